
/**
 * Snapshot taken when a round-trip probe is sent, matched in order with its response
 */
export interface ProbeSample {
    /**
     * Time the probe was dispatched (ms, clock of the controller)
     */
    readonly sentAt: number;
    /**
     * Byte position at send time
     */
    readonly positionAtSend: number;
    /**
     * Over-buffered bytes estimated at send time
     */
    readonly extraAtSend: number;
    readonly wasCongested: boolean;
}
