import { VerboseLogging } from "../utilities/logging/verbose.logging";


export enum WindowAction {
    // RTT way above the wire latency: scale the window by baseRTT / minRTT
    SHRINK_MULTIPLICATIVE = "shrink-multiplicative",
    SHRINK = "shrink",
    GROW_FAST = "grow-fast",
    GROW = "grow",
    HOLD = "hold"
}

export interface WindowAdjustment {
    action: WindowAction;
    previousWindow: number;
    congestionWindow: number;
    baseRTT: number;
    minRTT: number;
    // undefined when none of the samples was taken while congested
    minCongestedRTT: number | undefined;
}

export interface IdleReset {
    idleTime: number;
    previousWindow: number;
    congestionWindow: number;
}

/**
 * Optional listener the controller notifies after each window adjustment and idle reset.
 * Called synchronously, from inside probeAcked() and recordProgress() respectively.
 * onProbeBacklog() fires from probeSent() each time the number of unanswered probes
 * reaches a multiple of Constants.PENDING_PROBES_WARN_THRESHOLD.
 */
export interface CongestionObserver {
    onWindowAdjusted(adjustment: WindowAdjustment): void;
    onIdleReset(reset: IdleReset): void;
    onProbeBacklog(pendingProbes: number): void;
}

/**
 * Default observer: debug output on what the congestion control is up to
 */
export class LoggingCongestionObserver implements CongestionObserver {

    public onWindowAdjusted(adjustment: WindowAdjustment): void {
        if (!VerboseLogging.isDebugEnabled())
            return;

        let bandwidth = adjustment.congestionWindow * 8.0 / adjustment.baseRTT / 1000.0;
        VerboseLogging.debug("CongestionController:adjustWindow : RTT: " + adjustment.minRTT + " ms (" + adjustment.baseRTT + " ms), Window: " + Math.floor(adjustment.congestionWindow / 1024) + " KiB, Bandwidth: " + bandwidth.toFixed(3) + " Mbps (" + adjustment.action + ")");
    }

    public onIdleReset(reset: IdleReset): void {
        VerboseLogging.debug("CongestionController:recordProgress : connection idle for " + reset.idleTime + " ms, resetting congestion control. Window " + reset.previousWindow + " -> " + reset.congestionWindow);
    }

    public onProbeBacklog(pendingProbes: number): void {
        VerboseLogging.warn("CongestionController:probeSent : " + pendingProbes + " probes are waiting for a response, is the peer still answering?");
    }
}
