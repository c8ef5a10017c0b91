export enum CongestionErrorCodes {
    // the estimator broke one of its own invariants, this is a bug, not bad input
    INVARIANT_VIOLATION = 0x1,
    INVALID_OPTION = 0x2
}
