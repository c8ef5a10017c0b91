
export class Constants {

    /**
     * Verify the estimator's internal invariants (minRTT >= baseRTT, window bounds, ...)
     * A violation is a bug in the estimation logic, so this throws instead of clamping.
     */
    public static DEBUG_verifyInvariants: boolean = process.env.CONGESTION_VERIFY_INVARIANTS !== "false";

    public static readonly LOG_TYPE = "stdout";
    public static          LOG_LEVEL = process.env.LOG_LEVEL || 'info';
    public static          LOG_FILE_NAME: string | undefined = process.env.LOG_FILE_NAME;
    public static readonly MAX_LOG_FILE_SIZE = 20971520;

    /**
     * Congestion window bounds, in bytes
     */
    // gets us going fairly fast on a decent network. If it's too high, it is rapidly reduced
    public static readonly INITIAL_WINDOW = 16384;
    // TCP's minimal window is 3*MSS, but the MSS is unknown here. 4 KiB is a guess on the low side
    public static readonly MINIMUM_WINDOW = 4096;
    // default maximum window of Linux
    public static readonly MAXIMUM_WINDOW = 4194304;

    /**
     * Window adjustment (all delays in ms above the wire latency)
     */
    public static readonly MIN_SAMPLES_PER_ADJUSTMENT = 3;
    public static readonly WAY_TOO_LARGE_DELAY = 100;
    public static readonly TOO_LARGE_DELAY = 50;
    public static readonly WAY_TOO_SMALL_DELAY = 5;
    public static readonly TOO_SMALL_DELAY = 25;
    public static readonly WINDOW_DECREMENT = 4096;
    public static readonly WINDOW_INCREMENT = 4096;
    public static readonly WINDOW_FAST_INCREMENT = 8192;

    /**
     * Lower bound of the idle timeout, used as is while the wire latency is unknown (ms)
     */
    public static readonly IDLE_TIMEOUT_FLOOR = 100;

    // the probe queue is never trimmed, we only complain about it
    public static readonly PENDING_PROBES_WARN_THRESHOLD = 64;

    /**
     * How long the send gate waits before re-checking when no ETA can be estimated (ms)
     */
    public static readonly CONGESTION_RETRY_INTERVAL = 100;
}
