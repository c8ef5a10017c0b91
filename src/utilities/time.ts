export class Time {

    /**
     * Milliseconds (fractional) since an arbitrary, fixed point in the past
     */
    public static now(): number {
        var hr = process.hrtime();
        return hr[0] * 1e3 + hr[1] / 1e6;
    }

    /**
     * Whole milliseconds between two timestamps, truncated. A clock that went backwards gives 0.
     */
    public static msBetween(earlier: number, later: number): number {
        return Math.max(0, Math.floor(later - earlier));
    }
}

/**
 * Timestamp source for the congestion controller, in milliseconds
 */
export interface Clock {
    now(): number;
}

export class MonotonicClock implements Clock {
    public now(): number {
        return Time.now();
    }
}
