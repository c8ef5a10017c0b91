
/**
 * Arithmetic on the 32-bit byte position counter.
 * Positions wrap around, so all comparisons are only valid while the real distance
 * between two positions is below half the counter range.
 */
export class SerialArithmetic {

    public static readonly MODULUS: number = 0x100000000;
    public static readonly HALF_RANGE: number = 0x80000000;

    /**
     * Reduce an integer modulo 2^32
     */
    public static toUint32(value: number): number {
        return value >>> 0;
    }

    /**
     * Bytes from earlier up to later, accounting for wraparound
     */
    public static distance(later: number, earlier: number): number {
        return (later - earlier) >>> 0;
    }

    /**
     * Checks if position a lies strictly ahead of position b
     */
    public static isAfter(a: number, b: number): boolean {
        let distance = SerialArithmetic.distance(a, b);
        return distance !== 0 && distance < SerialArithmetic.HALF_RANGE;
    }
}
