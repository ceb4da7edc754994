export interface Clock {
    /** Nanoseconds since the Unix epoch */
    nowUnixNano(): bigint;
}

/**
 * Wall-clock anchored once, advanced by the monotonic high-resolution timer
 */
export class SystemClock implements Clock {
    private readonly wallAnchor = BigInt(Date.now()) * 1_000_000n;
    private readonly monotonicAnchor = process.hrtime.bigint();

    nowUnixNano(): bigint {
        return this.wallAnchor + (process.hrtime.bigint() - this.monotonicAnchor);
    }
}
