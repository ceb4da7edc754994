import type { Clock } from '../telemetry/clock.js';

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
    constructor(private now: bigint = 1_700_000_000_000_000_000n) {}

    nowUnixNano(): bigint {
        return this.now;
    }

    advanceMs(ms: number): void {
        this.now += BigInt(ms) * 1_000_000n;
    }
}
