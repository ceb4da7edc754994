import type { IdGenerator } from '../propagation/id-generator.js';

/**
 * Deterministic ids: trace ids `000...0001`, span ids `000...0001`, counting up
 */
export class SequentialIdGenerator implements IdGenerator {
    private traces = 0;
    private spans = 0;

    traceId(): string {
        this.traces += 1;
        return this.traces.toString(16).padStart(32, '0');
    }

    spanId(): string {
        this.spans += 1;
        return this.spans.toString(16).padStart(16, '0');
    }
}
