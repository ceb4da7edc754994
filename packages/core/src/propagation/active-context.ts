import { AsyncLocalStorage } from 'async_hooks';
import type { TraceContext } from './trace-context.js';

/**
 * Tracks the innermost open span of one step across async boundaries.
 *
 * Each step owns its own instance, so sibling spans started concurrently in
 * the same step still see the step (or their own parent) as current.
 */
export class ActiveContext {
    private readonly storage = new AsyncLocalStorage<TraceContext>();

    constructor(private readonly root: TraceContext) {}

    current(): TraceContext {
        return this.storage.getStore() ?? this.root;
    }

    /**
     * Run `fn` with `context` as the current span
     */
    run<T>(context: TraceContext, fn: () => T): T {
        return this.storage.run(context, fn);
    }
}
