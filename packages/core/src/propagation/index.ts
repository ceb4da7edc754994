export {
    type TraceContext,
    type DerivedContext,
    EMPTY_CONTEXT,
    SAMPLED_FLAGS,
    TRACEPARENT_VERSION,
    parseTraceparent,
    formatTraceparent,
    isEmptyContext,
    deriveChild,
} from './trace-context.js';
export { type IdGenerator, RandomIdGenerator } from './id-generator.js';
export {
    type ContextCarrier,
    EnvContextCarrier,
    InMemoryContextCarrier,
    TRACEPARENT_ENV,
    restore,
} from './carrier.js';
export { ActiveContext } from './active-context.js';
