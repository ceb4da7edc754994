export {
    RetryExecutor,
    resolvePolicy,
    type Traceable,
    type RetryOperation,
    type RetryExecutorOptions,
    type Sleep,
} from './retry-executor.js';
export * from './schemas.js';
export { RetryError } from './errors.js';
export { RetryErrorCode } from './error-codes.js';
