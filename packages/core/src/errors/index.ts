export { ErrorScope, ErrorType } from './types.js';
export { StepTraceRuntimeError, isStepTraceError } from './runtime-error.js';
