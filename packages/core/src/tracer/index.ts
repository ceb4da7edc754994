export { Tracer, createTracer, STEP_NAME_PREFIX } from './tracer.js';
export { Step, type StepInit } from './step.js';
export type { TracerOptions, TracerDeps } from './types.js';
