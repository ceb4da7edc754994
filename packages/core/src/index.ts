/**
 * @steptrace/core
 *
 * W3C trace-context propagation plus OTLP/JSON spans, logs and metrics for
 * short-lived CI steps.
 */

// Tracer and steps
export * from './tracer/index.js';

// Configuration
export * from './config/index.js';

// Context propagation
export * from './propagation/index.js';

// Records and encoding
export * from './telemetry/index.js';

// Delivery
export * from './exporter/index.js';

// Retry
export * from './retry/index.js';

// Output tee
export * from './log-tee/index.js';

// Logger
export * from './logger/index.js';

// Errors
export * from './errors/index.js';
