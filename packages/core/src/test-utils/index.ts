export { ManualClock } from './clock.js';
export { SequentialIdGenerator } from './ids.js';
export { RecordingExporter } from './recording-exporter.js';
export { createMockLogger, createSilentMockLogger } from '../logger/test-utils.js';
