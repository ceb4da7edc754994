export { LogTee, annotateLine, type LogTeeOptions } from './log-tee.js';
export type { LogSink, LogCorrelation } from './types.js';
