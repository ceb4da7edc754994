export { SIGNAL_PATHS, type Exporter, type FetchLike } from './types.js';
export {
    OtlpHttpExporter,
    DEFAULT_EXPORT_TIMEOUT_MS,
    type OtlpHttpExporterOptions,
} from './otlp-http-exporter.js';
export { ExporterError } from './errors.js';
export { ExporterErrorCode } from './error-codes.js';
