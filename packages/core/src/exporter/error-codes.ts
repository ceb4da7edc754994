/**
 * Exporter delivery error codes
 */
export enum ExporterErrorCode {
    DELIVERY_TIMEOUT = 'exporter_delivery_timeout',
    DELIVERY_REJECTED = 'exporter_delivery_rejected',
    DELIVERY_FAILED = 'exporter_delivery_failed',
    SERIALIZATION_FAILED = 'exporter_serialization_failed',
}
