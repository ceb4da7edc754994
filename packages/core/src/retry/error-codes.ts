/**
 * Retry error codes
 */
export enum RetryErrorCode {
    INVALID_POLICY = 'retry_invalid_policy',
}
