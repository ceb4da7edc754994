/**
 * Step command error codes
 */
export enum ProcessErrorCode {
    COMMAND_NOT_FOUND = 'process_command_not_found',
    PERMISSION_DENIED = 'process_permission_denied',
    EXECUTION_FAILED = 'process_execution_failed',
    NON_ZERO_EXIT = 'process_non_zero_exit',
}
