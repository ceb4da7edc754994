import { ErrorScope, ErrorType, StepTraceRuntimeError } from '@steptrace/core';
import { ProcessErrorCode } from './error-codes.js';

/**
 * Step command error factory
 */
export class ProcessError {
    static commandNotFound(command: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ProcessErrorCode.COMMAND_NOT_FOUND,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Command not found: ${command}`,
            { command }
        );
    }

    static permissionDenied(command: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ProcessErrorCode.PERMISSION_DENIED,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `Permission denied: ${command}`,
            { command }
        );
    }

    static executionFailed(command: string, cause: string): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ProcessErrorCode.EXECUTION_FAILED,
            ErrorScope.PROCESS,
            ErrorType.SYSTEM,
            `Could not run ${command}: ${cause}`,
            { command }
        );
    }

    /**
     * Raised inside the command span so it closes as ERROR
     */
    static nonZeroExit(command: string, exitCode: number): StepTraceRuntimeError {
        return new StepTraceRuntimeError(
            ProcessErrorCode.NON_ZERO_EXIT,
            ErrorScope.PROCESS,
            ErrorType.USER,
            `${command} exited with code ${exitCode}`,
            { command, exitCode }
        );
    }
}
