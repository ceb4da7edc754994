import type { ZodIssue } from 'zod';
import { StepTraceRuntimeError } from '../errors/runtime-error.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { RetryErrorCode } from './error-codes.js';

export class RetryError {
    static invalidPolicy(issues: ZodIssue[]): StepTraceRuntimeError {
        const detail = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        return new StepTraceRuntimeError(
            RetryErrorCode.INVALID_POLICY,
            ErrorScope.RETRY,
            ErrorType.USER,
            `Invalid retry policy: ${detail}`,
            { issues }
        );
    }
}
