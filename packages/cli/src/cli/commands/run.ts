import path from 'path';
import type { Writable } from 'stream';
import { z } from 'zod';
import {
    LogComponent,
    LogTee,
    TRACEPARENT_ENV,
    createTracer,
    isStepTraceError,
    type RetryPolicyInput,
    type Tracer,
} from '@steptrace/core';
import { createCommandRunner, type CommandRunner } from '../../process/command-runner.js';
import { ProcessErrorCode } from '../../process/error-codes.js';
import { ProcessError } from '../../process/errors.js';

const RunCommandSchema = z
    .object({
        step: z.string().min(1, 'Step name cannot be empty'),
        command: z
            .array(z.string())
            .min(1, 'A command to run is required after --'),
        attr: z.array(z.string()).default([]),
        logFile: z.string().min(1).optional(),
        span: z.string().min(1).optional(),
        retry: z.boolean().default(false),
        maxAttempts: z.coerce.number().int().positive().optional(),
        initialDelay: z.coerce.number().nonnegative().optional().describe('Seconds'),
        maxDelay: z.coerce.number().nonnegative().optional().describe('Seconds'),
    })
    .strict();

export type RunCommandOptions = z.output<typeof RunCommandSchema>;

export interface RunCommandDeps {
    tracer?: Tracer;
    runner?: CommandRunner;
    env?: NodeJS.ProcessEnv;
    /** Console side of the log tee */
    stdout?: Writable;
}

function retryOverrides(options: RunCommandOptions): RetryPolicyInput {
    const policy: RetryPolicyInput = {};
    if (options.maxAttempts !== undefined) policy.maxAttempts = options.maxAttempts;
    if (options.initialDelay !== undefined) {
        policy.initialDelayMs = Math.round(options.initialDelay * 1000);
    }
    if (options.maxDelay !== undefined) policy.maxDelayMs = Math.round(options.maxDelay * 1000);
    return policy;
}

/**
 * Runs one command as a traced step and returns the exit code to leave with.
 * @throws {z.ZodError} for invalid options, before any step is started
 */
export async function handleRunCommand(input: unknown, deps: RunCommandDeps = {}): Promise<number> {
    const options = RunCommandSchema.parse(input);
    const env = deps.env ?? process.env;
    const tracer = deps.tracer ?? createTracer({ env });
    const logger = tracer.logger.createChild(LogComponent.CLI);
    const runner = deps.runner ?? createCommandRunner(undefined, logger.createChild(LogComponent.PROCESS));

    const commandLine = options.command.join(' ');
    const spanName = options.span ?? path.basename(options.command[0] ?? commandLine);
    const step = tracer.startStep(options.step, options.attr);
    const tee = options.logFile
        ? new LogTee({
              sink: step,
              logPath: options.logFile,
              console: deps.stdout,
              logger: logger.createChild(LogComponent.LOG_TEE),
          })
        : undefined;

    let lastExitCode = 0;
    const attempt = async (): Promise<number> => {
        lastExitCode = await runner({
            command: options.command,
            env: { ...env, [TRACEPARENT_ENV]: step.traceparent() },
            tee,
        });
        if (lastExitCode !== 0) {
            throw ProcessError.nonZeroExit(commandLine, lastExitCode);
        }
        return lastExitCode;
    };

    let exitCode: number;
    try {
        exitCode = options.retry
            ? await step.retry(spanName, attempt, retryOverrides(options))
            : await step.trace(spanName, attempt);
    } catch (error) {
        exitCode = lastExitCode !== 0 ? lastExitCode : 1;
        // a non-zero exit is carried by the span status alone
        const nonZeroExit = isStepTraceError(error) && error.code === ProcessErrorCode.NON_ZERO_EXIT;
        if (!nonZeroExit && error instanceof Error) {
            logger.trackException(error, { command: commandLine });
        } else if (!nonZeroExit) {
            logger.error(String(error), { command: commandLine });
        }
    }

    await step.end(exitCode);
    if (!deps.tracer) {
        await tracer.close();
    }
    return exitCode;
}
