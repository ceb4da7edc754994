/**
 * Runs a step's command as an argv list and reports its exit code.
 * Output is inherited, or merged into one stream for a LogTee.
 */

import { spawn, type SpawnOptions } from 'child_process';
import os from 'os';
import { PassThrough, type Readable } from 'stream';
import type { LogTee, Logger } from '@steptrace/core';
import { ProcessError } from './errors.js';

/**
 * The part of a ChildProcess the runner relies on
 */
export interface ChildLike {
    readonly stdout: Readable | null;
    readonly stderr: Readable | null;
    once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
    once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnLike = (file: string, args: readonly string[], options: SpawnOptions) => ChildLike;

export interface CommandSpec {
    /** Program followed by its arguments, passed through without a shell */
    command: readonly string[];
    env: NodeJS.ProcessEnv;
    /** Receives stdout and stderr as one stream when set */
    tee?: LogTee | undefined;
}

export type CommandRunner = (spec: CommandSpec) => Promise<number>;

const defaultSpawn: SpawnLike = (file, args, options) => spawn(file, args, options);

/**
 * Exit code the shell would report for a signal-terminated command
 */
export function signalExitCode(signal: NodeJS.Signals | null): number {
    const signals: Partial<Record<NodeJS.Signals, number>> = os.constants.signals;
    const signalNumber = signal ? signals[signal] : undefined;
    return signalNumber === undefined ? 1 : 128 + signalNumber;
}

function errnoCode(error: Error): string | undefined {
    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function waitForExit(child: ChildLike, file: string, commandLine: string): Promise<number> {
    return new Promise((resolve, reject) => {
        child.once('close', (code, signal) => {
            resolve(code ?? signalExitCode(signal));
        });
        child.once('error', (error) => {
            switch (errnoCode(error)) {
                case 'ENOENT':
                    reject(ProcessError.commandNotFound(file));
                    break;
                case 'EACCES':
                    reject(ProcessError.permissionDenied(file));
                    break;
                default:
                    reject(ProcessError.executionFailed(commandLine, error.message));
            }
        });
    });
}

/**
 * Interleaves stdout and stderr in arrival order; ends once both closed
 */
function mergeOutput(child: ChildLike): PassThrough {
    const merged = new PassThrough();
    const streams = [child.stdout, child.stderr].filter(
        (stream): stream is Readable => stream !== null
    );
    let open = streams.length;
    if (open === 0) {
        merged.end();
    }
    for (const stream of streams) {
        stream.pipe(merged, { end: false });
        stream.once('close', () => {
            open -= 1;
            if (open === 0) merged.end();
        });
    }
    return merged;
}

export function createCommandRunner(spawnProcess: SpawnLike = defaultSpawn, logger?: Logger): CommandRunner {
    return async ({ command, env, tee }) => {
        const [file, ...args] = command;
        if (file === undefined) {
            throw ProcessError.executionFailed('', 'no command given');
        }
        const commandLine = command.join(' ');
        logger?.debug(`Executing command: ${commandLine}`);
        const child = spawnProcess(file, args, {
            env,
            shell: false,
            stdio: tee ? ['inherit', 'pipe', 'pipe'] : 'inherit',
        });
        const exited = waitForExit(child, file, commandLine);
        if (!tee) {
            return exited;
        }
        const [exitCode] = await Promise.all([exited, tee.attach(mergeOutput(child))]);
        return exitCode;
    };
}
