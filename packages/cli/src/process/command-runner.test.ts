import { EventEmitter } from 'events';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PassThrough, Writable } from 'stream';
import type { SpawnOptions } from 'child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LogTee } from '@steptrace/core';
import { createCommandRunner, signalExitCode, type ChildLike } from './command-runner.js';

class FakeChild extends EventEmitter implements ChildLike {
    readonly stdout = new PassThrough();
    readonly stderr = new PassThrough();
}

function setup() {
    const child = new FakeChild();
    const spawnProcess = vi.fn((_file: string, _args: readonly string[], _options: SpawnOptions) => child);
    return { child, spawnProcess, runner: createCommandRunner(spawnProcess) };
}

describe('createCommandRunner', () => {
    it('spawns the program with its arguments and inherited output', async () => {
        const { child, spawnProcess, runner } = setup();

        const result = runner({ command: ['make', 'build'], env: { TRACEPARENT: 'tp' } });
        child.emit('close', 0, null);

        await expect(result).resolves.toBe(0);
        expect(spawnProcess).toHaveBeenCalledWith('make', ['build'], {
            env: { TRACEPARENT: 'tp' },
            shell: false,
            stdio: 'inherit',
        });
    });

    it('passes arguments with spaces and quotes as single arguments', async () => {
        const { child, spawnProcess, runner } = setup();

        const result = runner({ command: ['echo', 'hello world', "it's"], env: {} });
        child.emit('close', 0, null);

        await expect(result).resolves.toBe(0);
        expect(spawnProcess.mock.calls[0]?.[1]).toEqual(['hello world', "it's"]);
    });

    it('rejects an empty command without spawning', async () => {
        const { spawnProcess, runner } = setup();

        await expect(runner({ command: [], env: {} })).rejects.toMatchObject({
            code: 'process_execution_failed',
        });
        expect(spawnProcess).not.toHaveBeenCalled();
    });

    it('reports the exit code of a failing command', async () => {
        const { child, runner } = setup();

        const result = runner({ command: ['false'], env: {} });
        child.emit('close', 2, null);

        await expect(result).resolves.toBe(2);
    });

    it('maps a signal to 128 plus the signal number', async () => {
        const { child, runner } = setup();

        const result = runner({ command: ['sleep', '60'], env: {} });
        child.emit('close', null, 'SIGTERM');

        await expect(result).resolves.toBe(128 + os.constants.signals.SIGTERM);
    });

    it('rejects when the program cannot be found', async () => {
        const { child, runner } = setup();

        const result = runner({ command: ['make', 'all'], env: {} });
        child.emit('error', Object.assign(new Error('spawn make ENOENT'), { code: 'ENOENT' }));

        await expect(result).rejects.toMatchObject({
            code: 'process_command_not_found',
            scope: 'process',
            message: 'Command not found: make',
        });
    });

    describe('with a log tee', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(path.join(os.tmpdir(), 'command-runner-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('pipes stdout and stderr through the tee before resolving', async () => {
            const { child, spawnProcess, runner } = setup();
            const logPath = path.join(dir, 'out.log');
            const sink = {
                log: vi.fn(),
                correlation: { traceId: 't', parentSpanId: 'p', spanId: 's' },
            };
            const tee = new LogTee({
                sink,
                logPath,
                console: new Writable({ write: (_chunk, _encoding, callback) => callback() }),
            });

            const result = runner({ command: ['make'], env: {}, tee });
            child.stdout.end('compiled\n');
            child.stderr.end('warning: unused\n');
            child.emit('close', 0, null);

            await expect(result).resolves.toBe(0);
            expect(spawnProcess.mock.calls[0]?.[2].stdio).toEqual(['inherit', 'pipe', 'pipe']);
            expect(sink.log.mock.calls.map(([line]) => line).sort()).toEqual([
                'compiled',
                'warning: unused',
            ]);
            const written = (await readFile(logPath, 'utf8')).split('\n').filter(Boolean).sort();
            expect(written).toEqual(['compiled', 'warning: unused']);
        });
    });
});

describe('signalExitCode', () => {
    it('falls back to 1 without a signal', () => {
        expect(signalExitCode(null)).toBe(1);
    });

    it('adds the signal number to 128', () => {
        expect(signalExitCode('SIGKILL')).toBe(137);
    });
});
