import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { StepTraceLogger } from './logger.js';
import { createLogger } from './factory.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LogComponent, type LogEntry, type LoggerTransport } from './types.js';
import { LoggerErrorCode } from './error-codes.js';

function recordingTransport(): LoggerTransport & { entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    return {
        entries,
        write: (entry: LogEntry) => {
            entries.push(entry);
        },
    };
}

describe('StepTraceLogger', () => {
    it('drops entries below the configured level', () => {
        const transport = recordingTransport();
        const logger = new StepTraceLogger({
            level: 'warn',
            component: LogComponent.EXPORTER,
            service: 'svc',
            transports: [transport],
        });

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');
        logger.error('shown too');

        expect(transport.entries.map((e) => e.message)).toEqual(['shown', 'shown too']);
        expect(transport.entries[0]?.component).toBe('exporter');
        expect(transport.entries[0]?.service).toBe('svc');
    });

    it('children inherit the level and transports of their parent', () => {
        const transport = recordingTransport();
        const logger = new StepTraceLogger({
            level: 'debug',
            component: LogComponent.TRACER,
            service: 'svc',
            transports: [transport],
        });
        const child = logger.createChild(LogComponent.RETRY);

        child.debug('attempt failed', { attempt: 1 });
        child.silly('hidden');

        expect(transport.entries).toHaveLength(1);
        expect(transport.entries[0]).toMatchObject({
            level: 'debug',
            component: 'retry',
            context: { attempt: 1 },
        });
    });

    it('keeps logging when a transport throws', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const transport = recordingTransport();
        const broken: LoggerTransport = {
            write: () => {
                throw new Error('disk full');
            },
        };
        const logger = new StepTraceLogger({
            level: 'info',
            component: LogComponent.TRACER,
            service: 'svc',
            transports: [broken, transport],
        });

        logger.info('still delivered');

        expect(transport.entries).toHaveLength(1);
        expect(consoleError).toHaveBeenCalledTimes(1);
        consoleError.mockRestore();
    });

    it('trackException records error details', () => {
        const transport = recordingTransport();
        const logger = new StepTraceLogger({
            level: 'error',
            component: LogComponent.TRACER,
            service: 'svc',
            transports: [transport],
        });

        logger.trackException(new TypeError('bad value'), { field: 'x' });

        expect(transport.entries[0]?.message).toBe('bad value');
        expect(transport.entries[0]?.context).toMatchObject({
            field: 'x',
            errorName: 'TypeError',
            errorType: 'TypeError',
        });
    });
});

describe('ConsoleTransport', () => {
    it('writes uncoloured lines with context to the given stream', async () => {
        const stream = new PassThrough();
        const chunks: string[] = [];
        stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
        const transport = new ConsoleTransport({ colorize: false, stream });

        transport.write({
            level: 'warn',
            message: 'export dropped',
            timestamp: new Date().toISOString(),
            component: LogComponent.EXPORTER,
            service: 'svc',
            context: { status: 503 },
        });

        await new Promise((resolve) => setImmediate(resolve));
        const output = chunks.join('');
        expect(output).toContain('[WARN] [exporter:svc] export dropped {"status":503}');
        expect(output.endsWith('\n')).toBe(true);
    });
});

describe('FileTransport', () => {
    it('appends one JSON entry per line, creating the directory', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'file-transport-'));
        const filePath = path.join(dir, 'nested', 'diagnostics.jsonl');
        try {
            const transport = new FileTransport({ path: filePath });
            const entry: LogEntry = {
                level: 'debug',
                message: 'span exported',
                timestamp: '2024-01-01T00:00:00.000Z',
                component: LogComponent.TRACER,
                service: 'svc',
                context: { name: 'compile' },
            };

            transport.write(entry);
            transport.write({ ...entry, message: 'log exported', context: undefined });
            await transport.destroy();

            const lines = (await readFile(filePath, 'utf8')).trimEnd().split('\n');
            expect(lines.map((line) => JSON.parse(line).message)).toEqual([
                'span exported',
                'log exported',
            ]);
            expect(JSON.parse(lines[0] ?? '{}')).toEqual(entry);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});

describe('createLogger', () => {
    it('applies the default warn level', async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), 'create-logger-'));
        const filePath = path.join(dir, 'diagnostics.jsonl');
        try {
            const logger = createLogger({
                service: 'svc',
                config: { transports: [{ type: 'file', path: filePath }] },
            });

            logger.info('hidden');
            logger.warn('export dropped');
            await logger.destroy();

            const lines = (await readFile(filePath, 'utf8')).trimEnd().split('\n');
            expect(lines.map((line) => JSON.parse(line).message)).toEqual(['export dropped']);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it('rejects an invalid configuration', () => {
        let caught: unknown;
        try {
            createLogger({ service: 'svc', config: { transports: [{ type: 'file', path: '' }] } });
        } catch (error) {
            caught = error;
        }
        expect(caught).toMatchObject({ code: LoggerErrorCode.INVALID_CONFIG, scope: 'logger' });
    });
});
