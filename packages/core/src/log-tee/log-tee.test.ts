import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PassThrough, Writable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createMockLogger } from '../logger/test-utils.js';
import { InMemoryContextCarrier } from '../propagation/carrier.js';
import { loadConfig } from '../config/loader.js';
import { ManualClock } from '../test-utils/clock.js';
import { SequentialIdGenerator } from '../test-utils/ids.js';
import { RecordingExporter } from '../test-utils/recording-exporter.js';
import { createTracer } from '../tracer/tracer.js';
import { LogTee } from './log-tee.js';
import type { LogSink } from './types.js';

function collectingStream(): { stream: Writable; output: string[] } {
    const output: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {
            output.push(String(chunk));
            callback();
        },
    });
    return { stream, output };
}

function sourceOf(text: string): PassThrough {
    const source = new PassThrough();
    source.end(text);
    return source;
}

function fakeSink(): LogSink & { log: ReturnType<typeof vi.fn> } {
    return {
        log: vi.fn(),
        correlation: { traceId: 'trace-a', parentSpanId: 'parent-b', spanId: 'span-c' },
    };
}

describe('LogTee', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'log-tee-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('writes raw lines to the file, the sink and annotated lines to the console', async () => {
        const logPath = path.join(dir, 'build.log');
        const sink = fakeSink();
        const { stream, output } = collectingStream();

        await new LogTee({ sink, logPath, console: stream }).attach(sourceOf('first\nsecond\n'));

        expect(await readFile(logPath, 'utf8')).toBe('first\nsecond\n');
        expect(sink.log.mock.calls).toEqual([['first'], ['second']]);
        expect(output.join('')).toBe(
            'traceId=trace-a parentId=parent-b spanId=span-c first\n' +
                'traceId=trace-a parentId=parent-b spanId=span-c second\n'
        );
    });

    it('truncates an existing log file and writes the output bytes unchanged', async () => {
        const logPath = path.join(dir, 'build.log');
        await writeFile(logPath, 'stale output\n');
        const sink = fakeSink();
        const { stream, output } = collectingStream();

        await new LogTee({ sink, logPath, console: stream }).attach(sourceOf('only\r\ntail'));

        expect(await readFile(logPath, 'utf8')).toBe('only\r\ntail');
        expect(sink.log.mock.calls).toEqual([['only'], ['tail']]);
        expect(output).toEqual([
            'traceId=trace-a parentId=parent-b spanId=span-c only\n',
            'traceId=trace-a parentId=parent-b spanId=span-c tail\n',
        ]);
    });

    it('joins a character split across chunks', async () => {
        const sink = fakeSink();
        const encoded = Buffer.from('café\n');
        const source = new PassThrough();
        source.write(encoded.subarray(0, 4));
        source.end(encoded.subarray(4));

        await new LogTee({
            sink,
            logPath: path.join(dir, 'build.log'),
            console: collectingStream().stream,
        }).attach(source);

        expect(sink.log.mock.calls).toEqual([['café']]);
    });

    it('waits for a slow console to drain before writing the next line', async () => {
        const printed: string[] = [];
        let mostBuffered = 0;
        const slowConsole = new Writable({
            highWaterMark: 1,
            write(chunk, _encoding, callback) {
                mostBuffered = Math.max(mostBuffered, this.writableLength);
                printed.push(String(chunk));
                setTimeout(callback, 1);
            },
        });
        const annotated = ['a', 'bb', 'ccc'].map(
            (line) => `traceId=trace-a parentId=parent-b spanId=span-c ${line}\n`
        );

        await new LogTee({
            sink: fakeSink(),
            logPath: path.join(dir, 'build.log'),
            console: slowConsole,
        }).attach(sourceOf('a\nbb\nccc\n'));

        expect(printed).toEqual(annotated);
        expect(mostBuffered).toBe(Buffer.byteLength(annotated[2] ?? ''));
    });

    it('keeps teeing to the sink when the log file cannot be opened', async () => {
        const logPath = path.join(dir, 'missing', 'build.log');
        const sink = fakeSink();
        const logger = createMockLogger();

        await new LogTee({ sink, logPath, console: collectingStream().stream, logger }).attach(
            sourceOf('still here\n')
        );

        expect(sink.log).toHaveBeenCalledWith('still here');
        expect(logger.warn).toHaveBeenCalledWith(
            expect.stringContaining(`Cannot write log file ${logPath}`),
            { logPath }
        );
    });

    it('exports every line as a log record of the open step', async () => {
        const exporter = new RecordingExporter();
        const step = createTracer({
            config: loadConfig({ HOSTNAME: 'runner-1' }).config,
            exporter,
            carrier: new InMemoryContextCarrier(),
            clock: new ManualClock(),
            ids: new SequentialIdGenerator(),
            logger: createMockLogger(),
        }).startStep('test');
        const { stream, output } = collectingStream();

        await new LogTee({ sink: step, logPath: path.join(dir, 'test.log'), console: stream }).attach(
            sourceOf('ok 1\n')
        );

        expect(exporter.logs().map((record) => [record.body.stringValue, record.spanId])).toEqual([
            ['ok 1', '0000000000000001'],
        ]);
        expect(output).toEqual([
            'traceId=00000000000000000000000000000001 parentId= spanId=0000000000000001 ok 1\n',
        ]);
    });
});
