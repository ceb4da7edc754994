/**
 * Splits a command's combined output three ways, like `tee` with tracing:
 * the bytes as received to a file, each line to a sink (the step's OTLP logs),
 * and an annotated copy of each line to the console.
 */

import { createWriteStream, type WriteStream } from 'fs';
import type { Readable, Writable } from 'stream';
import { StringDecoder } from 'string_decoder';
import type { Logger } from '../logger/types.js';
import type { LogCorrelation, LogSink } from './types.js';

export interface LogTeeOptions {
    sink: LogSink;
    /** Truncated when the tee attaches */
    logPath: string;
    /** Defaults to process.stdout */
    console?: Writable;
    logger?: Logger;
}

export function annotateLine(correlation: LogCorrelation, line: string): string {
    return `traceId=${correlation.traceId} parentId=${correlation.parentSpanId} spanId=${correlation.spanId} ${line}`;
}

export class LogTee {
    private readonly sink: LogSink;
    private readonly logPath: string;
    private readonly console: Writable;
    private readonly logger: Logger | undefined;

    constructor(options: LogTeeOptions) {
        this.sink = options.sink;
        this.logPath = options.logPath;
        this.console = options.console ?? process.stdout;
        this.logger = options.logger;
    }

    /**
     * Consumes `source`, waiting on the file and the console when they are
     * full. Resolves once it ended and the log file is closed. A log file
     * that cannot be written is reported and skipped.
     */
    async attach(source: Readable): Promise<void> {
        const file = createWriteStream(this.logPath, { flags: 'w' });
        let fileFailed = false;
        file.on('error', (error) => {
            if (fileFailed) return;
            fileFailed = true;
            this.logger?.warn(`Cannot write log file ${this.logPath}: ${error.message}`, {
                logPath: this.logPath,
            });
        });

        const lines = new LineSplitter();
        try {
            for await (const chunk of source) {
                const data: unknown = chunk;
                const bytes = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
                if (!fileFailed) {
                    await writeAndWait(file, bytes);
                }
                for (const line of lines.push(bytes)) {
                    await this.emitLine(line);
                }
            }
            for (const line of lines.end()) {
                await this.emitLine(line);
            }
        } finally {
            await closeFile(file);
        }
    }

    private async emitLine(line: string): Promise<void> {
        this.sink.log(line);
        await writeAndWait(this.console, `${annotateLine(this.sink.correlation, line)}\n`);
    }
}

/**
 * Cuts decoded text on `\n`, dropping one trailing `\r` per line
 */
class LineSplitter {
    private readonly decoder = new StringDecoder('utf8');
    private pending = '';

    push(bytes: Buffer): string[] {
        const parts = (this.pending + this.decoder.write(bytes)).split('\n');
        this.pending = parts.pop() ?? '';
        return parts.map(withoutCarriageReturn);
    }

    /** The unterminated last line, if any */
    end(): string[] {
        const rest = this.pending + this.decoder.end();
        this.pending = '';
        return rest === '' ? [] : [withoutCarriageReturn(rest)];
    }
}

function withoutCarriageReturn(line: string): string {
    return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Resolves once the stream accepts more, or once it closed
 */
function writeAndWait(stream: Writable, chunk: string | Buffer): Promise<void> {
    if (stream.write(chunk) || stream.destroyed) {
        return Promise.resolve();
    }
    return new Promise((resolve) => {
        const done = () => {
            stream.off('drain', done);
            stream.off('close', done);
            resolve();
        };
        stream.on('drain', done);
        stream.on('close', done);
    });
}

function closeFile(file: WriteStream): Promise<void> {
    return new Promise((resolve) => {
        if (file.closed) {
            resolve();
            return;
        }
        file.once('close', () => resolve());
        file.end();
    });
}
