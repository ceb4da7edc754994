/**
 * Console Transport
 *
 * Writes diagnostics to stderr. Stdout carries the step's own output, so the
 * instrumentation stays off it regardless of level.
 */

import chalk from 'chalk';
import type { LoggerTransport, LogEntry, LogLevel } from '../types.js';

export interface ConsoleTransportConfig {
    colorize?: boolean;
    /** Destination stream, stderr by default */
    stream?: NodeJS.WritableStream;
}

export class ConsoleTransport implements LoggerTransport {
    private colorize: boolean;
    private stream: NodeJS.WritableStream;

    constructor(config: ConsoleTransportConfig = {}) {
        this.colorize = config.colorize ?? true;
        this.stream = config.stream ?? process.stderr;
    }

    write(entry: LogEntry): void {
        const timestamp = new Date(entry.timestamp).toLocaleTimeString();
        const component = `[${entry.component}:${entry.service}]`;
        const levelLabel = `[${entry.level.toUpperCase()}]`;

        let message = `${timestamp} ${levelLabel} ${component} ${entry.message}`;

        if (this.colorize) {
            message = this.getColorForLevel(entry.level)(message);
        }

        if (entry.context && Object.keys(entry.context).length > 0) {
            message += ' ' + JSON.stringify(entry.context);
        }

        this.stream.write(message + '\n');
    }

    private getColorForLevel(level: LogLevel): (text: string) => string {
        switch (level) {
            case 'debug':
                return chalk.gray;
            case 'info':
                return chalk.cyan;
            case 'warn':
                return chalk.yellow;
            case 'error':
                return chalk.red;
            default:
                return (s: string) => s;
        }
    }
}
