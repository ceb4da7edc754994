/**
 * File Transport
 *
 * Appends one JSON entry per line to a diagnostics file.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    path: string;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private writeStream: fs.WriteStream | null;

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;

        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        this.writeStream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        this.writeStream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
    }

    write(entry: LogEntry): void {
        this.writeStream?.write(JSON.stringify(entry) + '\n');
    }

    getFilePath(): string {
        return this.filePath;
    }

    async destroy(): Promise<void> {
        const stream = this.writeStream;
        if (!stream) return;
        this.writeStream = null;
        await new Promise<void>((resolve) => stream.end(() => resolve()));
    }
}
