/**
 * StepTrace Logger
 *
 * Multi-transport diagnostic logger with component-based categorisation.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, LogComponent } from './types.js';

export interface StepTraceLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: LogComponent;
    service: string;
    transports: LoggerTransport[];
}

export class StepTraceLogger implements Logger {
    // Lower number = more severe; an entry is logged when its number <= the configured one
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    private readonly level: LogLevel;
    private readonly component: LogComponent;
    private readonly service: string;
    private readonly transports: LoggerTransport[];

    constructor(config: StepTraceLoggerConfig) {
        this.level = config.level;
        this.component = config.component;
        this.service = config.service;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    silly(message: string, context?: Record<string, unknown>): void {
        this.log('silly', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    createChild(component: LogComponent): StepTraceLogger {
        return new StepTraceLogger({
            level: this.level,
            component,
            service: this.service,
            transports: this.transports,
        });
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        if (StepTraceLogger.LEVELS[level] > StepTraceLogger.LEVELS[this.level]) {
            return;
        }

        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            service: this.service,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break logging
                console.error('Logger transport error:', error);
            }
        }
    }
}
