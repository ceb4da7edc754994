/**
 * Trace ids stamped on each console line
 */
export interface LogCorrelation {
    readonly traceId: string;
    readonly parentSpanId: string;
    readonly spanId: string;
}

/**
 * Where teed lines go besides the file and the console. An open Step is one.
 */
export interface LogSink {
    log(line: string): void;
    readonly correlation: LogCorrelation;
}
