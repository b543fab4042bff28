// =============================================================================
// Logger — leveled, structured events written to stderr
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    event: string;
    data?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
    debug(event: string, data?: Record<string, unknown>): void;
    info(event: string, data?: Record<string, unknown>): void;
    warn(event: string, data?: Record<string, unknown>): void;
    error(event: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
    /** Lowest level that reaches the sink (default: 'warn'); 'silent' drops everything */
    level?: LogLevel | 'silent';

    /** Custom sink (defaults to one line per entry on stderr) */
    sink?: LogSink;
}

const RANK: Record<LogLevel | 'silent', number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * stdout carries the rendered frames, so log lines go to stderr.
 */
export const stderrSink: LogSink = (entry) => {
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    if (entry.data) {
        console.error(`${prefix} ${entry.event}`, entry.data);
    } else {
        console.error(`${prefix} ${entry.event}`);
    }
};

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = RANK[options.level ?? 'warn'];
    const sink = options.sink ?? stderrSink;

    function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
        if (RANK[level] < threshold) return;
        sink({ timestamp: Date.now(), level, event, data });
    }

    return {
        debug: (event, data) => emit('debug', event, data),
        info: (event, data) => emit('info', event, data),
        warn: (event, data) => emit('warn', event, data),
        error: (event, data) => emit('error', event, data),
    };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
