export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const METHODS: Record<LogLevel, 'debug' | 'log' | 'warn' | 'error'> = {
    debug: 'debug',
    info: 'log',
    warn: 'warn',
    error: 'error',
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

/**
 * Structured logger.
 *
 * Writes a single JSON object per call so every field can be extracted
 * and queried by whatever collects stdout.
 */
export function log(
    level: LogLevel,
    component: string,
    event: string,
    data?: Record<string, unknown>,
): void {
    if (RANK[level] < RANK[threshold]) return;
    const timestamp = new Date().toISOString();
    console[METHODS[level]](JSON.stringify({ timestamp, level, component, event, ...data }));
}
