import { env } from './env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    event: string;
    level: LogLevel;
    timestamp: string;
    input?: string;
    output?: string;
    error?: string;
    [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export class Logger {
    constructor(
        private readonly minLevel: LogLevel = 'info',
        private readonly production = false,
    ) {}

    private format(level: LogLevel, event: string, data: Partial<LogEntry>): LogEntry {
        return {
            ...data,
            level,
            event,
            timestamp: new Date().toISOString(),
        };
    }

    private print(entry: LogEntry) {
        if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this.minLevel]) return;
        if (entry.level === 'debug' && this.production) return;

        if (entry.level === 'error') {
            console.error(JSON.stringify(entry));
        } else {
            console.log(JSON.stringify(entry));
        }
    }

    debug(event: string, data: Partial<LogEntry> = {}) {
        this.print(this.format('debug', event, data));
    }

    info(event: string, data: Partial<LogEntry> = {}) {
        this.print(this.format('info', event, data));
    }

    warn(event: string, data: Partial<LogEntry> = {}) {
        this.print(this.format('warn', event, data));
    }

    error(event: string, data: Partial<LogEntry> = {}) {
        this.print(this.format('error', event, data));
    }
}

export const logger = new Logger(env.LOG_LEVEL, env.NODE_ENV === 'production');
