const isTest = process.env.NODE_ENV === 'test';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export class Logger {
    private level: LogLevel;
    private readonly explicitLevel: boolean;

    constructor(level?: string) {
        this.explicitLevel = level !== undefined;
        this.level = Logger.toLevel(level);
    }

    private static toLevel(level: string | undefined): LogLevel {
        const normalized = (level || 'warn').toLowerCase();
        return LEVELS.find(candidate => candidate === normalized) ?? 'warn';
    }

    public setLevel(level: string): void {
        this.level = Logger.toLevel(level);
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
    }

    // stdout belongs to the report; every log line goes to stderr
    private shouldOutput(): boolean {
        return !isTest || this.explicitLevel;
    }

    public info(message: string, meta?: unknown): void {
        if (this.shouldLog('info') && this.shouldOutput()) {
            console.error(`[INFO] ${message}`, meta ?? '');
        }
    }

    public error(message: string, error?: unknown): void {
        if (this.shouldLog('error') && this.shouldOutput()) {
            console.error(`[ERROR] ${message}`, Logger.describe(error));
        }
    }

    public warn(message: string, meta?: unknown): void {
        if (this.shouldLog('warn') && this.shouldOutput()) {
            console.error(`[WARN] ${message}`, Logger.describe(meta));
        }
    }

    public debug(message: string, meta?: unknown): void {
        if (this.shouldLog('debug') && this.shouldOutput()) {
            console.error(`[DEBUG] ${message}`, meta ?? '');
        }
    }

    private static describe(value: unknown): unknown {
        if (value instanceof Error) {
            return value.message;
        }
        return value ?? '';
    }
}

export const logger = new Logger(process.env.LOG_LEVEL);
