export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'none'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error' | 'log' | 'dir'>;

export type LoggerOptions = {
    level?: LogLevel | undefined;
    sink?: LogSink | undefined;
};

export function isLogLevel(maybe: unknown): maybe is LogLevel {
    return LOG_LEVELS.some((level) => level === maybe);
}

export class Logger {
    private level: LogLevel;
    private readonly name: string;
    private readonly sink: LogSink;

    constructor(name: string, options: LoggerOptions = {}) {
        this.name = name;
        this.level = options.level ?? 'info';
        this.sink = options.sink ?? console;
    }

    get currentLevel(): LogLevel {
        return this.level;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    /**
     * @returns a logger that writes to the same sink at the same level, tagged `parent:suffix`
     */
    child(suffix: string): Logger {
        return new Logger(`${this.name}:${suffix}`, { level: this.level, sink: this.sink });
    }

    private shouldLog(level: LogLevel): boolean {
        return level !== 'none' && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
    }

    private formatMessage(level: LogLevel, message: string): string {
        const timestamp = new Date().toISOString();
        return `[${timestamp}] [${this.name}] [${level.toUpperCase()}] ${message}`;
    }

    debug(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('debug')) {
            this.sink.debug(this.formatMessage('debug', message), ...optionalParams);
        }
    }

    dir(obj: unknown, ...optionalParams: unknown[]) {
        if (this.shouldLog('debug')) {
            this.sink.log(this.formatMessage('debug', 'See object below'), ...optionalParams);
            this.sink.dir(obj);
        }
    }

    info(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('info')) {
            this.sink.info(this.formatMessage('info', message), ...optionalParams);
        }
    }

    warn(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('warn')) {
            this.sink.warn(this.formatMessage('warn', message), ...optionalParams);
        }
    }

    error(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog('error')) {
            this.sink.error(this.formatMessage('error', message), ...optionalParams);
        }
    }
}

export function createLogger(name: string, options?: LoggerOptions): Logger {
    return new Logger(name, options);
}

export const logger = new Logger('cutout');
