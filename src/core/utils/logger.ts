import * as winston from 'winston';
import * as path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
    level?: LogLevel;
    /** Also write to this file (its directory must exist) */
    file?: string | null;
    silent?: boolean;
}

/**
 * Build the winston logger shared by one CoreAPI instance
 */
export function createCoreLogger(options: LoggerOptions = {}): winston.Logger {
    const logger = winston.createLogger({
        level: options.level ?? 'info',
        silent: options.silent ?? false,
        format: winston.format.combine(
            winston.format.timestamp({
                format: 'YYYY-MM-DD HH:mm:ss'
            }),
            winston.format.errors({ stack: true }),
            winston.format.simple()
        ),
        transports: [
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.printf(({ level, message, timestamp }) => {
                        return `${timestamp} [${level}]: ${message}`;
                    })
                )
            })
        ]
    });

    if (options.file) {
        logger.add(new winston.transports.File({
            filename: path.resolve(options.file),
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            )
        }));
    }

    return logger;
}

/**
 * Context-prefixed wrapper around a winston logger
 */
export class Logger {
    private readonly context: string;
    private readonly target: winston.Logger;

    constructor(context: string, target: winston.Logger) {
        this.context = context;
        this.target = target;
    }

    child(context: string): Logger {
        return new Logger(context, this.target);
    }

    info(message: string): void {
        this.target.info(`[${this.context}] ${message}`);
    }

    warn(message: string): void {
        this.target.warn(`[${this.context}] ${message}`);
    }

    error(message: string, error?: unknown): void {
        if (error) {
            const detail = error instanceof Error ? error.message : String(error);
            this.target.error(`[${this.context}] ${message}: ${detail}`);
        } else {
            this.target.error(`[${this.context}] ${message}`);
        }
    }

    debug(message: string): void {
        this.target.debug(`[${this.context}] ${message}`);
    }
}
