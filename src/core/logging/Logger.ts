// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * Centralizes logging to ensure:
 * 1. Structured output (timestamps, levels, modules)
 * 2. Secret redaction (security)
 * 3. Configurable verbosity
 *
 * Everything goes to stderr: stdout is owned by the MCP stdio transport.
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVEL_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    }
    if (ENV.NODE_ENV === 'production') return LogLevel.INFO;
    if (ENV.NODE_ENV === 'test') return LogLevel.WARN;
    return LogLevel.DEBUG;
}

export class Logger {
    private static readonly currentLevel: LogLevel = defaultLevel();

    /**
     * Matches token-like values (sk-..., Bearer ...) that may end up in operation params.
     */
    private static SECRET_REGEX = /(sk-[a-zA-Z0-9_-]{20,}|Bearer\s+[a-zA-Z0-9._-]{20,})/g;

    private static redact(message: unknown): unknown {
        if (typeof message === 'string') {
            return message.replace(this.SECRET_REGEX, '[REDACTED]');
        } else if (typeof message === 'object' && message !== null) {
            try {
                const str = JSON.stringify(message);
                return JSON.parse(str.replace(this.SECRET_REGEX, '[REDACTED]')) as unknown;
            } catch {
                return '[Unserializable]';
            }
        }
        return message;
    }

    private static formatMessage(level: string, module: string, message: string, context?: unknown): string {
        const timestamp = new Date().toISOString();
        const safeMessage = this.redact(message);

        let log = `[${timestamp}] [${level}] [${module}] ${typeof safeMessage === 'string' ? safeMessage : JSON.stringify(safeMessage)}`;

        if (context !== undefined) {
            log += ` ${JSON.stringify(this.redact(context))}`;
        }

        return log;
    }

    public static debug(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${error.stack}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${JSON.stringify(this.redact(error))}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}
