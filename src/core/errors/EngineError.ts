// src/core/errors/EngineError.ts

import { ErrorContext } from './ErrorContext';
import { ErrorKind } from './ErrorKind';

/**
 * Base error class for all engine errors.
 * Provides structured metadata and caller-facing formatting.
 */
export class EngineError extends Error {
    public readonly context: ErrorContext;
    public readonly kind: ErrorKind;
    public readonly timestamp: number;

    constructor(message: string, kind: ErrorKind = ErrorKind.Exception, context: ErrorContext = {}) {
        super(message);
        this.name = 'EngineError';
        this.kind = kind;
        this.context = context;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    /**
     * Converts the error to a plain object for JSON serialization.
     */
    public toJSON() {
        return {
            name: this.name,
            kind: this.kind,
            message: this.message,
            timestamp: this.timestamp,
            context: this.context,
            stack: process.env.NODE_ENV === 'development' ? this.stack : undefined
        };
    }

    /**
     * Formats a message suitable for the remote caller.
     */
    public toUserFriendly(): string {
        let msg = `[${this.context.code || this.kind}] ${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
