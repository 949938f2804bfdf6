// src/core/errors/errorFactory.ts

import * as Errors from './errors';
import { EngineError } from './EngineError';
import { ErrorContext } from './ErrorContext';
import { ErrorKind } from './ErrorKind';

/**
 * Factory class to create consistent error instances across the application.
 */
export class ErrorFactory {
    static notFound(message: string, context?: ErrorContext) {
        return new Errors.NotFoundError(message, context);
    }

    static state(message: string, context?: ErrorContext) {
        return new Errors.StateError(message, context);
    }

    static resource(message: string, context?: ErrorContext) {
        return new Errors.ResourceError(message, context);
    }

    /**
     * Maps anything thrown across a handler boundary to its error kind.
     * Typed engine errors keep their kind; everything else is an unexpected Exception.
     */
    static kindOf(error: unknown): ErrorKind {
        return error instanceof EngineError ? error.kind : ErrorKind.Exception;
    }

    static messageOf(error: unknown): string {
        if (error instanceof Error) return error.message;
        return String(error);
    }
}
