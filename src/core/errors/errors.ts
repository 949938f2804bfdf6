// src/core/errors/errors.ts

import { EngineError } from './EngineError';
import { ErrorContext } from './ErrorContext';
import { ErrorKind } from './ErrorKind';

/**
 * Unresolved operation name or missing referenced entity.
 */
export class NotFoundError extends EngineError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorKind.NotFound, {
            code: 'NOT_FOUND',
            component: 'APPLICATION',
            ...context
        });
        this.name = 'NotFoundError';
    }
}

/**
 * Illegal transition (commit without start, reuse of a finished group, ...).
 */
export class StateError extends EngineError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorKind.State, {
            code: 'STATE_ERROR',
            component: 'CORE_TRANSACTION',
            ...context
        });
        this.name = 'StateError';
    }
}

/**
 * The external model refused or failed a mutation after failure classification.
 */
export class ResourceError extends EngineError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, ErrorKind.Resource, {
            code: 'RESOURCE_ERROR',
            component: 'INFRA_RESOURCE',
            ...context
        });
        this.name = 'ResourceError';
    }
}
