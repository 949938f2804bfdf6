// src/core/errors/ErrorKind.ts

/**
 * Machine-readable failure categories carried by every failed OperationResult.
 */
export enum ErrorKind {
    Validation = 'ValidationError',
    NotFound = 'NotFound',
    State = 'StateError',
    Resource = 'ResourceError',
    Exception = 'Exception',
}
