// src/core/errors/index.ts

export * from './errors';
export { EngineError } from './EngineError';
export { ErrorContext } from './ErrorContext';
export { ErrorKind } from './ErrorKind';
export { ErrorFactory } from './errorFactory';
