// src/core/errors/ErrorContext.ts

/**
 * Metadata provided with an error to help with debugging and caller guidance.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'STATE_ERROR')
    operation?: string;      // The operation or command that failed
    suggestion?: string;     // Helpful tip for the caller
    component?: string;      // The layer where the error occurred
    retryable?: boolean;     // Whether the call can be retried as-is
    details?: unknown;       // Original error or additional technical context
}
