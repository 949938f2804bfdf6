// src/core/validation/paramValidator.ts

import { z } from 'zod';
import { ErrorKind } from '../errors/ErrorKind';
import { OperationFailure, Params, fail } from '../operations/types';

export type ParamsCheck<T> =
    | { ok: true; value: T }
    | { ok: false; failure: OperationFailure };

/**
 * Flattens zod issues into "path: message" pairs.
 */
export function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join(', ');
}

/**
 * The shared missing/invalid field path: every handler and command converts its
 * untyped params through here, so a bad field is always a ValidationError result.
 */
export function validateParams<S extends z.ZodTypeAny>(schema: S, params: Params, operation: string): ParamsCheck<z.infer<S>> {
    const parsed = schema.safeParse(params);
    if (parsed.success) {
        return { ok: true, value: parsed.data };
    }
    return {
        ok: false,
        failure: fail(ErrorKind.Validation, `Invalid parameters for '${operation}': ${describeIssues(parsed.error)}`),
    };
}
