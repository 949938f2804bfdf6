// src/core/operations/types.ts

import { ErrorKind } from '../errors/ErrorKind';
import { ResourceHandle } from '../resource/types';

/** Untyped parameter map as it arrives at the boundary. */
export type Params = Record<string, unknown>;

/** Structured payload returned by a handler. */
export type Payload = Record<string, unknown>;

/**
 * A named unit of work. Frozen on construction, see createOperation().
 */
export interface Operation {
    readonly name: string;
    readonly params: Readonly<Params>;
}

export interface OperationSuccess {
    success: true;
    payload: Payload;
}

export interface OperationFailure {
    success: false;
    errorMessage: string;
    errorKind: ErrorKind;
    payload?: Payload;
}

export type OperationResult = OperationSuccess | OperationFailure;

/**
 * What an executor tells a handler about the transaction it runs under.
 */
export interface OperationContext {
    /** True when a batch / safe / verify executor already owns the scope. */
    readonly inScope: boolean;
    /**
     * Runs `work` inside a transaction named `name`. When `inScope` is true the
     * enclosing scope is reused and no new top-level transaction is opened.
     */
    withTransaction(name: string, work: () => Promise<OperationResult>): Promise<OperationResult>;
}

export type OperationHandler<R extends ResourceHandle = ResourceHandle> = (
    resource: R,
    params: Params,
    context: OperationContext
) => Promise<OperationResult>;

/**
 * JSON Schema properties of an operation's params, as advertised to remote callers.
 */
export interface ParamSchema {
    properties: Record<string, unknown>;
    required?: string[];
}

export interface OperationDefinition<R extends ResourceHandle = ResourceHandle> {
    name: string;
    handler: OperationHandler<R>;
    aliases?: string[];
    category?: string;
    description?: string;
    params?: ParamSchema;
}

/**
 * Discovery metadata, as returned by listMethods.
 */
export interface OperationInfo {
    name: string;
    category: string;
    description: string;
    aliases: string[];
    params: ParamSchema;
}

export function createOperation(name: string, params: Params = {}): Operation {
    return Object.freeze({ name, params: Object.freeze({ ...params }) });
}

export function ok(payload: Payload = {}): OperationSuccess {
    return { success: true, payload };
}

export function fail(errorKind: ErrorKind, errorMessage: string, payload?: Payload): OperationFailure {
    return payload === undefined
        ? { success: false, errorKind, errorMessage }
        : { success: false, errorKind, errorMessage, payload };
}
