// src/core/resource/types.ts

import { FailurePolicy } from '../failures/types';

/**
 * Opaque reference to a scope opened on a resource.
 */
export interface ScopeToken {
    readonly id: string;
    readonly name: string;
    readonly depth: number;
}

/**
 * The live external model, supplied by the host and borrowed by the engine for
 * the duration of one call. Scopes nest; only the innermost open scope may be
 * committed or rolled back.
 *
 * `commit` runs the failure policy attached to the scope. When the policy asks
 * for a rollback the resource rolls the scope back itself and rejects with a
 * ResourceError.
 */
export interface ResourceHandle {
    readonly title: string;
    beginScope(name: string): Promise<ScopeToken>;
    commit(token: ScopeToken): Promise<void>;
    rollback(token: ScopeToken): Promise<void>;
    attachFailurePolicy(token: ScopeToken, policy: FailurePolicy): Promise<void>;
}
