// src/core/resource/InMemoryModel.ts

import { v4 as uuidv4 } from 'uuid';
import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import {
    FailureMessage,
    FailurePolicy,
    FailureProcessingResult,
    FailuresAccessor,
    FailureResolution,
    FailureSeverity,
} from '../failures/types';
import { ResourceHandle, ScopeToken } from './types';

export type ParameterValue = string | number | boolean;

export interface ModelElement {
    id: string;
    category: string;
    name: string;
    hostId?: string;
    parameters: Record<string, ParameterValue>;
}

export interface NewElement {
    category: string;
    name: string;
    hostId?: string;
    parameters?: Record<string, ParameterValue>;
}

export interface FailureInput {
    severity: FailureSeverity;
    description: string;
    elementIds?: string[];
    resolution?: FailureResolution;
}

interface OpenScope {
    token: ScopeToken;
    snapshot: Map<string, ModelElement>;
    failures: FailureMessage[];
    policy?: FailurePolicy;
}

function cloneElements(elements: Map<string, ModelElement>): Map<string, ModelElement> {
    const copy = new Map<string, ModelElement>();
    for (const [id, element] of elements) {
        copy.set(id, { ...element, parameters: { ...element.parameters } });
    }
    return copy;
}

/**
 * InMemoryModel
 * Reference host model: a flat element table with nested, snapshot-backed scopes.
 *
 * Failures posted during a mutation are queued on the innermost scope and run
 * through that scope's failure policy (or the nearest enclosing one) at commit.
 */
export class InMemoryModel implements ResourceHandle {
    private elements: Map<string, ModelElement> = new Map();
    private scopes: OpenScope[] = [];
    private undoStack: string[] = [];
    private nextId: number;

    constructor(public readonly title: string = 'Untitled', firstElementId: number = 1000) {
        this.nextId = firstElementId;
    }

    // ---------------------------------------------------------------------
    // ResourceHandle
    // ---------------------------------------------------------------------

    async beginScope(name: string): Promise<ScopeToken> {
        const token: ScopeToken = { id: uuidv4(), name, depth: this.scopes.length };
        this.scopes.push({ token, snapshot: cloneElements(this.elements), failures: [] });
        Logger.debug('InMemoryModel', `Scope opened: ${name}`, { depth: token.depth });
        return token;
    }

    async attachFailurePolicy(token: ScopeToken, policy: FailurePolicy): Promise<void> {
        this.innermost(token, 'attach a failure policy to').policy = policy;
    }

    async commit(token: ScopeToken): Promise<void> {
        const scope = this.innermost(token, 'commit');

        let verdict: FailureProcessingResult;
        try {
            verdict = this.processFailures(scope);
        } catch (error) {
            this.restore(scope);
            throw ErrorFactory.resource(`Scope '${token.name}' was rolled back: failure processing threw`, {
                operation: token.name,
                details: ErrorFactory.messageOf(error),
                suggestion: 'Check the attached failure policy'
            });
        }

        if (verdict === 'proceedWithRollback') {
            const descriptions = scope.failures.map(f => f.description);
            this.restore(scope);
            throw ErrorFactory.resource(`Scope '${token.name}' was rolled back by failure processing`, {
                operation: token.name,
                details: descriptions,
                suggestion: 'Inspect details for the failures the host refused'
            });
        }

        this.scopes.pop();
        if (this.scopes.length === 0) {
            this.undoStack.push(token.name);
        }
        Logger.debug('InMemoryModel', `Scope committed: ${token.name}`, { depth: token.depth });
    }

    async rollback(token: ScopeToken): Promise<void> {
        this.restore(this.innermost(token, 'roll back'));
        Logger.debug('InMemoryModel', `Scope rolled back: ${token.name}`, { depth: token.depth });
    }

    // ---------------------------------------------------------------------
    // Element primitives (used by operation handlers)
    // ---------------------------------------------------------------------

    createElement(input: NewElement): ModelElement {
        this.assertModifiable();
        const element: ModelElement = {
            id: String(this.nextId++),
            category: input.category,
            name: input.name,
            parameters: { ...(input.parameters ?? {}) },
        };
        if (input.hostId !== undefined) {
            element.hostId = input.hostId;
        }
        this.elements.set(element.id, element);
        return { ...element, parameters: { ...element.parameters } };
    }

    deleteElement(id: string): boolean {
        this.assertModifiable();
        return this.elements.delete(id);
    }

    setParameter(id: string, key: string, value: ParameterValue): void {
        this.assertModifiable();
        const element = this.elements.get(id);
        if (!element) {
            throw ErrorFactory.notFound(`Element ${id} not found`, { operation: 'setParameter' });
        }
        element.parameters[key] = value;
    }

    getElement(id: string): ModelElement | undefined {
        const element = this.elements.get(id);
        return element ? { ...element, parameters: { ...element.parameters } } : undefined;
    }

    listElements(category?: string): ModelElement[] {
        return this.snapshot().filter(e => category === undefined || e.category === category);
    }

    /**
     * Queues a host failure on the innermost open scope.
     */
    postFailure(input: FailureInput): FailureMessage {
        const scope = this.scopes[this.scopes.length - 1];
        if (!scope) {
            throw ErrorFactory.resource('Failures can only be posted inside an open scope');
        }
        const failure: FailureMessage = { id: uuidv4(), ...input };
        scope.failures.push(failure);
        return failure;
    }

    // ---------------------------------------------------------------------
    // Introspection
    // ---------------------------------------------------------------------

    /** Elements ordered by id, deep-copied. */
    snapshot(): ModelElement[] {
        return Array.from(cloneElements(this.elements).values())
            .sort((a, b) => Number(a.id) - Number(b.id));
    }

    getOpenScopeCount(): number {
        return this.scopes.length;
    }

    getUndoStack(): string[] {
        return [...this.undoStack];
    }

    // ---------------------------------------------------------------------

    private assertModifiable(): void {
        if (this.scopes.length === 0) {
            throw ErrorFactory.resource('Attempt to modify the model outside of a transaction', {
                suggestion: 'Run the mutation through context.withTransaction()'
            });
        }
    }

    private innermost(token: ScopeToken, action: string): OpenScope {
        const top = this.scopes[this.scopes.length - 1];
        if (!top || top.token.id !== token.id) {
            throw ErrorFactory.resource(`Cannot ${action} scope '${token.name}': it is not the innermost open scope`, {
                operation: token.name
            });
        }
        return top;
    }

    private restore(scope: OpenScope): void {
        this.elements = scope.snapshot;
        this.scopes.pop();
    }

    private effectivePolicy(scope: OpenScope): FailurePolicy | undefined {
        if (scope.policy) return scope.policy;
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const policy = this.scopes[i].policy;
            if (policy) return policy;
        }
        return undefined;
    }

    private processFailures(scope: OpenScope): FailureProcessingResult {
        if (scope.failures.length === 0) return 'continue';

        const policy = this.effectivePolicy(scope);
        if (policy) {
            const verdict = policy.preprocess(this.accessorFor(scope));
            const unresolvedError = scope.failures.some(f => f.severity === FailureSeverity.Error);
            if (verdict === 'proceedWithRollback' || unresolvedError) {
                return 'proceedWithRollback';
            }
            // Warnings the policy chose to keep are reported and dropped with the scope.
            for (const failure of scope.failures) {
                Logger.warn('InMemoryModel', `Warning kept in '${scope.token.name}': ${failure.description}`);
            }
            scope.failures = [];
            return 'continue';
        }

        if (scope.failures.some(f => f.severity === FailureSeverity.Error)) {
            return 'proceedWithRollback';
        }
        for (const failure of scope.failures) {
            Logger.warn('InMemoryModel', `Unhandled warning in '${scope.token.name}': ${failure.description}`);
        }
        scope.failures = [];
        return 'continue';
    }

    private accessorFor(scope: OpenScope): FailuresAccessor {
        const remove = (failure: FailureMessage) => {
            scope.failures = scope.failures.filter(f => f.id !== failure.id);
        };
        return {
            scopeName: scope.token.name,
            getFailures: () => [...scope.failures],
            deleteWarning: (failure) => {
                if (failure.severity !== FailureSeverity.Warning) {
                    throw ErrorFactory.resource(`Cannot delete '${failure.description}': not a warning`);
                }
                remove(failure);
            },
            resolveFailure: (failure) => {
                if (!failure.resolution) {
                    throw ErrorFactory.resource(`'${failure.description}' has no resolution`);
                }
                failure.resolution.apply();
                remove(failure);
            },
        };
    }
}
