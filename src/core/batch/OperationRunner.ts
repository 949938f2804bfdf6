// src/core/batch/OperationRunner.ts

import { ErrorKind } from '../errors';
import { FailurePolicy } from '../failures/types';
import { Operation, OperationResult, fail } from '../operations/types';
import { OperationRegistry } from '../operations/OperationRegistry';
import { ResourceHandle } from '../resource/types';
import { TransactionManager } from '../transactions/TransactionManager';
import { ScopedOutcome } from '../transactions/types';

/**
 * Resolves an operation and runs its handler. Unresolved names come back as
 * NotFound results without any scope being opened.
 */
export class OperationRunner<R extends ResourceHandle = ResourceHandle> {
    constructor(
        private readonly registry: OperationRegistry<R>,
        private readonly transactions: TransactionManager<R>
    ) { }

    /**
     * Runs the operation in its own sub-scope under the caller's scope.
     * The handler sees `inScope = true`.
     */
    async runEnclosed(operation: Operation, scopeName: string, policy?: FailurePolicy): Promise<ScopedOutcome> {
        const handler = this.registry.resolve(operation.name);
        if (!handler) {
            return { result: this.notFound(operation), rolledBack: false };
        }
        const context = this.transactions.enclosedContext();
        return this.transactions.executeInScope(
            scopeName,
            () => this.transactions.invoke(handler, operation, context),
            policy
        );
    }

    /**
     * Runs the operation on its own; the handler requests its transaction
     * through `context.withTransaction`.
     */
    async runStandalone(operation: Operation): Promise<OperationResult> {
        const handler = this.registry.resolve(operation.name);
        if (!handler) {
            return this.notFound(operation);
        }
        return this.transactions.invoke(handler, operation, this.transactions.standaloneContext());
    }

    private notFound(operation: Operation): OperationResult {
        if (operation.name.trim().length === 0) {
            return fail(ErrorKind.Validation, 'Method name required');
        }
        return fail(ErrorKind.NotFound, `Method '${operation.name}' not found`);
    }
}
