// src/core/transactions/TransactionManager.ts

import { ErrorFactory, ResourceError } from '../errors';
import { FailurePolicy } from '../failures/types';
import { Logger } from '../logging/Logger';
import {
    Operation,
    OperationContext,
    OperationHandler,
    OperationResult,
    fail,
} from '../operations/types';
import { ResourceHandle, ScopeToken } from '../resource/types';
import { ScopedOutcome } from './types';

/**
 * TransactionManager
 * Opens scopes on the borrowed resource with the failure policy attached,
 * and runs handler work inside them with commit-on-success / rollback-on-failure.
 */
export class TransactionManager<R extends ResourceHandle = ResourceHandle> {
    constructor(
        public readonly resource: R,
        private readonly failurePolicy: FailurePolicy
    ) { }

    public get defaultPolicy(): FailurePolicy {
        return this.failurePolicy;
    }

    /**
     * Begins a scope and attaches the policy. If attaching fails the scope is
     * rolled back before the error propagates.
     */
    async openScope(name: string, policy: FailurePolicy = this.failurePolicy): Promise<ScopeToken> {
        const token = await this.resource.beginScope(name);
        try {
            await this.resource.attachFailurePolicy(token, policy);
        } catch (error) {
            await this.resource.rollback(token);
            throw error;
        }
        return token;
    }

    /**
     * Runs `work` in a fresh scope. A successful result is committed; a failed
     * result or a thrown fault rolls the scope back. A commit refused by the
     * failure policy is reported as a ResourceError result.
     */
    async executeInScope(
        name: string,
        work: () => Promise<OperationResult>,
        policy: FailurePolicy = this.failurePolicy
    ): Promise<ScopedOutcome> {
        const token = await this.openScope(name, policy);

        let result: OperationResult;
        try {
            result = await work();
        } catch (error) {
            await this.resource.rollback(token);
            Logger.warn('TransactionManager', `Scope '${name}' rolled back after a fault`, { error: ErrorFactory.messageOf(error) });
            return { result: fail(ErrorFactory.kindOf(error), ErrorFactory.messageOf(error)), rolledBack: true };
        }

        if (!result.success) {
            await this.resource.rollback(token);
            Logger.debug('TransactionManager', `Scope '${name}' rolled back: ${result.errorMessage}`);
            return { result, rolledBack: true };
        }

        try {
            await this.resource.commit(token);
        } catch (error) {
            if (error instanceof ResourceError) {
                return { result: fail(error.kind, error.message, { failures: error.context.details }), rolledBack: true };
            }
            throw error;
        }
        return { result, rolledBack: false };
    }

    /**
     * Calls a handler, converting anything it throws into a failed result.
     */
    async invoke(handler: OperationHandler<R>, operation: Operation, context: OperationContext): Promise<OperationResult> {
        try {
            return await handler(this.resource, { ...operation.params }, context);
        } catch (error) {
            Logger.error('TransactionManager', `Handler '${operation.name}' threw`, error);
            return fail(ErrorFactory.kindOf(error), ErrorFactory.messageOf(error));
        }
    }

    /**
     * Context for a handler whose scope is owned by an executor.
     */
    enclosedContext(): OperationContext {
        return {
            inScope: true,
            withTransaction: (_name, work) => work(),
        };
    }

    /**
     * Context for a handler invoked on its own: it must request a transaction.
     */
    standaloneContext(policy: FailurePolicy = this.failurePolicy): OperationContext {
        return {
            inScope: false,
            withTransaction: async (name, work) => (await this.executeInScope(name, work, policy)).result,
        };
    }
}
