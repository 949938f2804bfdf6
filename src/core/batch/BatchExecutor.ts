// src/core/batch/BatchExecutor.ts

import { CONFIG } from '../../config/config';
import { ResourceError } from '../errors';
import { StrictFailurePolicy } from '../failures/policies';
import { FailurePolicy } from '../failures/types';
import { JournalSink } from '../journal/OperationJournal';
import { Logger } from '../logging/Logger';
import { Operation, Payload } from '../operations/types';
import { ResourceHandle } from '../resource/types';
import { TransactionManager } from '../transactions/TransactionManager';
import { OperationRunner } from './OperationRunner';
import { BatchEntry, BatchPolicy, BatchResult } from './types';

/**
 * Collects ids a successful operation reports under the configured payload keys.
 */
export function collectCreatedIds(payload: Payload, keys: readonly string[] = CONFIG.BATCH.CREATED_ID_KEYS): string[] {
    const ids: string[] = [];
    const take = (value: unknown) => {
        if (typeof value === 'string' || typeof value === 'number') {
            ids.push(String(value));
        }
    };
    for (const key of keys) {
        const value = payload[key];
        if (Array.isArray(value)) {
            value.forEach(take);
        } else {
            take(value);
        }
    }
    return ids;
}

/**
 * BatchExecutor
 * Runs an ordered list of operations inside one private scope.
 *
 * Each operation gets its own sub-scope: a failed operation's partial effects
 * are rolled back on the spot, so a continue-on-error batch commits exactly the
 * operations that reported success. With stopOnError the first failure rolls
 * back the whole batch scope.
 */
export class BatchExecutor<R extends ResourceHandle = ResourceHandle> {
    private readonly strictPolicy = new StrictFailurePolicy();

    constructor(
        private readonly runner: OperationRunner<R>,
        private readonly transactions: TransactionManager<R>,
        private readonly journal?: JournalSink
    ) { }

    async run(
        operations: readonly Operation[],
        policy: BatchPolicy,
        batchName: string = CONFIG.BATCH.DEFAULT_NAME
    ): Promise<BatchResult> {
        const failurePolicy: FailurePolicy = policy.continueOnWarning === false
            ? this.strictPolicy
            : this.transactions.defaultPolicy;
        const reportPartialAsFailure = policy.reportPartialAsFailure ?? CONFIG.BATCH.REPORT_PARTIAL_AS_FAILURE;

        const perOperation: BatchEntry[] = [];
        const createdIds: string[] = [];
        let succeededCount = 0;
        let failedCount = 0;
        let rolledBack = false;
        let committed = false;
        let closed = false;
        let error: string | undefined;

        Logger.info('BatchExecutor', `Batch '${batchName}' starting`, {
            operations: operations.length,
            stopOnError: policy.stopOnError,
            policy: failurePolicy.name
        });

        const scope = await this.transactions.openScope(batchName, failurePolicy);
        const resource = this.transactions.resource;

        try {
            for (let index = 0; index < operations.length; index++) {
                const operation = operations[index];
                const { result } = await this.runner.runEnclosed(
                    operation,
                    `${batchName} [${index}] ${operation.name}`,
                    failurePolicy
                );
                perOperation.push({ index, name: operation.name, result });

                if (result.success) {
                    succeededCount++;
                    createdIds.push(...collectCreatedIds(result.payload));
                    continue;
                }

                failedCount++;
                Logger.warn('BatchExecutor', `Operation ${index} (${operation.name}) failed: ${result.errorMessage}`);

                if (policy.stopOnError) {
                    closed = true;
                    await resource.rollback(scope);
                    rolledBack = true;
                    error = `Operation ${index} (${operation.name}) failed: ${result.errorMessage}. Transaction rolled back.`;
                    break;
                }
            }

            if (!closed) {
                closed = true;
                try {
                    await resource.commit(scope);
                    committed = true;
                } catch (commitError) {
                    if (!(commitError instanceof ResourceError)) throw commitError;
                    rolledBack = true;
                    error = `Batch '${batchName}' was rejected at commit: ${commitError.message}. Transaction rolled back.`;
                }
            }
        } catch (fault) {
            if (!closed) {
                await resource.rollback(scope);
            }
            Logger.error('BatchExecutor', `Batch '${batchName}' aborted`, fault);
            await this.journal?.record({
                kind: 'batch',
                name: batchName,
                outcome: 'rolled_back',
                succeeded: succeededCount,
                failed: failedCount,
                detail: { aborted: true },
            });
            throw fault;
        }

        const success = rolledBack ? false : failedCount === 0 || !reportPartialAsFailure;

        const result: BatchResult = {
            batchName,
            total: operations.length,
            perOperation,
            succeededCount,
            failedCount,
            rolledBack,
            committed,
            success,
            createdIds: rolledBack ? [] : createdIds,
        };
        if (error !== undefined) {
            result.error = error;
        }

        Logger.info('BatchExecutor', `Batch '${batchName}' finished`, {
            succeeded: succeededCount,
            failed: failedCount,
            rolledBack
        });
        await this.journal?.record({
            kind: 'batch',
            name: batchName,
            outcome: committed ? 'committed' : 'rolled_back',
            succeeded: succeededCount,
            failed: failedCount,
            detail: error !== undefined ? { total: operations.length, error } : { total: operations.length },
        });

        return result;
    }
}
