// src/core/batch/SafeExecutor.ts

import { ResourceError } from '../errors';
import { JournalSink } from '../journal/OperationJournal';
import { Logger } from '../logging/Logger';
import { Operation } from '../operations/types';
import { ResourceHandle } from '../resource/types';
import { TransactionManager } from '../transactions/TransactionManager';
import { OperationRunner } from './OperationRunner';
import { SafeExecuteResult, VerifyResult } from './types';

/**
 * Single-operation protocols built on private scopes:
 * - safeExecute: commit on success, roll back otherwise;
 * - verifyAndRollback: commit only if a follow-up verification succeeds.
 */
export class SafeExecutor<R extends ResourceHandle = ResourceHandle> {
    constructor(
        private readonly runner: OperationRunner<R>,
        private readonly transactions: TransactionManager<R>,
        private readonly journal?: JournalSink
    ) { }

    async safeExecute(operation: Operation, displayName: string = operation.name): Promise<SafeExecuteResult> {
        const { result, rolledBack } = await this.runner.runEnclosed(operation, displayName);

        let message: string;
        if (result.success) {
            message = `'${displayName}' completed successfully`;
        } else if (rolledBack) {
            message = `'${displayName}' failed and was rolled back`;
        } else {
            message = `'${displayName}' failed before any change was made`;
        }

        if (rolledBack || result.success) {
            await this.journal?.record({
                kind: 'safe',
                name: displayName,
                outcome: result.success ? 'committed' : 'rolled_back',
                succeeded: result.success ? 1 : 0,
                failed: result.success ? 0 : 1,
                detail: { method: operation.name },
            });
        }

        return {
            success: result.success,
            method: operation.name,
            displayName,
            result,
            wasRolledBack: rolledBack,
            message,
        };
    }

    async verifyAndRollback(
        main: Operation,
        verify: Operation,
        operationName: string = main.name
    ): Promise<VerifyResult> {
        const resource = this.transactions.resource;
        const scope = await this.transactions.openScope(operationName);
        let closed = false;

        const finish = async (outcome: VerifyResult): Promise<VerifyResult> => {
            await this.journal?.record({
                kind: 'verify',
                name: operationName,
                outcome: outcome.wasRolledBack ? 'rolled_back' : 'committed',
                succeeded: outcome.success ? 1 : 0,
                failed: outcome.success ? 0 : 1,
                detail: { phase: outcome.phase, method: main.name, verifyMethod: verify.name },
            });
            return outcome;
        };

        try {
            const { result: mainResult } = await this.runner.runEnclosed(main, `${operationName}: ${main.name}`);
            if (!mainResult.success) {
                closed = true;
                await resource.rollback(scope);
                return finish({
                    success: false,
                    phase: 'Execution',
                    mainResult,
                    wasRolledBack: true,
                    message: 'Main operation failed, rolled back',
                });
            }

            const { result: verifyResult } = await this.runner.runEnclosed(verify, `${operationName}: verify ${verify.name}`);
            if (!verifyResult.success) {
                closed = true;
                await resource.rollback(scope);
                Logger.info('SafeExecutor', `Verification '${verify.name}' failed, '${operationName}' rolled back`);
                return finish({
                    success: false,
                    phase: 'Verification',
                    mainResult,
                    verifyResult,
                    wasRolledBack: true,
                    message: 'Verification failed, changes rolled back',
                });
            }

            closed = true;
            try {
                await resource.commit(scope);
            } catch (commitError) {
                if (!(commitError instanceof ResourceError)) throw commitError;
                return finish({
                    success: false,
                    phase: 'Complete',
                    mainResult,
                    verifyResult,
                    wasRolledBack: true,
                    message: `Commit rejected after verification: ${commitError.message}`,
                });
            }

            return finish({
                success: true,
                phase: 'Complete',
                mainResult,
                verifyResult,
                wasRolledBack: false,
                message: 'Operation and verification both succeeded',
            });
        } catch (fault) {
            if (!closed) {
                await resource.rollback(scope);
            }
            throw fault;
        }
    }
}
