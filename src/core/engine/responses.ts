// src/core/engine/responses.ts

import { BatchResult, SafeExecuteResult, VerifyResult } from '../batch/types';
import { OperationResult } from '../operations/types';
import { Checkpoint } from '../transactions/types';

/**
 * The calling convention every entry point honors.
 */
export interface Response {
    success: boolean;
    error?: string;
    [key: string]: unknown;
}

export function toResponse(result: OperationResult): Response {
    if (result.success) {
        return { ...result.payload, success: true };
    }
    return {
        ...(result.payload ?? {}),
        success: false,
        error: result.errorMessage,
        errorKind: result.errorKind,
    };
}

export function serializeCheckpoints(checkpoints: Checkpoint[]): Array<{ label: string; timestamp: string }> {
    return checkpoints.map(c => ({ label: c.label, timestamp: c.timestamp.toISOString() }));
}

export function batchResponse(batch: BatchResult): Response {
    const response: Response = {
        success: batch.success,
        batchName: batch.batchName,
        totalOperations: batch.total,
        succeededCount: batch.succeededCount,
        failedCount: batch.failedCount,
        rolledBack: batch.rolledBack,
        committed: batch.committed,
        createdIds: batch.createdIds,
        results: batch.perOperation.map(entry => ({
            index: entry.index,
            method: entry.name,
            ...toResponse(entry.result),
        })),
        message: batch.failedCount === 0 && !batch.rolledBack
            ? `Batch '${batch.batchName}' completed successfully`
            : `Batch '${batch.batchName}' had ${batch.failedCount} failure(s)`,
    };
    if (batch.error !== undefined) {
        response.error = batch.error;
    }
    return response;
}

export function safeExecuteResponse(outcome: SafeExecuteResult): Response {
    const response: Response = {
        success: outcome.success,
        method: outcome.method,
        result: toResponse(outcome.result),
        wasRolledBack: outcome.wasRolledBack,
        message: outcome.message,
    };
    if (!outcome.result.success) {
        response.error = outcome.result.errorMessage;
    }
    return response;
}

export function verifyResponse(outcome: VerifyResult): Response {
    const response: Response = {
        success: outcome.success,
        phase: outcome.phase,
        mainResult: toResponse(outcome.mainResult),
        wasRolledBack: outcome.wasRolledBack,
        message: outcome.message,
    };
    if (outcome.verifyResult) {
        response.verifyResult = toResponse(outcome.verifyResult);
    }
    if (!outcome.success) {
        response.error = outcome.message;
    }
    return response;
}
