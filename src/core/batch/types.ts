// src/core/batch/types.ts

import { OperationResult } from '../operations/types';

export interface BatchPolicy {
    stopOnError: boolean;
    /** When false, any host warning fails the operation that raised it. */
    continueOnWarning?: boolean;
    /**
     * Whether a committed continue-on-error batch with failures reports
     * `success: false`. Defaults to CONFIG.BATCH.REPORT_PARTIAL_AS_FAILURE.
     */
    reportPartialAsFailure?: boolean;
}

export interface BatchEntry {
    index: number;
    name: string;
    result: OperationResult;
}

export interface BatchResult {
    batchName: string;
    total: number;
    perOperation: BatchEntry[];
    succeededCount: number;
    failedCount: number;
    rolledBack: boolean;
    committed: boolean;
    success: boolean;
    error?: string;
    createdIds: string[];
}

export interface SafeExecuteResult {
    success: boolean;
    method: string;
    displayName: string;
    result: OperationResult;
    wasRolledBack: boolean;
    message: string;
}

export type VerifyPhase = 'Execution' | 'Verification' | 'Complete';

export interface VerifyResult {
    success: boolean;
    phase: VerifyPhase;
    mainResult: OperationResult;
    verifyResult?: OperationResult;
    wasRolledBack: boolean;
    message: string;
}
