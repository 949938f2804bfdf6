// src/core/transactions/types.ts

import { OperationResult } from '../operations/types';

export enum GroupState {
    Inactive = 'Inactive',
    Active = 'Active',
    Committed = 'Committed',
    RolledBack = 'RolledBack',
}

/**
 * Labeled marker inside an active group. Observational only.
 */
export interface Checkpoint {
    label: string;
    timestamp: Date;
}

export interface GroupStatus {
    hasActive: boolean;
    name: string | null;
    checkpointCount: number;
    checkpoints: Checkpoint[];
}

export type GroupStartResult =
    | { success: true; groupName: string }
    | { success: false; error: 'AlreadyActive'; activeGroup: string }
    | { success: false; error: 'ResourceError'; message: string };

export type GroupCheckpointResult =
    | { success: true; checkpoint: Checkpoint; checkpointCount: number; activeGroup: string }
    | { success: false; error: 'StateError'; message: string };

export type GroupEndResult =
    | { success: true; groupName: string; state: GroupState; checkpoints: Checkpoint[] }
    | { success: false; error: 'StateError'; message: string }
    | { success: false; error: 'ResourceError'; message: string; groupName: string; checkpoints: Checkpoint[] };

/**
 * Outcome of running work in a private scope.
 */
export interface ScopedOutcome {
    result: OperationResult;
    rolledBack: boolean;
}
