// src/core/transactions/TransactionGroupManager.ts

import { EngineError, ErrorFactory } from '../errors';
import { JournalSink } from '../journal/OperationJournal';
import { Logger } from '../logging/Logger';
import { TransactionGroup } from './TransactionGroup';
import { TransactionManager } from './TransactionManager';
import {
    Checkpoint,
    GroupCheckpointResult,
    GroupEndResult,
    GroupStartResult,
    GroupState,
    GroupStatus,
} from './types';

/**
 * TransactionGroupManager
 * Session object owning at most one active TransactionGroup per resource.
 * Constructed once per resource handle and passed to whoever needs it.
 */
export class TransactionGroupManager {
    private active: TransactionGroup | null = null;

    constructor(
        private readonly transactions: TransactionManager,
        private readonly journal?: JournalSink
    ) { }

    async start(name: string): Promise<GroupStartResult> {
        if (this.active) {
            Logger.warn('TransactionGroups', `Rejected start of '${name}': '${this.active.name}' is active`);
            return { success: false, error: 'AlreadyActive', activeGroup: this.active.name };
        }

        const group = new TransactionGroup(name, this.transactions);
        try {
            await group.start();
        } catch (error) {
            Logger.error('TransactionGroups', `Resource refused to open group '${name}'`, error);
            return { success: false, error: 'ResourceError', message: ErrorFactory.messageOf(error) };
        }

        this.active = group;
        Logger.info('TransactionGroups', `Group started: ${name}`);
        return { success: true, groupName: name };
    }

    checkpoint(label: string): GroupCheckpointResult {
        const group = this.active;
        if (!group) {
            return { success: false, error: 'StateError', message: 'No active transaction group' };
        }

        const checkpoint = group.addCheckpoint(label);
        return {
            success: true,
            checkpoint,
            checkpointCount: group.getCheckpoints().length,
            activeGroup: group.name,
        };
    }

    async commit(): Promise<GroupEndResult> {
        return this.end('commit');
    }

    async rollback(): Promise<GroupEndResult> {
        return this.end('rollback');
    }

    status(): GroupStatus {
        const checkpoints = this.active ? this.active.getCheckpoints() : [];
        return {
            hasActive: this.active !== null,
            name: this.active ? this.active.name : null,
            checkpointCount: checkpoints.length,
            checkpoints,
        };
    }

    public get activeGroupName(): string | null {
        return this.active ? this.active.name : null;
    }

    private async end(action: 'commit' | 'rollback'): Promise<GroupEndResult> {
        const group = this.active;
        if (!group) {
            return { success: false, error: 'StateError', message: 'No active transaction group' };
        }

        const log = group.getCheckpoints();
        let checkpoints: Checkpoint[];
        try {
            checkpoints = action === 'commit' ? await group.assimilate() : await group.rollBack();
        } catch (error) {
            if (group.getState() === GroupState.Active) {
                // The resource failed before the transition; the group is still usable.
                throw error;
            }
            this.active = null;
            await this.journal?.record({
                kind: 'group',
                name: group.name,
                outcome: 'rolled_back',
                detail: { reason: ErrorFactory.messageOf(error) },
            });
            if (error instanceof EngineError) {
                return { success: false, error: 'ResourceError', message: error.message, groupName: group.name, checkpoints: log };
            }
            throw error;
        }

        this.active = null;
        Logger.info('TransactionGroups', `Group ${action === 'commit' ? 'committed' : 'rolled back'}: ${group.name}`, {
            checkpoints: checkpoints.length
        });
        await this.journal?.record({
            kind: 'group',
            name: group.name,
            outcome: action === 'commit' ? 'committed' : 'rolled_back',
            detail: { checkpoints: checkpoints.map(c => c.label) },
        });

        return { success: true, groupName: group.name, state: group.getState(), checkpoints };
    }
}
