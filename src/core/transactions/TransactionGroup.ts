// src/core/transactions/TransactionGroup.ts

import { ErrorFactory } from '../errors';
import { ScopeToken } from '../resource/types';
import { Checkpoint, GroupState } from './types';
import { TransactionManager } from './TransactionManager';

/**
 * A container that merges every primitive transaction made while it is
 * active into one undoable unit. One-shot: once committed or rolled back it
 * cannot be started again.
 */
export class TransactionGroup {
    private state: GroupState = GroupState.Inactive;
    private token: ScopeToken | null = null;
    private log: Checkpoint[] = [];

    constructor(
        public readonly name: string,
        private readonly transactions: TransactionManager
    ) { }

    public getState(): GroupState {
        return this.state;
    }

    public getCheckpoints(): Checkpoint[] {
        return this.log.map(c => ({ ...c }));
    }

    async start(): Promise<void> {
        if (this.state !== GroupState.Inactive) {
            throw ErrorFactory.state(`Group '${this.name}' is ${this.state} and cannot be started`);
        }
        this.token = await this.transactions.openScope(this.name);
        this.state = GroupState.Active;
        this.log = [{ label: `started: ${this.name}`, timestamp: new Date() }];
    }

    addCheckpoint(label: string): Checkpoint {
        this.requireActive('checkpoint');
        const checkpoint: Checkpoint = { label, timestamp: new Date() };
        this.log.push(checkpoint);
        return { ...checkpoint };
    }

    /**
     * Merges the group into one undoable unit. If the resource refuses the
     * commit it has already rolled the group back: the state becomes
     * RolledBack and the error propagates.
     */
    async assimilate(): Promise<Checkpoint[]> {
        const token = this.requireActive('commit');
        try {
            await this.transactions.resource.commit(token);
        } catch (error) {
            this.finish(GroupState.RolledBack);
            throw error;
        }
        return this.finish(GroupState.Committed);
    }

    async rollBack(): Promise<Checkpoint[]> {
        const token = this.requireActive('roll back');
        await this.transactions.resource.rollback(token);
        return this.finish(GroupState.RolledBack);
    }

    private requireActive(action: string): ScopeToken {
        if (this.state !== GroupState.Active || !this.token) {
            throw ErrorFactory.state(`Cannot ${action} group '${this.name}' in state ${this.state}`);
        }
        return this.token;
    }

    private finish(state: GroupState.Committed | GroupState.RolledBack): Checkpoint[] {
        const checkpoints = this.log;
        this.state = state;
        this.token = null;
        this.log = [];
        return checkpoints;
    }
}
