// tests/unit/transaction_groups.test.ts

import { StateError } from '../../src/core/errors';
import { WarningSwallowerPolicy } from '../../src/core/failures/policies';
import { FailureSeverity } from '../../src/core/failures/types';
import { InMemoryModel } from '../../src/core/resource/InMemoryModel';
import { TransactionGroup } from '../../src/core/transactions/TransactionGroup';
import { TransactionGroupManager } from '../../src/core/transactions/TransactionGroupManager';
import { TransactionManager } from '../../src/core/transactions/TransactionManager';
import { GroupState } from '../../src/core/transactions/types';

describe('TransactionGroupManager', () => {
    let model: InMemoryModel;
    let groups: TransactionGroupManager;

    beforeEach(() => {
        model = new InMemoryModel('Test Model');
        groups = new TransactionGroupManager(new TransactionManager(model, new WarningSwallowerPolicy()));
    });

    it('should start with a single checkpoint', async () => {
        const result = await groups.start('G1');

        expect(result).toEqual({ success: true, groupName: 'G1' });
        const status = groups.status();
        expect(status.hasActive).toBe(true);
        expect(status.name).toBe('G1');
        expect(status.checkpointCount).toBe(1);
        expect(status.checkpoints[0].label).toBe('started: G1');
    });

    it('should report AlreadyActive without touching the active group', async () => {
        await groups.start('G1');
        groups.checkpoint('walls placed');

        const second = await groups.start('G2');

        expect(second).toEqual({ success: false, error: 'AlreadyActive', activeGroup: 'G1' });
        expect(groups.status().checkpoints.map(c => c.label)).toEqual(['started: G1', 'walls placed']);
        expect(model.getOpenScopeCount()).toBe(1);
    });

    it('should count N checkpoints as N + 1 entries', async () => {
        await groups.start('G1');
        for (let i = 1; i <= 3; i++) {
            const result = groups.checkpoint(`step ${i}`);
            expect(result).toMatchObject({ success: true, checkpointCount: i + 1, activeGroup: 'G1' });
        }
        expect(groups.status().checkpointCount).toBe(4);
    });

    it('should return StateError for checkpoint, commit and rollback while inactive', async () => {
        const expected = { success: false, error: 'StateError', message: 'No active transaction group' };

        expect(groups.checkpoint('orphan')).toEqual(expected);
        expect(await groups.commit()).toEqual(expected);
        expect(await groups.rollback()).toEqual(expected);
        expect(groups.status()).toEqual({ hasActive: false, name: null, checkpointCount: 0, checkpoints: [] });
    });

    it('should commit every change made while active as one undo entry', async () => {
        await groups.start('Layout');
        const scope = await model.beginScope('wall');
        model.createElement({ category: 'Walls', name: 'A' });
        await model.commit(scope);
        groups.checkpoint('after wall');

        const result = await groups.commit();

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.state).toBe(GroupState.Committed);
            expect(result.checkpoints.map(c => c.label)).toEqual(['started: Layout', 'after wall']);
        }
        expect(model.getUndoStack()).toEqual(['Layout']);
        expect(model.snapshot()).toHaveLength(1);
        expect(groups.status().checkpointCount).toBe(0);
    });

    it('should undo every change made while active on rollback', async () => {
        await groups.start('Layout');
        const scope = await model.beginScope('wall');
        model.createElement({ category: 'Walls', name: 'A' });
        await model.commit(scope);

        const result = await groups.rollback();

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.state).toBe(GroupState.RolledBack);
        }
        expect(model.snapshot()).toEqual([]);
        expect(model.getUndoStack()).toEqual([]);
    });

    it('should reset the checkpoint log on the next start', async () => {
        await groups.start('G1');
        groups.checkpoint('one');
        await groups.commit();

        await groups.start('G2');
        expect(groups.status().checkpointCount).toBe(1);
    });

    it('should report a ResourceError and end the group when the commit is refused', async () => {
        await groups.start('G1');
        const inner = await model.beginScope('ok');
        model.createElement({ category: 'Walls', name: 'B' });
        await model.commit(inner);
        model.postFailure({ severity: FailureSeverity.Error, description: 'Group level error' });
        groups.checkpoint('before commit');

        const result = await groups.commit();

        expect(result).toMatchObject({
            success: false,
            error: 'ResourceError',
            message: "Scope 'G1' was rolled back by failure processing",
            groupName: 'G1',
        });
        if (!result.success && result.error === 'ResourceError') {
            expect(result.checkpoints.map(c => c.label)).toEqual(['started: G1', 'before commit']);
        }
        expect(groups.status().hasActive).toBe(false);
        expect(model.snapshot()).toEqual([]);
    });
});

describe('TransactionGroup', () => {
    it('should not start twice', async () => {
        const model = new InMemoryModel();
        const group = new TransactionGroup('Once', new TransactionManager(model, new WarningSwallowerPolicy()));
        await group.start();
        await group.rollBack();

        expect(group.getState()).toBe(GroupState.RolledBack);
        await expect(group.start()).rejects.toBeInstanceOf(StateError);
    });

    it('should refuse checkpoints once finished', async () => {
        const model = new InMemoryModel();
        const group = new TransactionGroup('Once', new TransactionManager(model, new WarningSwallowerPolicy()));
        await group.start();
        await group.assimilate();

        expect(() => group.addCheckpoint('late')).toThrow(StateError);
    });
});
