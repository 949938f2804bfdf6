// tests/unit/journal.test.ts

import { OperationJournal } from '../../src/core/journal/OperationJournal';
import { createOperation } from '../../src/core/operations/types';
import { IN_MEMORY, closeDatabase, getSqliteInstance, initDatabase } from '../../src/infrastructure/database';
import { buildStack } from '../helpers/fixtures';

describe('OperationJournal', () => {
    let journal: OperationJournal;

    beforeEach(() => {
        journal = new OperationJournal(initDatabase(IN_MEMORY));
    });

    afterEach(() => {
        closeDatabase();
    });

    it('should create the journal table', () => {
        const tables = getSqliteInstance()
            .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='journal_entries'")
            .all();
        expect(tables).toEqual([{ name: 'journal_entries' }]);
    });

    it('should return the newest entries first', async () => {
        await journal.record({ kind: 'safe', name: 'first', outcome: 'committed', succeeded: 1 });
        await journal.record({ kind: 'batch', name: 'second', outcome: 'rolled_back', failed: 2, detail: { total: 2 } });

        const entries = await journal.recent(10);

        expect(entries.map(e => e.name)).toEqual(['second', 'first']);
        expect(entries[0]).toMatchObject({
            kind: 'batch',
            outcome: 'rolled_back',
            succeeded: 0,
            failed: 2,
            detail: { total: 2 },
        });
        expect(entries[1].detail).toBeNull();
        expect(entries[1].createdAt).toBeInstanceOf(Date);
    });

    it('should honor the limit', async () => {
        for (let i = 0; i < 3; i++) {
            await journal.record({ kind: 'safe', name: `op ${i}`, outcome: 'committed' });
        }
        expect((await journal.recent(2)).map(e => e.name)).toEqual(['op 2', 'op 1']);
    });

    it('should record terminal outcomes from the executors', async () => {
        const stack = buildStack(journal);

        await stack.batches.run([createOperation('opA'), createOperation('opB')], { stopOnError: true }, 'Failing batch');
        await stack.groups.start('G1');
        await stack.groups.commit();

        const [group, batch] = await journal.recent(2);
        expect(group).toMatchObject({ kind: 'group', name: 'G1', outcome: 'committed', detail: { checkpoints: ['started: G1'] } });
        expect(batch).toMatchObject({
            kind: 'batch',
            name: 'Failing batch',
            outcome: 'rolled_back',
            succeeded: 1,
            failed: 1,
            detail: { total: 2, error: 'Operation 1 (opB) failed: X not found. Transaction rolled back.' },
        });
    });
});
