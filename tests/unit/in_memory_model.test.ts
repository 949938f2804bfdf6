// tests/unit/in_memory_model.test.ts

import { ResourceError } from '../../src/core/errors';
import { StrictFailurePolicy, WarningSwallowerPolicy } from '../../src/core/failures/policies';
import { FailureSeverity } from '../../src/core/failures/types';
import { InMemoryModel } from '../../src/core/resource/InMemoryModel';

describe('InMemoryModel', () => {
    let model: InMemoryModel;

    beforeEach(() => {
        model = new InMemoryModel('Test Model');
    });

    it('should refuse mutations outside a scope', () => {
        expect(() => model.createElement({ category: 'Walls', name: 'A' })).toThrow(
            'Attempt to modify the model outside of a transaction'
        );
    });

    it('should assign sequential ids starting at 1000', async () => {
        const scope = await model.beginScope('create');
        const first = model.createElement({ category: 'Walls', name: 'A' });
        const second = model.createElement({ category: 'Doors', name: 'D', hostId: first.id });
        await model.commit(scope);

        expect(first.id).toBe('1000');
        expect(second.id).toBe('1001');
        expect(model.getElement('1001')?.hostId).toBe('1000');
        expect(model.getUndoStack()).toEqual(['create']);
    });

    it('should restore the snapshot on rollback', async () => {
        const setup = await model.beginScope('setup');
        model.createElement({ category: 'Walls', name: 'A', parameters: { Mark: 'W1' } });
        await model.commit(setup);

        const scope = await model.beginScope('edit');
        model.setParameter('1000', 'Mark', 'W2');
        model.createElement({ category: 'Walls', name: 'B' });
        await model.rollback(scope);

        expect(model.snapshot()).toEqual([
            { id: '1000', category: 'Walls', name: 'A', parameters: { Mark: 'W1' } },
        ]);
        expect(model.getOpenScopeCount()).toBe(0);
    });

    it('should only record the outermost scope on the undo stack', async () => {
        const outer = await model.beginScope('outer');
        const inner = await model.beginScope('inner');
        model.createElement({ category: 'Walls', name: 'A' });
        await model.commit(inner);
        await model.commit(outer);

        expect(model.getUndoStack()).toEqual(['outer']);
    });

    it('should discard a committed inner scope when the outer scope rolls back', async () => {
        const outer = await model.beginScope('outer');
        const inner = await model.beginScope('inner');
        model.createElement({ category: 'Walls', name: 'A' });
        await model.commit(inner);
        await model.rollback(outer);

        expect(model.snapshot()).toEqual([]);
        expect(model.getUndoStack()).toEqual([]);
    });

    it('should reject closing a scope that is not innermost', async () => {
        const outer = await model.beginScope('outer');
        await model.beginScope('inner');

        await expect(model.commit(outer)).rejects.toThrow(
            "Cannot commit scope 'outer': it is not the innermost open scope"
        );
    });

    describe('failure processing', () => {
        it('should delete warnings under the warning swallower', async () => {
            const scope = await model.beginScope('warn');
            await model.attachFailurePolicy(scope, new WarningSwallowerPolicy());
            model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({ severity: FailureSeverity.Warning, description: 'Overlap' });
            await model.commit(scope);

            expect(model.snapshot()).toHaveLength(1);
        });

        it('should apply the resolution of a resolvable error', async () => {
            const scope = await model.beginScope('resolve');
            await model.attachFailurePolicy(scope, new WarningSwallowerPolicy());
            const doomed = model.createElement({ category: 'Walls', name: 'Doomed' });
            model.createElement({ category: 'Walls', name: 'Kept' });
            model.postFailure({
                severity: FailureSeverity.Error,
                description: 'Doomed is invalid',
                resolution: { description: 'Delete it', apply: () => { model.deleteElement(doomed.id); } },
            });
            await model.commit(scope);

            expect(model.snapshot().map(e => e.name)).toEqual(['Kept']);
        });

        it('should roll back and throw ResourceError on an unresolvable error', async () => {
            const scope = await model.beginScope('broken');
            await model.attachFailurePolicy(scope, new WarningSwallowerPolicy());
            model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({ severity: FailureSeverity.Error, description: 'Walls overlap' });

            const error = await model.commit(scope).then(() => null, (e: unknown) => e);
            expect(error).toBeInstanceOf(ResourceError);
            if (error instanceof ResourceError) {
                expect(error.message).toBe("Scope 'broken' was rolled back by failure processing");
                expect(error.context.details).toEqual(['Walls overlap']);
            }
            expect(model.snapshot()).toEqual([]);
            expect(model.getOpenScopeCount()).toBe(0);
        });

        it('should roll back a half-applied resolution that throws', async () => {
            const scope = await model.beginScope('resolve');
            await model.attachFailurePolicy(scope, new WarningSwallowerPolicy());
            const first = model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({
                severity: FailureSeverity.Error,
                description: 'A is invalid',
                resolution: {
                    description: 'Delete it',
                    apply: () => {
                        model.deleteElement(first.id);
                        throw new Error('resolution failed');
                    },
                },
            });

            const error = await model.commit(scope).then(() => null, (e: unknown) => e);
            expect(error).toBeInstanceOf(ResourceError);
            if (error instanceof ResourceError) {
                expect(error.message).toBe("Scope 'resolve' was rolled back: failure processing threw");
                expect(error.context.details).toBe('resolution failed');
            }
            expect(model.snapshot()).toEqual([]);
            expect(model.getOpenScopeCount()).toBe(0);
            expect(model.getUndoStack()).toEqual([]);
        });

        it('should roll back on a warning under the strict policy', async () => {
            const scope = await model.beginScope('strict');
            await model.attachFailurePolicy(scope, new StrictFailurePolicy());
            model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({ severity: FailureSeverity.Warning, description: 'Overlap' });

            await expect(model.commit(scope)).rejects.toBeInstanceOf(ResourceError);
            expect(model.snapshot()).toEqual([]);
        });

        it('should use the nearest enclosing policy for an inner scope', async () => {
            const outer = await model.beginScope('outer');
            await model.attachFailurePolicy(outer, new StrictFailurePolicy());
            const inner = await model.beginScope('inner');
            model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({ severity: FailureSeverity.Warning, description: 'Overlap' });

            await expect(model.commit(inner)).rejects.toBeInstanceOf(ResourceError);
            expect(model.getOpenScopeCount()).toBe(1);
            await model.rollback(outer);
        });

        it('should keep warnings but commit when no policy is attached', async () => {
            const scope = await model.beginScope('plain');
            model.createElement({ category: 'Walls', name: 'A' });
            model.postFailure({ severity: FailureSeverity.Warning, description: 'Overlap' });
            await model.commit(scope);

            expect(model.snapshot()).toHaveLength(1);
        });
    });
});
