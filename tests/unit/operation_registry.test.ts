// tests/unit/operation_registry.test.ts

import { StateError } from '../../src/core/errors';
import { OperationRegistry } from '../../src/core/operations/OperationRegistry';
import { createOperation, ok } from '../../src/core/operations/types';
import { InMemoryModel } from '../../src/core/resource/InMemoryModel';

describe('OperationRegistry', () => {
    const noop = async () => ok({ ran: true });

    it('should resolve names case-insensitively and through aliases', () => {
        const registry = new OperationRegistry<InMemoryModel>();
        registry.register({ name: 'createWall', aliases: ['placeWall'], handler: noop });

        expect(registry.resolve('createWall')).toBe(noop);
        expect(registry.resolve('CREATEWALL')).toBe(noop);
        expect(registry.resolve('placewall')).toBe(noop);
        expect(registry.has('PlaceWall')).toBe(true);
    });

    it('should return undefined for unknown names without throwing', () => {
        const registry = new OperationRegistry<InMemoryModel>();
        expect(registry.resolve('doesNotExist')).toBeUndefined();
        expect(registry.resolve('')).toBeUndefined();
    });

    it('should let the last registration win and record the conflict', () => {
        const registry = new OperationRegistry<InMemoryModel>();
        const second = async () => ok({ second: true });
        registry.register({ name: 'move', handler: noop });
        registry.register({ name: 'Move', handler: second });

        expect(registry.resolve('move')).toBe(second);
        expect(registry.getConflicts()).toEqual(['Move (overwritten by Move)']);
    });

    it('should refuse registrations once sealed', () => {
        const registry = new OperationRegistry<InMemoryModel>();
        registry.seal();

        expect(registry.isSealed()).toBe(true);
        expect(() => registry.register({ name: 'late', handler: noop })).toThrow(StateError);
    });

    it('should list one entry per operation sorted by category then name', () => {
        const registry = new OperationRegistry<InMemoryModel>();
        registry.register({ name: 'zeta', category: 'B', handler: noop });
        registry.register({ name: 'beta', category: 'A', aliases: ['b'], description: 'Beta op', handler: noop });
        registry.register({ name: 'alpha', handler: noop });

        expect(registry.list()).toEqual([
            { name: 'beta', category: 'A', description: 'Beta op', aliases: ['b'], params: { properties: {} } },
            { name: 'zeta', category: 'B', description: 'zeta', aliases: [], params: { properties: {} } },
            { name: 'alpha', category: 'General', description: 'alpha', aliases: [], params: { properties: {} } },
        ]);
    });
});

describe('createOperation', () => {
    it('should freeze the operation', () => {
        const operation = createOperation('createWall', { length: 5 });
        expect(Object.isFrozen(operation)).toBe(true);
        expect(operation).toEqual({ name: 'createWall', params: { length: 5 } });
    });
});
