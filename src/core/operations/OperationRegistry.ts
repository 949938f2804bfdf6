// src/core/operations/OperationRegistry.ts

import { ErrorFactory } from '../errors';
import { Logger } from '../logging/Logger';
import { ResourceHandle } from '../resource/types';
import { OperationDefinition, OperationHandler, OperationInfo } from './types';

interface RegistryEntry<R extends ResourceHandle> {
    handler: OperationHandler<R>;
    info: OperationInfo;
}

/**
 * OperationRegistry
 * Maps an operation name (case-insensitive, aliases included) to its handler.
 * Filled once at startup, then sealed; lookups never throw.
 */
export class OperationRegistry<R extends ResourceHandle = ResourceHandle> {
    private entries: Map<string, RegistryEntry<R>> = new Map();
    private conflicts: string[] = [];
    private sealed: boolean = false;

    public register(definition: OperationDefinition<R>): void {
        if (this.sealed) {
            throw ErrorFactory.state(`Cannot register '${definition.name}': registry is sealed`, {
                operation: definition.name,
                suggestion: 'Register operations through a module before the engine starts'
            });
        }

        const info: OperationInfo = {
            name: definition.name,
            category: definition.category ?? 'General',
            description: definition.description ?? definition.name,
            aliases: definition.aliases ?? [],
            params: definition.params ?? { properties: {} },
        };
        const entry: RegistryEntry<R> = { handler: definition.handler, info };

        this.put(definition.name, entry);
        for (const alias of info.aliases) {
            if (alias.trim().length > 0) {
                this.put(alias, entry);
            }
        }
    }

    private put(name: string, entry: RegistryEntry<R>): void {
        const key = name.toLowerCase();
        const existing = this.entries.get(key);
        if (existing && existing !== entry) {
            this.conflicts.push(`${name} (overwritten by ${entry.info.name})`);
            Logger.warn('OperationRegistry', `Name conflict, last registration wins: ${name}`);
        }
        this.entries.set(key, entry);
    }

    /**
     * Returns the handler registered under `name`, or undefined.
     */
    public resolve(name: string): OperationHandler<R> | undefined {
        return this.entries.get(name.toLowerCase())?.handler;
    }

    public has(name: string): boolean {
        return this.entries.has(name.toLowerCase());
    }

    public seal(): void {
        this.sealed = true;
        Logger.info('OperationRegistry', `Registry sealed with ${this.list().length} operations`);
    }

    public isSealed(): boolean {
        return this.sealed;
    }

    /**
     * One entry per primary name, sorted by category then name.
     */
    public list(): OperationInfo[] {
        const unique = new Set<OperationInfo>();
        for (const entry of this.entries.values()) {
            unique.add(entry.info);
        }
        return Array.from(unique).sort((a, b) =>
            a.category.localeCompare(b.category) || a.name.localeCompare(b.name)
        );
    }

    public getConflicts(): string[] {
        return [...this.conflicts];
    }
}
