// src/core/engine/index.ts

import { ModuleManager } from '../modules/ModuleManager';
import { OperationModule } from '../modules/types';
import { OperationRegistry } from '../operations/OperationRegistry';
import { ResourceHandle } from '../resource/types';
import { CommandDispatcher, EngineOptions } from './CommandDispatcher';

export { CommandDispatcher } from './CommandDispatcher';
export type { EngineOptions, InboundCall } from './CommandDispatcher';
export type { Response } from './responses';

export interface Engine<R extends ResourceHandle> {
    dispatcher: CommandDispatcher<R>;
    registry: OperationRegistry<R>;
    modules: ModuleManager<R>;
}

/**
 * Wires a resource and its operation modules into a ready dispatcher.
 * The registry is sealed before the dispatcher is handed out.
 */
export async function createEngine<R extends ResourceHandle>(
    resource: R,
    modules: OperationModule<R>[],
    options: EngineOptions = {}
): Promise<Engine<R>> {
    const registry = new OperationRegistry<R>();
    const manager = new ModuleManager<R>(registry);
    for (const module of modules) {
        await manager.registerModule(module);
    }
    await manager.seal();

    return {
        dispatcher: new CommandDispatcher(registry, resource, options),
        registry,
        modules: manager,
    };
}
