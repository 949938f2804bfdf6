import { Mutex } from 'async-mutex';
import { OperationModule } from './types';
import { Logger } from '../logging/Logger';
import { OperationRegistry } from '../operations/OperationRegistry';
import { ResourceHandle } from '../resource/types';

/**
 * Manager for operation modules.
 * Handles safe registration, initialization, and disposal of modules, feeding
 * each module's operations into the registry.
 */
export class ModuleManager<R extends ResourceHandle = ResourceHandle> {
    private modules: Map<string, OperationModule<R>> = new Map();
    private registrationMutex: Mutex = new Mutex();

    constructor(private readonly registry: OperationRegistry<R>) { }

    /**
     * Safely registers and initializes a new module.
     * Uses a Mutex so concurrent startup code cannot interleave registrations.
     */
    public async registerModule(module: OperationModule<R>): Promise<void> {
        return await this.registrationMutex.runExclusive(async () => {
            if (this.modules.has(module.id)) {
                Logger.info('ModuleManager', `Module ${module.id} is already registered. Skipping.`);
                return;
            }

            try {
                Logger.info('ModuleManager', `Initializing module: ${module.name} (v${module.version})...`);
                await module.initialize();
                const operations = module.operations();
                for (const operation of operations) {
                    this.registry.register({ category: module.name, ...operation });
                }
                this.modules.set(module.id, module);
                Logger.info('ModuleManager', `Module ${module.id} registered ${operations.length} operations.`);
            } catch (error) {
                Logger.error('ModuleManager', `Failed to initialize module ${module.id}:`, error);
                throw error;
            }
        });
    }

    /**
     * Ends the registration phase: no module can add operations afterwards.
     */
    public async seal(): Promise<void> {
        await this.registrationMutex.runExclusive(async () => {
            this.registry.seal();
        });
    }

    /**
     * Calls every module's shutdown logic. Operations stay registered: the
     * registry is static for the life of the process.
     */
    public async shutdown(): Promise<void> {
        await this.registrationMutex.runExclusive(async () => {
            for (const module of this.modules.values()) {
                try {
                    if (module.shutdown) {
                        await module.shutdown();
                    }
                } catch (error) {
                    Logger.error('ModuleManager', `Error during module ${module.id} shutdown:`, error);
                }
            }
            this.modules.clear();
        });
    }

    public getModule(moduleId: string): OperationModule<R> | undefined {
        return this.modules.get(moduleId);
    }

    public listModules(): OperationModule<R>[] {
        return Array.from(this.modules.values());
    }
}
