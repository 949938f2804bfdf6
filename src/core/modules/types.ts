import { OperationDefinition } from '../operations/types';
import { ResourceHandle } from '../resource/types';

/**
 * Interface for operation modules.
 * A module is a self-contained group of operations that plugs into the
 * registry without touching the executors.
 */
export interface OperationModule<R extends ResourceHandle = ResourceHandle> {
    /** Unique identifier for the module (e.g., 'elements') */
    id: string;

    /** Human-readable name */
    name: string;

    /** Description of what the module does */
    description: string;

    /** Version of the module */
    version: string;

    /**
     * Initialization logic for the module.
     * Called before its operations are registered.
     */
    initialize(): Promise<void>;

    /**
     * The operations this module contributes.
     */
    operations(): OperationDefinition<R>[];

    /**
     * Optional: Logic to execute before shutdown.
     */
    shutdown?(): Promise<void>;
}
