// src/config/config.ts

import path from 'path';
import { ENV } from './env';

/**
 * Helper to get the project root directory.
 * Derives the root from the file location to ensure consistency
 * even if the process is started from a different working directory.
 */
const PROJECT_ROOT = path.resolve(__dirname, '../..');

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface PathsConfig {
    PROJECT_ROOT: string;
    DATA_DIR: string;
}

interface BatchConfig {
    DEFAULT_NAME: string;
    STOP_ON_ERROR: boolean;
    CONTINUE_ON_WARNING: boolean;
    REPORT_PARTIAL_AS_FAILURE: boolean;
    MAX_OPERATIONS: number;
    CREATED_ID_KEYS: readonly string[];
}

interface ValidationConfig {
    MAX_LABEL_LENGTH: number;
    MAX_METHOD_NAME_LENGTH: number;
}

interface JournalConfig {
    ENABLED: boolean;
    HISTORY_LIMIT: number;
}

interface Config {
    SERVER: ServerConfig;
    PATHS: PathsConfig;
    BATCH: BatchConfig;
    VALIDATION: ValidationConfig;
    JOURNAL: JournalConfig;
}

/**
 * Centralized configuration for the bridge.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'model-txn-bridge',
        VERSION: '1.0.0',
    },

    PATHS: {
        PROJECT_ROOT,
        DATA_DIR: ENV.DATA_DIR ?? path.join(PROJECT_ROOT, 'data'),
    },

    BATCH: {
        DEFAULT_NAME: 'Batch Operation',
        STOP_ON_ERROR: true,
        CONTINUE_ON_WARNING: true,
        REPORT_PARTIAL_AS_FAILURE: true,
        MAX_OPERATIONS: 500,
        // Payload keys whose values are collected into BatchResult.createdIds
        CREATED_ID_KEYS: ['elementId', 'instanceId', 'wallId', 'elementIds'],
    },

    VALIDATION: {
        MAX_LABEL_LENGTH: 200,
        MAX_METHOD_NAME_LENGTH: 100,
    },

    JOURNAL: {
        ENABLED: ENV.JOURNAL_ENABLED,
        HISTORY_LIMIT: 20,
    },
};
