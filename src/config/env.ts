// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform(val => val === 'true' || val === '1');

/**
 * Environment Variable Schema
 */
const envSchema = z.object({
    // Server & Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Logging verbosity; falls back to a NODE_ENV based default when unset
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Operation journal (SQLite)
    JOURNAL_ENABLED: booleanFlag,
    DATA_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

// Process and validate
const _env = envSchema.parse(process.env);

if (_env.NODE_ENV === 'production' && _env.LOG_LEVEL === 'debug') {
    process.stderr.write('WARNING: LOG_LEVEL=debug in production will log every scope transition.\n');
}

export const ENV: Env = _env;
