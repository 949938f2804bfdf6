import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import path from 'path';
import fs from 'fs';
import { CONFIG } from '../../config/config';
import { ENV } from '../../config/env';
import { Logger } from '../../core/logging/Logger';

const DB_FILENAME = ENV.NODE_ENV === 'test' ? 'journal_test.db' : 'journal.db';
const DB_PATH = path.join(CONFIG.PATHS.DATA_DIR, DB_FILENAME);

export const IN_MEMORY = ':memory:';

export type JournalDatabase = BetterSQLite3Database<typeof schema>;

let db: JournalDatabase | null = null;
let sqlite: Database.Database | null = null;
let currentPath: string | null = null;

/**
 * Initialize the SQLite database connection. Pass ':memory:' for tests.
 */
export function initDatabase(dbPath: string = DB_PATH): JournalDatabase {
    if (db && dbPath === currentPath) return db;

    if (sqlite) {
        sqlite.close();
    }

    if (dbPath !== IN_MEMORY) {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const connection = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
        connection.pragma('journal_mode = WAL');
    }

    connection.exec(`
        CREATE TABLE IF NOT EXISTS journal_entries (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            kind TEXT NOT NULL,
            name TEXT NOT NULL,
            outcome TEXT NOT NULL,
            succeeded INTEGER NOT NULL DEFAULT 0,
            failed INTEGER NOT NULL DEFAULT 0,
            detail TEXT,
            created_at INTEGER NOT NULL DEFAULT (unixepoch())
        );

        CREATE INDEX IF NOT EXISTS idx_journal_created ON journal_entries(created_at);
        CREATE INDEX IF NOT EXISTS idx_journal_kind ON journal_entries(kind);
    `);

    sqlite = connection;
    currentPath = dbPath;
    db = drizzle(connection, { schema });

    Logger.info('DB', `SQLite journal initialized at: ${dbPath}`);
    return db;
}

/**
 * Get the raw SQLite instance (for raw queries)
 */
export function getSqliteInstance(): Database.Database {
    if (!sqlite) {
        initDatabase();
    }
    if (!sqlite) {
        throw new Error('SQLite connection could not be opened');
    }
    return sqlite;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
    if (sqlite) {
        sqlite.close();
        sqlite = null;
        db = null;
        currentPath = null;
        Logger.info('DB', 'Database connection closed');
    }
}

export { schema };
export { journalEntries } from './schema';
