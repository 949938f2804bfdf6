import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

// -------------------------------------------------------------------------
// Journal Entries (terminal outcome of every scope the engine owned)
// -------------------------------------------------------------------------
export const journalEntries = sqliteTable('journal_entries', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    kind: text('kind').notNull(),          // 'group', 'batch', 'safe', 'verify'
    name: text('name').notNull(),
    outcome: text('outcome').notNull(),    // 'committed', 'rolled_back'
    succeeded: integer('succeeded').notNull().default(0),
    failed: integer('failed').notNull().default(0),
    detail: text('detail', { mode: 'json' }).$type<Record<string, unknown>>(),
    createdAt: integer('created_at', { mode: 'timestamp' })
        .notNull()
        .default(sql`(unixepoch())`),
}, (t) => ({
    createdIndex: index('idx_journal_created').on(t.createdAt),
    kindIndex: index('idx_journal_kind').on(t.kind),
}));

