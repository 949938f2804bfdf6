// src/core/journal/OperationJournal.ts

import { desc } from 'drizzle-orm';
import { JournalDatabase, journalEntries } from '../../infrastructure/database';
import { Logger } from '../logging/Logger';

export type JournalKind = 'group' | 'batch' | 'safe' | 'verify';
export type JournalOutcome = 'committed' | 'rolled_back';

export interface JournalEntry {
    kind: JournalKind;
    name: string;
    outcome: JournalOutcome;
    succeeded?: number;
    failed?: number;
    detail?: Record<string, unknown>;
}

export interface JournalRecord extends Required<Omit<JournalEntry, 'detail'>> {
    id: number;
    detail: Record<string, unknown> | null;
    createdAt: Date;
}

/**
 * Where executors report terminal outcomes. Recording is observational:
 * implementations must not let a write failure change an engine outcome.
 */
export interface JournalSink {
    record(entry: JournalEntry): Promise<void>;
    recent(limit: number): Promise<JournalRecord[]>;
}

function isKind(value: string): value is JournalKind {
    return value === 'group' || value === 'batch' || value === 'safe' || value === 'verify';
}

/**
 * SQLite-backed journal (drizzle over better-sqlite3).
 */
export class OperationJournal implements JournalSink {
    constructor(private readonly db: JournalDatabase) { }

    async record(entry: JournalEntry): Promise<void> {
        try {
            await this.db.insert(journalEntries).values({
                kind: entry.kind,
                name: entry.name,
                outcome: entry.outcome,
                succeeded: entry.succeeded ?? 0,
                failed: entry.failed ?? 0,
                detail: entry.detail ?? null,
                createdAt: new Date(),
            });
        } catch (error) {
            Logger.error('OperationJournal', `Failed to journal ${entry.kind} '${entry.name}'`, error);
        }
    }

    async recent(limit: number): Promise<JournalRecord[]> {
        const rows = await this.db.select().from(journalEntries)
            .orderBy(desc(journalEntries.id))
            .limit(limit);

        return rows.map((row): JournalRecord => ({
            id: row.id,
            kind: isKind(row.kind) ? row.kind : 'batch',
            name: row.name,
            outcome: row.outcome === 'committed' ? 'committed' : 'rolled_back',
            succeeded: row.succeeded,
            failed: row.failed,
            detail: row.detail ?? null,
            createdAt: row.createdAt,
        }));
    }
}
