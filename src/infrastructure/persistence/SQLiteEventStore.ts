import Database from 'better-sqlite3';
import type { IEventStore, Evidence } from '../../kernel-core/L5/Audit.js';
import { registryEventSchema } from '../../kernel-core/L0/Schemas.js';

interface EventRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    commandId: string;
    caller: string;
    type: string;
    timestamp: number;
    event: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS registry_events (
                sequence INTEGER PRIMARY KEY,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                commandId TEXT NOT NULL,
                caller TEXT NOT NULL,
                type TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                event TEXT NOT NULL
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO registry_events (
                sequence, evidenceId, previousEvidenceId, commandId, caller, type, timestamp, event
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.sequence,
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.commandId,
            evidence.caller,
            evidence.event.type,
            evidence.timestamp,
            JSON.stringify(evidence.event)
        );
    }

    async getHistory(afterSequence: number = 0): Promise<Evidence[]> {
        const stmt = this.db.prepare<[number], EventRow>('SELECT * FROM registry_events WHERE sequence > ? ORDER BY sequence ASC');
        return stmt.all(afterSequence).map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const stmt = this.db.prepare<[], EventRow>('SELECT * FROM registry_events ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: EventRow): Evidence {
        return {
            sequence: row.sequence,
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            commandId: row.commandId,
            caller: row.caller,
            timestamp: row.timestamp,
            event: registryEventSchema.parse(JSON.parse(row.event))
        };
    }

    public close() {
        if (this.db.open) {
            this.db.close();
        }
    }
}
