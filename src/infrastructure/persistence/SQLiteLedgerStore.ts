import Database from 'better-sqlite3';
import type { ContractId } from '../../registry-core/L0/Ontology.js';
import type { LedgerBackend, LedgerTransaction } from '../../registry-core/L3/Host.js';
import type { LedgerEvent } from '../../registry-core/L5/Events.js';

interface EntryRow {
    value: string;
}

interface EventRow {
    sequence: number;
    eventId: string;
    previousEventId: string;
    contractId: string;
    ledgerTimestamp: string;
    topics: string;
    data: string;
}

function prepareStatements(db: Database.Database) {
    return {
        getEntry: db.prepare<[string], EntryRow>('SELECT value FROM ledger_entries WHERE key = ?'),
        putEntry: db.prepare<[string, string]>(
            'INSERT INTO ledger_entries (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
        ),
        deleteEntry: db.prepare<[string]>('DELETE FROM ledger_entries WHERE key = ?'),
        latestEvent: db.prepare<[], EventRow>('SELECT * FROM ledger_events ORDER BY sequence DESC LIMIT 1'),
        insertEvent: db.prepare<[number, string, string, string, string, string, string]>(`
            INSERT INTO ledger_events (
                sequence, eventId, previousEventId, contractId, ledgerTimestamp, topics, data
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?
            )
        `),
        allEvents: db.prepare<[], EventRow>('SELECT * FROM ledger_events ORDER BY sequence ASC'),
        contractEvents: db.prepare<[string], EventRow>('SELECT * FROM ledger_events WHERE contractId = ? ORDER BY sequence ASC'),
    };
}

/**
 * Durable ledger backend. One SQLite transaction per host invocation:
 * a throw inside `transact` rolls back entries and events together.
 */
export class SQLiteLedgerStore implements LedgerBackend {
    private db: Database.Database;
    private statements: ReturnType<typeof prepareStatements>;

    constructor(dbPath: string = 'wrap-registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
        this.statements = prepareStatements(this.db);
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ledger_entries (
                key TEXT PRIMARY KEY,
                value TEXT NOT NULL
            );
            CREATE TABLE IF NOT EXISTS ledger_events (
                sequence INTEGER PRIMARY KEY,
                eventId TEXT UNIQUE NOT NULL,
                previousEventId TEXT NOT NULL,
                contractId TEXT NOT NULL,
                ledgerTimestamp TEXT NOT NULL,
                topics TEXT NOT NULL,
                data TEXT NOT NULL
            );
        `);
    }

    public transact<T>(work: (tx: LedgerTransaction) => T): T {
        const { getEntry, putEntry, deleteEntry, latestEvent, insertEvent } = this.statements;

        const tx: LedgerTransaction = {
            get: (key) => getEntry.get(key)?.value,
            set: (key, value) => { putEntry.run(key, value); },
            delete: (key) => { deleteEntry.run(key); },
            lastEvent: () => {
                const row = latestEvent.get();
                return row ? this.mapRowToEvent(row) : undefined;
            },
            appendEvent: (event) => {
                insertEvent.run(
                    event.sequence,
                    event.eventId,
                    event.previousEventId,
                    event.contractId,
                    event.ledgerTimestamp,
                    JSON.stringify(event.topics),
                    event.data
                );
            },
        };

        return this.db.transaction(() => work(tx))();
    }

    public events(contractId?: ContractId): LedgerEvent[] {
        const rows = contractId === undefined
            ? this.statements.allEvents.all()
            : this.statements.contractEvents.all(contractId);

        return rows.map(row => this.mapRowToEvent(row));
    }

    private mapRowToEvent(row: EventRow): LedgerEvent {
        const topics: unknown = JSON.parse(row.topics);
        if (!Array.isArray(topics) || !topics.every((t): t is string => typeof t === 'string')) {
            throw new Error(`[SQLiteLedger] Event ${row.sequence} has malformed topics`);
        }

        return {
            sequence: row.sequence,
            eventId: row.eventId,
            previousEventId: row.previousEventId,
            contractId: row.contractId,
            ledgerTimestamp: row.ledgerTimestamp,
            topics,
            data: row.data,
        };
    }

    public close() {
        this.db.close();
        console.log('[SQLiteLedger] Closed.');
    }
}
