// src/registry-core/L3/MemoryLedger.ts
import type { ContractId } from '../L0/Ontology.js';
import type { LedgerEvent } from '../L5/Events.js';
import type { LedgerBackend, LedgerTransaction } from './Host.js';

/**
 * In-process ledger. A transaction stages its writes over the committed
 * entries (null marks a delete); they are applied only once `work` returns.
 */
export class MemoryLedger implements LedgerBackend {
    private entries = new Map<string, string>();
    private log: LedgerEvent[] = [];

    public transact<T>(work: (tx: LedgerTransaction) => T): T {
        const staged = new Map<string, string | null>();
        const appended: LedgerEvent[] = [];

        const tx: LedgerTransaction = {
            get: (key) => {
                const value = staged.get(key);
                return value === undefined ? this.entries.get(key) : value ?? undefined;
            },
            set: (key, value) => { staged.set(key, value); },
            delete: (key) => { staged.set(key, null); },
            lastEvent: () => appended[appended.length - 1] ?? this.log[this.log.length - 1],
            appendEvent: (event) => { appended.push(event); },
        };

        // A throw here discards the staged writes.
        const result = work(tx);

        for (const [key, value] of staged) {
            if (value === null) this.entries.delete(key);
            else this.entries.set(key, value);
        }
        this.log.push(...appended);
        return result;
    }

    public events(contractId?: ContractId): LedgerEvent[] {
        return this.log.filter(e => contractId === undefined || e.contractId === contractId);
    }

    // Number of stored ledger entries, across contracts.
    public get size(): number {
        return this.entries.size;
    }
}
