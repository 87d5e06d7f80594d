// src/registry-core/L3/Host.ts
import { ErrorCode, RegistryError } from '../Errors.js';
import { verifySignature } from '../L0/Crypto.js';
import type { Address, ContractEvent, ContractId, DataKey, EventTopic } from '../L0/Ontology.js';
import { sealEvent } from '../L5/Events.js';
import type { LedgerEvent } from '../L5/Events.js';

/**
 * Host Ports
 * Everything the contract needs from the ledger is injected through these.
 */

// Persistence Port: staged view of the ledger inside one transaction.
export interface LedgerTransaction {
    get(key: string): string | undefined;
    set(key: string, value: string): void;
    delete(key: string): void;
    lastEvent(): LedgerEvent | undefined;
    appendEvent(event: LedgerEvent): void;
}

// Persistence Port: all-or-nothing application of a unit of work.
export interface LedgerBackend {
    /** Commits when `work` returns, discards every staged write when it throws. */
    transact<T>(work: (tx: LedgerTransaction) => T): T;
    events(contractId?: ContractId): LedgerEvent[];
}

// Environment Port: ledger close time, u64 seconds.
export interface LedgerClock {
    now(): bigint;
}

// Crypto Port
export interface SignatureVerifier {
    verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean;
}

export const Ed25519Verifier: SignatureVerifier = {
    verify: (message, signature, publicKey) => verifySignature(message, signature, publicKey),
};

// Native authorization carried by the invocation (the addresses that signed it).
export interface InvocationAuth {
    authorizedBy?: readonly Address[];
}

// --- Clocks ---

export class ManualLedgerClock implements LedgerClock {
    constructor(private current: bigint = 0n) { }

    public now(): bigint { return this.current; }

    public set(timestamp: bigint) {
        if (timestamp < this.current) {
            throw new Error(`Clock Error: ledger time cannot move backwards (${this.current} -> ${timestamp})`);
        }
        this.current = timestamp;
    }

    public advance(seconds: bigint) { this.set(this.current + seconds); }
}

export class SystemLedgerClock implements LedgerClock {
    private last = 0n;

    public now(): bigint {
        const wall = BigInt(Math.floor(Date.now() / 1000));
        if (wall > this.last) this.last = wall;
        return this.last;
    }
}

// --- Contract Storage ---

export function storageKey(contractId: ContractId, key: DataKey): string {
    switch (key.kind) {
        case 'Admin':
        case 'AdminPublicKey':
            return JSON.stringify([contractId, key.kind]);
        case 'Wrap':
            return JSON.stringify([contractId, key.kind, key.user, key.period.toString()]);
        case 'UserCount':
            return JSON.stringify([contractId, key.kind, key.user]);
    }
}

/**
 * Instance storage of one contract, scoped by its id.
 */
export class ContractStorage {
    constructor(private contractId: ContractId, private tx: LedgerTransaction) { }

    public has(key: DataKey): boolean { return this.tx.get(storageKey(this.contractId, key)) !== undefined; }
    public get(key: DataKey): string | undefined { return this.tx.get(storageKey(this.contractId, key)); }
    public set(key: DataKey, value: string) { this.tx.set(storageKey(this.contractId, key), value); }
    public remove(key: DataKey) { this.tx.delete(storageKey(this.contractId, key)); }

    // Parsed JSON value, undefined when absent. Text that is not JSON is corruption.
    public read(key: DataKey): unknown {
        const raw = this.get(key);
        if (raw === undefined) return undefined;
        try {
            return JSON.parse(raw);
        } catch {
            throw new RegistryError(ErrorCode.STORAGE_CORRUPTED, `Stored ${key.kind} value is not JSON`, { key: key.kind });
        }
    }
}

// --- Invocation ---

export class Invocation {
    private readonly signers: ReadonlySet<Address>;

    constructor(
        public readonly contractId: ContractId,
        public readonly storage: ContractStorage,
        public readonly timestamp: bigint,
        public readonly verifier: SignatureVerifier,
        auth: InvocationAuth,
        private staged: ContractEvent[]
    ) {
        this.signers = new Set(auth.authorizedBy ?? []);
    }

    // require_auth: did `address` sign this invocation?
    public isAuthorizedBy(address: Address): boolean {
        return this.signers.has(address);
    }

    public publish(topics: readonly EventTopic[], data: string) {
        this.staged.push({ contractId: this.contractId, topics: [...topics], data });
    }
}

/**
 * The Ledger Host
 * Runs each contract call to completion inside one backend transaction.
 * Storage writes and events become visible together or not at all.
 */
export class LedgerHost {
    private active = false;

    constructor(
        private backend: LedgerBackend,
        private clock: LedgerClock = new SystemLedgerClock(),
        private verifier: SignatureVerifier = Ed25519Verifier
    ) { }

    public invoke<T>(contractId: ContractId, work: (env: Invocation) => T, auth: InvocationAuth = {}): T {
        if (this.active) {
            throw new Error('Host Error: nested invocation refused; calls are serialized per host');
        }
        this.active = true;

        try {
            return this.backend.transact((tx) => {
                const staged: ContractEvent[] = [];
                const timestamp = this.clock.now();
                const env = new Invocation(contractId, new ContractStorage(contractId, tx), timestamp, this.verifier, auth, staged);

                const result = work(env);

                let tip = tx.lastEvent();
                for (const event of staged) {
                    tip = sealEvent(tip, event, timestamp);
                    tx.appendEvent(tip);
                }
                return result;
            });
        } finally {
            this.active = false;
        }
    }

    public events(contractId?: ContractId): LedgerEvent[] {
        return this.backend.events(contractId);
    }
}
