// src/registry-core/L2/RecordStore.ts
import { ErrorCode, RegistryError } from '../Errors.js';
import { fromHex, isHex, toHex } from '../L0/Crypto.js';
import { enforce, UniquenessGuard } from '../L0/Guards.js';
import type { Address, RegistryKey, WrapRecord } from '../L0/Ontology.js';
import { CONTENT_HASH_BYTES } from '../L0/Primitives.js';
import type { ContractStorage } from '../L3/Host.js';

// Stored form: bigints as decimal strings, bytes as hex.
interface StoredWrapRecord {
    timestamp: string;
    archetype: string;
    contentHash: string;
    period: string;
}

const wrapKey = (key: RegistryKey) => ({ kind: 'Wrap', user: key.user, period: key.period } as const);
const countKey = (user: Address) => ({ kind: 'UserCount', user } as const);

/**
 * (user, period) -> WrapRecord, plus the per-user issuance counter.
 * Runs on the invocation's staged storage; the host commits both or neither.
 */
export class RecordStore {
    constructor(private storage: ContractStorage) { }

    public exists(key: RegistryKey): boolean {
        return this.storage.has(wrapKey(key));
    }

    public get(key: RegistryKey): WrapRecord | undefined {
        const value = this.storage.read(wrapKey(key));
        return value === undefined ? undefined : decodeWrapRecord(value);
    }

    public put(key: RegistryKey, record: WrapRecord) {
        enforce(UniquenessGuard({ key, exists: this.exists(key) }));
        this.storage.set(wrapKey(key), JSON.stringify(encodeWrapRecord(record)));
    }

    public count(user: Address): number {
        const value = this.storage.read(countKey(user));
        return value === undefined ? 0 : decodeCount(value);
    }

    public incrementCounter(user: Address): number {
        const next = this.count(user) + 1;
        this.storage.set(countKey(user), JSON.stringify(next));
        return next;
    }
}

function encodeWrapRecord(record: WrapRecord): StoredWrapRecord {
    return {
        timestamp: record.timestamp.toString(),
        archetype: record.archetype,
        contentHash: toHex(record.contentHash),
        period: record.period.toString(),
    };
}

function decodeWrapRecord(value: unknown): WrapRecord {
    if (
        typeof value !== 'object' || value === null ||
        !('timestamp' in value) || typeof value.timestamp !== 'string' || !/^[0-9]+$/.test(value.timestamp) ||
        !('archetype' in value) || typeof value.archetype !== 'string' ||
        !('contentHash' in value) || typeof value.contentHash !== 'string' || !isHex(value.contentHash, CONTENT_HASH_BYTES) ||
        !('period' in value) || typeof value.period !== 'string' || !/^[0-9]+$/.test(value.period)
    ) {
        throw new RegistryError(ErrorCode.STORAGE_CORRUPTED, 'Stored wrap record is malformed');
    }

    return {
        timestamp: BigInt(value.timestamp),
        archetype: value.archetype,
        contentHash: fromHex(value.contentHash),
        period: BigInt(value.period),
    };
}

function decodeCount(value: unknown): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
        throw new RegistryError(ErrorCode.STORAGE_CORRUPTED, 'Stored counter is malformed');
    }
    return value;
}
