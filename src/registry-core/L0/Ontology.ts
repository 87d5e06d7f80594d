// src/registry-core/L0/Ontology.ts

// --- 1. Identity ---
export type Address = string;
export type ContractId = string;

// --- 2. Registry Primitives ---
export type Period = bigint; // u64
export type ArchetypeTag = string; // ledger symbol, [A-Za-z0-9_]{1,32}
export type ContentHash = Uint8Array; // 32 bytes, opaque
export type Signature = Uint8Array; // 64 bytes, Ed25519
export type PublicKey = Uint8Array; // 32 bytes, Ed25519

export type RegistryLifecycle = 'UNINITIALIZED' | 'READY';

/**
 * The once-per-(user, period) artifact.
 * Immutable after creation: nothing updates or removes it.
 */
export interface WrapRecord {
    timestamp: bigint; // ledger seconds at issuance
    archetype: ArchetypeTag;
    contentHash: ContentHash;
    period: Period;
}

export interface RegistryKey {
    user: Address;
    period: Period;
}

export interface MintRequest {
    user: Address;
    period: Period;
    archetype: ArchetypeTag;
    contentHash: ContentHash;
    signature?: Signature;
}

// --- 3. Persisted Layout ---
export type DataKey =
    | { kind: 'Admin' }
    | { kind: 'AdminPublicKey' }
    | { kind: 'Wrap'; user: Address; period: Period }
    | { kind: 'UserCount'; user: Address };

// --- 4. Events ---
export type EventTopic = string | bigint;

export interface ContractEvent {
    contractId: ContractId;
    topics: readonly EventTopic[];
    data: string;
}

export const MINT_TOPIC = 'mint';

// --- 5. Token Metadata (fixed policy constants) ---
export const TOKEN_METADATA = {
    name: 'Stellar Wrap Registry',
    symbol: 'WRAP',
    decimals: 0,
} as const;
