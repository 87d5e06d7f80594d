// src/registry-core/L0/Primitives.ts
import { ErrorCode, RegistryError } from '../Errors.js';
import type { Address, ArchetypeTag, ContentHash, MintRequest, Period, PublicKey } from './Ontology.js';

export const U64_MAX = (1n << 64n) - 1n;
export const MAX_IDENTITY_BYTES = 256;
export const MAX_ARCHETYPE_LENGTH = 32;
export const CONTENT_HASH_BYTES = 32;
export const PUBLIC_KEY_BYTES = 32;
export const SIGNATURE_BYTES = 64;

const ARCHETYPE_PATTERN = /^[A-Za-z0-9_]+$/;

const invalid = (message: string, metadata?: Record<string, unknown>) =>
    new RegistryError(ErrorCode.INVALID_ARGUMENT, message, metadata);

export function assertIdentity(value: string, field: string): Address {
    const size = Buffer.byteLength(value, 'utf8');
    if (size === 0) throw invalid(`${field} must not be empty`, { field });
    if (size > MAX_IDENTITY_BYTES) throw invalid(`${field} exceeds ${MAX_IDENTITY_BYTES} bytes`, { field, size });
    return value;
}

export function assertPeriod(period: bigint): Period {
    if (period < 0n || period > U64_MAX) {
        throw invalid(`Period ${period} outside u64 range`, { period: period.toString() });
    }
    return period;
}

export function assertArchetype(archetype: string): ArchetypeTag {
    if (archetype.length === 0 || archetype.length > MAX_ARCHETYPE_LENGTH || !ARCHETYPE_PATTERN.test(archetype)) {
        throw invalid(`Archetype must be 1-${MAX_ARCHETYPE_LENGTH} symbol characters [A-Za-z0-9_]`, { archetype });
    }
    return archetype;
}

export function assertContentHash(contentHash: Uint8Array): ContentHash {
    if (contentHash.length !== CONTENT_HASH_BYTES) {
        throw invalid(`Content hash must be ${CONTENT_HASH_BYTES} bytes`, { length: contentHash.length });
    }
    return contentHash;
}

export function assertPublicKey(publicKey: Uint8Array): PublicKey {
    if (publicKey.length !== PUBLIC_KEY_BYTES) {
        throw invalid(`Admin public key must be ${PUBLIC_KEY_BYTES} bytes`, { length: publicKey.length });
    }
    return publicKey;
}

/**
 * Shape check for a mint request. The signature is left to the gate:
 * a malformed signature is an authorization failure, not an input error.
 */
export function assertMintRequest(request: MintRequest): MintRequest {
    assertIdentity(request.user, 'user');
    assertPeriod(request.period);
    assertArchetype(request.archetype);
    assertContentHash(request.contentHash);
    return request;
}

// Accepts decimal strings and safe integers, as carried over JSON.
export function parsePeriod(raw: unknown): Period {
    if (typeof raw === 'bigint') return assertPeriod(raw);
    if (typeof raw === 'number' && Number.isSafeInteger(raw)) return assertPeriod(BigInt(raw));
    if (typeof raw === 'string' && /^[0-9]{1,20}$/.test(raw)) return assertPeriod(BigInt(raw));
    throw invalid('Period must be an unsigned 64-bit integer', { period: String(raw) });
}
