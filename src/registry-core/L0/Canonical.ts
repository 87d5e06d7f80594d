// src/registry-core/L0/Canonical.ts
import type { Address, ArchetypeTag, ContentHash, ContractId, Period } from './Ontology.js';
import { assertArchetype, assertContentHash, assertIdentity, assertPeriod } from './Primitives.js';

/**
 * Mint Authorization Payload
 *
 * Layout, in this fixed order (the off-ledger signer must reproduce it byte for byte):
 *
 *   contractId   u32be length || utf8
 *   user         u32be length || utf8
 *   period       u64be
 *   archetype    u32be length || ascii
 *   contentHash  32 raw bytes
 *
 * Every field is length-prefixed or fixed-width, so the encoding is injective.
 * The contract identity binds a signature to a single deployed instance.
 */
export function canonicalizeMintPayload(
    contractId: ContractId,
    user: Address,
    period: Period,
    archetype: ArchetypeTag,
    contentHash: ContentHash
): Uint8Array {
    const contract = Buffer.from(assertIdentity(contractId, 'contractId'), 'utf8');
    const account = Buffer.from(assertIdentity(user, 'user'), 'utf8');
    const tag = Buffer.from(assertArchetype(archetype), 'ascii');
    const digest = assertContentHash(contentHash);

    const periodField = Buffer.alloc(8);
    periodField.writeBigUInt64BE(assertPeriod(period));

    return new Uint8Array(Buffer.concat([
        lengthPrefixed(contract),
        lengthPrefixed(account),
        periodField,
        lengthPrefixed(tag),
        digest,
    ]));
}

function lengthPrefixed(field: Buffer): Buffer {
    const prefix = Buffer.alloc(4);
    prefix.writeUInt32BE(field.length);
    return Buffer.concat([prefix, field]);
}
