// src/registry-core/L5/Events.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { ContractEvent, ContractId, EventTopic } from '../L0/Ontology.js';

// --- Committed Contract Event (the ledger's event log entry) ---
export interface LedgerEvent {
    sequence: number;
    eventId: string; // The identifying hash
    previousEventId: string; // Chain linkage
    contractId: ContractId;
    ledgerTimestamp: string; // u64 seconds, decimal
    topics: string[];
    data: string;
}

export const GENESIS_EVENT_ID = '0000000000000000000000000000000000000000000000000000000000000000';

export function encodeTopic(topic: EventTopic): string {
    return typeof topic === 'bigint' ? topic.toString() : topic;
}

/**
 * Links a staged event onto the chain tip. Called inside the committing
 * transaction, so rolled-back invocations never produce a sequence number.
 */
export function sealEvent(previous: LedgerEvent | undefined, event: ContractEvent, ledgerTimestamp: bigint): LedgerEvent {
    const previousEventId = previous ? previous.eventId : GENESIS_EVENT_ID;
    const sequence = previous ? previous.sequence + 1 : 1;
    const topics = event.topics.map(encodeTopic);
    const timestamp = ledgerTimestamp.toString();

    return Object.freeze({
        sequence,
        eventId: calculateEventId(previousEventId, event.contractId, timestamp, topics, event.data),
        previousEventId,
        contractId: event.contractId,
        ledgerTimestamp: timestamp,
        topics,
        data: event.data,
    });
}

// Historical legitimacy: linkage and hashes must both hold.
export function verifyEventChain(events: readonly LedgerEvent[]): boolean {
    let prev = GENESIS_EVENT_ID;
    let sequence = 0;

    for (const entry of events) {
        if (entry.previousEventId !== prev) return false;
        if (entry.sequence !== sequence + 1) return false;

        const id = calculateEventId(prev, entry.contractId, entry.ledgerTimestamp, entry.topics, entry.data);
        if (id !== entry.eventId) return false;

        prev = entry.eventId;
        sequence = entry.sequence;
    }
    return true;
}

function calculateEventId(
    previousEventId: string,
    contractId: ContractId,
    ledgerTimestamp: string,
    topics: readonly string[],
    data: string
): string {
    // [PreviousId, ContractId, Timestamp, Topics, DataHash]
    return hash(canonicalize([previousEventId, contractId, ledgerTimestamp, topics, hash(data)]));
}
