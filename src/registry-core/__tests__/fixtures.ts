import { WrapRegistry } from '../Registry.js';
import { RegistryError } from '../Errors.js';
import type { ContractId, MintRequest } from '../L0/Ontology.js';
import { createAuthorization } from '../L1/Authorization.js';
import type { AuthMode } from '../L1/Authorization.js';
import { LedgerHost, ManualLedgerClock } from '../L3/Host.js';
import type { LedgerBackend } from '../L3/Host.js';
import { MemoryLedger } from '../L3/MemoryLedger.js';
import { AdminSigner } from '../L6/AdminSigner.js';

export const ADMIN = 'GADMIN';
export const USER_A = 'GUSER_A';
export const USER_B = 'GUSER_B';
export const CONTRACT_V1 = 'CWRAP_V1';
export const CONTRACT_V2 = 'CWRAP_V2';
export const GENESIS_TIME = 1000000n;

// Placeholder key material: a 32-byte seed filled with one value.
export const seed = (fill: number) => new Uint8Array(32).fill(fill);
export const digest = (fill: number) => new Uint8Array(32).fill(fill);

export function unsignedRequest(overrides: Partial<MintRequest> = {}): Omit<MintRequest, 'signature'> {
    return {
        user: overrides.user ?? USER_A,
        period: overrides.period ?? 202501n,
        archetype: overrides.archetype ?? 'architect',
        contentHash: overrides.contentHash ?? digest(7),
    };
}

export interface Deployment {
    ledger: LedgerBackend;
    clock: ManualLedgerClock;
    host: LedgerHost;
    registry: WrapRegistry;
    signer: AdminSigner;
}

export function deploy(options: {
    mode?: AuthMode;
    contractId?: ContractId;
    ledger?: LedgerBackend;
    pressureThreshold?: number;
} = {}): Deployment {
    const ledger = options.ledger ?? new MemoryLedger();
    const clock = new ManualLedgerClock(GENESIS_TIME);
    const host = new LedgerHost(ledger, clock);
    const registry = new WrapRegistry({
        contractId: options.contractId ?? CONTRACT_V1,
        host,
        authorization: createAuthorization(options.mode ?? 'SIGNATURE'),
        pressureThreshold: options.pressureThreshold ?? 1000,
    });
    return { ledger, clock, host, registry, signer: AdminSigner.fromSecretKey(seed(1)) };
}

/**
 * Runs `fn` and returns the RegistryError it throws.
 */
export function rejectionOf(fn: () => unknown): RegistryError {
    try {
        fn();
    } catch (e) {
        if (e instanceof RegistryError) return e;
        throw e;
    }
    throw new Error('Expected a RegistryError, call succeeded');
}
