import { ErrorCode, RegistryError } from './Errors.js';
import { toHex } from './L0/Crypto.js';
import { enforce, GenesisGuard, UniquenessGuard } from './L0/Guards.js';
import { MINT_TOPIC, TOKEN_METADATA } from './L0/Ontology.js';
import type { Address, ContractId, MintRequest, Period, PublicKey, RegistryLifecycle, WrapRecord } from './L0/Ontology.js';
import { assertIdentity, assertMintRequest, assertPeriod, assertPublicKey } from './L0/Primitives.js';
import { AdminRegistry } from './L1/AdminRegistry.js';
import { CapabilityGuard, SignatureAuth } from './L1/Authorization.js';
import type { AuthorizationStrategy } from './L1/Authorization.js';
import { RecordStore } from './L2/RecordStore.js';
import type { Invocation, InvocationAuth, LedgerHost } from './L3/Host.js';
import type { LedgerEvent } from './L5/Events.js';

export interface RegistryOptions {
    contractId: ContractId;
    host: LedgerHost;
    authorization?: AuthorizationStrategy;
    pressureThreshold?: number;
}

/**
 * Wrap Registry (Mint Orchestrator)
 *
 * UNINITIALIZED -> READY, once. Every mutating call is one host invocation:
 * a rejection at any step rolls back all staged writes and events.
 */
export class WrapRegistry {
    public readonly contractId: ContractId;
    private host: LedgerHost;
    private authorization: AuthorizationStrategy;

    // Pressure Tracker: ErrorCode -> Count
    private rejectionTracker: Map<ErrorCode, number> = new Map();
    private readonly pressureThreshold: number;

    constructor(options: RegistryOptions) {
        this.contractId = assertIdentity(options.contractId, 'contractId');
        this.host = options.host;
        this.authorization = options.authorization ?? new SignatureAuth();
        this.pressureThreshold = options.pressureThreshold ?? 5;
    }

    public get AuthMode() { return this.authorization.mode; }

    // --- Lifecycle ---

    public initialize(admin: Address, adminPublicKey?: PublicKey): void {
        this.run(({ storage }) => {
            const admins = new AdminRegistry(storage);
            enforce(GenesisGuard({ admin: admins.getAdmin() }));

            admins.rotate(assertIdentity(admin, 'admin'), adminPublicKey ? assertPublicKey(adminPublicKey) : undefined);
        });
        console.log(`[WrapRegistry] ${this.contractId} initialized. Admin: ${admin}${adminPublicKey ? ` (key ${toHex(adminPublicKey)})` : ''}`);
    }

    public updateAdmin(newAdmin: Address, newPublicKey: PublicKey | undefined, auth: InvocationAuth): void {
        this.run((env) => {
            const admins = new AdminRegistry(env.storage);
            const current = admins.requireAdmin();
            enforce(CapabilityGuard({ env, admin: current }));

            admins.rotate(assertIdentity(newAdmin, 'newAdmin'), newPublicKey ? assertPublicKey(newPublicKey) : undefined);
        }, auth);
        console.log(`[WrapRegistry] ${this.contractId} admin rotated to ${newAdmin}${newPublicKey ? '' : ' (no signing key)'}`);
    }

    public get Lifecycle(): RegistryLifecycle {
        return this.isInitialized() ? 'READY' : 'UNINITIALIZED';
    }

    // --- Issuance ---

    public mint(request: MintRequest, auth: InvocationAuth = {}): WrapRecord {
        const record = this.run((env) => {
            assertMintRequest(request);

            // 1. Lifecycle
            const admins = new AdminRegistry(env.storage);
            admins.requireAdmin();

            // 2. Authorization Gate
            enforce(this.authorization.authorize({ env, admins, request }));

            // 3. Uniqueness
            const key = { user: request.user, period: request.period };
            const records = new RecordStore(env.storage);
            enforce(UniquenessGuard({ key, exists: records.exists(key) }));

            // 4. Ledger time, never caller time
            const wrap: WrapRecord = {
                timestamp: env.timestamp,
                archetype: request.archetype,
                contentHash: new Uint8Array(request.contentHash),
                period: request.period,
            };

            // 5. Atomic commit
            records.put(key, wrap);
            records.incrementCounter(request.user);

            env.publish([MINT_TOPIC, request.user, request.period], request.archetype);
            return wrap;
        }, auth);

        console.log(`[WrapRegistry] Minted ${request.archetype} for ${request.user} in period ${request.period}`);
        return record;
    }

    // --- Queries (any state) ---

    public getWrap(user: Address, period: Period): WrapRecord | undefined {
        return this.run(({ storage }) => new RecordStore(storage).get({ user, period: assertPeriod(period) }));
    }

    public balanceOf(user: Address): number {
        return this.run(({ storage }) => new RecordStore(storage).count(user));
    }

    public getCount(user: Address): number {
        return this.balanceOf(user);
    }

    public getAdmin(): Address | undefined {
        return this.run(({ storage }) => new AdminRegistry(storage).getAdmin());
    }

    public getAdminPublicKey(): PublicKey | undefined {
        return this.run(({ storage }) => new AdminRegistry(storage).getPublicKey());
    }

    public isInitialized(): boolean {
        return this.run(({ storage }) => new AdminRegistry(storage).isInitialized());
    }

    public events(): LedgerEvent[] {
        return this.host.events(this.contractId);
    }

    // --- Token Interface (soulbound policy) ---

    public name(): string { return TOKEN_METADATA.name; }
    public symbol(): string { return TOKEN_METADATA.symbol; }
    public decimals(): number { return TOKEN_METADATA.decimals; }

    public transfer(_from: Address, _to: Address, _amount: bigint): never {
        return this.refuse('transfer');
    }

    public transferFrom(_spender: Address, _from: Address, _to: Address, _amount: bigint): never {
        return this.refuse('transfer_from');
    }

    public approve(_from: Address, _spender: Address, _amount: bigint, _expirationLedger: number): never {
        return this.refuse('approve');
    }

    public burn(_from: Address, _amount: bigint): never {
        return this.refuse('burn');
    }

    public get RejectionPressure(): ReadonlyMap<ErrorCode, number> {
        return this.rejectionTracker;
    }

    // --- Internals ---

    // Soulbound: records never move and are never destroyed.
    private refuse(operation: string): never {
        const error = new RegistryError(ErrorCode.TRANSFER_NOT_ALLOWED, `${operation} is not allowed: wraps are soulbound`, { operation });
        this.recordRejection(error);
        throw error;
    }

    private run<T>(work: (env: Invocation) => T, auth?: InvocationAuth): T {
        try {
            return this.host.invoke(this.contractId, work, auth);
        } catch (e) {
            if (e instanceof RegistryError) this.recordRejection(e);
            throw e;
        }
    }

    private recordRejection(error: RegistryError) {
        const pressure = (this.rejectionTracker.get(error.code) ?? 0) + 1;
        this.rejectionTracker.set(error.code, pressure);

        if (pressure > this.pressureThreshold) {
            console.warn(`[WrapRegistry] Pressure Alert: ${error.code} rejected ${pressure} times on ${this.contractId}`);
        }
    }
}
