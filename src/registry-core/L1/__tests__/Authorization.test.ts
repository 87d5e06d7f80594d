import { describe, test, expect } from '@jest/globals';
import { ErrorCode, RegistryError } from '../../Errors.js';
import type { MintRequest } from '../../L0/Ontology.js';
import { LedgerHost, ManualLedgerClock } from '../../L3/Host.js';
import type { InvocationAuth, SignatureVerifier } from '../../L3/Host.js';
import { MemoryLedger } from '../../L3/MemoryLedger.js';
import { AdminSigner } from '../../L6/AdminSigner.js';
import { AdminRegistry } from '../AdminRegistry.js';
import { CapabilityAuth, SignatureAuth, createAuthorization } from '../Authorization.js';
import type { AuthorizationStrategy } from '../Authorization.js';

const CONTRACT = 'CWRAP_AUTH';
const signer = AdminSigner.fromSecretKey(new Uint8Array(32).fill(1));
const request: Omit<MintRequest, 'signature'> = {
    user: 'GUSER',
    period: 12n,
    archetype: 'architect',
    contentHash: new Uint8Array(32).fill(5),
};

function setup(publicKey?: Uint8Array, verifier?: SignatureVerifier) {
    const host = new LedgerHost(new MemoryLedger(), new ManualLedgerClock(), verifier);
    host.invoke(CONTRACT, (env) => new AdminRegistry(env.storage).rotate('GADMIN', publicKey));

    const decide = (strategy: AuthorizationStrategy, mint: MintRequest, auth: InvocationAuth = {}) =>
        host.invoke(CONTRACT, (env) => strategy.authorize({ env, admins: new AdminRegistry(env.storage), request: mint }), auth);

    return { host, decide };
}

describe('Authorization Gate', () => {
    test('Strategy factory', () => {
        expect(createAuthorization('CAPABILITY')).toBeInstanceOf(CapabilityAuth);
        expect(createAuthorization('SIGNATURE')).toBeInstanceOf(SignatureAuth);
    });

    test('Capability passes only with the admin in the invocation auth', () => {
        const { decide } = setup();
        const strategy = new CapabilityAuth();

        expect(decide(strategy, request, { authorizedBy: ['GADMIN'] })).toEqual({ ok: true });
        expect(decide(strategy, request, { authorizedBy: ['GUSER', 'GOTHER'] })).toEqual({
            ok: false,
            code: ErrorCode.UNAUTHORIZED,
            violation: 'Invocation is not authorized by the admin',
            details: { admin: 'GADMIN' },
        });
    });

    test('Signature rules in order: key, presence, length, verification', () => {
        const strategy = new SignatureAuth();

        const keyless = setup();
        expect(keyless.decide(strategy, signer.authorizeMint(CONTRACT, request))).toMatchObject({ ok: false, code: ErrorCode.NOT_INITIALIZED });

        const { decide } = setup(signer.publicKey);
        expect(decide(strategy, request)).toMatchObject({ ok: false, code: ErrorCode.UNAUTHORIZED });
        expect(decide(strategy, { ...request, signature: new Uint8Array(65) })).toMatchObject({ ok: false, code: ErrorCode.INVALID_SIGNATURE });
        expect(decide(strategy, { ...signer.authorizeMint(CONTRACT, request), period: 13n })).toEqual({
            ok: false,
            code: ErrorCode.INVALID_SIGNATURE,
            violation: 'Signature does not match the admin key for this payload',
            details: { user: 'GUSER', period: '13' },
        });
        expect(decide(strategy, signer.authorizeMint(CONTRACT, request))).toEqual({ ok: true });
    });

    test('Verification goes through the host verifier', () => {
        const calls: number[] = [];
        const permissive: SignatureVerifier = {
            verify: (message) => {
                calls.push(message.length);
                return true;
            },
        };
        const { decide } = setup(signer.publicKey, permissive);

        expect(decide(new SignatureAuth(), { ...request, signature: new Uint8Array(64) })).toEqual({ ok: true });
        // CWRAP_AUTH(4+10) GUSER(4+5) period(8) architect(4+9) hash(32)
        expect(calls).toEqual([76]);
    });
});

describe('Admin Registry', () => {
    test('Rotation stores identity and key together', () => {
        const { host } = setup(signer.publicKey);

        host.invoke(CONTRACT, (env) => {
            const admins = new AdminRegistry(env.storage);
            expect(admins.isInitialized()).toBe(true);
            expect(admins.requireAdmin()).toBe('GADMIN');
            expect(admins.getPublicKey()).toEqual(signer.publicKey);

            admins.rotate('GNEXT');
            expect(admins.getAdmin()).toBe('GNEXT');
            expect(admins.getPublicKey()).toBeUndefined();
        });
    });

    test('Missing admin and corrupted entries', () => {
        const host = new LedgerHost(new MemoryLedger(), new ManualLedgerClock());

        host.invoke(CONTRACT, (env) => {
            const admins = new AdminRegistry(env.storage);
            expect(admins.isInitialized()).toBe(false);
            expect(() => admins.requireAdmin()).toThrow(RegistryError);

            env.storage.set({ kind: 'Admin' }, '42');
            expect(() => admins.getAdmin()).toThrow('[Wrap:STORAGE_CORRUPTED] Stored admin is not an address');
            env.storage.set({ kind: 'AdminPublicKey' }, '"abcd"');
            expect(() => admins.getPublicKey()).toThrow('[Wrap:STORAGE_CORRUPTED] Stored admin public key is malformed');
        });
    });

    test('Unquoted admin and non-hex key are corruption, not parse errors', () => {
        const host = new LedgerHost(new MemoryLedger(), new ManualLedgerClock());

        host.invoke(CONTRACT, (env) => {
            const admins = new AdminRegistry(env.storage);

            env.storage.set({ kind: 'Admin' }, 'GADMIN');
            expect(() => admins.getAdmin()).toThrow('[Wrap:STORAGE_CORRUPTED] Stored Admin value is not JSON');
            expect(() => admins.requireAdmin()).toThrow(RegistryError);

            env.storage.set({ kind: 'AdminPublicKey' }, JSON.stringify('z'.repeat(64)));
            expect(() => admins.getPublicKey()).toThrow('[Wrap:STORAGE_CORRUPTED] Stored admin public key is malformed');
        });
    });
});
