import { jest, describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import http from 'http';
import { WrapServer, createServer } from '../Server.js';
import { InfrastructureError } from '../../Platform/Errors.js';
import { toHex } from '../../registry-core/L0/Crypto.js';
import type { Deployment } from '../../registry-core/__tests__/fixtures.js';
import { ADMIN, USER_A, CONTRACT_V1, deploy, digest, unsignedRequest } from '../../registry-core/__tests__/fixtures.js';

interface Reply {
    status: number;
    body: unknown;
}

// Helpers for HTTP requests
function call(port: number, method: string, path: string, body?: unknown): Promise<Reply> {
    return send(port, method, path, body === undefined ? undefined : JSON.stringify(body));
}

function send(port: number, method: string, path: string, payload?: string): Promise<Reply> {
    return new Promise((resolve, reject) => {
        const headers = payload === undefined ? {} : {
            'Content-Type': 'application/json',
            'Content-Length': Buffer.byteLength(payload),
        };

        const req = http.request({ host: '127.0.0.1', port, method, path, headers, agent: false }, (res) => {
            let data = '';
            res.on('data', (chunk) => data += chunk);
            res.on('end', () => {
                try {
                    resolve({ status: res.statusCode ?? 0, body: JSON.parse(data) });
                } catch (e) {
                    reject(e);
                }
            });
        });
        req.on('error', reject);
        if (payload !== undefined) req.write(payload);
        req.end();
    });
}

describe('M8: HTTP Gateway', () => {
    let quiet: { mockRestore(): void } | undefined;
    let d: Deployment;
    let server: WrapServer;
    let port: number;

    const signedMintBody = () => {
        const request = unsignedRequest();
        return {
            user: request.user,
            period: request.period.toString(),
            archetype: request.archetype,
            contentHash: toHex(request.contentHash),
            signature: toHex(d.signer.signMint(CONTRACT_V1, request)),
        };
    };

    beforeAll(async () => {
        quiet = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        d = deploy();
        server = new WrapServer(d.registry, 0);
        port = await server.start();
    });

    afterAll(async () => {
        await server.stop();
        quiet?.mockRestore();
    });

    test('M8.1 Status and metadata', async () => {
        expect(await call(port, 'GET', '/api/status')).toEqual({
            status: 200,
            body: { ok: true, contractId: CONTRACT_V1, authMode: 'SIGNATURE', initialized: false },
        });
        expect(await call(port, 'GET', '/api/metadata')).toEqual({
            status: 200,
            body: { ok: true, name: 'Stellar Wrap Registry', symbol: 'WRAP', decimals: 0 },
        });
        expect((await call(port, 'GET', '/api/admin')).body).toEqual({ ok: true, admin: null, adminPublicKey: null });
    });

    test('M8.2 Initialize with a hex admin key', async () => {
        const reply = await call(port, 'POST', '/api/initialize', { admin: ADMIN, adminPublicKey: d.signer.publicKeyHex });
        expect(reply).toEqual({ status: 200, body: { ok: true } });

        expect((await call(port, 'GET', '/api/admin')).body).toEqual({
            ok: true,
            admin: ADMIN,
            adminPublicKey: d.signer.publicKeyHex,
        });

        const again = await call(port, 'POST', '/api/initialize', { admin: ADMIN });
        expect(again.status).toBe(409);
        expect(again.body).toMatchObject({ ok: false, error: { code: 'ALREADY_INITIALIZED', contractError: 1 } });
    });

    test('M8.3 Signed mint, then replay conflict', async () => {
        const minted = await call(port, 'POST', '/api/mint', signedMintBody());
        expect(minted).toEqual({
            status: 200,
            body: {
                ok: true,
                data: { timestamp: '1000000', archetype: 'architect', contentHash: toHex(digest(7)), period: '202501' },
            },
        });

        const replay = await call(port, 'POST', '/api/mint', signedMintBody());
        expect(replay).toEqual({
            status: 409,
            body: {
                ok: false,
                error: {
                    code: 'WRAP_ALREADY_EXISTS',
                    contractError: 4,
                    message: '[Wrap:WRAP_ALREADY_EXISTS] Wrap already issued for GUSER_A in period 202501',
                },
            },
        });
    });

    test('M8.4 Queries', async () => {
        expect((await call(port, 'GET', `/api/wraps/${USER_A}/202501`)).body).toEqual({
            ok: true,
            data: { timestamp: '1000000', archetype: 'architect', contentHash: toHex(digest(7)), period: '202501' },
        });
        expect((await call(port, 'GET', `/api/wraps/${USER_A}/999999`)).body).toEqual({ ok: true, data: null });
        expect((await call(port, 'GET', `/api/balance/${USER_A}`)).body).toEqual({ ok: true, balance: 1 });

        const badPeriod = await call(port, 'GET', `/api/wraps/${USER_A}/abc`);
        expect(badPeriod.status).toBe(400);
        expect(badPeriod.body).toMatchObject({ ok: false, error: { code: 'INVALID_ARGUMENT', contractError: 7 } });

        const events = await call(port, 'GET', '/api/events');
        expect(events.body).toMatchObject({
            ok: true,
            count: 1,
            data: [{ sequence: 1, contractId: CONTRACT_V1, topics: ['mint', USER_A, '202501'], data: 'architect' }],
        });
    });

    test('M8.5 Malformed requests are rejected before the contract', async () => {
        const { contentHash: _omitted, ...withoutHash } = signedMintBody();
        expect(await call(port, 'POST', '/api/mint', withoutHash)).toEqual({
            status: 400,
            body: { ok: false, error: { code: 'REQUEST_INVALID', message: '"contentHash" is required' } },
        });

        expect(await call(port, 'POST', '/api/mint', { ...signedMintBody(), signature: 'zz' })).toEqual({
            status: 400,
            body: { ok: false, error: { code: 'REQUEST_INVALID', message: '"signature" must be a hex string' } },
        });

        const unsigned = await call(port, 'POST', '/api/mint', { ...signedMintBody(), signature: undefined, period: '7' });
        expect(unsigned.status).toBe(401);
        expect(unsigned.body).toMatchObject({ ok: false, error: { code: 'UNAUTHORIZED', contractError: 3 } });
    });

    test('M8.9 Unparseable JSON body gets a JSON rejection', async () => {
        const reply = await send(port, 'POST', '/api/initialize', '{"admin": ');
        expect(reply).toEqual({
            status: 400,
            body: { ok: false, error: { code: 'REQUEST_INVALID', message: 'Request body is not valid JSON' } },
        });
        expect(d.registry.getAdmin()).toBe(ADMIN);
    });

    test('M8.6 Soulbound and admin policy over HTTP', async () => {
        const transfer = await call(port, 'POST', '/api/transfer', {});
        expect(transfer.status).toBe(403);
        expect(transfer.body).toMatchObject({ ok: false, error: { code: 'TRANSFER_NOT_ALLOWED', contractError: 6 } });

        const burn = await call(port, 'POST', '/api/burn', {});
        expect(burn.status).toBe(403);

        const rotate = await call(port, 'POST', '/api/admin', { newAdmin: 'GNEXT' });
        expect(rotate.status).toBe(401);
        expect(rotate.body).toMatchObject({ ok: false, error: { code: 'UNAUTHORIZED' } });

        const allowed = await call(port, 'POST', '/api/admin', {
            newAdmin: 'GNEXT',
            newPublicKey: d.signer.publicKeyHex,
            authorizedBy: [ADMIN],
        });
        expect(allowed).toEqual({ status: 200, body: { ok: true } });
        expect(d.registry.getAdmin()).toBe('GNEXT');
    });
});

describe('M8: Composition Root', () => {
    test('M8.7 Builds a server over SQLite from configuration', async () => {
        const quiet = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const { server, store } = createServer({ port: 0, dbPath: ':memory:', contractId: 'CWRAP_BOOT', authMode: 'CAPABILITY' });

        try {
            const port = await server.start();
            expect((await call(port, 'GET', '/api/status')).body).toEqual({
                ok: true,
                contractId: 'CWRAP_BOOT',
                authMode: 'CAPABILITY',
                initialized: false,
            });
        } finally {
            await server.stop();
            store.close();
            quiet.mockRestore();
        }
    });

    test('M8.8 Unopenable database is an infrastructure failure', () => {
        expect(() => createServer({
            port: 0,
            dbPath: '/nonexistent-wrap-dir/ledger.db',
            contractId: 'CWRAP_BOOT',
            authMode: 'SIGNATURE',
        })).toThrow(InfrastructureError);
    });
});
