import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { WrapRegistry } from '../registry-core/Registry.js';
import { RegistryError } from '../registry-core/Errors.js';
import { fromHex, toHex } from '../registry-core/L0/Crypto.js';
import type { Address, WrapRecord } from '../registry-core/L0/Ontology.js';
import { parsePeriod } from '../registry-core/L0/Primitives.js';
import { createAuthorization } from '../registry-core/L1/Authorization.js';
import { LedgerHost, SystemLedgerClock } from '../registry-core/L3/Host.js';
import type { InvocationAuth } from '../registry-core/L3/Host.js';
import { SQLiteLedgerStore } from '../infrastructure/persistence/SQLiteLedgerStore.js';
import { loadConfig } from '../Platform/Config.js';
import type { RegistryConfig } from '../Platform/Config.js';
import { HTTP_STATUS, InfrastructureError, PlatformError, RequestValidationError } from '../Platform/Errors.js';

// --- Wire Mapping ---

export interface WrapRecordJson {
    timestamp: string;
    archetype: string;
    contentHash: string;
    period: string;
}

export function toWrapJson(record: WrapRecord): WrapRecordJson {
    return {
        timestamp: record.timestamp.toString(),
        archetype: record.archetype,
        contentHash: toHex(record.contentHash),
        period: record.period.toString(),
    };
}

function field(body: unknown, name: string): unknown {
    if (typeof body !== 'object' || body === null) return undefined;
    return Object.getOwnPropertyDescriptor(body, name)?.value;
}

function requireString(body: unknown, name: string): string {
    const value = field(body, name);
    if (typeof value !== 'string') throw new RequestValidationError(`"${name}" must be a string`, name);
    return value;
}

function optionalBytes(body: unknown, name: string): Uint8Array | undefined {
    const value = field(body, name);
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') throw new RequestValidationError(`"${name}" must be a hex string`, name);
    try {
        return fromHex(value);
    } catch {
        throw new RequestValidationError(`"${name}" must be a hex string`, name);
    }
}

function requireBytes(body: unknown, name: string): Uint8Array {
    const bytes = optionalBytes(body, name);
    if (!bytes) throw new RequestValidationError(`"${name}" is required`, name);
    return bytes;
}

// body-parser tags a body it could not parse.
function isMalformedBody(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

// Sandbox host: the submitter declares which addresses signed the invocation.
function authFrom(body: unknown): InvocationAuth {
    const value = field(body, 'authorizedBy');
    if (value === undefined) return {};
    if (!Array.isArray(value) || !value.every((a): a is Address => typeof a === 'string')) {
        throw new RequestValidationError('"authorizedBy" must be an array of addresses', 'authorizedBy');
    }
    return { authorizedBy: value };
}

/**
 * HTTP gateway over a single registry instance.
 */
export class WrapServer {
    private app: express.Express;
    private server?: Server;

    constructor(private registry: WrapRegistry, private port: number = 3000) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App() { return this.app; }

    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, () => {
                const address = server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.port;
                console.log(`[WrapServer] Listening on port ${port} (contract ${this.registry.contractId}, ${this.registry.AuthMode} auth)`);
                resolve(port);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) return resolve();
            this.server.close((err) => (err ? reject(err) : resolve()));
            this.server = undefined;
        });
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            console.log(`[WrapServer] ${req.method} ${req.url}`);
            next();
        });

        // --- Status & Metadata ---
        this.app.get('/api/status', (_req, res) => {
            this.respond(res, () => ({
                contractId: this.registry.contractId,
                authMode: this.registry.AuthMode,
                initialized: this.registry.isInitialized(),
            }));
        });

        this.app.get('/api/metadata', (_req, res) => {
            this.respond(res, () => ({
                name: this.registry.name(),
                symbol: this.registry.symbol(),
                decimals: this.registry.decimals(),
            }));
        });

        this.app.get('/api/admin', (_req, res) => {
            this.respond(res, () => {
                const key = this.registry.getAdminPublicKey();
                return { admin: this.registry.getAdmin() ?? null, adminPublicKey: key ? toHex(key) : null };
            });
        });

        // --- Lifecycle ---
        this.app.post('/api/initialize', (req, res) => {
            this.respond(res, () => {
                const body: unknown = req.body;
                this.registry.initialize(requireString(body, 'admin'), optionalBytes(body, 'adminPublicKey'));
                return {};
            });
        });

        this.app.post('/api/admin', (req, res) => {
            this.respond(res, () => {
                const body: unknown = req.body;
                this.registry.updateAdmin(requireString(body, 'newAdmin'), optionalBytes(body, 'newPublicKey'), authFrom(body));
                return {};
            });
        });

        // --- Issuance ---
        this.app.post('/api/mint', (req, res) => {
            this.respond(res, () => {
                const body: unknown = req.body;
                const signature = optionalBytes(body, 'signature');
                const record = this.registry.mint({
                    user: requireString(body, 'user'),
                    period: parsePeriod(field(body, 'period')),
                    archetype: requireString(body, 'archetype'),
                    contentHash: requireBytes(body, 'contentHash'),
                    ...(signature ? { signature } : {}),
                }, authFrom(body));
                return { data: toWrapJson(record) };
            });
        });

        // --- Queries ---
        this.app.get('/api/wraps/:user/:period', (req, res) => {
            this.respond(res, () => {
                const record = this.registry.getWrap(req.params.user, parsePeriod(req.params.period));
                return { data: record ? toWrapJson(record) : null };
            });
        });

        this.app.get('/api/balance/:user', (req, res) => {
            this.respond(res, () => ({ balance: this.registry.balanceOf(req.params.user) }));
        });

        this.app.get('/api/events', (_req, res) => {
            this.respond(res, () => {
                const events = this.registry.events();
                return { count: events.length, data: events };
            });
        });

        // --- Soulbound Policy ---
        this.app.post('/api/transfer', (_req, res) => {
            this.respond(res, () => this.registry.transfer('', '', 0n));
        });
        this.app.post('/api/transfer-from', (_req, res) => {
            this.respond(res, () => this.registry.transferFrom('', '', '', 0n));
        });
        this.app.post('/api/approve', (_req, res) => {
            this.respond(res, () => this.registry.approve('', '', 0n, 0));
        });
        this.app.post('/api/burn', (_req, res) => {
            this.respond(res, () => this.registry.burn('', 0n));
        });

        // --- Errors raised before a route runs ---
        this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
            this.fail(res, isMalformedBody(err) ? new RequestValidationError('Request body is not valid JSON', 'body') : err);
        });
    }

    private respond(res: Response, work: () => object) {
        try {
            res.json({ ok: true, ...work() });
        } catch (e) {
            this.fail(res, e);
        }
    }

    private fail(res: Response, e: unknown) {
        if (e instanceof RegistryError) {
            res.status(HTTP_STATUS[e.code]).json({
                ok: false,
                error: { code: e.code, contractError: e.contractError, message: e.message },
            });
            return;
        }
        if (e instanceof RequestValidationError) {
            res.status(400).json({ ok: false, error: { code: e.code, message: e.message } });
            return;
        }

        const message = e instanceof Error ? e.message : String(e);
        console.error('[WrapServer] Request Error:', message);
        res.status(500).json({
            ok: false,
            error: { code: e instanceof PlatformError ? e.code : 'INTERNAL', message },
        });
    }
}

// --- Composition Root ---

export function createServer(config: RegistryConfig): { server: WrapServer; store: SQLiteLedgerStore } {
    let store: SQLiteLedgerStore;
    try {
        store = new SQLiteLedgerStore(config.dbPath);
    } catch (e) {
        throw new InfrastructureError(`Cannot open ledger database at ${config.dbPath}`, e instanceof Error ? e.message : String(e));
    }
    const host = new LedgerHost(store, new SystemLedgerClock());
    const registry = new WrapRegistry({
        contractId: config.contractId,
        host,
        authorization: createAuthorization(config.authMode),
    });
    return { server: new WrapServer(registry, config.port), store };
}

// Start if run directly
if (require.main === module) {
    const { server } = createServer(loadConfig());
    server.start().catch((e: unknown) => {
        console.error('[WrapServer] Boot Failed:', e instanceof Error ? e.message : String(e));
        process.exitCode = 1;
    });
}
