import { AUTH_MODES } from '../registry-core/L1/Authorization.js';
import type { AuthMode } from '../registry-core/L1/Authorization.js';
import { assertIdentity } from '../registry-core/L0/Primitives.js';
import { ConfigurationError } from './Errors.js';

export interface RegistryConfig {
    port: number;
    dbPath: string;
    contractId: string;
    authMode: AuthMode;
}

export const DEFAULT_CONFIG: RegistryConfig = {
    port: 3000,
    dbPath: 'wrap-registry.db',
    contractId: 'wrap-registry',
    authMode: 'SIGNATURE',
};

/**
 * Deployment settings from the environment; unset variables take the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
    return {
        port: parsePort(env.WRAP_PORT),
        dbPath: nonEmpty(env.WRAP_DB_PATH, 'WRAP_DB_PATH') ?? DEFAULT_CONFIG.dbPath,
        contractId: parseContractId(env.WRAP_CONTRACT_ID),
        authMode: parseAuthMode(env.WRAP_AUTH_MODE),
    };
}

function nonEmpty(raw: string | undefined, variable: string): string | undefined {
    if (raw === undefined) return undefined;
    if (raw.trim().length === 0) throw new ConfigurationError(`${variable} must not be empty`, variable);
    return raw.trim();
}

function parsePort(raw: string | undefined): number {
    const value = nonEmpty(raw, 'WRAP_PORT');
    if (value === undefined) return DEFAULT_CONFIG.port;

    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigurationError(`WRAP_PORT must be an integer between 1 and 65535, got "${value}"`, 'WRAP_PORT');
    }
    return port;
}

function parseContractId(raw: string | undefined): string {
    const value = nonEmpty(raw, 'WRAP_CONTRACT_ID');
    if (value === undefined) return DEFAULT_CONFIG.contractId;
    try {
        return assertIdentity(value, 'contractId');
    } catch (e) {
        throw new ConfigurationError(`WRAP_CONTRACT_ID is not a usable contract id: ${e instanceof Error ? e.message : String(e)}`, 'WRAP_CONTRACT_ID');
    }
}

function parseAuthMode(raw: string | undefined): AuthMode {
    const value = nonEmpty(raw, 'WRAP_AUTH_MODE');
    if (value === undefined) return DEFAULT_CONFIG.authMode;

    const mode = AUTH_MODES.find(m => m === value.toUpperCase());
    if (!mode) {
        throw new ConfigurationError(`WRAP_AUTH_MODE must be one of ${AUTH_MODES.join(', ')}, got "${value}"`, 'WRAP_AUTH_MODE');
    }
    return mode;
}
