// src/registry-core/L0/Guards.ts
import { ErrorCode, RegistryError } from '../Errors.js';
import type { Address, RegistryKey } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

export const OK: GuardResult = { ok: true };
export const FAIL = (code: ErrorCode, violation: string, details?: Record<string, unknown>): GuardResult =>
    details ? { ok: false, code, violation, details } : { ok: false, code, violation };

/**
 * Turns a failed guard into the invocation's terminal error.
 */
export function enforce(result: GuardResult): void {
    if (!result.ok) {
        throw new RegistryError(result.code, result.violation, result.details);
    }
}

// --- Concrete Guards ---

// 1. Lifecycle: initialization happens once.
export const GenesisGuard: Guard<{ admin: Address | undefined }> = ({ admin }) => {
    if (admin !== undefined) return FAIL(ErrorCode.ALREADY_INITIALIZED, 'Registry already has an admin');
    return OK;
};

// 2. Uniqueness: one record per (user, period), forever.
export const UniquenessGuard: Guard<{ key: RegistryKey; exists: boolean }> = ({ key, exists }) => {
    if (exists) {
        return FAIL(ErrorCode.WRAP_ALREADY_EXISTS, `Wrap already issued for ${key.user} in period ${key.period}`, {
            user: key.user,
            period: key.period.toString(),
        });
    }
    return OK;
};
