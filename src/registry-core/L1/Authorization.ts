// src/registry-core/L1/Authorization.ts
import { ErrorCode } from '../Errors.js';
import { canonicalizeMintPayload } from '../L0/Canonical.js';
import { FAIL, OK } from '../L0/Guards.js';
import type { Guard, GuardResult } from '../L0/Guards.js';
import type { Address, MintRequest } from '../L0/Ontology.js';
import { SIGNATURE_BYTES } from '../L0/Primitives.js';
import type { Invocation } from '../L3/Host.js';
import type { AdminRegistry } from './AdminRegistry.js';

export type AuthMode = 'CAPABILITY' | 'SIGNATURE';

export const AUTH_MODES: readonly AuthMode[] = ['CAPABILITY', 'SIGNATURE'];

export interface MintAuthorizationContext {
    env: Invocation;
    admins: AdminRegistry;
    request: MintRequest;
}

/**
 * Authorization Gate
 * One strategy per deployment; the orchestrator never branches on the mode.
 */
export interface AuthorizationStrategy {
    readonly mode: AuthMode;
    authorize(ctx: MintAuthorizationContext): GuardResult;
}

// Capability: the invocation carries the admin's native authorization.
export const CapabilityGuard: Guard<{ env: Invocation; admin: Address }> = ({ env, admin }) => {
    if (!env.isAuthorizedBy(admin)) {
        return FAIL(ErrorCode.UNAUTHORIZED, 'Invocation is not authorized by the admin', { admin });
    }
    return OK;
};

export class CapabilityAuth implements AuthorizationStrategy {
    public readonly mode = 'CAPABILITY';

    public authorize({ env, admins }: MintAuthorizationContext): GuardResult {
        return CapabilityGuard({ env, admin: admins.requireAdmin() });
    }
}

/**
 * Detached signature over the canonical mint payload, checked against the
 * registered admin key.
 *
 * The signature has no expiry and no nonce. It stays valid for its exact
 * tuple; a second use is stopped by the (user, period) uniqueness rule and
 * use on another instance by the contract id inside the payload.
 */
export class SignatureAuth implements AuthorizationStrategy {
    public readonly mode = 'SIGNATURE';

    public authorize({ env, admins, request }: MintAuthorizationContext): GuardResult {
        const publicKey = admins.getPublicKey();
        if (!publicKey) return FAIL(ErrorCode.NOT_INITIALIZED, 'No admin public key registered');

        if (!request.signature) return FAIL(ErrorCode.UNAUTHORIZED, 'Mint carries no admin signature');
        if (request.signature.length !== SIGNATURE_BYTES) {
            return FAIL(ErrorCode.INVALID_SIGNATURE, `Signature must be ${SIGNATURE_BYTES} bytes`);
        }

        const payload = canonicalizeMintPayload(env.contractId, request.user, request.period, request.archetype, request.contentHash);
        if (!env.verifier.verify(payload, request.signature, publicKey)) {
            return FAIL(ErrorCode.INVALID_SIGNATURE, 'Signature does not match the admin key for this payload', {
                user: request.user,
                period: request.period.toString(),
            });
        }
        return OK;
    }
}

export function createAuthorization(mode: AuthMode): AuthorizationStrategy {
    return mode === 'CAPABILITY' ? new CapabilityAuth() : new SignatureAuth();
}
