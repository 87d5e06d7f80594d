// src/registry-core/L6/AdminSigner.ts
import { canonicalizeMintPayload } from '../L0/Canonical.js';
import { keyPairFromSecret, signBytes, toHex } from '../L0/Crypto.js';
import type { KeyPair } from '../L0/Crypto.js';
import type { ContractId, MintRequest, PublicKey, Signature } from '../L0/Ontology.js';

/**
 * Off-ledger admin tooling: pre-authorizes a mint that the user submits
 * (and pays for) later. Holds the secret key; never runs on the ledger.
 */
export class AdminSigner {
    private constructor(private keys: KeyPair) { }

    public static fromSecretKey(secretKey: Uint8Array): AdminSigner {
        return new AdminSigner(keyPairFromSecret(secretKey));
    }

    public get publicKey(): PublicKey { return this.keys.publicKey; }
    public get publicKeyHex(): string { return toHex(this.keys.publicKey); }

    public signMint(contractId: ContractId, request: Omit<MintRequest, 'signature'>): Signature {
        const payload = canonicalizeMintPayload(contractId, request.user, request.period, request.archetype, request.contentHash);
        return signBytes(payload, this.keys.secretKey);
    }

    // Convenience: the request with its signature attached.
    public authorizeMint(contractId: ContractId, request: Omit<MintRequest, 'signature'>): MintRequest {
        return { ...request, signature: this.signMint(contractId, request) };
    }
}
