// src/registry-core/L1/AdminRegistry.ts
import { ErrorCode, RegistryError } from '../Errors.js';
import { fromHex, isHex, toHex } from '../L0/Crypto.js';
import type { Address, PublicKey } from '../L0/Ontology.js';
import { PUBLIC_KEY_BYTES } from '../L0/Primitives.js';
import type { ContractStorage } from '../L3/Host.js';

const ADMIN = { kind: 'Admin' } as const;
const ADMIN_PUBLIC_KEY = { kind: 'AdminPublicKey' } as const;

/**
 * Holds the admin identity and the optional key bound to it.
 * Writes happen only from Registry.initialize / Registry.updateAdmin.
 */
export class AdminRegistry {
    constructor(private storage: ContractStorage) { }

    public getAdmin(): Address | undefined {
        const value = this.storage.read(ADMIN);
        return value === undefined ? undefined : decodeAddress(value);
    }

    public requireAdmin(): Address {
        const admin = this.getAdmin();
        if (admin === undefined) throw new RegistryError(ErrorCode.NOT_INITIALIZED, 'Registry has no admin');
        return admin;
    }

    public getPublicKey(): PublicKey | undefined {
        const value = this.storage.read(ADMIN_PUBLIC_KEY);
        return value === undefined ? undefined : decodePublicKey(value);
    }

    public isInitialized(): boolean {
        return this.storage.has(ADMIN);
    }

    // Identity and key move together; an omitted key clears the old binding.
    public rotate(admin: Address, publicKey?: PublicKey) {
        this.storage.set(ADMIN, JSON.stringify(admin));
        if (publicKey) {
            this.storage.set(ADMIN_PUBLIC_KEY, JSON.stringify(toHex(publicKey)));
        } else {
            this.storage.remove(ADMIN_PUBLIC_KEY);
        }
    }
}

function decodeAddress(value: unknown): Address {
    if (typeof value !== 'string' || value.length === 0) {
        throw new RegistryError(ErrorCode.STORAGE_CORRUPTED, 'Stored admin is not an address');
    }
    return value;
}

function decodePublicKey(value: unknown): PublicKey {
    if (typeof value !== 'string' || !isHex(value, PUBLIC_KEY_BYTES)) {
        throw new RegistryError(ErrorCode.STORAGE_CORRUPTED, 'Stored admin public key is malformed');
    }
    return fromHex(value);
}
