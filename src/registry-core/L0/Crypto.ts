// src/registry-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';

// Sync Ed25519 needs a sync SHA-512; contract calls never suspend.
ed.utils.sha512Sync = (...messages: Uint8Array[]) =>
    new Uint8Array(createHash('sha512').update(ed.utils.concatBytes(...messages)).digest());

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

// Stable JSON for hashing (sorted keys, bigint as decimal string)
export function canonicalize(value: unknown): string {
    if (typeof value === 'bigint') return JSON.stringify(value.toString());
    if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
    if (Array.isArray(value)) return `[${value.map(canonicalize).join(',')}]`;
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.2 Hex
export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

export function isHex(value: string, bytes: number): boolean {
    return value.length === bytes * 2 && /^[0-9a-f]*$/.test(value);
}

export function fromHex(hex: string): Uint8Array {
    if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
        throw new Error(`Crypto Error: not a hex string`);
    }
    return new Uint8Array(Buffer.from(hex, 'hex'));
}

// 1.3 Digital Signatures (Ed25519, raw 32-byte keys)
export interface KeyPair {
    publicKey: Uint8Array;
    secretKey: Uint8Array;
}

export function generateKeyPair(): KeyPair {
    return keyPairFromSecret(ed.utils.randomPrivateKey());
}

export function keyPairFromSecret(secretKey: Uint8Array): KeyPair {
    if (secretKey.length !== 32) throw new Error('Crypto Error: Ed25519 secret key must be 32 bytes');
    return { publicKey: ed.sync.getPublicKey(secretKey), secretKey };
}

export function signBytes(message: Uint8Array, secretKey: Uint8Array): Uint8Array {
    return ed.sync.sign(message, secretKey);
}

export function verifySignature(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    try {
        return ed.sync.verify(signature, message, publicKey);
    } catch {
        // malformed key or signature encoding
        return false;
    }
}
