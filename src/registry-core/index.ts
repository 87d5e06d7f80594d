export { WrapRegistry } from './Registry.js';
export type { RegistryOptions } from './Registry.js';
export { ErrorCode, RegistryError, CONTRACT_ERROR_NUMBER } from './Errors.js';
export * from './L0/Ontology.js';
export { canonicalizeMintPayload } from './L0/Canonical.js';
export { parsePeriod } from './L0/Primitives.js';
export { generateKeyPair, keyPairFromSecret, signBytes, verifySignature, toHex, fromHex } from './L0/Crypto.js';
export type { KeyPair } from './L0/Crypto.js';
export { CapabilityAuth, SignatureAuth, createAuthorization, AUTH_MODES } from './L1/Authorization.js';
export type { AuthMode, AuthorizationStrategy } from './L1/Authorization.js';
export { LedgerHost, ManualLedgerClock, SystemLedgerClock, Ed25519Verifier } from './L3/Host.js';
export type { LedgerBackend, LedgerClock, SignatureVerifier, InvocationAuth } from './L3/Host.js';
export { MemoryLedger } from './L3/MemoryLedger.js';
export { verifyEventChain, GENESIS_EVENT_ID } from './L5/Events.js';
export type { LedgerEvent } from './L5/Events.js';
export { AdminSigner } from './L6/AdminSigner.js';
