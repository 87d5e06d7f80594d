/**
 * Wrap Registry Error Taxonomy
 * Every contract rejection is terminal for its invocation.
 */

export enum ErrorCode {
    // I. Lifecycle
    ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
    NOT_INITIALIZED = 'NOT_INITIALIZED',

    // II. Authorization
    UNAUTHORIZED = 'UNAUTHORIZED',
    INVALID_SIGNATURE = 'INVALID_SIGNATURE',

    // III. Registry Law
    WRAP_ALREADY_EXISTS = 'WRAP_ALREADY_EXISTS',
    TRANSFER_NOT_ALLOWED = 'TRANSFER_NOT_ALLOWED',

    // IV. Input & Storage
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    STORAGE_CORRUPTED = 'STORAGE_CORRUPTED',
}

// Numeric codes as reported by the deployed contract (Error(Contract, #n)).
export const CONTRACT_ERROR_NUMBER: Record<ErrorCode, number> = {
    [ErrorCode.ALREADY_INITIALIZED]: 1,
    [ErrorCode.NOT_INITIALIZED]: 2,
    [ErrorCode.UNAUTHORIZED]: 3,
    [ErrorCode.WRAP_ALREADY_EXISTS]: 4,
    [ErrorCode.INVALID_SIGNATURE]: 5,
    [ErrorCode.TRANSFER_NOT_ALLOWED]: 6,
    [ErrorCode.INVALID_ARGUMENT]: 7,
    [ErrorCode.STORAGE_CORRUPTED]: 8,
};

export class RegistryError extends Error {
    public readonly code: ErrorCode;
    public readonly metadata?: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, metadata?: Record<string, unknown>) {
        super(`[Wrap:${code}] ${message}`);
        this.name = 'RegistryError';
        this.code = code;
        if (metadata) this.metadata = metadata;
    }

    public get contractError(): number {
        return CONTRACT_ERROR_NUMBER[this.code];
    }
}
