/**
 * Wrap Platform: Gateway Error Taxonomy
 * Failures that happen around the contract, never inside it.
 */
import { ErrorCode } from '../registry-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when the environment carries an unusable setting.
 */
export class ConfigurationError extends PlatformError {
    constructor(message: string, variable: string) {
        super(message, 'CONFIGURATION_INVALID', { variable });
    }
}

/**
 * Thrown when a request body cannot be mapped onto a contract call.
 */
export class RequestValidationError extends PlatformError {
    constructor(message: string, field: string) {
        super(message, 'REQUEST_INVALID', { field });
    }
}

/**
 * Thrown when the environment/platform fails (e.g. storage unavailable).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: string) {
        super(message, 'INFRASTRUCTURE_FAILURE', underlying ? { underlying } : undefined);
    }
}

// Contract rejection -> HTTP status
export const HTTP_STATUS: Record<ErrorCode, number> = {
    [ErrorCode.INVALID_ARGUMENT]: 400,
    [ErrorCode.UNAUTHORIZED]: 401,
    [ErrorCode.INVALID_SIGNATURE]: 401,
    [ErrorCode.TRANSFER_NOT_ALLOWED]: 403,
    [ErrorCode.NOT_INITIALIZED]: 409,
    [ErrorCode.ALREADY_INITIALIZED]: 409,
    [ErrorCode.WRAP_ALREADY_EXISTS]: 409,
    [ErrorCode.STORAGE_CORRUPTED]: 500,
};
