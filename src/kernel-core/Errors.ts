/**
 * Registry Error Taxonomy
 * Centralized error codes for rejected commands and terminal failures.
 */

export enum ErrorCode {
    // I. Authority (caller lacks a capability or a relationship to the target)
    UNAUTHORIZED = 'UNAUTHORIZED',
    FORBIDDEN = 'FORBIDDEN',

    // II. Arguments
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',

    // III. Contributor status conflicts
    ALREADY_AUTHORIZED = 'ALREADY_AUTHORIZED',
    NOT_AUTHORIZED = 'NOT_AUTHORIZED',

    // IV. Availability (absent or retired target)
    NOT_FOUND = 'NOT_FOUND',
    INACTIVE = 'INACTIVE',

    // V. Command authenticity
    SIGNATURE_INVALID = 'SIGNATURE_INVALID',
    REPLAY_DETECTED = 'REPLAY_DETECTED',

    // VI. Registry lifecycle & internal
    REGISTRY_NOT_ACTIVE = 'REGISTRY_NOT_ACTIVE',
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
    COMMIT_FAILED = 'COMMIT_FAILED',
}

export type ErrorClass = 'AUTHORITY' | 'ARGUMENT' | 'CONFLICT' | 'AVAILABILITY' | 'SECURITY' | 'SYSTEM';

const CLASSES: Record<ErrorCode, ErrorClass> = {
    [ErrorCode.UNAUTHORIZED]: 'AUTHORITY',
    [ErrorCode.FORBIDDEN]: 'AUTHORITY',
    [ErrorCode.INVALID_ARGUMENT]: 'ARGUMENT',
    [ErrorCode.ALREADY_AUTHORIZED]: 'CONFLICT',
    [ErrorCode.NOT_AUTHORIZED]: 'CONFLICT',
    [ErrorCode.NOT_FOUND]: 'AVAILABILITY',
    [ErrorCode.INACTIVE]: 'AVAILABILITY',
    [ErrorCode.SIGNATURE_INVALID]: 'SECURITY',
    [ErrorCode.REPLAY_DETECTED]: 'SECURITY',
    [ErrorCode.REGISTRY_NOT_ACTIVE]: 'SYSTEM',
    [ErrorCode.INTEGRITY_BREACH]: 'SYSTEM',
    [ErrorCode.REPLAY_FAILURE]: 'SYSTEM',
    [ErrorCode.COMMIT_FAILED]: 'SYSTEM',
};

export function errorClassOf(code: ErrorCode): ErrorClass {
    return CLASSES[code];
}

export class RegistryError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${message}`);
        this.name = 'RegistryError';
    }

    public get errorClass(): ErrorClass {
        return errorClassOf(this.code);
    }
}

export function isRegistryError(e: unknown, code?: ErrorCode): e is RegistryError {
    return e instanceof RegistryError && (code === undefined || e.code === code);
}
