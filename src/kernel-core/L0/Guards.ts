// src/kernel-core/L0/Guards.ts
import type { Contributor, Identity, SpeciesRecord } from './Ontology.js';
import { ZERO_IDENTITY, isIdentity } from './Ontology.js';
import { ErrorCode, RegistryError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => (
    details ? { ok: false, code, violation: msg, details } : { ok: false, code, violation: msg }
);

/**
 * Turns the first failing guard into a thrown RegistryError.
 */
export function enforce(...results: GuardResult[]): void {
    for (const result of results) {
        if (!result.ok) {
            throw new RegistryError(result.code, result.violation, result.details);
        }
    }
}

// --- Concrete Guards ---

// 1. Authority
export const OwnerGuard: Guard<{ caller: Identity, owner: Identity }> = ({ caller, owner }) => {
    if (caller !== owner) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Authority Violation: ${caller} is not the registry owner`, { caller });
    }
    return OK;
};

export const ContributorGuard: Guard<{ caller: Identity, contributor: Contributor | undefined }> = ({ caller, contributor }) => {
    if (!contributor?.authorized) {
        return FAIL(ErrorCode.UNAUTHORIZED, `Authority Violation: ${caller} is not an authorized contributor`, { caller });
    }
    return OK;
};

export const CreatorGuard: Guard<{ caller: Identity, record: SpeciesRecord }> = ({ caller, record }) => {
    if (caller !== record.creator) {
        return FAIL(ErrorCode.FORBIDDEN, `Ownership Violation: only the creator may amend record ${record.id}`, { caller, id: record.id });
    }
    return OK;
};

export const CreatorOrOwnerGuard: Guard<{ caller: Identity, record: SpeciesRecord, owner: Identity }> = ({ caller, record, owner }) => {
    if (caller !== record.creator && caller !== owner) {
        return FAIL(ErrorCode.FORBIDDEN, `Ownership Violation: only the creator or the owner may retire record ${record.id}`, { caller, id: record.id });
    }
    return OK;
};

// 2. Arguments
export const IdentityGuard: Guard<{ identity: string, field: string }> = ({ identity, field }) => {
    if (!isIdentity(identity)) {
        return FAIL(ErrorCode.INVALID_ARGUMENT, `${field} must be 64 lowercase hex characters`, { field });
    }
    if (identity === ZERO_IDENTITY) {
        return FAIL(ErrorCode.INVALID_ARGUMENT, `${field} must not be the zero identity`, { field });
    }
    return OK;
};

export const RequiredTextGuard: Guard<Record<string, string>> = (fields) => {
    const empty = Object.entries(fields)
        .filter(([, value]) => value.trim().length === 0)
        .map(([field]) => field);
    if (empty.length > 0) {
        return FAIL(ErrorCode.INVALID_ARGUMENT, `Required fields are empty: ${empty.join(', ')}`, { fields: empty });
    }
    return OK;
};

// 3. Contributor status
export const GrantableGuard: Guard<{ contributor: Contributor | undefined }> = ({ contributor }) => {
    if (contributor?.authorized) {
        return FAIL(ErrorCode.ALREADY_AUTHORIZED, `Contributor ${contributor.identity} is already authorized`);
    }
    return OK;
};

export const RevocableGuard: Guard<{ identity: Identity, contributor: Contributor | undefined }> = ({ identity, contributor }) => {
    if (!contributor?.authorized) {
        return FAIL(ErrorCode.NOT_AUTHORIZED, `Contributor ${identity} is not authorized`);
    }
    return OK;
};

// 4. Replay Guard
export const ReplayGuard: Guard<{ commandId: string, seen: ReadonlySet<string> }> = ({ commandId, seen }) => {
    if (seen.has(commandId)) {
        return FAIL(ErrorCode.REPLAY_DETECTED, `Replay Violation: command ${commandId} already committed`);
    }
    return OK;
};
