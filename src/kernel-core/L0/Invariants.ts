// src/kernel-core/L0/Invariants.ts
import type { Identity, RegistryEvent } from './Ontology.js';
import { ZERO_IDENTITY, isIdentity, ownEntry } from './Ontology.js';
import type { RegistryState } from '../L2/State.js';
import { ErrorCode } from '../Errors.js';

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Record Identity")
    description: string;
    predicate: (context: InvariantContext) => boolean;
}

export interface InvariantContext {
    before: RegistryState;
    after: RegistryState;
    event: RegistryEvent;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    message: string;
}

// --- Structural Invariants ---
// Checked on every transition before it is installed. The reducer only writes
// the entries an event names, so each check reads those entries alone.

function touchedRecord(event: RegistryEvent): string | undefined {
    switch (event.type) {
        case 'RecordCreated':
        case 'RecordUpdated':
        case 'RecordDeactivated':
            return String(event.id);
        default:
            return undefined;
    }
}

function touchedContributor(event: RegistryEvent): Identity | undefined {
    switch (event.type) {
        case 'ContributorAuthorized':
        case 'ContributorRevoked':
            return event.contributor;
        default:
            return undefined;
    }
}

// I. Record Identity
export const INV_REC_01: Invariant = {
    id: 'INV-REC-01',
    boundary: 'Record Identity',
    description: 'Id, creator, scientific name, habitat and conservation status never change once written',
    predicate: ({ before, after, event }) => {
        const key = touchedRecord(event);
        const prev = key === undefined ? undefined : ownEntry(before.records, key);
        if (key === undefined || prev === undefined) return true;
        const next = ownEntry(after.records, key);
        return next !== undefined
            && next.id === prev.id
            && next.creator === prev.creator
            && next.scientificName === prev.scientificName
            && next.habitat === prev.habitat
            && next.conservationStatus === prev.conservationStatus;
    }
};

export const INV_REC_02: Invariant = {
    id: 'INV-REC-02',
    boundary: 'Record Identity',
    description: 'An inactive record is terminal: never reactivated, never amended',
    predicate: ({ before, after, event }) => {
        const key = touchedRecord(event);
        const prev = key === undefined ? undefined : ownEntry(before.records, key);
        if (key === undefined || prev === undefined || prev.active) return true;
        const next = ownEntry(after.records, key);
        return next !== undefined
            && !next.active
            && next.dataHash === prev.dataHash
            && next.timestamp === prev.timestamp;
    }
};

// II. Allocation
export const INV_ALLOC_01: Invariant = {
    id: 'INV-ALLOC-01',
    boundary: 'Identifier Allocation',
    description: 'The id counter never moves backwards and a written id lies in [1, counter)',
    predicate: ({ before, after, event }) => {
        if (after.nextRecordId < before.nextRecordId) return false;
        const key = touchedRecord(event);
        const record = key === undefined ? undefined : ownEntry(after.records, key);
        return record === undefined || (record.id >= 1 && record.id < after.nextRecordId);
    }
};

export const INV_IDX_01: Invariant = {
    id: 'INV-IDX-01',
    boundary: 'Contributor Index',
    description: 'Per-contributor record lists only grow',
    predicate: ({ before, after, event }) => {
        if (event.type !== 'RecordCreated') return true;
        const prev = ownEntry(before.index, event.creator) ?? [];
        const next = ownEntry(after.index, event.creator);
        return next !== undefined
            && next.length >= prev.length
            && prev.every((id, i) => next[i] === id);
    }
};

// III. Authority
export const INV_AUTH_01: Invariant = {
    id: 'INV-AUTH-01',
    boundary: 'Registry Authority',
    description: 'Exactly one well-formed, non-zero owner',
    predicate: ({ after }) => isIdentity(after.owner) && after.owner !== ZERO_IDENTITY
};

export const INV_AUTH_02: Invariant = {
    id: 'INV-AUTH-02',
    boundary: 'Registry Authority',
    description: 'Contributor entries are flagged, never removed',
    predicate: ({ before, after, event }) => {
        const identity = touchedContributor(event);
        if (identity === undefined || ownEntry(before.contributors, identity) === undefined) return true;
        return ownEntry(after.contributors, identity) !== undefined;
    }
};

export const STRUCTURAL_INVARIANTS: readonly Invariant[] = [
    INV_REC_01,
    INV_REC_02,
    INV_ALLOC_01,
    INV_IDX_01,
    INV_AUTH_01,
    INV_AUTH_02,
];

export function checkInvariants(
    context: InvariantContext,
    invariants: readonly Invariant[] = STRUCTURAL_INVARIANTS
): { ok: true } | { ok: false; rejection: Rejection } {
    for (const inv of invariants) {
        if (!inv.predicate(context)) {
            return {
                ok: false,
                rejection: {
                    code: ErrorCode.INTEGRITY_BREACH,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant ${inv.id} violated by ${context.event.type}: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}
