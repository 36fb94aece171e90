/**
 * REGISTRY ONTOLOGY
 * The single source of truth for the registry's primitives: identities,
 * contributors, records, commands and the notifications they produce.
 */

// --- 1. Identity ---
// Raw 32-byte Ed25519 public key, lowercase hex.
export type Identity = string;

export const ZERO_IDENTITY: Identity = '0'.repeat(64);

const IDENTITY_PATTERN = /^[0-9a-f]{64}$/;

export function isIdentity(value: string): boolean {
    return IDENTITY_PATTERN.test(value);
}

// --- 2. Contributor ---
export interface Contributor {
    readonly identity: Identity;
    readonly name: string;
    readonly authorized: boolean;
}

export interface ContributorView {
    name: string;
    authorized: boolean;
}

// --- 3. Record ---
export type RecordID = number;

export const CONSERVATION_STATUSES = [
    'Least Concern',
    'Near Threatened',
    'Vulnerable',
    'Endangered',
    'Critically Endangered',
    'Extinct',
] as const;

export type ConservationStatus = typeof CONSERVATION_STATUSES[number];

export const DEFAULT_CONSERVATION_STATUS: ConservationStatus = 'Least Concern';

export function isConservationStatus(value: string): value is ConservationStatus {
    return CONSERVATION_STATUSES.some(status => status === value);
}

export interface SpeciesRecord {
    readonly id: RecordID;
    readonly scientificName: string;
    readonly habitat: string;
    readonly conservationStatus: ConservationStatus;
    readonly creator: Identity;
    readonly dataHash: string;
    readonly timestamp: number;
    readonly active: boolean;
}

// --- 4. Commands ---
export type CommandPayload =
    | { kind: 'grantContributor'; identity: Identity; name: string }
    | { kind: 'revokeContributor'; identity: Identity }
    | { kind: 'transferOwnership'; newOwner: Identity }
    | {
        kind: 'createRecord';
        scientificName: string;
        habitat: string;
        dataHash: string;
        conservationStatus?: string;
    }
    | { kind: 'updateRecord'; id: RecordID; dataHash: string }
    | { kind: 'deactivateRecord'; id: RecordID };

export type CommandID = string;

/**
 * A signed request to run one command on behalf of `caller`.
 * The signature covers `commandId:caller:canonical(payload):issuedAt:nonce`.
 */
export interface Command {
    commandId: CommandID;
    caller: Identity;
    payload: CommandPayload;
    issuedAt: number;
    nonce: string;
    signature: string;
}

// --- 5. Notifications ---
export type RegistryEvent =
    | { type: 'RegistryConstituted'; owner: Identity }
    | { type: 'ContributorAuthorized'; contributor: Identity; name: string }
    | { type: 'ContributorRevoked'; contributor: Identity }
    | { type: 'OwnershipTransferred'; previousOwner: Identity; newOwner: Identity }
    | {
        type: 'RecordCreated';
        id: RecordID;
        scientificName: string;
        habitat: string;
        dataHash: string;
        creator: Identity;
        conservationStatus: ConservationStatus;
    }
    | { type: 'RecordUpdated'; id: RecordID; dataHash: string }
    | { type: 'RecordDeactivated'; id: RecordID };

/**
 * Who committed an event, under which command, at which transaction time.
 */
export interface CommitContext {
    caller: Identity;
    commandId: CommandID;
    timestamp: number;
}

export type RegistryLifecycle = 'CONSTITUTED' | 'ACTIVE' | 'CLOSED';

/**
 * Reads an identity- or id-keyed table. Inherited names such as
 * `constructor` or `__proto__` are not entries.
 */
export function ownEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.hasOwn(table, key) ? table[key] : undefined;
}
