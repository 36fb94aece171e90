import { freeze, produce } from 'immer';
import type { Draft } from 'immer';
import type {
    CommitContext, Contributor, Identity, RecordID, RegistryEvent, SpeciesRecord
} from '../L0/Ontology.js';
import { ownEntry } from '../L0/Ontology.js';
import { hash, canonicalize } from '../L0/Crypto.js';
import { checkInvariants } from '../L0/Invariants.js';
import { ErrorCode, RegistryError } from '../Errors.js';

// --- State ---
export interface RegistryState {
    owner: Identity;
    contributors: Record<Identity, Contributor>;
    records: Record<string, SpeciesRecord>; // Keyed by String(id)
    index: Record<Identity, RecordID[]>;
    nextRecordId: RecordID;
    version: number;
    lastUpdate: number;
}

export interface StateSnapshot {
    state: RegistryState;
    hash: string;
    previousHash: string;
    commandId: string;
    evidenceId: string;
    timestamp: number;
}

/**
 * A computed but not yet installed transition. Holding one has no effect on
 * the registry; only `StateModel.install` makes it visible to readers.
 */
export interface PendingTransition {
    readonly previous: RegistryState;
    readonly state: RegistryState;
    readonly event: RegistryEvent;
    readonly context: CommitContext;
}

const GENESIS_PREVIOUS = '0000000000000000000000000000000000000000000000000000000000000000';

function breach(event: RegistryEvent, message: string): RegistryError {
    return new RegistryError(ErrorCode.INTEGRITY_BREACH, `Cannot apply ${event.type}: ${message}`, { event: event.type });
}

/**
 * The reducer. Applies one notification to a draft of the state; used for both
 * live commits and replay, so it re-checks what the event presupposes.
 */
export function applyEvent(draft: Draft<RegistryState>, event: RegistryEvent, context: CommitContext): void {
    switch (event.type) {
        case 'RegistryConstituted':
            draft.owner = event.owner;
            break;

        case 'ContributorAuthorized':
            draft.contributors[event.contributor] = {
                identity: event.contributor,
                name: event.name,
                authorized: true
            };
            break;

        case 'ContributorRevoked': {
            const existing = ownEntry(draft.contributors, event.contributor);
            if (!existing) throw breach(event, `unknown contributor ${event.contributor}`);
            existing.authorized = false;
            break;
        }

        case 'OwnershipTransferred':
            if (draft.owner !== event.previousOwner) throw breach(event, 'previous owner mismatch');
            draft.owner = event.newOwner;
            break;

        case 'RecordCreated': {
            if (event.id !== draft.nextRecordId) {
                throw breach(event, `expected id ${draft.nextRecordId}, got ${event.id}`);
            }
            draft.records[String(event.id)] = {
                id: event.id,
                scientificName: event.scientificName,
                habitat: event.habitat,
                conservationStatus: event.conservationStatus,
                creator: event.creator,
                dataHash: event.dataHash,
                timestamp: context.timestamp,
                active: true
            };
            const list = ownEntry(draft.index, event.creator);
            if (list) {
                list.push(event.id);
            } else {
                draft.index[event.creator] = [event.id];
            }
            draft.nextRecordId = event.id + 1;
            break;
        }

        case 'RecordUpdated': {
            const record = ownEntry(draft.records, String(event.id));
            if (!record?.active) throw breach(event, `record ${event.id} is not live`);
            record.dataHash = event.dataHash;
            record.timestamp = context.timestamp;
            break;
        }

        case 'RecordDeactivated': {
            const record = ownEntry(draft.records, String(event.id));
            if (!record?.active) throw breach(event, `record ${event.id} is not live`);
            record.active = false;
            break;
        }
    }

    draft.version++;
    draft.lastUpdate = context.timestamp;
}

export class StateModel {
    private currentState: RegistryState;

    // Hash chain of committed states
    private snapshots: StateSnapshot[] = [];

    constructor(owner: Identity) {
        const genesis: RegistryState = {
            owner,
            contributors: {},
            records: {},
            index: {},
            nextRecordId: 1,
            version: 0,
            lastUpdate: 0
        };
        this.currentState = freeze(genesis, true);

        this.snapshots.push({
            state: this.currentState,
            hash: hash('GENESIS'),
            previousHash: GENESIS_PREVIOUS,
            commandId: 'genesis',
            evidenceId: GENESIS_PREVIOUS,
            timestamp: 0
        });
    }

    public get current(): RegistryState { return this.currentState; }

    public getSnapshotChain(): readonly StateSnapshot[] { return this.snapshots; }

    /**
     * Transaction time never runs backwards, whatever the clock says.
     */
    public commitTimestamp(now: number): number {
        return Math.max(now, this.currentState.lastUpdate);
    }

    /**
     * Computes the state that `event` would produce. Throws on an inapplicable
     * event or a structural invariant breach; the current state is untouched
     * either way.
     */
    public prepare(event: RegistryEvent, context: CommitContext): PendingTransition {
        const previous = this.currentState;
        if (context.timestamp < previous.lastUpdate) {
            throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'Time Violation: Global Monotonicity Breach', {
                timestamp: context.timestamp,
                lastUpdate: previous.lastUpdate
            });
        }

        const state = produce(previous, draft => applyEvent(draft, event, context));

        const check = checkInvariants({ before: previous, after: state, event });
        if (!check.ok) {
            throw new RegistryError(check.rejection.code, check.rejection.message, {
                invariantId: check.rejection.invariantId,
                boundary: check.rejection.boundary
            });
        }

        return { previous, state, event, context };
    }

    /**
     * Installs a prepared transition and seals it into the snapshot chain.
     */
    public install(pending: PendingTransition, evidenceId: string): StateSnapshot {
        if (pending.previous !== this.currentState) {
            throw new RegistryError(ErrorCode.COMMIT_FAILED, 'Stale transition: state changed since it was prepared');
        }

        const previousSnapshot = this.snapshots[this.snapshots.length - 1];
        if (!previousSnapshot) throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'Critical: Genesis snapshot missing');

        const snapshot: StateSnapshot = {
            state: pending.state,
            hash: this.sealHash(pending.state, pending.context.commandId, pending.context.timestamp, evidenceId, previousSnapshot.hash),
            previousHash: previousSnapshot.hash,
            commandId: pending.context.commandId,
            evidenceId,
            timestamp: pending.context.timestamp
        };

        this.snapshots.push(snapshot);
        this.currentState = pending.state;
        return snapshot;
    }

    public verifyIntegrity(): boolean {
        for (let i = 1; i < this.snapshots.length; i++) {
            const prev = this.snapshots[i - 1];
            const curr = this.snapshots[i];
            if (!prev || !curr) return false;
            if (curr.previousHash !== prev.hash) return false;

            const expected = this.sealHash(curr.state, curr.commandId, curr.timestamp, curr.evidenceId, curr.previousHash);
            if (expected !== curr.hash) return false;
        }
        return true;
    }

    private sealHash(state: RegistryState, commandId: string, timestamp: number, evidenceId: string, previousHash: string): string {
        const stateRoot = hash(canonicalize(state));
        const canonical: [number, string, number, string, string, string] = [
            state.version,
            commandId,
            timestamp,
            stateRoot,
            evidenceId,
            previousHash
        ];
        return hash(canonicalize(canonical));
    }

    // --- Reads (committed state only) ---

    public getContributor(identity: Identity): Contributor | undefined {
        return ownEntry(this.currentState.contributors, identity);
    }

    public getRecord(id: RecordID): SpeciesRecord | undefined {
        return ownEntry(this.currentState.records, String(id));
    }

    public getIndex(identity: Identity): readonly RecordID[] {
        return ownEntry(this.currentState.index, identity) ?? [];
    }

    public listRecords(): SpeciesRecord[] {
        return Object.values(this.currentState.records).sort((a, b) => a.id - b.id);
    }
}
