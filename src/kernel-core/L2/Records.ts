import type { Identity, RecordID, RegistryEvent, SpeciesRecord } from '../L0/Ontology.js';
import { DEFAULT_CONSERVATION_STATUS, isConservationStatus } from '../L0/Ontology.js';
import {
    enforce, ContributorGuard, RequiredTextGuard, CreatorGuard, CreatorOrOwnerGuard
} from '../L0/Guards.js';
import { StateModel } from './State.js';
import { ErrorCode, RegistryError } from '../Errors.js';

export interface RecordInput {
    scientificName: string;
    habitat: string;
    dataHash: string;
    conservationStatus?: string;
}

/**
 * Creates, amends and retires records: nonexistent -> active -> inactive.
 * Authorization is read from committed state at call time, never cached.
 */
export class RecordLifecycle {
    constructor(private state: StateModel) { }

    public planCreate(caller: Identity, input: RecordInput): RegistryEvent {
        const status = input.conservationStatus ?? DEFAULT_CONSERVATION_STATUS;
        enforce(
            ContributorGuard({ caller, contributor: this.state.getContributor(caller) }),
            RequiredTextGuard({
                scientificName: input.scientificName,
                habitat: input.habitat,
                dataHash: input.dataHash
            })
        );
        if (!isConservationStatus(status)) {
            throw new RegistryError(ErrorCode.INVALID_ARGUMENT, `Unknown conservation status: ${status}`, { status });
        }

        return {
            type: 'RecordCreated',
            id: this.state.current.nextRecordId,
            scientificName: input.scientificName,
            habitat: input.habitat,
            dataHash: input.dataHash,
            creator: caller,
            conservationStatus: status
        };
    }

    /**
     * Creator-exclusive; the owner does not bypass this.
     */
    public planUpdate(caller: Identity, id: RecordID, dataHash: string): RegistryEvent {
        const record = this.requireLive(id);
        enforce(
            CreatorGuard({ caller, record }),
            RequiredTextGuard({ dataHash })
        );
        return { type: 'RecordUpdated', id, dataHash };
    }

    public planDeactivate(caller: Identity, id: RecordID): RegistryEvent {
        const record = this.requireLive(id);
        enforce(CreatorOrOwnerGuard({ caller, record, owner: this.state.current.owner }));
        return { type: 'RecordDeactivated', id };
    }

    /**
     * Returns inactive records too; callers inspect `active` themselves.
     */
    public getRecord(id: RecordID): SpeciesRecord {
        const record = Number.isInteger(id) && id > 0 ? this.state.getRecord(id) : undefined;
        if (!record) {
            throw new RegistryError(ErrorCode.NOT_FOUND, `Record ${id} does not exist`, { id });
        }
        return record;
    }

    public getContributorRecords(identity: Identity): RecordID[] {
        return [...this.state.getIndex(identity)];
    }

    public listRecords(): SpeciesRecord[] {
        return this.state.listRecords();
    }

    public get count(): number {
        return this.state.current.nextRecordId - 1;
    }

    // Nonexistence is the degenerate case of inactivity: both fail the same way.
    private requireLive(id: RecordID): SpeciesRecord {
        const record = this.state.getRecord(id);
        if (!record?.active) {
            throw new RegistryError(ErrorCode.INACTIVE, `Record ${id} does not exist or is inactive`, { id });
        }
        return record;
    }
}
