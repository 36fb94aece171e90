import type {
    Command, CommandID, CommandPayload, CommitContext, ContributorView, Identity,
    RecordID, RegistryEvent, RegistryLifecycle, SpeciesRecord
} from './L0/Ontology.js';
import { enforce, IdentityGuard, ReplayGuard } from './L0/Guards.js';
import { randomNonce } from './L0/Crypto.js';
import { WriteQueue } from './L0/WriteQueue.js';
import { AuthorizationManager } from './L1/Authorization.js';
import { StateModel } from './L2/State.js';
import type { StateSnapshot } from './L2/State.js';
import { RecordLifecycle } from './L2/Records.js';
import type { RecordInput } from './L2/Records.js';
import { authenticate } from './L2/CommandFactory.js';
import { ProjectionEngine } from './L3/Projections.js';
import { AuditLog } from './L5/Audit.js';
import type { Evidence } from './L5/Audit.js';
import { ErrorCode, RegistryError, isRegistryError } from './Errors.js';

/**
 * Environment Port: transaction clock (epoch ms).
 */
export interface Clock {
    now(): number;
}

export const SystemClock: Clock = { now: () => Date.now() };

export interface RegistryOptions {
    owner: Identity;
    audit?: AuditLog;
    clock?: Clock;
    projections?: ProjectionEngine;
}

export interface Receipt {
    commandId: CommandID;
    sequence: number;
    evidenceId: string;
    stateHash: string;
    timestamp: number;
    event: RegistryEvent;
}

export type NotificationListener = (evidence: Evidence) => void;

export class SpeciesRegistry {
    private lifecycle: RegistryLifecycle = 'CONSTITUTED';
    private seenCommands: Set<CommandID> = new Set(); // Replay Protection
    private listeners: Set<NotificationListener> = new Set();
    private writer = new WriteQueue();

    private readonly configuredOwner: Identity;
    private readonly audit: AuditLog;
    private readonly clock: Clock;
    private readonly projections: ProjectionEngine;

    public readonly state: StateModel;
    public readonly authorization: AuthorizationManager;
    public readonly records: RecordLifecycle;

    public constructor(options: RegistryOptions) {
        enforce(IdentityGuard({ identity: options.owner, field: 'owner' }));

        this.configuredOwner = options.owner;
        this.audit = options.audit ?? new AuditLog();
        this.clock = options.clock ?? SystemClock;
        this.projections = options.projections ?? new ProjectionEngine();

        this.state = new StateModel(options.owner);
        this.authorization = new AuthorizationManager(this.state);
        this.records = new RecordLifecycle(this.state);
    }

    public get Lifecycle(): RegistryLifecycle { return this.lifecycle; }
    public get Audit(): AuditLog { return this.audit; }
    public get pendingWrites(): number { return this.writer.depth; }

    /**
     * Activates the registry. Against an empty log the genesis notification
     * is committed first so the owner can be recovered from the log alone.
     */
    public async boot(): Promise<void> {
        await this.writer.run(async () => {
            if (this.lifecycle !== 'CONSTITUTED') return;

            if ((await this.audit.getTip()) === null) {
                const owner = this.state.current.owner;
                await this.commit({ type: 'RegistryConstituted', owner }, {
                    caller: owner,
                    commandId: `genesis:${owner}`,
                    timestamp: this.state.commitTimestamp(this.clock.now())
                });
            }

            this.lifecycle = 'ACTIVE';
            console.log(`[Registry] Active. Owner ${this.state.current.owner}, ${this.records.count} records.`);
        });
    }

    /**
     * Stops accepting commands, lets in-flight commands settle, then closes
     * the event store.
     */
    public async close(): Promise<void> {
        this.lifecycle = 'CLOSED';
        await this.writer.drain();
        this.audit.close();
        console.log('[Registry] Closed.');
    }

    // --- Authorization Manager ---

    public async grantContributor(caller: Identity, identity: Identity, name: string): Promise<void> {
        await this.dispatch(caller, { kind: 'grantContributor', identity, name });
    }

    public async revokeContributor(caller: Identity, identity: Identity): Promise<void> {
        await this.dispatch(caller, { kind: 'revokeContributor', identity });
    }

    public async transferOwnership(caller: Identity, newOwner: Identity): Promise<void> {
        await this.dispatch(caller, { kind: 'transferOwnership', newOwner });
    }

    public getContributor(identity: Identity): ContributorView {
        return this.authorization.getContributor(identity);
    }

    public getOwner(): Identity {
        return this.authorization.owner;
    }

    // --- Record Lifecycle Manager ---

    public async createRecord(caller: Identity, input: RecordInput): Promise<RecordID> {
        const receipt = await this.dispatch(caller, { kind: 'createRecord', ...input });
        if (receipt.event.type !== 'RecordCreated') {
            throw new RegistryError(ErrorCode.COMMIT_FAILED, `Unexpected ${receipt.event.type} for createRecord`);
        }
        return receipt.event.id;
    }

    public async updateRecord(caller: Identity, id: RecordID, dataHash: string): Promise<void> {
        await this.dispatch(caller, { kind: 'updateRecord', id, dataHash });
    }

    public async deactivateRecord(caller: Identity, id: RecordID): Promise<void> {
        await this.dispatch(caller, { kind: 'deactivateRecord', id });
    }

    public getRecord(id: RecordID): SpeciesRecord {
        return this.records.getRecord(id);
    }

    public getContributorRecords(identity: Identity): RecordID[] {
        return this.records.getContributorRecords(identity);
    }

    public listRecords(): SpeciesRecord[] {
        return this.records.listRecords();
    }

    // --- Signed command entry ---

    /**
     * Runs a signed command: id and signature are checked before the command
     * joins the write queue; the replay check runs inside it.
     */
    public async execute(command: Command): Promise<Receipt> {
        const check = await authenticate(command);
        if (!check.ok) {
            console.warn(`[Registry] Rejected ${command.payload.kind} from ${command.caller}: ${check.violation}`);
        }
        enforce(check);
        return this.dispatch(command.caller, command.payload, command.commandId);
    }

    // --- Notifications ---

    public subscribe(listener: NotificationListener): () => void {
        this.listeners.add(listener);
        return () => { this.listeners.delete(listener); };
    }

    // --- Recovery ---

    /**
     * Re-applies one persisted notification. Only a registry that has not
     * booted yet can be restored; guards are not re-run.
     */
    public restore(evidence: Evidence): StateSnapshot {
        if (this.lifecycle !== 'CONSTITUTED') {
            throw new RegistryError(ErrorCode.REPLAY_FAILURE, `Cannot restore into a registry in state ${this.lifecycle}`);
        }
        if (evidence.event.type === 'RegistryConstituted' && evidence.event.owner !== this.configuredOwner) {
            console.warn(`[Registry] Log owner ${evidence.event.owner} differs from configured owner ${this.configuredOwner}; the log wins.`);
        }

        const pending = this.state.prepare(evidence.event, {
            caller: evidence.caller,
            commandId: evidence.commandId,
            timestamp: evidence.timestamp
        });
        const snapshot = this.state.install(pending, evidence.evidenceId);
        this.seenCommands.add(evidence.commandId);
        this.projections.apply(evidence);
        return snapshot;
    }

    public async verifyIntegrity(): Promise<{ state: boolean, audit: boolean }> {
        return {
            state: this.state.verifyIntegrity(),
            audit: await this.audit.verifyChain()
        };
    }

    // --- Write path ---

    private dispatch(caller: Identity, payload: CommandPayload, commandId: CommandID = `local:${randomNonce()}`): Promise<Receipt> {
        return this.writer.run(async () => {
            try {
                if (this.lifecycle !== 'ACTIVE') {
                    throw new RegistryError(ErrorCode.REGISTRY_NOT_ACTIVE, `Cannot run ${payload.kind} in state ${this.lifecycle}`);
                }
                enforce(ReplayGuard({ commandId, seen: this.seenCommands }));

                const event = this.plan(caller, payload);
                return await this.commit(event, {
                    caller,
                    commandId,
                    timestamp: this.state.commitTimestamp(this.clock.now())
                });
            } catch (e: unknown) {
                if (isRegistryError(e)) {
                    console.warn(`[Registry] Rejected ${payload.kind} from ${caller}: ${e.message}`);
                }
                throw e;
            }
        });
    }

    private plan(caller: Identity, payload: CommandPayload): RegistryEvent {
        switch (payload.kind) {
            case 'grantContributor':
                return this.authorization.planGrant(caller, payload.identity, payload.name);
            case 'revokeContributor':
                return this.authorization.planRevoke(caller, payload.identity);
            case 'transferOwnership':
                return this.authorization.planTransfer(caller, payload.newOwner);
            case 'createRecord':
                return this.records.planCreate(caller, payload);
            case 'updateRecord':
                return this.records.planUpdate(caller, payload.id, payload.dataHash);
            case 'deactivateRecord':
                return this.records.planDeactivate(caller, payload.id);
        }
    }

    /**
     * Prepare, persist, install. Nothing becomes visible to readers unless the
     * event store accepted the evidence.
     */
    private async commit(event: RegistryEvent, context: CommitContext): Promise<Receipt> {
        const pending = this.state.prepare(event, context);

        let evidence: Evidence;
        try {
            evidence = await this.audit.append(event, context);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[Registry] Commit Error on ${event.type}:`, e);
            throw new RegistryError(ErrorCode.COMMIT_FAILED, `Event store append failed: ${message}`);
        }

        const snapshot = this.state.install(pending, evidence.evidenceId);
        this.seenCommands.add(context.commandId);
        this.publish(evidence);

        return {
            commandId: context.commandId,
            sequence: evidence.sequence,
            evidenceId: evidence.evidenceId,
            stateHash: snapshot.hash,
            timestamp: context.timestamp,
            event
        };
    }

    private publish(evidence: Evidence): void {
        this.projections.apply(evidence);
        for (const listener of this.listeners) {
            try {
                listener(evidence);
            } catch (e: unknown) {
                console.error(`[Registry] Listener failed on evidence ${evidence.sequence}:`, e);
            }
        }
    }
}
