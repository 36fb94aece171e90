// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { CommitContext, RegistryEvent } from '../L0/Ontology.js';

/**
 * Event Store Port: the durable, append-only substrate behind the audit log.
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(afterSequence?: number): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
    /** Releases the underlying handle, where the store holds one. */
    close?(): void;
}

// --- Evidence (one committed notification) ---
export interface Evidence {
    sequence: number; // 1-based commit order
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    commandId: string;
    caller: string;
    timestamp: number; // Transaction time, epoch ms
    event: RegistryEvent;
}

export const GENESIS_EVIDENCE = '0000000000000000000000000000000000000000000000000000000000000000';

/**
 * The registry's notification stream. Entries are hash-chained and frozen;
 * external indexers treat it as the durable audit log.
 */
export class AuditLog {
    private localChain: Evidence[] = [];

    constructor(private store?: IEventStore) { }

    public async append(event: RegistryEvent, context: CommitContext): Promise<Evidence> {
        const latest = await this.getTip();
        const previousEvidenceId = latest ? latest.evidenceId : GENESIS_EVIDENCE;
        const sequence = latest ? latest.sequence + 1 : 1;

        const evidence: Evidence = Object.freeze({
            sequence,
            evidenceId: AuditLog.calculateHash(previousEvidenceId, sequence, context, event),
            previousEvidenceId,
            commandId: context.commandId,
            caller: context.caller,
            timestamp: context.timestamp,
            event
        });

        // Store first: a failed write leaves the chain where it was
        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    public async getHistory(afterSequence: number = 0): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory(afterSequence);
        }
        return this.localChain.filter(e => e.sequence > afterSequence);
    }

    public async getTip(): Promise<Evidence | null> {
        const local = this.localChain[this.localChain.length - 1];
        if (local) return local;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = GENESIS_EVIDENCE;
        let sequence = 0;

        for (const entry of history) {
            // 1. Linkage Check
            if (entry.previousEvidenceId !== prev) return false;
            if (entry.sequence !== ++sequence) return false;

            // 2. Hash Check
            const h = AuditLog.calculateHash(prev, entry.sequence, entry, entry.event);
            if (h !== entry.evidenceId) return false;

            prev = entry.evidenceId;
        }
        return true;
    }

    public close(): void {
        this.store?.close?.();
    }

    private static calculateHash(prevHash: string, sequence: number, context: CommitContext, event: RegistryEvent): string {
        // [PreviousHash, Sequence, CommandID, Caller, Timestamp, EventHash]
        const canonical: [string, number, string, string, number, string] = [
            prevHash,
            sequence,
            context.commandId,
            context.caller,
            context.timestamp,
            hash(canonicalize(event))
        ];
        return hash(canonicalize(canonical));
    }
}
