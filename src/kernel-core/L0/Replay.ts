import { SpeciesRegistry } from '../Registry.js';
import { AuditLog } from '../L5/Audit.js';
import { ErrorCode, RegistryError } from '../Errors.js';

export class ReplayEngine {
    /**
     * Replays the provided AuditLog onto a registry that has not booted yet.
     * Returns the number of notifications applied.
     */
    public async replay(log: AuditLog, registry: SpeciesRegistry): Promise<number> {
        if (!(await log.verifyChain())) {
            throw new RegistryError(ErrorCode.INTEGRITY_BREACH, 'Audit chain does not verify; refusing to replay');
        }

        const history = await log.getHistory();
        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        for (const entry of history) {
            try {
                registry.restore(entry);
            } catch (e: unknown) {
                const message = e instanceof Error ? e.message : String(e);
                throw new RegistryError(ErrorCode.REPLAY_FAILURE, `Replay Failure at sequence ${entry.sequence} (${entry.event.type}): ${message}`, {
                    sequence: entry.sequence
                });
            }
        }

        // Final tip check
        const logTip = await log.getTip();
        const chain = registry.state.getSnapshotChain();
        const stateTip = chain[chain.length - 1];
        if (logTip && stateTip && stateTip.evidenceId !== logTip.evidenceId) {
            throw new RegistryError(ErrorCode.REPLAY_FAILURE, `Tip mismatch. State: ${stateTip.evidenceId}, Log: ${logTip.evidenceId}`);
        }

        console.log(`[ReplayEngine] Replay complete.`);
        return history.length;
    }
}
