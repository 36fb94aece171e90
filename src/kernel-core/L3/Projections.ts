import type { RecordID } from '../L0/Ontology.js';
import type { Evidence } from '../L5/Audit.js';

/**
 * Projections are read models derived purely from the notification stream.
 * They must be deterministic and idempotent under replay from a reset.
 */
export interface Projection<T> {
    name: string;
    version: string;

    /**
     * Resets the internal state of the projection to its zero value.
     */
    reset(): void;

    /**
     * Applies a single piece of evidence to the projection.
     */
    apply(evidence: Evidence): void;

    getState(): T;
}

export class ProjectionEngine {
    private projections: Map<string, Projection<unknown>> = new Map();

    public register(projection: Projection<unknown>) {
        if (this.projections.has(projection.name)) {
            console.warn(`[ProjectionEngine] Overwriting projection: ${projection.name}`);
        }
        this.projections.set(projection.name, projection);
    }

    /**
     * Feeds a single event to all registered projections.
     */
    public apply(evidence: Evidence) {
        for (const projection of this.projections.values()) {
            try {
                projection.apply(evidence);
            } catch (e: unknown) {
                // A read model failing must not undo a committed command.
                console.error(`[ProjectionEngine] Projection '${projection.name}' failed on evidence ${evidence.evidenceId}:`, e);
            }
        }
    }

    public reset() {
        for (const projection of this.projections.values()) {
            projection.reset();
        }
    }
}

/**
 * Active record ids per habitat. Habitats are matched case-insensitively,
 * ignoring surrounding whitespace; ids leave the index on deactivation.
 */
export class HabitatProjection implements Projection<Record<string, RecordID[]>> {
    public readonly name = 'habitats';
    public readonly version = '1.0.0';

    private habitatOf: Map<RecordID, string> = new Map();
    private byHabitat: Map<string, RecordID[]> = new Map();

    public static key(habitat: string): string {
        return habitat.trim().toLowerCase();
    }

    public reset(): void {
        this.habitatOf.clear();
        this.byHabitat.clear();
    }

    public apply(evidence: Evidence): void {
        const event = evidence.event;
        if (event.type === 'RecordCreated') {
            const key = HabitatProjection.key(event.habitat);
            this.habitatOf.set(event.id, key);
            this.byHabitat.set(key, [...(this.byHabitat.get(key) ?? []), event.id]);
        } else if (event.type === 'RecordDeactivated') {
            const key = this.habitatOf.get(event.id);
            if (key === undefined) return;
            const remaining = (this.byHabitat.get(key) ?? []).filter(id => id !== event.id);
            if (remaining.length > 0) {
                this.byHabitat.set(key, remaining);
            } else {
                this.byHabitat.delete(key);
            }
        }
    }

    public lookup(habitat: string): RecordID[] {
        return [...(this.byHabitat.get(HabitatProjection.key(habitat)) ?? [])];
    }

    public getState(): Record<string, RecordID[]> {
        return Object.fromEntries([...this.byHabitat.entries()].map(([k, ids]) => [k, [...ids]]));
    }
}
