// src/kernel-core/L0/WriteQueue.ts

/**
 * Single write path. Tasks run one at a time in submission order; a task
 * starts only after the previous one has settled, so no two commands ever
 * interleave between their precondition checks and their commit.
 */
export class WriteQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    public run<T>(task: () => Promise<T>): Promise<T> {
        this.pending++;
        const result = this.tail.then(task);
        // The queue only waits on settlement; the outcome belongs to the caller of run().
        this.tail = result.then(
            () => { this.pending--; },
            () => { this.pending--; }
        );
        return result;
    }

    public get depth(): number { return this.pending; }

    /**
     * Resolves once every task submitted so far has settled.
     */
    public drain(): Promise<void> {
        return this.tail;
    }
}
