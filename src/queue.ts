import { OperationCancelledError, describeError } from './errors';
import log from './logger';

const logger = log.scope('queue');

export type OperationState = 'queued' | 'running' | 'fulfilled' | 'rejected' | 'cancelled';

export type Outcome<T> =
    | { status: 'fulfilled'; value: T }
    | { status: 'rejected'; error: unknown }
    | { status: 'cancelled'; error: OperationCancelledError };

let nextId = 1;

/**
 * Handle on one submitted operation. The promise is created on first access
 * of {@link result}, so a caller that listens through callbacks only never
 * leaves an unobserved rejection behind.
 */
export class PendingOperation<T> {
    readonly id = nextId++;
    private currentState: OperationState = 'queued';
    private outcome: Outcome<T> | null = null;
    private promise: Promise<T> | null = null;
    private readonly listeners: Array<() => void> = [];

    constructor(readonly label: string, private readonly onCancel: () => boolean) {}

    get state(): OperationState {
        return this.currentState;
    }

    get result(): Promise<T> {
        if (!this.promise) {
            this.promise = new Promise<T>((resolve, reject) => {
                this.onSettled((outcome) => {
                    if (outcome.status === 'fulfilled') resolve(outcome.value);
                    else reject(outcome.error);
                });
            });
        }
        return this.promise;
    }

    /** Withdraws the operation if it has not started; running operations always complete. */
    cancel(): boolean {
        if (this.currentState !== 'queued') return false;
        return this.onCancel();
    }

    /** Called immediately when already settled. */
    onSettled(listener: (outcome: Outcome<T>) => void): void {
        const outcome = this.outcome;
        if (outcome) {
            listener(outcome);
            return;
        }
        this.listeners.push(() => {
            if (this.outcome) listener(this.outcome);
        });
    }

    /** @internal */
    markRunning(): void {
        this.currentState = 'running';
    }

    /** @internal */
    settle(outcome: Outcome<T>): void {
        if (this.outcome) return;
        this.outcome = outcome;
        this.currentState = outcome.status;
        for (const listener of this.listeners.splice(0)) {
            try {
                listener();
            } catch (error) {
                logger.error(`${this.label}: settle listener threw:`, error);
            }
        }
    }
}

interface QueueEntry {
    label: string;
    isQueued: () => boolean;
    cancel: () => void;
    run: () => Promise<void>;
    settled: (listener: () => void) => void;
}

/**
 * FIFO worker for one instrument: operations run one at a time, end to end,
 * in submission order. A failing operation is reported on its own handle and
 * the next one starts regardless.
 */
export class OperationQueue {
    private readonly entries: QueueEntry[] = [];
    private current: QueueEntry | null = null;
    private draining = false;

    constructor(readonly name: string) {}

    /** Queued operations plus the running one. */
    get size(): number {
        return this.entries.length + (this.current ? 1 : 0);
    }

    get busy(): boolean {
        return this.current !== null;
    }

    enqueue<T>(label: string, task: () => Promise<T>): PendingOperation<T> {
        const operation: PendingOperation<T> = new PendingOperation<T>(label, () => this.withdraw(entry));
        const entry: QueueEntry = {
            label,
            isQueued: () => operation.state === 'queued',
            cancel: () => operation.settle({ status: 'cancelled', error: new OperationCancelledError(label) }),
            settled: (listener) => operation.onSettled(listener),
            run: async () => {
                operation.markRunning();
                let outcome: Outcome<T>;
                try {
                    outcome = { status: 'fulfilled', value: await task() };
                } catch (error) {
                    logger.warn(`${this.name}: ${label} failed: ${describeError(error)}`);
                    outcome = { status: 'rejected', error };
                }
                // Off the queue before anyone hears about it
                this.current = null;
                operation.settle(outcome);
            }
        };
        this.entries.push(entry);
        this.startDraining();
        return operation;
    }

    /** Resolves once every operation queued so far has settled. */
    idle(): Promise<void> {
        const last = this.entries[this.entries.length - 1] ?? this.current;
        if (!last) return Promise.resolve();
        return new Promise(resolve => last.settled(() => resolve()));
    }

    private withdraw(entry: QueueEntry): boolean {
        const index = this.entries.indexOf(entry);
        if (index < 0 || !entry.isQueued()) return false;
        this.entries.splice(index, 1);
        logger.info(`${this.name}: ${entry.label} cancelled`);
        entry.cancel();
        return true;
    }

    private startDraining(): void {
        this.drain().catch((error: unknown) => {
            logger.error(`${this.name}: worker stopped:`, error);
        });
    }

    private async drain(): Promise<void> {
        if (this.draining) return;
        this.draining = true;
        try {
            for (let entry = this.entries.shift(); entry; entry = this.entries.shift()) {
                this.current = entry;
                await entry.run();
            }
        } finally {
            this.draining = false;
        }
    }
}
