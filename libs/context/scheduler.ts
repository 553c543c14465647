/**
 * ContextScheduler
 *
 * Single-owner task queue for one context. Submitted operations run with bounded
 * concurrency and each settles exactly once; after shutdown, new submissions are rejected.
 * Exclusive operations additionally pass through a one-slot lane, so they run one at a
 * time in submission order.
 */

import { getComponentLogger } from '../logging/logger.js';
import { CoreError } from '../errors/CoreError.js';
import { OperationResult, settle } from '../errors/result.js';

const logger = getComponentLogger('ContextScheduler');

class Semaphore {
    private inFlight = 0;
    private readonly queue: Array<() => void> = [];

    constructor(private readonly limit: number) { }

    async acquire(): Promise<() => void> {
        if (this.inFlight < this.limit) {
            this.inFlight += 1;
            return () => this.release();
        }

        return new Promise(resolve => {
            this.queue.push(() => {
                this.inFlight += 1;
                resolve(() => this.release());
            });
        });
    }

    private release(): void {
        this.inFlight -= 1;
        const next = this.queue.shift();
        if (next) {
            next();
        }
    }
}

export interface SubmitOptions {
    readonly exclusive?: boolean;
}

export class ContextScheduler {
    private readonly semaphore: Semaphore;
    private readonly lane = new Semaphore(1);
    private readonly pending = new Set<Promise<unknown>>();
    private closed = false;

    constructor(readonly contextId: number, concurrency: number) {
        this.semaphore = new Semaphore(Math.max(1, concurrency));
    }

    get isShutdown(): boolean {
        return this.closed;
    }

    /**
     * Runs an operation on this context; its promise settles exactly once.
     */
    submit<T>(label: string, operation: () => Promise<T>, options: SubmitOptions = {}): Promise<T> {
        if (this.closed) {
            return Promise.reject(new CoreError('HandleInvalid', `Context ${this.contextId} is shut down; ${label} rejected`));
        }
        const task = options.exclusive ? this.runExclusive(label, operation) : this.run(label, operation);
        this.pending.add(task);
        const forget = () => {
            this.pending.delete(task);
        };
        task.then(forget, forget);
        return task;
    }

    /**
     * Like submit, but completes with the result contract instead of rejecting.
     */
    submitSettled<T>(label: string, operation: () => Promise<T>, options: SubmitOptions = {}): Promise<OperationResult<T>> {
        return settle(() => this.submit(label, operation, options), label);
    }

    /**
     * Waits for every submitted operation to settle.
     */
    async drain(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.allSettled([...this.pending]);
        }
    }

    /**
     * Rejects further submissions and waits for in-flight work.
     */
    async shutdown(): Promise<void> {
        this.closed = true;
        await this.drain();
        logger.debug({ contextId: this.contextId }, 'Context scheduler stopped');
    }

    private async runExclusive<T>(label: string, operation: () => Promise<T>): Promise<T> {
        const release = await this.lane.acquire();
        try {
            return await this.run(label, operation);
        } finally {
            release();
        }
    }

    private async run<T>(label: string, operation: () => Promise<T>): Promise<T> {
        const release = await this.semaphore.acquire();
        try {
            return await operation();
        } catch (err: unknown) {
            logger.debug({ contextId: this.contextId, label, err }, 'Scheduled operation failed');
            throw err;
        } finally {
            release();
        }
    }
}
