import { describeError, isRetryableBatchError } from './errors';

export interface BatchJob {
    execution_id: string;
    sequence: number;
}

export type JobHandler<J> = (job: J, attempt: number) => Promise<void>;

export type DeadLetterHandler<J> = (
    job: J,
    error: unknown,
    attempts: number,
) => Promise<void>;

export interface WorkQueue<J> {
    enqueue(job: J): void;
    onIdle(): Promise<void>;
}

export interface WorkQueueStats {
    waiting: number;
    running: number;
    delayed: number;
}

export interface InMemoryWorkQueueConfig<J> {
    concurrency: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffCeilingMs: number;
    onDeadLetter?: DeadLetterHandler<J>;
    isRetryable?: (error: unknown) => boolean;
}

interface QueuedJob<J> {
    job: J;
    attempt: number;
}

/** Delay before retry number `attempt` (1-based) is re-queued. */
export function computeBackoffMs(
    attempt: number,
    baseMs: number,
    ceilingMs: number,
): number {
    return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), ceilingMs);
}

function parseStrictPositiveInteger(value: number, fieldName: string): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${fieldName} must be a positive integer`);
    }

    return value;
}

/**
 * Process-local queue with bounded concurrency. Retryable failures are
 * re-queued after an exponential backoff; anything else, or a job out of
 * attempts, goes to the dead-letter handler exactly once.
 */
export class InMemoryWorkQueue<J> implements WorkQueue<J> {
    private readonly waiting: QueuedJob<J>[] = [];

    private readonly delayed = new Set<NodeJS.Timeout>();

    private readonly idleWaiters: Array<() => void> = [];

    private readonly concurrency: number;

    private readonly maxAttempts: number;

    private readonly isRetryable: (error: unknown) => boolean;

    private running = 0;

    private stopped = false;

    constructor(
        private readonly handler: JobHandler<J>,
        private readonly config: InMemoryWorkQueueConfig<J>,
    ) {
        this.concurrency = parseStrictPositiveInteger(
            config.concurrency,
            'concurrency',
        );
        this.maxAttempts = parseStrictPositiveInteger(
            config.maxAttempts,
            'maxAttempts',
        );
        this.isRetryable = config.isRetryable || isRetryableBatchError;
    }

    enqueue(job: J): void {
        if (this.stopped) {
            throw new Error('work queue is stopped');
        }

        this.waiting.push({
            job,
            attempt: 1,
        });
        this.drain();
    }

    onIdle(): Promise<void> {
        if (this.isIdle()) {
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    stats(): WorkQueueStats {
        return {
            waiting: this.waiting.length,
            running: this.running,
            delayed: this.delayed.size,
        };
    }

    /**
     * Stops taking jobs and drops pending retries. Resolves once running
     * jobs have finished.
     */
    async stop(): Promise<void> {
        this.stopped = true;

        for (const timer of this.delayed) {
            clearTimeout(timer);
        }

        this.delayed.clear();
        this.waiting.length = 0;

        await this.onIdle();
    }

    private drain(): void {
        while (
            !this.stopped &&
            this.running < this.concurrency &&
            this.waiting.length > 0
        ) {
            const next = this.waiting.shift();

            if (!next) {
                break;
            }

            this.running += 1;
            void this.run(next);
        }

        this.notifyIfIdle();
    }

    private async run(entry: QueuedJob<J>): Promise<void> {
        try {
            await this.handler(entry.job, entry.attempt);
        } catch (error: unknown) {
            await this.handleFailure(entry, error);
        } finally {
            this.running -= 1;
            this.drain();
        }
    }

    private async handleFailure(
        entry: QueuedJob<J>,
        error: unknown,
    ): Promise<void> {
        if (
            !this.stopped &&
            this.isRetryable(error) &&
            entry.attempt < this.maxAttempts
        ) {
            const delayMs = computeBackoffMs(
                entry.attempt,
                this.config.backoffBaseMs,
                this.config.backoffCeilingMs,
            );

            console.warn('work queue job retry scheduled', {
                attempt: entry.attempt,
                delay_ms: delayMs,
                error: describeError(error),
            });

            const timer = setTimeout(() => {
                this.delayed.delete(timer);
                this.waiting.push({
                    job: entry.job,
                    attempt: entry.attempt + 1,
                });
                this.drain();
            }, delayMs);

            this.delayed.add(timer);

            return;
        }

        console.warn('work queue job dead-lettered', {
            attempts: entry.attempt,
            error: describeError(error),
        });

        if (!this.config.onDeadLetter) {
            return;
        }

        try {
            await this.config.onDeadLetter(entry.job, error, entry.attempt);
        } catch (deadLetterError: unknown) {
            console.error('work queue dead-letter handler failed', {
                error: describeError(deadLetterError),
            });
        }
    }

    private isIdle(): boolean {
        return (
            this.running === 0 &&
            this.waiting.length === 0 &&
            this.delayed.size === 0
        );
    }

    private notifyIfIdle(): void {
        if (!this.isIdle()) {
            return;
        }

        const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);

        for (const resolve of waiters) {
            resolve();
        }
    }
}
