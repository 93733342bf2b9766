import { InMemoryTtlCache, TtlCache } from '../cache/ttl-cache';
import {
    CHECKPOINT_BUFFER_SIZE,
    CHECKPOINT_TTL_SECONDS,
} from '../constants';
import {
    LifecycleEventSink,
    NoopLifecycleEventSink,
} from '../events/lifecycle-events';
import {
    ExecutionLedger,
    SettleBatchInput,
    SettleBatchResult,
} from '../executions/execution-ledger';
import {
    BatchStatus,
    ExecutionRecord,
    ExecutionStatus,
    isTerminalExecutionStatus,
    normalizeIsoWithMillis,
} from '../executions/models';

export interface ProgressCheckpoint {
    count: number;
    at_ms: number;
}

export interface ProgressTrackerOptions {
    cache?: TtlCache<ProgressCheckpoint[]>;
    events?: LifecycleEventSink;
    now?: () => Date;
    notifyIntervalMs?: number;
}

export interface ProgressDetails {
    execution_id: string;
    status: ExecutionStatus;
    percentage: number;
    total_records: number;
    processed_records: number;
    failed_records: number;
    total_batches: number | null;
    batches: Record<BatchStatus, number>;
    elapsed_seconds: number | null;
    eta_seconds: number | null;
    eta_human: string | null;
}

function pluralize(count: number, unit: string): string {
    return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

export function formatDuration(seconds: number): string {
    if (seconds < 60) {
        return pluralize(Math.ceil(seconds), 'second');
    }

    if (seconds < 3600) {
        return pluralize(Math.ceil(seconds / 60), 'minute');
    }

    const hours = Math.floor(seconds / 3600);
    const minutes = Math.ceil((seconds % 3600) / 60);
    const hoursText = pluralize(hours, 'hour');

    return minutes > 0
        ? `${hoursText} ${pluralize(minutes, 'minute')}`
        : hoursText;
}

function checkpointKey(executionId: string): string {
    return `bulk_progress:${executionId}`;
}

function emptyBatchCounts(): Record<BatchStatus, number> {
    return {
        pending: 0,
        processing: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
    };
}

/**
 * Settles batches against the ledger and keeps a short ring of
 * checkpoints per execution for rate and ETA estimates. Checkpoints live
 * in a TTL cache; losing them only makes the ETA unknown.
 */
export class ProgressTracker {
    private readonly cache: TtlCache<ProgressCheckpoint[]>;

    private readonly events: LifecycleEventSink;

    private readonly now: () => Date;

    private readonly notifyIntervalMs: number;

    private readonly lastNotifiedAt = new Map<string, number>();

    constructor(
        private readonly ledger: ExecutionLedger,
        options: ProgressTrackerOptions = {},
    ) {
        this.now = options.now || (() => new Date());
        this.cache = options.cache || new InMemoryTtlCache({
            now: this.now,
        });
        this.events = options.events || new NoopLifecycleEventSink();
        this.notifyIntervalMs = options.notifyIntervalMs ?? 500;
    }

    async initialize(execution: ExecutionRecord): Promise<void> {
        await this.cache.put(
            checkpointKey(execution.execution_id),
            [{
                count: execution.processed_records,
                at_ms: this.now().getTime(),
            }],
            CHECKPOINT_TTL_SECONDS,
        );
    }

    /**
     * Marks one batch terminal and folds its counts into the execution in
     * a single ledger call. Returns null when the batch was already
     * settled.
     */
    async update(input: SettleBatchInput): Promise<SettleBatchResult | null> {
        const settled = await this.ledger.settleBatch(input);

        if (!settled) {
            return null;
        }

        await this.appendCheckpoint(settled.execution);
        await this.notify(settled.execution);

        return settled;
    }

    getProgress(execution: ExecutionRecord): number {
        if (execution.total_records <= 0) {
            return 0;
        }

        const ratio = execution.processed_records / execution.total_records;
        const percentage = Math.round(ratio * 10000) / 100;

        return Math.min(100, Math.max(0, percentage));
    }

    /** Seconds until the execution should finish, when a rate is known. */
    async getEstimatedTimeRemaining(
        execution: ExecutionRecord,
    ): Promise<number | null> {
        if (isTerminalExecutionStatus(execution.status)) {
            return null;
        }

        const checkpoints = await this.cache.get(
            checkpointKey(execution.execution_id),
        );

        if (!checkpoints || checkpoints.length < 2) {
            return null;
        }

        const oldest = checkpoints[0];
        const newest = checkpoints[checkpoints.length - 1];
        const elapsedMs = newest.at_ms - oldest.at_ms;
        const counted = newest.count - oldest.count;

        if (elapsedMs <= 0 || counted <= 0) {
            return null;
        }

        const perSecond = counted / (elapsedMs / 1000);
        const remaining = Math.max(
            0,
            execution.total_records - execution.processed_records,
        );

        return Math.ceil(remaining / perSecond);
    }

    async getDetails(execution: ExecutionRecord): Promise<ProgressDetails> {
        const batches = emptyBatchCounts();

        for (const batch of await this.ledger.listBatches(
            execution.execution_id,
        )) {
            batches[batch.status] += 1;
        }

        const etaSeconds = await this.getEstimatedTimeRemaining(execution);

        return {
            execution_id: execution.execution_id,
            status: execution.status,
            percentage: this.getProgress(execution),
            total_records: execution.total_records,
            processed_records: execution.processed_records,
            failed_records: execution.failed_records,
            total_batches: execution.total_batches,
            batches,
            elapsed_seconds: this.elapsedSeconds(execution),
            eta_seconds: etaSeconds,
            eta_human: etaSeconds === null ? null : formatDuration(etaSeconds),
        };
    }

    async clear(executionId: string): Promise<void> {
        await this.cache.forget(checkpointKey(executionId));
        this.lastNotifiedAt.delete(executionId);
    }

    private elapsedSeconds(execution: ExecutionRecord): number | null {
        if (!execution.started_at) {
            return null;
        }

        const endMs = execution.completed_at
            ? Date.parse(execution.completed_at)
            : this.now().getTime();

        return Math.max(
            0,
            Math.floor((endMs - Date.parse(execution.started_at)) / 1000),
        );
    }

    private async appendCheckpoint(execution: ExecutionRecord): Promise<void> {
        const key = checkpointKey(execution.execution_id);
        const checkpoints = await this.cache.get(key) || [];

        checkpoints.push({
            count: execution.processed_records,
            at_ms: this.now().getTime(),
        });

        await this.cache.put(
            key,
            checkpoints.slice(-CHECKPOINT_BUFFER_SIZE),
            CHECKPOINT_TTL_SECONDS,
        );
    }

    private async notify(execution: ExecutionRecord): Promise<void> {
        const nowMs = this.now().getTime();
        const settledRecords =
            execution.processed_records + execution.failed_records;
        const isFinal = execution.total_batches !== null &&
            settledRecords >= execution.total_records;
        const lastMs = this.lastNotifiedAt.get(execution.execution_id);

        if (
            !isFinal &&
            lastMs !== undefined &&
            nowMs - lastMs < this.notifyIntervalMs
        ) {
            return;
        }

        this.lastNotifiedAt.set(execution.execution_id, nowMs);
        this.events.emit({
            type: 'execution.progress',
            execution_id: execution.execution_id,
            at: normalizeIsoWithMillis(this.now()),
            processed_records: execution.processed_records,
            failed_records: execution.failed_records,
            total_records: execution.total_records,
            percentage: this.getProgress(execution),
            eta_seconds: await this.getEstimatedTimeRemaining(execution),
        });
    }
}
