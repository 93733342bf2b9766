import { ExecutionLedger } from '../executions/execution-ledger';
import {
    ExecutionRecord,
    isActiveExecutionStatus,
    normalizeIsoWithMillis,
} from '../executions/models';
import { ProgressTracker } from '../progress/progress-tracker';
import { describeError } from '../queue/errors';
import { BatchJob, WorkQueue } from '../queue/work-queue';
import { TargetResolver } from '../targets/target-resolver';
import { ExecutionFinalizer } from './execution-finalizer';
import { MemoryMonitor } from './memory-monitor';

export interface BatchDispatcherDependencies {
    ledger: ExecutionLedger;
    resolver: TargetResolver;
    queue: WorkQueue<BatchJob>;
    tracker: ProgressTracker;
    finalizer: ExecutionFinalizer;
    monitor: MemoryMonitor;
    now?: () => Date;
}

export interface DispatchSummary {
    execution: ExecutionRecord;
    total_batches: number;
    dispatched_records: number;
}

export interface RecoverySummary {
    redispatched: string[];
    requeued_batches: number;
    finalized: string[];
}

interface DispatchStart {
    sequence: number;
    afterId: string | null;
    dispatched: number;
}

const FRESH_START: DispatchStart = {
    sequence: 0,
    afterId: null,
    dispatched: 0,
};

/**
 * Splits a pending execution into batches. Ids are streamed from the
 * resolver and only the batch being filled is held in memory.
 */
export class BatchDispatcher {
    private readonly now: () => Date;

    constructor(private readonly deps: BatchDispatcherDependencies) {
        this.now = deps.now || (() => new Date());
    }

    async dispatch(executionId: string): Promise<DispatchSummary | null> {
        const execution = await this.deps.ledger.transitionExecution(
            executionId,
            ['pending'],
            { status_reason: 'dispatching' },
            this.nowIso(),
        );

        if (!execution) {
            return null;
        }

        return this.runDispatch(execution, FRESH_START);
    }

    /**
     * Picks up executions a previous process left active. Batches still
     * pending or processing go back on the queue; a dispatch that never
     * finished continues after the last batched id.
     */
    async recover(): Promise<RecoverySummary> {
        const summary: RecoverySummary = {
            redispatched: [],
            requeued_batches: 0,
            finalized: [],
        };
        const active = await this.deps.ledger.listExecutions({
            statuses: ['pending', 'processing'],
        });

        for (const execution of active) {
            const executionId = execution.execution_id;
            const batches = await this.deps.ledger.listBatches(executionId);

            for (const batch of batches) {
                if (batch.status === 'pending' || batch.status === 'processing') {
                    this.deps.queue.enqueue({
                        execution_id: executionId,
                        sequence: batch.sequence,
                    });
                    summary.requeued_batches += 1;
                }
            }

            if (execution.total_batches === null) {
                const last = batches[batches.length - 1];

                summary.redispatched.push(executionId);

                if (last) {
                    await this.runDispatch(execution, {
                        sequence: last.sequence,
                        afterId: last.record_ids[last.record_ids.length - 1],
                        dispatched: execution.dispatched_records,
                    });
                } else {
                    await this.dispatch(executionId);
                }

                continue;
            }

            if (await this.deps.finalizer.finalizeIfDone(executionId)) {
                summary.finalized.push(executionId);
            }
        }

        console.log('bulk executions recovered', {
            redispatched: summary.redispatched.length,
            requeued_batches: summary.requeued_batches,
            finalized: summary.finalized.length,
        });

        return summary;
    }

    private async runDispatch(
        execution: ExecutionRecord,
        start: DispatchStart,
    ): Promise<DispatchSummary | null> {
        const executionId = execution.execution_id;

        try {
            return await this.dispatchBatches(execution, start);
        } catch (error: unknown) {
            const errorDetail = describeError(error);

            console.error('bulk dispatch failed', {
                execution_id: executionId,
                error: errorDetail,
            });

            const failed = await this.deps.finalizer.terminate(
                executionId,
                ['pending', 'processing'],
                'failed',
                'failed_dispatch_error',
                errorDetail,
            );

            return failed
                ? {
                    execution: failed,
                    total_batches: failed.total_batches || 0,
                    dispatched_records: failed.dispatched_records,
                }
                : null;
        }
    }

    private async dispatchBatches(
        execution: ExecutionRecord,
        start: DispatchStart,
    ): Promise<DispatchSummary> {
        const executionId = execution.execution_id;
        let batchSize = this.deps.monitor.recommendBatchSize(
            execution.batch_size,
        );
        let chunk: string[] = [];
        let sequence = start.sequence;
        let dispatched = start.dispatched;
        let interrupted = false;

        await this.deps.tracker.initialize(execution);

        const flush = async (): Promise<void> => {
            sequence += 1;
            await this.deps.ledger.appendBatch(
                executionId,
                sequence,
                chunk,
                this.nowIso(),
            );
            this.deps.queue.enqueue({
                execution_id: executionId,
                sequence,
            });
            dispatched += chunk.length;
            chunk = [];
            batchSize = this.deps.monitor.recommendBatchSize(batchSize);
        };

        for await (const recordId of this.deps.resolver.streamIds(
            execution.entity_type,
            execution.filter,
            start.afterId,
        )) {
            chunk.push(recordId);

            if (chunk.length < batchSize) {
                continue;
            }

            await flush();

            if (!await this.isStillActive(executionId)) {
                interrupted = true;
                break;
            }
        }

        if (!interrupted && chunk.length > 0) {
            await flush();
        }

        const finalized = await this.deps.ledger.finalizeDispatch(
            executionId,
            sequence,
            this.nowIso(),
        );

        if (!finalized) {
            throw new Error(`execution ${executionId} disappeared`);
        }

        console.log('bulk dispatch finalized', {
            execution_id: executionId,
            total_batches: sequence,
            dispatched_records: dispatched,
            interrupted,
        });

        if (sequence === 0) {
            const completed = await this.deps.finalizer.terminate(
                executionId,
                ['pending'],
                'completed',
                'completed_no_matches',
                null,
            );

            return {
                execution: completed || finalized,
                total_batches: 0,
                dispatched_records: 0,
            };
        }

        const terminal = await this.deps.finalizer.finalizeIfDone(executionId);

        return {
            execution: terminal || finalized,
            total_batches: sequence,
            dispatched_records: dispatched,
        };
    }

    private async isStillActive(executionId: string): Promise<boolean> {
        const current = await this.deps.ledger.getExecution(executionId);

        return current !== null && isActiveExecutionStatus(current.status);
    }

    private nowIso(): string {
        return normalizeIsoWithMillis(this.now());
    }
}
