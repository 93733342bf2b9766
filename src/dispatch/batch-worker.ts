import {
    ActionContext,
    ActionRegistry,
    RegisteredAction,
} from '../actions/action-registry';
import { RecordFailurePolicy } from '../env';
import {
    LifecycleEventSink,
    NoopLifecycleEventSink,
} from '../events/lifecycle-events';
import { ExecutionLedger } from '../executions/execution-ledger';
import {
    BatchRecord,
    ExecutionRecord,
    isActiveExecutionStatus,
    normalizeIsoWithMillis,
    UndoOperationType,
} from '../executions/models';
import { ProgressTracker } from '../progress/progress-tracker';
import {
    BatchTimeoutError,
    describeError,
    isRetryableBatchError,
} from '../queue/errors';
import { BatchJob } from '../queue/work-queue';
import { RecordStore, StoredRecord } from '../targets/record-store';
import { UndoManager } from '../undo/undo-manager';
import { ExecutionFinalizer } from './execution-finalizer';

export interface BatchWorkerDependencies {
    ledger: ExecutionLedger;
    store: RecordStore;
    registry: ActionRegistry;
    tracker: ProgressTracker;
    undoManager: UndoManager;
    finalizer: ExecutionFinalizer;
    events?: LifecycleEventSink;
}

export interface BatchWorkerConfig {
    batchTimeoutMs: number;
    recordFailurePolicy: RecordFailurePolicy;
    now?: () => Date;
}

interface RecordRun {
    execution: ExecutionRecord;
    action: RegisteredAction;
    parameters: Record<string, unknown>;
    undoOperation: UndoOperationType | null;
    undoFields: string[] | '*';
    context: ActionContext;
}

type LoopOutcome = 'completed' | 'cancelled' | 'aborted' | 'lost';

/**
 * Processes one batch job from the work queue. Progress is written to the
 * batch row after every record, so a retried job resumes at the cursor.
 */
export class BatchWorker {
    private readonly events: LifecycleEventSink;

    private readonly now: () => Date;

    constructor(
        private readonly deps: BatchWorkerDependencies,
        private readonly config: BatchWorkerConfig,
    ) {
        this.events = deps.events || new NoopLifecycleEventSink();
        this.now = config.now || (() => new Date());
    }

    async handle(job: BatchJob, attempt: number): Promise<void> {
        const startedAt = this.now();
        const startedIso = normalizeIsoWithMillis(startedAt);
        const batch = await this.deps.ledger.claimBatch(
            job.execution_id,
            job.sequence,
            startedIso,
        );

        if (!batch) {
            console.log('batch already settled, skipping', {
                execution_id: job.execution_id,
                sequence: job.sequence,
                attempt,
            });

            return;
        }

        const execution = await this.activate(job.execution_id, startedIso);

        if (!execution) {
            throw new Error(`execution ${job.execution_id} not found`);
        }

        if (!isActiveExecutionStatus(execution.status)) {
            await this.settle(batch, 'cancelled', null, false);

            return;
        }

        const action = this.deps.registry.get(execution.action_name);

        if (!action) {
            await this.failWholeBatch(
                batch,
                `unknown action: ${execution.action_name}`,
            );

            return;
        }

        const parsed = action.parseParameters(execution.parameters);

        if (!parsed.success) {
            await this.failWholeBatch(batch, parsed.message);

            return;
        }

        const undoOperation = execution.undo_enabled
            ? action.undoOperation
            : null;
        const run: RecordRun = {
            execution,
            action,
            parameters: parsed.parameters,
            undoOperation,
            undoFields: undoOperation
                ? action.declareUndoFields(parsed.parameters)
                : [],
            context: {
                executionId: execution.execution_id,
                entityType: execution.entity_type,
                actor: execution.requested_by,
                store: this.deps.store,
                now: this.now,
            },
        };
        const deadlineMs = startedAt.getTime() + this.config.batchTimeoutMs;
        const loop = await this.processRecords(batch, run, deadlineMs);

        switch (loop.outcome) {
            case 'lost':
                return;
            case 'cancelled':
                await this.settle(batch, 'cancelled', null, false);

                return;
            case 'aborted':
                await this.settle(batch, 'failed', loop.error, true, false);
                await this.deps.finalizer.terminate(
                    batch.execution_id,
                    ['pending', 'processing'],
                    'failed',
                    'failed_record_aborted',
                    loop.error,
                );

                return;
            case 'completed':
                await this.settle(batch, 'completed', null, false);
        }
    }

    /**
     * Dead-letter path: the job is out of attempts. Every record the batch
     * did not get to counts as failed.
     */
    async handleDeadLetter(
        job: BatchJob,
        error: unknown,
        attempts: number,
    ): Promise<void> {
        const errorDetail = describeError(error);

        console.error('batch dead-lettered', {
            execution_id: job.execution_id,
            sequence: job.sequence,
            attempts,
            error: errorDetail,
        });

        let batch = await this.deps.ledger.getBatch(
            job.execution_id,
            job.sequence,
        );

        if (batch && batch.status === 'pending') {
            batch = await this.deps.ledger.claimBatch(
                job.execution_id,
                job.sequence,
                normalizeIsoWithMillis(this.now()),
            );
        }

        if (!batch || batch.status !== 'processing') {
            return;
        }

        await this.settle(batch, 'failed', errorDetail, true);
    }

    private async activate(
        executionId: string,
        startedIso: string,
    ): Promise<ExecutionRecord | null> {
        const moved = await this.deps.ledger.transitionExecution(
            executionId,
            ['pending'],
            {
                status: 'processing',
                status_reason: 'processing_batches',
                started_at: startedIso,
            },
            startedIso,
        );

        if (!moved) {
            return this.deps.ledger.getExecution(executionId);
        }

        this.events.emit({
            type: 'execution.started',
            execution_id: executionId,
            at: startedIso,
        });

        return moved;
    }

    private async processRecords(
        batch: BatchRecord,
        run: RecordRun,
        deadlineMs: number,
    ): Promise<{ outcome: LoopOutcome; error: string | null }> {
        const remainingIds = batch.record_ids.slice(batch.cursor);
        const records = new Map<string, StoredRecord>();

        for (const record of await this.deps.store.getMany(
            run.execution.entity_type,
            remainingIds,
        )) {
            records.set(record.id, record);
        }

        for (let index = batch.cursor; index < batch.size; index += 1) {
            const current = await this.deps.ledger.getExecution(
                batch.execution_id,
            );

            if (!current || !isActiveExecutionStatus(current.status)) {
                return { outcome: 'cancelled', error: null };
            }

            if (this.now().getTime() > deadlineMs) {
                throw new BatchTimeoutError(
                    batch.execution_id,
                    batch.sequence,
                    this.config.batchTimeoutMs,
                );
            }

            const recordId = batch.record_ids[index];
            const failure = await this.processRecord(
                recordId,
                records.get(recordId) || null,
                run,
            );
            const progressed = await this.deps.ledger.recordBatchProgress(
                batch.execution_id,
                batch.sequence,
                failure === null
                    ? {
                        cursor: index + 1,
                        processed: 1,
                        failed: 0,
                        failedIds: [],
                    }
                    : {
                        cursor: index + 1,
                        processed: 0,
                        failed: 1,
                        failedIds: [recordId],
                        errorDetail: `${recordId}: ${failure}`,
                    },
            );

            if (!progressed) {
                return { outcome: 'lost', error: null };
            }

            if (failure !== null && this.config.recordFailurePolicy === 'abort') {
                return {
                    outcome: 'aborted',
                    error: `${recordId}: ${failure}`,
                };
            }
        }

        return { outcome: 'completed', error: null };
    }

    /** Returns the failure message, or null when the record was applied. */
    private async processRecord(
        recordId: string,
        record: StoredRecord | null,
        run: RecordRun,
    ): Promise<string | null> {
        if (!record) {
            return 'record not found';
        }

        let captured = false;

        if (run.undoOperation) {
            captured = await this.deps.undoManager.captureSnapshot(
                run.execution,
                record,
                run.undoOperation,
                run.undoFields,
            );
        }

        try {
            await run.action.execute(record, run.parameters, run.context);

            return null;
        } catch (error: unknown) {
            // Retryable errors fail the attempt, not the record; the
            // snapshot stays as the pre-mutation state for the retry.
            if (isRetryableBatchError(error)) {
                throw error;
            }

            if (captured) {
                await this.deps.undoManager.discardSnapshot(
                    run.execution.execution_id,
                    recordId,
                );
            }

            return describeError(error);
        }
    }

    private async failWholeBatch(
        batch: BatchRecord,
        errorDetail: string,
    ): Promise<void> {
        console.warn('batch cannot run', {
            execution_id: batch.execution_id,
            sequence: batch.sequence,
            error: errorDetail,
        });
        await this.settle(batch, 'failed', errorDetail, true);
    }

    private async settle(
        batch: BatchRecord,
        status: 'completed' | 'failed' | 'cancelled',
        errorDetail: string | null,
        remainingAsFailed: boolean,
        finalize = true,
    ): Promise<void> {
        const settled = await this.deps.tracker.update({
            executionId: batch.execution_id,
            sequence: batch.sequence,
            status,
            errorDetail,
            completedAt: normalizeIsoWithMillis(this.now()),
            remainingAsFailed,
        });

        if (!settled || !finalize) {
            return;
        }

        await this.deps.finalizer.finalizeIfDone(batch.execution_id);
    }
}
