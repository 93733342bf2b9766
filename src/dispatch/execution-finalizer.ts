import {
    LifecycleEventSink,
    NoopLifecycleEventSink,
} from '../events/lifecycle-events';
import { ExecutionLedger } from '../executions/execution-ledger';
import {
    ExecutionRecord,
    ExecutionStatus,
    ExecutionStatusReason,
    isTerminalExecutionStatus,
    normalizeIsoWithMillis,
} from '../executions/models';
import { ProgressTracker } from '../progress/progress-tracker';

export interface ExecutionFinalizerOptions {
    failureThresholdPercent: number;
    events?: LifecycleEventSink;
    now?: () => Date;
}

export type TerminalStatus = 'completed' | 'failed' | 'cancelled';

const TERMINAL_EVENT_TYPES = {
    completed: 'execution.completed',
    failed: 'execution.failed',
    cancelled: 'execution.cancelled',
} as const;

/**
 * Owns the moves into terminal statuses. Every move is a compare-and-swap
 * on the ledger, so concurrent callers settle on exactly one winner and
 * only the winner emits the lifecycle event.
 */
export class ExecutionFinalizer {
    private readonly events: LifecycleEventSink;

    private readonly now: () => Date;

    constructor(
        private readonly ledger: ExecutionLedger,
        private readonly tracker: ProgressTracker,
        private readonly options: ExecutionFinalizerOptions,
    ) {
        this.events = options.events || new NoopLifecycleEventSink();
        this.now = options.now || (() => new Date());
    }

    /**
     * Completes or fails the execution once dispatch is finalized and no
     * batch is outstanding. Returns the terminal row when this call made
     * the move.
     */
    async finalizeIfDone(executionId: string): Promise<ExecutionRecord | null> {
        const dispatched = await this.ledger.getExecution(executionId);

        if (
            !dispatched ||
            dispatched.total_batches === null ||
            isTerminalExecutionStatus(dispatched.status)
        ) {
            return null;
        }

        if (await this.ledger.countOutstandingBatches(executionId) > 0) {
            return null;
        }

        // Counters are read after the count: a batch settling in between
        // must be part of the decision.
        const execution = await this.ledger.getExecution(executionId);

        if (!execution || isTerminalExecutionStatus(execution.status)) {
            return null;
        }

        const total = execution.total_records;
        const failed = execution.failed_records;
        const failedPercent = total > 0 ? (failed * 100) / total : 0;

        if (failed > 0 && failedPercent > this.options.failureThresholdPercent) {
            return this.terminate(
                executionId,
                ['pending', 'processing'],
                'failed',
                'failed_threshold_exceeded',
                `${failed} of ${total} records failed`,
            );
        }

        return this.terminate(
            executionId,
            ['pending', 'processing'],
            'completed',
            failed > 0 ? 'completed_with_failures' : 'completed_all_batches',
            null,
        );
    }

    async terminate(
        executionId: string,
        expected: readonly ExecutionStatus[],
        status: TerminalStatus,
        reason: ExecutionStatusReason,
        errorDetail: string | null,
    ): Promise<ExecutionRecord | null> {
        const nowIso = normalizeIsoWithMillis(this.now());
        const terminated = await this.ledger.transitionExecution(
            executionId,
            expected,
            {
                status,
                status_reason: reason,
                completed_at: nowIso,
                error_detail: errorDetail,
            },
            nowIso,
        );

        if (!terminated) {
            return null;
        }

        await this.tracker.clear(executionId);
        this.events.emit({
            type: TERMINAL_EVENT_TYPES[status],
            execution_id: executionId,
            at: nowIso,
            status_reason: reason,
            processed_records: terminated.processed_records,
            failed_records: terminated.failed_records,
            total_records: terminated.total_records,
        });

        return terminated;
    }
}
