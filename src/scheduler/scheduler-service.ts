import { BatchDispatcher } from '../dispatch/batch-dispatcher';
import { ExecutionFinalizer } from '../dispatch/execution-finalizer';
import { ExecutionLedger } from '../executions/execution-ledger';
import {
    addDays,
    ExecutionRecord,
    normalizeIsoWithMillis,
    RescheduleExecutionRequestSchema,
} from '../executions/models';
import { RateGate } from '../gate/rate-gate';
import { describeError } from '../queue/errors';
import { TargetResolver } from '../targets/target-resolver';

export interface SchedulerServiceConfig {
    maxScheduleDaysAhead: number;
    dueBatchLimit?: number;
    now?: () => Date;
}

export interface SchedulerServiceDependencies {
    ledger: ExecutionLedger;
    resolver: TargetResolver;
    dispatcher: BatchDispatcher;
    finalizer: ExecutionFinalizer;
    gate: RateGate;
}

export interface ProcessDueSummary {
    promoted: string[];
    failed: Array<{
        execution_id: string;
        error: string;
    }>;
}

export type ScheduleTimeResult =
    | {
        success: true;
        scheduledFor: string;
    }
    | {
        success: false;
        message: string;
    };

export type SchedulerMutationResult =
    | {
        success: true;
        execution: ExecutionRecord;
    }
    | {
        success: false;
        statusCode: 400 | 404 | 409;
        error: 'invalid_request' | 'not_found' | 'scheduling_conflict';
        message: string;
    };

export function validateScheduledFor(
    raw: string,
    now: Date,
    maxDaysAhead: number,
): ScheduleTimeResult {
    const atMs = Date.parse(raw);

    if (Number.isNaN(atMs)) {
        return {
            success: false,
            message: 'scheduled_for must be an ISO timestamp',
        };
    }

    if (atMs <= now.getTime()) {
        return {
            success: false,
            message: 'scheduled_for must be in the future',
        };
    }

    if (atMs > addDays(now, maxDaysAhead).getTime()) {
        return {
            success: false,
            message:
                `scheduled_for must be within ${maxDaysAhead} days`,
        };
    }

    return {
        success: true,
        scheduledFor: normalizeIsoWithMillis(new Date(atMs)),
    };
}

function undoExpiryFrom(
    execution: ExecutionRecord,
    anchor: Date,
): string | null {
    return execution.undo_enabled
        ? normalizeIsoWithMillis(addDays(anchor, execution.undo_expiry_days))
        : null;
}

/**
 * Holds deferred executions until their activation time. Promotion is a
 * compare-and-swap out of `scheduled`, so overlapping sweeps never
 * dispatch an execution twice.
 */
export class SchedulerService {
    private readonly now: () => Date;

    private readonly dueBatchLimit: number;

    private timer: NodeJS.Timeout | null = null;

    private sweeping: Promise<ProcessDueSummary> | null = null;

    constructor(
        private readonly deps: SchedulerServiceDependencies,
        private readonly config: SchedulerServiceConfig,
    ) {
        this.now = config.now || (() => new Date());
        this.dueBatchLimit = config.dueBatchLimit || 100;
    }

    async processDue(): Promise<ProcessDueSummary> {
        const summary: ProcessDueSummary = {
            promoted: [],
            failed: [],
        };
        const due = await this.deps.ledger.listDueScheduled(
            normalizeIsoWithMillis(this.now()),
            this.dueBatchLimit,
        );

        for (const execution of due) {
            try {
                const promoted = await this.promote(execution);

                if (promoted) {
                    summary.promoted.push(execution.execution_id);
                }
            } catch (error: unknown) {
                const errorDetail = describeError(error);

                console.warn('scheduled execution activation failed', {
                    execution_id: execution.execution_id,
                    error: errorDetail,
                });
                await this.deps.finalizer.terminate(
                    execution.execution_id,
                    ['scheduled', 'pending'],
                    'failed',
                    'failed_activation_error',
                    errorDetail,
                );
                summary.failed.push({
                    execution_id: execution.execution_id,
                    error: errorDetail,
                });
            }
        }

        if (summary.promoted.length > 0 || summary.failed.length > 0) {
            console.log('scheduled executions processed', {
                promoted: summary.promoted.length,
                failed: summary.failed.length,
            });
        }

        return summary;
    }

    async cancel(
        executionId: string,
    ): Promise<SchedulerMutationResult> {
        const cancelled = await this.deps.finalizer.terminate(
            executionId,
            ['scheduled'],
            'cancelled',
            'cancelled_by_actor',
            null,
        );

        if (cancelled) {
            return {
                success: true,
                execution: cancelled,
            };
        }

        return this.conflictFor(
            executionId,
            'only scheduled executions can be cancelled by the scheduler',
        );
    }

    async reschedule(
        executionId: string,
        requestBody: unknown,
    ): Promise<SchedulerMutationResult> {
        const parsed = RescheduleExecutionRequestSchema.safeParse(requestBody);

        if (!parsed.success) {
            return {
                success: false,
                statusCode: 400,
                error: 'invalid_request',
                message: parsed.error.issues[0]?.message || 'Invalid request',
            };
        }

        const now = this.now();
        const scheduled = validateScheduledFor(
            parsed.data.scheduled_for,
            now,
            this.config.maxScheduleDaysAhead,
        );

        if (!scheduled.success) {
            return {
                success: false,
                statusCode: 400,
                error: 'invalid_request',
                message: scheduled.message,
            };
        }

        const current = await this.deps.ledger.getExecution(executionId);

        if (!current) {
            return {
                success: false,
                statusCode: 404,
                error: 'not_found',
                message: 'execution not found',
            };
        }

        const rescheduled = await this.deps.ledger.transitionExecution(
            executionId,
            ['scheduled'],
            {
                scheduled_for: scheduled.scheduledFor,
                undo_expires_at: undoExpiryFrom(
                    current,
                    new Date(scheduled.scheduledFor),
                ),
            },
            normalizeIsoWithMillis(now),
        );

        if (!rescheduled) {
            return this.conflictFor(
                executionId,
                'only scheduled executions can be rescheduled',
            );
        }

        return {
            success: true,
            execution: rescheduled,
        };
    }

    async listScheduled(actor: string): Promise<ExecutionRecord[]> {
        return this.deps.ledger.listExecutions({
            requestedBy: actor,
            statuses: ['scheduled'],
        });
    }

    async listUpcoming(
        hoursAhead: number,
        actor?: string,
    ): Promise<ExecutionRecord[]> {
        const until = new Date(
            this.now().getTime() + hoursAhead * 60 * 60 * 1000,
        );

        return this.deps.ledger.listExecutions({
            requestedBy: actor,
            statuses: ['scheduled'],
            scheduledBefore: normalizeIsoWithMillis(until),
        });
    }

    start(intervalMs: number): void {
        if (this.timer) {
            return;
        }

        this.timer = setInterval(() => {
            void this.sweep();
        }, intervalMs);
        this.timer.unref();
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        if (this.sweeping) {
            await this.sweeping;
        }
    }

    private async sweep(): Promise<void> {
        if (this.sweeping) {
            return;
        }

        this.sweeping = this.processDue();

        try {
            await this.sweeping;
        } catch (error: unknown) {
            console.error('scheduler sweep failed', {
                error: describeError(error),
            });
        } finally {
            this.sweeping = null;
        }
    }

    private async promote(execution: ExecutionRecord): Promise<boolean> {
        const total = await this.deps.resolver.count(
            execution.entity_type,
            execution.filter,
        );
        const volume = this.deps.gate.checkVolume(total);

        if (!volume.allowed) {
            throw new Error(volume.message);
        }

        const now = this.now();
        const promoted = await this.deps.ledger.transitionExecution(
            execution.execution_id,
            ['scheduled'],
            {
                status: 'pending',
                status_reason: 'queued_for_dispatch',
                total_records: total,
                undo_expires_at: undoExpiryFrom(execution, now),
            },
            normalizeIsoWithMillis(now),
        );

        if (!promoted) {
            return false;
        }

        await this.deps.dispatcher.dispatch(execution.execution_id);

        return true;
    }

    private async conflictFor(
        executionId: string,
        message: string,
    ): Promise<SchedulerMutationResult> {
        const current = await this.deps.ledger.getExecution(executionId);

        if (!current) {
            return {
                success: false,
                statusCode: 404,
                error: 'not_found',
                message: 'execution not found',
            };
        }

        return {
            success: false,
            statusCode: 409,
            error: 'scheduling_conflict',
            message,
        };
    }
}
