import { randomUUID } from 'node:crypto';
import { ActionRegistry, ActionSummary } from '../actions/action-registry';
import { AuthorizationPolicy } from '../auth/authorization-policy';
import { BULK_EXECUTION_SCHEMA_VERSION } from '../constants';
import { BatchDispatcher } from '../dispatch/batch-dispatcher';
import { ExecutionFinalizer } from '../dispatch/execution-finalizer';
import { MemoryMonitor } from '../dispatch/memory-monitor';
import {
    LifecycleEventSink,
    NoopLifecycleEventSink,
} from '../events/lifecycle-events';
import { GateDenyReason, RateGate } from '../gate/rate-gate';
import {
    ProgressDetails,
    ProgressTracker,
} from '../progress/progress-tracker';
import { describeError } from '../queue/errors';
import {
    SchedulerMutationResult,
    SchedulerService,
    validateScheduledFor,
} from '../scheduler/scheduler-service';
import { FilterSpec } from '../targets/filter';
import { StoredRecord } from '../targets/record-store';
import { TargetResolver } from '../targets/target-resolver';
import { UndoManager, UndoResult } from '../undo/undo-manager';
import { ExecutionLedger } from './execution-ledger';
import {
    addDays,
    BatchRecord,
    ExecutionRecord,
    isTerminalExecutionStatus,
    normalizeIsoWithMillis,
    PreviewExecutionRequestSchema,
    SubmitExecutionRequestSchema,
} from './models';

export interface ExecutionServiceDependencies {
    ledger: ExecutionLedger;
    resolver: TargetResolver;
    registry: ActionRegistry;
    authorization: AuthorizationPolicy;
    gate: RateGate;
    monitor: MemoryMonitor;
    dispatcher: BatchDispatcher;
    scheduler: SchedulerService;
    finalizer: ExecutionFinalizer;
    tracker: ProgressTracker;
    undoManager: UndoManager;
    events?: LifecycleEventSink;
}

export interface ExecutionServiceConfig {
    defaultBatchSize: number;
    undoDefaultExpiryDays: number;
    undoMaxExpiryDays: number;
    previewLimit: number;
    maxScheduleDaysAhead: number;
    now?: () => Date;
}

export type ExecutionFailure = {
    success: false;
    statusCode: 400 | 403 | 404 | 409 | 429;
    error:
        | 'spec_invalid'
        | 'unauthorized'
        | 'rate_limited'
        | 'undo_unavailable'
        | 'scheduling_conflict'
        | 'already_terminal'
        | 'not_found'
        | 'invalid_request';
    message: string;
    reason?: string;
    retry_after_seconds?: number;
};

export interface UndoStatus {
    can_undo: boolean;
    time_remaining_seconds: number | null;
    undoable_records: number;
}

export interface PreviewPayload {
    entity_type: string;
    filter: FilterSpec;
    total: number;
    sample: StoredRecord[];
}

export type SubmitExecutionResult =
    | {
        success: true;
        statusCode: 200 | 201 | 202;
        dry_run: false;
        execution: ExecutionRecord;
    }
    | ({
        success: true;
        statusCode: 200;
        dry_run: true;
    } & PreviewPayload)
    | ExecutionFailure;

export type PreviewExecutionResult =
    | ({
        success: true;
    } & PreviewPayload)
    | ExecutionFailure;

export type ExecutionStatusResult =
    | {
        success: true;
        execution: ExecutionRecord;
        progress: ProgressDetails;
        undo: UndoStatus;
    }
    | ExecutionFailure;

export type CancelExecutionResult =
    | {
        success: true;
        execution: ExecutionRecord;
    }
    | ExecutionFailure;

export type ListBatchesResult =
    | {
        success: true;
        batches: BatchRecord[];
    }
    | ExecutionFailure;

interface ValidatedTarget {
    entityType: string;
    filter: FilterSpec;
}

function notFound(): ExecutionFailure {
    return {
        success: false,
        statusCode: 404,
        error: 'not_found',
        message: 'execution not found',
    };
}

function specInvalid(message: string): ExecutionFailure {
    return {
        success: false,
        statusCode: 400,
        error: 'spec_invalid',
        message,
    };
}

function rateLimited(
    reason: GateDenyReason,
    message: string,
    retryAfterSeconds: number | null,
): ExecutionFailure {
    const failure: ExecutionFailure = {
        success: false,
        statusCode: 429,
        error: 'rate_limited',
        reason,
        message,
    };

    if (retryAfterSeconds !== null) {
        failure.retry_after_seconds = retryAfterSeconds;
    }

    return failure;
}

function fromSchedulerResult(
    result: SchedulerMutationResult,
): CancelExecutionResult {
    if (result.success) {
        return result;
    }

    return {
        success: false,
        statusCode: result.statusCode,
        error: result.error,
        message: result.message,
    };
}

/**
 * Entry point for callers. Every synchronous failure is returned before
 * any row is written; work after admission runs in the background and is
 * observed through `getStatus`.
 */
export class ExecutionService {
    private readonly events: LifecycleEventSink;

    private readonly now: () => Date;

    private readonly inflight = new Set<Promise<void>>();

    constructor(
        private readonly deps: ExecutionServiceDependencies,
        private readonly config: ExecutionServiceConfig,
    ) {
        this.events = deps.events || new NoopLifecycleEventSink();
        this.now = config.now || (() => new Date());
    }

    async submit(
        requestBody: unknown,
        actor: string,
    ): Promise<SubmitExecutionResult> {
        const parsed = SubmitExecutionRequestSchema.safeParse(requestBody);

        if (!parsed.success) {
            return specInvalid(
                parsed.error.issues[0]?.message || 'Invalid request',
            );
        }

        const request = parsed.data;
        const target = await this.validateTarget(
            request.entity_type,
            request.filter,
        );

        if ('success' in target) {
            return target;
        }

        const action = this.deps.registry.get(request.action);

        if (!action) {
            return specInvalid(`unknown action: ${request.action}`);
        }

        const parameters = action.parseParameters(request.parameters);

        if (!parameters.success) {
            return specInvalid(parameters.message);
        }

        const undoExpiryDays = request.undo_expiry_days ??
            this.config.undoDefaultExpiryDays;

        if (undoExpiryDays > this.config.undoMaxExpiryDays) {
            return specInvalid(
                `undo_expiry_days must not exceed ${this.config.undoMaxExpiryDays}`,
            );
        }

        const now = this.now();
        let scheduledFor: string | null = null;

        if (request.scheduled_for !== undefined) {
            const scheduled = validateScheduledFor(
                request.scheduled_for,
                now,
                this.config.maxScheduleDaysAhead,
            );

            if (!scheduled.success) {
                return specInvalid(scheduled.message);
            }

            scheduledFor = scheduled.scheduledFor;
        }

        const allowed = await this.deps.authorization.isAllowed({
            actor,
            action: action.name,
            entityType: target.entityType,
        });

        if (!allowed) {
            return {
                success: false,
                statusCode: 403,
                error: 'unauthorized',
                message:
                    `actor may not run ${action.name} on ${target.entityType}`,
            };
        }

        if (request.dry_run) {
            return {
                success: true,
                statusCode: 200,
                dry_run: true,
                ...await this.buildPreview(target, this.config.previewLimit),
            };
        }

        const admitted = await this.deps.gate.withAdmissionLock(
            actor,
            async (): Promise<ExecutionRecord | ExecutionFailure> => {
                const admission = await this.deps.gate.attempt(actor);

                if (!admission.allowed) {
                    return rateLimited(
                        admission.reason,
                        admission.message,
                        admission.retryAfterSeconds,
                    );
                }

                const total = await this.deps.resolver.count(
                    target.entityType,
                    target.filter,
                );
                const volume = this.deps.gate.checkVolume(total);

                if (!volume.allowed) {
                    return rateLimited(
                        volume.reason,
                        volume.message,
                        volume.retryAfterSeconds,
                    );
                }

                const nowIso = normalizeIsoWithMillis(now);
                const undoEnabled = request.undo_enabled &&
                    action.undoOperation !== null;
                const undoAnchor = scheduledFor ? new Date(scheduledFor) : now;
                const completedImmediately = scheduledFor === null &&
                    total === 0;
                const execution: ExecutionRecord = {
                    schema_version: BULK_EXECUTION_SCHEMA_VERSION,
                    execution_id: `exe_${randomUUID()}`,
                    entity_type: target.entityType,
                    filter: target.filter,
                    action_name: action.name,
                    parameters: parameters.parameters,
                    batch_size: this.deps.monitor.clampBatchSize(
                        request.batch_size ?? this.config.defaultBatchSize,
                    ),
                    total_records: total,
                    dispatched_records: 0,
                    total_batches: completedImmediately ? 0 : null,
                    processed_records: 0,
                    failed_records: 0,
                    status: scheduledFor
                        ? 'scheduled'
                        : completedImmediately ? 'completed' : 'pending',
                    status_reason: scheduledFor
                        ? 'awaiting_schedule'
                        : completedImmediately
                            ? 'completed_no_matches'
                            : 'queued_for_dispatch',
                    undo_enabled: undoEnabled,
                    undo_expiry_days: undoExpiryDays,
                    undo_expires_at: undoEnabled
                        ? normalizeIsoWithMillis(
                            addDays(undoAnchor, undoExpiryDays),
                        )
                        : null,
                    undone_at: null,
                    undone_by: null,
                    scheduled_for: scheduledFor,
                    requested_by: actor,
                    requested_at: nowIso,
                    started_at: completedImmediately ? nowIso : null,
                    completed_at: completedImmediately ? nowIso : null,
                    updated_at: nowIso,
                    error_detail: null,
                };

                await this.deps.ledger.createExecution(execution);
                await this.deps.gate.recordAdmission(actor, total);

                return execution;
            },
        );

        if ('success' in admitted) {
            return admitted;
        }

        const execution = admitted;
        const total = execution.total_records;
        const completedImmediately = execution.status === 'completed';
        const nowIso = execution.requested_at;

        console.log('bulk execution submitted', {
            execution_id: execution.execution_id,
            entity_type: execution.entity_type,
            action: execution.action_name,
            total_records: total,
            status: execution.status,
            requested_by: actor,
        });

        if (completedImmediately) {
            this.events.emit({
                type: 'execution.completed',
                execution_id: execution.execution_id,
                at: nowIso,
                status_reason: 'completed_no_matches',
                processed_records: 0,
                failed_records: 0,
                total_records: 0,
            });

            return {
                success: true,
                statusCode: 201,
                dry_run: false,
                execution,
            };
        }

        if (execution.status === 'pending') {
            this.dispatchInBackground(execution.execution_id);
        }

        return {
            success: true,
            statusCode: 202,
            dry_run: false,
            execution,
        };
    }

    async preview(
        requestBody: unknown,
        actor: string,
    ): Promise<PreviewExecutionResult> {
        const parsed = PreviewExecutionRequestSchema.safeParse(requestBody);

        if (!parsed.success) {
            return specInvalid(
                parsed.error.issues[0]?.message || 'Invalid request',
            );
        }

        const request = parsed.data;
        const target = await this.validateTarget(
            request.entity_type,
            request.filter,
        );

        if ('success' in target) {
            return target;
        }

        if (request.action !== undefined) {
            const action = this.deps.registry.get(request.action);

            if (!action) {
                return specInvalid(`unknown action: ${request.action}`);
            }

            const parameters = action.parseParameters(request.parameters);

            if (!parameters.success) {
                return specInvalid(parameters.message);
            }

            const allowed = await this.deps.authorization.isAllowed({
                actor,
                action: action.name,
                entityType: target.entityType,
            });

            if (!allowed) {
                return {
                    success: false,
                    statusCode: 403,
                    error: 'unauthorized',
                    message:
                        `actor may not run ${action.name} on ` +
                        `${target.entityType}`,
                };
            }
        }

        const limit = Math.min(
            request.limit ?? this.config.previewLimit,
            this.config.previewLimit,
        );

        return {
            success: true,
            ...await this.buildPreview(target, limit),
        };
    }

    async getStatus(executionId: string): Promise<ExecutionStatusResult> {
        const execution = await this.deps.ledger.getExecution(executionId);

        if (!execution) {
            return notFound();
        }

        const undoableRecords = await this.deps.undoManager.getUndoableCount(
            executionId,
        );

        return {
            success: true,
            execution,
            progress: await this.deps.tracker.getDetails(execution),
            undo: {
                can_undo: this.deps.undoManager.canUndo(
                    execution,
                    undoableRecords,
                ),
                time_remaining_seconds:
                    this.deps.undoManager.getTimeRemaining(execution),
                undoable_records: undoableRecords,
            },
        };
    }

    /**
     * Scheduled executions are withdrawn before they ever dispatch. Running
     * ones stop at the next record; batches already settled keep their
     * counts.
     */
    async cancel(
        executionId: string,
        actor: string,
    ): Promise<CancelExecutionResult> {
        const execution = await this.deps.ledger.getExecution(executionId);

        if (!execution) {
            return notFound();
        }

        const denied = await this.authorizeExisting(execution, actor);

        if (denied) {
            return denied;
        }

        if (execution.status === 'scheduled') {
            return fromSchedulerResult(
                await this.deps.scheduler.cancel(executionId),
            );
        }

        const cancelled = isTerminalExecutionStatus(execution.status)
            ? null
            : await this.deps.finalizer.terminate(
                executionId,
                ['pending', 'processing'],
                'cancelled',
                'cancelled_by_actor',
                null,
            );

        if (!cancelled) {
            return {
                success: false,
                statusCode: 409,
                error: 'already_terminal',
                message: 'execution has already finished',
            };
        }

        console.log('bulk execution cancelled', {
            execution_id: executionId,
            cancelled_by: actor,
        });

        return {
            success: true,
            execution: cancelled,
        };
    }

    async undo(
        executionId: string,
        actor: string,
    ): Promise<UndoResult | ExecutionFailure> {
        const execution = await this.deps.ledger.getExecution(executionId);

        if (!execution) {
            return notFound();
        }

        const denied = await this.authorizeExisting(execution, actor);

        if (denied) {
            return denied;
        }

        return this.deps.undoManager.undo(executionId, actor);
    }

    async listScheduled(actor: string): Promise<ExecutionRecord[]> {
        return this.deps.scheduler.listScheduled(actor);
    }

    async reschedule(
        executionId: string,
        requestBody: unknown,
        actor: string,
    ): Promise<CancelExecutionResult> {
        const execution = await this.deps.ledger.getExecution(executionId);

        if (!execution) {
            return notFound();
        }

        const denied = await this.authorizeExisting(execution, actor);

        if (denied) {
            return denied;
        }

        return fromSchedulerResult(
            await this.deps.scheduler.reschedule(executionId, requestBody),
        );
    }

    async listBatches(executionId: string): Promise<ListBatchesResult> {
        const execution = await this.deps.ledger.getExecution(executionId);

        if (!execution) {
            return notFound();
        }

        return {
            success: true,
            batches: await this.deps.ledger.listBatches(executionId),
        };
    }

    listActions(): ActionSummary[] {
        return this.deps.registry.list();
    }

    /** Resolves once every background dispatch has returned. */
    async drain(): Promise<void> {
        while (this.inflight.size > 0) {
            await Promise.all(Array.from(this.inflight));
        }
    }

    private dispatchInBackground(executionId: string): void {
        const running: Promise<void> = this.deps.dispatcher.dispatch(executionId)
            .then(() => undefined)
            .catch((error: unknown) => {
                console.error('bulk dispatch crashed', {
                    execution_id: executionId,
                    error: describeError(error),
                });
            })
            .finally(() => {
                this.inflight.delete(running);
            });

        this.inflight.add(running);
    }

    private async validateTarget(
        entityType: string,
        rawFilter: unknown,
    ): Promise<ValidatedTarget | ExecutionFailure> {
        const target = await this.deps.resolver.parseTarget(
            entityType,
            rawFilter,
        );

        if (!target.success) {
            return specInvalid(target.message);
        }

        return {
            entityType: target.entityType,
            filter: target.filter,
        };
    }

    private async buildPreview(
        target: ValidatedTarget,
        limit: number,
    ): Promise<PreviewPayload> {
        return {
            entity_type: target.entityType,
            filter: target.filter,
            total: await this.deps.resolver.count(
                target.entityType,
                target.filter,
            ),
            sample: await this.deps.resolver.sample(
                target.entityType,
                target.filter,
                limit,
            ),
        };
    }

    private async authorizeExisting(
        execution: ExecutionRecord,
        actor: string,
    ): Promise<ExecutionFailure | null> {
        const allowed = await this.deps.authorization.isAllowed({
            actor,
            action: execution.action_name,
            entityType: execution.entity_type,
        });

        if (allowed) {
            return null;
        }

        return {
            success: false,
            statusCode: 403,
            error: 'unauthorized',
            message:
                `actor may not manage ${execution.action_name} on ` +
                `${execution.entity_type}`,
        };
    }
}
