import { randomUUID } from 'node:crypto';
import {
    LifecycleEventSink,
    NoopLifecycleEventSink,
} from '../events/lifecycle-events';
import { ExecutionLedger } from '../executions/execution-ledger';
import {
    ExecutionRecord,
    normalizeIsoWithMillis,
    SnapshotRecord,
    UndoOperationType,
} from '../executions/models';
import { RecordStore, StoredRecord } from '../targets/record-store';
import { CapturedState, SnapshotCodec } from './snapshot-codec';

export type ActionEffect =
    | 'deleted'
    | 'reinstated'
    | 'fields_updated'
    | 'destroyed';

export type UndoIneligibleReason =
    | 'already_undone'
    | 'never_enabled'
    | 'expired'
    | 'not_completed'
    | 'nothing_to_undo';

export type UndoResult =
    | {
        success: true;
        execution: ExecutionRecord;
        restored_records: number;
        failed_records: number;
    }
    | {
        success: false;
        statusCode: 404 | 409;
        error: 'not_found' | 'undo_unavailable';
        reason?: UndoIneligibleReason;
        message: string;
    };

export interface UndoManagerOptions {
    codec?: SnapshotCodec;
    events?: LifecycleEventSink;
    now?: () => Date;
    restorePageSize?: number;
}

const EFFECT_UNDO_OPERATIONS: Record<ActionEffect, UndoOperationType> = {
    deleted: 'reinstate_deleted',
    reinstated: 'delete_again',
    fields_updated: 'revert_fields',
    destroyed: 'recreate_from_scratch',
};

const INELIGIBLE_MESSAGES: Record<UndoIneligibleReason, string> = {
    already_undone: 'execution has already been undone',
    never_enabled: 'undo was not enabled for this execution',
    expired: 'the undo window for this execution has passed',
    not_completed: 'only completed executions can be undone',
    nothing_to_undo: 'no reversible changes were captured',
};

export function undoOperationForEffect(
    effect: ActionEffect,
): UndoOperationType {
    return EFFECT_UNDO_OPERATIONS[effect];
}

function captureState(
    record: StoredRecord,
    fields: string[] | '*',
): CapturedState {
    if (fields === '*') {
        return {
            fields: { ...record.fields },
            absent: [],
            deleted_at: record.deleted_at,
        };
    }

    const captured: Record<string, unknown> = {};
    const absent: string[] = [];

    for (const field of fields) {
        if (Object.prototype.hasOwnProperty.call(record.fields, field)) {
            captured[field] = record.fields[field];
        } else {
            absent.push(field);
        }
    }

    return {
        fields: captured,
        absent,
        deleted_at: record.deleted_at,
    };
}

export class UndoManager {
    private readonly codec: SnapshotCodec;

    private readonly events: LifecycleEventSink;

    private readonly now: () => Date;

    private readonly restorePageSize: number;

    constructor(
        private readonly ledger: ExecutionLedger,
        private readonly store: RecordStore,
        options: UndoManagerOptions = {},
    ) {
        this.codec = options.codec || new SnapshotCodec();
        this.events = options.events || new NoopLifecycleEventSink();
        this.now = options.now || (() => new Date());
        this.restorePageSize = options.restorePageSize || 200;
    }

    async captureSnapshot(
        execution: ExecutionRecord,
        record: StoredRecord,
        undoOperation: UndoOperationType,
        fields: string[] | '*',
    ): Promise<boolean> {
        const snapshot: SnapshotRecord = {
            snapshot_id: `snap_${randomUUID()}`,
            execution_id: execution.execution_id,
            entity_type: execution.entity_type,
            record_id: record.id,
            undo_operation: undoOperation,
            captured_fields: this.codec.encode(captureState(record, fields)),
            undone: false,
            undone_at: null,
            undone_by: null,
            created_at: normalizeIsoWithMillis(this.now()),
        };

        return this.ledger.saveSnapshot(snapshot);
    }

    async discardSnapshot(
        executionId: string,
        recordId: string,
    ): Promise<void> {
        await this.ledger.deleteSnapshot(executionId, recordId);
    }

    checkEligibility(
        execution: ExecutionRecord,
        snapshotCount: number,
    ): UndoIneligibleReason | null {
        if (execution.undone_at !== null) {
            return 'already_undone';
        }

        if (execution.undo_expires_at === null) {
            return 'never_enabled';
        }

        if (
            !execution.undo_enabled ||
            execution.undo_expires_at <= normalizeIsoWithMillis(this.now())
        ) {
            return 'expired';
        }

        if (execution.status !== 'completed') {
            return 'not_completed';
        }

        if (snapshotCount === 0) {
            return 'nothing_to_undo';
        }

        return null;
    }

    canUndo(execution: ExecutionRecord, snapshotCount: number): boolean {
        return this.checkEligibility(execution, snapshotCount) === null;
    }

    /** Seconds left in the undo window, or null when there is no window. */
    getTimeRemaining(execution: ExecutionRecord): number | null {
        if (
            !execution.undo_enabled ||
            execution.undo_expires_at === null ||
            execution.undone_at !== null
        ) {
            return null;
        }

        const remainingMs =
            Date.parse(execution.undo_expires_at) - this.now().getTime();

        return Math.max(0, Math.floor(remainingMs / 1000));
    }

    async getUndoableCount(executionId: string): Promise<number> {
        return this.ledger.countUndoableSnapshots(executionId);
    }

    async undo(executionId: string, actor: string): Promise<UndoResult> {
        const execution = await this.ledger.getExecution(executionId);

        if (!execution) {
            return {
                success: false,
                statusCode: 404,
                error: 'not_found',
                message: 'execution not found',
            };
        }

        const snapshotCount = await this.getUndoableCount(executionId);
        const ineligible = this.checkEligibility(execution, snapshotCount);

        if (ineligible) {
            return this.unavailable(ineligible);
        }

        const nowIso = normalizeIsoWithMillis(this.now());
        const claimed = await this.ledger.claimUndo(executionId, nowIso, actor);

        if (!claimed) {
            const current = await this.ledger.getExecution(executionId);
            const reason = current
                ? this.checkEligibility(current, snapshotCount)
                : null;

            return this.unavailable(reason || 'already_undone');
        }

        let restored = 0;
        let failed = 0;
        let afterRecordId: string | null = null;

        while (true) {
            const page: SnapshotRecord[] = await this.ledger.listPendingSnapshots(
                executionId,
                {
                    afterRecordId,
                    limit: this.restorePageSize,
                },
            );

            if (page.length === 0) {
                break;
            }

            for (const snapshot of page) {
                try {
                    await this.restoreRecord(snapshot);
                    await this.ledger.markSnapshotUndone(
                        snapshot.snapshot_id,
                        normalizeIsoWithMillis(this.now()),
                        actor,
                    );
                    restored += 1;
                } catch (error: unknown) {
                    failed += 1;
                    console.warn('undo restore failed', {
                        execution_id: executionId,
                        record_id: snapshot.record_id,
                        undo_operation: snapshot.undo_operation,
                        error: error instanceof Error
                            ? error.message
                            : String(error),
                    });
                }
            }

            if (page.length < this.restorePageSize) {
                break;
            }

            afterRecordId = page[page.length - 1].record_id;
        }

        this.events.emit({
            type: 'execution.undone',
            execution_id: executionId,
            at: normalizeIsoWithMillis(this.now()),
            undone_by: actor,
            restored_records: restored,
            failed_records: failed,
        });

        return {
            success: true,
            execution: claimed,
            restored_records: restored,
            failed_records: failed,
        };
    }

    private async restoreRecord(snapshot: SnapshotRecord): Promise<void> {
        const state = this.codec.decode(snapshot.captured_fields);
        const entityType = snapshot.entity_type;
        const recordId = snapshot.record_id;

        switch (snapshot.undo_operation) {
            case 'reinstate_deleted':
                if (!await this.store.restore(entityType, recordId)) {
                    throw new Error(`record ${recordId} is not deleted`);
                }

                return;
            case 'delete_again': {
                const deleted = await this.store.softDelete(
                    entityType,
                    recordId,
                    state.deleted_at || normalizeIsoWithMillis(this.now()),
                );

                if (!deleted) {
                    throw new Error(`record ${recordId} is not live`);
                }

                return;
            }
            case 'revert_fields':
                if (!await this.store.update(
                    entityType,
                    recordId,
                    state.fields,
                    state.absent,
                )) {
                    throw new Error(`record ${recordId} no longer exists`);
                }

                return;
            case 'recreate_from_scratch':
                await this.store.insert(entityType, {
                    id: recordId,
                    fields: state.fields,
                    deleted_at: state.deleted_at,
                });

                return;
        }
    }

    private unavailable(reason: UndoIneligibleReason): UndoResult {
        return {
            success: false,
            statusCode: 409,
            error: 'undo_unavailable',
            reason,
            message: INELIGIBLE_MESSAGES[reason],
        };
    }
}
