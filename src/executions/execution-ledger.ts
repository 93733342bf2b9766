import {
    BatchRecord,
    ExecutionPatch,
    ExecutionRecord,
    ExecutionStatus,
    isActiveExecutionStatus,
    isTerminalExecutionStatus,
    SnapshotRecord,
} from './models';

export interface ListExecutionsQuery {
    requestedBy?: string;
    statuses?: ExecutionStatus[];
    scheduledAfter?: string;
    scheduledBefore?: string;
    limit?: number;
}

export interface BatchProgressDelta {
    cursor: number;
    processed: number;
    failed: number;
    failedIds: string[];
    errorDetail?: string | null;
}

export type SettledBatchStatus = 'completed' | 'failed' | 'cancelled';

export interface SettleBatchInput {
    executionId: string;
    sequence: number;
    status: SettledBatchStatus;
    errorDetail: string | null;
    completedAt: string;
    remainingAsFailed: boolean;
}

export interface SettleBatchResult {
    batch: BatchRecord;
    execution: ExecutionRecord;
}

export interface SnapshotPageQuery {
    afterRecordId: string | null;
    limit: number;
}

/**
 * Durable record of executions, their batches and the snapshots captured
 * for undo. Counter and status writes are atomic per call. Batch progress
 * moves the execution counters in the same write, so settling a batch only
 * adds the records it gives up on. Status writes
 * are compare-and-swap against the expected prior statuses and return null
 * when the row is not in one of them.
 */
export interface ExecutionLedger {
    createExecution(record: ExecutionRecord): Promise<void>;
    getExecution(executionId: string): Promise<ExecutionRecord | null>;
    listExecutions(query: ListExecutionsQuery): Promise<ExecutionRecord[]>;
    countActiveForActor(actor: string): Promise<number>;
    transitionExecution(
        executionId: string,
        expected: readonly ExecutionStatus[],
        patch: ExecutionPatch,
        updatedAt: string,
    ): Promise<ExecutionRecord | null>;
    appendBatch(
        executionId: string,
        sequence: number,
        recordIds: string[],
        updatedAt: string,
    ): Promise<BatchRecord>;
    finalizeDispatch(
        executionId: string,
        totalBatches: number,
        updatedAt: string,
    ): Promise<ExecutionRecord | null>;
    getBatch(executionId: string, sequence: number): Promise<BatchRecord | null>;
    listBatches(executionId: string): Promise<BatchRecord[]>;
    claimBatch(
        executionId: string,
        sequence: number,
        startedAt: string,
    ): Promise<BatchRecord | null>;
    recordBatchProgress(
        executionId: string,
        sequence: number,
        delta: BatchProgressDelta,
    ): Promise<BatchRecord | null>;
    settleBatch(input: SettleBatchInput): Promise<SettleBatchResult | null>;
    countOutstandingBatches(executionId: string): Promise<number>;
    saveSnapshot(snapshot: SnapshotRecord): Promise<boolean>;
    deleteSnapshot(executionId: string, recordId: string): Promise<void>;
    listPendingSnapshots(
        executionId: string,
        query: SnapshotPageQuery,
    ): Promise<SnapshotRecord[]>;
    markSnapshotUndone(
        snapshotId: string,
        undoneAt: string,
        undoneBy: string,
    ): Promise<void>;
    countUndoableSnapshots(executionId: string): Promise<number>;
    deleteSnapshots(executionId: string): Promise<number>;
    claimUndo(
        executionId: string,
        nowIso: string,
        actor: string,
    ): Promise<ExecutionRecord | null>;
    listDueScheduled(nowIso: string, limit: number): Promise<ExecutionRecord[]>;
    listExpiredUndoWindows(
        nowIso: string,
        limit: number,
    ): Promise<ExecutionRecord[]>;
    listPurgeableExecutions(
        completedBefore: string,
        limit: number,
    ): Promise<ExecutionRecord[]>;
    deleteExecution(executionId: string): Promise<void>;
}

function cloneValue<T>(value: T): T {
    return JSON.parse(JSON.stringify(value)) as T;
}

function batchKey(executionId: string, sequence: number): string {
    return `${executionId}#${sequence}`;
}

function compareNullableLast(
    left: string | null,
    right: string | null,
): number {
    if (left === right) {
        return 0;
    }

    if (left === null) {
        return 1;
    }

    if (right === null) {
        return -1;
    }

    return left < right ? -1 : 1;
}

function compareForListing(
    left: ExecutionRecord,
    right: ExecutionRecord,
): number {
    return compareNullableLast(left.scheduled_for, right.scheduled_for) ||
        compareNullableLast(left.requested_at, right.requested_at) ||
        compareNullableLast(left.execution_id, right.execution_id);
}

function compareBySequence(left: BatchRecord, right: BatchRecord): number {
    return left.sequence - right.sequence;
}

export class InMemoryExecutionLedger implements ExecutionLedger {
    private readonly executions = new Map<string, ExecutionRecord>();

    private readonly batches = new Map<string, BatchRecord>();

    private readonly snapshots = new Map<string, SnapshotRecord>();

    async createExecution(record: ExecutionRecord): Promise<void> {
        if (this.executions.has(record.execution_id)) {
            throw new Error(
                `execution ${record.execution_id} already exists`,
            );
        }

        this.executions.set(record.execution_id, cloneValue(record));
    }

    async getExecution(executionId: string): Promise<ExecutionRecord | null> {
        const record = this.executions.get(executionId);

        return record ? cloneValue(record) : null;
    }

    async listExecutions(
        query: ListExecutionsQuery,
    ): Promise<ExecutionRecord[]> {
        const matched = Array.from(this.executions.values())
            .filter((record) => {
                if (
                    query.requestedBy !== undefined &&
                    record.requested_by !== query.requestedBy
                ) {
                    return false;
                }

                if (query.statuses && !query.statuses.includes(record.status)) {
                    return false;
                }

                if (
                    query.scheduledAfter !== undefined &&
                    (
                        record.scheduled_for === null ||
                        record.scheduled_for <= query.scheduledAfter
                    )
                ) {
                    return false;
                }

                if (
                    query.scheduledBefore !== undefined &&
                    (
                        record.scheduled_for === null ||
                        record.scheduled_for > query.scheduledBefore
                    )
                ) {
                    return false;
                }

                return true;
            })
            .sort(compareForListing);
        const limited = query.limit === undefined
            ? matched
            : matched.slice(0, query.limit);

        return limited.map((record) => cloneValue(record));
    }

    async countActiveForActor(actor: string): Promise<number> {
        let count = 0;

        for (const record of this.executions.values()) {
            if (
                record.requested_by === actor &&
                isActiveExecutionStatus(record.status)
            ) {
                count += 1;
            }
        }

        return count;
    }

    async transitionExecution(
        executionId: string,
        expected: readonly ExecutionStatus[],
        patch: ExecutionPatch,
        updatedAt: string,
    ): Promise<ExecutionRecord | null> {
        const record = this.executions.get(executionId);

        if (!record || !expected.includes(record.status)) {
            return null;
        }

        Object.assign(record, patch, { updated_at: updatedAt });

        return cloneValue(record);
    }

    async appendBatch(
        executionId: string,
        sequence: number,
        recordIds: string[],
        updatedAt: string,
    ): Promise<BatchRecord> {
        const execution = this.requireExecution(executionId);
        const key = batchKey(executionId, sequence);

        if (this.batches.has(key)) {
            throw new Error(
                `batch ${sequence} of execution ${executionId} already exists`,
            );
        }

        const batch: BatchRecord = {
            execution_id: executionId,
            sequence,
            record_ids: [...recordIds],
            size: recordIds.length,
            status: 'pending',
            cursor: 0,
            processed_count: 0,
            failed_count: 0,
            failed_ids: [],
            attempts: 0,
            error_detail: null,
            started_at: null,
            completed_at: null,
        };

        this.batches.set(key, batch);
        execution.dispatched_records += batch.size;
        execution.total_records = Math.max(
            execution.total_records,
            execution.dispatched_records,
        );
        execution.updated_at = updatedAt;

        return cloneValue(batch);
    }

    async finalizeDispatch(
        executionId: string,
        totalBatches: number,
        updatedAt: string,
    ): Promise<ExecutionRecord | null> {
        const execution = this.executions.get(executionId);

        if (!execution) {
            return null;
        }

        execution.total_batches = totalBatches;
        execution.total_records = execution.dispatched_records;
        execution.updated_at = updatedAt;

        return cloneValue(execution);
    }

    async getBatch(
        executionId: string,
        sequence: number,
    ): Promise<BatchRecord | null> {
        const batch = this.batches.get(batchKey(executionId, sequence));

        return batch ? cloneValue(batch) : null;
    }

    async listBatches(executionId: string): Promise<BatchRecord[]> {
        return this.batchesOf(executionId)
            .sort(compareBySequence)
            .map((batch) => cloneValue(batch));
    }

    async claimBatch(
        executionId: string,
        sequence: number,
        startedAt: string,
    ): Promise<BatchRecord | null> {
        const batch = this.batches.get(batchKey(executionId, sequence));

        if (
            !batch ||
            (batch.status !== 'pending' && batch.status !== 'processing')
        ) {
            return null;
        }

        batch.status = 'processing';
        batch.attempts += 1;
        batch.started_at = batch.started_at || startedAt;

        return cloneValue(batch);
    }

    async recordBatchProgress(
        executionId: string,
        sequence: number,
        delta: BatchProgressDelta,
    ): Promise<BatchRecord | null> {
        const batch = this.batches.get(batchKey(executionId, sequence));
        const execution = this.executions.get(executionId);

        if (!batch || !execution || batch.status !== 'processing') {
            return null;
        }

        batch.cursor = Math.min(batch.size, Math.max(batch.cursor, delta.cursor));
        batch.processed_count += delta.processed;
        batch.failed_count += delta.failed;
        batch.failed_ids.push(...delta.failedIds);
        execution.processed_records += delta.processed;
        execution.failed_records += delta.failed;

        if (delta.errorDetail !== undefined) {
            batch.error_detail = delta.errorDetail;
        }

        return cloneValue(batch);
    }

    async settleBatch(
        input: SettleBatchInput,
    ): Promise<SettleBatchResult | null> {
        const batch = this.batches.get(
            batchKey(input.executionId, input.sequence),
        );
        const execution = this.executions.get(input.executionId);

        if (!batch || !execution || batch.status !== 'processing') {
            return null;
        }

        let remainingCount = 0;

        if (input.remainingAsFailed && batch.cursor < batch.size) {
            remainingCount = batch.size - batch.cursor;
            batch.failed_ids.push(...batch.record_ids.slice(batch.cursor));
            batch.failed_count += remainingCount;
            batch.cursor = batch.size;
        }

        batch.status = input.status;
        batch.completed_at = input.completedAt;

        if (input.errorDetail !== null) {
            batch.error_detail = input.errorDetail;
        }

        execution.failed_records += remainingCount;
        execution.updated_at = input.completedAt;

        return {
            batch: cloneValue(batch),
            execution: cloneValue(execution),
        };
    }

    async countOutstandingBatches(executionId: string): Promise<number> {
        return this.batchesOf(executionId).filter((batch) =>
            batch.status === 'pending' || batch.status === 'processing',
        ).length;
    }

    async saveSnapshot(snapshot: SnapshotRecord): Promise<boolean> {
        for (const existing of this.snapshots.values()) {
            if (
                existing.execution_id === snapshot.execution_id &&
                existing.record_id === snapshot.record_id &&
                !existing.undone
            ) {
                return false;
            }
        }

        this.snapshots.set(snapshot.snapshot_id, cloneValue(snapshot));

        return true;
    }

    async deleteSnapshot(
        executionId: string,
        recordId: string,
    ): Promise<void> {
        for (const [snapshotId, snapshot] of this.snapshots) {
            if (
                snapshot.execution_id === executionId &&
                snapshot.record_id === recordId &&
                !snapshot.undone
            ) {
                this.snapshots.delete(snapshotId);
            }
        }
    }

    async listPendingSnapshots(
        executionId: string,
        query: SnapshotPageQuery,
    ): Promise<SnapshotRecord[]> {
        return Array.from(this.snapshots.values())
            .filter((snapshot) =>
                snapshot.execution_id === executionId &&
                !snapshot.undone &&
                (
                    query.afterRecordId === null ||
                    snapshot.record_id > query.afterRecordId
                ),
            )
            .sort((left, right) =>
                left.record_id < right.record_id
                    ? -1
                    : left.record_id > right.record_id ? 1 : 0,
            )
            .slice(0, query.limit)
            .map((snapshot) => cloneValue(snapshot));
    }

    async markSnapshotUndone(
        snapshotId: string,
        undoneAt: string,
        undoneBy: string,
    ): Promise<void> {
        const snapshot = this.snapshots.get(snapshotId);

        if (!snapshot || snapshot.undone) {
            return;
        }

        snapshot.undone = true;
        snapshot.undone_at = undoneAt;
        snapshot.undone_by = undoneBy;
    }

    async countUndoableSnapshots(executionId: string): Promise<number> {
        let count = 0;

        for (const snapshot of this.snapshots.values()) {
            if (snapshot.execution_id === executionId && !snapshot.undone) {
                count += 1;
            }
        }

        return count;
    }

    async deleteSnapshots(executionId: string): Promise<number> {
        let deleted = 0;

        for (const [snapshotId, snapshot] of this.snapshots) {
            if (snapshot.execution_id === executionId) {
                this.snapshots.delete(snapshotId);
                deleted += 1;
            }
        }

        return deleted;
    }

    async claimUndo(
        executionId: string,
        nowIso: string,
        actor: string,
    ): Promise<ExecutionRecord | null> {
        const execution = this.executions.get(executionId);

        if (
            !execution ||
            !execution.undo_enabled ||
            execution.undone_at !== null ||
            execution.status !== 'completed' ||
            execution.undo_expires_at === null ||
            execution.undo_expires_at <= nowIso
        ) {
            return null;
        }

        execution.undo_enabled = false;
        execution.undone_at = nowIso;
        execution.undone_by = actor;
        execution.updated_at = nowIso;

        return cloneValue(execution);
    }

    async listDueScheduled(
        nowIso: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        return Array.from(this.executions.values())
            .filter((record) =>
                record.status === 'scheduled' &&
                record.scheduled_for !== null &&
                record.scheduled_for <= nowIso,
            )
            .sort((left, right) =>
                String(left.scheduled_for).localeCompare(
                    String(right.scheduled_for),
                ),
            )
            .slice(0, limit)
            .map((record) => cloneValue(record));
    }

    async listExpiredUndoWindows(
        nowIso: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        return Array.from(this.executions.values())
            .filter((record) =>
                record.undo_enabled &&
                record.undo_expires_at !== null &&
                record.undo_expires_at <= nowIso,
            )
            .slice(0, limit)
            .map((record) => cloneValue(record));
    }

    async listPurgeableExecutions(
        completedBefore: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        return Array.from(this.executions.values())
            .filter((record) =>
                isTerminalExecutionStatus(record.status) &&
                !record.undo_enabled &&
                record.completed_at !== null &&
                record.completed_at < completedBefore,
            )
            .slice(0, limit)
            .map((record) => cloneValue(record));
    }

    async deleteExecution(executionId: string): Promise<void> {
        await this.deleteSnapshots(executionId);

        for (const batch of this.batchesOf(executionId)) {
            this.batches.delete(batchKey(executionId, batch.sequence));
        }

        this.executions.delete(executionId);
    }

    private batchesOf(executionId: string): BatchRecord[] {
        return Array.from(this.batches.values()).filter((batch) =>
            batch.execution_id === executionId,
        );
    }

    private requireExecution(executionId: string): ExecutionRecord {
        const execution = this.executions.get(executionId);

        if (!execution) {
            throw new Error(`execution ${executionId} not found`);
        }

        return execution;
    }
}
