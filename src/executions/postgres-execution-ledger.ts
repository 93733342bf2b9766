import { Pool, type PoolClient, type PoolConfig } from 'pg';
import { z } from 'zod';
import { BULK_EXECUTION_SCHEMA_VERSION } from '../constants';
import { FilterSpecSchema } from '../targets/filter';
import {
    BatchProgressDelta,
    ExecutionLedger,
    ListExecutionsQuery,
    SettleBatchInput,
    SettleBatchResult,
    SnapshotPageQuery,
} from './execution-ledger';
import {
    ACTIVE_EXECUTION_STATUSES,
    BATCH_STATUSES,
    BatchRecord,
    EXECUTION_STATUS_REASONS,
    EXECUTION_STATUSES,
    ExecutionPatch,
    ExecutionRecord,
    ExecutionStatus,
    SnapshotRecord,
    UNDO_OPERATIONS,
} from './models';

export interface PostgresExecutionLedgerOptions {
    pool?: Pool;
    poolConfig?: Omit<PoolConfig, 'connectionString'>;
    schemaName?: string;
}

const DEFAULT_SCHEMA_NAME = 'bulk_engine';

function parseJsonColumn(raw: unknown): unknown {
    return typeof raw === 'string' ? JSON.parse(raw) : raw;
}

const StringArrayColumn = z.preprocess(
    parseJsonColumn,
    z.array(z.string()),
);

const ExecutionRowSchema = z.object({
    schema_version: z.literal(BULK_EXECUTION_SCHEMA_VERSION),
    execution_id: z.string(),
    entity_type: z.string(),
    filter_spec: z.preprocess(parseJsonColumn, FilterSpecSchema),
    action_name: z.string(),
    parameters: z.preprocess(parseJsonColumn, z.record(z.unknown())),
    batch_size: z.number().int(),
    total_records: z.number().int(),
    dispatched_records: z.number().int(),
    total_batches: z.number().int().nullable(),
    processed_records: z.number().int(),
    failed_records: z.number().int(),
    status: z.enum(EXECUTION_STATUSES),
    status_reason: z.enum(EXECUTION_STATUS_REASONS),
    undo_enabled: z.boolean(),
    undo_expiry_days: z.number().int(),
    undo_expires_at: z.string().nullable(),
    undone_at: z.string().nullable(),
    undone_by: z.string().nullable(),
    scheduled_for: z.string().nullable(),
    requested_by: z.string(),
    requested_at: z.string(),
    started_at: z.string().nullable(),
    completed_at: z.string().nullable(),
    updated_at: z.string(),
    error_detail: z.string().nullable(),
});

const BatchRowSchema = z.object({
    execution_id: z.string(),
    batch_sequence: z.number().int(),
    record_ids: StringArrayColumn,
    size: z.number().int(),
    status: z.enum(BATCH_STATUSES),
    cursor_position: z.number().int(),
    processed_count: z.number().int(),
    failed_count: z.number().int(),
    failed_ids: StringArrayColumn,
    attempts: z.number().int(),
    error_detail: z.string().nullable(),
    started_at: z.string().nullable(),
    completed_at: z.string().nullable(),
});

const SnapshotRowSchema = z.object({
    snapshot_id: z.string(),
    execution_id: z.string(),
    entity_type: z.string(),
    record_id: z.string(),
    undo_operation: z.enum(UNDO_OPERATIONS),
    captured_fields: z.string(),
    undone: z.boolean(),
    undone_at: z.string().nullable(),
    undone_by: z.string().nullable(),
    created_at: z.string(),
});

const PATCH_COLUMN_CASTS: Record<keyof ExecutionPatch, string> = {
    status: 'text',
    status_reason: 'text',
    total_records: 'integer',
    undo_enabled: 'boolean',
    undo_expires_at: 'text',
    scheduled_for: 'text',
    started_at: 'text',
    completed_at: 'text',
    error_detail: 'text',
};

function isPatchKey(key: string): key is keyof ExecutionPatch {
    return Object.prototype.hasOwnProperty.call(PATCH_COLUMN_CASTS, key);
}

function toExecution(row: unknown): ExecutionRecord {
    const { filter_spec: filter, ...rest } = ExecutionRowSchema.parse(row);

    return {
        ...rest,
        filter,
    };
}

function toBatch(row: unknown): BatchRecord {
    const {
        batch_sequence: sequence,
        cursor_position: cursor,
        ...rest
    } = BatchRowSchema.parse(row);

    return {
        ...rest,
        sequence,
        cursor,
    };
}

function toSnapshot(row: unknown): SnapshotRecord {
    return SnapshotRowSchema.parse(row);
}

function validateSqlIdentifier(
    value: string,
    fieldName: string,
): string {
    const trimmed = String(value || '').trim();

    if (trimmed.length === 0) {
        throw new Error(`${fieldName} is required`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${fieldName} must match [A-Za-z_][A-Za-z0-9_]*`,
        );
    }

    return trimmed;
}

function validateLimit(limit: number): number {
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new Error('query limit must be a positive integer');
    }

    return limit;
}

function placeholders(count: number, offset: number): string {
    return Array.from(
        { length: count },
        (_, index) => `$${index + offset}`,
    ).join(', ');
}

export class PostgresExecutionLedger implements ExecutionLedger {
    private readonly batchesTable: string;

    private readonly executionsTable: string;

    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly ready: Promise<void>;

    private readonly schemaName: string;

    private readonly snapshotsTable: string;

    constructor(
        pgUrl: string,
        options: PostgresExecutionLedgerOptions = {},
    ) {
        const connectionString = String(pgUrl || '').trim();

        this.schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_SCHEMA_NAME,
            'ledger schema name',
        );
        this.executionsTable = `"${this.schemaName}"."bulk_executions"`;
        this.batchesTable = `"${this.schemaName}"."bulk_batches"`;
        this.snapshotsTable = `"${this.schemaName}"."bulk_snapshots"`;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            if (connectionString.length === 0) {
                throw new Error('BAE_PG_URL is required');
            }

            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
                idleTimeoutMillis:
                    options.poolConfig?.idleTimeoutMillis || 30000,
                max: options.poolConfig?.max || 10,
                ...options.poolConfig,
            });
            this.ownsPool = true;
        }

        this.ready = this.initialize();
    }

    async close(): Promise<void> {
        await this.ready;

        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }

    async createExecution(record: ExecutionRecord): Promise<void> {
        await this.ready;

        await this.pool.query(
            `INSERT INTO ${this.executionsTable} (
                schema_version,
                execution_id,
                entity_type,
                filter_spec,
                action_name,
                parameters,
                batch_size,
                total_records,
                dispatched_records,
                total_batches,
                processed_records,
                failed_records,
                status,
                status_reason,
                undo_enabled,
                undo_expiry_days,
                undo_expires_at,
                undone_at,
                undone_by,
                scheduled_for,
                requested_by,
                requested_at,
                started_at,
                completed_at,
                updated_at,
                error_detail
            ) VALUES (
                $1, $2, $3, $4::jsonb, $5, $6::jsonb,
                $7::integer, $8::integer, $9::integer, $10::integer,
                $11::integer, $12::integer, $13, $14, $15::boolean,
                $16::integer, $17, $18, $19, $20, $21, $22, $23, $24,
                $25, $26
            )`,
            [
                record.schema_version,
                record.execution_id,
                record.entity_type,
                JSON.stringify(record.filter),
                record.action_name,
                JSON.stringify(record.parameters),
                record.batch_size,
                record.total_records,
                record.dispatched_records,
                record.total_batches,
                record.processed_records,
                record.failed_records,
                record.status,
                record.status_reason,
                record.undo_enabled,
                record.undo_expiry_days,
                record.undo_expires_at,
                record.undone_at,
                record.undone_by,
                record.scheduled_for,
                record.requested_by,
                record.requested_at,
                record.started_at,
                record.completed_at,
                record.updated_at,
                record.error_detail,
            ],
        );
    }

    async getExecution(executionId: string): Promise<ExecutionRecord | null> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.executionsTable}
            WHERE execution_id = $1`,
            [executionId],
        );

        return result.rows.length === 1 ? toExecution(result.rows[0]) : null;
    }

    async listExecutions(
        query: ListExecutionsQuery,
    ): Promise<ExecutionRecord[]> {
        await this.ready;

        const conditions: string[] = [];
        const values: unknown[] = [];

        if (query.requestedBy !== undefined) {
            values.push(query.requestedBy);
            conditions.push(`requested_by = $${values.length}`);
        }

        if (query.statuses && query.statuses.length > 0) {
            const offset = values.length + 1;

            values.push(...query.statuses);
            conditions.push(
                `status IN (${placeholders(query.statuses.length, offset)})`,
            );
        }

        if (query.scheduledAfter !== undefined) {
            values.push(query.scheduledAfter);
            conditions.push(
                `scheduled_for IS NOT NULL AND scheduled_for > $${values.length}`,
            );
        }

        if (query.scheduledBefore !== undefined) {
            values.push(query.scheduledBefore);
            conditions.push(
                `scheduled_for IS NOT NULL AND scheduled_for <= $${values.length}`,
            );
        }

        const where = conditions.length > 0
            ? `WHERE ${conditions.join(' AND ')}`
            : '';
        const limit = query.limit === undefined
            ? ''
            : `LIMIT ${validateLimit(query.limit)}`;
        const result = await this.pool.query(
            `SELECT *
            FROM ${this.executionsTable}
            ${where}
            ORDER BY scheduled_for ASC,
                requested_at ASC,
                execution_id ASC
            ${limit}`,
            values,
        );

        return result.rows.map(toExecution);
    }

    async countActiveForActor(actor: string): Promise<number> {
        await this.ready;

        const result = await this.pool.query<{ count: number | string }>(
            `SELECT COUNT(*) AS count
            FROM ${this.executionsTable}
            WHERE requested_by = $1
                AND status IN (${placeholders(
                    ACTIVE_EXECUTION_STATUSES.length,
                    2,
                )})`,
            [
                actor,
                ...ACTIVE_EXECUTION_STATUSES,
            ],
        );

        return Number(result.rows[0]?.count || 0);
    }

    async transitionExecution(
        executionId: string,
        expected: readonly ExecutionStatus[],
        patch: ExecutionPatch,
        updatedAt: string,
    ): Promise<ExecutionRecord | null> {
        await this.ready;

        if (expected.length === 0) {
            return null;
        }

        const values: unknown[] = [executionId, updatedAt];
        const assignments = ['updated_at = $2'];

        for (const [key, value] of Object.entries(patch)) {
            if (!isPatchKey(key) || value === undefined) {
                continue;
            }

            values.push(value);
            assignments.push(
                `${key} = $${values.length}::${PATCH_COLUMN_CASTS[key]}`,
            );
        }

        const offset = values.length + 1;

        values.push(...expected);

        const result = await this.pool.query(
            `UPDATE ${this.executionsTable}
            SET ${assignments.join(', ')}
            WHERE execution_id = $1
                AND status IN (${placeholders(expected.length, offset)})
            RETURNING *`,
            values,
        );

        return result.rows.length === 1 ? toExecution(result.rows[0]) : null;
    }

    async appendBatch(
        executionId: string,
        sequence: number,
        recordIds: string[],
        updatedAt: string,
    ): Promise<BatchRecord> {
        return this.withTransaction(async (client) => {
            const execution = await this.lockExecution(client, executionId);

            if (!execution) {
                throw new Error(`execution ${executionId} not found`);
            }

            const inserted = await client.query(
                `INSERT INTO ${this.batchesTable} (
                    execution_id,
                    batch_sequence,
                    record_ids,
                    size,
                    status,
                    cursor_position,
                    processed_count,
                    failed_count,
                    failed_ids,
                    attempts,
                    error_detail,
                    started_at,
                    completed_at
                ) VALUES (
                    $1, $2::integer, $3::jsonb, $4::integer, 'pending',
                    0, 0, 0, '[]'::jsonb, 0, NULL, NULL, NULL
                )
                RETURNING *`,
                [
                    executionId,
                    sequence,
                    JSON.stringify(recordIds),
                    recordIds.length,
                ],
            );
            const dispatched = execution.dispatched_records + recordIds.length;

            await client.query(
                `UPDATE ${this.executionsTable}
                SET dispatched_records = $2::integer,
                    total_records = $3::integer,
                    updated_at = $4
                WHERE execution_id = $1`,
                [
                    executionId,
                    dispatched,
                    Math.max(execution.total_records, dispatched),
                    updatedAt,
                ],
            );

            return toBatch(inserted.rows[0]);
        });
    }

    async finalizeDispatch(
        executionId: string,
        totalBatches: number,
        updatedAt: string,
    ): Promise<ExecutionRecord | null> {
        await this.ready;

        const result = await this.pool.query(
            `UPDATE ${this.executionsTable}
            SET total_batches = $2::integer,
                total_records = dispatched_records,
                updated_at = $3
            WHERE execution_id = $1
            RETURNING *`,
            [
                executionId,
                totalBatches,
                updatedAt,
            ],
        );

        return result.rows.length === 1 ? toExecution(result.rows[0]) : null;
    }

    async getBatch(
        executionId: string,
        sequence: number,
    ): Promise<BatchRecord | null> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.batchesTable}
            WHERE execution_id = $1
                AND batch_sequence = $2::integer`,
            [
                executionId,
                sequence,
            ],
        );

        return result.rows.length === 1 ? toBatch(result.rows[0]) : null;
    }

    async listBatches(executionId: string): Promise<BatchRecord[]> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.batchesTable}
            WHERE execution_id = $1
            ORDER BY batch_sequence ASC`,
            [executionId],
        );

        return result.rows.map(toBatch);
    }

    async claimBatch(
        executionId: string,
        sequence: number,
        startedAt: string,
    ): Promise<BatchRecord | null> {
        await this.ready;

        const result = await this.pool.query(
            `UPDATE ${this.batchesTable}
            SET status = 'processing',
                attempts = attempts + 1,
                started_at = COALESCE(started_at, $3::text)
            WHERE execution_id = $1
                AND batch_sequence = $2::integer
                AND status IN ('pending', 'processing')
            RETURNING *`,
            [
                executionId,
                sequence,
                startedAt,
            ],
        );

        return result.rows.length === 1 ? toBatch(result.rows[0]) : null;
    }

    async recordBatchProgress(
        executionId: string,
        sequence: number,
        delta: BatchProgressDelta,
    ): Promise<BatchRecord | null> {
        return this.withTransaction(async (client) => {
            const batch = await this.lockBatch(client, executionId, sequence);

            if (!batch || batch.status !== 'processing') {
                return null;
            }

            const next: BatchRecord = {
                ...batch,
                cursor: Math.min(
                    batch.size,
                    Math.max(batch.cursor, delta.cursor),
                ),
                processed_count: batch.processed_count + delta.processed,
                failed_count: batch.failed_count + delta.failed,
                failed_ids: [...batch.failed_ids, ...delta.failedIds],
                error_detail: delta.errorDetail === undefined
                    ? batch.error_detail
                    : delta.errorDetail,
            };

            await this.writeBatchCounters(client, next);
            await client.query(
                `UPDATE ${this.executionsTable}
                SET processed_records = processed_records + $2::integer,
                    failed_records = failed_records + $3::integer
                WHERE execution_id = $1`,
                [
                    executionId,
                    delta.processed,
                    delta.failed,
                ],
            );

            return next;
        });
    }

    async settleBatch(
        input: SettleBatchInput,
    ): Promise<SettleBatchResult | null> {
        return this.withTransaction(async (client) => {
            const batch = await this.lockBatch(
                client,
                input.executionId,
                input.sequence,
            );

            if (!batch || batch.status !== 'processing') {
                return null;
            }

            const remaining = input.remainingAsFailed
                ? batch.record_ids.slice(batch.cursor)
                : [];
            const settled: BatchRecord = {
                ...batch,
                status: input.status,
                cursor: batch.cursor + remaining.length,
                failed_count: batch.failed_count + remaining.length,
                failed_ids: [...batch.failed_ids, ...remaining],
                error_detail: input.errorDetail === null
                    ? batch.error_detail
                    : input.errorDetail,
                completed_at: input.completedAt,
            };

            await this.writeBatchCounters(client, settled);

            const updated = await client.query(
                `UPDATE ${this.executionsTable}
                SET failed_records = failed_records + $2::integer,
                    updated_at = $3
                WHERE execution_id = $1
                RETURNING *`,
                [
                    input.executionId,
                    remaining.length,
                    input.completedAt,
                ],
            );

            if (updated.rows.length !== 1) {
                throw new Error(
                    `execution ${input.executionId} not found`,
                );
            }

            return {
                batch: settled,
                execution: toExecution(updated.rows[0]),
            };
        });
    }

    async countOutstandingBatches(executionId: string): Promise<number> {
        await this.ready;

        const result = await this.pool.query<{ count: number | string }>(
            `SELECT COUNT(*) AS count
            FROM ${this.batchesTable}
            WHERE execution_id = $1
                AND status IN ('pending', 'processing')`,
            [executionId],
        );

        return Number(result.rows[0]?.count || 0);
    }

    async saveSnapshot(snapshot: SnapshotRecord): Promise<boolean> {
        await this.ready;

        // The partial unique index keeps one live snapshot per record.
        const inserted = await this.pool.query(
            `INSERT INTO ${this.snapshotsTable} (
                snapshot_id,
                execution_id,
                entity_type,
                record_id,
                undo_operation,
                captured_fields,
                undone,
                undone_at,
                undone_by,
                created_at
            ) VALUES (
                $1, $2, $3, $4, $5, $6, $7::boolean, $8, $9, $10
            )
            ON CONFLICT DO NOTHING
            RETURNING snapshot_id`,
            [
                snapshot.snapshot_id,
                snapshot.execution_id,
                snapshot.entity_type,
                snapshot.record_id,
                snapshot.undo_operation,
                snapshot.captured_fields,
                snapshot.undone,
                snapshot.undone_at,
                snapshot.undone_by,
                snapshot.created_at,
            ],
        );

        return inserted.rows.length === 1;
    }

    async deleteSnapshot(
        executionId: string,
        recordId: string,
    ): Promise<void> {
        await this.ready;

        await this.pool.query(
            `DELETE FROM ${this.snapshotsTable}
            WHERE execution_id = $1
                AND record_id = $2
                AND undone = false`,
            [
                executionId,
                recordId,
            ],
        );
    }

    async listPendingSnapshots(
        executionId: string,
        query: SnapshotPageQuery,
    ): Promise<SnapshotRecord[]> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.snapshotsTable}
            WHERE execution_id = $1
                AND undone = false
                AND record_id > $2
            ORDER BY record_id ASC
            LIMIT ${validateLimit(query.limit)}`,
            [
                executionId,
                query.afterRecordId || '',
            ],
        );

        return result.rows.map(toSnapshot);
    }

    async markSnapshotUndone(
        snapshotId: string,
        undoneAt: string,
        undoneBy: string,
    ): Promise<void> {
        await this.ready;

        await this.pool.query(
            `UPDATE ${this.snapshotsTable}
            SET undone = true,
                undone_at = $2,
                undone_by = $3
            WHERE snapshot_id = $1
                AND undone = false`,
            [
                snapshotId,
                undoneAt,
                undoneBy,
            ],
        );
    }

    async countUndoableSnapshots(executionId: string): Promise<number> {
        await this.ready;

        const result = await this.pool.query<{ count: number | string }>(
            `SELECT COUNT(*) AS count
            FROM ${this.snapshotsTable}
            WHERE execution_id = $1
                AND undone = false`,
            [executionId],
        );

        return Number(result.rows[0]?.count || 0);
    }

    async deleteSnapshots(executionId: string): Promise<number> {
        await this.ready;

        const result = await this.pool.query(
            `DELETE FROM ${this.snapshotsTable}
            WHERE execution_id = $1`,
            [executionId],
        );

        return result.rowCount || 0;
    }

    async claimUndo(
        executionId: string,
        nowIso: string,
        actor: string,
    ): Promise<ExecutionRecord | null> {
        await this.ready;

        const result = await this.pool.query(
            `UPDATE ${this.executionsTable}
            SET undo_enabled = false,
                undone_at = $2,
                undone_by = $3,
                updated_at = $2
            WHERE execution_id = $1
                AND undo_enabled = true
                AND undone_at IS NULL
                AND status = 'completed'
                AND undo_expires_at IS NOT NULL
                AND undo_expires_at > $2
            RETURNING *`,
            [
                executionId,
                nowIso,
                actor,
            ],
        );

        return result.rows.length === 1 ? toExecution(result.rows[0]) : null;
    }

    async listDueScheduled(
        nowIso: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.executionsTable}
            WHERE status = 'scheduled'
                AND scheduled_for IS NOT NULL
                AND scheduled_for <= $1
            ORDER BY scheduled_for ASC, execution_id ASC
            LIMIT ${validateLimit(limit)}`,
            [nowIso],
        );

        return result.rows.map(toExecution);
    }

    async listExpiredUndoWindows(
        nowIso: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.executionsTable}
            WHERE undo_enabled = true
                AND undo_expires_at IS NOT NULL
                AND undo_expires_at <= $1
            ORDER BY undo_expires_at ASC, execution_id ASC
            LIMIT ${validateLimit(limit)}`,
            [nowIso],
        );

        return result.rows.map(toExecution);
    }

    async listPurgeableExecutions(
        completedBefore: string,
        limit: number,
    ): Promise<ExecutionRecord[]> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT *
            FROM ${this.executionsTable}
            WHERE status IN ('completed', 'failed', 'cancelled')
                AND undo_enabled = false
                AND completed_at IS NOT NULL
                AND completed_at < $1
            ORDER BY completed_at ASC, execution_id ASC
            LIMIT ${validateLimit(limit)}`,
            [completedBefore],
        );

        return result.rows.map(toExecution);
    }

    async deleteExecution(executionId: string): Promise<void> {
        await this.withTransaction(async (client) => {
            await client.query(
                `DELETE FROM ${this.snapshotsTable} WHERE execution_id = $1`,
                [executionId],
            );
            await client.query(
                `DELETE FROM ${this.batchesTable} WHERE execution_id = $1`,
                [executionId],
            );
            await client.query(
                `DELETE FROM ${this.executionsTable} WHERE execution_id = $1`,
                [executionId],
            );
        });
    }

    private async withTransaction<T>(
        work: (client: PoolClient) => Promise<T>,
    ): Promise<T> {
        await this.ready;

        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');

            const result = await work(client);

            await client.query('COMMIT');

            return result;
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    private async lockExecution(
        client: PoolClient,
        executionId: string,
    ): Promise<ExecutionRecord | null> {
        const result = await client.query(
            `SELECT *
            FROM ${this.executionsTable}
            WHERE execution_id = $1
            FOR UPDATE`,
            [executionId],
        );

        return result.rows.length === 1 ? toExecution(result.rows[0]) : null;
    }

    private async lockBatch(
        client: PoolClient,
        executionId: string,
        sequence: number,
    ): Promise<BatchRecord | null> {
        const result = await client.query(
            `SELECT *
            FROM ${this.batchesTable}
            WHERE execution_id = $1
                AND batch_sequence = $2::integer
            FOR UPDATE`,
            [
                executionId,
                sequence,
            ],
        );

        return result.rows.length === 1 ? toBatch(result.rows[0]) : null;
    }

    private async writeBatchCounters(
        client: PoolClient,
        batch: BatchRecord,
    ): Promise<void> {
        await client.query(
            `UPDATE ${this.batchesTable}
            SET status = $3,
                cursor_position = $4::integer,
                processed_count = $5::integer,
                failed_count = $6::integer,
                failed_ids = $7::jsonb,
                error_detail = $8,
                completed_at = $9
            WHERE execution_id = $1
                AND batch_sequence = $2::integer`,
            [
                batch.execution_id,
                batch.sequence,
                batch.status,
                batch.cursor,
                batch.processed_count,
                batch.failed_count,
                JSON.stringify(batch.failed_ids),
                batch.error_detail,
                batch.completed_at,
            ],
        );
    }

    private async initialize(): Promise<void> {
        await this.pool.query(
            `CREATE SCHEMA IF NOT EXISTS "${this.schemaName}"`,
        );
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.executionsTable} (
    execution_id TEXT PRIMARY KEY,
    schema_version TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    filter_spec JSONB NOT NULL,
    action_name TEXT NOT NULL,
    parameters JSONB NOT NULL,
    batch_size INTEGER NOT NULL,
    total_records INTEGER NOT NULL,
    dispatched_records INTEGER NOT NULL,
    total_batches INTEGER,
    processed_records INTEGER NOT NULL,
    failed_records INTEGER NOT NULL,
    status TEXT NOT NULL,
    status_reason TEXT NOT NULL,
    undo_enabled BOOLEAN NOT NULL,
    undo_expiry_days INTEGER NOT NULL,
    undo_expires_at TEXT,
    undone_at TEXT,
    undone_by TEXT,
    scheduled_for TEXT,
    requested_by TEXT NOT NULL,
    requested_at TEXT NOT NULL,
    started_at TEXT,
    completed_at TEXT,
    updated_at TEXT NOT NULL,
    error_detail TEXT
)
`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.batchesTable} (
    execution_id TEXT NOT NULL,
    batch_sequence INTEGER NOT NULL,
    record_ids JSONB NOT NULL,
    size INTEGER NOT NULL,
    status TEXT NOT NULL,
    cursor_position INTEGER NOT NULL,
    processed_count INTEGER NOT NULL,
    failed_count INTEGER NOT NULL,
    failed_ids JSONB NOT NULL,
    attempts INTEGER NOT NULL,
    error_detail TEXT,
    started_at TEXT,
    completed_at TEXT,
    PRIMARY KEY (execution_id, batch_sequence)
)
`);
        await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.snapshotsTable} (
    snapshot_id TEXT PRIMARY KEY,
    execution_id TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    record_id TEXT NOT NULL,
    undo_operation TEXT NOT NULL,
    captured_fields TEXT NOT NULL,
    undone BOOLEAN NOT NULL,
    undone_at TEXT,
    undone_by TEXT,
    created_at TEXT NOT NULL
)
`);
        await this.pool.query(`
CREATE UNIQUE INDEX IF NOT EXISTS bulk_snapshots_live_record
ON ${this.snapshotsTable} (execution_id, record_id)
WHERE undone = false
`);
    }
}
