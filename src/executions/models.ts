import { z } from 'zod';
import { BULK_EXECUTION_SCHEMA_VERSION } from '../constants';
import { FilterSpec } from '../targets/filter';

const ISO_WITH_MILLIS =
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

export const EXECUTION_STATUSES = [
    'scheduled',
    'pending',
    'processing',
    'completed',
    'failed',
    'cancelled',
] as const;

export const BATCH_STATUSES = [
    'pending',
    'processing',
    'completed',
    'failed',
    'cancelled',
] as const;

export const UNDO_OPERATIONS = [
    'reinstate_deleted',
    'delete_again',
    'revert_fields',
    'recreate_from_scratch',
] as const;

export const EXECUTION_STATUS_REASONS = [
    'none',
    'awaiting_schedule',
    'queued_for_dispatch',
    'dispatching',
    'processing_batches',
    'completed_all_batches',
    'completed_no_matches',
    'completed_with_failures',
    'failed_threshold_exceeded',
    'failed_record_aborted',
    'failed_dispatch_error',
    'failed_activation_error',
    'cancelled_by_actor',
] as const;

export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];
export type BatchStatus = (typeof BATCH_STATUSES)[number];
export type UndoOperationType = (typeof UNDO_OPERATIONS)[number];
export type ExecutionStatusReason = (typeof EXECUTION_STATUS_REASONS)[number];

export const ACTIVE_EXECUTION_STATUSES: readonly ExecutionStatus[] = [
    'scheduled',
    'pending',
    'processing',
];

export interface ExecutionRecord {
    schema_version: typeof BULK_EXECUTION_SCHEMA_VERSION;
    execution_id: string;
    entity_type: string;
    filter: FilterSpec;
    action_name: string;
    parameters: Record<string, unknown>;
    batch_size: number;
    total_records: number;
    dispatched_records: number;
    total_batches: number | null;
    processed_records: number;
    failed_records: number;
    status: ExecutionStatus;
    status_reason: ExecutionStatusReason;
    undo_enabled: boolean;
    undo_expiry_days: number;
    undo_expires_at: string | null;
    undone_at: string | null;
    undone_by: string | null;
    scheduled_for: string | null;
    requested_by: string;
    requested_at: string;
    started_at: string | null;
    completed_at: string | null;
    updated_at: string;
    error_detail: string | null;
}

export interface BatchRecord {
    execution_id: string;
    sequence: number;
    record_ids: string[];
    size: number;
    status: BatchStatus;
    cursor: number;
    processed_count: number;
    failed_count: number;
    failed_ids: string[];
    attempts: number;
    error_detail: string | null;
    started_at: string | null;
    completed_at: string | null;
}

export interface SnapshotRecord {
    snapshot_id: string;
    execution_id: string;
    entity_type: string;
    record_id: string;
    undo_operation: UndoOperationType;
    captured_fields: string;
    undone: boolean;
    undone_at: string | null;
    undone_by: string | null;
    created_at: string;
}

export type ExecutionPatch = Partial<Pick<
    ExecutionRecord,
    | 'status'
    | 'status_reason'
    | 'total_records'
    | 'undo_enabled'
    | 'undo_expires_at'
    | 'scheduled_for'
    | 'started_at'
    | 'completed_at'
    | 'error_detail'
>>;

export const SubmitExecutionRequestSchema = z
    .object({
        entity_type: z.string().min(1),
        filter: z.unknown(),
        action: z.string().min(1),
        parameters: z.record(z.unknown()).default({}),
        batch_size: z.number().int().positive().optional(),
        undo_enabled: z.boolean().default(true),
        undo_expiry_days: z.number().int().positive().optional(),
        scheduled_for: z.string().datetime({ offset: true }).optional(),
        dry_run: z.boolean().default(false),
    })
    .strict();

export type SubmitExecutionRequest = z.infer<
    typeof SubmitExecutionRequestSchema
>;

export const PreviewExecutionRequestSchema = z
    .object({
        entity_type: z.string().min(1),
        filter: z.unknown(),
        action: z.string().min(1).optional(),
        parameters: z.record(z.unknown()).default({}),
        limit: z.number().int().positive().optional(),
    })
    .strict();

export type PreviewExecutionRequest = z.infer<
    typeof PreviewExecutionRequestSchema
>;

export const RescheduleExecutionRequestSchema = z
    .object({
        scheduled_for: z.string().datetime({ offset: true }),
    })
    .strict();

export const CooldownRequestSchema = z
    .object({
        actor: z.string().min(1),
        seconds: z.number().int().nonnegative().optional(),
        clear: z.boolean().default(false),
    })
    .strict();

export function normalizeIsoWithMillis(date: Date): string {
    const value = date.toISOString();

    if (!ISO_WITH_MILLIS.test(value)) {
        throw new Error('timestamp must be ISO with milliseconds');
    }

    return value;
}

export function isTerminalExecutionStatus(status: ExecutionStatus): boolean {
    return (
        status === 'completed' ||
        status === 'failed' ||
        status === 'cancelled'
    );
}

export function isActiveExecutionStatus(status: ExecutionStatus): boolean {
    return ACTIVE_EXECUTION_STATUSES.includes(status);
}

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}
