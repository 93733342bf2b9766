import { z } from 'zod';

export type RecordFailurePolicy = 'continue' | 'abort';

export interface ActionAllowlistEntry {
    actor?: string;
    action: string;
    entity_type: string;
}

export interface BulkEngineEnv {
    port: number;
    adminToken: string;
    authSigningKey: string;
    authClockSkewSeconds: number;
    authExpectedIssuer?: string;
    maxJsonBodyBytes: number;
    pgUrl: string;
    pgSchema: string;
    entityTypes: string[];
    defaultBatchSize: number;
    minBatchSize: number;
    maxBatchSize: number;
    memoryThresholdPercent: number;
    queueConcurrency: number;
    queueMaxAttempts: number;
    queueBackoffBaseMs: number;
    queueBackoffCeilingMs: number;
    batchTimeoutMs: number;
    failureThresholdPercent: number;
    recordFailurePolicy: RecordFailurePolicy;
    undoDefaultExpiryDays: number;
    undoMaxExpiryDays: number;
    maxConcurrentExecutions: number;
    maxRecordsPerExecution: number;
    cooldownSeconds: number;
    cooldownThresholdRecords: number;
    progressNotifyIntervalMs: number;
    previewLimit: number;
    maxScheduleDaysAhead: number;
    schedulerIntervalSeconds: number;
    executionRetentionDays: number;
    cleanupIntervalSeconds: number;
    actionAllowlist: ActionAllowlistEntry[] | null;
}

const actionAllowlistSchema = z.array(
    z.object({
        actor: z.string().min(1).optional(),
        action: z.string().min(1),
        entity_type: z.string().min(1),
    }).strict(),
);

function parseNonNegativeInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return parsed;
}

function parseStrictPositiveInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseNonNegativeInteger(raw, fieldName, defaultValue);

    if (parsed <= 0) {
        throw new Error(`${fieldName} must be greater than zero`);
    }

    return parsed;
}

function parsePercentage(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
        throw new Error(
            `${fieldName} must be a number between 0 and 100`,
        );
    }

    return parsed;
}

function parseOptionalString(raw: string | undefined): string | undefined {
    if (!raw) {
        return undefined;
    }

    const trimmed = raw.trim();

    return trimmed ? trimmed : undefined;
}

function parseRequiredString(
    raw: string | undefined,
    fieldName: string,
): string {
    const parsed = parseOptionalString(raw);

    if (!parsed) {
        throw new Error(`${fieldName} is required`);
    }

    return parsed;
}

function parseEntityTypes(raw: string | undefined): string[] {
    const parsed = parseOptionalString(raw);

    if (!parsed) {
        return [];
    }

    return Array.from(new Set(
        parsed.split(',')
            .map((entry) => entry.trim())
            .filter((entry) => entry !== ''),
    ));
}

function parseRecordFailurePolicy(
    raw: string | undefined,
): RecordFailurePolicy {
    const parsed = parseOptionalString(raw);

    if (!parsed) {
        return 'continue';
    }

    const normalized = parsed.toLowerCase();

    if (normalized === 'continue' || normalized === 'abort') {
        return normalized;
    }

    throw new Error(
        'BAE_RECORD_FAILURE_POLICY must be one of: continue, abort',
    );
}

function parseActionAllowlist(
    raw: string | undefined,
): ActionAllowlistEntry[] | null {
    if (!raw || raw.trim() === '') {
        return null;
    }

    let parsed: unknown;

    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error('BAE_ACTION_ALLOWLIST_JSON must be valid JSON');
    }

    const result = actionAllowlistSchema.safeParse(parsed);

    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue.path.map((part) => `[${String(part)}]`).join('');

        throw new Error(
            `BAE_ACTION_ALLOWLIST_JSON${path} ${issue.message}`,
        );
    }

    return result.data;
}

export function parseBulkEngineEnv(
    env: NodeJS.ProcessEnv,
): BulkEngineEnv {
    const minBatchSize = parseStrictPositiveInteger(
        env.BAE_MIN_BATCH_SIZE,
        'BAE_MIN_BATCH_SIZE',
        10,
    );
    const maxBatchSize = parseStrictPositiveInteger(
        env.BAE_MAX_BATCH_SIZE,
        'BAE_MAX_BATCH_SIZE',
        10000,
    );
    const defaultBatchSize = parseStrictPositiveInteger(
        env.BAE_DEFAULT_BATCH_SIZE,
        'BAE_DEFAULT_BATCH_SIZE',
        500,
    );

    if (minBatchSize > maxBatchSize) {
        throw new Error(
            'BAE_MIN_BATCH_SIZE must not exceed BAE_MAX_BATCH_SIZE',
        );
    }

    if (defaultBatchSize < minBatchSize || defaultBatchSize > maxBatchSize) {
        throw new Error(
            'BAE_DEFAULT_BATCH_SIZE must be between ' +
            'BAE_MIN_BATCH_SIZE and BAE_MAX_BATCH_SIZE',
        );
    }

    const undoMaxExpiryDays = parseStrictPositiveInteger(
        env.BAE_UNDO_MAX_EXPIRY_DAYS,
        'BAE_UNDO_MAX_EXPIRY_DAYS',
        90,
    );
    const undoDefaultExpiryDays = parseStrictPositiveInteger(
        env.BAE_UNDO_DEFAULT_EXPIRY_DAYS,
        'BAE_UNDO_DEFAULT_EXPIRY_DAYS',
        7,
    );

    if (undoDefaultExpiryDays > undoMaxExpiryDays) {
        throw new Error(
            'BAE_UNDO_DEFAULT_EXPIRY_DAYS must not exceed ' +
            'BAE_UNDO_MAX_EXPIRY_DAYS',
        );
    }

    return {
        port: parseNonNegativeInteger(env.PORT, 'PORT', 3200),
        adminToken: parseRequiredString(
            env.BAE_ADMIN_TOKEN,
            'BAE_ADMIN_TOKEN',
        ),
        authSigningKey: parseRequiredString(
            env.BAE_AUTH_SIGNING_KEY,
            'BAE_AUTH_SIGNING_KEY',
        ),
        authClockSkewSeconds: parseNonNegativeInteger(
            env.BAE_AUTH_TOKEN_CLOCK_SKEW_SECONDS,
            'BAE_AUTH_TOKEN_CLOCK_SKEW_SECONDS',
            30,
        ),
        authExpectedIssuer: parseOptionalString(
            env.BAE_AUTH_EXPECTED_ISSUER,
        ),
        maxJsonBodyBytes: parseStrictPositiveInteger(
            env.BAE_MAX_JSON_BODY_BYTES,
            'BAE_MAX_JSON_BODY_BYTES',
            1048576,
        ),
        pgUrl: parseRequiredString(env.BAE_PG_URL, 'BAE_PG_URL'),
        pgSchema: parseOptionalString(env.BAE_PG_SCHEMA) || 'bulk_engine',
        entityTypes: parseEntityTypes(env.BAE_ENTITY_TYPES),
        defaultBatchSize,
        minBatchSize,
        maxBatchSize,
        memoryThresholdPercent: parsePercentage(
            env.BAE_MEMORY_THRESHOLD_PERCENT,
            'BAE_MEMORY_THRESHOLD_PERCENT',
            80,
        ),
        queueConcurrency: parseStrictPositiveInteger(
            env.BAE_QUEUE_CONCURRENCY,
            'BAE_QUEUE_CONCURRENCY',
            4,
        ),
        queueMaxAttempts: parseStrictPositiveInteger(
            env.BAE_QUEUE_MAX_ATTEMPTS,
            'BAE_QUEUE_MAX_ATTEMPTS',
            3,
        ),
        queueBackoffBaseMs: parseNonNegativeInteger(
            env.BAE_QUEUE_BACKOFF_BASE_MS,
            'BAE_QUEUE_BACKOFF_BASE_MS',
            30000,
        ),
        queueBackoffCeilingMs: parseNonNegativeInteger(
            env.BAE_QUEUE_BACKOFF_CEILING_MS,
            'BAE_QUEUE_BACKOFF_CEILING_MS',
            300000,
        ),
        batchTimeoutMs: parseStrictPositiveInteger(
            env.BAE_BATCH_TIMEOUT_MS,
            'BAE_BATCH_TIMEOUT_MS',
            3600000,
        ),
        failureThresholdPercent: parsePercentage(
            env.BAE_FAILURE_THRESHOLD_PERCENT,
            'BAE_FAILURE_THRESHOLD_PERCENT',
            50,
        ),
        recordFailurePolicy: parseRecordFailurePolicy(
            env.BAE_RECORD_FAILURE_POLICY,
        ),
        undoDefaultExpiryDays,
        undoMaxExpiryDays,
        maxConcurrentExecutions: parseStrictPositiveInteger(
            env.BAE_MAX_CONCURRENT_EXECUTIONS,
            'BAE_MAX_CONCURRENT_EXECUTIONS',
            5,
        ),
        maxRecordsPerExecution: parseStrictPositiveInteger(
            env.BAE_MAX_RECORDS_PER_EXECUTION,
            'BAE_MAX_RECORDS_PER_EXECUTION',
            100000,
        ),
        cooldownSeconds: parseNonNegativeInteger(
            env.BAE_COOLDOWN_SECONDS,
            'BAE_COOLDOWN_SECONDS',
            60,
        ),
        cooldownThresholdRecords: parseStrictPositiveInteger(
            env.BAE_COOLDOWN_THRESHOLD_RECORDS,
            'BAE_COOLDOWN_THRESHOLD_RECORDS',
            10000,
        ),
        progressNotifyIntervalMs: parseNonNegativeInteger(
            env.BAE_PROGRESS_NOTIFY_INTERVAL_MS,
            'BAE_PROGRESS_NOTIFY_INTERVAL_MS',
            500,
        ),
        previewLimit: parseStrictPositiveInteger(
            env.BAE_PREVIEW_LIMIT,
            'BAE_PREVIEW_LIMIT',
            100,
        ),
        maxScheduleDaysAhead: parseStrictPositiveInteger(
            env.BAE_MAX_SCHEDULE_DAYS_AHEAD,
            'BAE_MAX_SCHEDULE_DAYS_AHEAD',
            365,
        ),
        schedulerIntervalSeconds: parseNonNegativeInteger(
            env.BAE_SCHEDULER_INTERVAL_SECONDS,
            'BAE_SCHEDULER_INTERVAL_SECONDS',
            60,
        ),
        executionRetentionDays: parseStrictPositiveInteger(
            env.BAE_EXECUTION_RETENTION_DAYS,
            'BAE_EXECUTION_RETENTION_DAYS',
            30,
        ),
        cleanupIntervalSeconds: parseNonNegativeInteger(
            env.BAE_CLEANUP_INTERVAL_SECONDS,
            'BAE_CLEANUP_INTERVAL_SECONDS',
            3600,
        ),
        actionAllowlist: parseActionAllowlist(
            env.BAE_ACTION_ALLOWLIST_JSON,
        ),
    };
}
