import { signJwt } from './auth/jwt';
import { BULK_EXECUTION_SCHEMA_VERSION } from './constants';
import { ActionRegistry } from './actions/action-registry';
import { BulkEngine, BulkEngineConfig, createBulkEngine } from './engine';
import { LifecycleEvent } from './events/lifecycle-events';
import { InMemoryExecutionLedger } from './executions/execution-ledger';
import { ExecutionRecord } from './executions/models';
import { InMemoryRecordStore, RecordStore } from './targets/record-store';

export interface BuildTokenInput {
    actor?: string;
    audience?: string;
    expiresInSeconds?: number;
    issuedAt?: number;
    issuer?: string;
    scope?: string;
    signingKey: string;
}

export const TEST_SIGNING_KEY = 'test-secret';

export const TEST_ADMIN_TOKEN = 'test-admin-token';

export function buildScopedToken(input: BuildTokenInput): string {
    const now = input.issuedAt || Math.floor(Date.now() / 1000);
    const scope = input.scope || 'bulk';

    return signJwt(
        {
            iss: input.issuer || 'bulk-auth',
            sub: input.actor || 'operator-1',
            aud: input.audience || `bulk-engine:${scope}`,
            jti: `tok-${now}`,
            iat: now,
            exp: now + (input.expiresInSeconds || 300),
            service_scope: scope,
        },
        input.signingKey,
    );
}

export function buildExecutionRecord(
    overrides: Partial<ExecutionRecord> = {},
): ExecutionRecord {
    return {
        schema_version: BULK_EXECUTION_SCHEMA_VERSION,
        execution_id: 'exe_test',
        entity_type: 'users',
        filter: {
            kind: 'all',
            scope: 'active',
        },
        action_name: 'delete',
        parameters: {},
        batch_size: 100,
        total_records: 0,
        dispatched_records: 0,
        total_batches: null,
        processed_records: 0,
        failed_records: 0,
        status: 'pending',
        status_reason: 'queued_for_dispatch',
        undo_enabled: true,
        undo_expiry_days: 7,
        undo_expires_at: '2026-01-08T00:00:00.000Z',
        undone_at: null,
        undone_by: null,
        scheduled_for: null,
        requested_by: 'operator-1',
        requested_at: '2026-01-01T00:00:00.000Z',
        started_at: null,
        completed_at: null,
        updated_at: '2026-01-01T00:00:00.000Z',
        error_detail: null,
        ...overrides,
    };
}

export function buildTestEngineConfig(
    overrides: Partial<BulkEngineConfig> = {},
): BulkEngineConfig {
    return {
        defaultBatchSize: 100,
        minBatchSize: 1,
        maxBatchSize: 1000,
        memoryThresholdPercent: 80,
        queueConcurrency: 4,
        queueMaxAttempts: 3,
        queueBackoffBaseMs: 1,
        queueBackoffCeilingMs: 5,
        batchTimeoutMs: 60000,
        failureThresholdPercent: 50,
        recordFailurePolicy: 'continue',
        undoDefaultExpiryDays: 7,
        undoMaxExpiryDays: 90,
        maxConcurrentExecutions: 5,
        maxRecordsPerExecution: 100000,
        cooldownSeconds: 60,
        cooldownThresholdRecords: 0,
        progressNotifyIntervalMs: 0,
        previewLimit: 5,
        maxScheduleDaysAhead: 365,
        actionAllowlist: null,
        ...overrides,
    };
}

export interface TestEngineOptions {
    config?: Partial<BulkEngineConfig>;
    now?: () => Date;
    registry?: ActionRegistry;
    store?: RecordStore;
    heapUsedPercent?: number;
}

export interface TestEngine {
    engine: BulkEngine;
    ledger: InMemoryExecutionLedger;
    events: LifecycleEvent[];
}

export function buildTestEngine(options: TestEngineOptions = {}): TestEngine {
    const ledger = new InMemoryExecutionLedger();
    const events: LifecycleEvent[] = [];
    const engine = createBulkEngine({
        ledger,
        store: options.store || new InMemoryRecordStore(['users']),
        registry: options.registry,
        events: {
            emit: (event) => {
                events.push(event);
            },
        },
        memorySampler: () => ({
            usedBytes: options.heapUsedPercent || 0,
            limitBytes: 100,
        }),
        now: options.now,
    }, buildTestEngineConfig(options.config));

    return { engine, ledger, events };
}

export function buildRecordIds(count: number, width = 4): string[] {
    return Array.from(
        { length: count },
        (_, index) => `r-${String(index + 1).padStart(width, '0')}`,
    );
}
