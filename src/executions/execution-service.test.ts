import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { BulkEngineConfig } from '../engine';
import { InMemoryRecordStore } from '../targets/record-store';
import {
    buildExecutionRecord,
    buildRecordIds,
    buildTestEngine,
} from '../test-helpers';

const ACTOR = 'operator-1';

function buildFixture(config: Partial<BulkEngineConfig> = {}) {
    let nowMs = Date.parse('2026-01-01T00:00:00.000Z');
    const store = new InMemoryRecordStore(['users']);

    store.seed('users', buildRecordIds(12).map((id) => ({
        id,
        fields: { tier: 'basic' },
        deleted_at: null,
    })));

    const fixture = buildTestEngine({
        store,
        config,
        now: () => new Date(nowMs),
    });

    return {
        ...fixture,
        store,
        advanceTo(iso: string): void {
            nowMs = Date.parse(iso);
        },
    };
}

function upgradeRequest(overrides: Record<string, unknown> = {}) {
    return {
        entity_type: 'users',
        filter: { kind: 'all' },
        action: 'update',
        parameters: { fields: { tier: 'gold' } },
        batch_size: 5,
        ...overrides,
    };
}

async function submitAndSettle(
    fixture: ReturnType<typeof buildFixture>,
    overrides: Record<string, unknown> = {},
): Promise<string> {
    const submitted = await fixture.engine.executions.submit(
        upgradeRequest(overrides),
        ACTOR,
    );

    assert.ok(submitted.success && !submitted.dry_run);
    await fixture.engine.whenIdle();

    return submitted.execution.execution_id;
}

describe('ExecutionService submit', () => {
    test('accepts a request and runs it to completion', async () => {
        const fixture = buildFixture();
        const submitted = await fixture.engine.executions.submit(
            upgradeRequest(),
            ACTOR,
        );

        assert.ok(submitted.success && !submitted.dry_run);
        assert.equal(submitted.statusCode, 202);
        assert.equal(submitted.execution.status, 'pending');
        assert.equal(submitted.execution.total_records, 12);
        assert.equal(submitted.execution.batch_size, 5);

        await fixture.engine.whenIdle();

        const status = await fixture.engine.executions.getStatus(
            submitted.execution.execution_id,
        );

        assert.ok(status.success);
        assert.equal(status.execution.status, 'completed');
        assert.equal(status.execution.status_reason, 'completed_all_batches');
        assert.equal(status.execution.total_batches, 3);
        assert.equal(status.progress.percentage, 100);
        assert.equal(status.progress.batches.completed, 3);
        assert.deepEqual(status.undo, {
            can_undo: true,
            time_remaining_seconds: 604800,
            undoable_records: 12,
        });
    });

    test('completes at once when nothing matches', async () => {
        const fixture = buildFixture();
        const submitted = await fixture.engine.executions.submit(
            upgradeRequest({ filter: { kind: 'ids', ids: ['nobody'] } }),
            ACTOR,
        );

        assert.ok(submitted.success && !submitted.dry_run);
        assert.equal(submitted.statusCode, 201);
        assert.equal(submitted.execution.status, 'completed');
        assert.equal(submitted.execution.status_reason, 'completed_no_matches');
        assert.deepEqual(
            fixture.events.map((event) => event.type),
            ['execution.completed'],
        );
    });

    test('rejects invalid requests before writing anything', async () => {
        const fixture = buildFixture();
        const cases: Array<[Record<string, unknown>, string]> = [
            [{ entity_type: 'widgets' }, 'unknown entity type: widgets'],
            [{ action: 'explode' }, 'unknown action: explode'],
            [
                { parameters: { fields: {} } },
                'parameters.fields: at least one field is required',
            ],
            [{ undo_expiry_days: 91 }, 'undo_expiry_days must not exceed 90'],
            [
                { scheduled_for: '2025-06-01T00:00:00.000Z' },
                'scheduled_for must be in the future',
            ],
        ];

        for (const [overrides, message] of cases) {
            assert.deepEqual(
                await fixture.engine.executions.submit(
                    upgradeRequest(overrides),
                    ACTOR,
                ),
                {
                    success: false,
                    statusCode: 400,
                    error: 'spec_invalid',
                    message,
                },
            );
        }

        assert.deepEqual(await fixture.ledger.listExecutions({}), []);
    });

    test('refuses actions outside the allowlist', async () => {
        const fixture = buildFixture({
            actionAllowlist: [{ action: 'update', entity_type: 'users' }],
        });

        assert.deepEqual(
            await fixture.engine.executions.submit(
                upgradeRequest({ action: 'delete', parameters: {} }),
                ACTOR,
            ),
            {
                success: false,
                statusCode: 403,
                error: 'unauthorized',
                message: 'actor may not run delete on users',
            },
        );
    });

    test('never admits more active executions than the ceiling', async () => {
        const fixture = buildFixture({ maxConcurrentExecutions: 2 });
        const later = { scheduled_for: '2026-01-05T00:00:00.000Z' };

        for (let index = 0; index < 2; index += 1) {
            const submitted = await fixture.engine.executions.submit(
                upgradeRequest(later),
                ACTOR,
            );

            assert.equal(submitted.success, true);
        }

        assert.deepEqual(
            await fixture.engine.executions.submit(upgradeRequest(later), ACTOR),
            {
                success: false,
                statusCode: 429,
                error: 'rate_limited',
                reason: 'concurrency_limit',
                message: 'actor already has 2 active executions (limit 2)',
            },
        );
        assert.equal(
            (await fixture.engine.executions.submit(
                upgradeRequest(later),
                'operator-2',
            )).success,
            true,
        );
    });

    test('admits one of two simultaneous submissions at a ceiling of one', async () => {
        const fixture = buildFixture({ maxConcurrentExecutions: 1 });
        const later = { scheduled_for: '2026-01-05T00:00:00.000Z' };
        const results = await Promise.all([
            fixture.engine.executions.submit(upgradeRequest(later), ACTOR),
            fixture.engine.executions.submit(upgradeRequest(later), ACTOR),
        ]);

        assert.deepEqual(
            results.map((result) => result.success).sort(),
            [false, true],
        );
        assert.equal(await fixture.ledger.countActiveForActor(ACTOR), 1);
    });

    test('enforces the cooldown after a large execution', async () => {
        const fixture = buildFixture({
            cooldownSeconds: 60,
            cooldownThresholdRecords: 10,
        });

        await submitAndSettle(fixture);

        assert.deepEqual(
            await fixture.engine.executions.submit(upgradeRequest(), ACTOR),
            {
                success: false,
                statusCode: 429,
                error: 'rate_limited',
                reason: 'cooldown',
                message: 'actor is cooling down for 60s',
                retry_after_seconds: 60,
            },
        );
    });

    test('rejects targets above the record limit', async () => {
        const fixture = buildFixture({ maxRecordsPerExecution: 5 });

        assert.deepEqual(
            await fixture.engine.executions.submit(upgradeRequest(), ACTOR),
            {
                success: false,
                statusCode: 429,
                error: 'rate_limited',
                reason: 'record_limit',
                message: 'target matches 12 records (limit 5)',
            },
        );
    });

    test('answers a dry run without creating an execution', async () => {
        const fixture = buildFixture();
        const result = await fixture.engine.executions.submit(
            upgradeRequest({ dry_run: true }),
            ACTOR,
        );

        assert.ok(result.success && result.dry_run);
        assert.equal(result.total, 12);
        assert.deepEqual(
            result.sample.map((record) => record.id),
            ['r-0001', 'r-0002', 'r-0003', 'r-0004', 'r-0005'],
        );
        assert.deepEqual(await fixture.ledger.listExecutions({}), []);
    });
});

describe('ExecutionService preview', () => {
    test('caps the sample at the configured limit', async () => {
        const fixture = buildFixture();
        const small = await fixture.engine.executions.preview({
            entity_type: 'users',
            filter: { kind: 'ids', ids: ['r-0003', 'r-0001', 'r-0001'] },
        }, ACTOR);
        const capped = await fixture.engine.executions.preview({
            entity_type: 'users',
            filter: { kind: 'all' },
            limit: 50,
        }, ACTOR);

        assert.ok(small.success);
        assert.equal(small.total, 2);
        assert.deepEqual(small.filter, {
            kind: 'ids',
            ids: ['r-0001', 'r-0003'],
            scope: 'active',
        });
        assert.ok(capped.success);
        assert.equal(capped.sample.length, 5);
    });
});

describe('ExecutionService cancel', () => {
    test('cancels a pending execution before any record is touched', async () => {
        const fixture = buildFixture();

        await fixture.ledger.createExecution(buildExecutionRecord({
            action_name: 'update',
            parameters: { fields: { tier: 'gold' } },
            total_records: 12,
        }));

        const cancelled = await fixture.engine.executions.cancel('exe_test', ACTOR);

        assert.ok(cancelled.success);
        assert.equal(cancelled.execution.status, 'cancelled');
        assert.equal(await fixture.engine.dispatcher.dispatch('exe_test'), null);
        assert.equal(
            (await fixture.ledger.getExecution('exe_test'))?.processed_records,
            0,
        );
        assert.deepEqual(
            await fixture.engine.executions.cancel('exe_test', ACTOR),
            {
                success: false,
                statusCode: 409,
                error: 'already_terminal',
                message: 'execution has already finished',
            },
        );
    });

    test('withdraws a scheduled execution through the scheduler', async () => {
        const fixture = buildFixture();
        const submitted = await fixture.engine.executions.submit(
            upgradeRequest({ scheduled_for: '2026-01-02T00:00:00.000Z' }),
            ACTOR,
        );

        assert.ok(submitted.success && !submitted.dry_run);

        const cancelled = await fixture.engine.executions.cancel(
            submitted.execution.execution_id,
            ACTOR,
        );

        assert.ok(cancelled.success);
        assert.equal(cancelled.execution.status_reason, 'cancelled_by_actor');
        assert.deepEqual(await fixture.engine.executions.listScheduled(ACTOR), []);
    });

    test('reports unknown executions', async () => {
        const fixture = buildFixture();

        assert.deepEqual(
            await fixture.engine.executions.getStatus('exe_missing'),
            {
                success: false,
                statusCode: 404,
                error: 'not_found',
                message: 'execution not found',
            },
        );
        assert.equal(
            (await fixture.engine.executions.cancel('exe_missing', ACTOR)).success,
            false,
        );
    });
});

describe('ExecutionService undo', () => {
    test('restores captured fields once', async () => {
        const fixture = buildFixture();
        const executionId = await submitAndSettle(fixture);

        assert.deepEqual(
            (await fixture.store.getMany('users', ['r-0007']))[0].fields,
            { tier: 'gold' },
        );

        const undone = await fixture.engine.executions.undo(executionId, ACTOR);

        assert.ok(undone.success);
        assert.equal(undone.restored_records, 12);
        assert.equal(undone.failed_records, 0);
        assert.deepEqual(
            (await fixture.store.getMany('users', ['r-0007']))[0].fields,
            { tier: 'basic' },
        );
        assert.deepEqual(
            await fixture.engine.executions.undo(executionId, ACTOR),
            {
                success: false,
                statusCode: 409,
                error: 'undo_unavailable',
                reason: 'already_undone',
                message: 'execution has already been undone',
            },
        );
    });

    test('refuses once the window has passed', async () => {
        const fixture = buildFixture();
        const executionId = await submitAndSettle(fixture);

        fixture.advanceTo('2026-01-08T00:00:01.000Z');

        assert.deepEqual(
            await fixture.engine.executions.undo(executionId, ACTOR),
            {
                success: false,
                statusCode: 409,
                error: 'undo_unavailable',
                reason: 'expired',
                message: 'the undo window for this execution has passed',
            },
        );
    });

    test('lists batches and registered actions', async () => {
        const fixture = buildFixture();
        const executionId = await submitAndSettle(fixture);
        const batches = await fixture.engine.executions.listBatches(executionId);

        assert.ok(batches.success);
        assert.deepEqual(
            batches.batches.map((batch) => batch.size),
            [5, 5, 2],
        );
        assert.deepEqual(
            fixture.engine.executions.listActions().map((action) => action.name),
            ['archive', 'delete', 'force_delete', 'restore', 'update'],
        );
    });
});
