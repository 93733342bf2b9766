import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { BulkEngineConfig } from '../engine';
import { InMemoryRecordStore } from '../targets/record-store';
import { buildExecutionRecord, buildTestEngine } from '../test-helpers';
import { validateScheduledFor } from './scheduler-service';

const START = new Date('2026-01-01T00:00:00.000Z');

function buildFixture(config: Partial<BulkEngineConfig> = {}) {
    let nowMs = START.getTime();
    const store = new InMemoryRecordStore(['users']);

    store.seed('users', ['u-1', 'u-2', 'u-3'].map((id) => ({
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

function scheduledRecord(executionId: string, scheduledFor: string, actor = 'operator-1') {
    return buildExecutionRecord({
        execution_id: executionId,
        action_name: 'update',
        parameters: { fields: { tier: 'gold' } },
        status: 'scheduled',
        status_reason: 'awaiting_schedule',
        scheduled_for: scheduledFor,
        requested_by: actor,
        undo_expires_at: null,
    });
}

describe('validateScheduledFor', () => {
    test('rejects unparseable, past and far-future times', () => {
        assert.deepEqual(validateScheduledFor('soon', START, 30), {
            success: false,
            message: 'scheduled_for must be an ISO timestamp',
        });
        assert.deepEqual(
            validateScheduledFor('2025-12-31T23:59:59.000Z', START, 30),
            {
                success: false,
                message: 'scheduled_for must be in the future',
            },
        );
        assert.deepEqual(
            validateScheduledFor('2026-03-01T00:00:00.000Z', START, 30),
            {
                success: false,
                message: 'scheduled_for must be within 30 days',
            },
        );
    });

    test('normalizes an accepted time to UTC with millis', () => {
        assert.deepEqual(
            validateScheduledFor('2026-01-05T10:00:00+02:00', START, 30),
            {
                success: true,
                scheduledFor: '2026-01-05T08:00:00.000Z',
            },
        );
    });
});

describe('SchedulerService', () => {
    test('promotes a due execution and anchors undo at activation', async () => {
        const { engine, ledger, store, advanceTo } = buildFixture();
        const submitted = await engine.executions.submit({
            entity_type: 'users',
            filter: { kind: 'all' },
            action: 'update',
            parameters: { fields: { tier: 'gold' } },
            scheduled_for: '2026-01-02T00:00:00.000Z',
        }, 'operator-1');

        assert.equal(submitted.success, true);
        assert.ok(submitted.success && !submitted.dry_run);

        const executionId = submitted.execution.execution_id;

        assert.equal(submitted.statusCode, 202);
        assert.equal(submitted.execution.status, 'scheduled');
        assert.equal(
            submitted.execution.undo_expires_at,
            '2026-01-09T00:00:00.000Z',
        );
        assert.deepEqual(await engine.scheduler.processDue(), {
            promoted: [],
            failed: [],
        });

        advanceTo('2026-01-02T06:00:00.000Z');

        assert.deepEqual(await engine.scheduler.processDue(), {
            promoted: [executionId],
            failed: [],
        });

        await engine.whenIdle();

        const execution = await ledger.getExecution(executionId);

        assert.equal(execution?.status, 'completed');
        assert.equal(execution?.processed_records, 3);
        assert.equal(execution?.undo_expires_at, '2026-01-09T06:00:00.000Z');
        assert.deepEqual(
            (await store.getMany('users', ['u-2']))[0].fields,
            { tier: 'gold' },
        );
    });

    test('fails activation when the target outgrew the record limit', async () => {
        const { engine, ledger, advanceTo } = buildFixture({
            maxRecordsPerExecution: 2,
        });

        await ledger.createExecution(
            scheduledRecord('exe_big', '2026-01-01T12:00:00.000Z'),
        );
        advanceTo('2026-01-01T12:00:00.000Z');

        assert.deepEqual(await engine.scheduler.processDue(), {
            promoted: [],
            failed: [
                {
                    execution_id: 'exe_big',
                    error: 'target matches 3 records (limit 2)',
                },
            ],
        });

        const execution = await ledger.getExecution('exe_big');

        assert.equal(execution?.status, 'failed');
        assert.equal(execution?.status_reason, 'failed_activation_error');
        assert.equal(execution?.error_detail, 'target matches 3 records (limit 2)');
    });

    test('cancels only scheduled executions', async () => {
        const { engine, ledger } = buildFixture();

        await ledger.createExecution(
            scheduledRecord('exe_later', '2026-01-03T00:00:00.000Z'),
        );

        const cancelled = await engine.scheduler.cancel('exe_later');

        assert.equal(cancelled.success, true);
        assert.equal(
            (await ledger.getExecution('exe_later'))?.status_reason,
            'cancelled_by_actor',
        );
        assert.deepEqual(await engine.scheduler.cancel('exe_later'), {
            success: false,
            statusCode: 409,
            error: 'scheduling_conflict',
            message:
                'only scheduled executions can be cancelled by the scheduler',
        });
        assert.deepEqual(await engine.scheduler.cancel('exe_missing'), {
            success: false,
            statusCode: 404,
            error: 'not_found',
            message: 'execution not found',
        });
    });

    test('reschedules and recomputes the undo deadline', async () => {
        const { engine, ledger } = buildFixture();

        await ledger.createExecution({
            ...scheduledRecord('exe_later', '2026-01-03T00:00:00.000Z'),
            undo_expires_at: '2026-01-10T00:00:00.000Z',
        });

        const moved = await engine.scheduler.reschedule('exe_later', {
            scheduled_for: '2026-01-04T12:00:00.000Z',
        });

        assert.ok(moved.success);
        assert.equal(moved.execution.scheduled_for, '2026-01-04T12:00:00.000Z');
        assert.equal(
            moved.execution.undo_expires_at,
            '2026-01-11T12:00:00.000Z',
        );

        const invalid = await engine.scheduler.reschedule('exe_later', {});

        assert.equal(invalid.success, false);
        assert.ok(!invalid.success && invalid.statusCode === 400);
        assert.deepEqual(
            await engine.scheduler.reschedule('exe_later', {
                scheduled_for: '2025-12-01T00:00:00.000Z',
            }),
            {
                success: false,
                statusCode: 400,
                error: 'invalid_request',
                message: 'scheduled_for must be in the future',
            },
        );
    });

    test('lists scheduled executions per actor and within a horizon', async () => {
        const { engine, ledger } = buildFixture();

        await ledger.createExecution(
            scheduledRecord('exe_soon', '2026-01-01T02:00:00.000Z'),
        );
        await ledger.createExecution(
            scheduledRecord('exe_later', '2026-01-02T06:00:00.000Z'),
        );
        await ledger.createExecution(
            scheduledRecord('exe_other', '2026-01-01T03:00:00.000Z', 'operator-2'),
        );

        const mine = await engine.scheduler.listScheduled('operator-1');
        const upcoming = await engine.scheduler.listUpcoming(24);

        assert.deepEqual(
            mine.map((execution) => execution.execution_id).sort(),
            ['exe_later', 'exe_soon'],
        );
        assert.deepEqual(
            upcoming.map((execution) => execution.execution_id).sort(),
            ['exe_other', 'exe_soon'],
        );
    });
});
