import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { buildExecutionRecord } from '../test-helpers';
import { InMemoryExecutionLedger } from './execution-ledger';
import { SnapshotRecord } from './models';

const AT = '2026-01-01T00:00:10.000Z';

function snapshot(
    recordId: string,
    overrides: Partial<SnapshotRecord> = {},
): SnapshotRecord {
    return {
        snapshot_id: `snap_${recordId}`,
        execution_id: 'exe_test',
        entity_type: 'users',
        record_id: recordId,
        undo_operation: 'reinstate_deleted',
        captured_fields: 'json:{"fields":{},"deleted_at":null}',
        undone: false,
        undone_at: null,
        undone_by: null,
        created_at: AT,
        ...overrides,
    };
}

async function seededLedger(): Promise<InMemoryExecutionLedger> {
    const ledger = new InMemoryExecutionLedger();

    await ledger.createExecution(buildExecutionRecord({ total_records: 5 }));

    return ledger;
}

describe('InMemoryExecutionLedger', () => {
    test('rejects duplicate executions', async () => {
        const ledger = await seededLedger();

        await assert.rejects(
            ledger.createExecution(buildExecutionRecord()),
            /already exists/,
        );
    });

    test('transitions only from expected statuses', async () => {
        const ledger = await seededLedger();
        const moved = await ledger.transitionExecution(
            'exe_test',
            ['pending'],
            { status: 'processing', started_at: AT },
            AT,
        );
        const stale = await ledger.transitionExecution(
            'exe_test',
            ['pending'],
            { status: 'cancelled' },
            AT,
        );

        assert.equal(moved?.status, 'processing');
        assert.equal(moved?.started_at, AT);
        assert.equal(stale, null);
        assert.equal((await ledger.getExecution('exe_test'))?.status, 'processing');
    });

    test('grows the total while dispatching and fixes it on finalize', async () => {
        const ledger = await seededLedger();

        await ledger.appendBatch('exe_test', 1, ['a', 'b', 'c', 'd'], AT);
        await ledger.appendBatch('exe_test', 2, ['e', 'f'], AT);

        assert.equal((await ledger.getExecution('exe_test'))?.total_records, 6);

        const finalized = await ledger.finalizeDispatch('exe_test', 2, AT);

        assert.equal(finalized?.total_batches, 2);
        assert.equal(finalized?.total_records, 6);
        assert.equal(finalized?.dispatched_records, 6);
        await assert.rejects(
            ledger.appendBatch('exe_test', 2, ['g'], AT),
            /already exists/,
        );
    });

    test('claims, records progress and settles a batch once', async () => {
        const ledger = await seededLedger();

        await ledger.appendBatch('exe_test', 1, ['a', 'b', 'c'], AT);

        const claimed = await ledger.claimBatch('exe_test', 1, AT);

        assert.equal(claimed?.status, 'processing');
        assert.equal(claimed?.attempts, 1);

        await ledger.recordBatchProgress('exe_test', 1, {
            cursor: 1,
            processed: 1,
            failed: 0,
            failedIds: [],
        });
        await ledger.recordBatchProgress('exe_test', 1, {
            cursor: 2,
            processed: 0,
            failed: 1,
            failedIds: ['b'],
            errorDetail: 'boom',
        });

        const midway = await ledger.getExecution('exe_test');

        assert.equal(midway?.processed_records, 1);
        assert.equal(midway?.failed_records, 1);

        const settled = await ledger.settleBatch({
            executionId: 'exe_test',
            sequence: 1,
            status: 'failed',
            errorDetail: 'dead-lettered',
            completedAt: AT,
            remainingAsFailed: true,
        });

        assert.deepEqual(settled?.batch.failed_ids, ['b', 'c']);
        assert.equal(settled?.batch.cursor, 3);
        assert.equal(settled?.batch.error_detail, 'dead-lettered');
        assert.equal(settled?.execution.processed_records, 1);
        assert.equal(settled?.execution.failed_records, 2);

        assert.equal(
            await ledger.settleBatch({
                executionId: 'exe_test',
                sequence: 1,
                status: 'completed',
                errorDetail: null,
                completedAt: AT,
                remainingAsFailed: false,
            }),
            null,
        );
        assert.equal(await ledger.claimBatch('exe_test', 1, AT), null);
        assert.equal(await ledger.countOutstandingBatches('exe_test'), 0);
    });

    test('concurrent settlements lose no counter update', async () => {
        const ledger = await seededLedger();

        for (let sequence = 1; sequence <= 5; sequence += 1) {
            await ledger.appendBatch('exe_test', sequence, [`r${sequence}`], AT);
            await ledger.claimBatch('exe_test', sequence, AT);
            await ledger.recordBatchProgress('exe_test', sequence, {
                cursor: 1,
                processed: 1,
                failed: 0,
                failedIds: [],
            });
        }

        await Promise.all([5, 3, 1, 4, 2].map((sequence) =>
            ledger.settleBatch({
                executionId: 'exe_test',
                sequence,
                status: 'completed',
                errorDetail: null,
                completedAt: AT,
                remainingAsFailed: false,
            }),
        ));

        assert.equal(
            (await ledger.getExecution('exe_test'))?.processed_records,
            5,
        );
    });

    test('keeps the first non-undone snapshot per record', async () => {
        const ledger = await seededLedger();

        assert.equal(await ledger.saveSnapshot(snapshot('a')), true);
        assert.equal(
            await ledger.saveSnapshot(snapshot('a', { snapshot_id: 'snap_dup' })),
            false,
        );
        assert.equal(await ledger.saveSnapshot(snapshot('b')), true);
        assert.equal(await ledger.countUndoableSnapshots('exe_test'), 2);

        await ledger.markSnapshotUndone('snap_a', AT, 'operator-1');
        await ledger.deleteSnapshot('exe_test', 'b');

        assert.equal(await ledger.countUndoableSnapshots('exe_test'), 0);
        assert.equal(await ledger.deleteSnapshots('exe_test'), 1);
    });

    test('pages pending snapshots in record order', async () => {
        const ledger = await seededLedger();

        for (const id of ['c', 'a', 'b']) {
            await ledger.saveSnapshot(snapshot(id));
        }

        const first = await ledger.listPendingSnapshots('exe_test', {
            afterRecordId: null,
            limit: 2,
        });
        const second = await ledger.listPendingSnapshots('exe_test', {
            afterRecordId: 'b',
            limit: 2,
        });

        assert.deepEqual(first.map((entry) => entry.record_id), ['a', 'b']);
        assert.deepEqual(second.map((entry) => entry.record_id), ['c']);
    });

    test('claims undo exactly once and only inside the window', async () => {
        const ledger = new InMemoryExecutionLedger();

        await ledger.createExecution(buildExecutionRecord({
            status: 'completed',
        }));

        assert.equal(
            await ledger.claimUndo(
                'exe_test',
                '2026-01-08T00:00:00.000Z',
                'operator-1',
            ),
            null,
        );

        const claimed = await ledger.claimUndo('exe_test', AT, 'operator-1');

        assert.equal(claimed?.undo_enabled, false);
        assert.equal(claimed?.undone_by, 'operator-1');
        assert.equal(await ledger.claimUndo('exe_test', AT, 'operator-2'), null);
    });

    test('counts active executions per actor', async () => {
        const ledger = new InMemoryExecutionLedger();

        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_1',
            status: 'scheduled',
        }));
        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_2',
            status: 'completed',
        }));
        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_3',
            requested_by: 'operator-2',
        }));

        assert.equal(await ledger.countActiveForActor('operator-1'), 1);
        assert.equal(await ledger.countActiveForActor('operator-2'), 1);
    });

    test('lists due and upcoming scheduled executions', async () => {
        const ledger = new InMemoryExecutionLedger();

        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_late',
            status: 'scheduled',
            scheduled_for: '2026-01-03T00:00:00.000Z',
        }));
        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_soon',
            status: 'scheduled',
            scheduled_for: '2026-01-02T00:00:00.000Z',
        }));

        const due = await ledger.listDueScheduled(
            '2026-01-02T00:00:00.000Z',
            10,
        );
        const upcoming = await ledger.listExecutions({
            statuses: ['scheduled'],
            scheduledAfter: '2026-01-01T00:00:00.000Z',
            scheduledBefore: '2026-01-05T00:00:00.000Z',
        });

        assert.deepEqual(due.map((entry) => entry.execution_id), ['exe_soon']);
        assert.deepEqual(
            upcoming.map((entry) => entry.execution_id),
            ['exe_soon', 'exe_late'],
        );
    });

    test('finds expired undo windows and purgeable executions', async () => {
        const ledger = new InMemoryExecutionLedger();

        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_expired',
            status: 'completed',
            completed_at: '2026-01-01T00:00:00.000Z',
        }));
        await ledger.createExecution(buildExecutionRecord({
            execution_id: 'exe_old',
            status: 'failed',
            undo_enabled: false,
            completed_at: '2025-11-01T00:00:00.000Z',
        }));

        const expired = await ledger.listExpiredUndoWindows(
            '2026-01-09T00:00:00.000Z',
            10,
        );
        const purgeable = await ledger.listPurgeableExecutions(
            '2025-12-01T00:00:00.000Z',
            10,
        );

        assert.deepEqual(
            expired.map((entry) => entry.execution_id),
            ['exe_expired'],
        );
        assert.deepEqual(
            purgeable.map((entry) => entry.execution_id),
            ['exe_old'],
        );

        await ledger.deleteExecution('exe_old');
        assert.equal(await ledger.getExecution('exe_old'), null);
    });
});
