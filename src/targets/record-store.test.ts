import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { InMemoryRecordStore } from './record-store';

function buildStore(): InMemoryRecordStore {
    const store = new InMemoryRecordStore(['users']);

    store.seed('users', [
        { id: 'u-3', fields: { name: 'Cy' }, deleted_at: null },
        { id: 'u-1', fields: { name: 'Al' }, deleted_at: null },
        {
            id: 'u-2',
            fields: { name: 'Bo' },
            deleted_at: '2026-01-01T00:00:00.000Z',
        },
    ]);

    return store;
}

describe('InMemoryRecordStore', () => {
    test('scans in id order with keyset paging and scope', async () => {
        const store = buildStore();
        const first = await store.scan('users', {
            afterId: null,
            limit: 1,
            scope: 'any',
        });
        const rest = await store.scan('users', {
            afterId: 'u-1',
            limit: 10,
            scope: 'active',
        });

        assert.deepEqual(first.map((entry) => entry.id), ['u-1']);
        assert.deepEqual(rest.map((entry) => entry.id), ['u-3']);
    });

    test('returns copies that do not alias stored state', async () => {
        const store = buildStore();
        const fetched = await store.get('users', 'u-1');

        assert.ok(fetched);
        fetched.fields.name = 'changed';

        const again = await store.get('users', 'u-1');
        assert.equal(again?.fields.name, 'Al');
    });

    test('merges updated fields', async () => {
        const store = buildStore();
        const updated = await store.update('users', 'u-1', { role: 'admin' });

        assert.deepEqual(updated?.fields, { name: 'Al', role: 'admin' });
        assert.equal(await store.update('users', 'missing', {}), null);
    });

    test('drops unset fields after merging', async () => {
        const store = buildStore();

        await store.update('users', 'u-1', { role: 'admin', tier: 'gold' });

        const reverted = await store.update(
            'users',
            'u-1',
            { tier: 'basic' },
            ['role'],
        );

        assert.deepEqual(reverted?.fields, { name: 'Al', tier: 'basic' });
        assert.deepEqual((await store.get('users', 'u-1'))?.fields, {
            name: 'Al',
            tier: 'basic',
        });
    });

    test('soft deletes and restores once', async () => {
        const store = buildStore();
        const at = '2026-02-01T00:00:00.000Z';

        assert.equal(await store.softDelete('users', 'u-1', at), true);
        assert.equal(await store.softDelete('users', 'u-1', at), false);
        assert.equal((await store.get('users', 'u-1'))?.deleted_at, at);
        assert.equal(await store.restore('users', 'u-1'), true);
        assert.equal(await store.restore('users', 'u-1'), false);
    });

    test('destroys and reinserts records', async () => {
        const store = buildStore();

        assert.equal(await store.destroy('users', 'u-3'), true);
        assert.equal(await store.get('users', 'u-3'), null);

        await store.insert('users', {
            id: 'u-3',
            fields: { name: 'Cy' },
            deleted_at: null,
        });
        await assert.rejects(
            store.insert('users', {
                id: 'u-3',
                fields: {},
                deleted_at: null,
            }),
            /already exists/,
        );
    });

    test('rejects unknown entity types', async () => {
        const store = buildStore();

        assert.equal(await store.hasEntityType('orders'), false);
        await assert.rejects(
            store.get('orders', 'o-1'),
            /unknown entity type: orders/,
        );
    });
});
