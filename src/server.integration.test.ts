import assert from 'node:assert/strict';
import { once } from 'node:events';
import { Server } from 'node:http';
import { test } from 'node:test';
import { RequestAuthenticator } from './auth/authenticator';
import { createBulkEngineServer } from './server';
import { InMemoryRecordStore } from './targets/record-store';
import {
    buildScopedToken,
    buildTestEngine,
    TEST_ADMIN_TOKEN,
    TEST_SIGNING_KEY,
} from './test-helpers';

interface ResponseData {
    status: number;
    headers: Headers;
    body: Record<string, unknown>;
}

const FIXED_NOW = new Date('2026-02-16T12:00:00.000Z');

function now(): Date {
    return new Date(FIXED_NOW.getTime());
}

const TOKEN = buildScopedToken({
    signingKey: TEST_SIGNING_KEY,
    issuedAt: Math.floor(FIXED_NOW.getTime() / 1000),
});

async function listen(server: Server): Promise<string> {
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();

    if (!address || typeof address === 'string') {
        throw new Error('server address is unavailable');
    }

    return `http://127.0.0.1:${address.port}`;
}

async function closeServer(server: Server): Promise<void> {
    await new Promise<void>((resolve) => {
        server.close(() => {
            resolve();
        });
    });
}

async function request(
    baseUrl: string,
    method: 'GET' | 'POST',
    path: string,
    options: {
        token?: string | null;
        adminToken?: string;
        body?: string;
    } = {},
): Promise<ResponseData> {
    const headers: Record<string, string> = {
        'content-type': 'application/json',
    };
    const token = options.token === undefined ? TOKEN : options.token;

    if (token) {
        headers.authorization = `Bearer ${token}`;
    }

    if (options.adminToken) {
        headers['x-bulk-admin-token'] = options.adminToken;
    }

    const response = await fetch(`${baseUrl}${path}`, {
        method,
        headers,
        body: method === 'POST' ? options.body || '{}' : undefined,
    });
    const body = await response.json() as Record<string, unknown>;

    return {
        status: response.status,
        headers: response.headers,
        body,
    };
}

function readExecutionId(value: unknown): string {
    if (
        typeof value === 'object' &&
        value !== null &&
        'execution_id' in value &&
        typeof value.execution_id === 'string'
    ) {
        return value.execution_id;
    }

    throw new Error('response carries no execution_id');
}

async function postJson(
    baseUrl: string,
    path: string,
    payload: Record<string, unknown>,
    adminToken?: string,
): Promise<ResponseData> {
    return request(baseUrl, 'POST', path, {
        body: JSON.stringify(payload),
        adminToken,
    });
}

async function withServer(
    run: (
        baseUrl: string,
        fixture: ReturnType<typeof buildTestEngine>,
    ) => Promise<void>,
): Promise<void> {
    const store = new InMemoryRecordStore(['users']);

    store.seed('users', ['u-1', 'u-2', 'u-3'].map((id) => ({
        id,
        fields: { tier: 'basic' },
        deleted_at: null,
    })));

    const fixture = buildTestEngine({
        store,
        now,
    });
    const server = createBulkEngineServer({
        authenticator: new RequestAuthenticator({
            signingKey: TEST_SIGNING_KEY,
            tokenClockSkewSeconds: 30,
            now,
        }),
        engine: fixture.engine,
    }, {
        adminToken: TEST_ADMIN_TOKEN,
        maxJsonBodyBytes: 4096,
    });
    const baseUrl = await listen(server);

    try {
        await run(baseUrl, fixture);
    } finally {
        await fixture.engine.shutdown();
        await closeServer(server);
    }
}

const UPGRADE_REQUEST = {
    entity_type: 'users',
    filter: { kind: 'all' },
    action: 'update',
    parameters: { fields: { tier: 'gold' } },
    batch_size: 2,
};

test('health check needs no token', async () => {
    await withServer(async (baseUrl) => {
        const response = await request(baseUrl, 'GET', '/v1/health', {
            token: null,
        });

        assert.equal(response.status, 200);
        assert.deepEqual(response.body, { ok: true });
    });
});

test('requests without a bulk-scoped token are rejected', async () => {
    await withServer(async (baseUrl) => {
        const missing = await request(baseUrl, 'GET', '/v1/actions', {
            token: null,
        });
        const foreignScoped = await request(baseUrl, 'GET', '/v1/actions', {
            token: buildScopedToken({
                signingKey: TEST_SIGNING_KEY,
                issuedAt: Math.floor(FIXED_NOW.getTime() / 1000),
                scope: 'reports',
            }),
        });

        assert.equal(missing.status, 401);
        assert.deepEqual(missing.body, {
            error: 'unauthorized',
            reason_code: 'denied_token_malformed',
        });
        assert.equal(foreignScoped.status, 401);
        assert.equal(foreignScoped.body.reason_code, 'denied_token_wrong_service_scope');
    });
});

test('execution runs, reports status and undoes once', async () => {
    await withServer(async (baseUrl, { engine }) => {
        const submitted = await postJson(baseUrl, '/v1/executions', UPGRADE_REQUEST);

        assert.equal(submitted.status, 202);

        const executionId = readExecutionId(submitted.body.execution);

        await engine.whenIdle();

        const status = await request(
            baseUrl,
            'GET',
            `/v1/executions/${executionId}`,
        );

        assert.equal(status.status, 200);
        assert.deepEqual(status.body.undo, {
            can_undo: true,
            time_remaining_seconds: 604800,
            undoable_records: 3,
        });

        const batches = await request(
            baseUrl,
            'GET',
            `/v1/executions/${executionId}/batches`,
        );

        assert.equal(batches.status, 200);
        assert.ok(Array.isArray(batches.body.batches));
        assert.equal(batches.body.batches.length, 2);

        const undone = await postJson(
            baseUrl,
            `/v1/executions/${executionId}/undo`,
            {},
        );

        assert.equal(undone.status, 200);
        assert.equal(undone.body.restored_records, 3);
        assert.deepEqual(
            (await engine.store.getMany('users', ['u-1']))[0].fields,
            { tier: 'basic' },
        );

        const again = await postJson(
            baseUrl,
            `/v1/executions/${executionId}/undo`,
            {},
        );

        assert.equal(again.status, 409);
        assert.deepEqual(again.body, {
            error: 'undo_unavailable',
            reason: 'already_undone',
            message: 'execution has already been undone',
        });
    });
});

test('invalid submissions return spec_invalid', async () => {
    await withServer(async (baseUrl) => {
        const response = await postJson(baseUrl, '/v1/executions', {
            ...UPGRADE_REQUEST,
            action: 'explode',
        });

        assert.equal(response.status, 400);
        assert.deepEqual(response.body, {
            error: 'spec_invalid',
            message: 'unknown action: explode',
        });
    });
});

test('malformed JSON bodies are rejected as bad requests', async () => {
    await withServer(async (baseUrl) => {
        const response = await request(baseUrl, 'POST', '/v1/executions', {
            body: '{"entity_type":',
        });

        assert.equal(response.status, 400);
        assert.equal(response.body.error, 'bad_request');
    });
});

test('preview returns the match count and sample', async () => {
    await withServer(async (baseUrl) => {
        const response = await postJson(baseUrl, '/v1/executions/preview', {
            entity_type: 'users',
            filter: { kind: 'ids', ids: ['u-2', 'u-9'] },
        });

        assert.equal(response.status, 200);
        assert.equal(response.body.total, 1);
        assert.deepEqual(response.body.sample, [
            {
                id: 'u-2',
                fields: { tier: 'basic' },
                deleted_at: null,
            },
        ]);
    });
});

test('admin cooldown blocks submissions with retry-after', async () => {
    await withServer(async (baseUrl) => {
        const forbidden = await postJson(baseUrl, '/v1/admin/gate/cooldown', {
            actor: 'operator-1',
        });

        assert.equal(forbidden.status, 403);

        const set = await postJson(baseUrl, '/v1/admin/gate/cooldown', {
            actor: 'operator-1',
            seconds: 120,
        }, TEST_ADMIN_TOKEN);

        assert.equal(set.status, 200);
        assert.deepEqual(set.body, {
            actor: 'operator-1',
            cooldown_remaining_seconds: 120,
            remaining_slots: 5,
        });

        const limited = await postJson(baseUrl, '/v1/executions', UPGRADE_REQUEST);

        assert.equal(limited.status, 429);
        assert.equal(limited.headers.get('retry-after'), '120');
        assert.deepEqual(limited.body, {
            error: 'rate_limited',
            message: 'actor is cooling down for 120s',
            reason: 'cooldown',
            retry_after_seconds: 120,
        });

        const cleared = await postJson(baseUrl, '/v1/admin/gate/cooldown', {
            actor: 'operator-1',
            clear: true,
        }, TEST_ADMIN_TOKEN);

        assert.equal(cleared.body.cooldown_remaining_seconds, 0);
    });
});

test('scheduled executions can be listed, moved and cancelled', async () => {
    await withServer(async (baseUrl) => {
        const submitted = await postJson(baseUrl, '/v1/executions', {
            ...UPGRADE_REQUEST,
            scheduled_for: '2026-02-17T12:00:00.000Z',
        });

        assert.equal(submitted.status, 202);

        const scheduled = await request(
            baseUrl,
            'GET',
            '/v1/executions/scheduled',
        );

        assert.ok(Array.isArray(scheduled.body.executions));
        assert.equal(scheduled.body.executions.length, 1);

        const executionId = readExecutionId(scheduled.body.executions[0]);
        const moved = await postJson(
            baseUrl,
            `/v1/executions/${executionId}/reschedule`,
            { scheduled_for: '2026-02-18T00:00:00.000Z' },
        );

        assert.equal(moved.status, 200);

        const cancelled = await postJson(
            baseUrl,
            `/v1/executions/${executionId}/cancel`,
            {},
        );

        assert.equal(cancelled.status, 200);
        assert.deepEqual(
            (await request(baseUrl, 'GET', '/v1/executions/scheduled')).body,
            { executions: [] },
        );
    });
});

test('admin maintenance routes report what they did', async () => {
    await withServer(async (baseUrl) => {
        const due = await postJson(
            baseUrl,
            '/v1/admin/scheduler/process-due',
            {},
            TEST_ADMIN_TOKEN,
        );
        const cleanup = await postJson(
            baseUrl,
            '/v1/admin/cleanup',
            {},
            TEST_ADMIN_TOKEN,
        );

        assert.deepEqual(due.body, { promoted: [], failed: [] });
        assert.deepEqual(cleanup.body, {
            snapshots: { executions: 0, snapshots: 0 },
            executions: { executions: 0, cutoff: '2026-01-17T12:00:00.000Z' },
        });
    });
});

test('unknown routes return not_found', async () => {
    await withServer(async (baseUrl) => {
        const response = await request(baseUrl, 'GET', '/v1/nothing-here');

        assert.equal(response.status, 404);
        assert.deepEqual(response.body, { error: 'not_found' });
    });
});
