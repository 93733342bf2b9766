import {
    createServer,
    IncomingMessage,
    Server,
    ServerResponse,
} from 'node:http';
import { URL } from 'node:url';
import { z } from 'zod';
import { RequestAuthenticator } from './auth/authenticator';
import { BulkEngine } from './engine';
import { ExecutionFailure } from './executions/execution-service';
import { CooldownRequestSchema } from './executions/models';

export interface BulkEngineServerDependencies {
    authenticator: RequestAuthenticator;
    engine: BulkEngine;
}

export interface BulkEngineServerOptions {
    adminToken?: string;
    maxJsonBodyBytes?: number;
    executionRetentionDays?: number;
}

const DEFAULT_MAX_JSON_BODY_BYTES = 1_048_576;

const DEFAULT_EXECUTION_RETENTION_DAYS = 30;

const ADMIN_TOKEN_HEADER = 'x-bulk-admin-token';

const CleanupRequestSchema = z
    .object({
        retention_days: z.number().int().nonnegative().optional(),
    })
    .strict();

class RequestBodyTooLargeError extends Error {
    constructor(public readonly maxBytes: number) {
        super(`request body exceeded max of ${maxBytes} bytes`);
    }
}

class RequestBodyInvalidError extends Error {}

async function readJsonBody(
    request: IncomingMessage,
    maxJsonBodyBytes: number,
): Promise<unknown> {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    for await (const chunk of request) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        totalBytes += buffer.length;

        if (totalBytes > maxJsonBodyBytes) {
            throw new RequestBodyTooLargeError(maxJsonBodyBytes);
        }

        chunks.push(buffer);
    }

    const bodyText = Buffer.concat(chunks).toString('utf8');

    if (!bodyText.trim()) {
        return {};
    }

    let parsed: unknown;

    try {
        parsed = JSON.parse(bodyText) as unknown;
    } catch (error: unknown) {
        throw new RequestBodyInvalidError(
            error instanceof Error ? error.message : 'invalid JSON',
        );
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new RequestBodyInvalidError('request body must be a JSON object');
    }

    return parsed;
}

function sendJson(
    response: ServerResponse,
    statusCode: number,
    payload: Record<string, unknown>,
): void {
    response.statusCode = statusCode;
    response.setHeader('content-type', 'application/json');
    response.end(JSON.stringify(payload));
}

function sendFailure(
    response: ServerResponse,
    failure: ExecutionFailure,
): void {
    const payload: Record<string, unknown> = {
        error: failure.error,
        message: failure.message,
    };

    if (failure.reason !== undefined) {
        payload.reason = failure.reason;
    }

    if (failure.retry_after_seconds !== undefined) {
        payload.retry_after_seconds = failure.retry_after_seconds;
        response.setHeader('retry-after', String(failure.retry_after_seconds));
    }

    sendJson(response, failure.statusCode, payload);
}

interface ExecutionPath {
    executionId: string;
    action: 'batches' | 'cancel' | 'undo' | 'reschedule' | null;
}

function asExecutionPath(pathname: string): ExecutionPath | null {
    const match = pathname.match(
        /^\/v1\/executions\/([^/]+)(?:\/(batches|cancel|undo|reschedule))?$/,
    );

    if (!match) {
        return null;
    }

    const action = match[2];

    return {
        executionId: decodeURIComponent(match[1]),
        action: action === 'batches' ||
            action === 'cancel' ||
            action === 'undo' ||
            action === 'reschedule'
            ? action
            : null,
    };
}

function isAdminPath(pathname: string): boolean {
    return pathname.startsWith('/v1/admin/');
}

function isAdminAuthorized(
    request: IncomingMessage,
    options?: BulkEngineServerOptions,
): boolean {
    if (!options?.adminToken) {
        return false;
    }

    return request.headers[ADMIN_TOKEN_HEADER] === options.adminToken;
}

export function createBulkEngineServer(
    deps: BulkEngineServerDependencies,
    options?: BulkEngineServerOptions,
): Server {
    const maxJsonBodyBytes = options?.maxJsonBodyBytes ||
        DEFAULT_MAX_JSON_BODY_BYTES;
    const retentionDays = options?.executionRetentionDays ??
        DEFAULT_EXECUTION_RETENTION_DAYS;
    const { engine } = deps;

    return createServer(async (request, response) => {
        try {
            const method = request.method || 'GET';
            const parsedUrl = new URL(request.url || '/', 'http://localhost');
            const pathname = parsedUrl.pathname;

            if (method === 'GET' && pathname === '/v1/health') {
                sendJson(response, 200, {
                    ok: true,
                });

                return;
            }

            if (isAdminPath(pathname)) {
                if (!isAdminAuthorized(request, options)) {
                    sendJson(response, 403, {
                        error: 'forbidden',
                        reason_code: 'admin_auth_required',
                    });

                    return;
                }

                if (method === 'GET' && pathname === '/v1/admin/queue') {
                    sendJson(response, 200, {
                        ...engine.queue.stats(),
                    });

                    return;
                }

                if (
                    method === 'POST' &&
                    pathname === '/v1/admin/scheduler/process-due'
                ) {
                    sendJson(response, 200, {
                        ...await engine.scheduler.processDue(),
                    });

                    return;
                }

                if (method === 'POST' && pathname === '/v1/admin/cleanup') {
                    const body = CleanupRequestSchema.safeParse(
                        await readJsonBody(request, maxJsonBodyBytes),
                    );

                    if (!body.success) {
                        sendJson(response, 400, {
                            error: 'invalid_request',
                            message: body.error.issues[0]?.message ||
                                'Invalid request',
                        });

                        return;
                    }

                    sendJson(response, 200, {
                        ...await engine.cleanup.runOnce(
                            body.data.retention_days ?? retentionDays,
                        ),
                    });

                    return;
                }

                if (method === 'POST' && pathname === '/v1/admin/gate/cooldown') {
                    const body = CooldownRequestSchema.safeParse(
                        await readJsonBody(request, maxJsonBodyBytes),
                    );

                    if (!body.success) {
                        sendJson(response, 400, {
                            error: 'invalid_request',
                            message: body.error.issues[0]?.message ||
                                'Invalid request',
                        });

                        return;
                    }

                    const actor = body.data.actor.trim();

                    if (body.data.clear) {
                        await engine.gate.clearCooldown(actor);
                    } else {
                        await engine.gate.setCooldown(actor, body.data.seconds);
                    }

                    console.log('actor cooldown changed', {
                        actor,
                        cleared: body.data.clear,
                        seconds: body.data.seconds ?? null,
                    });
                    sendJson(response, 200, {
                        actor,
                        cooldown_remaining_seconds:
                            await engine.gate.getCooldownRemaining(actor),
                        remaining_slots:
                            await engine.gate.getRemainingSlots(actor),
                    });

                    return;
                }

                sendJson(response, 404, {
                    error: 'not_found',
                });

                return;
            }

            const authResult = deps.authenticator.authenticate(
                request.headers.authorization,
            );

            if (!authResult.success) {
                sendJson(response, 401, {
                    error: 'unauthorized',
                    reason_code: authResult.reasonCode,
                });

                return;
            }

            const actor = authResult.auth.actor;

            if (method === 'GET' && pathname === '/v1/actions') {
                sendJson(response, 200, {
                    actions: engine.executions.listActions(),
                });

                return;
            }

            if (method === 'POST' && pathname === '/v1/executions') {
                const body = await readJsonBody(request, maxJsonBodyBytes);
                const result = await engine.executions.submit(body, actor);

                if (!result.success) {
                    sendFailure(response, result);

                    return;
                }

                if (result.dry_run) {
                    sendJson(response, 200, {
                        dry_run: true,
                        entity_type: result.entity_type,
                        filter: result.filter,
                        total: result.total,
                        sample: result.sample,
                    });

                    return;
                }

                sendJson(response, result.statusCode, {
                    execution: result.execution,
                });

                return;
            }

            if (method === 'POST' && pathname === '/v1/executions/preview') {
                const body = await readJsonBody(request, maxJsonBodyBytes);
                const result = await engine.executions.preview(body, actor);

                if (!result.success) {
                    sendFailure(response, result);

                    return;
                }

                sendJson(response, 200, {
                    entity_type: result.entity_type,
                    filter: result.filter,
                    total: result.total,
                    sample: result.sample,
                });

                return;
            }

            if (method === 'GET' && pathname === '/v1/executions/scheduled') {
                sendJson(response, 200, {
                    executions: await engine.executions.listScheduled(actor),
                });

                return;
            }

            const executionPath = asExecutionPath(pathname);

            if (executionPath && method === 'GET') {
                if (executionPath.action === null) {
                    const result = await engine.executions.getStatus(
                        executionPath.executionId,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, 200, {
                        execution: result.execution,
                        progress: result.progress,
                        undo: result.undo,
                    });

                    return;
                }

                if (executionPath.action === 'batches') {
                    const result = await engine.executions.listBatches(
                        executionPath.executionId,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, 200, {
                        batches: result.batches,
                    });

                    return;
                }
            }

            if (executionPath && method === 'POST') {
                if (executionPath.action === 'cancel') {
                    const result = await engine.executions.cancel(
                        executionPath.executionId,
                        actor,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, 200, {
                        execution: result.execution,
                    });

                    return;
                }

                if (executionPath.action === 'undo') {
                    const result = await engine.executions.undo(
                        executionPath.executionId,
                        actor,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, 200, {
                        execution: result.execution,
                        restored_records: result.restored_records,
                        failed_records: result.failed_records,
                    });

                    return;
                }

                if (executionPath.action === 'reschedule') {
                    const body = await readJsonBody(request, maxJsonBodyBytes);
                    const result = await engine.executions.reschedule(
                        executionPath.executionId,
                        body,
                        actor,
                    );

                    if (!result.success) {
                        sendFailure(response, result);

                        return;
                    }

                    sendJson(response, 200, {
                        execution: result.execution,
                    });

                    return;
                }
            }

            sendJson(response, 404, {
                error: 'not_found',
            });
        } catch (error: unknown) {
            if (error instanceof RequestBodyTooLargeError) {
                sendJson(response, 413, {
                    error: 'payload_too_large',
                    reason_code: 'request_body_too_large',
                    message: error.message,
                });

                return;
            }

            if (error instanceof RequestBodyInvalidError) {
                sendJson(response, 400, {
                    error: 'bad_request',
                    message: error.message,
                });

                return;
            }

            console.error('bulk-engine request failed', {
                method: request.method,
                url: request.url,
                error: error instanceof Error ? error.message : String(error),
            });
            sendJson(response, 500, {
                error: 'internal_error',
            });
        }
    });
}
