import { Pool } from 'pg';
import { RequestAuthenticator } from './auth/authenticator';
import { createBulkEngine } from './engine';
import { parseBulkEngineEnv } from './env';
import { PostgresExecutionLedger } from './executions/postgres-execution-ledger';
import { createBulkEngineServer } from './server';
import { PostgresRecordStore } from './targets/postgres-record-store';

export * from './constants';
export { createBulkEngine } from './engine';
export { ActionRegistry } from './actions/action-registry';
export { registerBuiltinActions } from './actions/builtin-actions';

async function main(): Promise<void> {
    const env = parseBulkEngineEnv(process.env);
    const statePool = new Pool({
        allowExitOnIdle: false,
        connectionString: env.pgUrl,
        idleTimeoutMillis: 30000,
        max: 10,
    });
    const ledger = new PostgresExecutionLedger(env.pgUrl, {
        pool: statePool,
        schemaName: env.pgSchema,
    });
    const store = new PostgresRecordStore(env.pgUrl, {
        pool: statePool,
        schemaName: env.pgSchema,
        entityTypes: env.entityTypes,
    });
    const engine = createBulkEngine({
        ledger,
        store,
    }, env);
    const authenticator = new RequestAuthenticator({
        signingKey: env.authSigningKey,
        tokenClockSkewSeconds: env.authClockSkewSeconds,
        expectedIssuer: env.authExpectedIssuer,
    });
    const server = createBulkEngineServer({
        authenticator,
        engine,
    }, {
        adminToken: env.adminToken,
        maxJsonBodyBytes: env.maxJsonBodyBytes,
        executionRetentionDays: env.executionRetentionDays,
    });

    // Picks up executions a previous process left mid-dispatch.
    await engine.dispatcher.recover();

    await new Promise<void>((resolve) => {
        server.listen(env.port, '0.0.0.0', () => {
            resolve();
        });
    });

    engine.scheduler.start(env.schedulerIntervalSeconds * 1000);

    if (env.cleanupIntervalSeconds > 0) {
        engine.cleanup.start(
            env.cleanupIntervalSeconds * 1000,
            env.executionRetentionDays,
        );
    }

    console.log('bulk-engine listening', {
        entity_types: env.entityTypes,
        default_batch_size: env.defaultBatchSize,
        min_batch_size: env.minBatchSize,
        max_batch_size: env.maxBatchSize,
        queue_concurrency: env.queueConcurrency,
        queue_max_attempts: env.queueMaxAttempts,
        batch_timeout_ms: env.batchTimeoutMs,
        failure_threshold_percent: env.failureThresholdPercent,
        record_failure_policy: env.recordFailurePolicy,
        max_concurrent_executions: env.maxConcurrentExecutions,
        max_records_per_execution: env.maxRecordsPerExecution,
        scheduler_interval_seconds: env.schedulerIntervalSeconds,
        cleanup_interval_seconds: env.cleanupIntervalSeconds,
        action_allowlist_entries: env.actionAllowlist
            ? env.actionAllowlist.length
            : null,
        max_json_body_bytes: env.maxJsonBodyBytes,
        pg_url_configured: env.pgUrl.length > 0,
        port: env.port,
    });

    process.once('SIGTERM', () => {
        console.log('bulk-engine shutting down');
        server.close();
        engine.shutdown()
            .then(() => statePool.end())
            .catch((error: unknown) => {
                console.error('bulk-engine shutdown failed', error);
                process.exitCode = 1;
            });
    });
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('bulk-engine failed to start', error);
        process.exitCode = 1;
    });
}
