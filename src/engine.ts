import { ActionRegistry } from './actions/action-registry';
import { registerBuiltinActions } from './actions/builtin-actions';
import {
    AuthorizationPolicy,
    createAuthorizationPolicy,
} from './auth/authorization-policy';
import { BatchDispatcher } from './dispatch/batch-dispatcher';
import { BatchWorker } from './dispatch/batch-worker';
import { ExecutionFinalizer } from './dispatch/execution-finalizer';
import { MemoryMonitor, MemorySampler } from './dispatch/memory-monitor';
import { BulkEngineEnv } from './env';
import {
    InProcessLifecycleEventSink,
    LifecycleEventSink,
} from './events/lifecycle-events';
import { ExecutionLedger } from './executions/execution-ledger';
import { ExecutionService } from './executions/execution-service';
import { RateGate } from './gate/rate-gate';
import { CleanupService } from './maintenance/cleanup-service';
import { ProgressTracker } from './progress/progress-tracker';
import { isRetryableBatchError } from './queue/errors';
import { BatchJob, InMemoryWorkQueue } from './queue/work-queue';
import { SchedulerService } from './scheduler/scheduler-service';
import { RecordStore } from './targets/record-store';
import { TargetResolver } from './targets/target-resolver';
import { UndoManager } from './undo/undo-manager';

export type BulkEngineConfig = Pick<
    BulkEngineEnv,
    | 'defaultBatchSize'
    | 'minBatchSize'
    | 'maxBatchSize'
    | 'memoryThresholdPercent'
    | 'queueConcurrency'
    | 'queueMaxAttempts'
    | 'queueBackoffBaseMs'
    | 'queueBackoffCeilingMs'
    | 'batchTimeoutMs'
    | 'failureThresholdPercent'
    | 'recordFailurePolicy'
    | 'undoDefaultExpiryDays'
    | 'undoMaxExpiryDays'
    | 'maxConcurrentExecutions'
    | 'maxRecordsPerExecution'
    | 'cooldownSeconds'
    | 'cooldownThresholdRecords'
    | 'progressNotifyIntervalMs'
    | 'previewLimit'
    | 'maxScheduleDaysAhead'
    | 'actionAllowlist'
>;

export interface BulkEngineDependencies {
    ledger: ExecutionLedger;
    store: RecordStore;
    registry?: ActionRegistry;
    events?: LifecycleEventSink;
    authorization?: AuthorizationPolicy;
    memorySampler?: MemorySampler;
    now?: () => Date;
}

export interface BulkEngine {
    ledger: ExecutionLedger;
    store: RecordStore;
    registry: ActionRegistry;
    events: LifecycleEventSink;
    resolver: TargetResolver;
    tracker: ProgressTracker;
    undoManager: UndoManager;
    finalizer: ExecutionFinalizer;
    monitor: MemoryMonitor;
    worker: BatchWorker;
    queue: InMemoryWorkQueue<BatchJob>;
    dispatcher: BatchDispatcher;
    gate: RateGate;
    scheduler: SchedulerService;
    cleanup: CleanupService;
    executions: ExecutionService;
    whenIdle(): Promise<void>;
    shutdown(): Promise<void>;
}

export function createBulkEngine(
    deps: BulkEngineDependencies,
    config: BulkEngineConfig,
): BulkEngine {
    const now = deps.now || (() => new Date());
    const { ledger, store } = deps;
    const registry = deps.registry || registerBuiltinActions();
    const events = deps.events || new InProcessLifecycleEventSink();
    const resolver = new TargetResolver(store);
    const tracker = new ProgressTracker(ledger, {
        events,
        now,
        notifyIntervalMs: config.progressNotifyIntervalMs,
    });
    const undoManager = new UndoManager(ledger, store, {
        events,
        now,
    });
    const finalizer = new ExecutionFinalizer(ledger, tracker, {
        failureThresholdPercent: config.failureThresholdPercent,
        events,
        now,
    });
    const monitor = new MemoryMonitor({
        thresholdPercent: config.memoryThresholdPercent,
        minBatchSize: config.minBatchSize,
        maxBatchSize: config.maxBatchSize,
        sampler: deps.memorySampler,
    });
    const worker = new BatchWorker({
        ledger,
        store,
        registry,
        tracker,
        undoManager,
        finalizer,
        events,
    }, {
        batchTimeoutMs: config.batchTimeoutMs,
        recordFailurePolicy: config.recordFailurePolicy,
        now,
    });
    const queue = new InMemoryWorkQueue<BatchJob>(
        (job, attempt) => worker.handle(job, attempt),
        {
            concurrency: config.queueConcurrency,
            maxAttempts: config.queueMaxAttempts,
            backoffBaseMs: config.queueBackoffBaseMs,
            backoffCeilingMs: config.queueBackoffCeilingMs,
            onDeadLetter: (job, error, attempts) =>
                worker.handleDeadLetter(job, error, attempts),
            isRetryable: isRetryableBatchError,
        },
    );
    const dispatcher = new BatchDispatcher({
        ledger,
        resolver,
        queue,
        tracker,
        finalizer,
        monitor,
        now,
    });
    const gate = new RateGate(ledger, {
        maxConcurrentExecutions: config.maxConcurrentExecutions,
        maxRecordsPerExecution: config.maxRecordsPerExecution,
        cooldownSeconds: config.cooldownSeconds,
        cooldownThresholdRecords: config.cooldownThresholdRecords,
        now,
    });
    const scheduler = new SchedulerService({
        ledger,
        resolver,
        dispatcher,
        finalizer,
        gate,
    }, {
        maxScheduleDaysAhead: config.maxScheduleDaysAhead,
        now,
    });
    const cleanup = new CleanupService(ledger, {
        now,
    });
    const executions = new ExecutionService({
        ledger,
        resolver,
        registry,
        authorization: deps.authorization ||
            createAuthorizationPolicy(config.actionAllowlist),
        gate,
        monitor,
        dispatcher,
        scheduler,
        finalizer,
        tracker,
        undoManager,
        events,
    }, {
        defaultBatchSize: config.defaultBatchSize,
        undoDefaultExpiryDays: config.undoDefaultExpiryDays,
        undoMaxExpiryDays: config.undoMaxExpiryDays,
        previewLimit: config.previewLimit,
        maxScheduleDaysAhead: config.maxScheduleDaysAhead,
        now,
    });

    return {
        ledger,
        store,
        registry,
        events,
        resolver,
        tracker,
        undoManager,
        finalizer,
        monitor,
        worker,
        queue,
        dispatcher,
        gate,
        scheduler,
        cleanup,
        executions,
        async whenIdle(): Promise<void> {
            await executions.drain();
            await queue.onIdle();
        },
        async shutdown(): Promise<void> {
            await scheduler.stop();
            await cleanup.stop();
            await executions.drain();
            await queue.stop();
        },
    };
}
