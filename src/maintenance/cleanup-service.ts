import { ExecutionLedger } from '../executions/execution-ledger';
import {
    addDays,
    normalizeIsoWithMillis,
} from '../executions/models';
import { describeError } from '../queue/errors';

export interface CleanupServiceOptions {
    batchLimit?: number;
    now?: () => Date;
}

export interface SnapshotPurgeSummary {
    executions: number;
    snapshots: number;
}

export interface ExecutionPurgeSummary {
    executions: number;
    cutoff: string;
}

export interface CleanupSummary {
    snapshots: SnapshotPurgeSummary;
    executions: ExecutionPurgeSummary;
}

export class CleanupService {
    private readonly batchLimit: number;

    private readonly now: () => Date;

    private timer: NodeJS.Timeout | null = null;

    private sweeping: Promise<CleanupSummary> | null = null;

    constructor(
        private readonly ledger: ExecutionLedger,
        options: CleanupServiceOptions = {},
    ) {
        this.batchLimit = options.batchLimit || 500;
        this.now = options.now || (() => new Date());
    }

    /**
     * Drops the snapshots of every execution whose undo window has passed
     * and closes the window on the row.
     */
    async purgeExpiredSnapshots(): Promise<SnapshotPurgeSummary> {
        const nowIso = normalizeIsoWithMillis(this.now());
        const expired = await this.ledger.listExpiredUndoWindows(
            nowIso,
            this.batchLimit,
        );
        const summary: SnapshotPurgeSummary = {
            executions: 0,
            snapshots: 0,
        };

        for (const execution of expired) {
            summary.snapshots += await this.ledger.deleteSnapshots(
                execution.execution_id,
            );

            const closed = await this.ledger.transitionExecution(
                execution.execution_id,
                [execution.status],
                { undo_enabled: false },
                nowIso,
            );

            if (closed) {
                summary.executions += 1;
            }
        }

        if (summary.executions > 0) {
            console.log('expired undo snapshots purged', {
                executions: summary.executions,
                snapshots: summary.snapshots,
            });
        }

        return summary;
    }

    /** Deletes terminal executions that finished before the retention. */
    async purgeExecutions(retentionDays: number): Promise<ExecutionPurgeSummary> {
        if (!Number.isInteger(retentionDays) || retentionDays < 0) {
            throw new Error('retentionDays must be a non-negative integer');
        }

        const cutoff = normalizeIsoWithMillis(
            addDays(this.now(), -retentionDays),
        );
        const purgeable = await this.ledger.listPurgeableExecutions(
            cutoff,
            this.batchLimit,
        );

        for (const execution of purgeable) {
            await this.ledger.deleteExecution(execution.execution_id);
        }

        if (purgeable.length > 0) {
            console.log('terminal executions purged', {
                executions: purgeable.length,
                cutoff,
            });
        }

        return {
            executions: purgeable.length,
            cutoff,
        };
    }

    async runOnce(retentionDays: number): Promise<CleanupSummary> {
        const snapshots = await this.purgeExpiredSnapshots();
        const executions = await this.purgeExecutions(retentionDays);

        return {
            snapshots,
            executions,
        };
    }

    start(intervalMs: number, retentionDays: number): void {
        if (this.timer) {
            return;
        }

        this.timer = setInterval(() => {
            void this.sweep(retentionDays);
        }, intervalMs);
        this.timer.unref();
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }

        if (this.sweeping) {
            await this.sweeping;
        }
    }

    /** One guarded pass; a pass already running makes this a no-op. */
    async sweep(retentionDays: number): Promise<void> {
        if (this.sweeping) {
            return;
        }

        this.sweeping = this.runOnce(retentionDays);

        try {
            await this.sweeping;
        } catch (error: unknown) {
            console.error('cleanup sweep failed', {
                error: describeError(error),
            });
        } finally {
            this.sweeping = null;
        }
    }
}
