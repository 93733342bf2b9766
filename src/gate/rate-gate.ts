import { InMemoryTtlCache, TtlCache } from '../cache/ttl-cache';
import { ExecutionLedger } from '../executions/execution-ledger';

export type GateDenyReason =
    | 'concurrency_limit'
    | 'cooldown'
    | 'record_limit';

export type GateDecision =
    | {
        allowed: true;
    }
    | {
        allowed: false;
        reason: GateDenyReason;
        retryAfterSeconds: number | null;
        message: string;
    };

export interface CooldownEntry {
    expires_at_ms: number;
}

export interface RateGateConfig {
    maxConcurrentExecutions: number;
    maxRecordsPerExecution: number;
    cooldownSeconds: number;
    cooldownThresholdRecords: number;
    cache?: TtlCache<CooldownEntry>;
    now?: () => Date;
}

function cooldownKey(actor: string): string {
    return `bulk_cooldown:${actor}`;
}

/**
 * Admission control at submission time. Counts come from the ledger, so
 * a slot frees as soon as an execution reaches a terminal status.
 * Cooldowns live in the TTL cache and vanish when it is lost.
 */
export class RateGate {
    private readonly cache: TtlCache<CooldownEntry>;

    private readonly now: () => Date;

    private readonly admissions = new Map<string, Promise<void>>();

    constructor(
        private readonly ledger: ExecutionLedger,
        private readonly config: RateGateConfig,
    ) {
        this.now = config.now || (() => new Date());
        this.cache = config.cache || new InMemoryTtlCache({
            now: this.now,
        });
    }

    /**
     * Runs `admit` once no other admission for the same actor is in
     * flight, so the active count read inside it holds until the new
     * execution is written. Admissions are serialized per process only.
     */
    async withAdmissionLock<T>(
        actor: string,
        admit: () => Promise<T>,
    ): Promise<T> {
        const previous = this.admissions.get(actor) || Promise.resolve();
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        const tail = previous.then(() => current);

        this.admissions.set(actor, tail);

        try {
            await previous;

            return await admit();
        } finally {
            release();

            if (this.admissions.get(actor) === tail) {
                this.admissions.delete(actor);
            }
        }
    }

    async attempt(actor: string): Promise<GateDecision> {
        const activeCount = await this.ledger.countActiveForActor(actor);

        if (activeCount >= this.config.maxConcurrentExecutions) {
            return {
                allowed: false,
                reason: 'concurrency_limit',
                retryAfterSeconds: null,
                message:
                    `actor already has ${activeCount} active executions ` +
                    `(limit ${this.config.maxConcurrentExecutions})`,
            };
        }

        const cooldownRemaining = await this.getCooldownRemaining(actor);

        if (cooldownRemaining > 0) {
            return {
                allowed: false,
                reason: 'cooldown',
                retryAfterSeconds: cooldownRemaining,
                message: `actor is cooling down for ${cooldownRemaining}s`,
            };
        }

        return {
            allowed: true,
        };
    }

    checkVolume(totalRecords: number): GateDecision {
        if (totalRecords > this.config.maxRecordsPerExecution) {
            return {
                allowed: false,
                reason: 'record_limit',
                retryAfterSeconds: null,
                message:
                    `target matches ${totalRecords} records ` +
                    `(limit ${this.config.maxRecordsPerExecution})`,
            };
        }

        return {
            allowed: true,
        };
    }

    /** Arms the cooldown when an admitted submission is large enough. */
    async recordAdmission(actor: string, totalRecords: number): Promise<void> {
        if (
            this.config.cooldownThresholdRecords > 0 &&
            totalRecords >= this.config.cooldownThresholdRecords
        ) {
            await this.setCooldown(actor);
        }
    }

    async setCooldown(actor: string, seconds?: number): Promise<void> {
        const ttlSeconds = seconds ?? this.config.cooldownSeconds;

        if (ttlSeconds <= 0) {
            await this.clearCooldown(actor);

            return;
        }

        await this.cache.put(
            cooldownKey(actor),
            {
                expires_at_ms: this.now().getTime() + ttlSeconds * 1000,
            },
            ttlSeconds,
        );
    }

    async clearCooldown(actor: string): Promise<void> {
        await this.cache.forget(cooldownKey(actor));
    }

    async getCooldownRemaining(actor: string): Promise<number> {
        const entry = await this.cache.get(cooldownKey(actor));

        if (!entry) {
            return 0;
        }

        return Math.max(
            0,
            Math.ceil((entry.expires_at_ms - this.now().getTime()) / 1000),
        );
    }

    async getRemainingSlots(actor: string): Promise<number> {
        const activeCount = await this.ledger.countActiveForActor(actor);

        return Math.max(0, this.config.maxConcurrentExecutions - activeCount);
    }
}
