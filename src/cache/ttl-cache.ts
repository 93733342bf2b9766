export interface TtlCache<V> {
    get(key: string): Promise<V | null>;
    put(key: string, value: V, ttlSeconds: number): Promise<void>;
    forget(key: string): Promise<void>;
}

export interface InMemoryTtlCacheConfig {
    now?: () => Date;
    sweepEvery?: number;
}

interface CacheEntry<V> {
    expiresAtMs: number;
    value: V;
}

function cloneValue<T>(value: T): T {
    return JSON.parse(JSON.stringify(value)) as T;
}

function parseNonNegativeNumber(value: number, fieldName: string): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new Error(`${fieldName} must be a non-negative number`);
    }

    return value;
}

export class InMemoryTtlCache<V> implements TtlCache<V> {
    private readonly entries = new Map<string, CacheEntry<V>>();

    private readonly now: () => Date;

    private readonly sweepEvery: number;

    private writesSinceSweep = 0;

    constructor(config: InMemoryTtlCacheConfig = {}) {
        this.now = config.now || (() => new Date());
        this.sweepEvery = config.sweepEvery || 1000;
    }

    async get(key: string): Promise<V | null> {
        const entry = this.entries.get(key);

        if (!entry) {
            return null;
        }

        if (entry.expiresAtMs <= this.now().getTime()) {
            this.entries.delete(key);

            return null;
        }

        return cloneValue(entry.value);
    }

    async put(key: string, value: V, ttlSeconds: number): Promise<void> {
        const ttlMs = parseNonNegativeNumber(ttlSeconds, 'ttlSeconds') * 1000;

        if (ttlMs === 0) {
            this.entries.delete(key);

            return;
        }

        this.entries.set(key, {
            expiresAtMs: this.now().getTime() + ttlMs,
            value: cloneValue(value),
        });
        this.writesSinceSweep += 1;

        if (this.writesSinceSweep >= this.sweepEvery) {
            this.sweep();
        }
    }

    async forget(key: string): Promise<void> {
        this.entries.delete(key);
    }

    size(): number {
        return this.entries.size;
    }

    private sweep(): void {
        const nowMs = this.now().getTime();

        for (const [key, entry] of this.entries) {
            if (entry.expiresAtMs <= nowMs) {
                this.entries.delete(key);
            }
        }

        this.writesSinceSweep = 0;
    }
}
