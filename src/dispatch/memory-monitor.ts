import { getHeapStatistics } from 'node:v8';

export interface MemorySample {
    usedBytes: number;
    limitBytes: number;
}

export type MemorySampler = () => MemorySample;

export interface MemoryMonitorConfig {
    thresholdPercent: number;
    minBatchSize: number;
    maxBatchSize: number;
    sampler?: MemorySampler;
}

export function sampleProcessMemory(): MemorySample {
    return {
        usedBytes: process.memoryUsage().heapUsed,
        limitBytes: getHeapStatistics().heap_size_limit,
    };
}

export class MemoryMonitor {
    private readonly sampler: MemorySampler;

    constructor(private readonly config: MemoryMonitorConfig) {
        if (config.minBatchSize > config.maxBatchSize) {
            throw new Error('minBatchSize must not exceed maxBatchSize');
        }

        this.sampler = config.sampler || sampleProcessMemory;
    }

    getUsagePercent(): number {
        const sample = this.sampler();

        if (sample.limitBytes <= 0) {
            return 0;
        }

        return Math.round((sample.usedBytes / sample.limitBytes) * 10000) / 100;
    }

    isUnderPressure(): boolean {
        return this.getUsagePercent() >= this.config.thresholdPercent;
    }

    clampBatchSize(size: number): number {
        return Math.min(
            this.config.maxBatchSize,
            Math.max(this.config.minBatchSize, Math.floor(size)),
        );
    }

    /** Halves the batch size under heap pressure, never below the minimum. */
    recommendBatchSize(current: number): number {
        const clamped = this.clampBatchSize(current);

        if (!this.isUnderPressure()) {
            return clamped;
        }

        const reduced = this.clampBatchSize(clamped / 2);

        if (reduced < clamped) {
            console.warn('memory pressure, reducing batch size', {
                usage_percent: this.getUsagePercent(),
                from: clamped,
                to: reduced,
            });
        }

        return reduced;
    }
}
