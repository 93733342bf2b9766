import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { MemoryMonitor, sampleProcessMemory } from './memory-monitor';

function buildMonitor(usedBytes: number) {
    return new MemoryMonitor({
        thresholdPercent: 80,
        minBatchSize: 10,
        maxBatchSize: 1000,
        sampler: () => ({
            usedBytes,
            limitBytes: 1000,
        }),
    });
}

describe('MemoryMonitor', () => {
    test('reports heap usage against the limit', () => {
        assert.equal(buildMonitor(123).getUsagePercent(), 12.3);
        assert.equal(buildMonitor(799).isUnderPressure(), false);
        assert.equal(buildMonitor(800).isUnderPressure(), true);
    });

    test('clamps batch sizes into the configured range', () => {
        const monitor = buildMonitor(0);

        assert.equal(monitor.recommendBatchSize(5), 10);
        assert.equal(monitor.recommendBatchSize(250), 250);
        assert.equal(monitor.recommendBatchSize(5000), 1000);
    });

    test('halves the batch size under pressure but not below the minimum', () => {
        const monitor = buildMonitor(900);

        assert.equal(monitor.recommendBatchSize(250), 125);
        assert.equal(monitor.recommendBatchSize(15), 10);
        assert.equal(monitor.recommendBatchSize(10), 10);
    });

    test('treats an unknown limit as no pressure', () => {
        const monitor = new MemoryMonitor({
            thresholdPercent: 80,
            minBatchSize: 10,
            maxBatchSize: 1000,
            sampler: () => ({
                usedBytes: 500,
                limitBytes: 0,
            }),
        });

        assert.equal(monitor.getUsagePercent(), 0);
    });

    test('samples the running process', () => {
        const sample = sampleProcessMemory();

        assert.ok(sample.usedBytes > 0);
        assert.ok(sample.limitBytes > sample.usedBytes);
    });

    test('rejects an inverted range', () => {
        assert.throws(() => new MemoryMonitor({
            thresholdPercent: 80,
            minBatchSize: 100,
            maxBatchSize: 10,
        }), /minBatchSize must not exceed maxBatchSize/);
    });
});
