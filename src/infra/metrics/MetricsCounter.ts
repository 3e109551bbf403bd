/**
 * Metrics Counter
 *
 * Process-wide prediction counters keyed by period: `all_time` plus one
 * bucket per ISO week (`2025-W07`). Created at zero when the process starts,
 * never reset, never decremented.
 *
 * Increments are synchronous Map updates with no await between the read and
 * the write, so concurrent requests on the event loop cannot lose updates.
 */

import { ALL_TIME, periodKey } from '../../utils/period.js';

const METRIC_NAME = 'market_predictions_served_total';

export class MetricsCounter {
    private readonly counters = new Map<string, number>();

    increment(key: string, by: number = 1): number {
        if (!Number.isInteger(by) || by < 0) {
            throw new RangeError(`Counter increment must be a non-negative integer, got ${by}`);
        }
        const next = (this.counters.get(key) ?? 0) + by;
        this.counters.set(key, next);
        return next;
    }

    read(key: string): number {
        return this.counters.get(key) ?? 0;
    }

    /**
     * Count one served prediction in the all-time total and the period bucket of `at`.
     */
    recordPrediction(at: Date = new Date()): void {
        this.increment(ALL_TIME);
        this.increment(periodKey(at));
    }

    /**
     * Prometheus text exposition of every bucket.
     */
    getMetrics(): string {
        let output = `# TYPE ${METRIC_NAME} counter\n`;
        for (const [key, value] of this.counters) {
            output += `${METRIC_NAME}{period="${key}"} ${value}\n`;
        }
        return output;
    }
}
