/**
 * Metrics Counter & period key tests
 */

import { describe, it, expect } from 'vitest';
import { MetricsCounter } from '../src/infra/metrics/MetricsCounter.js';
import { ALL_TIME, isoWeekOf, monthName, periodKey, previousPeriodKey } from '../src/utils/period.js';

describe('MetricsCounter', () => {
    it('starts every bucket at zero', () => {
        const counter = new MetricsCounter();
        expect(counter.read(ALL_TIME)).toBe(0);
        expect(counter.read('2025-W01')).toBe(0);
    });

    it('loses no increments under concurrent callers', async () => {
        const counter = new MetricsCounter();
        const at = new Date('2025-05-14T10:00:00.000Z');

        await Promise.all(Array.from({ length: 1000 }, async () => {
            await Promise.resolve();
            counter.recordPrediction(at);
        }));

        expect(counter.read(ALL_TIME)).toBe(1000);
        expect(counter.read('2025-W20')).toBe(1000);
    });

    it('returns the new value from increment', () => {
        const counter = new MetricsCounter();
        expect(counter.increment('x')).toBe(1);
        expect(counter.increment('x', 4)).toBe(5);
    });

    it('never decrements', () => {
        const counter = new MetricsCounter();
        expect(() => counter.increment(ALL_TIME, -1)).toThrow(RangeError);
        expect(() => counter.increment(ALL_TIME, 0.5)).toThrow(RangeError);
        expect(counter.read(ALL_TIME)).toBe(0);
    });

    it('exposes buckets in Prometheus text format', () => {
        const counter = new MetricsCounter();
        counter.recordPrediction(new Date('2025-05-14T10:00:00.000Z'));

        expect(counter.getMetrics()).toBe(
            '# TYPE market_predictions_served_total counter\n' +
            'market_predictions_served_total{period="all_time"} 1\n' +
            'market_predictions_served_total{period="2025-W20"} 1\n'
        );
    });
});

describe('period keys', () => {
    it('assigns late-December days to week 1 of the next ISO year', () => {
        expect(isoWeekOf(new Date('2024-12-30T00:00:00.000Z'))).toEqual({ year: 2025, week: 1 });
    });

    it('assigns early-January days to week 53 of the previous ISO year', () => {
        expect(isoWeekOf(new Date('2021-01-03T12:00:00.000Z'))).toEqual({ year: 2020, week: 53 });
        expect(periodKey(new Date('2021-01-03T12:00:00.000Z'))).toBe('2020-W53');
    });

    it('zero-pads the week number', () => {
        expect(periodKey(new Date('2025-02-12T00:00:00.000Z'))).toBe('2025-W07');
    });

    it('steps back one week for the previous period', () => {
        expect(previousPeriodKey(new Date('2025-05-14T10:00:00.000Z'))).toBe('2025-W19');
        expect(previousPeriodKey(new Date('2025-01-01T00:00:00.000Z'))).toBe('2024-W52');
    });

    it('names the UTC month', () => {
        expect(monthName(new Date('2025-05-14T10:00:00.000Z'))).toBe('May');
    });
});
