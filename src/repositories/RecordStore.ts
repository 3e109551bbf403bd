/**
 * Record Store
 *
 * Read contract over weekly market records. The engines only read; the
 * ingest path replaces the whole set with `replaceAll`, which must be atomic
 * with respect to readers (a reader sees the old set or the new one).
 */

import type {
    DemandClass,
    DemandTrend,
    MarketWeekRecord,
    PageOptions,
    RecordFilters,
} from '../types/index.js';
import { DEMAND_VALUE } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';

export interface RecentOptions {
    confirmedOnly?: boolean;
    year?: number;
}

export interface RecordStore {
    /** Throws NotFoundError when (year, week) has no record. */
    get(year: number, week: number): Promise<MarketWeekRecord>;

    /** Ascending by year then week. Empty when nothing matches. */
    query(filters: RecordFilters, page?: PageOptions): Promise<MarketWeekRecord[]>;

    count(filters: RecordFilters): Promise<number>;

    latest(): Promise<MarketWeekRecord | null>;

    /** Most recent record whose outcome has not been recorded yet. */
    latestUnconfirmed(): Promise<MarketWeekRecord | null>;

    /** The `limit` most recent records, returned ascending. */
    recent(limit: number, options?: RecentOptions): Promise<MarketWeekRecord[]>;

    replaceAll(records: MarketWeekRecord[]): Promise<void>;
}

// ============================================
// Shared helpers
// ============================================

export function compareRecords(a: MarketWeekRecord, b: MarketWeekRecord): number {
    return a.year - b.year || a.week - b.week;
}

export function recordKey(year: number, week: number): string {
    return `${year}-W${week}`;
}

export function matchesFilters(record: MarketWeekRecord, filters: RecordFilters): boolean {
    if (filters.year !== undefined && record.year !== filters.year) return false;
    if (filters.month !== undefined && record.month.toLowerCase() !== filters.month.toLowerCase()) return false;
    if (filters.demand !== undefined && record.marketDemand !== filters.demand) return false;
    return true;
}

/**
 * Rejects a batch that would break the (year, week) uniqueness invariant.
 */
export function assertUniqueWeeks(records: MarketWeekRecord[]): void {
    const seen = new Set<string>();
    for (const record of records) {
        const key = recordKey(record.year, record.week);
        if (seen.has(key)) {
            throw new ValidationError(`Duplicate market week ${key}`);
        }
        seen.add(key);
    }
}

export function deriveDemandTrend(
    current: DemandClass | null,
    previous: DemandClass
): DemandTrend | null {
    if (current === null) return null;
    const delta = DEMAND_VALUE[current] - DEMAND_VALUE[previous];
    if (delta > 0) return 'Increasing';
    if (delta < 0) return 'Decreasing';
    return 'Stable';
}
