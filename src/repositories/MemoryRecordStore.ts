/**
 * In-memory record store.
 *
 * Holds a frozen, sorted snapshot. `replaceAll` builds the next snapshot off
 * to the side and swaps the reference in one assignment, so every read works
 * against exactly one snapshot.
 */

import type { MarketWeekRecord, PageOptions, RecordFilters } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import {
    assertUniqueWeeks,
    compareRecords,
    matchesFilters,
    recordKey,
    type RecentOptions,
    type RecordStore,
} from './RecordStore.js';

interface Snapshot {
    rows: readonly MarketWeekRecord[];
    byKey: ReadonlyMap<string, MarketWeekRecord>;
}

function buildSnapshot(records: MarketWeekRecord[]): Snapshot {
    assertUniqueWeeks(records);
    const rows = Object.freeze([...records].sort(compareRecords));
    const byKey = new Map(rows.map(r => [recordKey(r.year, r.week), r] as const));
    return { rows, byKey };
}

export class MemoryRecordStore implements RecordStore {
    private snapshot: Snapshot;

    constructor(records: MarketWeekRecord[] = []) {
        this.snapshot = buildSnapshot(records);
    }

    async get(year: number, week: number): Promise<MarketWeekRecord> {
        const record = this.snapshot.byKey.get(recordKey(year, week));
        if (!record) {
            throw new NotFoundError(`Market week ${recordKey(year, week)} not found`);
        }
        return record;
    }

    async query(filters: RecordFilters, page: PageOptions = {}): Promise<MarketWeekRecord[]> {
        const matched = this.snapshot.rows.filter(r => matchesFilters(r, filters));
        const offset = page.offset ?? 0;
        const end = page.limit === undefined ? undefined : offset + page.limit;
        return matched.slice(offset, end);
    }

    async count(filters: RecordFilters): Promise<number> {
        return this.snapshot.rows.filter(r => matchesFilters(r, filters)).length;
    }

    async latest(): Promise<MarketWeekRecord | null> {
        const { rows } = this.snapshot;
        return rows.length > 0 ? rows[rows.length - 1] : null;
    }

    async latestUnconfirmed(): Promise<MarketWeekRecord | null> {
        const { rows } = this.snapshot;
        for (let i = rows.length - 1; i >= 0; i--) {
            if (rows[i].marketDemand === null) return rows[i];
        }
        return null;
    }

    async recent(limit: number, options: RecentOptions = {}): Promise<MarketWeekRecord[]> {
        if (limit <= 0) return [];
        const eligible = this.snapshot.rows.filter(r =>
            (!options.confirmedOnly || r.marketDemand !== null) &&
            (options.year === undefined || r.year === options.year)
        );
        return eligible.slice(-limit);
    }

    async replaceAll(records: MarketWeekRecord[]): Promise<void> {
        this.snapshot = buildSnapshot(records);
    }
}
