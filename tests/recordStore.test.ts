/**
 * Record store tests: in-memory store, timeout wrapper, and the Postgres
 * row/filter mapping.
 */

import { describe, it, expect } from 'vitest';
import { MemoryRecordStore } from '../src/repositories/MemoryRecordStore.js';
import { buildWhere, mapRow } from '../src/repositories/PostgresRecordStore.js';
import type { RecordStore } from '../src/repositories/RecordStore.js';
import type { MarketWeekRecord } from '../src/types/index.js';
import { TimedRecordStore } from '../src/repositories/TimedRecordStore.js';
import { NotFoundError, StoreUnavailableError, ValidationError } from '../src/utils/errors.js';
import { makeRecord, weeksWithDemand } from './helpers.js';

describe('MemoryRecordStore', () => {
    it('returns a stored week', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, ['Low', 'High']));
        const record = await store.get(2025, 2);
        expect(record.marketDemand).toBe('High');
    });

    it('throws NotFoundError for an unknown week', async () => {
        const store = new MemoryRecordStore();
        await expect(store.get(2025, 9)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('orders query results by (year, week) ascending', async () => {
        const store = new MemoryRecordStore([
            makeRecord({ year: 2025, week: 3 }),
            makeRecord({ year: 2024, week: 52 }),
            makeRecord({ year: 2025, week: 1 }),
        ]);

        const rows = await store.query({});

        expect(rows.map(r => `${r.year}-${r.week}`)).toEqual(['2024-52', '2025-1', '2025-3']);
    });

    it('returns an empty list when nothing matches', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, ['Low']));
        expect(await store.query({ year: 1999 })).toEqual([]);
        expect(await store.count({ demand: 'High' })).toBe(0);
    });

    it('returns the most recent rows in ascending order', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, ['Low', 'Medium', 'High', null]));

        expect((await store.recent(2)).map(r => r.week)).toEqual([3, 4]);
        expect((await store.recent(2, { confirmedOnly: true })).map(r => r.week)).toEqual([2, 3]);
        expect(await store.recent(0)).toEqual([]);
    });

    it('finds the latest unconfirmed week', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, [null, 'High', null, 'Low']));

        expect((await store.latestUnconfirmed())?.week).toBe(3);
        expect((await store.latest())?.week).toBe(4);
    });

    it('returns null latest rows on an empty store', async () => {
        const store = new MemoryRecordStore();
        expect(await store.latest()).toBeNull();
        expect(await store.latestUnconfirmed()).toBeNull();
    });

    it('rejects duplicate weeks and keeps the current snapshot', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, ['Low']));

        await expect(store.replaceAll([makeRecord({ week: 4 }), makeRecord({ week: 4 })]))
            .rejects.toBeInstanceOf(ValidationError);
        expect(await store.count({})).toBe(1);
    });

    it('swaps snapshots without disturbing earlier reads', async () => {
        const store = new MemoryRecordStore(weeksWithDemand(2025, ['Low', 'Low']));
        const before = await store.query({});

        await store.replaceAll(weeksWithDemand(2025, ['High', 'High', 'High']));
        const after = await store.query({});

        expect(before.map(r => r.marketDemand)).toEqual(['Low', 'Low']);
        expect(after.map(r => r.marketDemand)).toEqual(['High', 'High', 'High']);
    });
});

describe('TimedRecordStore', () => {
    function storeWith(overrides: Partial<RecordStore>): RecordStore {
        const base = new MemoryRecordStore(weeksWithDemand(2025, ['Low']));
        return {
            get: overrides.get ?? ((year, week) => base.get(year, week)),
            query: overrides.query ?? ((filters, page) => base.query(filters, page)),
            count: overrides.count ?? (filters => base.count(filters)),
            latest: overrides.latest ?? (() => base.latest()),
            latestUnconfirmed: overrides.latestUnconfirmed ?? (() => base.latestUnconfirmed()),
            recent: overrides.recent ?? ((limit, options) => base.recent(limit, options)),
            replaceAll: overrides.replaceAll ?? (records => base.replaceAll(records)),
        };
    }

    it('passes results through', async () => {
        const store = new TimedRecordStore(storeWith({}), 100);
        expect(await store.count({})).toBe(1);
    });

    it('turns a hung call into StoreUnavailableError', async () => {
        const store = new TimedRecordStore(storeWith({ query: () => new Promise<MarketWeekRecord[]>(() => {}) }), 20);

        await expect(store.query({})).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('turns a driver failure into StoreUnavailableError', async () => {
        const store = new TimedRecordStore(
            storeWith({ latest: () => Promise.reject(new Error('connection refused')) }),
            100
        );

        await expect(store.latest()).rejects.toThrow('Record store latest failed: connection refused');
    });

    it('lets NotFoundError through unchanged', async () => {
        const store = new TimedRecordStore(storeWith({}), 100);
        await expect(store.get(2025, 30)).rejects.toBeInstanceOf(NotFoundError);
    });
});

describe('PostgresRecordStore mapping', () => {
    it('builds a parameterised WHERE clause', () => {
        expect(buildWhere({ year: 2025, month: 'March', demand: 'High' })).toEqual({
            clause: 'WHERE year = $1 AND LOWER(month) = LOWER($2) AND market_demand = $3',
            params: [2025, 'March', 'High'],
        });
    });

    it('builds no clause without filters', () => {
        expect(buildWhere({})).toEqual({ clause: '', params: [] });
    });

    it('maps a database row, coercing DECIMAL strings', () => {
        const record = mapRow({
            week: 3,
            year: 2025,
            month: 'January',
            rainfall_mm: '96.30',
            temperature_c: '23.40',
            market_day: true,
            school_open: false,
            disease_alert: 'Absence',
            last_week_demand: 'Medium',
            market_demand: null,
            source: 'seed_csv',
            created_at: '2025-01-20T00:00:00.000Z',
        });

        expect(record).toEqual({
            week: 3,
            year: 2025,
            month: 'January',
            rainfallMm: 96.3,
            temperatureC: 23.4,
            marketDay: true,
            schoolOpen: false,
            diseaseAlert: 'Absence',
            lastWeekDemand: 'Medium',
            marketDemand: null,
            source: 'seed_csv',
            createdAt: new Date('2025-01-20T00:00:00.000Z'),
        });
    });

    it('rejects a row with an unknown demand class', () => {
        expect(() => mapRow({
            week: 3, year: 2025, month: 'January', rainfall_mm: '1', temperature_c: '1',
            market_day: true, school_open: true, disease_alert: 'Absence',
            last_week_demand: 'Extreme', market_demand: null, source: 'x',
            created_at: '2025-01-20T00:00:00.000Z',
        })).toThrow();
    });
});
