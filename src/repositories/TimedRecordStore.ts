/**
 * Bounds every call on the wrapped store. Timeouts and driver failures
 * surface as StoreUnavailableError; the store's own AppErrors (NotFound,
 * duplicate weeks) pass through untouched.
 */

import type { MarketWeekRecord, PageOptions, RecordFilters } from '../types/index.js';
import { AppError, StoreUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/reliability.js';
import type { RecentOptions, RecordStore } from './RecordStore.js';

const logger = createLogger('RecordStore');

export class TimedRecordStore implements RecordStore {
    constructor(
        private readonly inner: RecordStore,
        private readonly timeoutMs: number
    ) {}

    private async guard<T>(operation: string, call: () => Promise<T>): Promise<T> {
        try {
            return await withTimeout(call(), this.timeoutMs, `Record store ${operation} timed out after ${this.timeoutMs}ms`);
        } catch (error) {
            if (error instanceof AppError) throw error;
            logger.error({ operation, err: errorMessage(error) }, 'Record store call failed');
            throw new StoreUnavailableError(`Record store ${operation} failed: ${errorMessage(error)}`);
        }
    }

    get(year: number, week: number): Promise<MarketWeekRecord> {
        return this.guard('get', () => this.inner.get(year, week));
    }

    query(filters: RecordFilters, page?: PageOptions): Promise<MarketWeekRecord[]> {
        return this.guard('query', () => this.inner.query(filters, page));
    }

    count(filters: RecordFilters): Promise<number> {
        return this.guard('count', () => this.inner.count(filters));
    }

    latest(): Promise<MarketWeekRecord | null> {
        return this.guard('latest', () => this.inner.latest());
    }

    latestUnconfirmed(): Promise<MarketWeekRecord | null> {
        return this.guard('latestUnconfirmed', () => this.inner.latestUnconfirmed());
    }

    recent(limit: number, options?: RecentOptions): Promise<MarketWeekRecord[]> {
        return this.guard('recent', () => this.inner.recent(limit, options));
    }

    replaceAll(records: MarketWeekRecord[]): Promise<void> {
        return this.guard('replaceAll', () => this.inner.replaceAll(records));
    }
}
