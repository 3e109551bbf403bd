/**
 * Postgres-backed record store (Neon serverless HTTP driver).
 *
 * Encapsulates all market_week_records SQL. `replaceAll` sends the delete
 * and every insert as one non-interactive transaction, so readers never see
 * a half-applied refresh.
 */

import { z } from 'zod';
import type { Row, Sql } from '../db/index.js';
import {
    DEMAND_CLASSES,
    DISEASE_ALERTS,
    type MarketWeekRecord,
    type PageOptions,
    type RecordFilters,
} from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import { assertUniqueWeeks, recordKey, type RecentOptions, type RecordStore } from './RecordStore.js';

const TABLE = 'market_week_records';

const COLUMNS = `week, year, month, rainfall_mm, temperature_c, market_day, school_open,
    disease_alert, last_week_demand, market_demand, source, created_at`;

// DECIMAL columns arrive as strings from the driver
const RowSchema = z.object({
    week: z.coerce.number().int(),
    year: z.coerce.number().int(),
    month: z.string(),
    rainfall_mm: z.coerce.number(),
    temperature_c: z.coerce.number(),
    market_day: z.boolean(),
    school_open: z.boolean(),
    disease_alert: z.enum(DISEASE_ALERTS),
    last_week_demand: z.enum(DEMAND_CLASSES),
    market_demand: z.enum(DEMAND_CLASSES).nullable(),
    source: z.string(),
    created_at: z.coerce.date(),
});

export function mapRow(row: Row): MarketWeekRecord {
    const parsed = RowSchema.parse(row);
    return {
        week: parsed.week,
        year: parsed.year,
        month: parsed.month,
        rainfallMm: parsed.rainfall_mm,
        temperatureC: parsed.temperature_c,
        marketDay: parsed.market_day,
        schoolOpen: parsed.school_open,
        diseaseAlert: parsed.disease_alert,
        lastWeekDemand: parsed.last_week_demand,
        marketDemand: parsed.market_demand,
        source: parsed.source,
        createdAt: parsed.created_at,
    };
}

/**
 * Builds a WHERE clause with positional parameters starting at $1.
 */
export function buildWhere(filters: RecordFilters): { clause: string; params: unknown[] } {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.year !== undefined) {
        params.push(filters.year);
        conditions.push(`year = $${params.length}`);
    }
    if (filters.month !== undefined) {
        params.push(filters.month);
        conditions.push(`LOWER(month) = LOWER($${params.length})`);
    }
    if (filters.demand !== undefined) {
        params.push(filters.demand);
        conditions.push(`market_demand = $${params.length}`);
    }

    return {
        clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
        params,
    };
}

export class PostgresRecordStore implements RecordStore {
    constructor(private readonly sql: Sql) {}

    async get(year: number, week: number): Promise<MarketWeekRecord> {
        const rows = await this.sql.query(
            `SELECT ${COLUMNS} FROM ${TABLE} WHERE year = $1 AND week = $2`,
            [year, week]
        );
        if (rows.length === 0) {
            throw new NotFoundError(`Market week ${recordKey(year, week)} not found`);
        }
        return mapRow(rows[0]);
    }

    async query(filters: RecordFilters, page: PageOptions = {}): Promise<MarketWeekRecord[]> {
        const { clause, params } = buildWhere(filters);
        let text = `SELECT ${COLUMNS} FROM ${TABLE} ${clause} ORDER BY year ASC, week ASC`;

        if (page.limit !== undefined) {
            params.push(page.limit);
            text += ` LIMIT $${params.length}`;
        }
        if (page.offset !== undefined && page.offset > 0) {
            params.push(page.offset);
            text += ` OFFSET $${params.length}`;
        }

        const rows = await this.sql.query(text, params);
        return rows.map(mapRow);
    }

    async count(filters: RecordFilters): Promise<number> {
        const { clause, params } = buildWhere(filters);
        const rows = await this.sql.query(`SELECT COUNT(*)::int AS count FROM ${TABLE} ${clause}`, params);
        return z.coerce.number().parse(rows[0]?.count ?? 0);
    }

    async latest(): Promise<MarketWeekRecord | null> {
        const rows = await this.sql.query(
            `SELECT ${COLUMNS} FROM ${TABLE} ORDER BY year DESC, week DESC LIMIT 1`
        );
        return rows.length > 0 ? mapRow(rows[0]) : null;
    }

    async latestUnconfirmed(): Promise<MarketWeekRecord | null> {
        const rows = await this.sql.query(
            `SELECT ${COLUMNS} FROM ${TABLE} WHERE market_demand IS NULL ORDER BY year DESC, week DESC LIMIT 1`
        );
        return rows.length > 0 ? mapRow(rows[0]) : null;
    }

    async recent(limit: number, options: RecentOptions = {}): Promise<MarketWeekRecord[]> {
        if (limit <= 0) return [];

        const conditions: string[] = [];
        const params: unknown[] = [];
        if (options.confirmedOnly) {
            conditions.push('market_demand IS NOT NULL');
        }
        if (options.year !== undefined) {
            params.push(options.year);
            conditions.push(`year = $${params.length}`);
        }
        params.push(limit);

        const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
        const rows = await this.sql.query(
            `SELECT ${COLUMNS} FROM ${TABLE} ${where} ORDER BY year DESC, week DESC LIMIT $${params.length}`,
            params
        );
        return rows.map(mapRow).reverse();
    }

    async replaceAll(records: MarketWeekRecord[]): Promise<void> {
        assertUniqueWeeks(records);

        const statements = [
            this.sql.query(`DELETE FROM ${TABLE}`),
            ...records.map(r => this.sql.query(
                `INSERT INTO ${TABLE} (week, year, month, rainfall_mm, temperature_c, market_day, school_open,
                    disease_alert, last_week_demand, market_demand, source, created_at)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
                [
                    r.week, r.year, r.month, r.rainfallMm, r.temperatureC, r.marketDay, r.schoolOpen,
                    r.diseaseAlert, r.lastWeekDemand, r.marketDemand, r.source, r.createdAt.toISOString(),
                ]
            )),
        ];

        await this.sql.transaction(statements);
    }
}
