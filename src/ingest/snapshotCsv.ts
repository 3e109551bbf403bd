/**
 * Dataset snapshot ingestion.
 *
 * Parses the weekly snapshot CSV published by the data pipeline into market
 * records. Header row required:
 *   Week,Year,Month,Rainfall_mm,Temperature_C,Market_Day,School_Open,
 *   Disease_Alert,Last_Week_Demand,Market_Demand
 *
 * Market_Demand may be blank for weeks whose outcome is not in yet. Rows that
 * fail validation are reported with their 1-based data row number and skipped.
 * A repeated (year, week) keeps the first row.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { recordKey } from '../repositories/RecordStore.js';
import { DEMAND_CLASSES, DISEASE_ALERTS, type MarketWeekRecord } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('SnapshotIngest');

const TRUTHY = new Set(['yes', 'true', '1']);

const csvBoolean = z.string().transform(v => TRUTHY.has(v.trim().toLowerCase()));

const SnapshotRowSchema = z.object({
    Week: z.coerce.number().int().min(1).max(52),
    Year: z.coerce.number().int().min(1900).max(2100),
    Month: z.string().min(1),
    Rainfall_mm: z.coerce.number().min(0),
    Temperature_C: z.coerce.number(),
    Market_Day: csvBoolean,
    School_Open: csvBoolean,
    Disease_Alert: z.enum(DISEASE_ALERTS),
    Last_Week_Demand: z.enum(DEMAND_CLASSES),
    Market_Demand: z
        .union([z.enum(DEMAND_CLASSES), z.literal('')])
        .optional()
        .transform(v => (v === undefined || v === '' ? null : v)),
});

const CsvRowsSchema = z.array(z.record(z.string()));

export interface SnapshotParseResult {
    records: MarketWeekRecord[];
    errors: string[];
}

export interface SnapshotParseOptions {
    source?: string;
    ingestedAt?: Date;
}

export function parseSnapshotCsv(text: string, options: SnapshotParseOptions = {}): SnapshotParseResult {
    const source = options.source ?? 'sample_data_load';
    const ingestedAt = options.ingestedAt ?? new Date();

    const parsed: unknown = parse(text, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
    });
    const rows = CsvRowsSchema.parse(parsed);

    const records: MarketWeekRecord[] = [];
    const errors: string[] = [];
    const seen = new Set<string>();

    rows.forEach((row, index) => {
        const rowNumber = index + 1;
        const result = SnapshotRowSchema.safeParse(row);
        if (!result.success) {
            const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
            errors.push(`Row ${rowNumber}: ${detail}`);
            return;
        }

        const r = result.data;
        const key = recordKey(r.Year, r.Week);
        if (seen.has(key)) {
            errors.push(`Row ${rowNumber}: duplicate week ${key}`);
            return;
        }
        seen.add(key);

        records.push({
            week: r.Week,
            year: r.Year,
            month: r.Month,
            rainfallMm: r.Rainfall_mm,
            temperatureC: r.Temperature_C,
            marketDay: r.Market_Day,
            schoolOpen: r.School_Open,
            diseaseAlert: r.Disease_Alert,
            lastWeekDemand: r.Last_Week_Demand,
            marketDemand: r.Market_Demand,
            createdAt: ingestedAt,
            source,
        });
    });

    return { records, errors };
}

export async function loadSnapshotFile(filePath: string, options: SnapshotParseOptions = {}): Promise<SnapshotParseResult> {
    const text = await readFile(filePath, 'utf-8');
    const result = parseSnapshotCsv(text, options);

    logger.info({
        file: filePath,
        loaded: result.records.length,
        rejected: result.errors.length,
    }, 'Snapshot parsed');

    for (const error of result.errors) {
        logger.warn({ file: filePath }, error);
    }

    return result;
}

/**
 * Existing weeks win over incoming ones, so re-running a load never
 * overwrites an outcome that is already stored.
 */
export function mergeSnapshot(existing: MarketWeekRecord[], incoming: MarketWeekRecord[]): {
    records: MarketWeekRecord[];
    added: number;
} {
    const keys = new Set(existing.map(r => recordKey(r.year, r.week)));
    const additions = incoming.filter(r => !keys.has(recordKey(r.year, r.week)));
    return { records: [...existing, ...additions], added: additions.length };
}
