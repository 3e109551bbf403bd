/**
 * Load a dataset snapshot CSV into the Postgres record store.
 *
 *   npm run load:sample -- --file data/sample-weeks.csv [--clear]
 *
 * Without --clear, weeks already stored are kept and only new weeks are added.
 * The resulting set is swapped in with one transaction.
 */

import path from 'path';
import { parseArgs } from 'util';
import { getSql, isDatabaseAvailable } from '../db/index.js';
import { runMigrations } from '../db/schema.js';
import { loadSnapshotFile, mergeSnapshot } from '../ingest/snapshotCsv.js';
import { PostgresRecordStore } from '../repositories/PostgresRecordStore.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('loadSampleData');

async function main(): Promise<void> {
    const { values } = parseArgs({
        options: {
            file: { type: 'string', default: 'data/sample-weeks.csv' },
            clear: { type: 'boolean', default: false },
        },
    });

    if (!isDatabaseAvailable()) {
        throw new Error('DATABASE_URL must be set to load data');
    }

    await runMigrations();
    const store = new PostgresRecordStore(getSql());

    const file = path.resolve(process.cwd(), values.file ?? 'data/sample-weeks.csv');
    const { records, errors } = await loadSnapshotFile(file, { source: 'sample_data_load' });

    const existing = values.clear ? [] : await store.query({});
    if (values.clear) {
        logger.info({ existing: await store.count({}) }, 'Clearing existing market data');
    }

    const merged = mergeSnapshot(existing, records);
    await store.replaceAll(merged.records);

    logger.info({
        file,
        added: merged.added,
        total: merged.records.length,
        rejectedRows: errors.length,
    }, 'Snapshot loaded');
}

main().catch((error: unknown) => {
    logger.error({ err: errorMessage(error) }, 'Snapshot load failed');
    process.exit(1);
});
