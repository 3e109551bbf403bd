import { getSql, isDatabaseAvailable } from './index.js';
import { dbLogger as logger } from '../utils/logger.js';

/**
 * Database schema statements - each must be run individually for Neon serverless
 */
const SCHEMA_STATEMENTS = [
    // One row per observed (or upcoming) market week
    `CREATE TABLE IF NOT EXISTS market_week_records (
    id BIGSERIAL PRIMARY KEY,
    week INTEGER NOT NULL CHECK (week BETWEEN 1 AND 52),
    year INTEGER NOT NULL,
    month VARCHAR(20) NOT NULL,
    rainfall_mm DECIMAL(8,2) NOT NULL CHECK (rainfall_mm >= 0),
    temperature_c DECIMAL(5,2) NOT NULL,
    market_day BOOLEAN NOT NULL DEFAULT false,
    school_open BOOLEAN NOT NULL DEFAULT true,
    disease_alert VARCHAR(20) NOT NULL DEFAULT 'Absence',
    last_week_demand VARCHAR(20) NOT NULL,
    market_demand VARCHAR(20),
    source VARCHAR(100) NOT NULL DEFAULT 'manual_upload',
    created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
    CONSTRAINT market_week_records_year_week UNIQUE (year, week)
  )`,

    `CREATE INDEX IF NOT EXISTS idx_market_week_records_demand ON market_week_records(market_demand)`,
];

/**
 * Run database migrations
 */
export async function runMigrations(): Promise<void> {
    if (!isDatabaseAvailable()) {
        logger.warn('Database not available, skipping migrations');
        return;
    }

    const sql = getSql();
    logger.info('Running database migrations...');

    for (const statement of SCHEMA_STATEMENTS) {
        await sql.query(statement);
    }

    logger.info({ statements: SCHEMA_STATEMENTS.length }, 'Database migrations completed');
}
