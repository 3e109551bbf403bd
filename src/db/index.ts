import { neon, type NeonQueryFunction } from '@neondatabase/serverless';
import { env } from '../config/env.js';
import { dbLogger as logger } from '../utils/logger.js';

export type Sql = NeonQueryFunction<false, false>;
export type Row = Record<string, unknown>;

const DATABASE_URL = env.DATABASE_URL;

// HTTP query function (works everywhere, no WebSocket needed)
export const sql: Sql | null = DATABASE_URL ? neon(DATABASE_URL) : null;

if (DATABASE_URL) {
    // Mask the secret parts for logging
    const maskedUrl = DATABASE_URL.replace(/:[^:@]+@/, ':***@');
    logger.info({ url: maskedUrl }, 'Initializing Neon Database Connection');
} else {
    logger.warn('DATABASE_URL is not set. Using in-memory record store.');
}

/**
 * Check if database is available
 */
export function isDatabaseAvailable(): boolean {
    return sql !== null;
}

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
    if (!sql) return false;

    try {
        const result = await sql`SELECT 1 as connected`;
        if (result.length > 0) {
            logger.info('Database connection successful');
            return true;
        }
        return false;
    } catch (error) {
        logger.error({ error }, 'Database connection failed');
        return false;
    }
}

// Non-null sql accessor - throws if not configured
export function getSql(): Sql {
    if (!sql) {
        throw new Error('Database not configured - set DATABASE_URL');
    }
    return sql;
}
