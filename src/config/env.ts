import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { serviceLogger } from '../utils/logger.js';

// ===================================
// 1. AUTO-DETECT ENVIRONMENT
// ===================================

enum EnvMode {
    TEST = 'test',
    LOCAL = 'local',
    STAGING = 'staging',
    PRODUCTION = 'production'
}

function detectMode(): EnvMode {
    const railwayEnv = process.env.RAILWAY_ENVIRONMENT_NAME; // "staging" | "production"

    if (process.env.NODE_ENV === 'test') {
        return EnvMode.TEST;
    }

    if (railwayEnv === 'production' || process.env.NODE_ENV === 'production') return EnvMode.PRODUCTION;
    if (railwayEnv === 'staging') return EnvMode.STAGING;

    return EnvMode.LOCAL;
}

const CURRENT_MODE = detectMode();

// ===================================
// 2. LOAD CORRECT ENV FILE
// ===================================

if (CURRENT_MODE === EnvMode.LOCAL) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
    // Fallback to .env if .env.local missing
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
} else if (CURRENT_MODE === EnvMode.TEST) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env.test') });
}
// Staging/Prod use injected variables (no file loading needed)

// ===================================
// 3. VALIDATION
// ===================================

function requireVar(key: string): string {
    const value = process.env[key];
    if (!value) {
        throw new Error(`[CRITICAL] Missing required environment variable: ${key}`);
    }
    return value;
}

const NumericSettings = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    PREDICTION_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    DEFAULT_MODEL_ACCURACY: z.coerce.number().min(0).max(100).default(95),
    SIMULATION_PLAY_SPEED_MS: z.coerce.number().int().positive().default(500),
});

const numeric = NumericSettings.parse({
    PORT: process.env.PORT || undefined,
    PREDICTION_TIMEOUT_MS: process.env.PREDICTION_TIMEOUT_MS || undefined,
    STORE_TIMEOUT_MS: process.env.STORE_TIMEOUT_MS || undefined,
    DEFAULT_MODEL_ACCURACY: process.env.DEFAULT_MODEL_ACCURACY || undefined,
    SIMULATION_PLAY_SPEED_MS: process.env.SIMULATION_PLAY_SPEED_MS || undefined,
});

const isStaging = CURRENT_MODE === EnvMode.STAGING;
const isProduction = CURRENT_MODE === EnvMode.PRODUCTION;
const isLocal = CURRENT_MODE === EnvMode.LOCAL;
const isTest = CURRENT_MODE === EnvMode.TEST;

// Cloud environments must run against the real store
const DATABASE_URL = isProduction || isStaging
    ? requireVar('DATABASE_URL')
    : process.env.DATABASE_URL;

// ===================================
// 4. EXPORT THE SAFE ENV OBJECT
// ===================================

export const env = Object.freeze({
    // metadata
    mode: CURRENT_MODE,
    isLocal,
    isStaging,
    isProduction,
    isTest,

    // server
    PORT: numeric.PORT,
    HOST: process.env.HOST || '0.0.0.0',
    DATABASE_URL,

    // data + model artifacts
    MODEL_PATH: path.resolve(process.cwd(), process.env.MODEL_PATH || 'models/demand-model.json'),
    SEED_CSV_PATH: path.resolve(process.cwd(), process.env.SEED_CSV_PATH || 'data/sample-weeks.csv'),

    // limits
    PREDICTION_TIMEOUT_MS: numeric.PREDICTION_TIMEOUT_MS,
    STORE_TIMEOUT_MS: numeric.STORE_TIMEOUT_MS,

    // dashboard
    DEFAULT_MODEL_ACCURACY: numeric.DEFAULT_MODEL_ACCURACY,
    SIMULATION_PLAY_SPEED_MS: numeric.SIMULATION_PLAY_SPEED_MS,
});

serviceLogger.info({
    mode: CURRENT_MODE,
    database: DATABASE_URL ? 'postgres' : 'memory',
    predictionTimeoutMs: env.PREDICTION_TIMEOUT_MS,
    storeTimeoutMs: env.STORE_TIMEOUT_MS,
}, 'Environment loaded');
