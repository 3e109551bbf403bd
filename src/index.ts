/**
 * Market Demand Analytics - Main Entry Point
 *
 * Serves dashboard aggregates, chart series and retrospective simulations
 * over weekly market records, backed by Postgres (Neon) when DATABASE_URL is
 * set and by an in-memory snapshot seeded from CSV otherwise.
 */

import { existsSync } from 'fs';
import { env } from './config/env.js';
import { buildApp } from './app.js';
import { getSql, isDatabaseAvailable, testConnection } from './db/index.js';
import { runMigrations } from './db/schema.js';
import { loadSnapshotFile } from './ingest/snapshotCsv.js';
import { MetricsCounter } from './infra/metrics/MetricsCounter.js';
import { loadLinearModel } from './prediction/LinearModelPredictor.js';
import type { PredictionProvider } from './prediction/PredictionProvider.js';
import { PredictionService } from './prediction/PredictionService.js';
import { MemoryRecordStore } from './repositories/MemoryRecordStore.js';
import { PostgresRecordStore } from './repositories/PostgresRecordStore.js';
import type { RecordStore } from './repositories/RecordStore.js';
import { TimedRecordStore } from './repositories/TimedRecordStore.js';
import { AccuracyHistory } from './services/AccuracyHistory.js';
import { AggregationEngine } from './services/AggregationEngine.js';
import { SimulationEngine } from './services/SimulationEngine.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function createStore(): Promise<RecordStore> {
    if (isDatabaseAvailable()) {
        const connected = await testConnection();
        if (!connected) {
            throw new Error('Database configured but unreachable');
        }
        await runMigrations();
        return new TimedRecordStore(new PostgresRecordStore(getSql()), env.STORE_TIMEOUT_MS);
    }

    const store = new MemoryRecordStore();
    if (existsSync(env.SEED_CSV_PATH)) {
        const { records } = await loadSnapshotFile(env.SEED_CSV_PATH, { source: 'seed_csv' });
        await store.replaceAll(records);
        logger.info({ records: records.length, file: env.SEED_CSV_PATH }, 'In-memory store seeded');
    } else {
        logger.warn({ file: env.SEED_CSV_PATH }, 'Seed CSV not found, starting with an empty store');
    }
    return new TimedRecordStore(store, env.STORE_TIMEOUT_MS);
}

async function loadInitialModel(): Promise<PredictionProvider | null> {
    try {
        return await loadLinearModel(env.MODEL_PATH);
    } catch (error) {
        // Serve aggregates anyway; prediction endpoints answer 503 until a reload succeeds
        logger.warn({ path: env.MODEL_PATH, err: errorMessage(error) }, 'Model artifact unavailable at startup');
        return null;
    }
}

async function start(): Promise<void> {
    try {
        const store = await createStore();
        const predictions = new PredictionService(await loadInitialModel(), {
            timeoutMs: env.PREDICTION_TIMEOUT_MS,
            loader: () => loadLinearModel(env.MODEL_PATH),
        });
        const counter = new MetricsCounter();
        const history = new AccuracyHistory();

        const aggregation = new AggregationEngine(store, predictions, counter, history, {
            defaultModelAccuracy: env.DEFAULT_MODEL_ACCURACY,
        });
        const simulation = new SimulationEngine(store, predictions, counter, history, {
            playSpeedMs: env.SIMULATION_PLAY_SPEED_MS,
        });

        const fastify = await buildApp({ store, predictions, counter, aggregation, simulation });

        const shutdown = (signal: string) => {
            logger.info({ signal }, 'Shutting down');
            fastify.close()
                .then(() => process.exit(0))
                .catch((err: unknown) => {
                    logger.error({ err: errorMessage(err) }, 'Error during shutdown');
                    process.exit(1);
                });
        };
        process.on('SIGTERM', () => shutdown('SIGTERM'));
        process.on('SIGINT', () => shutdown('SIGINT'));

        const address = await fastify.listen({ port: env.PORT, host: env.HOST });
        logger.info({
            address,
            mode: env.mode,
            store: isDatabaseAvailable() ? 'postgres' : 'memory',
            modelLoaded: predictions.isLoaded(),
        }, 'Market demand analytics service started');
    } catch (err) {
        logger.error({ err: errorMessage(err) }, 'Startup failed');
        process.exit(1);
    }
}

await start();
