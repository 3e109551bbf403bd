/**
 * Health Check Utility
 *
 * Quick liveness check plus a detailed check covering the record store,
 * the database connection and the prediction model.
 */

import { isDatabaseAvailable, testConnection } from '../db/index.js';
import type { PredictionService } from '../prediction/PredictionService.js';
import type { RecordStore } from '../repositories/RecordStore.js';
import { errorMessage } from './errors.js';

export interface HealthStatus {
    status: 'healthy' | 'degraded' | 'unhealthy';
    timestamp: string;
    version: string;
    uptime: number;
    services: {
        database: { configured: boolean; connected: boolean; latencyMs?: number };
        store: { reachable: boolean; records?: number; error?: string };
        model: { loaded: boolean; version?: string };
    };
    memory: {
        heapUsed: number;
        rss: number;
    };
}

export interface HealthDependencies {
    store: RecordStore;
    predictions: PredictionService;
}

const startTime = Date.now();

/**
 * Run comprehensive health check
 */
export async function runHealthCheck(deps: HealthDependencies): Promise<HealthStatus> {
    const configured = isDatabaseAvailable();
    const dbStart = Date.now();
    const dbConnected = configured ? await testConnection() : false;
    const dbLatency = Date.now() - dbStart;

    let store: HealthStatus['services']['store'];
    try {
        store = { reachable: true, records: await deps.store.count({}) };
    } catch (error) {
        store = { reachable: false, error: errorMessage(error) };
    }

    const model = deps.predictions.info();

    let status: HealthStatus['status'] = 'healthy';
    if (!store.reachable) {
        status = 'unhealthy';
    } else if (!model.is_loaded || (configured && !dbConnected)) {
        status = 'degraded';
    }

    const memUsage = process.memoryUsage();

    return {
        status,
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version || '1.0.0',
        uptime: Math.floor((Date.now() - startTime) / 1000),
        services: {
            database: {
                configured,
                connected: dbConnected,
                latencyMs: configured ? dbLatency : undefined,
            },
            store,
            model: { loaded: model.is_loaded, version: model.version },
        },
        memory: {
            heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
            rss: Math.round(memUsage.rss / 1024 / 1024),
        },
    };
}

/**
 * Quick health check (for load balancers)
 */
export function quickHealthCheck(): { status: 'ok' | 'error'; timestamp: string } {
    return {
        status: 'ok',
        timestamp: new Date().toISOString(),
    };
}
