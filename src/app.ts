/**
 * Fastify application assembly.
 *
 * Wires the engines into the HTTP surface. Kept separate from the entry
 * point so tests can build an app around in-memory collaborators and drive
 * it with `inject()`.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { MetricsCounter } from './infra/metrics/MetricsCounter.js';
import { addRequestId, createGlobalErrorHandler, logRequest, returnRequestId } from './middleware/requestId.js';
import type { PredictionService } from './prediction/PredictionService.js';
import type { RecordStore } from './repositories/RecordStore.js';
import marketDataRoutes from './routes/marketData.js';
import predictionRoutes from './routes/predictions.js';
import type { AggregationEngine } from './services/AggregationEngine.js';
import type { SimulationEngine } from './services/SimulationEngine.js';
import { quickHealthCheck, runHealthCheck } from './utils/healthCheck.js';

export interface AppDependencies {
    store: RecordStore;
    predictions: PredictionService;
    counter: MetricsCounter;
    aggregation: AggregationEngine;
    simulation: SimulationEngine;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
    const fastify = Fastify({
        logger: false, // We use our own pino logger
    });

    await fastify.register(cors, {
        origin: true,
    });

    // Set before any route plugin registers: plugins inherit the handler in place at registration
    fastify.setErrorHandler(createGlobalErrorHandler());

    // Request ID first, so every later log line can carry it
    fastify.addHook('onRequest', addRequestId);
    fastify.addHook('onRequest', returnRequestId);
    fastify.addHook('onResponse', logRequest);

    // Quick health check (for load balancers - fast response)
    fastify.get('/health', async () => {
        return quickHealthCheck();
    });

    // Detailed health check (includes store and model status)
    fastify.get('/health/detailed', async () => {
        return runHealthCheck({ store: deps.store, predictions: deps.predictions });
    });

    // Prometheus-format prediction counters
    fastify.get('/metrics', async (_request, reply) => {
        reply.header('Content-Type', 'text/plain');
        return deps.counter.getMetrics();
    });

    await fastify.register(predictionRoutes, {
        prefix: '/api/predictions',
        aggregation: deps.aggregation,
        simulation: deps.simulation,
        predictions: deps.predictions,
    });

    await fastify.register(marketDataRoutes, {
        prefix: '/api/market-data',
        aggregation: deps.aggregation,
    });

    return fastify;
}
