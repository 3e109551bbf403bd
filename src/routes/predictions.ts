/**
 * Prediction & dashboard routes
 *
 * Mounted under /api/predictions.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { PredictionService } from '../prediction/PredictionService.js';
import type { AggregationEngine } from '../services/AggregationEngine.js';
import { DEFAULT_CHART_WEEKS } from '../services/AggregationEngine.js';
import { parseSimulationRequest, type SimulationEngine } from '../services/SimulationEngine.js';
import { isoWeekOf } from '../utils/period.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PredictionRoutes');

// ============================================
// REQUEST SCHEMAS
// ============================================

const ChartQuerySchema = z.object({
    weeks: z.coerce.number().int().min(1).max(52).default(DEFAULT_CHART_WEEKS),
    year: z.coerce.number().int().min(1900).max(2100).optional(),
});

const DEFAULT_START_WEEK = 1;
const DEFAULT_END_WEEK = 20;

export interface PredictionRouteOptions {
    aggregation: AggregationEngine;
    simulation: SimulationEngine;
    predictions: PredictionService;
}

// ============================================
// ROUTE REGISTRATION
// ============================================

export default async function predictionRoutes(fastify: FastifyInstance, opts: PredictionRouteOptions) {
    const { aggregation, simulation, predictions } = opts;

    /**
     * GET /api/predictions/dashboard-cards
     * The four dashboard metric cards
     */
    fastify.get('/dashboard-cards', async () => {
        return aggregation.dashboardCards();
    });

    /**
     * GET /api/predictions/current-week
     * Prediction for the week still awaiting its outcome
     */
    fastify.get('/current-week', async () => {
        return aggregation.currentWeekPrediction();
    });

    /**
     * GET /api/predictions/chart-data?weeks=12&year=2025
     */
    fastify.get('/chart-data', async (request) => {
        const query = ChartQuerySchema.parse(request.query);
        return aggregation.chartData({ weeks: query.weeks, year: query.year });
    });

    /**
     * GET /api/predictions/simulate?start=1&end=20&year=2025
     * Week-by-week replay of predictions against recorded outcomes
     */
    fastify.get<{
        Querystring: { start?: string; end?: string; year?: string };
    }>('/simulate', async (request) => {
        const { start, end, year } = request.query;
        const simulationRequest = parseSimulationRequest({
            startWeek: start ?? DEFAULT_START_WEEK,
            endWeek: end ?? DEFAULT_END_WEEK,
            year: year ?? isoWeekOf(new Date()).year,
        });
        return simulation.simulate(simulationRequest);
    });

    /**
     * GET /api/predictions/status-cards
     * Weather and health status from the latest week
     */
    fastify.get('/status-cards', async () => {
        return aggregation.statusCards();
    });

    /**
     * GET /api/predictions/market-insights
     * Demand distribution donut
     */
    fastify.get('/market-insights', async () => {
        return aggregation.marketInsights();
    });

    /**
     * GET /api/predictions/business-insights
     */
    fastify.get('/business-insights', async () => {
        return aggregation.businessInsights();
    });

    /**
     * GET /api/predictions/agricultural-tips
     * Top growing tips from current conditions and recent predictions
     */
    fastify.get('/agricultural-tips', async () => {
        return aggregation.agriculturalTips();
    });

    /**
     * GET /api/predictions/model-info
     */
    fastify.get('/model-info', async () => {
        return predictions.info();
    });

    /**
     * POST /api/predictions/model/reload
     * Swap in the model artifact currently on disk
     */
    fastify.post('/model/reload', async () => {
        const descriptor = await predictions.reload();
        logger.info({ version: descriptor.version }, 'Model reloaded on request');
        return { success: true, model: predictions.info() };
    });
}
