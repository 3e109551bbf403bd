/**
 * Market data routes
 *
 * Mounted under /api/market-data.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AggregationEngine } from '../services/AggregationEngine.js';
import { DEMAND_CLASSES } from '../types/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

const HistoryQuerySchema = z.object({
    year: z.coerce.number().int().min(1900).max(2100).optional(),
    month: z.string().min(1).max(20).optional(),
    demand: z.enum(DEMAND_CLASSES).optional(),
    limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
    offset: z.coerce.number().int().min(0).default(0),
});

const WeekParamsSchema = z.object({
    year: z.coerce.number().int().min(1900).max(2100),
    week: z.coerce.number().int().min(1).max(52),
});

export interface MarketDataRouteOptions {
    aggregation: AggregationEngine;
}

export default async function marketDataRoutes(fastify: FastifyInstance, opts: MarketDataRouteOptions) {
    const { aggregation } = opts;

    /**
     * GET /api/market-data/history?year=2025&month=March&demand=High&limit=10&offset=0
     */
    fastify.get('/history', async (request) => {
        const { year, month, demand, limit, offset } = HistoryQuerySchema.parse(request.query);
        return aggregation.marketHistory({ year, month, demand }, { limit, offset });
    });

    /**
     * GET /api/market-data/weeks/:year/:week
     */
    fastify.get('/weeks/:year/:week', async (request) => {
        const { year, week } = WeekParamsSchema.parse(request.params);
        return aggregation.weekDetail(year, week);
    });
}
