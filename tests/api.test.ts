/**
 * HTTP API tests
 *
 * Drives the assembled Fastify app with inject(); no port is opened.
 */

import type { FastifyInstance } from 'fastify';
import { afterEach, describe, it, expect } from 'vitest';
import { MemoryRecordStore } from '../src/repositories/MemoryRecordStore.js';
import type { RecordStore } from '../src/repositories/RecordStore.js';
import { StubPredictor, createTestApp, weeksWithDemand, type TestContextOptions } from './helpers.js';

let app: FastifyInstance | null = null;

async function start(options: TestContextOptions = {}): Promise<FastifyInstance> {
    const built = await createTestApp(options);
    app = built.app;
    return built.app;
}

afterEach(async () => {
    if (app) {
        await app.close();
        app = null;
    }
});

describe('HTTP API', () => {
    describe('health', () => {
        it('answers the quick liveness check', async () => {
            const server = await start();

            const response = await server.inject({ method: 'GET', url: '/health' });

            expect(response.statusCode).toBe(200);
            expect(response.json().status).toBe('ok');
        });

        it('reports the store and model in the detailed check', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['Low', 'High']) });

            const response = await server.inject({ method: 'GET', url: '/health/detailed' });
            const body = response.json();

            expect(body.status).toBe('healthy');
            expect(body.services.store).toEqual({ reachable: true, records: 2 });
            expect(body.services.model).toEqual({ loaded: true, version: 'stub-1' });
        });

        it('is degraded without a model', async () => {
            const server = await start({ provider: null });

            const response = await server.inject({ method: 'GET', url: '/health/detailed' });

            expect(response.json().status).toBe('degraded');
        });
    });

    describe('request ids', () => {
        it('echoes an incoming x-request-id', async () => {
            const server = await start();

            const response = await server.inject({
                method: 'GET',
                url: '/health',
                headers: { 'x-request-id': 'req-test-1' },
            });

            expect(response.headers['x-request-id']).toBe('req-test-1');
        });

        it('generates one when absent', async () => {
            const server = await start();

            const response = await server.inject({ method: 'GET', url: '/health' });

            expect(response.headers['x-request-id']).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
        });
    });

    describe('GET /api/predictions/simulate', () => {
        it('replays the requested weeks', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['Medium', 'High', 'High']) });

            const response = await server.inject({
                method: 'GET',
                url: '/api/predictions/simulate?start=1&end=3&year=2025',
            });
            const body = response.json();

            expect(response.statusCode).toBe(200);
            expect(body.total_frames).toBe(3);
            expect(body.matches).toBe(2);
            expect(body.accuracy).toBeCloseTo(2 / 3, 10);
        });

        it('rejects an inverted range with INVALID_RANGE', async () => {
            const server = await start();

            const response = await server.inject({
                method: 'GET',
                url: '/api/predictions/simulate?start=10&end=5&year=2025',
            });

            expect(response.statusCode).toBe(400);
            expect(response.json().error.code).toBe('INVALID_RANGE');
            expect(response.json().error.statusCode).toBe(400);
        });

        it('answers 503 when no model is loaded', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['High']), provider: null });

            const response = await server.inject({
                method: 'GET',
                url: '/api/predictions/simulate?start=1&end=1&year=2025',
            });

            expect(response.statusCode).toBe(503);
            expect(response.json()).toEqual({
                error: { code: 'PREDICTION_UNAVAILABLE', message: 'Model not loaded', statusCode: 503 },
            });
        });
    });

    describe('dashboard endpoints', () => {
        it('counts served predictions on the cards and metrics', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['Low', null]) });

            await server.inject({ method: 'GET', url: '/api/predictions/current-week' });
            const cards = await server.inject({ method: 'GET', url: '/api/predictions/dashboard-cards' });
            const metrics = await server.inject({ method: 'GET', url: '/metrics' });

            expect(cards.json().total_predictions.value).toBe('1');
            expect(metrics.headers['content-type']).toMatch(/^text\/plain/);
            expect(metrics.body).toContain('market_predictions_served_total{period="all_time"} 1\n');
        });

        it('returns the current week prediction', async () => {
            const server = await start({
                records: weeksWithDemand(2025, ['Low', null]),
                provider: StubPredictor.always('Low', 0.42),
            });

            const response = await server.inject({ method: 'GET', url: '/api/predictions/current-week' });

            expect(response.json()).toMatchObject({
                week: 2,
                predicted_demand: 'Low',
                status_color: 'green',
                confidence_percentage: '42%',
            });
        });

        it('validates chart query parameters', async () => {
            const server = await start();

            const response = await server.inject({ method: 'GET', url: '/api/predictions/chart-data?weeks=0' });

            expect(response.statusCode).toBe(400);
            expect(response.json().error.code).toBe('VALIDATION_ERROR');
            expect(response.json().error.details[0]).toMatch(/^weeks: /);
        });

        it('serves chart data with the default window', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['Low', 'High', 'High']) });

            const response = await server.inject({ method: 'GET', url: '/api/predictions/chart-data' });

            expect(response.json().demand_distribution).toEqual({ High: 2, Medium: 0, Low: 1 });
        });
    });

    describe('GET /api/predictions/agricultural-tips', () => {
        it('serves tips for the latest week', async () => {
            const server = await start({ records: weeksWithDemand(2025, ['Low']) });

            const response = await server.inject({ method: 'GET', url: '/api/predictions/agricultural-tips' });

            expect(response.statusCode).toBe(200);
            expect(response.json().data_source).toBe('real_time_analysis');
            expect(response.json().tips).toHaveLength(2);
        });
    });

    describe('model management', () => {
        it('describes the loaded model', async () => {
            const server = await start({ provider: StubPredictor.always('Low', 0.5, 'v7') });

            const response = await server.inject({ method: 'GET', url: '/api/predictions/model-info' });

            expect(response.json()).toMatchObject({ is_loaded: true, version: 'v7', model_type: 'Stub' });
        });

        it('reloads the model on request', async () => {
            const server = await start({
                provider: null,
                loader: async () => StubPredictor.always('High', 0.8, 'v8'),
            });

            const response = await server.inject({ method: 'POST', url: '/api/predictions/model/reload' });

            expect(response.statusCode).toBe(200);
            expect(response.json()).toMatchObject({ success: true, model: { is_loaded: true, version: 'v8' } });
        });
    });

    describe('GET /api/market-data/history', () => {
        it('filters and pages history', async () => {
            const server = await start({
                records: weeksWithDemand(2025, ['High', 'Low', 'High', 'High', 'Medium', 'High']),
            });

            const response = await server.inject({
                method: 'GET',
                url: '/api/market-data/history?year=2025&demand=High&limit=2',
            });
            const body = response.json();

            expect(body.count).toBe(4);
            expect(body.limit).toBe(2);
            expect(body.offset).toBe(0);
            expect(body.results.map((r: { week: number }) => r.week)).toEqual([1, 3]);
        });

        it('rejects an unknown demand class', async () => {
            const server = await start();

            const response = await server.inject({ method: 'GET', url: '/api/market-data/history?demand=Extreme' });

            expect(response.statusCode).toBe(400);
            expect(response.json().error.code).toBe('VALIDATION_ERROR');
        });

        it('answers 404 for an unknown week', async () => {
            const server = await start();

            const response = await server.inject({ method: 'GET', url: '/api/market-data/weeks/2025/40' });

            expect(response.statusCode).toBe(404);
            expect(response.json()).toEqual({
                error: { code: 'NOT_FOUND', message: 'Market week 2025-W40 not found', statusCode: 404 },
            });
        });
    });

    describe('store failures', () => {
        it('answers 503 STORE_UNAVAILABLE when the store fails', async () => {
            const base = new MemoryRecordStore();
            const failing: RecordStore = {
                get: (year, week) => base.get(year, week),
                query: (filters, page) => base.query(filters, page),
                count: filters => base.count(filters),
                latest: () => base.latest(),
                latestUnconfirmed: () => base.latestUnconfirmed(),
                recent: () => Promise.reject(new Error('connection reset')),
                replaceAll: records => base.replaceAll(records),
            };
            const server = await start({ store: failing });

            const response = await server.inject({ method: 'GET', url: '/api/predictions/chart-data' });

            expect(response.statusCode).toBe(503);
            expect(response.json().error.code).toBe('STORE_UNAVAILABLE');
        });
    });
});
