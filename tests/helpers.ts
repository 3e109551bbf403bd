/**
 * Shared fixtures: record factory, stub prediction providers, and an
 * engine/app assembly around the in-memory store.
 */

import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';
import { MetricsCounter } from '../src/infra/metrics/MetricsCounter.js';
import type { ModelDescriptor, PredictionProvider } from '../src/prediction/PredictionProvider.js';
import { PredictionService, type ProviderLoader } from '../src/prediction/PredictionService.js';
import { MemoryRecordStore } from '../src/repositories/MemoryRecordStore.js';
import type { RecordStore } from '../src/repositories/RecordStore.js';
import { TimedRecordStore } from '../src/repositories/TimedRecordStore.js';
import { AccuracyHistory } from '../src/services/AccuracyHistory.js';
import { AggregationEngine } from '../src/services/AggregationEngine.js';
import { SimulationEngine } from '../src/services/SimulationEngine.js';
import type { DemandClass, DemandFeatures, DemandPrediction, MarketWeekRecord } from '../src/types/index.js';

export const FIXED_NOW = new Date('2025-05-14T10:00:00.000Z');

export function makeRecord(overrides: Partial<MarketWeekRecord> = {}): MarketWeekRecord {
    return {
        week: 1,
        year: 2025,
        month: 'January',
        rainfallMm: 100,
        temperatureC: 22,
        marketDay: true,
        schoolOpen: true,
        diseaseAlert: 'Absence',
        lastWeekDemand: 'Medium',
        marketDemand: 'Medium',
        createdAt: new Date('2025-01-06T00:00:00.000Z'),
        source: 'test',
        ...overrides,
    };
}

/**
 * Records for consecutive weeks of one year, one per demand entry.
 */
export function weeksWithDemand(year: number, demands: (DemandClass | null)[], firstWeek: number = 1): MarketWeekRecord[] {
    return demands.map((marketDemand, i) => makeRecord({ year, week: firstWeek + i, marketDemand }));
}

export class StubPredictor implements PredictionProvider {
    public readonly calls: DemandFeatures[] = [];

    constructor(
        private readonly respond: (features: DemandFeatures) => DemandPrediction | Promise<DemandPrediction>,
        private readonly version: string = 'stub-1'
    ) {}

    static always(demandClass: DemandClass, confidence: number, version?: string): StubPredictor {
        return new StubPredictor(() => ({ demandClass, confidence }), version);
    }

    async predict(features: DemandFeatures): Promise<DemandPrediction> {
        this.calls.push(features);
        return this.respond(features);
    }

    describe(): ModelDescriptor {
        return {
            modelType: 'Stub',
            version: this.version,
            trainedAt: null,
            accuracy: null,
            features: [],
        };
    }
}

export interface TestContext {
    store: RecordStore;
    predictions: PredictionService;
    counter: MetricsCounter;
    history: AccuracyHistory;
    aggregation: AggregationEngine;
    simulation: SimulationEngine;
}

export interface TestContextOptions {
    records?: MarketWeekRecord[];
    store?: RecordStore;
    provider?: PredictionProvider | null;
    loader?: ProviderLoader;
    now?: Date;
    timeoutMs?: number;
}

export function createContext(options: TestContextOptions = {}): TestContext {
    const store = options.store ?? new MemoryRecordStore(options.records ?? []);
    const provider = options.provider === undefined ? StubPredictor.always('High', 0.9) : options.provider;
    const predictions = new PredictionService(provider, {
        timeoutMs: options.timeoutMs ?? 200,
        loader: options.loader,
    });
    const counter = new MetricsCounter();
    const history = new AccuracyHistory();
    const now = options.now ?? FIXED_NOW;

    return {
        store,
        predictions,
        counter,
        history,
        aggregation: new AggregationEngine(store, predictions, counter, history, {
            defaultModelAccuracy: 95,
            now: () => now,
        }),
        simulation: new SimulationEngine(store, predictions, counter, history, {
            playSpeedMs: 500,
            now: () => now,
        }),
    };
}

export async function createTestApp(options: TestContextOptions = {}): Promise<{ app: FastifyInstance; ctx: TestContext }> {
    const base = options.store ?? new MemoryRecordStore(options.records ?? []);
    const ctx = createContext({ ...options, store: new TimedRecordStore(base, 200) });
    const app = await buildApp(ctx);
    return { app, ctx };
}
