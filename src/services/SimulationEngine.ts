/**
 * SIMULATION ENGINE
 *
 * Replays a week range of one year through the active prediction provider and
 * scores each prediction against the recorded outcome.
 *
 * - Weeks with no record are gap frames: no prediction, excluded from accuracy.
 * - Weeks whose outcome is not recorded yet are `actual_unknown`: predicted,
 *   never counted as a mismatch, excluded from accuracy.
 * - A provider failure aborts the run. No frame is ever guessed.
 * - The whole run scores against one provider, bound at the first
 *   prediction; a model reload mid-run takes effect on the next run.
 * - Every prediction actually issued counts as a served prediction.
 */

import { z } from 'zod';
import type { MetricsCounter } from '../infra/metrics/MetricsCounter.js';
import { featuresFromRecord } from '../prediction/PredictionProvider.js';
import type { PredictionService, PredictionSession } from '../prediction/PredictionService.js';
import type { RecordStore } from '../repositories/RecordStore.js';
import type {
    SimulationFrame,
    SimulationRequest,
    SimulationResult,
} from '../types/index.js';
import { InvalidRangeError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AccuracyHistory } from './AccuracyHistory.js';

const logger = createLogger('SimulationEngine');

export const MIN_WEEK = 1;
export const MAX_WEEK = 52;
export const MIN_YEAR = 1900;
export const MAX_YEAR = 2100;

const SimulationRequestSchema = z.object({
    startWeek: z.coerce.number().int().min(MIN_WEEK).max(MAX_WEEK),
    endWeek: z.coerce.number().int().min(MIN_WEEK).max(MAX_WEEK),
    year: z.coerce.number().int().min(MIN_YEAR).max(MAX_YEAR),
}).refine(r => r.startWeek <= r.endWeek, {
    message: 'start week must not be after end week',
    path: ['startWeek'],
});

/**
 * Validate week/year bounds: 1 <= start <= end <= 52, year within 1900-2100.
 */
export function parseSimulationRequest(input: unknown): SimulationRequest {
    const result = SimulationRequestSchema.safeParse(input);
    if (!result.success) {
        const detail = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new InvalidRangeError(`Invalid simulation range (${detail})`);
    }
    return result.data;
}

export interface SimulationEngineOptions {
    playSpeedMs: number;
    now?: () => Date;
}

export class SimulationEngine {
    private readonly now: () => Date;

    constructor(
        private readonly store: RecordStore,
        private readonly predictions: PredictionService,
        private readonly counter: MetricsCounter,
        private readonly history: AccuracyHistory,
        private readonly options: SimulationEngineOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    async simulate(input: SimulationRequest): Promise<SimulationResult> {
        const { startWeek, endWeek, year } = parseSimulationRequest(input);

        const frames: SimulationFrame[] = [];
        let matches = 0;
        let knownActuals = 0;

        // One read, so a store swap mid-run cannot mix old and new rows
        const records = await this.store.query({ year });
        const byWeek = new Map(records.map(r => [r.week, r] as const));
        let session: PredictionSession | null = null;

        for (let week = startWeek; week <= endWeek; week++) {
            const record = byWeek.get(week);

            if (!record) {
                frames.push(gapFrame(week));
                continue;
            }

            session ??= this.predictions.session();
            const prediction = await session.predict(featuresFromRecord(record));
            this.counter.recordPrediction(this.now());

            const actual = record.marketDemand;
            const match = actual !== null && prediction.demandClass === actual;
            if (actual !== null) {
                knownActuals++;
                if (match) matches++;
            }

            frames.push({
                week,
                month: record.month,
                predicted_demand: prediction.demandClass,
                actual_demand: actual,
                confidence: Math.round(prediction.confidence * 100) / 100,
                match,
                status: actual === null ? 'actual_unknown' : 'scored',
            });
        }

        const accuracy = knownActuals > 0 ? matches / knownActuals : null;

        if (accuracy !== null) {
            this.history.record({ accuracy, year, startWeek, endWeek, completedAt: this.now() });
        }

        logger.info({
            year,
            startWeek,
            endWeek,
            frames: frames.length,
            knownActuals,
            accuracy,
            model: session?.version ?? null,
        }, 'Simulation completed');

        return {
            year,
            start_week: startWeek,
            end_week: endWeek,
            frames,
            total_frames: frames.length,
            matches,
            known_actuals: knownActuals,
            accuracy,
            play_speed: this.options.playSpeedMs,
        };
    }
}

function gapFrame(week: number): SimulationFrame {
    return {
        week,
        month: null,
        predicted_demand: null,
        actual_demand: null,
        confidence: null,
        match: false,
        status: 'gap',
    };
}
