/**
 * Prediction Provider contract.
 *
 * Any backing classifier (loaded artifact, rule stub, remote service) that
 * maps a feature vector to a demand class and a confidence in [0, 1].
 */

import type { DemandFeatures, DemandPrediction, MarketWeekRecord } from '../types/index.js';
import { isoWeekOf, monthName } from '../utils/period.js';

export interface ModelDescriptor {
    modelType: string;
    version: string;
    trainedAt: string | null;
    accuracy: number | null;
    features: string[];
}

export interface PredictionProvider {
    predict(features: DemandFeatures): Promise<DemandPrediction>;
    describe(): ModelDescriptor;
}

export function featuresFromRecord(record: MarketWeekRecord): DemandFeatures {
    return {
        rainfallMm: record.rainfallMm,
        temperatureC: record.temperatureC,
        marketDay: record.marketDay,
        schoolOpen: record.schoolOpen,
        diseaseAlert: record.diseaseAlert,
        lastWeekDemand: record.lastWeekDemand,
        week: record.week,
        month: record.month,
    };
}

/**
 * Feature vector used when the store holds no records at all.
 */
export function defaultFeatures(now: Date): DemandFeatures {
    return {
        rainfallMm: 75,
        temperatureC: 23,
        marketDay: true,
        schoolOpen: true,
        diseaseAlert: 'Absence',
        lastWeekDemand: 'Medium',
        week: Math.min(isoWeekOf(now).week, 52),
        month: monthName(now),
    };
}
