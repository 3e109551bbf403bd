/**
 * Linear model predictor
 *
 * Scores each demand class as `intercept + Σ weight·feature` over the encoded
 * feature vector and returns the softmax winner. The coefficients come from a
 * JSON artifact produced by the offline training job; a missing or
 * mismatched artifact is a PredictionUnavailableError, never a fallback.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
    DEMAND_CLASSES,
    DEMAND_VALUE,
    type DemandClass,
    type DemandFeatures,
    type DemandPrediction,
} from '../types/index.js';
import { PredictionUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { ModelDescriptor, PredictionProvider } from './PredictionProvider.js';

const logger = createLogger('LinearModelPredictor');

export const FEATURE_NAMES = [
    'rainfall_mm',
    'temperature_c',
    'market_day',
    'school_open',
    'disease_alert',
    'last_week_demand',
    'week',
] as const;

type FeatureName = typeof FEATURE_NAMES[number];

const WeightsSchema = z.object({
    rainfall_mm: z.number(),
    temperature_c: z.number(),
    market_day: z.number(),
    school_open: z.number(),
    disease_alert: z.number(),
    last_week_demand: z.number(),
    week: z.number(),
});

const ClassCoefficientsSchema = z.object({
    intercept: z.number(),
    weights: WeightsSchema,
});

export const ModelArtifactSchema = z.object({
    model_type: z.string().default('Linear Demand Classifier'),
    version: z.string(),
    trained_at: z.string().nullable().default(null),
    accuracy: z.number().min(0).max(1).nullable().default(null),
    classes: z.object({
        Low: ClassCoefficientsSchema,
        Medium: ClassCoefficientsSchema,
        High: ClassCoefficientsSchema,
    }),
});

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

export function encodeFeatures(features: DemandFeatures): Record<FeatureName, number> {
    return {
        rainfall_mm: features.rainfallMm,
        temperature_c: features.temperatureC,
        market_day: features.marketDay ? 1 : 0,
        school_open: features.schoolOpen ? 1 : 0,
        disease_alert: features.diseaseAlert === 'Presence' ? 1 : 0,
        last_week_demand: DEMAND_VALUE[features.lastWeekDemand],
        week: features.week,
    };
}

export class LinearModelPredictor implements PredictionProvider {
    constructor(private readonly artifact: ModelArtifact) {}

    async predict(features: DemandFeatures): Promise<DemandPrediction> {
        const encoded = encodeFeatures(features);

        const scores = DEMAND_CLASSES.map(demandClass => {
            const { intercept, weights } = this.artifact.classes[demandClass];
            return FEATURE_NAMES.reduce((sum, name) => sum + weights[name] * encoded[name], intercept);
        });

        // Softmax, shifted by the max score for numerical stability
        const maxScore = Math.max(...scores);
        const exps = scores.map(s => Math.exp(s - maxScore));
        const total = exps.reduce((a, b) => a + b, 0);

        let best = 0;
        for (let i = 1; i < exps.length; i++) {
            if (exps[i] > exps[best]) best = i;
        }

        const demandClass: DemandClass = DEMAND_CLASSES[best];
        return { demandClass, confidence: exps[best] / total };
    }

    describe(): ModelDescriptor {
        return {
            modelType: this.artifact.model_type,
            version: this.artifact.version,
            trainedAt: this.artifact.trained_at,
            accuracy: this.artifact.accuracy,
            features: [...FEATURE_NAMES],
        };
    }
}

/**
 * Load and validate a model artifact from disk.
 */
export async function loadLinearModel(artifactPath: string): Promise<LinearModelPredictor> {
    let raw: string;
    try {
        raw = await readFile(artifactPath, 'utf-8');
    } catch (error) {
        throw new PredictionUnavailableError(`Model artifact not found at ${artifactPath}: ${errorMessage(error)}`);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new PredictionUnavailableError(`Model artifact is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = ModelArtifactSchema.safeParse(json);
    if (!parsed.success) {
        throw new PredictionUnavailableError(
            `Model artifact is incompatible: ${parsed.error.issues.map(i => `${i.path.join('.')} ${i.message}`).join('; ')}`
        );
    }

    logger.info({
        path: artifactPath,
        version: parsed.data.version,
        accuracy: parsed.data.accuracy,
        trainedAt: parsed.data.trained_at,
    }, 'Model artifact loaded');

    return new LinearModelPredictor(parsed.data);
}
