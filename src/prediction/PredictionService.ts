/**
 * Prediction Service
 *
 * Owns the active PredictionProvider. A swap replaces the reference in one
 * assignment; each call (or session) captures the provider once, so an
 * in-flight request finishes on the provider it started with.
 */

import { DEMAND_CLASSES, type DemandFeatures, type DemandPrediction } from '../types/index.js';
import { AppError, PredictionUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/reliability.js';
import type { ModelDescriptor, PredictionProvider } from './PredictionProvider.js';

const logger = createLogger('PredictionService');

const MAX_SERVED = 50;
const RECENT_WINDOW = 10;

export type ProviderLoader = () => Promise<PredictionProvider>;

export interface PredictionServiceOptions {
    timeoutMs: number;
    /** Used by reload(); without one, reload is unavailable. */
    loader?: ProviderLoader;
}

export interface PredictionSession {
    version: string;
    predict(features: DemandFeatures): Promise<DemandPrediction>;
}

export interface ModelInfo {
    is_loaded: boolean;
    model_type?: string;
    version?: string;
    accuracy?: number | null;
    trained_at?: string | null;
    features?: string[];
    message?: string;
}

function isValidPrediction(prediction: DemandPrediction): boolean {
    return DEMAND_CLASSES.includes(prediction.demandClass)
        && Number.isFinite(prediction.confidence)
        && prediction.confidence >= 0
        && prediction.confidence <= 1;
}

export class PredictionService {
    private provider: PredictionProvider | null;
    private served: DemandPrediction[] = [];

    constructor(provider: PredictionProvider | null, private readonly options: PredictionServiceOptions) {
        this.provider = provider;
    }

    isLoaded(): boolean {
        return this.provider !== null;
    }

    swap(provider: PredictionProvider): void {
        const previous = this.provider?.describe().version ?? null;
        this.provider = provider;
        logger.info({ previous, next: provider.describe().version }, 'Prediction provider swapped');
    }

    /**
     * Load a fresh provider and swap it in. The current provider stays
     * active when loading fails.
     */
    async reload(): Promise<ModelDescriptor> {
        if (!this.options.loader) {
            throw new PredictionUnavailableError('No model loader configured');
        }
        const next = await this.options.loader();
        this.swap(next);
        return next.describe();
    }

    /**
     * Bind the current provider for a multi-step request. Every prediction
     * made through the session uses that provider, whatever is swapped in
     * meanwhile.
     */
    session(): PredictionSession {
        const provider = this.provider;
        if (!provider) {
            throw new PredictionUnavailableError('Model not loaded');
        }
        return {
            version: provider.describe().version,
            predict: features => this.run(provider, features),
        };
    }

    async predict(features: DemandFeatures): Promise<DemandPrediction> {
        return this.session().predict(features);
    }

    /**
     * Most recent successful predictions, newest last.
     */
    recent(limit: number = RECENT_WINDOW): DemandPrediction[] {
        return limit > 0 ? this.served.slice(-limit) : [];
    }

    private async run(provider: PredictionProvider, features: DemandFeatures): Promise<DemandPrediction> {
        let prediction: DemandPrediction;
        try {
            prediction = await withTimeout(
                provider.predict(features),
                this.options.timeoutMs,
                `Prediction timed out after ${this.options.timeoutMs}ms`
            );
        } catch (error) {
            if (error instanceof AppError) throw error;
            logger.error({ err: errorMessage(error), week: features.week }, 'Prediction failed');
            throw new PredictionUnavailableError(`Prediction failed: ${errorMessage(error)}`);
        }

        if (!isValidPrediction(prediction)) {
            logger.error({ prediction }, 'Provider returned an incompatible prediction');
            throw new PredictionUnavailableError('Provider returned an incompatible prediction');
        }

        this.served = [...this.served, prediction].slice(-MAX_SERVED);
        return prediction;
    }

    info(): ModelInfo {
        if (!this.provider) {
            return { is_loaded: false, message: 'Model not loaded.' };
        }
        const descriptor = this.provider.describe();
        return {
            is_loaded: true,
            model_type: descriptor.modelType,
            version: descriptor.version,
            accuracy: descriptor.accuracy,
            trained_at: descriptor.trainedAt,
            features: descriptor.features,
        };
    }
}
