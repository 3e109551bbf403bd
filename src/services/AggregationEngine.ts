/**
 * AGGREGATION ENGINE
 *
 * Read-only dashboard views over the record store and the prediction counters:
 * metric cards with period-over-period deltas, the current-week prediction,
 * chart series, market history, and the status/insight panels.
 *
 * Empty input yields zero counts and empty series. A delta against a zero
 * previous value is undefined and left off the card.
 */

import type { MetricsCounter } from '../infra/metrics/MetricsCounter.js';
import { defaultFeatures, featuresFromRecord } from '../prediction/PredictionProvider.js';
import type { PredictionService } from '../prediction/PredictionService.js';
import { deriveDemandTrend, type RecordStore } from '../repositories/RecordStore.js';
import {
    DEMAND_VALUE,
    type ChartData,
    type ChartPoint,
    type CurrentWeekPrediction,
    type DashboardCard,
    type DashboardCards,
    type DemandClass,
    type DemandDistribution,
    type MarketHistory,
    type MarketHistoryRow,
    type MarketWeekRecord,
    type PageOptions,
    type RecordFilters,
    type StatusColor,
} from '../types/index.js';
import { ALL_TIME, isoWeekOf, periodKey, previousPeriodKey } from '../utils/period.js';
import type { AccuracyHistory } from './AccuracyHistory.js';

export const STATUS_COLORS: Record<DemandClass, StatusColor> = {
    High: 'red',
    Medium: 'orange',
    Low: 'green',
};

const DONUT_COLORS: Record<DemandClass, string> = {
    High: '#ef4444',
    Medium: '#f59e0b',
    Low: '#10b981',
};

const ALERT_COLOR = '#ef4444';
const COLD_COLOR = '#3b82f6';
const OK_COLOR = '#10b981';

export const DEFAULT_CHART_WEEKS = 12;
const INSIGHT_WINDOW = 20;
const BUSINESS_WINDOW = 12;
const MAX_TIPS = 4;

// Weekly revenue estimate per profit-potential tier
const REVENUE_ESTIMATE: Record<DemandClass, string> = {
    High: '650,000',
    Medium: '450,000',
    Low: '280,000',
};

const TIP_ORDER: Record<TipPriority, number> = { critical: 0, high: 1, medium: 2, low: 3 };

const STANDING_TIPS: readonly AgriculturalTip[] = [
    { icon: '💡', text: 'Plant tomatoes during dry season for better yields', priority: 'high' },
    { icon: '🌱', text: 'Use organic fertilizers to improve soil health', priority: 'medium' },
];

// ============================================
// Period deltas
// ============================================

/**
 * Percentage change versus the previous period, or undefined when there is
 * nothing to compare against.
 */
export function percentChange(current: number, previous: number | undefined): number | undefined {
    if (previous === undefined || previous === 0) return undefined;
    return ((current - previous) / previous) * 100;
}

export function formatChange(change: number): string {
    return `${change >= 0 ? '+' : ''}${change.toFixed(1)}%`;
}

export function buildCard(label: string, value: string, current: number, previous: number | undefined): DashboardCard {
    const change = percentChange(current, previous);
    if (change === undefined) {
        return { value, trend: 'up', label };
    }
    return {
        value,
        change: formatChange(change),
        trend: change >= 0 ? 'up' : 'down',
        label,
    };
}

export function emptyDistribution(): DemandDistribution {
    return { High: 0, Medium: 0, Low: 0 };
}

function formatCount(n: number): string {
    return n.toLocaleString('en-US');
}

function toHistoryRow(record: MarketWeekRecord): MarketHistoryRow {
    return {
        week: record.week,
        year: record.year,
        month: record.month,
        rainfall_mm: record.rainfallMm,
        temperature_c: record.temperatureC,
        market_day: record.marketDay,
        school_open: record.schoolOpen,
        disease_alert: record.diseaseAlert,
        last_week_demand: record.lastWeekDemand,
        market_demand: record.marketDemand,
        demand_trend: deriveDemandTrend(record.marketDemand, record.lastWeekDemand),
        is_high_demand: record.marketDemand === 'High',
        source: record.source,
        created_at: record.createdAt.toISOString(),
    };
}

// ============================================
// Response shapes for the supplementary panels
// ============================================

export interface StatusCards {
    weather: { status: string; details: string; color?: string; temperature?: number; rainfall?: number };
    health: { status: string; details: string; color?: string; disease_alert?: string };
}

export interface MarketInsights {
    chart_type: 'donut';
    title: string;
    data: { label: string; value: number; color: string }[];
    center_text: string;
    center_label: string;
    weeks_analyzed: number;
}

export interface BusinessInsights {
    current_profit_potential: DemandClass;
    weekly_revenue_estimate: string;
    best_selling_days: string;
    market_trend: 'Growing' | 'Stable' | 'Declining';
    high_demand_weeks: number;
    market_days: number;
    weeks_analyzed: number;
    insights: string[];
}

export type TipPriority = 'critical' | 'high' | 'medium' | 'low';

export interface AgriculturalTip {
    icon: string;
    text: string;
    priority: TipPriority;
}

export interface AgriculturalTips {
    tips: AgriculturalTip[];
    last_updated: string;
    data_source: 'real_time_analysis';
}

export interface ChartOptions {
    weeks?: number;
    year?: number;
}

export interface AggregationEngineOptions {
    /** Accuracy (percent) reported before any simulation has run. */
    defaultModelAccuracy: number;
    now?: () => Date;
}

export class AggregationEngine {
    private readonly now: () => Date;

    constructor(
        private readonly store: RecordStore,
        private readonly predictions: PredictionService,
        private readonly counter: MetricsCounter,
        private readonly history: AccuracyHistory,
        private readonly options: AggregationEngineOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * The four dashboard metric cards.
     */
    async dashboardCards(): Promise<DashboardCards> {
        const now = this.now();

        const allTime = this.counter.read(ALL_TIME);
        const thisPeriod = this.counter.read(periodKey(now));
        const lastPeriod = this.counter.read(previousPeriodKey(now));

        const latestRun = this.history.latest();
        const previousRun = this.history.previous();
        const accuracy = latestRun ? latestRun.accuracy * 100 : this.options.defaultModelAccuracy;
        const previousAccuracy = previousRun ? previousRun.accuracy * 100 : undefined;

        const records = await this.store.query({});
        const highDemand = records.filter(r => r.marketDemand === 'High').length;
        const newest = records.length > 0 ? records[records.length - 1] : null;
        const highDemandBefore = newest?.marketDemand === 'High' ? highDemand - 1 : highDemand;

        return {
            // All-time total compared with where it stood when this period began
            total_predictions: buildCard('TOTAL PREDICTIONS', formatCount(allTime), allTime, allTime - thisPeriod),
            weekly_predictions: buildCard('THIS WEEK', formatCount(thisPeriod), thisPeriod, lastPeriod),
            model_performance: buildCard('ACCURACY', `${accuracy.toFixed(1)}%`, accuracy, previousAccuracy),
            high_demand_weeks: buildCard(
                'HIGH DEMAND',
                formatCount(highDemand),
                highDemand,
                newest ? highDemandBefore : undefined
            ),
        };
    }

    /**
     * Predict the week still awaiting an outcome (or the latest week when
     * every outcome is in). Counts as a served prediction.
     */
    async currentWeekPrediction(): Promise<CurrentWeekPrediction> {
        const now = this.now();
        const record = (await this.store.latestUnconfirmed()) ?? (await this.store.latest());

        const features = record ? featuresFromRecord(record) : defaultFeatures(now);
        const prediction = await this.predictions.predict(features);
        this.counter.recordPrediction(now);

        return {
            week: features.week,
            year: record ? record.year : isoWeekOf(now).year,
            month: features.month,
            predicted_demand: prediction.demandClass,
            confidence: Math.round(prediction.confidence * 100) / 100,
            status_color: STATUS_COLORS[prediction.demandClass],
            confidence_percentage: `${Math.floor(prediction.confidence * 100 + 1e-9)}%`,
            source: record ? 'record' : 'defaults',
        };
    }

    /**
     * Trend series over the most recent confirmed weeks, ascending, plus the
     * demand distribution of exactly those weeks.
     */
    async chartData(options: ChartOptions = {}): Promise<ChartData> {
        const records = await this.store.recent(options.weeks ?? DEFAULT_CHART_WEEKS, {
            confirmedOnly: true,
            year: options.year,
        });

        const trendData: ChartPoint[] = [];
        const distribution = emptyDistribution();

        for (const record of records) {
            const level = record.marketDemand;
            if (level === null) continue;

            trendData.push({
                week: `W${record.week}`,
                year: record.year,
                demand_level: level,
                demand_value: DEMAND_VALUE[level],
                rainfall: record.rainfallMm,
                temperature: record.temperatureC,
            });
            distribution[level] += 1;
        }

        return {
            trend_data: trendData,
            demand_distribution: distribution,
            total_weeks: trendData.length,
        };
    }

    /**
     * Filtered, paginated projection of raw records. `count` ignores the page.
     * Page, count and breakdown come from one read, so a store refresh can
     * never split them across snapshots.
     */
    async marketHistory(filters: RecordFilters, page: Required<PageOptions>): Promise<MarketHistory> {
        const matched = await this.store.query(filters);

        const breakdown = emptyDistribution();
        for (const record of matched) {
            if (record.marketDemand !== null) breakdown[record.marketDemand] += 1;
        }

        return {
            count: matched.length,
            limit: page.limit,
            offset: page.offset,
            demand_breakdown: breakdown,
            results: matched.slice(page.offset, page.offset + page.limit).map(toHistoryRow),
        };
    }

    async weekDetail(year: number, week: number): Promise<MarketHistoryRow> {
        return toHistoryRow(await this.store.get(year, week));
    }

    /**
     * Weather and health status from the latest recorded week.
     */
    async statusCards(): Promise<StatusCards> {
        const latest = await this.store.latest();

        if (!latest) {
            return {
                weather: { status: 'No data', details: 'Weather data unavailable' },
                health: { status: 'No data', details: 'Health data unavailable' },
            };
        }

        const temp = latest.temperatureC;
        const rainfall = latest.rainfallMm;

        let weatherStatus = 'Moderate';
        let weatherColor = OK_COLOR;
        if (temp > 30) {
            weatherStatus = 'Hot';
            weatherColor = ALERT_COLOR;
        } else if (temp < 15) {
            weatherStatus = 'Cold';
            weatherColor = COLD_COLOR;
        }

        const diseasePresent = latest.diseaseAlert === 'Presence';

        return {
            weather: {
                status: weatherStatus,
                details: `${temp}°C, ${rainfall}mm rain`,
                color: weatherColor,
                temperature: temp,
                rainfall,
            },
            health: {
                status: diseasePresent ? 'Disease Alert' : 'Healthy',
                details: diseasePresent ? 'Disease detected in area' : 'No disease reported',
                color: diseasePresent ? ALERT_COLOR : OK_COLOR,
                disease_alert: latest.diseaseAlert,
            },
        };
    }

    /**
     * Demand share (rounded percent) across the most recent confirmed weeks.
     */
    async marketInsights(): Promise<MarketInsights> {
        const records = await this.store.recent(INSIGHT_WINDOW, { confirmedOnly: true });
        const counts = emptyDistribution();
        for (const record of records) {
            if (record.marketDemand !== null) counts[record.marketDemand] += 1;
        }

        const total = records.length;
        const pct = (n: number): number => (total === 0 ? 0 : Math.round((n / total) * 100));

        return {
            chart_type: 'donut',
            title: 'Demand Distribution',
            data: (['High', 'Medium', 'Low'] as const).map(level => ({
                label: `${level} Demand`,
                value: pct(counts[level]),
                color: DONUT_COLORS[level],
            })),
            center_text: `${pct(counts.High)}%`,
            center_label: 'High Demand',
            weeks_analyzed: total,
        };
    }

    /**
     * Profit potential and short-term trend from the last twelve weeks.
     */
    async businessInsights(): Promise<BusinessInsights> {
        const records = await this.store.recent(BUSINESS_WINDOW);

        const highDemandWeeks = records.filter(r => r.marketDemand === 'High').length;
        const marketDays = records.filter(r => r.marketDay).length;
        const highRecent = records.slice(-3).filter(r => r.marketDemand === 'High').length;

        const potential: DemandClass = highDemandWeeks >= 4 ? 'High' : highDemandWeeks >= 2 ? 'Medium' : 'Low';
        const trend = highRecent >= 2 ? 'Growing' : highRecent === 1 ? 'Stable' : 'Declining';

        return {
            current_profit_potential: potential,
            weekly_revenue_estimate: REVENUE_ESTIMATE[potential],
            best_selling_days: marketDays > 6 ? 'Tuesday, Friday' : 'Friday, Saturday',
            market_trend: trend,
            high_demand_weeks: highDemandWeeks,
            market_days: marketDays,
            weeks_analyzed: records.length,
            insights: [
                `${highDemandWeeks} high-demand weeks recorded`,
                `Market days show ${marketDays}/${records.length} activity`,
                `Trend is ${trend.toLowerCase()} this month`,
            ],
        };
    }

    /**
     * Growing tips from the latest week's conditions and the recently served
     * predictions, most urgent first.
     */
    async agriculturalTips(): Promise<AgriculturalTips> {
        const latest = await this.store.latest();
        const recent = this.predictions.recent();
        const tips: AgriculturalTip[] = [...STANDING_TIPS];

        if (latest) {
            const temp = latest.temperatureC;
            if (temp > 25) {
                tips.push({ icon: '🌡️', text: `High temperature (${temp}°C) - increase irrigation frequency`, priority: 'high' });
            } else if (temp < 20) {
                tips.push({ icon: '❄️', text: 'Cool weather detected - protect young plants from cold', priority: 'medium' });
            }

            const rainfall = latest.rainfallMm;
            if (rainfall > 100) {
                tips.push({ icon: '🌧️', text: 'Heavy rainfall detected - ensure proper drainage', priority: 'high' });
            } else if (rainfall < 20) {
                tips.push({ icon: '💧', text: 'Low rainfall - implement water conservation techniques', priority: 'high' });
            }

            if (latest.diseaseAlert === 'Presence') {
                tips.push({ icon: '🦠', text: 'Disease alert active - apply preventive treatments immediately', priority: 'critical' });
            }
        }

        // Market tips need something served to judge by
        if (recent.length > 0) {
            const high = recent.filter(p => p.demandClass === 'High').length;
            if (high >= 3) {
                tips.push({
                    icon: '📈',
                    text: `High demand trend (${high}/${recent.length} recent predictions) - consider expanding production`,
                    priority: 'high',
                });
            } else if (high <= 1) {
                tips.push({ icon: '📉', text: 'Low demand period - focus on quality over quantity', priority: 'medium' });
            }

            const avgConfidence = recent.reduce((sum, p) => sum + p.confidence, 0) / recent.length;
            if (avgConfidence > 0.8) {
                tips.push({
                    icon: '🎯',
                    text: `High prediction confidence (${Math.floor(avgConfidence * 100 + 1e-9)}%) - good time for planning`,
                    priority: 'medium',
                });
            }
        }

        // Stable sort: equal priorities keep insertion order
        tips.sort((a, b) => TIP_ORDER[a.priority] - TIP_ORDER[b.priority]);

        return {
            tips: tips.slice(0, MAX_TIPS),
            last_updated: this.now().toISOString(),
            data_source: 'real_time_analysis',
        };
    }
}
