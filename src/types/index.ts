/**
 * Market Demand Analytics - Type Definitions
 */

// ============================================
// Enumerations
// ============================================

export const DEMAND_CLASSES = ['Low', 'Medium', 'High'] as const;
export type DemandClass = typeof DEMAND_CLASSES[number];

export const DISEASE_ALERTS = ['Absence', 'Presence'] as const;
export type DiseaseAlert = typeof DISEASE_ALERTS[number];

export type DemandTrend = 'Increasing' | 'Decreasing' | 'Stable';

export const DEMAND_VALUE: Record<DemandClass, number> = {
    Low: 1,
    Medium: 2,
    High: 3,
};

// ============================================
// Record Store
// ============================================

/**
 * One observed (or not yet observed) market week. Unique on (year, week).
 * `marketDemand` stays null until the week's outcome is recorded.
 */
export interface MarketWeekRecord {
    week: number;
    year: number;
    month: string;
    rainfallMm: number;
    temperatureC: number;
    marketDay: boolean;
    schoolOpen: boolean;
    diseaseAlert: DiseaseAlert;
    lastWeekDemand: DemandClass;
    marketDemand: DemandClass | null;
    createdAt: Date;
    source: string;
}

export interface RecordFilters {
    year?: number;
    month?: string;
    demand?: DemandClass;
}

export interface PageOptions {
    limit?: number;
    offset?: number;
}

// ============================================
// Prediction
// ============================================

export interface DemandFeatures {
    rainfallMm: number;
    temperatureC: number;
    marketDay: boolean;
    schoolOpen: boolean;
    diseaseAlert: DiseaseAlert;
    lastWeekDemand: DemandClass;
    week: number;
    month: string;
}

export interface DemandPrediction {
    demandClass: DemandClass;
    confidence: number; // 0-1
}

// ============================================
// Dashboard
// ============================================

export interface DashboardCard {
    value: string;
    change?: string;
    trend: 'up' | 'down';
    label: string;
}

export interface DashboardCards {
    total_predictions: DashboardCard;
    weekly_predictions: DashboardCard;
    model_performance: DashboardCard;
    high_demand_weeks: DashboardCard;
}

export type StatusColor = 'red' | 'orange' | 'green';

export interface CurrentWeekPrediction {
    week: number;
    year: number;
    month: string;
    predicted_demand: DemandClass;
    confidence: number;
    status_color: StatusColor;
    confidence_percentage: string;
    source: 'record' | 'defaults';
}

export interface ChartPoint {
    week: string;
    year: number;
    demand_level: DemandClass;
    demand_value: number;
    rainfall: number;
    temperature: number;
}

export type DemandDistribution = Record<DemandClass, number>;

export interface ChartData {
    trend_data: ChartPoint[];
    demand_distribution: DemandDistribution;
    total_weeks: number;
}

export interface MarketHistoryRow {
    week: number;
    year: number;
    month: string;
    rainfall_mm: number;
    temperature_c: number;
    market_day: boolean;
    school_open: boolean;
    disease_alert: DiseaseAlert;
    last_week_demand: DemandClass;
    market_demand: DemandClass | null;
    demand_trend: DemandTrend | null;
    is_high_demand: boolean;
    source: string;
    created_at: string;
}

export interface MarketHistory {
    count: number;
    limit: number;
    offset: number;
    demand_breakdown: DemandDistribution;
    results: MarketHistoryRow[];
}

// ============================================
// Simulation
// ============================================

export type FrameStatus = 'scored' | 'actual_unknown' | 'gap';

export interface SimulationFrame {
    week: number;
    month: string | null;
    predicted_demand: DemandClass | null;
    actual_demand: DemandClass | null;
    confidence: number | null;
    match: boolean;
    status: FrameStatus;
}

export interface SimulationRequest {
    startWeek: number;
    endWeek: number;
    year: number;
}

export interface SimulationResult {
    year: number;
    start_week: number;
    end_week: number;
    frames: SimulationFrame[];
    total_frames: number;
    matches: number;
    known_actuals: number;
    accuracy: number | null;
    play_speed: number;
}
