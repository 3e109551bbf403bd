/**
 * ISO-8601 week helpers. Period buckets are keyed `YYYY-Www`.
 */

export const ALL_TIME = 'all_time';

const MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export interface IsoWeek {
    year: number;
    week: number;
}

export function isoWeekOf(date: Date): IsoWeek {
    const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
    // Thursday of the same week decides the ISO year
    const dayNum = d.getUTCDay() || 7;
    d.setUTCDate(d.getUTCDate() + 4 - dayNum);
    const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
    const week = Math.ceil(((d.getTime() - yearStart.getTime()) / 86_400_000 + 1) / 7);
    return { year: d.getUTCFullYear(), week };
}

export function periodKey(date: Date): string {
    const { year, week } = isoWeekOf(date);
    return `${year}-W${String(week).padStart(2, '0')}`;
}

export function previousPeriodKey(date: Date): string {
    return periodKey(new Date(date.getTime() - 7 * 86_400_000));
}

export function monthName(date: Date): string {
    return MONTHS[date.getUTCMonth()];
}
