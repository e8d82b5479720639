import { z } from 'zod';

export const PERFORMANCE_PERIODS = ['1D', '1W', '1M', '3M', '6M', '1Y', 'YTD'] as const;
export const COMPARISON_PERIODS = ['1D', '1W', '1M', '3M', '6M', '1Y'] as const;

export type PerformancePeriod = (typeof PERFORMANCE_PERIODS)[number];
export type FixedPeriod = (typeof COMPARISON_PERIODS)[number];

export const performancePeriodSchema = z.enum(PERFORMANCE_PERIODS);
export const comparisonPeriodSchema = z.enum(COMPARISON_PERIODS);

const PERIOD_DAYS: Record<FixedPeriod, number> = {
  '1D': 1,
  '1W': 7,
  '1M': 30,
  '3M': 90,
  '6M': 180,
  '1Y': 365,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Number of days a fixed period looks back. YTD has no fixed length.
 */
export function periodDays(period: PerformancePeriod): number | null {
  return period === 'YTD' ? null : PERIOD_DAYS[period];
}

/**
 * First calendar day (UTC, YYYY-MM-DD) of the lookback window.
 */
export function resolvePeriodStart(period: PerformancePeriod, now: Date = new Date()): string {
  const days = periodDays(period);

  if (days === null) {
    return `${now.getUTCFullYear()}-01-01`;
  }

  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return new Date(today - days * MS_PER_DAY).toISOString().slice(0, 10);
}
