import { asc, isNotNull, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { z } from 'zod';
import { withConnection } from '../config/database.js';
import type { Database } from '../config/database.js';
import { companies, historicalData } from '../db/schema/index.js';
import { InternalError } from '../utils/errors.js';
import { resolvePeriodStart } from './period.js';
import type { FixedPeriod, PerformancePeriod } from './period.js';

export type Trend = 'positive' | 'negative' | 'neutral';

/**
 * One company with the two prices bounding the window and its latest volume.
 * Prices are null when the company has no trade in the window (start) or at all (current).
 */
export interface CompanyPriceRow {
  symbol: string;
  name: string;
  sector: string;
  startPrice: number | null;
  currentPrice: number | null;
  volume: number | null;
}

export interface CompanyPerformance {
  symbol: string;
  name: string;
  sector: string;
  currentPrice: number;
  volume: number | null;
  performance: number;
}

export interface SectorPerformanceSummary {
  sector: string;
  companiesCount: number;
  avgPerformance: number;
  totalPerformance: number;
  avgCurrentPrice: number;
  trend: Trend;
}

export interface SectorComparisonSummary {
  sector: string;
  companies: CompanyPerformance[];
  avgPerformance: number;
  bestPerformer: CompanyPerformance;
  worstPerformer: CompanyPerformance;
}

export interface SectorListing {
  sector: string;
  companiesCount: number;
}

// bigint and numeric columns arrive from pg as strings
const nullableNumber = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((value, ctx) => {
    if (value === null) return null;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a finite number: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const companyPriceRowSchema = z
  .object({
    symbol: z.string(),
    name: z.string(),
    sector: z.string(),
    start_price: nullableNumber,
    current_price: nullableNumber,
    volume: nullableNumber,
  })
  .transform((row): CompanyPriceRow => ({
    symbol: row.symbol,
    name: row.name,
    sector: row.sector,
    startPrice: row.start_price,
    currentPrice: row.current_price,
    volume: row.volume,
  }));

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Percentage change from `start` to `current`.
 * Null when either price is missing or the start price is not positive.
 */
export function computePerformance(start: number | null, current: number | null): number | null {
  if (start === null || current === null || start <= 0) {
    return null;
  }
  return ((current - start) / start) * 100;
}

export function trendFor(avgPerformance: number | null): Trend {
  if (avgPerformance === null || avgPerformance === 0) return 'neutral';
  return avgPerformance > 0 ? 'positive' : 'negative';
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Group items by sector, keeping sectors in first-seen order and
 * items in their original order within each sector.
 */
export function groupBySector<T extends { sector: string }>(items: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const item of items) {
    const group = groups.get(item.sector);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.sector, [item]);
    }
  }

  return groups;
}

/**
 * Companies whose window performance can be computed.
 */
export function toCompanyPerformances(rows: CompanyPriceRow[]): CompanyPerformance[] {
  const result: CompanyPerformance[] = [];

  for (const row of rows) {
    const performance = computePerformance(row.startPrice, row.currentPrice);
    if (performance === null || row.currentPrice === null) continue;

    result.push({
      symbol: row.symbol,
      name: row.name,
      sector: row.sector,
      currentPrice: row.currentPrice,
      volume: row.volume,
      performance,
    });
  }

  return result;
}

/**
 * Per-sector performance, best average first.
 * Sectors without a single company that has both prices are left out.
 */
export function summarizeSectorPerformance(rows: CompanyPriceRow[]): SectorPerformanceSummary[] {
  const groups = groupBySector(toCompanyPerformances(rows));
  const summaries: SectorPerformanceSummary[] = [];

  for (const [sector, members] of groups) {
    const performances = members.map((m) => m.performance);
    const avgPerformance = mean(performances);

    summaries.push({
      sector,
      companiesCount: members.length,
      avgPerformance,
      totalPerformance: performances.reduce((sum, value) => sum + value, 0),
      avgCurrentPrice: mean(members.map((m) => m.currentPrice)),
      trend: trendFor(avgPerformance),
    });
  }

  return summaries.sort((a, b) => b.avgPerformance - a.avgPerformance);
}

/**
 * Side-by-side view of the requested sectors, in request order.
 * Requested sectors with no computable company are left out.
 */
export function summarizeSectorComparison(
  rows: CompanyPriceRow[],
  requestedSectors: string[]
): SectorComparisonSummary[] {
  const groups = groupBySector(toCompanyPerformances(rows));
  const summaries: SectorComparisonSummary[] = [];

  for (const sector of requestedSectors) {
    const members = groups.get(sector);
    if (!members || members.length === 0) continue;

    const ranked = [...members].sort((a, b) => b.performance - a.performance);
    const best = ranked[0];
    const worst = ranked[ranked.length - 1];
    if (!best || !worst) continue;

    summaries.push({
      sector,
      companies: ranked,
      avgPerformance: mean(ranked.map((m) => m.performance)),
      bestPerformer: best,
      worstPerformer: worst,
    });
  }

  return summaries;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * One row per company that has a sector: the earliest price on or after
 * `windowStart`, the latest price and the latest volume.
 * Every value is a bound parameter.
 */
export function buildCompanyPriceQuery(windowStart: string, sectors?: string[]): SQL {
  const sectorFilter = sectors
    ? sql`AND ${companies.sector} IN (${sql.join(sectors.map((name) => sql`${name}`), sql`, `)})`
    : sql``;

  return sql`
    SELECT
      ${companies.symbol} AS symbol,
      ${companies.name} AS name,
      ${companies.sector} AS sector,
      start_point.price AS start_price,
      latest_point.price AS current_price,
      latest_point.volume AS volume
    FROM ${companies}
    LEFT JOIN LATERAL (
      SELECT ${historicalData.price} AS price
      FROM ${historicalData}
      WHERE ${historicalData.companyId} = ${companies.id}
        AND ${historicalData.tradeDate} >= ${windowStart}
      ORDER BY ${historicalData.tradeDate} ASC
      LIMIT 1
    ) start_point ON true
    LEFT JOIN LATERAL (
      SELECT ${historicalData.price} AS price, ${historicalData.volume} AS volume
      FROM ${historicalData}
      WHERE ${historicalData.companyId} = ${companies.id}
      ORDER BY ${historicalData.tradeDate} DESC
      LIMIT 1
    ) latest_point ON true
    WHERE ${companies.sector} IS NOT NULL
    ${sectorFilter}
    ORDER BY ${companies.sector} ASC, ${companies.symbol} ASC
  `;
}

async function fetchCompanyPrices(db: Database, query: SQL): Promise<CompanyPriceRow[]> {
  const result = await db.execute(query);
  const parsed = z.array(companyPriceRowSchema).safeParse(result.rows);

  if (!parsed.success) {
    throw new InternalError('Unexpected row shape returned by price query', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return parsed.data;
}

export async function getSectorPerformance(
  period: PerformancePeriod,
  now: Date = new Date()
): Promise<SectorPerformanceSummary[]> {
  const windowStart = resolvePeriodStart(period, now);

  const rows = await withConnection((db) =>
    fetchCompanyPrices(db, buildCompanyPriceQuery(windowStart))
  );

  return summarizeSectorPerformance(rows);
}

export async function compareSectors(
  sectors: string[],
  period: FixedPeriod,
  now: Date = new Date()
): Promise<SectorComparisonSummary[]> {
  if (sectors.length === 0) {
    return [];
  }

  const windowStart = resolvePeriodStart(period, now);

  const rows = await withConnection((db) =>
    fetchCompanyPrices(db, buildCompanyPriceQuery(windowStart, sectors))
  );

  return summarizeSectorComparison(rows, sectors);
}

/**
 * Distinct sectors with their company counts, alphabetically.
 */
export async function listSectors(): Promise<SectorListing[]> {
  const rows = await withConnection(async (db) =>
    db
      .select({
        sector: companies.sector,
        companiesCount: sql<number>`count(*)::int`,
      })
      .from(companies)
      .where(isNotNull(companies.sector))
      .groupBy(companies.sector)
      .orderBy(asc(companies.sector))
  );

  const listings: SectorListing[] = [];
  for (const row of rows) {
    if (row.sector !== null) {
      listings.push({ sector: row.sector, companiesCount: row.companiesCount });
    }
  }
  return listings;
}
