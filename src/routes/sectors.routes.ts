import { Hono } from 'hono';
import { z } from 'zod';
import { validateQuery } from '../middleware/validator.js';
import { authMiddleware } from '../middleware/auth.js';
import {
  getSectorPerformance,
  compareSectors,
  listSectors,
} from '../services/sector.service.js';
import type { CompanyPerformance } from '../services/sector.service.js';
import { comparisonPeriodSchema, performancePeriodSchema } from '../services/period.js';
import { success } from '../utils/response.js';
import { round2 } from '../utils/round.js';
import type { AppEnv } from '../types/index.js';

const sectorRoutes = new Hono<AppEnv>();

// Apply auth middleware to all sector routes
sectorRoutes.use('*', authMiddleware);

// Map a company's window performance to its API shape
const toCompanyDto = (company: CompanyPerformance) => ({
  symbol: company.symbol,
  name: company.name,
  current_price: company.currentPrice,
  performance: round2(company.performance),
  volume: company.volume,
});

/**
 * Comma-separated sector names: trimmed, blanks dropped, duplicates removed
 * (first occurrence wins).
 */
export const sectorListSchema = z
  .string()
  .transform((raw) => [...new Set(raw.split(',').map((name) => name.trim()).filter(Boolean))])
  .pipe(z.array(z.string()).min(1, 'At least one sector name is required'));

// Zod schema for GET /sectors/performance query params
const performanceQuerySchema = z.object({
  period: performancePeriodSchema.default('1M'),
});

// Zod schema for GET /sectors/compare query params
const compareQuerySchema = z.object({
  sectors: sectorListSchema,
  period: comparisonPeriodSchema.default('1M'),
});

// GET /sectors - Distinct sectors with company counts
sectorRoutes.get('/', async (c) => {
  const sectors = await listSectors();

  return c.json(success({
    sectors: sectors.map((s) => ({
      sector: s.sector,
      companies_count: s.companiesCount,
    })),
  }, c.get('requestId')), 200);
});

// GET /sectors/performance - Aggregate performance per sector over a period
sectorRoutes.get('/performance', validateQuery(performanceQuerySchema), async (c) => {
  const { period } = c.get('query');

  const summaries = await getSectorPerformance(period);

  return c.json(success({
    period,
    sectors: summaries.map((s) => ({
      sector: s.sector,
      companies_count: s.companiesCount,
      avg_performance: round2(s.avgPerformance),
      total_performance: round2(s.totalPerformance),
      avg_current_price: round2(s.avgCurrentPrice),
      trend: s.trend,
    })),
  }, c.get('requestId')), 200);
});

// GET /sectors/compare - Compare named sectors company by company
sectorRoutes.get('/compare', validateQuery(compareQuerySchema), async (c) => {
  const { sectors, period } = c.get('query');

  const comparison = await compareSectors(sectors, period);

  return c.json(success({
    period,
    sectors_compared: sectors,
    comparison: comparison.map((s) => ({
      sector: s.sector,
      companies: s.companies.map(toCompanyDto),
      avg_performance: round2(s.avgPerformance),
      best_performer: toCompanyDto(s.bestPerformer),
      worst_performer: toCompanyDto(s.worstPerformer),
    })),
  }, c.get('requestId')), 200);
});

export { sectorRoutes };
