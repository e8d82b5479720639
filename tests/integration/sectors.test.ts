import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { app } from '../../src/app.js';
import * as sectorService from '../../src/services/sector.service.js';
import type { CompanyPerformance } from '../../src/services/sector.service.js';
import {
  createTestUser,
  createTestToken,
  createExpiredTestToken,
  createAuthHeader,
} from '../helpers/auth.helper.js';
import { readError, readSuccess } from '../helpers/http.helper.js';

/**
 * Integration tests for sector endpoints.
 * The service layer is mocked; routing, auth, validation and response
 * shaping run for real.
 */

vi.mock('../../src/services/sector.service.js', async () => {
  const actual = await vi.importActual<typeof import('../../src/services/sector.service.js')>(
    '../../src/services/sector.service.js'
  );
  return {
    ...actual,
    getSectorPerformance: vi.fn(),
    compareSectors: vi.fn(),
    listSectors: vi.fn(),
  };
});

interface PerformanceData {
  period: string;
  sectors: {
    sector: string;
    companies_count: number;
    avg_performance: number;
    total_performance: number;
    avg_current_price: number;
    trend: string;
  }[];
}

interface CompanyDto {
  symbol: string;
  name: string;
  current_price: number;
  performance: number;
  volume: number | null;
}

interface ComparisonData {
  period: string;
  sectors_compared: string[];
  comparison: {
    sector: string;
    companies: CompanyDto[];
    avg_performance: number;
    best_performer: CompanyDto;
    worst_performer: CompanyDto;
  }[];
}

function company(overrides: Partial<CompanyPerformance> & Pick<CompanyPerformance, 'symbol'>): CompanyPerformance {
  return {
    name: `${overrides.symbol} Ltd`,
    sector: 'Banking',
    currentPrice: 100,
    volume: 1000,
    performance: 0,
    ...overrides,
  };
}

describe('Sector Endpoints Integration Tests', () => {
  let authHeader: string;

  beforeEach(() => {
    vi.clearAllMocks();
    authHeader = createAuthHeader(createTestToken(createTestUser({ email: 'analyst@example.com' })));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Authentication', () => {
    it('should return 401 without an Authorization header', async () => {
      const res = await app.request('/v1/sectors/performance');

      expect(res.status).toBe(401);
      const body = await readError(res);
      expect(body.error.code).toBe('AUTH_REQUIRED');
      expect(sectorService.getSectorPerformance).not.toHaveBeenCalled();
    });

    it('should return 401 for a non-Bearer scheme', async () => {
      const res = await app.request('/v1/sectors/performance', {
        headers: { Authorization: 'Basic dGVzdDp0ZXN0' },
      });

      expect(res.status).toBe(401);
      const body = await readError(res);
      expect(body.error.message).toBe('Authorization header must use Bearer scheme');
    });

    it('should return AUTH_EXPIRED for an expired token', async () => {
      const token = createExpiredTestToken(createTestUser());
      const res = await app.request('/v1/sectors/performance', {
        headers: { Authorization: createAuthHeader(token) },
      });

      expect(res.status).toBe(401);
      const body = await readError(res);
      expect(body.error.code).toBe('AUTH_EXPIRED');
    });

    it('should return 401 for a malformed token', async () => {
      const res = await app.request('/v1/sectors/performance', {
        headers: { Authorization: 'Bearer not-a-real-token' },
      });

      expect(res.status).toBe(401);
      const body = await readError(res);
      expect(body.error.message).toBe('Invalid access token');
    });
  });

  describe('GET /v1/sectors/performance', () => {
    it('should default to 1M and shape the sector rows', async () => {
      vi.mocked(sectorService.getSectorPerformance).mockResolvedValue([
        {
          sector: 'Telecom',
          companiesCount: 2,
          avgPerformance: 12.3456,
          totalPerformance: 24.6912,
          avgCurrentPrice: 1502.5,
          trend: 'positive',
        },
        {
          sector: 'Banking',
          companiesCount: 3,
          avgPerformance: -1.5,
          totalPerformance: -4.5,
          avgCurrentPrice: 7250,
          trend: 'negative',
        },
      ]);

      const res = await app.request('/v1/sectors/performance', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(200);
      expect(sectorService.getSectorPerformance).toHaveBeenCalledWith('1M');

      const body = await readSuccess<PerformanceData>(res);
      expect(body.success).toBe(true);
      expect(body.data).toEqual({
        period: '1M',
        sectors: [
          {
            sector: 'Telecom',
            companies_count: 2,
            avg_performance: 12.35,
            total_performance: 24.69,
            avg_current_price: 1502.5,
            trend: 'positive',
          },
          {
            sector: 'Banking',
            companies_count: 3,
            avg_performance: -1.5,
            total_performance: -4.5,
            avg_current_price: 7250,
            trend: 'negative',
          },
        ],
      });
    });

    it('should accept YTD', async () => {
      vi.mocked(sectorService.getSectorPerformance).mockResolvedValue([]);

      const res = await app.request('/v1/sectors/performance?period=YTD', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(200);
      expect(sectorService.getSectorPerformance).toHaveBeenCalledWith('YTD');
      const body = await readSuccess<PerformanceData>(res);
      expect(body.data).toEqual({ period: 'YTD', sectors: [] });
    });

    it('should reject an unknown period before calling the service', async () => {
      const res = await app.request('/v1/sectors/performance?period=2Y', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(422);
      const body = await readError(res);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(sectorService.getSectorPerformance).not.toHaveBeenCalled();
    });

    it('should return 500 when the database fails', async () => {
      vi.mocked(sectorService.getSectorPerformance).mockRejectedValue(new Error('connection refused'));

      const res = await app.request('/v1/sectors/performance?period=1D', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(500);
      const body = await readError(res);
      expect(body.error.code).toBe('INTERNAL_ERROR');
      expect(body.error.message).toBe('An unexpected error occurred');
    });
  });

  describe('GET /v1/sectors/compare', () => {
    it('should clean the sector list and pass the period through', async () => {
      vi.mocked(sectorService.compareSectors).mockResolvedValue([]);

      const sectors = encodeURIComponent('Banking, Telecom,,Banking');
      const res = await app.request(`/v1/sectors/compare?sectors=${sectors}&period=1W`, {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(200);
      expect(sectorService.compareSectors).toHaveBeenCalledWith(['Banking', 'Telecom'], '1W');

      const body = await readSuccess<ComparisonData>(res);
      expect(body.data).toEqual({
        period: '1W',
        sectors_compared: ['Banking', 'Telecom'],
        comparison: [],
      });
    });

    it('should shape each sector with its best and worst performer', async () => {
      const best = company({ symbol: 'BNK1', name: 'Bank One', currentPrice: 110, performance: 10 });
      const middle = company({ symbol: 'BNK4', currentPrice: 103, performance: 3, volume: null });
      const worst = company({ symbol: 'BNK2', name: 'Bank Two', currentPrice: 190, performance: -5, volume: 900 });

      vi.mocked(sectorService.compareSectors).mockResolvedValue([
        {
          sector: 'Banking',
          companies: [best, middle, worst],
          avgPerformance: 8 / 3,
          bestPerformer: best,
          worstPerformer: worst,
        },
      ]);

      const res = await app.request('/v1/sectors/compare?sectors=Banking,Unknown', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(200);
      const body = await readSuccess<ComparisonData>(res);

      expect(body.data.period).toBe('1M');
      expect(body.data.sectors_compared).toEqual(['Banking', 'Unknown']);
      expect(body.data.comparison).toEqual([
        {
          sector: 'Banking',
          companies: [
            { symbol: 'BNK1', name: 'Bank One', current_price: 110, performance: 10, volume: 1000 },
            { symbol: 'BNK4', name: 'BNK4 Ltd', current_price: 103, performance: 3, volume: null },
            { symbol: 'BNK2', name: 'Bank Two', current_price: 190, performance: -5, volume: 900 },
          ],
          avg_performance: 2.67,
          best_performer: { symbol: 'BNK1', name: 'Bank One', current_price: 110, performance: 10, volume: 1000 },
          worst_performer: { symbol: 'BNK2', name: 'Bank Two', current_price: 190, performance: -5, volume: 900 },
        },
      ]);
    });

    it('should reject YTD for comparisons', async () => {
      const res = await app.request('/v1/sectors/compare?sectors=Banking&period=YTD', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(422);
      expect(sectorService.compareSectors).not.toHaveBeenCalled();
    });

    it('should require at least one sector name', async () => {
      const missing = await app.request('/v1/sectors/compare', {
        headers: { Authorization: authHeader },
      });
      const blank = await app.request(`/v1/sectors/compare?sectors=${encodeURIComponent(' , ')}`, {
        headers: { Authorization: authHeader },
      });

      expect(missing.status).toBe(422);
      expect(blank.status).toBe(422);
      expect(sectorService.compareSectors).not.toHaveBeenCalled();
    });
  });

  describe('GET /v1/sectors', () => {
    it('should list sectors with company counts', async () => {
      vi.mocked(sectorService.listSectors).mockResolvedValue([
        { sector: 'Banking', companiesCount: 4 },
        { sector: 'Telecom', companiesCount: 1 },
      ]);

      const res = await app.request('/v1/sectors', {
        headers: { Authorization: authHeader },
      });

      expect(res.status).toBe(200);
      const body = await readSuccess<{ sectors: { sector: string; companies_count: number }[] }>(res);
      expect(body.data.sectors).toEqual([
        { sector: 'Banking', companies_count: 4 },
        { sector: 'Telecom', companies_count: 1 },
      ]);
    });
  });

  describe('Unknown routes', () => {
    it('should return NOT_FOUND', async () => {
      const res = await app.request('/v1/industries');

      expect(res.status).toBe(404);
      const body = await readError(res);
      expect(body.error.code).toBe('NOT_FOUND');
    });
  });
});
