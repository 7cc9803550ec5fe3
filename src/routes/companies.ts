import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SignalStore } from '../db';
import { Tier } from '../db/types';
import { createLogger } from '../logger';
import { CompanyScoreEngine } from '../scorer/company-scorer';
import { parseInput, sendError } from './respond';

const log = createLogger('api.companies');

const tierSchema = z.coerce
  .number()
  .int()
  .refine((value): value is Tier => value >= 1 && value <= 4, { message: 'tier must be 1-4' });

const companyQuerySchema = z.object({
  platform: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
  minScore: z.coerce.number().min(0).max(10).optional(),
  tier: tierSchema.optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const refreshBodySchema = z.object({
  companyId: z.string().min(1).optional(),
});

export interface CompanyRouteDeps {
  store: SignalStore;
  engine: CompanyScoreEngine;
}

export function createCompanyRoutes({ store, engine }: CompanyRouteDeps): Router {
  const router = Router();

  // GET /api/companies - ranked list
  router.get('/companies', (req: Request, res: Response) => {
    try {
      const filters = parseInput(companyQuerySchema, req.query, 'company filters');
      const companies = store.listCompanies(filters);
      res.json({ success: true, companies, count: companies.length });
    } catch (error) {
      sendError(res, log, error, 'Failed to list companies');
    }
  });

  // GET /api/companies/:id - company with score breakdown and evidence counts
  router.get('/companies/:id', (req: Request, res: Response) => {
    try {
      const company = store.requireCompany(req.params.id);
      const evidence = store.getEvidenceSignals(company.id);
      res.json({
        success: true,
        company,
        breakdown: store.getScoreBreakdown(company.id),
        evidence: {
          leadership: evidence.leadership.length,
          tools: evidence.tools.length,
          culture: evidence.culture.length,
          otherSignals: evidence.otherSignals.length,
        },
      });
    } catch (error) {
      sendError(res, log, error, 'Failed to get company');
    }
  });

  // POST /api/scores/refresh - one company, or all when no id is given
  router.post('/scores/refresh', (req: Request, res: Response) => {
    try {
      const { companyId } = parseInput(refreshBodySchema, req.body, 'refresh request');
      const breakdowns = companyId ? [engine.refresh(companyId)] : engine.refreshAll();
      res.json({ success: true, refreshed: breakdowns.length, breakdowns });
    } catch (error) {
      sendError(res, log, error, 'Failed to refresh scores');
    }
  });

  // GET /api/stats - store totals
  router.get('/stats', (_req: Request, res: Response) => {
    try {
      res.json({ success: true, ...store.getStats() });
    } catch (error) {
      sendError(res, log, error, 'Failed to get stats');
    }
  });

  return router;
}
