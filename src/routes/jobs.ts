import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SignalStore } from '../db';
import { JOB_STATUSES } from '../db/types';
import { NotFoundError } from '../errors';
import { createLogger } from '../logger';
import { ScanOrchestrator } from '../scrapers/runner';
import { parseInput, sendError } from './respond';

const log = createLogger('api.jobs');

const jobQuerySchema = z.object({
  companyId: z.string().min(1).optional(),
  status: z.enum(JOB_STATUSES).optional(),
  minRelevance: z.coerce.number().min(0).max(10).optional(),
  since: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

// `closed` is set by scans only
const statusBodySchema = z.object({
  status: z.enum(['active', 'applied', 'ignored']),
});

const scanBodySchema = z.object({
  platform: z.string().min(1).optional(),
  company: z.string().min(1).optional(),
  minScore: z.coerce.number().min(0).max(10).optional(),
});

export interface JobRouteDeps {
  store: SignalStore;
  orchestrator: ScanOrchestrator;
}

export function createJobRoutes({ store, orchestrator }: JobRouteDeps): Router {
  const router = Router();

  // GET /api/jobs - list with filters
  router.get('/jobs', (req: Request, res: Response) => {
    try {
      const filters = parseInput(jobQuerySchema, req.query, 'job filters');
      const jobs = store.getJobs(filters);
      res.json({ success: true, jobs, count: jobs.length });
    } catch (error) {
      sendError(res, log, error, 'Failed to list jobs');
    }
  });

  // GET /api/jobs/:id - single listing
  router.get('/jobs/:id', (req: Request, res: Response) => {
    try {
      const job = store.getJobById(req.params.id);
      if (!job) throw new NotFoundError('Job', req.params.id);
      res.json({ success: true, job });
    } catch (error) {
      sendError(res, log, error, 'Failed to get job');
    }
  });

  // POST /api/jobs/:id/status - mark applied / ignored / active
  router.post('/jobs/:id/status', (req: Request, res: Response) => {
    try {
      const { status } = parseInput(statusBodySchema, req.body, 'status update');
      if (!store.updateJobStatus(req.params.id, status)) {
        throw new NotFoundError('Job', req.params.id);
      }
      res.json({ success: true, job: store.getJobById(req.params.id) });
    } catch (error) {
      sendError(res, log, error, 'Failed to update job status');
    }
  });

  // POST /api/scan - scan companies, one result per company
  router.post('/scan', async (req: Request, res: Response) => {
    try {
      const filters = parseInput(scanBodySchema, req.body, 'scan filters');
      log.info({ filters }, 'Scan requested');
      const results = await orchestrator.scanAll(filters);
      res.json({ success: true, results });
    } catch (error) {
      sendError(res, log, error, 'Scan failed');
    }
  });

  // GET /api/scan-runs - recent scan history
  router.get('/scan-runs', (req: Request, res: Response) => {
    try {
      const { limit } = parseInput(z.object({ limit: z.coerce.number().int().positive().optional() }), req.query, 'query');
      res.json({ success: true, runs: store.getScanRuns(limit) });
    } catch (error) {
      sendError(res, log, error, 'Failed to get scan runs');
    }
  });

  return router;
}
