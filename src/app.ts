import express from 'express';
import cors from 'cors';
import { SignalStore } from './db';
import { createLogger } from './logger';
import { createCompanyRoutes } from './routes/companies';
import { createJobRoutes } from './routes/jobs';
import { CompanyScoreEngine } from './scorer/company-scorer';
import { ScanOrchestrator } from './scrapers/runner';

const log = createLogger('http');

export interface AppDeps {
  store: SignalStore;
  orchestrator: ScanOrchestrator;
  engine: CompanyScoreEngine;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    log.debug({ method: req.method, path: req.path }, 'Request');
    next();
  });

  // Routes
  app.use('/api', createJobRoutes(deps));
  app.use('/api', createCompanyRoutes(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'jobsignal' });
  });

  // Error handler; malformed JSON bodies land here too
  app.use(
    (err: Error & { status?: number }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err.status === 400) {
        res.status(400).json({ success: false, error: 'Malformed request body' });
        return;
      }
      log.error({ err }, 'Unhandled request error');
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  );

  return app;
}
