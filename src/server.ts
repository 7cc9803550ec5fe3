import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { getStore } from './db';
import { createLogger } from './logger';
import { CompanyScoreEngine } from './scorer/company-scorer';
import { JobRelevanceScorer } from './scorer/job-scorer';
import { loadJobScoringProfile } from './scorer/profile';
import { createDefaultRegistry } from './scrapers/registry';
import { ScanOrchestrator } from './scrapers/runner';

const log = createLogger('server');

const config = loadConfig();
const store = getStore();

const app = createApp({
  store,
  orchestrator: new ScanOrchestrator({
    store,
    registry: createDefaultRegistry({ timeoutMs: config.fetchTimeoutMs }),
    scorer: new JobRelevanceScorer(loadJobScoringProfile(config.jobProfilePath)),
  }),
  engine: new CompanyScoreEngine(store),
});

app.listen(config.port, () => {
  log.info({ port: config.port, database: config.databasePath }, `Server running on http://localhost:${config.port}`);
});
