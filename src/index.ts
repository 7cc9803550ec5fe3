export { createApp } from './app';
export type { AppDeps } from './app';
export { loadConfig, loadLoggingConfig } from './config';
export type { AppConfig, LoggingConfig, LogLevel } from './config';
export * from './errors';
export { createLogger } from './logger';
export { SignalStore, getStore, jobIdentityKey } from './db';
export type { ScanRunResult, SignalStoreOptions } from './db';
export * from './db/types';
export { importCompanies, importCompaniesFromFile, companyImportSchema } from './db/import';
export type { CompanyImport, ImportSummary } from './db/import';
export {
  CompanyScoreEngine,
  DEFAULT_COMPANY_SCORING,
  compositeScore,
  computeSubScores,
  cultureScore,
  evidenceDepthScore,
  leadershipScore,
  recencyScore,
  toolAdoptionScore,
} from './scorer/company-scorer';
export type { CompanyScoringConfig, CompanyScoringWeights, RecencyBucket } from './scorer/company-scorer';
export { JobRelevanceScorer } from './scorer/job-scorer';
export type { JobRelevance } from './scorer/job-scorer';
export {
  DEFAULT_JOB_PROFILE,
  jobScoringProfileSchema,
  loadJobScoringProfile,
  mergeJobScoringProfile,
  parseJobScoringProfile,
} from './scorer/profile';
export type { JobScoringProfile, JobScoringWeights } from './scorer/profile';
export { AdapterRegistry, createDefaultRegistry } from './scrapers/registry';
export { GreenhouseAdapter } from './scrapers/greenhouse';
export { LeverAdapter } from './scrapers/lever';
export { AshbyAdapter } from './scrapers/ashby';
export { GenericHeuristicAdapter } from './scrapers/generic';
export { ScanOrchestrator } from './scrapers/runner';
export type { ScanErrorKind, ScanFilters, ScanResult } from './scrapers/runner';
export * from './scrapers/types';
