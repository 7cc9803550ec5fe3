import { SignalStore } from '../db';
import { Company } from '../db/types';
import {
  AdapterConfigError,
  AdapterUnavailableError,
  errorMessage,
  FetchFailureError,
} from '../errors';
import { createLogger } from '../logger';
import { JobRelevanceScorer } from '../scorer/job-scorer';
import { AdapterRegistry } from './registry';
import { CanonicalJob, CompanyDescriptor } from './types';

const log = createLogger('scanner');

export type ScanErrorKind = 'adapter_unavailable' | 'adapter_config' | 'fetch_failure' | 'adapter_error';

export interface ScanResult {
  companyId: string;
  companyName: string;
  platform: string;
  jobsFound: number;
  newJobs: number;
  updatedJobs: number;
  staleJobs: number;
  error: string | null;
  errorKind: ScanErrorKind | null;
}

export interface ScanFilters {
  platform?: string;
  /** Partial company name */
  company?: string;
  minScore?: number;
}

export interface ScanOrchestratorDeps {
  store: SignalStore;
  registry: AdapterRegistry;
  scorer: JobRelevanceScorer;
}

function classifyError(error: unknown): ScanErrorKind {
  if (error instanceof AdapterUnavailableError) return 'adapter_unavailable';
  if (error instanceof AdapterConfigError) return 'adapter_config';
  if (error instanceof FetchFailureError) return 'fetch_failure';
  return 'adapter_error';
}

function toDescriptor(company: Company): CompanyDescriptor {
  return {
    id: company.id,
    name: company.name,
    domain: company.domain,
    careersUrl: company.careersUrl,
    careersPlatform: company.careersPlatform,
    boardToken: company.boardToken,
  };
}

/**
 * Syncs stored job listings with each company's job source: fetch, score,
 * upsert, then close whatever the source no longer lists. Companies are
 * scanned one after another; a source failure only affects its own company,
 * while store errors propagate.
 */
export class ScanOrchestrator {
  private readonly store: SignalStore;
  private readonly registry: AdapterRegistry;
  private readonly scorer: JobRelevanceScorer;

  constructor(deps: ScanOrchestratorDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.scorer = deps.scorer;
  }

  async scanCompany(company: Company): Promise<ScanResult> {
    const platform = company.careersPlatform?.toLowerCase() || 'unknown';
    const result: ScanResult = {
      companyId: company.id,
      companyName: company.name,
      platform,
      jobsFound: 0,
      newJobs: 0,
      updatedJobs: 0,
      staleJobs: 0,
      error: null,
      errorKind: null,
    };

    const runId = this.store.startScanRun(company.id, platform);

    let jobs: CanonicalJob[];
    try {
      const adapter = this.registry.resolve(company.careersPlatform);
      if (!adapter) throw new AdapterUnavailableError(company.careersPlatform);
      log.info({ company: company.name, platform }, 'Scanning company');
      jobs = await adapter.fetchJobs(toDescriptor(company));
    } catch (error) {
      result.error = errorMessage(error);
      result.errorKind = classifyError(error);
      const status = result.errorKind === 'adapter_unavailable' ? 'skipped' : 'failed';
      this.store.completeScanRun(runId, { status, jobsFound: 0, jobsNew: 0, jobsStale: 0, error: result.error });
      log.warn({ company: company.name, platform, kind: result.errorKind, err: error }, 'Company scan aborted');
      return result;
    }

    result.jobsFound = jobs.length;

    try {
      this.store.transaction(() => {
        const observed = new Set<string>();
        for (const job of jobs) {
          const relevance = this.scorer.score(job);
          const upsert = this.store.upsertJob(company.id, job, relevance.score, relevance.reasons);
          if (upsert.isNew) result.newJobs++;
          else result.updatedJobs++;
          observed.add(upsert.id);
        }
        result.staleJobs = this.store.markStale(company.id, observed);
      });
    } catch (error) {
      this.store.completeScanRun(runId, {
        status: 'failed',
        jobsFound: result.jobsFound,
        jobsNew: 0,
        jobsStale: 0,
        error: errorMessage(error),
      });
      throw error;
    }

    this.store.completeScanRun(runId, {
      status: 'completed',
      jobsFound: result.jobsFound,
      jobsNew: result.newJobs,
      jobsStale: result.staleJobs,
    });
    log.info(
      { company: company.name, found: result.jobsFound, new: result.newJobs, stale: result.staleJobs },
      'Company scan complete',
    );
    return result;
  }

  /** One result per selected company, in descending score order, even when every company fails. */
  async scanAll(filters: ScanFilters = {}): Promise<ScanResult[]> {
    const companies = this.store.listCompanies({
      platform: filters.platform,
      name: filters.company,
      minScore: filters.minScore,
    });

    const results: ScanResult[] = [];
    for (const company of companies) {
      results.push(await this.scanCompany(company));
    }

    const failed = results.filter(r => r.error !== null).length;
    log.info({ companies: results.length, failed }, 'Scan finished');
    return results;
  }
}
