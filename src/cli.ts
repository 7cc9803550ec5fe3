#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { parseArgs } from 'util';
import { loadConfig } from './config';
import { getStore, SignalStore } from './db';
import { importCompaniesFromFile } from './db/import';
import { JOB_STATUSES, JobStatus, Tier } from './db/types';
import { errorMessage, NotFoundError, ValidationError } from './errors';
import { CompanyScoreEngine } from './scorer/company-scorer';
import { JobRelevanceScorer } from './scorer/job-scorer';
import { loadJobScoringProfile } from './scorer/profile';
import { createDefaultRegistry } from './scrapers/registry';
import { ScanOrchestrator } from './scrapers/runner';

const USAGE = `
Usage:
  jobsignal scan [--platform p] [--company name] [--min-score n]
                                       Scan job sources and sync listings
  jobsignal scores refresh [--company name]
                                       Recompute company scores
  jobsignal companies [--tier n] [--min-score n]
                                       List companies by score
  jobsignal companies import <file>    Import companies and evidence from JSON
  jobsignal jobs [--company name] [--status s] [--min-relevance n] [--new] [--limit n]
                                       List job listings
  jobsignal job show|apply|ignore <id> Show or update one listing
  jobsignal runs [--limit n]           Recent scan runs
  jobsignal stats                      Store totals
`;

const DAY_MS = 24 * 60 * 60 * 1000;

function parseCommandLine(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      platform: { type: 'string' },
      company: { type: 'string' },
      'min-score': { type: 'string' },
      'min-relevance': { type: 'string' },
      tier: { type: 'string' },
      status: { type: 'string' },
      limit: { type: 'string' },
      new: { type: 'boolean' },
    },
  });
  const [command, sub, arg] = positionals;
  return { flags: values, command, sub, arg };
}

function numberFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new ValidationError(`--${name} must be a number`, [value]);
  return parsed;
}

function tierFlag(value: string | undefined): Tier | undefined {
  const tier = numberFlag('tier', value);
  if (tier === undefined) return undefined;
  if (tier === 1 || tier === 2 || tier === 3 || tier === 4) return tier;
  throw new ValidationError('--tier must be 1-4', [String(value)]);
}

function statusFlag(value: string | undefined): JobStatus | undefined {
  if (value === undefined) return undefined;
  const status = JOB_STATUSES.find(s => s === value);
  if (!status) throw new ValidationError(`--status must be one of ${JOB_STATUSES.join(', ')}`, [value]);
  return status;
}

function requireCompanyByName(store: SignalStore, name: string) {
  const company = store.findCompanyByName(name);
  if (!company) throw new NotFoundError('Company', name);
  return company;
}

function buildOrchestrator(store: SignalStore): ScanOrchestrator {
  const config = loadConfig();
  return new ScanOrchestrator({
    store,
    registry: createDefaultRegistry({ timeoutMs: config.fetchTimeoutMs }),
    scorer: new JobRelevanceScorer(loadJobScoringProfile(config.jobProfilePath)),
  });
}

async function main() {
  const { flags, command, sub, arg } = parseCommandLine(process.argv.slice(2));

  switch (command) {
    case 'scan': {
      const store = getStore();
      const results = await buildOrchestrator(store).scanAll({
        platform: flags.platform,
        company: flags.company,
        minScore: numberFlag('min-score', flags['min-score']),
      });

      for (const r of results) {
        const outcome = r.error ? `error: ${r.error}` : 'ok';
        console.log(
          `  ${r.companyName} (${r.platform}): ${r.jobsFound} found, ${r.newJobs} new, ${r.staleJobs} stale - ${outcome}`
        );
      }
      const found = results.reduce((sum, r) => sum + r.jobsFound, 0);
      const fresh = results.reduce((sum, r) => sum + r.newJobs, 0);
      const errors = results.filter(r => r.error).length;
      console.log(`\nTotal: ${found} jobs found, ${fresh} new, ${errors} errors`);
      break;
    }

    case 'scores': {
      if (sub !== 'refresh') {
        console.log(USAGE);
        break;
      }
      const store = getStore();
      const engine = new CompanyScoreEngine(store);
      if (flags.company) {
        const company = requireCompanyByName(store, flags.company);
        const breakdown = engine.refresh(company.id);
        console.log(`${company.name}: ${breakdown.composite.toFixed(2)}`);
        console.log(JSON.stringify(breakdown, null, 2));
      } else {
        const breakdowns = engine.refreshAll();
        console.log(`Refreshed ${breakdowns.length} companies.`);
      }
      break;
    }

    case 'companies': {
      const store = getStore();
      if (sub === 'import') {
        if (!arg) throw new ValidationError('companies import needs a file path');
        const summary = importCompaniesFromFile(store, arg);
        console.log(
          `Imported ${summary.companies} companies (${summary.leadershipSignals} leadership, ` +
            `${summary.toolAdoptions} tools, ${summary.aiSignals} signals).`
        );
        if (summary.skipped.length > 0) console.log(`Skipped existing: ${summary.skipped.join(', ')}`);
        break;
      }

      const companies = store.listCompanies({
        tier: tierFlag(flags.tier),
        minScore: numberFlag('min-score', flags['min-score']),
      });
      for (const c of companies) {
        console.log(`  ${c.compositeScore.toFixed(2).padStart(5)}  T${c.tier}  ${c.name}  [${c.careersPlatform ?? '-'}]`);
      }
      console.log(`\n${companies.length} companies`);
      break;
    }

    case 'jobs': {
      const store = getStore();
      const company = flags.company ? requireCompanyByName(store, flags.company) : null;
      const jobs = store.getJobs({
        companyId: company?.id,
        status: statusFlag(flags.status),
        minRelevance: numberFlag('min-relevance', flags['min-relevance']),
        since: flags.new ? new Date(Date.now() - DAY_MS).toISOString() : undefined,
        limit: numberFlag('limit', flags.limit),
      });
      for (const j of jobs) {
        console.log(`  ${j.relevanceScore.toFixed(1).padStart(4)}  ${j.companyName}: ${j.title}  (${j.status})  ${j.id}`);
      }
      console.log(`\n${jobs.length} jobs`);
      break;
    }

    case 'job': {
      if (!arg || !['show', 'apply', 'ignore'].includes(sub ?? '')) {
        console.log(USAGE);
        break;
      }
      const store = getStore();
      if (sub === 'apply' || sub === 'ignore') {
        const status: JobStatus = sub === 'apply' ? 'applied' : 'ignored';
        if (!store.updateJobStatus(arg, status)) throw new NotFoundError('Job', arg);
        console.log(`Job ${arg} marked ${status}.`);
        break;
      }
      const job = store.getJobById(arg);
      if (!job) throw new NotFoundError('Job', arg);
      console.log(JSON.stringify(job, null, 2));
      break;
    }

    case 'runs': {
      const runs = getStore().getScanRuns(numberFlag('limit', flags.limit));
      for (const r of runs) {
        const detail = r.error ? ` (${r.error})` : '';
        console.log(`  ${r.startedAt}  ${r.companyName} [${r.platform}] ${r.status}: ${r.jobsFound} found, ${r.jobsNew} new, ${r.jobsStale} stale${detail}`);
      }
      break;
    }

    case 'stats': {
      const stats = getStore().getStats();
      console.log('\nStats:', JSON.stringify(stats, null, 2));
      break;
    }

    default:
      console.log(USAGE);
  }
}

main().catch(err => {
  console.error('Error:', errorMessage(err));
  process.exit(1);
});
