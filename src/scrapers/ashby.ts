import { z } from 'zod';
import { AdapterConfigError } from '../errors';
import { createLogger } from '../logger';
import { emptyToNull, isoDay, truncateDescription } from './html';
import { fetchJson } from './http';
import { optionalString, parsePostings } from './parse';
import { resolveBoardToken } from './tokens';
import {
  AdapterOptions,
  CanonicalJob,
  CompanyDescriptor,
  DEFAULT_TIMEOUT_MS,
  Platform,
  SourceAdapter,
} from './types';

const API_BASE = 'https://api.ashbyhq.com/posting-api/job-board';
const BOARD_BASE = 'https://jobs.ashbyhq.com';

const log = createLogger('scrapers.ashby');

const ashbyJobSchema = z.object({
  id: optionalString,
  title: z.string(),
  jobUrl: optionalString,
  publishedAt: optionalString,
  department: optionalString,
  team: optionalString,
  location: optionalString,
  descriptionPlain: optionalString,
});

type AshbyJob = z.infer<typeof ashbyJobSchema>;

const ashbyResponseSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
});

export function normalizeAshbyJob(raw: AshbyJob, slug: string): CanonicalJob {
  let url = emptyToNull(raw.jobUrl);
  if (!url && raw.id) {
    url = `${BOARD_BASE}/${slug}/${raw.id}`;
  }

  return {
    title: raw.title.trim(),
    url,
    location: emptyToNull(raw.location),
    department: emptyToNull(raw.department),
    description: truncateDescription(emptyToNull(raw.descriptionPlain)),
    datePosted: isoDay(raw.publishedAt),
  };
}

export class AshbyAdapter implements SourceAdapter {
  readonly platform: Platform = 'ashby';
  private readonly timeoutMs: number;

  constructor(options: AdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchJobs(company: CompanyDescriptor): Promise<CanonicalJob[]> {
    const slug = resolveBoardToken(company);
    if (!slug) {
      throw new AdapterConfigError(`No Ashby board slug for company: ${company.name}`);
    }

    const url = `${API_BASE}/${encodeURIComponent(slug)}`;
    const body = ashbyResponseSchema.safeParse(await fetchJson(url, this.timeoutMs));
    if (!body.success) {
      log.warn({ company: company.name, slug }, 'Unexpected Ashby response shape');
      return [];
    }

    const jobs = parsePostings(body.data.jobs, ashbyJobSchema, raw => normalizeAshbyJob(raw, slug), log);
    log.info({ company: company.name, slug, count: jobs.length }, 'Fetched Ashby postings');
    return jobs;
  }
}
