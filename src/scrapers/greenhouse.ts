import { z } from 'zod';
import { AdapterConfigError } from '../errors';
import { createLogger } from '../logger';
import { decodeEntities, emptyToNull, isoDay, stripHtml, truncateDescription } from './html';
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

const API_BASE = 'https://boards-api.greenhouse.io/v1/boards';

const log = createLogger('scrapers.greenhouse');

const greenhouseJobSchema = z.object({
  id: z.number().optional(),
  title: z.string(),
  absolute_url: optionalString,
  updated_at: optionalString,
  location: z.object({ name: optionalString }).nullish(),
  departments: z.array(z.object({ name: optionalString })).nullish(),
  // HTML, itself entity-escaped
  content: optionalString,
});

type GreenhouseJob = z.infer<typeof greenhouseJobSchema>;

const greenhouseResponseSchema = z.object({
  jobs: z.array(z.unknown()).default([]),
});

export function normalizeGreenhouseJob(raw: GreenhouseJob): CanonicalJob {
  const description = raw.content ? emptyToNull(stripHtml(decodeEntities(raw.content))) : null;

  return {
    title: raw.title.trim(),
    url: emptyToNull(raw.absolute_url),
    location: emptyToNull(raw.location?.name),
    department: emptyToNull(raw.departments?.[0]?.name),
    description: truncateDescription(description),
    datePosted: isoDay(raw.updated_at),
  };
}

export class GreenhouseAdapter implements SourceAdapter {
  readonly platform: Platform = 'greenhouse';
  private readonly timeoutMs: number;

  constructor(options: AdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchJobs(company: CompanyDescriptor): Promise<CanonicalJob[]> {
    const token = resolveBoardToken(company);
    if (!token) {
      throw new AdapterConfigError(`No Greenhouse board token for domain: ${company.domain ?? '(none)'}`);
    }

    const url = `${API_BASE}/${encodeURIComponent(token)}/jobs?content=true`;
    const body = greenhouseResponseSchema.safeParse(await fetchJson(url, this.timeoutMs));
    if (!body.success) {
      log.warn({ company: company.name, token }, 'Unexpected Greenhouse response shape');
      return [];
    }

    const jobs = parsePostings(body.data.jobs, greenhouseJobSchema, normalizeGreenhouseJob, log);
    log.info({ company: company.name, token, count: jobs.length }, 'Fetched Greenhouse postings');
    return jobs;
  }
}
