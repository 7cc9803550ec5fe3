import { z } from 'zod';
import { AdapterConfigError } from '../errors';
import { createLogger } from '../logger';
import { emptyToNull, truncateDescription } from './html';
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

const API_BASE = 'https://api.lever.co/v0/postings';

const log = createLogger('scrapers.lever');

const leverPostingSchema = z.object({
  id: optionalString,
  text: z.string(),
  hostedUrl: optionalString,
  applyUrl: optionalString,
  createdAt: z.number().nullish(), // epoch ms
  descriptionPlain: optionalString,
  categories: z
    .object({
      location: optionalString,
      department: optionalString,
      team: optionalString,
      commitment: optionalString,
    })
    .nullish(),
});

type LeverPosting = z.infer<typeof leverPostingSchema>;

function epochDay(ms: number | null | undefined): string | null {
  if (ms == null) return null;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
}

export function normalizeLeverPosting(raw: LeverPosting): CanonicalJob {
  const categories = raw.categories;
  return {
    title: raw.text.trim(),
    url: emptyToNull(raw.hostedUrl) ?? emptyToNull(raw.applyUrl),
    location: emptyToNull(categories?.location),
    department: emptyToNull(categories?.department) ?? emptyToNull(categories?.team),
    description: truncateDescription(emptyToNull(raw.descriptionPlain)),
    datePosted: epochDay(raw.createdAt),
  };
}

export class LeverAdapter implements SourceAdapter {
  readonly platform: Platform = 'lever';
  private readonly timeoutMs: number;

  constructor(options: AdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchJobs(company: CompanyDescriptor): Promise<CanonicalJob[]> {
    const slug = resolveBoardToken(company);
    if (!slug) {
      throw new AdapterConfigError(`No Lever slug for company: ${company.name}`);
    }

    const url = `${API_BASE}/${encodeURIComponent(slug)}?mode=json`;
    const body = await fetchJson(url, this.timeoutMs);
    if (!Array.isArray(body)) {
      log.warn({ company: company.name, slug }, 'Unexpected Lever response shape');
      return [];
    }

    const jobs = parsePostings(body, leverPostingSchema, normalizeLeverPosting, log);
    log.info({ company: company.name, slug, count: jobs.length }, 'Fetched Lever postings');
    return jobs;
  }
}
