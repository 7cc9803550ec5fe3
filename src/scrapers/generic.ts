import { z } from 'zod';
import { createLogger } from '../logger';
import { decodeEntities, emptyToNull, isoDay, stripHtml, truncateDescription } from './html';
import { fetchText } from './http';
import { optionalString, parsePostings } from './parse';
import {
  AdapterOptions,
  CanonicalJob,
  CompanyDescriptor,
  DEFAULT_TIMEOUT_MS,
  Platform,
  SourceAdapter,
} from './types';

const log = createLogger('scrapers.generic');

const JSONLD_PATTERN = /<script[^>]*type\s*=\s*["']application\/ld\+json["'][^>]*>(.*?)<\/script>/gis;
const ANCHOR_PATTERN = /<a\b[^>]*?\bhref\s*=\s*["']([^"']+)["'][^>]*>(.*?)<\/a>/gis;
const JOB_PATH_PATTERN = /\/(jobs?|careers?|positions?|openings?|roles?)\/[a-zA-Z0-9\-_]+/i;

const MIN_TITLE_LENGTH = 3;
const MAX_TITLE_LENGTH = 200;

// Link texts that point at listing pages or actions rather than a posting
const NAVIGATION_LABELS = new Set([
  'apply',
  'apply now',
  'learn more',
  'view',
  'view all',
  'see all',
  'back',
  'home',
  'jobs',
  'careers',
  'open positions',
]);

const addressSchema = z.object({
  addressLocality: optionalString,
  addressRegion: optionalString,
});

const placeSchema = z.object({
  address: z.union([addressSchema, z.string()]).nullish(),
});

const jobPostingSchema = z.object({
  title: z.string(),
  url: optionalString,
  description: optionalString,
  datePosted: optionalString,
  jobLocation: z.union([placeSchema, z.array(placeSchema)]).nullish(),
  employmentUnit: z.object({ name: optionalString }).nullish(),
});

type JobPosting = z.infer<typeof jobPostingSchema>;
type Place = z.infer<typeof placeSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasType(node: Record<string, unknown>, type: string): boolean {
  const declared = node['@type'];
  return declared === type || (Array.isArray(declared) && declared.includes(type));
}

function resolveUrl(href: string | null, baseUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

/** Walks arrays, ItemLists, ListItems and @graph containers collecting JobPosting nodes. */
function collectJobPostings(node: unknown, out: unknown[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectJobPostings(child, out);
    return;
  }
  if (!isRecord(node)) return;

  if (hasType(node, 'JobPosting')) {
    out.push(node);
    return;
  }
  if (hasType(node, 'ItemList')) collectJobPostings(node.itemListElement, out);
  if ('item' in node) collectJobPostings(node.item, out);
  if ('@graph' in node) collectJobPostings(node['@graph'], out);
}

function placeToLocation(place: Place | undefined): string | null {
  const address = place?.address;
  if (!address) return null;
  if (typeof address === 'string') return emptyToNull(address);

  const parts = [address.addressLocality, address.addressRegion]
    .map(part => emptyToNull(part))
    .filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join(', ') : null;
}

function normalizeJobPosting(raw: JobPosting, baseUrl: string): CanonicalJob {
  const place = Array.isArray(raw.jobLocation) ? raw.jobLocation[0] : raw.jobLocation ?? undefined;
  const description = raw.description ? emptyToNull(stripHtml(decodeEntities(raw.description))) : null;

  return {
    title: decodeEntities(raw.title).trim(),
    url: resolveUrl(emptyToNull(raw.url), baseUrl),
    location: placeToLocation(place),
    department: emptyToNull(raw.employmentUnit?.name),
    description: truncateDescription(description),
    datePosted: isoDay(raw.datePosted),
  };
}

export function extractJsonLdJobs(html: string, baseUrl: string): CanonicalJob[] {
  const postings: unknown[] = [];

  for (const match of html.matchAll(JSONLD_PATTERN)) {
    let data: unknown;
    try {
      data = JSON.parse(match[1]);
    } catch {
      log.debug({ baseUrl }, 'Skipping malformed JSON-LD block');
      continue;
    }
    collectJobPostings(data, postings);
  }

  return parsePostings(postings, jobPostingSchema, raw => normalizeJobPosting(raw, baseUrl), log);
}

export function extractJobLinks(html: string, baseUrl: string): CanonicalJob[] {
  const jobs: CanonicalJob[] = [];
  const seenUrls = new Set<string>();

  for (const match of html.matchAll(ANCHOR_PATTERN)) {
    const href = match[1];
    if (!JOB_PATH_PATTERN.test(href)) continue;

    const url = resolveUrl(href, baseUrl);
    if (!url || seenUrls.has(url)) continue;
    seenUrls.add(url);

    const title = stripHtml(match[2]);
    if (title.length < MIN_TITLE_LENGTH || title.length > MAX_TITLE_LENGTH) continue;
    if (NAVIGATION_LABELS.has(title.toLowerCase())) continue;

    jobs.push({ title, url, location: null, department: null, description: null, datePosted: null });
  }

  return jobs;
}

/**
 * Best-effort adapter for career pages with no known API. Tries JSON-LD
 * JobPosting data first, then links that look like individual postings.
 * Pages rendered client-side usually yield nothing.
 */
export class GenericHeuristicAdapter implements SourceAdapter {
  readonly platform: Platform = 'custom';
  private readonly timeoutMs: number;

  constructor(options: AdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchJobs(company: CompanyDescriptor): Promise<CanonicalJob[]> {
    if (!company.careersUrl) {
      log.debug({ company: company.name }, 'No careers URL, nothing to scan');
      return [];
    }

    const html = await fetchText(company.careersUrl, this.timeoutMs);

    const structured = extractJsonLdJobs(html, company.careersUrl);
    if (structured.length > 0) {
      log.info({ company: company.name, count: structured.length }, 'Extracted JSON-LD postings');
      return structured;
    }

    const linked = extractJobLinks(html, company.careersUrl);
    log.info({ company: company.name, count: linked.length }, 'Extracted postings from job links');
    return linked;
  }
}
