export const PLATFORMS = ['greenhouse', 'lever', 'ashby', 'custom'] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Adapter-agnostic shape every posting is normalized into before scoring and storage. */
export interface CanonicalJob {
  title: string;
  url: string | null;
  location: string | null;
  department: string | null;
  description: string | null;
  /** YYYY-MM-DD */
  datePosted: string | null;
}

/** What an adapter needs to know about a company to find its postings. */
export interface CompanyDescriptor {
  id: string;
  name: string;
  domain: string | null;
  careersUrl: string | null;
  careersPlatform: string | null;
  boardToken: string | null;
}

export interface SourceAdapter {
  readonly platform: Platform;
  fetchJobs(company: CompanyDescriptor): Promise<CanonicalJob[]>;
}

export interface AdapterOptions {
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const MAX_DESCRIPTION_LENGTH = 5000;
