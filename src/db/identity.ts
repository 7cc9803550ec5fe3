import { createHash } from 'crypto';
import { CanonicalJob } from '../scrapers/types';

/**
 * Stable identity of a posting within a company (stored beside the title).
 * Postings with a URL are identified by it; URL-less postings fall back to a
 * hash of title, location and department so that two same-titled openings
 * in different places stay distinct.
 */
export function jobIdentityKey(job: Pick<CanonicalJob, 'title' | 'url' | 'location' | 'department'>): string {
  if (job.url) return job.url;

  const content = [job.title, job.location ?? '', job.department ?? '']
    .map(part => part.trim().toLowerCase())
    .join('|');
  return `sha256:${createHash('sha256').update(content).digest('hex')}`;
}
