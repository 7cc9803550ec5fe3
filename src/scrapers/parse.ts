import { z } from 'zod';
import type { Logger } from 'pino';
import { CanonicalJob } from './types';

/**
 * Validates each raw posting on its own so one malformed entry costs only
 * that entry. Postings that fail the schema, throw while normalizing, or
 * normalize to an empty title are dropped and counted.
 */
export function parsePostings<T>(
  items: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  normalize: (posting: T) => CanonicalJob,
  log: Logger,
): CanonicalJob[] {
  const jobs: CanonicalJob[] = [];
  let skipped = 0;

  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    let job: CanonicalJob;
    try {
      job = normalize(parsed.data);
    } catch (error) {
      log.debug({ err: error }, 'Posting failed to normalize');
      skipped++;
      continue;
    }
    if (!job.title) {
      skipped++;
      continue;
    }
    jobs.push(job);
  }

  if (skipped > 0) {
    log.debug({ skipped, kept: jobs.length }, 'Skipped unparseable postings');
  }
  return jobs;
}

export const optionalString = z.string().nullish();
