import fs from 'fs';
import { z } from 'zod';
import { ValidationError } from '../errors';
import defaultProfileJson from './job-profile.json';

const WEIGHT_TOLERANCE = 1e-9;

const phraseList = z.array(z.string().trim().toLowerCase().min(1));

const weightsSchema = z
  .object({
    title: z.number().min(0).max(1),
    keywords: z.number().min(0).max(1),
    location: z.number().min(0).max(1),
    seniority: z.number().min(0).max(1),
  })
  .refine(w => Math.abs(w.title + w.keywords + w.location + w.seniority - 1) <= WEIGHT_TOLERANCE, {
    message: 'weights must sum to 1',
  });

export const jobScoringProfileSchema = z.object({
  weights: weightsSchema,
  targetRoles: phraseList,
  domainWords: phraseList,
  engineeringWords: phraseList,
  positiveKeywords: phraseList,
  negativeKeywords: phraseList,
  preferredLocations: phraseList,
  targetSeniority: phraseList,
  juniorSignals: phraseList,
  executiveSignals: phraseList,
});

type ProfileShape = z.infer<typeof jobScoringProfileSchema>;

export type JobScoringWeights = Readonly<ProfileShape['weights']>;

/**
 * Everything the job relevance scorer matches against. Phrases are stored
 * lowercased; list order decides which phrase is reported when several match.
 */
export type JobScoringProfile = {
  readonly [K in keyof ProfileShape]: K extends 'weights' ? JobScoringWeights : readonly string[];
};

const overrideSchema = jobScoringProfileSchema.partial();

function freezeProfile(profile: ProfileShape): JobScoringProfile {
  return Object.freeze({
    weights: Object.freeze({ ...profile.weights }),
    targetRoles: Object.freeze([...profile.targetRoles]),
    domainWords: Object.freeze([...profile.domainWords]),
    engineeringWords: Object.freeze([...profile.engineeringWords]),
    positiveKeywords: Object.freeze([...profile.positiveKeywords]),
    negativeKeywords: Object.freeze([...profile.negativeKeywords]),
    preferredLocations: Object.freeze([...profile.preferredLocations]),
    targetSeniority: Object.freeze([...profile.targetSeniority]),
    juniorSignals: Object.freeze([...profile.juniorSignals]),
    executiveSignals: Object.freeze([...profile.executiveSignals]),
  });
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Validates a complete profile object and returns a frozen copy. */
export function parseJobScoringProfile(input: unknown): JobScoringProfile {
  const parsed = jobScoringProfileSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid job scoring profile', describeIssues(parsed.error));
  }
  return freezeProfile(parsed.data);
}

export const DEFAULT_JOB_PROFILE: JobScoringProfile = parseJobScoringProfile(defaultProfileJson);

/**
 * Applies a partial override on top of `base`. Lists given in the override
 * replace the base lists wholesale; weights must be given as a full set.
 */
export function mergeJobScoringProfile(base: JobScoringProfile, override: unknown): JobScoringProfile {
  const parsed = overrideSchema.safeParse(override);
  if (!parsed.success) {
    throw new ValidationError('Invalid job scoring profile override', describeIssues(parsed.error));
  }

  const merged: ProfileShape = {
    weights: { ...(parsed.data.weights ?? base.weights) },
    targetRoles: [...(parsed.data.targetRoles ?? base.targetRoles)],
    domainWords: [...(parsed.data.domainWords ?? base.domainWords)],
    engineeringWords: [...(parsed.data.engineeringWords ?? base.engineeringWords)],
    positiveKeywords: [...(parsed.data.positiveKeywords ?? base.positiveKeywords)],
    negativeKeywords: [...(parsed.data.negativeKeywords ?? base.negativeKeywords)],
    preferredLocations: [...(parsed.data.preferredLocations ?? base.preferredLocations)],
    targetSeniority: [...(parsed.data.targetSeniority ?? base.targetSeniority)],
    juniorSignals: [...(parsed.data.juniorSignals ?? base.juniorSignals)],
    executiveSignals: [...(parsed.data.executiveSignals ?? base.executiveSignals)],
  };
  return freezeProfile(merged);
}

/** Reads a JSON override file and merges it over the default profile. */
export function loadJobScoringProfile(filePath: string | null | undefined): JobScoringProfile {
  if (!filePath) return DEFAULT_JOB_PROFILE;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read job scoring profile ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return mergeJobScoringProfile(DEFAULT_JOB_PROFILE, raw);
}
