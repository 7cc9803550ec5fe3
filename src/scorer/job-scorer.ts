import { CanonicalJob } from '../scrapers/types';
import { DEFAULT_JOB_PROFILE, JobScoringProfile } from './profile';

export interface JobRelevance {
  /** Weighted composite, 0-10, two decimals */
  score: number;
  /** Tags from title, keyword, location and seniority scoring, in that order */
  reasons: string[];
  titleScore: number;
  keywordScore: number;
  locationScore: number;
  seniorityScore: number;
}

type ScorableJob = Pick<CanonicalJob, 'title'> & Partial<Pick<CanonicalJob, 'description' | 'location'>>;

interface SubScore {
  score: number;
  reasons: string[];
}

function firstMatch(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find(phrase => text.includes(phrase));
}

function countMatches(text: string, phrases: readonly string[]): number {
  return new Set(phrases.filter(phrase => text.includes(phrase))).size;
}

/**
 * Ranks a single listing against a fixed set of heuristics. Missing optional
 * fields score neutral rather than low, so a record with only a title is
 * always scorable.
 */
export class JobRelevanceScorer {
  readonly profile: JobScoringProfile;

  constructor(profile: JobScoringProfile = DEFAULT_JOB_PROFILE) {
    this.profile = profile;
  }

  score(job: ScorableJob): JobRelevance {
    const title = this.scoreTitle(job.title);
    const keywords = this.scoreKeywords(job.description ?? null);
    const location = this.scoreLocation(job.location ?? null);
    const seniority = this.scoreSeniority(job.title);

    const { weights } = this.profile;
    const composite =
      title.score * weights.title +
      keywords.score * weights.keywords +
      location.score * weights.location +
      seniority.score * weights.seniority;

    return {
      score: Math.min(Math.round(composite * 100) / 100, 10),
      reasons: [...title.reasons, ...keywords.reasons, ...location.reasons, ...seniority.reasons],
      titleScore: title.score,
      keywordScore: keywords.score,
      locationScore: location.score,
      seniorityScore: seniority.score,
    };
  }

  scoreTitle(rawTitle: string): SubScore {
    const title = rawTitle.toLowerCase();

    const role = firstMatch(title, this.profile.targetRoles);
    if (role) return { score: 10, reasons: [`title_match:${role}`] };

    const hasDomain = firstMatch(title, this.profile.domainWords) !== undefined;
    const hasEngineering = firstMatch(title, this.profile.engineeringWords) !== undefined;

    if (hasDomain && hasEngineering) return { score: 8, reasons: ['title_partial:domain+engineering'] };
    if (hasDomain) return { score: 5, reasons: ['title_partial:domain'] };
    if (hasEngineering) return { score: 3, reasons: ['title_partial:engineering'] };
    return { score: 0, reasons: [] };
  }

  scoreKeywords(description: string | null): SubScore {
    if (!description) return { score: 5, reasons: ['no_description'] };

    const text = description.toLowerCase();
    const positive = countMatches(text, this.profile.positiveKeywords);
    const negative = countMatches(text, this.profile.negativeKeywords);

    const reasons: string[] = [];
    if (positive > 0) reasons.push(`keywords_positive:${positive}`);
    if (negative > 0) reasons.push(`keywords_negative:${negative}`);

    const score = Math.min(2 + positive * 1.6, 10) - negative * 2;
    return { score: Math.max(score, 0), reasons };
  }

  scoreLocation(location: string | null): SubScore {
    if (!location) return { score: 5, reasons: ['no_location'] };

    const preferred = firstMatch(location.toLowerCase(), this.profile.preferredLocations);
    if (preferred) return { score: 10, reasons: [`location_preferred:${preferred}`] };
    return { score: 3, reasons: ['location_other'] };
  }

  // Junior and executive words win over target words ("Senior Director" is exec).
  scoreSeniority(rawTitle: string): SubScore {
    const title = rawTitle.toLowerCase();

    const junior = firstMatch(title, this.profile.juniorSignals);
    if (junior) return { score: 2, reasons: [`seniority_junior:${junior}`] };

    const executive = firstMatch(title, this.profile.executiveSignals);
    if (executive) return { score: 4, reasons: [`seniority_exec:${executive}`] };

    const target = firstMatch(title, this.profile.targetSeniority);
    if (target) return { score: 10, reasons: [`seniority_target:${target}`] };

    return { score: 6, reasons: ['seniority_neutral'] };
  }
}
