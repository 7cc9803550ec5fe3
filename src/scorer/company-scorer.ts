import { SignalStore } from '../db';
import {
  AdoptionLevel,
  CompanySubScores,
  CULTURE_SIGNAL_TYPES,
  EvidenceSignals,
  ImpactLevel,
  ScoreBreakdown,
} from '../db/types';
import { createLogger } from '../logger';

const log = createLogger('company-scorer');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CompanyScoringWeights {
  readonly leadership: number;
  readonly toolAdoption: number;
  readonly culture: number;
  readonly evidenceDepth: number;
  readonly recency: number;
}

export interface RecencyBucket {
  /** Inclusive upper bound on evidence age in days */
  readonly maxDays: number;
  readonly score: number;
}

export interface CompanyScoringConfig {
  readonly weights: CompanyScoringWeights;
  readonly impactScores: Readonly<Record<ImpactLevel, number>>;
  /** Used when a leadership signal carries no impact level */
  readonly unknownImpactScore: number;
  readonly adoptionScores: Readonly<Record<AdoptionLevel, number>>;
  readonly unknownAdoptionScore: number;
  readonly cultureSignalTypes: readonly string[];
  readonly defaultSignalStrength: number;
  readonly bonusPerExtraLeadershipSignal: number;
  readonly maxExtraLeadershipSignals: number;
  readonly bonusPerExtraTool: number;
  readonly maxExtraTools: number;
  /** Ascending by maxDays */
  readonly recencyBuckets: readonly RecencyBucket[];
  /** Evidence older than every bucket */
  readonly staleRecencyScore: number;
  /** No dated evidence at all */
  readonly neutralRecencyScore: number;
}

export const DEFAULT_COMPANY_SCORING: CompanyScoringConfig = Object.freeze({
  weights: Object.freeze({
    leadership: 0.3,
    toolAdoption: 0.25,
    culture: 0.25,
    evidenceDepth: 0.1,
    recency: 0.1,
  }),
  impactScores: Object.freeze({
    'company-wide': 10,
    engineering: 7,
    team: 4,
    personal: 2,
  }),
  unknownImpactScore: 2,
  adoptionScores: Object.freeze({
    required: 10,
    encouraged: 8,
    allowed: 5,
    exploring: 3,
    rumored: 1,
  }),
  unknownAdoptionScore: 1,
  cultureSignalTypes: CULTURE_SIGNAL_TYPES,
  defaultSignalStrength: 3,
  bonusPerExtraLeadershipSignal: 0.5,
  maxExtraLeadershipSignals: 3,
  bonusPerExtraTool: 0.5,
  maxExtraTools: 4,
  recencyBuckets: Object.freeze([
    { maxDays: 30, score: 10 },
    { maxDays: 90, score: 9 },
    { maxDays: 180, score: 7 },
    { maxDays: 365, score: 5 },
    { maxDays: 730, score: 3 },
  ]),
  staleRecencyScore: 1,
  neutralRecencyScore: 5,
});

export function leadershipScore(
  signals: EvidenceSignals['leadership'],
  config: CompanyScoringConfig = DEFAULT_COMPANY_SCORING,
): number {
  if (signals.length === 0) return 0;

  const base = Math.max(
    ...signals.map(s => (s.impactLevel ? config.impactScores[s.impactLevel] : config.unknownImpactScore)),
  );
  const extra = Math.min(signals.length - 1, config.maxExtraLeadershipSignals);
  return Math.min(base + extra * config.bonusPerExtraLeadershipSignal, 10);
}

export function toolAdoptionScore(
  tools: EvidenceSignals['tools'],
  config: CompanyScoringConfig = DEFAULT_COMPANY_SCORING,
): number {
  if (tools.length === 0) return 0;

  const base = Math.max(
    ...tools.map(t => (t.adoptionLevel ? config.adoptionScores[t.adoptionLevel] : config.unknownAdoptionScore)),
  );
  const distinctTools = new Set(tools.map(t => t.toolName)).size;
  const extra = Math.min(distinctTools - 1, config.maxExtraTools);
  return Math.min(base + extra * config.bonusPerExtraTool, 10);
}

/** Average strength doubled, damped by a log count factor so volume alone cannot max it out. */
export function cultureScore(
  signals: EvidenceSignals['culture'],
  config: CompanyScoringConfig = DEFAULT_COMPANY_SCORING,
): number {
  if (signals.length === 0) return 0;

  const strengths = signals.map(s => s.signalStrength || config.defaultSignalStrength);
  const average = strengths.reduce((sum, value) => sum + value, 0) / strengths.length;
  const countFactor = Math.min(Math.log2(strengths.length + 1) / 2.5, 1);
  return Math.min(average * 2 * countFactor, 10);
}

export function evidenceDepthScore(totalSignals: number): number {
  if (totalSignals <= 0) return 0;
  return Math.min(Math.log2(totalSignals + 1) * 2.5, 10);
}

function parseObservedDay(value: string): number | null {
  const day = value.slice(0, 10);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) return null;
  const time = Date.parse(`${day}T00:00:00Z`);
  return Number.isNaN(time) ? null : time;
}

/**
 * Step function over the age of the most recent observation. Unparseable
 * dates are ignored; no usable date at all scores neutral.
 */
export function recencyScore(
  observedDates: readonly (string | null)[],
  now: Date,
  config: CompanyScoringConfig = DEFAULT_COMPANY_SCORING,
): number {
  const times = observedDates
    .map(value => (value ? parseObservedDay(value) : null))
    .filter((time): time is number => time !== null);
  if (times.length === 0) return config.neutralRecencyScore;

  const daysAgo = Math.floor((now.getTime() - Math.max(...times)) / DAY_MS);
  const bucket = config.recencyBuckets.find(b => daysAgo <= b.maxDays);
  return bucket ? bucket.score : config.staleRecencyScore;
}

export function compositeScore(
  subScores: CompanySubScores,
  weights: CompanyScoringWeights = DEFAULT_COMPANY_SCORING.weights,
): number {
  const composite =
    subScores.leadership * weights.leadership +
    subScores.toolAdoption * weights.toolAdoption +
    subScores.culture * weights.culture +
    subScores.evidenceDepth * weights.evidenceDepth +
    subScores.recency * weights.recency;
  return Math.round(composite * 100) / 100;
}

export function computeSubScores(
  evidence: EvidenceSignals,
  now: Date,
  config: CompanyScoringConfig = DEFAULT_COMPANY_SCORING,
): CompanySubScores {
  const aiSignals = [...evidence.culture, ...evidence.otherSignals];
  const total = evidence.leadership.length + evidence.tools.length + aiSignals.length;
  const dates = [
    ...aiSignals.map(s => s.dateObserved),
    ...evidence.leadership.map(s => s.dateObserved),
    ...evidence.tools.map(t => t.dateObserved),
  ];

  return {
    leadership: leadershipScore(evidence.leadership, config),
    toolAdoption: toolAdoptionScore(evidence.tools, config),
    culture: cultureScore(evidence.culture, config),
    evidenceDepth: evidenceDepthScore(total),
    recency: recencyScore(dates, now, config),
  };
}

function sameScores(previous: ScoreBreakdown, subScores: CompanySubScores, composite: number): boolean {
  return previous.composite === composite
    && previous.leadership === subScores.leadership
    && previous.toolAdoption === subScores.toolAdoption
    && previous.culture === subScores.culture
    && previous.evidenceDepth === subScores.evidenceDepth
    && previous.recency === subScores.recency;
}

export interface CompanyScoreEngineOptions {
  config?: CompanyScoringConfig;
  now?: () => Date;
}

/**
 * Recomputes a company's score breakdown from its current evidence and
 * persists it. Always a full recomputation; the stored breakdown is a cache.
 * Refreshing a company while it is being scanned is unsupported.
 */
export class CompanyScoreEngine {
  private readonly store: SignalStore;
  private readonly config: CompanyScoringConfig;
  private readonly now: () => Date;

  constructor(store: SignalStore, options: CompanyScoreEngineOptions = {}) {
    this.store = store;
    this.config = options.config ?? DEFAULT_COMPANY_SCORING;
    this.now = options.now ?? (() => new Date());
  }

  compute(companyId: string): { subScores: CompanySubScores; composite: number } {
    const evidence = this.store.getEvidenceSignals(companyId, this.config.cultureSignalTypes);
    const subScores = computeSubScores(evidence, this.now(), this.config);
    return { subScores, composite: compositeScore(subScores, this.config.weights) };
  }

  /** An unchanged result keeps its previous `lastComputedAt`. */
  refresh(companyId: string): ScoreBreakdown {
    const company = this.store.requireCompany(companyId);
    const { subScores, composite } = this.compute(company.id);
    const previous = this.store.getScoreBreakdown(company.id);
    const computedAt = previous && sameScores(previous, subScores, composite)
      ? previous.lastComputedAt
      : this.now().toISOString();

    const breakdown = this.store.transaction(() => {
      const saved = this.store.upsertScoreBreakdown(company.id, subScores, composite, computedAt);
      this.store.updateCompanyScore(company.id, composite);
      return saved;
    });

    log.debug({ companyId, company: company.name, composite }, 'Company score refreshed');
    return breakdown;
  }

  refreshAll(): ScoreBreakdown[] {
    const companies = this.store.listCompanies();
    const results = companies.map(company => this.refresh(company.id));
    log.info({ companies: results.length }, 'Refreshed all company scores');
    return results;
  }
}
