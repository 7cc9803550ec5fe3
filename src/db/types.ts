export const JOB_STATUSES = ['active', 'closed', 'applied', 'ignored'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const IMPACT_LEVELS = ['company-wide', 'engineering', 'team', 'personal'] as const;
export type ImpactLevel = (typeof IMPACT_LEVELS)[number];

export const ADOPTION_LEVELS = ['required', 'encouraged', 'allowed', 'exploring', 'rumored'] as const;
export type AdoptionLevel = (typeof ADOPTION_LEVELS)[number];

export const LEADERSHIP_SIGNAL_TYPES = ['quote', 'policy', 'memo', 'talk', 'tweet', 'interview'] as const;
export type LeadershipSignalType = (typeof LEADERSHIP_SIGNAL_TYPES)[number];

export const AI_SIGNAL_TYPES = [
  'leadership_statement',
  'engineering_blog',
  'job_posting_language',
  'conference_talk',
  'employee_report',
  'press_coverage',
  'github_activity',
  'company_policy',
  'product_integration',
  'tool_mandate',
] as const;
export type AiSignalType = (typeof AI_SIGNAL_TYPES)[number];

/** AI signal types that speak to engineering culture rather than one-off events. */
export const CULTURE_SIGNAL_TYPES: readonly AiSignalType[] = [
  'employee_report',
  'engineering_blog',
  'job_posting_language',
  'github_activity',
  'company_policy',
];

export type Tier = 1 | 2 | 3 | 4;

export interface Company {
  id: string;
  name: string;
  domain: string | null;
  careersUrl: string | null;
  careersPlatform: string | null;
  boardToken: string | null;
  compositeScore: number;
  tier: Tier;
  lastResearchedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewCompany {
  name: string;
  domain?: string | null;
  careersUrl?: string | null;
  careersPlatform?: string | null;
  boardToken?: string | null;
  tier?: Tier;
}

export interface CompanyFilters {
  platform?: string;
  /** Case-insensitive partial match */
  name?: string;
  minScore?: number;
  tier?: Tier;
  limit?: number;
}

export interface LeadershipSignal {
  id: string;
  companyId: string;
  leaderName: string;
  leaderTitle: string | null;
  signalType: LeadershipSignalType | null;
  content: string;
  sourceUrl: string | null;
  impactLevel: ImpactLevel | null;
  dateObserved: string | null;
  createdAt: string;
}

export type NewLeadershipSignal = Pick<LeadershipSignal, 'companyId' | 'leaderName' | 'content'> &
  Partial<Pick<LeadershipSignal, 'leaderTitle' | 'signalType' | 'sourceUrl' | 'impactLevel' | 'dateObserved'>>;

export interface ToolAdoption {
  id: string;
  companyId: string;
  toolName: string;
  adoptionLevel: AdoptionLevel | null;
  evidenceUrl: string | null;
  evidenceExcerpt: string | null;
  dateObserved: string | null;
  createdAt: string;
}

export type NewToolAdoption = Pick<ToolAdoption, 'companyId' | 'toolName'> &
  Partial<Pick<ToolAdoption, 'adoptionLevel' | 'evidenceUrl' | 'evidenceExcerpt' | 'dateObserved'>>;

export interface AiSignal {
  id: string;
  companyId: string;
  signalType: AiSignalType;
  title: string;
  sourceUrl: string | null;
  sourceName: string | null;
  excerpt: string | null;
  /** 1-5 */
  signalStrength: number | null;
  dateObserved: string | null;
  verified: boolean;
  createdAt: string;
}

export type NewAiSignal = Pick<AiSignal, 'companyId' | 'signalType' | 'title'> &
  Partial<Pick<AiSignal, 'sourceUrl' | 'sourceName' | 'excerpt' | 'signalStrength' | 'dateObserved' | 'verified'>>;

export interface EvidenceSignals {
  leadership: LeadershipSignal[];
  tools: ToolAdoption[];
  /** AI signals whose type indicates culture */
  culture: AiSignal[];
  /** Remaining AI signals; count toward depth and recency only */
  otherSignals: AiSignal[];
}

export interface CompanySubScores {
  leadership: number;
  toolAdoption: number;
  culture: number;
  evidenceDepth: number;
  recency: number;
}

export interface ScoreBreakdown extends CompanySubScores {
  companyId: string;
  composite: number;
  lastComputedAt: string;
}

export interface JobListing {
  id: string;
  companyId: string;
  companyName: string;
  title: string;
  url: string | null;
  identityKey: string;
  location: string | null;
  department: string | null;
  description: string | null;
  datePosted: string | null;
  relevanceScore: number;
  matchReasons: string[];
  status: JobStatus;
  dateFirstSeen: string;
  dateLastSeen: string;
}

export interface JobFilters {
  companyId?: string;
  status?: JobStatus;
  minRelevance?: number;
  /** ISO timestamp; listings first seen at or after it */
  since?: string;
  limit?: number;
}

export interface UpsertResult {
  id: string;
  isNew: boolean;
}

export type ScanRunStatus = 'running' | 'completed' | 'failed' | 'skipped';

export interface ScanRun {
  id: number;
  companyId: string;
  companyName: string;
  platform: string;
  startedAt: string;
  completedAt: string | null;
  status: ScanRunStatus;
  jobsFound: number;
  jobsNew: number;
  jobsStale: number;
  error: string | null;
}

export interface StoreStats {
  companies: number;
  aiSignals: number;
  leadershipSignals: number;
  toolsTracked: number;
  averageScore: number | null;
  byTier: Record<string, number>;
  jobs: { total: number; active: number; relevant: number };
}
