import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { loadConfig } from '../config';
import { NotFoundError } from '../errors';
import { createLogger } from '../logger';
import { CanonicalJob } from '../scrapers/types';
import { jobIdentityKey } from './identity';
import { initializeDatabase } from './schema';
import {
  AiSignal,
  Company,
  CompanyFilters,
  CompanySubScores,
  CULTURE_SIGNAL_TYPES,
  EvidenceSignals,
  JobFilters,
  JobListing,
  JobStatus,
  LeadershipSignal,
  NewAiSignal,
  NewCompany,
  NewLeadershipSignal,
  NewToolAdoption,
  ScanRun,
  ScanRunStatus,
  ScoreBreakdown,
  StoreStats,
  Tier,
  ToolAdoption,
  UpsertResult,
} from './types';

export * from './types';
export { jobIdentityKey } from './identity';

const log = createLogger('db');

const RELEVANT_JOB_THRESHOLD = 7;

const COMPANY_COLUMNS = `
  id, name, domain, careers_url as careersUrl, careers_platform as careersPlatform,
  board_token as boardToken, composite_score as compositeScore, tier,
  last_researched_at as lastResearchedAt, created_at as createdAt, updated_at as updatedAt
`;

const JOB_COLUMNS = `
  j.id, j.company_id as companyId, c.name as companyName, j.title, j.url,
  j.identity_key as identityKey, j.location, j.department, j.description,
  j.date_posted as datePosted, j.relevance_score as relevanceScore,
  j.match_reasons as matchReasons, j.status, j.date_first_seen as dateFirstSeen,
  j.date_last_seen as dateLastSeen
`;

type JobRow = Omit<JobListing, 'matchReasons'> & { matchReasons: string | null };
type AiSignalRow = Omit<AiSignal, 'verified'> & { verified: number };

const matchReasonsSchema = z.array(z.string());

function parseMatchReasons(raw: string | null, jobId: string): string[] {
  if (!raw) return [];
  try {
    const parsed = matchReasonsSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch (error) {
    log.warn({ jobId, error }, 'Stored match reasons are not valid JSON');
    return [];
  }
  log.warn({ jobId }, 'Stored match reasons are not a string list');
  return [];
}

function toJobListing(row: JobRow): JobListing {
  return { ...row, matchReasons: parseMatchReasons(row.matchReasons, row.id) };
}

function toAiSignal(row: AiSignalRow): AiSignal {
  return { ...row, verified: row.verified === 1 };
}

export interface SignalStoreOptions {
  /** Clock for every timestamp the store writes */
  now?: () => Date;
}

export interface ScanRunResult {
  status: Exclude<ScanRunStatus, 'running'>;
  jobsFound: number;
  jobsNew: number;
  jobsStale: number;
  error?: string | null;
}

/**
 * Persistence boundary for companies, evidence, score breakdowns, job
 * listings and scan runs. Backed by a single better-sqlite3 connection; all
 * calls are synchronous and write errors propagate to the caller.
 */
export class SignalStore {
  readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, options: SignalStoreOptions = {}) {
    this.db = db;
    this.now = options.now ?? (() => new Date());
  }

  static open(dbPath: string, options: SignalStoreOptions = {}): SignalStore {
    return new SignalStore(initializeDatabase(dbPath), options);
  }

  close(): void {
    this.db.close();
  }

  /** Runs `fn` in one transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // --- Companies ---

  addCompany(input: NewCompany): Company {
    const id = uuidv4();
    const now = this.timestamp();
    this.db.prepare(`
      INSERT INTO companies (id, name, domain, careers_url, careers_platform, board_token, tier, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id, input.name, input.domain ?? null, input.careersUrl ?? null,
      input.careersPlatform ?? null, input.boardToken ?? null, input.tier ?? 4, now, now
    );
    return this.requireCompany(id);
  }

  getCompany(id: string): Company | null {
    const row = this.db.prepare(`SELECT ${COMPANY_COLUMNS} FROM companies WHERE id = ?`).get(id) as Company | undefined;
    return row ?? null;
  }

  requireCompany(id: string): Company {
    const company = this.getCompany(id);
    if (!company) throw new NotFoundError('Company', id);
    return company;
  }

  /** Exact (case-insensitive) name first, then the best-scored partial match. */
  findCompanyByName(name: string): Company | null {
    const exact = this.db.prepare(
      `SELECT ${COMPANY_COLUMNS} FROM companies WHERE lower(name) = lower(?)`
    ).get(name) as Company | undefined;
    if (exact) return exact;

    const partial = this.db.prepare(
      `SELECT ${COMPANY_COLUMNS} FROM companies WHERE name LIKE ? ORDER BY composite_score DESC, name ASC LIMIT 1`
    ).get(`%${name}%`) as Company | undefined;
    return partial ?? null;
  }

  listCompanies(filters: CompanyFilters = {}): Company[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.platform) {
      conditions.push('careers_platform = ?');
      params.push(filters.platform);
    }
    if (filters.name) {
      conditions.push('name LIKE ?');
      params.push(`%${filters.name}%`);
    }
    if (filters.minScore != null) {
      conditions.push('composite_score >= ?');
      params.push(filters.minScore);
    }
    if (filters.tier != null) {
      conditions.push('tier = ?');
      params.push(filters.tier);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? -1;

    return this.db.prepare(`
      SELECT ${COMPANY_COLUMNS} FROM companies
      ${where}
      ORDER BY composite_score DESC, name ASC
      LIMIT ?
    `).all(...params, limit) as Company[];
  }

  updateCompanyScore(companyId: string, composite: number): void {
    const result = this.db.prepare(
      'UPDATE companies SET composite_score = ?, updated_at = ? WHERE id = ?'
    ).run(composite, this.timestamp(), companyId);
    if (result.changes === 0) throw new NotFoundError('Company', companyId);
  }

  setCompanyTier(companyId: string, tier: Tier): void {
    const result = this.db.prepare(
      'UPDATE companies SET tier = ?, updated_at = ? WHERE id = ?'
    ).run(tier, this.timestamp(), companyId);
    if (result.changes === 0) throw new NotFoundError('Company', companyId);
  }

  markCompanyResearched(companyId: string, at: Date = this.now()): void {
    const result = this.db.prepare(
      'UPDATE companies SET last_researched_at = ?, updated_at = ? WHERE id = ?'
    ).run(at.toISOString(), this.timestamp(), companyId);
    if (result.changes === 0) throw new NotFoundError('Company', companyId);
  }

  // --- Evidence (append-only) ---

  addLeadershipSignal(input: NewLeadershipSignal): LeadershipSignal {
    const signal: LeadershipSignal = {
      id: uuidv4(),
      companyId: input.companyId,
      leaderName: input.leaderName,
      leaderTitle: input.leaderTitle ?? null,
      signalType: input.signalType ?? null,
      content: input.content,
      sourceUrl: input.sourceUrl ?? null,
      impactLevel: input.impactLevel ?? null,
      dateObserved: input.dateObserved ?? null,
      createdAt: this.timestamp(),
    };
    this.db.prepare(`
      INSERT INTO leadership_signals (id, company_id, leader_name, leader_title, signal_type, content,
        source_url, impact_level, date_observed, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      signal.id, signal.companyId, signal.leaderName, signal.leaderTitle, signal.signalType,
      signal.content, signal.sourceUrl, signal.impactLevel, signal.dateObserved, signal.createdAt
    );
    return signal;
  }

  addToolAdoption(input: NewToolAdoption): ToolAdoption {
    const record: ToolAdoption = {
      id: uuidv4(),
      companyId: input.companyId,
      toolName: input.toolName,
      adoptionLevel: input.adoptionLevel ?? null,
      evidenceUrl: input.evidenceUrl ?? null,
      evidenceExcerpt: input.evidenceExcerpt ?? null,
      dateObserved: input.dateObserved ?? null,
      createdAt: this.timestamp(),
    };
    this.db.prepare(`
      INSERT INTO tools_adopted (id, company_id, tool_name, adoption_level, evidence_url,
        evidence_excerpt, date_observed, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      record.id, record.companyId, record.toolName, record.adoptionLevel, record.evidenceUrl,
      record.evidenceExcerpt, record.dateObserved, record.createdAt
    );
    return record;
  }

  addAiSignal(input: NewAiSignal): AiSignal {
    const signal: AiSignal = {
      id: uuidv4(),
      companyId: input.companyId,
      signalType: input.signalType,
      title: input.title,
      sourceUrl: input.sourceUrl ?? null,
      sourceName: input.sourceName ?? null,
      excerpt: input.excerpt ?? null,
      signalStrength: input.signalStrength ?? null,
      dateObserved: input.dateObserved ?? null,
      verified: input.verified ?? false,
      createdAt: this.timestamp(),
    };
    this.db.prepare(`
      INSERT INTO ai_signals (id, company_id, signal_type, title, source_url, source_name, excerpt,
        signal_strength, date_observed, verified, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      signal.id, signal.companyId, signal.signalType, signal.title, signal.sourceUrl, signal.sourceName,
      signal.excerpt, signal.signalStrength, signal.dateObserved, signal.verified ? 1 : 0, signal.createdAt
    );
    return signal;
  }

  getEvidenceSignals(companyId: string, cultureTypes: readonly string[] = CULTURE_SIGNAL_TYPES): EvidenceSignals {
    const leadership = this.db.prepare(`
      SELECT id, company_id as companyId, leader_name as leaderName, leader_title as leaderTitle,
        signal_type as signalType, content, source_url as sourceUrl, impact_level as impactLevel,
        date_observed as dateObserved, created_at as createdAt
      FROM leadership_signals WHERE company_id = ? ORDER BY created_at, id
    `).all(companyId) as LeadershipSignal[];

    const tools = this.db.prepare(`
      SELECT id, company_id as companyId, tool_name as toolName, adoption_level as adoptionLevel,
        evidence_url as evidenceUrl, evidence_excerpt as evidenceExcerpt,
        date_observed as dateObserved, created_at as createdAt
      FROM tools_adopted WHERE company_id = ? ORDER BY created_at, id
    `).all(companyId) as ToolAdoption[];

    const signals = (this.db.prepare(`
      SELECT id, company_id as companyId, signal_type as signalType, title, source_url as sourceUrl,
        source_name as sourceName, excerpt, signal_strength as signalStrength,
        date_observed as dateObserved, verified, created_at as createdAt
      FROM ai_signals WHERE company_id = ? ORDER BY created_at, id
    `).all(companyId) as AiSignalRow[]).map(toAiSignal);

    const culture = new Set(cultureTypes);
    return {
      leadership,
      tools,
      culture: signals.filter(signal => culture.has(signal.signalType)),
      otherSignals: signals.filter(signal => !culture.has(signal.signalType)),
    };
  }

  // --- Score breakdown (derived cache) ---

  upsertScoreBreakdown(
    companyId: string,
    subScores: CompanySubScores,
    composite: number,
    computedAt: string = this.timestamp(),
  ): ScoreBreakdown {
    this.db.prepare(`
      INSERT INTO score_breakdown (company_id, leadership_score, tool_adoption_score, culture_score,
        evidence_depth_score, recency_score, composite_score, last_computed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(company_id) DO UPDATE SET
        leadership_score = excluded.leadership_score,
        tool_adoption_score = excluded.tool_adoption_score,
        culture_score = excluded.culture_score,
        evidence_depth_score = excluded.evidence_depth_score,
        recency_score = excluded.recency_score,
        composite_score = excluded.composite_score,
        last_computed_at = excluded.last_computed_at
    `).run(
      companyId, subScores.leadership, subScores.toolAdoption, subScores.culture,
      subScores.evidenceDepth, subScores.recency, composite, computedAt
    );
    return { companyId, ...subScores, composite, lastComputedAt: computedAt };
  }

  getScoreBreakdown(companyId: string): ScoreBreakdown | null {
    const row = this.db.prepare(`
      SELECT company_id as companyId, leadership_score as leadership, tool_adoption_score as toolAdoption,
        culture_score as culture, evidence_depth_score as evidenceDepth, recency_score as recency,
        composite_score as composite, last_computed_at as lastComputedAt
      FROM score_breakdown WHERE company_id = ?
    `).get(companyId) as ScoreBreakdown | undefined;
    return row ?? null;
  }

  // --- Job listings ---

  /**
   * Inserts a listing on first sighting, otherwise refreshes it: known values
   * are only replaced by new non-null ones, `date_last_seen` is bumped and a
   * closed listing is reopened. Applied/ignored listings keep their status.
   */
  upsertJob(companyId: string, job: CanonicalJob, relevanceScore: number, reasons: string[]): UpsertResult {
    const identityKey = jobIdentityKey(job);
    const now = this.timestamp();
    const reasonsJson = reasons.length > 0 ? JSON.stringify(reasons) : null;

    const existing = this.db.prepare(
      'SELECT id FROM job_listings WHERE company_id = ? AND title = ? AND identity_key = ?'
    ).get(companyId, job.title, identityKey) as { id: string } | undefined;

    if (existing) {
      this.db.prepare(`
        UPDATE job_listings SET
          date_last_seen = ?,
          url = COALESCE(?, url),
          location = COALESCE(?, location),
          department = COALESCE(?, department),
          description = COALESCE(?, description),
          date_posted = COALESCE(?, date_posted),
          relevance_score = ?,
          match_reasons = COALESCE(?, match_reasons),
          status = CASE WHEN status = 'closed' THEN 'active' ELSE status END
        WHERE id = ?
      `).run(
        now, job.url, job.location, job.department, job.description, job.datePosted,
        relevanceScore, reasonsJson, existing.id
      );
      return { id: existing.id, isNew: false };
    }

    const id = uuidv4();
    this.db.prepare(`
      INSERT INTO job_listings (id, company_id, title, url, identity_key, location, department,
        description, date_posted, relevance_score, match_reasons, status, date_first_seen, date_last_seen)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'active', ?, ?)
    `).run(
      id, companyId, job.title, job.url, identityKey, job.location, job.department,
      job.description, job.datePosted, relevanceScore, reasonsJson ?? '[]', now, now
    );
    return { id, isNew: true };
  }

  /**
   * Closes every active listing of the company whose id is not among the
   * listings upserted by the latest fetch. Applied and ignored listings are
   * never touched.
   */
  markStale(companyId: string, observedIds: Iterable<string>): number {
    const observed = new Set(observedIds);
    const rows = this.db.prepare(
      "SELECT id FROM job_listings WHERE company_id = ? AND status = 'active'"
    ).all(companyId) as { id: string }[];

    const close = this.db.prepare("UPDATE job_listings SET status = 'closed' WHERE id = ? AND status = 'active'");
    return this.transaction(() => {
      let closed = 0;
      for (const row of rows) {
        if (observed.has(row.id)) continue;
        closed += close.run(row.id).changes;
      }
      return closed;
    });
  }

  getJobs(filters: JobFilters = {}): JobListing[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.companyId) {
      conditions.push('j.company_id = ?');
      params.push(filters.companyId);
    }
    if (filters.status) {
      conditions.push('j.status = ?');
      params.push(filters.status);
    }
    if (filters.minRelevance != null) {
      conditions.push('j.relevance_score >= ?');
      params.push(filters.minRelevance);
    }
    if (filters.since) {
      conditions.push('j.date_first_seen >= ?');
      params.push(filters.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? 50;

    const rows = this.db.prepare(`
      SELECT ${JOB_COLUMNS}
      FROM job_listings j
      JOIN companies c ON c.id = j.company_id
      ${where}
      ORDER BY j.relevance_score DESC, j.date_first_seen DESC, j.title ASC
      LIMIT ?
    `).all(...params, limit) as JobRow[];

    return rows.map(toJobListing);
  }

  getJobById(id: string): JobListing | null {
    const row = this.db.prepare(`
      SELECT ${JOB_COLUMNS}
      FROM job_listings j
      JOIN companies c ON c.id = j.company_id
      WHERE j.id = ?
    `).get(id) as JobRow | undefined;
    return row ? toJobListing(row) : null;
  }

  /** Returns false when no listing has that id. */
  updateJobStatus(id: string, status: JobStatus): boolean {
    const result = this.db.prepare('UPDATE job_listings SET status = ? WHERE id = ?').run(status, id);
    return result.changes > 0;
  }

  // --- Scan runs ---

  startScanRun(companyId: string, platform: string): number {
    const result = this.db.prepare(
      'INSERT INTO scan_runs (company_id, platform, started_at) VALUES (?, ?, ?)'
    ).run(companyId, platform, this.timestamp());
    return Number(result.lastInsertRowid);
  }

  completeScanRun(id: number, result: ScanRunResult): void {
    this.db.prepare(`
      UPDATE scan_runs SET completed_at = ?, status = ?, jobs_found = ?, jobs_new = ?, jobs_stale = ?, error = ?
      WHERE id = ?
    `).run(
      this.timestamp(), result.status, result.jobsFound, result.jobsNew, result.jobsStale,
      result.error ?? null, id
    );
  }

  getScanRuns(limit: number = 20): ScanRun[] {
    return this.db.prepare(`
      SELECT r.id, r.company_id as companyId, c.name as companyName, r.platform,
        r.started_at as startedAt, r.completed_at as completedAt, r.status,
        r.jobs_found as jobsFound, r.jobs_new as jobsNew, r.jobs_stale as jobsStale, r.error
      FROM scan_runs r
      JOIN companies c ON c.id = r.company_id
      ORDER BY r.started_at DESC, r.id DESC
      LIMIT ?
    `).all(limit) as ScanRun[];
  }

  // --- Stats ---

  getStats(): StoreStats {
    const count = (sql: string, ...params: unknown[]): number =>
      (this.db.prepare(sql).get(...params) as { c: number }).c;

    const avgRow = this.db.prepare('SELECT AVG(composite_score) as avg FROM companies').get() as { avg: number | null };
    const tiers = this.db.prepare(
      'SELECT tier, COUNT(*) as c FROM companies GROUP BY tier ORDER BY tier'
    ).all() as { tier: number; c: number }[];

    const byTier: Record<string, number> = {};
    for (const row of tiers) byTier[String(row.tier)] = row.c;

    return {
      companies: count('SELECT COUNT(*) as c FROM companies'),
      aiSignals: count('SELECT COUNT(*) as c FROM ai_signals'),
      leadershipSignals: count('SELECT COUNT(*) as c FROM leadership_signals'),
      toolsTracked: count('SELECT COUNT(*) as c FROM tools_adopted'),
      averageScore: avgRow.avg,
      byTier,
      jobs: {
        total: count('SELECT COUNT(*) as c FROM job_listings'),
        active: count("SELECT COUNT(*) as c FROM job_listings WHERE status = 'active'"),
        relevant: count(
          "SELECT COUNT(*) as c FROM job_listings WHERE status = 'active' AND relevance_score >= ?",
          RELEVANT_JOB_THRESHOLD
        ),
      },
    };
  }
}

let store: SignalStore | undefined;

/** Process-wide store at the configured DATABASE_PATH, opened on first use. */
export function getStore(): SignalStore {
  if (!store) {
    store = SignalStore.open(loadConfig().databasePath);
  }
  return store;
}
