import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS companies (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      domain TEXT,
      careers_url TEXT,
      careers_platform TEXT,
      board_token TEXT,
      composite_score REAL NOT NULL DEFAULT 0,
      tier INTEGER NOT NULL DEFAULT 4 CHECK(tier BETWEEN 1 AND 4),
      last_researched_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS ai_signals (
      id TEXT PRIMARY KEY,
      company_id TEXT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      signal_type TEXT NOT NULL,
      title TEXT NOT NULL,
      source_url TEXT,
      source_name TEXT,
      excerpt TEXT,
      signal_strength INTEGER CHECK(signal_strength BETWEEN 1 AND 5),
      date_observed TEXT,
      verified INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS leadership_signals (
      id TEXT PRIMARY KEY,
      company_id TEXT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      leader_name TEXT NOT NULL,
      leader_title TEXT,
      signal_type TEXT,
      content TEXT NOT NULL,
      source_url TEXT,
      impact_level TEXT CHECK(impact_level IN ('company-wide', 'engineering', 'team', 'personal')),
      date_observed TEXT,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS tools_adopted (
      id TEXT PRIMARY KEY,
      company_id TEXT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      tool_name TEXT NOT NULL,
      adoption_level TEXT CHECK(adoption_level IN ('required', 'encouraged', 'allowed', 'exploring', 'rumored')),
      evidence_url TEXT,
      evidence_excerpt TEXT,
      date_observed TEXT,
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS score_breakdown (
      company_id TEXT PRIMARY KEY REFERENCES companies(id) ON DELETE CASCADE,
      leadership_score REAL NOT NULL,
      tool_adoption_score REAL NOT NULL,
      culture_score REAL NOT NULL,
      evidence_depth_score REAL NOT NULL,
      recency_score REAL NOT NULL,
      composite_score REAL NOT NULL,
      last_computed_at TEXT NOT NULL
    )
  `);

  // identity_key is the URL, or a content hash for postings without one
  db.exec(`
    CREATE TABLE IF NOT EXISTS job_listings (
      id TEXT PRIMARY KEY,
      company_id TEXT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      url TEXT,
      identity_key TEXT NOT NULL,
      location TEXT,
      department TEXT,
      description TEXT,
      date_posted TEXT,
      relevance_score REAL NOT NULL DEFAULT 0,
      match_reasons TEXT NOT NULL DEFAULT '[]',
      status TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active', 'closed', 'applied', 'ignored')),
      date_first_seen TEXT NOT NULL,
      date_last_seen TEXT NOT NULL,
      UNIQUE(company_id, title, identity_key)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS scan_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      company_id TEXT NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      platform TEXT NOT NULL,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      status TEXT NOT NULL DEFAULT 'running',
      jobs_found INTEGER NOT NULL DEFAULT 0,
      jobs_new INTEGER NOT NULL DEFAULT 0,
      jobs_stale INTEGER NOT NULL DEFAULT 0,
      error TEXT
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_companies_score ON companies(composite_score DESC);
    CREATE INDEX IF NOT EXISTS idx_companies_platform ON companies(careers_platform);
    CREATE INDEX IF NOT EXISTS idx_ai_signals_company ON ai_signals(company_id);
    CREATE INDEX IF NOT EXISTS idx_leadership_company ON leadership_signals(company_id);
    CREATE INDEX IF NOT EXISTS idx_tools_company ON tools_adopted(company_id);
    CREATE INDEX IF NOT EXISTS idx_jobs_company_status ON job_listings(company_id, status);
    CREATE INDEX IF NOT EXISTS idx_jobs_relevance ON job_listings(relevance_score DESC);
    CREATE INDEX IF NOT EXISTS idx_scan_runs_started ON scan_runs(started_at DESC);
  `);

  return db;
}


