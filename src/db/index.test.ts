import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError } from '../errors';
import { CanonicalJob } from '../scrapers/types';
import { jobIdentityKey, SignalStore } from './index';

function job(overrides: Partial<CanonicalJob> & { title: string }): CanonicalJob {
  return {
    url: null,
    location: null,
    department: null,
    description: null,
    datePosted: null,
    ...overrides,
  };
}

describe('SignalStore', () => {
  let clock: Date;
  let store: SignalStore;

  beforeEach(() => {
    clock = new Date('2026-01-31T12:00:00.000Z');
    store = SignalStore.open(':memory:', { now: () => clock });
  });

  afterEach(() => {
    store.close();
  });

  function advance(hours: number): void {
    clock = new Date(clock.getTime() + hours * 60 * 60 * 1000);
  }

  describe('companies', () => {
    it('creates companies with defaults', () => {
      const company = store.addCompany({ name: 'Acme', domain: 'acme.com', careersPlatform: 'greenhouse' });
      expect(company).toMatchObject({
        name: 'Acme',
        domain: 'acme.com',
        careersUrl: null,
        careersPlatform: 'greenhouse',
        boardToken: null,
        compositeScore: 0,
        tier: 4,
        lastResearchedAt: null,
        createdAt: '2026-01-31T12:00:00.000Z',
      });
    });

    it('finds by exact name first, then by partial match', () => {
      const acme = store.addCompany({ name: 'Acme' });
      const acmeLabs = store.addCompany({ name: 'Acme Labs' });
      store.updateCompanyScore(acmeLabs.id, 9);

      expect(store.findCompanyByName('acme')?.id).toBe(acme.id);
      expect(store.findCompanyByName('labs')?.id).toBe(acmeLabs.id);
      expect(store.findCompanyByName('nothing')).toBeNull();
    });

    it('lists by score descending, then name', () => {
      const a = store.addCompany({ name: 'Alpha', careersPlatform: 'lever' });
      const b = store.addCompany({ name: 'Bravo', careersPlatform: 'greenhouse' });
      store.addCompany({ name: 'Charlie', careersPlatform: 'lever' });
      store.updateCompanyScore(b.id, 7.5);
      store.updateCompanyScore(a.id, 3);

      expect(store.listCompanies().map(c => c.name)).toEqual(['Bravo', 'Alpha', 'Charlie']);
      expect(store.listCompanies({ platform: 'lever' }).map(c => c.name)).toEqual(['Alpha', 'Charlie']);
      expect(store.listCompanies({ minScore: 3 }).map(c => c.name)).toEqual(['Bravo', 'Alpha']);
      expect(store.listCompanies({ limit: 1 }).map(c => c.name)).toEqual(['Bravo']);
    });

    it('updates tier and research timestamp', () => {
      const company = store.addCompany({ name: 'Acme' });
      store.setCompanyTier(company.id, 1);
      store.markCompanyResearched(company.id, new Date('2026-01-15T00:00:00.000Z'));

      expect(store.requireCompany(company.id)).toMatchObject({
        tier: 1,
        lastResearchedAt: '2026-01-15T00:00:00.000Z',
      });
      expect(store.listCompanies({ tier: 1 })).toHaveLength(1);
    });

    it('raises NotFoundError for unknown companies', () => {
      expect(() => store.updateCompanyScore('missing', 5)).toThrow(NotFoundError);
      expect(() => store.requireCompany('missing')).toThrow('Company not found: missing');
    });

    it('propagates write errors', () => {
      store.addCompany({ name: 'Acme' });
      expect(() => store.addCompany({ name: 'Acme' })).toThrow(/UNIQUE/);
    });
  });

  describe('evidence', () => {
    it('splits AI signals into culture and other signals', () => {
      const company = store.addCompany({ name: 'Acme' });
      store.addLeadershipSignal({ companyId: company.id, leaderName: 'Pat', content: 'AI first', impactLevel: 'team' });
      store.addToolAdoption({ companyId: company.id, toolName: 'Copilot' });
      store.addAiSignal({ companyId: company.id, signalType: 'employee_report', title: 'Review', verified: true });
      store.addAiSignal({ companyId: company.id, signalType: 'press_coverage', title: 'Article' });

      const evidence = store.getEvidenceSignals(company.id);
      expect(evidence.leadership).toHaveLength(1);
      expect(evidence.leadership[0]).toMatchObject({ leaderName: 'Pat', impactLevel: 'team', leaderTitle: null });
      expect(evidence.tools[0]).toMatchObject({ toolName: 'Copilot', adoptionLevel: null });
      expect(evidence.culture.map(s => s.title)).toEqual(['Review']);
      expect(evidence.culture[0].verified).toBe(true);
      expect(evidence.otherSignals.map(s => s.title)).toEqual(['Article']);
    });
  });

  describe('job listings', () => {
    let companyId: string;

    beforeEach(() => {
      companyId = store.addCompany({ name: 'Acme' }).id;
    });

    it('inserts once and updates on the next sighting', () => {
      const posting = job({ title: 'Data Engineer', url: 'https://acme.test/jobs/1', location: 'Remote' });
      const first = store.upsertJob(companyId, posting, 8, ['title_match:data engineer']);
      advance(24);
      const second = store.upsertJob(companyId, posting, 8, ['title_match:data engineer']);

      expect(first.isNew).toBe(true);
      expect(second).toEqual({ id: first.id, isNew: false });
      expect(store.getJobs()).toHaveLength(1);

      const stored = store.getJobById(first.id);
      expect(stored).toMatchObject({
        companyName: 'Acme',
        identityKey: 'https://acme.test/jobs/1',
        matchReasons: ['title_match:data engineer'],
        status: 'active',
        dateFirstSeen: '2026-01-31T12:00:00.000Z',
        dateLastSeen: '2026-02-01T12:00:00.000Z',
      });
    });

    it('never overwrites a known value with an unknown one', () => {
      const url = 'https://acme.test/jobs/1';
      const { id } = store.upsertJob(
        companyId,
        job({ title: 'Data Engineer', url, location: 'Remote', department: 'Data' }),
        6,
        ['a'],
      );
      store.upsertJob(companyId, job({ title: 'Data Engineer', url, description: 'Now with SQL' }), 7, []);

      expect(store.getJobById(id)).toMatchObject({
        location: 'Remote',
        department: 'Data',
        description: 'Now with SQL',
        relevanceScore: 7,
        matchReasons: ['a'],
      });
    });

    it('reopens closed listings but keeps applied and ignored ones', () => {
      const closed = store.upsertJob(companyId, job({ title: 'A', url: 'https://acme.test/a' }), 5, []);
      const applied = store.upsertJob(companyId, job({ title: 'B', url: 'https://acme.test/b' }), 5, []);
      store.updateJobStatus(closed.id, 'closed');
      store.updateJobStatus(applied.id, 'applied');

      store.upsertJob(companyId, job({ title: 'A', url: 'https://acme.test/a' }), 5, []);
      store.upsertJob(companyId, job({ title: 'B', url: 'https://acme.test/b' }), 5, []);

      expect(store.getJobById(closed.id)?.status).toBe('active');
      expect(store.getJobById(applied.id)?.status).toBe('applied');
    });

    it('keeps URL-less postings with the same title apart by location', () => {
      const berlin = store.upsertJob(companyId, job({ title: 'Data Engineer', location: 'Berlin' }), 5, []);
      const austin = store.upsertJob(companyId, job({ title: 'Data Engineer', location: 'Austin' }), 5, []);

      expect(berlin.isNew).toBe(true);
      expect(austin.isNew).toBe(true);
      expect(berlin.id).not.toBe(austin.id);
      expect(store.getJobById(berlin.id)?.identityKey).toMatch(/^sha256:[0-9a-f]{64}$/);
    });

    it('closes only active listings that were not observed', () => {
      const a = store.upsertJob(companyId, job({ title: 'A', url: 'https://acme.test/a' }), 5, []);
      const b = store.upsertJob(companyId, job({ title: 'B', url: 'https://acme.test/b' }), 5, []);
      const c = store.upsertJob(companyId, job({ title: 'C', url: 'https://acme.test/c' }), 5, []);
      const d = store.upsertJob(companyId, job({ title: 'D', url: 'https://acme.test/d' }), 5, []);
      store.updateJobStatus(c.id, 'applied');
      store.updateJobStatus(d.id, 'ignored');

      expect(store.markStale(companyId, [a.id])).toBe(1);

      expect(store.getJobById(a.id)?.status).toBe('active');
      expect(store.getJobById(b.id)?.status).toBe('closed');
      expect(store.getJobById(c.id)?.status).toBe('applied');
      expect(store.getJobById(d.id)?.status).toBe('ignored');
      expect(store.markStale(companyId, [])).toBe(1);
    });

    it('does not touch other companies when marking stale', () => {
      const other = store.addCompany({ name: 'Other' }).id;
      const theirs = store.upsertJob(other, job({ title: 'A', url: 'https://other.test/a' }), 5, []);

      store.markStale(companyId, []);
      expect(store.getJobById(theirs.id)?.status).toBe('active');
    });

    it('filters and orders listings', () => {
      const low = store.upsertJob(companyId, job({ title: 'Low', url: 'https://acme.test/low' }), 2, []);
      advance(1);
      const high = store.upsertJob(companyId, job({ title: 'High', url: 'https://acme.test/high' }), 9, []);
      const alsoHigh = store.upsertJob(companyId, job({ title: 'Also High', url: 'https://acme.test/also' }), 9, []);
      store.updateJobStatus(low.id, 'ignored');

      expect(store.getJobs().map(j => j.id)).toEqual([alsoHigh.id, high.id, low.id]);
      expect(store.getJobs({ minRelevance: 5 })).toHaveLength(2);
      expect(store.getJobs({ status: 'ignored' }).map(j => j.id)).toEqual([low.id]);
      expect(store.getJobs({ since: '2026-01-31T12:30:00.000Z' })).toHaveLength(2);
      expect(store.getJobs({ limit: 1 })).toHaveLength(1);
    });

    it('reports unknown ids on status updates', () => {
      expect(store.updateJobStatus('missing', 'applied')).toBe(false);
      expect(store.getJobById('missing')).toBeNull();
    });

    it('reads unparseable stored match reasons as empty', () => {
      const { id } = store.upsertJob(companyId, job({ title: 'A', url: 'https://acme.test/a' }), 5, ['x']);
      store.db.prepare("UPDATE job_listings SET match_reasons = '{oops' WHERE id = ?").run(id);
      expect(store.getJobById(id)?.matchReasons).toEqual([]);
    });
  });

  it('derives identity keys from the URL when there is one', () => {
    expect(jobIdentityKey({ title: 'A', url: 'https://acme.test/a', location: null, department: null })).toBe(
      'https://acme.test/a',
    );
    expect(jobIdentityKey({ title: ' Data Engineer ', url: null, location: 'BERLIN', department: null })).toBe(
      jobIdentityKey({ title: 'data engineer', url: null, location: 'berlin', department: '' }),
    );
  });

  it('rolls back a failed transaction', () => {
    expect(() =>
      store.transaction(() => {
        store.addCompany({ name: 'Doomed' });
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(store.findCompanyByName('Doomed')).toBeNull();
  });

  it('records scan runs', () => {
    const company = store.addCompany({ name: 'Acme' });
    const runId = store.startScanRun(company.id, 'lever');
    advance(1);
    store.completeScanRun(runId, { status: 'completed', jobsFound: 3, jobsNew: 2, jobsStale: 1 });

    expect(store.getScanRuns()).toEqual([
      {
        id: runId,
        companyId: company.id,
        companyName: 'Acme',
        platform: 'lever',
        startedAt: '2026-01-31T12:00:00.000Z',
        completedAt: '2026-01-31T13:00:00.000Z',
        status: 'completed',
        jobsFound: 3,
        jobsNew: 2,
        jobsStale: 1,
        error: null,
      },
    ]);
  });

  it('summarizes the store', () => {
    const company = store.addCompany({ name: 'Acme', tier: 2 });
    store.addCompany({ name: 'Other' });
    store.updateCompanyScore(company.id, 6);
    store.addAiSignal({ companyId: company.id, signalType: 'engineering_blog', title: 'Blog' });
    store.upsertJob(company.id, job({ title: 'A', url: 'https://acme.test/a' }), 8, []);
    const b = store.upsertJob(company.id, job({ title: 'B', url: 'https://acme.test/b' }), 3, []);
    store.updateJobStatus(b.id, 'closed');

    expect(store.getStats()).toEqual({
      companies: 2,
      aiSignals: 1,
      leadershipSignals: 0,
      toolsTracked: 0,
      averageScore: 3,
      byTier: { '2': 1, '4': 1 },
      jobs: { total: 2, active: 1, relevant: 1 },
    });
  });
});
