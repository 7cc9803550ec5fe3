import { afterEach, describe, expect, it, vi } from 'vitest';
import { LeverAdapter } from './lever';
import { CompanyDescriptor } from './types';

const linear: CompanyDescriptor = {
  id: 'c1',
  name: 'Linear',
  domain: 'linear.app',
  careersUrl: null,
  careersPlatform: 'lever',
  boardToken: null,
};

describe('LeverAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('derives the slug from the domain and normalizes postings', async () => {
    const fetchMock = vi.fn(async () =>
      new Response(
        JSON.stringify([
          {
            id: 'abc',
            text: 'Analytics Engineer',
            hostedUrl: 'https://jobs.lever.co/linear/abc',
            createdAt: Date.UTC(2026, 0, 5, 23, 0),
            descriptionPlain: '  SQL and dbt ',
            categories: { location: 'San Francisco', team: 'Data' },
          },
          {
            id: 'def',
            text: 'Data Analyst',
            hostedUrl: '',
            applyUrl: 'https://jobs.lever.co/linear/def/apply',
          },
          { id: 'ghi' },
        ]),
        { status: 200 },
      ),
    );
    vi.stubGlobal('fetch', fetchMock);

    const jobs = await new LeverAdapter().fetchJobs(linear);

    expect(fetchMock).toHaveBeenCalledWith('https://api.lever.co/v0/postings/linear?mode=json', expect.anything());
    expect(jobs).toEqual([
      {
        title: 'Analytics Engineer',
        url: 'https://jobs.lever.co/linear/abc',
        location: 'San Francisco',
        department: 'Data',
        description: 'SQL and dbt',
        datePosted: '2026-01-05',
      },
      {
        title: 'Data Analyst',
        url: 'https://jobs.lever.co/linear/def/apply',
        location: null,
        department: null,
        description: null,
        datePosted: null,
      },
    ]);
  });

  it('drops a creation time outside the date range', async () => {
    vi.stubGlobal('fetch', vi.fn(async () =>
      new Response(
        JSON.stringify([
          { id: 'a', text: 'Data Engineer', createdAt: Date.UTC(2026, 1, 2) },
          { id: 'b', text: 'Data Analyst', createdAt: 1e20 },
        ]),
        { status: 200 },
      ),
    ));

    const jobs = await new LeverAdapter().fetchJobs(linear);

    expect(jobs.map(job => [job.title, job.datePosted])).toEqual([
      ['Data Engineer', '2026-02-02'],
      ['Data Analyst', null],
    ]);
  });

  it('prefers an explicit board token', async () => {
    const fetchMock = vi.fn(async () => new Response('[]', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new LeverAdapter().fetchJobs({ ...linear, boardToken: 'linear-app' });

    expect(fetchMock).toHaveBeenCalledWith('https://api.lever.co/v0/postings/linear-app?mode=json', expect.anything());
  });

  it('returns nothing when the response is not a list', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"ok":false}', { status: 200 })));
    await expect(new LeverAdapter().fetchJobs(linear)).resolves.toEqual([]);
  });
});
