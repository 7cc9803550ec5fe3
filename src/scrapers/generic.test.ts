import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchFailureError } from '../errors';
import { extractJobLinks, extractJsonLdJobs, GenericHeuristicAdapter } from './generic';
import { CompanyDescriptor } from './types';

const BASE = 'https://example.com/careers';

const company: CompanyDescriptor = {
  id: 'c1',
  name: 'Example',
  domain: 'example.com',
  careersUrl: BASE,
  careersPlatform: 'custom',
  boardToken: null,
};

const jsonLdPage = `
<html><head>
<script type="application/ld+json">
{"@context":"https://schema.org","@graph":[
  {"@type":"Organization","name":"Example"},
  {"@type":"JobPosting","title":"Data Scientist","url":"/careers/data-scientist",
   "datePosted":"2026-01-03","description":"<p>Python &amp; SQL</p>",
   "employmentUnit":{"name":"Analytics"},
   "jobLocation":{"@type":"Place","address":{"addressLocality":"Austin","addressRegion":"TX"}}}
]}
</script>
</head><body><a href="/jobs/ignored-link">Ignored Link</a></body></html>`;

const linkPage = `
<ul>
  <li><a href="/jobs/123-data-engineer">Data Engineer</a></li>
  <li><a class="dup" href="/jobs/123-data-engineer">Data Engineer</a></li>
  <li><a href="/jobs/apply-now">Apply now</a></li>
  <li><a href="/about">About us</a></li>
  <li><a href="https://example.com/careers/ml-lead"><span>ML</span> Lead</a></li>
  <li><a href="/roles/x">AI</a></li>
</ul>`;

describe('extractJsonLdJobs', () => {
  it('reads JobPosting nodes from @graph containers', () => {
    expect(extractJsonLdJobs(jsonLdPage, BASE)).toEqual([
      {
        title: 'Data Scientist',
        url: 'https://example.com/careers/data-scientist',
        location: 'Austin, TX',
        department: 'Analytics',
        description: 'Python & SQL',
        datePosted: '2026-01-03',
      },
    ]);
  });

  it('reads ItemList entries and string addresses', () => {
    const html = `<script type='application/ld+json'>
      {"@type":"ItemList","itemListElement":[
        {"@type":"ListItem","item":{"@type":"JobPosting","title":"Analyst","jobLocation":[{"address":"Remote"}]}}
      ]}</script>`;
    expect(extractJsonLdJobs(html, BASE)).toEqual([
      { title: 'Analyst', url: null, location: 'Remote', department: null, description: null, datePosted: null },
    ]);
  });

  it('skips malformed blocks', () => {
    const html = '<script type="application/ld+json">{ nope</script>';
    expect(extractJsonLdJobs(html, BASE)).toEqual([]);
  });
});

describe('extractJobLinks', () => {
  it('keeps out-of-range character references in link text', () => {
    const html = '<a href="/jobs/9">X &#9999999; Y</a>';
    expect(extractJobLinks(html, BASE).map(job => job.title)).toEqual(['X &#9999999; Y']);
  });

  it('keeps de-duplicated posting links with plausible titles', () => {
    expect(extractJobLinks(linkPage, BASE)).toEqual([
      {
        title: 'Data Engineer',
        url: 'https://example.com/jobs/123-data-engineer',
        location: null,
        department: null,
        description: null,
        datePosted: null,
      },
      {
        title: 'ML Lead',
        url: 'https://example.com/careers/ml-lead',
        location: null,
        department: null,
        description: null,
        datePosted: null,
      },
    ]);
  });
});

describe('GenericHeuristicAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('prefers structured data over links', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(jsonLdPage, { status: 200 })));
    const jobs = await new GenericHeuristicAdapter().fetchJobs(company);
    expect(jobs.map(j => j.title)).toEqual(['Data Scientist']);
  });

  it('falls back to job links', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(linkPage, { status: 200 })));
    const jobs = await new GenericHeuristicAdapter().fetchJobs(company);
    expect(jobs.map(j => j.title)).toEqual(['Data Engineer', 'ML Lead']);
  });

  it('returns nothing without a careers URL', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    await expect(new GenericHeuristicAdapter().fetchJobs({ ...company, careersUrl: null })).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reports fetch failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('down', { status: 503 })));
    await expect(new GenericHeuristicAdapter().fetchJobs(company)).rejects.toThrow(FetchFailureError);
  });
});
