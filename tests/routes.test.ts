import type { Server } from 'http';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createApp } from '../src/app';
import { QueryCatalog } from '../src/queries';
import { RateLimiter, delay } from '../src/scrapers/rateLimiter';
import { Orchestrator } from '../src/scrapers/runner';
import { JobSearchService, ratePolicies } from '../src/search';
import { goodJob, scripted } from './helpers/adapters';
import { FakeBrowserPool } from './helpers/fakeBrowser';
import { sourceConfig } from './helpers/listings';

const configs = [sourceConfig('indeed')];

const service = new JobSearchService({
  orchestrator: new Orchestrator(configs, {
    browser: new FakeBrowserPool(),
    limiter: new RateLimiter(ratePolicies(configs)),
    options: { maxConcurrentSources: 1, runTimeoutMs: 5000, networkRetries: 0, retryBackoffMs: 1, cancelGraceMs: 100 },
    registry: {
      indeed: scripted(async function* (_context, call) {
        await delay(30);
        yield goodJob('indeed', call);
      }),
    },
  }),
  catalog: new QueryCatalog([
    { slug: 'core-llm', name: 'Core LLM', description: 'LLM roles', queries: ['LLM engineer'] },
  ]),
  queriesPerCategory: 2,
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createApp(service).listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('search API', () => {
  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', service: 'jobsweep' });
  });

  it('lists categories and sources', async () => {
    const categories = await (await fetch(`${baseUrl}/api/categories`)).json();
    expect(categories).toEqual({
      success: true,
      categories: [{ slug: 'core-llm', name: 'Core LLM', description: 'LLM roles', queries: ['LLM engineer'] }],
    });

    const sources = await (await fetch(`${baseUrl}/api/sources`)).json();
    expect(sources).toEqual({
      success: true,
      sources: [{ id: 'indeed', enabled: true, priority: 1, maxPages: 2, health: null }],
    });
  });

  it('runs a search', async () => {
    const res = await post('/api/search', { query: 'LLM engineer', location: 'Remote', maxResults: 5 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      result: { queries: ['LLM engineer'], listings: [{ rank: 1, source: 'indeed' }] },
    });
  });

  it('rejects malformed requests', async () => {
    const missing = await post('/api/search', { location: 'Remote' });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ success: false, error: 'Invalid request' });

    const unknownSource = await post('/api/search', { query: 'LLM engineer', sources: ['monster'] });
    expect(unknownSource.status).toBe(400);

    const limit = await fetch(`${baseUrl}/api/runs?limit=0`);
    expect(limit.status).toBe(400);
  });

  it('reports configuration problems as bad requests', async () => {
    const res = await post('/api/search/category', { category: 'devops' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Unknown query category: devops. Available: core-llm',
    });
  });

  it('runs category and comprehensive searches', async () => {
    const category = await post('/api/search/category', { category: 'core-llm', maxJobsPerQuery: 2 });
    expect(category.status).toBe(200);
    expect(await category.json()).toMatchObject({ success: true, result: { queries: ['LLM engineer'] } });

    const comprehensive = await post('/api/search/comprehensive', {});
    expect(comprehensive.status).toBe(200);
    expect(await comprehensive.json()).toMatchObject({ result: { listings: [{ rank: 1 }] } });
  });

  it('refuses a search while another is running', async () => {
    const responses = await Promise.all([
      post('/api/search', { query: 'LLM engineer' }),
      post('/api/search', { query: 'RAG engineer' }),
    ]);
    expect(responses.map(res => res.status).sort()).toEqual([200, 409]);
  });

  it('reports that runs are not being recorded', async () => {
    const res = await fetch(`${baseUrl}/api/runs`);
    expect(await res.json()).toEqual({ success: true, recording: false, runs: [] });
  });
});
