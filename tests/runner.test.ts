import { describe, it, expect } from 'vitest';
import {
  BlockedError,
  ConfigurationError,
  NetworkError,
  ParseError,
  RateBudgetExhaustedError,
  SearchInProgressError,
} from '../src/errors';
import { RateLimiter, delay } from '../src/scrapers/rateLimiter';
import { Orchestrator, type OrchestratorOptions } from '../src/scrapers/runner';
import { isSourceId, type AdapterFactory, type SearchQuery, type SourceConfig, type SourceId } from '../src/scrapers/types';
import { ratePolicies } from '../src/search';
import { badJob, goodJob, jobs, scripted } from './helpers/adapters';
import { FakeBrowserPool } from './helpers/fakeBrowser';
import { sourceConfig } from './helpers/listings';

const OPTIONS: OrchestratorOptions = {
  maxConcurrentSources: 3,
  runTimeoutMs: 5000,
  networkRetries: 2,
  retryBackoffMs: 1,
  cancelGraceMs: 500,
};

const QUERY: SearchQuery = { text: 'LLM engineer', location: 'Houston, TX' };

function orchestrator(
  registry: Partial<Record<SourceId, AdapterFactory>>,
  options: Partial<OrchestratorOptions> = {},
  configs: SourceConfig[] = Object.keys(registry)
    .filter(isSourceId)
    .map((id, index) => sourceConfig(id, { priority: index + 1 })),
  limiter = new RateLimiter(ratePolicies(configs)),
): Orchestrator {
  return new Orchestrator(configs, {
    browser: new FakeBrowserPool(),
    limiter,
    options: { ...OPTIONS, ...options },
    registry,
  });
}

describe('Orchestrator', () => {
  it('returns the listings of healthy sources when another is blocked', async () => {
    const runner = orchestrator({
      ziprecruiter: scripted(async function* () {
        throw new BlockedError('ziprecruiter', 'HTTP 403 on https://www.ziprecruiter.com/jobs-search');
      }),
      indeed: scripted(() => jobs(goodJob('indeed', 1), badJob('indeed', 2), goodJob('indeed', 3))),
    });

    const [zip, indeed] = await runner.run(QUERY);

    expect(zip.source).toBe('ziprecruiter');
    expect(zip.status).toBe('blocked');
    expect(zip.error).toBe(
      'ziprecruiter blocked automated access: HTTP 403 on https://www.ziprecruiter.com/jobs-search',
    );
    expect(zip.listings).toEqual([]);

    expect(indeed.status).toBe('ok');
    expect(indeed.rawCount).toBe(3);
    expect(indeed.filteredCount).toBe(1);
    expect(indeed.listings.map(item => item.url)).toEqual([
      'https://indeed.example.com/jobs/1',
      'https://indeed.example.com/jobs/3',
    ]);
    expect(indeed.listings[0].qualityScore).toBe(0.7);
    expect(indeed.error).toBeUndefined();
  });

  it('retries network failures from the first page and drops the failed attempt', async () => {
    const runner = orchestrator({
      indeed: scripted(async function* (_context, call) {
        if (call === 1) {
          yield goodJob('indeed', 'stale');
          throw new NetworkError('indeed', 'net::ERR_CONNECTION_RESET');
        }
        yield goodJob('indeed', 1);
        yield goodJob('indeed', 2);
      }),
    });

    const [outcome] = await runner.run(QUERY);
    expect(outcome.status).toBe('ok');
    expect(outcome.attempts).toBe(2);
    expect(outcome.rawCount).toBe(2);
    expect(outcome.listings.map(item => item.url)).toEqual([
      'https://indeed.example.com/jobs/1',
      'https://indeed.example.com/jobs/2',
    ]);
  });

  it('records an error once retries run out', async () => {
    const runner = orchestrator({
      indeed: scripted(async function* () {
        throw new NetworkError('indeed', 'timeout');
      }),
    });

    const [outcome] = await runner.run(QUERY);
    expect(outcome.status).toBe('error');
    expect(outcome.attempts).toBe(3);
    expect(outcome.error).toBe('indeed network failure: timeout');
  });

  it('does not retry parse failures', async () => {
    const runner = orchestrator({
      linkedin: scripted(async function* () {
        throw new ParseError('linkedin', 'no titles');
      }),
    });

    const [outcome] = await runner.run(QUERY);
    expect(outcome.status).toBe('error');
    expect(outcome.attempts).toBe(1);
  });

  it('keeps what was accepted when the request budget runs out', async () => {
    const runner = orchestrator({
      glassdoor: scripted(async function* () {
        yield goodJob('glassdoor', 1);
        throw new RateBudgetExhaustedError('glassdoor', 12);
      }),
    });

    const [outcome] = await runner.run(QUERY);
    expect(outcome.status).toBe('partial');
    expect(outcome.listings).toHaveLength(1);
    expect(outcome.error).toBe('glassdoor request budget of 12 exhausted for this session');
  });

  it('stops consuming a source at maxResults', async () => {
    let closed = false;
    const runner = orchestrator({
      remoteok: scripted(async function* () {
        try {
          for (let i = 1; i <= 5; i++) yield goodJob('remoteok', i);
        } finally {
          closed = true;
        }
      }),
    });

    const [outcome] = await runner.run({ ...QUERY, maxResults: 2 });
    expect(outcome.listings).toHaveLength(2);
    expect(outcome.rawCount).toBe(2);
    expect(closed).toBe(true);
  });

  it('lists outcomes in configuration order whatever the completion order', async () => {
    const runner = orchestrator({
      ziprecruiter: scripted(async function* () {
        await delay(30);
        yield goodJob('ziprecruiter', 1);
      }),
      indeed: scripted(() => jobs(goodJob('indeed', 1))),
    });

    const outcomes = await runner.run(QUERY);
    expect(outcomes.map(outcome => outcome.source)).toEqual(['ziprecruiter', 'indeed']);
  });

  it('never runs more sources at once than allowed', async () => {
    let active = 0;
    let peak = 0;
    const slow = scripted(async function* () {
      active++;
      peak = Math.max(peak, active);
      await delay(10);
      active--;
      yield goodJob('indeed', 1);
    });

    const runner = orchestrator(
      { ziprecruiter: slow, indeed: slow, linkedin: slow, glassdoor: slow },
      { maxConcurrentSources: 2 },
    );
    const outcomes = await runner.run(QUERY);

    expect(peak).toBe(2);
    expect(outcomes.every(outcome => outcome.status === 'ok')).toBe(true);
  });

  it('cancels running sources at the timeout and reports sources that never started', async () => {
    let sawAbort = false;
    const runner = orchestrator(
      {
        indeed: scripted(() => jobs(goodJob('indeed', 1))),
        ziprecruiter: scripted(async function* (context) {
          yield goodJob('ziprecruiter', 1);
          try {
            await delay(10_000, context.signal);
          } finally {
            sawAbort = context.signal.aborted;
          }
          yield goodJob('ziprecruiter', 2);
        }),
        linkedin: scripted(() => jobs(goodJob('linkedin', 1))),
      },
      { maxConcurrentSources: 1, runTimeoutMs: 50, cancelGraceMs: 1000 },
    );

    const [indeed, zip, linkedin] = await runner.run(QUERY);

    expect(indeed.status).toBe('ok');
    expect(zip.status).toBe('partial');
    expect(zip.error).toBe('cancelled by run timeout');
    expect(zip.listings.map(item => item.url)).toEqual(['https://ziprecruiter.example.com/jobs/1']);
    expect(sawAbort).toBe(true);
    expect(linkedin.status).toBe('partial');
    expect(linkedin.error).toBe('not started before run timeout');
    expect(linkedin.attempts).toBe(0);
    expect(runner.state).toBe('done');
  });

  it('reports skipped sources as blocked without dispatching them', async () => {
    let called = false;
    const runner = orchestrator({
      ziprecruiter: scripted(() => {
        called = true;
        return jobs();
      }),
      indeed: scripted(() => jobs(goodJob('indeed', 1))),
    });

    const [zip, indeed] = await runner.run(QUERY, { skipSources: new Set<SourceId>(['ziprecruiter']) });
    expect(called).toBe(false);
    expect(zip.status).toBe('blocked');
    expect(zip.error).toBe('skipped: blocked earlier in this search');
    expect(zip.attempts).toBe(0);
    expect(indeed.status).toBe('ok');
  });

  it('resets request budgets at the start of every run', async () => {
    const configs = [sourceConfig('indeed', { maxRequestsPerSession: 2 })];
    const runner = orchestrator(
      {
        indeed: scripted(async function* (context) {
          await context.limiter.acquire('indeed', context.signal);
          await context.limiter.acquire('indeed', context.signal);
          yield goodJob('indeed', 1);
        }),
      },
      {},
      configs,
    );

    const [first] = await runner.run(QUERY);
    const [second] = await runner.run(QUERY);
    expect(first.status).toBe('ok');
    expect(second.status).toBe('ok');
    expect(second.requests).toBe(2);
  });

  it('moves through dispatching to done', async () => {
    let during: string | undefined;
    const runner: Orchestrator = orchestrator({
      indeed: scripted(async function* () {
        during = runner.state;
        yield goodJob('indeed', 1);
      }),
    });

    expect(runner.state).toBe('idle');
    await runner.run(QUERY);
    expect(during).toBe('dispatching');
    expect(runner.state).toBe('done');
  });

  it('refuses a second run while one is in progress', async () => {
    const runner = orchestrator({
      indeed: scripted(async function* () {
        await delay(20);
        yield goodJob('indeed', 1);
      }),
    });

    const first = runner.run(QUERY);
    await expect(runner.run(QUERY)).rejects.toBeInstanceOf(SearchInProgressError);
    await first;
  });

  describe('configuration errors', () => {
    const indeedOnly = { indeed: scripted(() => jobs()) };

    it('rejects a run with no enabled sources', async () => {
      const runner = orchestrator(indeedOnly, {}, [sourceConfig('indeed', { enabled: false })]);
      await expect(runner.run(QUERY)).rejects.toBeInstanceOf(ConfigurationError);
      expect(runner.state).toBe('idle');
    });

    it('rejects sources that are not configured', async () => {
      const runner = orchestrator(indeedOnly);
      await expect(runner.run({ ...QUERY, sources: ['linkedin'] })).rejects.toThrow('Unknown sources: linkedin');
    });

    it('rejects configured sources without an adapter', async () => {
      const runner = orchestrator(indeedOnly, {}, [sourceConfig('indeed'), sourceConfig('wellfound')]);
      await expect(runner.run({ ...QUERY, sources: ['wellfound'] })).rejects.toThrow(
        'No adapter registered for source: wellfound',
      );
    });

    it('rejects an empty query', async () => {
      const runner = orchestrator(indeedOnly);
      await expect(runner.run({ ...QUERY, text: '  ' })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('runs an explicitly requested disabled source', async () => {
      const runner = orchestrator(
        { wellfound: scripted(() => jobs(goodJob('wellfound', 1))) },
        {},
        [sourceConfig('wellfound', { enabled: false })],
      );
      const [outcome] = await runner.run({ ...QUERY, sources: ['wellfound'] });
      expect(outcome.status).toBe('ok');
    });
  });
});
