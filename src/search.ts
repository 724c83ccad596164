import { loadSourcesConfig, type AppConfig } from './config';
import { RunHistory, type SearchKind } from './db';
import { ConfigurationError, errorMessage } from './errors';
import { QueryCatalog } from './queries';
import { aggregate } from './scrapers/aggregator';
import { PlaywrightBrowserPool, type BrowserPool } from './scrapers/browser';
import { RateLimiter, type RatePolicy } from './scrapers/rateLimiter';
import { Orchestrator } from './scrapers/runner';
import type { AggregatedResult, ScrapeOutcome, ScrapeStatus, SearchQuery, SourceConfig, SourceId } from './scrapers/types';

/** Query settings shared by every query of a category or comprehensive search. */
export type SearchDefaults = Omit<SearchQuery, 'text' | 'maxResults'>;

export interface JobSearchServiceDeps {
  orchestrator: Orchestrator;
  catalog: QueryCatalog;
  queriesPerCategory: number;
  history?: RunHistory | null;
}

function combineStatus(a: ScrapeStatus, b: ScrapeStatus): ScrapeStatus {
  if (a === b) return a;
  if (a === 'ok' || a === 'partial' || b === 'ok' || b === 'partial') return 'partial';
  return 'error';
}

/**
 * Fold one source's outcomes from consecutive queries into a single outcome.
 */
export function combineOutcomes(a: ScrapeOutcome, b: ScrapeOutcome): ScrapeOutcome {
  const errors = [...new Set([a.error, b.error].filter((error): error is string => Boolean(error)))];
  return {
    source: a.source,
    status: combineStatus(a.status, b.status),
    listings: [...a.listings, ...b.listings],
    rawCount: a.rawCount + b.rawCount,
    filteredCount: a.filteredCount + b.filteredCount,
    attempts: a.attempts + b.attempts,
    requests: a.requests + b.requests,
    durationMs: a.durationMs + b.durationMs,
    ...(errors.length > 0 ? { error: errors.join('; ') } : {}),
  };
}

export class JobSearchService {
  private readonly orchestrator: Orchestrator;
  private readonly history: RunHistory | null;
  readonly catalog: QueryCatalog;
  readonly queriesPerCategory: number;

  constructor(deps: JobSearchServiceDeps) {
    this.orchestrator = deps.orchestrator;
    this.catalog = deps.catalog;
    this.queriesPerCategory = deps.queriesPerCategory;
    this.history = deps.history ?? null;
  }

  get sources(): readonly SourceConfig[] {
    return this.orchestrator.sourceConfigs;
  }

  async search(query: SearchQuery): Promise<AggregatedResult> {
    return this.runQueries('query', query.text, [query]);
  }

  /** Several explicit queries in one search; results are merged as one report. */
  async searchMany(
    texts: readonly string[],
    defaults: SearchDefaults = { location: '' },
    maxResults?: number,
  ): Promise<AggregatedResult> {
    if (texts.length === 0) {
      throw new ConfigurationError('No queries given');
    }
    return this.runQueries(
      'query',
      texts.join(' | '),
      texts.map(text => ({ ...defaults, text, ...(maxResults !== undefined ? { maxResults } : {}) })),
    );
  }

  /**
   * Run the first `queriesPerCategory` queries of a category, keeping at most
   * `maxJobsPerQuery` accepted listings per source and query.
   */
  async searchCategory(
    categoryName: string,
    maxJobsPerQuery: number,
    defaults: SearchDefaults = { location: '' },
  ): Promise<AggregatedResult> {
    const category = this.catalog.resolve(categoryName);
    const queries = category.queries
      .slice(0, this.queriesPerCategory)
      .map(text => ({ ...defaults, text, maxResults: maxJobsPerQuery }));
    return this.runQueries('category', category.slug, queries);
  }

  /** One query (the first) from every category. */
  async searchComprehensive(
    maxJobsPerCategory: number,
    defaults: SearchDefaults = { location: '' },
  ): Promise<AggregatedResult> {
    const queries = this.catalog
      .list()
      .map(category => ({ ...defaults, text: category.queries[0], maxResults: maxJobsPerCategory }));
    return this.runQueries('comprehensive', 'all categories', queries);
  }

  /**
   * Queries run one after another. A source that was blocked by an earlier query
   * is not dispatched again in the same search.
   */
  private async runQueries(kind: SearchKind, label: string, queries: SearchQuery[]): Promise<AggregatedResult> {
    const startedAt = new Date();
    const perSource = new Map<SourceId, ScrapeOutcome>();
    const blocked = new Set<SourceId>();

    for (const [index, query] of queries.entries()) {
      if (queries.length > 1) {
        console.log(`\n[Search] Query ${index + 1}/${queries.length}: "${query.text}"`);
      }
      const outcomes = await this.orchestrator.run(query, { skipSources: blocked });
      for (const outcome of outcomes) {
        if (outcome.status === 'blocked') blocked.add(outcome.source);
        const previous = perSource.get(outcome.source);
        perSource.set(outcome.source, previous ? combineOutcomes(previous, outcome) : outcome);
      }
    }

    const result = aggregate([...perSource.values()], {
      priorities: this.orchestrator.priorities(),
      queries: queries.map(query => query.text),
      durationMs: Date.now() - startedAt.getTime(),
    });

    console.log(
      `[Search] ${result.listings.length} listings from ${result.totalRaw} raw ` +
        `(${result.duplicatesRemoved} duplicates removed) in ${(result.durationMs / 1000).toFixed(1)}s`,
    );

    if (this.history) {
      try {
        this.history.record(kind, label, result, startedAt);
      } catch (error) {
        console.error('[Search] Failed to record run history:', errorMessage(error));
      }
    }
    return result;
  }
}

export interface SearchRuntime {
  service: JobSearchService;
  browser: BrowserPool;
  history: RunHistory | null;
  close(): Promise<void>;
}

export function ratePolicies(sources: readonly SourceConfig[]): Record<string, RatePolicy> {
  return Object.fromEntries(
    sources.map(source => [
      source.id,
      { minDelayMs: source.minDelayMs, maxDelayMs: source.maxDelayMs, maxRequests: source.maxRequestsPerSession },
    ]),
  );
}

/**
 * Wire the service to its real collaborators: Playwright, the rate limiter built
 * from the source settings and, when enabled, SQLite run history.
 */
export function createSearchRuntime(config: AppConfig): SearchRuntime {
  const sources = loadSourcesConfig(config.sourcesPath);
  const catalog = QueryCatalog.fromFile(config.querySetsPath);
  const browser = new PlaywrightBrowserPool(config.browser);
  const limiter = new RateLimiter(ratePolicies(sources));
  const orchestrator = new Orchestrator(sources, { browser, limiter, options: config.orchestrator });
  const history = config.recordRuns ? RunHistory.open(config.databasePath) : null;

  return {
    service: new JobSearchService({ orchestrator, catalog, queriesPerCategory: config.queriesPerCategory, history }),
    browser,
    history,
    async close() {
      await browser.close();
      history?.close();
    },
  };
}
