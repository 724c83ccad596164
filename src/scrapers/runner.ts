import {
  BlockedError,
  ConfigurationError,
  NetworkError,
  RateBudgetExhaustedError,
  ScrapeCancelledError,
  SearchInProgressError,
  errorMessage,
} from '../errors';
import type { BrowserPool } from './browser';
import { summarizeRejections, type FilterVerdict } from './filters';
import { glassdoorAdapter } from './glassdoor';
import { indeedAdapter } from './indeed';
import { linkedInAdapter } from './linkedin';
import { delay, type RateLimiter } from './rateLimiter';
import { remoteOkAdapter } from './remoteok';
import type {
  AcceptedListing,
  AdapterFactory,
  ScrapeOutcome,
  ScrapeStatus,
  SearchQuery,
  SourceAdapter,
  SourceConfig,
  SourceId,
} from './types';
import { wellfoundAdapter } from './wellfound';
import { zipRecruiterAdapter } from './ziprecruiter';

export const adapters: Record<SourceId, AdapterFactory> = {
  ziprecruiter: zipRecruiterAdapter,
  indeed: indeedAdapter,
  linkedin: linkedInAdapter,
  glassdoor: glassdoorAdapter,
  wellfound: wellfoundAdapter,
  remoteok: remoteOkAdapter,
};

export type RunState = 'idle' | 'dispatching' | 'collecting' | 'done';

export interface OrchestratorOptions {
  maxConcurrentSources: number;
  runTimeoutMs: number;
  /** Extra attempts after a NetworkError. */
  networkRetries: number;
  /** Backoff before retry n is retryBackoffMs * 2^(n-1). */
  retryBackoffMs: number;
  /** How long cancelled tasks get to unwind after the run timeout. */
  cancelGraceMs: number;
}

export interface OrchestratorDeps {
  browser: BrowserPool;
  limiter: RateLimiter;
  options: OrchestratorOptions;
  /** Defaults to the shipped site adapters. */
  registry?: Partial<Record<SourceId, AdapterFactory>>;
}

export interface RunOptions {
  /** Sources not to dispatch this run; they are reported as blocked. */
  skipSources?: ReadonlySet<SourceId>;
}

interface Tally {
  listings: AcceptedListing[];
  rawCount: number;
  filteredCount: number;
  attempts: number;
  startedAt: number;
}

async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([work.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one query against every selected source concurrently and collects a
 * ScrapeOutcome per source.
 *
 * A source's failure is recorded in its own outcome and never cancels the
 * others. Only the run timeout cancels anything, and then every task still
 * running is aborted through a shared signal.
 */
export class Orchestrator {
  private currentState: RunState = 'idle';
  private readonly sources: readonly SourceConfig[];
  private readonly instances = new Map<SourceId, SourceAdapter>();
  private readonly browser: BrowserPool;
  private readonly limiter: RateLimiter;
  private readonly options: OrchestratorOptions;

  constructor(sources: readonly SourceConfig[], deps: OrchestratorDeps) {
    this.sources = sources;
    this.browser = deps.browser;
    this.limiter = deps.limiter;
    this.options = deps.options;

    const registry = deps.registry ?? adapters;
    for (const config of sources) {
      const factory = registry[config.id];
      if (factory) this.instances.set(config.id, factory(config));
    }
  }

  get state(): RunState {
    return this.currentState;
  }

  get sourceConfigs(): readonly SourceConfig[] {
    return this.sources;
  }

  priorities(): Partial<Record<SourceId, number>> {
    const priorities: Partial<Record<SourceId, number>> = {};
    for (const config of this.sources) priorities[config.id] = config.priority;
    return priorities;
  }

  /**
   * Sources a query runs against, in configuration order. An explicit list may
   * name a disabled source; an empty one means every enabled source.
   */
  selectSources(query: SearchQuery): SourceAdapter[] {
    const configured = new Set(this.sources.map(config => config.id));
    const requested = query.sources ?? [];

    const unknown = requested.filter(id => !configured.has(id));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown sources: ${unknown.join(', ')}`);
    }

    const chosen = this.sources.filter(config =>
      requested.length > 0 ? requested.includes(config.id) : config.enabled,
    );
    if (chosen.length === 0) {
      throw new ConfigurationError('No enabled sources to search');
    }

    return chosen.map(config => {
      const adapter = this.instances.get(config.id);
      if (!adapter) throw new ConfigurationError(`No adapter registered for source: ${config.id}`);
      return adapter;
    });
  }

  async run(query: SearchQuery, { skipSources }: RunOptions = {}): Promise<ScrapeOutcome[]> {
    if (this.currentState === 'dispatching' || this.currentState === 'collecting') {
      throw new SearchInProgressError();
    }
    validateQuery(query);
    const selected = this.selectSources(query);

    this.limiter.reset();
    this.currentState = 'dispatching';

    const controller = new AbortController();
    const tallies = new Map<SourceId, Tally>();
    const finished = new Map<SourceId, ScrapeOutcome>();
    const queue = selected.filter(adapter => !skipSources?.has(adapter.id));

    console.log(
      `[Runner] Searching "${query.text}" in ${query.location || 'any location'} on ${queue.length} sources`,
    );

    const worker = async (): Promise<void> => {
      for (let adapter = queue.shift(); adapter; adapter = queue.shift()) {
        if (controller.signal.aborted) return;
        const tally: Tally = { listings: [], rawCount: 0, filteredCount: 0, attempts: 0, startedAt: Date.now() };
        tallies.set(adapter.id, tally);
        finished.set(adapter.id, await this.runSource(adapter, query, controller.signal, tally));
      }
    };

    const workerCount = Math.min(Math.max(1, this.options.maxConcurrentSources), queue.length);
    const all = Promise.all(Array.from({ length: workerCount }, worker));

    const completed = await settlesWithin(all, this.options.runTimeoutMs);
    this.currentState = 'collecting';

    if (!completed) {
      const running = [...tallies.keys()].filter(id => !finished.has(id));
      console.warn(
        `[Runner] Run timeout after ${this.options.runTimeoutMs}ms; cancelling ${running.join(', ') || 'nothing'}`,
      );
      controller.abort();
      await settlesWithin(all, this.options.cancelGraceMs);
    }

    const outcomes = selected.map(adapter => {
      const outcome = finished.get(adapter.id);
      if (outcome) return outcome;

      if (skipSources?.has(adapter.id)) {
        return this.outcome(adapter.id, 'blocked', emptyTally(), 'skipped: blocked earlier in this search');
      }
      const tally = tallies.get(adapter.id);
      if (tally) {
        return this.outcome(adapter.id, 'partial', tally, 'cancelled by run timeout');
      }
      return this.outcome(adapter.id, 'partial', emptyTally(), 'not started before run timeout');
    });

    this.currentState = 'done';
    return outcomes;
  }

  private async runSource(
    adapter: SourceAdapter,
    query: SearchQuery,
    signal: AbortSignal,
    tally: Tally,
  ): Promise<ScrapeOutcome> {
    const filter = adapter.qualityFilter(query.mode ?? 'general');
    const maxPages = query.maxPages ?? adapter.config.maxPages;
    const context = { browser: this.browser, limiter: this.limiter, signal };

    console.log(`[Runner] Starting ${adapter.id}...`);

    for (let attempt = 1; ; attempt++) {
      // A retry starts over; nothing from a failed attempt is kept
      tally.attempts = attempt;
      tally.listings = [];
      tally.rawCount = 0;
      tally.filteredCount = 0;
      const verdicts: FilterVerdict[] = [];

      try {
        for await (const listing of adapter.fetchRaw(query, maxPages, context)) {
          if (signal.aborted) break;
          tally.rawCount++;
          const verdict = filter.evaluate(listing);
          verdicts.push(verdict);
          if (verdict.accepted) {
            tally.listings.push(Object.freeze({ ...listing, qualityScore: verdict.score }));
          } else {
            tally.filteredCount++;
          }
          if (query.maxResults !== undefined && tally.listings.length >= query.maxResults) break;
        }

        logRejections(adapter.id, verdicts);
        if (signal.aborted) {
          return this.outcome(adapter.id, 'partial', tally, 'cancelled by run timeout');
        }
        return this.outcome(adapter.id, 'ok', tally);
      } catch (error) {
        if (error instanceof ScrapeCancelledError || signal.aborted) {
          return this.outcome(adapter.id, 'partial', tally, 'cancelled by run timeout');
        }
        if (error instanceof RateBudgetExhaustedError) {
          logRejections(adapter.id, verdicts);
          return this.outcome(adapter.id, 'partial', tally, error.message);
        }
        if (error instanceof BlockedError) {
          return this.outcome(adapter.id, 'blocked', tally, error.message);
        }
        if (error instanceof NetworkError && attempt <= this.options.networkRetries) {
          const backoff = this.options.retryBackoffMs * 2 ** (attempt - 1);
          console.warn(`[Runner] ${adapter.id} attempt ${attempt} failed (${error.message}); retrying in ${backoff}ms`);
          try {
            await delay(backoff, signal);
          } catch (cancelled) {
            return this.outcome(adapter.id, 'partial', tally, errorMessage(cancelled));
          }
          continue;
        }
        return this.outcome(adapter.id, 'error', tally, errorMessage(error));
      }
    }
  }

  private outcome(source: SourceId, status: ScrapeStatus, tally: Tally, error?: string): ScrapeOutcome {
    const outcome: ScrapeOutcome = {
      source,
      status,
      listings: [...tally.listings],
      rawCount: tally.rawCount,
      filteredCount: tally.filteredCount,
      attempts: tally.attempts,
      requests: this.limiter.used(source),
      durationMs: tally.attempts > 0 ? Date.now() - tally.startedAt : 0,
      ...(error ? { error } : {}),
    };

    const counts = `${outcome.rawCount} raw, ${outcome.listings.length} accepted, ${outcome.filteredCount} filtered`;
    if (status === 'ok') {
      console.log(`[Runner] ${source} complete: ${counts}`);
    } else {
      console.error(`[Runner] ${source} ${status}: ${error ?? 'no detail'} (${counts})`);
    }
    return outcome;
  }
}

function emptyTally(): Tally {
  return { listings: [], rawCount: 0, filteredCount: 0, attempts: 0, startedAt: Date.now() };
}

function validateQuery(query: SearchQuery): void {
  if (!query.text.trim()) {
    throw new ConfigurationError('Search query text is empty');
  }
  if (query.maxPages !== undefined && (!Number.isInteger(query.maxPages) || query.maxPages < 1)) {
    throw new ConfigurationError(`maxPages must be a positive integer, got ${query.maxPages}`);
  }
  if (query.maxResults !== undefined && (!Number.isInteger(query.maxResults) || query.maxResults < 1)) {
    throw new ConfigurationError(`maxResults must be a positive integer, got ${query.maxResults}`);
  }
}

function logRejections(source: SourceId, verdicts: FilterVerdict[]): void {
  const top = summarizeRejections(verdicts).slice(0, 3);
  if (top.length === 0) return;
  console.log(`[Runner] ${source} rejections: ${top.map(([reason, count]) => `${reason} (${count})`).join('; ')}`);
}
