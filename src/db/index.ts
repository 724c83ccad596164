import type Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AggregatedResult, ScrapeStatus } from '../scrapers/types';
import { initializeDatabase } from './schema';

export type SearchKind = 'query' | 'category' | 'comprehensive';

export interface ScrapeRunRow {
  source: string;
  status: ScrapeStatus;
  rawCount: number;
  acceptedCount: number;
  filteredCount: number;
  attempts: number;
  requests: number;
  durationMs: number;
  error: string | null;
}

export interface SearchRunRow {
  id: string;
  kind: SearchKind;
  label: string;
  queries: string[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
  totalRaw: number;
  totalFiltered: number;
  duplicatesRemoved: number;
  listings: number;
  sources: ScrapeRunRow[];
}

export interface SourceHealth {
  source: string;
  runs: number;
  ok: number;
  partial: number;
  blocked: number;
  errors: number;
  lastStatus: ScrapeStatus | null;
  lastRunAt: string | null;
}

type StoredSearchRun = Omit<SearchRunRow, 'queries' | 'sources'> & { queries: string };

function parseQueries(value: string): string[] {
  const parsed: unknown = JSON.parse(value);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * SQLite record of past searches: one search_runs row per search and one
 * scrape_runs row per source it dispatched. Listings themselves are not stored.
 */
export class RunHistory {
  constructor(private readonly db: Database.Database) {}

  static open(dbPath: string): RunHistory {
    return new RunHistory(initializeDatabase(dbPath));
  }

  record(kind: SearchKind, label: string, result: AggregatedResult, startedAt: Date): string {
    const id = uuidv4();
    const completedAt = new Date(startedAt.getTime() + result.durationMs);

    const insertSearch = this.db.prepare(`
      INSERT INTO search_runs
        (id, kind, label, queries, started_at, completed_at, duration_ms,
         total_raw, total_filtered, duplicates_removed, listings)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertScrape = this.db.prepare(`
      INSERT INTO scrape_runs
        (search_run_id, source, status, raw_count, accepted_count, filtered_count,
         attempts, requests, duration_ms, error)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      insertSearch.run(
        id, kind, label, JSON.stringify(result.queries),
        startedAt.toISOString(), completedAt.toISOString(), result.durationMs,
        result.totalRaw, result.totalFiltered, result.duplicatesRemoved, result.listings.length,
      );
      for (const outcome of result.outcomes) {
        insertScrape.run(
          id, outcome.source, outcome.status, outcome.rawCount, outcome.listings.length,
          outcome.filteredCount, outcome.attempts, outcome.requests, outcome.durationMs,
          outcome.error ?? null,
        );
      }
    })();

    return id;
  }

  /** Most recent searches first, each with its per-source rows in dispatch order. */
  recentRuns(limit: number = 20): SearchRunRow[] {
    const runs = this.db.prepare<[number], StoredSearchRun>(`
      SELECT id, kind, label, queries, started_at as startedAt, completed_at as completedAt,
             duration_ms as durationMs, total_raw as totalRaw, total_filtered as totalFiltered,
             duplicates_removed as duplicatesRemoved, listings
      FROM search_runs ORDER BY started_at DESC, rowid DESC LIMIT ?
    `).all(limit);

    const sources = this.db.prepare<[string], ScrapeRunRow>(`
      SELECT source, status, raw_count as rawCount, accepted_count as acceptedCount,
             filtered_count as filteredCount, attempts, requests, duration_ms as durationMs, error
      FROM scrape_runs WHERE search_run_id = ? ORDER BY id
    `);

    return runs.map(run => ({ ...run, queries: parseQueries(run.queries), sources: sources.all(run.id) }));
  }

  /** Per-source status counts across all recorded searches. */
  sourceHealth(): SourceHealth[] {
    const rows = this.db.prepare<[], Omit<SourceHealth, 'lastStatus' | 'lastRunAt'>>(`
      SELECT source,
             COUNT(*) as runs,
             SUM(status = 'ok') as ok,
             SUM(status = 'partial') as partial,
             SUM(status = 'blocked') as blocked,
             SUM(status = 'error') as errors
      FROM scrape_runs GROUP BY source ORDER BY source
    `).all();

    const latest = this.db.prepare<[string], { status: ScrapeStatus; startedAt: string }>(`
      SELECT s.status, r.started_at as startedAt
      FROM scrape_runs s JOIN search_runs r ON r.id = s.search_run_id
      WHERE s.source = ? ORDER BY r.started_at DESC, s.id DESC LIMIT 1
    `);

    return rows.map(row => {
      const last = latest.get(row.source);
      return { ...row, lastStatus: last?.status ?? null, lastRunAt: last?.startedAt ?? null };
    });
  }

  close(): void {
    this.db.close();
  }
}
