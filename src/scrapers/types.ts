import type { BrowserPool } from './browser';
import type { QualityFilter } from './filters';
import type { RateLimiter } from './rateLimiter';

export const SOURCE_IDS = ['ziprecruiter', 'indeed', 'linkedin', 'glassdoor', 'wellfound', 'remoteok'] as const;
export type SourceId = (typeof SOURCE_IDS)[number];

export function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some(id => id === value);
}

export type JobType = 'full_time' | 'part_time' | 'contract' | 'internship' | 'unknown';
export type RemoteType = 'onsite' | 'remote' | 'hybrid' | 'unknown';
export type FilterMode = 'general' | 'strict';
export type ScrapeStatus = 'ok' | 'partial' | 'blocked' | 'error';

export interface FieldCompleteness {
  hasCompany: boolean;
  hasLocation: boolean;
  hasDescription: boolean;
  hasSalary: boolean;
  hasJobType: boolean;
  hasRemoteType: boolean;
}

/**
 * A normalized posting. Built (and frozen) by `createJobListing`; `key` is the
 * normalized posting URL and is the listing's identity.
 */
export interface JobListing {
  readonly key: string;
  readonly url: string;
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly description: string;
  readonly salaryMin: number | null;
  readonly salaryMax: number | null;
  readonly salaryText: string | null;
  readonly jobType: JobType;
  readonly remoteType: RemoteType;
  readonly source: SourceId;
  readonly sourceJobId: string | null;
  readonly postedHint: string | null;
  readonly skills: readonly string[];
  readonly descriptionLength: number;
  readonly completeness: Readonly<FieldCompleteness>;
}

export interface AcceptedListing extends JobListing {
  readonly qualityScore: number;
}

export interface RankedListing extends AcceptedListing {
  readonly rank: number;
  readonly alternateSources: readonly SourceId[];
}

export interface SearchQuery {
  readonly text: string;
  readonly location: string;
  /** Overrides each source's configured page count. */
  readonly maxPages?: number;
  readonly seniority?: string;
  /** Empty or missing means every source enabled in configuration. */
  readonly sources?: readonly SourceId[];
  readonly mode?: FilterMode;
  /** Stop consuming a source once it has accepted this many listings. */
  readonly maxResults?: number;
}

export interface ScoreWeights {
  description: number;
  salary: number;
  jobType: number;
  remoteType: number;
  technology: number;
}

export interface FilterSettings {
  requiredKeywords: readonly string[];
  excludeKeywords: readonly string[];
  minSalary: number | null;
  maxSalary: number | null;
  minQualityScore: number;
  technologyKeywords: readonly string[];
  weights: Readonly<ScoreWeights>;
  descriptionTarget: number;
  technologyCap: number;
}

export interface SourceConfig {
  readonly id: SourceId;
  readonly enabled: boolean;
  readonly priority: number;
  readonly maxPages: number;
  readonly minDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRequestsPerSession: number;
  readonly fetchDetails: boolean;
  readonly filters: Readonly<Record<FilterMode, Readonly<FilterSettings>>>;
}

export interface ScrapeOutcome {
  source: SourceId;
  status: ScrapeStatus;
  listings: AcceptedListing[];
  rawCount: number;
  filteredCount: number;
  error?: string;
  attempts: number;
  /** Rate-limited requests the source made during the run. */
  requests: number;
  durationMs: number;
}

export interface SourceBreakdown {
  status: ScrapeStatus;
  raw: number;
  accepted: number;
  filtered: number;
  unique: number;
  error?: string;
}

export interface SalaryAnalysis {
  min: number;
  max: number;
  mean: number;
  median: number;
  listingsWithSalary: number;
  coveragePercent: number;
}

export interface ResultSummary {
  bySource: Partial<Record<SourceId, SourceBreakdown>>;
  successfulSources: SourceId[];
  failedSources: SourceId[];
  technologies: { name: string; count: number }[];
  salary: SalaryAnalysis | null;
}

export interface AggregatedResult {
  queries: string[];
  listings: RankedListing[];
  totalRaw: number;
  totalFiltered: number;
  duplicatesRemoved: number;
  outcomes: ScrapeOutcome[];
  durationMs: number;
  summary: ResultSummary;
}

/**
 * What an adapter gets from the runner for one fetch.
 */
export interface FetchContext {
  browser: BrowserPool;
  limiter: RateLimiter;
  signal: AbortSignal;
}

/**
 * One variant per site. `fetchRaw` returns a fresh sequence on every call, so a
 * retry starts again from the first page.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  readonly config: SourceConfig;
  qualityFilter(mode: FilterMode): QualityFilter;
  fetchRaw(query: SearchQuery, maxPages: number, context: FetchContext): AsyncIterable<JobListing>;
}

export type AdapterFactory = (config: SourceConfig) => SourceAdapter;
