import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors';
import type { OrchestratorOptions } from './scrapers/runner';
import { isSourceId, type FilterMode, type FilterSettings, type ScoreWeights, type SourceConfig } from './scrapers/types';

export const DEFAULT_WEIGHTS: ScoreWeights = {
  description: 0.35,
  salary: 0.15,
  jobType: 0.1,
  remoteType: 0.1,
  technology: 0.3,
};

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  SOURCES_CONFIG: z.string().min(1).default('config/sources.json'),
  QUERY_SETS_CONFIG: z.string().min(1).default('config/query-sets.json'),
  MAX_CONCURRENT_SOURCES: z.coerce.number().int().min(1).default(3),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  NETWORK_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  CANCEL_GRACE_MS: z.coerce.number().int().min(0).default(5000),
  QUERIES_PER_CATEGORY: z.coerce.number().int().min(1).default(3),
  HEADLESS: flag.default('true'),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  DATABASE_PATH: z.string().min(1).default('data/jobs.db'),
  RECORD_RUNS: flag.default('false'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
});

export interface AppConfig {
  sourcesPath: string;
  querySetsPath: string;
  orchestrator: OrchestratorOptions;
  queriesPerCategory: number;
  browser: {
    headless: boolean;
    navigationTimeoutMs: number;
    executablePath?: string;
  };
  databasePath: string;
  recordRuns: boolean;
  port: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Read settings from the environment. Relative paths resolve against the working
 * directory. Empty variables count as unset.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  return {
    sourcesPath: path.resolve(vars.SOURCES_CONFIG),
    querySetsPath: path.resolve(vars.QUERY_SETS_CONFIG),
    orchestrator: {
      maxConcurrentSources: vars.MAX_CONCURRENT_SOURCES,
      runTimeoutMs: vars.RUN_TIMEOUT_MS,
      networkRetries: vars.NETWORK_RETRIES,
      retryBackoffMs: vars.RETRY_BACKOFF_MS,
      cancelGraceMs: vars.CANCEL_GRACE_MS,
    },
    queriesPerCategory: vars.QUERIES_PER_CATEGORY,
    browser: {
      headless: vars.HEADLESS,
      navigationTimeoutMs: vars.NAVIGATION_TIMEOUT_MS,
      ...(vars.BROWSER_EXECUTABLE_PATH ? { executablePath: vars.BROWSER_EXECUTABLE_PATH } : {}),
    },
    databasePath: vars.DATABASE_PATH === ':memory:' ? vars.DATABASE_PATH : path.resolve(vars.DATABASE_PATH),
    recordRuns: vars.RECORD_RUNS,
    port: vars.PORT,
  };
}

// --- Source configuration (config/sources.json) ---

const keywordList = z.array(z.string().trim().min(1)).default([]);

const modeSchema = z
  .object({
    minSalary: z.number().nonnegative().nullable().default(null),
    maxSalary: z.number().nonnegative().nullable().default(null),
    minQualityScore: z.number().min(0).max(1),
  })
  .refine(mode => mode.minSalary === null || mode.maxSalary === null || mode.minSalary <= mode.maxSalary, {
    message: 'minSalary must not exceed maxSalary',
  });

const sourceSchema = z
  .object({
    enabled: z.boolean().default(true),
    priority: z.number().int(),
    maxPages: z.number().int().min(1),
    minDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    maxRequestsPerSession: z.number().int().min(1),
    fetchDetails: z.boolean().default(false),
    extraRequiredKeywords: keywordList,
    extraExcludeKeywords: keywordList,
    general: modeSchema,
    strict: modeSchema,
  })
  .refine(source => source.minDelayMs <= source.maxDelayMs, {
    message: 'minDelayMs must not exceed maxDelayMs',
  });

const sourcesFileSchema = z.object({
  scoring: z
    .object({
      weights: z
        .object({
          description: z.number().min(0),
          salary: z.number().min(0),
          jobType: z.number().min(0),
          remoteType: z.number().min(0),
          technology: z.number().min(0),
        })
        .default(DEFAULT_WEIGHTS),
      descriptionTarget: z.number().positive().default(800),
      technologyCap: z.number().int().positive().default(4),
      technologyKeywords: keywordList,
    })
    .default({}),
  keywords: z
    .object({
      required: keywordList,
      exclude: keywordList,
    })
    .default({}),
  sources: z.record(z.string(), sourceSchema),
});

/**
 * Validate the parsed contents of a sources file and build one SourceConfig per
 * source, in file order. Shared keyword lists are combined with each source's
 * extra keywords.
 */
export function parseSourcesConfig(raw: unknown): SourceConfig[] {
  const parsed = sourcesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid source configuration: ${describeIssues(parsed.error)}`);
  }
  const { scoring, keywords, sources } = parsed.data;

  return Object.entries(sources).map(([id, source]) => {
    if (!isSourceId(id)) {
      throw new ConfigurationError(`Unknown source in configuration: ${id}`);
    }

    const settingsFor = (mode: FilterMode): FilterSettings => ({
      requiredKeywords: [...keywords.required, ...source.extraRequiredKeywords],
      excludeKeywords: [...keywords.exclude, ...source.extraExcludeKeywords],
      minSalary: source[mode].minSalary,
      maxSalary: source[mode].maxSalary,
      minQualityScore: source[mode].minQualityScore,
      technologyKeywords: scoring.technologyKeywords,
      weights: scoring.weights,
      descriptionTarget: scoring.descriptionTarget,
      technologyCap: scoring.technologyCap,
    });

    return {
      id,
      enabled: source.enabled,
      priority: source.priority,
      maxPages: source.maxPages,
      minDelayMs: source.minDelayMs,
      maxDelayMs: source.maxDelayMs,
      maxRequestsPerSession: source.maxRequestsPerSession,
      fetchDetails: source.fetchDetails,
      filters: { general: settingsFor('general'), strict: settingsFor('strict') },
    };
  });
}

export function readJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
}

export function loadSourcesConfig(filePath: string): SourceConfig[] {
  return parseSourcesConfig(readJsonFile(filePath));
}
