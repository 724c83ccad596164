import { parseArgs } from 'util';
import { ConfigurationError, errorMessage } from './errors';
import type { ReportFormat } from './report';
import type { SearchDefaults } from './search';
import { SOURCE_IDS, isSourceId, type SourceId } from './scrapers/types';

export interface CliInvocation {
  command: string | undefined;
  args: string[];
  defaults: SearchDefaults;
  maxResults?: number;
  /** Per query for category searches, per category for comprehensive ones. */
  maxJobs: number;
  format: ReportFormat;
  json: boolean;
}

const DEFAULT_MAX_JOBS = 10;

function positiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function sourceList(value: string | undefined): SourceId[] | undefined {
  if (value === undefined) return undefined;
  const ids = value
    .split(',')
    .map(id => id.trim().toLowerCase())
    .filter(Boolean);
  const unknown = ids.filter(id => !isSourceId(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown sources: ${unknown.join(', ')}. Available: ${SOURCE_IDS.join(', ')}`);
  }
  return ids.filter(isSourceId);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      location: { type: 'string', short: 'l' },
      sources: { type: 'string', short: 's' },
      'max-pages': { type: 'string' },
      'max-results': { type: 'string' },
      'max-jobs': { type: 'string' },
      seniority: { type: 'string' },
      strict: { type: 'boolean', default: false },
      brief: { type: 'boolean', default: false },
      full: { type: 'boolean', default: false },
      'counts-only': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
  });
}

export function parseCliArgs(argv: string[]): CliInvocation {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigurationError(errorMessage(error));
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;

  const maxPages = positiveInt('max-pages', values['max-pages']);
  const sources = sourceList(values.sources);
  const seniority = values.seniority?.trim();

  const defaults: SearchDefaults = {
    location: values.location?.trim() ?? '',
    mode: values.strict ? 'strict' : 'general',
    ...(maxPages !== undefined ? { maxPages } : {}),
    ...(sources !== undefined ? { sources } : {}),
    ...(seniority ? { seniority } : {}),
  };

  const maxResults = positiveInt('max-results', values['max-results']);
  if (maxResults !== undefined && (command === 'category' || command === 'comprehensive')) {
    throw new ConfigurationError(`--max-results does not apply to ${command}; use --max-jobs`);
  }

  return {
    command,
    args,
    defaults,
    ...(maxResults !== undefined ? { maxResults } : {}),
    maxJobs: positiveInt('max-jobs', values['max-jobs']) ?? DEFAULT_MAX_JOBS,
    format: values['counts-only'] ? 'counts' : values.full ? 'full' : 'brief',
    json: values.json,
  };
}
