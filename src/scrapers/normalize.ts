import type { FieldCompleteness, JobListing, JobType, RemoteType, SourceId } from './types';

// Query parameters that only track how the visitor arrived
const TRACKING_PARAMS = new Set([
  'gclid',
  'fbclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  'trk',
  'trkinfo',
  'trackingid',
  'refid',
  'ref',
  'src',
  'from',
  'tk',
  'vjs',
  'position',
  'pagenum',
]);

const COMPANY_SUFFIXES = new Set([
  'inc',
  'incorporated',
  'llc',
  'ltd',
  'limited',
  'corp',
  'corporation',
  'co',
  'company',
  'plc',
  'gmbh',
]);

const HOURS_PER_YEAR = 2080;

/**
 * Normalize a posting URL so that the same posting reached through different
 * links compares equal: https scheme, lowercase host, no fragment, no tracking
 * parameters, sorted remaining parameters, no trailing slash.
 * Returns the trimmed input when it cannot be parsed.
 */
export function normalizeUrl(url: string, base?: string): string {
  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return trimmed;
  }

  const params = [...parsed.searchParams.entries()]
    .filter(([name]) => {
      const lower = name.toLowerCase();
      return !lower.startsWith('utm_') && !TRACKING_PARAMS.has(lower);
    })
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));

  const protocol = parsed.protocol === 'http:' ? 'https:' : parsed.protocol;
  const pathname = parsed.pathname.replace(/\/+$/, '');
  const search = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : '';
  return `${protocol}//${parsed.host.toLowerCase()}${pathname}${search}`;
}

/** Lowercase, punctuation to spaces, collapsed whitespace. */
export function normalizeText(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function normalizeCompany(company: string): string {
  const tokens = normalizeText(company).split(' ').filter(Boolean);
  while (tokens.length > 1 && COMPANY_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  return tokens.join(' ');
}

/**
 * City part of a location string: "Houston, TX" -> "houston", "Remote - US" -> "remote".
 */
export function cityOf(location: string): string {
  const [city = ''] = location.split(/,|\s[-–|]\s|\(/);
  return normalizeText(city);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive pattern that matches a keyword only as a whole word or phrase,
 * so "hr" does not match "three" and "ai/ml" still matches "AI/ML Engineer".
 */
export function keywordPattern(keyword: string): RegExp {
  const body = escapeRegExp(keyword.trim().toLowerCase()).replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'iu');
}

export function matchingKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter(keyword => keywordPattern(keyword).test(text));
}

/**
 * Parse salary text into an annual USD range.
 * Handles "$120K - $150K a year", "$55 - $70 an hour", "$95,000", "Up to $180k".
 */
export function parseSalary(text: string | null | undefined): { min: number; max: number } | null {
  if (!text) return null;
  const lower = text.toLowerCase().replace(/,/g, '');
  const matches = [...lower.matchAll(/(\d+(?:\.\d+)?)\s*(k\b)?/g)].slice(0, 2);
  if (matches.length === 0) return null;

  const anyThousands = matches.some(m => m[2] !== undefined);
  let values = matches.map(m => {
    const value = parseFloat(m[1]);
    return anyThousands && value < 1000 ? value * 1000 : value;
  });

  if (/\b(hour|hourly|hr)\b|\/\s*h(ou)?r?\b/.test(lower)) {
    values = values.map(v => v * HOURS_PER_YEAR);
  } else if (/\b(month|monthly|mo)\b/.test(lower)) {
    values = values.map(v => v * 12);
  }

  values = values.map(v => Math.round(v)).filter(v => v > 0);
  if (values.length === 0) return null;

  const min = Math.min(...values);
  const max = Math.max(...values);
  return { min, max };
}

export function detectJobType(text: string | null | undefined): JobType {
  if (!text) return 'unknown';
  const lower = text.toLowerCase();
  if (/full[\s-]?time/.test(lower)) return 'full_time';
  if (/part[\s-]?time/.test(lower)) return 'part_time';
  if (/\b(contract|contractor|temporary|temp)\b/.test(lower)) return 'contract';
  if (/\bintern(ship)?\b/.test(lower)) return 'internship';
  return 'unknown';
}

export function detectRemoteType(...texts: (string | null | undefined)[]): RemoteType {
  const lower = texts.filter(Boolean).join(' ').toLowerCase();
  if (!lower) return 'unknown';
  if (/\bhybrid\b/.test(lower)) return 'hybrid';
  if (/\b(remote|work from home|wfh|anywhere)\b/.test(lower)) return 'remote';
  if (/\b(on[\s-]?site|in[\s-]office|in[\s-]person)\b/.test(lower)) return 'onsite';
  return 'unknown';
}

/** Raw card fields as read off a page; everything but url and title is optional. */
export interface ListingFields {
  url: string;
  title: string;
  company?: string;
  location?: string;
  description?: string;
  salaryText?: string;
  jobTypeText?: string;
  remoteText?: string;
  sourceJobId?: string;
  postedHint?: string;
  tags?: readonly string[];
}

function clean(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Build the immutable listing for one card. Skills are the card's own tags plus
 * any vocabulary term found in the title or description.
 */
export function createJobListing(
  source: SourceId,
  fields: ListingFields,
  vocabulary: readonly string[],
): JobListing {
  const title = clean(fields.title);
  const company = clean(fields.company);
  const location = clean(fields.location);
  const description = clean(fields.description);
  const salaryText = clean(fields.salaryText) || null;
  const salary = parseSalary(salaryText);
  const jobType = detectJobType(fields.jobTypeText ?? `${title} ${description}`);
  const remoteType = detectRemoteType(fields.remoteText, location, title);

  const skills = new Set<string>();
  for (const tag of fields.tags ?? []) {
    const normalized = clean(tag).toLowerCase();
    if (normalized) skills.add(normalized);
  }
  for (const term of matchingKeywords(`${title} ${description}`, vocabulary)) {
    skills.add(term.toLowerCase());
  }

  const completeness: FieldCompleteness = {
    hasCompany: company.length > 0,
    hasLocation: location.length > 0,
    hasDescription: description.length > 0,
    hasSalary: salary !== null,
    hasJobType: jobType !== 'unknown',
    hasRemoteType: remoteType !== 'unknown',
  };

  return Object.freeze({
    key: normalizeUrl(fields.url),
    url: fields.url.trim(),
    title,
    company,
    location,
    description,
    salaryMin: salary?.min ?? null,
    salaryMax: salary?.max ?? null,
    salaryText,
    jobType,
    remoteType,
    source,
    sourceJobId: clean(fields.sourceJobId) || null,
    postedHint: clean(fields.postedHint) || null,
    skills: Object.freeze([...skills].sort()),
    descriptionLength: description.length,
    completeness: Object.freeze(completeness),
  });
}

/**
 * Rewrite query text for a seniority hint: "senior"/"sr" prefix "Senior",
 * "staff"/"principal"/"lead" prefix the level, junior and mid levels leave it alone.
 */
export function applySeniority(text: string, seniority?: string): string {
  const level = seniority?.trim().toLowerCase();
  if (!level) return text;
  if (level === 'senior' || level === 'sr') return `Senior ${text}`;
  if (level === 'staff' || level === 'principal' || level === 'lead') {
    return `${level[0].toUpperCase()}${level.slice(1)} ${text}`;
  }
  return text;
}
