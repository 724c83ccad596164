import { identify, merge, type MergedListing } from './dedupe';
import { normalizeCompany } from './normalize';
import type {
  AggregatedResult,
  RankedListing,
  ResultSummary,
  SalaryAnalysis,
  ScrapeOutcome,
  SourceBreakdown,
  SourceId,
} from './types';

export interface AggregateOptions {
  /** Lower is preferred; sources missing here sort last. */
  priorities: Readonly<Partial<Record<SourceId, number>>>;
  queries: readonly string[];
  durationMs: number;
}

interface Candidate {
  listing: MergedListing;
  priority: number;
  order: number;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.listing.qualityScore - a.listing.qualityScore ||
    a.priority - b.priority ||
    a.order - b.order
  );
}

/**
 * Merge every source's accepted listings into one ranked, duplicate-free list.
 *
 * Candidates are ranked first (score desc, source priority asc, discovery order),
 * so the first copy of a posting met while folding is always the one kept as
 * base. Pass one folds exact URL matches; pass two compares title, company and
 * city only among listings that share a normalized company name.
 */
export function aggregate(outcomes: readonly ScrapeOutcome[], options: AggregateOptions): AggregatedResult {
  let order = 0;
  const candidates: Candidate[] = [];
  for (const outcome of outcomes) {
    const priority = options.priorities[outcome.source] ?? Number.MAX_SAFE_INTEGER;
    for (const listing of outcome.listings) {
      candidates.push({ listing: { ...listing, alternateSources: [] }, priority, order: order++ });
    }
  }
  candidates.sort(compareCandidates);

  let duplicatesRemoved = 0;

  const byKey = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const existing = byKey.get(candidate.listing.key);
    if (existing) {
      existing.listing = merge(existing.listing, candidate.listing);
      duplicatesRemoved++;
    } else {
      byKey.set(candidate.listing.key, candidate);
    }
  }

  const kept: Candidate[] = [];
  const byCompany = new Map<string, Candidate[]>();
  for (const candidate of byKey.values()) {
    const company = normalizeCompany(candidate.listing.company);
    if (!company) {
      kept.push(candidate);
      continue;
    }
    const group = byCompany.get(company) ?? [];
    const match = group.find(other => identify(other.listing, candidate.listing));
    if (match) {
      match.listing = merge(match.listing, candidate.listing);
      duplicatesRemoved++;
      continue;
    }
    group.push(candidate);
    byCompany.set(company, group);
    kept.push(candidate);
  }

  const listings: RankedListing[] = kept.map((candidate, index) =>
    Object.freeze({ ...candidate.listing, rank: index + 1 }),
  );

  const totalRaw = outcomes.reduce((sum, outcome) => sum + outcome.rawCount, 0);

  return {
    queries: [...options.queries],
    listings,
    totalRaw,
    // Everything seen but not reported: filter rejections plus merged duplicates
    totalFiltered: Math.max(totalRaw - listings.length, 0),
    duplicatesRemoved,
    outcomes: [...outcomes],
    durationMs: options.durationMs,
    summary: summarize(outcomes, listings),
  };
}

export function summarize(outcomes: readonly ScrapeOutcome[], listings: readonly RankedListing[]): ResultSummary {
  const bySource: Partial<Record<SourceId, SourceBreakdown>> = {};
  const successfulSources: SourceId[] = [];
  const failedSources: SourceId[] = [];

  for (const outcome of outcomes) {
    bySource[outcome.source] = {
      status: outcome.status,
      raw: outcome.rawCount,
      accepted: outcome.listings.length,
      filtered: outcome.filteredCount,
      unique: listings.filter(listing => listing.source === outcome.source).length,
      ...(outcome.error ? { error: outcome.error } : {}),
    };
    if (outcome.status === 'ok' || outcome.status === 'partial') {
      successfulSources.push(outcome.source);
    } else {
      failedSources.push(outcome.source);
    }
  }

  return {
    bySource,
    successfulSources,
    failedSources,
    technologies: countTechnologies(listings),
    salary: analyzeSalaries(listings),
  };
}

export function countTechnologies(listings: readonly RankedListing[]): { name: string; count: number }[] {
  const counts = new Map<string, number>();
  for (const listing of listings) {
    for (const skill of listing.skills) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));
}

/**
 * Salary statistics over listings that state one. Each listing contributes the
 * midpoint of its range to the mean and median.
 */
export function analyzeSalaries(listings: readonly RankedListing[]): SalaryAnalysis | null {
  const ranges: { low: number; high: number }[] = [];
  for (const listing of listings) {
    const low = listing.salaryMin ?? listing.salaryMax;
    const high = listing.salaryMax ?? listing.salaryMin;
    if (low !== null && high !== null) ranges.push({ low, high });
  }
  if (ranges.length === 0) return null;

  const midpoints = ranges.map(range => (range.low + range.high) / 2).sort((a, b) => a - b);
  const middle = Math.floor(midpoints.length / 2);
  const median =
    midpoints.length % 2 === 0 ? (midpoints[middle - 1] + midpoints[middle]) / 2 : midpoints[middle];

  return {
    min: Math.min(...ranges.map(range => range.low)),
    max: Math.max(...ranges.map(range => range.high)),
    mean: Math.round(midpoints.reduce((sum, value) => sum + value, 0) / midpoints.length),
    median: Math.round(median),
    listingsWithSalary: ranges.length,
    coveragePercent: Math.round((ranges.length / listings.length) * 1000) / 10,
  };
}
