import type { AggregatedResult, RankedListing, ScrapeOutcome } from './scrapers/types';

export type ReportFormat = 'brief' | 'full' | 'counts';

const DESCRIPTION_EXCERPT = 280;
const TOP_TECHNOLOGIES = 10;

function money(value: number): string {
  return `$${value.toLocaleString('en-US')}`;
}

export function formatSalary(listing: Pick<RankedListing, 'salaryMin' | 'salaryMax'>): string | null {
  const { salaryMin, salaryMax } = listing;
  if (salaryMin === null && salaryMax === null) return null;
  if (salaryMin !== null && salaryMax !== null && salaryMin !== salaryMax) {
    return `${money(salaryMin)} - ${money(salaryMax)}`;
  }
  return money(salaryMin ?? salaryMax ?? 0);
}

function excerpt(text: string): string {
  return text.length > DESCRIPTION_EXCERPT ? `${text.slice(0, DESCRIPTION_EXCERPT).trimEnd()}...` : text;
}

function headline(result: AggregatedResult): string {
  const label = result.queries.length === 1 ? `"${result.queries[0]}"` : `${result.queries.length} queries`;
  return (
    `Found ${result.listings.length} listings for ${label} ` +
    `(${result.totalRaw} raw, ${result.totalFiltered} filtered, ${result.duplicatesRemoved} duplicates removed) ` +
    `in ${(result.durationMs / 1000).toFixed(1)}s`
  );
}

function outcomeLine(outcome: ScrapeOutcome): string {
  const counts = `${outcome.listings.length}/${outcome.rawCount} accepted`;
  const detail = outcome.error ? ` - ${outcome.error}` : '';
  return `  ${outcome.source.padEnd(13)} ${outcome.status.padEnd(8)} ${counts}${detail}`;
}

function listingLines(listing: RankedListing, full: boolean): string[] {
  const where = [listing.company, listing.location].filter(Boolean).join(', ');
  const salary = formatSalary(listing);
  const sources = [listing.source, ...listing.alternateSources].join(', ');

  const lines = [
    `${String(listing.rank).padStart(3)}. [${listing.qualityScore.toFixed(2)}] ${listing.title}${where ? ` - ${where}` : ''}`,
    `     ${[salary, sources].filter(Boolean).join(' | ')}`,
    `     ${listing.url}`,
  ];

  if (full) {
    lines.push(`     ${listing.jobType} / ${listing.remoteType}${listing.postedHint ? ` / ${listing.postedHint}` : ''}`);
    if (listing.skills.length > 0) lines.push(`     Skills: ${listing.skills.join(', ')}`);
    if (listing.description) lines.push(`     ${excerpt(listing.description)}`);
  }
  return lines;
}

/**
 * Plain-text report of a search. "counts" prints only totals and per-source
 * status; "brief" adds one block per listing; "full" adds listing details,
 * technology counts and salary statistics.
 */
export function renderReport(result: AggregatedResult, format: ReportFormat = 'brief'): string {
  const lines = [headline(result), '', 'Sources:', ...result.outcomes.map(outcomeLine)];

  if (format === 'counts') return lines.join('\n');

  const full = format === 'full';
  lines.push('');
  if (result.listings.length === 0) {
    lines.push('No listings passed the filters.');
  }
  for (const listing of result.listings) {
    lines.push(...listingLines(listing, full));
  }

  if (full) {
    const technologies = result.summary.technologies.slice(0, TOP_TECHNOLOGIES);
    if (technologies.length > 0) {
      lines.push('', `Technologies: ${technologies.map(tech => `${tech.name} (${tech.count})`).join(', ')}`);
    }
    const salary = result.summary.salary;
    if (salary) {
      lines.push(
        `Salaries: ${money(salary.min)} - ${money(salary.max)}, median ${money(salary.median)}, ` +
          `mean ${money(salary.mean)} (${salary.listingsWithSalary} listings, ${salary.coveragePercent}%)`,
      );
    }
  }

  return lines.join('\n');
}
