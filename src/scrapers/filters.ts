// Quality filter shared by all scraper adapters; each source brings its own settings
import { keywordPattern } from './normalize';
import type { FilterSettings, JobListing } from './types';

export interface FilterVerdict {
  accepted: boolean;
  score: number;
  reason: string;
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function formatSalary(value: number): string {
  return `$${value.toLocaleString('en-US')}`;
}

/**
 * Scores a listing in [0, 1] and decides whether to keep it.
 *
 * Rejection order: any exclude keyword, then no required keyword, then salary
 * outside the configured bounds, then a score under the threshold. Exclusion
 * always wins over inclusion. The threshold is inclusive.
 */
export class QualityFilter {
  readonly settings: Readonly<FilterSettings>;
  private readonly required: { keyword: string; pattern: RegExp }[];
  private readonly excluded: { keyword: string; pattern: RegExp }[];
  private readonly technology: RegExp[];

  constructor(settings: FilterSettings) {
    this.settings = settings;
    this.required = settings.requiredKeywords.map(keyword => ({ keyword, pattern: keywordPattern(keyword) }));
    this.excluded = settings.excludeKeywords.map(keyword => ({ keyword, pattern: keywordPattern(keyword) }));
    this.technology = settings.technologyKeywords.map(keywordPattern);
  }

  accept(listing: JobListing): boolean {
    return this.evaluate(listing).accepted;
  }

  evaluate(listing: JobListing): FilterVerdict {
    const score = this.score(listing);
    const reject = (reason: string): FilterVerdict => ({ accepted: false, score, reason });

    const everything = [
      listing.title,
      listing.company,
      listing.location,
      listing.description,
      listing.skills.join(' '),
    ].join(' ');
    const excluded = this.excluded.find(({ pattern }) => pattern.test(everything));
    if (excluded) return reject(`Contains excluded keyword: '${excluded.keyword}'`);

    if (this.required.length > 0) {
      const searchable = `${listing.title} ${listing.description}`;
      if (!this.required.some(({ pattern }) => pattern.test(searchable))) {
        return reject('Missing required keywords');
      }
    }

    const { minSalary, maxSalary } = this.settings;
    const low = listing.salaryMin ?? listing.salaryMax;
    const high = listing.salaryMax ?? listing.salaryMin;
    if (minSalary !== null && low !== null && low < minSalary) {
      return reject(`Salary ${formatSalary(low)} below minimum ${formatSalary(minSalary)}`);
    }
    if (maxSalary !== null && high !== null && high > maxSalary) {
      return reject(`Salary ${formatSalary(high)} above maximum ${formatSalary(maxSalary)}`);
    }

    if (score < this.settings.minQualityScore) {
      return reject(`Quality score ${score.toFixed(2)} below minimum ${this.settings.minQualityScore}`);
    }

    return { accepted: true, score, reason: 'Passed all filters' };
  }

  score(listing: JobListing): number {
    const { weights, descriptionTarget, technologyCap } = this.settings;

    const descriptionPart = descriptionTarget > 0 ? Math.min(listing.descriptionLength / descriptionTarget, 1) : 0;

    const techText = `${listing.title} ${listing.description} ${listing.skills.join(' ')}`;
    const techCount = this.technology.filter(pattern => pattern.test(techText)).length;
    const techPart = technologyCap > 0 ? Math.min(techCount, technologyCap) / technologyCap : 0;

    const total =
      weights.description * descriptionPart +
      (listing.completeness.hasSalary ? weights.salary : 0) +
      (listing.completeness.hasJobType ? weights.jobType : 0) +
      (listing.completeness.hasRemoteType ? weights.remoteType : 0) +
      weights.technology * techPart;

    return round(Math.min(Math.max(total, 0), 1));
  }
}

/**
 * Tally rejection reasons for a batch, most frequent first.
 */
export function summarizeRejections(verdicts: FilterVerdict[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const verdict of verdicts) {
    if (verdict.accepted) continue;
    counts.set(verdict.reason, (counts.get(verdict.reason) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}
