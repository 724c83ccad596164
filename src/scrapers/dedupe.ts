import { cityOf, normalizeCompany, normalizeText } from './normalize';
import type { JobListing, RankedListing, SourceId } from './types';

/** An accepted listing that may already have absorbed duplicates from other sources. */
export type MergedListing = Omit<RankedListing, 'rank'>;

/**
 * Whether two listings are the same posting: equal normalized URLs, or the same
 * normalized title and company in the same city.
 */
export function identify(a: JobListing, b: JobListing): boolean {
  if (a.key === b.key) return true;

  const title = normalizeText(a.title);
  if (!title || title !== normalizeText(b.title)) return false;

  const company = normalizeCompany(a.company);
  if (!company || company !== normalizeCompany(b.company)) return false;

  return cityOf(a.location) === cityOf(b.location);
}

function longer(a: string, b: string): string {
  return b.length > a.length ? b : a;
}

/**
 * Fold two copies of one posting into a single listing. The higher-scored copy
 * (the first on a tie) is the base; the other fills in what the base lacks and is
 * noted as an alternate source.
 */
export function merge(a: MergedListing, b: MergedListing): MergedListing {
  const [base, other] = b.qualityScore > a.qualityScore ? [b, a] : [a, b];

  const baseHasSalary = base.salaryMin !== null || base.salaryMax !== null;
  const salary = baseHasSalary
    ? { salaryMin: base.salaryMin, salaryMax: base.salaryMax, salaryText: base.salaryText }
    : { salaryMin: other.salaryMin, salaryMax: other.salaryMax, salaryText: other.salaryText };

  const company = base.company || other.company;
  const location = base.location || other.location;
  const description = longer(base.description, other.description);
  const jobType = base.jobType === 'unknown' ? other.jobType : base.jobType;
  const remoteType = base.remoteType === 'unknown' ? other.remoteType : base.remoteType;
  const skills = [...new Set([...base.skills, ...other.skills])].sort();

  const alternates: SourceId[] = [];
  for (const source of [...base.alternateSources, other.source, ...other.alternateSources]) {
    if (source !== base.source && !alternates.includes(source)) alternates.push(source);
  }

  return Object.freeze({
    ...base,
    ...salary,
    company,
    location,
    description,
    jobType,
    remoteType,
    skills: Object.freeze(skills),
    descriptionLength: description.length,
    completeness: Object.freeze({
      hasCompany: company.length > 0,
      hasLocation: location.length > 0,
      hasDescription: description.length > 0,
      hasSalary: salary.salaryMin !== null || salary.salaryMax !== null,
      hasJobType: jobType !== 'unknown',
      hasRemoteType: remoteType !== 'unknown',
    }),
    alternateSources: Object.freeze(alternates),
  });
}
