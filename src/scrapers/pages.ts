import { BlockedError, NetworkError, ParseError, ScrapeCancelledError, errorMessage } from '../errors';
import type { BrowserSession, ElementScope, NavigationResult } from './browser';
import { QualityFilter } from './filters';
import { createJobListing, normalizeUrl, type ListingFields } from './normalize';
import type { RateLimiter } from './rateLimiter';
import type { FetchContext, JobListing, SearchQuery, SourceAdapter, SourceConfig, SourceId } from './types';

export interface ListingSelectors {
  card: string;
  title: string;
  /** Element carrying the posting href. */
  link: string;
  company?: string;
  location?: string;
  salary?: string;
  snippet?: string;
  jobType?: string;
  posted?: string;
  tags?: string;
  /** Where the site's own posting id lives; no selector means the card itself. */
  jobId?: { selector?: string; attribute: string };
  /** Shown when a search legitimately has no results. */
  noResults?: string;
  /** Present only on denial or challenge pages. */
  challenge: string[];
  /** Full description on a posting's own page. */
  detailDescription?: string;
}

/**
 * The site-specific part of a source: how to build a search URL, where the
 * fields live on a result page and what a denial looks like.
 */
export interface SiteDefinition {
  id: SourceId;
  /** Log tag, e.g. "ZipRecruiter". */
  label: string;
  baseUrl: string;
  selectors: ListingSelectors;
  deniedTitle?: RegExp;
  /** `page` is zero-based. */
  searchUrl(query: SearchQuery, page: number): string;
  refine?(fields: ListingFields): ListingFields;
}

const DENIAL_TITLE =
  /access denied|just a moment|attention required|verify you are human|are you a robot|security check|captcha|unusual traffic|request blocked/i;

const BLOCKING_STATUSES = new Set([401, 403, 429, 999]);

async function visit(
  site: SiteDefinition,
  session: BrowserSession,
  url: string,
  limiter: RateLimiter,
  signal: AbortSignal,
): Promise<NavigationResult> {
  await limiter.acquire(site.id, signal);

  let result: NavigationResult;
  try {
    result = await session.navigate(url);
  } catch (error) {
    if (signal.aborted) throw new ScrapeCancelledError();
    throw new NetworkError(site.id, errorMessage(error));
  }

  if (result.status !== null && BLOCKING_STATUSES.has(result.status)) {
    throw new BlockedError(site.id, `HTTP ${result.status} on ${url}`);
  }
  if (!result.ok) {
    throw new NetworkError(site.id, `HTTP ${result.status ?? 'error'} on ${url}`);
  }
  if (DENIAL_TITLE.test(result.title) || site.deniedTitle?.test(result.title)) {
    throw new BlockedError(site.id, `denial page "${result.title}"`);
  }
  for (const marker of site.selectors.challenge) {
    if ((await session.queryAll(marker)).length > 0) {
      throw new BlockedError(site.id, `challenge marker ${marker} on ${url}`);
    }
  }
  return result;
}

function optionalText(scope: ElementScope, selector: string | undefined): Promise<string | undefined> {
  return selector ? scope.extractText(selector) : Promise.resolve(undefined);
}

async function readCard(site: SiteDefinition, card: ElementScope): Promise<ListingFields | null> {
  const { selectors } = site;
  const title = await card.extractText(selectors.title);
  const href = await card.extractAttribute(selectors.link, 'href');
  if (!title || !href) return null;

  let url: string;
  try {
    url = new URL(href, site.baseUrl).toString();
  } catch {
    return null;
  }

  const tags = selectors.tags
    ? await Promise.all((await card.queryAll(selectors.tags)).map(tag => tag.extractText()))
    : [];

  const fields: ListingFields = {
    url,
    title,
    company: await optionalText(card, selectors.company),
    location: await optionalText(card, selectors.location),
    salaryText: await optionalText(card, selectors.salary),
    description: await optionalText(card, selectors.snippet),
    jobTypeText: await optionalText(card, selectors.jobType),
    postedHint: await optionalText(card, selectors.posted),
    sourceJobId: selectors.jobId
      ? await card.extractAttribute(selectors.jobId.selector, selectors.jobId.attribute)
      : undefined,
    tags: tags.filter((tag): tag is string => Boolean(tag)),
  };
  return site.refine ? site.refine(fields) : fields;
}

async function fetchDescription(
  site: SiteDefinition,
  session: BrowserSession,
  fields: ListingFields,
  limiter: RateLimiter,
  signal: AbortSignal,
): Promise<ListingFields> {
  const selector = site.selectors.detailDescription;
  if (!selector) return fields;
  try {
    await visit(site, session, fields.url, limiter, signal);
    const description = await session.extractText(selector);
    return description ? { ...fields, description } : fields;
  } catch (error) {
    if (!(error instanceof NetworkError)) throw error;
    console.warn(`[${site.label}] Keeping card snippet for ${fields.url}: ${error.message}`);
    return fields;
  }
}

/**
 * Walk a site's result pages for one query and yield a listing per card.
 *
 * Every navigation goes through the rate limiter. A denial page, challenge
 * marker or empty first page without a "no results" marker fails with
 * BlockedError; cards with nothing readable fail with ParseError. The session is
 * released however the walk ends, including when the consumer stops early.
 */
export async function* scrapeListingPages(
  site: SiteDefinition,
  config: SourceConfig,
  query: SearchQuery,
  maxPages: number,
  { browser, limiter, signal }: FetchContext,
): AsyncGenerator<JobListing> {
  const tag = `[${site.label}]`;
  const vocabulary = config.filters.general.technologyKeywords;
  const seen = new Set<string>();

  const session = await browser.acquire(signal);
  try {
    for (let page = 0; page < maxPages; page++) {
      if (signal.aborted) return;

      const url = site.searchUrl(query, page);
      console.log(`${tag} Fetching page ${page + 1}...`);
      await visit(site, session, url, limiter, signal);

      const cards = await session.queryAll(site.selectors.card);
      if (cards.length === 0) {
        const emptyMarker = site.selectors.noResults
          ? (await session.queryAll(site.selectors.noResults)).length > 0
          : false;
        if (page === 0 && !emptyMarker) {
          throw new BlockedError(site.id, 'no listings and no empty-result marker after navigation');
        }
        console.log(`${tag} No more jobs on page ${page + 1}, done.`);
        return;
      }

      const batch: ListingFields[] = [];
      let unreadable = 0;
      for (const card of cards) {
        const fields = await readCard(site, card);
        if (!fields) {
          unreadable++;
          continue;
        }
        const key = normalizeUrl(fields.url);
        if (seen.has(key)) continue;
        seen.add(key);
        batch.push(fields);
      }

      if (unreadable === cards.length) {
        throw new ParseError(site.id, `${cards.length} cards on page ${page + 1} but none had a title and link`);
      }

      console.log(`${tag} Page ${page + 1}: ${cards.length} cards, ${batch.length} new listings`);
      if (page > 0 && batch.length === 0) {
        console.log(`${tag} Page ${page + 1} repeats earlier listings, done.`);
        return;
      }

      for (const fields of batch) {
        if (signal.aborted) return;
        const complete =
          config.fetchDetails && !fields.description
            ? await fetchDescription(site, session, fields, limiter, signal)
            : fields;
        yield createJobListing(site.id, complete, vocabulary);
      }
    }
  } finally {
    await session.release();
  }
}

/**
 * Adapter for a site definition: the site's pages plus the source's own filter settings.
 */
export function siteAdapter(site: SiteDefinition, config: SourceConfig): SourceAdapter {
  return {
    id: site.id,
    config,
    qualityFilter: mode => new QualityFilter(config.filters[mode]),
    fetchRaw: (query, maxPages, context) => scrapeListingPages(site, config, query, maxPages, context),
  };
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}
