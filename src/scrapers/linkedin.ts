import { siteAdapter, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://www.linkedin.com';
const RESULTS_PER_PAGE = 25;
const PAST_WEEK = 'r604800';

/**
 * Public (signed-out) job search. LinkedIn answers scrapers with HTTP 999 or the
 * sign-in wall, both of which count as blocked.
 */
export const LINKEDIN: SiteDefinition = {
  id: 'linkedin',
  label: 'LinkedIn',
  baseUrl: BASE_URL,
  selectors: {
    card: 'div.base-search-card',
    title: 'h3.base-search-card__title',
    link: 'a.base-card__full-link',
    company: 'h4.base-search-card__subtitle',
    location: 'span.job-search-card__location',
    salary: 'span.job-search-card__salary-info',
    posted: 'time',
    jobId: { attribute: 'data-entity-urn' },
    noResults: 'section.two-pane-serp-page__no-results',
    challenge: ['form#captcha-internal', 'div.authwall-join-form'],
    detailDescription: 'div.show-more-less-html__markup',
  },
  deniedTitle: /sign in|join linkedin|security verification/i,
  searchUrl(query, page) {
    const params = new URLSearchParams({
      keywords: applySeniority(query.text, query.seniority),
      location: query.location,
      f_TPR: PAST_WEEK,
      start: String(page * RESULTS_PER_PAGE),
    });
    return `${BASE_URL}/jobs/search?${params.toString()}`;
  },
  refine(fields) {
    // "urn:li:jobPosting:3812345678" -> "3812345678"
    const id = fields.sourceJobId?.split(':').pop();
    if (!id) return fields;
    return { ...fields, sourceJobId: id, url: `${BASE_URL}/jobs/view/${id}` };
  },
};

export const linkedInAdapter: AdapterFactory = config => siteAdapter(LINKEDIN, config);
