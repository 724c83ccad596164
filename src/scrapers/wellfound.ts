import { siteAdapter, slugify, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://wellfound.com';

// Startup roles; remote searches live under /role/r/, located ones under /role/l/
export const WELLFOUND: SiteDefinition = {
  id: 'wellfound',
  label: 'Wellfound',
  baseUrl: BASE_URL,
  selectors: {
    card: 'div[data-test="JobSearchResult"]',
    title: 'a[data-test="job-link"]',
    link: 'a[data-test="job-link"]',
    company: '[data-test="startup-name"]',
    location: '[data-test="job-location"]',
    salary: '[data-test="job-compensation"]',
    jobType: '[data-test="job-type"]',
    posted: '[data-test="job-posted"]',
    tags: '[data-test="job-tag"]',
    noResults: '[data-test="EmptyResults"]',
    challenge: ['#challenge-form', 'iframe[src*="captcha"]'],
    detailDescription: 'div[data-test="JobDescription"]',
  },
  searchUrl(query, page) {
    const role = slugify(applySeniority(query.text, query.seniority));
    const location = slugify(query.location);
    const path = !location || location === 'remote' ? `/role/r/${role}` : `/role/l/${role}/${location}`;
    return page === 0 ? `${BASE_URL}${path}` : `${BASE_URL}${path}?page=${page + 1}`;
  },
};

export const wellfoundAdapter: AdapterFactory = config => siteAdapter(WELLFOUND, config);
