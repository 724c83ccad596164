import { siteAdapter, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://www.ziprecruiter.com';
// Only postings from the last week
const DAYS_BACK = 7;
const RADIUS_MILES = 25;

export const ZIPRECRUITER: SiteDefinition = {
  id: 'ziprecruiter',
  label: 'ZipRecruiter',
  baseUrl: BASE_URL,
  selectors: {
    card: 'article.job_result',
    title: 'h2.job_title',
    link: 'a.job_link',
    company: 'a.company_name',
    location: '.company_location',
    salary: '.compensation',
    snippet: '.job_snippet',
    jobType: '.employment_type',
    posted: '.job_age',
    jobId: { attribute: 'data-job-id' },
    noResults: '.no_results',
    challenge: ['#challenge-form', 'iframe[src*="captcha"]'],
  },
  deniedTitle: /blocked|forbidden/i,
  searchUrl(query, page) {
    const params = new URLSearchParams({
      search: applySeniority(query.text, query.seniority),
      location: query.location,
      radius: String(RADIUS_MILES),
      days: String(DAYS_BACK),
      page: String(page + 1),
    });
    return `${BASE_URL}/jobs-search?${params.toString()}`;
  },
};

export const zipRecruiterAdapter: AdapterFactory = config => siteAdapter(ZIPRECRUITER, config);
