import { siteAdapter, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://www.glassdoor.com';

export const GLASSDOOR: SiteDefinition = {
  id: 'glassdoor',
  label: 'Glassdoor',
  baseUrl: BASE_URL,
  selectors: {
    card: 'li[data-test="jobListing"]',
    title: 'a[data-test="job-title"]',
    link: 'a[data-test="job-title"]',
    company: '[data-test="employer-name"]',
    location: '[data-test="emp-location"]',
    salary: '[data-test="detailSalary"]',
    snippet: '[data-test="descSnippet"]',
    posted: '[data-test="job-age"]',
    jobId: { attribute: 'data-jobid' },
    noResults: '[data-test="no-results"]',
    challenge: ['#px-captcha', 'div.cf-browser-verification'],
  },
  deniedTitle: /help us protect glassdoor/i,
  searchUrl(query, page) {
    const params = new URLSearchParams({
      'sc.keyword': applySeniority(query.text, query.seniority),
      locKeyword: query.location,
      fromAge: '7',
      p: String(page + 1),
    });
    return `${BASE_URL}/Job/jobs.htm?${params.toString()}`;
  },
};

export const glassdoorAdapter: AdapterFactory = config => siteAdapter(GLASSDOOR, config);
