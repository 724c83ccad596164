import { siteAdapter, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://www.indeed.com';
const RESULTS_PER_PAGE = 10;

export const INDEED: SiteDefinition = {
  id: 'indeed',
  label: 'Indeed',
  baseUrl: BASE_URL,
  selectors: {
    card: 'div.job_seen_beacon',
    title: 'h2.jobTitle span[title]',
    link: 'a.jcs-JobTitle',
    company: '[data-testid="company-name"]',
    location: '[data-testid="text-location"]',
    salary: '.salary-snippet-container',
    snippet: '[data-testid="jobsnippet_footer"]',
    jobType: '[data-testid="attribute_snippet_testid"]',
    posted: 'span.date',
    jobId: { selector: 'a.jcs-JobTitle', attribute: 'data-jk' },
    noResults: '.jobsearch-NoResult-messageContainer',
    challenge: ['#challenge-running', 'form#captcha-form', 'iframe[title*="hCaptcha"]'],
  },
  deniedTitle: /hcaptcha|blocked/i,
  searchUrl(query, page) {
    const params = new URLSearchParams({
      q: applySeniority(query.text, query.seniority),
      l: query.location,
      fromage: '7',
      start: String(page * RESULTS_PER_PAGE),
    });
    return `${BASE_URL}/jobs?${params.toString()}`;
  },
  // Card links go through a click tracker; the job key gives the stable posting page.
  refine(fields) {
    if (!fields.sourceJobId) return fields;
    return { ...fields, url: `${BASE_URL}/viewjob?jk=${encodeURIComponent(fields.sourceJobId)}` };
  },
};

export const indeedAdapter: AdapterFactory = config => siteAdapter(INDEED, config);
