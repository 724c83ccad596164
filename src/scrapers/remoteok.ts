import { siteAdapter, slugify, type SiteDefinition } from './pages';
import { applySeniority } from './normalize';
import type { AdapterFactory } from './types';

const BASE_URL = 'https://remoteok.com';
const RESULTS_PER_PAGE = 20;

export const REMOTEOK: SiteDefinition = {
  id: 'remoteok',
  label: 'RemoteOK',
  baseUrl: BASE_URL,
  selectors: {
    card: 'tr.job',
    title: 'h2[itemprop="title"]',
    link: 'a.preventLink',
    company: 'h3[itemprop="name"]',
    location: 'div.location',
    salary: 'div.salary',
    posted: 'time',
    tags: 'td.tags h3',
    jobId: { attribute: 'data-id' },
    noResults: 'div.no-jobs',
    challenge: ['#challenge-form', 'iframe[src*="captcha"]'],
    detailDescription: 'div.description',
  },
  searchUrl(query, page) {
    // RemoteOK is remote-only, so the location is not part of the search
    const tag = slugify(applySeniority(query.text, query.seniority));
    const offset = page * RESULTS_PER_PAGE;
    return offset === 0 ? `${BASE_URL}/remote-${tag}-jobs` : `${BASE_URL}/remote-${tag}-jobs?offset=${offset}`;
  },
  refine(fields) {
    return { ...fields, location: fields.location || 'Remote', remoteText: 'remote' };
  },
};

export const remoteOkAdapter: AdapterFactory = config => siteAdapter(REMOTEOK, config);
