import { QualityFilter } from '../../src/scrapers/filters';
import type { AdapterFactory, FetchContext, JobListing, SearchQuery, SourceId } from '../../src/scrapers/types';
import { listing } from './listings';

/** Produces the raw sequence for the n-th fetchRaw call (1-based). */
export type Script = (context: FetchContext, call: number, query: SearchQuery) => AsyncIterable<JobListing>;

/** Adapter whose pages are replaced by a script. */
export function scripted(script: Script): AdapterFactory {
  return config => {
    let calls = 0;
    return {
      id: config.id,
      config,
      qualityFilter: mode => new QualityFilter(config.filters[mode]),
      fetchRaw: (query, _maxPages, context) => script(context, ++calls, query),
    };
  };
}

/** Passes the default test filter with a score of 0.7. */
export function goodJob(source: SourceId, id: string | number): JobListing {
  return listing(
    {
      url: `https://${source}.example.com/jobs/${id}`,
      title: 'LLM Engineer',
      description: `Python ${'a'.repeat(793)}`,
      jobTypeText: 'Full-time',
      location: 'Remote',
    },
    source,
  );
}

/** Rejected by the default test filter for the exclude keyword "sales". */
export function badJob(source: SourceId, id: string | number): JobListing {
  return listing({ url: `https://${source}.example.com/jobs/${id}`, title: 'Sales Manager' }, source);
}

export async function* jobs(...items: JobListing[]): AsyncGenerator<JobListing> {
  for (const item of items) yield item;
}
