import { describe, it, expect } from 'vitest';
import {
  applySeniority,
  cityOf,
  createJobListing,
  detectJobType,
  detectRemoteType,
  keywordPattern,
  normalizeCompany,
  normalizeUrl,
  parseSalary,
} from '../src/scrapers/normalize';
import { VOCABULARY } from './helpers/listings';

describe('normalizeUrl', () => {
  it('forces https, drops the fragment and tracking parameters, sorts the rest', () => {
    expect(normalizeUrl('HTTP://WWW.Example.com/jobs/123/?utm_source=x&b=2&a=1#frag')).toBe(
      'https://www.example.com/jobs/123?a=1&b=2',
    );
  });

  it('strips job-board tracking parameters regardless of case', () => {
    expect(normalizeUrl('https://www.linkedin.com/jobs/view/42?trk=public&refId=abc&trackingId=xyz')).toBe(
      'https://www.linkedin.com/jobs/view/42',
    );
  });

  it('removes the trailing slash of a bare host', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
  });

  it('resolves relative links against a base', () => {
    expect(normalizeUrl('/c/job?jid=1', 'https://www.ziprecruiter.com')).toBe(
      'https://www.ziprecruiter.com/c/job?jid=1',
    );
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl('  not a url ')).toBe('not a url');
  });
});

describe('company and location normalization', () => {
  it('drops legal suffixes and punctuation from company names', () => {
    expect(normalizeCompany('Acme AI, Inc.')).toBe('acme ai');
    expect(normalizeCompany('Globex Corporation')).toBe('globex');
  });

  it('keeps a company that is only a suffix word', () => {
    expect(normalizeCompany('Company')).toBe('company');
  });

  it('reduces locations to the city', () => {
    expect(cityOf('Houston, TX')).toBe('houston');
    expect(cityOf('Remote - US')).toBe('remote');
    expect(cityOf('New York (Hybrid)')).toBe('new york');
  });
});

describe('keywordPattern', () => {
  it('matches whole words only', () => {
    expect(keywordPattern('hr').test('three openings')).toBe(false);
    expect(keywordPattern('hr').test('HR generalist')).toBe(true);
  });

  it('matches keywords with punctuation and flexible spacing', () => {
    expect(keywordPattern('ai/ml').test('AI/ML Engineer')).toBe(true);
    expect(keywordPattern('machine learning').test('Machine  Learning role')).toBe(true);
  });
});

describe('parseSalary', () => {
  it('reads annual ranges written in thousands', () => {
    expect(parseSalary('$120K - $150K a year')).toEqual({ min: 120000, max: 150000 });
  });

  it('annualizes hourly pay', () => {
    expect(parseSalary('$55 - $70 an hour')).toEqual({ min: 114400, max: 145600 });
  });

  it('annualizes monthly pay', () => {
    expect(parseSalary('$8,000 a month')).toEqual({ min: 96000, max: 96000 });
  });

  it('reads a single figure with separators', () => {
    expect(parseSalary('$95,000')).toEqual({ min: 95000, max: 95000 });
  });

  it('returns null without numbers', () => {
    expect(parseSalary('Competitive')).toBeNull();
    expect(parseSalary(undefined)).toBeNull();
  });
});

describe('job and remote type detection', () => {
  it('detects job types', () => {
    expect(detectJobType('Full-time')).toBe('full_time');
    expect(detectJobType('Part time')).toBe('part_time');
    expect(detectJobType('Contract')).toBe('contract');
    expect(detectJobType('Summer Internship')).toBe('internship');
    expect(detectJobType('')).toBe('unknown');
  });

  it('prefers hybrid over remote and remote over on-site', () => {
    expect(detectRemoteType('Hybrid remote')).toBe('hybrid');
    expect(detectRemoteType(undefined, 'Remote - US')).toBe('remote');
    expect(detectRemoteType('On-site')).toBe('onsite');
    expect(detectRemoteType('Austin, TX')).toBe('unknown');
  });
});

describe('createJobListing', () => {
  const job = createJobListing(
    'indeed',
    {
      url: 'https://www.indeed.com/viewjob?jk=abc&from=serp',
      title: '  Senior  LLM Engineer ',
      company: 'Acme',
      location: 'Remote',
      description: 'Build RAG pipelines with Python and PyTorch.',
      salaryText: '$150K - $180K a year',
      tags: ['LangChain', ' '],
    },
    VOCABULARY,
  );

  it('normalizes the identity key and cleans text', () => {
    expect(job.key).toBe('https://www.indeed.com/viewjob?jk=abc');
    expect(job.url).toBe('https://www.indeed.com/viewjob?jk=abc&from=serp');
    expect(job.title).toBe('Senior LLM Engineer');
  });

  it('derives salary, types and skills', () => {
    expect(job.salaryMin).toBe(150000);
    expect(job.salaryMax).toBe(180000);
    expect(job.jobType).toBe('unknown');
    expect(job.remoteType).toBe('remote');
    expect(job.skills).toEqual(['langchain', 'llm', 'python', 'pytorch', 'rag']);
  });

  it('records field completeness', () => {
    expect(job.completeness).toEqual({
      hasCompany: true,
      hasLocation: true,
      hasDescription: true,
      hasSalary: true,
      hasJobType: false,
      hasRemoteType: true,
    });
    expect(job.descriptionLength).toBe(44);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.skills)).toBe(true);
  });
});

describe('applySeniority', () => {
  it('prefixes senior and staff-level hints', () => {
    expect(applySeniority('LLM engineer', 'senior')).toBe('Senior LLM engineer');
    expect(applySeniority('LLM engineer', 'sr')).toBe('Senior LLM engineer');
    expect(applySeniority('LLM engineer', 'Staff')).toBe('Staff LLM engineer');
  });

  it('leaves other levels alone', () => {
    expect(applySeniority('LLM engineer', 'junior')).toBe('LLM engineer');
    expect(applySeniority('LLM engineer')).toBe('LLM engineer');
  });
});
