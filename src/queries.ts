import { z } from 'zod';
import { readJsonFile } from './config';
import { ConfigurationError } from './errors';

export interface QueryCategory {
  slug: string;
  name: string;
  description: string;
  queries: readonly string[];
}

const categoriesSchema = z
  .array(
    z.object({
      slug: z.string().regex(/^[a-z0-9-]+$/),
      name: z.string().min(1),
      description: z.string().default(''),
      queries: z.array(z.string().trim().min(1)).min(1),
    }),
  )
  .min(1);

/**
 * Named groups of search queries ("core-llm", "rag-vector", ...) used for
 * category and comprehensive searches.
 */
export class QueryCatalog {
  private readonly categories: readonly QueryCategory[];

  constructor(categories: readonly QueryCategory[]) {
    const slugs = new Set<string>();
    for (const category of categories) {
      if (slugs.has(category.slug)) {
        throw new ConfigurationError(`Duplicate query category: ${category.slug}`);
      }
      slugs.add(category.slug);
    }
    this.categories = categories;
  }

  static parse(raw: unknown): QueryCatalog {
    const parsed = categoriesSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ConfigurationError(`Invalid query categories: ${detail}`);
    }
    return new QueryCatalog(parsed.data);
  }

  static fromFile(filePath: string): QueryCatalog {
    return QueryCatalog.parse(readJsonFile(filePath));
  }

  list(): readonly QueryCategory[] {
    return this.categories;
  }

  /** Find a category by slug or display name, ignoring case. */
  resolve(nameOrSlug: string): QueryCategory {
    const wanted = nameOrSlug.trim().toLowerCase();
    const category = this.categories.find(
      candidate => candidate.slug === wanted || candidate.name.toLowerCase() === wanted,
    );
    if (!category) {
      const available = this.categories.map(candidate => candidate.slug).join(', ');
      throw new ConfigurationError(`Unknown query category: ${nameOrSlug}. Available: ${available}`);
    }
    return category;
  }

  allQueries(): string[] {
    return [...new Set(this.categories.flatMap(category => category.queries))];
  }

  randomQuery(random: () => number = Math.random, category?: string): string {
    const pool = category ? this.resolve(category).queries : this.allQueries();
    return pool[Math.floor(random() * pool.length) % pool.length];
  }

  /** Queries containing `keyword`, case-insensitively. */
  search(keyword: string): string[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    return this.allQueries().filter(query => query.toLowerCase().includes(needle));
  }
}
