import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { RunHistory } from '../db';
import { ConfigurationError, SearchInProgressError } from '../errors';
import type { JobSearchService } from '../search';
import { SOURCE_IDS } from '../scrapers/types';

const queryDefaults = {
  location: z.string().trim().default(''),
  maxPages: z.number().int().min(1).max(10).optional(),
  seniority: z.string().trim().min(1).optional(),
  sources: z.array(z.enum(SOURCE_IDS)).optional(),
  mode: z.enum(['general', 'strict']).default('general'),
};

const searchBody = z.object({
  query: z.string().trim().min(1),
  maxResults: z.number().int().min(1).optional(),
  ...queryDefaults,
});

const categoryBody = z.object({
  category: z.string().trim().min(1),
  maxJobsPerQuery: z.number().int().min(1).default(10),
  ...queryDefaults,
});

const comprehensiveBody = z.object({
  maxJobsPerCategory: z.number().int().min(1).default(5),
  ...queryDefaults,
});

const runsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof ConfigurationError) {
    res.status(400).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof SearchInProgressError) {
    res.status(409).json({ success: false, error: error.message });
    return;
  }
  console.error(`[API] ${action} error:`, error);
  res.status(500).json({ success: false, error: `Failed to ${action}` });
}

function sendInvalid(res: Response, error: z.ZodError): void {
  res.status(400).json({ success: false, error: 'Invalid request', issues: error.flatten().fieldErrors });
}

export function createSearchRouter(service: JobSearchService, history: RunHistory | null = null): Router {
  const router = Router();

  // GET /api/categories - query categories
  router.get('/categories', (_req: Request, res: Response) => {
    res.json({ success: true, categories: service.catalog.list() });
  });

  // GET /api/sources - configured sources, with recorded health when history is on
  router.get('/sources', (_req: Request, res: Response) => {
    try {
      const health = history ? history.sourceHealth() : [];
      const sources = service.sources.map(source => ({
        id: source.id,
        enabled: source.enabled,
        priority: source.priority,
        maxPages: source.maxPages,
        health: health.find(entry => entry.source === source.id) ?? null,
      }));
      res.json({ success: true, sources });
    } catch (error) {
      sendError(res, error, 'list sources');
    }
  });

  // POST /api/search - one query
  router.post('/search', async (req: Request, res: Response) => {
    const body = searchBody.safeParse(req.body);
    if (!body.success) {
      sendInvalid(res, body.error);
      return;
    }
    const { query, ...rest } = body.data;
    try {
      const result = await service.search({ ...rest, text: query });
      res.json({ success: true, result });
    } catch (error) {
      sendError(res, error, 'run search');
    }
  });

  // POST /api/search/category - the first queries of one category
  router.post('/search/category', async (req: Request, res: Response) => {
    const body = categoryBody.safeParse(req.body);
    if (!body.success) {
      sendInvalid(res, body.error);
      return;
    }
    const { category, maxJobsPerQuery, ...defaults } = body.data;
    try {
      const result = await service.searchCategory(category, maxJobsPerQuery, defaults);
      res.json({ success: true, result });
    } catch (error) {
      sendError(res, error, 'run category search');
    }
  });

  // POST /api/search/comprehensive - one query from every category
  router.post('/search/comprehensive', async (req: Request, res: Response) => {
    const body = comprehensiveBody.safeParse(req.body ?? {});
    if (!body.success) {
      sendInvalid(res, body.error);
      return;
    }
    const { maxJobsPerCategory, ...defaults } = body.data;
    try {
      const result = await service.searchComprehensive(maxJobsPerCategory, defaults);
      res.json({ success: true, result });
    } catch (error) {
      sendError(res, error, 'run comprehensive search');
    }
  });

  // GET /api/runs - recent searches
  router.get('/runs', (req: Request, res: Response) => {
    const query = runsQuery.safeParse(req.query);
    if (!query.success) {
      sendInvalid(res, query.error);
      return;
    }
    try {
      const runs = history ? history.recentRuns(query.data.limit) : [];
      res.json({ success: true, recording: history !== null, runs });
    } catch (error) {
      sendError(res, error, 'list runs');
    }
  });

  return router;
}
