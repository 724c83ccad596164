import express from 'express';
import cors from 'cors';
import type { RunHistory } from './db';
import { createSearchRouter } from './routes/search';
import type { JobSearchService } from './search';

export function createApp(service: JobSearchService, history: RunHistory | null = null): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use((req, _res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Routes
  app.use('/api', createSearchRouter(service, history));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), service: 'jobsweep' });
  });

  // Error handler
  app.use(
    (err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      console.error('[Error]', err);
      res.status(500).json({ success: false, error: 'Internal server error' });
    }
  );

  return app;
}
