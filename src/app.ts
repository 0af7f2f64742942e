/**
 * Credit Decision Engine - Express Application
 */

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createOriginationRoutes } from './api';
import { OriginationService } from './modules/loans';

const DEFAULT_RATE_LIMIT_PER_MINUTE = 120;

export interface AppDependencies {
  originationService: OriginationService;
  mode: 'postgres' | 'mock';
  rateLimitPerMinute?: number;
}

export function rateLimitFromEnv(value: string | undefined): number {
  const parsed = parseInt(value || '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_RATE_LIMIT_PER_MINUTE;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: deps.rateLimitPerMinute ?? DEFAULT_RATE_LIMIT_PER_MINUTE,
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'OK', service: 'credit-decision-engine', mode: deps.mode, timestamp: new Date().toISOString() });
  });

  app.use('/api/v1', createOriginationRoutes({ originationService: deps.originationService }));

  // Error handler (malformed JSON bodies land here too)
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('[Error]', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
