/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { CrawlPipeline } from './modules/crawler/crawl.pipeline';
import { CrawlerController } from './modules/crawler/crawler.controller';
import { createCrawlerRouter } from './modules/crawler/crawler.router';

export const createApp = (pipeline: CrawlPipeline): Application => {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Listing crawler is running',
      state: pipeline.getState(),
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
    });
  });

  app.use('/api/crawl', createCrawlerRouter(new CrawlerController(pipeline)));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // Error handler, registered last
  app.use(errorHandler);

  return app;
};
