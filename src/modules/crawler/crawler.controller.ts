/**
 * Crawler Controller
 * HTTP handlers for the crawl control API
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { ApiError, asyncHandler } from '../../middleware/error-handler';
import { CrawlPipeline } from './crawl.pipeline';

const LogQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(100),
});

export class CrawlerController {
  constructor(private readonly pipeline: CrawlPipeline) {}

  /**
   * GET /api/crawl/status
   */
  getStatus = asyncHandler(async (_req: Request, res: Response) => {
    res.json({ success: true, status: this.pipeline.status() });
  });

  /**
   * GET /api/crawl/metrics
   */
  getMetrics = asyncHandler(async (_req: Request, res: Response) => {
    res.json({ success: true, metrics: this.pipeline.metrics() });
  });

  /**
   * GET /api/crawl/sites/:siteId/log?limit=N
   */
  getSiteLog = asyncHandler(async (req: Request, res: Response) => {
    const { siteId } = req.params;
    const query = LogQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ApiError(400, 'limit must be an integer between 1 and 1000');
    }
    const entries = this.pipeline.recentLog(siteId, query.data.limit);
    if (entries === null) {
      throw new ApiError(404, `Unknown site: ${siteId}`);
    }
    res.json({ success: true, siteId, entries });
  });

  /**
   * POST /api/crawl/sites/:siteId/pause
   */
  pauseSite = asyncHandler(async (req: Request, res: Response) => {
    const { siteId } = req.params;
    if (!this.pipeline.pauseSite(siteId)) {
      throw new ApiError(404, `Unknown site: ${siteId}`);
    }
    res.json({ success: true, siteId, paused: true });
  });

  /**
   * POST /api/crawl/sites/:siteId/resume
   */
  resumeSite = asyncHandler(async (req: Request, res: Response) => {
    const { siteId } = req.params;
    if (!this.pipeline.resumeSite(siteId)) {
      throw new ApiError(404, `Unknown site: ${siteId}`);
    }
    res.json({ success: true, siteId, paused: false });
  });

  /**
   * POST /api/crawl/stop
   * Responds once workers have exited and the frontier is saved
   */
  stop = asyncHandler(async (_req: Request, res: Response) => {
    await this.pipeline.stop();
    res.json({ success: true, status: this.pipeline.status() });
  });
}
