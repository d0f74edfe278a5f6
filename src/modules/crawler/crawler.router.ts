/**
 * Crawler Router
 * Route definitions for the crawl control API
 */

import { Router } from 'express';
import { CrawlerController } from './crawler.controller';

export function createCrawlerRouter(controller: CrawlerController): Router {
  const router = Router();

  /**
   * @route   GET /api/crawl/status
   * @desc    Pipeline state, per-site queue depth and totals
   */
  router.get('/status', controller.getStatus);

  /**
   * @route   GET /api/crawl/metrics
   * @desc    Current metrics snapshot
   */
  router.get('/metrics', controller.getMetrics);

  /**
   * @route   GET /api/crawl/sites/:siteId/log
   * @desc    Latest crawl log entries of a site (?limit=N, default 100)
   */
  router.get('/sites/:siteId/log', controller.getSiteLog);

  /**
   * @route   POST /api/crawl/sites/:siteId/pause
   * @desc    Stop dispatching requests to a site
   */
  router.post('/sites/:siteId/pause', controller.pauseSite);

  /**
   * @route   POST /api/crawl/sites/:siteId/resume
   * @desc    Resume a paused site
   */
  router.post('/sites/:siteId/resume', controller.resumeSite);

  /**
   * @route   POST /api/crawl/stop
   * @desc    Graceful stop; pending work is saved
   */
  router.post('/stop', controller.stop);

  return router;
}
