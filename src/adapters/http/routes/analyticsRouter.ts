import type { Router } from 'express';
import express from 'express';
import type { AnalyticsService } from '../../../core/analytics/AnalyticsService.js';
import { userIdOf } from '../context.js';

/** Chart-ready aggregates. Query strings carry category, from, to and bucket. */
export function createAnalyticsRouter(analyticsService: AnalyticsService): Router {
  const router = express.Router();

  router.get('/summary', (req, res) => {
    res.status(200).json(analyticsService.summary(userIdOf(req), req.query));
  });

  router.get('/series', (req, res) => {
    res.status(200).json(analyticsService.series(userIdOf(req), req.query));
  });

  router.get('/overview', (req, res) => {
    res.status(200).json(analyticsService.overview(userIdOf(req)));
  });

  return router;
}
