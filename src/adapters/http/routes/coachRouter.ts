import type { Router } from 'express';
import express from 'express';
import type { CoachService } from '../../../core/coach/CoachService.js';
import { asyncHandler } from '../asyncHandler.js';
import { userIdOf } from '../context.js';

export function createCoachRouter(coachService: CoachService): Router {
  const router = express.Router();

  router.get('/suggestions', (req, res) => {
    res.status(200).json(coachService.suggestions(userIdOf(req)));
  });

  router.get('/messages', (req, res) => {
    res.status(200).json({ messages: coachService.history(userIdOf(req)) });
  });

  router.post(
    '/messages',
    asyncHandler(async (req, res) => {
      res.status(201).json(await coachService.ask(userIdOf(req), req.body));
    })
  );

  router.delete('/messages', (req, res) => {
    res.status(200).json({ removed: coachService.clear(userIdOf(req)) });
  });

  return router;
}
