import type { Router } from 'express';
import express from 'express';
import type { AuthService } from '../../../core/auth/AuthService.js';
import { asyncHandler } from '../asyncHandler.js';
import { sessionOf } from '../context.js';
import { bearerToken, requireSession } from '../middleware/requireSession.js';

export function createAuthRouter(authService: AuthService): Router {
  const router = express.Router();

  router.post(
    '/register',
    asyncHandler(async (req, res) => {
      const user = await authService.register(req.body);
      res.status(201).json(user);
    })
  );

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      res.status(200).json(await authService.login(req.body));
    })
  );

  router.post('/logout', requireSession(authService), (req, res) => {
    const token = bearerToken(req);
    if (token) authService.logout(token);
    res.status(204).end();
  });

  router.get('/me', requireSession(authService), (req, res) => {
    res.status(200).json(sessionOf(req).user);
  });

  return router;
}
