import type { Router } from 'express';
import express from 'express';
import type { ProfileService } from '../../../core/profile/ProfileService.js';
import { asyncHandler } from '../asyncHandler.js';
import { sessionOf, userIdOf } from '../context.js';

export function createProfileRouter(profileService: ProfileService): Router {
  const router = express.Router();

  router.get('/', (req, res) => {
    res.status(200).json(profileService.getProfile(userIdOf(req)));
  });

  router.patch('/', (req, res) => {
    res.status(200).json(profileService.updateProfile(userIdOf(req), req.body));
  });

  router.post(
    '/password',
    asyncHandler(async (req, res) => {
      const session = sessionOf(req);
      await profileService.changePassword(session.user.id, req.body, session.tokenHash);
      res.status(204).end();
    })
  );

  router.delete(
    '/',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      const password = typeof body === 'object' && body !== null && 'password' in body ? body.password : undefined;
      await profileService.deleteAccount(userIdOf(req), password);
      res.status(204).end();
    })
  );

  return router;
}
