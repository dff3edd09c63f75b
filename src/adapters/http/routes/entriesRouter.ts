import type { Router } from 'express';
import express from 'express';
import type { EntryService } from '../../../core/entries/EntryService.js';
import { parseId, userIdOf } from '../context.js';

export function createEntriesRouter(entryService: EntryService): Router {
  const router = express.Router();

  router.post('/workout', (req, res) => {
    res.status(201).json(entryService.logWorkout(userIdOf(req), req.body));
  });

  router.post('/mood', (req, res) => {
    res.status(201).json(entryService.logMood(userIdOf(req), req.body));
  });

  router.post('/habit', (req, res) => {
    res.status(201).json(entryService.logHabit(userIdOf(req), req.body));
  });

  router.get('/', (req, res) => {
    res.status(200).json(entryService.list(userIdOf(req), req.query));
  });

  router.get('/:id', (req, res) => {
    res.status(200).json(entryService.get(userIdOf(req), parseId(req.params.id)));
  });

  router.delete('/:id', (req, res) => {
    entryService.delete(userIdOf(req), parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
