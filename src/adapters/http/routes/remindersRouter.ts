import type { Router } from 'express';
import express from 'express';
import type { ReminderService } from '../../../core/reminders/ReminderService.js';
import { parseId, userIdOf } from '../context.js';

export function createRemindersRouter(reminderService: ReminderService): Router {
  const router = express.Router();

  router.get('/', (req, res) => {
    res.status(200).json(reminderService.list(userIdOf(req), req.query));
  });

  router.post('/', (req, res) => {
    res.status(201).json(reminderService.create(userIdOf(req), req.body));
  });

  router.patch('/:id', (req, res) => {
    res.status(200).json(reminderService.setCompleted(userIdOf(req), parseId(req.params.id), req.body));
  });

  router.delete('/:id', (req, res) => {
    reminderService.delete(userIdOf(req), parseId(req.params.id));
    res.status(204).end();
  });

  return router;
}
