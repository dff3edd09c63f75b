import type { Reminder, ReminderRepository } from '../../persistence/repositories/ReminderRepository.js';
import { DAY_MS, systemClock, type Clock } from '../../utils/dates.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import { MAX_DAYS_AHEAD, reminderCreateSchema, reminderListQuerySchema, reminderStatusSchema } from './schemas.js';

export interface ReminderServiceOptions {
  clock?: Clock;
}

export class ReminderService {
  private readonly logger = createLogger({ service: 'ReminderService' });
  private readonly clock: Clock;

  constructor(
    private readonly reminderRepository: ReminderRepository,
    options: ReminderServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  create(userId: number, input: unknown): Reminder {
    const data = parseInput(reminderCreateSchema, input, 'Invalid reminder');
    const now = this.clock().getTime();
    const dueAt = new Date(data.dueAt).getTime();

    if (dueAt < now) {
      throw new ValidationError('Invalid reminder', [{ path: 'dueAt', message: 'Due time cannot be in the past' }]);
    }
    if (dueAt > now + MAX_DAYS_AHEAD * DAY_MS) {
      throw new ValidationError('Invalid reminder', [
        { path: 'dueAt', message: `Due time must be within ${MAX_DAYS_AHEAD} days` },
      ]);
    }

    const reminder = this.reminderRepository.create({ userId, title: data.title, dueAt, notes: data.notes }, now);
    this.logger.info({ userId, reminderId: reminder.id }, 'Reminder created');
    return reminder;
  }

  /** Soonest due first. Query values arrive as strings. */
  list(userId: number, query: unknown = {}): Reminder[] {
    const { includeCompleted } = parseInput(reminderListQuerySchema, query, 'Invalid reminder query');
    return this.reminderRepository.list(userId, includeCompleted);
  }

  setCompleted(userId: number, reminderId: number, input: unknown): Reminder {
    const { completed } = parseInput(reminderStatusSchema, input, 'Invalid reminder update');
    const reminder = this.reminderRepository.setCompleted(userId, reminderId, completed);
    if (!reminder) {
      throw new NotFoundError('Reminder');
    }
    this.logger.info({ userId, reminderId, completed }, 'Reminder status changed');
    return reminder;
  }

  delete(userId: number, reminderId: number): void {
    if (!this.reminderRepository.delete(userId, reminderId)) {
      throw new NotFoundError('Reminder');
    }
    this.logger.info({ userId, reminderId }, 'Reminder deleted');
  }
}
