import { describe, it, expect, beforeEach } from 'vitest';
import { ReminderService } from '../../core/reminders/ReminderService.js';
import { ReminderRepository } from '../../persistence/repositories/ReminderRepository.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { createClock, createTestStore, detailsOf, insertUser, thrownBy, type TestStore } from '../helpers.js';

describe('ReminderService', () => {
  let store: TestStore;
  let service: ReminderService;
  let userId: number;

  beforeEach(() => {
    store = createTestStore();
    userId = insertUser(store.users);
    service = new ReminderService(new ReminderRepository(store.db), {
      clock: createClock('2026-04-01T08:00:00.000Z'),
    });
  });

  it('creates a reminder', () => {
    const reminder = service.create(userId, {
      title: '  Morning run ',
      dueAt: '2026-04-02T06:30:00+02:00',
      notes: 'Bring water',
    });

    expect(reminder).toEqual({
      id: 1,
      userId,
      title: 'Morning run',
      dueAt: Date.parse('2026-04-02T04:30:00.000Z'),
      notes: 'Bring water',
      completed: false,
      createdAt: Date.parse('2026-04-01T08:00:00.000Z'),
    });
  });

  it('rejects a due time in the past', () => {
    const error = thrownBy(() => service.create(userId, { title: 'Stretch', dueAt: '2026-04-01T07:59:00Z' }));

    expect(detailsOf(error)).toEqual([{ path: 'dueAt', message: 'Due time cannot be in the past' }]);
  });

  it('rejects a due time more than 365 days ahead', () => {
    expect(() => service.create(userId, { title: 'Stretch', dueAt: '2027-04-01T08:00:00Z' })).not.toThrow();

    const error = thrownBy(() => service.create(userId, { title: 'Stretch', dueAt: '2027-04-01T08:00:01Z' }));
    expect(detailsOf(error)).toEqual([{ path: 'dueAt', message: 'Due time must be within 365 days' }]);
  });

  it('rejects a blank title and a date without time', () => {
    expect(() => service.create(userId, { title: ' ', dueAt: '2026-04-02T06:30:00Z' })).toThrow(ValidationError);
    expect(() => service.create(userId, { title: 'Yoga', dueAt: '2026-04-02' })).toThrow(ValidationError);
  });

  it('lists soonest first and can hide completed ones', () => {
    const later = service.create(userId, { title: 'Later', dueAt: '2026-04-10T08:00:00Z' });
    const sooner = service.create(userId, { title: 'Sooner', dueAt: '2026-04-03T08:00:00Z' });
    service.setCompleted(userId, sooner.id, { completed: true });

    expect(service.list(userId).map((reminder) => reminder.title)).toEqual(['Sooner', 'Later']);
    expect(service.list(userId, { includeCompleted: 'false' })).toEqual([later]);
  });

  it('marks a reminder completed and open again', () => {
    const reminder = service.create(userId, { title: 'Yoga', dueAt: '2026-04-02T18:00:00Z' });

    expect(service.setCompleted(userId, reminder.id, { completed: true }).completed).toBe(true);
    expect(service.setCompleted(userId, reminder.id, { completed: false }).completed).toBe(false);
    expect(() => service.setCompleted(userId, reminder.id, { completed: 'yes' })).toThrow(ValidationError);
  });

  it("does not touch another user's reminders", () => {
    const otherId = insertUser(store.users, { username: 'sam' });
    const reminder = service.create(userId, { title: 'Yoga', dueAt: '2026-04-02T18:00:00Z' });

    expect(() => service.setCompleted(otherId, reminder.id, { completed: true })).toThrow(NotFoundError);
    expect(() => service.delete(otherId, reminder.id)).toThrow(new NotFoundError('Reminder'));
    expect(service.list(otherId)).toEqual([]);
  });

  it('deletes a reminder', () => {
    const reminder = service.create(userId, { title: 'Yoga', dueAt: '2026-04-02T18:00:00Z' });
    service.delete(userId, reminder.id);

    expect(service.list(userId)).toEqual([]);
  });
});
