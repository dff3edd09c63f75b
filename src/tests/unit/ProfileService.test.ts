import { describe, it, expect, beforeEach } from 'vitest';
import { AuthService, hashToken } from '../../core/auth/AuthService.js';
import { EntryService } from '../../core/entries/EntryService.js';
import { bodyMassIndex, ProfileService } from '../../core/profile/ProfileService.js';
import { AuthenticationError, ConflictError, ValidationError } from '../../utils/errors.js';
import {
  createClock,
  createTestStore,
  detailsOf,
  registration,
  TEST_BCRYPT_ROUNDS,
  TEST_PASSWORD,
  type TestClock,
  type TestStore,
} from '../helpers.js';

describe('bodyMassIndex', () => {
  it('rounds to one decimal', () => {
    expect(bodyMassIndex(170, 70)).toBe(24.2);
    expect(bodyMassIndex(180, 81)).toBe(25);
  });

  it('is null without height or weight', () => {
    expect(bodyMassIndex(undefined, 70)).toBeNull();
    expect(bodyMassIndex(170, undefined)).toBeNull();
  });
});

describe('ProfileService', () => {
  let store: TestStore;
  let clock: TestClock;
  let auth: AuthService;
  let profiles: ProfileService;
  let userId: number;

  beforeEach(async () => {
    store = createTestStore();
    clock = createClock('2026-03-01T09:00:00.000Z');
    auth = new AuthService(store.users, store.sessions, {
      sessionTtlHours: 24,
      bcryptRounds: TEST_BCRYPT_ROUNDS,
      clock,
    });
    profiles = new ProfileService(store.users, store.sessions, { bcryptRounds: TEST_BCRYPT_ROUNDS, clock });
    userId = (await auth.register(registration({ heightCm: 180, weightKg: 81, fitnessGoals: ['Muscle Gain'] }))).id;
  });

  it('returns the profile with account age and BMI', () => {
    clock.advanceDays(10);

    expect(profiles.getProfile(userId)).toEqual({
      id: userId,
      username: 'alex',
      email: 'alex@example.com',
      firstName: 'Alex',
      lastName: 'Doe',
      heightCm: 180,
      weightKg: 81,
      fitnessGoals: ['Muscle Gain'],
      createdAt: Date.parse('2026-03-01T09:00:00.000Z'),
      accountAgeDays: 10,
      bmi: 25,
    });
  });

  describe('updateProfile', () => {
    it('changes only the given fields', () => {
      const updated = profiles.updateProfile(userId, { weightKg: 78.5, fitnessGoals: ['Flexibility', 'Flexibility'] });

      expect(updated).toMatchObject({ weightKg: 78.5, heightCm: 180, firstName: 'Alex', fitnessGoals: ['Flexibility'] });
      expect(store.users.getById(userId)?.weightKg).toBe(78.5);
    });

    it("refuses another user's email", async () => {
      await auth.register(registration({ username: 'sam', email: 'sam@example.com' }));

      expect(() => profiles.updateProfile(userId, { email: 'Sam@Example.com' })).toThrow(
        new ConflictError('Email already registered')
      );
    });

    it('rejects out-of-range values and unknown fields', () => {
      expect(() => profiles.updateProfile(userId, { heightCm: 90 })).toThrow(ValidationError);
      expect(() => profiles.updateProfile(userId, { username: 'new-name' })).toThrow(ValidationError);
    });
  });

  describe('changePassword', () => {
    const change = {
      currentPassword: TEST_PASSWORD,
      newPassword: 'new-test-password',
      newPasswordConfirm: 'new-test-password',
    };

    it('replaces the password and revokes the other sessions', async () => {
      const kept = await auth.login({ username: 'alex', password: TEST_PASSWORD });
      const other = await auth.login({ username: 'alex', password: TEST_PASSWORD });

      await profiles.changePassword(userId, change, hashToken(kept.token));

      expect(auth.authenticate(kept.token).user.id).toBe(userId);
      expect(() => auth.authenticate(other.token)).toThrow(AuthenticationError);
      await expect(auth.login({ username: 'alex', password: TEST_PASSWORD })).rejects.toThrow(AuthenticationError);
      await expect(auth.login({ username: 'alex', password: 'new-test-password' })).resolves.toMatchObject({
        user: { id: userId },
      });
    });

    it('rejects a wrong current password', async () => {
      await expect(profiles.changePassword(userId, { ...change, currentPassword: 'wrong-password' })).rejects.toThrow(
        new AuthenticationError('Current password is incorrect')
      );
    });

    it('rejects a confirmation that does not match', async () => {
      const error = await profiles.changePassword(userId, { ...change, newPasswordConfirm: 'different-password' }).then(
        () => undefined,
        (e: unknown) => e
      );

      expect(detailsOf(error)).toEqual([
        { path: 'newPasswordConfirm', message: 'New password and confirmation do not match' },
      ]);
    });
  });

  describe('deleteAccount', () => {
    it('keeps the account when the password is wrong', async () => {
      await expect(profiles.deleteAccount(userId, 'wrong-password')).rejects.toThrow(AuthenticationError);
      await expect(profiles.deleteAccount(userId, undefined)).rejects.toThrow(AuthenticationError);
      expect(store.users.getById(userId)).not.toBeNull();
    });

    it('removes the user with their sessions and entries', async () => {
      const entries = new EntryService(store.entries, store.users, { moodOncePerDay: true, clock });
      entries.logMood(userId, { score: 4 });
      const { token } = await auth.login({ username: 'alex', password: TEST_PASSWORD });

      await profiles.deleteAccount(userId, TEST_PASSWORD);

      expect(store.users.getById(userId)).toBeNull();
      expect(store.entries.count(userId)).toBe(0);
      expect(store.sessions.countForUser(userId)).toBe(0);
      expect(() => auth.authenticate(token)).toThrow(AuthenticationError);
      expect(() => profiles.getProfile(userId)).toThrow('User not found');
    });
  });
});
