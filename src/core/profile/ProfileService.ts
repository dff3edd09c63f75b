import type { SessionRepository } from '../../persistence/repositories/SessionRepository.js';
import {
  withoutCredentials,
  type User,
  type UserRepository,
  type UserWithCredentials,
} from '../../persistence/repositories/UserRepository.js';
import { daysBetween, systemClock, type Clock } from '../../utils/dates.js';
import { AuthenticationError, ConflictError, NotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import { hashPassword, verifyPassword } from '../auth/passwords.js';
import { changePasswordSchema, profileUpdateSchema } from '../auth/schemas.js';

export interface Profile extends User {
  accountAgeDays: number;
  /** Body mass index to one decimal, when height and weight are both known */
  bmi: number | null;
}

export interface ProfileServiceOptions {
  bcryptRounds: number;
  clock?: Clock;
}

export function bodyMassIndex(heightCm: number | undefined, weightKg: number | undefined): number | null {
  if (heightCm === undefined || weightKg === undefined || heightCm <= 0) {
    return null;
  }
  const meters = heightCm / 100;
  return Math.round((weightKg / (meters * meters)) * 10) / 10;
}

export class ProfileService {
  private readonly logger = createLogger({ service: 'ProfileService' });
  private readonly clock: Clock;

  constructor(
    private readonly userRepository: UserRepository,
    private readonly sessionRepository: SessionRepository,
    private readonly options: ProfileServiceOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  getProfile(userId: number): Profile {
    return this.toProfile(this.requireUser(userId));
  }

  updateProfile(userId: number, patch: unknown): Profile {
    const data = parseInput(profileUpdateSchema, patch, 'Invalid profile update');
    const current = this.requireUser(userId);

    if (data.email !== undefined && data.email !== current.email) {
      const owner = this.userRepository.getByEmail(data.email);
      if (owner && owner.id !== userId) {
        throw new ConflictError('Email already registered');
      }
    }

    const updated = this.userRepository.updateProfile(userId, data);
    if (!updated) {
      throw new NotFoundError('User');
    }

    this.logger.info({ userId, fields: Object.keys(data) }, 'Profile updated');
    return this.toProfile(updated);
  }

  /**
   * Replace the password after checking the current one. Every other session of the user is
   * revoked; the caller's own session survives when its hash is given.
   */
  async changePassword(userId: number, input: unknown, keepTokenHash?: string): Promise<void> {
    const data = parseInput(changePasswordSchema, input, 'Invalid password change');
    const user = this.requireUser(userId);

    if (!(await verifyPassword(data.currentPassword, user.passwordHash))) {
      throw new AuthenticationError('Current password is incorrect');
    }

    const passwordHash = await hashPassword(data.newPassword, this.options.bcryptRounds);
    this.userRepository.updatePasswordHash(userId, passwordHash);
    const revoked = this.sessionRepository.deleteOthers(userId, keepTokenHash);

    this.logger.info({ userId, revoked }, 'Password changed');
  }

  /** Deletes the user; entries, sessions, reminders and coach messages go with it. */
  async deleteAccount(userId: number, password: unknown): Promise<void> {
    const user = this.requireUser(userId);
    if (typeof password !== 'string' || !(await verifyPassword(password, user.passwordHash))) {
      throw new AuthenticationError('Password is incorrect');
    }

    this.userRepository.delete(userId);
    this.logger.info({ userId }, 'Account deleted');
  }

  private requireUser(userId: number): UserWithCredentials {
    const user = this.userRepository.getById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }

  private toProfile(user: UserWithCredentials): Profile {
    return {
      ...withoutCredentials(user),
      accountAgeDays: daysBetween(new Date(user.createdAt), this.clock()),
      bmi: bodyMassIndex(user.heightCm, user.weightKg),
    };
  }
}
