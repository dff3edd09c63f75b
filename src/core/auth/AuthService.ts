import { createHash, randomBytes } from 'node:crypto';
import type { SessionRepository } from '../../persistence/repositories/SessionRepository.js';
import {
  withoutCredentials,
  type User,
  type UserRepository,
} from '../../persistence/repositories/UserRepository.js';
import { AuthenticationError, ConflictError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { parseInput } from '../../utils/validation.js';
import { systemClock, type Clock } from '../../utils/dates.js';
import { hashPassword, verifyPassword } from './passwords.js';
import { loginSchema, registerSchema } from './schemas.js';

export interface AuthServiceOptions {
  sessionTtlHours: number;
  bcryptRounds: number;
  clock?: Clock;
}

export interface LoginResult {
  token: string;
  expiresAt: string;
  user: User;
}

export interface AuthenticatedSession {
  user: User;
  tokenHash: string;
}

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export class AuthService {
  private readonly logger = createLogger({ service: 'AuthService' });
  private readonly clock: Clock;
  /** Compared against when the username is unknown so both failure paths do the same work. */
  private dummyHash: Promise<string> | undefined;

  constructor(
    private readonly userRepository: UserRepository,
    private readonly sessionRepository: SessionRepository,
    private readonly options: AuthServiceOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async register(input: unknown): Promise<User> {
    const data = parseInput(registerSchema, input, 'Invalid registration details');

    if (this.userRepository.getByUsername(data.username)) {
      throw new ConflictError('Username already exists. Please choose another one');
    }
    if (this.userRepository.getByEmail(data.email)) {
      throw new ConflictError('Email already registered');
    }

    const passwordHash = await hashPassword(data.password, this.options.bcryptRounds);
    const user = this.userRepository.create(
      {
        username: data.username,
        email: data.email,
        passwordHash,
        firstName: data.firstName,
        lastName: data.lastName,
        heightCm: data.heightCm,
        weightKg: data.weightKg,
        fitnessGoals: data.fitnessGoals,
      },
      this.clock().getTime()
    );

    this.logger.info({ userId: user.id }, 'User registered');
    return withoutCredentials(user);
  }

  async login(input: unknown): Promise<LoginResult> {
    const parsed = loginSchema.safeParse(input);
    if (!parsed.success) {
      throw new AuthenticationError();
    }
    const { username, password } = parsed.data;

    const user = this.userRepository.getByUsername(username);
    const passwordHash = user?.passwordHash ?? (await this.getDummyHash());
    const valid = await verifyPassword(password, passwordHash);
    if (!user || !valid) {
      this.logger.info('Login rejected');
      throw new AuthenticationError();
    }

    const now = this.clock().getTime();
    const token = randomBytes(32).toString('hex');
    const session = this.sessionRepository.create({
      tokenHash: hashToken(token),
      userId: user.id,
      createdAt: now,
      expiresAt: now + this.options.sessionTtlHours * 60 * 60 * 1000,
    });
    this.userRepository.recordLogin(user.id, now);

    this.logger.info({ userId: user.id }, 'User logged in');
    return {
      token,
      expiresAt: new Date(session.expiresAt).toISOString(),
      user: withoutCredentials({ ...user, lastLoginAt: now }),
    };
  }

  /** Resolve a bearer token to its user. Unknown and expired tokens fail alike. */
  authenticate(token: string | undefined): AuthenticatedSession {
    if (!token) {
      throw new AuthenticationError('Authentication required');
    }

    const tokenHash = hashToken(token);
    const session = this.sessionRepository.getByTokenHash(tokenHash);
    if (!session) {
      throw new AuthenticationError('Session is invalid or has expired');
    }
    if (session.expiresAt <= this.clock().getTime()) {
      this.sessionRepository.delete(tokenHash);
      throw new AuthenticationError('Session is invalid or has expired');
    }

    const user = this.userRepository.getById(session.userId);
    if (!user) {
      throw new AuthenticationError('Session is invalid or has expired');
    }
    return { user: withoutCredentials(user), tokenHash };
  }

  logout(token: string): void {
    const removed = this.sessionRepository.delete(hashToken(token));
    this.logger.info({ removed }, 'Logout');
  }

  purgeExpiredSessions(): number {
    const removed = this.sessionRepository.deleteExpired(this.clock().getTime());
    if (removed > 0) {
      this.logger.info({ removed }, 'Purged expired sessions');
    }
    return removed;
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= hashPassword('not-a-real-password', this.options.bcryptRounds);
    return this.dummyHash;
  }
}
