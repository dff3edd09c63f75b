import type { Database } from 'better-sqlite3';
import type { Config } from './config/index.js';
import type { LLMPort } from './ports/LLMPort.js';
import { AnalyticsService } from './core/analytics/AnalyticsService.js';
import { AuthService } from './core/auth/AuthService.js';
import { CoachService } from './core/coach/CoachService.js';
import { EntryService } from './core/entries/EntryService.js';
import { ProfileService } from './core/profile/ProfileService.js';
import { ReminderService } from './core/reminders/ReminderService.js';
import { CoachMessageRepository } from './persistence/repositories/CoachMessageRepository.js';
import { EntryRepository } from './persistence/repositories/EntryRepository.js';
import { ReminderRepository } from './persistence/repositories/ReminderRepository.js';
import { SessionRepository } from './persistence/repositories/SessionRepository.js';
import { UserRepository } from './persistence/repositories/UserRepository.js';
import type { AppServices } from './server.js';
import type { Clock } from './utils/dates.js';

export interface ServiceOptions {
  db: Database;
  config: Pick<Config, 'sessionTtlHours' | 'bcryptRounds' | 'moodOncePerDay'>;
  llmPort: LLMPort;
  coachSystemPrompt: string;
  clock?: Clock;
}

/** Wires repositories over one database into the services the HTTP layer needs. */
export function createServices(options: ServiceOptions): AppServices {
  const { db, config, clock } = options;

  const userRepository = new UserRepository(db);
  const sessionRepository = new SessionRepository(db);
  const entryRepository = new EntryRepository(db);

  const entryService = new EntryService(entryRepository, userRepository, {
    moodOncePerDay: config.moodOncePerDay,
    clock,
  });
  const analyticsService = new AnalyticsService(entryRepository, { clock });

  return {
    authService: new AuthService(userRepository, sessionRepository, {
      sessionTtlHours: config.sessionTtlHours,
      bcryptRounds: config.bcryptRounds,
      clock,
    }),
    entryService,
    analyticsService,
    profileService: new ProfileService(userRepository, sessionRepository, {
      bcryptRounds: config.bcryptRounds,
      clock,
    }),
    reminderService: new ReminderService(new ReminderRepository(db), { clock }),
    coachService: new CoachService({
      llmPort: options.llmPort,
      userRepository,
      coachMessageRepository: new CoachMessageRepository(db),
      analyticsService,
      entryService,
      systemPromptTemplate: options.coachSystemPrompt,
      clock,
    }),
  };
}
