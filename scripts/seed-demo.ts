/**
 * Fill a database with a month of demo entries for one user, for trying the API and charts.
 * Run with: npm run seed:demo
 *
 * Credentials of the demo account: demo / demo-password
 */
import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { DisabledLLMAdapter } from '../src/adapters/llm/DisabledLLMAdapter.js';
import { closeDatabase, getDatabase } from '../src/persistence/database.js';
import { createServices } from '../src/services.js';
import type { ActivityType } from '../src/persistence/repositories/EntryRepository.js';
import { addDays, startOfUtcDay } from '../src/utils/dates.js';
import { ConflictError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';

const DAYS = 30;
const ROTATION: ActivityType[] = ['cardio', 'strength', 'yoga', 'hiit', 'stretching', 'pilates', 'meditation'];

const logger = createLogger({ component: 'seed-demo' });

async function main(): Promise<void> {
  const config = loadConfig();
  const db = getDatabase(config.databasePath);
  const { authService, entryService, reminderService } = createServices({
    db,
    config,
    llmPort: new DisabledLLMAdapter(),
    coachSystemPrompt: '',
  });

  try {
    await authService.register({
      username: 'demo',
      email: 'demo@example.com',
      password: 'demo-password',
      passwordConfirm: 'demo-password',
      firstName: 'Demo',
      lastName: 'User',
      heightCm: 172,
      weightKg: 68,
      fitnessGoals: ['General Fitness', 'Stress Resilience'],
    });
  } catch (error) {
    if (!(error instanceof ConflictError)) throw error;
    logger.info('Demo user already exists; adding entries to it');
  }

  const { user } = await authService.login({ username: 'demo', password: 'demo-password' });
  const today = startOfUtcDay(new Date());
  let logged = 0;

  for (let offset = DAYS - 1; offset >= 1; offset--) {
    const day = addDays(today, -offset);
    const at = (hour: number): string => new Date(day.getTime() + hour * 60 * 60 * 1000).toISOString();

    // Rest every fourth day
    if (offset % 4 !== 0) {
      const activityType = ROTATION[offset % ROTATION.length] ?? 'exercise';
      entryService.logWorkout(user.id, { activityType, durationMinutes: 20 + (offset % 5) * 10, recordedAt: at(7) });
      logged++;
    }

    try {
      entryService.logMood(user.id, { score: 2 + (offset % 4), recordedAt: at(21) });
      logged++;
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
    }

    entryService.logHabit(user.id, { habit: 'Water', value: 1.5 + (offset % 3) * 0.5, unit: 'l', recordedAt: at(20) });
    entryService.logHabit(user.id, { habit: 'Sleep', value: 6 + (offset % 3), unit: 'h', recordedAt: at(8) });
    logged += 2;
  }

  reminderService.create(user.id, {
    title: 'Evening yoga',
    dueAt: addDays(today, 1).toISOString(),
    notes: '20 minutes, focus on hips',
  });

  logger.info({ userId: user.id, logged }, 'Demo data seeded');
}

main()
  .catch((error) => {
    logger.error({ error }, 'Seeding failed');
    process.exitCode = 1;
  })
  .finally(() => {
    closeDatabase();
  });
