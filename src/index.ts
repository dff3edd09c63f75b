// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { SessionCleanupJob } from './scheduler/SessionCleanupJob.js';
import { scheduleSessionCleanup } from './scheduler/index.js';
import { createApp, startServer } from './server.js';
import { createServices } from './services.js';
import { createLogger } from './utils/logger.js';
import { loadPrompt } from './utils/prompts.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting Fitlistic API');

  try {
    const config = loadConfig();
    const db = getDatabase(config.databasePath);

    const llmPort = config.anthropicApiKey
      ? new ClaudeAdapter({ apiKey: config.anthropicApiKey, model: config.llmTextModel })
      : new DisabledLLMAdapter();
    if (!config.anthropicApiKey) {
      logger.warn('ANTHROPIC_API_KEY not set; the AI coach will answer with a notice');
    }

    const services = createServices({
      db,
      config,
      llmPort,
      coachSystemPrompt: await loadPrompt('coach_system.md'),
    });

    const cleanupTask = scheduleSessionCleanup(
      new SessionCleanupJob(services.authService),
      config.sessionCleanupCron,
      config.timezone
    );

    const app = createApp(services, { corsOrigins: config.corsOrigins });
    const server = await startServer(app, config.port, config.host);

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Shutting down');
      cleanupTask.stop();
      server.close((error) => {
        if (error) {
          logger.error({ error }, 'Error while closing HTTP server');
        }
        closeDatabase();
        process.exit(error ? 1 : 0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
