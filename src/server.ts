import type { Server } from 'node:http';
import cors from 'cors';
import express from 'express';
import type { Express } from 'express';
import type { AnalyticsService } from './core/analytics/AnalyticsService.js';
import type { AuthService } from './core/auth/AuthService.js';
import type { CoachService } from './core/coach/CoachService.js';
import type { EntryService } from './core/entries/EntryService.js';
import type { ProfileService } from './core/profile/ProfileService.js';
import type { ReminderService } from './core/reminders/ReminderService.js';
import { errorHandler, notFoundHandler } from './adapters/http/middleware/errorHandler.js';
import { requestContext, requestLogger } from './adapters/http/middleware/requestContext.js';
import { requireSession } from './adapters/http/middleware/requireSession.js';
import { createAnalyticsRouter } from './adapters/http/routes/analyticsRouter.js';
import { createAuthRouter } from './adapters/http/routes/authRouter.js';
import { createCoachRouter } from './adapters/http/routes/coachRouter.js';
import { createEntriesRouter } from './adapters/http/routes/entriesRouter.js';
import { createProfileRouter } from './adapters/http/routes/profileRouter.js';
import { createRemindersRouter } from './adapters/http/routes/remindersRouter.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'server' });

export interface AppServices {
  authService: AuthService;
  entryService: EntryService;
  analyticsService: AnalyticsService;
  profileService: ProfileService;
  reminderService: ReminderService;
  coachService: CoachService;
}

export interface AppOptions {
  /** Browser origins allowed to call the API; empty allows any */
  corsOrigins?: string[];
}

export function createApp(services: AppServices, options: AppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');

  const origins = options.corsOrigins ?? [];
  app.use(
    cors({
      origin: origins.length > 0 ? origins : true,
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID'],
    })
  );
  app.use(requestContext);
  app.use(requestLogger);
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const authenticated = requireSession(services.authService);
  app.use('/api/auth', createAuthRouter(services.authService));
  app.use('/api/entries', authenticated, createEntriesRouter(services.entryService));
  app.use('/api/analytics', authenticated, createAnalyticsRouter(services.analyticsService));
  app.use('/api/profile', authenticated, createProfileRouter(services.profileService));
  app.use('/api/reminders', authenticated, createRemindersRouter(services.reminderService));
  app.use('/api/coach', authenticated, createCoachRouter(services.coachService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function startServer(app: Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
