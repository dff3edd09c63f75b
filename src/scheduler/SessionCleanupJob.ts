import type { AuthService } from '../core/auth/AuthService.js';
import { createLogger } from '../utils/logger.js';

/** Deletes sessions past their expiry so the table does not grow without bound. */
export class SessionCleanupJob {
  private readonly logger = createLogger({ job: 'SessionCleanupJob' });

  constructor(private readonly authService: AuthService) {}

  run(): number {
    const removed = this.authService.purgeExpiredSessions();
    this.logger.debug({ removed }, 'Session cleanup finished');
    return removed;
  }
}
