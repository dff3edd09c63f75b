import type { Entry } from '../../persistence/repositories/EntryRepository.js';
import type { AnalyticsService } from '../analytics/AnalyticsService.js';
import type { EntryService } from '../entries/EntryService.js';
import { createLogger } from '../../utils/logger.js';
import { MAX_RECENT_ENTRIES } from './tools.js';

export interface ToolExecutorDependencies {
  analyticsService: AnalyticsService;
  entryService: EntryService;
}

/** Runs coach tool calls for one user. Results and failures both come back as JSON text. */
export class ToolExecutor {
  private readonly logger = createLogger({ service: 'ToolExecutor' });

  constructor(
    private readonly deps: ToolExecutorDependencies,
    private readonly userId: number
  ) {}

  execute(toolName: string, input: Record<string, unknown>): string {
    const logger = this.logger.child({ toolName, userId: this.userId });
    logger.info({ input }, 'Executing tool');

    try {
      switch (toolName) {
        case 'get_fitness_overview':
          return JSON.stringify(this.deps.analyticsService.overview(this.userId));
        case 'get_entry_summary':
          return JSON.stringify(this.deps.analyticsService.summary(this.userId, input));
        case 'get_recent_entries':
          return this.getRecentEntries(input);
        default:
          logger.warn('Unknown tool');
          return JSON.stringify({ error: `Unknown tool: ${toolName}` });
      }
    } catch (error) {
      logger.error({ error }, 'Tool execution failed');
      const message = error instanceof Error ? error.message : 'Unknown error';
      return JSON.stringify({ error: `Tool execution failed: ${message}` });
    }
  }

  private getRecentEntries(input: Record<string, unknown>): string {
    const requested = typeof input.limit === 'number' ? Math.trunc(input.limit) : 10;
    const limit = Math.min(Math.max(requested, 1), MAX_RECENT_ENTRIES);
    const page = this.deps.entryService.list(this.userId, { category: input.category, limit });

    return JSON.stringify({
      total: page.total,
      entries: page.entries.map(describeEntry),
    });
  }
}

function describeEntry(entry: Entry): Record<string, unknown> {
  const base = { category: entry.category, recordedAt: new Date(entry.recordedAt).toISOString(), note: entry.note };
  switch (entry.category) {
    case 'workout':
      return {
        ...base,
        activityType: entry.activityType,
        durationMinutes: entry.durationMinutes,
        caloriesBurned: entry.caloriesBurned,
      };
    case 'mood':
      return { ...base, score: entry.score };
    case 'habit':
      return { ...base, habit: entry.habit, value: entry.value, unit: entry.unit };
  }
}
