import type { ToolDefinition } from '../../ports/LLMPort.js';
import { ENTRY_CATEGORIES } from '../../persistence/repositories/EntryRepository.js';

/**
 * Read-only tools the coach can call while answering. Schemas follow the Anthropic tool use
 * JSON Schema format.
 */

export const MAX_RECENT_ENTRIES = 20;

export const getFitnessOverviewTool: ToolDefinition = {
  name: 'get_fitness_overview',
  description:
    "Get the user's workout totals for the last 7 days, last 30 days and all time, their average workout " +
    'duration, current workout streak in days and their latest mood score (1-5).',
  input_schema: {
    type: 'object',
    properties: {},
  },
};

export const getEntrySummaryTool: ToolDefinition = {
  name: 'get_entry_summary',
  description:
    'Summarise logged entries of one category over an optional date range: count, total, mean, min, max and ' +
    'trend direction. Workouts summarise duration in minutes, moods the 1-5 score, habits the logged value ' +
    '(habits are also broken down per habit name).',
  input_schema: {
    type: 'object',
    properties: {
      category: {
        type: 'string',
        enum: [...ENTRY_CATEGORIES],
        description: 'Which kind of entry to summarise',
      },
      from: {
        type: 'string',
        description: 'First day to include, YYYY-MM-DD (UTC). Omit for no lower bound.',
      },
      to: {
        type: 'string',
        description: 'Last day to include, YYYY-MM-DD (UTC). Omit for no upper bound.',
      },
    },
    required: ['category'],
  },
};

export const getRecentEntriesTool: ToolDefinition = {
  name: 'get_recent_entries',
  description: 'List the most recent entries the user logged, newest first, optionally of one category.',
  input_schema: {
    type: 'object',
    properties: {
      category: {
        type: 'string',
        enum: [...ENTRY_CATEGORIES],
        description: 'Only entries of this category',
      },
      limit: {
        type: 'number',
        description: `How many entries to return (1-${MAX_RECENT_ENTRIES}, default 10)`,
      },
    },
  },
};

export const COACH_TOOLS: ToolDefinition[] = [getFitnessOverviewTool, getEntrySummaryTool, getRecentEntriesTool];
