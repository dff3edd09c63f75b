import { z } from 'zod';
import type { ContentBlock, LLMPort, Message, TokenUsage } from '../../ports/LLMPort.js';
import type {
  CoachMessage,
  CoachMessageRepository,
} from '../../persistence/repositories/CoachMessageRepository.js';
import type { FitnessGoal, User, UserRepository } from '../../persistence/repositories/UserRepository.js';
import type { AnalyticsService } from '../analytics/AnalyticsService.js';
import type { EntryService } from '../entries/EntryService.js';
import { bodyMassIndex } from '../profile/ProfileService.js';
import { NotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { renderPrompt } from '../../utils/prompts.js';
import { parseInput } from '../../utils/validation.js';
import { systemClock, toIsoDate, type Clock } from '../../utils/dates.js';
import { ToolExecutor } from './ToolExecutor.js';
import { COACH_TOOLS } from './tools.js';

export const MAX_TOOL_ROUNDS = 5;
/** Stored messages replayed to the model on each question */
export const CONTEXT_MESSAGES = 10;
const HISTORY_LIMIT = 100;
const DEFAULT_GOAL: FitnessGoal = 'General Fitness';

export interface CoachSuggestion {
  goal: FitnessGoal | null;
  title: string;
  prompt: string;
}

export interface CoachSuggestions {
  greeting: string;
  suggestions: CoachSuggestion[];
}

export interface CoachReply {
  message: CoachMessage;
  toolRounds: number;
}

export interface CoachServiceDependencies {
  llmPort: LLMPort;
  userRepository: UserRepository;
  coachMessageRepository: CoachMessageRepository;
  analyticsService: AnalyticsService;
  entryService: EntryService;
  /** Template with {{firstName}}, {{today}}, {{goals}}, {{weight}}, {{height}} and {{bmi}} */
  systemPromptTemplate: string;
  clock?: Clock;
}

const GOAL_SUGGESTIONS: Record<FitnessGoal, Omit<CoachSuggestion, 'goal'>> = {
  'Weight Loss': {
    title: 'Fat Burning Workout',
    prompt: 'Create a single fat burning HIIT session suited to my fitness level',
  },
  'Muscle Gain': {
    title: 'Strength Training',
    prompt: 'Create a single strength training session focused on building muscle',
  },
  Flexibility: {
    title: 'Flexibility Routine',
    prompt: 'Create a single flexibility and mobility routine',
  },
  'Better Mental Health': {
    title: 'Mental Health Boost',
    prompt: 'Create a single session that combines mindfulness with gentle exercise for better mental health',
  },
  'Stress Resilience': {
    title: 'Stress Resilience',
    prompt: 'Create a single session that pairs light cardio with stress management techniques',
  },
  'General Fitness': {
    title: 'Full Body Workout',
    prompt: 'Create a single full body workout for general fitness',
  },
};

const NO_GOAL_SUGGESTION: CoachSuggestion = {
  goal: null,
  title: 'Cardio Workout',
  prompt: 'Create a 30-minute cardio workout for beginners',
};

const askSchema = z.object({
  message: z
    .string({ required_error: 'Message is required' })
    .trim()
    .min(1, 'Message is required')
    .max(2000, 'Message must be at most 2000 characters'),
});

/**
 * Goal-aware coaching chat. Each question replays the recent conversation to the LLM and lets it
 * read the user's own data through a bounded tool loop.
 */
export class CoachService {
  private readonly logger = createLogger({ service: 'CoachService' });
  private readonly clock: Clock;

  constructor(private readonly deps: CoachServiceDependencies) {
    this.clock = deps.clock ?? systemClock;
  }

  suggestions(userId: number): CoachSuggestions {
    const user = this.requireUser(userId);
    const goals = user.fitnessGoals;
    const suggestions: CoachSuggestion[] = goals.map((goal) => ({ goal, ...GOAL_SUGGESTIONS[goal] }));
    if (goals.length === 0) {
      suggestions.push({ goal: DEFAULT_GOAL, ...GOAL_SUGGESTIONS[DEFAULT_GOAL] }, NO_GOAL_SUGGESTION);
    }

    const goalList = (goals.length > 0 ? goals : [DEFAULT_GOAL]).join(', ');
    return {
      greeting:
        `Hello ${user.firstName}! I'm your AI workout coach. I can help with single workouts, nutrition tips ` +
        `and wellness advice. Your current fitness goals are: ${goalList}. ` +
        'How would you like to work towards your goals today?',
      suggestions,
    };
  }

  async ask(userId: number, input: unknown): Promise<CoachReply> {
    const { message } = parseInput(askSchema, input, 'Invalid coach message');
    const user = this.requireUser(userId);
    const logger = this.logger.child({ method: 'ask', userId });

    this.deps.coachMessageRepository.save(userId, 'user', message, this.clock().getTime());

    const messages = toConversation(this.deps.coachMessageRepository.getConversation(userId, CONTEXT_MESSAGES));
    const systemPrompt = this.buildSystemPrompt(user);
    const toolExecutor = new ToolExecutor(
      { analyticsService: this.deps.analyticsService, entryService: this.deps.entryService },
      userId
    );
    const totalUsage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const addUsage = (usage: TokenUsage | undefined): void => {
      if (usage) {
        totalUsage.inputTokens += usage.inputTokens;
        totalUsage.outputTokens += usage.outputTokens;
      }
    };

    let response = await this.deps.llmPort.generateWithTools({
      messages,
      tools: COACH_TOOLS,
      systemPrompt,
      maxTokens: 1024,
    });
    addUsage(response.usage);

    let toolRounds = 0;
    while (response.stopReason === 'tool_use' && toolRounds < MAX_TOOL_ROUNDS) {
      if (!response.toolCalls || response.toolCalls.length === 0) {
        logger.warn('Got tool_use stop reason but no tool calls');
        break;
      }
      toolRounds++;
      logger.info({ round: toolRounds, toolCalls: response.toolCalls.length }, 'Processing tool calls');

      messages.push({ role: 'assistant', content: response.contentBlocks });
      const toolResults = response.toolCalls.map((toolCall): ContentBlock => ({
        type: 'tool_result',
        tool_use_id: toolCall.id,
        content: toolExecutor.execute(toolCall.name, toolCall.input),
      }));
      messages.push({ role: 'user', content: toolResults });

      response = await this.deps.llmPort.generateWithTools({
        messages,
        tools: COACH_TOOLS,
        systemPrompt,
        maxTokens: 1024,
      });
      addUsage(response.usage);
    }

    if (response.stopReason === 'tool_use') {
      logger.warn({ toolRounds }, 'Reached max tool rounds');
    }

    const replyText = response.text?.trim() || "I looked into that but don't have an answer yet. Could you rephrase?";
    const reply = this.deps.coachMessageRepository.save(userId, 'assistant', replyText, this.clock().getTime());

    logger.info({ toolRounds, responseLength: replyText.length, usage: totalUsage }, 'Coach replied');
    return { message: reply, toolRounds };
  }

  /** Oldest first. */
  history(userId: number): CoachMessage[] {
    return this.deps.coachMessageRepository.getConversation(userId, HISTORY_LIMIT);
  }

  clear(userId: number): number {
    const removed = this.deps.coachMessageRepository.clear(userId);
    this.logger.info({ userId, removed }, 'Coach conversation cleared');
    return removed;
  }

  buildSystemPrompt(user: User): string {
    const bmi = bodyMassIndex(user.heightCm, user.weightKg);
    return renderPrompt(this.deps.systemPromptTemplate, {
      firstName: user.firstName,
      today: toIsoDate(this.clock()),
      goals: (user.fitnessGoals.length > 0 ? user.fitnessGoals : [DEFAULT_GOAL]).join(', '),
      weight: user.weightKg !== undefined ? `${user.weightKg} kg` : 'not provided',
      height: user.heightCm !== undefined ? `${user.heightCm} cm` : 'not provided',
      bmi: bmi !== null ? bmi.toFixed(1) : 'unknown',
    });
  }

  private requireUser(userId: number): User {
    const user = this.deps.userRepository.getById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }
}

/** The model expects the conversation to open with a user turn. */
function toConversation(stored: CoachMessage[]): Message[] {
  const firstUser = stored.findIndex((message) => message.role === 'user');
  if (firstUser === -1) return [];
  return stored.slice(firstUser).map((message) => ({ role: message.role, content: message.content }));
}
