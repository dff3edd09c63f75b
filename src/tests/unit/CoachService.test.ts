import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { AnalyticsService } from '../../core/analytics/AnalyticsService.js';
import { CoachService, MAX_TOOL_ROUNDS } from '../../core/coach/CoachService.js';
import { EntryService } from '../../core/entries/EntryService.js';
import { CoachMessageRepository } from '../../persistence/repositories/CoachMessageRepository.js';
import type { FitnessGoal } from '../../persistence/repositories/UserRepository.js';
import type { LLMPort, Message, ToolUseResponse } from '../../ports/LLMPort.js';
import { LLMError, ValidationError } from '../../utils/errors.js';
import { createClock, createTestStore, type TestStore } from '../helpers.js';

const TEMPLATE = 'Coach {{firstName}} on {{today}}. Goals: {{goals}}. {{weight}}, {{height}}, BMI {{bmi}}.';

function textResponse(text: string): ToolUseResponse {
  return { stopReason: 'end_turn', text, contentBlocks: [{ type: 'text', text }] };
}

function toolResponse(name: string, input: Record<string, unknown> = {}, id = 'call-1'): ToolUseResponse {
  return {
    stopReason: 'tool_use',
    toolCalls: [{ id, name, input }],
    contentBlocks: [{ type: 'tool_use', id, name, input }],
  };
}

/** Text of the first tool_result block in a message, if it carries one. */
function toolResultText(message: Message | undefined): string | undefined {
  if (!message || typeof message.content === 'string') return undefined;
  const [block] = message.content;
  return block?.type === 'tool_result' ? block.content : undefined;
}

describe('CoachService', () => {
  let store: TestStore;
  let messages: CoachMessageRepository;
  let entries: EntryService;
  let generateWithTools: Mock<LLMPort['generateWithTools']>;
  let coach: CoachService;
  let userId: number;

  function createUser(fitnessGoals: FitnessGoal[] = []): number {
    return store.users.create({
      username: 'alex',
      email: 'alex@example.com',
      passwordHash: 'not-a-hash',
      firstName: 'Alex',
      lastName: 'Doe',
      heightCm: 170,
      weightKg: 70,
      fitnessGoals,
    }).id;
  }

  beforeEach(() => {
    store = createTestStore();
    messages = new CoachMessageRepository(store.db);
    const clock = createClock('2026-05-04T10:00:00.000Z');
    entries = new EntryService(store.entries, store.users, { moodOncePerDay: true, clock });
    generateWithTools = vi.fn<LLMPort['generateWithTools']>();
    coach = new CoachService({
      llmPort: { generateWithTools },
      userRepository: store.users,
      coachMessageRepository: messages,
      analyticsService: new AnalyticsService(store.entries, { clock }),
      entryService: entries,
      systemPromptTemplate: TEMPLATE,
      clock,
    });
  });

  describe('suggestions', () => {
    it('offers one prompt per goal', () => {
      userId = createUser(['Weight Loss', 'Flexibility']);
      const { greeting, suggestions } = coach.suggestions(userId);

      expect(suggestions.map((suggestion) => suggestion.title)).toEqual(['Fat Burning Workout', 'Flexibility Routine']);
      expect(greeting).toContain('Your current fitness goals are: Weight Loss, Flexibility.');
    });

    it('falls back to general prompts without goals', () => {
      userId = createUser();
      const { greeting, suggestions } = coach.suggestions(userId);

      expect(suggestions.map((suggestion) => suggestion.title)).toEqual(['Full Body Workout', 'Cardio Workout']);
      expect(greeting).toContain('Your current fitness goals are: General Fitness.');
    });
  });

  describe('ask', () => {
    beforeEach(() => {
      userId = createUser(['Weight Loss']);
    });

    it('sends the profile in the system prompt and stores both turns', async () => {
      generateWithTools.mockResolvedValue(textResponse('Try a brisk 20 minute walk.'));

      const reply = await coach.ask(userId, { message: '  What should I do today? ' });

      expect(reply.toolRounds).toBe(0);
      expect(reply.message).toMatchObject({ role: 'assistant', content: 'Try a brisk 20 minute walk.' });
      expect(generateWithTools).toHaveBeenCalledTimes(1);
      expect(generateWithTools.mock.calls[0]?.[0]).toMatchObject({
        systemPrompt: 'Coach Alex on 2026-05-04. Goals: Weight Loss. 70 kg, 170 cm, BMI 24.2.',
        messages: [{ role: 'user', content: 'What should I do today?' }],
      });
      expect(coach.history(userId).map((message) => [message.role, message.content])).toEqual([
        ['user', 'What should I do today?'],
        ['assistant', 'Try a brisk 20 minute walk.'],
      ]);
    });

    it('runs requested tools and feeds their results back', async () => {
      entries.logWorkout(userId, { activityType: 'cardio', durationMinutes: 30, recordedAt: '2026-05-04T07:00:00Z' });
      generateWithTools
        .mockResolvedValueOnce(toolResponse('get_fitness_overview'))
        .mockResolvedValueOnce(textResponse('You worked out 30 minutes today. Nice!'));

      const reply = await coach.ask(userId, { message: 'How am I doing?' });

      expect(reply.toolRounds).toBe(1);
      expect(reply.message.content).toBe('You worked out 30 minutes today. Nice!');

      const followUp: Message[] = generateWithTools.mock.calls[1]?.[0].messages ?? [];
      expect(followUp).toHaveLength(3);
      expect(followUp[1]?.role).toBe('assistant');
      expect(followUp[2]?.content).toMatchObject([{ type: 'tool_result', tool_use_id: 'call-1' }]);
      const resultText = toolResultText(followUp[2]) ?? '{}';
      expect(JSON.parse(resultText)).toMatchObject({
        allTime: { workouts: 1, minutes: 30 },
        streakDays: 1,
      });
    });

    it('reports tool failures to the model instead of throwing', async () => {
      const replies = [
        toolResponse('delete_everything'),
        toolResponse('get_entry_summary', { category: 'sleep' }, 'call-2'),
        textResponse('Done.'),
      ];
      const toolResults: string[] = [];
      generateWithTools.mockImplementation(async (request) => {
        const result = toolResultText(request.messages.at(-1));
        if (result !== undefined) toolResults.push(result);
        return replies.shift() ?? textResponse('unexpected');
      });

      await coach.ask(userId, { message: 'Hi' });

      expect(toolResults).toEqual([
        '{"error":"Unknown tool: delete_everything"}',
        '{"error":"Tool execution failed: Invalid analytics query"}',
      ]);
    });

    it(`stops after ${MAX_TOOL_ROUNDS} tool rounds`, async () => {
      generateWithTools.mockResolvedValue(toolResponse('get_fitness_overview'));

      const reply = await coach.ask(userId, { message: 'Loop forever' });

      expect(generateWithTools).toHaveBeenCalledTimes(MAX_TOOL_ROUNDS + 1);
      expect(reply.toolRounds).toBe(MAX_TOOL_ROUNDS);
      expect(reply.message.content).toBe("I looked into that but don't have an answer yet. Could you rephrase?");
    });

    it('replays only the last ten stored messages, starting on a user turn', async () => {
      for (let i = 0; i < 12; i++) {
        messages.save(userId, i % 2 === 0 ? 'user' : 'assistant', `m${i}`);
      }
      generateWithTools.mockResolvedValue(textResponse('ok'));

      await coach.ask(userId, { message: 'latest' });

      const sent = generateWithTools.mock.calls[0]?.[0].messages ?? [];
      expect(sent.map((message) => message.content)).toEqual(['m4', 'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'latest']);
    });

    it('keeps the question when the model fails', async () => {
      generateWithTools.mockRejectedValue(new LLMError('The AI coach is unavailable right now'));

      await expect(coach.ask(userId, { message: 'Hello?' })).rejects.toThrow(LLMError);
      expect(coach.history(userId).map((message) => message.content)).toEqual(['Hello?']);
    });

    it('rejects an empty message without calling the model', async () => {
      await expect(coach.ask(userId, { message: '   ' })).rejects.toThrow(ValidationError);
      expect(generateWithTools).not.toHaveBeenCalled();
    });
  });

  it('clears the conversation', async () => {
    userId = createUser();
    generateWithTools.mockResolvedValue(textResponse('Hi there'));
    await coach.ask(userId, { message: 'Hello' });

    expect(coach.clear(userId)).toBe(2);
    expect(coach.history(userId)).toEqual([]);
  });
});
