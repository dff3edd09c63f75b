import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  LLMPort,
  ToolCall,
  ToolUseRequest,
  ToolUseResponse,
} from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

export const DEFAULT_TEXT_MODEL = 'claude-sonnet-4-5';

export interface ClaudeAdapterOptions {
  apiKey: string;
  model?: string;
  /** Injected in tests */
  client?: Anthropic;
}

/** The coach system prompt repeats on every turn of a conversation, so it is marked cacheable. */
function buildSystemParam(systemPrompt: string | undefined): Anthropic.TextBlockParam[] | undefined {
  if (!systemPrompt?.trim()) {
    return undefined;
  }
  return [{ type: 'text', text: systemPrompt, cache_control: { type: 'ephemeral' } }];
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;

  constructor(options: ClaudeAdapterOptions) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_TEXT_MODEL;
    this.logger.info({ model: this.model }, 'Claude adapter initialized');
  }

  async generateWithTools(request: ToolUseRequest): Promise<ToolUseResponse> {
    const logger = this.logger.child({ method: 'generateWithTools' });
    try {
      const response = await this.client.messages.create(buildCreateParams(this.model, request));

      return buildToolUseResponse(response);
    } catch (error) {
      logger.error({ error }, 'Claude tool use generation failed');
      throw new LLMError('The AI coach is unavailable right now', { cause: error });
    }
  }
}

export function buildCreateParams(model: string, request: ToolUseRequest): Anthropic.MessageCreateParamsNonStreaming {
  return {
    model,
    max_tokens: request.maxTokens ?? 1024,
    system: buildSystemParam(request.systemPrompt),
    messages: request.messages.map((message) => ({ role: message.role, content: message.content })),
    tools: request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.input_schema,
    })),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The parts of a Messages API reply the coach reads. */
export type ClaudeReply = Pick<Anthropic.Message, 'content' | 'stop_reason'> & {
  usage: Pick<Anthropic.Usage, 'input_tokens' | 'output_tokens'>;
};

export function buildToolUseResponse(response: ClaudeReply): ToolUseResponse {
  const contentBlocks: ContentBlock[] = [];
  const toolCalls: ToolCall[] = [];
  const texts: string[] = [];

  for (const block of response.content) {
    if (block.type === 'text') {
      contentBlocks.push({ type: 'text', text: block.text });
      texts.push(block.text);
    } else if (block.type === 'tool_use') {
      const input = isRecord(block.input) ? block.input : {};
      contentBlocks.push({ type: 'tool_use', id: block.id, name: block.name, input });
      toolCalls.push({ id: block.id, name: block.name, input });
    }
  }

  const stopReason =
    response.stop_reason === 'tool_use'
      ? 'tool_use'
      : response.stop_reason === 'max_tokens'
        ? 'max_tokens'
        : 'end_turn';

  return {
    stopReason,
    text: texts.length > 0 ? texts.join('\n\n') : undefined,
    toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
    contentBlocks,
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}
