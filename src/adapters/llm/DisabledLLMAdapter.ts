import type { LLMPort, ToolUseRequest, ToolUseResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';

export const COACH_DISABLED_NOTICE =
  'The AI coach is not configured on this server. Set ANTHROPIC_API_KEY to enable personalised coaching.';

/** Used when no API key is configured: the coach still answers, with a notice instead of advice. */
export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateWithTools(request: ToolUseRequest): Promise<ToolUseResponse> {
    this.logger.debug({ messages: request.messages.length }, 'Coach disabled, sending notice');
    return {
      stopReason: 'end_turn',
      text: COACH_DISABLED_NOTICE,
      contentBlocks: [{ type: 'text', text: COACH_DISABLED_NOTICE }],
    };
  }
}
