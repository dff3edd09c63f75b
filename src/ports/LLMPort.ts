/**
 * What the coach needs from a language model: one tool-enabled completion per call. Block shapes
 * mirror the Anthropic Messages API so the Claude adapter maps them field for field.
 */

export type ChatRole = 'user' | 'assistant';

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

/** JSON Schema for a tool's arguments; always an object at the top level. Other keywords pass through. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [keyword: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/** Sent back on a user turn, answering the tool_use block with the same id. */
export interface ToolResultContent {
  type: 'tool_result';
  tool_use_id: string;
  content: string;
}

export type ContentBlock = TextContent | ToolUseContent | ToolResultContent;

export interface Message {
  role: ChatRole;
  content: string | ContentBlock[];
}

export type ToolCall = Omit<ToolUseContent, 'type'>;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ToolUseRequest {
  messages: Message[];
  tools: ToolDefinition[];
  systemPrompt?: string;
  maxTokens?: number;
}

export interface ToolUseResponse {
  stopReason: StopReason;
  /** Text blocks joined, absent when the model only called tools */
  text?: string;
  toolCalls?: ToolCall[];
  /** Raw blocks, replayed as the assistant turn when tool results follow */
  contentBlocks: ContentBlock[];
  usage?: TokenUsage;
}

export interface LLMPort {
  generateWithTools(request: ToolUseRequest): Promise<ToolUseResponse>;
}
