/**
 * Model Backend Types
 *
 * These types abstract over different LLM providers. A backend receives
 * the run's transcript and tool definitions and answers with text or with
 * tool calls; it never executes tools itself.
 */

import type { JSONSchema7 } from 'json-schema';
import type { JsonValue } from '../values';

export interface Message {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_call_id?: string;
  tool_calls?: ToolCall[];
  /** Tool role only: the result reports a failure. */
  is_error?: boolean;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: JsonValue;
}

export interface ToolResult {
  tool_call_id: string;
  content: string;
  isError: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JSONSchema7;
}

export interface ChatRequest {
  messages: Message[];
  tools: ToolDefinition[];
  model?: string;
  jsonMode: boolean;
}

export interface ChatResponse {
  content?: string;
  toolCalls: ToolCall[];
}

/**
 * Abstraction over LLM providers.
 */
export interface ModelBackend {
  /** Total API calls made. */
  totalApiCalls: number;

  /**
   * Send the transcript. Failures throw ApiError or ProviderError.
   */
  chat(request: ChatRequest): Promise<ChatResponse>;
}

/**
 * Resolved model settings for one call.
 */
export interface ModelConfig {
  provider: string;
  name: string;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  base_url?: string;
}
