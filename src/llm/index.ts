/**
 * Model backend module exports
 */

export type {
  ChatRequest,
  ChatResponse,
  Message,
  ModelBackend,
  ModelConfig,
  ToolCall,
  ToolDefinition,
  ToolResult,
} from './types';
export { VercelAIBackend, type VercelAIBackendOptions } from './vercel';
export { MockModelBackend, textResponse, toolCallResponse, type MockResponse } from './mock';
