/**
 * Shared option and hook types.
 */

import type { ModelBackend, ToolCall, ToolResult } from './llm/types';
import type { Logger } from './logging';
import type { ToolRegistry } from './tools/registry';
import type { AgentValue } from './values';

/**
 * Observers of an agent run. Every hook is optional and may be async.
 * A hook that throws is logged and the run continues.
 */
export interface AgentRunHooks {
  /** Before each backend call of the main loop (0-based). */
  onStep?(agent: AgentValue, step: number): void | Promise<void>;
  onToolCall?(agent: AgentValue, call: ToolCall): void | Promise<void>;
  onToolResult?(agent: AgentValue, result: ToolResult): void | Promise<void>;
  /** A candidate answer was rejected; `attempt` is 0-based. */
  onValidationFailure?(agent: AgentValue, attempt: number, message: string): void | Promise<void>;
  onFinish?(agent: AgentValue, answer: string): void | Promise<void>;
}

export interface AgentRunnerOptions {
  backend: ModelBackend;
  registry?: ToolRegistry;
  /** Model for agents that declare none. */
  defaultModel?: string;
  logger?: Logger;
  hooks?: AgentRunHooks;
}

export interface InterpreterOptions {
  /** Without a backend, `agent.run()` is a type error. */
  backend?: ModelBackend;
  registry?: ToolRegistry;
  defaultModel?: string;
  logger?: Logger;
  hooks?: AgentRunHooks;
}
