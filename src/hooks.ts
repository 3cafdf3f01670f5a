import { errorMessage } from './errors';
import type { ToolCall, ToolResult } from './llm/types';
import { NullLogger, type Logger } from './logging';
import type { AgentRunHooks } from './types';
import type { AgentValue } from './values';

/**
 * Fans every event out to several hook sets, in order. A failing hook is
 * logged and the next one still runs.
 */
export class CompositeHooks implements AgentRunHooks {
  constructor(private hooks: AgentRunHooks[], private logger: Logger = new NullLogger()) {}

  async onStep(agent: AgentValue, step: number): Promise<void> {
    for (const hook of this.hooks) {
      if (hook.onStep) await this.guard('onStep', () => hook.onStep?.(agent, step));
    }
  }

  async onToolCall(agent: AgentValue, call: ToolCall): Promise<void> {
    for (const hook of this.hooks) {
      if (hook.onToolCall) await this.guard('onToolCall', () => hook.onToolCall?.(agent, call));
    }
  }

  async onToolResult(agent: AgentValue, result: ToolResult): Promise<void> {
    for (const hook of this.hooks) {
      if (hook.onToolResult) await this.guard('onToolResult', () => hook.onToolResult?.(agent, result));
    }
  }

  async onValidationFailure(agent: AgentValue, attempt: number, message: string): Promise<void> {
    for (const hook of this.hooks) {
      if (hook.onValidationFailure) {
        await this.guard('onValidationFailure', () => hook.onValidationFailure?.(agent, attempt, message));
      }
    }
  }

  async onFinish(agent: AgentValue, answer: string): Promise<void> {
    for (const hook of this.hooks) {
      if (hook.onFinish) await this.guard('onFinish', () => hook.onFinish?.(agent, answer));
    }
  }

  private async guard(name: string, fn: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn(`Hook ${name} failed`, { error: errorMessage(err) });
    }
  }
}

/**
 * Records every event in order; handy for tracing a run.
 */
export class RecordingHooks implements AgentRunHooks {
  readonly events: string[] = [];

  onStep(agent: AgentValue, step: number): void {
    this.events.push(`step ${agent.name} ${step}`);
  }

  onToolCall(agent: AgentValue, call: ToolCall): void {
    this.events.push(`call ${agent.name} ${call.name}`);
  }

  onToolResult(agent: AgentValue, result: ToolResult): void {
    this.events.push(`result ${agent.name} ${result.tool_call_id}${result.isError ? ' error' : ''}`);
  }

  onValidationFailure(agent: AgentValue, attempt: number, message: string): void {
    this.events.push(`invalid ${agent.name} ${attempt}: ${message}`);
  }

  onFinish(agent: AgentValue, answer: string): void {
    this.events.push(`finish ${agent.name}`);
  }
}
