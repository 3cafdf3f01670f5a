/**
 * Agent runner
 *
 * Drives one agent's conversation with the model backend:
 *
 *   system (+ output instructions) -> [user] -> model
 *     tool calls  -> dispatch in order, append results, call the model again
 *     text answer -> done, or validated against the output schema
 *
 * The main loop is bounded by the agent's maxSteps. Structured output
 * failures get up to outputRetries corrective round-trips, which do not
 * count as steps.
 */

import type { AgentInvoker } from './block';
import { MaxStepsExceededError, OutputValidationError, errorMessage } from './errors';
import type { Message, ModelBackend, ToolDefinition } from './llm/types';
import { NullLogger, type Logger } from './logging';
import { describeSchema, type OutputSchema } from './schema';
import { renderOutputInstructions, renderRetryPrompt } from './templating';
import { ToolRegistry } from './tools/registry';
import type { AgentRunHooks, AgentRunnerOptions } from './types';
import { parseJsonOutput, validateOutput } from './validation';
import type { AgentValue } from './values';

export interface AgentRunResult {
  output: string;
  /** Transcript at the end of the run. */
  messages: Message[];
  /** Backend calls made by the main loop. */
  steps: number;
}

interface RunContext {
  agent: AgentValue;
  messages: Message[];
  tools: ToolDefinition[];
  model: string | undefined;
}

export class AgentRunner implements AgentInvoker {
  private backend: ModelBackend;
  private registry: ToolRegistry;
  private defaultModel: string | undefined;
  private logger: Logger;
  private hooks: AgentRunHooks;

  constructor(options: AgentRunnerOptions) {
    this.backend = options.backend;
    this.logger = options.logger ?? new NullLogger();
    this.registry = options.registry ?? new ToolRegistry(this.logger);
    this.defaultModel = options.defaultModel;
    this.hooks = options.hooks ?? {};
  }

  async run(agent: AgentValue, input?: string): Promise<string> {
    return (await this.runWithTranscript(agent, input)).output;
  }

  async runWithTranscript(agent: AgentValue, input?: string): Promise<AgentRunResult> {
    const schema = agent.outputSchema;
    const schemaText = schema ? describeSchema(schema) : undefined;
    const jsonMode = schema !== undefined;

    const system = schemaText
      ? `${agent.prompt}\n\n${renderOutputInstructions(schemaText, agent.outputInstructions)}`
      : agent.prompt;
    const messages: Message[] = [{ role: 'system', content: system }];
    const userContent = input ?? agent.userPrompt;
    if (userContent !== undefined) {
      messages.push({ role: 'user', content: userContent });
    }

    const ctx: RunContext = {
      agent,
      messages,
      tools: this.registry.definitionsFor(agent.tools),
      model: agent.model ?? this.defaultModel,
    };

    for (let step = 0; step < agent.maxSteps; step++) {
      await this.notify('onStep', () => this.hooks.onStep?.(agent, step));
      this.logger.debug(`Agent '${agent.name}' step ${step + 1}/${agent.maxSteps}`);

      const response = await this.backend.chat({
        messages,
        tools: ctx.tools,
        model: ctx.model,
        jsonMode,
      });

      if (response.toolCalls.length === 0) {
        const candidate = response.content ?? '';
        const output = schema && schemaText
          ? await this.validate(ctx, schema, schemaText, candidate)
          : candidate;
        await this.notify('onFinish', () => this.hooks.onFinish?.(agent, output));
        return { output, messages, steps: step + 1 };
      }

      messages.push({
        role: 'assistant',
        content: response.content ?? '',
        tool_calls: response.toolCalls,
      });

      for (const call of response.toolCalls) {
        await this.notify('onToolCall', () => this.hooks.onToolCall?.(agent, call));
        this.logger.debug(`Dispatching tool '${call.name}'`, { id: call.id });

        const result = await this.registry.execute(call);
        if (result.isError) {
          this.logger.warn(`Tool '${call.name}' failed`, { error: result.content });
        }
        await this.notify('onToolResult', () => this.hooks.onToolResult?.(agent, result));

        messages.push({
          role: 'tool',
          content: result.content,
          tool_call_id: result.tool_call_id,
          is_error: result.isError,
        });
      }
    }

    this.logger.warn(`Agent '${agent.name}' exceeded ${agent.maxSteps} steps`);
    throw new MaxStepsExceededError(agent.maxSteps);
  }

  /**
   * Returns the accepted answer text, or throws OutputValidationError once
   * outputRetries corrective attempts have been used.
   */
  private async validate(
    ctx: RunContext,
    schema: OutputSchema,
    schemaText: string,
    candidate: string,
  ): Promise<string> {
    const { agent, messages } = ctx;
    let raw = candidate;

    for (let attempt = 0; ; attempt++) {
      const error = checkCandidate(raw, schema);
      if (error === undefined) return raw;

      await this.notify('onValidationFailure', () => this.hooks.onValidationFailure?.(agent, attempt, error));

      if (attempt >= agent.outputRetries) {
        this.logger.warn(`Agent '${agent.name}' output rejected`, { error, attempts: attempt + 1 });
        throw new OutputValidationError(error, schema, raw);
      }

      this.logger.debug(`Retrying output for '${agent.name}'`, { attempt: attempt + 1, error });
      messages.push({ role: 'assistant', content: raw });
      messages.push({
        role: 'user',
        content: renderRetryPrompt(schemaText, error, attempt + 1, agent.retryPrompt),
      });

      // Tool calls in a retry response are ignored; only its text counts.
      const response = await this.backend.chat({
        messages,
        tools: ctx.tools,
        model: ctx.model,
        jsonMode: true,
      });
      raw = response.content ?? '';
    }
  }

  private async notify(name: keyof AgentRunHooks, fn: () => void | Promise<void> | undefined): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.warn(`Hook ${name} failed`, { error: errorMessage(err) });
    }
  }
}

/**
 * The first reason a candidate answer is unacceptable, if any.
 */
function checkCandidate(raw: string, schema: OutputSchema): string | undefined {
  const parsed = parseJsonOutput(raw);
  if (!parsed.ok) return parsed.error;
  const result = validateOutput(parsed.value, schema);
  return result.ok ? undefined : result.error;
}
