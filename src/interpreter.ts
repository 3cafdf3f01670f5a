/**
 * Program interpreter.
 *
 * Evaluates top-level declarations and statements in order against one
 * global environment. Tools declared in the program are registered in the
 * registry and bound by name; agents become Agent values.
 */

import { AgentRunner } from './agent';
import { isDeclaration, type AgentDecl, type Program, type StructField } from './ast';
import { BlockEvaluator, normal, type Completion } from './block';
import { Environment } from './environment';
import { ConfigError, QuillTypeError } from './errors';
import { evaluate } from './expression';
import { NullLogger, type Logger } from './logging';
import { resolveOutputSchema } from './schema';
import { checkTemplate } from './templating';
import { ToolRegistry } from './tools/registry';
import { UserTool } from './tools/user_tool';
import type { InterpreterOptions } from './types';
import {
  createAgent,
  mkAgent,
  mkNull,
  mkTool,
  typeName,
  type AgentValue,
  type Value,
} from './values';

type AgentSettings = { -readonly [K in keyof Omit<AgentValue, 'name'>]?: AgentValue[K] };

export class Interpreter {
  readonly env = new Environment();
  readonly registry: ToolRegistry;
  readonly evaluator: BlockEvaluator;
  readonly runner: AgentRunner | undefined;
  private structs = new Map<string, StructField[]>();
  private logger: Logger;

  constructor(options: InterpreterOptions = {}) {
    this.logger = options.logger ?? new NullLogger();
    this.registry = options.registry ?? new ToolRegistry(this.logger);
    this.runner = options.backend
      ? new AgentRunner({
          backend: options.backend,
          registry: this.registry,
          defaultModel: options.defaultModel,
          logger: this.logger,
          hooks: options.hooks,
        })
      : undefined;
    this.evaluator = new BlockEvaluator({
      registry: this.registry,
      runner: this.runner,
      logger: this.logger,
    });
  }

  /**
   * Run a program. A top-level `return` stops it and is reported as
   * `returned`; otherwise the result is `normal(null)`.
   */
  async run(program: Program): Promise<Completion> {
    for (const item of program.items) {
      if (!isDeclaration(item)) {
        const completion = await this.evaluator.executeStatement(item, this.env);
        if (completion.type === 'returned') return completion;
        continue;
      }

      switch (item.kind) {
        case 'struct':
          this.structs.set(item.name, item.fields);
          break;
        case 'enum':
          this.env.defineEnum({
            name: item.name,
            variants: item.variants.map((v) => ({ name: v.name, fields: v.fields })),
          });
          break;
        case 'tool':
          this.registry.register(new UserTool(item, this.env, this.evaluator));
          this.env.define(item.name, mkTool(item.name));
          this.logger.debug(`Registered tool '${item.name}'`);
          break;
        case 'agent':
          this.env.define(item.name, mkAgent(this.buildAgent(item)));
          this.logger.debug(`Defined agent '${item.name}'`);
          break;
      }
    }
    return normal(mkNull());
  }

  /**
   * Look up an agent defined by the program.
   */
  getAgent(name: string): AgentValue | undefined {
    const value = this.env.get(name);
    return value?.kind === 'agent' ? value.agent : undefined;
  }

  private buildAgent(decl: AgentDecl): AgentValue {
    const settings: AgentSettings = { tools: decl.tools };

    for (const field of decl.fields) {
      const value = evaluate(field.value, this.env);
      switch (field.name) {
        case 'prompt':
        case 'systemPrompt':
          settings.prompt = expectString(field.name, value);
          break;
        case 'userPrompt':
          settings.userPrompt = expectString(field.name, value);
          break;
        case 'model':
          settings.model = expectString(field.name, value);
          break;
        case 'max_steps':
        case 'maxSteps':
          settings.maxSteps = expectCount(field.name, value);
          break;
        case 'output_retries':
        case 'outputRetries':
          settings.outputRetries = expectCount(field.name, value);
          break;
        case 'output_instructions':
        case 'outputInstructions':
          settings.outputInstructions = expectTemplate(decl.name, field.name, value);
          break;
        case 'retry_prompt':
        case 'retryPrompt':
          settings.retryPrompt = expectTemplate(decl.name, field.name, value);
          break;
        default:
          this.logger.debug(`Ignoring unknown field '${field.name}' on agent '${decl.name}'`);
      }
    }

    if (decl.output) {
      const schema = resolveOutputSchema(decl.output, this.structs);
      if (!schema) {
        const missing = decl.output.kind === 'named' ? decl.output.name : 'inline';
        throw new QuillTypeError('declared struct', missing, decl.span);
      }
      settings.outputSchema = schema;
    }

    const { prompt = '', ...rest } = settings;
    return createAgent(decl.name, prompt, rest);
  }
}

function expectString(field: string, value: Value): string {
  if (value.kind !== 'string') {
    throw new QuillTypeError(`String for '${field}'`, typeName(value));
  }
  return value.value;
}

function expectTemplate(agent: string, field: string, value: Value): string {
  const template = expectString(field, value);
  const error = checkTemplate(template);
  if (error !== undefined) {
    throw new ConfigError(`Invalid template for '${field}' on agent '${agent}': ${error}`);
  }
  return template;
}

function expectCount(field: string, value: Value): number {
  if (value.kind !== 'number' || value.value < 0) {
    throw new QuillTypeError(`non-negative Number for '${field}'`, valueLabel(value));
  }
  return Math.trunc(value.value);
}

function valueLabel(value: Value): string {
  return value.kind === 'number' ? String(value.value) : typeName(value);
}
