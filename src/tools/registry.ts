/**
 * Tool registry
 *
 * Name-keyed store of tools. `execute` is the runner's entry point and
 * never throws for tool-level problems: unknown tools, invalid arguments
 * and failed executions all come back as error results.
 */

import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import { errorMessage } from '../errors';
import type { ToolCall, ToolDefinition, ToolResult } from '../llm/types';
import { NullLogger, type Logger } from '../logging';
import { JsonParseTool } from './json_parse';
import { ReadFileTool } from './read_file';
import type { Tool } from './types';
import { WebFetchTool, type WebFetchOptions } from './web_fetch';
import { WriteFileTool } from './write_file';

export interface BuiltinToolOptions {
  /** Base directory for relative paths in read_file / write_file. */
  baseDir?: string;
  webFetch?: WebFetchOptions;
  logger?: Logger;
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();
  private validators = new Map<string, ValidateFunction | null>();
  private ajv = new Ajv({ allErrors: true, strict: false });
  private logger: Logger;

  constructor(logger: Logger = new NullLogger()) {
    this.logger = logger;
  }

  /**
   * Registry holding read_file, write_file, web_fetch and json_parse.
   */
  static withBuiltins(options: BuiltinToolOptions = {}): ToolRegistry {
    const registry = new ToolRegistry(options.logger);
    registry.register(new ReadFileTool(options.baseDir));
    registry.register(new WriteFileTool(options.baseDir));
    registry.register(new WebFetchTool(options.webFetch));
    registry.register(new JsonParseTool());
    return registry;
  }

  /**
   * Register a tool. A tool with the same name is replaced.
   */
  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
    this.validators.delete(tool.name);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Definitions for the given names, in the given order. Unknown names are skipped.
   */
  definitionsFor(names: readonly string[]): ToolDefinition[] {
    const defs: ToolDefinition[] = [];
    for (const name of names) {
      const tool = this.tools.get(name);
      if (!tool) continue;
      defs.push({
        name: tool.name,
        description: tool.description,
        parameters: tool.parametersSchema(),
      });
    }
    return defs;
  }

  async execute(call: ToolCall): Promise<ToolResult> {
    const tool = this.tools.get(call.name);
    if (!tool) {
      return { tool_call_id: call.id, content: `Unknown tool: ${call.name}`, isError: true };
    }

    const invalid = this.checkArguments(tool, call);
    if (invalid) {
      return { tool_call_id: call.id, content: `Invalid arguments for ${call.name}: ${invalid}`, isError: true };
    }

    try {
      const outcome = await tool.execute(call.arguments);
      return outcome.ok
        ? { tool_call_id: call.id, content: outcome.content, isError: false }
        : { tool_call_id: call.id, content: outcome.error, isError: true };
    } catch (err) {
      this.logger.warn(`Tool '${call.name}' threw`, { error: errorMessage(err) });
      return { tool_call_id: call.id, content: errorMessage(err), isError: true };
    }
  }

  /**
   * Returns the validation messages, or undefined when the arguments pass.
   */
  private checkArguments(tool: Tool, call: ToolCall): string | undefined {
    const validate = this.validatorFor(tool);
    if (!validate || validate(call.arguments)) return undefined;
    return (validate.errors ?? [])
      .map((e) => `${e.instancePath || '(root)'} ${e.message ?? 'is invalid'}`)
      .join('; ');
  }

  private validatorFor(tool: Tool): ValidateFunction | null {
    const cached = this.validators.get(tool.name);
    if (cached !== undefined) return cached;

    let validate: ValidateFunction | null = null;
    try {
      validate = this.ajv.compile({ ...(tool.validationSchema?.() ?? tool.parametersSchema()) });
    } catch (err) {
      // Uncompilable schema: run without validation.
      this.logger.warn(`Cannot compile parameter schema for '${tool.name}'`, { error: errorMessage(err) });
    }
    this.validators.set(tool.name, validate);
    return validate;
  }
}
