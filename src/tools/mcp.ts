import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { JSONSchema7 } from 'json-schema';
import { errorMessage } from '../errors';
import { NullLogger, type Logger } from '../logging';
import { narrowJsonSchema } from '../schema';
import type { JsonValue } from '../values';
import { failure, success, type Tool, type ToolExecution } from './types';

export interface McpServer {
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface ToolFilter {
  allow?: string[];
  deny?: string[];
}

export interface McpToolInfo {
  name: string;
  description?: string;
  inputSchema: { [key: string]: unknown };
}

/**
 * The part of the MCP client the provider uses.
 */
export interface McpClient {
  listTools(): Promise<{ tools: McpToolInfo[] }>;
  callTool(params: { name: string; arguments?: Record<string, unknown> }): Promise<{ [key: string]: unknown }>;
  close(): Promise<void>;
}

export type McpClientFactory = (name: string, server: McpServer) => Promise<McpClient>;

export interface McpToolProviderOptions {
  logger?: Logger;
  clientFactory?: McpClientFactory;
}

async function connectStdio(name: string, server: McpServer): Promise<McpClient> {
  const transport = new StdioClientTransport({
    command: server.command,
    args: server.args ?? [],
    env: server.env,
  });
  const client = new Client({ name, version: "1.0.0" });
  await client.connect(transport);
  return client;
}

export class McpToolProvider {
  private clients = new Map<string, McpClient>();
  private logger: Logger;
  private clientFactory: McpClientFactory;

  constructor(options: McpToolProviderOptions = {}) {
    this.logger = options.logger ?? new NullLogger();
    this.clientFactory = options.clientFactory ?? connectStdio;
  }

  /**
   * Connect each server. A server that fails to start is skipped with a warning.
   */
  async connect(servers: Record<string, McpServer>): Promise<void> {
    for (const [name, server] of Object.entries(servers)) {
      const command = server.command.trim();
      if (!name || !command) {
        continue;
      }

      try {
        const client = await this.clientFactory(name, { ...server, command });
        this.clients.set(name, client);
        this.logger.debug(`Connected MCP server '${name}'`);
      } catch (err) {
        this.logger.warn(`Failed to connect MCP server '${name}'`, { error: errorMessage(err) });
      }
    }
  }

  servers(): string[] {
    return [...this.clients.keys()];
  }

  /**
   * Tools of every connected server, named `<server>:<tool>`.
   */
  async tools(filter?: ToolFilter): Promise<McpTool[]> {
    const tools: McpTool[] = [];
    for (const [serverName, client] of this.clients) {
      const { tools: serverTools } = await client.listTools();
      for (const info of serverTools) {
        const name = `${serverName}:${info.name}`;
        if (matchesFilter(name, filter)) tools.push(new McpTool(name, info, client));
      }
    }
    return tools;
  }

  async close(): Promise<void> {
    for (const [name, client] of this.clients) {
      try {
        await client.close();
      } catch (err) {
        this.logger.warn(`Failed to close MCP server '${name}'`, { error: errorMessage(err) });
      }
    }
    this.clients.clear();
  }
}

export class McpTool implements Tool {
  readonly description: string;
  private schema: JSONSchema7;

  constructor(readonly name: string, private info: McpToolInfo, private client: McpClient) {
    this.description = info.description ?? `MCP tool ${info.name}`;
    this.schema = narrowJsonSchema(info.inputSchema);
  }

  parametersSchema(): JSONSchema7 {
    return this.schema;
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    if (typeof args !== 'object' || args === null || Array.isArray(args)) {
      return failure(`Arguments for ${this.name} must be an object`);
    }

    let result: { [key: string]: unknown };
    try {
      result = await this.client.callTool({ name: this.info.name, arguments: args });
    } catch (err) {
      return failure(`MCP call failed: ${errorMessage(err)}`);
    }

    const text = textContent(result.content);
    return result.isError === true ? failure(text) : success(text);
  }
}

/**
 * Join the text parts of an MCP content list; other part types are skipped.
 */
export function textContent(content: unknown): string {
  if (!Array.isArray(content)) return '';
  const items: unknown[] = content;
  const parts: string[] = [];
  for (const part of items) {
    if (
      typeof part === 'object' && part !== null &&
      'type' in part && part.type === 'text' &&
      'text' in part && typeof part.text === 'string'
    ) {
      parts.push(part.text);
    }
  }
  return parts.join('\n');
}

export function matchesFilter(name: string, filter?: ToolFilter): boolean {
  if (filter?.deny?.some(p => matchGlob(name, p))) return false;
  if (filter?.allow && !filter.allow.some(p => matchGlob(name, p))) return false;
  return true;
}

function matchGlob(name: string, pattern: string): boolean {
  if (pattern.includes("*")) {
    const escaped = pattern.split("*").map((s) => s.replace(/[.+?^${}()|[\]\\]/g, "\\$&"));
    return new RegExp(`^${escaped.join(".*")}$`).test(name);
  }
  return name === pattern;
}
