import { vi } from 'vitest'
import { mkdtempSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { Statement } from '../../src/ast'
import { BlockEvaluator, type Completion } from '../../src/block'
import { Environment } from '../../src/environment'
import type { ToolCall } from '../../src/llm/types'
import type { Logger } from '../../src/logging'
import type { McpClient, McpToolInfo } from '../../src/tools/mcp'
import type { AgentRunHooks } from '../../src/types'
import { createAgent, type AgentValue, type JsonValue } from '../../src/values'

/**
 * Create a minimal agent for testing
 */
export function createMinimalAgent(overrides: Partial<AgentValue> = {}): AgentValue {
  return {
    ...createAgent('Bot', 'You are a helpful assistant.'),
    ...overrides
  }
}

/**
 * Build a tool call as a backend would return it
 */
export function toolCall(name: string, args: JsonValue = {}, id = `call_${name}`): ToolCall {
  return { id, name, arguments: args }
}

/**
 * Run statements as one block in a fresh (or given) environment
 */
export async function runBlock(
  statements: Statement[],
  env: Environment = new Environment(),
  evaluator: BlockEvaluator = new BlockEvaluator()
): Promise<Completion> {
  return evaluator.evaluateBlock({ statements }, env)
}

/**
 * Create mock hooks for testing
 */
export function createMockHooks() {
  return {
    onStep: vi.fn(),
    onToolCall: vi.fn(),
    onToolResult: vi.fn(),
    onValidationFailure: vi.fn(),
    onFinish: vi.fn()
  } satisfies AgentRunHooks
}

/**
 * Logger whose methods are spies
 */
export function createSpyLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies Logger
}

/**
 * Create a mock MCP tool listing entry
 */
export function createMockTool(name: string, description: string = ''): McpToolInfo {
  return {
    name,
    description: description || `Mock tool ${name}`,
    inputSchema: {
      type: 'object',
      properties: {
        input: { type: 'string' }
      },
      required: ['input']
    }
  }
}

/**
 * In-process stand-in for an MCP server connection
 */
export function createFakeMcpClient(
  tools: McpToolInfo[],
  callTool: McpClient['callTool'] = async () => ({ content: [] })
) {
  return {
    listTools: vi.fn(async () => ({ tools })),
    callTool: vi.fn(callTool),
    close: vi.fn(async () => {})
  } satisfies McpClient
}

/**
 * Create a temporary directory for test files
 */
export function createTempDir(testName: string): string {
  return mkdtempSync(join(tmpdir(), `quill-${testName}-`))
}

/**
 * Clean up temporary directory and files
 */
export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

/**
 * Capture console logs for testing
 */
export function captureLogs() {
  const logs: string[] = []
  const spies = [
    vi.spyOn(console, 'debug').mockImplementation((...args) => { logs.push(`DEBUG: ${args.join(' ')}`) }),
    vi.spyOn(console, 'info').mockImplementation((...args) => { logs.push(`INFO: ${args.join(' ')}`) }),
    vi.spyOn(console, 'warn').mockImplementation((...args) => { logs.push(`WARN: ${args.join(' ')}`) }),
    vi.spyOn(console, 'error').mockImplementation((...args) => { logs.push(`ERROR: ${args.join(' ')}`) })
  ]

  return {
    getLogs: () => logs,
    reset: () => {
      for (const spy of spies) spy.mockRestore()
    }
  }
}
