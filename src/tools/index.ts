export { ToolRegistry, type BuiltinToolOptions } from './registry';
export { UserTool } from './user_tool';
export { ReadFileTool } from './read_file';
export { WriteFileTool } from './write_file';
export { WebFetchTool, DEFAULT_MAX_BYTES, type WebFetchOptions } from './web_fetch';
export { JsonParseTool } from './json_parse';
export {
  McpTool,
  McpToolProvider,
  matchesFilter,
  type McpClient,
  type McpClientFactory,
  type McpServer,
  type McpToolInfo,
  type McpToolProviderOptions,
  type ToolFilter,
} from './mcp';
export { failure, success, type Tool, type ToolExecution } from './types';
