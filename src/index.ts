// Syntax tree
export * from './ast';

// Values and scopes
export * from './values';
export { Environment, type EnumDef, type EnumVariantDef } from './environment';

// Evaluation
export { evaluate } from './expression';
export {
  BlockEvaluator,
  argsToJson,
  normal,
  returned,
  type AgentInvoker,
  type BlockEvaluatorOptions,
  type Completion,
} from './block';
export { callArrayMethod, callEnumMethod, callStringMethod } from './methods';
export { Interpreter } from './interpreter';

// Agents
export { AgentRunner, type AgentRunResult } from './agent';
export { CompositeHooks, RecordingHooks } from './hooks';
export type { AgentRunHooks, AgentRunnerOptions, InterpreterOptions } from './types';

// Output contracts
export {
  describeSchema,
  fieldTypeToJsonSchema,
  narrowJsonSchema,
  resolveOutputSchema,
  toJsonSchema,
  type OutputSchema,
} from './schema';
export {
  extractJson,
  jsonTypeName,
  parseJsonOutput,
  validateOutput,
  type ParseResult,
  type ValidationResult,
} from './validation';
export {
  DEFAULT_OUTPUT_INSTRUCTIONS,
  DEFAULT_RETRY_PROMPT,
  renderOutputInstructions,
  renderRetryPrompt,
  checkTemplate,
  renderTemplate,
} from './templating';

// Tools
export * from './tools';

// Model backends
export * from './llm';
export {
  ProfileManager,
  parseModelId,
  parseProfiles,
  resolveModelConfig,
  type ModelProfileConfig,
  type ProfilesConfig,
} from './profiles';

// Configuration and logging
export { CONFIG_FILE, createBackend, createLogger, loadConfig, type RuntimeConfig } from './config';
export {
  ConsoleLogger,
  LOG_LEVELS,
  NullLogger,
  isLogLevel,
  parseLogLevel,
  type LogFields,
  type LogLevel,
  type Logger,
} from './logging';

// Errors
export * from './errors';
