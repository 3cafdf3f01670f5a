/**
 * Runtime configuration.
 *
 * Sources, low to high priority:
 * 1. quill.yml in the config directory (optional)
 * 2. Environment variables
 *
 * ```yaml
 * # quill.yml
 * default_model: fast
 * log_level: info
 * profiles: ./profiles.yml
 * api_keys:
 *   openai: your-key-here
 * mock: false
 * ```
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "./errors";
import { MockModelBackend, textResponse } from "./llm/mock";
import type { ModelBackend } from "./llm/types";
import { VercelAIBackend } from "./llm/vercel";
import { ConsoleLogger, NullLogger, parseLogLevel, type LogLevel, type Logger } from "./logging";
import { isRecord, optionalString, ProfileManager } from "./profiles";

export const CONFIG_FILE = "quill.yml";

export interface RuntimeConfig {
  /** API keys by lowercase provider name. */
  apiKeys: Record<string, string | undefined>;
  defaultModel?: string;
  logLevel: LogLevel;
  mock: boolean;
  mockResponse?: string;
  profilesFile?: string;
}

type Env = Record<string, string | undefined>;

const API_KEY_VARS: Record<string, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  cerebras: "CEREBRAS_API_KEY",
};

/**
 * Load configuration for a directory.
 *
 * @throws ConfigError for malformed quill.yml or an invalid log level
 */
export function loadConfig(dir: string = process.cwd(), env: Env = process.env): RuntimeConfig {
  const config: RuntimeConfig = { apiKeys: {}, logLevel: "info", mock: false };

  const configPath = join(dir, CONFIG_FILE);
  if (existsSync(configPath)) {
    applyFile(config, readFileSync(configPath, "utf-8"), dir);
  }

  if (!config.profilesFile) {
    const profilesPath = join(dir, "profiles.yml");
    if (existsSync(profilesPath)) config.profilesFile = profilesPath;
  }

  applyEnv(config, env);
  return config;
}

function applyFile(config: RuntimeConfig, content: string, dir: string): void {
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${CONFIG_FILE}: ${errorMessage(err)}`);
  }
  if (doc === null || doc === undefined) return;
  if (!isRecord(doc)) {
    throw new ConfigError(`${CONFIG_FILE}: expected a mapping at the top level`);
  }

  const defaultModel = optionalString(doc.default_model, `${CONFIG_FILE}: 'default_model'`);
  if (defaultModel !== undefined) config.defaultModel = defaultModel;

  const logLevel = optionalString(doc.log_level, `${CONFIG_FILE}: 'log_level'`);
  if (logLevel !== undefined) config.logLevel = requireLogLevel(logLevel);

  const profiles = optionalString(doc.profiles, `${CONFIG_FILE}: 'profiles'`);
  if (profiles !== undefined) config.profilesFile = resolve(dir, profiles);

  const mock = doc.mock;
  if (mock !== undefined && mock !== null) {
    if (typeof mock !== "boolean") {
      throw new ConfigError(`${CONFIG_FILE}: 'mock' must be a boolean`);
    }
    config.mock = mock;
  }

  const mockResponse = optionalString(doc.mock_response, `${CONFIG_FILE}: 'mock_response'`);
  if (mockResponse !== undefined) config.mockResponse = mockResponse;

  const apiKeys = doc.api_keys;
  if (apiKeys !== undefined && apiKeys !== null) {
    if (!isRecord(apiKeys)) {
      throw new ConfigError(`${CONFIG_FILE}: 'api_keys' must be a mapping`);
    }
    for (const [provider, key] of Object.entries(apiKeys)) {
      config.apiKeys[provider.toLowerCase()] = optionalString(key, `${CONFIG_FILE}: api_keys.${provider}`);
    }
  }
}

function applyEnv(config: RuntimeConfig, env: Env): void {
  for (const [provider, variable] of Object.entries(API_KEY_VARS)) {
    const key = env[variable];
    if (key) config.apiKeys[provider] = key;
  }

  const defaultModel = env.QUILL_DEFAULT_MODEL;
  if (defaultModel) config.defaultModel = defaultModel;

  const logLevel = env.QUILL_LOG_LEVEL;
  if (logLevel) config.logLevel = requireLogLevel(logLevel);

  const mock = env.QUILL_MOCK;
  if (mock !== undefined && mock !== "") config.mock = isTruthyFlag(mock);

  const mockResponse = env.QUILL_MOCK_RESPONSE;
  if (mockResponse !== undefined) {
    config.mockResponse = mockResponse;
  }
}

function requireLogLevel(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigError(
      `Invalid log level '${value}'. Expected one of: trace, debug, info, warn, error, off`
    );
  }
  return level;
}

function isTruthyFlag(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function createLogger(config: RuntimeConfig): Logger {
  return config.logLevel === "off" ? new NullLogger() : new ConsoleLogger(config.logLevel);
}

/**
 * Mock mode answers every request with `mockResponse`; otherwise requests
 * go through the Vercel AI SDK.
 */
export function createBackend(config: RuntimeConfig, logger: Logger = new NullLogger()): ModelBackend {
  if (config.mock) {
    return new MockModelBackend([], textResponse(config.mockResponse ?? "mock response"));
  }
  return new VercelAIBackend({
    apiKeys: config.apiKeys,
    profiles: new ProfileManager(config.profilesFile, logger),
    defaultModel: config.defaultModel,
    logger,
  });
}
