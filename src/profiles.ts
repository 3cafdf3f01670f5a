/**
 * Model profile management.
 *
 * Provides centralized model configuration through profiles.yml files.
 * Profiles enable easy switching between model configurations (e.g., dev vs prod).
 *
 * Resolution order (low to high priority):
 * 1. default profile (fallback)
 * 2. Agent's model identifier: a profile name, or `provider/name`, or a bare model name
 * 3. override profile (trumps all)
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { ConfigError, errorMessage } from "./errors";
import type { ModelConfig } from "./llm/types";
import { NullLogger, type Logger } from "./logging";

export type ModelProfileConfig = Partial<ModelConfig>;

export interface ProfilesConfig {
  default?: string;
  override?: string;
  model_profiles: Record<string, ModelProfileConfig>;
}

export const DEFAULT_PROVIDER = "openai";

// Cache loaded profile managers by directory
const profileManagerCache: Map<string, ProfileManager> = new Map();

/**
 * Manages model profiles from profiles.yml files.
 *
 * @example
 * ```typescript
 * const manager = new ProfileManager("config/profiles.yml");
 * const config = manager.resolveModelConfig("fast-cheap");
 * // { provider: 'cerebras', name: 'llama3.1-8b', temperature: 0.6 }
 * ```
 */
export class ProfileManager {
  private profiles: Record<string, ModelProfileConfig> = {};
  private defaultProfile: string | undefined;
  private overrideProfile: string | undefined;
  private logger: Logger;
  readonly profilesFile: string | undefined;

  constructor(profilesFile?: string, logger: Logger = new NullLogger()) {
    this.profilesFile = profilesFile;
    this.logger = logger;
    if (profilesFile) {
      this.loadProfiles(profilesFile);
    }
  }

  /**
   * Get or create a ProfileManager for a directory.
   * Caches instances by directory to avoid re-reading profiles.yml.
   */
  static getInstance(configDir: string): ProfileManager {
    const cached = profileManagerCache.get(configDir);
    if (cached) return cached;

    const profilesPath = join(configDir, "profiles.yml");
    // No profiles file - empty manager
    const manager = existsSync(profilesPath) ? new ProfileManager(profilesPath) : new ProfileManager();
    profileManagerCache.set(configDir, manager);
    return manager;
  }

  /**
   * Clear cached ProfileManager instances.
   */
  static clearCache(): void {
    profileManagerCache.clear();
  }

  private loadProfiles(profilesFile: string): void {
    if (!existsSync(profilesFile)) {
      return;
    }

    const config = parseProfiles(readFileSync(profilesFile, "utf-8"), profilesFile);
    this.profiles = config.model_profiles;
    this.defaultProfile = config.default;
    this.overrideProfile = config.override;
  }

  getProfile(name: string): ModelProfileConfig | undefined {
    return this.profiles[name];
  }

  getProfiles(): Record<string, ModelProfileConfig> {
    return this.profiles;
  }

  getDefaultProfile(): string | undefined {
    return this.defaultProfile;
  }

  getOverrideProfile(): string | undefined {
    return this.overrideProfile;
  }

  /**
   * Resolve the final model configuration for a model identifier.
   *
   * @throws ConfigError if neither the profiles nor the identifier name a model
   */
  resolveModelConfig(model: string | undefined): ModelConfig {
    const result: ModelProfileConfig = {};

    // 1. Apply default profile
    if (this.defaultProfile) {
      const defaultCfg = this.getProfile(this.defaultProfile);
      if (defaultCfg) {
        Object.assign(result, defaultCfg);
      } else {
        this.logger.warn(`Default profile '${this.defaultProfile}' not found`);
      }
    }

    // 2. Agent's model identifier
    if (model) {
      const profileCfg = this.getProfile(model);
      if (profileCfg) {
        Object.assign(result, profileCfg);
      } else {
        Object.assign(result, parseModelId(model, result.provider));
      }
    }

    // 3. Apply override profile (trumps all)
    if (this.overrideProfile) {
      const overrideCfg = this.getProfile(this.overrideProfile);
      if (overrideCfg) {
        Object.assign(result, overrideCfg);
      } else {
        this.logger.warn(`Override profile '${this.overrideProfile}' not found`);
      }
    }

    const { provider, name } = result;
    if (!name) {
      throw new ConfigError(
        model ? `Model '${model}' resolved without a model name` : "No model configured"
      );
    }
    return { ...result, provider: provider ?? DEFAULT_PROVIDER, name };
  }
}

/**
 * `provider/name` splits at the first slash; a bare name keeps the
 * provider already resolved.
 */
export function parseModelId(model: string, fallbackProvider?: string): ModelProfileConfig {
  const slash = model.indexOf("/");
  if (slash > 0) {
    return { provider: model.slice(0, slash), name: model.slice(slash + 1) };
  }
  return { provider: fallbackProvider ?? DEFAULT_PROVIDER, name: model };
}

/**
 * Parse and check a profiles.yml document. Both the bare layout and one
 * wrapped in a top-level `data` key are accepted.
 */
export function parseProfiles(content: string, source = "profiles.yml"): ProfilesConfig {
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${source}: ${errorMessage(err)}`);
  }
  if (doc === null || doc === undefined) {
    return { model_profiles: {} };
  }
  if (!isRecord(doc)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const data = isRecord(doc.data) ? doc.data : doc;
  const rawProfiles = data.model_profiles ?? {};
  if (!isRecord(rawProfiles)) {
    throw new ConfigError(`${source}: 'model_profiles' must be a mapping`);
  }

  const model_profiles: Record<string, ModelProfileConfig> = {};
  for (const [name, raw] of Object.entries(rawProfiles)) {
    if (!isRecord(raw)) {
      throw new ConfigError(`${source}: profile '${name}' must be a mapping`);
    }
    model_profiles[name] = toProfile(raw, `${source}: profile '${name}'`);
  }

  return {
    default: optionalString(data.default, `${source}: 'default'`),
    override: optionalString(data.override, `${source}: 'override'`),
    model_profiles,
  };
}

function toProfile(raw: Record<string, unknown>, where: string): ModelProfileConfig {
  const profile: ModelProfileConfig = {};
  const provider = optionalString(raw.provider, `${where} provider`);
  const name = optionalString(raw.name, `${where} name`);
  const baseUrl = optionalString(raw.base_url, `${where} base_url`);
  const temperature = optionalNumber(raw.temperature, `${where} temperature`);
  const maxTokens = optionalNumber(raw.max_tokens, `${where} max_tokens`);
  const topP = optionalNumber(raw.top_p, `${where} top_p`);
  if (provider !== undefined) profile.provider = provider;
  if (name !== undefined) profile.name = name;
  if (baseUrl !== undefined) profile.base_url = baseUrl;
  if (temperature !== undefined) profile.temperature = temperature;
  if (maxTokens !== undefined) profile.max_tokens = maxTokens;
  if (topP !== undefined) profile.top_p = topP;
  return profile;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${where} must be a string`);
  }
  return value;
}

export function optionalNumber(value: unknown, where: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") {
    throw new ConfigError(`${where} must be a number`);
  }
  return value;
}

/**
 * Convenience function to resolve model configuration.
 *
 * @param model - Agent's model identifier
 * @param configDir - Directory searched for profiles.yml
 * @param profilesFile - Explicit path to profiles.yml (overrides auto-discovery)
 */
export function resolveModelConfig(
  model: string | undefined,
  configDir: string,
  profilesFile?: string
): ModelConfig {
  const manager = profilesFile
    ? new ProfileManager(profilesFile)
    : ProfileManager.getInstance(configDir);

  return manager.resolveModelConfig(model);
}
