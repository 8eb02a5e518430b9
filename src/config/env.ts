// ============================================================
// Object Forge - Environment Configuration
// Resolves provider, model and credentials for script generation
// ============================================================

import { ENV_KEYS, GENERATION_DEFAULTS } from '../shared/constants';
import type { ProviderGeneratorConfig } from '../scriptgen/generator';
import { getProvider, isKnownProvider, listProviders } from '../scriptgen/providers';
import type { ProviderKeyFamily } from '../scriptgen/providers';

export class ConfigError extends Error {
  /** Machine-readable error code */
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
  }
}

/** Environment variables holding the key for each provider family, in lookup order */
export const API_KEY_VARIABLES: Record<ProviderKeyFamily, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

type Env = Record<string, string | undefined>;

/**
 * Reads the generator settings from the environment.
 *
 * @throws {ConfigError} on an unknown provider, a missing API key or a
 *   malformed number
 */
export function loadConfig(env: Env = process.env): ProviderGeneratorConfig {
  const providerId = readString(env, ENV_KEYS.PROVIDER) ?? GENERATION_DEFAULTS.PROVIDER;
  if (!isKnownProvider(providerId)) {
    throw new ConfigError(
      `${ENV_KEYS.PROVIDER}="${providerId}" is not a known provider. Valid: ${listProviders().join(', ')}`,
      'UNKNOWN_PROVIDER',
    );
  }

  const { family } = getProvider(providerId);
  const keyVariables = API_KEY_VARIABLES[family];
  const apiKey = keyVariables.map((name) => readString(env, name)).find((value) => value !== undefined);
  if (apiKey === undefined) {
    throw new ConfigError(
      `Provider "${providerId}" needs an API key in ${keyVariables.join(' or ')}`,
      'MISSING_API_KEY',
    );
  }

  return {
    providerId,
    apiKey,
    model: readString(env, ENV_KEYS.MODEL),
    maxTokens: readNumber(env, ENV_KEYS.MAX_TOKENS, GENERATION_DEFAULTS.MAX_TOKENS, true),
    temperature: readNumber(env, ENV_KEYS.TEMPERATURE, GENERATION_DEFAULTS.TEMPERATURE, false),
  };
}

function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Env, name: string, fallback: number, integer: boolean): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigError(
      `${name}="${raw}" must be a non-negative ${integer ? 'integer' : 'number'}`,
      'INVALID_NUMBER',
    );
  }
  return value;
}
