// ============================================================
// Object Forge - Script Generator
// One object name in, one generated script text out
// ============================================================

import { GENERATION_DEFAULTS } from '../shared/constants';
import { buildScriptPrompt } from './prompt';
import type { ScriptPromptOptions } from './prompt';
import { callProvider, getProvider } from './providers';

// ------------------------------------------------------------------
// Capability
// ------------------------------------------------------------------

/**
 * Anything that can turn an object name into script text.
 * Implementations reject with {@link ServiceError}.
 */
export interface ScriptGenerator {
  generate(name: string): Promise<string>;
}

// ------------------------------------------------------------------
// Error class
// ------------------------------------------------------------------

/**
 * Failure of the external generation service. Not retried: the run that
 * hits it stops.
 */
export class ServiceError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** HTTP status reported by the provider SDK, when there is one */
  readonly status?: number;

  constructor(message: string, code: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ServiceError';
    this.code = code;
    this.status = options.status;
  }
}

// ------------------------------------------------------------------
// Provider-backed implementation
// ------------------------------------------------------------------

/** Settings for {@link ProviderScriptGenerator} */
export interface ProviderGeneratorConfig {
  /** Provider ID (see providers/index.ts) */
  providerId: string;
  apiKey: string;
  /** Overrides the provider's default model */
  model?: string;
  maxTokens?: number;
  temperature?: number;
  prompt?: ScriptPromptOptions;
}

/**
 * Sends the script prompt for each name to the configured LLM provider.
 * Every SDK failure surfaces as a `ServiceError` with code `PROVIDER_ERROR`.
 */
export class ProviderScriptGenerator implements ScriptGenerator {
  private readonly config: Required<Omit<ProviderGeneratorConfig, 'model'>> & { model?: string };

  constructor(config: ProviderGeneratorConfig) {
    // Fails fast on an unknown provider ID
    getProvider(config.providerId);

    this.config = {
      providerId: config.providerId,
      apiKey: config.apiKey,
      model: config.model,
      maxTokens: config.maxTokens ?? GENERATION_DEFAULTS.MAX_TOKENS,
      temperature: config.temperature ?? GENERATION_DEFAULTS.TEMPERATURE,
      prompt: config.prompt ?? {},
    };
  }

  async generate(name: string): Promise<string> {
    const prompt = buildScriptPrompt(name, this.config.prompt);

    try {
      const result = await callProvider(this.config.providerId, this.config.apiKey, prompt, {
        model: this.config.model,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });

      console.log(
        `[scriptgen] Generated script for "${name}" using ${result.model} (${result.usage.totalTokens} tokens)`,
      );
      return result.content;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ServiceError(
        `${this.config.providerId} request for "${name}" failed: ${message}`,
        'PROVIDER_ERROR',
        { status: readStatus(err), cause: err },
      );
    }
  }
}

/** SDK errors (Anthropic, OpenAI) carry the HTTP status as `status` */
function readStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}
