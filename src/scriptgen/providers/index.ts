import type { ProviderCall, ProviderCallOptions, ProviderResult } from './types';
import { callAnthropic } from './anthropic';
import { callGemini } from './gemini';
import { callOpenAI } from './openai';

export type { ProviderCall, ProviderCallOptions, ProviderResult } from './types';

/** API key family a provider authenticates with */
export type ProviderKeyFamily = 'anthropic' | 'openai' | 'google';

interface ProviderEntry {
  call: ProviderCall;
  model: string;
  family: ProviderKeyFamily;
}

/** Provider ID → { call function, default model, key family } */
const PROVIDERS: Record<string, ProviderEntry> = {
  'claude-sonnet': { call: callAnthropic, model: 'claude-sonnet-4-20250514', family: 'anthropic' },
  'claude-haiku':  { call: callAnthropic, model: 'claude-3-5-haiku-20241022', family: 'anthropic' },
  'gpt-4o':        { call: callOpenAI, model: 'gpt-4o', family: 'openai' },
  'gpt-4o-mini':   { call: callOpenAI, model: 'gpt-4o-mini', family: 'openai' },
  'gemini-flash':  { call: callGemini, model: 'gemini-2.5-flash', family: 'google' },
  'gemini-pro':    { call: callGemini, model: 'gemini-2.5-pro', family: 'google' },
};

export function listProviders(): string[] {
  return Object.keys(PROVIDERS);
}

export function isKnownProvider(providerId: string): boolean {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, providerId);
}

/**
 * @throws Error when the provider ID is not registered
 */
export function getProvider(providerId: string): ProviderEntry {
  if (!isKnownProvider(providerId)) {
    throw new Error(`Unknown LLM provider: "${providerId}". Valid: ${listProviders().join(', ')}`);
  }
  return PROVIDERS[providerId];
}

/**
 * Dispatches a prompt to the correct provider. `options.model` overrides
 * the provider's default model when set.
 */
export async function callProvider(
  providerId: string,
  apiKey: string,
  prompt: string,
  options: Partial<ProviderCallOptions> & Omit<ProviderCallOptions, 'model'>,
): Promise<ProviderResult> {
  const provider = getProvider(providerId);
  return provider.call(apiKey, prompt, { ...options, model: options.model ?? provider.model });
}
