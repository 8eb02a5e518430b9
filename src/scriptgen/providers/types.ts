import type { TokenUsage } from '../../shared/types';

/** Raw result from an LLM provider call */
export interface ProviderResult {
  content: string;
  model: string;
  usage: TokenUsage;
}

/** Per-call generation settings */
export interface ProviderCallOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export type ProviderCall = (
  apiKey: string,
  prompt: string,
  options: ProviderCallOptions,
) => Promise<ProviderResult>;
