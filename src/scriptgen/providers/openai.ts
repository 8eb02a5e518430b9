// ============================================================
// Object Forge - OpenAI Provider
// ============================================================

import OpenAI from 'openai';
import type { ProviderCallOptions, ProviderResult } from './types';

export async function callOpenAI(
  apiKey: string,
  prompt: string,
  options: ProviderCallOptions,
): Promise<ProviderResult> {
  const client = new OpenAI({ apiKey });

  const response = await client.chat.completions.create({
    model: options.model,
    max_tokens: options.maxTokens,
    temperature: options.temperature,
    messages: [{ role: 'user', content: prompt }],
  });

  const choice = response.choices[0];
  const text = choice?.message?.content ?? '';
  const usage = response.usage;

  return {
    content: text,
    model: response.model,
    usage: {
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      totalTokens: usage?.total_tokens ?? 0,
    },
  };
}
