// ============================================================
// Object Forge - Anthropic Provider
// ============================================================

import Anthropic from '@anthropic-ai/sdk';
import type { ProviderCallOptions, ProviderResult } from './types';

export async function callAnthropic(
  apiKey: string,
  prompt: string,
  options: ProviderCallOptions,
): Promise<ProviderResult> {
  const client = new Anthropic({ apiKey });

  const response = await client.messages.create({
    model: options.model,
    max_tokens: options.maxTokens,
    temperature: options.temperature,
    messages: [{ role: 'user', content: prompt }],
  });

  const textBlock = response.content.find((block) => block.type === 'text');
  const content = textBlock && textBlock.type === 'text' ? textBlock.text : '';

  return {
    content,
    model: response.model,
    usage: {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    },
  };
}
