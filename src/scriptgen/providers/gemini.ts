// ============================================================
// Object Forge - Google Gemini Provider
// ============================================================

import { GoogleGenAI } from '@google/genai';
import type { ProviderCallOptions, ProviderResult } from './types';

export async function callGemini(
  apiKey: string,
  prompt: string,
  options: ProviderCallOptions,
): Promise<ProviderResult> {
  const ai = new GoogleGenAI({ apiKey });

  const response = await ai.models.generateContent({
    model: options.model,
    contents: [{ role: 'user', parts: [{ text: prompt }] }],
    config: {
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
    },
  });

  return {
    content: response.text ?? '',
    model: options.model,
    usage: {
      promptTokens: response.usageMetadata?.promptTokenCount ?? 0,
      completionTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
      totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
    },
  };
}
