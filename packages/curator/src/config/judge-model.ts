import type { LanguageModel } from 'ai';

import { createOpenAI } from '@ai-sdk/openai';

import { JUDGE_MODEL } from './constants';

export interface JudgeModelOptions {
  /**
   * Upstage API key. Falls back to the UPSTAGE_API_KEY environment variable.
   */
  apiKey?: string;

  /**
   * Chat model id (default: solar-pro)
   */
  modelId?: string;

  /**
   * OpenAI-compatible endpoint (default: https://api.upstage.ai/v1)
   */
  baseURL?: string;
}

/**
 * Build the language model that judges document quality
 *
 * @returns The model, or undefined when no API key is configured
 */
export function createJudgeModel(
  options: JudgeModelOptions = {},
): LanguageModel | undefined {
  const apiKey = options.apiKey ?? process.env[JUDGE_MODEL.API_KEY_ENV_VAR];
  if (!apiKey) {
    return undefined;
  }

  const upstage = createOpenAI({
    apiKey,
    baseURL: options.baseURL ?? JUDGE_MODEL.BASE_URL,
  });

  return upstage.chat(options.modelId ?? JUDGE_MODEL.MODEL_ID);
}
