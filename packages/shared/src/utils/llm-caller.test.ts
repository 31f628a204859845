import type { LanguageModel } from 'ai';

import { generateText } from 'ai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { LLMCaller, type LLMTextCallConfig } from './llm-caller';

vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

type GenerateTextResult = Awaited<ReturnType<typeof generateText>>;

function createMockTextResult(
  text: string,
  usage = { inputTokens: 100, outputTokens: 50, totalTokens: 150 },
): GenerateTextResult {
  // Only the fields LLMCaller reads are provided
  return { text, usage } as unknown as GenerateTextResult;
}

describe('LLMCaller', () => {
  const primaryModel: LanguageModel = 'solar-pro';
  const fallbackModel: LanguageModel = 'solar-mini';

  let config: LLMTextCallConfig;

  beforeEach(() => {
    vi.mocked(generateText).mockReset();
    config = {
      systemPrompt: 'system',
      userPrompt: 'user',
      primaryModel,
      maxRetries: 3,
      temperature: 0.1,
      component: 'SemanticEvaluator',
      phase: 'judgment',
    };
  });

  describe('callText', () => {
    test('returns the primary completion with usage', async () => {
      vi.mocked(generateText).mockResolvedValueOnce(
        createMockTextResult('{"overall_score": 80}'),
      );

      const result = await LLMCaller.callText(config);

      expect(result).toEqual({
        output: '{"overall_score": 80}',
        usage: {
          component: 'SemanticEvaluator',
          phase: 'judgment',
          model: 'primary',
          modelName: 'solar-pro',
          inputTokens: 100,
          outputTokens: 50,
          totalTokens: 150,
        },
        usedFallback: false,
      });
    });

    test('passes prompts and generation settings to generateText', async () => {
      const controller = new AbortController();
      vi.mocked(generateText).mockResolvedValueOnce(createMockTextResult('ok'));

      await LLMCaller.callText({ ...config, abortSignal: controller.signal });

      expect(generateText).toHaveBeenCalledWith({
        model: 'solar-pro',
        system: 'system',
        prompt: 'user',
        temperature: 0.1,
        maxRetries: 3,
        abortSignal: controller.signal,
      });
    });

    test('reads modelId from model objects', async () => {
      const modelObject = { modelId: 'solar-pro2' } as unknown as LanguageModel;
      vi.mocked(generateText).mockResolvedValueOnce(createMockTextResult('ok'));

      const result = await LLMCaller.callText({
        ...config,
        primaryModel: modelObject,
      });

      expect(result.usage.modelName).toBe('solar-pro2');
    });

    test('defaults missing usage fields to zero', async () => {
      vi.mocked(generateText).mockResolvedValueOnce({
        text: 'ok',
        usage: {},
      } as unknown as GenerateTextResult);

      const result = await LLMCaller.callText(config);

      expect(result.usage.inputTokens).toBe(0);
      expect(result.usage.outputTokens).toBe(0);
      expect(result.usage.totalTokens).toBe(0);
    });

    test('retries on the fallback model when the primary fails', async () => {
      vi.mocked(generateText)
        .mockRejectedValueOnce(new Error('primary down'))
        .mockResolvedValueOnce(createMockTextResult('from fallback'));

      const result = await LLMCaller.callText({ ...config, fallbackModel });

      expect(result.output).toBe('from fallback');
      expect(result.usedFallback).toBe(true);
      expect(result.usage.model).toBe('fallback');
      expect(result.usage.modelName).toBe('solar-mini');
      expect(generateText).toHaveBeenCalledTimes(2);
    });

    test('rethrows the primary error without a fallback model', async () => {
      vi.mocked(generateText).mockRejectedValueOnce(new Error('primary down'));

      await expect(LLMCaller.callText(config)).rejects.toThrow('primary down');
      expect(generateText).toHaveBeenCalledTimes(1);
    });

    test('does not try the fallback model after an abort', async () => {
      const controller = new AbortController();
      controller.abort();
      vi.mocked(generateText).mockRejectedValueOnce(new Error('aborted'));

      await expect(
        LLMCaller.callText({
          ...config,
          fallbackModel,
          abortSignal: controller.signal,
        }),
      ).rejects.toThrow('aborted');
      expect(generateText).toHaveBeenCalledTimes(1);
    });

    test('propagates the fallback error when both models fail', async () => {
      vi.mocked(generateText)
        .mockRejectedValueOnce(new Error('primary down'))
        .mockRejectedValueOnce(new Error('fallback down'));

      await expect(
        LLMCaller.callText({ ...config, fallbackModel }),
      ).rejects.toThrow('fallback down');
    });
  });
});
