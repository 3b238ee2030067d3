/**
 * Gemini judgment model.
 * Thin wrapper handling the API call, retries and response parsing.
 */

import type { GenerateContentResponse, GoogleGenAI } from '@google/genai';
import type { JudgmentModelConfig } from '../../config/models';
import { ExternalServiceError, JudgmentParseError } from '../../utils/errors';
import { withRetry } from '../../utils/retry';
import type { JudgmentModel } from '../stance/judgment.interface';
import { createGeminiClient } from './core';
import { stanceJudgmentSchema } from './schemas/stance';

export interface GeminiJudgmentOptions {
  apiKey?: string;
  model: string;
  modelConfig: JudgmentModelConfig;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
}

export class GeminiJudgmentModel implements JudgmentModel {
  readonly name: string;
  private clientPromise: Promise<GoogleGenAI | null> | null = null;

  constructor(private readonly options: GeminiJudgmentOptions) {
    this.name = `gemini:${options.model}`;
  }

  async judge(prompt: string, signal?: AbortSignal): Promise<unknown> {
    const client = await this.getClient();
    if (!client) {
      throw new ExternalServiceError('gemini', 'Gemini API client not initialized - GEMINI_API_KEY missing');
    }

    const result = await withRetry(
      'gemini.judge',
      (attemptSignal) =>
        client.models.generateContent({
          model: this.options.model,
          contents: prompt,
          config: {
            responseMimeType: 'application/json',
            responseJsonSchema: stanceJudgmentSchema,
            temperature: this.options.modelConfig.temperature,
            maxOutputTokens: this.options.modelConfig.maxOutputTokens,
            abortSignal: attemptSignal,
          },
        }),
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.retryBaseMs,
        timeoutMs: this.options.timeoutMs,
        signal,
      }
    );

    return parseResponse(result);
  }

  private getClient(): Promise<GoogleGenAI | null> {
    this.clientPromise ??= createGeminiClient(this.options.apiKey);
    return this.clientPromise;
  }
}

/**
 * Parse the JSON body of a Gemini response. Blocked or empty responses are
 * service errors; text that is not JSON is a judgment parse error.
 */
export function parseResponse(result: GenerateContentResponse): unknown {
  if (!result.candidates?.length) {
    const blockReason = result.promptFeedback?.blockReason;
    if (blockReason) {
      throw new ExternalServiceError('gemini', `Content blocked: ${blockReason}`);
    }
    throw new ExternalServiceError('gemini', 'Empty response from API');
  }

  const text = result.text;
  if (!text?.trim()) {
    throw new ExternalServiceError('gemini', 'Empty response text');
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new JudgmentParseError('Failed to parse judgment response as JSON', { cause: error });
  }
}
