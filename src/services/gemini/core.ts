/**
 * Shared Gemini API client module.
 *
 * The SDK is loaded on first use so processes that never judge evidence do
 * not pay for it. All Gemini usage should import from here.
 */

import type { GoogleGenAI } from '@google/genai';
import { logger } from '../../utils/logger';

/**
 * Create a Gemini client, or null when no API key is configured.
 */
export async function createGeminiClient(apiKey: string | undefined): Promise<GoogleGenAI | null> {
  if (!apiKey) {
    logger.warn('GEMINI_API_KEY not configured');
    return null;
  }
  const { GoogleGenAI } = await import('@google/genai');
  return new GoogleGenAI({ apiKey });
}

/**
 * Type constants for Gemini schema definitions.
 * Mirrors the JSON Schema type names accepted by responseJsonSchema.
 */
export const GeminiType = {
  STRING: 'string',
  NUMBER: 'number',
  INTEGER: 'integer',
  BOOLEAN: 'boolean',
  ARRAY: 'array',
  OBJECT: 'object',
} as const;
