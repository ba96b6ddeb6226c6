// =============================================================================
// AI Provider Registry
// =============================================================================
// Centralized provider configuration using Vercel AI SDK

import { createProviderRegistry } from 'ai';
import { openai } from '@ai-sdk/openai';
import { anthropic } from '@ai-sdk/anthropic';
import { ValidationError } from '../../domain/errors/index.js';

/**
 * Provider registry with OpenAI and Anthropic
 *
 * Usage:
 *   registry.languageModel('openai:gpt-4o-mini')
 *   registry.languageModel('anthropic:claude-sonnet-4-20250514')
 */
export const registry = createProviderRegistry({
  openai,
  anthropic,
});

export type ModelId = `openai:${string}` | `anthropic:${string}`;

export function isModelId(modelId: string): modelId is ModelId {
  return /^(openai|anthropic):.+/.test(modelId);
}

/**
 * Get a language model by ID
 * @param modelId - Model ID in format "provider:model" (e.g., "openai:gpt-4o-mini")
 */
export function getLanguageModel(modelId: string) {
  if (!isModelId(modelId)) {
    throw new ValidationError(`Unsupported model id: ${modelId}`, { modelId });
  }
  return registry.languageModel(modelId);
}

/**
 * Provider half of a model id ("openai:gpt-4o" -> "openai")
 */
export function providerOf(modelId: string): string {
  const separator = modelId.indexOf(':');
  return separator === -1 ? modelId : modelId.slice(0, separator);
}
