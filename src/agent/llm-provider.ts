/**
 * LLM Provider Factory
 *
 * Creates AI SDK language model instances.
 * Default: OpenRouter (OPENROUTER_API_KEY)
 * Optional: Anthropic (ANTHROPIC_API_KEY)
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModelV1 } from 'ai';
import { ConfigurationError, describeError } from '../errors.js';

export type LLMProviderName = 'openrouter' | 'anthropic';

export interface LLMConfig {
  provider?: LLMProviderName | undefined;
  model?: string | undefined;
  apiKey?: string | undefined;
}

const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.5-flash-lite';
const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

/**
 * Create Anthropic provider (lazy import keeps it off the startup path)
 */
async function createAnthropicProvider(apiKey: string, model?: string): Promise<LanguageModelV1> {
  try {
    const { createAnthropic } = await import('@ai-sdk/anthropic');
    const anthropic = createAnthropic({ apiKey });
    return anthropic(model || DEFAULT_ANTHROPIC_MODEL);
  } catch (error) {
    throw new ConfigurationError(`Anthropic provider not available: ${describeError(error)}`);
  }
}

/**
 * Create a language model from configuration and the provider API keys in `env`
 */
export async function createLanguageModel(
  config: LLMConfig = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<LanguageModelV1> {
  const provider = config.provider ?? 'openrouter';

  if (provider === 'anthropic') {
    const apiKey = config.apiKey || env['ANTHROPIC_API_KEY'];
    if (!apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY required for Anthropic provider');
    }
    return createAnthropicProvider(apiKey, config.model);
  }

  const apiKey = config.apiKey || env['OPENROUTER_API_KEY'];
  if (!apiKey) {
    throw new ConfigurationError('OPENROUTER_API_KEY required for OpenRouter provider');
  }
  const openrouter = createOpenRouter({ apiKey });
  return openrouter(config.model || DEFAULT_OPENROUTER_MODEL);
}

/**
 * Get the default model ID for display
 */
export function getDefaultModelId(provider: LLMProviderName = 'openrouter'): string {
  return provider === 'anthropic' ? DEFAULT_ANTHROPIC_MODEL : DEFAULT_OPENROUTER_MODEL;
}

/**
 * Check which providers have credentials
 */
export function getAvailableProviders(env: NodeJS.ProcessEnv = process.env): Record<LLMProviderName, boolean> {
  return {
    openrouter: !!env['OPENROUTER_API_KEY'],
    anthropic: !!env['ANTHROPIC_API_KEY'],
  };
}
