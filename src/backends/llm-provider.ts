/**
 * LLM Provider Factory
 *
 * Creates AI SDK language model instances.
 * Cloud default: OpenRouter. Anthropic when configured.
 * Local: any OpenAI-compatible endpoint on this machine, reached through the
 * OpenRouter provider with a custom base URL.
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModelV1 } from 'ai';
import type { CloudConfig, OnDeviceConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

const DEFAULT_OPENROUTER_MODEL = 'google/gemini-2.5-flash-lite';
const DEFAULT_ANTHROPIC_MODEL = 'claude-3-haiku-20240307';

type Environment = Record<string, string | undefined>;

/**
 * Create Anthropic provider (lazy import so OpenRouter-only setups never load it)
 */
async function createAnthropicModel(apiKey: string, model?: string): Promise<LanguageModelV1> {
  const { createAnthropic } = await import('@ai-sdk/anthropic');
  const anthropic = createAnthropic({ apiKey });
  return anthropic(model || DEFAULT_ANTHROPIC_MODEL);
}

/**
 * Create the cloud model from configuration, falling back to the provider's
 * usual API key variable.
 *
 * @throws ConfigurationError when Anthropic is selected without a key
 */
export async function createCloudModel(
  config: Pick<CloudConfig, 'provider' | 'model' | 'apiKey'>,
  env: Environment = process.env
): Promise<LanguageModelV1> {
  if (config.provider === 'anthropic') {
    const apiKey = config.apiKey || env['ANTHROPIC_API_KEY'];
    if (!apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY required for Anthropic provider');
    }
    return createAnthropicModel(apiKey, config.model);
  }

  const openrouter = createOpenRouter({
    apiKey: config.apiKey || env['OPENROUTER_API_KEY'] || '',
  });
  return openrouter(config.model || DEFAULT_OPENROUTER_MODEL);
}

/**
 * Create the model served by the local runtime
 */
export function createLocalModel(config: Pick<OnDeviceConfig, 'baseURL' | 'model'>): LanguageModelV1 {
  const local = createOpenRouter({
    baseURL: config.baseURL,
    // Local servers ignore the key, but the provider requires one
    apiKey: 'local',
  });
  return local(config.model);
}

/**
 * Get the default model ID for display
 */
export function getDefaultModelId(provider?: 'openrouter' | 'anthropic'): string {
  if (provider === 'anthropic') {
    return DEFAULT_ANTHROPIC_MODEL;
  }
  return DEFAULT_OPENROUTER_MODEL;
}
