import { describe, it, expect } from 'vitest';
import { createCloudModel, createLocalModel, getDefaultModelId } from '../../../src/backends/llm-provider.js';
import { ConfigurationError } from '../../../src/errors.js';

describe('createCloudModel', () => {
  it('uses OpenRouter with the default model', async () => {
    const model = await createCloudModel({ provider: 'openrouter' }, {});
    expect(model.modelId).toBe(getDefaultModelId('openrouter'));
  });

  it('uses the configured model', async () => {
    const model = await createCloudModel({ provider: 'openrouter', model: 'test/model', apiKey: 'test-secret' }, {});
    expect(model.modelId).toBe('test/model');
  });

  it('creates an Anthropic model from the environment key', async () => {
    const model = await createCloudModel({ provider: 'anthropic' }, { ANTHROPIC_API_KEY: 'test-secret' });
    expect(model.modelId).toBe(getDefaultModelId('anthropic'));
  });

  it('requires a key for Anthropic', async () => {
    await expect(createCloudModel({ provider: 'anthropic' }, {})).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('createLocalModel', () => {
  it('targets the configured local model', () => {
    expect(createLocalModel({ baseURL: 'http://127.0.0.1:11434/v1', model: 'llama3.2' }).modelId).toBe('llama3.2');
  });
});
