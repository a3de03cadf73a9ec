import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---------------------------------------------------------------------------
// Mock node:fs/promises
// ---------------------------------------------------------------------------

const { mockReadFile } = vi.hoisted(() => ({
  mockReadFile: vi.fn(),
}));

vi.mock('node:fs/promises', () => ({
  readFile: mockReadFile,
}));

import { createDefaultConfig, loadModelConfig } from '../model-config.js';

describe('model-config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createDefaultConfig', () => {
    it('registers only providers whose credentials are present', () => {
      const config = createDefaultConfig({ DASHSCOPE_API_KEY: 'test-secret', OLLAMA_BASE_URL: 'http://127.0.0.1:11434/v1' });
      expect(Object.keys(config.providers).sort()).toEqual(['dashscope', 'ollama']);
      expect(config.providers['dashscope']).toEqual({
        provider: 'openai-compatible',
        apiKey: 'test-secret',
        baseURL: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
      });
    });

    it('prefers qwen-plus when DashScope is configured', () => {
      expect(createDefaultConfig({ DASHSCOPE_API_KEY: 'test-secret' }).defaultModel).toBe('qwen-plus');
    });

    it('falls back to the first configured provider in preference order', () => {
      expect(createDefaultConfig({ ANTHROPIC_API_KEY: 'test-secret' }).defaultModel).toBe('claude-sonnet-4');
      expect(createDefaultConfig({ OPENAI_API_KEY: 'test-secret' }).defaultModel).toBe('gpt-4o-mini');
    });
  });

  describe('loadModelConfig', () => {
    it('throws when no provider is configured', async () => {
      await expect(loadModelConfig({})).rejects.toThrow('no providers configured');
    });

    it('applies DEFAULT_MODEL given as a catalog id', async () => {
      const config = await loadModelConfig({ OPENAI_API_KEY: 'test-secret', DEFAULT_MODEL: 'gpt-4o' });
      expect(config.defaultModel).toBe('gpt-4o');
    });

    it('applies DEFAULT_MODEL given as a provider model name', async () => {
      const config = await loadModelConfig({ ANTHROPIC_API_KEY: 'test-secret', DEFAULT_MODEL: 'claude-sonnet-4-20250514' });
      expect(config.defaultModel).toBe('claude-sonnet-4');
    });

    it('adds an ad-hoc model for an unknown DEFAULT_MODEL name', async () => {
      const config = await loadModelConfig({ DASHSCOPE_API_KEY: 'test-secret', DEFAULT_MODEL: 'qwen-long' });
      expect(config.defaultModel).toBe('custom-default');
      expect(config.models.find((m) => m.id === 'custom-default')).toEqual({
        id: 'custom-default',
        modelName: 'qwen-long',
        provider: 'dashscope',
        displayName: 'qwen-long',
        maxTokens: 4096,
      });
    });

    it('rejects a DEFAULT_MODEL whose provider is not configured', async () => {
      await expect(
        loadModelConfig({ DASHSCOPE_API_KEY: 'test-secret', DEFAULT_MODEL: 'claude-opus-custom' }),
      ).rejects.toThrow("appears to be a anthropic model but no anthropic provider is configured");
    });

    it('parses FALLBACK_MODELS into the fallback chain', async () => {
      const config = await loadModelConfig({ DASHSCOPE_API_KEY: 'test-secret', FALLBACK_MODELS: 'qwen-turbo, qwen-plus' });
      expect(config.fallbackChain).toEqual(['qwen-turbo', 'qwen-plus']);
    });

    it('loads a config file and merges environment credentials', async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({
          providers: { local: { provider: 'ollama' } },
          models: [{ id: 'tiny', modelName: 'tinyllama', provider: 'local' }],
          defaultModel: 'tiny',
        }),
      );
      const config = await loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/etc/parley/models.json', OPENAI_API_KEY: 'test-secret' });

      expect(mockReadFile).toHaveBeenCalledWith('/etc/parley/models.json', 'utf-8');
      expect(Object.keys(config.providers).sort()).toEqual(['local', 'openai']);
      expect(config.models).toEqual([{ id: 'tiny', modelName: 'tinyllama', provider: 'local', maxTokens: 4096 }]);
      expect(config.defaultModel).toBe('tiny');
    });

    it('rejects a malformed config file', async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({ providers: {}, models: 'nope' }));
      await expect(loadModelConfig({ MODEL_ROUTER_CONFIG_PATH: '/tmp/bad.json' })).rejects.toThrow(
        "invalid config file at '/tmp/bad.json'",
      );
    });

    it('rejects a fallback chain naming unknown models', async () => {
      await expect(
        loadModelConfig({ DASHSCOPE_API_KEY: 'test-secret', FALLBACK_MODELS: 'nonexistent' }),
      ).rejects.toThrow("fallback chain references unknown model id 'nonexistent'");
    });
  });
});
