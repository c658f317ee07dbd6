import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  getGenerativeModel: vi.fn(),
  embedContent: vi.fn(),
  generateContent: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.getGenerativeModel;
  },
}));

import { gemini_embed, generate_with_flash, is_ai_available } from './gemini.js';

beforeEach(() => {
  vi.clearAllMocks();
  mocks.getGenerativeModel.mockReturnValue({
    embedContent: mocks.embedContent,
    generateContent: mocks.generateContent,
  });
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('gemini_embed', () => {
  it('calls the embedding model with the abort signal and returns the values', async () => {
    mocks.embedContent.mockResolvedValueOnce({ embedding: { values: [0.1, 0.2] } });
    const signal = new AbortController().signal;

    await expect(gemini_embed('where is the fire station', signal)).resolves.toEqual([0.1, 0.2]);
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-embedding-001' });
    expect(mocks.embedContent).toHaveBeenCalledWith('where is the fire station', { signal });
  });

  it('propagates client errors', async () => {
    mocks.embedContent.mockRejectedValueOnce(new Error('429 RESOURCE_EXHAUSTED'));

    await expect(gemini_embed('x', new AbortController().signal)).rejects.toThrow('429 RESOURCE_EXHAUSTED');
  });
});

describe('generate_with_flash', () => {
  it('returns the response text from the flash model', async () => {
    mocks.generateContent.mockResolvedValueOnce({ response: { text: () => 'Grid E4.' } });

    await expect(generate_with_flash('prompt')).resolves.toBe('Grid E4.');
    expect(mocks.getGenerativeModel).toHaveBeenCalledWith({ model: 'gemini-2.5-flash' });
    expect(mocks.generateContent).toHaveBeenCalledWith('prompt', undefined);
  });
});

describe('is_ai_available', () => {
  it('is true with an API key', () => {
    expect(is_ai_available()).toBe(true);
  });

  it('is false when AI is disabled', () => {
    vi.stubEnv('AI_ENABLED', 'false');
    expect(is_ai_available()).toBe(false);
  });
});
