/**
 * Tests for the LLM client seam
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createAnthropicClient, extractJson } from '../../src/llm/client';

describe('extractJson', () => {
  it('parses a bare JSON reply', () => {
    expect(extractJson('{"score": 7, "summary": "s", "reasoning": "r"}')).toEqual({
      score: 7,
      summary: 's',
      reasoning: 'r',
    });
  });

  it('parses a fenced code block', () => {
    const reply = 'Here is my verdict:\n```json\n{"score": 3}\n```\nThanks.';
    expect(extractJson(reply)).toEqual({ score: 3 });
  });

  it('parses an object surrounded by prose', () => {
    expect(extractJson('Verdict: {"score": 9} as requested')).toEqual({ score: 9 });
  });

  it('parses an array', () => {
    expect(extractJson('Results: [1, 2, 3]')).toEqual([1, 2, 3]);
  });

  it('returns null when nothing parses', () => {
    expect(extractJson('I cannot judge this story.')).toBeNull();
    expect(extractJson('{"score": 4,')).toBeNull();
  });
});

describe('createAnthropicClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('requires an API key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(() => createAnthropicClient()).toThrow('ANTHROPIC_API_KEY not set');
  });

  it('uses the configured model', () => {
    const client = createAnthropicClient({ apiKey: 'test-secret', model: 'test-model' });
    expect(client.model).toBe('test-model');
  });
});
