/**
 * NewsScout — LLM Client
 *
 * Thin seam over the model provider. The scorer and the evaluator
 * only see `LlmClient`, so tests swap in a deterministic fake.
 */

import Anthropic from '@anthropic-ai/sdk';
import { DEFAULT_MODEL } from '../lib/config';
import { scopedLogger, errorMessage } from '../lib/logger';

const log = scopedLogger('llm');

const MAX_TOKENS = 1024;

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface AnthropicClientOptions {
  apiKey?: string;
  model?: string;
}

/**
 * LlmClient backed by the Anthropic Messages API.
 */
export function createAnthropicClient(options: AnthropicClientOptions = {}): LlmClient {
  const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new Error('ANTHROPIC_API_KEY not set');
  }

  const anthropic = new Anthropic({ apiKey });
  const model = options.model ?? DEFAULT_MODEL;

  return {
    model,
    async complete(request: CompletionRequest): Promise<string> {
      try {
        const response = await anthropic.messages.create(
          {
            model,
            max_tokens: request.maxTokens ?? MAX_TOKENS,
            temperature: request.temperature ?? 0.2,
            system: request.system,
            messages: [{ role: 'user', content: request.prompt }],
          },
          { signal: request.signal }
        );

        const textContent = response.content.find(c => c.type === 'text');
        if (!textContent || textContent.type !== 'text') {
          throw new Error('No text content in response');
        }

        log.debug('Completion received', {
          model,
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        });

        return textContent.text;
      } catch (error) {
        log.warn('Completion failed', { model, error: errorMessage(error) });
        throw error;
      }
    },
  };
}

// ============================================================
// RESPONSE PARSING
// ============================================================

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON value out of a model reply: the whole text, then a fenced
 * code block, then the outermost object or array. Null when none parse.
 */
export function extractJson(text: string): unknown {
  const direct = tryParse(text.trim());
  if (direct !== undefined) return direct;

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    const parsed = tryParse(fenced[1]);
    if (parsed !== undefined) return parsed;
  }

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start >= 0 && end > start) {
      const parsed = tryParse(text.slice(start, end + 1));
      if (parsed !== undefined) return parsed;
    }
  }

  return null;
}
