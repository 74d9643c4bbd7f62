/**
 * AnthropicQuestionGenerator - Question sets through the Anthropic Messages API
 * https://docs.anthropic.com/en/api/messages
 *
 * @module packages/adapters/generation/AnthropicQuestionGenerator
 */

import { readFileSync } from 'fs';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { IQuestionGenerator } from '../../core/ports/IQuestionGenerator.js';
import { GenerationError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';

const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';
const ANTHROPIC_VERSION = '2023-06-01';

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
});

export type HttpPoster = Pick<AxiosInstance, 'post'>;

export interface AnthropicQuestionGeneratorOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  systemPrompt: string;
  client?: HttpPoster;
}

export class AnthropicQuestionGenerator implements IQuestionGenerator {
  private readonly client: HttpPoster;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly systemPrompt: string;

  constructor(options: AnthropicQuestionGeneratorOptions) {
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.systemPrompt = options.systemPrompt;
    this.client =
      options.client ??
      axios.create({
        baseURL: ANTHROPIC_BASE_URL,
        headers: {
          'x-api-key': options.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'Content-Type': 'application/json',
        },
        timeout: options.timeoutMs,
      });
  }

  async generate(topic: string): Promise<string> {
    const startedAt = Date.now();
    let data: unknown;

    try {
      const response = await this.client.post('/v1/messages', {
        model: this.model,
        max_tokens: this.maxTokens,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: `Write the question set for this topic: ${topic}` }],
      });
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        logger.error({ status, errorCode: err.code }, 'Generation request failed');
        throw new GenerationError(
          status ? `Generation service returned ${status}` : 'Generation service unreachable',
          status
        );
      }
      throw err;
    }

    const parsed = messagesResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('Generation service returned an unexpected response');
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();

    if (text.length === 0) {
      throw new GenerationError('Generation service returned no text');
    }

    logger.info(
      { durationMs: Date.now() - startedAt, chars: text.length, stopReason: parsed.data.stop_reason },
      'Generated question set'
    );
    return text;
  }
}

/**
 * Load the system prompt from disk
 */
export function loadSystemPrompt(path: string): string {
  const prompt = readFileSync(path, 'utf8').trim();
  if (prompt.length === 0) {
    throw new GenerationError(`System prompt file is empty: ${path}`);
  }
  return prompt;
}

/**
 * Factory function
 */
export function createQuestionGenerator(
  options: Omit<AnthropicQuestionGeneratorOptions, 'systemPrompt'> & { promptPath: string }
): AnthropicQuestionGenerator {
  const { promptPath, ...rest } = options;
  return new AnthropicQuestionGenerator({ ...rest, systemPrompt: loadSystemPrompt(promptPath) });
}
