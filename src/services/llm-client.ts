import { z } from 'zod';
import { HttpClient } from '../utils/http';
import { RateLimiter } from '../utils/rate-limiter';
import { logger, preview } from '../utils/logger';

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  promptName?: string;
}

/**
 * Single-shot, stateless text completion
 */
export interface CompletionClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

/**
 * Mistral chat completions client
 * Every call waits on the shared rate limiter first
 */
export class MistralClient implements CompletionClient {
  private readonly endpoint = 'https://api.mistral.ai/v1/chat/completions';
  private readonly timeoutMs = 30_000;

  constructor(
    private readonly http: HttpClient,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly rateLimiter: RateLimiter
  ) {}

  getModelName(): string {
    return this.model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    await this.rateLimiter.acquire();

    const startedAt = Date.now();
    const promptName = options.promptName ?? 'completion';

    const response = await this.http.request(this.endpoint, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature,
        max_tokens: options.maxTokens,
      }),
      timeoutMs: this.timeoutMs,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Mistral API error: HTTP ${response.status} - ${preview(body, 200)}`);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    const content = parsed.success ? parsed.data.choices[0].message.content : null;
    if (!content) {
      throw new Error('Mistral response does not contain message content');
    }

    logger.info('llm.call.completed', {
      promptName,
      model: this.model,
      latencyMs: Date.now() - startedAt,
      responseChars: content.length,
    });
    return content.trim();
  }
}
