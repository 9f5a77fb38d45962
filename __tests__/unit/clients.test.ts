import { describe, expect, it } from 'vitest';
import { MistralClient } from '../../src/services/llm-client';
import { SerperSearchClient } from '../../src/services/search-client';
import { Clock, RateLimiter } from '../../src/utils/rate-limiter';
import { FakeHttpClient } from '../helpers/fakes';

const MISTRAL_URL = 'https://api.mistral.ai/v1/chat/completions';
const SERPER_URL = 'https://google.serper.dev/search';

const instantClock: Clock = {
  now: () => 0,
  sleep: async () => undefined,
};

describe('MistralClient', () => {
  function client(http: FakeHttpClient): MistralClient {
    return new MistralClient(http, 'test-secret', 'mistral-large-latest', new RateLimiter(60, instantClock));
  }

  it('posts a single user message and returns the trimmed content', async () => {
    const http = new FakeHttpClient().on(
      MISTRAL_URL,
      { body: { choices: [{ message: { content: '  {"is_hiring": true}  ' } }] } },
      'POST'
    );

    const content = await client(http).complete('Is Acme hiring?', { temperature: 0.1, maxTokens: 500 });

    expect(content).toBe('{"is_hiring": true}');
    const { options } = http.requests[0];
    expect(options.headers?.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(options.body ?? '{}')).toEqual({
      model: 'mistral-large-latest',
      messages: [{ role: 'user', content: 'Is Acme hiring?' }],
      temperature: 0.1,
      max_tokens: 500,
    });
  });

  it('rejects error responses', async () => {
    const http = new FakeHttpClient().on(MISTRAL_URL, { status: 429, body: 'rate limited' }, 'POST');

    await expect(client(http).complete('prompt', { temperature: 0.1, maxTokens: 10 })).rejects.toThrow(
      'Mistral API error: HTTP 429 - rate limited'
    );
  });

  it('rejects responses without content', async () => {
    const http = new FakeHttpClient().on(MISTRAL_URL, { body: { choices: [] } }, 'POST');

    await expect(client(http).complete('prompt', { temperature: 0.1, maxTokens: 10 })).rejects.toThrow(
      'Mistral response does not contain message content'
    );
  });
});

describe('SerperSearchClient', () => {
  it('returns nothing without an API key', async () => {
    const http = new FakeHttpClient();

    expect(await new SerperSearchClient(http, null).search('acme careers', 5)).toEqual([]);
    expect(http.requests).toHaveLength(0);
  });

  it('maps organic results', async () => {
    const http = new FakeHttpClient().on(
      SERPER_URL,
      {
        body: {
          organic: [
            { title: 'Acme Careers', link: 'https://acme.io/careers', snippet: 'Join us' },
            { link: 'https://boards.greenhouse.io/acme' },
          ],
        },
      },
      'POST'
    );

    const results = await new SerperSearchClient(http, 'test-serper').search('acme careers', 5);

    expect(results).toEqual([
      { title: 'Acme Careers', link: 'https://acme.io/careers', snippet: 'Join us' },
      { title: '', link: 'https://boards.greenhouse.io/acme', snippet: '' },
    ]);
    expect(http.requests[0].options.headers?.['X-API-KEY']).toBe('test-serper');
    expect(JSON.parse(http.requests[0].options.body ?? '{}')).toEqual({ q: 'acme careers', num: 5 });
  });

  it('returns nothing on errors', async () => {
    const failing = new FakeHttpClient().on(SERPER_URL, { status: 500, body: 'oops' }, 'POST');
    const throwing = new FakeHttpClient().on(SERPER_URL, { error: new Error('ENOTFOUND') }, 'POST');

    expect(await new SerperSearchClient(failing, 'test-serper').search('q', 5)).toEqual([]);
    expect(await new SerperSearchClient(throwing, 'test-serper').search('q', 5)).toEqual([]);
  });
});
