import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { ConfigError, MemoryLogger, RateLimitError } from '@patchfix/shared';
import { OpenAIAdapter } from './adapter';
import type { AdapterContext } from '../types';

function completion(content: string, finishReason: string) {
  return {
    id: 'chatcmpl-123',
    object: 'chat.completion',
    created: 1677652288,
    model: 'gpt-test',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: finishReason,
      },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

describe('OpenAIAdapter contract', () => {
  let adapter: OpenAIAdapter;
  let ctx: AdapterContext;

  beforeEach(() => {
    nock.cleanAll();
    nock.disableNetConnect();
    ctx = { runId: 'test-run', logger: new MemoryLogger(), retryOptions: { maxRetries: 0 } };
    adapter = new OpenAIAdapter({ type: 'openai', model: 'gpt-test', api_key: 'test-secret' });
  });

  afterEach(() => {
    nock.cleanAll();
    nock.enableNetConnect();
  });

  it('sends the request and returns text, usage and stop reason', async () => {
    const scope = nock('https://api.openai.com')
      .post('/v1/chat/completions', (body) => {
        return (
          body.model === 'gpt-test' &&
          body.messages[0].role === 'system' &&
          body.messages[1].content === 'Hi' &&
          body.max_tokens === 8192 &&
          body.temperature === 0
        );
      })
      .reply(200, completion('Hello there', 'stop'));

    const result = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'You fix patches.' },
          { role: 'user', content: 'Hi' },
        ],
        maxTokens: 8192,
      },
      ctx,
    );

    expect(result.text).toBe('Hello there');
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(result.stopReason).toBe('stop');
    expect(scope.isDone()).toBe(true);
  });

  it('maps finish_reason length', async () => {
    nock('https://api.openai.com')
      .post('/v1/chat/completions')
      .reply(200, completion('partial', 'length'));

    const result = await adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx);

    expect(result.stopReason).toBe('length');
  });

  it('maps 429 to RateLimitError', async () => {
    nock('https://api.openai.com')
      .post('/v1/chat/completions')
      .reply(429, {
        error: { message: 'Rate limit exceeded', type: 'requests', param: null, code: null },
      });

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(RateLimitError);
  });

  it('maps 401 to ConfigError', async () => {
    nock('https://api.openai.com')
      .post('/v1/chat/completions')
      .reply(401, {
        error: { message: 'Incorrect API key', type: 'invalid_request_error', param: null, code: null },
      });

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(ConfigError);
  });
});
