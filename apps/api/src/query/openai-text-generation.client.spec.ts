import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import { APIConnectionTimeoutError, APIError, RateLimitError } from 'openai/error';
import { UpstreamError, UpstreamRateLimitedError, UpstreamTimeoutError } from '../common/errors';
import { OpenAiTextGenerationClient, toUpstreamError } from './openai-text-generation.client';

const request = { system: 'sys', user: 'list products' };

describe('toUpstreamError', () => {
  it('maps 429 to UpstreamRateLimited with retry-after', () => {
    const err = toUpstreamError(
      new RateLimitError(429, { message: 'Rate limit reached' }, 'Rate limit reached', { 'retry-after': '7' }),
    );

    expect(err).toBeInstanceOf(UpstreamRateLimitedError);
    expect(err).toMatchObject({ kind: 'UpstreamRateLimited', retryAfterSeconds: 7 });
  });

  it('maps SDK timeouts to UpstreamTimeout', () => {
    expect(toUpstreamError(new APIConnectionTimeoutError())).toBeInstanceOf(UpstreamTimeoutError);
  });

  it('maps other HTTP failures to UpstreamError with the status', () => {
    const err = toUpstreamError(new APIError(503, undefined, 'unavailable', undefined));

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ kind: 'UpstreamError', upstreamStatus: 503 });
  });

  it('maps unknown failures to UpstreamError', () => {
    expect(toUpstreamError(new Error('socket hang up'))).toMatchObject({
      kind: 'UpstreamError',
      message: 'Text-generation request failed: socket hang up',
    });
  });
});

describe('OpenAiTextGenerationClient', () => {
  let server: Server;
  let baseURL = '';
  let handler: (req: IncomingMessage, res: ServerResponse) => void = () => undefined;

  beforeAll(async () => {
    server = createServer((req, res) => handler(req, res));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const addr = server.address();
    const port = typeof addr === 'object' && addr ? addr.port : 0;
    baseURL = `http://127.0.0.1:${port}/v1`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function client(): OpenAiTextGenerationClient {
    return new OpenAiTextGenerationClient({ apiKey: 'test-key', baseURL, model: 'gpt-4o' });
  }

  function reply(status: number, body: unknown, headers: Record<string, string> = {}) {
    handler = (_req, res) => {
      res.writeHead(status, { 'content-type': 'application/json', ...headers });
      res.end(JSON.stringify(body));
    };
  }

  it('returns the trimmed completion text', async () => {
    reply(200, {
      id: 'chatcmpl-1',
      object: 'chat.completion',
      created: 0,
      model: 'gpt-4o',
      choices: [{ index: 0, message: { role: 'assistant', content: '  SELECT 1  ' }, finish_reason: 'stop' }],
    });

    await expect(client().complete(request, { timeoutMs: 2000 })).resolves.toBe('SELECT 1');
  });

  it('fails with UpstreamRateLimited on HTTP 429', async () => {
    reply(429, { error: { message: 'Rate limit reached', type: 'requests' } }, { 'retry-after': '3' });

    await expect(client().complete(request, { timeoutMs: 2000 })).rejects.toMatchObject({
      kind: 'UpstreamRateLimited',
      retryAfterSeconds: 3,
    });
  });

  it('fails with UpstreamError on a server error', async () => {
    reply(500, { error: { message: 'boom' } });

    await expect(client().complete(request, { timeoutMs: 2000 })).rejects.toMatchObject({
      kind: 'UpstreamError',
      upstreamStatus: 500,
    });
  });

  it('fails with UpstreamError on an empty completion', async () => {
    reply(200, {
      id: 'chatcmpl-2',
      object: 'chat.completion',
      created: 0,
      model: 'gpt-4o',
      choices: [{ index: 0, message: { role: 'assistant', content: '' }, finish_reason: 'stop' }],
    });

    await expect(client().complete(request, { timeoutMs: 2000 })).rejects.toMatchObject({
      kind: 'UpstreamError',
      message: 'LLM did not return any content.',
    });
  });

  it('fails with UpstreamTimeout when the provider does not answer in time', async () => {
    handler = () => undefined;

    await expect(client().complete(request, { timeoutMs: 100 })).rejects.toBeInstanceOf(UpstreamTimeoutError);
  });

  it('refuses to call out without credentials', async () => {
    const unconfigured = new OpenAiTextGenerationClient({ model: 'gpt-4o' });

    await expect(unconfigured.complete(request, { timeoutMs: 100 })).rejects.toMatchObject({
      kind: 'UpstreamError',
      message: 'OPENAI_API_KEY or OPENAI_BASE_URL is not set. Set them in .env.',
    });
  });
});
