import assert from 'node:assert/strict';
import { afterEach, describe, it, mock } from 'node:test';

import { CancelledError, ProviderError } from '../src/agent/errors.js';
import { OpenAICompatClient, RateLimiter } from '../src/client.js';
import { parseRetryAfter } from '../src/client/error-utils.js';
import { toWireMessages } from '../src/client/wire.js';
import type { SendRequest } from '../src/types.js';

const BASE = 'https://api.test/v1';

type FetchCall = { url: string; init?: RequestInit };
let calls: FetchCall[] = [];

function stubFetch(respond: (call: FetchCall) => Response | Promise<Response>): void {
  calls = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const call = { url: String(input), init };
    calls.push(call);
    return respond(call);
  });
}

/** SSE body delivered in small chunks so frames straddle reads. */
function sse(frames: string[], chunkSize = 7): Response {
  const bytes = new TextEncoder().encode(frames.join(''));
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (let i = 0; i < bytes.length; i += chunkSize) controller.enqueue(bytes.slice(i, i + chunkSize));
      controller.close();
    },
  });
  return new Response(stream, { headers: { 'content-type': 'text/event-stream' } });
}

const data = (obj: unknown) => `data: ${JSON.stringify(obj)}\n\n`;
const DONE = 'data: [DONE]\n\n';

function client(stream = true): OpenAICompatClient {
  return new OpenAICompatClient({ provider: 'openrouter', baseUrl: BASE + '/', apiKey: 'test-secret', stream });
}

function request(overrides: Partial<SendRequest> = {}): SendRequest {
  return {
    model: 'openai/gpt-4o-mini',
    transcript: [
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'list files' },
    ],
    tools: [],
    ...overrides,
  };
}

function bodyOf(call: FetchCall): unknown {
  return typeof call.init?.body === 'string' ? JSON.parse(call.init.body) : undefined;
}

afterEach(() => {
  mock.restoreAll();
});

describe('OpenAICompatClient streaming', () => {
  it('buffers text deltas until [DONE]', async () => {
    stubFetch(() =>
      sse([
        data({ choices: [{ delta: { content: 'Hel' } }] }),
        ': keep-alive comment\n\n',
        data({ choices: [{ delta: { content: 'lo' }, finish_reason: 'stop' }] }),
        DONE,
      ])
    );
    const tokens: string[] = [];

    const completion = await client().send(request({ onToken: (t) => tokens.push(t) }));

    assert.deepEqual(completion, { kind: 'final', text: 'Hello', usage: undefined });
    assert.deepEqual(tokens, ['Hel', 'lo']);
    assert.equal(calls[0].url, `${BASE}/chat/completions`);
  });

  it('joins tool-call argument fragments per index', async () => {
    stubFetch(() =>
      sse([
        data({
          choices: [
            { delta: { tool_calls: [{ index: 0, id: 'call_abc', function: { name: 'read_file', arguments: '{"pa' } }] } },
          ],
        }),
        data({ choices: [{ delta: { tool_calls: [{ index: 0, function: { arguments: 'th":"a.txt"}' } }] } }] }),
        data({ choices: [{ delta: { tool_calls: [{ index: 1, function: { name: 'list_directory', arguments: '' } }] } }] }),
        data({ choices: [{ delta: {}, finish_reason: 'tool_calls' }] }),
        data({ choices: [], usage: { prompt_tokens: 10, completion_tokens: 5 } }),
        DONE,
      ])
    );

    const completion = await client().send(request());

    assert.deepEqual(completion, {
      kind: 'tool_calls',
      calls: [
        { id: 'call_abc', name: 'read_file', args: { path: 'a.txt' } },
        { id: 'call_0', name: 'list_directory', args: {} },
      ],
      text: undefined,
      usage: { promptTokens: 10, completionTokens: 5 },
    });
  });

  it('accepts a clean close after a finish reason', async () => {
    stubFetch(() => sse([data({ choices: [{ delta: { content: 'ok' }, finish_reason: 'stop' }] })]));
    assert.deepEqual(await client().send(request()), { kind: 'final', text: 'ok', usage: undefined });
  });

  it('treats a stream cut short as a retryable failure', async () => {
    stubFetch(() => sse([data({ choices: [{ delta: { content: 'partial' } }] })]));
    await assert.rejects(client().send(request()), (e) => {
      assert.ok(e instanceof ProviderError);
      assert.equal(e.retryable, true);
      assert.equal(e.message, 'malformed response from openrouter: stream ended before completion');
      return true;
    });
  });

  it('cancels a body left open after [DONE]', async () => {
    let cancelled = false;
    const bytes = new TextEncoder().encode(data({ choices: [{ delta: { content: 'ok' } }] }) + DONE);
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes);
      },
      cancel() {
        cancelled = true;
      },
    });
    stubFetch(() => new Response(stream, { headers: { 'content-type': 'text/event-stream' } }));

    assert.deepEqual(await client().send(request()), { kind: 'final', text: 'ok', usage: undefined });
    assert.equal(cancelled, true);
  });

  it('rejects unparsable data lines', async () => {
    stubFetch(() => sse(['data: {"choices": [\n\n', DONE]));
    await assert.rejects(client().send(request()), {
      name: 'ProviderError',
      message: 'malformed response from openrouter: unparsable SSE data line',
    });
  });

  it('never returns a call with truncated arguments', async () => {
    stubFetch(() =>
      sse([
        data({
          choices: [
            { delta: { tool_calls: [{ index: 0, id: 'c1', function: { name: 'read_file', arguments: '{"path":"a' } }] } },
          ],
        }),
        DONE,
      ])
    );
    await assert.rejects(client().send(request()), (e) => {
      assert.ok(e instanceof ProviderError);
      assert.equal(e.retryable, true);
      assert.equal(e.message, 'malformed response from openrouter: unparsable arguments for read_file: {"path":"a');
      return true;
    });
  });

  it('surfaces in-stream provider errors', async () => {
    stubFetch(() => sse([data({ error: { message: 'upstream overloaded', code: 502 } }), DONE]));
    await assert.rejects(client().send(request()), {
      message: 'malformed response from openrouter: stream error: upstream overloaded',
    });
  });
});

describe('OpenAICompatClient requests', () => {
  it('sends the transcript, tools and auth header', async () => {
    stubFetch(() =>
      Response.json({
        choices: [{ message: { content: 'hi' } }],
        usage: { prompt_tokens: 3, completion_tokens: 1 },
      })
    );
    const tools = [
      {
        type: 'function' as const,
        function: { name: 'list_directory', description: 'List', parameters: { type: 'object' } },
      },
    ];

    const completion = await client(false).send(request({ tools, temperature: 0.2, maxTokens: 256 }));

    assert.deepEqual(completion, { kind: 'final', text: 'hi', usage: { promptTokens: 3, completionTokens: 1 } });
    assert.deepEqual(bodyOf(calls[0]), {
      model: 'openai/gpt-4o-mini',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'list files' },
      ],
      stream: false,
      tools,
      tool_choice: 'auto',
      temperature: 0.2,
      max_tokens: 256,
    });
    assert.deepEqual(calls[0].init?.headers, {
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
  });

  it('reads a JSON body even when streaming was requested', async () => {
    stubFetch(() =>
      Response.json({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: 'x1', type: 'function', function: { name: 'git_status', arguments: '{}' } }],
            },
          },
        ],
      })
    );
    assert.deepEqual(await client(true).send(request()), {
      kind: 'tool_calls',
      calls: [{ id: 'x1', name: 'git_status', args: {} }],
      text: undefined,
      usage: undefined,
    });
  });

  it('marks 401 as final', async () => {
    stubFetch(() => Response.json({ error: { message: 'invalid key' } }, { status: 401, statusText: 'Unauthorized' }));
    await assert.rejects(client(false).send(request()), (e) => {
      assert.ok(e instanceof ProviderError);
      assert.equal(e.status, 401);
      assert.equal(e.retryable, false);
      assert.equal(e.message, 'POST /chat/completions failed: 401 Unauthorized: invalid key');
      return true;
    });
  });

  it('marks 429 as retryable and keeps Retry-After', async () => {
    const c = client(false);
    stubFetch(
      () => new Response('slow down', { status: 429, statusText: 'Too Many Requests', headers: { 'retry-after': '2' } })
    );
    await assert.rejects(c.send(request()), (e) => {
      assert.ok(e instanceof ProviderError);
      assert.equal(e.retryable, true);
      assert.equal(e.retryAfterMs, 2000);
      return true;
    });
    assert.equal(c.rateLimiter.recentCount, 1);
  });

  it('rejects a body that is not JSON', async () => {
    stubFetch(() => new Response('<html>gateway</html>', { headers: { 'content-type': 'text/html' } }));
    await assert.rejects(client(false).send(request()), {
      message: 'malformed response from openrouter: response body is not JSON',
    });
  });

  it('wraps network failures as retryable', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });
    await assert.rejects(client(false).send(request()), (e) => {
      assert.ok(e instanceof ProviderError);
      assert.equal(e.retryable, true);
      assert.equal(e.message, `cannot reach ${BASE}/chat/completions (connection refused): fetch failed`);
      return true;
    });
  });

  it('reports a caller abort as cancellation', async () => {
    const ac = new AbortController();
    ac.abort();
    stubFetch(() => {
      throw new DOMException('This operation was aborted', 'AbortError');
    });
    await assert.rejects(client(false).send(request({ signal: ac.signal })), CancelledError);
  });

  it('lists models', async () => {
    stubFetch(() => Response.json({ data: [{ id: 'a/b', context_length: 8192, name: 'A' }, { id: 'c/d' }] }));
    assert.deepEqual(await client().models(), [
      { id: 'a/b', provider: 'openrouter', contextLength: 8192 },
      { id: 'c/d', provider: 'openrouter', contextLength: undefined },
    ]);
    assert.equal(calls[0].url, `${BASE}/models`);
  });
});

describe('toWireMessages', () => {
  it('maps assistant tool calls and tool results', () => {
    assert.deepEqual(
      toWireMessages([
        { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'read_file', args: { path: 'a.txt' } }] },
        {
          role: 'tool',
          content: 'error: missing',
          result: { callId: 'c1', name: 'read_file', success: false, error: 'missing' },
        },
        { role: 'assistant', content: 'done' },
      ]),
      [
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'c1', type: 'function', function: { name: 'read_file', arguments: '{"path":"a.txt"}' } }],
        },
        { role: 'tool', tool_call_id: 'c1', content: 'error: missing' },
        { role: 'assistant', content: 'done' },
      ]
    );
  });
});

describe('RateLimiter', () => {
  const failure = (status?: number, retryAfterMs?: number) =>
    new ProviderError('failed', { provider: 'groq', status, retryable: true, retryAfterMs });

  it('counts only 429 and 503 and escalates past the threshold', () => {
    let now = 0;
    const rl = new RateLimiter(60_000, 3, 60_000, () => now);
    assert.equal(rl.note(failure(500)), false);
    assert.equal(rl.note(failure()), false);
    assert.equal(rl.note(failure(429)), true);
    assert.equal(rl.note(failure(503)), true);
    assert.equal(rl.delayMs(), 0);
    rl.note(failure(429));
    assert.equal(rl.delayMs(), 2000);
    rl.note(failure(429));
    assert.equal(rl.delayMs(), 4000);

    now = 61_000;
    assert.equal(rl.delayMs(), 0);
    assert.equal(rl.recentCount, 0);
  });

  it('holds requests until a Retry-After has passed', () => {
    let now = 0;
    const rl = new RateLimiter(60_000, 5, 10_000, () => now);
    rl.note(failure(429, 3000));
    assert.equal(rl.delayMs(), 3000);
    now = 1000;
    assert.equal(rl.delayMs(), 2000);
    rl.note(failure(503, 120_000));
    assert.equal(rl.delayMs(), 10_000);
    now = 11_000;
    assert.equal(rl.delayMs(), 0);
  });

  it('turns an abort during the hold into cancellation', async () => {
    const rl = new RateLimiter(60_000, 5, 60_000, () => 0);
    rl.note(failure(429, 5000));
    const ac = new AbortController();
    ac.abort();
    await assert.rejects(rl.wait('groq', ac.signal), CancelledError);
  });

  it('is fed by the client on a 503', async () => {
    const c = client(false);
    stubFetch(() => new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));
    await assert.rejects(c.send(request()), ProviderError);
    stubFetch(() => new Response('bad gateway', { status: 502, statusText: 'Bad Gateway' }));
    await assert.rejects(c.send(request()), ProviderError);
    assert.equal(c.rateLimiter.recentCount, 1);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and HTTP dates', () => {
    assert.equal(parseRetryAfter('3'), 3000);
    assert.equal(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT', Date.parse('Thu, 01 Jan 2026 00:00:00 GMT')), 10_000);
    assert.equal(parseRetryAfter('soon'), undefined);
    assert.equal(parseRetryAfter(null), undefined);
  });
});
