import type { ReadableStream } from 'node:stream/web';

import { Agent, setGlobalDispatcher } from 'undici';

import { ProviderError } from './agent/errors.js';
import { ToolArgumentsParseError, callIdSequence, parseToolArguments } from './agent/tool-calls.js';
import { CallScope, httpError, malformed } from './client/error-utils.js';
import { RateLimiter } from './client/pressure.js';
import { ChatChunkSchema, ChatCompletionSchema, ModelsResponseSchema, toWireMessages } from './client/wire.js';
import type { ChatChunk } from './client/wire.js';
import { createLogger } from './log.js';
import type {
  Completion,
  ModelGateway,
  ModelInfo,
  ProviderName,
  SendRequest,
  TokenUsage,
  ToolCallRequest,
} from './types.js';
import { errorMessage } from './utils.js';

export { RateLimiter } from './client/pressure.js';

const log = createLogger('client');

// ── Persistent connection pool ───────────────────────────────────────────
// Reuses TCP+TLS connections across requests to avoid the overhead of
// handshake negotiation on every API call. undici's Agent backs Node's
// global fetch(), so installing it as the global dispatcher covers every
// provider adapter.
let pooled = false;

export function usePooledConnections(): void {
  if (pooled) return;
  pooled = true;
  setGlobalDispatcher(
    new Agent({
      keepAliveTimeout: 30_000, // Keep idle connections alive for 30s
      keepAliveMaxTimeout: 120_000, // Max keep-alive for any connection
      connections: 16, // Max connections per origin
      pipelining: 1,
      connect: {
        rejectUnauthorized: true, // Enforce TLS verification
      },
    })
  );
}

export const DEFAULT_TIMEOUT_MS = 120_000;

export type OpenAICompatOptions = {
  provider: Exclude<ProviderName, 'ollama'>;
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  stream?: boolean;
  /** Extra headers (OpenRouter attribution headers, etc). */
  headers?: Record<string, string>;
  rateLimiter?: RateLimiter;
};

type PartialToolCall = { id?: string; name: string; args: string };

function toUsage(u: { prompt_tokens?: number; completion_tokens?: number } | null | undefined): TokenUsage | undefined {
  if (!u) return undefined;
  return { promptTokens: u.prompt_tokens, completionTokens: u.completion_tokens };
}

/**
 * Chat-completions client for OpenAI-compatible providers (OpenRouter, Groq).
 * SSE streams are buffered until `data: [DONE]` (or a clean close after a
 * finish_reason); tool-call argument fragments are joined per index and
 * parsed once.
 */
export class OpenAICompatClient implements ModelGateway {
  readonly provider: Exclude<ProviderName, 'ollama'>;
  readonly rateLimiter: RateLimiter;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly stream: boolean;

  constructor(private readonly opts: OpenAICompatOptions) {
    this.provider = opts.provider;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stream = opts.stream ?? true;
    this.rateLimiter = opts.rateLimiter ?? new RateLimiter();
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json', ...(this.opts.headers ?? {}) };
    if (this.opts.apiKey) h.Authorization = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  async send(req: SendRequest): Promise<Completion> {
    const url = `${this.baseUrl}/chat/completions`;
    const stream = this.stream;
    const body: Record<string, unknown> = {
      model: req.model,
      messages: toWireMessages(req.transcript),
      stream,
    };
    if (req.tools.length) {
      body.tools = req.tools;
      body.tool_choice = 'auto';
    }
    if (req.temperature !== undefined) body.temperature = req.temperature;
    if (req.maxTokens !== undefined) body.max_tokens = req.maxTokens;

    await this.rateLimiter.wait(this.provider, req.signal);

    log.debug(`→ POST ${url}`, { model: req.model, stream, tools: req.tools.length });
    const scope = new CallScope(this.provider, this.timeoutMs, req.signal);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal: scope.signal,
      });
      if (!res.ok) throw await httpError(this.provider, res, 'POST /chat/completions');
      if (stream && res.body && /event-stream/i.test(res.headers.get('content-type') ?? 'text/event-stream')) {
        return await this.readStream(res.body, req.onToken);
      }
      return this.parseCompletion(await res.text());
    } catch (e) {
      const err = scope.translate(e, url);
      if (err instanceof ProviderError) this.rateLimiter.note(err);
      throw err;
    } finally {
      scope.dispose();
    }
  }

  /** Non-streaming JSON body → Completion. */
  parseCompletion(text: string): Completion {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw malformed(this.provider, 'response body is not JSON', e);
    }
    const parsed = ChatCompletionSchema.safeParse(json);
    if (!parsed.success) throw malformed(this.provider, parsed.error.issues[0]?.message ?? 'bad shape');

    const choice = parsed.data.choices[0];
    const nextId = callIdSequence();
    const partials: PartialToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id ?? undefined,
      name: tc.function.name,
      args:
        typeof tc.function.arguments === 'string'
          ? tc.function.arguments
          : JSON.stringify(tc.function.arguments ?? {}),
    }));
    return this.finish(choice.message.content ?? '', partials, toUsage(parsed.data.usage), nextId);
  }

  private finish(
    text: string,
    partials: PartialToolCall[],
    usage: TokenUsage | undefined,
    nextId: () => string
  ): Completion {
    if (!partials.length) return { kind: 'final', text, usage };
    const calls: ToolCallRequest[] = [];
    for (const p of partials) {
      if (!p.name) throw malformed(this.provider, 'tool call without a function name');
      let args: Record<string, unknown>;
      try {
        args = parseToolArguments(p.name, p.args);
      } catch (e) {
        if (e instanceof ToolArgumentsParseError) throw malformed(this.provider, e.message, e);
        throw e;
      }
      calls.push({ id: p.id || nextId(), name: p.name, args });
    }
    return { kind: 'tool_calls', calls, text: text || undefined, usage };
  }

  private async readStream(
    body: ReadableStream<Uint8Array>,
    onToken?: (token: string) => void
  ): Promise<Completion> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buf = '';
    let text = '';
    let usage: TokenUsage | undefined;
    let finishReason: string | undefined;
    const byIndex = new Map<number, PartialToolCall>();

    const apply = (chunk: ChatChunk) => {
      if (chunk.error) throw malformed(this.provider, `stream error: ${chunk.error.message}`);
      if (chunk.usage) usage = toUsage(chunk.usage);
      const c = chunk.choices?.[0];
      if (!c) return;
      if (c.finish_reason) finishReason = c.finish_reason;
      const d = c.delta;
      if (!d) return;
      if (d.content) {
        text += d.content;
        onToken?.(d.content);
      }
      for (const [pos, tc] of (d.tool_calls ?? []).entries()) {
        const idx = tc.index ?? pos;
        const cur = byIndex.get(idx) ?? { name: '', args: '' };
        if (tc.id) cur.id = tc.id;
        if (tc.function?.name) cur.name += tc.function.name;
        if (tc.function?.arguments) cur.args += tc.function.arguments;
        byIndex.set(idx, cur);
      }
    };

    const complete = (): Completion => {
      const partials = [...byIndex.entries()].sort((a, b) => a[0] - b[0]).map(([, p]) => p);
      return this.finish(text, partials, usage, callIdSequence());
    };

    /** Returns true once `[DONE]` is seen. */
    const handleFrame = (frame: string): boolean => {
      for (const line of frame.split('\n')) {
        if (!line.startsWith('data:')) continue;
        const data = line.slice(5).trim();
        if (data === '[DONE]') return true;
        if (!data) continue;
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch (e) {
          throw malformed(this.provider, 'unparsable SSE data line', e);
        }
        const chunk = ChatChunkSchema.safeParse(json);
        if (!chunk.success) throw malformed(this.provider, 'unexpected SSE chunk shape');
        apply(chunk.data);
      }
      return false;
    };

    let drained = false;
    try {
      for (;;) {
        const { value, done } = await reader.read();
        if (done) {
          drained = true;
          break;
        }
        buf += decoder.decode(value, { stream: true }).replace(/\r\n/g, '\n');
        for (;;) {
          const idx = buf.indexOf('\n\n');
          if (idx === -1) break;
          const frame = buf.slice(0, idx);
          buf = buf.slice(idx + 2);
          if (handleFrame(frame)) return complete();
        }
      }
    } finally {
      // after [DONE] or a bad frame the body is still open
      if (!drained) {
        await reader.cancel().catch((e: unknown) => log.debug('stream cancel failed', { error: errorMessage(e) }));
      }
      reader.releaseLock();
    }

    // Closed without [DONE]: accept only a syntactically complete tail.
    buf += decoder.decode();
    if (buf.trim() && handleFrame(buf)) return complete();
    if (finishReason) return complete();
    throw malformed(this.provider, 'stream ended before completion');
  }

  async models(signal?: AbortSignal): Promise<ModelInfo[]> {
    const url = `${this.baseUrl}/models`;
    const scope = new CallScope(this.provider, this.timeoutMs, signal);
    try {
      const res = await fetch(url, { headers: this.headers(), signal: scope.signal });
      if (!res.ok) throw await httpError(this.provider, res, 'GET /models');
      const parsed = ModelsResponseSchema.safeParse(await res.json());
      if (!parsed.success) throw malformed(this.provider, 'unexpected /models shape');
      return parsed.data.data.map((m) => ({
        id: m.id,
        provider: this.provider,
        contextLength: m.context_length ?? undefined,
      }));
    } catch (e) {
      throw scope.translate(e, url);
    } finally {
      scope.dispose();
    }
  }
}
