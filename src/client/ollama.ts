import type { ReadableStream } from 'node:stream/web';

import { z } from 'zod';

import { ProviderError } from '../agent/errors.js';
import { ToolArgumentsParseError, callIdSequence, parseToolArguments, parseToolCallsFromContent } from '../agent/tool-calls.js';
import { createLogger } from '../log.js';
import type { Completion, ConversationTurn, ModelGateway, ModelInfo, SendRequest, TokenUsage, ToolCallRequest } from '../types.js';
import { errorMessage } from '../utils.js';

import { CallScope, httpError, malformed } from './error-utils.js';
import { RateLimiter } from './pressure.js';

const log = createLogger('ollama');

export const OLLAMA_DEFAULT_URL = 'http://localhost:11434';

type OllamaMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string;
      tool_calls?: { function: { name: string; arguments: Record<string, unknown> } }[];
    }
  | { role: 'tool'; content: string; tool_name: string };

export function toOllamaMessages(transcript: readonly ConversationTurn[]): OllamaMessage[] {
  return transcript.map((turn): OllamaMessage => {
    switch (turn.role) {
      case 'system':
      case 'user':
        return { role: turn.role, content: turn.content };
      case 'assistant':
        if (!turn.toolCalls?.length) return { role: 'assistant', content: turn.content };
        return {
          role: 'assistant',
          content: turn.content,
          tool_calls: turn.toolCalls.map((c) => ({ function: { name: c.name, arguments: c.args } })),
        };
      case 'tool':
        return { role: 'tool', content: turn.content, tool_name: turn.result.name };
    }
  });
}

const OllamaLineSchema = z.object({
  message: z
    .object({
      content: z.string().nullish(),
      tool_calls: z
        .array(
          z.object({
            function: z.object({
              name: z.string(),
              arguments: z.union([z.record(z.unknown()), z.string()]).nullish(),
            }),
          })
        )
        .nullish(),
    })
    .nullish(),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  error: z.string().optional(),
});

type OllamaLine = z.infer<typeof OllamaLineSchema>;

const TagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()),
});

export type OllamaOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  stream?: boolean;
  rateLimiter?: RateLimiter;
};

/**
 * Adapter for a local Ollama server (`/api/chat`, NDJSON streaming).
 * Ollama omits tool call ids, so they are synthesised; models that print
 * tool calls as JSON in their content get those calls recovered.
 */
export class OllamaClient implements ModelGateway {
  readonly provider = 'ollama';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly stream: boolean;
  readonly rateLimiter: RateLimiter;

  constructor(opts: OllamaOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? OLLAMA_DEFAULT_URL).replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.stream = opts.stream ?? true;
    this.rateLimiter = opts.rateLimiter ?? new RateLimiter();
  }

  async send(req: SendRequest): Promise<Completion> {
    const url = `${this.baseUrl}/api/chat`;
    const body: Record<string, unknown> = {
      model: req.model,
      messages: toOllamaMessages(req.transcript),
      stream: this.stream,
    };
    if (req.tools.length) body.tools = req.tools;
    const options: Record<string, number> = {};
    if (req.temperature !== undefined) options.temperature = req.temperature;
    if (req.maxTokens !== undefined) options.num_predict = req.maxTokens;
    if (Object.keys(options).length) body.options = options;

    const known = new Set(req.tools.map((t) => t.function.name));
    await this.rateLimiter.wait(this.provider, req.signal);
    log.debug(`→ POST ${url}`, { model: req.model, stream: this.stream });
    const scope = new CallScope(this.provider, this.timeoutMs, req.signal);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: scope.signal,
      });
      if (!res.ok) throw await httpError(this.provider, res, 'POST /api/chat');
      if (!res.body) throw malformed(this.provider, 'empty response body');
      return await this.readNdjson(res.body, known, req.onToken);
    } catch (e) {
      const err = scope.translate(e, url);
      // a busy Ollama answers 503
      if (err instanceof ProviderError) this.rateLimiter.note(err);
      throw err;
    } finally {
      scope.dispose();
    }
  }

  private async readNdjson(
    body: ReadableStream<Uint8Array>,
    known: ReadonlySet<string>,
    onToken?: (token: string) => void
  ): Promise<Completion> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buf = '';
    let text = '';
    let usage: TokenUsage | undefined;
    const rawCalls: { name: string; args: unknown }[] = [];

    /** Returns true on the `done: true` line. */
    const handleLine = (line: string): boolean => {
      if (!line.trim()) return false;
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (e) {
        throw malformed(this.provider, 'unparsable NDJSON line', e);
      }
      const parsed = OllamaLineSchema.safeParse(json);
      if (!parsed.success) throw malformed(this.provider, 'unexpected chat line shape');
      const chunk: OllamaLine = parsed.data;
      if (chunk.error) throw malformed(this.provider, `stream error: ${chunk.error}`);
      const content = chunk.message?.content;
      if (content) {
        text += content;
        onToken?.(content);
      }
      for (const tc of chunk.message?.tool_calls ?? []) {
        rawCalls.push({ name: tc.function.name, args: tc.function.arguments });
      }
      if (chunk.done) {
        usage = { promptTokens: chunk.prompt_eval_count, completionTokens: chunk.eval_count };
        return true;
      }
      return false;
    };

    let finished = false;
    let drained = false;
    try {
      while (!finished) {
        const { value, done } = await reader.read();
        if (done) {
          drained = true;
          break;
        }
        buf += decoder.decode(value, { stream: true });
        while (!finished) {
          const nl = buf.indexOf('\n');
          if (nl === -1) break;
          const line = buf.slice(0, nl);
          buf = buf.slice(nl + 1);
          finished = handleLine(line);
        }
      }
    } finally {
      // done:true can arrive before the server closes the body
      if (!drained) {
        await reader.cancel().catch((e: unknown) => log.debug('stream cancel failed', { error: errorMessage(e) }));
      }
      reader.releaseLock();
    }

    if (!finished) {
      buf += decoder.decode();
      finished = handleLine(buf);
    }
    if (!finished) throw malformed(this.provider, 'stream ended before done');

    return this.toCompletion(text, rawCalls, usage, known);
  }

  private toCompletion(
    text: string,
    rawCalls: { name: string; args: unknown }[],
    usage: TokenUsage | undefined,
    known: ReadonlySet<string>
  ): Completion {
    const nextId = callIdSequence();
    if (rawCalls.length) {
      const calls: ToolCallRequest[] = [];
      for (const c of rawCalls) {
        try {
          calls.push({ id: nextId(), name: c.name, args: parseToolArguments(c.name, c.args) });
        } catch (e) {
          if (e instanceof ToolArgumentsParseError) throw malformed(this.provider, e.message, e);
          throw e;
        }
      }
      return { kind: 'tool_calls', calls, text: text || undefined, usage };
    }

    // Content-mode: some local models print the call instead of using tool_calls.
    if (known.size) {
      const recovered = parseToolCallsFromContent(text, known, nextId);
      if (recovered) {
        log.debug('recovered tool calls from content', { count: recovered.length });
        return { kind: 'tool_calls', calls: recovered, usage };
      }
    }
    return { kind: 'final', text, usage };
  }

  async models(signal?: AbortSignal): Promise<ModelInfo[]> {
    const url = `${this.baseUrl}/api/tags`;
    const scope = new CallScope(this.provider, this.timeoutMs, signal);
    try {
      const res = await fetch(url, { signal: scope.signal });
      if (!res.ok) throw await httpError(this.provider, res, 'GET /api/tags');
      const parsed = TagsSchema.safeParse(await res.json());
      if (!parsed.success) throw malformed(this.provider, 'unexpected /api/tags shape');
      return parsed.data.models.map((m): ModelInfo => ({ id: m.name, provider: 'ollama' }));
    } catch (e) {
      throw scope.translate(e, url);
    } finally {
      scope.dispose();
    }
  }
}
