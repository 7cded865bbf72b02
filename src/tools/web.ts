import { z } from 'zod';

import { createLogger } from '../log.js';
import type { ToolContext } from '../types.js';
import { PKG_VERSION } from '../utils.js';

import { defineTool } from './registry.js';
import { htmlToText, truncateBytes } from './text-utils.js';
import { ToolExecutionError } from './tool-error.js';

const log = createLogger('web');

const DDG_ENDPOINT = 'https://api.duckduckgo.com/';
const USER_AGENT = `toolrelay/${PKG_VERSION}`;
const MAX_FETCH_BYTES = 48 * 1024;

/** fetch bounded by the tool timeout and the session's abort signal. */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  ctx: Pick<ToolContext, 'signal' | 'httpTimeoutMs'>
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ctx.httpTimeoutMs);
  const onAbort = () => controller.abort();
  ctx.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (e) {
    if (controller.signal.aborted && !ctx.signal?.aborted) {
      throw new ToolExecutionError('timeout', `request to ${url} timed out after ${ctx.httpTimeoutMs}ms`);
    }
    throw e;
  } finally {
    clearTimeout(timer);
    ctx.signal?.removeEventListener('abort', onAbort);
  }
}

function assertHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ToolExecutionError('invalid_args', `invalid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ToolExecutionError('invalid_args', `unsupported protocol ${url.protocol}`);
  }
  return url;
}

function statusError(res: Response, url: string): ToolExecutionError {
  const code = res.status === 404 ? 'not_found' : res.status >= 500 || res.status === 429 ? 'transient' : 'internal';
  return new ToolExecutionError(code, `HTTP ${res.status} ${res.statusText} from ${url}`);
}

type Topic = { Text?: string; FirstURL?: string; Topics?: Topic[] };

const TopicSchema: z.ZodType<Topic> = z.lazy(() =>
  z.object({
    Text: z.string().optional(),
    FirstURL: z.string().optional(),
    Topics: z.array(TopicSchema).optional(),
  })
);

const InstantAnswerSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  Answer: z.union([z.string(), z.number()]).optional(),
  Definition: z.string().optional(),
  RelatedTopics: z.array(TopicSchema).optional(),
});

export type InstantAnswer = z.infer<typeof InstantAnswerSchema>;

/** Render a DuckDuckGo instant-answer payload as numbered result lines. */
export function formatInstantAnswer(query: string, data: InstantAnswer, maxResults: number): string {
  const lines: string[] = [];
  if (data.Answer !== undefined && String(data.Answer).trim()) lines.push(`Answer: ${data.Answer}`);
  if (data.AbstractText) {
    lines.push(`${data.Heading || query}: ${data.AbstractText}`);
    if (data.AbstractURL) lines.push(`  ${data.AbstractURL}`);
  }
  if (data.Definition) lines.push(`Definition: ${data.Definition}`);

  const flat: Topic[] = [];
  for (const t of data.RelatedTopics ?? []) {
    if (t.Topics) flat.push(...t.Topics);
    else flat.push(t);
  }
  const related = flat.filter((t) => t.Text).slice(0, maxResults);
  related.forEach((t, i) => {
    lines.push(`${i + 1}. ${t.Text}`);
    if (t.FirstURL) lines.push(`   ${t.FirstURL}`);
  });

  if (!lines.length) return `No instant answer for "${query}".`;
  return lines.join('\n');
}

export const webSearchTool = defineTool({
  name: 'web_search',
  description: 'Search the web (DuckDuckGo instant answers). Returns an abstract and related results.',
  parameters: z.object({
    query: z.string().min(1),
    max_results: z.number().int().min(1).max(20).default(5),
  }),
  safety: 'safe',
  category: 'web',
  async run(args, ctx) {
    const url = new URL(DDG_ENDPOINT);
    url.searchParams.set('q', args.query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('skip_disambig', '1');

    log.debug('search', { query: args.query });
    const res = await fetchWithTimeout(url.toString(), { headers: { 'User-Agent': USER_AGENT } }, ctx);
    if (!res.ok) throw statusError(res, DDG_ENDPOINT);

    const parsed = InstantAnswerSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ToolExecutionError('transient', 'unexpected search response shape');
    }
    return formatInstantAnswer(args.query, parsed.data, args.max_results);
  },
});

export const webFetchTool = defineTool({
  name: 'web_fetch',
  description: 'Fetch a URL with HTTP GET. HTML is reduced to readable text; output is size-capped.',
  parameters: z.object({
    url: z.string().min(1),
    max_bytes: z.number().int().min(256).max(256 * 1024).optional(),
  }),
  safety: 'safe',
  category: 'web',
  async run(args, ctx) {
    const url = assertHttpUrl(args.url);
    const res = await fetchWithTimeout(url.toString(), { headers: { 'User-Agent': USER_AGENT } }, ctx);
    if (!res.ok) throw statusError(res, url.toString());

    const type = res.headers.get('content-type') ?? '';
    const body = await res.text();
    const text = /html/i.test(type) ? htmlToText(body) : body;
    const header = `# ${url.toString()} (${res.status}${type ? `, ${type.split(';')[0]}` : ''})`;
    return truncateBytes(`${header}\n${text}`, args.max_bytes ?? MAX_FETCH_BYTES).text;
  },
});

export const httpPostTool = defineTool({
  name: 'http_post',
  description:
    'Send an HTTP POST. Pass json for a JSON body or body for raw text. Returns status and response text.',
  parameters: z.object({
    url: z.string().min(1),
    json: z.unknown().optional(),
    body: z.string().optional(),
    headers: z.record(z.string()).optional(),
  }),
  safety: 'confirm',
  category: 'web',
  async run(args, ctx) {
    const url = assertHttpUrl(args.url);
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT, ...(args.headers ?? {}) };
    let body: string;
    if (args.json !== undefined) {
      body = JSON.stringify(args.json);
      headers['Content-Type'] ??= 'application/json';
    } else {
      body = args.body ?? '';
      headers['Content-Type'] ??= 'text/plain; charset=utf-8';
    }

    const res = await fetchWithTimeout(url.toString(), { method: 'POST', headers, body }, ctx);
    const text = await res.text();
    const out = truncateBytes(`HTTP ${res.status} ${res.statusText}\n${text}`, MAX_FETCH_BYTES).text;
    if (!res.ok) throw new ToolExecutionError(res.status >= 500 ? 'transient' : 'internal', out);
    return out;
  },
});
