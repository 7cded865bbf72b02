/**
 * Provider routing: one ModelGateway in front of the three adapters.
 *
 *   groq/<id>    → Groq        (prefix stripped)
 *   ollama/<id>  → local Ollama (prefix stripped)
 *   anything else → OpenRouter  (id sent as-is, e.g. `anthropic/claude-3.5-sonnet`)
 */

import { ProviderError } from './agent/errors.js';
import { ResilientGateway } from './agent/resilient-provider.js';
import type { RetryInfo } from './agent/resilient-provider.js';
import { OpenAICompatClient } from './client.js';
import { OLLAMA_DEFAULT_URL, OllamaClient } from './client/ollama.js';
import type { ToolrelayConfig } from './config.js';
import { createLogger } from './log.js';
import type { Completion, ModelGateway, ModelInfo, ProviderName, SendRequest } from './types.js';
import { PKG_VERSION } from './utils.js';

const log = createLogger('gateway');

export const OPENROUTER_URL = 'https://openrouter.ai/api/v1';
export const GROQ_URL = 'https://api.groq.com/openai/v1';

export type Route = { provider: ProviderName; model: string };

export function routeModel(model: string): Route {
  if (model.startsWith('groq/')) return { provider: 'groq', model: model.slice('groq/'.length) };
  if (model.startsWith('ollama/')) return { provider: 'ollama', model: model.slice('ollama/'.length) };
  return { provider: 'openrouter', model };
}

/** OLLAMA_HOST is often given bare (`127.0.0.1:11434`). */
export function normalizeOllamaUrl(value: string | undefined): string {
  if (!value) return OLLAMA_DEFAULT_URL;
  return /^https?:\/\//i.test(value) ? value : `http://${value}`;
}

/** Adapter with a model listing (all three built-in adapters have one). */
export interface ProviderAdapter extends ModelGateway {
  models(signal?: AbortSignal): Promise<ModelInfo[]>;
}

export type ProviderRouterOptions = {
  openrouter?: ProviderAdapter;
  groq?: ProviderAdapter;
  ollama?: ProviderAdapter;
};

function missingKey(provider: ProviderName): ProviderError {
  const envName = provider === 'groq' ? 'GROQ_API_KEY' : 'OPENROUTER_API_KEY';
  return new ProviderError(`no API key for ${provider}; set ${envName} or run \`toolrelay key ${provider} <key>\``, {
    provider,
    retryable: false,
  });
}

export class ProviderRouter implements ModelGateway {
  constructor(private readonly adapters: ProviderRouterOptions) {}

  adapterFor(provider: ProviderName): ProviderAdapter {
    const adapter = this.adapters[provider];
    if (!adapter) throw missingKey(provider);
    return adapter;
  }

  async send(req: SendRequest): Promise<Completion> {
    const route = routeModel(req.model);
    const adapter = this.adapterFor(route.provider);
    log.debug('routing', { model: req.model, provider: route.provider });
    return adapter.send({ ...req, model: route.model });
  }

  /** Model ids come back in routable form (`groq/…`, `ollama/…`). */
  async models(provider: ProviderName, signal?: AbortSignal): Promise<ModelInfo[]> {
    const list = await this.adapterFor(provider).models(signal);
    if (provider === 'openrouter') return list;
    return list.map((m) => ({ ...m, id: `${provider}/${m.id}` }));
  }
}

/** Router wired from config, wrapped in retry + fallback. */
export function createGateway(
  config: ToolrelayConfig,
  opts: { onRetry?: (info: RetryInfo) => void } = {}
): { gateway: ModelGateway; router: ProviderRouter } {
  const timeoutMs = config.request_timeout * 1000;
  const { openrouter, groq, ollama } = config.providers;

  const router = new ProviderRouter({
    openrouter: openrouter.api_key
      ? new OpenAICompatClient({
          provider: 'openrouter',
          baseUrl: openrouter.base_url ?? OPENROUTER_URL,
          apiKey: openrouter.api_key,
          timeoutMs,
          stream: config.stream,
          headers: { 'X-Title': 'toolrelay', 'User-Agent': `toolrelay/${PKG_VERSION}` },
        })
      : undefined,
    groq: groq.api_key
      ? new OpenAICompatClient({
          provider: 'groq',
          baseUrl: groq.base_url ?? GROQ_URL,
          apiKey: groq.api_key,
          timeoutMs,
          stream: config.stream,
        })
      : undefined,
    ollama: new OllamaClient({
      baseUrl: normalizeOllamaUrl(ollama.base_url),
      timeoutMs,
      stream: config.stream,
    }),
  });

  const gateway = new ResilientGateway(router, {
    maxRetries: config.max_retries,
    baseDelayMs: config.retry_base_ms,
    fallbackModels: config.fallback_models,
    onRetry: opts.onRetry,
  });
  return { gateway, router };
}
