/**
 * `model`, `key` and `models`: config edits go through the locked writer.
 */

import { setConfigValue } from '../config.js';
import { createGateway, routeModel } from '../gateway.js';
import { err as errFmt } from '../term.js';
import type { ProviderName } from '../types.js';

import { flagString } from './args.js';
import type { CliContext } from './context.js';

const KEY_PROVIDERS = ['openrouter', 'groq'] as const;
type KeyProvider = (typeof KEY_PROVIDERS)[number];

function isKeyProvider(v: string): v is KeyProvider {
  return KEY_PROVIDERS.some((p) => p === v);
}

function isProviderName(v: string): v is ProviderName {
  return v === 'openrouter' || v === 'groq' || v === 'ollama';
}

/** `sk-or-v1-abcd…wxyz` → `sk-o…wxyz`. */
export function maskKey(key: string): string {
  if (key.length <= 8) return '*'.repeat(key.length);
  return `${key.slice(0, 4)}…${key.slice(-4)}`;
}

export async function runModelCommand(ctx: CliContext, id: string | undefined): Promise<number> {
  if (!id) {
    const route = routeModel(ctx.config.model);
    ctx.stdout(`${ctx.config.model} ${ctx.S.dim(`(${route.provider})`)}\n`);
    return 0;
  }
  await setConfigValue('model', id, { configPath: ctx.configPath });
  ctx.stdout(`default model set to ${id} (${routeModel(id).provider})\n`);
  return 0;
}

export async function runKeyCommand(ctx: CliContext, provider: string | undefined, key: string | undefined): Promise<number> {
  if (!provider || !isKeyProvider(provider) || !key) {
    ctx.stderr(errFmt(`usage: toolrelay key <${KEY_PROVIDERS.join('|')}> <key>`, ctx.S) + '\n');
    return 2;
  }
  await setConfigValue(`providers.${provider}.api_key`, key, { configPath: ctx.configPath });
  ctx.stdout(`${provider} key saved (${maskKey(key)}) to ${ctx.configPath}\n`);
  return 0;
}

export async function runModelsCommand(ctx: CliContext): Promise<number> {
  const provider = flagString(ctx.args, 'provider') ?? routeModel(ctx.config.model).provider;
  if (!isProviderName(provider)) {
    ctx.stderr(errFmt(`unknown provider ${provider}; use openrouter, groq or ollama`, ctx.S) + '\n');
    return 2;
  }
  const { router } = createGateway(ctx.config);
  const models = await router.models(provider);
  if (ctx.args.flags.json) {
    ctx.stdout(JSON.stringify(models, null, 2) + '\n');
    return 0;
  }
  for (const m of models.sort((a, b) => a.id.localeCompare(b.id))) {
    const ctxLen = m.contextLength ? ctx.S.dim(` ${m.contextLength} ctx`) : '';
    const mark = m.id === ctx.config.model ? ctx.S.green(' *') : '';
    ctx.stdout(`${m.id}${ctxLen}${mark}\n`);
  }
  if (!models.length) ctx.stdout(ctx.S.dim(`no models reported by ${provider}`) + '\n');
  return 0;
}
