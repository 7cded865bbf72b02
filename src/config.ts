import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { ConfigError } from './agent/errors.js';
import { withFileLock } from './config-lock.js';
import type { LockOptions } from './config-lock.js';
import { atomicWrite } from './fs-utils.js';
import { createLogger } from './log.js';
import type { ApprovalMode } from './types.js';
import { configDir, errorCode, isRecord } from './utils.js';

const log = createLogger('config');

export const DEFAULT_MODEL = 'openai/gpt-4o-mini';

const ApiProviderSchema = z
  .object({
    api_key: z.string().optional(),
    base_url: z.string().optional(),
  })
  .default({});

export const ConfigSchema = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  fallback_models: z.array(z.string()).default([]),
  providers: z
    .object({
      openrouter: ApiProviderSchema,
      groq: ApiProviderSchema,
      ollama: z.object({ base_url: z.string().optional() }).default({}),
    })
    .default({}),
  max_steps: z.number().int().positive().default(20),
  agent_max_steps: z.number().int().positive().default(50),
  max_retries: z.number().int().min(0).default(3),
  retry_base_ms: z.number().int().positive().default(1000),
  /** Seconds. */
  request_timeout: z.number().positive().default(120),
  stream: z.boolean().default(true),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().optional(),
  approval_mode: z.enum(['default', 'yolo', 'reject']).default('default'),
  lockdown: z.boolean().default(false),
  allowed_dirs: z.array(z.string()).default([]),
  /** Seconds. */
  exec_timeout: z.number().positive().default(60),
  verbose: z.boolean().default(false),
  tools: z.record(z.boolean()).default({}),
  safety: z
    .object({
      forbidden_patterns: z.array(z.string()).default([]),
      cautious_patterns: z.array(z.string()).default([]),
      allow_patterns: z.array(z.string()).default([]),
      protected_paths: z.array(z.string()).default([]),
    })
    .default({}),
});

export type ToolrelayConfig = z.infer<typeof ConfigSchema>;

/** Values a command line may set; `undefined` leaves the lower layer alone. */
export type ConfigOverrides = {
  model?: string;
  max_steps?: number;
  approval_mode?: ApprovalMode;
  lockdown?: boolean;
  stream?: boolean;
  verbose?: boolean;
  allowed_dirs?: string[];
};

export function defaultConfigPath(): string {
  return path.join(configDir(), 'config.json');
}

function parseBool(v: string | undefined): boolean | undefined {
  if (v == null) return undefined;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

function parseNum(v: string | undefined): number | undefined {
  if (v == null || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function parseApprovalMode(v: string | undefined): ApprovalMode | undefined {
  if (v == null) return undefined;
  const lower = v.toLowerCase();
  if (lower === 'default' || lower === 'yolo' || lower === 'reject') return lower;
  log.warn('ignoring unknown TOOLRELAY_APPROVAL_MODE', { value: v });
  return undefined;
}

/** Read the raw JSON object; `{}` when the file does not exist. */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (e) {
    if (errorCode(e) === 'ENOENT') return {};
    throw e;
  }
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`invalid JSON in ${configPath}: ${e instanceof Error ? e.message : String(e)}`, configPath);
  }
  if (!isRecord(parsed)) throw new ConfigError(`${configPath} must contain a JSON object`, configPath);
  return parsed;
}

function validate(raw: Record<string, unknown>, configPath: string): ToolrelayConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
  throw new ConfigError(`invalid config ${configPath}: ${detail}`, configPath);
}

function setPath(target: Record<string, unknown>, keys: string[], value: unknown): void {
  let cur = target;
  for (const k of keys.slice(0, -1)) {
    const next = cur[k];
    if (isRecord(next)) {
      cur = next;
    } else {
      const fresh: Record<string, unknown> = {};
      cur[k] = fresh;
      cur = fresh;
    }
  }
  const last = keys[keys.length - 1];
  if (last !== undefined) cur[last] = value;
}

function applyDefined(target: Record<string, unknown>, entries: [string, unknown][]): void {
  for (const [key, value] of entries) {
    if (value !== undefined) setPath(target, key.split('.'), value);
  }
}

function envEntries(env: NodeJS.ProcessEnv): [string, unknown][] {
  return [
    ['providers.openrouter.api_key', env.OPENROUTER_API_KEY || undefined],
    ['providers.groq.api_key', env.GROQ_API_KEY || undefined],
    ['providers.ollama.base_url', env.OLLAMA_HOST || undefined],
    ['model', env.TOOLRELAY_MODEL || undefined],
    ['max_steps', parseNum(env.TOOLRELAY_MAX_STEPS)],
    ['approval_mode', parseApprovalMode(env.TOOLRELAY_APPROVAL_MODE)],
    ['verbose', parseBool(env.TOOLRELAY_VERBOSE)],
  ];
}

/**
 * Load config: defaults < file < env < cli.
 * Unknown keys are ignored; a value of the wrong type is a ConfigError.
 */
export async function loadConfig(
  opts: {
    configPath?: string;
    cli?: ConfigOverrides;
    env?: NodeJS.ProcessEnv;
  } = {}
): Promise<{ config: ToolrelayConfig; configPath: string }> {
  const configPath = opts.configPath ?? defaultConfigPath();
  const merged = structuredClone(await readConfigFile(configPath));

  applyDefined(merged, envEntries(opts.env ?? process.env));
  applyDefined(merged, Object.entries(opts.cli ?? {}));

  return { config: validate(merged, configPath), configPath };
}

export function lockPathFor(configPath: string): string {
  return `${configPath}.lock`;
}

/**
 * Read-modify-write under the config lock. The file keeps keys this version
 * does not know; the result must still validate before it is written.
 */
export async function updateConfigFile(
  mutate: (raw: Record<string, unknown>) => void,
  opts: { configPath?: string; lock?: LockOptions } = {}
): Promise<ToolrelayConfig> {
  const configPath = opts.configPath ?? defaultConfigPath();
  return withFileLock(
    lockPathFor(configPath),
    async () => {
      const raw = await readConfigFile(configPath);
      mutate(raw);
      const config = validate(raw, configPath);
      await atomicWrite(configPath, JSON.stringify(raw, null, 2) + '\n', { mode: 0o600, dirMode: 0o700 });
      log.debug('config written', { path: configPath });
      return config;
    },
    opts.lock
  );
}

/** Set one dotted key (`providers.groq.api_key`). */
export async function setConfigValue(
  key: string,
  value: unknown,
  opts: { configPath?: string; lock?: LockOptions } = {}
): Promise<ToolrelayConfig> {
  const keys = key.split('.').filter(Boolean);
  if (!keys.length) throw new ConfigError(`invalid config key: ${JSON.stringify(key)}`);
  return updateConfigFile((raw) => setPath(raw, keys, value), opts);
}
