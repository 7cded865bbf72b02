/**
 * CLI argument parsing, boolean/numeric coercions, and help text.
 */

import {
  BudgetExceededError,
  CancelledError,
  ConfigError,
  ConfigLockError,
  ProviderError,
  UnknownToolError,
} from '../agent/errors.js';
import { isConnRefused } from '../client/error-utils.js';
import type { ConfigOverrides } from '../config.js';
import type { ApprovalMode } from '../types.js';

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  if (e instanceof BudgetExceededError) {
    return `Stopped: ${e.message}. The task needed more steps than allowed. Try --max-steps <N> to raise the limit.`;
  }
  if (e instanceof CancelledError) return 'Cancelled.';
  if (e instanceof UnknownToolError) {
    return `The model asked for a tool that does not exist (${e.toolName}); nothing in that batch was run.`;
  }
  if (e instanceof ConfigLockError) {
    return `${e.message}. Another toolrelay process may be writing the config; try again.`;
  }
  if (e instanceof ConfigError) return `Config error: ${e.message}`;
  if (e instanceof ProviderError) {
    if (e.status === 401 || e.status === 403) {
      return `Authentication failed for ${e.provider} (${e.status}). Check your key: toolrelay key ${e.provider} <key>`;
    }
    if (e.status === 404) return `Model not found on ${e.provider}: ${e.message}`;
    if (e.provider === 'ollama' && isConnRefused(e.cause)) {
      return `Connection failed: ${e.message}. Is Ollama running?`;
    }
    if (e.status === 429) return `Rate limited by ${e.provider}; retries exhausted. (${e.message})`;
    return e.message;
  }
  return e instanceof Error ? e.message : String(e);
}

export type FlagValue = string | true;

export type ParsedArgs = {
  _: string[];
  flags: Record<string, FlagValue>;
};

// Flags that are always boolean (never consume the next positional arg as their value)
const BOOLEAN_FLAGS = new Set([
  'help',
  'verbose',
  'yes',
  'reject',
  'lockdown',
  'no-stream',
  'version',
  'json',
]);

const SHORT_ALIASES: Record<string, string> = {
  h: 'help',
  v: 'version',
  y: 'yes',
  m: 'model',
  o: 'out',
};

export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { _: [], flags: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      out._.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('-') || a === '-') {
      out._.push(a);
      continue;
    }
    // Single-dash short flags like -v, -h, -m
    if (a.length === 2) {
      const short = a.slice(1);
      const mapped = SHORT_ALIASES[short] ?? short;
      if (BOOLEAN_FLAGS.has(mapped)) {
        out.flags[mapped] = true;
        continue;
      }
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        out.flags[mapped] = next;
        i++;
      } else {
        out.flags[mapped] = true;
      }
      continue;
    }
    const eq = a.indexOf('=');
    const key = (eq === -1 ? a : a.slice(0, eq)).replace(/^--?/, '');
    if (eq !== -1) {
      out.flags[key] = a.slice(eq + 1);
    } else if (BOOLEAN_FLAGS.has(key)) {
      out.flags[key] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        out.flags[key] = next;
        i++;
      } else {
        out.flags[key] = true;
      }
    }
  }
  return out;
}

export function flagString(args: ParsedArgs, key: string): string | undefined {
  const v = args.flags[key];
  return typeof v === 'string' ? v : undefined;
}

export function asNum(v: FlagValue | undefined): number | undefined {
  if (v === undefined || v === true) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function asBool(v: FlagValue | undefined): boolean | undefined {
  if (v === undefined) return undefined;
  if (v === true) return true;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

/** `--yes` wins over `--reject`; neither leaves the configured mode. */
export function approvalFromFlags(args: ParsedArgs): ApprovalMode | undefined {
  if (asBool(args.flags.yes)) return 'yolo';
  if (asBool(args.flags.reject)) return 'reject';
  return undefined;
}

export function cliOverrides(args: ParsedArgs): ConfigOverrides {
  const maxSteps = asNum(args.flags['max-steps']);
  return {
    model: flagString(args, 'model'),
    max_steps: maxSteps !== undefined && maxSteps > 0 ? Math.floor(maxSteps) : undefined,
    approval_mode: approvalFromFlags(args),
    lockdown: args.flags.lockdown ? true : undefined,
    stream: args.flags['no-stream'] ? false : undefined,
    verbose: args.flags.verbose ? true : undefined,
  };
}

export const HELP_TEXT = `Usage: toolrelay <command> [options]

Commands:
  ask <prompt>               One request; tool calls run behind the safety gate
  agent <task>               Same as ask, with the larger agent step budget
  chat                       Interactive session (one model run per message)
  model [id]                 Show or set the default model
  key <provider> <key>       Store an API key (openrouter | groq)
  models [--provider P]      List models (openrouter | groq | ollama)
  sessions                   List saved sessions
  export <id> [--out FILE]   Write a session transcript as markdown

Model ids:
  groq/<id>                  Groq
  ollama/<id>                local Ollama
  anything else              OpenRouter (e.g. anthropic/claude-3.5-sonnet)

Options:
  --model, -m ID
  --max-steps N              (model calls per run)
  --yes, -y                  (approve confirm-class tools without asking)
  --reject                   (refuse every confirm-class tool)
  --lockdown                 (deny cautious commands instead of asking)
  --dir PATH                 (workspace; default: current directory)
  --resume ID                (continue a saved session)
  --no-stream
  --config PATH              (default: ~/.config/toolrelay/config.json)
  --verbose
  --help, -h
  --version, -v
`;
