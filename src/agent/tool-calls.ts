import type { ToolCallRequest } from '../types.js';
import { isRecord } from '../utils.js';

/** Raised when a tool call's argument string is not a JSON object. */
export class ToolArgumentsParseError extends Error {
  constructor(
    readonly toolName: string,
    readonly raw: string
  ) {
    super(`unparsable arguments for ${toolName}: ${raw.slice(0, 200)}`);
    this.name = 'ToolArgumentsParseError';
  }
}

/**
 * Decode wire-level tool arguments. Empty means `{}`; anything that is not a
 * JSON object throws so a truncated call is never executed with partial args.
 */
export function parseToolArguments(name: string, raw: unknown): Record<string, unknown> {
  if (raw == null) return {};
  if (isRecord(raw)) return raw;
  if (typeof raw !== 'string') throw new ToolArgumentsParseError(name, String(raw));
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ToolArgumentsParseError(name, raw);
  }
  if (!isRecord(parsed)) throw new ToolArgumentsParseError(name, raw);
  return parsed;
}

function tryParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return null;
  }
}

/** `{name, arguments}` or `{function: {name, arguments}}` → request (without id). */
function callFromObject(v: unknown): Omit<ToolCallRequest, 'id'> | null {
  if (!isRecord(v)) return null;
  const fn = isRecord(v.function) ? v.function : v;
  if (typeof fn.name !== 'string' || !fn.name) return null;
  const rawArgs = fn.arguments ?? fn.parameters ?? {};
  try {
    return { name: fn.name, args: parseToolArguments(fn.name, rawArgs) };
  } catch {
    return null;
  }
}

function callsFromValue(v: unknown): Omit<ToolCallRequest, 'id'>[] {
  if (Array.isArray(v)) {
    return v.map(callFromObject).filter((c): c is Omit<ToolCallRequest, 'id'> => c !== null);
  }
  if (isRecord(v) && Array.isArray(v.tool_calls)) return callsFromValue(v.tool_calls);
  const single = callFromObject(v);
  return single ? [single] : [];
}

/** Top-level `{...}` spans, string-aware. */
function splitJsonObjects(text: string): string[] {
  const objects: string[] = [];
  let depth = 0;
  let start = -1;
  let inStr = false;
  let esc = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === '\\') esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}') {
      if (depth > 0) depth--;
      if (depth === 0 && start !== -1) {
        objects.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  return objects;
}

/**
 * Recover tool calls a model printed into its content instead of the
 * structured tool_calls field. Only names in `known` are accepted, so prose
 * that merely contains JSON is left alone. Returns null when nothing matched.
 */
export function parseToolCallsFromContent(
  content: string,
  known: ReadonlySet<string>,
  nextId: () => string
): ToolCallRequest[] | null {
  const trimmed = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');
  if (!trimmed.includes('{')) return null;

  let found: Omit<ToolCallRequest, 'id'>[] = [];

  // Case 1: whole content is JSON (object, wrapper or array)
  const whole = tryParse(trimmed);
  if (whole !== null) found = callsFromValue(whole);

  // Case 2: <tool_call>{...}</tool_call> blocks
  if (!found.length && trimmed.includes('<tool_call>')) {
    for (const m of trimmed.matchAll(/<tool_call>\s*([\s\S]*?)\s*<\/tool_call>/g)) {
      found.push(...callsFromValue(tryParse(m[1])));
    }
  }

  // Case 3: JSON objects embedded in (or concatenated within) prose
  if (!found.length) {
    for (const obj of splitJsonObjects(trimmed)) {
      found.push(...callsFromValue(tryParse(obj)));
    }
  }

  const accepted = found.filter((c) => known.has(c.name));
  if (!accepted.length) return null;
  return accepted.map((c) => ({ id: nextId(), name: c.name, args: c.args }));
}

/** Sequential `call_<n>` ids for providers that omit them. */
export function callIdSequence(start = 0): () => string {
  let n = start;
  return () => `call_${n++}`;
}
