import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { UnknownToolError } from '../agent/errors.js';
import { createLogger } from '../log.js';
import type { ToolContext, ToolResult, ToolSchema, ToolSpec, ToolStats } from '../types.js';

import { ToolExecutionError } from './tool-error.js';

const log = createLogger('tools');

/** JSON schema for the wire, without the draft `$schema` marker. */
export function toJsonSchema(spec: ToolSpec): Record<string, unknown> {
  const raw = zodToJsonSchema(spec.parameters, { $refStrategy: 'none' });
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (k !== '$schema') out[k] = v;
  }
  return out;
}

/**
 * Name → tool lookup with per-tool enable flags and call statistics.
 * `execute` never throws for tool-level failures; only an unknown name escapes.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolSpec>();
  private readonly counters = new Map<string, ToolStats>();

  /** `enabled[name] === false` hides a tool from schemas() and resolve(). */
  constructor(private readonly enabled: Record<string, boolean> = {}) {}

  register(tool: ToolSpec): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  isEnabled(name: string): boolean {
    return this.tools.has(name) && this.enabled[name] !== false;
  }

  resolve(name: string): ToolSpec {
    const tool = this.tools.get(name);
    if (!tool || this.enabled[name] === false) throw new UnknownToolError(name);
    return tool;
  }

  /** Enabled tools in registration order. */
  list(): ToolSpec[] {
    return [...this.tools.values()].filter((t) => this.enabled[t.name] !== false);
  }

  schemas(): ToolSchema[] {
    return this.list().map((t) => ({
      type: 'function',
      function: { name: t.name, description: t.description, parameters: toJsonSchema(t) },
    }));
  }

  async execute(
    name: string,
    args: Record<string, unknown>,
    ctx: ToolContext,
    callId = ''
  ): Promise<ToolResult> {
    const tool = this.resolve(name);
    const started = Date.now();
    let result: ToolResult;
    try {
      const parsed = tool.parameters.parse(args);
      const output = await tool.run(parsed, ctx);
      result = { callId, name, success: true, output, durationMs: Date.now() - started };
    } catch (e) {
      const err = ToolExecutionError.fromError(e);
      log.debug(`${name} failed`, { code: err.code, error: err.message });
      result = {
        callId,
        name,
        success: false,
        error: err.toToolResult(),
        durationMs: Date.now() - started,
      };
    }
    this.record(result);
    return result;
  }

  private record(result: ToolResult): void {
    const s = this.counters.get(result.name) ?? { calls: 0, failures: 0, totalMs: 0 };
    s.calls += 1;
    if (!result.success) s.failures += 1;
    s.totalMs += result.durationMs ?? 0;
    this.counters.set(result.name, s);
  }

  stats(): Record<string, ToolStats> {
    const out: Record<string, ToolStats> = {};
    for (const [name, s] of this.counters) out[name] = { ...s };
    return out;
  }
}

/** Typed constructor: infers `run` args from the zod schema, returns the erased spec. */
export function defineTool<S extends ZodTypeAny>(spec: ToolSpec<S>): ToolSpec {
  return spec;
}
