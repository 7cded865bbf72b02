/**
 * Path helpers for tool operations: workspace-relative resolution and redaction.
 * Containment is enforced earlier by the SafetyGate; these only shape paths.
 */

import path from 'node:path';

import type { ToolContext } from '../types.js';

/**
 * Check if a resolved target path resides within a directory.
 * Handles the root directory edge case: when dir is `/`, every absolute path is valid.
 */
export function isWithinDir(target: string, dir: string): boolean {
  if (dir === '/') return target.startsWith('/');
  const rel = path.relative(dir, target);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Resolve a tool argument path to an absolute path using the context's cwd.
 */
export function resolvePath(ctx: Pick<ToolContext, 'cwd'>, p: string): string {
  if (!p.trim()) throw new Error('missing path');
  return path.resolve(ctx.cwd, p);
}

/**
 * Redact a path for model-visible output.
 * - Paths within cwd are shown relative (`.` for cwd itself)
 * - Paths outside cwd are shown as [outside-cwd]/basename
 */
export function redactPath(filePath: string, absCwd: string): string {
  const resolved = path.resolve(filePath);
  if (isWithinDir(resolved, absCwd)) {
    return path.relative(absCwd, resolved) || '.';
  }
  return `[outside-cwd]/${path.basename(resolved)}`;
}
