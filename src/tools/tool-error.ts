/**
 * Structured tool error taxonomy for reliable, machine-actionable failure handling.
 * Tool implementations throw these; the registry turns them into failed ToolResults.
 */

import { ZodError } from 'zod';

import { errorCode, errorMessage } from '../utils.js';

export type ToolErrorCode =
  | 'invalid_args' // Wrong types, missing params
  | 'not_found' // File/directory doesn't exist
  | 'conflict' // File already exists, edit conflict, etc.
  | 'blocked' // Safety policy blocked the operation
  | 'permission' // Permission denied (filesystem, network, etc.)
  | 'timeout' // Operation timed out
  | 'transient' // Network error, temporary failure
  | 'internal'; // Unexpected error in tool implementation

export class ToolExecutionError extends Error {
  constructor(
    public readonly code: ToolErrorCode,
    message: string,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'ToolExecutionError';
  }

  get retryable(): boolean {
    return this.code === 'timeout' || this.code === 'transient';
  }

  /**
   * Format as a concise tool result error string
   */
  toToolResult(): string {
    const lines = [`${this.code}: ${this.message}`];
    if (this.hint) lines.push(`hint: ${this.hint}`);
    return lines.join('\n');
  }

  /**
   * Create from a generic error (with code inference from errno and message)
   */
  static fromError(err: unknown, defaultCode: ToolErrorCode = 'internal'): ToolExecutionError {
    if (err instanceof ToolExecutionError) return err;
    if (err instanceof ZodError) {
      const detail = err.issues
        .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
        .join('; ');
      return new ToolExecutionError('invalid_args', detail);
    }

    const message = errorMessage(err);
    const errno = errorCode(err) ?? '';

    let code = defaultCode;
    if (errno === 'ENOENT' || message.includes('not found')) {
      code = 'not_found';
    } else if (errno === 'EACCES' || errno === 'EPERM' || /permission denied/i.test(message)) {
      code = 'permission';
    } else if (errno === 'ETIMEDOUT' || /timed? ?out/i.test(message)) {
      code = 'timeout';
    } else if (errno === 'ECONNREFUSED' || errno === 'ECONNRESET' || /network|fetch failed/i.test(message)) {
      code = 'transient';
    } else if (errno === 'EEXIST' || errno === 'EISDIR' || message.includes('already exists')) {
      code = 'conflict';
    } else if (/invalid|required/i.test(message)) {
      code = 'invalid_args';
    }

    return new ToolExecutionError(code, message);
  }
}
