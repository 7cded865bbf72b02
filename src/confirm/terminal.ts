/**
 * TerminalConfirmProvider: interactive readline-based confirmation with
 * remembered decisions.
 */

import type { Styler } from '../term.js';
import type { BlockedNotice, ConfirmationProvider, ConfirmRequest } from '../types.js';

/** The slice of `readline/promises` Interface the provider needs. */
export interface Asker {
  question(query: string): Promise<string>;
}

type Writer = (line: string) => void;

export class TerminalConfirmProvider implements ConfirmationProvider {
  /**
   * Remembered decisions, keyed by tool + command or path.
   * Approving `execute_command: npm test` once approves it for the rest of the session.
   */
  private remembered = new Map<string, boolean>();

  constructor(
    private readonly rl: Asker,
    private readonly s: Styler,
    private readonly write: Writer = (line) => process.stderr.write(line + '\n'),
    private readonly columns: number = process.stdout.columns ?? 80
  ) {}

  async confirm(opts: ConfirmRequest): Promise<boolean> {
    const memKey = memoryKey(opts);
    const known = memKey ? this.remembered.get(memKey) : undefined;
    if (known !== undefined) {
      this.write(this.s.dim(`[remembered ${known ? '✓' : '✗'}] ${opts.summary}`));
      return known;
    }

    const ans = (await this.rl.question(this.boxedPrompt(opts.summary, opts.reason))).trim().toLowerCase();
    const approved = ans === '' || ans === 'y' || ans === 'yes';
    if (memKey) this.remembered.set(memKey, approved);
    return approved;
  }

  async showBlocked(opts: BlockedNotice): Promise<void> {
    this.write(`${this.s.red('[blocked]')} ${opts.tool}: ${opts.reason}`);
  }

  /** Clear remembered decisions (e.g. on session reset). */
  clearRemembered(): void {
    this.remembered.clear();
  }

  /** Boxed prompt: ┌─ summary ─┐, then the reason and `[Y/n]`. */
  private boxedPrompt(summary: string, reason: string): string {
    const maxW = Math.min(this.columns, 80);
    const inner = summary.length > maxW - 6 ? summary.slice(0, maxW - 9) + '...' : summary;
    const border = '─'.repeat(Math.max(inner.length + 2, 20));
    const lines = [`┌${border}┐`, `│ ${inner.padEnd(border.length - 1)}│`, `└${border}┘`];
    return `${lines.join('\n')}\n${this.s.dim(reason)} ${this.s.bold('[Y/n]')} `;
  }
}

/**
 * - command tools: keyed by command string
 * - file tools: keyed by path
 * - other: null (don't remember)
 */
export function memoryKey(opts: Pick<ConfirmRequest, 'tool' | 'args'>): string | null {
  const cmd = opts.args.cmd;
  if (typeof cmd === 'string' && cmd) return `${opts.tool}:cmd:${cmd}`;
  const p = opts.args.path;
  if (typeof p === 'string' && p) return `${opts.tool}:path:${p}`;
  return null;
}
