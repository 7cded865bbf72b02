/**
 * HeadlessConfirmProvider: for CI, piped and non-interactive use.
 * Behavior depends on approval mode:
 *   - yolo: approve everything
 *   - reject: reject everything
 *   - default: reject everything (can't prompt without a TTY)
 */

import type { ApprovalMode, BlockedNotice, ConfirmationProvider, ConfirmRequest } from '../types.js';

type Writer = (line: string) => void;

export class HeadlessConfirmProvider implements ConfirmationProvider {
  constructor(
    private readonly mode: ApprovalMode,
    private readonly write: Writer = (line) => process.stderr.write(line + '\n')
  ) {}

  async confirm(opts: ConfirmRequest): Promise<boolean> {
    switch (this.mode) {
      case 'yolo':
        return true;
      case 'reject':
        this.write(`[non-interactive] rejected ${opts.summary}; use --yes to auto-approve`);
        return false;
      case 'default':
        this.write(`[headless] rejected ${opts.summary} (${opts.reason}; mode=default, no TTY)`);
        return false;
    }
  }

  async showBlocked(opts: BlockedNotice): Promise<void> {
    this.write(`[headless] blocked ${opts.tool}: ${opts.reason}`);
  }
}
