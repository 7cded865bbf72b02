import type { Styler } from '../term.js';
import type { ApprovalMode, ConfirmationProvider } from '../types.js';

import { AutoApproveProvider } from './auto.js';
import { HeadlessConfirmProvider } from './headless.js';
import { TerminalConfirmProvider } from './terminal.js';
import type { Asker } from './terminal.js';

export { AutoApproveProvider, HeadlessConfirmProvider, TerminalConfirmProvider };
export type { Asker };

/** yolo → auto; a TTY with a prompt source → terminal; otherwise headless. */
export function createConfirmProvider(opts: {
  mode: ApprovalMode;
  styler: Styler;
  rl?: Asker;
  interactive: boolean;
}): ConfirmationProvider {
  if (opts.mode === 'yolo') return new AutoApproveProvider();
  if (opts.interactive && opts.rl && opts.mode === 'default') return new TerminalConfirmProvider(opts.rl, opts.styler);
  return new HeadlessConfirmProvider(opts.mode);
}
