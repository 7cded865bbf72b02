import { SessionStore } from '../agent/session-store.js';
import type { ToolrelayConfig } from '../config.js';
import type { Styler } from '../term.js';

import type { ParsedArgs } from './args.js';

/** Everything a subcommand needs; built once in main(). */
export type CliContext = {
  config: ToolrelayConfig;
  configPath: string;
  args: ParsedArgs;
  S: Styler;
  /** Session workspace (`--dir`, else process cwd). */
  cwd: string;
  store: SessionStore;
  /** Raw writes; callers add their own newlines. */
  stdout: (s: string) => void;
  stderr: (s: string) => void;
  /** stdin and stderr are both terminals, so confirmations can prompt. */
  interactive: boolean;
};

export function createCliContext(init: Omit<CliContext, 'store' | 'stdout' | 'stderr'> & Partial<CliContext>): CliContext {
  return {
    store: new SessionStore(),
    stdout: (s) => process.stdout.write(s),
    stderr: (s) => process.stderr.write(s),
    ...init,
  };
}
