import pc from 'picocolors';

type ColorMode = 'auto' | 'always' | 'never';

export function resolveColorMode(mode: ColorMode): { enabled: boolean } {
  const env = process.env;

  // Standard opt-out
  if ('NO_COLOR' in env) return { enabled: false };

  // Explicit force/disable
  if (env.FORCE_COLOR === '0') return { enabled: false };
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return { enabled: true };

  if (mode === 'always') return { enabled: true };
  if (mode === 'never') return { enabled: false };

  return { enabled: !!process.stdout.isTTY };
}

export type Styler = {
  enabled: boolean;
  dim: (s: string) => string;
  bold: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  cyan: (s: string) => string;
  magenta: (s: string) => string;
};

export function makeStyler(enabled: boolean): Styler {
  const wrap = (fn: (s: string) => string) => (s: string) => (enabled ? fn(s) : s);
  return {
    enabled,
    dim: wrap(pc.dim),
    bold: wrap(pc.bold),
    red: wrap(pc.red),
    yellow: wrap(pc.yellow),
    green: wrap(pc.green),
    cyan: wrap(pc.cyan),
    magenta: wrap(pc.magenta),
  };
}

export function banner(title: string, s: Styler): string {
  return s.cyan(s.bold(title));
}

export function err(msg: string, s: Styler): string {
  return s.red('ERROR') + s.dim(': ') + msg;
}

/** One-line tool call trace: `▸ read_file path=src/a.ts`. */
export function toolCallLine(name: string, args: Record<string, unknown>, s: Styler): string {
  const parts = Object.entries(args).map(([k, v]) => {
    const raw = typeof v === 'string' ? v : JSON.stringify(v);
    const short = raw.length > 60 ? raw.slice(0, 57) + '...' : raw;
    return `${k}=${short}`;
  });
  return `${s.magenta('▸')} ${s.bold(name)} ${s.dim(parts.join(' '))}`.trimEnd();
}

export function toolResultLine(
  ok: boolean,
  summary: string,
  durationMs: number | undefined,
  s: Styler
): string {
  const mark = ok ? s.green('✓') : s.red('✗');
  const took = durationMs != null ? s.dim(` (${durationMs}ms)`) : '';
  return `  ${mark} ${summary}${took}`;
}
