import path from 'node:path';

import { exportMarkdown } from '../agent/session-store.js';
import { atomicWrite } from '../fs-utils.js';
import { err as errFmt } from '../term.js';

import { flagString } from './args.js';
import type { CliContext } from './context.js';

export async function runSessionsCommand(ctx: CliContext): Promise<number> {
  const list = await ctx.store.list();
  if (ctx.args.flags.json) {
    ctx.stdout(JSON.stringify(list, null, 2) + '\n');
    return 0;
  }
  if (!list.length) {
    ctx.stdout(ctx.S.dim('no saved sessions') + '\n');
    return 0;
  }
  for (const s of list) {
    const state = s.state === 'done' ? ctx.S.green(s.state) : s.state === 'failed' ? ctx.S.red(s.state) : ctx.S.yellow(s.state);
    ctx.stdout(`${ctx.S.bold(s.id)}  ${state}  ${ctx.S.dim(`${s.model} · ${s.steps} steps · ${s.updatedAt}`)}\n  ${s.title}\n`);
  }
  return 0;
}

export async function runExportCommand(ctx: CliContext, id: string | undefined): Promise<number> {
  if (!id) {
    ctx.stderr(errFmt('usage: toolrelay export <id> [--out FILE]', ctx.S) + '\n');
    return 2;
  }
  const md = exportMarkdown(await ctx.store.load(id));
  const out = flagString(ctx.args, 'out');
  if (!out) {
    ctx.stdout(md);
    return 0;
  }
  const abs = path.resolve(ctx.cwd, out);
  await atomicWrite(abs, md);
  ctx.stderr(`wrote ${abs}\n`);
  return 0;
}
