#!/usr/bin/env node

import fs from 'node:fs/promises';
import path from 'node:path';

import { config as loadEnv } from 'dotenv';

import { friendlyError, HELP_TEXT, cliOverrides, flagString, parseArgs } from './cli/args.js';
import type { ParsedArgs } from './cli/args.js';
import { runChat } from './cli/chat.js';
import { runKeyCommand, runModelCommand, runModelsCommand } from './cli/config-cmds.js';
import { createCliContext } from './cli/context.js';
import type { CliContext } from './cli/context.js';
import { runOneShot } from './cli/oneshot.js';
import { runExportCommand, runSessionsCommand } from './cli/session-cmds.js';
import { usePooledConnections } from './client.js';
import { loadConfig } from './config.js';
import { configureLogging } from './log.js';
import { err as errFmt, makeStyler, resolveColorMode } from './term.js';
import { PKG_VERSION } from './utils.js';

async function resolveWorkspace(args: ParsedArgs): Promise<string> {
  const dir = flagString(args, 'dir');
  if (!dir) return process.cwd();
  const abs = path.resolve(dir);
  const st = await fs.stat(abs).catch(() => null);
  if (!st?.isDirectory()) throw new Error(`--dir ${dir} is not a directory`);
  return abs;
}

async function dispatch(ctx: CliContext, command: string, rest: string[]): Promise<number> {
  switch (command) {
    case 'ask':
    case 'agent':
      return runOneShot(ctx, command, rest.join(' '));
    case 'chat':
      return runChat(ctx);
    case 'model':
      return runModelCommand(ctx, rest[0]);
    case 'key':
      return runKeyCommand(ctx, rest[0], rest[1]);
    case 'models':
      return runModelsCommand(ctx);
    case 'sessions':
      return runSessionsCommand(ctx);
    case 'export':
      return runExportCommand(ctx, rest[0]);
    default:
      ctx.stderr(errFmt(`unknown command ${command}; see toolrelay --help`, ctx.S) + '\n');
      return 2;
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const S = makeStyler(resolveColorMode('auto').enabled);

  if (args.flags.version) {
    process.stdout.write(PKG_VERSION + '\n');
    return 0;
  }
  const [command, ...rest] = args._;
  if (args.flags.help || !command) {
    process.stdout.write(HELP_TEXT);
    return command || args.flags.help ? 0 : 2;
  }

  loadEnv();
  const { config, configPath } = await loadConfig({
    configPath: flagString(args, 'config'),
    cli: cliOverrides(args),
  });
  configureLogging({ verbose: config.verbose });
  usePooledConnections();

  const ctx = createCliContext({
    config,
    configPath,
    args,
    S,
    cwd: await resolveWorkspace(args),
    interactive: Boolean(process.stdin.isTTY && process.stderr.isTTY),
  });
  return dispatch(ctx, command, rest);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    const S = makeStyler(resolveColorMode('auto').enabled);
    process.stderr.write(errFmt(friendlyError(e), S) + '\n');
    if (process.env.TOOLRELAY_DEBUG === '1' && e instanceof Error && e.stack) process.stderr.write(e.stack + '\n');
    process.exitCode = 1;
  }
);
