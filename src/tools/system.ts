import os from 'node:os';

import { z } from 'zod';

import { defineTool } from './registry.js';
import { ToolExecutionError } from './tool-error.js';

const SECRET_NAME = /pass(word)?|secret|key|token|auth|credential/i;
const MAX_VALUE_CHARS = 200;

function gib(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(1)} GiB`;
}

export const systemInfoTool = defineTool({
  name: 'system_info',
  description: 'Describe the host: OS, CPU, memory, Node.js version and working directory.',
  parameters: z.object({}),
  safety: 'safe',
  category: 'system',
  async run(_args, ctx) {
    const cpus = os.cpus();
    return [
      `os: ${os.type()} ${os.release()} (${os.platform()}/${os.arch()})`,
      `hostname: ${os.hostname()}`,
      `cpu: ${cpus[0]?.model.trim() ?? 'unknown'} x${cpus.length}`,
      `memory: ${gib(os.freemem())} free of ${gib(os.totalmem())}`,
      `uptime: ${Math.round(os.uptime() / 60)} min`,
      `node: ${process.version}`,
      `cwd: ${ctx.cwd}`,
    ].join('\n');
  },
});

function shownValue(name: string, value: string): string {
  if (SECRET_NAME.test(name)) return '[hidden]';
  return value.length > MAX_VALUE_CHARS ? value.slice(0, MAX_VALUE_CHARS) + '...' : value;
}

/** Read-only view of the agent's environment; secret-looking names never show their value. */
export const environmentTool = defineTool({
  name: 'environment',
  description:
    'Read environment variables: get one by name, or list them (optionally only names starting with prefix). ' +
    'Values of secret-looking variables are hidden.',
  parameters: z.object({
    action: z.enum(['get', 'list']),
    name: z.string().min(1).optional(),
    prefix: z.string().optional(),
  }),
  safety: 'safe',
  category: 'system',
  async run(args) {
    if (args.action === 'get') {
      if (!args.name) throw new ToolExecutionError('invalid_args', 'name is required for get');
      const value = process.env[args.name];
      return value === undefined ? `${args.name} is not set` : `${args.name}=${shownValue(args.name, value)}`;
    }

    const prefix = args.prefix ?? '';
    const names = Object.keys(process.env)
      .filter((k) => k.startsWith(prefix))
      .sort();
    if (!names.length) return prefix ? `[no variables starting with ${prefix}]` : '[no variables]';
    return names.map((k) => `${k}=${shownValue(k, process.env[k] ?? '')}`).join('\n');
  },
});
