import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { atomicWrite } from '../fs-utils.js';
import { createLogger } from '../log.js';
import type { ConversationTurn, SessionSnapshot } from '../types.js';
import { errorCode, stateDir } from '../utils.js';

import type { AgentSession } from './session.js';

const log = createLogger('sessions');

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
});

const TurnSchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('system'), content: z.string() }),
  z.object({ role: z.literal('user'), content: z.string() }),
  z.object({ role: z.literal('assistant'), content: z.string(), toolCalls: z.array(ToolCallSchema).optional() }),
  z.object({
    role: z.literal('tool'),
    content: z.string(),
    result: z.object({
      callId: z.string(),
      name: z.string(),
      success: z.boolean(),
      output: z.string().optional(),
      error: z.string().optional(),
      durationMs: z.number().optional(),
    }),
  }),
]);

const SnapshotSchema = z.object({
  id: z.string(),
  model: z.string(),
  cwd: z.string(),
  transcript: z.array(TurnSchema),
  steps: z.number().int().min(0),
  maxSteps: z.number().int().positive(),
  state: z.enum(['awaiting-model', 'executing-tools', 'done', 'failed']),
  finalText: z.string().optional(),
  failure: z.object({ name: z.string(), message: z.string() }).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type SessionSummary = {
  id: string;
  model: string;
  state: SessionSnapshot['state'];
  steps: number;
  updatedAt: string;
  /** First user message, trimmed to one line. */
  title: string;
};

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function defaultSessionDir(): string {
  return path.join(stateDir(), 'sessions');
}

function firstUserLine(transcript: readonly ConversationTurn[]): string {
  const first = transcript.find((t) => t.role === 'user');
  const line = first?.content.split('\n')[0]?.trim() ?? '';
  return line.length > 72 ? line.slice(0, 71) + '…' : line;
}

export class SessionStore {
  constructor(readonly dir: string = defaultSessionDir()) {}

  pathFor(id: string): string {
    if (!SAFE_ID.test(id)) throw new Error(`invalid session id: ${JSON.stringify(id)}`);
    return path.join(this.dir, `${id}.json`);
  }

  async save(session: AgentSession | SessionSnapshot): Promise<string> {
    const snap = 'toSnapshot' in session ? session.toSnapshot() : session;
    const file = this.pathFor(snap.id);
    await atomicWrite(file, JSON.stringify(snap, null, 2) + '\n', { mode: 0o600, dirMode: 0o700 });
    log.debug('session saved', { id: snap.id, turns: snap.transcript.length });
    return file;
  }

  async load(id: string): Promise<SessionSnapshot> {
    const file = this.pathFor(id);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') throw new Error(`no saved session ${id}`);
      throw e;
    }
    const parsed = SnapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`session ${id} is corrupt: ${parsed.error.issues[0]?.message ?? 'bad shape'}`);
    }
    return parsed.data;
  }

  /** Newest first. Unreadable files are skipped with a warning. */
  async list(): Promise<SessionSummary[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return [];
      throw e;
    }
    const out: SessionSummary[] = [];
    for (const name of names) {
      if (!name.endsWith('.json') || name.startsWith('.')) continue;
      const id = name.slice(0, -'.json'.length);
      try {
        const snap = await this.load(id);
        out.push({
          id: snap.id,
          model: snap.model,
          state: snap.state,
          steps: snap.steps,
          updatedAt: snap.updatedAt,
          title: firstUserLine(snap.transcript),
        });
      } catch (e) {
        log.warn('skipping unreadable session', { file: name, error: e instanceof Error ? e.message : String(e) });
      }
    }
    return out.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }
}

function fence(text: string): string {
  const longest = Math.max(2, ...[...text.matchAll(/`+/g)].map((m) => m[0].length));
  const ticks = '`'.repeat(longest + 1);
  return `${ticks}\n${text}\n${ticks}`;
}

/** Readable transcript; the system prompt is left out. */
export function exportMarkdown(snap: SessionSnapshot): string {
  const lines: string[] = [
    `# Session ${snap.id}`,
    '',
    `- model: ${snap.model}`,
    `- workspace: ${snap.cwd}`,
    `- state: ${snap.state}`,
    `- steps: ${snap.steps}/${snap.maxSteps}`,
    `- created: ${snap.createdAt}`,
  ];
  if (snap.failure) lines.push(`- failure: ${snap.failure.name}: ${snap.failure.message}`);

  for (const turn of snap.transcript) {
    switch (turn.role) {
      case 'system':
        break;
      case 'user':
        lines.push('', '## User', '', turn.content);
        break;
      case 'assistant':
        lines.push('', '## Assistant');
        if (turn.content) lines.push('', turn.content);
        for (const call of turn.toolCalls ?? []) {
          lines.push('', `**tool call** \`${call.name}\` (${call.id})`, '', fence(JSON.stringify(call.args, null, 2)));
        }
        break;
      case 'tool': {
        const status = turn.result.success ? 'ok' : 'failed';
        lines.push('', `### Result: ${turn.result.name} (${status})`, '', fence(turn.content));
        break;
      }
    }
  }
  return lines.join('\n') + '\n';
}
