import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { atomicWrite } from '../fs-utils.js';
import type { ToolContext } from '../types.js';

import { clipLines, gitExec } from './git.js';
import { redactPath, resolvePath } from './path-safety.js';
import { defineTool } from './registry.js';
import { globishMatch, looksBinary, truncateBytes } from './text-utils.js';
import { ToolExecutionError } from './tool-error.js';

const MAX_READ_BYTES = 64 * 1024;
const DEFAULT_READ_LINES = 400;
const SKIP_DIRS = new Set(['node_modules', '.git', 'dist', 'build']);

function rel(ctx: ToolContext, abs: string): string {
  return redactPath(abs, path.resolve(ctx.cwd));
}

export const readFileTool = defineTool({
  name: 'read_file',
  description:
    'Read a text file. Returns numbered lines. Use offset/limit to page through large files.',
  parameters: z.object({
    path: z.string().min(1).describe('File path, relative to the workspace'),
    offset: z.number().int().min(1).optional().describe('First line to return (1-based)'),
    limit: z.number().int().min(1).max(2000).optional().describe('Maximum number of lines'),
  }),
  safety: 'safe',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const p = resolvePath(ctx, args.path);
    const shown = rel(ctx, p);
    const stat = await fs.stat(p);
    if (stat.isDirectory()) {
      throw new ToolExecutionError(
        'invalid_args',
        `"${shown}" is a directory, not a file`,
        'use list_directory to see its contents'
      );
    }

    const buf = await fs.readFile(p);
    if (looksBinary(buf)) return `[binary file, ${buf.length} bytes]`;

    const text = buf.toString('utf8');
    if (!text) return `# ${shown}\n[file is empty (0 bytes)]`;

    const lines = text.replace(/\r?\n$/, '').split(/\r?\n/);
    const start = Math.min(args.offset ?? 1, lines.length);
    const limit = args.limit ?? DEFAULT_READ_LINES;
    const end = Math.min(lines.length, start + limit - 1);

    const out = [`# ${shown} (lines ${start}-${end} of ${lines.length})`];
    for (let ln = start; ln <= end; ln++) out.push(`${ln}| ${lines[ln - 1]}`);
    return truncateBytes(out.join('\n'), MAX_READ_BYTES).text;
  },
});

export const listDirectoryTool = defineTool({
  name: 'list_directory',
  description:
    'List directory entries as "kind<TAB>size<TAB>path" lines. Set recursive to descend (max depth 3).',
  parameters: z.object({
    path: z.string().min(1).default('.').describe('Directory path, relative to the workspace'),
    recursive: z.boolean().optional(),
    max_entries: z.number().int().min(1).max(500).optional(),
  }),
  safety: 'safe',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const root = resolvePath(ctx, args.path);
    const maxEntries = args.max_entries ?? 200;
    const lines: string[] = [];
    let count = 0;
    let truncated = false;

    async function walk(dir: string, depth: number): Promise<void> {
      const ents = await fs.readdir(dir, { withFileTypes: true });
      ents.sort((a, b) => a.name.localeCompare(b.name));
      for (const ent of ents) {
        if (count >= maxEntries) {
          truncated = true;
          return;
        }
        const full = path.join(dir, ent.name);
        const st = await fs.lstat(full).catch(() => null);
        const kind = ent.isDirectory() ? 'dir' : ent.isSymbolicLink() ? 'link' : 'file';
        const size = ent.isDirectory() ? 0 : (st?.size ?? 0);
        lines.push(`${kind}\t${size}\t${rel(ctx, full)}`);
        count++;
        if (args.recursive && ent.isDirectory() && depth < 3 && !SKIP_DIRS.has(ent.name)) {
          await walk(full, depth + 1);
        }
      }
    }

    await walk(root, 0);
    if (truncated) lines.push(`[truncated after ${maxEntries} entries]`);
    if (!lines.length) return `[empty directory: ${rel(ctx, root)}]`;
    return lines.join('\n');
  },
});

export const searchFilesTool = defineTool({
  name: 'search_files',
  description:
    'Search file contents with a regular expression. Returns "path:line:text" matches. ' +
    'include filters file names (e.g. "*.ts").',
  parameters: z.object({
    pattern: z.string().min(1),
    path: z.string().min(1).default('.'),
    include: z.string().optional(),
    max_results: z.number().int().min(1).max(200).optional(),
  }),
  safety: 'safe',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const root = resolvePath(ctx, args.path);
    const maxResults = args.max_results ?? 50;

    let re: RegExp;
    try {
      re = new RegExp(args.pattern);
    } catch {
      // Invalid regex: fall back to a literal match
      re = new RegExp(args.pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    }

    const out: string[] = [];
    // set once a match is found beyond max_results
    let truncated = false;

    async function scan(file: string): Promise<void> {
      const buf = await fs.readFile(file).catch(() => null);
      if (!buf || looksBinary(buf)) return;
      const lines = buf.toString('utf8').split(/\r?\n/);
      for (let i = 0; i < lines.length; i++) {
        if (!re.test(lines[i])) continue;
        if (out.length >= maxResults) {
          truncated = true;
          return;
        }
        out.push(`${rel(ctx, file)}:${i + 1}:${lines[i]}`);
      }
    }

    async function walk(dir: string, depth: number): Promise<void> {
      const ents = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
      ents.sort((a, b) => a.name.localeCompare(b.name));
      for (const ent of ents) {
        if (truncated) return;
        const full = path.join(dir, ent.name);
        if (ent.isDirectory()) {
          if (!SKIP_DIRS.has(ent.name) && depth < 6) await walk(full, depth + 1);
          continue;
        }
        if (!ent.isFile()) continue;
        if (args.include && !globishMatch(ent.name, args.include)) continue;
        await scan(full);
      }
    }

    const rootStat = await fs.stat(root);
    if (rootStat.isFile()) await scan(root);
    else await walk(root, 0);

    if (!out.length) return `No matches for pattern "${args.pattern}" in ${rel(ctx, root)}.`;
    if (truncated) out.push(`[truncated after ${maxResults} results]`);
    return out.join('\n');
  },
});

export const writeFileTool = defineTool({
  name: 'write_file',
  description: 'Create or overwrite a file with the given content. Parent directories are created.',
  parameters: z.object({
    path: z.string().min(1),
    content: z.string(),
  }),
  safety: 'confirm',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const p = resolvePath(ctx, args.path);
    const st = await fs.stat(p).catch(() => null);
    if (st?.isDirectory()) {
      throw new ToolExecutionError('conflict', `"${rel(ctx, p)}" is a directory`);
    }
    await atomicWrite(p, args.content);
    return `wrote ${rel(ctx, p)} (${Buffer.byteLength(args.content, 'utf8')} bytes)`;
  },
});

export const editFileTool = defineTool({
  name: 'edit_file',
  description:
    'Replace exactly one occurrence of old_text with new_text in a file. ' +
    'old_text must match the file exactly, including whitespace.',
  parameters: z.object({
    path: z.string().min(1),
    old_text: z.string().min(1),
    new_text: z.string(),
  }),
  safety: 'confirm',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const p = resolvePath(ctx, args.path);
    const shown = rel(ctx, p);
    const text = await fs.readFile(p, 'utf8');

    const first = text.indexOf(args.old_text);
    if (first === -1) {
      throw new ToolExecutionError(
        'not_found',
        `old_text not found in ${shown}`,
        'read_file the region first and copy the text exactly'
      );
    }
    const second = text.indexOf(args.old_text, first + 1);
    if (second !== -1) {
      throw new ToolExecutionError(
        'conflict',
        `old_text matches more than once in ${shown}`,
        'include more surrounding lines to make it unique'
      );
    }

    const next = text.slice(0, first) + args.new_text + text.slice(first + args.old_text.length);
    await atomicWrite(p, next);
    const line = text.slice(0, first).split('\n').length;
    return `edited ${shown} at line ${line}`;
  },
});

export const deleteFileTool = defineTool({
  name: 'delete_file',
  description: 'Delete a single file. Directories are refused.',
  parameters: z.object({ path: z.string().min(1) }),
  safety: 'confirm',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const p = resolvePath(ctx, args.path);
    const st = await fs.lstat(p);
    if (st.isDirectory()) {
      throw new ToolExecutionError('conflict', `"${rel(ctx, p)}" is a directory; only files can be deleted`);
    }
    await fs.unlink(p);
    return `deleted ${rel(ctx, p)}`;
  },
});

export const createDirectoryTool = defineTool({
  name: 'create_directory',
  description: 'Create a directory, including missing parents.',
  parameters: z.object({ path: z.string().min(1) }),
  safety: 'safe',
  category: 'file',
  guard: { paths: ['path'] },
  async run(args, ctx) {
    const p = resolvePath(ctx, args.path);
    await fs.mkdir(p, { recursive: true });
    return `created ${rel(ctx, p)}`;
  },
});

async function requireFile(ctx: ToolContext, p: string, role: string): Promise<number> {
  const st = await fs.stat(p).catch(() => null);
  if (!st) throw new ToolExecutionError('not_found', `${role} not found: ${rel(ctx, p)}`);
  if (!st.isFile()) throw new ToolExecutionError('invalid_args', `"${rel(ctx, p)}" is not a file`);
  return st.size;
}

export const copyFileTool = defineTool({
  name: 'copy_file',
  description:
    'Copy a file. Missing parent directories of the destination are created. ' +
    'An existing destination is only replaced with overwrite=true.',
  parameters: z.object({
    source: z.string().min(1),
    destination: z.string().min(1),
    overwrite: z.boolean().default(false),
  }),
  safety: 'confirm',
  category: 'file',
  guard: { paths: ['source', 'destination'] },
  async run(args, ctx) {
    const src = resolvePath(ctx, args.source);
    const dest = resolvePath(ctx, args.destination);
    const size = await requireFile(ctx, src, 'source file');

    const existing = await fs.lstat(dest).catch(() => null);
    if (existing?.isDirectory()) {
      throw new ToolExecutionError('conflict', `"${rel(ctx, dest)}" is a directory`);
    }
    if (existing && !args.overwrite) {
      throw new ToolExecutionError('conflict', `"${rel(ctx, dest)}" already exists`, 'pass overwrite=true to replace it');
    }

    await fs.mkdir(path.dirname(dest), { recursive: true });
    await fs.copyFile(src, dest, args.overwrite ? 0 : fsConstants.COPYFILE_EXCL);
    return `copied ${rel(ctx, src)} to ${rel(ctx, dest)} (${size} bytes)`;
  },
});

export const diffFilesTool = defineTool({
  name: 'diff_files',
  description: 'Compare two text files as a unified diff with context_lines lines of context (default 3).',
  parameters: z.object({
    file1: z.string().min(1),
    file2: z.string().min(1),
    context_lines: z.number().int().min(0).max(20).default(3),
  }),
  safety: 'safe',
  category: 'file',
  guard: { paths: ['file1', 'file2'] },
  async run(args, ctx) {
    const a = resolvePath(ctx, args.file1);
    const b = resolvePath(ctx, args.file2);
    await requireFile(ctx, a, 'file');
    await requireFile(ctx, b, 'file');

    const base = path.resolve(ctx.cwd);
    // --no-index exits 1 when the files differ
    const r = await gitExec(
      ctx,
      [
        'diff',
        '--no-index',
        '--no-color',
        '--no-ext-diff',
        '--src-prefix=a/',
        '--dst-prefix=b/',
        `-U${args.context_lines}`,
        '--',
        path.relative(base, a),
        path.relative(base, b),
      ],
      { okCodes: [0, 1] }
    );
    if (r.rc === 0) return `[files are identical: ${rel(ctx, a)} and ${rel(ctx, b)}]`;

    let added = 0;
    let removed = 0;
    let inHunk = false;
    for (const line of r.out.split('\n')) {
      if (line.startsWith('@@')) inHunk = true;
      else if (inHunk && line.startsWith('+')) added++;
      else if (inHunk && line.startsWith('-')) removed++;
    }
    return `${clipLines(r.out.trimEnd(), 800)}\n[${added} added, ${removed} removed]`;
  },
});
