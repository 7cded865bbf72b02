/**
 * Safety gate: graduated permission checks run before every tool call.
 *
 * Three tiers for shell commands:
 * - FORBIDDEN: Always denied, even in yolo mode. Hard stop, no override.
 * - CAUTIOUS:  Require explicit confirmation. Lockdown promotes these to denied.
 * - FREE:      No restrictions.
 *
 * Also enforces:
 * - Path traversal detection (symlink escape, ../ escape outside the workspace)
 * - Protected path restrictions (system-critical files are never touched)
 * - User-configurable overrides from the `safety` config section
 *
 * Only arguments a tool declares in its `guard` are inspected, so the same string
 * is dangerous in `execute_command.cmd` and harmless in `write_file.content`.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { createLogger } from './log.js';
import { isWithinDir } from './tools/path-safety.js';
import type { ToolSpec, Verdict } from './types.js';

const log = createLogger('safety');

type Pattern = { re: RegExp; reason: string };

// ──────────────────────────────────────────────────────
// Forbidden patterns: ALWAYS denied, even in yolo mode
// ──────────────────────────────────────────────────────

export const FORBIDDEN_PATTERNS: Pattern[] = [
  // Wipe root / home / system directories
  { re: /\brm\s+(-\w*[rf]\w*\s+)*\s*\/\s*$/, reason: 'rm targeting /' },
  { re: /\brm\s+(-\w*[rf]\w*\s+)+\/(\s|$)/, reason: 'rm -rf /' },
  { re: /\brm\s+(-\w*[rf]\w*\s+)+\/\*/, reason: 'rm -rf /*' },
  {
    re: /\brm\s+(-\w*[rf]\w*\s+)+\/(boot|etc|usr|lib|sbin|bin|var|sys|proc|dev)\b/,
    reason: 'rm targeting system directory',
  },
  { re: /\brm\s+(-\w*[rf]\w*\s+)+~\/?(\s|$)/, reason: 'rm targeting home directory' },
  { re: /\brm\s+(-\w*[rf]\w*\s+)+\$HOME\b/, reason: 'rm targeting $HOME' },
  { re: /\brm\s+.*--no-preserve-root\b/, reason: 'rm --no-preserve-root' },

  // Block device / partition destruction
  { re: /\bdd\b.*\bof\s*=\s*\/dev\//, reason: 'dd writing to block device' },
  { re: /\bmkfs(\.\w+)?\b/, reason: 'mkfs (filesystem creation)' },
  { re: /\bfdisk\b/, reason: 'fdisk (partition table modification)' },
  { re: /\bparted\b/, reason: 'parted (partition modification)' },
  { re: />\s*\/dev\/(sd|nvme|hd|vd)\w*/, reason: 'redirect onto block device' },

  // Boot/kernel destruction
  { re: /\bupdate-grub\b/, reason: 'GRUB modification' },
  { re: /\bgrub-install\b/, reason: 'GRUB installation' },

  // Recursive permission nuke
  {
    re: /\bchmod\s+(-\w*R\w*\s+)*(0?777|a\+rwx)\s+\/\s*$/,
    reason: 'chmod 777 / (recursive permission nuke)',
  },
  { re: /\bchown\s+(-\w*R\w*\s+).*\s+\/\s*$/, reason: 'chown targeting /' },

  // Fork bomb
  { re: /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, reason: 'fork bomb' },

  // Direct passwd/shadow manipulation
  { re: />\s*\/etc\/passwd\b/, reason: 'overwriting /etc/passwd' },
  { re: />\s*\/etc\/shadow\b/, reason: 'overwriting /etc/shadow' },

  // Disable firewall entirely
  { re: /\bufw\s+disable\b/, reason: 'disabling firewall' },
  { re: /\biptables\s+-F\b/, reason: 'flushing all iptables rules' },

  // System shutdown/reboot (model shouldn't decide this)
  { re: /\b(shutdown|reboot|poweroff|halt|init\s+[06])\b/, reason: 'system shutdown/reboot' },

  // Wipe entire git history
  { re: /\bgit\s+push\s+--mirror\b/, reason: 'git mirror push (overwrites remote)' },
];

// ──────────────────────────────────────────────────────
// Cautious patterns: require confirmation
// ──────────────────────────────────────────────────────

export const CAUTIOUS_PATTERNS: Pattern[] = [
  // Recursive delete (non-system paths)
  { re: /\brm\s+(-\w*[rf]\w*\s+)/, reason: 'rm with -r or -f flags' },

  // Sudo escalation
  { re: /\bsudo\b/, reason: 'sudo (privilege escalation)' },

  // Remote code execution
  { re: /\bcurl\b.*\|\s*(ba)?sh\b/, reason: 'piping curl to shell' },
  { re: /\bwget\b.*\|\s*(ba)?sh\b/, reason: 'piping wget to shell' },

  // Git force operations
  { re: /\bgit\s+push\s+.*--force\b/, reason: 'git force push' },
  { re: /\bgit\s+push\s+-f\b/, reason: 'git force push' },
  { re: /\bgit\s+reset\s+--hard\b/, reason: 'git reset --hard' },
  { re: /\bgit\s+clean\s+-[dfx]/, reason: 'git clean (removes untracked files)' },
  { re: /\bgit\s+checkout\s+--\s+\S+/, reason: 'git checkout -- (discards local file changes)' },
  { re: /\bgit\s+checkout\s+\./, reason: 'git checkout . (discards local changes)' },

  // Package management
  {
    re: /\b(apt|apt-get|dnf|yum|pacman|brew|pip|pip3|npm|pnpm|yarn)\s+(install|add|remove|purge|uninstall)\b/,
    reason: 'package install/remove',
  },

  // Service management
  {
    re: /\bsystemctl\s+(start|stop|restart|enable|disable|mask)\b/,
    reason: 'service state change',
  },

  // Network/firewall changes
  { re: /\bufw\s+(allow|deny|reject)\b/, reason: 'firewall rule change' },
  { re: /\biptables\s+(-A|-I|-D)\b/, reason: 'iptables rule change' },

  // Process control
  { re: /\b(kill|pkill|killall)\s+(-9\s+)?\S+/, reason: 'killing processes' },

  // Docker management
  { re: /\bdocker\s+(rm|rmi|system\s+prune)\b/, reason: 'docker resource removal' },

  // Dangerous file operations outside of the tool system
  { re: /\bmv\s+.*\/\.\./, reason: 'mv with path traversal' },
  { re: /\bchmod\s+-\w*R/, reason: 'recursive chmod' },

  // Remote operations
  { re: /\bssh\b/, reason: 'ssh (remote operation)' },
  { re: /\bscp\b/, reason: 'scp (remote copy)' },
  { re: /\brsync\b/, reason: 'rsync (remote sync)' },
];

// ──────────────────────────────────────────────────────
// Protected paths: file tools can NEVER touch these
// ──────────────────────────────────────────────────────

export const PROTECTED_PATHS: string[] = [
  '/boot',
  '/etc/grub.d',
  '/etc/default/grub',
  '/etc/passwd',
  '/etc/shadow',
  '/etc/sudoers',
  '/etc/fstab',
  '/proc',
  '/sys',
  '/dev',
];

/**
 * Paths that should never be the target of rm or similar bulk deletion.
 * Broader than PROTECTED_PATHS: they protect user data, not just system files.
 */
export const PROTECTED_DELETE_ROOTS: string[] = [
  '/',
  '/home',
  '/root',
  '/var',
  '/usr',
  '/lib',
  '/bin',
  '/sbin',
  '/etc',
  '/boot',
  '/opt',
];

/** The `safety` section of the config file. */
export type SafetyConfig = {
  /** Extra forbidden patterns (always denied, supplements built-ins) */
  forbidden_patterns?: string[];
  /** Extra cautious patterns (require confirmation, supplements built-ins) */
  cautious_patterns?: string[];
  /** Patterns to explicitly allow (bypass cautious for known-safe commands) */
  allow_patterns?: string[];
  /** Extra protected paths (file tools can never touch these) */
  protected_paths?: string[];
};

export type SafetyGateOptions = {
  /** Session workspace; relative path arguments resolve against it. */
  cwd: string;
  /** Extra directories path arguments may point into. */
  allowedDirs?: string[];
  /** Promote every cautious command to denied. */
  lockdown?: boolean;
  safety?: SafetyConfig;
};

function compilePatterns(patterns: string[] | undefined, label: string): Pattern[] {
  const result: Pattern[] = [];
  for (const p of patterns ?? []) {
    try {
      result.push({ re: new RegExp(p), reason: `user ${label}: ${p}` });
    } catch (e) {
      log.warn(`invalid regex in ${label}_patterns, skipped`, {
        pattern: p,
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }
  return result;
}

/** Collapse whitespace so patterns see one canonical spelling. */
export function normalizeCommand(command: string): string {
  return command.replace(/\s+/g, ' ').trim();
}

/**
 * Drop shell quoting and spell `${HOME}` as `$HOME`, so `rm -rf "/etc"` and
 * `rm -rf '/'` reach the tables in the same form as their bare spelling.
 */
export function unquoteCommand(command: string): string {
  return command
    .replace(/'([^']*)'|"([^"]*)"/g, (_m: string, single?: string, double?: string) => single ?? double ?? '')
    .replace(/\$\{HOME\}/g, '$HOME');
}

const HOME_TARGET = /^(~|\$HOME)\/*$/;

/**
 * Check if a command's rm targets a protected delete root (or a whole user home).
 * Extra protection on rm beyond the pattern tables.
 */
export function isProtectedDeleteTarget(command: string): boolean {
  for (const m of unquoteCommand(command).matchAll(/\brm\s+([^;&|]*)/g)) {
    const targets = m[1].split(/\s+/).filter((t) => t && !t.startsWith('-'));
    for (const target of targets) {
      if (HOME_TARGET.test(target)) return true;
      if (!target.startsWith('/')) continue;
      const norm = path.posix.normalize(target).replace(/\/+$/, '') || '/';
      if (PROTECTED_DELETE_ROOTS.includes(norm)) return true;
      if (/^\/home\/[^/]+$/.test(norm)) return true;
    }
  }
  return false;
}

/** realpath of the deepest existing ancestor, with the missing tail re-appended. */
async function realpathLenient(abs: string): Promise<string> {
  let current = abs;
  const tail: string[] = [];
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return tail.length ? path.join(real, ...tail.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return abs;
      tail.push(path.basename(current));
      current = parent;
    }
  }
}

export class SafetyGate {
  readonly cwd: string;
  private readonly allowedDirs: string[];
  private readonly lockdown: boolean;
  private readonly userForbidden: Pattern[];
  private readonly userCautious: Pattern[];
  private readonly userAllow: Pattern[];
  private readonly protectedPaths: string[];
  private realRoots?: Promise<string[]>;

  constructor(opts: SafetyGateOptions) {
    this.cwd = path.resolve(opts.cwd);
    this.allowedDirs = (opts.allowedDirs ?? []).map((d) => path.resolve(this.cwd, d));
    this.lockdown = opts.lockdown ?? false;
    this.userForbidden = compilePatterns(opts.safety?.forbidden_patterns, 'forbidden');
    this.userCautious = compilePatterns(opts.safety?.cautious_patterns, 'cautious');
    this.userAllow = compilePatterns(opts.safety?.allow_patterns, 'allow');
    this.protectedPaths = [
      ...PROTECTED_PATHS,
      ...(opts.safety?.protected_paths ?? []).map((p) => path.resolve(p)),
    ];
  }

  /** Evaluate a pending tool call. Deny beats confirm; confirm beats allow. */
  async check(spec: ToolSpec, args: Record<string, unknown>): Promise<Verdict> {
    if (spec.safety === 'blocked') {
      log.debug('deny blocked tool', { tool: spec.name });
      return { kind: 'deny', reason: `blocked tool: ${spec.name}` };
    }

    let pending: Verdict | undefined;

    for (const key of spec.guard?.command ?? []) {
      const value = args[key];
      if (typeof value !== 'string') continue;
      const verdict = this.checkCommand(value);
      if (verdict.kind === 'deny') return verdict;
      if (verdict.kind === 'confirm' && !pending) pending = verdict;
    }

    for (const key of spec.guard?.paths ?? []) {
      const value = args[key];
      if (typeof value !== 'string' || !value.trim()) continue;
      const reason = await this.checkPath(value);
      if (reason) return { kind: 'deny', reason };
    }

    if (pending) return pending;

    if (spec.safety === 'confirm') {
      const summary = summarizeCall(spec.name, args);
      return {
        kind: 'confirm',
        reason: `${spec.name} requires approval`,
        prompt: summary,
      };
    }
    return { kind: 'allow' };
  }

  /** Screen a shell command against the forbidden/cautious tables. */
  checkCommand(command: string): Verdict {
    const cmd = normalizeCommand(command);
    const bare = unquoteCommand(cmd);
    const matches = (re: RegExp) => re.test(cmd) || (bare !== cmd && re.test(bare));

    for (const { re, reason } of [...FORBIDDEN_PATTERNS, ...this.userForbidden]) {
      if (matches(re)) {
        log.warn(`denied: ${reason}`, { cmd });
        return { kind: 'deny', reason: `blocked pattern: ${reason}` };
      }
    }

    if (isProtectedDeleteTarget(cmd)) {
      log.warn('denied: rm targeting protected directory', { cmd });
      return { kind: 'deny', reason: 'blocked pattern: rm targeting protected directory' };
    }

    for (const { re, reason } of [...CAUTIOUS_PATTERNS, ...this.userCautious]) {
      if (!matches(re)) continue;
      if (this.userAllow.some((a) => a.re.test(cmd))) {
        log.debug('allowed by allow_patterns', { cmd });
        return { kind: 'allow' };
      }
      if (this.lockdown) {
        log.warn(`denied (lockdown): ${reason}`, { cmd });
        return { kind: 'deny', reason: `blocked pattern (lockdown): ${reason}` };
      }
      log.debug(`cautious: ${reason}`, { cmd });
      return {
        kind: 'confirm',
        reason,
        prompt: `Cautious command (${reason}): ${command}`,
      };
    }

    return { kind: 'allow' };
  }

  /**
   * Resolve a path argument against the workspace.
   * Returns a denial reason, or null when the path is acceptable.
   */
  async checkPath(p: string): Promise<string | null> {
    const abs = path.resolve(this.cwd, p);

    for (const pp of this.protectedPaths) {
      if (abs === pp || abs.startsWith(pp + '/')) {
        log.warn('denied: protected path', { path: abs });
        return `protected path: ${pp}`;
      }
    }

    const roots = [this.cwd, ...this.allowedDirs];
    if (!roots.some((r) => isWithinDir(abs, r))) {
      log.warn('denied: outside workspace', { path: abs });
      return `path traversal: ${p} is outside the workspace ${this.cwd}`;
    }

    // Lexically inside; make sure a symlink does not lead back out.
    const real = await realpathLenient(abs);
    const realRoots = await this.resolvedRoots();
    if (!realRoots.some((r) => isWithinDir(real, r))) {
      log.warn('denied: symlink escape', { path: abs, real });
      return `path traversal: ${p} resolves to ${real} (outside the workspace)`;
    }
    return null;
  }

  private resolvedRoots(): Promise<string[]> {
    this.realRoots ??= Promise.all(
      [this.cwd, ...this.allowedDirs].map((r) => realpathLenient(r))
    );
    return this.realRoots;
  }
}

/** Human-readable one-liner for confirmation prompts. */
export function summarizeCall(tool: string, args: Record<string, unknown>): string {
  const pick = (k: string) => (typeof args[k] === 'string' ? String(args[k]) : undefined);
  const source = pick('source');
  const destination = pick('destination');
  const copy = source && destination ? `${source} -> ${destination}` : undefined;
  const ref = [pick('action'), pick('remote'), pick('branch') ?? pick('branch_name')].filter(Boolean).join(' ');
  const target = pick('cmd') ?? pick('path') ?? copy ?? pick('url') ?? pick('message') ?? (ref || undefined);
  return target ? `${tool}: ${target}` : tool;
}
