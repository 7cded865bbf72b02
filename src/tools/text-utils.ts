/**
 * Pure text-processing helpers used by tool implementations.
 */

/** Strip ANSI escape sequences from a string. */
export function stripAnsi(s: string): string {
  return s
    .replace(/\u001b\[[0-9;]*[A-Za-z]/g, '')
    .replace(/\u001b\][^\u0007]*\u0007/g, '')
    .replace(/\u001b[()][AB012]/g, '')
    .replace(/\u001b[=>Nc7-9]/g, '');
}

/** Truncate a string to maxBytes (UTF-8), appending a truncation notice. */
export function truncateBytes(
  s: string,
  maxBytes: number,
  totalBytesHint?: number
): { text: string; truncated: boolean } {
  const b = Buffer.from(s, 'utf8');
  const total =
    typeof totalBytesHint === 'number' && Number.isFinite(totalBytesHint)
      ? totalBytesHint
      : b.length;
  if (b.length <= maxBytes) return { text: s, truncated: false };
  const cut = b.subarray(0, maxBytes);
  return { text: cut.toString('utf8') + `\n[truncated, ${total} bytes total]`, truncated: true };
}

/** NUL byte in the first 512 bytes means binary. */
export function looksBinary(buf: Buffer): boolean {
  for (let i = 0; i < Math.min(buf.length, 512); i++) {
    if (buf[i] === 0) return true;
  }
  return false;
}

/** Minimal glob: exact name, `*.ext`, or `prefix*`. */
export function globishMatch(name: string, glob: string): boolean {
  if (glob === name) return true;
  const ext = /^\*\.(.+)$/.exec(glob);
  if (ext) return name.endsWith('.' + ext[1]);
  if (glob.endsWith('*') && !glob.slice(0, -1).includes('*')) {
    return name.startsWith(glob.slice(0, -1));
  }
  return false;
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Readable text from an HTML document: scripts/styles dropped, tags removed, blank runs collapsed. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript|svg)[\s\S]*?<\/\1>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|h[1-6]|li|tr|section|article|header|footer)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(#\d+|[a-z]+);/gi, (m, ent: string) => {
      if (ent.startsWith('#')) return String.fromCharCode(Number(ent.slice(1)));
      return ENTITIES[ent.toLowerCase()] ?? m;
    })
    .split('\n')
    .map((l) => l.replace(/[ \t]+/g, ' ').trim())
    .filter((l, i, arr) => l !== '' || (i > 0 && arr[i - 1] !== ''))
    .join('\n')
    .trim();
}
