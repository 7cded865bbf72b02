import fs from 'node:fs/promises';
import path from 'node:path';

/**
 * Write via temp file + rename so readers never see a partial file.
 * Keeps the original file's mode unless `mode` is given.
 */
export async function atomicWrite(
  absPath: string,
  data: string | Buffer,
  opts: { mode?: number; dirMode?: number } = {}
): Promise<void> {
  const dir = path.dirname(absPath);
  await fs.mkdir(dir, { recursive: true, mode: opts.dirMode });

  const origStat = await fs.stat(absPath).catch(() => null);
  const mode = opts.mode ?? (origStat ? origStat.mode & 0o7777 : undefined);

  const tmp = path.join(dir, `.${path.basename(absPath)}.tmp.${process.pid}.${Date.now()}`);
  try {
    await fs.writeFile(tmp, data, { mode });
    if (mode != null) await fs.chmod(tmp, mode);
    await fs.rename(tmp, absPath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}
