import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

export async function readUtf8(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf8');
}

export async function mkdirp(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

// The temp file sits beside the target so rename never crosses devices.
export async function writeAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await mkdirp(dir);
  const tmpFile = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  await fs.writeFile(tmpFile, content, 'utf8');
  await fs.rename(tmpFile, filePath);
}

export async function readJsonOr(filePath: string, fallback: unknown): Promise<unknown> {
  let raw: string;
  try {
    raw = await readUtf8(filePath);
  } catch (err) {
    if (isMissingFile(err)) return fallback;
    throw err;
  }
  return JSON.parse(raw);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function rollByDate(prefix: string, ext: string): string {
  const now = new Date();
  const stamp = now.toISOString().slice(0, 10).replace(/-/g, '');
  return `${prefix}-${stamp}.${ext}`;
}

/**
 * Runs tasks for the same key one after another. Used to serialize
 * read-modify-write cycles on a per-user file.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.catch(() => undefined);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }
}
