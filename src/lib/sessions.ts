import { promises as fs } from 'fs';
import path from 'path';
import { parseContext } from '../engine/context';
import type { DialogueContext } from '../engine/types';
import { isMissingFile, readJsonOr, writeAtomic } from './fsutil';
import { logEvent } from './logging';

export type SessionStore = {
  get(user: string): Promise<DialogueContext | undefined>;
  put(user: string, context: DialogueContext): Promise<void>;
  delete(user: string): Promise<void>;
};

export class MemorySessionStore implements SessionStore {
  private readonly contexts = new Map<string, string>();

  async get(user: string): Promise<DialogueContext | undefined> {
    const raw = this.contexts.get(user);
    if (raw === undefined) return undefined;
    return parseContext(JSON.parse(raw)) ?? undefined;
  }

  async put(user: string, context: DialogueContext): Promise<void> {
    // Stored serialized so callers never share a live object with the store.
    this.contexts.set(user, JSON.stringify(context));
  }

  async delete(user: string): Promise<void> {
    this.contexts.delete(user);
  }
}

/** One JSON file per user under `dir`; survives restarts. */
export class FileSessionStore implements SessionStore {
  constructor(private readonly dir: string) {}

  private fileFor(user: string): string {
    return path.join(this.dir, `${user}.json`);
  }

  async get(user: string): Promise<DialogueContext | undefined> {
    let raw: unknown;
    try {
      raw = await readJsonOr(this.fileFor(user), undefined);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      raw = null;
    }
    if (raw === undefined) return undefined;
    const context = parseContext(raw);
    if (!context) {
      await logEvent({ type: 'session.invalid', level: 'warn', payload: { user } });
      return undefined;
    }
    return context;
  }

  async put(user: string, context: DialogueContext): Promise<void> {
    await writeAtomic(this.fileFor(user), JSON.stringify(context, null, 2));
  }

  async delete(user: string): Promise<void> {
    try {
      await fs.unlink(this.fileFor(user));
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
  }
}
