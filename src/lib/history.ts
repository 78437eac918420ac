import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  EMOTION_TAGS,
  INTENT_TAGS,
  SENTIMENTS,
  TOPICS,
  type ChatTurnRecord,
} from '../engine/types';
import { isMissingFile, KeyedLock, readJsonOr, writeAtomic } from './fsutil';

export type HistoryLog = {
  append(user: string, record: ChatTurnRecord): Promise<void>;
  read(user: string): Promise<ChatTurnRecord[]>;
  clear(user: string): Promise<void>;
};

export const DEFAULT_HISTORY_LIMIT = 50;

const RecordSchema = z.object({
  timestamp: z.string(),
  input: z.string(),
  response: z.string(),
  topic: z.enum(TOPICS),
  intent: z.enum(INTENT_TAGS).nullable(),
  emotion: z.enum(EMOTION_TAGS),
  sentiment: z.enum(SENTIMENTS),
  key_phrases: z.array(z.string()),
});

const stored = z.array(z.unknown());

/**
 * Per-user JSON array of turns, newest last, cut to the most recent `limit`.
 * Rows that no longer fit the record shape are dropped on read.
 */
export class FileHistoryLog implements HistoryLog {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly dir: string,
    private readonly limit = DEFAULT_HISTORY_LIMIT,
  ) {}

  private fileFor(user: string): string {
    return path.join(this.dir, `${user}.json`);
  }

  private async load(user: string): Promise<ChatTurnRecord[]> {
    const parsed = stored.safeParse(await readJsonOr(this.fileFor(user), []));
    if (!parsed.success) return [];
    const out: ChatTurnRecord[] = [];
    for (const row of parsed.data) {
      const rec = RecordSchema.safeParse(row);
      if (rec.success) out.push(rec.data);
    }
    return out;
  }

  append(user: string, record: ChatTurnRecord): Promise<void> {
    return this.lock.run(user, async () => {
      const rows = await this.load(user);
      rows.push(record);
      await writeAtomic(this.fileFor(user), JSON.stringify(rows.slice(-this.limit), null, 2));
    });
  }

  read(user: string): Promise<ChatTurnRecord[]> {
    return this.lock.run(user, () => this.load(user));
  }

  clear(user: string): Promise<void> {
    return this.lock.run(user, async () => {
      try {
        await fs.unlink(this.fileFor(user));
      } catch (err) {
        if (!isMissingFile(err)) throw err;
      }
    });
  }
}
