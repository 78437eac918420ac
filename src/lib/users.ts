import path from 'path';
import { z } from 'zod';
import { KeyedLock, readJsonOr, writeAtomic } from './fsutil';
import { logEvent } from './logging';

export const UsernameSchema = z
  .string()
  .transform((s) => s.trim().toLowerCase())
  .pipe(
    z
      .string()
      .min(1, 'Username is required.')
      .max(40, 'Username is too long.')
      .regex(/^[a-z0-9][a-z0-9_.-]*$/, 'Username may only contain letters, digits, dots, dashes and underscores.'),
  );

const UserRecordSchema = z.object({
  created: z.string(),
  last_login: z.string().optional(),
});

export type UserRecord = z.infer<typeof UserRecordSchema>;

const UsersFileSchema = z.record(z.string(), UserRecordSchema);

export type UserRegistry = {
  register(username: string): Promise<{ user: UserRecord; created: boolean }>;
};

/** `users.json` keyed by normalized username. */
export class FileUserRegistry implements UserRegistry {
  private readonly file: string;
  private readonly lock = new KeyedLock();

  constructor(dataDir: string) {
    this.file = path.join(dataDir, 'users.json');
  }

  private async readAll(): Promise<Record<string, UserRecord>> {
    const parsed = UsersFileSchema.safeParse(await readJsonOr(this.file, {}));
    if (!parsed.success) {
      await logEvent({ type: 'users.invalid', level: 'warn', payload: { file: this.file } });
      return {};
    }
    return parsed.data;
  }

  register(username: string): Promise<{ user: UserRecord; created: boolean }> {
    return this.lock.run('users', async () => {
      const users = await this.readAll();
      const now = new Date().toISOString();
      const existing = users[username];
      const user: UserRecord = existing ? { ...existing, last_login: now } : { created: now, last_login: now };
      users[username] = user;
      await writeAtomic(this.file, JSON.stringify(users, null, 2));
      if (!existing) await logEvent({ type: 'user.created', payload: { user: username } });
      return { user, created: !existing };
    });
  }
}
