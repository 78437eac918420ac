import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { configureLogging } from './logging';
import { TokenRegistry } from './tokens';
import { FileUserRegistry, UsernameSchema } from './users';

describe('UsernameSchema', () => {
  it('trims and lowercases', () => {
    expect(UsernameSchema.parse('  Sam.K ')).toBe('sam.k');
  });

  it.each([
    ['', 'Username is required.'],
    ['   ', 'Username is required.'],
    ['x'.repeat(41), 'Username is too long.'],
    ['../etc', 'Username may only contain letters, digits, dots, dashes and underscores.'],
  ])('rejects %j', (raw, message) => {
    const result = UsernameSchema.safeParse(raw);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.issues[0].message).toBe(message);
  });
});

describe('FileUserRegistry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'users-'));
    configureLogging({ dir: path.join(dir, 'logs'), echo: false });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates a user once and records later logins', async () => {
    const users = new FileUserRegistry(dir);
    const first = await users.register('sam');
    const second = await users.register('sam');
    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.user.created).toBe(first.user.created);

    const saved = JSON.parse(await fs.readFile(path.join(dir, 'users.json'), 'utf8'));
    expect(Object.keys(saved)).toEqual(['sam']);
  });
});

describe('TokenRegistry', () => {
  it('issues, resolves and revokes tokens', () => {
    const tokens = new TokenRegistry();
    const token = tokens.issue('sam');
    expect(token).toHaveLength(32);
    expect(tokens.resolve(token)).toBe('sam');
    expect(tokens.resolve(undefined)).toBeUndefined();
    expect(tokens.revoke(token)).toBe('sam');
    expect(tokens.resolve(token)).toBeUndefined();
    expect(tokens.revoke(token)).toBeUndefined();
  });

  it('lets idle tokens lapse and extends tokens in use', () => {
    let clock = 0;
    const tokens = new TokenRegistry(1000, () => clock);
    const idle = tokens.issue('sam');
    const busy = tokens.issue('kim');
    clock = 900;
    expect(tokens.resolve(busy)).toBe('kim');
    clock = 1500;
    expect(tokens.resolve(idle)).toBeUndefined();
    expect(tokens.resolve(busy)).toBe('kim');
  });

  it('drops lapsed tokens when issuing', () => {
    let clock = 0;
    const tokens = new TokenRegistry(1000, () => clock);
    tokens.issue('sam');
    clock = 2000;
    tokens.issue('kim');
    expect(tokens.size).toBe(1);
  });
});
