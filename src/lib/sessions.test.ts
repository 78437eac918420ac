import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createContext } from '../engine/context';
import { configureLogging } from './logging';
import { FileSessionStore, MemorySessionStore } from './sessions';

describe('MemorySessionStore', () => {
  it('stores copies, not live objects', async () => {
    const store = new MemorySessionStore();
    const ctx = createContext();
    await store.put('sam', ctx);
    ctx.help_count = 2;
    expect((await store.get('sam'))?.help_count).toBe(0);
  });

  it('deletes', async () => {
    const store = new MemorySessionStore();
    await store.put('sam', createContext());
    await store.delete('sam');
    expect(await store.get('sam')).toBeUndefined();
  });
});

describe('FileSessionStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sessions-'));
    configureLogging({ dir: path.join(dir, 'logs'), echo: false });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('round-trips a context through disk', async () => {
    const store = new FileSessionStore(path.join(dir, 'sessions'));
    const ctx = createContext();
    ctx.last_topic = 'calm';
    ctx.used_responses.calm = [2];
    await store.put('sam', ctx);
    expect(await new FileSessionStore(path.join(dir, 'sessions')).get('sam')).toEqual(ctx);
  });

  it('returns undefined for unknown users and tolerates deleting them', async () => {
    const store = new FileSessionStore(dir);
    expect(await store.get('nobody')).toBeUndefined();
    await expect(store.delete('nobody')).resolves.toBeUndefined();
  });

  it('treats corrupt files as missing', async () => {
    const store = new FileSessionStore(dir);
    await fs.writeFile(path.join(dir, 'broken.json'), '{not json', 'utf8');
    await fs.writeFile(path.join(dir, 'odd.json'), JSON.stringify({ last_topic: 'weather' }), 'utf8');
    expect(await store.get('broken')).toBeUndefined();
    expect(await store.get('odd')).toBeUndefined();
  });
});
