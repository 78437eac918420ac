import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDialogueEngine } from '../engine/dialogue';
import { defaultTemplateLibrary } from '../engine/resources';
import { FileHistoryLog, type HistoryLog } from '../lib/history';
import { configureLogging, currentLogFile } from '../lib/logging';
import { MemorySessionStore } from '../lib/sessions';
import { TokenRegistry } from '../lib/tokens';
import { FileUserRegistry } from '../lib/users';
import { ChatService } from './service';

describe('ChatService', () => {
  let dir: string;
  let sessions: MemorySessionStore;
  let service: ChatService;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'service-'));
    configureLogging({ dir: path.join(dir, 'logs'), echo: false });
    sessions = new MemorySessionStore();
    service = new ChatService({
      engine: createDialogueEngine(),
      sessions,
      history: new FileHistoryLog(path.join(dir, 'history')),
      users: new FileUserRegistry(dir),
      tokens: new TokenRegistry(),
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true, maxRetries: 5 });
  });

  it('logs in with a fresh context and a token', async () => {
    const login = await service.login('sam');
    expect(login.created).toBe(true);
    expect(service.userFor(login.token)).toBe('sam');
    expect(await sessions.get('sam')).toMatchObject({ last_topic: 'none', help_count: 0 });
  });

  it('carries the context from turn to turn', async () => {
    await service.login('sam');
    const escalations = defaultTemplateLibrary().escalations.help;
    expect((await service.turn('sam', 'help')).response).toBe(escalations[0]);
    expect((await service.turn('sam', 'help')).response).toBe(escalations[1]);
    expect((await service.turn('sam', 'help')).topic).toBe('crisis');
  });

  it('starts over on a new login', async () => {
    await service.login('sam');
    await service.turn('sam', 'help');
    await service.login('sam');
    expect((await sessions.get('sam'))?.help_count).toBe(0);
  });

  it('serializes concurrent turns of one user', async () => {
    await service.login('sam');
    await Promise.all([service.turn('sam', 'help'), service.turn('sam', 'help')]);
    expect((await sessions.get('sam'))?.help_count).toBe(2);
  });

  it('records each turn in the history', async () => {
    await service.login('sam');
    await service.turn('sam', 'I feel sad');
    await service.turn('sam', 'hello');
    const history = await service.history('sam');
    expect(history.map((r) => [r.input, r.topic])).toEqual([
      ['I feel sad', 'sadness'],
      ['hello', 'neutral'],
    ]);
  });

  it('logs out by revoking the token and dropping the context', async () => {
    const { token } = await service.login('sam');
    await service.logout(token);
    expect(service.userFor(token)).toBeUndefined();
    expect(await sessions.get('sam')).toBeUndefined();
    await expect(service.logout(undefined)).resolves.toBeUndefined();
    await expect(service.logout('unknown-token')).resolves.toBeUndefined();
  });

  it('keeps answering when the history write fails', async () => {
    const broken: HistoryLog = {
      append: () => Promise.reject(new Error('disk full')),
      read: async () => [],
      clear: async () => undefined,
    };
    const fragile = new ChatService({
      engine: createDialogueEngine(),
      sessions,
      history: broken,
      users: new FileUserRegistry(dir),
      tokens: new TokenRegistry(),
    });
    await fragile.login('sam');
    const reply = await fragile.turn('sam', 'I feel sad');
    expect(reply.topic).toBe('sadness');

    await vi.waitFor(async () => {
      const lines = (await fs.readFile(currentLogFile(), 'utf8')).trim().split('\n');
      const failure = lines.map((line) => JSON.parse(line)).find((entry) => entry.type === 'history.append_failed');
      expect(failure).toMatchObject({ level: 'error', payload: { user: 'sam', msg: 'disk full' } });
    });
  });
});
