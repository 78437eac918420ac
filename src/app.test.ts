import { promises as fs } from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from './app';
import { ChatService } from './chat/service';
import { createDialogueEngine } from './engine/dialogue';
import { defaultTemplateLibrary } from './engine/resources';
import { FileHistoryLog } from './lib/history';
import { configureLogging } from './lib/logging';
import { MemorySessionStore } from './lib/sessions';
import { TokenRegistry } from './lib/tokens';
import { FileUserRegistry } from './lib/users';

const LoginReply = z.object({ message: z.string(), username: z.string(), token: z.string() });
const HistoryReply = z.object({ username: z.string(), history: z.array(z.object({ input: z.string() })) });

describe('HTTP routes', () => {
  let dir: string;
  let server: http.Server;
  let base: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'app-'));
    configureLogging({ dir: path.join(dir, 'logs'), echo: false });
    const service = new ChatService({
      engine: createDialogueEngine(),
      sessions: new MemorySessionStore(),
      history: new FileHistoryLog(path.join(dir, 'history')),
      users: new FileUserRegistry(dir),
      tokens: new TokenRegistry(),
    });
    server = http.createServer(createApp(service, { templateKeys: () => 17 }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await fs.rm(dir, { recursive: true, force: true });
  });

  function post(route: string, body: unknown, token?: string) {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (token) headers['x-session-token'] = token;
    return fetch(`${base}${route}`, { method: 'POST', headers, body: JSON.stringify(body) });
  }

  async function login(username: string): Promise<string> {
    const res = await post('/login', { username });
    return LoginReply.parse(await res.json()).token;
  }

  it('reports health', async () => {
    const res = await fetch(`${base}/healthz`);
    expect(await res.json()).toEqual({ ok: true, templates: 17 });
  });

  it('logs in', async () => {
    const res = await post('/login', { username: ' Sam ' });
    expect(res.status).toBe(200);
    const body = LoginReply.parse(await res.json());
    expect(body.message).toBe('Welcome sam!');
    expect(body.username).toBe('sam');
    expect(body.token).toHaveLength(32);
  });

  it('requires a username', async () => {
    for (const payload of [{}, { username: '  ' }, { username: 42 }]) {
      const res = await post('/login', payload);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Username is required.' });
    }
  });

  it('refuses chat and history without a token', async () => {
    const chat = await post('/chat', { message: 'hello' });
    expect(chat.status).toBe(403);
    expect(await chat.json()).toEqual({ error: 'Login required' });
    const history = await fetch(`${base}/history`);
    expect(history.status).toBe(403);
  });

  it('chats and keeps history', async () => {
    const token = await login('sam');
    const res = await post('/chat', { message: 'help' }, token);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      response: defaultTemplateLibrary().escalations.help[0],
      emotion: 'listening',
      suggestions: ['I feel stressed', 'I feel sad', 'I need motivation', 'Can we do a breathing exercise?'],
      topic: 'listening',
    });

    const history = await fetch(`${base}/history`, { headers: { authorization: `Bearer ${token}` } });
    const body = HistoryReply.parse(await history.json());
    expect(body.username).toBe('sam');
    expect(body.history.map((r) => r.input)).toEqual(['help']);
  });

  it('rejects a bad chat body', async () => {
    const token = await login('sam');
    const res = await post('/chat', { message: 7 }, token);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'A message string is required.' });
  });

  it('answers malformed JSON with 400', async () => {
    const res = await fetch(`${base}/login`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"username":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Malformed JSON body.' });
  });

  it('answers an oversized body with 413', async () => {
    const token = await login('sam');
    const res = await post('/chat', { message: 'a'.repeat(20_000) }, token);
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request body too large.' });
  });

  it('logs out', async () => {
    const token = await login('sam');
    const out = await post('/logout', {}, token);
    expect(await out.json()).toEqual({ message: 'Logged out.' });
    expect((await post('/chat', { message: 'hello' }, token)).status).toBe(403);
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
