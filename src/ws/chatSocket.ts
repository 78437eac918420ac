import type { Server } from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { z } from 'zod';
import type { ChatService } from '../chat/service';
import { emit, errorPayload } from '../lib/logging';
import { UsernameSchema } from '../lib/users';
import { MAX_MESSAGE_LENGTH } from '../routes/chat';

const ClientFrame = z.discriminatedUnion('type', [
  z.object({ type: z.literal('login'), username: UsernameSchema }),
  z.object({ type: z.literal('message'), text: z.string().max(MAX_MESSAGE_LENGTH) }),
  z.object({ type: z.literal('logout') }),
]);

type ClientFrame = z.infer<typeof ClientFrame>;

export type ServerFrame =
  | { type: 'system'; text: string }
  | { type: 'session'; username: string; token: string }
  | { type: 'assistant'; text: string; emotion: string; suggestions: string[]; topic: string }
  | { type: 'error'; message: string };

function send(ws: WebSocket, frame: ServerFrame) {
  if (ws.readyState === ws.OPEN) ws.send(JSON.stringify(frame));
}

function parseFrame(data: RawData): ClientFrame | string {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString());
  } catch {
    return 'Malformed frame.';
  }
  const parsed = ClientFrame.safeParse(raw);
  if (!parsed.success) return parsed.error.issues[0]?.message ?? 'Unknown frame.';
  return parsed.data;
}

export function attachChatSocket(server: Server, service: ChatService, path = '/ws'): WebSocketServer {
  const wss = new WebSocketServer({ server, path });

  wss.on('connection', (ws) => {
    let session: { username: string; token: string } | null = null;
    // Frames are handled one at a time, in arrival order.
    let queue: Promise<void> = Promise.resolve();
    send(ws, { type: 'system', text: 'ready.' });

    function enqueue(task: () => Promise<void>) {
      queue = queue.then(task).catch((err: unknown) => {
        emit({ type: 'ws.error', level: 'error', payload: errorPayload(err) });
        send(ws, { type: 'error', message: 'Internal error' });
      });
    }

    async function endSession() {
      if (!session) return;
      const { token } = session;
      session = null;
      await service.logout(token);
    }

    async function handle(frame: ClientFrame) {
      switch (frame.type) {
        case 'login': {
          await endSession();
          const result = await service.login(frame.username);
          session = { username: result.username, token: result.token };
          send(ws, { type: 'session', username: result.username, token: result.token });
          send(ws, { type: 'system', text: `Welcome ${result.username}!` });
          return;
        }
        case 'logout': {
          await endSession();
          send(ws, { type: 'system', text: 'Logged out.' });
          return;
        }
        case 'message': {
          if (!session) {
            send(ws, { type: 'error', message: 'Login required' });
            return;
          }
          const reply = await service.turn(session.username, frame.text);
          send(ws, {
            type: 'assistant',
            text: reply.response,
            emotion: reply.emotion,
            suggestions: reply.suggestions,
            topic: reply.topic,
          });
          return;
        }
      }
    }

    ws.on('message', (data: RawData) => {
      const frame = parseFrame(data);
      enqueue(async () => {
        if (typeof frame === 'string') {
          send(ws, { type: 'error', message: frame });
          return;
        }
        await handle(frame);
      });
    });

    ws.on('close', () => {
      enqueue(endSession);
    });

    ws.on('error', (err: Error) => {
      emit({ type: 'ws.error', level: 'warn', payload: errorPayload(err) });
    });
  });

  return wss;
}
