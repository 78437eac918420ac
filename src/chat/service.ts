import { createContext } from '../engine/context';
import type { DialogueEngine } from '../engine/dialogue';
import type { ChatTurnRecord, EmotionTag, Topic, TurnRoute } from '../engine/types';
import { KeyedLock } from '../lib/fsutil';
import type { HistoryLog } from '../lib/history';
import { emit, errorPayload } from '../lib/logging';
import type { SessionStore } from '../lib/sessions';
import { truncate } from '../lib/strings';
import type { TokenRegistry } from '../lib/tokens';
import type { UserRegistry } from '../lib/users';

export type ChatServiceDeps = {
  engine: DialogueEngine;
  sessions: SessionStore;
  history: HistoryLog;
  users: UserRegistry;
  tokens: TokenRegistry;
};

export type ChatReply = {
  response: string;
  emotion: EmotionTag;
  suggestions: string[];
  topic: Topic;
  route: TurnRoute;
};

export type LoginResult = {
  username: string;
  token: string;
  created: boolean;
};

/**
 * Glue between the transports and the dialogue engine: owns the
 * load, process, store cycle for one user's context and hands finished turns
 * to the history log.
 */
export class ChatService {
  private readonly turns = new KeyedLock();

  constructor(private readonly deps: ChatServiceDeps) {}

  /** `username` must already be normalized (see UsernameSchema). */
  async login(username: string): Promise<LoginResult> {
    const { created } = await this.deps.users.register(username);
    await this.deps.sessions.put(username, createContext());
    const token = this.deps.tokens.issue(username);
    emit({ type: 'session.login', payload: { user: username, created } });
    return { username, token, created };
  }

  async logout(token: string | undefined): Promise<void> {
    if (!token) return;
    const username = this.deps.tokens.revoke(token);
    if (!username) return;
    await this.deps.sessions.delete(username);
    emit({ type: 'session.logout', payload: { user: username } });
  }

  userFor(token: string | undefined): string | undefined {
    return this.deps.tokens.resolve(token);
  }

  turn(username: string, message: string): Promise<ChatReply> {
    return this.turns.run(username, async () => {
      const stored = await this.deps.sessions.get(username);
      const result = this.deps.engine.processTurn(message, stored ?? createContext());
      await this.deps.sessions.put(username, result.context);

      if (result.missingTemplate) {
        emit({
          type: 'templates.missing',
          level: 'error',
          payload: { key: result.missingTemplate, user: username },
        });
      }
      this.recordTurn(username, result.record);
      emit({
        type: 'chat.turn',
        payload: {
          user: username,
          route: result.route,
          intent: result.intent,
          topic: result.topic,
          input: truncate(result.record.input, 120),
        },
      });

      return {
        response: result.response,
        emotion: result.emotion,
        suggestions: result.suggestions,
        topic: result.topic,
        route: result.route,
      };
    });
  }

  history(username: string): Promise<ChatTurnRecord[]> {
    return this.deps.history.read(username);
  }

  private recordTurn(username: string, record: ChatTurnRecord): void {
    this.deps.history.append(username, record).catch((err: unknown) => {
      emit({ type: 'history.append_failed', level: 'error', payload: { user: username, ...errorPayload(err) } });
    });
  }
}
