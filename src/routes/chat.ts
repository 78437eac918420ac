import type { Express } from 'express';
import { z } from 'zod';
import type { ChatService } from '../chat/service';
import { requireUser, wrap } from './auth';

export const MAX_MESSAGE_LENGTH = 2000;

const ChatBody = z.object({
  message: z.string().max(MAX_MESSAGE_LENGTH),
});

export function registerChatRoutes(app: Express, service: ChatService) {
  app.post(
    '/chat',
    wrap(async (req, res) => {
      const username = requireUser(service, req, res);
      if (!username) return;
      const body = ChatBody.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: 'A message string is required.' });
        return;
      }
      const reply = await service.turn(username, body.data.message);
      res.json({
        response: reply.response,
        emotion: reply.emotion,
        suggestions: reply.suggestions,
        topic: reply.topic,
      });
    }),
  );

  app.get(
    '/history',
    wrap(async (req, res) => {
      const username = requireUser(service, req, res);
      if (!username) return;
      const history = await service.history(username);
      res.json({ username, history });
    }),
  );
}
