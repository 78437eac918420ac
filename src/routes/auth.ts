import type { Express, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { ChatService } from '../chat/service';
import { UsernameSchema } from '../lib/users';

const LoginBody = z.object({ username: UsernameSchema });

export function wrap(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function tokenFrom(req: Request): string | undefined {
  const header = req.get('x-session-token');
  if (header) return header.trim();
  const auth = req.get('authorization');
  const m = auth ? /^Bearer\s+(\S+)$/i.exec(auth) : null;
  return m ? m[1] : undefined;
}

/** Username behind the request's token, or undefined after answering 403. */
export function requireUser(service: ChatService, req: Request, res: Response): string | undefined {
  const username = service.userFor(tokenFrom(req));
  if (!username) {
    res.status(403).json({ error: 'Login required' });
    return undefined;
  }
  return username;
}

export function registerAuthRoutes(app: Express, service: ChatService) {
  app.post(
    '/login',
    wrap(async (req, res) => {
      const body = LoginBody.safeParse(req.body ?? {});
      if (!body.success) {
        const missing = body.error.issues.some((issue) => issue.code === 'invalid_type' || issue.code === 'too_small');
        res.status(400).json({ error: missing ? 'Username is required.' : body.error.issues[0].message });
        return;
      }
      const { username, token } = await service.login(body.data.username);
      res.json({ message: `Welcome ${username}!`, username, token });
    }),
  );

  app.post(
    '/logout',
    wrap(async (req, res) => {
      await service.logout(tokenFrom(req));
      res.json({ message: 'Logged out.' });
    }),
  );
}
