import express, { type NextFunction, type Request, type Response } from 'express';
import type { ChatService } from './chat/service';
import { emit, errorPayload } from './lib/logging';
import { registerAuthRoutes } from './routes/auth';
import { registerChatRoutes } from './routes/chat';
import { registerHealthRoute } from './routes/health';

// Body parser errors (too large, bad charset) carry a 4xx `status`.
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export type AppOptions = {
  templateKeys: () => number;
};

export function createApp(service: ChatService, options: AppOptions) {
  const app = express();
  app.use(express.json({ limit: '16kb' }));

  registerHealthRoute(app, options.templateKeys);
  registerAuthRoutes(app, service);
  registerChatRoutes(app, service);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Four parameters: express only treats it as an error handler with this arity.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body.' });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: status === 413 ? 'Request body too large.' : 'Bad request.' });
      return;
    }
    emit({ type: 'http.error', level: 'error', payload: { path: req.path, ...errorPayload(err) } });
    res.status(500).json({ error: 'Internal error' });
  });

  return app;
}
