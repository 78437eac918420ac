import type { Express, Request, Response } from 'express';

export function registerHealthRoute(app: Express, templateKeys: () => number) {
  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, templates: templateKeys() });
  });
}
