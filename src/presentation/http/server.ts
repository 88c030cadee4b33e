import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { Logger } from '../../shared/logger';
import { createSnapshotRouter, type SnapshotRouteDeps } from './snapshot.routes';

const logger = new Logger('HttpServer');

export function createServer(deps: SnapshotRouteDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createSnapshotRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // express recognises error handlers by arity, so `next` stays in the signature
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled request error', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
