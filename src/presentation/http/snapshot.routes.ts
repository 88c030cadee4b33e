import { Router } from 'express';
import type { Request, Response } from 'express';
import type {
  IPollLoop,
  ISessionStore,
  ISnapshotCache,
} from '../../domain/interfaces/services.interface';
import { formatDuration, type UptimeService } from '../../infrastructure/services/uptime.service';

export const NOT_READY_BODY = { error: 'Data not yet available; try again in a few seconds.' } as const;

export interface SnapshotRouteDeps {
  snapshotCache: ISnapshotCache;
  pollLoop: IPollLoop;
  sessionStore: ISessionStore;
  uptimeService: UptimeService;
}

export function createSnapshotRouter(deps: SnapshotRouteDeps): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const snapshot = deps.snapshotCache.get();
    if (snapshot.timestamp === 0) {
      res.status(503).json(NOT_READY_BODY);
      return;
    }

    const { CE, PE } = snapshot.totals;
    res.status(200).json({ CE: { totalOI: CE.totalOI }, PE: { totalOI: PE.totalOI } });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).type('text/plain').send('OI snapshot service is alive!');
  });

  router.get('/status', (_req: Request, res: Response) => {
    const now = Date.now();
    const snapshot = deps.snapshotCache.get();
    const session = deps.sessionStore.getCookies();
    const { state, ...cycles } = deps.pollLoop.getStats();
    const uptimeMs = deps.uptimeService.getUptimeMs();

    res.status(200).json({
      state,
      uptime: formatDuration(uptimeMs),
      uptimeMs,
      snapshot: {
        timestamp: snapshot.timestamp,
        ageMs: snapshot.timestamp === 0 ? null : now - snapshot.timestamp,
      },
      session: {
        cookieCount: Object.keys(session.cookies).length,
        ageMs: Number.isFinite(session.age) ? session.age : null,
      },
      cycles,
    });
  });

  return router;
}
