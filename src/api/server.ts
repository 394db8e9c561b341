/**
 * Health surface: liveness, readiness and pipeline stats.
 */
import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import { logger } from '../logger.js';
import type { PipelineCoordinator } from '../pipeline/coordinator.js';

export interface ApiServerOptions {
  coordinator: Pick<PipelineCoordinator, 'isRunning' | 'getStats'>;
  port?: number;
}

/**
 * JSON.stringify replacer; bigint values (checkpoint) go out as decimal strings.
 */
function bigintToString(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function createApiServer(options: ApiServerOptions): Express {
  const { coordinator } = options;
  const app = express();

  app.disable('x-powered-by');

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    if (coordinator.isRunning()) {
      res.json({ status: 'ready' });
    } else {
      res.status(503).json({ status: 'not_ready' });
    }
  });

  app.get('/stats', (_req: Request, res: Response) => {
    try {
      res.type('application/json').send(JSON.stringify(coordinator.getStats(), bigintToString));
    } catch (error) {
      logger.error({ error }, 'Error collecting stats');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export async function startApiServer(options: ApiServerOptions): Promise<Server> {
  const { port = 3001 } = options;
  const app = createApiServer(options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'Health server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}
