import express, { Express } from 'express';
import type { Server } from 'http';
import { Logger } from '../utils/logger.js';

/** Liveness check for process supervisors; independent of sync state. */
export function createHealthApp(): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(['/', '/health'], (_req, res) => {
    res.type('text/plain').send('OK');
  });

  return app;
}

export function startHealthServer(port: number, logger: Logger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createHealthApp().listen(port, () => {
      logger.info(`Health check listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
