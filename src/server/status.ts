/**
 * Postwatch — Status & Image Server
 *
 * Endpoints:
 * - GET /health         — liveness
 * - GET /status         — scheduler, endpoint pool and delivery queue state
 * - GET /images/:file   — post screenshots linked from notifications
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { stat } from 'fs/promises';
import path from 'path';
import type { SchedulerStatus } from '../scheduler/scheduler';
import type { EndpointPoolSnapshot, EndpointPoolStats, DeliveryQueueStats } from '../types';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';

// ============================================================
// CONFIGURATION
// ============================================================

export interface StatusSources {
  scheduler: { status(): SchedulerStatus };
  pool: { stats(): EndpointPoolStats; snapshot(): EndpointPoolSnapshot };
  queue: { stats(): DeliveryQueueStats };
}

export interface StatusServerOptions {
  sources: StatusSources;
  screenshotsDir: string;
}

const SAFE_IMAGE_NAME = /^[A-Za-z0-9_-]+\.(png|jpe?g|webp|gif)$/i;

export const PLACEHOLDER_SVG = `<svg xmlns="http://www.w3.org/2000/svg" width="400" height="100">
  <rect width="100%" height="100%" fill="#f0f0f0"/>
  <text x="50%" y="50%" font-family="Arial" font-size="16" text-anchor="middle" dy=".3em" fill="#666">Image not found</text>
</svg>`;

function sendPlaceholder(res: Response): void {
  res.status(200).type('image/svg+xml').send(PLACEHOLDER_SVG);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

// ============================================================
// EXPRESS APP
// ============================================================

export function createStatusApp(options: StatusServerOptions): Express {
  const app = express();
  const screenshotsRoot = path.resolve(options.screenshotsDir);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/status', (_req: Request, res: Response) => {
    const { scheduler, pool, queue } = options.sources;
    res.json({
      scheduler: scheduler.status(),
      endpoints: {
        ...pool.stats(),
        items: pool.snapshot().endpoints,
      },
      queue: queue.stats(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/images/:file', async (req: Request, res: Response, next: NextFunction) => {
    const file = req.params.file ?? '';
    if (!SAFE_IMAGE_NAME.test(file)) {
      sendPlaceholder(res);
      return;
    }

    try {
      if (!(await isFile(path.join(screenshotsRoot, file)))) {
        sendPlaceholder(res);
        return;
      }

      res.sendFile(file, { root: screenshotsRoot }, error => {
        if (!error) return;
        logger.error('Failed to send screenshot', { file, error: toErrorMessage(error) });
        if (!res.headersSent) sendPlaceholder(res);
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in status server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

// ============================================================
// SERVER START
// ============================================================

export function startStatusServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Status server listening on port ${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
