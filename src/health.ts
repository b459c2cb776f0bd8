// MARK: - Health Check Server
// Express server for uptime monitoring and access metrics

import express, { Request, Response } from 'express';
import mongoose from 'mongoose';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { Client } from 'discord.js';
import type { AccessController } from './services/access/AccessController';
import type { DailyResetScheduler } from './services/access/DailyResetScheduler';
import type { JournalStore } from './services/journal/JournalStore';
import { describeError } from './errors';
import { logger } from './utils/logger';

export interface HealthDependencies {
  client: Client;
  guildId: string;
  store: JournalStore;
  controller: AccessController;
  scheduler: DailyResetScheduler;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    mongodb: 'connected' | 'disconnected';
    discord: 'ready' | 'not ready';
    scheduler: 'running' | 'stopped';
  };
}

const app = express();

let deps: HealthDependencies | null = null;
let server: Server | null = null;
let activePort: number | null = null;

/**
 * Initialize health server with the running bot's services
 */
export function initializeHealthServer(dependencies: HealthDependencies): void {
  deps = dependencies;
}

export function buildHealthReport(
  mongoConnected: boolean,
  discordReady: boolean,
  schedulerRunning: boolean,
  now: Date = new Date(),
): HealthReport {
  const healthy = mongoConnected && discordReady && schedulerRunning;

  return {
    status: healthy ? 'healthy' : 'degraded',
    timestamp: now.toISOString(),
    uptime: process.uptime(),
    checks: {
      mongodb: mongoConnected ? 'connected' : 'disconnected',
      discord: discordReady ? 'ready' : 'not ready',
      scheduler: schedulerRunning ? 'running' : 'stopped',
    },
  };
}

/**
 * Health check endpoint
 */
app.get('/health', (req: Request, res: Response) => {
  const report = buildHealthReport(
    mongoose.connection.readyState === mongoose.ConnectionStates.connected,
    deps?.client.isReady() ?? false,
    deps?.scheduler.getStatus().running ?? false,
  );

  res.status(report.status === 'healthy' ? 200 : 503).json(report);
});

/**
 * Metrics endpoint
 */
app.get('/metrics', async (req: Request, res: Response) => {
  if (!deps) {
    res.status(503).json({ error: 'Bot not initialized' });
    return;
  }

  try {
    const pendingAccess = await deps.store.countPending(deps.guildId);
    const scheduler = deps.scheduler.getStatus();

    res.json({
      memory: process.memoryUsage(),
      uptime: process.uptime(),
      ...deps.controller.getMetrics(),
      pendingAccess,
      lastResetDate: scheduler.lastReset?.lastBoundaryDate ?? null,
      lastResetRunAt: scheduler.lastReset?.lastRunAt.toISOString() ?? null,
      nextResetAt: scheduler.nextResetAt?.toISOString() ?? null,
    });
  } catch (error) {
    logger.error('Failed to fetch metrics', { error: describeError(error).message });
    res.status(500).json({ error: 'Failed to fetch metrics' });
  }
});

/**
 * Root endpoint
 */
app.get('/', (req: Request, res: Response) => {
  res.json({
    name: 'Journal Gate Bot',
    version: '1.0.0',
    status: 'running',
  });
});

/**
 * Start health server
 */
export async function startHealthServer(preferredPort: number, allowFallback: boolean): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const attemptListen = (port: number, canFallback: boolean): void => {
      const instance = app.listen(port, () => {
        server = instance;
        const address: AddressInfo | string | null = instance.address();
        activePort = address !== null && typeof address === 'object' ? address.port : port;
        logger.info('Health server started', { port: activePort });
        resolve();
      });

      instance.once('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
          logger.error('Health server port already in use', { port });

          if (canFallback) {
            logger.warn('Attempting to start health server on an ephemeral port');
            instance.close(() => attemptListen(0, false));
            return;
          }

          reject(new Error(`Port ${port} is already in use for health server`));
          return;
        }

        reject(error);
      });
    };

    attemptListen(preferredPort, allowFallback);
  });
}

/**
 * Graceful shutdown
 */
export async function stopHealthServer(): Promise<void> {
  const running = server;
  if (!running) {
    logger.info('Health server not running');
    return;
  }

  await new Promise<void>((resolve, reject) => {
    running.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

  logger.info('Health server stopped', { port: activePort });
  server = null;
  activePort = null;
}
