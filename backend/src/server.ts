/**
 * Express + Socket.IO Server
 */

import express, { Express, Request, Response } from 'express';
import { createServer as createHttpServer, Server } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import cors from 'cors';

import { AppConfig } from './config/index.js';
import { createLogger, type Logger } from './logger.js';
import { createDefaultRegistry } from './machines/providers/index.js';
import type { ProviderRegistry } from './machines/registry.js';
import { MachineService } from './machines/MachineService.js';
import { CommandDispatcher } from './monitoring/CommandDispatcher.js';
import { LivenessMonitor } from './monitoring/LivenessMonitor.js';
import { Orchestrator } from './monitoring/Orchestrator.js';
import { StateReconciler } from './monitoring/StateReconciler.js';
import { StateManager } from './state/StateManager.js';
import { createApiRoutes } from './api/routes.js';
import { createErrorHandler } from './api/errorHandler.js';
import { setupWebSocket } from './websocket/server.js';

export interface ServerContext {
  app: Express;
  server: Server;
  machineService: MachineService;
  cleanup: () => Promise<void>;
}

export interface ServerOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
}

export async function createServer(config: AppConfig, options: ServerOptions = {}): Promise<ServerContext> {
  const logger = options.logger ?? createLogger('server');

  const app: Express = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json());

  const httpServer = createHttpServer(app);

  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
    pingInterval: config.websocket.ping_interval,
    pingTimeout: config.websocket.ping_timeout,
  });

  // Monitoring core
  const reconciler = new StateReconciler({ logger });
  const liveness = new LivenessMonitor(reconciler, {
    offlineMultiplier: config.monitoring.offline_multiplier,
    minCheckMs: config.monitoring.min_check_interval,
    checksPerInterval: config.monitoring.checks_per_interval,
    logger,
  });
  const registry = options.registry ?? createDefaultRegistry();
  const orchestrator = new Orchestrator({ registry, reconciler, liveness, logger });
  const dispatcher = new CommandDispatcher(orchestrator, logger);
  const machineService = new MachineService({
    registry,
    orchestrator,
    reconciler,
    dispatcher,
    defaultPollIntervalMs: config.monitoring.default_poll_interval,
    logger,
  });

  const stateManager = new StateManager(io, logger);
  stateManager.attach(reconciler);

  await machineService.initialize(config.machines);

  app.use('/api', createApiRoutes(machineService, stateManager));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'PrintFleet',
      version: '1.0.0',
      endpoints: {
        api: '/api',
        health: '/health',
        websocket: 'ws://...',
      },
    });
  });

  setupWebSocket(io, machineService, stateManager, logger);

  app.use(createErrorHandler(logger));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  const cleanup = async (): Promise<void> => {
    logger.info('Cleaning up resources...');
    await machineService.shutdown();
    liveness.cleanup();
    stateManager.cleanup();
    io.close();
  };

  return { app, server: httpServer, machineService, cleanup };
}
