import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { connectDB } from './config/database';
import { type AppConfig, loadConfig } from './config/env';
import { startScheduler } from './jobs/scheduler';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import type { Datastore } from './repositories/datastore';
import { MemoryDatastore } from './repositories/memoryDatastore';
import { MysqlDatastore } from './repositories/mysqlDatastore';
import { getServices, initServices, type ServiceOptions } from './services';
import { configureAuth } from './utils/auth';
import { describeError } from './utils/errors';
import { AppLogger } from './utils/logger';

// Import routes
import adminRoutes from './routes/adminRoutes';
import drawingRoutes from './routes/drawingRoutes';
import fulfillmentRoutes from './routes/fulfillmentRoutes';
import pointsRoutes from './routes/pointsRoutes';

// Serves the container registered by initServices(); controllers resolve it the same way.
export const createApp = (): Application => {
  const { logger } = getServices();
  const app: Application = express();

  // Middleware
  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      credentials: true,
    })
  );
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      logger.debug('http.request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - started,
      });
    });
    next();
  });

  // Health check endpoint
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      await getServices().store.ping();
      res.status(200).json({
        status: 'OK',
        database: 'Connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.warn('health.degraded', { error: describeError(error) });
      res.status(503).json({
        status: 'ERROR',
        message: 'Service unavailable',
        database: 'Error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // API Routes
  app.use('/api/points', pointsRoutes);
  app.use('/api/drawings', drawingRoutes);
  app.use('/api/fulfillments', fulfillmentRoutes);
  app.use('/api/admin', adminRoutes);

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
};

const openDatastore = async (config: AppConfig, logger: AppLogger): Promise<Datastore> => {
  if (config.dataStore === 'memory') {
    logger.warn('datastore.memory', { message: 'Using the in-memory datastore; data is lost on restart' });
    return new MemoryDatastore();
  }
  const pool = await connectDB(config.database, logger);
  return new MysqlDatastore(pool, logger);
};

export interface StartOptions {
  // fitness tracker integrations; the activity sync job runs only when some are given
  trackers?: ServiceOptions['trackers'];
}

// Start server
export const startServer = async (options: StartOptions = {}): Promise<void> => {
  const config = loadConfig();
  const logger = new AppLogger({ level: config.logLevel, logPath: config.logPath });

  process.on('unhandledRejection', (reason) => {
    logger.error('process.unhandled_rejection', { error: describeError(reason) });
  });

  logger.info('server.starting', {
    node_env: config.nodeEnv,
    port: config.port,
    data_store: config.dataStore,
  });

  configureAuth({ secret: config.jwtSecret, expiresIn: config.jwtExpiresIn });
  const store = await openDatastore(config, logger);
  const services = initServices({ store, logger, trackers: options.trackers });
  const scheduler = config.scheduler.enabled ? startScheduler(services, config.scheduler) : null;

  const server = createApp().listen(config.port, '0.0.0.0', () => {
    logger.info('server.listening', { port: config.port });
  });

  const shutdown = (signal: string): void => {
    logger.info('server.stopping', { signal });
    scheduler?.stop();
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('server.shutdown_failed', { error: describeError(error) });
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error('Failed to start server:', describeError(error));
    process.exit(1);
  });
}
