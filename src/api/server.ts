import express, { type Application, type Request, type Response, type NextFunction } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'http';
import type Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import { formatUserError, logError, AppError } from '../utils/errors.js';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';

export interface AppOptions {
  db: Database.Database;
  telegramMode: 'polling' | 'webhook';
  /** Mounted at TELEGRAM_WEBHOOK_PATH in webhook mode */
  webhookHandler?: (req: Request, res: Response) => Promise<void>;
}

/**
 * HTTP server instance
 */
let server: ReturnType<Application['listen']> | null = null;

/**
 * Create and configure the Express application
 */
export function createApp(options: AppOptions): Application {
  const expressApp = express();

  expressApp.set('trust proxy', 1);

  // Request logging via pino-http
  expressApp.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req: IncomingMessage) => req.url === '/health',
      },
      serializers: {
        req: (req: IncomingMessage) => ({
          method: req.method,
          url: req.url,
        }),
        res: (res: ServerResponse) => ({
          statusCode: res.statusCode,
        }),
      },
    })
  );

  expressApp.use(express.json({ limit: '1mb' }));

  expressApp.get('/health', (_req: Request, res: Response) => {
    try {
      options.db.prepare('SELECT 1').get();
      res.json({ status: 'healthy', database: 'ok', telegramMode: options.telegramMode });
    } catch (error) {
      logError(error, { operation: 'healthCheck' });
      res.status(503).json({ status: 'unhealthy', database: 'unavailable', telegramMode: options.telegramMode });
    }
  });

  if (options.telegramMode === 'webhook' && options.webhookHandler) {
    const handler = options.webhookHandler;
    expressApp.post(TELEGRAM_WEBHOOK_PATH, (req: Request, res: Response, next: NextFunction) => {
      handler(req, res).catch(next);
    });
  }

  expressApp.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  expressApp.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logError(err, { operation: 'httpRequest' });
    const status = err instanceof AppError ? err.statusCode : 500;
    res.status(status).json(formatUserError(err));
  });

  return expressApp;
}

/**
 * Start the Express server
 */
export async function startServer(app: Application, port: number, host: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve();
    });

    listening.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ err: error }, 'Failed to start server');
      }
      reject(error);
    });

    server = listening;
  });
}

/**
 * Stop the Express server
 */
export async function stopServer(): Promise<void> {
  const current = server;
  if (!current) {
    return;
  }

  logger.info('Stopping API server...');

  await new Promise<void>((resolve) => {
    const forceTimer = setTimeout(() => {
      logger.warn('Forcing server shutdown after timeout');
      resolve();
    }, 10000);

    current.close(() => {
      clearTimeout(forceTimer);
      logger.info('API server stopped');
      resolve();
    });
  });

  server = null;
}
