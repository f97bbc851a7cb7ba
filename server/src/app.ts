/**
 * Express application
 *
 * Security middleware, request logging and the API routers. Startup and
 * the WebSocket stream live in index.ts.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';

import { AppConfig } from './config';
import { CommandInterpreter } from './core/commandInterpreter';
import { ExecutorRegistry } from './executors';
import { createHealthRouter } from './routes/health';
import { createToolsRouter } from './routes/tools';
import { createVoiceRouter } from './routes/voice';
import { logger } from './services/logger';

export interface AppDependencies {
  config: AppConfig;
  jwtSecret: string;
  registry: ExecutorRegistry;
  interpreter: CommandInterpreter;
  version: string;
  queuedReminders: () => number;
  connectedClients: () => number;
}

export function createApp(deps: AppDependencies): Express {
  const { config } = deps;
  const app = express();

  // =============================================================================
  // SECURITY MIDDLEWARE
  // =============================================================================

  app.use(helmet());

  const allowedOrigins = config.cors.allowedOrigins;
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (voice clients, curl)
        if (!origin) return callback(null, true);

        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          logger.warn(`CORS blocked request from origin: ${origin}`);
          callback(new Error('Not allowed by CORS'));
        }
      },
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      max: config.rateLimit.max,
      message: { error: 'Too many requests, please try again later.' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(express.json({ limit: '100kb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.http(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`, {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration,
        ip: req.ip,
      });
    });
    next();
  });

  // =============================================================================
  // ROUTES
  // =============================================================================

  app.use(
    '/api/v1/health',
    createHealthRouter({
      config,
      version: deps.version,
      queuedReminders: deps.queuedReminders,
      connectedClients: deps.connectedClients,
    })
  );
  app.use('/api/v1/voice', createVoiceRouter({ interpreter: deps.interpreter, jwtSecret: deps.jwtSecret }));
  app.use('/api/v1/tools', createToolsRouter({ registry: deps.registry, jwtSecret: deps.jwtSecret }));

  // =============================================================================
  // ERROR HANDLING
  // =============================================================================

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handlers are recognised by arity; `next` must stay
  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    // body-parser rejections carry their own 4xx status
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: err.message });
      return;
    }

    logger.error('Unhandled error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });

    const message = config.env === 'production' ? 'Internal server error' : err.message;
    res.status(500).json({ error: message });
  });

  return app;
}
