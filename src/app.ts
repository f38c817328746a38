import express from 'express';
import { pingDatabase } from './db/sqlite.js';
import { logger } from './lib/logger.js';
import { createAppointmentsRouter, createAvailabilityRouter } from './routes/appointments.route.js';
import { createToolCallsRouter } from './routes/tool-calls.route.js';
import type { Services } from './services/index.js';
import { ErrorCode, type ApiResponse } from './types/index.js';

export function createApp(services: Services): express.Express {
  const app = express();

  app.use(express.json());

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(`${req.method} ${req.path} | ${res.statusCode} | ${duration}ms`);
    });
    next();
  });

  app.get('/health', (req, res) => {
    const databaseUp = pingDatabase(services.db);
    res.status(databaseUp ? 200 : 503).json({
      status: databaseUp ? 'healthy' : 'degraded',
      database: databaseUp ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/availability', createAvailabilityRouter(services));
  app.use('/api/appointments', createAppointmentsRouter(services));
  app.use('/api/tools', createToolCallsRouter(services));

  app.use((req, res) => {
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.NOT_FOUND,
        message: `Endpoint ${req.method} ${req.path} not found`,
      },
    };
    res.status(404).json(response);
  });

  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    // express.json() flags unparseable bodies with type 'entity.parse.failed'.
    if ('type' in err && err.type === 'entity.parse.failed') {
      const response: ApiResponse = {
        success: false,
        error: { code: ErrorCode.VALIDATION_ERROR, message: 'Request body is not valid JSON' },
      };
      res.status(400).json(response);
      return;
    }

    logger.error('Unhandled error', { method: req.method, path: req.path, error: err });
    const response: ApiResponse = {
      success: false,
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An internal server error occurred',
      },
    };
    res.status(500).json(response);
  });

  return app;
}
