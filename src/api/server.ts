import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { createGuardRouter } from './routes/guard.js';
import { createJwtAuth, type AuthOptions } from './middleware/jwt-auth.js';
import type { SafetyGateway } from '../guardrail/index.js';
import { AppError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ServerOptions {
  gateway: SafetyGateway;
  auth: AuthOptions;
}

export function createServer(options: ServerOptions): Express {
  const app = express();

  app.use(express.json({ limit: '2mb' }));

  // Routes
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // API Routes (JWT protected)
  app.use('/api/guard', createGuardRouter(options.gateway, createJwtAuth(options.auth)));

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }

    // Malformed JSON bodies from express.json()
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
      return;
    }

    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function startServer(options: ServerOptions, port: number): Server {
  const app = createServer(options);

  return app.listen(port, () => {
    logger.info({ port }, 'Safety gateway server started');
  });
}
