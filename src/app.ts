import express, { ErrorRequestHandler } from 'express';
import helmet from 'helmet';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import { AppDeps } from './api/deps';
import { createCallsRouter } from './api/routes/calls';
import { createLogsRouter } from './api/routes/logs';
import { createVerificationRouter } from './api/routes/verification';
import { errorMessage, logger } from './utils/logger';
import { homePage } from './views/home';

const handleUncaught: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: `Upload rejected: ${err.message}` });
    return;
  }
  logger.error('Unhandled request error', { error: errorMessage(err) });
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  const callCreationLimiter = rateLimit({ windowMs: 60_000, limit: 10, standardHeaders: true, legacyHeaders: false });

  app.get('/', (_req, res) => {
    res.type('html').send(homePage());
  });

  app.use(['/call', '/ai-command'], callCreationLimiter);
  app.use(createCallsRouter(deps));
  app.use(createLogsRouter(deps));
  app.use(createVerificationRouter(deps));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(handleUncaught);

  return app;
}
