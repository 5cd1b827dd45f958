import { Router } from 'express';
import { cleanupCallLogs } from '../../services/log-cleanup';
import { logsPage } from '../../views/logs';
import { AppDeps } from '../deps';
import { sendError } from '../respond';

export function createLogsRouter(deps: Pick<AppDeps, 'store'>): Router {
  const router = Router();

  // GET /logs — HTML history page
  router.get('/logs', async (_req, res) => {
    try {
      const entries = await deps.store.list();
      res.type('html').send(logsPage(entries));
    } catch (err) {
      sendError(res, err, 'rendering call log');
    }
  });

  // GET /api/logs
  router.get('/api/logs', async (_req, res) => {
    try {
      res.json({ logs: await deps.store.list() });
    } catch (err) {
      sendError(res, err, 'listing call log');
    }
  });

  // POST /api/cleanup-logs — rewrite stored error messages in readable form
  router.post('/api/cleanup-logs', async (_req, res) => {
    try {
      const count = await cleanupCallLogs(deps.store);
      res.json({ message: `Cleaned up ${count} log entries`, count });
    } catch (err) {
      sendError(res, err, 'cleaning call log');
    }
  });

  return router;
}
