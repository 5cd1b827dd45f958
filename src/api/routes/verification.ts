import { Router } from 'express';
import { checkVerification } from '../../services/verification';
import { AppDeps } from '../deps';
import { sendError } from '../respond';

export function createVerificationRouter(deps: Pick<AppDeps, 'telephony'>): Router {
  const router = Router();

  // GET /api/check-verification/:phoneNumber
  router.get('/api/check-verification/:phoneNumber', async (req, res) => {
    try {
      res.json(await checkVerification(req.params.phoneNumber, deps.telephony));
    } catch (err) {
      sendError(res, err, 'checking verification');
    }
  });

  return router;
}
