import { Response, Router } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { interpretCommand } from '../../commands';
import { collectCandidates, parseNumberText } from '../../numbers/parser';
import { BatchOutcome, runCallBatch } from '../../services/call-batch';
import { InputError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { AppDeps } from '../deps';
import { sendError } from '../respond';

const callFormSchema = z.object({
  numbers: z.string().optional(),
});

const commandFormSchema = z.object({
  command: z.string({ required_error: 'command is required' }),
  numbers: z.string().optional(),
});

function respondWithBatch(res: Response, outcome: BatchOutcome, extra: Record<string, unknown> = {}): void {
  const unrecorded = outcome.results.filter((r) => !r.persisted).length;
  if (unrecorded > 0) {
    logger.error('Calls placed but not all were recorded', { unrecorded, total: outcome.total });
    res.status(500).json({
      error: `${unrecorded} of ${outcome.total} call attempts could not be written to the call log`,
      ...extra,
      ...outcome,
    });
    return;
  }
  res.json({ ...extra, ...outcome });
}

export function createCallsRouter(deps: AppDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });

  // POST /call — numbers typed into the form and/or an uploaded file
  router.post('/call', upload.single('file'), async (req, res) => {
    try {
      const { numbers } = callFormSchema.parse(req.body ?? {});
      const file = req.file ? { originalname: req.file.originalname, buffer: req.file.buffer } : undefined;
      const candidates = collectCandidates({ text: numbers, file });
      logger.info('Call batch requested', { candidates: candidates.length, file: file?.originalname });

      const outcome = await runCallBatch(candidates, deps);
      respondWithBatch(res, outcome);
    } catch (err) {
      sendError(res, err, 'placing calls');
    }
  });

  // POST /ai-command — free-text instruction, optionally with the pending number list
  router.post('/ai-command', upload.none(), async (req, res) => {
    try {
      const { command, numbers } = commandFormSchema.parse(req.body ?? {});
      const availableNumbers = numbers ? parseNumberText(numbers) : [];
      const interpretation = await interpretCommand(command, { availableNumbers }, deps.resolvers);

      if (interpretation.kind === 'not_understood') {
        res.status(422).json({ error: 'Command not understood', reasons: interpretation.reasons });
        return;
      }

      const { action, resolvedBy } = interpretation;
      if (action.type === 'call_one') {
        const outcome = await runCallBatch([action.number], deps);
        respondWithBatch(res, outcome, { action: action.type, resolvedBy });
        return;
      }

      if (availableNumbers.length === 0) {
        throw new InputError('No phone numbers available to call');
      }
      const outcome = await runCallBatch(availableNumbers, deps);
      respondWithBatch(res, outcome, { action: action.type, resolvedBy });
    } catch (err) {
      sendError(res, err, 'handling command');
    }
  });

  return router;
}
