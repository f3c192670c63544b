/**
 * @fileoverview Ad-hoc extraction endpoint.
 *
 * POST /extract - Runs the extraction engine over `{ text }` using the
 * current catalogs and returns the structured result.
 */

import { Router, type Request, type Response } from 'express';
import { loadExtractionProfile } from '../domains/catalogs/runtime/index.js';
import { extractStructured } from '../domains/extraction/runtime/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../utils/observability/index.js';

const log = createLogger({ domain: 'extract-route' });

const router = Router();

function readText(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('text' in body)) return undefined;
  return typeof body.text === 'string' ? body.text : undefined;
}

router.post('/extract', (req: Request, res: Response) => {
  withLogContext({ requestId: createRequestId() }, () => {
    const text = readText(req.body);
    if (text === undefined) {
      res.status(400).json({ error: 'Request body must be a JSON object with a string "text" field' });
      return;
    }

    try {
      const result = extractStructured(text, loadExtractionProfile());
      res.json(result);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        log.error('extract_configuration_error', { code: error.code, problems: error.problems });
        res.status(500).json({ error: error.message, problems: error.problems });
        return;
      }
      log.error('extract_failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  });
});

export default router;
