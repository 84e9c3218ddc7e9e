import express, { Request, Response } from 'express';
import cors from 'cors';
import * as logger from 'firebase-functions/logger';
import { validateApiKey } from '../middleware/auth';
import { describeError } from '../utils/errors';
import { CAMPUS_DOMAINS, isCampusDomain } from '../workers/invocation';
import type { PipelineRegistry } from '../workers/pipelines';

/**
 * Operator endpoint for re-running one feed on demand. Unlike scheduled
 * runs, a failed pipeline is reported back as a 500.
 */
export function createTriggerApp(pipelines: PipelineRegistry): express.Express {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());
  app.use(validateApiKey);

  app.get('/status', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      domains: CAMPUS_DOMAINS,
      timestamp: new Date().toISOString(),
    });
  });

  app.post('/sync/:domain', async (req: Request, res: Response): Promise<void> => {
    const domain = req.params.domain ?? '';
    if (!isCampusDomain(domain)) {
      res.status(404).json({ error: `Unknown domain: ${domain}` });
      return;
    }

    const startedAt = Date.now();
    try {
      const summary = await pipelines[domain]();
      res.json({ success: true, domain, durationMs: Date.now() - startedAt, summary });
    } catch (error) {
      logger.error(`[${domain}] Manual sync failed`, { domain, error: describeError(error) });
      res.status(500).json({
        success: false,
        domain,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  });

  return app;
}
