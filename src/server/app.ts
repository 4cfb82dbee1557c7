import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { logError, logEvent } from '../logging/log';
import { WEBHOOK_SECRET_HEADER } from '../pipeline/auth';
import type { PipelineContext } from '../pipeline/context';
import { handleIntake } from '../pipeline/orchestrator';
import { createRateLimiter } from './rateLimit';

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
  'encoding.unsupported': 'Request body encoding is not supported',
  'charset.unsupported': 'Request body charset is not supported',
};

/** 4xx errors raised by the body parsers, with the status they carry. */
function clientErrorOf(error: unknown): { status: number; message: string } | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const status =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : undefined;
  if (status === undefined || status < 400 || status > 499) {
    return null;
  }
  const type = 'type' in error && typeof error.type === 'string' ? error.type : '';
  return { status, message: BODY_ERROR_MESSAGES[type] ?? 'Bad request' };
}

export function createApp(context: PipelineContext): Express {
  const app = express();

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
    }),
  );
  app.use(createRateLimiter(context.config.rateLimit));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true, service: context.config.profile.service, timestamp: new Date().toISOString() });
  });

  app.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await handleIntake(
        { payload: req.body, authToken: req.get(WEBHOOK_SECRET_HEADER) },
        context,
      );

      if (outcome.status === 'rejected') {
        if (outcome.stage === 'RejectedUnauthenticated') {
          res.status(401).json({ error: outcome.error.message });
          return;
        }
        res.status(400).json({ error: outcome.error.message });
        return;
      }

      res.json(outcome.response);
    } catch (error) {
      next(error);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const clientError = clientErrorOf(err);
    if (clientError) {
      res.status(clientError.status).json({ error: clientError.message });
      return;
    }
    logError('server.error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export function logStartup(port: number, service: string): void {
  logEvent('server.listening', { service, url: `http://localhost:${port}` });
}
