import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import {
  QueryInProgressError,
  ResourceUnavailableError,
  SessionNotFoundError,
} from '../session/errors.js';
import type { ErrorResponse } from '../schema/session.js';
import * as log from '../utils/logger.js';
import { createSessionRouter } from './routes.js';
import type { ServiceDeps } from './routes.js';

// ── App factory ──────────────────────────────────────────────

export function createApp(deps: ServiceDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(createSessionRouter(deps));
  app.use(errorHandler);

  return app;
}

// ── Error mapping ────────────────────────────────────────────

function sendError(res: Response, status: number, error: string): void {
  const body: ErrorResponse = { error };
  res.status(status).json(body);
}

function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    const body: ErrorResponse = { error: 'Invalid request' };
    res.status(422).json({ ...body, issues: err.issues });
    return;
  }

  if (
    err instanceof SessionNotFoundError ||
    err instanceof QueryInProgressError ||
    err instanceof ResourceUnavailableError
  ) {
    sendError(res, err.statusCode, err.message);
    return;
  }

  if (err instanceof SyntaxError) {
    sendError(res, 400, 'Malformed JSON body');
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  log.error(`Unhandled request error: ${message}`);
  sendError(res, 500, 'Internal server error');
}
