import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import {
  createSessionQuerySchema,
  queryRequestSchema,
} from '../schema/session.js';
import type {
  CloseSessionResponse,
  ErrorResponse,
  QueryResponse,
  SessionListResponse,
  SessionResponse,
} from '../schema/session.js';
import type { QueryEngine } from '../core/queryEngine.js';
import type { SessionRecord } from '../session/record.js';
import type { SessionRegistry } from '../session/registry.js';

// ── Public types ─────────────────────────────────────────────

export interface ServiceDeps {
  registry: SessionRegistry;
  engine: QueryEngine;
}

// ── Helpers ──────────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not forward rejected promises; route them to `next`. */
function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

function toSessionResponse(record: SessionRecord): SessionResponse {
  const { state } = record;
  return {
    sessionId: record.id,
    status: state.status,
    pageUrl: record.pageUrl(),
    currentQuery: state.currentQuery,
    currentStep: state.currentStep,
    currentAction: state.currentAction,
    result: state.result,
    error: state.error,
  };
}

function sessionIdParam(req: Request): string {
  return req.params['sessionId'] ?? '';
}

// ── Router ───────────────────────────────────────────────────

export function createSessionRouter({ registry, engine }: ServiceDeps): Router {
  const router = Router();

  router.post(
    '/sessions',
    asyncHandler(async (req, res) => {
      const { timeoutMinutes } = createSessionQuerySchema.parse(req.query);
      const record = await registry.create(timeoutMinutes);

      const body: SessionResponse = {
        sessionId: record.id,
        status: record.state.status,
        pageUrl: record.pageUrl(),
      };
      res.status(201).json(body);
    }),
  );

  router.get('/sessions', (_req, res) => {
    const body: SessionListResponse = {
      activeSessions: registry.count(),
      sessions: registry.snapshot(),
    };
    res.json(body);
  });

  router.get('/sessions/:sessionId', (req, res) => {
    const record = registry.get(sessionIdParam(req));
    res.json(toSessionResponse(record));
  });

  router.delete(
    '/sessions/:sessionId',
    asyncHandler(async (req, res) => {
      const closed = await registry.close(sessionIdParam(req));
      if (!closed) {
        const notFound: ErrorResponse = { error: 'Session not found' };
        res.status(404).json(notFound);
        return;
      }
      const body: CloseSessionResponse = { message: 'Session closed' };
      res.json(body);
    }),
  );

  router.post('/sessions/:sessionId/query', (req, res) => {
    const { question, maxSteps } = queryRequestSchema.parse(req.body);
    const record = registry.get(sessionIdParam(req));

    engine.submit(record, question, maxSteps);

    const body: QueryResponse = {
      sessionId: record.id,
      status: 'processing',
      answer: null,
    };
    res.status(202).json(body);
  });

  return router;
}
