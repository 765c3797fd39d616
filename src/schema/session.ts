import { z } from 'zod';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Session status ──────────────────────────────────────────

export const sessionStatusSchema = z.enum([
  'active',
  'processing',
  'completed',
  'error',
]);

export type SessionStatus = z.infer<typeof sessionStatusSchema>;

// ── Requests ────────────────────────────────────────────────

export const createSessionQuerySchema = z.object({
  timeoutMinutes: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .default(TIMEOUTS.SESSION_TIMEOUT_MINUTES),
});

export type CreateSessionQuery = z.infer<typeof createSessionQuerySchema>;

export const queryRequestSchema = z.object({
  question: z.string().min(1),
  maxSteps: z.number().int().positive().optional().default(LIMITS.MAX_STEPS),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;

// ── Responses ───────────────────────────────────────────────

export const sessionResponseSchema = z.object({
  sessionId: z.string().min(1),
  status: sessionStatusSchema,
  pageUrl: z.string().nullable(),
  currentQuery: z.string().nullable().optional(),
  currentStep: z.number().int().nullable().optional(),
  currentAction: z.string().nullable().optional(),
  result: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
});

export type SessionResponse = z.infer<typeof sessionResponseSchema>;

export const queryResponseSchema = z.object({
  sessionId: z.string().min(1),
  status: z.enum(['processing', 'completed', 'error']),
  answer: z.string().nullable(),
});

export type QueryResponse = z.infer<typeof queryResponseSchema>;

export const sessionSummarySchema = z.object({
  status: sessionStatusSchema,
  createdAt: z.string().datetime(),
  lastAccessed: z.string().datetime(),
  currentQuery: z.string().nullable(),
  pageUrl: z.string().nullable(),
});

export type SessionSummary = z.infer<typeof sessionSummarySchema>;

export const sessionListResponseSchema = z.object({
  activeSessions: z.number().int().nonnegative(),
  sessions: z.record(sessionSummarySchema),
});

export type SessionListResponse = z.infer<typeof sessionListResponseSchema>;

export const closeSessionResponseSchema = z.object({
  message: z.string(),
});

export type CloseSessionResponse = z.infer<typeof closeSessionResponseSchema>;

/** Body of every non-2xx answer. */
export const errorResponseSchema = z.object({
  error: z.string(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
