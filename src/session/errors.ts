// ── Registry errors ─────────────────────────────────────────
// Each carries the HTTP status the service answers with.

export class SessionNotFoundError extends Error {
  readonly statusCode: number = 404;
  readonly sessionId: string;

  constructor(sessionId: string, message = 'Session not found') {
    super(message);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class SessionExpiredError extends SessionNotFoundError {
  constructor(sessionId: string) {
    super(sessionId, 'Session expired');
    this.name = 'SessionExpiredError';
  }
}

export class QueryInProgressError extends Error {
  readonly statusCode: number = 409;
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('A query is already running in this session');
    this.name = 'QueryInProgressError';
    this.sessionId = sessionId;
  }
}

export class ResourceUnavailableError extends Error {
  readonly statusCode: number = 503;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Failed to create session: ${reason}`, options);
    this.name = 'ResourceUnavailableError';
  }
}
