import { randomUUID } from 'node:crypto';
import { clearInterval, setInterval } from 'node:timers';

import type { SessionSummary } from '../schema/session.js';
import { TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import {
  ResourceUnavailableError,
  SessionExpiredError,
  SessionNotFoundError,
} from './errors.js';
import { SessionRecord } from './record.js';
import type { SessionResourceFactory, SessionResources } from './types.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionRegistryOptions {
  sweepIntervalMs?: number | undefined;
  idFactory?: (() => string) | undefined;
}

// ── Registry ─────────────────────────────────────────────────

/**
 * In-memory store of browsing sessions with TTL expiry.
 *
 * Every structural change goes through synchronous code on the map, so
 * insert, lookup, take and scan never interleave. Resource release
 * happens after the record has left the map and never blocks lookups.
 */
export class SessionRegistry {
  readonly #sessions = new Map<string, SessionRecord>();
  readonly #sweepIntervalMs: number;
  readonly #idFactory: () => string;

  #factory: SessionResourceFactory | null = null;
  #sweepTimer: NodeJS.Timeout | null = null;
  #sweeping = false;
  /** Bumped by `closeAll`; a create that spans a shutdown must not insert. */
  #shutdowns = 0;

  constructor(options: SessionRegistryOptions = {}) {
    this.#sweepIntervalMs = options.sweepIntervalMs ?? TIMEOUTS.SWEEP_INTERVAL;
    this.#idFactory = options.idFactory ?? randomUUID;
  }

  // ── Lifecycle ──────────────────────────────────────────────

  /** Attach the resource factory and start the periodic expiry sweep. */
  initialize(factory: SessionResourceFactory): void {
    this.#factory = factory;
    if (this.#sweepTimer) return;

    this.#sweepTimer = setInterval(() => {
      void this.#runSweep();
    }, this.#sweepIntervalMs);
    this.#sweepTimer.unref();
  }

  /** Close every session concurrently, then stop the sweep. */
  async closeAll(): Promise<void> {
    this.#shutdowns += 1;
    const ids = [...this.#sessions.keys()];
    const results = await Promise.allSettled(ids.map((id) => this.close(id)));

    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        log.warn(`Error closing session ${ids[index] ?? '?'}: ${describe(result.reason)}`);
      }
    }

    if (this.#sweepTimer) {
      clearInterval(this.#sweepTimer);
      this.#sweepTimer = null;
    }
    this.#factory = null;
  }

  // ── Operations ─────────────────────────────────────────────

  async create(
    timeoutMinutes: number = TIMEOUTS.SESSION_TIMEOUT_MINUTES,
  ): Promise<SessionRecord> {
    const factory = this.#factory;
    if (!factory) {
      throw new ResourceUnavailableError('browser not initialized');
    }

    const shutdowns = this.#shutdowns;
    let resources: SessionResources;
    try {
      resources = await factory();
    } catch (err) {
      log.error(`Failed to create session: ${describe(err)}`);
      throw new ResourceUnavailableError(describe(err), { cause: err });
    }

    if (this.#shutdowns !== shutdowns) {
      try {
        await resources.context.close();
      } catch (err) {
        log.warn(`Error closing page opened during shutdown: ${describe(err)}`);
      }
      throw new ResourceUnavailableError('registry closed while the session was opening');
    }

    const id = this.#allocateId();
    const record = new SessionRecord(id, resources, timeoutMinutes);
    this.#sessions.set(id, record);

    log.session(id, 'Created session');
    return record;
  }

  /** Look up a live session and mark it as accessed. */
  get(sessionId: string): SessionRecord {
    const record = this.#sessions.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }

    const now = Date.now();
    if (record.isExpired(now)) {
      const taken = this.#take(sessionId);
      if (taken) {
        void this.#release(taken, 'expired');
      }
      throw new SessionExpiredError(sessionId);
    }

    record.touch(now);
    return record;
  }

  async close(sessionId: string): Promise<boolean> {
    const record = this.#take(sessionId);
    if (!record) return false;

    await this.#release(record, 'closed');
    return true;
  }

  /** Close every session that is expired right now. Returns how many. */
  async sweepExpired(): Promise<number> {
    const now = Date.now();
    const expired: SessionRecord[] = [];

    for (const [id, record] of this.#sessions) {
      if (record.isExpired(now)) {
        const taken = this.#take(id);
        if (taken) expired.push(taken);
      }
    }

    for (const record of expired) {
      log.session(record.id, 'Cleaning up expired session');
    }
    await Promise.all(expired.map((record) => this.#release(record, 'expired')));

    return expired.length;
  }

  // ── Monitoring ─────────────────────────────────────────────

  count(): number {
    return this.#sessions.size;
  }

  snapshot(): Record<string, SessionSummary> {
    const out: Record<string, SessionSummary> = {};
    for (const [id, record] of this.#sessions) {
      out[id] = record.summary();
    }
    return out;
  }

  // ── Internals ──────────────────────────────────────────────

  #allocateId(): string {
    let id = this.#idFactory();
    while (this.#sessions.has(id)) {
      id = this.#idFactory();
    }
    return id;
  }

  /** Remove-if-present: only one caller ever gets a given record back. */
  #take(sessionId: string): SessionRecord | undefined {
    const record = this.#sessions.get(sessionId);
    if (!record) return undefined;
    this.#sessions.delete(sessionId);
    return record;
  }

  async #release(record: SessionRecord, reason: string): Promise<void> {
    try {
      await record.release();
    } catch (err) {
      log.warn(`Error closing page for session ${record.id}: ${describe(err)}`);
    }
    log.session(record.id, `Session ${reason}`);
  }

  async #runSweep(): Promise<void> {
    if (this.#sweeping) return;
    this.#sweeping = true;
    try {
      await this.sweepExpired();
    } catch (err) {
      log.error(`Error in cleanup task: ${describe(err)}`);
    } finally {
      this.#sweeping = false;
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
