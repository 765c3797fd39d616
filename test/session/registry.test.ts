import { afterEach, describe, expect, it, vi } from 'vitest';

import { QueryEngine } from '../../src/core/queryEngine.js';
import {
  ResourceUnavailableError,
  SessionExpiredError,
  SessionNotFoundError,
} from '../../src/session/errors.js';
import { SessionRegistry } from '../../src/session/registry.js';
import type { SessionResourceFactory } from '../../src/session/types.js';
import {
  blockingGraph,
  fakeContext,
  scriptedGraph,
  sequentialIds,
  staticFactory,
} from '../helpers.js';

const T0 = new Date('2026-01-01T00:00:00.000Z').getTime();
const MINUTE = 60_000;

function createRegistry(factory: SessionResourceFactory = staticFactory(() => scriptedGraph([]))) {
  const registry = new SessionRegistry({ idFactory: sequentialIds() });
  registry.initialize(factory);
  return registry;
}

/** Factory that hands out a fresh fake context each time and remembers it. */
function trackingFactory() {
  const contexts: Array<ReturnType<typeof fakeContext>> = [];
  const factory: SessionResourceFactory = async () => {
    const context = fakeContext();
    contexts.push(context);
    return { context, graph: scriptedGraph([]) };
  };
  return { contexts, factory };
}

describe('SessionRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('create', () => {
    it('starts active with lastAccessed equal to createdAt', async () => {
      const registry = createRegistry();

      const record = await registry.create();

      expect(record.id).toBe('s-1');
      expect(record.state.status).toBe('active');
      expect(record.state.lastAccessed).toBe(record.createdAt);
      expect(record.timeoutMs).toBe(30 * MINUTE);
      expect(registry.count()).toBe(1);
      await registry.closeAll();
    });

    it('skips ids that are already taken', async () => {
      const ids = ['dup', 'dup', 'other'];
      const registry = new SessionRegistry({ idFactory: () => ids.shift() ?? 'x' });
      registry.initialize(staticFactory(() => scriptedGraph([])));

      const first = await registry.create();
      const second = await registry.create();

      expect([first.id, second.id]).toEqual(['dup', 'other']);
      await registry.closeAll();
    });

    it('fails when no factory is attached', async () => {
      const registry = new SessionRegistry();

      await expect(registry.create()).rejects.toThrow(
        new ResourceUnavailableError('browser not initialized'),
      );
    });

    it('wraps factory failures and stores nothing', async () => {
      const registry = createRegistry(async () => {
        throw new Error('no browser');
      });

      const attempt = registry.create();

      await expect(attempt).rejects.toBeInstanceOf(ResourceUnavailableError);
      await expect(attempt).rejects.toThrow('Failed to create session: no browser');
      expect(registry.count()).toBe(0);
      await registry.closeAll();
    });
  });

  describe('get', () => {
    it('throws not-found for an unknown id', () => {
      const registry = createRegistry();

      expect(() => registry.get('missing')).toThrow(new SessionNotFoundError('missing'));
    });

    it('refreshes lastAccessed', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const registry = createRegistry();
      const record = await registry.create();

      vi.setSystemTime(T0 + 5 * MINUTE);
      registry.get(record.id);

      expect(record.state.lastAccessed).toBe(T0 + 5 * MINUTE);
      expect(record.createdAt).toBe(T0);
      await registry.closeAll();
    });

    it('removes and reports an expired session', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const { contexts, factory } = trackingFactory();
      const registry = createRegistry(factory);
      const record = await registry.create(60);

      vi.setSystemTime(T0 + 61 * MINUTE);

      expect(() => registry.get(record.id)).toThrow(SessionExpiredError);
      expect(registry.count()).toBe(0);
      expect(() => registry.get(record.id)).toThrow(new SessionNotFoundError(record.id));
      await vi.waitFor(() => {
        expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
      });
    });

    it('keeps a session alive at exactly its timeout', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const registry = createRegistry();
      const record = await registry.create(1);

      vi.setSystemTime(T0 + MINUTE);

      expect(registry.get(record.id)).toBe(record);
      await registry.closeAll();
    });
  });

  describe('close', () => {
    it('returns false for an unknown id', async () => {
      const registry = createRegistry();

      await expect(registry.close('missing')).resolves.toBe(false);
    });

    it('releases the page once, even when closed twice', async () => {
      const { contexts, factory } = trackingFactory();
      const registry = createRegistry(factory);
      const record = await registry.create();

      const results = await Promise.all([registry.close(record.id), registry.close(record.id)]);

      expect(results.sort()).toEqual([false, true]);
      expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
      expect(registry.count()).toBe(0);
    });

    it('stops a running query before closing the page', async () => {
      const order: string[] = [];
      const registry = createRegistry(async () => ({
        context: fakeContext('https://start.test/', () => order.push('context-closed')),
        graph: blockingGraph(() => order.push('graph-stopped')),
      }));
      const record = await registry.create();
      new QueryEngine().submit(record, 'q');
      await vi.waitFor(() => {
        expect(record.state.currentStep).toBe(1);
      });

      await expect(registry.close(record.id)).resolves.toBe(true);

      expect(order).toEqual(['graph-stopped', 'context-closed']);
    });

    it('still removes the session when the page fails to close', async () => {
      const registry = createRegistry(async () => {
        const context = fakeContext();
        context.close.mockRejectedValueOnce(new Error('target closed'));
        return { context, graph: scriptedGraph([]) };
      });
      const record = await registry.create();

      await expect(registry.close(record.id)).resolves.toBe(true);
      expect(registry.count()).toBe(0);
    });
  });

  describe('closeAll', () => {
    it('closes every session even when some fail', async () => {
      let calls = 0;
      const registry = createRegistry(async () => {
        calls += 1;
        const context = fakeContext();
        if (calls === 2) context.close.mockRejectedValueOnce(new Error('boom'));
        return { context, graph: scriptedGraph([]) };
      });
      await registry.create();
      await registry.create();
      await registry.create();

      await registry.closeAll();

      expect(registry.count()).toBe(0);
      await expect(registry.create()).rejects.toBeInstanceOf(ResourceUnavailableError);
    });
  });

  describe('create during closeAll', () => {
    it('releases the page instead of storing the session', async () => {
      const context = fakeContext();
      let openPage: () => void = () => undefined;
      const pageOpened = new Promise<void>((resolve) => {
        openPage = resolve;
      });
      const registry = createRegistry(async () => {
        await pageOpened;
        return { context, graph: scriptedGraph([]) };
      });

      const creating = registry.create();
      await registry.closeAll();
      openPage();

      await expect(creating).rejects.toThrow(
        'Failed to create session: registry closed while the session was opening',
      );
      expect(registry.count()).toBe(0);
      expect(context.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('sweepExpired', () => {
    it('removes only expired sessions', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const { contexts, factory } = trackingFactory();
      const registry = createRegistry(factory);
      const short = await registry.create(1);
      const long = await registry.create(10);

      vi.setSystemTime(T0 + 5 * MINUTE);

      await expect(registry.sweepExpired()).resolves.toBe(1);
      expect(registry.count()).toBe(1);
      expect(() => registry.get(short.id)).toThrow(SessionNotFoundError);
      expect(registry.get(long.id)).toBe(long);
      expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
      expect(contexts[1]?.close).not.toHaveBeenCalled();
      await registry.closeAll();
    });

    it('never releases a session that a lookup already took', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const { contexts, factory } = trackingFactory();
      const registry = createRegistry(factory);
      const record = await registry.create(1);

      vi.setSystemTime(T0 + 2 * MINUTE);
      expect(() => registry.get(record.id)).toThrow(SessionExpiredError);

      await expect(registry.sweepExpired()).resolves.toBe(0);
      await vi.waitFor(() => {
        expect(contexts[0]?.close).toHaveBeenCalledTimes(1);
      });
    });

    it('runs periodically once initialized', async () => {
      const registry = new SessionRegistry({ sweepIntervalMs: 10 });
      registry.initialize(staticFactory(() => scriptedGraph([])));
      await registry.create(0.0001);

      await vi.waitFor(() => {
        expect(registry.count()).toBe(0);
      });
      await registry.closeAll();
    });
  });

  describe('snapshot', () => {
    it('summarises every live session', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
      const registry = createRegistry(staticFactory(() => scriptedGraph([]), 'https://page.test/a'));
      const record = await registry.create();

      const snapshot = registry.snapshot();
      record.update({ status: 'processing', currentQuery: 'later' });

      expect(snapshot).toEqual({
        's-1': {
          status: 'active',
          createdAt: '2026-01-01T00:00:00.000Z',
          lastAccessed: '2026-01-01T00:00:00.000Z',
          currentQuery: null,
          pageUrl: 'https://page.test/a',
        },
      });
      await registry.closeAll();
    });
  });
});
