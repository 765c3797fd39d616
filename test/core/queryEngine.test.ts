import { describe, expect, it, vi } from 'vitest';

import { QueryEngine } from '../../src/core/queryEngine.js';
import { QueryInProgressError } from '../../src/session/errors.js';
import { SessionRecord } from '../../src/session/record.js';
import type { DecisionGraph } from '../../src/session/types.js';
import { blockingGraph, endlessGraph, fakeContext, scriptedGraph } from '../helpers.js';

function recordWith(graph: DecisionGraph): SessionRecord {
  return new SessionRecord('sess-1', { context: fakeContext(), graph }, 30);
}

async function settled(record: SessionRecord): Promise<void> {
  await vi.waitFor(() => {
    expect(record.state.status).not.toBe('processing');
  });
}

describe('QueryEngine', () => {
  const engine = new QueryEngine();

  it('marks the record processing before any step runs', () => {
    const record = recordWith(scriptedGraph([]));

    const state = engine.submit(record, 'what is up?');

    expect(state).toMatchObject({
      status: 'processing',
      currentQuery: 'what is up?',
      currentStep: 0,
      currentAction: null,
      result: null,
      error: null,
    });
  });

  it('completes with the first answer argument', async () => {
    const record = recordWith(
      scriptedGraph([
        { node: 'agent', prediction: 'Thought: search\nAction: Click 1' },
        { node: 'Click', observation: 'Clicked 1' },
        { node: 'update_scratchpad' },
        { node: 'agent', prediction: { kind: 'answer', args: ['42'] } },
      ]),
    );

    engine.submit(record, 'q');
    await settled(record);

    expect(record.state).toMatchObject({
      status: 'completed',
      currentStep: 2,
      currentAction: 'ANSWER: ["42"]',
      result: '42',
      error: null,
    });
  });

  it('counts unparseable replies as steps', async () => {
    const record = recordWith(
      scriptedGraph([
        { node: 'agent', prediction: 'garbage' },
        { node: 'agent', prediction: 'Action: ANSWER; ok' },
      ]),
    );

    engine.submit(record, 'q');
    await settled(record);

    expect(record.state.currentStep).toBe(2);
    expect(record.state.result).toBe('ok');
  });

  it('completes with a null result for an answer without arguments', async () => {
    const record = recordWith(
      scriptedGraph([{ node: 'agent', prediction: { kind: 'answer', args: null } }]),
    );

    engine.submit(record, 'q');
    await settled(record);

    expect(record.state.status).toBe('completed');
    expect(record.state.result).toBeNull();
    expect(record.state.currentAction).toBe('ANSWER: none');
  });

  it('fails once the step budget is exceeded', async () => {
    const record = recordWith(endlessGraph());

    engine.submit(record, 'q', 150);
    await settled(record);

    expect(record.state).toMatchObject({
      status: 'error',
      currentStep: 151,
      error: 'Max steps (150) exceeded',
    });
  });

  it('records a stream failure as an error', async () => {
    const record = recordWith(
      scriptedGraph([
        { node: 'agent', prediction: 'Action: Wait' },
        new Error('browser crashed'),
      ]),
    );

    engine.submit(record, 'q');
    await settled(record);

    expect(record.state).toMatchObject({
      status: 'error',
      currentStep: 1,
      error: 'browser crashed',
    });
  });

  it('completes with a null result when the stream ends without an answer', async () => {
    const record = recordWith(scriptedGraph([{ node: 'agent', prediction: 'Action: Wait' }]));

    engine.submit(record, 'q');
    await settled(record);

    expect(record.state).toMatchObject({ status: 'completed', result: null, currentStep: 1 });
  });

  it('rejects a second query and leaves the running one untouched', async () => {
    const record = recordWith(blockingGraph());
    engine.submit(record, 'first');
    await vi.waitFor(() => {
      expect(record.state.currentStep).toBe(1);
    });
    const before = record.state;

    expect(() => engine.submit(record, 'second')).toThrow(QueryInProgressError);
    expect(record.state).toBe(before);
    expect(record.state.currentQuery).toBe('first');

    await record.cancelRun();
  });

  it('clears the previous outcome on a new query', async () => {
    const record = recordWith(
      scriptedGraph([{ node: 'agent', prediction: 'Action: ANSWER; first' }]),
    );
    engine.submit(record, 'one');
    await settled(record);
    expect(record.state.result).toBe('first');

    const state = engine.submit(record, 'two');
    expect(state).toMatchObject({ status: 'processing', currentQuery: 'two', result: null });
    await settled(record);
  });

  it('stops writing to the record after cancellation', async () => {
    const onStop = vi.fn();
    const record = recordWith(blockingGraph(onStop));
    engine.submit(record, 'q');
    await vi.waitFor(() => {
      expect(record.state.currentStep).toBe(1);
    });

    await record.cancelRun();

    expect(onStop).toHaveBeenCalledTimes(1);
    expect(record.state.status).toBe('processing');
    expect(record.state.currentStep).toBe(1);
  });
});
