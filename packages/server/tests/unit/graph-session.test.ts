import { describe, expect, test, vi } from 'vitest';
import { createEmptyGraph } from '@nodepatch/core';
import { GraphSession } from '../../src/session/graph-session.js';

describe('GraphSession', () => {
  test('starts empty unless given a workflow', () => {
    expect(new GraphSession().graph).toEqual({ nodes: {}, links: [], meta: {} });
  });

  test('notifies listeners on commit until they unsubscribe', () => {
    const session = new GraphSession();
    const listener = vi.fn();
    const unsubscribe = session.onUpdate(listener);
    const next = createEmptyGraph({ title: 'next' });

    session.commit(next);
    expect(session.graph).toBe(next);
    expect(listener).toHaveBeenCalledWith(next);

    unsubscribe();
    session.commit(createEmptyGraph());
    expect(listener).toHaveBeenCalledTimes(1);
    expect(session.listenerCount).toBe(0);
  });

  test('clearListeners drops every subscriber', () => {
    const session = new GraphSession();
    session.onUpdate(vi.fn());
    session.onUpdate(vi.fn());
    expect(session.listenerCount).toBe(2);
    session.clearListeners();
    expect(session.listenerCount).toBe(0);
  });
});
