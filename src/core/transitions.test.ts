/**
 * Tests for the transition engine
 */

import { describe, it, expect } from 'vitest';
import { applyTransition, forkChildId, validateRequiredAttributes, TransitionOutcome } from './transitions';
import { AgentState, Transition, TransitionTag } from '../types/workflow';
import { unwrap } from '../types/result';

const context = { forkCounters: {}, processCwd: '/work' };

function agent(overrides: Partial<AgentState> = {}): AgentState {
  return {
    id: 'main',
    state: 'START.md',
    session: 's1',
    stack: [],
    status: 'active',
    retryCount: 0,
    ...overrides,
  };
}

function tag(
  name: TransitionTag,
  target: string,
  attributes: Record<string, string> = {},
  payload = ''
): Transition {
  return { tag: name, target, attributes, payload };
}

function advanced(outcome: TransitionOutcome): AgentState {
  if (outcome.kind !== 'advance') {
    throw new Error(`expected advance, got ${outcome.kind}`);
  }
  return outcome.agent;
}

describe('applyTransition', () => {
  it('should keep the session on goto', () => {
    const next = advanced(unwrap(applyTransition(agent(), tag('goto', 'NEXT.md'), context)));
    expect(next.state).toBe('NEXT.md');
    expect(next.session).toBe('s1');
    expect(next.stack).toEqual([]);
  });

  it('should clear one-shot fields before applying', () => {
    const start = agent({ pendingResult: 'done', forkSessionId: 's0', forkAttributes: { item: 'a' } });
    const next = advanced(unwrap(applyTransition(start, tag('goto', 'NEXT.md'), context)));
    expect(next.pendingResult).toBeUndefined();
    expect(next.forkSessionId).toBeUndefined();
    expect(next.forkAttributes).toBeUndefined();
  });

  it('should not mutate the input agent', () => {
    const start = agent();
    applyTransition(start, tag('function', 'EVAL.md', { return: 'NEXT.md' }), context);
    expect(start).toEqual(agent());
  });

  it('should drop the session and stack on reset', () => {
    const start = agent({ stack: [{ session: 's0', state: 'BACK.md' }] });
    const outcome = unwrap(applyTransition(start, tag('reset', 'FRESH.md'), context));
    const next = advanced(outcome);
    expect(next.session).toBeNull();
    expect(next.stack).toEqual([]);
    expect(outcome.warnings).toEqual(['Reset from START.md discarded 1 return frame(s)']);
  });

  it('should resolve reset cd against the process cwd', () => {
    const next = advanced(unwrap(applyTransition(agent(), tag('reset', 'FRESH.md', { cd: 'sub' }), context)));
    expect(next.cwd).toBe('/work/sub');
  });

  it('should resolve reset cd against the agent cwd when it has one', () => {
    const start = agent({ cwd: '/repo' });
    const next = advanced(unwrap(applyTransition(start, tag('reset', 'FRESH.md', { cd: '../other' }), context)));
    expect(next.cwd).toBe('/other');
  });

  it('should push a frame with the caller session on function', () => {
    const next = advanced(
      unwrap(applyTransition(agent(), tag('function', 'EVAL.md', { return: 'NEXT.md' }), context))
    );
    expect(next.state).toBe('EVAL.md');
    expect(next.session).toBeNull();
    expect(next.stack).toEqual([{ session: 's1', state: 'NEXT.md' }]);
  });

  it('should stack nested function frames', () => {
    const first = advanced(
      unwrap(applyTransition(agent(), tag('function', 'A.md', { return: 'R1.md' }), context))
    );
    const second = advanced(
      unwrap(applyTransition({ ...first, session: 's2' }, tag('function', 'B.md', { return: 'R2.md' }), context))
    );
    expect(second.stack).toEqual([
      { session: 's1', state: 'R1.md' },
      { session: 's2', state: 'R2.md' },
    ]);
  });

  it('should keep the session and mark it for forking on call', () => {
    const next = advanced(
      unwrap(applyTransition(agent(), tag('call', 'CHILD.md', { return: 'NEXT.md' }), context))
    );
    expect(next.session).toBe('s1');
    expect(next.forkSessionId).toBe('s1');
    expect(next.stack).toEqual([{ session: 's1', state: 'NEXT.md' }]);
  });

  it('should pop the frame and restore the caller session on result', () => {
    const start = agent({ session: 'callee', stack: [{ session: 's1', state: 'NEXT.md' }] });
    const next = advanced(unwrap(applyTransition(start, tag('result', '', {}, 'answer'), context)));
    expect(next.state).toBe('NEXT.md');
    expect(next.session).toBe('s1');
    expect(next.stack).toEqual([]);
    expect(next.pendingResult).toBe('answer');
  });

  it('should terminate on result with an empty stack', () => {
    const outcome = unwrap(applyTransition(agent(), tag('result', '', {}, 'final'), context));
    expect(outcome).toMatchObject({ kind: 'terminate', agentId: 'main', payload: 'final' });
  });

  it('should spawn a child on fork', () => {
    const outcome = unwrap(
      applyTransition(
        agent(),
        tag('fork', 'WORKER.md', { next: 'WAIT.md', item: 'alpha', cd: 'pkg' }),
        context
      )
    );
    if (outcome.kind !== 'spawn') {
      throw new Error('expected spawn');
    }
    expect(outcome.agent.state).toBe('WAIT.md');
    expect(outcome.agent.session).toBe('s1');
    expect(outcome.child).toEqual({
      id: 'main_worker1',
      state: 'WORKER.md',
      session: null,
      stack: [],
      status: 'active',
      retryCount: 0,
      cwd: '/work/pkg',
      forkAttributes: { item: 'alpha' },
    });
    expect(outcome.forkCounters).toEqual({ main: 1 });
  });

  it('should leave fork attributes unset when only next is given', () => {
    const outcome = unwrap(applyTransition(agent(), tag('fork', 'WORKER.md', { next: 'WAIT.md' }), context));
    expect(outcome.kind === 'spawn' && outcome.child.forkAttributes).toBeUndefined();
  });

  it('should keep fork ids monotonic per parent', () => {
    const outcome = unwrap(
      applyTransition(agent(), tag('fork', 'WORKER.md', { next: 'WAIT.md' }), {
        forkCounters: { main: 2, other: 7 },
        processCwd: '/work',
      })
    );
    expect(outcome.kind === 'spawn' && outcome.child.id).toBe('main_worker3');
    expect(outcome.kind === 'spawn' && outcome.forkCounters).toEqual({ main: 3, other: 7 });
  });

  it('should reject function without return', () => {
    const result = applyTransition(agent(), tag('function', 'EVAL.md'), context);
    expect(!result.ok && result.error.message).toBe(
      `<function> tag requires 'return' attribute. Example: <function return="NEXT.md">EVAL.md</function>`
    );
  });

  it('should reject fork without next', () => {
    const result = applyTransition(agent(), tag('fork', 'WORKER.md'), context);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe('PARSE_ERROR');
  });
});

describe('validateRequiredAttributes', () => {
  it('should accept tags without required attributes', () => {
    expect(validateRequiredAttributes(tag('goto', 'A.md')).ok).toBe(true);
    expect(validateRequiredAttributes(tag('call', 'A.md', { return: 'B.md' })).ok).toBe(true);
  });
});

describe('forkChildId', () => {
  it('should abbreviate and lowercase the target name', () => {
    expect(forkChildId('main', 'IMPLEMENT_FEATURE.md', 4)).toBe('main_implem4');
    expect(forkChildId('main_worker1', 'QA', 1)).toBe('main_worker1_qa1');
  });
});
