/**
 * Tests for the transition tag parser
 */

import { describe, it, expect } from 'vitest';
import { parseTransitions, validateSingle, formatTransition } from './transition-parser';
import { Transition } from '../types/workflow';

function parseOk(text: string): Transition[] {
  const result = parseTransitions(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('parseTransitions', () => {
  it('should parse a goto tag with a trimmed target', () => {
    expect(parseOk('Done.\n<goto>  NEXT.md \n</goto>')).toEqual([
      { tag: 'goto', target: 'NEXT.md', attributes: {}, payload: '' },
    ]);
  });

  it('should parse attributes with either quote style', () => {
    const [transition] = parseOk(`<fork next="MAIN.md" item='task one'>WORKER.md</fork>`);
    expect(transition.attributes).toEqual({ next: 'MAIN.md', item: 'task one' });
  });

  it('should keep the other quote character inside an attribute value', () => {
    const [transition] = parseOk(`<fork next="MAIN.md" label='say "hi"' note="it's">WORKER.md</fork>`);
    expect(transition.attributes).toEqual({ next: 'MAIN.md', label: 'say "hi"', note: "it's" });
  });

  it('should keep result content raw as payload with an empty target', () => {
    const [transition] = parseOk('<result>\n  line one\n  line two\n</result>');
    expect(transition).toEqual({
      tag: 'result',
      target: '',
      attributes: {},
      payload: '\n  line one\n  line two\n',
    });
  });

  it('should allow an empty result', () => {
    expect(parseOk('<result></result>')[0].payload).toBe('');
  });

  it('should ignore unknown tags entirely', () => {
    const transitions = parseOk('<thinking>hmm</thinking><goto>A.md</goto><b>bold</b>');
    expect(transitions).toHaveLength(1);
    expect(transitions[0].target).toBe('A.md');
  });

  it('should return every recognized tag in order', () => {
    const transitions = parseOk('<goto>A.md</goto> then <reset>B.md</reset>');
    expect(transitions.map((t) => t.tag)).toEqual(['goto', 'reset']);
  });

  it('should reject an empty target', () => {
    const result = parseTransitions('<goto>   </goto>');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Tag <goto> has empty target. Non-result tags must specify a target filename.'
      );
    }
  });

  it('should reject targets containing path separators', () => {
    for (const target of ['dir/NEXT.md', 'dir\\NEXT.md']) {
      const result = parseTransitions(`<goto>${target}</goto>`);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('PARSE_ERROR');
        expect(result.error.message).toContain('contains path separator');
      }
    }
  });

  it('should match multi-line content', () => {
    expect(parseOk('<call return="R.md">\nSUB.md\n</call>')[0]).toEqual({
      tag: 'call',
      target: 'SUB.md',
      attributes: { return: 'R.md' },
      payload: '',
    });
  });
});

describe('validateSingle', () => {
  it('should accept exactly one transition', () => {
    const result = validateSingle(parseOk('<goto>A.md</goto>'));
    expect(result.ok).toBe(true);
  });

  it('should reject zero transitions', () => {
    const result = validateSingle([]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Expected exactly one transition, found 0');
    }
  });

  it('should reject multiple transitions', () => {
    const result = validateSingle(parseOk('<goto>A.md</goto><goto>B.md</goto>'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Expected exactly one transition, found 2');
    }
  });
});

describe('formatTransition', () => {
  const samples: Transition[] = [
    { tag: 'goto', target: 'NEXT.md', attributes: {}, payload: '' },
    { tag: 'reset', target: 'START.md', attributes: { cd: 'sub' }, payload: '' },
    { tag: 'function', target: 'EVAL.md', attributes: { return: 'BACK.md' }, payload: '' },
    { tag: 'call', target: 'SUB.md', attributes: { return: 'BACK.md' }, payload: '' },
    { tag: 'fork', target: 'WORKER.md', attributes: { next: 'MAIN.md', item: 'first' }, payload: '' },
    { tag: 'result', target: '', attributes: {}, payload: 'all good' },
  ];

  it('should render tags that parse back to the same transition', () => {
    for (const sample of samples) {
      expect(parseOk(formatTransition(sample))).toEqual([sample]);
    }
  });

  it('should single-quote attribute values containing double quotes', () => {
    const transition: Transition = {
      tag: 'fork',
      target: 'WORKER.md',
      attributes: { next: 'MAIN.md', label: 'say "hi"' },
      payload: '',
    };
    expect(formatTransition(transition)).toBe(
      `<fork next="MAIN.md" label='say "hi"'>WORKER.md</fork>`
    );
    expect(parseOk(formatTransition(transition))).toEqual([transition]);
  });
});
