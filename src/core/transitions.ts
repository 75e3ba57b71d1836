/**
 * Transition engine
 *
 * Applies one of the six transition semantics to an agent. Every handler works
 * on an isolated copy with the one-shot fields already cleared, and returns the
 * agent(s) that replace the input instead of mutating shared state.
 */

import { isAbsolute, resolve } from 'path';
import { AgentState, Transition, clearTransientFields } from '../types/workflow';
import { Result, ok, err } from '../types/result';
import { ParseError } from './errors';
import { stripStateExtension } from './state-resolver';

/**
 * Workflow-level inputs a transition may read
 */
export interface TransitionContext {
  /** Per-parent fork counters of the workflow */
  forkCounters: Readonly<Record<string, number>>;
  /** Directory `cd` attributes are resolved against when the agent has none */
  processCwd: string;
}

/**
 * What applying a transition produced
 */
export type TransitionOutcome =
  | { kind: 'advance'; agent: AgentState; description: string; warnings: string[] }
  | {
      kind: 'spawn';
      agent: AgentState;
      child: AgentState;
      forkCounters: Record<string, number>;
      description: string;
      warnings: string[];
    }
  | { kind: 'terminate'; agentId: string; payload: string; description: string; warnings: string[] };

const REQUIRED_ATTRIBUTES: Partial<Record<Transition['tag'], { name: string; example: string }>> = {
  function: { name: 'return', example: '<function return="NEXT.md">EVAL.md</function>' },
  call: { name: 'return', example: '<call return="NEXT.md">CHILD.md</call>' },
  fork: { name: 'next', example: '<fork next="NEXT.md">WORKER.md</fork>' },
};

/**
 * Check that function/call carry `return` and fork carries `next`
 */
export function validateRequiredAttributes(transition: Transition): Result<void, ParseError> {
  const required = REQUIRED_ATTRIBUTES[transition.tag];
  if (required && !transition.attributes[required.name]) {
    return err(
      new ParseError(
        `<${transition.tag}> tag requires '${required.name}' attribute. Example: ${required.example}`
      )
    );
  }
  return ok(undefined);
}

/**
 * Child id: `{parent}_{first 6 chars of the lowercased state name}{counter}`
 */
export function forkChildId(parentId: string, target: string, counter: number): string {
  const abbrev = stripStateExtension(target).toLowerCase().slice(0, 6);
  return `${parentId}_${abbrev}${counter}`;
}

function resolveCwd(base: string, requested: string): string {
  return isAbsolute(requested) ? resolve(requested) : resolve(base, requested);
}

/**
 * Apply a transition to an agent
 */
export function applyTransition(
  agent: AgentState,
  transition: Transition,
  context: TransitionContext
): Result<TransitionOutcome, ParseError> {
  const required = validateRequiredAttributes(transition);
  if (!required.ok) {
    return required;
  }

  const next = clearTransientFields(agent);
  const warnings: string[] = [];

  switch (transition.tag) {
    case 'goto': {
      return ok({
        kind: 'advance',
        agent: { ...next, state: transition.target },
        description: `${agent.state} -> ${transition.target}`,
        warnings,
      });
    }

    case 'reset': {
      if (next.stack.length > 0) {
        warnings.push(
          `Reset from ${agent.state} discarded ${next.stack.length} return frame(s)`
        );
      }
      const updated: AgentState = { ...next, state: transition.target, session: null, stack: [] };
      const cd = transition.attributes.cd;
      if (cd) {
        updated.cwd = resolveCwd(agent.cwd ?? context.processCwd, cd);
      }
      return ok({
        kind: 'advance',
        agent: updated,
        description: `${agent.state} -> ${transition.target} (fresh session)`,
        warnings,
      });
    }

    case 'function': {
      const returnState = transition.attributes.return;
      return ok({
        kind: 'advance',
        agent: {
          ...next,
          state: transition.target,
          session: null,
          stack: [...next.stack, { session: agent.session, state: returnState }],
        },
        description: `${agent.state} -> ${transition.target} (returns to ${returnState})`,
        warnings,
      });
    }

    case 'call': {
      const returnState = transition.attributes.return;
      const updated: AgentState = {
        ...next,
        state: transition.target,
        stack: [...next.stack, { session: agent.session, state: returnState }],
      };
      // The callee branches from the caller's history on its first invocation
      if (agent.session) {
        updated.forkSessionId = agent.session;
      }
      return ok({
        kind: 'advance',
        agent: updated,
        description: `${agent.state} -> ${transition.target} (call, returns to ${returnState})`,
        warnings,
      });
    }

    case 'fork': {
      const counter = (context.forkCounters[agent.id] ?? 0) + 1;
      const childId = forkChildId(agent.id, transition.target, counter);
      const { next: nextState, cd, ...extra } = transition.attributes;

      const child: AgentState = {
        id: childId,
        state: transition.target,
        session: null,
        stack: [],
        status: 'active',
        retryCount: 0,
      };
      if (cd) {
        child.cwd = resolveCwd(agent.cwd ?? context.processCwd, cd);
      } else if (agent.cwd) {
        child.cwd = agent.cwd;
      }
      if (Object.keys(extra).length > 0) {
        child.forkAttributes = extra;
      }

      return ok({
        kind: 'spawn',
        agent: { ...next, state: nextState },
        child,
        forkCounters: { ...context.forkCounters, [agent.id]: counter },
        description: `${agent.state} -> ${nextState}, spawned ${childId} at ${transition.target}`,
        warnings,
      });
    }

    case 'result': {
      const frame = next.stack[next.stack.length - 1];
      if (!frame) {
        return ok({
          kind: 'terminate',
          agentId: agent.id,
          payload: transition.payload,
          description: `${agent.state} -> terminated`,
          warnings,
        });
      }
      return ok({
        kind: 'advance',
        agent: {
          ...next,
          state: frame.state,
          session: frame.session,
          stack: next.stack.slice(0, -1),
          pendingResult: transition.payload,
        },
        description: `${agent.state} -> ${frame.state} (returned)`,
        warnings,
      });
    }
  }
}
