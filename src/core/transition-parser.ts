/**
 * Transition tag parser
 * Extracts <goto>, <reset>, <function>, <call>, <fork> and <result> tags from step output
 */

import { Transition, isTransitionTag } from '../types/workflow';
import { Result, ok, err } from '../types/result';
import { ParseError } from './errors';

const TAG_PATTERN = /<(\w+)([^>]*)>([\s\S]*?)<\/\1>/g;
// A value runs to the quote that opened it, so the other quote may appear inside
const ATTRIBUTE_PATTERN = /(\w+)=(["'])(.*?)\2/g;

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of raw.matchAll(ATTRIBUTE_PATTERN)) {
    attributes[match[1]] = match[3];
  }
  return attributes;
}

/**
 * Parse every recognized transition tag in order of appearance.
 * Unknown tag names are skipped and not counted.
 */
export function parseTransitions(text: string): Result<Transition[], ParseError> {
  const transitions: Transition[] = [];

  for (const match of text.matchAll(TAG_PATTERN)) {
    const [, tagName, rawAttributes, content] = match;
    if (!isTransitionTag(tagName)) {
      continue;
    }

    const attributes = parseAttributes(rawAttributes);

    if (tagName === 'result') {
      transitions.push({ tag: tagName, target: '', attributes, payload: content });
      continue;
    }

    const target = content.trim();
    if (!target) {
      return err(
        new ParseError(
          `Tag <${tagName}> has empty target. Non-result tags must specify a target filename.`
        )
      );
    }
    if (target.includes('/') || target.includes('\\')) {
      return err(
        new ParseError(
          `Path '${target}' contains path separator. Tag targets must be filenames only, not paths.`
        )
      );
    }

    transitions.push({ tag: tagName, target, attributes, payload: '' });
  }

  return ok(transitions);
}

/**
 * Require exactly one transition
 */
export function validateSingle(transitions: Transition[]): Result<Transition, ParseError> {
  if (transitions.length !== 1) {
    return err(new ParseError(`Expected exactly one transition, found ${transitions.length}`));
  }
  return ok(transitions[0]);
}

function quoteAttribute(value: string): string {
  return value.includes('"') ? `'${value}'` : `"${value}"`;
}

/**
 * Render a transition back to its tag form
 */
export function formatTransition(transition: Transition): string {
  const attrs = Object.entries(transition.attributes)
    .map(([key, value]) => ` ${key}=${quoteAttribute(value)}`)
    .join('');
  const body = transition.tag === 'result' ? transition.payload : transition.target;
  return `<${transition.tag}${attrs}>${body}</${transition.tag}>`;
}
