/**
 * Transition policy
 * Frontmatter parsing, allow-list validation, implicit transitions and reminders
 */

import { extname, basename } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { AllowedTransition, Policy } from '../types/policy';
import { Transition, isTransitionTag } from '../types/workflow';
import { isModelName } from '../types/effective-config';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';
import { PolicyViolationError, PromptFileError, errorMessage } from './errors';

const STATE_EXTENSIONS = new Set(['.md', '.sh', '.bat']);

const FRONTMATTER_PATTERN = /^---\s*\n([\s\S]+?)\n---\s*\n/;
const EMPTY_FRONTMATTER_PATTERN = /^---\s*\n---\s*\n/;

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const frontmatterSchema = z
  .object({
    allowed_transitions: z.unknown().optional(),
    model: z.unknown().optional(),
  })
  .passthrough();

const allowedEntrySchema = z.object({ tag: z.string() }).catchall(scalarSchema);

export interface ParsedFrontmatter {
  policy: Policy | null;
  body: string;
}

function toAllowedTransition(
  entry: z.infer<typeof allowedEntrySchema>,
  logger?: Logger
): AllowedTransition | null {
  const { tag, ...rest } = entry;
  if (!isTransitionTag(tag)) {
    logger?.warn(`Ignoring allowed transition with unknown tag '${tag}'`);
    return null;
  }
  const attributes: Record<string, string> = {};
  let target: string | undefined;
  for (const [key, value] of Object.entries(rest)) {
    if (key === 'target') {
      target = String(value);
    } else {
      attributes[key] = String(value);
    }
  }
  return target === undefined ? { tag, attributes } : { tag, target, attributes };
}

/**
 * Split YAML frontmatter from a prompt file.
 * No frontmatter, or an empty one, yields a null policy.
 */
export function parseFrontmatter(
  content: string,
  logger?: Logger
): Result<ParsedFrontmatter, PromptFileError> {
  let yamlContent: string;
  let body: string;

  const match = FRONTMATTER_PATTERN.exec(content);
  if (match) {
    yamlContent = match[1];
    body = content.slice(match[0].length);
  } else {
    const emptyMatch = EMPTY_FRONTMATTER_PATTERN.exec(content);
    if (!emptyMatch) {
      return ok({ policy: null, body: content });
    }
    yamlContent = '';
    body = content.slice(emptyMatch[0].length);
  }

  if (!yamlContent.trim()) {
    return ok({ policy: null, body });
  }

  let data: unknown;
  try {
    data = parseYaml(yamlContent);
  } catch (error) {
    return err(new PromptFileError(`Invalid YAML frontmatter: ${errorMessage(error)}`));
  }

  if (data === null || data === undefined) {
    return ok({ policy: null, body });
  }

  const parsed = frontmatterSchema.safeParse(data);
  if (!parsed.success) {
    return err(new PromptFileError('Invalid YAML frontmatter: expected a mapping'));
  }

  const allowedTransitions: AllowedTransition[] = [];
  const rawList = parsed.data.allowed_transitions;
  if (Array.isArray(rawList)) {
    for (const rawEntry of rawList) {
      const entry = allowedEntrySchema.safeParse(rawEntry);
      if (!entry.success) {
        logger?.warn(
          `Ignoring malformed allowed transition ${JSON.stringify(rawEntry)}: needs a tag and scalar values`
        );
        continue;
      }
      const allowed = toAllowedTransition(entry.data, logger);
      if (allowed) {
        allowedTransitions.push(allowed);
      }
    }
  }

  const policy: Policy = { allowedTransitions };

  const rawModel = parsed.data.model;
  if (typeof rawModel === 'string' && rawModel.trim()) {
    const model = rawModel.trim().toLowerCase();
    if (!isModelName(model)) {
      logger?.warn(
        `Unknown model '${model}' in frontmatter. Valid values: opus, sonnet, haiku. Passing it through as-is.`
      );
    }
    policy.model = model;
  }

  return ok({ policy, body });
}

/**
 * Whether a policy target matches a concrete transition target.
 * An extensionless policy target matches any state extension with the same stem.
 */
export function targetsMatch(policyTarget: string, transitionTarget: string): boolean {
  if (policyTarget === transitionTarget) {
    return true;
  }
  if (extname(policyTarget)) {
    return false;
  }
  const transitionExt = extname(transitionTarget);
  const transitionStem = basename(transitionTarget, transitionExt);
  return transitionStem === policyTarget && STATE_EXTENSIONS.has(transitionExt.toLowerCase());
}

function describeAllowed(allowed: AllowedTransition): string {
  const shape: Record<string, string> = { tag: allowed.tag };
  if (allowed.target !== undefined) {
    shape.target = allowed.target;
  }
  return JSON.stringify({ ...shape, ...allowed.attributes });
}

function matchesAllowed(transition: Transition, allowed: AllowedTransition): boolean {
  if (allowed.tag !== transition.tag) {
    return false;
  }
  if (transition.tag === 'result') {
    return true;
  }
  if (allowed.target !== undefined && !targetsMatch(allowed.target, transition.target)) {
    return false;
  }
  for (const key of ['return', 'next']) {
    const expected = allowed.attributes[key];
    if (expected !== undefined && !targetsMatch(expected, transition.attributes[key] ?? '')) {
      return false;
    }
  }
  return true;
}

/**
 * Check a transition against the state's allow-list.
 * No policy, or an empty allow-list, allows everything.
 */
export function validateTransitionPolicy(
  transition: Transition,
  policy: Policy | null
): Result<void, PolicyViolationError> {
  if (!policy || policy.allowedTransitions.length === 0) {
    return ok(undefined);
  }

  if (policy.allowedTransitions.some((allowed) => matchesAllowed(transition, allowed))) {
    return ok(undefined);
  }

  const allowedForTag = policy.allowedTransitions.filter((a) => a.tag === transition.tag);
  if (allowedForTag.length > 0) {
    return err(
      new PolicyViolationError(
        `Transition '${transition.tag}' with target '${transition.target}' and attributes ` +
          `${JSON.stringify(transition.attributes)} is not allowed. ` +
          `Allowed combinations for '${transition.tag}': [${allowedForTag.map(describeAllowed).join(', ')}]`
      )
    );
  }

  const allowedTags = [...new Set(policy.allowedTransitions.map((a) => a.tag))];
  return err(
    new PolicyViolationError(
      `Tag '${transition.tag}' is not allowed. Allowed tags: [${allowedTags.join(', ')}]`
    )
  );
}

/**
 * Re-prompting with a reminder needs a non-empty allow-list to describe
 */
export function shouldUseReminderPrompt(policy: Policy | null): boolean {
  return policy !== null && policy.allowedTransitions.length > 0;
}

/**
 * The transition to synthesize when a step emits no tag, if the policy
 * pins exactly one non-result transition with a concrete target.
 * Result entries do not count: their payload is free-form.
 */
export function getImplicitTransition(policy: Policy | null): Transition | null {
  if (!policy) {
    return null;
  }
  const candidates = policy.allowedTransitions.filter((entry) => entry.tag !== 'result');
  if (candidates.length !== 1) {
    return null;
  }
  const [allowed] = candidates;
  if (!allowed.target) {
    return null;
  }
  return {
    tag: allowed.tag,
    target: allowed.target,
    attributes: { ...allowed.attributes },
    payload: '',
  };
}

function formatReminderTag(allowed: AllowedTransition): string {
  if (allowed.tag === 'result') {
    return '<result>...</result>';
  }
  const target = allowed.target || 'TARGET';
  const attrs = Object.entries(allowed.attributes).map(([key, value]) =>
    value.includes('"') ? `${key}='${value}'` : `${key}="${value}"`
  );
  if (attrs.length === 0) {
    return `<${allowed.tag}>${target}</${allowed.tag}>`;
  }
  return `<${allowed.tag} ${attrs.join(' ')}>${target}</${allowed.tag}>`;
}

/**
 * Reminder appended to the prompt when a step emitted no usable transition
 */
export function generateReminderPrompt(policy: Policy): string {
  const lines = [
    '',
    '---',
    'REMINDER: Emit exactly one of these tags (target names are literal, not placeholders):',
    '',
  ];
  policy.allowedTransitions.forEach((allowed, index) => {
    lines.push(`${index + 1}. ${formatReminderTag(allowed)}`);
  });
  lines.push('', 'Emit exactly one of the above tags.', '---');
  return lines.join('\n');
}
