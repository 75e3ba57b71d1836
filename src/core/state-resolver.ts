/**
 * State-name resolution
 * Maps abstract (extensionless) or explicit state names to concrete state units
 */

import { extname } from 'path';
import { WorkflowScope } from '../io/workflow-scope';
import { ResolvedStateUnit, StateUnitKind, Transition } from '../types/workflow';
import { Result, ok, err } from '../types/result';
import { TargetResolutionError } from './errors';

export type Platform = NodeJS.Platform;

const PROMPT_EXTENSION = '.md';
const STATE_EXTENSIONS = ['.md', '.sh', '.bat'];

function isWindows(platform: Platform): boolean {
  return platform === 'win32';
}

/**
 * Script extension that runs on the given platform
 */
export function scriptExtension(platform: Platform): '.sh' | '.bat' {
  return isWindows(platform) ? '.bat' : '.sh';
}

function otherScriptExtension(platform: Platform): '.sh' | '.bat' {
  return isWindows(platform) ? '.sh' : '.bat';
}

/**
 * Strip a state extension (.md, .sh, .bat), case-insensitively
 */
export function stripStateExtension(name: string): string {
  const lower = name.toLowerCase();
  for (const ext of STATE_EXTENSIONS) {
    if (lower.endsWith(ext)) {
      return name.slice(0, -ext.length);
    }
  }
  return name;
}

/**
 * Kind of a concrete state file name, or null when the extension is unsupported
 */
export function stateUnitKind(name: string): StateUnitKind | null {
  const ext = extname(name).toLowerCase();
  if (ext === PROMPT_EXTENSION) {
    return 'prompt';
  }
  if (ext === '.sh' || ext === '.bat') {
    return 'script';
  }
  return null;
}

function platformMismatch(name: string, ext: string): TargetResolutionError {
  if (ext === '.bat') {
    return new TargetResolutionError(
      `'${name}' is a Windows batch file and cannot run on this platform. Use a .sh script.`
    );
  }
  return new TargetResolutionError(
    `'${name}' is a shell script and cannot run on Windows. Use a .bat script.`
  );
}

/**
 * Resolve a state name within a scope.
 * Explicit names must exist and suit the platform; abstract names try the
 * prompt unit, then the platform's script unit, and fail when both exist.
 */
export async function resolveState(
  scope: WorkflowScope,
  name: string,
  platform: Platform = process.platform
): Promise<Result<ResolvedStateUnit, TargetResolutionError>> {
  if (name.includes('/') || name.includes('\\')) {
    return err(
      new TargetResolutionError(
        `State name '${name}' contains path separator. State names must not contain / or \\`
      )
    );
  }

  const ext = extname(name).toLowerCase();

  if (ext) {
    const kind = stateUnitKind(name);
    if (kind === null) {
      return err(
        new TargetResolutionError(
          `Unsupported state file extension '${ext}' in '${name}'. Use .md, .sh or .bat.`
        )
      );
    }
    if (!(await scope.has(name))) {
      return err(new TargetResolutionError(`State file not found: ${scope.describe(name)}`));
    }
    if (kind === 'script' && ext !== scriptExtension(platform)) {
      return err(platformMismatch(name, ext));
    }
    return ok({ name, kind });
  }

  const promptName = name + PROMPT_EXTENSION;
  const scriptName = name + scriptExtension(platform);
  const hasPrompt = await scope.has(promptName);
  const hasScript = await scope.has(scriptName);

  if (hasPrompt && hasScript) {
    return err(
      new TargetResolutionError(
        `Ambiguous state '${name}': both ${promptName} and ${scriptName} exist. Use an explicit extension.`
      )
    );
  }
  if (hasPrompt) {
    return ok({ name: promptName, kind: 'prompt' });
  }
  if (hasScript) {
    return ok({ name: scriptName, kind: 'script' });
  }

  const otherName = name + otherScriptExtension(platform);
  if (await scope.has(otherName)) {
    return err(
      new TargetResolutionError(
        `State '${name}' not found: only ${otherName} exists, which cannot run on this platform ` +
          `(expected ${promptName} or ${scriptName})`
      )
    );
  }

  return err(
    new TargetResolutionError(
      `State file not found: '${name}' (tried ${promptName} and ${scriptName} in ${scope.location})`
    )
  );
}

/**
 * Resolve the target and any return/next attribute of a transition
 */
export async function resolveTransitionTargets(
  scope: WorkflowScope,
  transition: Transition,
  platform: Platform = process.platform
): Promise<Result<Transition, TargetResolutionError>> {
  if (transition.tag === 'result') {
    return ok(transition);
  }

  const target = await resolveState(scope, transition.target, platform);
  if (!target.ok) {
    return target;
  }

  const attributes = { ...transition.attributes };
  for (const key of ['return', 'next']) {
    const value = attributes[key];
    if (value === undefined) {
      continue;
    }
    const resolved = await resolveState(scope, value, platform);
    if (!resolved.ok) {
      return resolved;
    }
    attributes[key] = resolved.value.name;
  }

  return ok({ ...transition, target: target.value.name, attributes });
}
