/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS, CommandName } from './types';
import { MODEL_NAMES, ModelName, isModelName } from '../types/effective-config';
import { Result, ok, err } from '../types/result';
import { validateWorkflowId } from '../io/state-store';

export const MIN_WIDTH = 40;

/** Options that only make sense when starting a new workflow */
const START_ONLY_OPTIONS = ['--workflow-id', '--budget', '--input', '--no-run'] as const;

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): Result<{ value: string; skip: number }, string> {
  const arg = args[index];

  const eq = arg.indexOf('=');
  if (eq !== -1) {
    const value = arg.slice(eq + 1);
    if (!value) {
      return err(`${argName}= requires a value`);
    }
    return ok({ value, skip: 0 });
  }

  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return err(`${argName} requires a value`);
  }
  return ok({ value: nextArg, skip: 1 });
}

function parseBudget(value: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return err('--budget must be a number greater than 0');
  }
  return ok(parsed);
}

function parseTimeout(value: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return err('--timeout must be a number of seconds, 0 or more');
  }
  return ok(parsed);
}

function parseWidth(value: string): Result<number, string> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < MIN_WIDTH) {
    return err(`--width must be an integer of at least ${MIN_WIDTH}`);
  }
  return ok(parsed);
}

function parseModel(value: string): Result<ModelName, string> {
  const lower = value.toLowerCase();
  if (!isModelName(lower)) {
    return err(`--model must be one of: ${MODEL_NAMES.join(', ')}`);
  }
  return ok(lower);
}

function parseWorkflowId(value: string, argName: string): Result<string, string> {
  const problem = validateWorkflowId(value);
  return problem ? err(`${argName}: ${problem}`) : ok(value);
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  const commands = new Set<CommandName>();
  const seen = new Set<string>();
  const fail = (error: string): ParseResult => ({ success: false, error: `Error: ${error}` });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.startsWith('--') ? arg.split('=')[0] : arg;
    seen.add(argBase);

    // Options taking a value share the lookup and error handling
    const takeValue = <T>(parse: (value: string) => Result<T, string>): Result<T, string> => {
      const raw = getArgValue(args, i, argBase);
      if (!raw.ok) {
        return raw;
      }
      i += raw.value.skip;
      return parse(raw.value.value);
    };

    switch (argBase) {
      case '--help':
      case '-h':
        commands.add('help');
        break;

      case '--version':
      case '-v':
        commands.add('version');
        break;

      case '--resume':
      case '--status': {
        const id = takeValue((value) => parseWorkflowId(value, argBase));
        if (!id.ok) return fail(id.error);
        commands.add(argBase === '--resume' ? 'resume' : 'status');
        result.workflowId = id.value;
        break;
      }

      case '--list':
        commands.add('list');
        break;

      case '--recover':
        commands.add('recover');
        break;

      case '--init-config':
        commands.add('init-config');
        break;

      case '--workflow-id': {
        const id = takeValue((value) => parseWorkflowId(value, argBase));
        if (!id.ok) return fail(id.error);
        result.workflowId = id.value;
        break;
      }

      case '--budget': {
        const budget = takeValue(parseBudget);
        if (!budget.ok) return fail(budget.error);
        result.budgetUsd = budget.value;
        break;
      }

      case '--input': {
        const input = takeValue((value) => ok(value));
        if (!input.ok) return fail(input.error);
        result.input = input.value;
        break;
      }

      case '--model': {
        const model = takeValue(parseModel);
        if (!model.ok) return fail(model.error);
        result.model = model.value;
        break;
      }

      case '--timeout': {
        const timeout = takeValue(parseTimeout);
        if (!timeout.ok) return fail(timeout.error);
        result.timeoutSeconds = timeout.value;
        break;
      }

      case '--width': {
        const width = takeValue(parseWidth);
        if (!width.ok) return fail(width.error);
        result.width = width.value;
        break;
      }

      case '--no-run':
        result.noRun = true;
        break;

      case '--no-debug':
        result.noDebug = true;
        break;

      case '--dangerously-skip-permissions':
        result.dangerouslySkipPermissions = true;
        break;

      case '--quiet':
        result.quiet = true;
        break;

      case '--verbose':
        result.verbose = true;
        break;

      case '--no-wait':
        result.noWait = true;
        break;

      default: {
        if (arg.startsWith('-')) {
          return fail(`Unknown option: ${argBase}`);
        }
        if (result.file !== null) {
          return fail(`Unexpected argument: ${arg}`);
        }
        result.file = arg;
        commands.add('start');
      }
    }
  }

  if (commands.has('help')) {
    return { success: true, args: { ...result, command: 'help' } };
  }
  if (commands.has('version')) {
    return { success: true, args: { ...result, command: 'version' } };
  }
  if (commands.size > 1) {
    return fail('Give only one of FILE, --resume, --status, --list, --recover or --init-config');
  }

  const [command] = [...commands];
  result.command = command ?? 'help';

  if (result.command !== 'start') {
    const stray = START_ONLY_OPTIONS.find((option) => seen.has(option));
    if (stray) {
      return fail(`${stray} only applies when starting a workflow from a FILE`);
    }
  }
  if (result.quiet && result.verbose) {
    return fail('--quiet and --verbose cannot be combined');
  }

  return { success: true, args: result };
}
