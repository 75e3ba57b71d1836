/**
 * Error diagnostics
 * Writes a plain-text report for every fatal or exhausted step failure
 */

import { join } from 'path';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Clock, SystemClock } from '../types/clock';
import { errorMessage, isWorkflowError } from '../core/errors';

const RULE_WIDTH = 80;

/**
 * What was going on when the error happened
 */
export interface DiagnosticContext {
  workflowId: string;
  agentId: string;
  currentState: string;
  sessionId: string | null;
  scopeDir: string;
  /** Anything else worth recording, rendered as `key: value` */
  extra?: Record<string, string | number | null>;
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function compactTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function renderRaw(raw: unknown): string {
  if (raw === undefined || raw === null) {
    return '(none)';
  }
  if (typeof raw === 'string') {
    return raw || '(empty)';
  }
  try {
    return JSON.stringify(raw, null, 2);
  } catch {
    return String(raw);
  }
}

/**
 * Render a diagnostic report
 */
export function formatDiagnosticReport(error: unknown, context: DiagnosticContext, now: Date): string {
  const heavy = '='.repeat(RULE_WIDTH);
  const light = '-'.repeat(RULE_WIDTH);
  const details = isWorkflowError(error) ? error.details : {};

  const info: Array<[string, string]> = [
    ['timestamp', now.toISOString()],
    ['workflow_id', context.workflowId],
    ['agent_id', context.agentId],
    ['current_state', context.currentState],
    ['error_type', error instanceof Error ? error.name : typeof error],
    ['error_code', isWorkflowError(error) ? error.code : 'UNEXPECTED'],
    ['error_message', errorMessage(error)],
    ['session_id', context.sessionId ?? 'None'],
  ];

  const contextLines = [`scope_dir: ${context.scopeDir}`];
  for (const [key, value] of Object.entries(context.extra ?? {})) {
    contextLines.push(`${key}: ${value ?? 'None'}`);
  }

  const stack = error instanceof Error && error.stack ? error.stack : '(unavailable)';

  return [
    heavy,
    'ERROR REPORT',
    heavy,
    '',
    'ERROR INFORMATION:',
    light,
    ...info.map(([key, value]) => `${key}: ${value}`),
    '',
    'CONTEXT:',
    light,
    ...contextLines,
    '',
    'RAW RESPONSE:',
    light,
    renderRaw(details.rawOutput),
    '',
    'EXTRACTED TEXT OUTPUT:',
    light,
    details.outputText || '(none)',
    '',
    'STACK TRACE:',
    light,
    stack,
    '',
  ].join('\n');
}

/**
 * Writes diagnostic reports under the errors directory.
 * A write failure is logged and reported as null; it never throws.
 */
export class DiagnosticWriter {
  constructor(
    private readonly fs: FileSystem,
    readonly errorDirectory: string,
    private readonly logger: Logger,
    private readonly clock: Clock = new SystemClock()
  ) {}

  async write(error: unknown, context: DiagnosticContext): Promise<string | null> {
    const now = this.clock.now();
    const path = join(
      this.errorDirectory,
      `${context.workflowId}_${context.agentId}_${compactTimestamp(now)}.txt`
    );

    try {
      const written = await this.fs.writeFile(path, formatDiagnosticReport(error, context, now), {
        createParents: true,
      });
      if (!written.ok) {
        this.logger.warn(`Failed to write diagnostic report ${path}: ${written.error.message}`, {
          workflowId: context.workflowId,
          agentId: context.agentId,
        });
        return null;
      }
    } catch (writeError) {
      this.logger.warn(`Failed to write diagnostic report ${path}: ${errorMessage(writeError)}`, {
        workflowId: context.workflowId,
        agentId: context.agentId,
      });
      return null;
    }

    this.logger.event('diagnostic_written', `Saved error report to ${path}`, {
      workflowId: context.workflowId,
      agentId: context.agentId,
      stateName: context.currentState,
    });
    return path;
  }
}
