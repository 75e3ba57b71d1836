/**
 * Claude Engine Adapter
 * Drives the Claude Code CLI in print mode with stream-json output
 */

import { InvocationRequest } from '../types/llm-backend';
import { BaseEngineAdapter, EngineAdapterOptions } from './engine-adapter';

/**
 * Engine adapter for Claude CLI
 */
export class ClaudeAdapter extends BaseEngineAdapter {
  readonly name = 'claude';
  protected readonly displayName = 'Claude';

  constructor(options: EngineAdapterOptions) {
    super(options);
  }

  protected getDefaultExecutablePath(): string {
    return 'claude';
  }

  protected buildArgs(request: InvocationRequest): string[] {
    const args: string[] = ['-p', '--output-format', 'stream-json', '--verbose'];

    if (request.dangerouslySkipPermissions) {
      args.push('--dangerously-skip-permissions');
    } else {
      args.push('--permission-mode', 'acceptEdits');
    }

    if (request.model) {
      args.push('--model', request.model);
    }

    if (request.sessionId) {
      args.push('--resume', request.sessionId);
    }

    args.push(request.prompt);

    // Branch a copy of the resumed session instead of appending to it
    if (request.forkSession && request.sessionId) {
      args.push('--fork-session');
    }

    return args;
  }
}

/**
 * Create a Claude adapter instance
 */
export function createClaudeAdapter(options: EngineAdapterOptions): ClaudeAdapter {
  return new ClaudeAdapter(options);
}
