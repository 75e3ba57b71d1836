/**
 * Engine adapter base
 * Runs an agentic CLI through a ProcessRunner and reads its JSON line stream
 */

import { ProcessRunner, SpawnResult } from '../types/process-runner';
import {
  InvocationRequest,
  InvocationResponse,
  LlmBackend,
  StreamMessage,
  StreamMessageHandler,
} from '../types/llm-backend';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';
import { InvocationError, RateLimitError, StepTimeoutError, WorkflowError } from '../core/errors';
import { LineBuffer } from './line-buffer';
import { extractRateLimitMessage, extractSessionId, parseStreamLine } from './stream-output';

/**
 * Options for creating an engine adapter
 */
export interface EngineAdapterOptions {
  /** Process runner for subprocess execution */
  processRunner: ProcessRunner;
  /** Path to the CLI executable */
  executablePath?: string;
  logger?: Logger;
}

/**
 * Base class for engine adapters with common functionality
 */
export abstract class BaseEngineAdapter implements LlmBackend {
  abstract readonly name: string;
  /** Name used in error messages */
  protected abstract readonly displayName: string;
  protected readonly processRunner: ProcessRunner;
  protected readonly executablePath: string;
  protected readonly logger?: Logger;

  constructor(options: EngineAdapterOptions) {
    this.processRunner = options.processRunner;
    this.executablePath = options.executablePath ?? this.getDefaultExecutablePath();
    this.logger = options.logger;
  }

  protected abstract getDefaultExecutablePath(): string;

  protected abstract buildArgs(request: InvocationRequest): string[];

  async invoke(
    request: InvocationRequest,
    onMessage?: StreamMessageHandler
  ): Promise<Result<InvocationResponse, WorkflowError>> {
    const args = this.buildArgs(request);
    const messages: StreamMessage[] = [];
    // A branched session gets a new id; the one branched from is never reported back
    let sessionId = request.forkSession ? null : request.sessionId;
    const lines = new LineBuffer();

    const consume = (line: string): void => {
      const message = parseStreamLine(line);
      if (!message) {
        return;
      }
      messages.push(message);
      sessionId = extractSessionId(message) ?? sessionId;
      onMessage?.(message, line);
    };

    this.logger?.debug(`Spawning ${this.executablePath}`, {
      model: request.model ?? 'default',
      resume: request.sessionId,
      fork: request.forkSession,
    });

    let spawnResult: SpawnResult;
    try {
      spawnResult = await this.processRunner.spawn(this.executablePath, {
        args,
        cwd: request.cwd,
        idleTimeoutMs: request.timeoutSeconds > 0 ? request.timeoutSeconds * 1000 : undefined,
        signal: request.signal,
        onStdout: (chunk) => lines.push(chunk).forEach(consume),
      });
    } catch (error) {
      return err(
        new InvocationError(
          `Failed to start ${this.executablePath}: ${error instanceof Error ? error.message : String(error)}`
        )
      );
    }
    lines.flush().forEach(consume);

    if (spawnResult.timedOut) {
      return err(
        new StepTimeoutError(
          `${this.displayName} produced no output for ${request.timeoutSeconds} seconds (idle timeout)`,
          { rawOutput: messages }
        )
      );
    }

    if (spawnResult.interrupted) {
      return err(new InvocationError(`${this.displayName} invocation was interrupted`, { rawOutput: messages }));
    }

    for (const message of messages) {
      const limitMessage = extractRateLimitMessage(message);
      if (limitMessage !== null) {
        return err(new RateLimitError(limitMessage, { rawOutput: messages }));
      }
    }

    if (spawnResult.exitCode !== 0) {
      return err(
        new InvocationError(
          `${this.displayName} command failed with return code ${spawnResult.exitCode}\nStderr: ${spawnResult.stderr.trim()}`,
          { rawOutput: messages }
        )
      );
    }

    return ok({ messages, sessionId });
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.processRunner.spawn(this.executablePath, {
        args: ['--version'],
        cwd: process.cwd(),
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
