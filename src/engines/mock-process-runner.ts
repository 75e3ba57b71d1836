/**
 * Mock ProcessRunner implementation
 * For testing - returns predefined results without spawning real processes
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number;
  /** Duration to report in milliseconds (default: 100) */
  durationMs?: number;
  /** Stdout lines, streamed to onStdout one at a time */
  stdoutLines?: string[];
  stderrLines?: string[];
  timedOut?: boolean;
  timeoutKind?: 'total' | 'idle';
  interrupted?: boolean;
  signal?: string;
  /** Real delay before returning; an abort during it resolves as interrupted */
  simulatedDelayMs?: number;
  /** Error to throw (simulates spawn failure) */
  throwError?: Error;
}

export interface MockProcessCall {
  command: string;
  options: SpawnOptions;
}

/**
 * Mock implementation of ProcessRunner for testing
 */
export class MockProcessRunner implements ProcessRunner {
  private defaultConfig: MockProcessConfig;
  private commandConfigs: Map<string, MockProcessConfig> = new Map();
  private patternConfigs: Array<{ pattern: RegExp; config: MockProcessConfig }> = [];
  private callHistory: MockProcessCall[] = [];
  private killCount = 0;

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 100,
      stdoutLines: [],
      stderrLines: [],
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for a specific command
   */
  setCommandConfig(command: string, config: MockProcessConfig): void {
    this.commandConfigs.set(command, config);
  }

  /**
   * Configure behavior for invocations whose command line (command and args) matches
   */
  setPatternConfig(pattern: RegExp, config: MockProcessConfig): void {
    this.patternConfigs.push({ pattern, config });
  }

  getCallHistory(): MockProcessCall[] {
    return [...this.callHistory];
  }

  getKillCount(): number {
    return this.killCount;
  }

  reset(): void {
    this.commandConfigs.clear();
    this.patternConfigs = [];
    this.callHistory = [];
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.callHistory.push({ command, options });

    const commandLine = [command, ...options.args].join(' ');
    const matched =
      this.commandConfigs.get(command) ??
      this.patternConfigs.find((entry) => entry.pattern.test(commandLine))?.config;
    const config: MockProcessConfig = { ...this.defaultConfig, ...matched };

    if (config.throwError) {
      throw config.throwError;
    }

    if (config.simulatedDelayMs && config.simulatedDelayMs > 0) {
      const aborted = await waitOrAbort(config.simulatedDelayMs, options.signal);
      if (aborted) {
        return {
          exitCode: 130,
          durationMs: 0,
          stdout: '',
          stderr: '',
          timedOut: false,
          interrupted: true,
        };
      }
    }

    const stdoutLines = config.stdoutLines ?? [];
    const stderrLines = config.stderrLines ?? [];
    for (const line of stdoutLines) {
      options.onStdout?.(line + '\n');
    }
    for (const line of stderrLines) {
      options.onStderr?.(line + '\n');
    }

    return {
      exitCode: config.exitCode ?? 0,
      durationMs: config.durationMs ?? 100,
      stdout: stdoutLines.map((line) => line + '\n').join(''),
      stderr: stderrLines.map((line) => line + '\n').join(''),
      timedOut: config.timedOut ?? false,
      timeoutKind: config.timeoutKind,
      interrupted: config.interrupted ?? false,
      signal: config.signal,
    };
  }

  killAll(): void {
    this.killCount++;
  }
}

function waitOrAbort(ms: number, signal: AbortSignal | undefined): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(true);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(false);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Create a mock process runner with optional default config
 */
export function createMockProcessRunner(config?: MockProcessConfig): MockProcessRunner {
  return new MockProcessRunner(config);
}
