/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn with its own process group so timeouts and
 * aborts take down every descendant.
 */

import { spawn, ChildProcess } from 'child_process';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';
import { errnoCode } from '../io/real-file-system';

const isWindows = process.platform === 'win32';

function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined || child.exitCode !== null) {
    return;
  }
  try {
    if (isWindows) {
      child.kill(signal);
    } else {
      process.kill(-child.pid, signal);
    }
  } catch (error) {
    // ESRCH: the group already exited
    if (errnoCode(error) !== 'ESRCH') {
      child.kill(signal);
    }
  }
}

/**
 * Real implementation of ProcessRunner using child_process
 */
export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Set<ChildProcess> = new Set();

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        resolve({
          exitCode: 130,
          durationMs: 0,
          stdout: '',
          stderr: '',
          timedOut: false,
          interrupted: true,
        });
        return;
      }

      const env = options.env ? { ...process.env, ...options.env } : process.env;

      // shell: false; detached puts the child at the head of a new process group
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
        detached: !isWindows,
      });
      this.runningProcesses.add(child);

      let stdout = '';
      let stderr = '';
      let timeoutKind: 'total' | 'idle' | undefined;
      let aborted = false;
      let totalTimer: NodeJS.Timeout | undefined;
      let idleTimer: NodeJS.Timeout | undefined;

      const expire = (kind: 'total' | 'idle'): void => {
        timeoutKind = kind;
        killTree(child, 'SIGKILL');
      };

      const armIdle = (): void => {
        if (!options.idleTimeoutMs) {
          return;
        }
        if (idleTimer) {
          clearTimeout(idleTimer);
        }
        idleTimer = setTimeout(() => expire('idle'), options.idleTimeoutMs);
      };

      const onAbort = (): void => {
        aborted = true;
        killTree(child, 'SIGTERM');
      };

      const cleanup = (): void => {
        this.runningProcesses.delete(child);
        if (totalTimer) {
          clearTimeout(totalTimer);
        }
        if (idleTimer) {
          clearTimeout(idleTimer);
        }
        options.signal?.removeEventListener('abort', onAbort);
      };

      if (options.timeoutMs) {
        totalTimer = setTimeout(() => expire('total'), options.timeoutMs);
      }
      armIdle();
      options.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (data: Buffer) => {
        const str = data.toString();
        stdout += str;
        armIdle();
        options.onStdout?.(str);
      });

      child.stderr?.on('data', (data: Buffer) => {
        const str = data.toString();
        stderr += str;
        options.onStderr?.(str);
      });

      child.on('close', (code, sig) => {
        cleanup();
        const interrupted = aborted || (sig !== null && timeoutKind === undefined);
        resolve({
          exitCode: code ?? (interrupted ? 130 : 1),
          durationMs: Date.now() - startTime,
          stdout,
          stderr,
          timedOut: timeoutKind !== undefined,
          timeoutKind,
          interrupted,
          signal: sig ?? undefined,
        });
      });

      child.on('error', (error) => {
        cleanup();
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const child of this.runningProcesses) {
      killTree(child, signal);
    }
    this.runningProcesses.clear();
  }
}

/**
 * Create a real process runner instance
 */
export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
