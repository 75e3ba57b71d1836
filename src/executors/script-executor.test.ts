import { describe, it, expect } from 'vitest';
import { ScriptExecutor, buildScriptEnv, scriptCommand } from './script-executor';
import { StepInput } from './executor';
import { directoryScope, openScope } from '../io/workflow-scope';
import { FileSystem } from '../types/file-system';
import { MemoryFileSystem } from '../io/memory-file-system';
import { AgentState } from '../types/workflow';
import { createTestHarness } from '../../tests/utils/test-context';
import { buildArchive } from '../../tests/utils/archive';

function stepInput(fs: FileSystem, agent: Partial<AgentState> = {}): StepInput {
  const state = agent.state ?? 'CHECK.sh';
  return {
    workflowId: 'wf1',
    scope: directoryScope(fs, '/flows/demo'),
    agent: { id: 'main', state, session: 'sess-1', stack: [], status: 'active', retryCount: 0, ...agent },
    unit: { name: state, kind: 'script' },
    totalCostUsd: 1.5,
    budgetUsd: 10,
    signal: new AbortController().signal,
  };
}

describe('buildScriptEnv', () => {
  it('should expose the workflow context and fork attributes', () => {
    const agent: AgentState = {
      id: 'main_worker1',
      state: 'CHECK.sh',
      session: null,
      stack: [],
      status: 'active',
      retryCount: 0,
      pendingResult: '',
      forkAttributes: { item: 'docs' },
    };
    expect(buildScriptEnv('wf1', agent, '/flows/demo', '/flows/demo/CHECK.sh')).toEqual({
      WAYPOINT_WORKFLOW_ID: 'wf1',
      WAYPOINT_AGENT_ID: 'main_worker1',
      WAYPOINT_STATE_DIR: '/flows/demo',
      WAYPOINT_STATE_FILE: '/flows/demo/CHECK.sh',
      WAYPOINT_RESULT: '',
      item: 'docs',
    });
  });

  it('should omit the result when none is pending', () => {
    const agent: AgentState = { id: 'main', state: 'A.sh', session: null, stack: [], status: 'active', retryCount: 0 };
    expect(Object.keys(buildScriptEnv('wf1', agent, '/s', '/s/A.sh'))).not.toContain('WAYPOINT_RESULT');
  });
});

describe('scriptCommand', () => {
  it('should pick the interpreter by platform', () => {
    expect(scriptCommand('/s/A.sh', 'linux')).toEqual({ command: 'bash', args: ['/s/A.sh'] });
    expect(scriptCommand('C:\\s\\A.bat', 'win32')).toEqual({ command: 'cmd.exe', args: ['/c', 'C:\\s\\A.bat'] });
  });
});

describe('ScriptExecutor', () => {
  const executor = new ScriptExecutor();

  it('should run the script and resolve its transition', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo', 'NEXT.md': 'next' } });
    harness.runner.setCommandConfig('bash', { stdoutLines: ['checking', '<goto>NEXT</goto>'], durationMs: 42 });

    const result = await executor.execute(stepInput(harness.fs, { cwd: '/repo/sub' }), harness.context);

    expect(result).toEqual({
      ok: true,
      value: {
        transition: { tag: 'goto', target: 'NEXT.md', attributes: {}, payload: '' },
        sessionId: 'sess-1',
        costUsd: 0,
      },
    });
    const [call] = harness.runner.getCallHistory();
    expect(call.command).toBe('bash');
    expect(call.options).toMatchObject({ args: ['/flows/demo/CHECK.sh'], cwd: '/repo/sub', timeoutMs: 600000 });
    expect(harness.events.map((event) => event.type)).toEqual(['state_started', 'script_output', 'state_completed']);
    expect(harness.events[1]).toMatchObject({ stepNumber: 1, exitCode: 0, executionTimeMs: 42 });
    expect(harness.events[2]).toMatchObject({ costUsd: 0, totalCostUsd: 1.5, durationMs: 42 });
  });

  it('should fail on a non-zero exit', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'exit 2' } });
    harness.runner.setCommandConfig('bash', { exitCode: 2, stderrLines: ['boom'] });

    const result = await executor.execute(stepInput(harness.fs), harness.context);

    expect(!result.ok && result.error.code).toBe('SCRIPT');
    expect(!result.ok && result.error.message).toBe("Script 'CHECK.sh' failed with exit code 2. stderr: boom\n");
  });

  it('should fail when stdout has no transition tag', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo' } });
    harness.runner.setCommandConfig('bash', { stdoutLines: ['all good'] });

    const result = await executor.execute(stepInput(harness.fs), harness.context);

    expect(!result.ok && result.error.message).toBe("Script 'CHECK.sh' produced no transition tag in stdout");
    expect(!result.ok && result.error.details.outputText).toBe('all good\n');
  });

  it('should fail when stdout has several transition tags', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo' } });
    harness.runner.setCommandConfig('bash', { stdoutLines: ['<goto>A</goto>', '<result>x</result>'] });

    const result = await executor.execute(stepInput(harness.fs), harness.context);

    expect(!result.ok && result.error.message).toBe("Script 'CHECK.sh' produced 2 transition tags (expected 1)");
  });

  it('should fail when the target does not exist', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'echo' } });
    harness.runner.setCommandConfig('bash', { stdoutLines: ['<goto>MISSING</goto>'] });

    const result = await executor.execute(stepInput(harness.fs), harness.context);

    expect(!result.ok && result.error.message).toBe(
      "Transition target not found: State file not found: 'MISSING' (tried MISSING.md and MISSING.sh in /flows/demo)"
    );
  });

  it('should fail on timeout', async () => {
    const harness = createTestHarness({ files: { 'CHECK.sh': 'sleep' }, settings: { timeoutSeconds: 5 } });
    harness.runner.setCommandConfig('bash', { timedOut: true, timeoutKind: 'total', exitCode: -1 });

    const result = await executor.execute(stepInput(harness.fs), harness.context);

    expect(!result.ok && result.error.message).toBe('Script timeout: CHECK.sh did not finish within 5 seconds');
    expect(harness.events[1]).toMatchObject({ type: 'script_output', exitCode: null });
  });

  it('should run batch files through cmd.exe on Windows', async () => {
    const harness = createTestHarness({ files: { 'CHECK.bat': 'echo' }, platform: 'win32' });
    harness.runner.setCommandConfig('cmd.exe', { stdoutLines: ['<result>ok</result>'] });

    const result = await executor.execute(stepInput(harness.fs, { state: 'CHECK.bat' }), harness.context);

    expect(result.ok && result.value.transition.payload).toBe('ok');
    expect(harness.runner.getCallHistory()[0].command).toBe('cmd.exe');
  });

  describe('in an archive scope', () => {
    async function archiveInput(fs: MemoryFileSystem): Promise<StepInput> {
      fs.setBinaryFile('/flows/demo.zip', buildArchive({ 'demo/CHECK.sh': 'echo check', 'demo/NEXT.md': 'next' }));
      const scope = await openScope(fs, '/flows/demo.zip', { scratchDirectory: '/scratch' });
      if (!scope.ok) {
        throw new Error(scope.error.message);
      }
      return { ...stepInput(fs), scope: scope.value };
    }

    it('should run a scratch copy of the script and remove it afterwards', async () => {
      const harness = createTestHarness();
      harness.runner.setCommandConfig('bash', { stdoutLines: ['<goto>NEXT</goto>'] });

      const result = await executor.execute(await archiveInput(harness.fs), harness.context);

      expect(result.ok && result.value.transition.target).toBe('NEXT.md');
      const [call] = harness.runner.getCallHistory();
      const scriptPath = call.options.args?.[0] ?? '';
      expect(scriptPath).toMatch(/^\/scratch\/waypoint-[0-9a-f-]{36}\.sh$/);
      expect(call.options.env).toMatchObject({ WAYPOINT_STATE_DIR: '/flows/demo.zip', WAYPOINT_STATE_FILE: scriptPath });
      expect(await harness.fs.exists(scriptPath)).toBe(false);
    });

    it('should remove the scratch copy when the script fails', async () => {
      const harness = createTestHarness();
      harness.runner.setCommandConfig('bash', { exitCode: 1, stderrLines: ['nope'] });

      const result = await executor.execute(await archiveInput(harness.fs), harness.context);

      expect(!result.ok && result.error.code).toBe('SCRIPT');
      const scriptPath = harness.runner.getCallHistory()[0].options.args?.[0] ?? '';
      expect(await harness.fs.exists(scriptPath)).toBe(false);
    });

    it('should give concurrent runs distinct copies', async () => {
      const harness = createTestHarness();
      harness.runner.setCommandConfig('bash', { stdoutLines: ['<result>ok</result>'] });
      const input = await archiveInput(harness.fs);

      await Promise.all([executor.execute(input, harness.context), executor.execute(input, harness.context)]);

      const paths = harness.runner.getCallHistory().map((call) => call.options.args?.[0]);
      expect(new Set(paths).size).toBe(2);
    });

    it('should fail when the script is missing from the archive', async () => {
      const harness = createTestHarness();
      const input = await archiveInput(harness.fs);
      const missing: StepInput = { ...input, unit: { name: 'GONE.sh', kind: 'script' } };

      const result = await executor.execute(missing, harness.context);

      expect(!result.ok && result.error.message).toBe(
        "Script execution error: File 'GONE.sh' not found in zip archive: /flows/demo.zip"
      );
      expect(harness.runner.getCallHistory()).toEqual([]);
    });
  });
});
