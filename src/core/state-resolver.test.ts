/**
 * Tests for state-name resolution
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { resolveState, resolveTransitionTargets, stripStateExtension, stateUnitKind } from './state-resolver';
import { MemoryFileSystem } from '../io/memory-file-system';
import { directoryScope, openScope } from '../io/workflow-scope';
import { buildArchive } from '../../tests/utils/archive';

const SCOPE = '/flows/demo';

describe('resolveState', () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    fs = new MemoryFileSystem('/');
    fs.setFile(`${SCOPE}/START.md`, 'start');
    fs.setFile(`${SCOPE}/COUNT.sh`, 'echo');
    fs.setFile(`${SCOPE}/BOTH.md`, 'prompt');
    fs.setFile(`${SCOPE}/BOTH.sh`, 'echo');
    fs.setFile(`${SCOPE}/WINONLY.bat`, 'echo');
  });

  it('should resolve an abstract name to the prompt unit', async () => {
    expect(await resolveState(directoryScope(fs, SCOPE), 'START', 'linux')).toEqual({
      ok: true,
      value: { name: 'START.md', kind: 'prompt' },
    });
  });

  it('should resolve an abstract name to the platform script', async () => {
    expect(await resolveState(directoryScope(fs, SCOPE), 'COUNT', 'linux')).toEqual({
      ok: true,
      value: { name: 'COUNT.sh', kind: 'script' },
    });
  });

  it('should accept an explicit name that exists', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'COUNT.sh', 'darwin');
    expect(result.ok && result.value).toEqual({ name: 'COUNT.sh', kind: 'script' });
  });

  it('should fail when both a prompt and a script match', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'BOTH', 'linux');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Ambiguous state 'BOTH': both BOTH.md and BOTH.sh exist. Use an explicit extension."
      );
    }
  });

  it('should explain when only the wrong-platform script exists', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'WINONLY', 'linux');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain('only WINONLY.bat exists, which cannot run on this platform');
    }
  });

  it('should reject an explicit script for another platform', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'WINONLY.bat', 'linux');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "'WINONLY.bat' is a Windows batch file and cannot run on this platform. Use a .sh script."
      );
    }
  });

  it('should reject a shell script on Windows', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'COUNT.sh', 'win32');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain('cannot run on Windows');
    }
  });

  it('should report a missing explicit file', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'MISSING.md', 'linux');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TARGET_RESOLUTION');
      expect(result.error.message).toBe('State file not found: /flows/demo/MISSING.md');
    }
  });

  it('should reject unsupported extensions', async () => {
    const result = await resolveState(directoryScope(fs, SCOPE), 'NOTES.txt', 'linux');
    expect(result.ok).toBe(false);
  });

  it('should reject state names with path separators', async () => {
    for (const name of ['../ESCAPE', 'subdir/STATE']) {
      const result = await resolveState(directoryScope(fs, SCOPE), name, 'linux');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          `State name '${name}' contains path separator. State names must not contain / or \\`
        );
      }
    }
  });
});

describe('resolveState in an archive scope', () => {
  async function archiveScope(entries: Record<string, string>) {
    const fs = new MemoryFileSystem('/');
    fs.setBinaryFile('/flows/demo.zip', buildArchive(entries));
    const scope = await openScope(fs, '/flows/demo.zip');
    if (!scope.ok) {
      throw new Error(scope.error.message);
    }
    return scope.value;
  }

  it('should resolve abstract names inside a single-folder archive', async () => {
    const scope = await archiveScope({ 'demo/NEXT.md': 'next', 'demo/PROCESS.sh': 'echo' });

    expect(await resolveState(scope, 'NEXT', 'linux')).toEqual({ ok: true, value: { name: 'NEXT.md', kind: 'prompt' } });
    expect(await resolveState(scope, 'PROCESS', 'linux')).toEqual({
      ok: true,
      value: { name: 'PROCESS.sh', kind: 'script' },
    });
  });

  it('should report ambiguity and missing names the same way as directories', async () => {
    const scope = await archiveScope({ 'CHECK.md': 'prompt', 'CHECK.sh': 'echo', 'WORK.bat': '@echo off' });

    const ambiguous = await resolveState(scope, 'CHECK', 'linux');
    expect(!ambiguous.ok && ambiguous.error.message).toBe(
      "Ambiguous state 'CHECK': both CHECK.md and CHECK.sh exist. Use an explicit extension."
    );
    const wrongPlatform = await resolveState(scope, 'WORK', 'linux');
    expect(!wrongPlatform.ok && wrongPlatform.error.message).toContain('only WORK.bat exists');
    const missing = await resolveState(scope, 'MISSING.md', 'linux');
    expect(!missing.ok && missing.error.message).toBe('State file not found: /flows/demo.zip:MISSING.md');
  });
});

describe('resolveTransitionTargets', () => {
  it('should resolve target, return and next', async () => {
    const fs = new MemoryFileSystem('/');
    fs.setFile(`${SCOPE}/EVAL.md`, '');
    fs.setFile(`${SCOPE}/NEXT.sh`, '');
    const result = await resolveTransitionTargets(
      directoryScope(fs, SCOPE),
      { tag: 'function', target: 'EVAL', attributes: { return: 'NEXT' }, payload: '' },
      'linux'
    );
    expect(result.ok && result.value).toEqual({
      tag: 'function',
      target: 'EVAL.md',
      attributes: { return: 'NEXT.sh' },
      payload: '',
    });
  });

  it('should leave result transitions alone', async () => {
    const fs = new MemoryFileSystem('/');
    const transition = { tag: 'result' as const, target: '', attributes: {}, payload: 'done' };
    expect(await resolveTransitionTargets(directoryScope(fs, SCOPE), transition, 'linux')).toEqual({
      ok: true,
      value: transition,
    });
  });
});

describe('helpers', () => {
  it('should strip state extensions case-insensitively', () => {
    expect(stripStateExtension('CHECK.MD')).toBe('CHECK');
    expect(stripStateExtension('run.bat')).toBe('run');
    expect(stripStateExtension('plain')).toBe('plain');
  });

  it('should classify state files', () => {
    expect(stateUnitKind('A.md')).toBe('prompt');
    expect(stateUnitKind('A.sh')).toBe('script');
    expect(stateUnitKind('A.txt')).toBeNull();
  });
});
