/**
 * Workflow scopes
 *
 * A scope is where a workflow's state units live: a plain directory, or a
 * zip archive whose files sit at its root or inside one top-level folder.
 * Prompts are read straight from an archive; scripts are copied out to a
 * scratch file for the run and removed afterwards.
 */

import AdmZip from 'adm-zip';
import { createHash, randomUUID } from 'crypto';
import { tmpdir } from 'os';
import { basename, extname, join } from 'path';
import { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';

export type ScopeKind = 'directory' | 'archive';

export type ScopeErrorCode =
  | 'NOT_FOUND'
  | 'FILE_NOT_FOUND'
  | 'INVALID_LAYOUT'
  | 'AMBIGUOUS_NAME'
  | 'HASH_MISMATCH'
  | 'IO_ERROR';

export interface ScopeError {
  code: ScopeErrorCode;
  message: string;
  /** Scope the error refers to */
  path: string;
}

export function createScopeError(code: ScopeErrorCode, path: string, message: string): ScopeError {
  return { code, path, message };
}

/**
 * A scope file copied somewhere a process can run it
 */
export interface CheckedOutFile {
  path: string;
  /** Remove the copy; a no-op for directory scopes */
  release(): Promise<Result<void, ScopeError>>;
}

export interface WorkflowScope {
  readonly kind: ScopeKind;
  /** The directory or archive path stored as the workflow's scopeDir */
  readonly location: string;
  /** How a file in the scope is named in messages */
  describe(name: string): string;
  has(name: string): Promise<boolean>;
  readText(name: string): Promise<Result<string, ScopeError>>;
  checkout(name: string): Promise<Result<CheckedOutFile, ScopeError>>;
}

export interface OpenScopeOptions {
  /** Where archive scripts are copied to. Default: the OS temp directory */
  scratchDirectory?: string;
}

/** Entry state of a workflow started from a directory or archive */
export const ENTRY_STATE = '1_START.md';

const HEX_RUN_PATTERN = /[0-9a-f]+/g;
const SHA256_HEX_LENGTH = 64;

/**
 * Whether a scope path names a zip archive. Decided by suffix alone.
 */
export function isArchiveScope(location: string): boolean {
  return location.toLowerCase().endsWith('.zip');
}

/**
 * Prefix every workflow file in the archive shares: '' for a flat archive,
 * 'folder/' when everything sits inside one top-level folder.
 */
export function detectArchiveLayout(entryNames: string[], archivePath: string): Result<string, ScopeError> {
  const files = entryNames.filter((name) => !name.endsWith('/'));
  if (files.length === 0) {
    return err(createScopeError('INVALID_LAYOUT', archivePath, `Empty zip archive (no files): ${archivePath}`));
  }

  const rootFiles = files.filter((name) => !name.includes('/'));
  if (rootFiles.length === files.length) {
    return ok('');
  }
  if (rootFiles.length > 0) {
    return err(
      createScopeError(
        'INVALID_LAYOUT',
        archivePath,
        `Invalid zip layout in ${archivePath}: mix of top-level files and subdirectories at root`
      )
    );
  }

  const folders = [...new Set(files.map((name) => name.split('/')[0]))].sort();
  if (folders.length > 1) {
    return err(
      createScopeError(
        'INVALID_LAYOUT',
        archivePath,
        `Invalid zip layout in ${archivePath}: multiple top-level folders (${folders.join(', ')})`
      )
    );
  }

  const nested = files.find((name) => name.split('/').length > 2);
  if (nested !== undefined) {
    return err(
      createScopeError(
        'INVALID_LAYOUT',
        archivePath,
        `Invalid zip layout in ${archivePath}: files nested more than one level deep (e.g. '${nested}')`
      )
    );
  }

  return ok(`${folders[0]}/`);
}

/**
 * SHA-256 hash embedded in an archive's file name, if any.
 * Exactly one 64-character hex run counts; a longer run or a second one is ambiguous.
 */
export function extractHashFromFilename(name: string): Result<string | null, ScopeError> {
  const runs = name.toLowerCase().match(HEX_RUN_PATTERN) ?? [];

  if (runs.some((run) => run.length > SHA256_HEX_LENGTH)) {
    return err(
      createScopeError('AMBIGUOUS_NAME', name, `Filename '${name}' contains a hex run longer than 64 characters`)
    );
  }

  const hashes = runs.filter((run) => run.length === SHA256_HEX_LENGTH);
  if (hashes.length > 1) {
    return err(
      createScopeError('AMBIGUOUS_NAME', name, `Filename '${name}' contains multiple 64-character hex runs`)
    );
  }

  return ok(hashes[0] ?? null);
}

/**
 * Check an archive against the hash in its file name. Names without a hash pass.
 */
export async function verifyArchiveHash(fs: FileSystem, archivePath: string): Promise<Result<void, ScopeError>> {
  const expected = extractHashFromFilename(basename(archivePath));
  if (!expected.ok) {
    return expected;
  }
  if (expected.value === null) {
    return ok(undefined);
  }

  const bytes = await fs.readBuffer(archivePath);
  if (!bytes.ok) {
    return err(readFailure(archivePath, bytes.error.code === 'NOT_FOUND', bytes.error.message));
  }

  const actual = createHash('sha256').update(bytes.value).digest('hex');
  if (actual !== expected.value) {
    return err(
      createScopeError(
        'HASH_MISMATCH',
        archivePath,
        `Zip archive hash mismatch for ${archivePath}: expected ${expected.value}, got ${actual}`
      )
    );
  }
  return ok(undefined);
}

function readFailure(archivePath: string, missing: boolean, detail: string): ScopeError {
  return missing
    ? createScopeError('NOT_FOUND', archivePath, `Zip archive not found: ${archivePath}`)
    : createScopeError('IO_ERROR', archivePath, `Could not read zip archive ${archivePath}: ${detail}`);
}

class DirectoryScope implements WorkflowScope {
  readonly kind = 'directory';

  constructor(
    private readonly fs: FileSystem,
    readonly location: string
  ) {}

  describe(name: string): string {
    return join(this.location, name);
  }

  has(name: string): Promise<boolean> {
    return this.fs.exists(join(this.location, name));
  }

  async readText(name: string): Promise<Result<string, ScopeError>> {
    const path = join(this.location, name);
    const content = await this.fs.readFile(path);
    if (!content.ok) {
      return err(
        content.error.code === 'NOT_FOUND'
          ? createScopeError('FILE_NOT_FOUND', this.location, `File not found: ${path}`)
          : createScopeError('IO_ERROR', this.location, content.error.message)
      );
    }
    return content;
  }

  async checkout(name: string): Promise<Result<CheckedOutFile, ScopeError>> {
    return ok({ path: join(this.location, name), release: async () => ok(undefined) });
  }
}

class ArchiveScope implements WorkflowScope {
  readonly kind = 'archive';

  constructor(
    private readonly fs: FileSystem,
    readonly location: string,
    private readonly files: Map<string, Buffer>,
    private readonly scratchDirectory: string
  ) {}

  describe(name: string): string {
    return `${this.location}:${name}`;
  }

  async has(name: string): Promise<boolean> {
    return this.files.has(name);
  }

  async readText(name: string): Promise<Result<string, ScopeError>> {
    const data = this.files.get(name);
    if (!data) {
      return err(this.missing(name));
    }
    return ok(data.toString('utf-8'));
  }

  async checkout(name: string): Promise<Result<CheckedOutFile, ScopeError>> {
    const data = this.files.get(name);
    if (!data) {
      return err(this.missing(name));
    }

    // Unique per call so concurrent agents never share a copy
    const path = join(this.scratchDirectory, `waypoint-${randomUUID()}${extname(name)}`);
    const written = await this.fs.writeFile(path, data.toString('utf-8'), { createParents: true });
    if (!written.ok) {
      return err(createScopeError('IO_ERROR', this.location, `Could not extract ${name}: ${written.error.message}`));
    }

    const { fs, location } = this;
    return ok({
      path,
      async release(): Promise<Result<void, ScopeError>> {
        const removed = await fs.remove(path);
        return removed.ok
          ? removed
          : err(createScopeError('IO_ERROR', location, `Could not remove ${path}: ${removed.error.message}`));
      },
    });
  }

  private missing(name: string): ScopeError {
    return createScopeError('FILE_NOT_FOUND', this.location, `File '${name}' not found in zip archive: ${this.location}`);
  }
}

/**
 * Scope over a plain directory; needs no I/O to open
 */
export function directoryScope(fs: FileSystem, location: string): WorkflowScope {
  return new DirectoryScope(fs, location);
}

/**
 * Open a directory or zip-archive scope. Archives are read and their
 * layout checked once, here.
 */
export async function openScope(
  fs: FileSystem,
  location: string,
  options: OpenScopeOptions = {}
): Promise<Result<WorkflowScope, ScopeError>> {
  if (!isArchiveScope(location)) {
    return ok(directoryScope(fs, location));
  }

  const bytes = await fs.readBuffer(location);
  if (!bytes.ok) {
    return err(readFailure(location, bytes.error.code === 'NOT_FOUND', bytes.error.message));
  }

  let entries: AdmZip.IZipEntry[];
  try {
    entries = new AdmZip(bytes.value).getEntries();
  } catch {
    return err(createScopeError('INVALID_LAYOUT', location, `Corrupt or unreadable zip archive: ${location}`));
  }

  const prefix = detectArchiveLayout(
    entries.map((entry) => entry.entryName),
    location
  );
  if (!prefix.ok) {
    return prefix;
  }

  const files = new Map<string, Buffer>();
  for (const entry of entries) {
    if (!entry.isDirectory && entry.entryName.startsWith(prefix.value)) {
      files.set(entry.entryName.slice(prefix.value.length), entry.getData());
    }
  }

  return ok(new ArchiveScope(fs, location, files, options.scratchDirectory ?? tmpdir()));
}
