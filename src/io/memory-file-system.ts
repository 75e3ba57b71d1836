/**
 * In-memory FileSystem implementation
 * For testing - maintains a virtual filesystem in memory
 */

import { resolve, join, dirname, basename, isAbsolute, sep } from 'path';
import {
  FileSystem,
  WriteOptions,
  FileSystemError,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

interface VirtualFile {
  type: 'file';
  content: string | Buffer;
}

function asText(content: string | Buffer): string {
  return typeof content === 'string' ? content : content.toString('utf-8');
}

interface VirtualDirectory {
  type: 'directory';
}

type VirtualEntry = VirtualFile | VirtualDirectory;

/**
 * In-memory implementation of FileSystem for testing
 */
export class MemoryFileSystem implements FileSystem {
  private entries: Map<string, VirtualEntry> = new Map();
  private readonly basePath: string;
  private failingWrites: RegExp[] = [];
  private writeCount = 0;

  constructor(basePath: string = '/') {
    this.basePath = resolve(basePath);
    this.entries.set(this.basePath, { type: 'directory' });
    this.ensureParents(this.basePath);
  }

  private normalizePath(path: string): string {
    return resolve(isAbsolute(path) ? path : join(this.basePath, path));
  }

  private ensureParents(path: string): void {
    let current = dirname(path);
    while (!this.entries.has(current)) {
      this.entries.set(current, { type: 'directory' });
      const parent = dirname(current);
      if (parent === current) {
        break;
      }
      current = parent;
    }
  }

  /**
   * Make every write to a matching path fail with IO_ERROR
   */
  failWritesMatching(pattern: RegExp): void {
    this.failingWrites.push(pattern);
  }

  /**
   * Number of successful writeFile calls
   */
  getWriteCount(): number {
    return this.writeCount;
  }

  /**
   * Seed a file, creating parent directories
   */
  setFile(path: string, content: string): void {
    const normalizedPath = this.normalizePath(path);
    this.ensureParents(normalizedPath);
    this.entries.set(normalizedPath, { type: 'file', content });
  }

  /**
   * Seed a binary file, such as an archive
   */
  setBinaryFile(path: string, content: Buffer): void {
    const normalizedPath = this.normalizePath(path);
    this.ensureParents(normalizedPath);
    this.entries.set(normalizedPath, { type: 'file', content });
  }

  /**
   * Read a file synchronously, or undefined when absent
   */
  getFile(path: string): string | undefined {
    const entry = this.entries.get(this.normalizePath(path));
    return entry?.type === 'file' ? asText(entry.content) : undefined;
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(asText(entry.content));
  }

  async readBuffer(path: string): Promise<Result<Buffer, FileSystemError>> {
    const entry = this.entries.get(this.normalizePath(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(typeof entry.content === 'string' ? Buffer.from(entry.content, 'utf-8') : entry.content);
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    if (this.failingWrites.some((pattern) => pattern.test(normalizedPath))) {
      return err(createFileSystemError('IO_ERROR', path, `Simulated write failure: ${path}`));
    }

    const parentDir = dirname(normalizedPath);
    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      this.ensureParents(normalizedPath);
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    if (this.entries.get(normalizedPath)?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.set(normalizedPath, { type: 'file', content });
    this.writeCount++;
    return ok(undefined);
  }

  async appendFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const existing = this.getFile(path) ?? '';
    return this.writeFile(path, existing + content, { atomic: false });
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(this.normalizePath(path));
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const existingEntry = this.entries.get(normalizedPath);
    if (existingEntry) {
      if (existingEntry.type === 'directory') {
        return recursive ? ok(undefined) : err(createFileSystemError('ALREADY_EXISTS', path));
      }
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const parentDir = dirname(normalizedPath);
    if (!this.entries.has(parentDir)) {
      if (!recursive) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      this.ensureParents(normalizedPath);
    }

    this.entries.set(normalizedPath, { type: 'directory' });
    return ok(undefined);
  }

  async remove(path: string): Promise<Result<void, FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.delete(normalizedPath);
    return ok(undefined);
  }

  async list(path: string): Promise<Result<string[], FileSystemError>> {
    const normalizedPath = this.normalizePath(path);
    const entry = this.entries.get(normalizedPath);

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const prefix = normalizedPath.endsWith(sep) ? normalizedPath : normalizedPath + sep;
    const names: string[] = [];
    for (const entryPath of this.entries.keys()) {
      if (entryPath.startsWith(prefix) && dirname(entryPath) === normalizedPath) {
        names.push(basename(entryPath));
      }
    }
    return ok(names.sort());
  }
}

