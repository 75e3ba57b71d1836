/**
 * Real FileSystem implementation
 * Uses Node.js fs module with atomic writes and path traversal protection
 */

import {
  readFile as fsReadFile,
  writeFile as fsWriteFile,
  appendFile as fsAppendFile,
  mkdir as fsMkdir,
  unlink as fsUnlink,
  readdir as fsReaddir,
  existsSync,
  mkdirSync,
  writeFileSync,
  renameSync,
  unlinkSync,
} from 'fs';
import { promisify } from 'util';
import { resolve, dirname, isAbsolute, relative } from 'path';
import { randomBytes } from 'crypto';
import {
  FileSystem,
  FileSystemError,
  FileSystemErrorCode,
  WriteOptions,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

const readFileAsync = promisify(fsReadFile);
const writeFileAsync = promisify(fsWriteFile);
const appendFileAsync = promisify(fsAppendFile);
const mkdirAsync = promisify(fsMkdir);
const unlinkAsync = promisify(fsUnlink);
const readdirAsync = promisify(fsReaddir);

/**
 * Extract the errno code from a thrown value, if it has one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const ERRNO_MAP: Record<string, FileSystemErrorCode> = {
  ENOENT: 'NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EEXIST: 'ALREADY_EXISTS',
  EISDIR: 'NOT_A_FILE',
  ENOTDIR: 'NOT_A_DIRECTORY',
};

/**
 * Convert a thrown fs error to a FileSystemError
 */
function mapFsError(error: unknown, path: string): FileSystemError {
  const code = errnoCode(error);
  const mapped = code !== undefined ? ERRNO_MAP[code] : undefined;
  if (mapped) {
    return createFileSystemError(mapped, path);
  }
  const cause = toError(error);
  return createFileSystemError('IO_ERROR', path, cause.message, cause);
}

/**
 * Real implementation of FileSystem using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  private readonly basePath?: string;

  /**
   * @param basePath - Optional base path for path traversal protection
   */
  constructor(basePath?: string) {
    this.basePath = basePath ? resolve(basePath) : undefined;
  }

  private isWithinBasePath(path: string): boolean {
    if (!this.basePath) {
      return true;
    }
    const relativePath = relative(this.basePath, resolve(path));
    return !relativePath.startsWith('..') && !isAbsolute(relativePath);
  }

  /**
   * Validate path against traversal attacks
   */
  private validatePath(path: string): Result<string, FileSystemError> {
    const normalizedPath = resolve(path);
    if (!this.isWithinBasePath(normalizedPath)) {
      return err(createFileSystemError('PATH_TRAVERSAL', path));
    }
    return ok(normalizedPath);
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      const content = await readFileAsync(validatedPath.value, { encoding: 'utf-8' });
      return ok(content);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async readBuffer(path: string): Promise<Result<Buffer, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      return ok(await readFileAsync(validatedPath.value));
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      if (options?.createParents) {
        mkdirSync(dirname(validatedPath.value), { recursive: true });
      }

      // Atomic write: write to temp file, then rename
      if (options?.atomic ?? true) {
        const tempPath = `${validatedPath.value}.${randomBytes(8).toString('hex')}.tmp`;
        try {
          writeFileSync(tempPath, content, { encoding: 'utf-8' });
          renameSync(tempPath, validatedPath.value);
        } catch (error) {
          if (existsSync(tempPath)) {
            unlinkSync(tempPath);
          }
          throw error;
        }
      } else {
        await writeFileAsync(validatedPath.value, content, { encoding: 'utf-8' });
      }

      return ok(undefined);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async appendFile(path: string, content: string): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      await appendFileAsync(validatedPath.value, content, { encoding: 'utf-8' });
      return ok(undefined);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return false;
    }
    return existsSync(validatedPath.value);
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      await mkdirAsync(validatedPath.value, { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async remove(path: string): Promise<Result<void, FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      await unlinkAsync(validatedPath.value);
      return ok(undefined);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }

  async list(path: string): Promise<Result<string[], FileSystemError>> {
    const validatedPath = this.validatePath(path);
    if (!validatedPath.ok) {
      return validatedPath;
    }

    try {
      const entries = await readdirAsync(validatedPath.value);
      return ok(entries);
    } catch (error) {
      return err(mapFsError(error, path));
    }
  }
}

/**
 * Create a real filesystem with optional base path restriction
 */
export function createRealFileSystem(basePath?: string): FileSystem {
  return new RealFileSystem(basePath);
}
