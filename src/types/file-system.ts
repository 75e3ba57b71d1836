/**
 * FileSystem interface
 * Abstracts the filesystem operations the engine needs, for testability
 */

import { Result } from './result';

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Whether to use atomic writes (write to temp, then rename). Default: true */
  atomic?: boolean;
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

/**
 * Error types for filesystem operations
 */
export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'ALREADY_EXISTS'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'PATH_TRAVERSAL'
  | 'IO_ERROR';

/**
 * Filesystem operation error
 */
export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

/**
 * Interface for filesystem operations
 * Implementations can be real (Node.js fs) or in-memory (for testing)
 */
export interface FileSystem {
  /**
   * Read a file's contents as a UTF-8 string
   */
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  /**
   * Read a file's raw bytes
   */
  readBuffer(path: string): Promise<Result<Buffer, FileSystemError>>;

  /**
   * Write content to a file, atomically unless told otherwise
   */
  writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>>;

  /**
   * Append content to a file, creating it if needed
   */
  appendFile(path: string, content: string): Promise<Result<void, FileSystemError>>;

  exists(path: string): Promise<boolean>;

  /**
   * Create a directory (and optionally parents)
   */
  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;

  /**
   * Remove a file
   */
  remove(path: string): Promise<Result<void, FileSystemError>>;

  /**
   * List the entry names of a directory
   */
  list(path: string): Promise<Result<string[], FileSystemError>>;
}

/**
 * Create a FileSystemError
 */
export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    ALREADY_EXISTS: `Path already exists: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    PATH_TRAVERSAL: `Path traversal detected: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}
