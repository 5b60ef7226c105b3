/**
 * @fileoverview Typed Node.js fs error factory
 */

export type FsErrorCode = 'ENOENT' | 'EACCES' | 'EPERM' | 'ENOSPC' | 'EROFS' | 'ENOTEMPTY' | 'EMFILE';

const DEFAULT_MESSAGES: Record<FsErrorCode, string> = {
  ENOENT: 'no such file or directory',
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  ENOSPC: 'no space left on device',
  EROFS: 'read-only file system',
  ENOTEMPTY: 'directory not empty',
  EMFILE: 'too many open files',
};

/**
 * Create a Node.js fs error (ErrnoException) with `code` set
 */
export function createFsError(code: FsErrorCode, path?: string, syscall = 'open'): NodeJS.ErrnoException {
  const message = path
    ? `${code}: ${DEFAULT_MESSAGES[code]}, ${syscall} '${path}'`
    : `${code}: ${DEFAULT_MESSAGES[code]}`;
  const error: NodeJS.ErrnoException = Object.assign(new Error(message), { code, syscall, path });
  return error;
}
