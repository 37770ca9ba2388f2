import fs from 'fs-extra';
import { FileStat, FileSystemProbe } from '../../lib/media-types';
import { FileAccessError, FileAccessErrorCode } from '../../lib/types';

/**
 * Read-only file system probe over fs-extra
 */
export class NodeFileSystem implements FileSystemProbe {
  async stat(filePath: string): Promise<FileStat> {
    try {
      const stats = await fs.stat(filePath);
      return {
        size: stats.size,
        isFile: stats.isFile(),
        birthtime: stats.birthtime,
        mtime: stats.mtime,
      };
    } catch (error) {
      throw toFileAccessError(error, filePath);
    }
  }

  async readHeader(filePath: string, length: number): Promise<Buffer> {
    let fd: number;
    try {
      fd = await fs.open(filePath, 'r');
    } catch (error) {
      throw toFileAccessError(error, filePath);
    }

    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await fs.read(fd, buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } catch (error) {
      throw toFileAccessError(error, filePath);
    } finally {
      await fs.close(fd);
    }
  }
}

export function toFileAccessError(error: unknown, filePath: string): FileAccessError {
  if (error instanceof FileAccessError) return error;

  const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
  const cause = error instanceof Error ? error : undefined;
  const message = cause?.message ?? String(error);

  return new FileAccessError(message, classifyErrorCode(code), filePath, cause);
}

function classifyErrorCode(code: string | undefined): FileAccessErrorCode {
  switch (code) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'PERMISSION_DENIED';
    default:
      return 'UNREADABLE';
  }
}
