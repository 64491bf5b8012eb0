import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { DirEntry, EntryKind, FileSystemPort, FsError } from '../../ports/file-system.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'ENOTDIR') return { code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

function kindOf(entry: Dirent | Stats): EntryKind {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

export class NodeFileSystem implements FileSystemPort {
  stat(filePath: string): ResultAsync<{ readonly kind: EntryKind }, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((stats) => ({ kind: kindOf(stats) }));
  }

  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((entries) =>
      entries.map((entry) => ({ name: entry.name, kind: kindOf(entry) }))
    );
  }
}
