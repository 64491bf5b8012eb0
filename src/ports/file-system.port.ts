import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string };

export type EntryKind = 'file' | 'directory' | 'other';

export interface DirEntry {
  readonly name: string;
  readonly kind: EntryKind;
}

/**
 * Port: the read-only filesystem view containers need.
 * Used by: container registry (existence checks), enumeration (listing).
 */
export interface FileSystemPort {
  stat(filePath: string): ResultAsync<{ readonly kind: EntryKind }, FsError>;

  /**
   * Entries of a directory, names only (not full paths), in no particular order.
   */
  readdir(dirPath: string): ResultAsync<readonly DirEntry[], FsError>;
}
