// src/core/storage.ts

import { createEmptyFileSync, ensureDirSync, statOrNullSync } from '../util/fs-utils';

export type StorageEntryKind = 'file' | 'directory' | 'other';

/**
 * The only filesystem capability the Scaffolder uses. Every call is
 * synchronous and takes an absolute path.
 *
 * Implementations signal failures with FilesystemError; anything else
 * they throw is wrapped by the Scaffolder.
 */
export interface ScaffoldStorage {
   /**
    * Create the directory and any missing ancestors.
    * Returns true when it was created, false when it already existed.
    */
   ensureDirectory(absPath: string): boolean;

   /**
    * Create an empty file unless a regular file already exists; never
    * truncates. Returns true when it was created. Anything other than a
    * regular file at the path is a FilesystemError.
    */
   createFileIfAbsent(absPath: string): boolean;

   /**
    * What currently sits at the path, or null when nothing does.
    * Throws FilesystemError when the path cannot be inspected.
    */
   kindOf(absPath: string): StorageEntryKind | null;
}

/**
 * ScaffoldStorage on top of the real filesystem.
 */
export class NodeStorage implements ScaffoldStorage {
   ensureDirectory(absPath: string): boolean {
      return ensureDirSync(absPath);
   }

   createFileIfAbsent(absPath: string): boolean {
      return createEmptyFileSync(absPath);
   }

   kindOf(absPath: string): StorageEntryKind | null {
      const stats = statOrNullSync(absPath);
      if (!stats) return null;
      if (stats.isDirectory()) return 'directory';
      if (stats.isFile()) return 'file';
      return 'other';
   }
}
