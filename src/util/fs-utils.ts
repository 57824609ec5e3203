// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';
import { FilesystemError } from '../core/errors';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Get file stats if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Stat a path, returning null only when nothing is there (ENOENT, or an
 * ancestor that is not a directory). Any other failure is a FilesystemError.
 */
export function statOrNullSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch (err) {
      const wrapped = FilesystemError.from(err, 'stat', targetPath);
      if (wrapped.code === 'ENOENT' || wrapped.code === 'ENOTDIR') return null;
      throw wrapped;
   }
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns true when the directory had to be created.
 *
 * Throws FilesystemError when the path (or an ancestor) exists as a
 * non-directory, or when creation is refused.
 */
export function ensureDirSync(dirPath: string): boolean {
   const stats = statSafeSync(dirPath);
   if (stats) {
      if (!stats.isDirectory()) {
         throw new FilesystemError('mkdir', dirPath, 'ENOTDIR', {
            detail: 'a non-directory already exists at this path',
         });
      }
      return false;
   }

   try {
      fs.mkdirSync(dirPath, { recursive: true });
   } catch (err) {
      throw FilesystemError.from(err, 'mkdir', dirPath);
   }
   return true;
}

/**
 * Create an empty file unless a regular file already exists at the path.
 * Uses an exclusive open, so an existing file is never truncated; anything
 * else in the way (directory, dangling link, FIFO) is a FilesystemError.
 * Returns true when the file was created.
 */
export function createEmptyFileSync(filePath: string): boolean {
   let fd: number;
   try {
      fd = fs.openSync(filePath, 'wx');
   } catch (err) {
      const wrapped = FilesystemError.from(err, 'create', filePath);
      if (wrapped.code !== 'EEXIST') throw wrapped;

      const stats = statSafeSync(filePath);
      if (!stats) {
         throw new FilesystemError('create', filePath, 'ENOENT', {
            detail: 'a dangling link already exists at this path',
         });
      }
      if (stats.isDirectory()) {
         throw new FilesystemError('create', filePath, 'EISDIR', {
            detail: 'a directory already exists at this path',
         });
      }
      if (!stats.isFile()) {
         throw new FilesystemError('create', filePath, 'EEXIST', {
            detail: 'a non-regular file already exists at this path',
         });
      }
      return false;
   }

   fs.closeSync(fd);
   return true;
}

/**
 * Resolve an absolute path from projectRoot + relative path,
 * and assert it stays within the project root.
 *
 * Throws if the resolved path escapes the project root.
 */
export function resolveProjectPath(projectRoot: string, relPath: string): string {
   const absRoot = path.resolve(projectRoot);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep) && absTarget !== absRoot) {
      throw new Error(
         `Attempted to resolve path outside project root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}
