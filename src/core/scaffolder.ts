// src/core/scaffolder.ts

import path from 'path';
import pluralize from 'pluralize';
import type {
   PlanEntry,
   PlanInspection,
   ScaffoldPlan,
   ScaffoldReport,
} from '../schema';
import { resolveProjectPath } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { FilesystemError, type FilesystemOperation } from './errors';
import { NodeStorage, type ScaffoldStorage } from './storage';

export const SUCCESS_MESSAGE = 'Project structure created successfully.';

export interface ScaffolderOptions {
   /**
    * Directory the plan's root is created in. Default: process.cwd().
    */
   cwd?: string;

   /**
    * Filesystem capability; defaults to NodeStorage.
    */
   storage?: ScaffoldStorage;

   /**
    * Optional logger; defaults to defaultLogger.child('[scaffolder]').
    */
   logger?: Logger;
}

export interface EnsureResult {
   created: string[];
   existing: string[];
}

/**
 * Materializes a ScaffoldPlan: directories first, then empty files,
 * creating only what is missing.
 */
export class Scaffolder {
   readonly root: string;
   private readonly storage: ScaffoldStorage;
   private readonly logger: Logger;

   constructor(
      private readonly plan: ScaffoldPlan,
      options: ScaffolderOptions = {},
   ) {
      this.root = path.resolve(options.cwd ?? process.cwd(), plan.rootName);
      this.storage = options.storage ?? new NodeStorage();
      this.logger = options.logger ?? defaultLogger.child('[scaffolder]');
   }

   private absolute(relPath: string): string {
      return resolveProjectPath(this.root, relPath);
   }

   private call<T>(operation: FilesystemOperation, absPath: string, fn: () => T): T {
      try {
         return fn();
      } catch (err) {
         throw FilesystemError.from(err, operation, absPath);
      }
   }

   /**
    * Ensure the root and every declared directory exist, in plan order.
    * The root is not part of the returned lists.
    */
   ensureDirectories(): EnsureResult {
      const result: EnsureResult = { created: [], existing: [] };

      if (this.call('mkdir', this.root, () => this.storage.ensureDirectory(this.root))) {
         this.logger.debug(`created ${this.plan.rootName}/`);
      }

      for (const dir of this.plan.directories) {
         const abs = this.absolute(dir);
         const created = this.call('mkdir', abs, () => this.storage.ensureDirectory(abs));
         if (created) {
            result.created.push(dir);
            this.logger.debug(`created ${dir}/`);
         } else {
            result.existing.push(dir);
            this.logger.debug(`exists  ${dir}/`);
         }
      }

      return result;
   }

   /**
    * Create every declared file that is absent as an empty file.
    * Existing files are left exactly as they are.
    */
   ensureFiles(): EnsureResult {
      const result: EnsureResult = { created: [], existing: [] };

      for (const file of this.plan.files) {
         const abs = this.absolute(file);
         const created = this.call('create', abs, () => this.storage.createFileIfAbsent(abs));
         if (created) {
            result.created.push(file);
            this.logger.debug(`created ${file}`);
         } else {
            result.existing.push(file);
            this.logger.debug(`exists  ${file}`);
         }
      }

      return result;
   }

   /**
    * Full run: directories, then files, then a single completion line.
    * The first FilesystemError aborts; re-running after fixing the cause resumes.
    */
   run(): ScaffoldReport {
      const dirs = this.ensureDirectories();
      const files = this.ensureFiles();

      this.logger.debug(
         `${pluralize('directory', dirs.created.length, true)} and ` +
         `${pluralize('file', files.created.length, true)} created under ${this.root}`,
      );
      this.logger.info(SUCCESS_MESSAGE);

      return {
         root: this.root,
         createdDirectories: dirs.created,
         existingDirectories: dirs.existing,
         createdFiles: files.created,
         existingFiles: files.existing,
      };
   }

   /**
    * Compare the plan with what is on disk without creating anything.
    */
   inspect(): PlanInspection {
      const present: PlanEntry[] = [];
      const missing: PlanEntry[] = [];
      const conflicting: PlanEntry[] = [];

      const entries: PlanEntry[] = [
         { kind: 'dir', path: '.' },
         ...this.plan.directories.map((p): PlanEntry => ({ kind: 'dir', path: p })),
         ...this.plan.files.map((p): PlanEntry => ({ kind: 'file', path: p })),
      ];

      for (const entry of entries) {
         const abs = this.absolute(entry.path);
         const found = this.call('stat', abs, () => this.storage.kindOf(abs));
         const expected = entry.kind === 'dir' ? 'directory' : 'file';

         if (found === null) {
            missing.push(entry);
         } else if (found === expected) {
            present.push(entry);
         } else {
            conflicting.push(entry);
         }
      }

      return {
         root: this.root,
         present,
         missing,
         conflicting,
         complete: missing.length === 0 && conflicting.length === 0,
      };
   }
}
