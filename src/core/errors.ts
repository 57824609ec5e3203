// src/core/errors.ts

import type { PlanDiagnostic } from '../schema';

export type FilesystemOperation = 'mkdir' | 'create' | 'stat';

const VERBS: Record<FilesystemOperation, string> = {
   mkdir: 'create directory',
   create: 'create file',
   stat: 'inspect',
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
   return err instanceof Error && 'code' in err;
}

/**
 * Any operating-system level failure while materializing a plan:
 * permission denial, a path that exists with the wrong type, a missing parent.
 */
export class FilesystemError extends Error {
   readonly code: string;
   readonly operation: FilesystemOperation;
   readonly path: string;

   constructor(
      operation: FilesystemOperation,
      targetPath: string,
      code: string,
      options: { cause?: unknown; detail?: string } = {},
   ) {
      const detail = options.detail ? ` (${options.detail})` : '';
      super(`Cannot ${VERBS[operation]} "${targetPath}": ${code}${detail}`, {
         cause: options.cause,
      });
      this.name = 'FilesystemError';
      this.code = code;
      this.operation = operation;
      this.path = targetPath;
   }

   /**
    * Wrap whatever a storage call threw. FilesystemErrors pass through untouched.
    */
   static from(err: unknown, operation: FilesystemOperation, targetPath: string): FilesystemError {
      if (err instanceof FilesystemError) return err;

      const code = isErrnoException(err) && typeof err.code === 'string' ? err.code : 'EUNKNOWN';
      const detail = err instanceof Error ? err.message : String(err);
      return new FilesystemError(operation, targetPath, code, { cause: err, detail });
   }
}

/**
 * Raised by definePlan when a plan breaks one of its structural rules.
 */
export class ScaffoldPlanError extends Error {
   readonly diagnostics: readonly PlanDiagnostic[];

   constructor(diagnostics: readonly PlanDiagnostic[]) {
      const summary = diagnostics.map((d) => `${d.code}: ${d.message}`).join('; ');
      super(`Invalid scaffold plan: ${summary}`);
      this.name = 'ScaffoldPlanError';
      this.diagnostics = diagnostics;
   }
}
