// src/schema/plan.ts

/**
 * Static description of the filesystem state a scaffold run guarantees.
 *
 * All paths are POSIX-style, relative to the project root, and
 * never end with a trailing slash once normalized.
 */
export interface ScaffoldPlan {
   /**
    * Name of the project root directory, created inside the
    * invocation directory. A single path segment.
    */
   readonly rootName: string;

   /**
    * Directories to ensure, in order. Nested paths such as
    * ".github/workflows" create their missing ancestors.
    */
   readonly directories: readonly string[];

   /**
    * Files to ensure, in order. Each must sit directly under the root,
    * under a declared directory, or under an ancestor of one.
    */
   readonly files: readonly string[];
}

/**
 * Loose shape accepted by definePlan / validatePlan before normalization.
 */
export interface ScaffoldPlanInput {
   rootName: string;
   directories?: readonly string[];
   files?: readonly string[];
}

export type PlanDiagnosticCode =
   | 'root-invalid'
   | 'path-empty'
   | 'path-absolute'
   | 'path-escapes-root'
   | 'duplicate-path'
   | 'file-dir-conflict'
   | 'file-parent-undeclared';

export interface PlanDiagnostic {
   code: PlanDiagnosticCode;
   /**
    * The offending path as written in the input (or the root name).
    */
   path: string;
   message: string;
}

export type PlanEntryKind = 'dir' | 'file';

/**
 * A plan path tagged with its kind, as reported by inspections.
 */
export interface PlanEntry {
   kind: PlanEntryKind;
   path: string;
}

/**
 * Outcome of one scaffold run. Paths are root-relative, in plan order;
 * the root itself is not listed.
 */
export interface ScaffoldReport {
   root: string;
   createdDirectories: string[];
   existingDirectories: string[];
   createdFiles: string[];
   existingFiles: string[];
}

/**
 * Read-only comparison between a plan and what is on disk.
 * The root is reported under the path ".".
 */
export interface PlanInspection {
   root: string;
   present: PlanEntry[];
   missing: PlanEntry[];
   /**
    * Paths that exist but with the wrong type (e.g. a file where a
    * directory is declared).
    */
   conflicting: PlanEntry[];
   complete: boolean;
}
