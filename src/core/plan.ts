// src/core/plan.ts

import path from 'path';
import type { PlanDiagnostic, ScaffoldPlan, ScaffoldPlanInput } from '../schema';
import { toPosixPath } from '../util/fs-utils';
import { ScaffoldPlanError } from './errors';

/**
 * Normalize a plan path: forward slashes, no "./" prefix, no trailing slash.
 * "." (or an empty string) normalizes to "".
 */
export function normalizePlanPath(raw: string): string {
   const posix = toPosixPath(raw.trim());
   if (!posix) return '';

   const normalized = path.posix.normalize(posix);
   const stripped = normalized.replace(/^(\.\/)+/, '').replace(/\/+$/, '');
   return stripped === '.' ? '' : stripped;
}

/**
 * Every ancestor of a relative POSIX path, nearest first ("a/b/c" → ["a/b", "a"]).
 */
function ancestorsOf(relPath: string): string[] {
   const out: string[] = [];
   let current = path.posix.dirname(relPath);
   while (current !== '.' && current !== '') {
      out.push(current);
      current = path.posix.dirname(current);
   }
   return out;
}

function validateRootName(rootName: string): PlanDiagnostic[] {
   const trimmed = rootName.trim();
   if (!trimmed || trimmed === '.' || trimmed === '..' || /[\\/]/.test(trimmed)) {
      return [
         {
            code: 'root-invalid',
            path: rootName,
            message: `Root name "${rootName}" must be a single path segment.`,
         },
      ];
   }
   return [];
}

/**
 * Check a plan against its structural rules without throwing.
 * Returns an empty array for a valid plan.
 */
export function validatePlan(input: ScaffoldPlanInput): PlanDiagnostic[] {
   const diagnostics: PlanDiagnostic[] = validateRootName(input.rootName);
   const seen = new Set<string>();
   const covered = new Set<string>();

   function checkPath(raw: string, label: 'directory' | 'file'): string | null {
      if (path.posix.isAbsolute(toPosixPath(raw)) || path.win32.isAbsolute(raw)) {
         diagnostics.push({
            code: 'path-absolute',
            path: raw,
            message: `The ${label} path "${raw}" must be relative to the project root.`,
         });
         return null;
      }

      const rel = normalizePlanPath(raw);
      if (!rel) {
         diagnostics.push({
            code: 'path-empty',
            path: raw,
            message: `The ${label} path "${raw}" is empty.`,
         });
         return null;
      }

      if (rel === '..' || rel.startsWith('../')) {
         diagnostics.push({
            code: 'path-escapes-root',
            path: raw,
            message: `The ${label} path "${raw}" resolves outside the project root.`,
         });
         return null;
      }

      if (seen.has(rel)) {
         diagnostics.push({
            code: 'duplicate-path',
            path: raw,
            message: `"${rel}" is declared more than once.`,
         });
         return null;
      }

      seen.add(rel);
      return rel;
   }

   for (const raw of input.directories ?? []) {
      const rel = checkPath(raw, 'directory');
      if (!rel) continue;
      covered.add(rel);
      for (const ancestor of ancestorsOf(rel)) covered.add(ancestor);
   }

   for (const raw of input.files ?? []) {
      const rel = checkPath(raw, 'file');
      if (!rel) continue;

      if (covered.has(rel)) {
         diagnostics.push({
            code: 'file-dir-conflict',
            path: raw,
            message: `"${rel}" is declared as a file but the plan needs it as a directory.`,
         });
         continue;
      }

      const parent = path.posix.dirname(rel);
      if (parent !== '.' && !covered.has(parent)) {
         diagnostics.push({
            code: 'file-parent-undeclared',
            path: raw,
            message: `The parent directory "${parent}" of "${rel}" is not declared in the plan.`,
         });
      }
   }

   return diagnostics;
}

/**
 * Normalize, validate and freeze a plan.
 *
 * @throws ScaffoldPlanError when validatePlan reports anything.
 */
export function definePlan(input: ScaffoldPlanInput): ScaffoldPlan {
   const diagnostics = validatePlan(input);
   if (diagnostics.length > 0) {
      throw new ScaffoldPlanError(diagnostics);
   }

   return Object.freeze({
      rootName: input.rootName.trim(),
      directories: Object.freeze((input.directories ?? []).map(normalizePlanPath)),
      files: Object.freeze((input.files ?? []).map(normalizePlanPath)),
   });
}
