// src/core/plan-tree.ts

import type { ScaffoldPlan } from '../schema';

interface TreeNode {
   name: string;
   dirs: Map<string, TreeNode>;
   files: Set<string>;
}

function createNode(name: string): TreeNode {
   return { name, dirs: new Map(), files: new Set() };
}

function descend(root: TreeNode, segments: string[]): TreeNode {
   let node = root;
   for (const segment of segments) {
      let next = node.dirs.get(segment);
      if (!next) {
         next = createNode(segment);
         node.dirs.set(segment, next);
      }
      node = next;
   }
   return node;
}

/**
 * Render a plan as a structure.txt-style tree.
 *
 * Indenting:
 * - 2 spaces per level, the root line at depth 0.
 * - Directories suffixed with "/", listed before files.
 * - Both groups sorted alphabetically; implicit ancestors get their own line.
 */
export function renderPlanTree(plan: ScaffoldPlan): string {
   const root = createNode(plan.rootName);

   for (const dir of plan.directories) {
      descend(root, dir.split('/'));
   }

   for (const file of plan.files) {
      const segments = file.split('/');
      const fileName = segments.pop();
      if (!fileName) continue;
      descend(root, segments).files.add(fileName);
   }

   const lines: string[] = [`${plan.rootName}/`];

   function walk(node: TreeNode, depth: number) {
      const indent = '  '.repeat(depth);
      const dirNames = [...node.dirs.keys()].sort((a, b) => a.localeCompare(b));
      for (const name of dirNames) {
         lines.push(`${indent}${name}/`);
         const child = node.dirs.get(name);
         if (child) walk(child, depth + 1);
      }

      const fileNames = [...node.files].sort((a, b) => a.localeCompare(b));
      for (const name of fileNames) {
         lines.push(`${indent}${name}`);
      }
   }

   walk(root, 1);
   return lines.join('\n');
}
