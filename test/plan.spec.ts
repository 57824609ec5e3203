// test/plan.spec.ts

import { describe, it, expect } from 'vitest';
import { definePlan, normalizePlanPath, validatePlan } from '../src/core/plan';
import { NEWS_PROJECT_PLAN } from '../src/core/news-plan';
import { ScaffoldPlanError } from '../src/core/errors';

describe('normalizePlanPath', () => {
    it('strips "./" prefixes and trailing slashes', () => {
        expect(normalizePlanPath('./core/')).toBe('core');
        expect(normalizePlanPath('.github/workflows/')).toBe('.github/workflows');
    });

    it('converts backslashes and collapses inner ".." segments', () => {
        expect(normalizePlanPath('core\\api_handler.ts')).toBe('core/api_handler.ts');
        expect(normalizePlanPath('a/../b')).toBe('b');
    });

    it('maps the root itself to an empty path', () => {
        expect(normalizePlanPath('.')).toBe('');
        expect(normalizePlanPath('./')).toBe('');
    });
});

describe('validatePlan', () => {
    it('accepts files under declared directories and their ancestors', () => {
        const diagnostics = validatePlan({
            rootName: 'demo',
            directories: ['src', '.github/workflows'],
            files: ['src/index.ts', '.github/CODEOWNERS', '.github/workflows/ci.yml', 'README.md'],
        });

        expect(diagnostics).toEqual([]);
    });

    it('rejects root names that are not a single segment', () => {
        for (const rootName of ['', '.', '..', 'a/b', 'a\\b']) {
            const codes = validatePlan({ rootName }).map((d) => d.code);
            expect(codes).toEqual(['root-invalid']);
        }
    });

    it('reports absolute, empty and escaping paths', () => {
        const diagnostics = validatePlan({
            rootName: 'demo',
            directories: ['/etc', '../outside', './'],
            files: ['a/../../x.txt'],
        });

        expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
            ['path-absolute', '/etc'],
            ['path-escapes-root', '../outside'],
            ['path-empty', './'],
            ['path-escapes-root', 'a/../../x.txt'],
        ]);
    });

    it('reports duplicates after normalization, across both lists', () => {
        const diagnostics = validatePlan({
            rootName: 'demo',
            directories: ['core', 'core/'],
            files: ['./core'],
        });

        expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
            ['duplicate-path', 'core/'],
            ['duplicate-path', './core'],
        ]);
    });

    it('reports a file declared where a directory is needed', () => {
        const diagnostics = validatePlan({
            rootName: 'demo',
            directories: ['a/b'],
            files: ['a', 'a/b/'],
        });

        expect(diagnostics.map((d) => [d.code, d.path])).toEqual([
            ['file-dir-conflict', 'a'],
            ['duplicate-path', 'a/b/'],
        ]);
        expect(diagnostics[0].message).toBe(
            '"a" is declared as a file but the plan needs it as a directory.',
        );
        expect(() => definePlan({ rootName: 'demo', directories: ['a/b'], files: ['a'] })).toThrow(
            ScaffoldPlanError,
        );
    });

    it('reports a file whose parent directory is not declared', () => {
        const diagnostics = validatePlan({
            rootName: 'demo',
            directories: ['core'],
            files: ['docs/intro.md'],
        });

        expect(diagnostics).toHaveLength(1);
        expect(diagnostics[0].code).toBe('file-parent-undeclared');
        expect(diagnostics[0].message).toBe(
            'The parent directory "docs" of "docs/intro.md" is not declared in the plan.',
        );
    });
});

describe('definePlan', () => {
    it('normalizes and freezes a valid plan', () => {
        const plan = definePlan({
            rootName: ' demo ',
            directories: ['./src/'],
            files: ['src\\index.ts'],
        });

        expect(plan).toEqual({
            rootName: 'demo',
            directories: ['src'],
            files: ['src/index.ts'],
        });
        expect(Object.isFrozen(plan)).toBe(true);
        expect(Object.isFrozen(plan.directories)).toBe(true);
        expect(Object.isFrozen(plan.files)).toBe(true);
    });

    it('throws ScaffoldPlanError carrying the diagnostics', () => {
        let caught: unknown;
        try {
            definePlan({ rootName: 'demo', files: ['missing/file.ts'] });
        } catch (err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ScaffoldPlanError);
        if (!(caught instanceof ScaffoldPlanError)) return;
        expect(caught.diagnostics.map((d) => d.code)).toEqual(['file-parent-undeclared']);
        expect(caught.message).toBe(
            'Invalid scaffold plan: file-parent-undeclared: ' +
            'The parent directory "missing" of "missing/file.ts" is not declared in the plan.',
        );
    });
});

describe('NEWS_PROJECT_PLAN', () => {
    it('targets ai-driven-smart-news with the module directories and CI workflow dir', () => {
        expect(NEWS_PROJECT_PLAN.rootName).toBe('ai-driven-smart-news');
        expect(NEWS_PROJECT_PLAN.directories).toEqual([
            'logger',
            'configs',
            'core',
            'tests',
            'utils',
            '.github/workflows',
        ]);
    });

    it('declares a marker file in every module directory plus the placeholders', () => {
        for (const dir of ['logger', 'configs', 'core', 'tests', 'utils']) {
            expect(NEWS_PROJECT_PLAN.files).toContain(`${dir}/index.ts`);
        }
        expect(NEWS_PROJECT_PLAN.files).toHaveLength(21);
        expect(NEWS_PROJECT_PLAN.files.slice(-6)).toEqual([
            '.github/workflows/ci.yml',
            '.gitignore',
            'requirements.txt',
            'README.md',
            'setup.ts',
            'main.ts',
        ]);
    });

    it('passes its own validation', () => {
        expect(validatePlan(NEWS_PROJECT_PLAN)).toEqual([]);
    });
});
