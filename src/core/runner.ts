// src/core/runner.ts

import type { PlanInspection, ScaffoldPlan, ScaffoldReport } from '../schema';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { NEWS_PROJECT_PLAN } from './news-plan';
import { Scaffolder } from './scaffolder';
import type { ScaffoldStorage } from './storage';

export interface RunOptions {
    /**
     * Optional logger override.
     */
    logger?: Logger;

    /**
     * Optional storage override (tests inject an in-memory one).
     */
    storage?: ScaffoldStorage;

    /**
     * Plan to apply; the news project plan unless overridden.
     */
    plan?: ScaffoldPlan;
}

function createScaffolder(cwd: string, options: RunOptions, tag: string): Scaffolder {
    return new Scaffolder(options.plan ?? NEWS_PROJECT_PLAN, {
        cwd,
        storage: options.storage,
        logger: options.logger ?? defaultLogger.child(tag),
    });
}

/**
 * Scaffold the project once inside the given directory.
 */
export function runScaffold(cwd: string, options: RunOptions = {}): ScaffoldReport {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const scaffolder = createScaffolder(cwd, { ...options, logger }, '[runner]');

    logger.debug(`Scaffolding into ${scaffolder.root}`);
    return scaffolder.run();
}

/**
 * Inspect the project under the given directory without touching it.
 */
export function checkScaffold(cwd: string, options: RunOptions = {}): PlanInspection {
    return createScaffolder(cwd, options, '[check]').inspect();
}
