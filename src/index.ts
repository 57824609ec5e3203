// src/index.ts

export * from './schema';
export { definePlan, validatePlan, normalizePlanPath } from './core/plan';
export { NEWS_PROJECT_PLAN } from './core/news-plan';
export { Scaffolder, SUCCESS_MESSAGE } from './core/scaffolder';
export type { ScaffolderOptions, EnsureResult } from './core/scaffolder';
export { NodeStorage } from './core/storage';
export type { ScaffoldStorage, StorageEntryKind } from './core/storage';
export { FilesystemError, ScaffoldPlanError } from './core/errors';
export type { FilesystemOperation } from './core/errors';
export { renderPlanTree } from './core/plan-tree';
export { runScaffold, checkScaffold } from './core/runner';
export type { RunOptions } from './core/runner';
export { Logger, defaultLogger, isLogLevel } from './util/logger';
export type { LogLevel, LoggerOptions } from './util/logger';
