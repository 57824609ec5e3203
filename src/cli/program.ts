// src/cli/program.ts

import path from "path";
import pluralize from "pluralize";
import { Command } from "commander";
import { checkScaffold, runScaffold } from "../core/runner";
import { renderPlanTree } from "../core/plan-tree";
import { NEWS_PROJECT_PLAN } from "../core/news-plan";
import { defaultLogger, Logger } from "../util/logger";
import { NEWS_PROJECT_ROOT } from "../schema";
import type { ScaffoldStorage } from "../core/storage";

interface BaseCliOptions {
  dir?: string;
  quiet?: boolean;
  debug?: boolean;
}

export interface ProgramOptions {
  /**
   * Directory relative `--dir` values resolve against. Default: process.cwd().
   */
  cwd?: string;
  logger?: Logger;
  storage?: ScaffoldStorage;
  /**
   * Sink for command output that is data rather than log (the `tree` command).
   */
  write?: (text: string) => void;
}

/**
 * Apply --quiet / --debug to the logger.
 */
function createCliLogger(base: Logger, opts: BaseCliOptions): Logger {
  if (opts.quiet) {
    base.setLevel("silent");
  } else if (opts.debug) {
    base.setLevel("debug");
  }
  return base;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const cwd = options.cwd ?? process.cwd();
  const baseLogger = options.logger ?? defaultLogger;
  const write = options.write ?? ((text: string) => process.stdout.write(text + "\n"));

  function targetDir(baseOpts: BaseCliOptions): string {
    return baseOpts.dir ? path.resolve(cwd, baseOpts.dir) : cwd;
  }

  const program = new Command();

  program
    .name("news-scaffold")
    .description(
      `Create the ${NEWS_PROJECT_ROOT} project skeleton (missing directories and empty files only)`,
    )
    .option(
      "-d, --dir <path>",
      `Directory to create ./${NEWS_PROJECT_ROOT} in (default: current directory)`,
    )
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("tree")
    .description("Print the project skeleton as an indented tree")
    .action(() => {
      write(renderPlanTree(NEWS_PROJECT_PLAN));
    });

  program
    .command("check")
    .description("Report missing or conflicting paths without creating anything")
    .action((_opts: Record<string, never>, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      const logger = createCliLogger(baseLogger, baseOpts);

      const inspection = checkScaffold(targetDir(baseOpts), {
        logger,
        storage: options.storage,
      });

      for (const entry of inspection.missing) {
        logger.warn(`missing ${entry.kind} ${entry.path}`);
      }
      for (const entry of inspection.conflicting) {
        logger.warn(`wrong type at ${entry.path} (expected ${entry.kind})`);
      }

      if (!inspection.complete) {
        const count = inspection.missing.length + inspection.conflicting.length;
        throw new Error(
          `${pluralize("path", count, true)} missing or conflicting under ${inspection.root}`,
        );
      }

      logger.info("Project structure is complete.");
    });

  // Base command: scaffold once
  program.action((opts: BaseCliOptions) => {
    const logger = createCliLogger(baseLogger, opts);
    logger.debug(`Starting scaffold (cwd=${cwd}, dir=${targetDir(opts)})`);
    runScaffold(targetDir(opts), { logger, storage: options.storage });
  });

  return program;
}

export interface CliRunOptions extends ProgramOptions {
  /**
   * Called with the exit status after a failure. Default: process.exit.
   */
  exit?: (code: number) => void;
  /**
   * Color override for the fatal-error line.
   */
  color?: boolean;
}

/**
 * Parse argv and run the matching command. A failure is always written to
 * stderr (even under --quiet or a silent log level) and exits with status 1.
 */
export async function runCli(
  argv: readonly string[],
  options: CliRunOptions = {},
): Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  // Independent of --quiet and NEWS_SCAFFOLD_LOG_LEVEL.
  const fatal = new Logger({
    level: "error",
    prefix: "[news-scaffold]",
    color: options.color,
  });

  try {
    await createProgram(options).parseAsync([...argv]);
  } catch (err) {
    fatal.error(err);
    exit(1);
  }
}
