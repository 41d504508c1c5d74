import { Command, CommanderError } from "commander";
import type { FileSystemHost } from "ts-morph";
import * as path from "path";
import { listPresets, loadCodemod } from "./config";
import { describe } from "./errors";
import { runCodemod } from "./rewriter/batch";
import { FileRewriter } from "./rewriter/file-rewriter";
import { DEFAULT_HEALTHCHECK, HealthcheckTransform } from "./transforms/healthcheck-transform";
import { createLogger } from "./utils/logger";
import type { LoggerOptions } from "./utils/logger";

interface RunCommandOptions {
  root: string;
  dryRun?: boolean;
  atomic?: boolean;
  verbose?: boolean;
}

interface HealthcheckCommandOptions {
  probe: string;
  path: string;
  interval: string;
  startPeriod: string;
  dryRun?: boolean;
}

export interface CliContext extends Pick<LoggerOptions, "color" | "write" | "writeError"> {
  /** Host every command reads and writes through */
  fileSystem: FileSystemHost;
}

export function createProgram(context: CliContext): Command {
  const { fileSystem } = context;
  const program = new Command();

  program
    .exitOverride()
    .name("go-inject")
    .description("Idempotent structural edits across Go service trees")
    .version("1.0.0");

  program
    .command("run")
    .description("Apply codemods (preset names or JSON definition paths)")
    .argument("<codemods...>")
    .option("-r, --root <dir>", "directory include patterns resolve against", process.cwd())
    .option("--dry-run", "report changes without writing")
    .option("--atomic", "transform every file before writing any")
    .option("-v, --verbose", "print search details and applied rules")
    .action((codemods: string[], options: RunCommandOptions) => {
      const logger = createLogger({ ...context, verbose: options.verbose });
      const root = path.resolve(options.root);

      for (const reference of codemods) {
        const definition = loadCodemod(reference);
        logger.info(`🚀 ${definition.name}${definition.description ? `: ${definition.description}` : ""}\n`);
        runCodemod(definition, {
          fileSystem,
          root,
          logger,
          dryRun: options.dryRun,
          atomic: options.atomic,
        });
      }
    });

  program
    .command("healthcheck")
    .description("Add a start period to compose healthchecks that probe a service endpoint")
    .argument("[file]", "compose file", "docker-compose.yml")
    .option("--probe <command>", "probe command", DEFAULT_HEALTHCHECK.probe)
    .option("--path <endpoint>", "probed endpoint", DEFAULT_HEALTHCHECK.path)
    .option("--interval <duration>", "interval the key follows", DEFAULT_HEALTHCHECK.interval)
    .option("--start-period <duration>", "start period to add", DEFAULT_HEALTHCHECK.value)
    .option("--dry-run", "report changes without writing")
    .action((file: string, options: HealthcheckCommandOptions) => {
      const logger = createLogger(context);
      const transform = new HealthcheckTransform({
        probe: options.probe,
        path: options.path,
        interval: options.interval,
        key: DEFAULT_HEALTHCHECK.key,
        value: options.startPeriod,
      });
      const verdict = new FileRewriter(fileSystem, [transform]).rewrite(path.resolve(file), {
        dryRun: options.dryRun,
      });

      if (verdict.changed) {
        logger.success(`Added ${DEFAULT_HEALTHCHECK.key} to service healthchecks in ${file}`);
      } else {
        logger.skip(`No changes needed: ${file}`);
      }
    });

  program
    .command("list")
    .description("List shipped codemod presets")
    .action(() => {
      const logger = createLogger(context);
      for (const preset of listPresets()) {
        logger.info(preset);
      }
    });

  return program;
}

/**
 * Parse `argv` and run the selected command. Returns the process exit code:
 * 1 when an error propagates out of a command.
 */
export function runCli(argv: string[], context: CliContext): number {
  const program = createProgram(context);

  try {
    program.parse(argv);
    return 0;
  } catch (error) {
    // Commander has already printed its own usage errors
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    createLogger(context).error(describe(error));
    return 1;
  }
}
