#!/usr/bin/env node

import path from "path";
import { Command, Option } from "commander";
import { compose } from "../core/composer";
import { loadComposeConfig } from "../core/config-loader";
import { inspectCharm, renderInspection } from "../core/inspect";
import { defaultLogger, LOG_LEVELS, type LogLevel, type Logger } from "../util/logger";
import { DEFAULT_SERIES, isComposeError } from "../schema";

interface BaseCliOptions {
  config?: string;
  logLevel?: LogLevel;
  quiet?: boolean;
  debug?: boolean;
}

interface ComposeCliOptions extends BaseCliOptions {
  outputDir?: string;
  series?: string;
  force?: boolean;
}

/**
 * The level given on the command line, if any. --quiet wins over --debug,
 * and both win over --log-level.
 */
function cliLogLevel(opts: BaseCliOptions): LogLevel | undefined {
  if (opts.quiet) return "silent";
  if (opts.debug) return "debug";
  return opts.logLevel;
}

function createCliLogger(opts: BaseCliOptions, configLevel?: LogLevel): Logger {
  const level = cliLogLevel(opts) ?? configLevel;
  if (level) {
    defaultLogger.setLevel(level);
  }
  return defaultLogger.child("[cli]");
}

async function handleComposeCommand(
  cwd: string,
  name: string,
  layer: string,
  opts: ComposeCliOptions,
) {
  // flags first, so config loading can already log at --debug
  createCliLogger(opts);
  const { config, configPath } = await loadComposeConfig(cwd, {
    configPath: opts.config,
  });
  const logger = createCliLogger(opts, config.logLevel);

  const outputDir = path.resolve(
    cwd,
    opts.outputDir ?? config.outputDir ?? process.env.JUJU_REPOSITORY ?? ".",
  );
  const layerDir = path.resolve(cwd, layer);

  logger.debug(
    `Composing ${name} (layer=${layerDir}, output=${outputDir}, config=${configPath ?? "none"})`,
  );

  const result = await compose({
    layerDir,
    name,
    outputDir,
    series: opts.series ?? config.series,
    existing: opts.force ? "overwrite" : config.existing,
    ignore: config.ignore,
    searchPath: config.searchPath,
    callbacks: config.callbacks,
    logger: defaultLogger.child("[compose]"),
  });

  logger.info(`Wrote ${result.outputDir}`);
}

async function handleInspectCommand(charm: string, opts: BaseCliOptions) {
  createCliLogger(opts);
  const result = inspectCharm(charm);
  process.stdout.write(renderInspection(result) + "\n");
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("charm-compose")
    .description("charm-compose – build a charm from a base charm and a layer")
    .option("-c, --config <path>", "Path to a charm-compose.config.* file")
    .addOption(
      new Option("-l, --log-level <level>", "Log level").choices(LOG_LEVELS),
    )
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("compose <name> [layer]", { isDefault: true })
    .description("Compose <name> from the layer directory (default: .)")
    .option(
      "-o, --output-dir <path>",
      "Repository to write into (default: config outputDir, $JUJU_REPOSITORY, then .)",
    )
    .option("-s, --series <series>", `Series subdirectory (default: ${DEFAULT_SERIES})`)
    .option("-f, --force", "Overwrite the output charm if it already exists")
    .action(
      async (
        name: string,
        layer: string | undefined,
        opts: ComposeCliOptions,
        cmd: Command,
      ) => {
        const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
        await handleComposeCommand(cwd, name, layer ?? ".", {
          ...baseOpts,
          ...opts,
        });
      },
    );

  program
    .command("inspect <charm>")
    .description("Show where each file of a composed charm came from and what changed since")
    .action(async (charm: string, _opts: object, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleInspectCommand(path.resolve(cwd, charm), baseOpts);
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err: unknown) => {
  if (isComposeError(err)) {
    defaultLogger.error(err.describe());
    if (err.path) {
      defaultLogger.error(`  at ${err.path}`);
    }
    process.exit(err.exitCode);
  }
  defaultLogger.error(err);
  process.exit(1);
});
