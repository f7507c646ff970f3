#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { z } from "zod";
import { CLI_NAME } from "./constants.js";
import {
  configureCalculateCommand,
  runCalculateCommand,
  type CalculateCommandOptions,
} from "./calculate-tree.js";
import { loggerForCommand } from "./cli-util.js";
import {
  BranchError,
  ConfigurationError,
  IncompleteChildError,
  RecordFileError,
  toError,
} from "./errors.js";
import { LOG_LEVEL_ENV, LOG_LEVELS, type Logger } from "./logger.js";

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const file = path.join(__dirname, "..", "package.json");
  const parsed = packageJsonSchema.safeParse(
    JSON.parse(fs.readFileSync(file, "utf8")),
  );
  return parsed.success ? parsed.data.version : "0.0.0";
}

export interface ProgramOptions {
  // overrides the --log-level logger, for embedding and tests
  logger?: Logger;
}

export function buildProgram({ logger }: ProgramOptions = {}): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Merkle-style checksums for directory trees, with resumable and incremental updates",
    )
    .version(readVersion())
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")}); defaults to $${LOG_LEVEL_ENV} or info`,
    );

  configureCalculateCommand(program.command("calculate")).action(
    async (target: string, opts: CalculateCommandOptions, command: Command) => {
      await runCalculateCommand(
        target,
        opts,
        logger ?? loggerForCommand(command),
      );
    },
  );

  return program;
}

function isReportable(err: unknown): err is Error {
  return (
    err instanceof ConfigurationError ||
    err instanceof BranchError ||
    err instanceof IncompleteChildError ||
    err instanceof RecordFileError
  );
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  // Default help when no subcommand given
  if (argv.length <= 2) {
    program.outputHelp();
    return 0;
  }
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (!isReportable(err)) throw err;
    console.error(`${CLI_NAME}: ${err.message}`);
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      const e = toError(err);
      console.error(`${CLI_NAME} fatal:\n${e.stack ?? e.message}`);
      process.exitCode = 1;
    },
  );
}
