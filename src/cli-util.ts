// src/cli-util.ts
import type { Command } from "commander";
import { ConsoleLogger, resolveLogLevel, type Logger } from "./logger.js";

/** Logger for a subcommand, honouring the global --log-level. */
export function loggerForCommand(command: Command): Logger {
  const { logLevel } = command.optsWithGlobals<{ logLevel?: string }>();
  return new ConsoleLogger(resolveLogLevel(logLevel));
}

/**
 * Handy for tests: parse user-style argv (no node/script prefix) and run
 * the matching action, turning commander's exits into thrown errors.
 */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<Command> {
  const program = buildProgram();
  // Subcommands copy these settings when created, so set them on each one.
  const quiet = (command: Command): void => {
    command.exitOverride();
    command.configureOutput({ writeErr: () => {}, writeOut: () => {} });
    command.commands.forEach(quiet);
  };
  quiet(program);
  return program.parseAsync(argv, { from: "user" });
}
