#!/usr/bin/env node
/**
 * stream-cmp CLI entry point.
 */

import { Command, CommanderError } from "commander";
import {
  compareSources,
  exitCodeFor,
  overriddenFlagsWarning,
  resolveReportingMode,
} from "./commands/cmp/index.js";
import { CmpError, EXIT_TROUBLE } from "./core/errors.js";
import { configureLogger, error as logError, warn } from "./core/logger.js";
import { parseOperands } from "./core/operands.js";
import { getVersion } from "./core/version.js";

interface CliOptions {
  long?: boolean;
  line?: boolean;
  silent?: boolean;
  debug?: boolean;
}

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof CommanderError) {
    // Commander already printed its message.
    process.exit(error.exitCode === 0 ? 0 : EXIT_TROUBLE);
  }

  if (error instanceof CmpError) {
    logError(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(EXIT_TROUBLE);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("stream-cmp")
    .description("Compare two byte streams and report where they first differ")
    .version(await getVersion())
    .argument("[operands...]", "source1 source2 [offset1 [offset2]] (- reads stdin)")
    .option(
      "-l, --long",
      "print the byte number (decimal) and the differing bytes (octal) for each difference"
    )
    .option("-L, --line", "print the line number of the first differing byte")
    .option("-s, --silent", "print nothing for differing sources, only set the exit status")
    .option("--debug", "print diagnostic messages to stderr")
    .exitOverride()
    .action(async (operands: string[], options: CliOptions) => {
      configureLogger({ quiet: options.silent, debug: options.debug });

      const { names, offsets } = parseOperands(operands);
      const mode = resolveReportingMode(options);
      const warning = overriddenFlagsWarning(options, mode);
      if (warning) {
        warn(warning);
      }

      const result = await compareSources({ operands: names, offsets, mode });
      process.exit(exitCodeFor(result.status));
    });

  await program.parseAsync(process.argv);
}

main().catch(handleError);
