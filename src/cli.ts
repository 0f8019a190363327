#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runGenerate } from "./commands/generate.js";

/**
 * Handle errors from the command handler: print `wordspray: <message>` and
 * exit 1.
 */
function handleCliError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`wordspray: ${message}\n`);
  process.exit(1);
}

const cli = yargs(hideBin(process.argv))
  .scriptName("wordspray")
  .usage("$0 [options]")
  .command(
    "$0",
    "Stream random words, some styled, to stdout",
    (yargs) =>
      yargs
        .option("seed", {
          type: "number",
          requiresArg: true,
          describe: "Seed the random source for reproducible output",
        })
        .option("config", {
          type: "string",
          requiresArg: true,
          describe: "TOML file overriding the built-in constants",
        }),
    async (argv) => {
      try {
        await runGenerate({ seed: argv.seed, configPath: argv.config });
      } catch (err: unknown) {
        handleCliError(err);
      }
    },
  )
  .strict()
  .help()
  .version("0.1.0");

await cli.parseAsync();
