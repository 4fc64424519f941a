/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import { createConvertCommand } from "./commands/convert";
import { createPublishCommand } from "./commands/publish";
import { createSummarizeCommand } from "./commands/summarize";
import { setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("notion-summarizer")
    .description("Summarize documents with OpenAI and publish the summaries to Notion.")
    .version(__APP_VERSION__)
    // Mutually exclusive logging flags
    .addOption(
      new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"),
    )
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .enablePositionalOptions()
    .showHelpAfterError(true);

  program.hook("preAction", (thisCommand) => {
    setupLogging(thisCommand.opts());
  });

  createSummarizeCommand(program);
  createPublishCommand(program);
  createConvertCommand(program);

  return program;
}
