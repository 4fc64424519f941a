/**
 * CLI wiring tests: registered commands and their options.
 */

import { describe, expect, it } from "vitest";
import { createCliProgram } from "./index";

describe("CLI program", () => {
  const program = createCliProgram();

  const getCommandOptions = (commandName: string) =>
    program.commands.find((cmd) => cmd.name() === commandName)?.options.map((opt) => opt.long) ??
    [];

  it("should register every command", () => {
    expect(program.commands.map((cmd) => cmd.name())).toEqual([
      "summarize",
      "publish",
      "convert",
    ]);
  });

  it("should expose global logging flags", () => {
    expect(program.options.map((opt) => opt.long)).toEqual(
      expect.arrayContaining(["--verbose", "--silent"]),
    );
  });

  const optionMatrix: Record<string, string[]> = {
    summarize: ["--output", "--api-key", "--model"],
    publish: ["--notion-token", "--database-id", "--output", "--api-key", "--model"],
    convert: ["--section"],
  };

  for (const [commandName, expected] of Object.entries(optionMatrix)) {
    it(`${commandName} command should accept ${expected.join(", ")}`, () => {
      expect(getCommandOptions(commandName)).toEqual(expected);
    });
  }

  it("should read credentials from the environment", () => {
    const publish = program.commands.find((cmd) => cmd.name() === "publish");
    const envVars = publish?.options.map((opt) => opt.envVar).filter(Boolean);
    expect(envVars).toEqual(["NOTION_TOKEN", "NOTION_DATABASE_ID", "OPENAI_API_KEY", "OPENAI_MODEL"]);
  });
});
