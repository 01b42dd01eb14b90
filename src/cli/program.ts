import { Command } from "commander";

import { registerAccountsCli } from "./accounts-cli.js";
import { createDefaultCliDeps, type CliDeps } from "./deps.js";
import { registerToolsCli } from "./tools-cli.js";

export function buildProgram(deps: CliDeps = createDefaultCliDeps()): Command {
  const program = new Command();
  program
    .name("inbox-bridge")
    .description("Authenticated Gmail and Calendar tools for agents")
    .version("0.1.0");

  registerAccountsCli(program, deps);
  registerToolsCli(program, deps);
  return program;
}
