/**
 * CLI commands for inspecting and calling agent tools by hand.
 */

import type { Command } from "commander";

import { BRIDGE_TOOLS } from "../agents/bridge-tools.js";
import { formatErrorMessage } from "../errors.js";
import { danger, info, warn } from "../globals.js";
import type { CliDeps } from "./deps.js";

function parseArgsJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`--args is not valid JSON: ${formatErrorMessage(err)}`, { cause: err });
  }
}

export function registerToolsCli(program: Command, deps: CliDeps) {
  const { runtime } = deps;
  const tools = program.command("tools").description("Agent tools for Gmail and Calendar");

  tools
    .command("list")
    .description("List available tools")
    .option("--json", "Output JSON tool definitions", false)
    .action((opts: { json: boolean }) => {
      const definitions = Object.values(BRIDGE_TOOLS);
      if (opts.json) {
        runtime.log(
          JSON.stringify(
            definitions.map(({ name, description, scope, parameters }) => ({
              name,
              description,
              scope,
              parameters,
            })),
            null,
            2,
          ),
        );
        return;
      }
      for (const tool of definitions) {
        runtime.log(`${tool.name} ${info(`(${tool.scope})`)}`);
        runtime.log(`  ${tool.description.split("\n")[0] ?? ""}`);
      }
    });

  tools
    .command("call")
    .description("Invoke a tool for a session and print what the agent would receive")
    .argument("<name>", "Tool name")
    .requiredOption("--session <id>", "Agent session id")
    .option("--args <json>", "Tool arguments as a JSON object", "{}")
    .action(async (name: string, opts: { session: string; args: string }) => {
      try {
        const bridge = deps.createBridge();
        const outcome = await bridge.invoke(name, parseArgsJson(opts.args), opts.session);
        await bridge.flush();

        switch (outcome.status) {
          case "ok":
            runtime.log(outcome.text);
            return;
          case "auth_required":
            runtime.log(warn(outcome.interruption.message));
            runtime.log(JSON.stringify(outcome.interruption, null, 2));
            runtime.exit(2);
            return;
          case "error":
            runtime.error(danger(outcome.text));
            runtime.exit(1);
            return;
        }
      } catch (err) {
        runtime.error(danger(`Tool call failed: ${formatErrorMessage(err)}`));
        runtime.exit(1);
      }
    });
}
