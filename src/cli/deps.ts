import { createBridgeContext, createToolBridge, type ToolBridge } from "../agents/bridge.js";
import { FileLinkedAccountStore, type LinkedAccountStore } from "../auth/linked-accounts.js";
import { loadConfig, resolveLinkedAccountsPath } from "../config/config.js";
import { setLogLevel } from "../logging.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

/** Everything the CLI touches outside itself; tests swap in fakes. */
export type CliDeps = {
  runtime: RuntimeEnv;
  openAccounts(): LinkedAccountStore;
  createBridge(): ToolBridge;
  now(): number;
};

export function createDefaultCliDeps(env: NodeJS.ProcessEnv = process.env): CliDeps {
  return {
    runtime: defaultRuntime,
    openAccounts: () => new FileLinkedAccountStore(resolveLinkedAccountsPath(env)),
    createBridge: () => {
      const config = loadConfig(env);
      setLogLevel(config.logLevel);
      return createToolBridge(createBridgeContext(config));
    },
    now: Date.now,
  };
}
