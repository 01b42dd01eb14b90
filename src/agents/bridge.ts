import { CredentialResolver } from "../auth/credential-resolver.js";
import {
  createAuth0TokenVaultProvider,
  createGoogleOAuthProvider,
  type IdentityProvider,
} from "../auth/identity-provider.js";
import { FileLinkedAccountStore, type LinkedAccountStore } from "../auth/linked-accounts.js";
import type { BridgeConfig, IdentityProviderConfig } from "../config/config.js";
import { createCalendarClient } from "../google/calendar-client.js";
import { createGmailClient } from "../google/gmail-client.js";
import { createSubsystemLogger } from "../logging.js";
import {
  createHttpSink,
  createLogSink,
  SinkDispatcher,
  type ToolCallSink,
} from "../observability/sink.js";
import { describeBridgeTools } from "./bridge-tools.js";
import { invokeTool, type ToolInvocationContext } from "./invoke.js";
import type { ToolDescriptor, ToolOutcome } from "./tools/common.js";

export type ToolBridge = {
  invoke(name: string, args: unknown, sessionId: string): Promise<ToolOutcome>;
  definitions(): ToolDescriptor[];
  /** Wait for pending observability deliveries. */
  flush(): Promise<void>;
};

export function createToolBridge(context: ToolInvocationContext): ToolBridge {
  return {
    invoke: (name, args, sessionId) =>
      invokeTool(context, { name, arguments: args, sessionId }),
    definitions: describeBridgeTools,
    flush: async () => {
      await context.dispatcher?.flush();
    },
  };
}

export function createIdentityProvider(config: IdentityProviderConfig): IdentityProvider {
  switch (config.kind) {
    case "google":
      return createGoogleOAuthProvider({
        clientId: config.clientId,
        clientSecret: config.clientSecret,
      });
    case "auth0":
      return createAuth0TokenVaultProvider({
        domain: config.domain,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        connection: config.connection,
      });
  }
}

export type BridgeDependencies = {
  accounts?: LinkedAccountStore;
  identityProvider?: IdentityProvider;
  sinks?: ToolCallSink[];
};

/**
 * Wire the bridge from configuration: linked accounts on disk, the configured
 * identity provider, googleapis clients, and a log sink plus the HTTP sink
 * when an observability URL is set.
 */
export function createBridgeContext(
  config: BridgeConfig,
  deps: BridgeDependencies = {},
): ToolInvocationContext {
  const credentials = new CredentialResolver({
    accounts: deps.accounts ?? new FileLinkedAccountStore(config.linkedAccountsPath),
    identityProvider: deps.identityProvider ?? createIdentityProvider(config.identity),
    safetyMarginMs: config.tokenSafetyMarginMs,
    refreshTimeoutMs: config.timeouts.refreshMs,
  });

  const sinks = deps.sinks ?? [createLogSink()];
  if (!deps.sinks && config.observability.url) {
    sinks.push(
      createHttpSink({
        url: config.observability.url,
        apiKey: config.observability.apiKey,
        timeoutMs: config.observability.timeoutMs,
      }),
    );
  }

  return {
    credentials,
    createMailProvider: (token) =>
      createGmailClient(token.token, { timeoutMs: config.timeouts.providerMs }),
    createCalendarProvider: (token) =>
      createCalendarClient(token.token, { timeoutMs: config.timeouts.providerMs }),
    dispatcher: new SinkDispatcher(sinks, config.observability.timeoutMs),
    maxChars: config.resultMaxChars,
    workday: config.workday,
    logger: createSubsystemLogger("tools"),
  };
}
