export {
  type BridgeDependencies,
  createBridgeContext,
  createIdentityProvider,
  createToolBridge,
  type ToolBridge,
} from "./agents/bridge.js";
export { BRIDGE_TOOLS, describeBridgeTools, findBridgeTool } from "./agents/bridge-tools.js";
export {
  invokeTool,
  type ToolCall,
  type ToolInvocationContext,
  validateToolArguments,
} from "./agents/invoke.js";
export {
  type AgentToolResult,
  type AuthRequiredReason,
  type GoogleAuthInterruption,
  isToolName,
  TOOL_NAMES,
  type ToolDescriptor,
  type ToolName,
  type ToolOutcome,
  toAgentResult,
} from "./agents/tools/common.js";
export { CredentialResolver, TokenCache } from "./auth/credential-resolver.js";
export {
  createAuth0TokenVaultProvider,
  createGoogleOAuthProvider,
  type IdentityProvider,
  IdentityProviderError,
} from "./auth/identity-provider.js";
export {
  FileLinkedAccountStore,
  type LinkedAccountStore,
  MemoryLinkedAccountStore,
} from "./auth/linked-accounts.js";
export { type BridgeConfig, loadConfig } from "./config/config.js";
export { ConfigError, CredentialError, TimeoutError, ToolArgumentError } from "./errors.js";
export * from "./google/index.js";
export {
  createHttpSink,
  createLogSink,
  SinkDispatcher,
  type ToolCallRecord,
  type ToolCallSink,
  toWireRecord,
  type WireToolCallRecord,
} from "./observability/sink.js";
