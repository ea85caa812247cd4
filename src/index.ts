/**
 * Programmatic API for sparse-proxy.
 */

export { SparseProxy, type SparseProxyOptions, type RefreshPolicy } from "./multiplexer/sparse-proxy";
export { SparseGateway, type Dispatch } from "./multiplexer/sparse-gateway";
export {
  BackendPool,
  type BackendPoolOptions,
  type DescriptorDiff,
  type RefreshReport,
  type Route,
} from "./multiplexer/backend-pool";
export {
  BackendConnection,
  type BackendConnectionOptions,
  type BackendProcess,
  type ProcessLauncher,
} from "./multiplexer/backend-connection";
export { BuiltinBackend, type BuiltinTool, textResult } from "./multiplexer/builtin-backend";
export { ToolRegistry, type DiscoveryTree } from "./multiplexer/tool-registry";
export { compileQuery, evaluateQuery } from "./multiplexer/path-query";
export { PendingTable } from "./multiplexer/pending-table";
export { ProxyServer } from "./multiplexer/proxy-server";
export {
  BackendUnavailableError,
  CorrelationError,
  FramingError,
  ProxyError,
  QuerySyntaxError,
  ShutdownError,
  TimeoutError,
  toJsonRpcError,
  UnknownToolError,
} from "./multiplexer/errors";
export {
  DEFAULT_SEPARATOR,
  namespaceTool,
  parseNamespacedTool,
} from "./multiplexer/namespace";
export { MCP_CALL, MCP_DISCOVER, ONBOARDING } from "./multiplexer/virtual-tools";
export { Framer, type FrameEvent } from "./protocol/framer";
export type {
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from "./protocol/messages";
export { createOnboardingBackend, OnboardingStore } from "./builtin/onboarding";
export { discoverConfig, type DiscoveryOptions } from "./config/discovery";
export { validateConfig } from "./config/schema";
export { toDescriptors } from "./config/types";
export type { ResolvedConfig, ServerConfig } from "./config/types";
export type {
  Backend,
  BackendDescriptor,
  BackendState,
  CallToolResult,
  ToolDescriptor,
  ToolInfo,
} from "./multiplexer/types";
export { setVerbose } from "./util/logger";
