/**
 * @a2a-bridge/a2a: A2A protocol client tool provider
 *
 * Discover remote A2A agents and send them messages from an LLM agent
 * pipeline, through three tools with uniform result mappings.
 *
 * Public API surface.
 */

// Provider & lifecycle
export { A2AClientToolProvider, createA2AClientToolProvider } from "./provider.js";
export { type A2aSessionOptions, withA2AClient } from "./session.js";
// Middleware
export { A2AMiddleware, createA2aMiddleware } from "./middleware.js";
// Tools
export { type A2aOperation, type A2aTool, bindA2aTools, buildA2aTools, toolName } from "./tools.js";
export { toToolResult } from "./tool-result.js";
// Client registry & auth
export { ClientRegistry, type ClientRegistryOptions } from "./client-registry.js";
export {
  buildAuthConfig,
  classifyHeaders,
  credentialHeaders,
  resolveClientConfig,
} from "./auth-resolver.js";
// Transport
export {
  createHttpTransport,
  HttpTransportClient,
  parseSseStream,
  type TransportClient,
  type TransportFactory,
} from "./transport-client.js";
// Discovery & messaging
export { AgentCardCache, type AgentCardCacheConfig } from "./agent-card-cache.js";
export {
  AgentDiscovery,
  type AgentDiscoveryOptions,
  joinUrl,
  renderAgentCard,
} from "./agent-discovery.js";
export { AgentMessenger, type AgentMessengerOptions, resolveEndpoint } from "./agent-messenger.js";
export {
  buildSendRequest,
  createTextMessage,
  type JsonRpcRequest,
  type RpcEvent,
  readRpcEvent,
  SEND_METHOD,
  STREAM_METHOD,
  type SendMethod,
} from "./message.js";
// Types
export type {
  A2aMessage,
  A2aMiddlewareConfig,
  A2aProviderOptions,
  A2aTextPart,
  AgentCard,
  AgentUrl,
  AuthConfig,
  AuthCredential,
  BulkDiscoveryReport,
  DiscoverAgentResult,
  HeaderMap,
  ListDiscoveredAgentsResult,
  PushNotificationConfig,
  ResolvedClientConfig,
  SendMessageResult,
  ToolFailure,
  ToolResult,
  ToolSuccess,
} from "./types.js";
export {
  AGENT_CARD_PATH,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_TOOL_PREFIX,
  LEGACY_AGENT_CARD_PATH,
} from "./types.js";
// Validation schemas
export {
  A2aMiddlewareConfigSchema,
  A2aProviderOptionsSchema,
  AgentCardSchema,
  AuthCredentialSchema,
  type DiscoverAgentInput,
  DiscoverAgentInputSchema,
  type SendMessageInput,
  SendMessageInputSchema,
  validateMiddlewareConfig,
  validateProviderOptions,
} from "./validation.js";
