/**
 * Core types for the A2A client tool provider.
 */

import type { TransportFactory } from "./transport-client.js";

/** Base URL of a remote agent. Used verbatim as a key; no canonicalization. */
export type AgentUrl = string;

/** Flat header mapping */
export type HeaderMap = Readonly<Record<string, string>>;

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

/**
 * Credential applied to every transport client.
 */
export type AuthCredential =
  | { readonly type: "basic"; readonly username: string; readonly password: string }
  | { readonly type: "bearer"; readonly token: string }
  | { readonly type: "apiKey"; readonly key: string; readonly headerName?: string | undefined };

/**
 * Process-wide authentication policy, frozen at provider construction.
 */
export interface AuthConfig {
  readonly defaultHeaders: HeaderMap;
  readonly credential: AuthCredential | undefined;
  readonly timeoutMs: number;
  readonly urlHeaders: ReadonlyMap<AgentUrl, HeaderMap>;
}

/**
 * Effective settings for the transport client of one URL.
 */
export interface ResolvedClientConfig {
  readonly url: AgentUrl;
  readonly headers: HeaderMap;
  readonly credential: AuthCredential | undefined;
  readonly timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Agent card
// ---------------------------------------------------------------------------

/**
 * Descriptor returned by an agent's discovery endpoint. Only `name` is
 * required; every other field is carried through as-is.
 */
export interface AgentCard {
  readonly name: string;
  readonly description?: string | undefined;
  readonly url?: string | undefined;
  readonly version?: string | undefined;
  readonly capabilities?:
    | {
        readonly streaming?: boolean | undefined;
        readonly pushNotifications?: boolean | undefined;
        readonly [key: string]: unknown;
      }
    | undefined;
  readonly [key: string]: unknown;
}

/** Outcome of a bulk discovery pass */
export interface BulkDiscoveryReport {
  readonly discovered: readonly AgentUrl[];
  readonly failed: readonly { readonly url: AgentUrl; readonly error: string }[];
}

// ---------------------------------------------------------------------------
// Messaging
// ---------------------------------------------------------------------------

export interface A2aTextPart {
  readonly kind: "text";
  readonly text: string;
}

/** Outbound user message */
export interface A2aMessage {
  readonly kind: "message";
  readonly messageId: string;
  readonly role: "user";
  readonly parts: readonly A2aTextPart[];
}

/**
 * Webhook target for asynchronous task notifications.
 */
export interface PushNotificationConfig {
  readonly url: string;
  readonly token?: string | undefined;
}

// ---------------------------------------------------------------------------
// Tool results
// ---------------------------------------------------------------------------

export type ToolSuccess<T extends object> = { readonly status: "success" } & T;

export type ToolFailure<C extends object> = {
  readonly status: "error";
  readonly error: string;
} & C;

/** Uniform result returned across the tool boundary */
export type ToolResult<T extends object, C extends object = Record<never, never>> =
  | ToolSuccess<T>
  | ToolFailure<C>;

export type DiscoverAgentResult = ToolResult<
  { readonly agent_card: Record<string, unknown>; readonly url: AgentUrl },
  { readonly url: AgentUrl }
>;

export type ListDiscoveredAgentsResult = ToolResult<{
  readonly agents: readonly Record<string, unknown>[];
  readonly total_count: number;
}>;

export type SendMessageResult = ToolResult<
  {
    readonly response: Record<string, unknown>;
    readonly message_id: string;
    readonly target_agent_url: AgentUrl;
  },
  { readonly message_id: string; readonly target_agent_url: AgentUrl }
>;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Options accepted by A2AClientToolProvider.
 */
export interface A2aProviderOptions {
  /** Agents discovered in bulk on first listing (or on start()) */
  readonly knownAgentUrls?: readonly AgentUrl[] | undefined;
  /** Request timeout in seconds (default: 300) */
  readonly timeout?: number | undefined;
  /**
   * Either a flat header map applied to every agent, or a map of agent URL
   * to headers applied to that URL only.
   */
  readonly headers?:
    | HeaderMap
    | Readonly<Record<AgentUrl, HeaderMap>>
    | undefined;
  readonly auth?: AuthCredential | undefined;
  readonly webhookUrl?: string | undefined;
  readonly webhookToken?: string | undefined;
  /** Well-known path of the agent card (default: /.well-known/agent-card.json) */
  readonly agentCardPath?: string | undefined;
  /** Card cache TTL in milliseconds (default: no expiry) */
  readonly cacheTtlMs?: number | undefined;
  readonly transportFactory?: TransportFactory | undefined;
  /** Called for each transport client that fails to close (default: console.warn) */
  readonly onCloseError?: ((url: AgentUrl, error: unknown) => void) | undefined;
}

/**
 * Configuration for the A2AMiddleware (wrapToolCall integration).
 */
export interface A2aMiddlewareConfig extends A2aProviderOptions {
  /** Tool name prefix (default: "a2a"); tools are named `{prefix}_discover_agent` and so on */
  readonly toolPrefix?: string | undefined;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Default request timeout in seconds */
export const DEFAULT_TIMEOUT_SECONDS = 300;

/** Default tool name prefix */
export const DEFAULT_TOOL_PREFIX = "a2a";

/** Well-known Agent Card path */
export const AGENT_CARD_PATH = "/.well-known/agent-card.json";

/** Agent Card path used by older agents */
export const LEGACY_AGENT_CARD_PATH = "/.well-known/agent.json";

/** Log tag */
export const LOG_TAG = "a2a";
