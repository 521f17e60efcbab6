/**
 * A2AClientToolProvider: the tool-facing owner of A2A client state.
 *
 * Holds the client registry, the Agent Card cache and the discovery state
 * for one session. Every tool operation returns a ToolResult and never
 * throws; close() releases every transport client.
 */

import { randomUUID } from "node:crypto";
import { AgentCardCache } from "./agent-card-cache.js";
import { AgentDiscovery, renderAgentCard } from "./agent-discovery.js";
import { AgentMessenger } from "./agent-messenger.js";
import { buildAuthConfig } from "./auth-resolver.js";
import { ClientRegistry } from "./client-registry.js";
import { toToolResult } from "./tool-result.js";
import { type A2aTool, bindA2aTools } from "./tools.js";
import type { TransportClient } from "./transport-client.js";
import type {
  A2aProviderOptions,
  AgentUrl,
  AuthConfig,
  BulkDiscoveryReport,
  DiscoverAgentResult,
  ListDiscoveredAgentsResult,
  PushNotificationConfig,
  SendMessageResult,
} from "./types.js";
import { DEFAULT_TIMEOUT_SECONDS } from "./types.js";
import { validateProviderOptions } from "./validation.js";

export class A2AClientToolProvider {
  /** Request timeout in seconds */
  readonly timeout: number;
  readonly knownAgentUrls: readonly AgentUrl[];
  readonly pushConfig: PushNotificationConfig | undefined;
  readonly authConfig: AuthConfig;

  private readonly registry: ClientRegistry;
  private readonly cache: AgentCardCache;
  private readonly discovery: AgentDiscovery;
  private readonly messenger: AgentMessenger;
  private boundTools: readonly A2aTool[] | undefined;

  /**
   * Options are trusted as given; use createA2AClientToolProvider to
   * validate them first.
   */
  constructor(options: A2aProviderOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    this.knownAgentUrls = Object.freeze([...(options.knownAgentUrls ?? [])]);
    this.pushConfig =
      options.webhookUrl !== undefined
        ? { url: options.webhookUrl, token: options.webhookToken }
        : undefined;
    this.authConfig = buildAuthConfig(options);

    this.registry = new ClientRegistry({
      authConfig: this.authConfig,
      transportFactory: options.transportFactory,
      onCloseError: options.onCloseError,
    });
    this.cache = new AgentCardCache({ ttlMs: options.cacheTtlMs });
    this.discovery = new AgentDiscovery({
      registry: this.registry,
      cache: this.cache,
      knownAgentUrls: this.knownAgentUrls,
      agentCardPath: options.agentCardPath,
    });
    this.messenger = new AgentMessenger({
      registry: this.registry,
      discovery: this.discovery,
      pushConfig: this.pushConfig,
    });
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  /** Number of live transport clients */
  get clientCount(): number {
    return this.registry.size;
  }

  hasClient(url: AgentUrl): boolean {
    return this.registry.has(url);
  }

  get initialDiscoveryDone(): boolean {
    return this.discovery.initialDiscoveryDone;
  }

  /**
   * Get or lazily create the transport client for a URL.
   *
   * @throws {ClientInitError} If the transport cannot be constructed
   */
  ensureClient(url: AgentUrl): Promise<TransportClient> {
    return this.registry.ensureClient(url);
  }

  /**
   * Eagerly discover the known agents. Optional: listing does it lazily.
   */
  start(): Promise<BulkDiscoveryReport> {
    return this.discovery.ensureInitialDiscovery();
  }

  // -------------------------------------------------------------------------
  // Tool operations
  // -------------------------------------------------------------------------

  discoverAgent(url: AgentUrl): Promise<DiscoverAgentResult> {
    return toToolResult("discover_agent", { url }, async () => {
      const card = await this.discovery.discover(url);
      return { agent_card: renderAgentCard(card), url };
    });
  }

  listDiscoveredAgents(): Promise<ListDiscoveredAgentsResult> {
    return toToolResult("list_discovered_agents", {}, async () => {
      const cards = await this.discovery.listDiscovered();
      const agents = [...cards.values()].map(renderAgentCard);
      return { agents, total_count: agents.length };
    });
  }

  sendMessage(
    messageText: string,
    targetAgentUrl: AgentUrl,
    messageId?: string,
  ): Promise<SendMessageResult> {
    const id = messageId ?? randomUUID();
    const context = { message_id: id, target_agent_url: targetAgentUrl };
    return toToolResult("send_message", context, async () => {
      const response = await this.messenger.send(targetAgentUrl, messageText, id);
      return { response, ...context };
    });
  }

  /** The three tools, bound to this provider under the default prefix */
  get tools(): readonly A2aTool[] {
    this.boundTools ??= bindA2aTools(this);
    return this.boundTools;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Close every transport client. Safe to call before any tool ran and
   * safe to call twice; never rejects.
   */
  async close(): Promise<void> {
    await this.registry.closeAll();
  }
}

/**
 * Factory: validates options, then creates the provider.
 *
 * @throws {ProviderConfigError} If options fail validation
 */
export function createA2AClientToolProvider(
  options: A2aProviderOptions = {},
): A2AClientToolProvider {
  validateProviderOptions(options);
  return new A2AClientToolProvider(options);
}
