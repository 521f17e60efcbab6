import { ClientInitError, getErrorMessage } from "@a2a-bridge/errors";
import { resolveClientConfig } from "./auth-resolver.js";
import { createHttpTransport, type TransportClient, type TransportFactory } from "./transport-client.js";
import type { AgentUrl, AuthConfig } from "./types.js";
import { LOG_TAG } from "./types.js";

export interface ClientRegistryOptions {
  readonly authConfig: AuthConfig;
  readonly transportFactory?: TransportFactory | undefined;
  /** Called for each client that fails to close (default: console.warn) */
  readonly onCloseError?: ((url: AgentUrl, error: unknown) => void) | undefined;
}

/**
 * Owns exactly one transport client per agent URL.
 *
 * Clients are created on first use and memoized. A pending-initialization
 * map makes concurrent callers for the same URL share a single creation,
 * so at most one client ever exists per key.
 */
export class ClientRegistry {
  private readonly clients = new Map<AgentUrl, TransportClient>();
  private readonly pending = new Map<AgentUrl, Promise<TransportClient>>();
  private readonly authConfig: AuthConfig;
  private readonly factory: TransportFactory;
  private readonly onCloseError: (url: AgentUrl, error: unknown) => void;
  /** Bumped by closeAll(); initializations started before it are discarded. */
  private generation = 0;
  /** Bumped per URL by evict(); same rule for that URL only. */
  private readonly evictions = new Map<AgentUrl, number>();

  constructor(options: ClientRegistryOptions) {
    this.authConfig = options.authConfig;
    this.factory = options.transportFactory ?? createHttpTransport;
    this.onCloseError =
      options.onCloseError ??
      ((url, error) => {
        console.warn(`[${LOG_TAG}] Failed to close client for ${url}: ${getErrorMessage(error)}`);
      });
  }

  /**
   * Get or create the client for a URL.
   * Returns the same instance on every call while that client stays open.
   *
   * @throws {ClientInitError} If the transport cannot be constructed
   */
  async ensureClient(url: AgentUrl): Promise<TransportClient> {
    const existing = this.clients.get(url);
    if (existing?.isOpen) return existing;
    if (existing) this.clients.delete(url);

    // If already initializing, wait for that to complete
    const pendingInit = this.pending.get(url);
    if (pendingInit) return pendingInit;

    const initPromise = this.initClient(url, this.generation, this.evictionsOf(url));
    this.pending.set(url, initPromise);

    try {
      return await initPromise;
    } finally {
      if (this.pending.get(url) === initPromise) {
        this.pending.delete(url);
      }
    }
  }

  /**
   * Close and remove the client for one URL. A client still being created
   * is discarded when it arrives. Returns false when there was neither.
   */
  async evict(url: AgentUrl): Promise<boolean> {
    this.evictions.set(url, this.evictionsOf(url) + 1);
    const wasPending = this.pending.delete(url);
    const client = this.clients.get(url);
    if (!client) return wasPending;
    this.clients.delete(url);
    await this.closeQuietly(url, client);
    return true;
  }

  /**
   * Close every client and empty the registry. Never rejects: each failed
   * close is reported through onCloseError and the rest still run.
   */
  async closeAll(): Promise<void> {
    this.generation += 1;
    const entries = [...this.clients];
    this.clients.clear();
    this.pending.clear();
    await Promise.allSettled(entries.map(([url, client]) => this.closeQuietly(url, client)));
  }

  get size(): number {
    return this.clients.size;
  }

  has(url: AgentUrl): boolean {
    return this.clients.has(url);
  }

  urls(): AgentUrl[] {
    return [...this.clients.keys()];
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private evictionsOf(url: AgentUrl): number {
    return this.evictions.get(url) ?? 0;
  }

  private async initClient(
    url: AgentUrl,
    generation: number,
    evictions: number,
  ): Promise<TransportClient> {
    const config = resolveClientConfig(url, this.authConfig);

    let client: TransportClient;
    try {
      client = await this.factory(config);
    } catch (error) {
      throw new ClientInitError(url, error);
    }

    if (generation !== this.generation) {
      await this.closeQuietly(url, client);
      throw new ClientInitError(url, new Error("registry closed during initialization"));
    }
    if (evictions !== this.evictionsOf(url)) {
      await this.closeQuietly(url, client);
      throw new ClientInitError(url, new Error("client evicted during initialization"));
    }

    this.clients.set(url, client);
    return client;
  }

  private async closeQuietly(url: AgentUrl, client: TransportClient): Promise<void> {
    try {
      await client.close();
    } catch (error) {
      this.onCloseError(url, error);
    }
  }
}
