/**
 * Agent discovery: fetches Agent Cards through the client registry and
 * keeps the most recent card per URL in the cache.
 *
 * Policy: a cached card short-circuits discovery. refresh() forces a fetch.
 */

import { DiscoveryError, getErrorMessage, TransportHttpError } from "@a2a-bridge/errors";
import type { AgentCardCache } from "./agent-card-cache.js";
import type { ClientRegistry } from "./client-registry.js";
import { withSpan } from "./tracing.js";
import type { TransportClient } from "./transport-client.js";
import type { AgentCard, AgentUrl, BulkDiscoveryReport } from "./types.js";
import { AGENT_CARD_PATH, LEGACY_AGENT_CARD_PATH, LOG_TAG } from "./types.js";
import { AgentCardSchema } from "./validation.js";

export interface AgentDiscoveryOptions {
  readonly registry: ClientRegistry;
  readonly cache: AgentCardCache;
  readonly knownAgentUrls?: readonly AgentUrl[] | undefined;
  readonly agentCardPath?: string | undefined;
}

/** Join a base URL and an absolute path without doubling the slash */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

/**
 * Render a card as a plain mapping (deep copy, safe to hand to callers).
 */
export function renderAgentCard(card: AgentCard): Record<string, unknown> {
  return structuredClone({ ...card });
}

/** Settle with `promise`, or reject with DiscoveryError once `signal` aborts */
function abortable(
  url: AgentUrl,
  promise: Promise<AgentCard>,
  signal: AbortSignal,
): Promise<AgentCard> {
  return new Promise<AgentCard>((resolve, reject) => {
    const onAbort = () => reject(new DiscoveryError(url, signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (card) => {
        signal.removeEventListener("abort", onAbort);
        resolve(card);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export class AgentDiscovery {
  private readonly registry: ClientRegistry;
  private readonly cache: AgentCardCache;
  private readonly knownAgentUrls: readonly AgentUrl[];
  private readonly agentCardPath: string;
  private readonly inFlight = new Map<AgentUrl, Promise<AgentCard>>();
  private initialDiscovery: Promise<BulkDiscoveryReport> | undefined;
  private initialDone = false;

  constructor(options: AgentDiscoveryOptions) {
    this.registry = options.registry;
    this.cache = options.cache;
    this.knownAgentUrls = [...(options.knownAgentUrls ?? [])];
    this.agentCardPath = options.agentCardPath ?? AGENT_CARD_PATH;
  }

  /** DiscoveryState: true once the known-agent pass has completed */
  get initialDiscoveryDone(): boolean {
    return this.initialDone;
  }

  /**
   * Return the cached card for a URL, or fetch and cache it.
   *
   * Concurrent misses for the same URL share one fetch. The shared fetch
   * carries no caller's signal: `signal` only stops this caller's wait.
   *
   * @throws {DiscoveryError} On any fetch, transport or validation failure,
   * or when `signal` aborts first
   */
  async discover(url: AgentUrl, signal?: AbortSignal): Promise<AgentCard> {
    const cached = this.cache.get(url);
    if (cached) return cached;
    if (signal?.aborted) throw new DiscoveryError(url, signal.reason);

    let shared = this.inFlight.get(url);
    if (shared === undefined) {
      shared = this.fetchAndCache(url).finally(() => {
        this.inFlight.delete(url);
      });
      this.inFlight.set(url, shared);
    }

    if (signal === undefined) return shared;
    return abortable(url, shared, signal);
  }

  /**
   * Drop the cached card for a URL and discover it again.
   */
  async refresh(url: AgentUrl, signal?: AbortSignal): Promise<AgentCard> {
    this.cache.delete(url);
    return this.discover(url, signal);
  }

  /**
   * Discover several URLs independently. A failure for one URL is logged
   * and reported; it never stops the others.
   */
  async bulkDiscover(urls: readonly AgentUrl[]): Promise<BulkDiscoveryReport> {
    const results = await Promise.allSettled(urls.map((url) => this.discover(url)));

    const discovered: AgentUrl[] = [];
    const failed: { url: AgentUrl; error: string }[] = [];
    results.forEach((result, index) => {
      const url = urls[index] ?? "";
      if (result.status === "fulfilled") {
        discovered.push(url);
      } else {
        const error = getErrorMessage(result.reason);
        console.warn(`[${LOG_TAG}] Failed to discover agent at ${url}: ${error}`);
        failed.push({ url, error });
      }
    });
    return { discovered, failed };
  }

  /**
   * Run bulk discovery of the known agent URLs exactly once.
   * Concurrent callers share the same pass.
   */
  ensureInitialDiscovery(): Promise<BulkDiscoveryReport> {
    if (this.initialDiscovery === undefined) {
      this.initialDiscovery = this.bulkDiscover(this.knownAgentUrls).then((report) => {
        this.initialDone = true;
        return report;
      });
    }
    return this.initialDiscovery;
  }

  /**
   * Snapshot of all cached cards, after the initial known-agent pass.
   */
  async listDiscovered(): Promise<ReadonlyMap<AgentUrl, AgentCard>> {
    if (!this.initialDone) {
      await this.ensureInitialDiscovery();
    }
    return this.cache.snapshot();
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private fetchAndCache(url: AgentUrl): Promise<AgentCard> {
    return withSpan("a2a.discover", { "a2a.agent_url": url }, async () => {
      let card: AgentCard;
      try {
        const client = await this.registry.ensureClient(url);
        const raw = await this.fetchCard(client, url);
        const parsed = AgentCardSchema.safeParse(raw);
        if (!parsed.success) {
          throw new Error(
            `Invalid agent card: ${parsed.error.issues
              .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
              .join("; ")}`,
          );
        }
        card = parsed.data;
      } catch (error) {
        throw new DiscoveryError(url, error);
      }
      this.cache.set(url, card);
      return card;
    });
  }

  private async fetchCard(client: TransportClient, url: AgentUrl): Promise<unknown> {
    try {
      return await client.getJson(joinUrl(url, this.agentCardPath));
    } catch (error) {
      const canFallBack =
        error instanceof TransportHttpError &&
        error.status === 404 &&
        this.agentCardPath === AGENT_CARD_PATH;
      if (!canFallBack) throw error;
      return client.getJson(joinUrl(url, LEGACY_AGENT_CARD_PATH));
    }
  }
}
