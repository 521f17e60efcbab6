/**
 * Cache of discovered Agent Cards, keyed by agent URL.
 *
 * - One entry per URL; set() replaces the previous card
 * - Optional TTL (default: entries never expire)
 * - Map insertion order gives a stable listing order
 */

import type { AgentCard, AgentUrl } from "./types.js";

interface CacheEntry {
  readonly card: AgentCard;
  readonly expiresAt: number;
}

export interface AgentCardCacheConfig {
  /** TTL in milliseconds (default: no expiry) */
  readonly ttlMs?: number | undefined;
}

export class AgentCardCache {
  private readonly entries: Map<AgentUrl, CacheEntry> = new Map();
  private readonly ttlMs: number;

  constructor(config?: AgentCardCacheConfig) {
    this.ttlMs = config?.ttlMs ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Get a cached Agent Card if it exists and hasn't expired.
   */
  get(url: AgentUrl): AgentCard | undefined {
    const entry = this.entries.get(url);
    if (entry === undefined) {
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(url);
      return undefined;
    }

    return entry.card;
  }

  /**
   * Store an Agent Card, replacing any earlier card for the same URL.
   */
  set(url: AgentUrl, card: AgentCard): void {
    this.entries.set(url, {
      card,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  delete(url: AgentUrl): boolean {
    return this.entries.delete(url);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Check if a URL is cached (and not expired).
   */
  has(url: AgentUrl): boolean {
    return this.get(url) !== undefined;
  }

  /**
   * Unexpired entries, in insertion order. Expired entries are dropped.
   */
  snapshot(): ReadonlyMap<AgentUrl, AgentCard> {
    const result = new Map<AgentUrl, AgentCard>();
    for (const url of [...this.entries.keys()]) {
      const card = this.get(url);
      if (card !== undefined) {
        result.set(url, card);
      }
    }
    return result;
  }

  /**
   * Number of entries currently in the cache (including expired).
   * Expired entries are lazily evicted on get().
   */
  get size(): number {
    return this.entries.size;
  }
}
