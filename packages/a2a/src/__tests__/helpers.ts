/**
 * Test helpers for @a2a-bridge/a2a
 */

import { TransportHttpError, TransportRequestError } from "@a2a-bridge/errors";
import type { TransportClient, TransportFactory } from "../transport-client.js";
import type { ResolvedClientConfig } from "../types.js";
import { AGENT_CARD_PATH } from "../types.js";

// ---------------------------------------------------------------------------
// Raw payloads
// ---------------------------------------------------------------------------

export function createRawAgentCard(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    name: "Test Agent",
    description: "A test A2A agent",
    version: "1.0.0",
    skills: [{ id: "search", name: "Search", description: "Search the web", tags: ["search"] }],
    capabilities: { streaming: false, pushNotifications: false },
    ...overrides,
  };
}

export function createJsonRpcSuccess(result: unknown, id = "req-1"): unknown {
  return { jsonrpc: "2.0", id, result };
}

export function createJsonRpcError(code: number, message: string, id = "req-1"): unknown {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

export function createAgentReply(text: string, messageId = "reply-1"): Record<string, unknown> {
  return {
    kind: "message",
    messageId,
    role: "agent",
    parts: [{ kind: "text", text }],
  };
}

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

export function mockFetchResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function mockSseResponse(chunks: readonly string[]): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
  return new Response(stream, { status: 200, headers: { "content-type": "text/event-stream" } });
}

// ---------------------------------------------------------------------------
// In-process agent network
// ---------------------------------------------------------------------------

export interface FakeAgent {
  /** Card served at the well-known path; omitted means HTTP 404 */
  readonly card?: Record<string, unknown>;
  /** Path the card is served at (default: the well-known path) */
  readonly cardPath?: string;
  /** JSON-RPC response to message/send */
  readonly respond?: (request: unknown) => unknown;
  /** Events emitted for message/stream */
  readonly events?: readonly unknown[];
  /** Error thrown by close() */
  readonly closeError?: Error;
}

export interface RecordedPost {
  readonly target: string;
  readonly body: unknown;
}

/**
 * TransportClient that answers from a FakeAgent instead of the network.
 * A URL with no agent behaves like a refused connection.
 */
export class FakeTransport implements TransportClient {
  readonly url: string;
  readonly headers: Headers;
  readonly timeoutMs: number;
  readonly gets: string[] = [];
  readonly posts: RecordedPost[] = [];
  readonly streams: RecordedPost[] = [];
  closeCalls = 0;
  private closed = false;

  constructor(
    config: ResolvedClientConfig,
    private readonly agent: FakeAgent | undefined,
  ) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs;
    this.headers = new Headers({ ...config.headers });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  async getJson(target: string): Promise<unknown> {
    this.gets.push(target);
    const agent = this.reachable(target);
    if (agent.card === undefined || !target.endsWith(agent.cardPath ?? AGENT_CARD_PATH)) {
      throw new TransportHttpError(target, 404, "Not Found");
    }
    return agent.card;
  }

  async postJson(target: string, body: unknown): Promise<unknown> {
    this.posts.push({ target, body });
    const agent = this.reachable(target);
    return agent.respond?.(body);
  }

  async *postStream(target: string, body: unknown): AsyncGenerator<unknown> {
    this.streams.push({ target, body });
    const agent = this.reachable(target);
    for (const event of agent.events ?? []) {
      yield event;
    }
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.closed = true;
    if (this.agent?.closeError) throw this.agent.closeError;
  }

  private reachable(target: string): FakeAgent {
    if (this.agent === undefined) {
      throw new TransportRequestError(target, new Error("connect ECONNREFUSED"));
    }
    return this.agent;
  }
}

export interface FakeNetwork {
  readonly factory: TransportFactory;
  readonly transports: FakeTransport[];
  readonly configs: ResolvedClientConfig[];
  transportFor(url: string): FakeTransport | undefined;
}

export function createFakeNetwork(agents: Readonly<Record<string, FakeAgent>> = {}): FakeNetwork {
  const transports: FakeTransport[] = [];
  const configs: ResolvedClientConfig[] = [];
  return {
    transports,
    configs,
    factory: (config) => {
      configs.push(config);
      const transport = new FakeTransport(config, agents[config.url]);
      transports.push(transport);
      return transport;
    },
    transportFor: (url) => transports.find((t) => t.url === url),
  };
}
