/**
 * HTTP transport bound to one agent URL.
 *
 * Built on the global fetch, whose dispatcher pools connections per origin.
 * Every request carries the resolved headers and is bounded by the resolved
 * timeout. close() aborts whatever is still in flight.
 */

import {
  A2aAuthFailedError,
  getErrorMessage,
  TransportClosedError,
  TransportHttpError,
  TransportRequestError,
  TransportTimeoutError,
} from "@a2a-bridge/errors";
import type { ResolvedClientConfig } from "./types.js";

/**
 * Capability the registry needs from a transport client.
 */
export interface TransportClient {
  readonly url: string;
  readonly headers: Headers;
  readonly timeoutMs: number;
  readonly isOpen: boolean;
  getJson(target: string, signal?: AbortSignal): Promise<unknown>;
  postJson(target: string, body: unknown, signal?: AbortSignal): Promise<unknown>;
  postStream(target: string, body: unknown, signal?: AbortSignal): AsyncGenerator<unknown>;
  close(): Promise<void>;
}

/** Builds a transport client from resolved settings */
export type TransportFactory = (
  config: ResolvedClientConfig,
) => TransportClient | Promise<TransportClient>;

// ---------------------------------------------------------------------------
// SSE parsing
// ---------------------------------------------------------------------------

/**
 * Yield the JSON payload of every `data:` line of an SSE body.
 * Multi-line data fields are joined with "\n" per the SSE format.
 */
export async function* parseSseStream(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let data: string[] = [];
  let finished = false;

  const flush = (): unknown[] => {
    if (data.length === 0) return [];
    const payload = data.join("\n");
    data = [];
    try {
      return [JSON.parse(payload)];
    } catch (error) {
      throw new SyntaxError(`Malformed SSE event data: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line === "") {
          yield* flush();
        } else if (line.startsWith("data:")) {
          data.push(line.slice(5).trimStart());
        }
      }
    }
    buffer += decoder.decode();
    if (buffer.startsWith("data:")) {
      data.push(buffer.slice(5).trimStart());
    }
    yield* flush();
  } finally {
    // A consumer that stops early must not leave the body streaming.
    try {
      if (!finished) await reader.cancel();
    } finally {
      reader.releaseLock();
    }
  }
}

// ---------------------------------------------------------------------------
// HttpTransportClient
// ---------------------------------------------------------------------------

export class HttpTransportClient implements TransportClient {
  readonly url: string;
  readonly headers: Headers;
  readonly timeoutMs: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: ResolvedClientConfig) {
    const parsed = new URL(config.url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new TypeError(`Unsupported protocol "${parsed.protocol}"`);
    }
    this.url = config.url;
    this.timeoutMs = config.timeoutMs;
    this.headers = new Headers();
    for (const [name, value] of Object.entries(config.headers)) {
      this.headers.set(name, value);
    }
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  getJson(target: string, signal?: AbortSignal): Promise<unknown> {
    return this.requestJson(target, { method: "GET" }, signal);
  }

  postJson(target: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.requestJson(target, { method: "POST", body: JSON.stringify(body) }, signal);
  }

  async *postStream(target: string, body: unknown, signal?: AbortSignal): AsyncGenerator<unknown> {
    const controller = this.track(signal);
    let drained = false;
    try {
      const response = await this.send(
        target,
        { method: "POST", body: JSON.stringify(body) },
        "text/event-stream",
        controller,
      );
      if (response.body === null) {
        drained = true;
        return;
      }
      try {
        yield* parseSseStream(response.body);
        drained = true;
      } catch (error) {
        throw this.mapError(target, controller, error);
      }
    } finally {
      if (!drained && !controller.signal.aborted) {
        controller.abort(new TransportClosedError(this.url));
      }
      this.untrack(controller);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort(new TransportClosedError(this.url));
    }
    this.inFlight.clear();
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /** The timeout covers the whole exchange, body included. */
  private async requestJson(
    target: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const controller = this.track(signal);
    try {
      const response = await this.send(target, init, "application/json", controller);
      try {
        return await response.json();
      } catch (error) {
        throw this.mapError(target, controller, error);
      }
    } finally {
      this.untrack(controller);
    }
  }

  private async send(
    target: string,
    init: RequestInit,
    accept: string,
    controller: AbortController,
  ): Promise<Response> {
    const headers = new Headers(this.headers);
    headers.set("Accept", accept);
    if (init.body !== undefined) {
      headers.set("Content-Type", "application/json");
    }

    let response: Response;
    try {
      response = await fetch(target, { ...init, headers, signal: controller.signal });
    } catch (error) {
      throw this.mapError(target, controller, error);
    }

    if (response.status === 401 || response.status === 403) {
      throw new A2aAuthFailedError(this.url, response.status);
    }
    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new TransportHttpError(target, response.status, text);
    }
    return response;
  }

  private track(signal?: AbortSignal): TrackedController {
    if (this.closed) {
      throw new TransportClosedError(this.url);
    }
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TransportTimeoutError(this.url, this.timeoutMs));
    }, this.timeoutMs);
    const onExternalAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", onExternalAbort, { once: true });
    }
    const tracked: TrackedController = Object.assign(controller, {
      dispose: () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onExternalAbort);
      },
    });
    this.inFlight.add(tracked);
    return tracked;
  }

  private untrack(controller: TrackedController): void {
    controller.dispose();
    this.inFlight.delete(controller);
  }

  /**
   * Translate a fetch or stream failure. An aborted request fails with the
   * abort reason: our timeout or close error, or the caller's own reason.
   */
  private mapError(target: string, controller: AbortController, error: unknown): unknown {
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      return reason ?? error;
    }
    return new TransportRequestError(target, error);
  }
}

type TrackedController = AbortController & { readonly dispose: () => void };

/** Default TransportFactory */
export function createHttpTransport(config: ResolvedClientConfig): TransportClient {
  return new HttpTransportClient(config);
}
