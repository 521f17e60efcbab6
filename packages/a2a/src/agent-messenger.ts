/**
 * Sends a text message to a remote agent and returns the first response.
 *
 * Agents advertising `capabilities.streaming` are called with
 * `message/stream` and read as SSE. All others get `message/send`, whose
 * single JSON-RPC response is treated as a one-event stream.
 */

import { SendError } from "@a2a-bridge/errors";
import type { AgentDiscovery } from "./agent-discovery.js";
import type { ClientRegistry } from "./client-registry.js";
import {
  buildSendRequest,
  createTextMessage,
  readRpcEvent,
  SEND_METHOD,
  STREAM_METHOD,
} from "./message.js";
import { withSpan } from "./tracing.js";
import type { TransportClient } from "./transport-client.js";
import type { AgentCard, AgentUrl, PushNotificationConfig } from "./types.js";

export interface AgentMessengerOptions {
  readonly registry: ClientRegistry;
  readonly discovery: AgentDiscovery;
  readonly pushConfig?: PushNotificationConfig | undefined;
}

/**
 * Endpoint a message is posted to: the card's own URL when it is http(s),
 * else the agent URL the card was discovered at.
 */
export function resolveEndpoint(url: AgentUrl, card: AgentCard): string {
  const advertised = card.url;
  if (advertised !== undefined && /^https?:\/\//.test(advertised)) {
    return advertised;
  }
  return url;
}

export class AgentMessenger {
  private readonly registry: ClientRegistry;
  private readonly discovery: AgentDiscovery;
  private readonly pushConfig: PushNotificationConfig | undefined;

  constructor(options: AgentMessengerOptions) {
    this.registry = options.registry;
    this.discovery = options.discovery;
    this.pushConfig = options.pushConfig;
  }

  /**
   * @throws {SendError} On discovery, transport or protocol failure
   */
  async send(
    url: AgentUrl,
    text: string,
    messageId: string,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    return withSpan(
      "a2a.send_message",
      { "a2a.agent_url": url, "a2a.message_id": messageId },
      async () => {
        try {
          const card = await this.discovery.discover(url, signal);
          const client = await this.registry.ensureClient(url);
          return await this.exchange(client, url, card, text, messageId, signal);
        } catch (error) {
          if (error instanceof SendError) throw error;
          throw new SendError(url, messageId, error);
        }
      },
    );
  }

  private async exchange(
    client: TransportClient,
    url: AgentUrl,
    card: AgentCard,
    text: string,
    messageId: string,
    signal?: AbortSignal,
  ): Promise<Record<string, unknown>> {
    const endpoint = resolveEndpoint(url, card);
    const message = createTextMessage(text, messageId);

    if (card.capabilities?.streaming === true) {
      const request = buildSendRequest(STREAM_METHOD, message, this.pushConfig);
      for await (const event of client.postStream(endpoint, request, signal)) {
        const result = this.firstResult(url, messageId, event);
        // Leaving the loop ends the generator, which releases the stream.
        if (result !== undefined) return result;
      }
    } else {
      const request = buildSendRequest(SEND_METHOD, message, this.pushConfig);
      const event = await client.postJson(endpoint, request, signal);
      const result = this.firstResult(url, messageId, event);
      if (result !== undefined) return result;
    }

    throw new SendError(url, messageId, new Error("No response received"));
  }

  private firstResult(
    url: AgentUrl,
    messageId: string,
    event: unknown,
  ): Record<string, unknown> | undefined {
    const read = readRpcEvent(event);
    switch (read.kind) {
      case "result":
        return read.result;
      case "error":
        throw new SendError(
          url,
          messageId,
          new Error(`JSON-RPC error ${read.code}: ${read.message}`),
        );
      case "other":
        return undefined;
    }
  }
}
