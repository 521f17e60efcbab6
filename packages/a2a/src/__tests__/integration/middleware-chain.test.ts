/**
 * Integration test: A2A middleware chain (discover → list → send → session end)
 *
 * Runs the middleware over the real HTTP transport with a stubbed fetch,
 * checking that tool calls are intercepted, requests carry the configured
 * auth, and results flow back as tool result mappings.
 */

import type { ToolRequest } from "@a2a-bridge/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { A2AMiddleware } from "../../middleware.js";
import {
  createAgentReply,
  createJsonRpcSuccess,
  createRawAgentCard,
  mockFetchResponse,
  mockSseResponse,
} from "../helpers.js";

const AGENT = "https://integration-agent.test";

describe("A2A middleware integration chain", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("performs discover → list → send → close end to end", async () => {
    const rawCard = createRawAgentCard({ name: "Integration Agent" });
    const reply = createAgentReply("Processed");
    const fetchMock = vi.fn(async (input: string, _init?: RequestInit) => {
      if (input.endsWith("/.well-known/agent-card.json")) {
        return mockFetchResponse(rawCard);
      }
      return mockFetchResponse(createJsonRpcSuccess(reply));
    });
    vi.stubGlobal("fetch", fetchMock);

    const middleware = new A2AMiddleware({
      knownAgentUrls: [AGENT],
      auth: { type: "bearer", token: "test-token" },
    });
    const next = vi.fn();

    // Step 1: Discover
    const discoverReq: ToolRequest = { toolName: "a2a_discover_agent", input: { url: AGENT } };
    const discoverRes = await middleware.wrapToolCall(discoverReq, next);
    expect(discoverRes.output).toEqual({ status: "success", agent_card: rawCard, url: AGENT });

    // Step 2: List (known agent already cached, no second card fetch)
    const listRes = await middleware.wrapToolCall(
      { toolName: "a2a_list_discovered_agents", input: {} },
      next,
    );
    expect(listRes.output).toEqual({ status: "success", agents: [rawCard], total_count: 1 });

    // Step 3: Send message
    const sendRes = await middleware.wrapToolCall(
      {
        toolName: "a2a_send_message",
        input: { message_text: "Process this task", target_agent_url: AGENT, message_id: "m-1" },
      },
      next,
    );
    expect(sendRes.output).toEqual({
      status: "success",
      response: reply,
      message_id: "m-1",
      target_agent_url: AGENT,
    });

    expect(next).not.toHaveBeenCalled();
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const sendCall = fetchMock.mock.calls[1];
    expect(sendCall?.[0]).toBe(AGENT);
    expect(new Headers(sendCall?.[1]?.headers).get("Authorization")).toBe("Bearer test-token");

    // Step 4: Session end closes the single client
    expect(middleware.provider.clientCount).toBe(1);
    await middleware.onSessionEnd({ sessionId: "s-1" });
    expect(middleware.provider.clientCount).toBe(0);
  });

  it("streams from agents that advertise streaming", async () => {
    const rawCard = createRawAgentCard({ capabilities: { streaming: true } });
    const update = { kind: "status-update", taskId: "t-1", status: { state: "completed" } };
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string) => {
        if (input.endsWith("/.well-known/agent-card.json")) {
          return mockFetchResponse(rawCard);
        }
        return mockSseResponse([`data: ${JSON.stringify(createJsonRpcSuccess(update))}\n\n`]);
      }),
    );

    const middleware = new A2AMiddleware({});
    const response = await middleware.wrapToolCall(
      {
        toolName: "a2a_send_message",
        input: { message_text: "Stream please", target_agent_url: AGENT, message_id: "m-2" },
      },
      vi.fn(),
    );

    expect(response.output).toEqual({
      status: "success",
      response: update,
      message_id: "m-2",
      target_agent_url: AGENT,
    });
    await middleware.onSessionEnd({ sessionId: "s-2" });
  });
});
