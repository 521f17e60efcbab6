/**
 * A2A tool definitions for the LLM agent pipeline.
 *
 * Three tools, one per provider operation:
 *   - a2a_discover_agent          → fetch and cache an Agent Card
 *   - a2a_list_discovered_agents  → list cached cards
 *   - a2a_send_message            → send text and return the first response
 */

import type { ToolConfig } from "@a2a-bridge/core";
import type { ZodError } from "zod";
import type { A2AClientToolProvider } from "./provider.js";
import type { ToolResult } from "./types.js";
import { DEFAULT_TOOL_PREFIX } from "./types.js";
import { DiscoverAgentInputSchema, SendMessageInputSchema, toValidationIssues } from "./validation.js";

/** Tool definition paired with the handler that runs it */
export interface A2aTool {
  readonly config: ToolConfig;
  invoke(input: unknown): Promise<ToolResult<object, object>>;
}

export type A2aOperation = "discover_agent" | "list_discovered_agents" | "send_message";

export function toolName(prefix: string, operation: A2aOperation): string {
  return `${prefix}_${operation}`;
}

/**
 * Build the 3 A2A tool definitions with optional name prefix.
 */
export function buildA2aTools(prefix = DEFAULT_TOOL_PREFIX): readonly ToolConfig[] {
  const { discover, list, send } = toolConfigs(prefix);
  return [discover, list, send];
}

function toolConfigs(prefix: string): {
  readonly discover: ToolConfig;
  readonly list: ToolConfig;
  readonly send: ToolConfig;
} {
  return {
    discover: {
      name: toolName(prefix, "discover_agent"),
      description:
        "Discover a remote A2A agent by URL and return its Agent Card: name, description, " +
        "skills and capabilities. Use this before sending messages to an unfamiliar agent.",
      parameters: {
        type: "object",
        properties: {
          url: {
            type: "string",
            description: "The base URL of the remote A2A agent (e.g. https://agent.example.com)",
          },
        },
        required: ["url"],
      },
    },
    list: {
      name: toolName(prefix, "list_discovered_agents"),
      description:
        "List every A2A agent discovered so far, including the preconfigured known agents.",
      parameters: {
        type: "object",
        properties: {},
      },
    },
    send: {
      name: toolName(prefix, "send_message"),
      description:
        "Send a text message to a remote A2A agent and return its response. " +
        "The agent is discovered first if it has not been already.",
      parameters: {
        type: "object",
        properties: {
          message_text: {
            type: "string",
            description: "The message to send to the remote agent",
          },
          target_agent_url: {
            type: "string",
            description: "The base URL of the remote A2A agent",
          },
          message_id: {
            type: "string",
            description: "Optional message ID; one is generated when omitted",
          },
        },
        required: ["message_text", "target_agent_url"],
      },
    },
  };
}

function invalidInput(error: ZodError): ToolResult<object, object> {
  const detail = toValidationIssues(error)
    .map((i) => `${i.field}: ${i.message}`)
    .join("; ");
  return { status: "error", error: `Invalid tool input: ${detail}` };
}

/**
 * Pair each tool definition with the provider operation it runs.
 * Input is validated before the provider is called.
 */
export function bindA2aTools(
  provider: A2AClientToolProvider,
  prefix = DEFAULT_TOOL_PREFIX,
): readonly A2aTool[] {
  const configs = toolConfigs(prefix);

  return [
    {
      config: configs.discover,
      async invoke(input) {
        const parsed = DiscoverAgentInputSchema.safeParse(input);
        if (!parsed.success) return invalidInput(parsed.error);
        return provider.discoverAgent(parsed.data.url);
      },
    },
    {
      config: configs.list,
      async invoke() {
        return provider.listDiscoveredAgents();
      },
    },
    {
      config: configs.send,
      async invoke(input) {
        const parsed = SendMessageInputSchema.safeParse(input);
        if (!parsed.success) return invalidInput(parsed.error);
        const { message_text, target_agent_url, message_id } = parsed.data;
        return provider.sendMessage(message_text, target_agent_url, message_id);
      },
    },
  ];
}
