/**
 * A2AMiddleware: wrapToolCall integration for the agent pipeline.
 *
 * Intercepts the {prefix}_* A2A tool calls and runs them on a provider
 * owned by the middleware. The provider is closed when the session ends.
 */

import type {
  BridgeMiddleware,
  SessionContext,
  ToolHandler,
  ToolRequest,
  ToolResponse,
} from "@a2a-bridge/core";
import { A2AClientToolProvider } from "./provider.js";
import { type A2aTool, bindA2aTools } from "./tools.js";
import type { A2aMiddlewareConfig } from "./types.js";
import { DEFAULT_TOOL_PREFIX } from "./types.js";
import { validateMiddlewareConfig } from "./validation.js";

export class A2AMiddleware implements BridgeMiddleware {
  readonly name = "a2a";
  readonly provider: A2AClientToolProvider;
  private readonly toolsByName: ReadonlyMap<string, A2aTool>;

  constructor(config: A2aMiddlewareConfig = {}) {
    const { toolPrefix, ...providerOptions } = config;
    this.provider = new A2AClientToolProvider(providerOptions);
    const prefix = toolPrefix ?? DEFAULT_TOOL_PREFIX;
    this.toolsByName = new Map(
      bindA2aTools(this.provider, prefix).map((tool) => [tool.config.name, tool]),
    );
  }

  /** Names of the tools this middleware answers */
  get toolNames(): readonly string[] {
    return [...this.toolsByName.keys()];
  }

  async wrapToolCall(req: ToolRequest, next: ToolHandler): Promise<ToolResponse> {
    const tool = this.toolsByName.get(req.toolName);
    if (tool === undefined) {
      return next(req);
    }

    const output = await tool.invoke(req.input);
    return {
      output,
      metadata: { provider: "a2a", tool: req.toolName, status: output.status },
    };
  }

  async onSessionEnd(_context: SessionContext): Promise<void> {
    await this.provider.close();
  }
}

/**
 * Factory: creates a validated A2AMiddleware.
 *
 * @throws {ProviderConfigError} If the config fails validation
 */
export function createA2aMiddleware(config: A2aMiddlewareConfig = {}): A2AMiddleware {
  validateMiddlewareConfig(config);
  return new A2AMiddleware(config);
}
