/**
 * @a2a-bridge/core: contracts shared with the orchestration framework.
 */

export const PACKAGE_NAME = "@a2a-bridge/core" as const;

export type { ToolConfig } from "./config-types.js";
export type {
  BridgeMiddleware,
  SessionContext,
  ToolHandler,
  ToolRequest,
  ToolResponse,
} from "./middleware-types.js";
