/**
 * Session context passed to middleware on session start and end.
 */
export interface SessionContext {
  /** Unique session identifier */
  sessionId: string;
  /** Agent identifier */
  agentId?: string;
  /** User identifier */
  userId?: string;
  /** Arbitrary metadata */
  metadata?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Tool call types used by the wrapToolCall hook
// ---------------------------------------------------------------------------

/** Request payload for a tool invocation */
export interface ToolRequest {
  readonly toolName: string;
  readonly input: unknown;
  readonly metadata?: Record<string, unknown>;
}

/** Response from a tool invocation */
export interface ToolResponse {
  readonly output: unknown;
  readonly metadata?: Record<string, unknown>;
}

/** Next handler in the tool call chain */
export type ToolHandler = (req: ToolRequest) => Promise<ToolResponse>;

// ---------------------------------------------------------------------------
// Middleware interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle hooks for the orchestration framework.
 *
 * All hooks are optional. Implement only the hooks your middleware needs.
 */
export interface BridgeMiddleware {
  /** Unique middleware name */
  readonly name: string;

  /** Called when a session starts, before any tool call */
  onSessionStart?(context: SessionContext): Promise<void>;

  /** Called when a session ends, after all tool calls */
  onSessionEnd?(context: SessionContext): Promise<void>;

  /** Wrap a tool invocation to intercept or observe it */
  wrapToolCall?(req: ToolRequest, next: ToolHandler): Promise<ToolResponse>;
}
