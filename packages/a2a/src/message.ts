/**
 * A2A message and JSON-RPC envelope helpers.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { A2aMessage, PushNotificationConfig } from "./types.js";

export const SEND_METHOD = "message/send";
export const STREAM_METHOD = "message/stream";

export type SendMethod = typeof SEND_METHOD | typeof STREAM_METHOD;

export interface JsonRpcRequest {
  readonly jsonrpc: "2.0";
  readonly id: string;
  readonly method: SendMethod;
  readonly params: {
    readonly message: A2aMessage;
    readonly configuration?: {
      readonly pushNotificationConfig: PushNotificationConfig;
    };
  };
}

/**
 * Build a single-part text message from the user role.
 */
export function createTextMessage(text: string, messageId: string): A2aMessage {
  return {
    kind: "message",
    messageId,
    role: "user",
    parts: [{ kind: "text", text }],
  };
}

export function buildSendRequest(
  method: SendMethod,
  message: A2aMessage,
  pushConfig?: PushNotificationConfig,
): JsonRpcRequest {
  return {
    jsonrpc: "2.0",
    id: randomUUID(),
    method,
    params:
      pushConfig !== undefined
        ? { message, configuration: { pushNotificationConfig: pushConfig } }
        : { message },
  };
}

// ---------------------------------------------------------------------------
// Response events
// ---------------------------------------------------------------------------

const JsonRpcResultSchema = z.object({
  result: z.record(z.string(), z.unknown()),
});

const JsonRpcErrorSchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
  }),
});

export type RpcEvent =
  | { readonly kind: "result"; readonly result: Record<string, unknown> }
  | { readonly kind: "error"; readonly code: number; readonly message: string }
  | { readonly kind: "other" };

/**
 * Classify one JSON-RPC response (or SSE event payload).
 */
export function readRpcEvent(payload: unknown): RpcEvent {
  const failure = JsonRpcErrorSchema.safeParse(payload);
  if (failure.success) {
    return { kind: "error", code: failure.data.error.code, message: failure.data.error.message };
  }
  const success = JsonRpcResultSchema.safeParse(payload);
  if (success.success) {
    return { kind: "result", result: success.data.result };
  }
  return { kind: "other" };
}
