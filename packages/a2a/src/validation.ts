/**
 * Zod schemas for provider configuration, agent cards and tool input.
 */

import { ProviderConfigError, type ValidationIssue } from "@a2a-bridge/errors";
import { type ZodError, type ZodType, z } from "zod";
import type { TransportFactory } from "./transport-client.js";
import type { A2aMiddlewareConfig, A2aProviderOptions, AgentCard } from "./types.js";

const HeaderMapSchema = z.record(z.string(), z.string());

export const AuthCredentialSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("basic"), username: z.string(), password: z.string() }),
  z.object({ type: z.literal("bearer"), token: z.string().min(1) }),
  z.object({
    type: z.literal("apiKey"),
    key: z.string().min(1),
    headerName: z.string().min(1).optional(),
  }),
]);

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith("http://") || value.startsWith("https://"), {
    message: "must be an http(s) URL",
  });

export const A2aProviderOptionsSchema = z.object({
  knownAgentUrls: z.array(HttpUrlSchema).optional(),
  timeout: z.number().positive().finite().optional(),
  headers: z.union([HeaderMapSchema, z.record(z.string(), HeaderMapSchema)]).optional(),
  auth: AuthCredentialSchema.optional(),
  webhookUrl: HttpUrlSchema.optional(),
  webhookToken: z.string().min(1).optional(),
  agentCardPath: z.string().startsWith("/").optional(),
  cacheTtlMs: z.number().int().min(0).optional(),
  transportFactory: z.custom<TransportFactory>((value) => typeof value === "function").optional(),
  onCloseError: z
    .custom<(url: string, error: unknown) => void>((value) => typeof value === "function")
    .optional(),
});

export const A2aMiddlewareConfigSchema = A2aProviderOptionsSchema.extend({
  toolPrefix: z.string().min(1).optional(),
});

export const AgentCardSchema: ZodType<AgentCard> = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    url: z.string().optional(),
    version: z.string().optional(),
    capabilities: z
      .object({
        streaming: z.boolean().optional(),
        pushNotifications: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Tool input
// ---------------------------------------------------------------------------

export const DiscoverAgentInputSchema = z.object({
  url: z.string().min(1),
});

export const SendMessageInputSchema = z.object({
  message_text: z.string().min(1),
  target_agent_url: z.string().min(1),
  message_id: z.string().min(1).optional(),
});

export type DiscoverAgentInput = z.infer<typeof DiscoverAgentInputSchema>;
export type SendMessageInput = z.infer<typeof SendMessageInputSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Flatten zod issues into field-level validation issues */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

function parseOrThrow<T>(schema: ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    throw new ProviderConfigError(summary, issues);
  }
  return result.data;
}

/**
 * Validate provider options. Throws ProviderConfigError on failure.
 */
export function validateProviderOptions(options: A2aProviderOptions): void {
  parseOrThrow(A2aProviderOptionsSchema, options);
}

/**
 * Validate middleware config. Throws ProviderConfigError on failure.
 */
export function validateMiddlewareConfig(config: A2aMiddlewareConfig): void {
  parseOrThrow(A2aMiddlewareConfigSchema, config);
}
