import { isExpectedError, wrapError } from "@a2a-bridge/errors";
import type { ToolFailure, ToolResult, ToolSuccess } from "./types.js";
import { LOG_TAG } from "./types.js";

/**
 * Run a tool operation and fold its outcome into a ToolResult.
 * Nothing thrown inside `run` escapes; it becomes the error shape,
 * carrying `context` alongside the message.
 *
 * Expected failures (an unreachable agent, a rejected message) are logged
 * with console.warn; anything else with console.error.
 */
export async function toToolResult<T extends object, C extends object>(
  operation: string,
  context: C,
  run: () => Promise<T>,
): Promise<ToolResult<T, C>> {
  try {
    const value = await run();
    const success: ToolSuccess<T> = { ...value, status: "success" };
    return success;
  } catch (caught) {
    const error = wrapError(caught);
    const log = isExpectedError(error) ? console.warn : console.error;
    log(`[${LOG_TAG}] ${operation} failed: ${error.message}`);
    const failure: ToolFailure<C> = { ...context, status: "error", error: error.message };
    return failure;
  }
}
