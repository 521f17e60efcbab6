/**
 * Tool definition exposed to the LLM.
 *
 * `parameters` is a JSON Schema object describing the tool input.
 */
export interface ToolConfig {
  name: string;
  description: string;
  parameters?: Record<string, unknown>;
}
