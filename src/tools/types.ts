/**
 * Shape shared by every tool: a JSON-schema parameter description and an
 * async `execute` that returns text content plus structured details.
 */

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  details?: unknown;
}

export interface ToolDefinition {
  name: string;
  label: string;
  description: string;
  parameters: Record<string, unknown>;
  execute: (toolCallId: string, args: unknown) => Promise<ToolResult>;
}

/** Tool arguments arrive as untyped JSON; anything but a plain object counts as no arguments. */
export function toParams(args: unknown): Record<string, unknown> {
  if (args === null || typeof args !== "object" || Array.isArray(args)) return {};
  return Object.fromEntries(Object.entries(args));
}
