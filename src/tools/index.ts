/**
 * Barrel file: exports all tool definitions for rc-flexure.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Structural ─────────────────────────────────────────────────────────────
import { createBeamFlexureToolDefinition } from "./structural/beam-flexure.js";
import { createBeta1ToolDefinition } from "./structural/beta1.js";
import type { ToolDefinition } from "./types.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export { createBeamFlexureToolDefinition, createBeta1ToolDefinition };
export type { ToolDefinition, ToolResult } from "./types.js";

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions(): ToolDefinition[] {
  return [
    // Structural
    createBeamFlexureToolDefinition(),
    createBeta1ToolDefinition(),
  ];
}
