/**
 * beta1 helper tool for rc-flexure.
 *
 * The flexure engine takes beta1 as an input so it can be overridden; this
 * tool gives the value ACI 318 assigns for a concrete strength.
 */
import { deriveBeta1 } from "../../beam/aci318.js";
import { parseUnitSystem } from "../../beam/units.js";
import { toParams, type ToolDefinition, type ToolResult } from "../types.js";

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function createBeta1ToolDefinition(): ToolDefinition {
  return {
    name: "structural_beta1",
    label: "Stress Block Factor beta1",
    description:
      "Derive the ACI 318 stress block factor beta1 from the concrete strength fc'. " +
      "0.85 up to 4000 psi (28 MPa), reduced by 0.05 per 1000 psi (7 MPa), not below 0.65.",
    parameters: {
      type: "object",
      properties: {
        fc_prime: {
          type: "number",
          exclusiveMinimum: 0,
          description: "Concrete compressive strength fc' (psi or MPa).",
        },
        unit_system: {
          type: "string",
          enum: ["imperial", "si"],
          description: "Unit system of fc_prime (default: imperial).",
        },
      },
      required: ["fc_prime"],
    },
    execute: async (_toolCallId: string, args: unknown): Promise<ToolResult> => {
      const params = toParams(args);

      const fc_prime = Number(params.fc_prime);
      if (!Number.isFinite(fc_prime) || fc_prime <= 0) {
        throw new Error("fc_prime must be a positive number.");
      }
      const unit = parseUnitSystem(params.unit_system ?? "imperial");
      const beta1 = deriveBeta1(fc_prime, unit);

      return {
        content: [{ type: "text", text: `beta1 = ${round(beta1, 4)} for fc' = ${fc_prime} (${unit})` }],
        details: { fc_prime, unit_system: unit, beta1 },
      };
    },
  };
}
