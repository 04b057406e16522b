/**
 * Flexural strength tool for rc-flexure.
 *
 * Computes the nominal moment strength Mn of a singly reinforced rectangular
 * concrete section (Whitney stress block, ACI 318) and checks the minimum
 * tension steel. Optionally writes the section / strain / stress diagram as SVG.
 */
import fs from "node:fs";
import path from "node:path";
import { compute, type SectionInput, type SectionResult } from "../../beam/section.js";
import { sectionInputFromRecord } from "../../beam/input.js";
import { deriveBeta1 } from "../../beam/aci318.js";
import { formatSummary } from "../../report/report.js";
import { renderSectionSvg } from "../../report/diagrams.js";
import { toParams, type ToolDefinition, type ToolResult } from "../types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

interface FlexureOutput {
  input: SectionInput;
  result: SectionResult;
  output_path?: string;
}

// ─── Utility ─────────────────────────────────────────────────────────────────

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function runFlexure(params: Record<string, unknown>): FlexureOutput {
  // beta1 may be requested as "auto" to derive it from fc'
  const { beta1, ...rest } = params;
  const autoBeta1 = typeof beta1 === "string" && beta1.trim().toLowerCase() === "auto";
  const input = sectionInputFromRecord(autoBeta1 ? rest : params);
  const finalInput: SectionInput = autoBeta1
    ? Object.freeze({ ...input, beta1: deriveBeta1(input.fc_prime, input.unit_system) })
    : input;

  const result = compute(finalInput);

  const outputPath =
    typeof params.output_path === "string" ? params.output_path.trim() || undefined : undefined;
  let savedPath: string | undefined;
  if (outputPath) {
    const resolvedPath = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(resolvedPath, renderSectionSvg(finalInput, result), "utf-8");
    savedPath = resolvedPath;
  }

  return { input: finalInput, result, output_path: savedPath };
}

const NUMBER_PARAM = (description: string) => ({ type: "number", description, exclusiveMinimum: 0 });

// ─── Tool definitions ────────────────────────────────────────────────────────

export function createBeamFlexureToolDefinition(): ToolDefinition {
  return {
    name: "structural_beam_flexure",
    label: "Beam Flexural Strength",
    description:
      "Compute the nominal moment strength Mn of a singly reinforced rectangular concrete beam " +
      "section using the Whitney rectangular stress block (ACI 318). Reports stress block depth, " +
      "neutral axis depth, steel strain and yield check, Mn, phi*Mn and the minimum steel check. " +
      "Values are in the native units of unit_system (imperial: psi, in, in²; si: MPa, mm, mm²). " +
      "Missing fields take that unit system's defaults. Can write the section diagram as SVG.",
    parameters: {
      type: "object",
      properties: {
        unit_system: {
          type: "string",
          enum: ["imperial", "si"],
          description: "Unit system of all values (default: imperial).",
        },
        fc_prime: NUMBER_PARAM("Concrete compressive strength fc' (psi or MPa)."),
        fy: NUMBER_PARAM("Steel yield strength (psi or MPa)."),
        es: NUMBER_PARAM("Steel modulus of elasticity (psi or MPa)."),
        beta1: {
          type: ["number", "string"],
          description: "Stress block factor beta1, or \"auto\" to derive it from fc' (default: 0.85).",
        },
        epsilon_cu: NUMBER_PARAM("Ultimate concrete strain (default: 0.003)."),
        b: NUMBER_PARAM("Section width (in or mm)."),
        h: NUMBER_PARAM("Total section depth (in or mm)."),
        d: NUMBER_PARAM("Effective depth to the tension steel centroid (in or mm)."),
        n_bars: {
          type: "integer",
          minimum: 0,
          description: "Number of tension bars.",
        },
        bar_area: {
          type: "number",
          minimum: 0,
          description: "Area of one bar (in² or mm²).",
        },
        output_path: {
          type: "string",
          description: "File path to save the section diagram as SVG. If not provided, no SVG is generated.",
        },
      },
    },
    execute: async (_toolCallId: string, args: unknown): Promise<ToolResult> => {
      const params = toParams(args);
      const { input, result, output_path } = runFlexure(params);

      const summary = formatSummary(input, result);
      const text = output_path ? `${summary}\nDiagram saved to: ${output_path}` : summary;

      return {
        content: [
          { type: "text", text },
          { type: "text", text: JSON.stringify({ input, result }, null, 2) },
        ],
        details: {
          unit_system: input.unit_system,
          strain_state: result.strain_state,
          Mn_display: round(result.display.Mn, 2),
          phi_Mn_display: round(result.display.phi_Mn, 2),
          As: round(result.As, 4),
          As_min: round(result.As_min, 4),
          as_min_ok: result.as_min_ok,
          output_path,
        },
      };
    },
  };
}
