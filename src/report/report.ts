/**
 * Text renderings of a flexure calculation: a compact results summary for the
 * terminal and tool output, and a step-by-step Markdown report.
 */
import type { SectionInput, SectionResult } from "../beam/section.js";
import { unitLabels, type UnitSystem } from "../beam/units.js";

const UNIT_TITLES: Record<UnitSystem, string> = {
  imperial: "Imperial (psi, in, lb)",
  si: "SI (MPa, mm, N)",
};

const AS_MIN_FORMULAS: Record<UnitSystem, string> = {
  imperial: "max(3√fc'/fy·b·d, 200/fy·b·d)",
  si: "max(0.25√fc'/fy·b·d, 1.4/fy·b·d)",
};

function fmt(value: number, decimals: number): string {
  return value.toFixed(decimals);
}

function yieldLabel(result: SectionResult): string {
  switch (result.strain_state) {
    case "yielded":
      return "Yes (Yields)";
    case "elastic":
      return "No (Elastic)";
    case "degenerate":
      return "n/a (no reinforcement)";
  }
}

// ─── Summary ─────────────────────────────────────────────────────────────────

export function formatSummary(input: SectionInput, result: SectionResult): string {
  const u = unitLabels(input.unit_system);
  const lines = [
    "RESULTS SUMMARY",
    "===============",
    "Steel Area:",
    `  As = ${fmt(result.As, 4)} ${u.area}`,
    "Forces:",
    `  T = C = ${fmt(result.display.T, 2)} ${u.force_k}`,
    "Geometry:",
    `  a = ${fmt(result.a, 4)} ${u.length}`,
    `  c = ${fmt(result.c, 4)} ${u.length}`,
    "Strain Check:",
    `  εy = ${fmt(result.epsilon_y, 6)}`,
    `  εs = ${result.epsilon_s === null ? "undefined" : fmt(result.epsilon_s, 6)}`,
    `  Yield: ${yieldLabel(result)}`,
    "Nominal Moment:",
    `  Mn = ${fmt(result.display.Mn, 1)} ${u.moment_display}`,
    `  φ = ${result.phi === null ? "n/a" : fmt(result.phi, 3)}, φMn = ${fmt(result.display.phi_Mn, 1)} ${u.moment_display}`,
    "Minimum Steel:",
    `  As,min = ${fmt(result.As_min, 4)} ${u.area}`,
    `  Status: ${result.as_min_ok ? "OK" : "NOT OK"}`,
  ];

  if (result.warnings.length > 0) {
    lines.push("Warnings:");
    for (const warning of result.warnings) lines.push(`  - ${warning}`);
  }

  return lines.join("\n");
}

// ─── Step-by-step report ─────────────────────────────────────────────────────

export function renderReport(input: SectionInput, result: SectionResult): string {
  const u = unitLabels(input.unit_system);
  const strainTag = result.steel_yields ? "[OK]" : "[NG]";
  const asTag = result.as_min_ok ? "[OK]" : "[NG]";

  const lines: string[] = [
    "## Nominal Moment Strength (ACI 318)",
    "",
    `**Unit system:** ${UNIT_TITLES[input.unit_system]}`,
    "",
    "### Step 1: Steel Area and Tension Force",
    "",
    `- As = n × A_bar = ${input.n_bars} × ${fmt(input.bar_area, 3)} = ${fmt(result.As, 3)} ${u.area}`,
    `- T = As × fy = ${fmt(result.As, 3)} × ${fmt(input.fy, 0)} = ${fmt(result.T, 0)} ${u.force} (${fmt(result.display.T, 1)} ${u.force_k})`,
    "",
    "### Step 2: Stress Block Depth",
    "",
    `- a = (As × fy) / (0.85 × fc' × b) = ${fmt(result.T, 0)} / (0.85 × ${fmt(input.fc_prime, 0)} × ${fmt(input.b, 1)}) = ${fmt(result.a, 4)} ${u.length}`,
    `- c = a / β1 = ${fmt(result.a, 4)} / ${fmt(input.beta1, 3)} = ${fmt(result.c, 4)} ${u.length}`,
    "",
    `### Step 3: Strain Check ${strainTag}`,
    "",
    `- εy = fy / Es = ${fmt(input.fy, 0)} / ${fmt(input.es, 0)} = ${fmt(result.epsilon_y, 6)}`,
  ];

  if (result.epsilon_s === null) {
    lines.push("- No tension reinforcement: c = 0, the steel strain is undefined.");
  } else {
    lines.push(
      `- εs = ((d − c) / c) × εcu = ((${fmt(input.d, 2)} − ${fmt(result.c, 2)}) / ${fmt(result.c, 2)}) × ${fmt(input.epsilon_cu, 4)} = ${fmt(result.epsilon_s, 6)}`,
    );
    lines.push(
      result.steel_yields
        ? `- εs ≥ εy: steel yields, fs = fy = ${fmt(result.fs, 0)} ${u.stress}`
        : `- εs < εy: steel is elastic, fs = εs × Es = ${fmt(result.fs, 0)} ${u.stress}`,
    );
  }

  lines.push(
    "",
    "### Step 4: Nominal Moment",
    "",
    `- Mn = As × fs × (d − a/2) = ${fmt(result.As, 3)} × ${fmt(result.fs, 0)} × (${fmt(input.d, 2)} − ${fmt(result.a, 4)}/2) = ${fmt(result.display.Mn_k, 0)} ${u.moment_k}`,
    `- **Mn = ${fmt(result.display.Mn, 1)} ${u.moment_display}**`,
  );
  if (result.phi !== null && result.epsilon_t !== null) {
    lines.push(
      `- φ = ${fmt(result.phi, 3)} (εt = ${fmt(result.epsilon_t, 6)}), φMn = ${fmt(result.display.phi_Mn, 1)} ${u.moment_display}`,
    );
  }

  lines.push(
    "",
    `### Step 5: Minimum Steel Check ${asTag}`,
    "",
    `- As,min = ${AS_MIN_FORMULAS[input.unit_system]} = max(${fmt(result.As_min_terms.sqrt_fc, 4)}, ${fmt(result.As_min_terms.fy_term, 4)}) = ${fmt(result.As_min, 4)} ${u.area}`,
    `- As = ${fmt(result.As, 4)} ${result.as_min_ok ? "≥" : "<"} As,min = ${fmt(result.As_min, 4)}`,
  );

  if (result.warnings.length > 0) {
    lines.push("", "### Warnings", "");
    for (const warning of result.warnings) lines.push(`- ${warning}`);
  }

  return lines.join("\n") + "\n";
}
