import { describe, expect, it } from "vitest";
import { formatSummary, renderReport } from "./report.js";
import { compute, type SectionInput } from "../beam/section.js";
import { defaultsFor } from "../beam/defaults.js";

function run(input: SectionInput) {
  return { input, result: compute(input) };
}

describe("formatSummary", () => {
  it("summarizes the Imperial defaults", () => {
    const { input, result } = run(defaultsFor("imperial"));
    expect(formatSummary(input, result).split("\n")).toEqual([
      "RESULTS SUMMARY",
      "===============",
      "Steel Area:",
      "  As = 3.1600 in²",
      "Forces:",
      "  T = C = 189.60 kips",
      "Geometry:",
      "  a = 4.6471 in",
      "  c = 5.4671 in",
      "Strain Check:",
      "  εy = 0.002069",
      "  εs = 0.006603",
      "  Yield: Yes (Yields)",
      "Nominal Moment:",
      "  Mn = 239.8 k-ft",
      "  φ = 0.900, φMn = 215.8 k-ft",
      "Minimum Steel:",
      "  As,min = 0.7000 in²",
      "  Status: OK",
    ]);
  });

  it("uses SI labels and scales", () => {
    const { input, result } = run(defaultsFor("si"));
    const lines = formatSummary(input, result).split("\n");
    expect(lines).toContain("  As = 1530.0000 mm²");
    expect(lines).toContain("  T = C = 642.60 kN");
    expect(lines).toContain("  c = 177.8824 mm");
    expect(lines).toContain("  Mn = 272.7 kN-m");
    expect(lines).toContain("  As,min = 416.6667 mm²");
  });

  it("reports the degenerate state and its warning", () => {
    const { input, result } = run({ ...defaultsFor("imperial"), n_bars: 0 });
    const lines = formatSummary(input, result).split("\n");
    expect(lines).toContain("  εs = undefined");
    expect(lines).toContain("  Yield: n/a (no reinforcement)");
    expect(lines).toContain("  φ = n/a, φMn = 0.0 k-ft");
    expect(lines).toContain("  Status: NOT OK");
    expect(lines.slice(-2)).toEqual([
      "Warnings:",
      "  - No tension reinforcement (As = 0); strain state is undefined and Mn = 0.",
    ]);
  });

  it("marks elastic steel", () => {
    const { input, result } = run({ ...defaultsFor("imperial"), b: 8, bar_area: 1.27 });
    expect(formatSummary(input, result).split("\n")).toContain("  Yield: No (Elastic)");
  });
});

describe("renderReport", () => {
  it("walks through the five steps for the Imperial defaults", () => {
    const { input, result } = run(defaultsFor("imperial"));
    const lines = renderReport(input, result).split("\n");
    expect(lines[0]).toBe("## Nominal Moment Strength (ACI 318)");
    expect(lines).toContain("**Unit system:** Imperial (psi, in, lb)");
    expect(lines).toContain("- As = n × A_bar = 4 × 0.790 = 3.160 in²");
    expect(lines).toContain("- T = As × fy = 3.160 × 60000 = 189600 lb (189.6 kips)");
    expect(lines).toContain("### Step 3: Strain Check [OK]");
    expect(lines).toContain("- εs ≥ εy: steel yields, fs = fy = 60000 psi");
    expect(lines).toContain(
      "- Mn = As × fs × (d − a/2) = 3.160 × 60000 × (17.50 − 4.6471/2) = 2877 k-in",
    );
    expect(lines).toContain("- **Mn = 239.8 k-ft**");
    expect(lines).toContain("- φ = 0.900 (εt = 0.006603), φMn = 215.8 k-ft");
    expect(lines).toContain("### Step 5: Minimum Steel Check [OK]");
    expect(lines).toContain(
      "- As,min = max(3√fc'/fy·b·d, 200/fy·b·d) = max(0.6641, 0.7000) = 0.7000 in²",
    );
    expect(lines).toContain("- As = 3.1600 ≥ As,min = 0.7000");
    expect(lines).not.toContain("### Warnings");
  });

  it("ends with a newline", () => {
    const { input, result } = run(defaultsFor("si"));
    expect(renderReport(input, result).endsWith("\n")).toBe(true);
  });

  it("reports elastic steel with [NG]", () => {
    const { input, result } = run({ ...defaultsFor("imperial"), b: 8, bar_area: 1.27 });
    const lines = renderReport(input, result).split("\n");
    expect(lines).toContain("### Step 3: Strain Check [NG]");
    expect(lines).toContain("- εs < εy: steel is elastic, fs = εs × Es = 28486 psi");
    expect(lines).toContain("- φ = 0.650 (εt = 0.000982), φMn = 93.3 k-ft");
  });

  it("reports a section without reinforcement", () => {
    const { input, result } = run({ ...defaultsFor("si"), n_bars: 0 });
    const lines = renderReport(input, result).split("\n");
    expect(lines).toContain("- No tension reinforcement: c = 0, the steel strain is undefined.");
    expect(lines).toContain("- **Mn = 0.0 kN-m**");
    expect(lines).toContain("### Step 5: Minimum Steel Check [NG]");
    expect(lines.some((l) => l.startsWith("- φ ="))).toBe(false);
    expect(lines).toContain("### Warnings");
  });
});
