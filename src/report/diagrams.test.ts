import { describe, expect, it } from "vitest";
import { MAX_DRAWN_BARS, renderSectionSvg } from "./diagrams.js";
import { compute, type SectionInput } from "../beam/section.js";
import { defaultsFor } from "../beam/defaults.js";

function svgFor(input: SectionInput): string {
  return renderSectionSvg(input, compute(input));
}

describe("renderSectionSvg", () => {
  it("draws the three panels", () => {
    const svg = svgFor(defaultsFor("imperial"));
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 900 420"')).toBe(true);
    expect(svg.endsWith("</svg>")).toBe(true);
    expect(svg).toContain('<g data-panel="cross-section">');
    expect(svg).toContain('<g data-panel="strain">');
    expect(svg).toContain('<g data-panel="stress">');
  });

  it("draws one circle per bar", () => {
    const svg = svgFor({ ...defaultsFor("si"), n_bars: 5 });
    expect(svg.match(/<circle class="bar"/g)).toHaveLength(5);
  });

  it("bounds the drawing for very large bar counts", () => {
    const svg = svgFor({ ...defaultsFor("imperial"), n_bars: 2_000_000, bar_area: 1e-6 });
    expect(svg.match(/<circle class="bar"/g)).toHaveLength(MAX_DRAWN_BARS);
    expect(svg).toContain(">n = 2000000</text>");
    expect(svg.length).toBeLessThan(20_000);
  });

  it("omits the count label when every bar is drawn", () => {
    const svg = svgFor({ ...defaultsFor("imperial"), n_bars: MAX_DRAWN_BARS });
    expect(svg.match(/<circle class="bar"/g)).toHaveLength(MAX_DRAWN_BARS);
    expect(svg).not.toContain(">n = ");
  });

  it("titles the diagram with Mn, As and the minimum steel status", () => {
    const svg = svgFor(defaultsFor("imperial"));
    expect(svg).toContain("Mn = 239.8 k-ft | As = 3.160 in² | ");
    expect(svg).toContain(">As,min OK</tspan>");
  });

  it("labels the strain state", () => {
    expect(svgFor(defaultsFor("imperial"))).toContain("εs=0.00660</text>");
    expect(svgFor({ ...defaultsFor("imperial"), b: 8, bar_area: 1.27 })).toContain("εs &lt; εy (elastic)");
  });

  it("replaces the strain profile with a note when there is no reinforcement", () => {
    const svg = svgFor({ ...defaultsFor("imperial"), n_bars: 0 });
    expect(svg).toContain(">No tension reinforcement</text>");
    expect(svg).not.toContain("<polygon");
    expect(svg).not.toContain('<circle class="bar"');
    expect(svg).toContain(">As,min NG</tspan>");
  });

  it("labels the force couple", () => {
    const svg = svgFor(defaultsFor("si"));
    expect(svg).toContain(">T=642.6 kN</text>");
    expect(svg).toContain(">C=642.6 kN</text>");
  });
});
