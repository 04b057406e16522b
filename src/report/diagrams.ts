/**
 * SVG diagrams for a flexure calculation: cross section, strain distribution
 * and stress block with the internal force couple. Pure string output; the
 * caller decides whether to write it to disk or serve it.
 */
import type { SectionInput, SectionResult } from "../beam/section.js";
import { unitLabels } from "../beam/units.js";

const COLORS = {
  concrete: "#E0E0DC",
  outline: "#4D4D4D",
  compression: "#D98C8C",
  compressionLine: "#B33333",
  tension: "#336699",
  steel: "#404050",
  neutral: "#666666",
  strain: "#B3D9F2",
  strainEdge: "#336699",
  momentArm: "#339933",
  ok: "#2ECC71",
  ng: "#E74C3C",
  text: "#333333",
};

const WIDTH = 900;
const HEIGHT = 420;
const PANEL_WIDTH = 260;
const PANEL_TOP = 60;
const DRAW_HEIGHT = 300;
const PANEL_X = [20, 320, 620] as const;
/** Above this count the bars are drawn as evenly spaced markers with a count label */
export const MAX_DRAWN_BARS = 20;

function esc(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function n(value: number): string {
  return (Math.round(value * 100) / 100).toString();
}

interface Frame {
  /** px per native length unit */
  scale: number;
  /** top fiber, px */
  top: number;
  /** depth in native units -> y px */
  y: (depth: number) => number;
}

function sectionFrame(input: SectionInput): Frame {
  const scale = Math.min(170 / input.b, (DRAW_HEIGHT - 20) / Math.max(input.h, input.d));
  const top = PANEL_TOP + 10;
  return { scale, top, y: (depth: number) => top + depth * scale };
}

// ─── Panels ──────────────────────────────────────────────────────────────────

function drawCrossSection(lines: string[], input: SectionInput, result: SectionResult, f: Frame): void {
  const u = unitLabels(input.unit_system);
  const px = PANEL_X[0];
  const w = input.b * f.scale;
  const x0 = px + (PANEL_WIDTH - w) / 2;

  lines.push(`<g data-panel="cross-section">`);
  lines.push(`<text x="${px + PANEL_WIDTH / 2}" y="${PANEL_TOP - 12}" text-anchor="middle" font-weight="bold">Cross Section</text>`);
  lines.push(`<rect x="${n(x0)}" y="${n(f.top)}" width="${n(w)}" height="${n(input.h * f.scale)}" fill="${COLORS.concrete}" stroke="${COLORS.outline}" stroke-width="1.5"/>`);

  if (result.a > 0) {
    const aDraw = Math.min(result.a, input.h) * f.scale;
    lines.push(`<rect x="${n(x0)}" y="${n(f.top)}" width="${n(w)}" height="${n(aDraw)}" fill="${COLORS.compression}" fill-opacity="0.6"/>`);
    lines.push(`<text x="${n(x0 - 6)}" y="${n(f.top + aDraw / 2 + 4)}" text-anchor="end" fill="${COLORS.compressionLine}" font-size="10">a=${result.a.toFixed(2)}</text>`);
  }
  if (result.c > 0) {
    const yNA = f.y(result.c);
    lines.push(`<line x1="${n(x0)}" y1="${n(yNA)}" x2="${n(x0 + w)}" y2="${n(yNA)}" stroke="${COLORS.neutral}" stroke-width="1.2" stroke-dasharray="5,3"/>`);
    lines.push(`<text x="${n(x0 + w + 6)}" y="${n(yNA + 4)}" fill="${COLORS.neutral}" font-size="10">c=${result.c.toFixed(2)}</text>`);
  }

  const ySteel = f.y(input.d);
  const radius = Math.max(2, Math.sqrt(input.bar_area / Math.PI) * f.scale * 0.7);
  const drawn = Math.min(input.n_bars, MAX_DRAWN_BARS);
  for (let i = 0; i < drawn; i++) {
    const frac = drawn === 1 ? 0.5 : 0.12 + (0.76 * i) / (drawn - 1);
    lines.push(`<circle class="bar" cx="${n(x0 + frac * w)}" cy="${n(ySteel)}" r="${n(radius)}" fill="${COLORS.steel}" stroke="#1A1A1A" stroke-width="0.5"/>`);
  }
  if (input.n_bars > MAX_DRAWN_BARS) {
    lines.push(`<text x="${n(x0 + w / 2)}" y="${n(ySteel - radius - 4)}" text-anchor="middle" font-size="10">n = ${input.n_bars}</text>`);
  }

  lines.push(`<text x="${n(x0 + w / 2)}" y="${n(f.y(input.h) + 18)}" text-anchor="middle" font-size="10">b=${input.b} ${u.length}</text>`);
  lines.push(`<text x="${n(x0 + w + 6)}" y="${n(f.top + (input.h * f.scale) / 2)}" font-size="10">h=${input.h}</text>`);
  lines.push(`<text x="${n(x0 + w + 6)}" y="${n(ySteel + 4)}" font-size="10">d=${input.d}</text>`);
  lines.push(`</g>`);
}

function drawStrain(lines: string[], input: SectionInput, result: SectionResult, f: Frame): void {
  const px = PANEL_X[1];
  const base = px + PANEL_WIDTH / 2;
  const ySteel = f.y(input.d);

  lines.push(`<g data-panel="strain">`);
  lines.push(`<text x="${base}" y="${PANEL_TOP - 12}" text-anchor="middle" font-weight="bold">Strain Distribution</text>`);
  lines.push(`<line x1="${base}" y1="${n(f.top)}" x2="${base}" y2="${n(f.y(input.h))}" stroke="#555" stroke-width="1"/>`);

  if (result.epsilon_s === null) {
    lines.push(`<text x="${base}" y="${n(f.top + (input.h * f.scale) / 2)}" text-anchor="middle" fill="${COLORS.ng}">No tension reinforcement</text>`);
    lines.push(`</g>`);
    return;
  }

  // εcu maps to 60 px; the steel strain is clipped to the panel
  const pxPerStrain = 60 / input.epsilon_cu;
  const xTop = input.epsilon_cu * pxPerStrain;
  const xBot = Math.max(-110, Math.min(110, result.epsilon_s * pxPerStrain));
  const yNA = f.y(result.c);

  lines.push(
    `<polygon points="${n(base)},${n(f.top)} ${n(base - xTop)},${n(f.top)} ${n(base)},${n(yNA)} ${n(base + xBot)},${n(ySteel)} ${n(base)},${n(ySteel)}" ` +
      `fill="${COLORS.strain}" fill-opacity="0.5" stroke="${COLORS.strainEdge}" stroke-width="1.2"/>`,
  );
  lines.push(`<line x1="${n(base - 80)}" y1="${n(yNA)}" x2="${n(base + 80)}" y2="${n(yNA)}" stroke="${COLORS.neutral}" stroke-dasharray="5,3"/>`);
  lines.push(`<text x="${n(base - xTop - 4)}" y="${n(f.top - 2)}" text-anchor="end" font-size="10">εcu=${input.epsilon_cu.toFixed(4)}</text>`);
  lines.push(`<text x="${n(base + xBot + 4)}" y="${n(ySteel + 12)}" font-size="10">εs=${result.epsilon_s.toFixed(5)}</text>`);
  lines.push(`<text x="${n(base + 4)}" y="${n(HEIGHT - 30)}" text-anchor="middle" font-size="10" fill="${result.steel_yields ? COLORS.ok : COLORS.ng}">${result.steel_yields ? "εs ≥ εy (yields)" : "εs &lt; εy (elastic)"}</text>`);
  lines.push(`</g>`);
}

function drawStress(lines: string[], input: SectionInput, result: SectionResult, f: Frame): void {
  const u = unitLabels(input.unit_system);
  const px = PANEL_X[2];
  const x0 = px + 40;
  const blockWidth = 60;
  const ySteel = f.y(input.d);
  const force = `${result.display.T.toFixed(1)} ${u.force_k}`;

  lines.push(`<g data-panel="stress">`);
  lines.push(`<text x="${px + PANEL_WIDTH / 2}" y="${PANEL_TOP - 12}" text-anchor="middle" font-weight="bold">Stress Block &amp; Forces</text>`);
  lines.push(`<defs><marker id="arrow" markerWidth="8" markerHeight="8" refX="8" refY="4" orient="auto"><path d="M0,0 L8,4 L0,8" fill="#333"/></marker></defs>`);

  if (result.a > 0) {
    const yC = f.y(Math.min(result.a, input.h) / 2);
    lines.push(`<rect x="${x0}" y="${n(f.top)}" width="${blockWidth}" height="${n(Math.min(result.a, input.h) * f.scale)}" fill="${COLORS.compression}" fill-opacity="0.7" stroke="${COLORS.compressionLine}" stroke-width="1.2"/>`);
    lines.push(`<text x="${x0 + blockWidth / 2}" y="${n(f.top - 2)}" text-anchor="middle" font-size="10">0.85fc'</text>`);
    lines.push(`<line x1="${x0 + blockWidth + 50}" y1="${n(yC)}" x2="${x0 + blockWidth + 5}" y2="${n(yC)}" stroke="${COLORS.compressionLine}" stroke-width="2" marker-end="url(#arrow)"/>`);
    lines.push(`<text x="${x0 + blockWidth + 54}" y="${n(yC + 4)}" fill="${COLORS.compressionLine}" font-size="10">C=${esc(force)}</text>`);

    const xa = x0 + blockWidth + 25;
    lines.push(`<line x1="${xa}" y1="${n(yC)}" x2="${xa}" y2="${n(ySteel)}" stroke="${COLORS.momentArm}" stroke-width="1.5"/>`);
    lines.push(`<text x="${xa + 4}" y="${n((yC + ySteel) / 2)}" fill="${COLORS.momentArm}" font-size="10">d−a/2=${(input.d - result.a / 2).toFixed(2)}</text>`);
  }

  lines.push(`<line x1="${x0}" y1="${n(ySteel)}" x2="${x0 + 50}" y2="${n(ySteel)}" stroke="${COLORS.tension}" stroke-width="2" marker-end="url(#arrow)"/>`);
  lines.push(`<text x="${x0 + 54}" y="${n(ySteel + 14)}" fill="${COLORS.tension}" font-size="10">T=${esc(force)}</text>`);
  lines.push(`</g>`);
}

// ─── Main ────────────────────────────────────────────────────────────────────

export function renderSectionSvg(input: SectionInput, result: SectionResult): string {
  const u = unitLabels(input.unit_system);
  const frame = sectionFrame(input);
  const lines: string[] = [];

  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${HEIGHT}" width="${WIDTH}" height="${HEIGHT}" font-family="Arial, sans-serif" font-size="12" fill="${COLORS.text}">`);
  lines.push(`<rect width="${WIDTH}" height="${HEIGHT}" fill="#fafafa" rx="4"/>`);
  lines.push(
    `<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14" font-weight="bold">` +
      `Mn = ${result.display.Mn.toFixed(1)} ${u.moment_display} | As = ${result.As.toFixed(3)} ${u.area} | ` +
      `<tspan fill="${result.as_min_ok ? COLORS.ok : COLORS.ng}">As,min ${result.as_min_ok ? "OK" : "NG"}</tspan></text>`,
  );

  drawCrossSection(lines, input, result, frame);
  drawStrain(lines, input, result, frame);
  drawStress(lines, input, result, frame);

  lines.push(`</svg>`);
  return lines.join("\n");
}
