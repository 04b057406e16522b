/**
 * Flexural strength of a singly reinforced rectangular concrete section.
 *
 * Whitney rectangular stress block per ACI 318. The stress-block depth `a` is
 * computed once with the steel at yield and is not re-solved when strain
 * compatibility later gives an elastic steel stress; the moment uses the
 * strain-gated stress `fs` with that same `a`.
 *
 * `compute` is pure: no I/O, no shared state, same input -> same result.
 */
import {
  minimumSteelArea,
  strengthReductionFactor,
  type MinimumSteel,
} from "./aci318.js";
import { InvalidGeometryError, type InputIssue } from "./errors.js";
import { displayScales, type UnitSystem } from "./units.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SectionInput {
  readonly fc_prime: number; // psi | MPa
  readonly fy: number; // psi | MPa
  readonly es: number; // psi | MPa
  readonly beta1: number;
  readonly epsilon_cu: number;
  readonly b: number; // in | mm
  readonly h: number; // in | mm
  readonly d: number; // in | mm
  readonly n_bars: number;
  readonly bar_area: number; // in² | mm²
  readonly unit_system: UnitSystem;
}

export type StrainState = "yielded" | "elastic" | "degenerate";

export type Classification = "under-reinforced" | "balanced" | "over-reinforced";

export interface DisplayValues {
  /** kips | kN */
  readonly T: number;
  /** k-in | N-mm */
  readonly Mn_k: number;
  /** k-ft | kN-m */
  readonly Mn: number;
  /** k-ft | kN-m */
  readonly phi_Mn: number;
}

export interface SectionResult {
  readonly unit_system: UnitSystem;
  readonly As: number;
  readonly T: number;
  readonly a: number;
  readonly c: number;
  readonly epsilon_y: number;
  readonly epsilon_s: number | null;
  readonly steel_yields: boolean | null;
  readonly strain_state: StrainState;
  readonly fs: number;
  readonly Mn: number;
  readonly epsilon_t: number | null;
  readonly phi: number | null;
  readonly phi_Mn: number;
  readonly rho: number;
  readonly rho_b: number;
  readonly classification: Classification;
  readonly As_min: number;
  readonly As_min_terms: Readonly<Omit<MinimumSteel, "As_min">>;
  readonly as_min_ok: boolean;
  readonly display: DisplayValues;
  readonly warnings: readonly string[];
}

// ─── Validation ──────────────────────────────────────────────────────────────

const POSITIVE_FIELDS = ["fc_prime", "fy", "es", "beta1", "epsilon_cu", "b", "h", "d"] as const;

export function validateSectionInput(input: SectionInput): InputIssue[] {
  const issues: InputIssue[] = [];

  for (const field of POSITIVE_FIELDS) {
    const value = input[field];
    if (!Number.isFinite(value) || value <= 0) {
      issues.push({ field, value, message: `${field} must be a positive number. Got ${value}.` });
    }
  }

  // Zero reinforcement is allowed: it yields the degenerate strain state.
  if (!Number.isFinite(input.n_bars) || input.n_bars < 0 || !Number.isInteger(input.n_bars)) {
    issues.push({
      field: "n_bars",
      value: input.n_bars,
      message: `n_bars must be a non-negative integer. Got ${input.n_bars}.`,
    });
  }
  if (!Number.isFinite(input.bar_area) || input.bar_area < 0) {
    issues.push({
      field: "bar_area",
      value: input.bar_area,
      message: `bar_area must be a non-negative number. Got ${input.bar_area}.`,
    });
  }

  return issues;
}

function collectWarnings(input: SectionInput, c: number, degenerate: boolean): string[] {
  const warnings: string[] = [];
  if (input.d >= input.h) {
    warnings.push(
      `Effective depth d = ${input.d} is not less than total depth h = ${input.h}; ` +
        "the tension steel lies outside the section.",
    );
  }
  if (input.beta1 < 0.65 || input.beta1 > 0.85) {
    warnings.push(`beta1 = ${input.beta1} is outside the ACI 318 range 0.65 - 0.85.`);
  }
  if (degenerate) {
    warnings.push("No tension reinforcement (As = 0); strain state is undefined and Mn = 0.");
  } else if (c >= input.d) {
    warnings.push(
      `Neutral axis depth c = ${c.toFixed(4)} is at or below the steel (d = ${input.d}); ` +
        "the steel is not in tension.",
    );
  }
  return warnings;
}

// ─── Engine ──────────────────────────────────────────────────────────────────

export function compute(input: SectionInput): SectionResult {
  const issues = validateSectionInput(input);
  if (issues.length > 0) {
    throw new InvalidGeometryError(issues);
  }

  const { fc_prime, fy, es, beta1, epsilon_cu, b, d, unit_system } = input;

  const As = input.n_bars * input.bar_area;
  const T = As * fy;
  const a = (As * fy) / (0.85 * fc_prime * b);
  const c = a / beta1;
  const epsilon_y = fy / es;

  const minSteel = minimumSteelArea(fc_prime, fy, b, d, unit_system);
  const rho = As / (b * d);
  const rho_b = ((0.85 * beta1 * fc_prime) / fy) * (epsilon_cu / (epsilon_cu + epsilon_y));
  const degenerate = c === 0;

  let epsilon_s: number | null = null;
  let steel_yields: boolean | null = null;
  let strain_state: StrainState = "degenerate";
  let fs = 0;
  let Mn = 0;
  let epsilon_t: number | null = null;
  let phi: number | null = null;

  if (!degenerate) {
    epsilon_s = (epsilon_cu * (d - c)) / c;
    steel_yields = epsilon_s >= epsilon_y;
    strain_state = steel_yields ? "yielded" : "elastic";
    fs = steel_yields ? fy : epsilon_s * es;
    Mn = As * fs * (d - a / 2);
    epsilon_t = epsilon_s;
    phi = strengthReductionFactor(epsilon_t);
  }

  const phi_Mn = phi === null ? 0 : phi * Mn;
  const scales = displayScales(unit_system);

  return Object.freeze({
    unit_system,
    As,
    T,
    a,
    c,
    epsilon_y,
    epsilon_s,
    steel_yields,
    strain_state,
    fs,
    Mn,
    epsilon_t,
    phi,
    phi_Mn,
    rho,
    rho_b,
    classification: classify(rho, rho_b),
    As_min: minSteel.As_min,
    As_min_terms: Object.freeze({ sqrt_fc: minSteel.sqrt_fc, fy_term: minSteel.fy_term, governs: minSteel.governs }),
    as_min_ok: As >= minSteel.As_min,
    display: Object.freeze({
      T: T / scales.force,
      Mn_k: Mn / scales.moment_k,
      Mn: Mn / scales.moment_display,
      phi_Mn: phi_Mn / scales.moment_display,
    }),
    warnings: Object.freeze(collectWarnings(input, c, degenerate)),
  });
}

function classify(rho: number, rho_b: number): Classification {
  if (Math.abs(rho - rho_b) <= 1e-9 * rho_b) return "balanced";
  return rho < rho_b ? "under-reinforced" : "over-reinforced";
}

export function isDegenerate(result: SectionResult): boolean {
  return result.strain_state === "degenerate";
}
