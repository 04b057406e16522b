/**
 * ACI 318 provisions used by the flexure engine: minimum tension steel,
 * the stress-block factor beta1 and the strength-reduction factor phi.
 */
import type { UnitSystem } from "./units.js";

// ─── Minimum reinforcement ──────────────────────────────────────────────────

export interface MinimumSteel {
  As_min: number;
  /** 3√fc'/fy·b·d (Imperial) or 0.25√fc'/fy·b·d (SI) */
  sqrt_fc: number;
  /** 200/fy·b·d (Imperial) or 1.4/fy·b·d (SI) */
  fy_term: number;
  governs: "sqrt_fc" | "fy";
}

const AS_MIN_CONSTANTS: Record<UnitSystem, { sqrt_fc: number; fy_term: number }> = {
  imperial: { sqrt_fc: 3, fy_term: 200 },
  si: { sqrt_fc: 0.25, fy_term: 1.4 },
};

export function minimumSteelArea(
  fc_prime: number,
  fy: number,
  b: number,
  d: number,
  unit: UnitSystem,
): MinimumSteel {
  const k = AS_MIN_CONSTANTS[unit];
  const sqrt_fc = ((k.sqrt_fc * Math.sqrt(fc_prime)) / fy) * b * d;
  const fy_term = (k.fy_term / fy) * b * d;
  return {
    As_min: Math.max(sqrt_fc, fy_term),
    sqrt_fc,
    fy_term,
    governs: sqrt_fc > fy_term ? "sqrt_fc" : "fy",
  };
}

// ─── Stress block factor ────────────────────────────────────────────────────

/**
 * beta1 as a function of fc'. The engine takes beta1 as an input; this is the
 * value a caller would normally supply.
 */
export function deriveBeta1(fc_prime: number, unit: UnitSystem): number {
  if (unit === "imperial") {
    if (fc_prime <= 4000) return 0.85;
    if (fc_prime >= 8000) return 0.65;
    return 0.85 - (0.05 * (fc_prime - 4000)) / 1000;
  }
  if (fc_prime <= 28) return 0.85;
  if (fc_prime >= 55) return 0.65;
  return 0.85 - (0.05 * (fc_prime - 28)) / 7;
}

// ─── Strength reduction ─────────────────────────────────────────────────────

export const TENSION_CONTROLLED_STRAIN = 0.005;
export const COMPRESSION_CONTROLLED_STRAIN = 0.002;

/** phi for flexure from the net tensile strain (tied members below the transition). */
export function strengthReductionFactor(epsilon_t: number): number {
  if (epsilon_t >= TENSION_CONTROLLED_STRAIN) return 0.9;
  if (epsilon_t <= COMPRESSION_CONTROLLED_STRAIN) return 0.65;
  return 0.65 + (0.25 * (epsilon_t - COMPRESSION_CONTROLLED_STRAIN)) / 0.003;
}
