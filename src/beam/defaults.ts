/**
 * Default parameter sets, one per unit system.
 *
 * Imperial: ACI Example 4-1 (4 No. 8 bars). SI: Example 4-1M (3 bars of 510 mm²).
 */
import type { SectionInput } from "./section.js";
import type { UnitSystem } from "./units.js";

const DEFAULTS: Record<UnitSystem, SectionInput> = {
  imperial: Object.freeze({
    fc_prime: 4000,
    fy: 60000,
    es: 29_000_000,
    beta1: 0.85,
    epsilon_cu: 0.003,
    b: 12,
    h: 20,
    d: 17.5,
    n_bars: 4,
    bar_area: 0.79,
    unit_system: "imperial",
  }),
  si: Object.freeze({
    fc_prime: 20,
    fy: 420,
    es: 200_000,
    beta1: 0.85,
    epsilon_cu: 0.003,
    b: 250,
    h: 565,
    d: 500,
    n_bars: 3,
    bar_area: 510,
    unit_system: "si",
  }),
};

export function defaultsFor(unit: UnitSystem): SectionInput {
  return DEFAULTS[unit];
}

/**
 * Changing the unit system resets every field to the target system's
 * defaults. Current values are never converted.
 */
export function switchUnitSystem(current: SectionInput, target: UnitSystem): SectionInput {
  if (current.unit_system === target) return current;
  return defaultsFor(target);
}
