/**
 * Unit systems for the flexure engine.
 *
 * Each system is self-consistent in its own native units (psi / in / lb or
 * MPa / mm / N). Nothing here converts a value from one system to the other;
 * the display scales only re-express a native quantity in a larger unit of the
 * same system (lb -> kips, lb-in -> k-ft, N-mm -> kN-m).
 */

export type UnitSystem = "imperial" | "si";

export const UNIT_SYSTEMS: readonly UnitSystem[] = ["imperial", "si"];

export interface UnitLabels {
  length: string;
  area: string;
  force: string;
  force_k: string;
  stress: string;
  moment: string;
  moment_k: string;
  moment_display: string;
}

export interface DisplayScales {
  /** native force -> kips / kN */
  force: number;
  /** native moment -> k-in (Imperial) or N-mm (SI) */
  moment_k: number;
  /** native moment -> k-ft / kN-m */
  moment_display: number;
}

const LABELS: Record<UnitSystem, UnitLabels> = {
  imperial: {
    length: "in",
    area: "in²",
    force: "lb",
    force_k: "kips",
    stress: "psi",
    moment: "lb-in",
    moment_k: "k-in",
    moment_display: "k-ft",
  },
  si: {
    length: "mm",
    area: "mm²",
    force: "N",
    force_k: "kN",
    stress: "MPa",
    moment: "N-mm",
    moment_k: "N-mm",
    moment_display: "kN-m",
  },
};

const SCALES: Record<UnitSystem, DisplayScales> = {
  imperial: { force: 1000, moment_k: 1000, moment_display: 12000 },
  si: { force: 1000, moment_k: 1, moment_display: 1e6 },
};

export function unitLabels(unit: UnitSystem): UnitLabels {
  return LABELS[unit];
}

export function displayScales(unit: UnitSystem): DisplayScales {
  return SCALES[unit];
}

export function isUnitSystem(value: unknown): value is UnitSystem {
  return value === "imperial" || value === "si";
}

/** Accepts "Imperial", "SI", "si", ... as typed by a user or sent by a form. */
export function parseUnitSystem(raw: unknown): UnitSystem {
  const value = String(raw ?? "").trim().toLowerCase();
  if (isUnitSystem(value)) return value;
  throw new Error(`unit_system must be one of: ${UNIT_SYSTEMS.join(", ")}. Got "${String(raw)}".`);
}
