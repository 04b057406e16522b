/**
 * Translation from loose records (JSON bodies, CLI key=value pairs, form
 * fields holding strings) to an immutable SectionInput.
 */
import { defaultsFor } from "./defaults.js";
import { InvalidGeometryError, type InputIssue } from "./errors.js";
import type { SectionInput } from "./section.js";
import { parseUnitSystem, type UnitSystem } from "./units.js";

export type NumericField = Exclude<keyof SectionInput, "unit_system">;

export const NUMERIC_FIELDS: readonly NumericField[] = [
  "fc_prime",
  "fy",
  "es",
  "beta1",
  "epsilon_cu",
  "b",
  "h",
  "d",
  "n_bars",
  "bar_area",
];

const ALIASES = new Map<string, keyof SectionInput>([
  ["fc", "fc_prime"],
  ["fc'", "fc_prime"],
  ["Es", "es"],
  ["units", "unit_system"],
]);

export function resolveFieldName(key: string): keyof SectionInput | undefined {
  const alias = ALIASES.get(key);
  if (alias) return alias;
  if (key === "unit_system") return key;
  return NUMERIC_FIELDS.find((f) => f === key);
}

function parseNumber(raw: unknown): number {
  if (typeof raw === "number") return raw;
  if (typeof raw === "string" && raw.trim() !== "") return Number(raw.trim());
  return Number.NaN;
}

/**
 * Build a SectionInput from `raw`. Fields missing from `raw` are taken from
 * `base` when its unit system matches, otherwise from the defaults of the
 * requested unit system. Unknown keys are ignored.
 */
export function sectionInputFromRecord(
  raw: Record<string, unknown>,
  base?: SectionInput,
): SectionInput {
  const normalized: Partial<Record<keyof SectionInput, unknown>> = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = resolveFieldName(key);
    if (field && value !== undefined && value !== null) normalized[field] = value;
  }

  let unit: UnitSystem;
  try {
    unit = parseUnitSystem(normalized.unit_system ?? base?.unit_system ?? "imperial");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InvalidGeometryError([{ field: "unit_system", value: normalized.unit_system, message }]);
  }

  const fallback = base && base.unit_system === unit ? base : defaultsFor(unit);
  const values: Record<NumericField, number> = { ...fallback };
  const issues: InputIssue[] = [];

  for (const field of NUMERIC_FIELDS) {
    const value = normalized[field];
    if (value === undefined) continue;
    const parsed = parseNumber(value);
    if (Number.isNaN(parsed)) {
      issues.push({ field, value, message: `${field} must be a number. Got "${String(value)}".` });
      continue;
    }
    values[field] = parsed;
  }

  if (issues.length > 0) {
    throw new InvalidGeometryError(issues);
  }

  return Object.freeze({ ...values, unit_system: unit });
}

/** Parse CLI-style `key=value` tokens into a record. */
export function parseAssignments(tokens: string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const token of tokens) {
    const eqIdx = token.indexOf("=");
    if (eqIdx <= 0) {
      throw new Error(`Expected key=value, got "${token}".`);
    }
    record[token.slice(0, eqIdx).trim()] = token.slice(eqIdx + 1).trim();
  }
  return record;
}
