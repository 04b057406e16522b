/**
 * Form state for the section editor. Field values are kept as the strings the
 * user typed; the server parses and validates them.
 */
import { NUMERIC_FIELDS, type NumericField } from "../../src/beam/input.js";
import { unitLabels, type UnitLabels } from "../../src/beam/units.js";
import type { SectionInput, SectionResult, UnitSystem } from "./api.js";

export type FormValues = Record<NumericField, string> & { unit_system: UnitSystem };

export interface FieldSpec {
  name: NumericField;
  label: string;
  group: "Materials" | "Geometry" | "Reinforcement";
  unit: (u: UnitLabels) => string;
  step: string;
}

const none = () => "";

export const FIELD_SPECS: readonly FieldSpec[] = [
  { name: "fc_prime", label: "f'c", group: "Materials", unit: (u) => u.stress, step: "any" },
  { name: "fy", label: "fy", group: "Materials", unit: (u) => u.stress, step: "any" },
  { name: "es", label: "Es", group: "Materials", unit: (u) => u.stress, step: "any" },
  { name: "beta1", label: "β1", group: "Materials", unit: none, step: "0.01" },
  { name: "epsilon_cu", label: "εcu", group: "Materials", unit: none, step: "0.0001" },
  { name: "b", label: "b", group: "Geometry", unit: (u) => u.length, step: "any" },
  { name: "h", label: "h", group: "Geometry", unit: (u) => u.length, step: "any" },
  { name: "d", label: "d", group: "Geometry", unit: (u) => u.length, step: "any" },
  { name: "n_bars", label: "Number of bars", group: "Reinforcement", unit: none, step: "1" },
  { name: "bar_area", label: "Bar area", group: "Reinforcement", unit: (u) => u.area, step: "any" },
];

export function formFromInput(input: SectionInput): FormValues {
  return {
    unit_system: input.unit_system,
    fc_prime: String(input.fc_prime),
    fy: String(input.fy),
    es: String(input.es),
    beta1: String(input.beta1),
    epsilon_cu: String(input.epsilon_cu),
    b: String(input.b),
    h: String(input.h),
    d: String(input.d),
    n_bars: String(input.n_bars),
    bar_area: String(input.bar_area),
  };
}

/** Request body for the calculation endpoints */
export function formToFields(values: FormValues): Record<string, string> {
  const fields: Record<string, string> = { unit_system: values.unit_system };
  for (const field of NUMERIC_FIELDS) fields[field] = values[field].trim();
  return fields;
}

export function setField(values: FormValues, field: NumericField, value: string): FormValues {
  return { ...values, [field]: value };
}

// ─── Result rows ──────────────────────────────────────────────────────────

export interface ResultRow {
  label: string;
  value: string;
}

export function resultRows(result: SectionResult): ResultRow[] {
  const u = unitLabels(result.unit_system);
  const strain = result.epsilon_s === null ? "undefined" : result.epsilon_s.toFixed(6);
  const yieldText =
    result.steel_yields === null ? "n/a" : result.steel_yields ? "Yes (Yields)" : "No (Elastic)";

  return [
    { label: "As", value: `${result.As.toFixed(4)} ${u.area}` },
    { label: "T = C", value: `${result.display.T.toFixed(2)} ${u.force_k}` },
    { label: "a", value: `${result.a.toFixed(4)} ${u.length}` },
    { label: "c", value: `${result.c.toFixed(4)} ${u.length}` },
    { label: "εy", value: result.epsilon_y.toFixed(6) },
    { label: "εs", value: strain },
    { label: "Steel yields", value: yieldText },
    { label: "Mn", value: `${result.display.Mn.toFixed(2)} ${u.moment_display}` },
    { label: "φMn", value: `${result.display.phi_Mn.toFixed(2)} ${u.moment_display}` },
    { label: "As,min", value: `${result.As_min.toFixed(4)} ${u.area}` },
  ];
}
