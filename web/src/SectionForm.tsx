import { unitLabels } from "../../src/beam/units.js";
import type { NumericField } from "../../src/beam/input.js";
import { FIELD_SPECS, type FieldSpec, type FormValues } from "./form.js";
import type { UnitSystem } from "./api.js";

interface Props {
  values: FormValues;
  onFieldChange: (field: NumericField, value: string) => void;
  onUnitChange: (unit: UnitSystem) => void;
}

const GROUPS: FieldSpec["group"][] = ["Materials", "Geometry", "Reinforcement"];

export default function SectionForm({ values, onFieldChange, onUnitChange }: Props) {
  const u = unitLabels(values.unit_system);

  return (
    <form className="space-y-4" onSubmit={(e) => e.preventDefault()}>
      {/* Unit toggle: switching reloads that system's defaults */}
      <div className="flex gap-1 rounded-lg bg-gray-100 p-1 text-xs">
        {(["imperial", "si"] as const).map((unit) => (
          <button
            key={unit}
            type="button"
            onClick={() => onUnitChange(unit)}
            className={`flex-1 rounded-md px-3 py-1 transition-colors ${
              values.unit_system === unit ? "bg-white text-gray-900 shadow-sm" : "text-gray-500 hover:text-gray-900"
            }`}
          >
            {unit === "imperial" ? "Imperial" : "SI"}
          </button>
        ))}
      </div>

      {GROUPS.map((group) => (
        <fieldset key={group} className="space-y-2">
          <legend className="text-xs font-semibold uppercase tracking-wide text-gray-400">{group}</legend>
          {FIELD_SPECS.filter((f) => f.group === group).map((spec) => (
            <label key={spec.name} className="flex items-center gap-2 text-sm">
              <span className="w-32 text-gray-700">{spec.label}</span>
              <input
                type="number"
                step={spec.step}
                value={values[spec.name]}
                onChange={(e) => onFieldChange(spec.name, e.target.value)}
                className="flex-1 rounded-lg border border-gray-300 px-2 py-1 font-mono text-sm focus:outline-none focus:ring-2 focus:ring-blue-500"
              />
              <span className="w-12 text-xs text-gray-400">{spec.unit(u)}</span>
            </label>
          ))}
        </fieldset>
      ))}
    </form>
  );
}
