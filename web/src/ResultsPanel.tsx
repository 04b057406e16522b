import { resultRows } from "./form.js";
import type { SectionResult } from "./api.js";

export default function ResultsPanel({ result }: { result: SectionResult }) {
  return (
    <div className="space-y-3">
      <div className="flex items-center justify-between">
        <h2 className="text-sm font-semibold text-gray-900">Results</h2>
        <span
          className={`rounded-full px-2 py-0.5 text-xs font-medium ${
            result.as_min_ok ? "bg-green-100 text-green-700" : "bg-red-100 text-red-700"
          }`}
        >
          As,min {result.as_min_ok ? "OK" : "NG"}
        </span>
      </div>

      <dl className="grid grid-cols-2 gap-x-4 gap-y-1 text-sm">
        {resultRows(result).map((row) => (
          <div key={row.label} className="contents">
            <dt className="text-gray-500">{row.label}</dt>
            <dd className="font-mono text-gray-900">{row.value}</dd>
          </div>
        ))}
      </dl>

      {result.warnings.length > 0 && (
        <ul className="space-y-1 text-xs text-amber-700">
          {result.warnings.map((w) => (
            <li key={w}>{w}</li>
          ))}
        </ul>
      )}
    </div>
  );
}
