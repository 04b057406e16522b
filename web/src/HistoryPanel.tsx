import { unitLabels } from "../../src/beam/units.js";
import type { HistoryRecord } from "./api.js";

interface Props {
  records: HistoryRecord[];
  onLoad: (record: HistoryRecord) => void;
  onDelete: (id: number) => void;
}

export default function HistoryPanel({ records, onLoad, onDelete }: Props) {
  if (records.length === 0) {
    return <p className="text-xs text-gray-400">No saved calculations.</p>;
  }

  return (
    <ul className="divide-y divide-gray-100 text-sm">
      {records.map((r) => {
        const u = unitLabels(r.inputs.unit_system);
        return (
          <li key={r.id} className="flex items-center gap-2 py-1.5">
            <button
              type="button"
              onClick={() => onLoad(r)}
              className="flex-1 text-left hover:text-blue-600"
              title={r.timestamp}
            >
              <span className="text-gray-400">#{r.id}</span>{" "}
              <span className="font-mono">
                Mn = {r.results.display.Mn.toFixed(1)} {u.moment_display}
              </span>
            </button>
            <button
              type="button"
              onClick={() => onDelete(r.id)}
              className="text-xs text-gray-400 hover:text-red-600"
            >
              Delete
            </button>
          </li>
        );
      })}
    </ul>
  );
}
