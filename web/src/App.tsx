import { useState, useEffect, useCallback } from "react";
import SectionForm from "./SectionForm.js";
import ResultsPanel from "./ResultsPanel.js";
import ReportView from "./ReportView.js";
import HistoryPanel from "./HistoryPanel.js";
import { formFromInput, formToFields, setField, type FormValues } from "./form.js";
import {
  ApiError,
  calculate,
  deleteHistory,
  getDefaults,
  getDiagram,
  getReport,
  listHistory,
  type HistoryRecord,
  type InputIssue,
  type SectionResult,
  type UnitSystem,
} from "./api.js";
import type { NumericField } from "../../src/beam/input.js";

const HISTORY_LIMIT = 10;
const RECALC_DELAY_MS = 250;

interface Outcome {
  result: SectionResult;
  markdown: string;
  svg: string;
}

export default function App() {
  const [values, setValues] = useState<FormValues | null>(null);
  const [outcome, setOutcome] = useState<Outcome | null>(null);
  const [issues, setIssues] = useState<InputIssue[]>([]);
  const [error, setError] = useState("");
  const [history, setHistory] = useState<HistoryRecord[]>([]);

  const refreshHistory = useCallback(() => {
    listHistory(HISTORY_LIMIT)
      .then(setHistory)
      .catch((err: unknown) => setError(err instanceof Error ? err.message : String(err)));
  }, []);

  const loadDefaults = useCallback((unit: UnitSystem) => {
    getDefaults(unit)
      .then((input) => setValues(formFromInput(input)))
      .catch((err: unknown) => setError(err instanceof Error ? err.message : String(err)));
  }, []);

  useEffect(() => {
    loadDefaults("imperial");
    refreshHistory();
  }, [loadDefaults, refreshHistory]);

  // Live recalculation
  useEffect(() => {
    if (!values) return;
    let cancelled = false;
    const fields = formToFields(values);

    const timer = setTimeout(() => {
      Promise.all([calculate(fields), getReport(fields), getDiagram(fields)])
        .then(([calc, report, svg]) => {
          if (cancelled) return;
          setOutcome({ result: calc.result, markdown: report.markdown, svg });
          setIssues([]);
          setError("");
        })
        .catch((err: unknown) => {
          if (cancelled) return;
          setOutcome(null);
          if (err instanceof ApiError && err.issues.length > 0) {
            setIssues(err.issues);
            setError("");
          } else {
            setIssues([]);
            setError(err instanceof Error ? err.message : String(err));
          }
        });
    }, RECALC_DELAY_MS);

    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, [values]);

  const handleFieldChange = (field: NumericField, value: string) => {
    setValues((prev) => (prev ? setField(prev, field, value) : prev));
  };

  const handleSave = async () => {
    if (!values) return;
    try {
      await calculate(formToFields(values), true);
      refreshHistory();
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  };

  const handleDelete = async (id: number) => {
    try {
      await deleteHistory(id);
      refreshHistory();
    } catch (err) {
      setError(err instanceof Error ? err.message : String(err));
    }
  };

  return (
    <div className="h-screen flex flex-col bg-white">
      {/* Header */}
      <header className="flex items-center justify-between px-4 py-2 border-b border-gray-200 bg-white">
        <div className="flex items-center gap-3">
          <h1 className="text-sm font-semibold text-gray-900">rc-flexure</h1>
          <span className="text-xs text-gray-400 font-mono">ACI 318 Whitney stress block</span>
        </div>
        <button
          onClick={handleSave}
          disabled={!outcome}
          className="text-xs text-gray-500 hover:text-gray-900 px-3 py-1 rounded-lg hover:bg-gray-100 disabled:opacity-40 transition-colors"
        >
          Save calculation
        </button>
      </header>

      <main className="flex-1 overflow-hidden grid grid-cols-[20rem_1fr_18rem]">
        <aside className="overflow-y-auto border-r border-gray-200 p-4">
          {values && (
            <SectionForm values={values} onFieldChange={handleFieldChange} onUnitChange={loadDefaults} />
          )}
        </aside>

        <section className="overflow-y-auto p-4 space-y-6">
          {error && <p className="text-sm text-red-600">{error}</p>}
          {issues.length > 0 && (
            <ul className="rounded-lg bg-red-50 px-4 py-3 text-sm text-red-700 space-y-1">
              {issues.map((issue) => (
                <li key={`${issue.field}-${issue.message}`}>{issue.message}</li>
              ))}
            </ul>
          )}
          {outcome && (
            <>
              <img
                src={`data:image/svg+xml;charset=utf-8,${encodeURIComponent(outcome.svg)}`}
                alt="Cross section, strain and stress diagrams"
                className="w-full max-w-4xl"
              />
              <ReportView markdown={outcome.markdown} />
            </>
          )}
        </section>

        <aside className="overflow-y-auto border-l border-gray-200 p-4 space-y-6">
          {outcome && <ResultsPanel result={outcome.result} />}
          <div className="space-y-2">
            <h2 className="text-sm font-semibold text-gray-900">History</h2>
            <HistoryPanel
              records={history}
              onLoad={(record) => setValues(formFromInput(record.inputs))}
              onDelete={handleDelete}
            />
          </div>
        </aside>
      </main>
    </div>
  );
}
