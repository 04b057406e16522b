/**
 * REPL command interpreter. Each call takes the current state and one input
 * line and returns the next state plus the lines to print; entry.ts owns the
 * terminal.
 */
import fs from "node:fs";
import path from "node:path";
import { compute, type SectionInput } from "../beam/section.js";
import { defaultsFor, switchUnitSystem } from "../beam/defaults.js";
import { parseAssignments, sectionInputFromRecord, NUMERIC_FIELDS } from "../beam/input.js";
import { deriveBeta1 } from "../beam/aci318.js";
import { InvalidGeometryError } from "../beam/errors.js";
import { parseUnitSystem, unitLabels, type UnitLabels } from "../beam/units.js";
import { formatSummary, renderReport } from "../report/report.js";
import { renderSectionSvg } from "../report/diagrams.js";
import type { HistoryStore } from "../history-store.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CliState {
  input: SectionInput;
}

export interface CommandContext {
  store: HistoryStore;
  historyLimit: number;
}

export interface CommandOutcome {
  state: CliState;
  output: string[];
  quit?: boolean;
  error?: boolean;
}

export const HELP_LINES = [
  "key=value ...       set fields (fc_prime, fy, es, beta1, epsilon_cu, b, h, d, n_bars, bar_area, unit_system)",
  "/units imperial|si  switch unit system (resets to defaults)",
  "/show               show current input",
  "/calc               compute and save to history",
  "/report             step-by-step calculation report",
  "/svg <path>         write section diagram as SVG",
  "/beta1              derive beta1 from fc' and set it",
  "/history [n]        list recent calculations",
  "/defaults           reset fields to defaults",
  "/help               this list",
  "/quit               exit",
];

export function initialState(): CliState {
  return { input: defaultsFor("imperial") };
}

// ─── Formatting ──────────────────────────────────────────────────────────────

function fieldUnit(field: string, u: UnitLabels): string {
  switch (field) {
    case "fc_prime":
    case "fy":
    case "es":
      return ` ${u.stress}`;
    case "b":
    case "h":
    case "d":
      return ` ${u.length}`;
    case "bar_area":
      return ` ${u.area}`;
    default:
      return "";
  }
}

export function describeInput(input: SectionInput): string[] {
  const u = unitLabels(input.unit_system);
  return [
    `unit_system = ${input.unit_system}`,
    ...NUMERIC_FIELDS.map((field) => `${field} = ${input[field]}${fieldUnit(field, u)}`),
  ];
}

// ─── Commands ────────────────────────────────────────────────────────────────

function calculate(state: CliState, ctx: CommandContext): CommandOutcome {
  const result = compute(state.input);
  const record = ctx.store.save(state.input, result);
  return {
    state,
    output: [...formatSummary(state.input, result).split("\n"), `Saved as #${record.id}`],
  };
}

function writeSvg(state: CliState, target: string): CommandOutcome {
  if (!target) throw new Error("Usage: /svg <path>");
  const resolvedPath = path.resolve(target);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  fs.writeFileSync(resolvedPath, renderSectionSvg(state.input, compute(state.input)), "utf-8");
  return { state, output: [`Diagram saved to: ${resolvedPath}`] };
}

function listHistory(arg: string, ctx: CommandContext): string[] {
  let limit = ctx.historyLimit;
  if (arg) {
    limit = Number(arg);
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`History count must be a positive integer. Got "${arg}".`);
    }
  }
  const records = ctx.store.list(limit);
  if (records.length === 0) return ["No calculations saved yet."];
  return records.map((r) => {
    const u = unitLabels(r.inputs.unit_system);
    const status = r.results.as_min_ok ? "OK" : "NG";
    return `#${r.id}  ${r.timestamp}  Mn = ${r.results.display.Mn.toFixed(1)} ${u.moment_display}  As = ${r.results.As.toFixed(4)} ${u.area}  As,min ${status}`;
  });
}

function dispatch(state: CliState, line: string, ctx: CommandContext): CommandOutcome {
  const [command = "", ...args] = line.split(/\s+/);
  const arg = args.join(" ");

  if (!command.startsWith("/")) {
    const input = sectionInputFromRecord(parseAssignments([command, ...args]), state.input);
    const changed = NUMERIC_FIELDS.filter((f) => input[f] !== state.input[f]);
    if (input.unit_system !== state.input.unit_system) {
      return { state: { input }, output: [`Unit system: ${input.unit_system}`, ...describeInput(input)] };
    }
    return {
      state: { input },
      output: changed.length > 0 ? changed.map((f) => `${f} = ${input[f]}`) : ["No changes."],
    };
  }

  switch (command) {
    case "/quit":
    case "/exit":
      return { state, output: [], quit: true };
    case "/help":
      return { state, output: HELP_LINES };
    case "/show":
      return { state, output: describeInput(state.input) };
    case "/units": {
      if (!arg) return { state, output: [`Unit system: ${state.input.unit_system}`] };
      const target = parseUnitSystem(arg);
      const input = switchUnitSystem(state.input, target);
      return { state: { input }, output: [`Unit system: ${target} (defaults loaded)`] };
    }
    case "/defaults":
      return { state: { input: defaultsFor(state.input.unit_system) }, output: ["Defaults loaded."] };
    case "/calc":
      return calculate(state, ctx);
    case "/report":
      return { state, output: renderReport(state.input, compute(state.input)).trimEnd().split("\n") };
    case "/svg":
      return writeSvg(state, arg);
    case "/beta1": {
      const beta1 = deriveBeta1(state.input.fc_prime, state.input.unit_system);
      const input = Object.freeze({ ...state.input, beta1 });
      return { state: { input }, output: [`beta1 = ${beta1.toFixed(4)}`] };
    }
    case "/history":
      return { state, output: listHistory(arg, ctx) };
    default:
      return { state, output: [`Unknown command ${command}. Type /help for commands.`], error: true };
  }
}

export function runCommand(state: CliState, line: string, ctx: CommandContext): CommandOutcome {
  const trimmed = line.trim();
  if (!trimmed) return { state, output: [] };

  try {
    return dispatch(state, trimmed, ctx);
  } catch (err) {
    if (err instanceof InvalidGeometryError) {
      return { state, output: ["Error:", ...err.issues.map((i) => `  - ${i.message}`)], error: true };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { state, output: [`Error: ${message}`], error: true };
  }
}
