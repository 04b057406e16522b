#!/usr/bin/env node
/**
 * rc-flexure: flexural strength of singly reinforced concrete beams.
 *
 * With arguments, computes once and exits:
 *   rc-flexure fc_prime=5000 b=14 n_bars=3 [--json]
 * Without arguments, starts the interactive REPL.
 */
import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { ensureDirs, dim, red, bold, HISTORY_LIMIT, APP_NAME, APP_VERSION } from "./shared.js";
import { createHistoryStore } from "./history-store.js";
import { compute } from "./beam/section.js";
import { parseAssignments, sectionInputFromRecord } from "./beam/input.js";
import { InvalidGeometryError } from "./beam/errors.js";
import { formatSummary } from "./report/report.js";
import { describeInput, initialState, runCommand, type CommandContext } from "./cli/commands.js";

// ─── One-shot ────────────────────────────────────────────────────────────────

function runOnce(argv: string[]): number {
  const asJson = argv.includes("--json");
  const tokens = argv.filter((a) => a !== "--json");

  try {
    const input = sectionInputFromRecord(parseAssignments(tokens));
    const result = compute(input);
    console.log(asJson ? JSON.stringify({ input, result }, null, 2) : formatSummary(input, result));
    return 0;
  } catch (err) {
    if (err instanceof InvalidGeometryError) {
      for (const issue of err.issues) console.error(red(`Error: ${issue.message}`));
    } else {
      console.error(red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    }
    return 1;
  }
}

// ─── REPL ────────────────────────────────────────────────────────────────────

async function repl() {
  ensureDirs();

  const ctx: CommandContext = { store: createHistoryStore(), historyLimit: HISTORY_LIMIT };
  let state = initialState();

  console.log(dim(`┌ ${APP_NAME} ${APP_VERSION}`));
  console.log(dim(`│ history: ${ctx.store.baseDir}`));
  for (const line of describeInput(state.input)) console.log(dim(`│ ${line}`));
  console.log(dim(`└ key=value /units /show /calc /report /svg /beta1 /history /help /quit`));
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let line: string;
    try {
      line = await rl.question(bold("> "));
    } catch {
      break; // EOF
    }

    const outcome = runCommand(state, line, ctx);
    state = outcome.state;
    for (const text of outcome.output) {
      console.log(outcome.error ? red(text) : text);
    }
    if (outcome.quit) break;
    if (outcome.output.length > 0) console.log();
  }

  rl.close();
  console.log(dim("Bye."));
}

const argv = process.argv.slice(2);
if (argv.length > 0) {
  process.exitCode = runOnce(argv);
} else {
  repl().catch((err) => {
    console.error("Fatal:", err);
    process.exit(1);
  });
}
