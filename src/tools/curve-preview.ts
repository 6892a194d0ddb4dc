import { formatBreakpoints, parseBreakpoints } from "../config/breakpoints.js";
import { CurveTable } from "../core/curve-table.js";
import { debugEnabled } from "../logging/logger.js";

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const [key, inlineValue] = arg.slice(2).split("=", 2);
    if (inlineValue !== undefined) {
      out[key] = inlineValue;
      continue;
    }
    const next = argv[i + 1];
    if (next && !next.startsWith("--")) {
      out[key] = next;
      i += 1;
    } else {
      out[key] = "true";
    }
  }
  return out;
}

function asNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const step = Math.max(1, Math.min(100, Math.round(asNumber(args.step, 10))));
  const table = CurveTable.build(parseBreakpoints(args.breakpoints ?? ""));

  console.log(`Breakpoints: ${formatBreakpoints(table.breakpoints)}`);
  console.log("\ncontrol  output");
  const levels = table.levels();
  for (let control = 0; control <= 100; control += step) {
    console.log(`${String(control).padStart(7)}  ${String(levels[control]).padStart(6)}`);
  }

  if (args.output !== undefined) {
    const output = asNumber(args.output, 0);
    const hint = args.hint === undefined ? undefined : asNumber(args.hint, 0);
    const candidates = table.candidates(output, hint);
    console.log(`\nControl values for output ${output}${hint === undefined ? "" : ` (hint ${hint})`}:`);
    for (const candidate of candidates) {
      const note = candidate.exact ? "" : " (nearest reachable)";
      console.log(`  ${candidate.control}${note}`);
    }
    if (debugEnabled) console.info("[curve-preview-debug]", { candidates });
  }
}

try {
  main();
} catch (error) {
  console.error(error);
  process.exitCode = 1;
}
