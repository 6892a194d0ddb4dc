import { ConfigError } from "../core/errors.js";
import type { Breakpoint } from "../core/curve-table.js";
import type { BreakpointInput } from "./types.js";

function toNumber(value: unknown, label: string): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new ConfigError(`Breakpoint ${label} is not a number: ${String(value)}`);
}

function parseText(text: string): Breakpoint[] {
  const out: Breakpoint[] = [];
  for (const entry of text.split(/[\n,;]+/)) {
    const trimmed = entry.trim();
    if (trimmed.length === 0) continue;
    const parts = trimmed.split(":");
    if (parts.length !== 2) {
      throw new ConfigError(`Invalid breakpoint "${trimmed}", expected control:output`);
    }
    out.push({ control: toNumber(parts[0], "control"), output: toNumber(parts[1], "output") });
  }
  return out;
}

/** Converts any accepted breakpoint shape into a list; range checks happen in `CurveTable.build`. */
export function parseBreakpoints(input: BreakpointInput | undefined): Breakpoint[] {
  if (input === undefined) return [];
  if (typeof input === "string") return parseText(input);
  if (Array.isArray(input)) {
    return input.map((entry) => {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new ConfigError("Breakpoint pairs must have exactly two values");
      }
      return { control: toNumber(entry[0], "control"), output: toNumber(entry[1], "output") };
    });
  }
  if (typeof input === "object" && input !== null) {
    return Object.entries(input).map(([control, output]) => ({
      control: toNumber(control, "control"),
      output: toNumber(output, "output"),
    }));
  }
  throw new ConfigError("Breakpoints must be text, a list of pairs or an object");
}

export function formatBreakpoints(points: readonly Breakpoint[]): string {
  return points.map((point) => `${point.control}:${point.output}`).join(", ");
}
