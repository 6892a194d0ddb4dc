import { ConfigError } from "./errors.js";

export const MIN_PERCENT = 0;
export const MAX_PERCENT = 100;

export type Breakpoint = {
  control: number;
  output: number;
};

export type InverseCandidate = {
  control: number;
  /** false when no integer control inside the segment reproduces the output */
  exact: boolean;
  /** index of the segment the candidate came from, -1 for the unreachable fallback */
  segment: number;
};

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return MIN_PERCENT;
  return Math.max(MIN_PERCENT, Math.min(MAX_PERCENT, Math.round(value)));
}

// Rounds numerator / denominator half away from zero using integer math only.
function roundedQuotient(numerator: number, denominator: number): number {
  const magnitude = Math.floor((2 * Math.abs(numerator) + denominator) / (2 * denominator));
  return numerator < 0 ? -magnitude : magnitude;
}

function isPercent(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PERCENT && value <= MAX_PERCENT;
}

/**
 * Piecewise-linear brightness curve of one member light.
 *
 * The table always spans control 0 to 100: a missing start maps to output 0 and
 * a missing end maps to output 100. Tables are immutable; reconfiguring a
 * member builds a new one.
 */
export class CurveTable {
  private readonly points: readonly Breakpoint[];

  private constructor(points: Breakpoint[]) {
    this.points = Object.freeze(points.map((point) => Object.freeze({ ...point })));
  }

  static build(raw: readonly Breakpoint[]): CurveTable {
    const seen = new Set<number>();
    for (const point of raw) {
      if (!isPercent(point.control)) {
        throw new ConfigError(`Breakpoint control must be an integer between 0 and 100, got ${point.control}`);
      }
      if (!isPercent(point.output)) {
        throw new ConfigError(`Breakpoint output must be an integer between 0 and 100, got ${point.output}`);
      }
      if (seen.has(point.control)) {
        throw new ConfigError(`Duplicate breakpoint for control ${point.control}`);
      }
      seen.add(point.control);
    }

    const points = [...raw].sort((left, right) => left.control - right.control);
    if (!seen.has(MIN_PERCENT)) points.unshift({ control: MIN_PERCENT, output: MIN_PERCENT });
    if (!seen.has(MAX_PERCENT)) points.push({ control: MAX_PERCENT, output: MAX_PERCENT });
    return new CurveTable(points);
  }

  static identity(): CurveTable {
    return CurveTable.build([]);
  }

  get breakpoints(): readonly Breakpoint[] {
    return this.points;
  }

  /**
   * Output for a control value. Between breakpoints the output is interpolated
   * and the interpolated delta is rounded half away from zero.
   */
  forward(control: number): number {
    const value = clampPercent(control);
    const index = this.segmentStart(value);
    const start = this.points[index];
    if (start.control === value) return start.output;
    const end = this.points[index + 1];
    const delta = roundedQuotient((value - start.control) * (end.output - start.output), end.control - start.control);
    return clampPercent(start.output + delta);
  }

  /** Best control value producing `output`, see {@link candidates} for the ranking. */
  inverse(output: number, hint?: number): number | undefined {
    return this.candidates(output, hint)[0]?.control;
  }

  /**
   * Every segment whose outputs bracket `output` contributes one candidate:
   * the hint itself when it lies in the segment and reproduces `output`,
   * otherwise the matching control nearest the exact solution.
   * Exact candidates rank first; then, with a hint, the one closest to the hint
   * (equal distance: the smaller control), without a hint the first segment.
   * When no segment reaches `output`, the single candidate is the smallest
   * control whose output is nearest to it.
   */
  candidates(output: number, hint?: number): InverseCandidate[] {
    const target = clampPercent(output);
    const anchor = hint === undefined ? undefined : clampPercent(hint);
    const found: InverseCandidate[] = [];

    for (let index = 0; index < this.points.length - 1; index += 1) {
      const start = this.points[index];
      const end = this.points[index + 1];
      if (target < Math.min(start.output, end.output) || target > Math.max(start.output, end.output)) continue;
      const candidate = this.segmentCandidate(index, target, anchor);
      if (found.some((item) => item.control === candidate.control)) continue;
      found.push(candidate);
    }

    if (found.length === 0) return [this.nearestReachable(target)];

    return found.sort((left, right) => {
      if (left.exact !== right.exact) return left.exact ? -1 : 1;
      if (anchor !== undefined) {
        const distance = Math.abs(left.control - anchor) - Math.abs(right.control - anchor);
        if (distance !== 0) return distance;
      }
      return left.control - right.control;
    });
  }

  /** Forward output for every control value 0..100. */
  levels(): number[] {
    const out: number[] = [];
    for (let control = MIN_PERCENT; control <= MAX_PERCENT; control += 1) {
      out.push(this.forward(control));
    }
    return out;
  }

  private segmentStart(control: number): number {
    let low = 0;
    let high = this.points.length - 1;
    while (low < high) {
      const middle = Math.ceil((low + high) / 2);
      if (this.points[middle].control <= control) {
        low = middle;
      } else {
        high = middle - 1;
      }
    }
    return low;
  }

  private segmentCandidate(index: number, target: number, anchor: number | undefined): InverseCandidate {
    const start = this.points[index];
    const end = this.points[index + 1];
    // Continuity: stay at the hint while it still produces the target.
    if (anchor !== undefined && anchor >= start.control && anchor <= end.control && this.forward(anchor) === target) {
      return { control: anchor, exact: true, segment: index };
    }
    const ideal =
      start.output === end.output
        ? anchor === undefined
          ? start.control
          : Math.max(start.control, Math.min(end.control, anchor))
        : start.control + ((target - start.output) * (end.control - start.control)) / (end.output - start.output);

    let best: number | undefined;
    for (let control = start.control; control <= end.control; control += 1) {
      if (this.forward(control) !== target) continue;
      if (best === undefined || Math.abs(control - ideal) < Math.abs(best - ideal)) {
        best = control;
      }
    }

    if (best !== undefined) return { control: best, exact: true, segment: index };
    return {
      control: Math.max(start.control, Math.min(end.control, Math.round(ideal))),
      exact: false,
      segment: index,
    };
  }

  private nearestReachable(target: number): InverseCandidate {
    let best = MIN_PERCENT;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (let control = MIN_PERCENT; control <= MAX_PERCENT; control += 1) {
      const distance = Math.abs(this.forward(control) - target);
      if (distance < bestDistance) {
        best = control;
        bestDistance = distance;
      }
    }
    return { control: best, exact: false, segment: -1 };
  }
}
