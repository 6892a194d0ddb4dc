import { ConfigError } from "./errors.js";
import type { LightProfile, MemberTarget } from "./light-profile.js";

/** Candidates further apart than this many control steps disagree. */
export const INFERENCE_TOLERANCE = 1;

export type MemberObservation = {
  state: MemberTarget;
  timestamp: number;
};

/**
 * `dimmable`: a dimmable member that is on with a brightness.
 * `off`: any member that is off. A binary member that is on says nothing about
 * the control value and yields no evidence.
 */
export type EvidenceClass = "dimmable" | "off";

export type Evidence = {
  memberId: string;
  control: number;
  evidence: EvidenceClass;
  timestamp: number;
};

export type InferenceResult =
  | { kind: "control"; control: number; memberId: string; conflict: boolean; evidence: Evidence[] }
  | { kind: "unknown"; reason: "no-evidence" | "ambiguous"; evidence: Evidence[] };

const CLASS_RANK: Record<EvidenceClass, number> = { dimmable: 2, off: 1 };

function disagree(left: Evidence, right: Evidence): boolean {
  return Math.abs(left.control - right.control) > INFERENCE_TOLERANCE;
}

export class GroupMapper {
  private readonly profiles = new Map<string, LightProfile>();

  constructor(profiles: Iterable<LightProfile>) {
    for (const profile of profiles) {
      if (this.profiles.has(profile.memberId)) {
        throw new ConfigError(`Duplicate member: ${profile.memberId}`);
      }
      this.profiles.set(profile.memberId, profile);
    }
  }

  get memberIds(): string[] {
    return [...this.profiles.keys()];
  }

  profile(memberId: string): LightProfile | undefined {
    return this.profiles.get(memberId);
  }

  forward(control: number): Map<string, MemberTarget> {
    const out = new Map<string, MemberTarget>();
    for (const [memberId, profile] of this.profiles) {
      out.set(memberId, profile.evaluate(control));
    }
    return out;
  }

  collectEvidence(observations: ReadonlyMap<string, MemberObservation>, hint?: number): Evidence[] {
    const out: Evidence[] = [];
    for (const [memberId, profile] of this.profiles) {
      const observation = observations.get(memberId);
      if (!observation) continue;
      const { state, timestamp } = observation;

      if (!state.on) {
        const control = profile.table.inverse(0);
        if (control !== undefined) out.push({ memberId, control, evidence: "off", timestamp });
        continue;
      }
      if (!profile.dimmable || state.brightness === undefined || state.brightness <= 0) continue;

      const control = profile.table.inverse(state.brightness, hint);
      if (control !== undefined) out.push({ memberId, control, evidence: "dimmable", timestamp });
    }
    return out;
  }

  /**
   * Control value that best explains the observed member states. Dimmable
   * evidence beats off evidence; within a class the most recently changed
   * member wins. Members of the winning class that changed at the same instant
   * and disagree make the result ambiguous.
   */
  inferControl(observations: ReadonlyMap<string, MemberObservation>, hint?: number): InferenceResult {
    const evidence = this.collectEvidence(observations, hint);
    if (evidence.length === 0) return { kind: "unknown", reason: "no-evidence", evidence };

    const topRank = Math.max(...evidence.map((item) => CLASS_RANK[item.evidence]));
    const top = evidence.filter((item) => CLASS_RANK[item.evidence] === topRank);
    const latest = Math.max(...top.map((item) => item.timestamp));
    const newest = top.filter((item) => item.timestamp === latest);

    const winner = newest[0];
    if (newest.some((item) => disagree(item, winner))) {
      return { kind: "unknown", reason: "ambiguous", evidence };
    }

    return {
      kind: "control",
      control: winner.control,
      memberId: winner.memberId,
      conflict: evidence.some((item) => disagree(item, winner)),
      evidence,
    };
  }
}
