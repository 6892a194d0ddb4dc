import { describe, expect, it } from "vitest";
import { CurveTable } from "./curve-table.js";
import { ConfigError } from "./errors.js";
import { GroupMapper } from "./group-mapper.js";
import type { MemberObservation } from "./group-mapper.js";
import { LightProfile } from "./light-profile.js";
import type { Capability } from "./light-profile.js";

function profile(memberId: string, points: Array<[number, number]>, capability: Capability = "dimmable"): LightProfile {
  return new LightProfile(
    memberId,
    CurveTable.build(points.map(([control, output]) => ({ control, output }))),
    capability,
  );
}

function observations(entries: Array<[string, MemberObservation["state"], number]>): Map<string, MemberObservation> {
  return new Map(entries.map(([memberId, state, timestamp]) => [memberId, { state, timestamp }]));
}

describe("GroupMapper.forward", () => {
  it("evaluates every member at the same control value", () => {
    const mapper = new GroupMapper([
      profile("ceiling", [[80, 100]]),
      profile("floor", [[60, 0]]),
      profile("strip", [[20, 0], [50, 30], [100, 0]], "onoff"),
    ]);
    expect(Object.fromEntries(mapper.forward(80))).toEqual({
      ceiling: { on: true, brightness: 100 },
      floor: { on: true, brightness: 50 },
      strip: { on: true },
    });
    expect(Object.fromEntries(mapper.forward(40))).toEqual({
      ceiling: { on: true, brightness: 50 },
      floor: { on: false },
      strip: { on: true },
    });
  });

  it("rejects a member listed twice", () => {
    expect(() => new GroupMapper([profile("a", []), profile("a", [])])).toThrow(ConfigError);
  });
});

describe("GroupMapper.inferControl", () => {
  it("reads the control value from a single dimmable member", () => {
    const mapper = new GroupMapper([profile("x", []), profile("y", [])]);
    const result = mapper.inferControl(observations([["x", { on: true, brightness: 70 }, 10]]));
    expect(result).toMatchObject({ kind: "control", control: 70, memberId: "x", conflict: false });
  });

  it("lets the most recent dimmable member win a disagreement", () => {
    const mapper = new GroupMapper([profile("a", [[80, 100]]), profile("b", [])]);
    const result = mapper.inferControl(
      observations([
        ["a", { on: true, brightness: 50 }, 1],
        ["b", { on: true, brightness: 30 }, 2],
      ]),
    );
    expect(result).toMatchObject({ kind: "control", control: 30, memberId: "b", conflict: true });
  });

  it("is ambiguous when members changed together and disagree", () => {
    const mapper = new GroupMapper([profile("a", [[80, 100]]), profile("b", [])]);
    const result = mapper.inferControl(
      observations([
        ["a", { on: true, brightness: 50 }, 5],
        ["b", { on: true, brightness: 30 }, 5],
      ]),
    );
    expect(result).toMatchObject({ kind: "unknown", reason: "ambiguous" });
  });

  it("accepts simultaneous readings within the tolerance", () => {
    const mapper = new GroupMapper([profile("a", [[80, 100]]), profile("b", [])]);
    const result = mapper.inferControl(
      observations([
        ["a", { on: true, brightness: 50 }, 5],
        ["b", { on: true, brightness: 41 }, 5],
      ]),
    );
    expect(result).toMatchObject({ kind: "control", control: 40, memberId: "a", conflict: false });
  });

  it("prefers dimmable evidence over a newer off reading", () => {
    const mapper = new GroupMapper([profile("a", [[80, 100]]), profile("b", [])]);
    const result = mapper.inferControl(
      observations([
        ["a", { on: true, brightness: 50 }, 1],
        ["b", { on: false }, 9],
      ]),
    );
    expect(result).toMatchObject({ kind: "control", control: 40, memberId: "a", conflict: true });
  });

  it("uses a binary member only when it is off", () => {
    const mapper = new GroupMapper([profile("strip", [[20, 0], [50, 30], [100, 0]], "onoff")]);
    expect(mapper.inferControl(observations([["strip", { on: false }, 3]]))).toMatchObject({
      kind: "control",
      control: 0,
      memberId: "strip",
    });
    expect(mapper.inferControl(observations([["strip", { on: true }, 3]]))).toMatchObject({
      kind: "unknown",
      reason: "no-evidence",
    });
  });

  it("reports no evidence without observations", () => {
    const mapper = new GroupMapper([profile("a", [])]);
    expect(mapper.inferControl(new Map())).toEqual({ kind: "unknown", reason: "no-evidence", evidence: [] });
  });

  it("uses the hint to choose between matching segments", () => {
    const mapper = new GroupMapper([profile("reading", [[20, 0], [50, 30], [100, 0]])]);
    const reading = observations([["reading", { on: true, brightness: 15 }, 1]]);
    expect(mapper.inferControl(reading)).toMatchObject({ kind: "control", control: 35 });
    expect(mapper.inferControl(reading, 80)).toMatchObject({ kind: "control", control: 75 });
  });
});
