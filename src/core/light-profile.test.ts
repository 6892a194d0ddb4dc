import { describe, expect, it } from "vitest";
import { CurveTable } from "./curve-table.js";
import { LightProfile } from "./light-profile.js";

const hump = CurveTable.build([
  { control: 20, output: 0 },
  { control: 50, output: 30 },
  { control: 100, output: 0 },
]);

describe("LightProfile", () => {
  it("turns a dimmable member on with the curve output", () => {
    const profile = new LightProfile("ceiling", CurveTable.build([{ control: 80, output: 100 }]), "dimmable");
    expect(profile.evaluate(40)).toEqual({ on: true, brightness: 50 });
    expect(profile.evaluate(0)).toEqual({ on: false });
  });

  it("keeps the lowest non-zero output for dimmable members", () => {
    const profile = new LightProfile("reading", hump, "dimmable");
    expect(profile.evaluate(99)).toEqual({ on: true, brightness: 1 });
    expect(profile.evaluate(100)).toEqual({ on: false });
  });

  it("switches a binary member on whenever the output is above zero", () => {
    const profile = new LightProfile("strip", hump, "onoff");
    expect(profile.dimmable).toBe(false);
    expect(profile.evaluate(0)).toEqual({ on: false });
    expect(profile.evaluate(20)).toEqual({ on: false });
    expect(profile.evaluate(21)).toEqual({ on: true });
    expect(profile.evaluate(99)).toEqual({ on: true });
    expect(profile.evaluate(100)).toEqual({ on: false });
  });
});
