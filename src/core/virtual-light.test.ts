import { describe, expect, it } from "vitest";
import type { GroupDefinition } from "../config/types.js";
import { SimulatedDeviceControl } from "../devices/simulated-device-control.js";
import { ConfigError, GroupNotFoundError } from "./errors.js";
import { GroupStore } from "./group-store.js";
import { buildProfile, VirtualLight } from "./virtual-light.js";

const living: GroupDefinition = {
  id: "living",
  name: "Living room",
  members: [
    { id: "ceiling", name: "Ceiling", breakpoints: { "80": 100 } },
    { id: "floor", breakpoints: "60:0" },
  ],
};

describe("buildProfile", () => {
  it("names the member in curve errors", () => {
    expect(() => buildProfile({ id: "floor", breakpoints: { "150": 1 } })).toThrow(
      "floor: Breakpoint control must be an integer between 0 and 100, got 150",
    );
  });
});

describe("VirtualLight", () => {
  it("lists the curve of every member", () => {
    const light = new VirtualLight(living, new SimulatedDeviceControl());
    const curves = light.curves();
    expect(curves.map((curve) => [curve.memberId, curve.name, curve.capability])).toEqual([
      ["ceiling", "Ceiling", "dimmable"],
      ["floor", "floor", "dimmable"],
    ]);
    expect(curves[0].levels[40]).toBe(50);
    expect(curves[1].breakpoints).toEqual([
      { control: 0, output: 0 },
      { control: 60, output: 0 },
      { control: 100, output: 100 },
    ]);
  });

  it("does not share its definition with the caller", () => {
    const definition = structuredClone(living);
    const light = new VirtualLight(definition, new SimulatedDeviceControl());
    definition.name = "Changed";
    expect(light.name).toBe("Living room");
    expect(light.describe()).toEqual(living);
  });

  it("applies a new curve and resends on the next command", async () => {
    const simulator = new SimulatedDeviceControl(() => 1000);
    const light = new VirtualLight(living, simulator);
    light.start();
    await light.setState(true, 40);
    expect(simulator.getState("floor")).toEqual({ on: false });

    const curve = await light.reconfigureMember("floor", { breakpoints: "10:20" });
    expect(curve.breakpoints).toEqual([
      { control: 0, output: 0 },
      { control: 10, output: 20 },
      { control: 100, output: 100 },
    ]);
    expect(curve.levels[40]).toBe(47);

    const report = await light.setState(true, 40);
    expect(report.succeeded).toEqual(["ceiling", "floor"]);
    expect(simulator.getState("floor")).toEqual({ on: true, brightness: 47 });
    expect(light.describe().members[1].breakpoints).toBe("10:20");
  });

  it("ignores a member re-publishing the state it was sent", async () => {
    const simulator = new SimulatedDeviceControl(() => 1000);
    const light = new VirtualLight(
      { id: "desk", name: "Desk", members: [{ id: "half", breakpoints: { "100": 50 } }] },
      simulator,
    );
    light.start();
    await light.setState(true, 49);
    await light.reconciler.idle();
    expect(simulator.getState("half")).toEqual({ on: true, brightness: 25 });

    simulator.applyExternal("half", { on: true, brightness: 25 });
    await light.reconciler.idle();

    expect(light.getState()).toEqual({ on: true, brightness: 49 });
  });

  it("switches a member to on/off control", async () => {
    const light = new VirtualLight(living, new SimulatedDeviceControl());
    const curve = await light.reconfigureMember("ceiling", { capability: "onoff" });
    expect(curve.capability).toBe("onoff");
    expect(light.describe().members[0]).toEqual({
      id: "ceiling",
      name: "Ceiling",
      capability: "onoff",
      breakpoints: { "80": 100 },
    });
  });

  it("rejects unknown members and invalid curves without changing anything", async () => {
    const light = new VirtualLight(living, new SimulatedDeviceControl());
    await expect(light.reconfigureMember("porch", { capability: "onoff" })).rejects.toThrow(
      "Unknown member porch in group living",
    );
    await expect(light.reconfigureMember("floor", { breakpoints: "10:200" })).rejects.toBeInstanceOf(ConfigError);
    expect(light.describe()).toEqual(living);
  });
});

describe("GroupStore", () => {
  it("finds groups by id", () => {
    const store = new GroupStore([living], new SimulatedDeviceControl());
    expect(store.list().map((group) => group.id)).toEqual(["living"]);
    expect(store.get("nope")).toBeUndefined();
    expect(() => store.require("nope")).toThrow(GroupNotFoundError);
  });

  it("rejects duplicate group ids", () => {
    expect(() => new GroupStore([living, living], new SimulatedDeviceControl())).toThrow(
      "Group already exists: living",
    );
  });
});
