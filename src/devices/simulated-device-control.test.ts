import { describe, expect, it } from "vitest";
import type { MemberTarget } from "../core/light-profile.js";
import { SimulatedDeviceControl } from "./simulated-device-control.js";

describe("SimulatedDeviceControl", () => {
  it("echoes commands as state reports", async () => {
    const devices = new SimulatedDeviceControl(() => 500);
    const reports: Array<[MemberTarget, number]> = [];
    devices.subscribe("lamp", (state, timestamp) => reports.push([state, timestamp]));

    await devices.setBrightness("lamp", 40);
    await devices.setOnOff("lamp", false);
    await devices.setOnOff("lamp", true);

    expect(reports).toEqual([
      [{ on: true, brightness: 40 }, 500],
      [{ on: false }, 500],
      [{ on: true }, 500],
    ]);
  });

  it("fails commands to unavailable or failing members", async () => {
    const devices = new SimulatedDeviceControl();
    devices.setAvailable("lamp", false);
    await expect(devices.setOnOff("lamp", true)).rejects.toThrow("lamp is unavailable");

    devices.setAvailable("lamp", true);
    devices.setFailure("lamp", new Error("jammed"));
    await expect(devices.setBrightness("lamp", 10)).rejects.toThrow("jammed");
    devices.setFailure("lamp", null);
    await devices.setBrightness("lamp", 10);
    expect(devices.getState("lamp")).toEqual({ on: true, brightness: 10 });
  });

  it("notifies availability changes once", () => {
    const devices = new SimulatedDeviceControl(() => 7);
    const changes: Array<[boolean, number]> = [];
    devices.subscribeAvailability("lamp", (available, timestamp) => changes.push([available, timestamp]));

    devices.setAvailable("lamp", false);
    devices.setAvailable("lamp", false);
    devices.setAvailable("lamp", true);

    expect(changes).toEqual([
      [false, 7],
      [true, 7],
    ]);
  });
});
