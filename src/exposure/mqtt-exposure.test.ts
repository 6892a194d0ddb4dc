import { describe, expect, it } from "vitest";
import { GroupStore } from "../core/group-store.js";
import { SimulatedDeviceControl } from "../devices/simulated-device-control.js";
import { FakeMqttDriver } from "../testing/fake-mqtt-driver.js";
import { MqttExposure, parseGroupCommand, stateTopicPayload } from "./mqtt-exposure.js";

function setup() {
  const driver = new FakeMqttDriver();
  const simulator = new SimulatedDeviceControl(() => 1000);
  const store = new GroupStore([{ id: "living", name: "Living room", members: [{ id: "lamp" }] }], simulator);
  const exposure = new MqttExposure(driver, store.list(), { enabled: true });
  return { driver, simulator, store, exposure };
}

describe("parseGroupCommand", () => {
  it("reads JSON light commands with 0-255 brightness", () => {
    expect(parseGroupCommand({ state: "ON", brightness: 255 })).toEqual({ on: true, brightness: 100 });
    expect(parseGroupCommand({ state: "ON", brightness: 1 })).toEqual({ on: true, brightness: 1 });
    expect(parseGroupCommand({ state: "ON" })).toEqual({ on: true });
    expect(parseGroupCommand("OFF")).toEqual({ on: false });
  });

  it("turns brightness 0 into off", () => {
    expect(parseGroupCommand({ state: "ON", brightness: 0 })).toEqual({ on: false });
  });

  it("ignores payloads without a state", () => {
    expect(parseGroupCommand({ brightness: 10 })).toBeNull();
  });
});

describe("stateTopicPayload", () => {
  it("reports brightness on the 0-255 scale", () => {
    expect(stateTopicPayload({ on: true, brightness: 50 })).toEqual({
      state: "ON",
      brightness: 128,
      color_mode: "brightness",
    });
    expect(stateTopicPayload({ on: false })).toEqual({ state: "OFF" });
  });
});

describe("MqttExposure", () => {
  it("announces every group with discovery, state and availability", async () => {
    const { driver, exposure } = setup();

    await exposure.announce();

    expect(driver.subscribed).toEqual(["dimmer-groups/group/living/set"]);
    const discovery = driver.lastOn("homeassistant/light/dimmer_groups/group_living/config");
    expect(discovery?.options).toEqual({ qos: 0, retain: true });
    expect(JSON.parse(discovery?.payload ?? "{}")).toMatchObject({
      name: "Living room",
      unique_id: "dimmer_groups_group_living",
      schema: "json",
      command_topic: "dimmer-groups/group/living/set",
      state_topic: "dimmer-groups/group/living/state",
      availability_topic: "dimmer-groups/availability",
      brightness_scale: 255,
    });
    expect(driver.lastOn("dimmer-groups/group/living/state")?.payload).toBe('{"state":"OFF"}');
    expect(driver.lastOn("dimmer-groups/availability")?.payload).toBe("online");
  });

  it("publishes retained payloads again on every announce", async () => {
    const { driver, exposure } = setup();
    await exposure.announce();
    await exposure.announce();
    expect(driver.published.filter((message) => message.topic === "dimmer-groups/group/living/state")).toHaveLength(2);
  });

  it("forwards commands to the group and publishes the new state", async () => {
    const { driver, simulator, store, exposure } = setup();
    await exposure.announce();

    driver.deliver("dimmer-groups/group/living/set", '{"state":"ON","brightness":128}');
    await store.require("living").reconciler.idle();

    expect(store.require("living").getState()).toEqual({ on: true, brightness: 50 });
    expect(simulator.getState("lamp")).toEqual({ on: true, brightness: 50 });
    expect(driver.lastOn("dimmer-groups/group/living/state")?.payload).toBe(
      '{"state":"ON","brightness":128,"color_mode":"brightness"}',
    );
  });

  it("ignores unreadable commands", async () => {
    const { driver, store, exposure } = setup();
    await exposure.announce();

    driver.deliver("dimmer-groups/group/living/set", "toggle");
    await store.require("living").reconciler.idle();

    expect(store.require("living").getState()).toEqual({ on: false });
  });

  it("marks itself offline when detached", async () => {
    const { driver, exposure } = setup();
    await exposure.announce();
    await exposure.detach();
    expect(driver.lastOn("dimmer-groups/availability")).toEqual({
      topic: "dimmer-groups/availability",
      payload: "offline",
      options: { qos: 0, retain: true },
    });
  });
});
