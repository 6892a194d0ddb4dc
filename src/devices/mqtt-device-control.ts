import type { MemberTarget } from "../core/light-profile.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { MqttDriver } from "../mqtt/mqtt-driver.js";
import { asRecord, parseOnOff, parsePayload } from "../mqtt/payload.js";
import { byteToPercent, DEFAULT_BRIGHTNESS_SCALE, percentToByte } from "./brightness-scale.js";
import type { AvailabilityListener, DeviceControl, MemberStateListener } from "./device-control.js";

export const DEFAULT_MEMBER_BASE_TOPIC = "zigbee2mqtt";

export type MqttDeviceControlOptions = {
  baseTopic?: string;
  brightnessScale?: number;
  now?: () => number;
  logger?: Logger;
};

type TopicRoute = { memberId: string; kind: "state" | "availability" };

export function parseMemberState(payload: unknown, scale: number): MemberTarget | null {
  const record = asRecord(payload);
  const on = parseOnOff("state" in record ? record.state : payload);
  if (on === null) return null;
  if (!on) return { on: false };
  const raw = Number(record.brightness);
  if (!Number.isFinite(raw)) return { on: true };
  return { on: true, brightness: byteToPercent(raw, scale) };
}

export function parseAvailability(payload: unknown): boolean | null {
  const value = typeof payload === "string" ? payload : asRecord(payload).state;
  if (typeof value !== "string") return parseOnOff(value);
  const normalized = value.trim().toLowerCase();
  if (normalized === "online") return true;
  if (normalized === "offline") return false;
  return parseOnOff(normalized);
}

/**
 * Member lights behind a JSON-schema MQTT bridge such as zigbee2mqtt:
 * commands go to `<base>/<id>/set`, state arrives on `<base>/<id>` and
 * availability on `<base>/<id>/availability`.
 */
export class MqttDeviceControl implements DeviceControl {
  readonly id = "mqtt";
  private readonly baseTopic: string;
  private readonly scale: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private routes = new Map<string, TopicRoute>();
  private stateListeners = new Map<string, Set<MemberStateListener>>();
  private availabilityListeners = new Map<string, Set<AvailabilityListener>>();
  private subscriptions = new Set<string>();

  constructor(
    private readonly driver: MqttDriver,
    options: MqttDeviceControlOptions = {},
  ) {
    const configured = options.baseTopic?.trim();
    this.baseTopic = configured && configured.length > 0 ? configured : DEFAULT_MEMBER_BASE_TOPIC;
    this.scale = Math.max(1, Math.round(options.brightnessScale ?? DEFAULT_BRIGHTNESS_SCALE));
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.driver.onMessage((topic, payload) => this.handleMessage(topic, payload));
  }

  async setBrightness(memberId: string, percent: number): Promise<void> {
    if (percent <= 0) {
      await this.setOnOff(memberId, false);
      return;
    }
    await this.publishCommand(memberId, { state: "ON", brightness: percentToByte(percent, this.scale) });
  }

  async setOnOff(memberId: string, on: boolean): Promise<void> {
    await this.publishCommand(memberId, { state: on ? "ON" : "OFF" });
  }

  subscribe(memberId: string, listener: MemberStateListener): () => void {
    return this.addListener(this.stateListeners, memberId, "state", listener);
  }

  subscribeAvailability(memberId: string, listener: AvailabilityListener): () => void {
    return this.addListener(this.availabilityListeners, memberId, "availability", listener);
  }

  private topicFor(memberId: string, kind: TopicRoute["kind"]): string {
    return kind === "state" ? `${this.baseTopic}/${memberId}` : `${this.baseTopic}/${memberId}/availability`;
  }

  private addListener<T>(
    registry: Map<string, Set<T>>,
    memberId: string,
    kind: TopicRoute["kind"],
    listener: T,
  ): () => void {
    const listeners = registry.get(memberId) ?? new Set<T>();
    listeners.add(listener);
    registry.set(memberId, listeners);

    const topic = this.topicFor(memberId, kind);
    this.routes.set(topic, { memberId, kind });
    if (!this.subscriptions.has(topic)) {
      this.subscriptions.add(topic);
      this.driver.subscribe(topic).catch((error: unknown) => {
        this.subscriptions.delete(topic);
        this.logger.error({ topic, err: error }, "MQTT subscribe failed");
      });
    }

    return () => {
      listeners.delete(listener);
    };
  }

  private async publishCommand(memberId: string, payload: Record<string, unknown>): Promise<void> {
    const topic = `${this.baseTopic}/${memberId}/set`;
    this.logger.debug({ topic, payload }, "Publishing member command");
    await this.driver.publish(topic, JSON.stringify(payload), { qos: 0, retain: false });
  }

  private handleMessage(topic: string, raw: Buffer): void {
    const route = this.routes.get(topic);
    if (!route) return;
    const payload = parsePayload(raw);
    const timestamp = this.now();

    if (route.kind === "availability") {
      const available = parseAvailability(payload);
      if (available === null) return;
      for (const listener of this.availabilityListeners.get(route.memberId) ?? []) {
        listener(available, timestamp);
      }
      return;
    }

    const state = parseMemberState(payload, this.scale);
    if (!state) {
      this.logger.debug({ topic }, "Ignoring member message without a state");
      return;
    }
    for (const listener of this.stateListeners.get(route.memberId) ?? []) {
      listener(state, timestamp);
    }
  }
}
