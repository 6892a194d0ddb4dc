import type { ExposureDefinition } from "../config/types.js";
import type { ControlState } from "../core/state-reconciler.js";
import type { VirtualLight } from "../core/virtual-light.js";
import { byteToPercent, percentToByte } from "../devices/brightness-scale.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { MqttDriver } from "../mqtt/mqtt-driver.js";
import { asRecord, parseOnOff, parsePayload, sanitizeId } from "../mqtt/payload.js";

const DEFAULT_DISCOVERY_PREFIX = "homeassistant";
const DEFAULT_BASE_TOPIC = "dimmer-groups";
const EXPOSED_SCALE = 255;

export type GroupCommand = { on: boolean; brightness?: number };

/** Reads a Home Assistant JSON-schema light command; brightness is 0–255 on the wire. */
export function parseGroupCommand(payload: unknown): GroupCommand | null {
  const record = asRecord(payload);
  const on = parseOnOff("state" in record ? record.state : payload);
  if (on === null) return null;
  if (!on) return { on: false };
  const raw = Number(record.brightness);
  if (!("brightness" in record) || !Number.isFinite(raw)) return { on: true };
  const brightness = byteToPercent(raw, EXPOSED_SCALE);
  return brightness > 0 ? { on: true, brightness } : { on: false };
}

export function stateTopicPayload(state: ControlState): Record<string, unknown> {
  if (!state.on) return { state: "OFF" };
  return {
    state: "ON",
    brightness: percentToByte(state.brightness ?? 100, EXPOSED_SCALE),
    color_mode: "brightness",
  };
}

/**
 * Publishes every virtual light as a Home Assistant MQTT light and forwards
 * the commands Home Assistant sends back.
 */
export class MqttExposure {
  private readonly baseTopic: string;
  private readonly discoveryPrefix: string;
  private readonly nodeId: string;
  private readonly groupsByCommandTopic = new Map<string, VirtualLight>();
  private readonly retainedPayloadCache = new Map<string, string>();
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly driver: MqttDriver,
    private readonly groups: VirtualLight[],
    definition: ExposureDefinition,
    private readonly logger: Logger = silentLogger,
  ) {
    const base = definition.baseTopic?.trim();
    const prefix = definition.discoveryPrefix?.trim();
    this.baseTopic = base && base.length > 0 ? base : DEFAULT_BASE_TOPIC;
    this.discoveryPrefix = prefix && prefix.length > 0 ? prefix : DEFAULT_DISCOVERY_PREFIX;
    this.nodeId = sanitizeId(definition.nodeId?.trim() || this.baseTopic);
    this.driver.onMessage((topic, payload) => this.handleCommand(topic, payload));
  }

  get availabilityTopic(): string {
    return `${this.baseTopic}/availability`;
  }

  commandTopic(groupId: string): string {
    return `${this.baseTopic}/group/${groupId}/set`;
  }

  stateTopic(groupId: string): string {
    return `${this.baseTopic}/group/${groupId}/state`;
  }

  /** Follows group state changes; publishing happens once the broker is reachable. */
  attach(): void {
    if (this.unsubscribers.length > 0) return;
    for (const group of this.groups) {
      this.groupsByCommandTopic.set(this.commandTopic(group.id), group);
      this.unsubscribers.push(
        group.subscribe((state) => {
          this.publishState(group.id, state).catch((error: unknown) => {
            this.logger.warn({ groupId: group.id, err: error }, "Failed to publish group state");
          });
        }),
      );
    }
  }

  /** Subscribes to commands and publishes discovery, state and availability. Run on every (re)connect. */
  async announce(): Promise<void> {
    this.attach();
    this.retainedPayloadCache.clear();
    for (const group of this.groups) {
      const commandTopic = this.commandTopic(group.id);
      await this.driver.subscribe(commandTopic);

      const objectId = sanitizeId(`group_${group.id}`);
      await this.publishJsonRetained(`${this.discoveryPrefix}/light/${this.nodeId}/${objectId}/config`, {
        name: group.name,
        unique_id: `${this.nodeId}_${objectId}`,
        schema: "json",
        command_topic: commandTopic,
        state_topic: this.stateTopic(group.id),
        availability_topic: this.availabilityTopic,
        payload_available: "online",
        payload_not_available: "offline",
        brightness: true,
        brightness_scale: EXPOSED_SCALE,
        supported_color_modes: ["brightness"],
        icon: "mdi:lightbulb-group",
        device: {
          identifiers: [this.nodeId],
          name: "Dimmer groups",
          model: "Virtual group light",
        },
      });
      await this.publishState(group.id, group.getState());
    }
    await this.publish(this.availabilityTopic, "online", true);
  }

  async detach(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    await this.publish(this.availabilityTopic, "offline", true);
  }

  private async publishState(groupId: string, state: ControlState): Promise<void> {
    await this.publishJsonRetained(this.stateTopic(groupId), stateTopicPayload(state));
  }

  private handleCommand(topic: string, raw: Buffer): void {
    const group = this.groupsByCommandTopic.get(topic);
    if (!group) return;
    const command = parseGroupCommand(parsePayload(raw));
    if (!command) {
      this.logger.debug({ topic }, "Ignoring unreadable group command");
      return;
    }
    group
      .setState(command.on, command.brightness)
      .then((report) => {
        if (report.failed.length > 0) {
          this.logger.warn(
            { groupId: group.id, failed: report.failed.map((failure) => failure.memberId) },
            "Group command partially failed",
          );
        }
      })
      .catch((error: unknown) => {
        this.logger.error({ groupId: group.id, err: error }, "Group command failed");
      });
  }

  private async publishJsonRetained(topic: string, payload: unknown): Promise<void> {
    const serialized = JSON.stringify(payload);
    const previous = this.retainedPayloadCache.get(topic);
    if (previous === serialized) return;
    await this.publish(topic, serialized, true);
    this.retainedPayloadCache.set(topic, serialized);
  }

  private async publish(topic: string, payload: string, retain: boolean): Promise<void> {
    await this.driver.publish(topic, payload, { qos: 0, retain });
  }
}
