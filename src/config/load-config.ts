import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { CurveTable } from "../core/curve-table.js";
import { asErrorMessage, ConfigError } from "../core/errors.js";
import { DEFAULT_MARKER_TIMEOUT_MS } from "../core/state-reconciler.js";
import { nestedGroupId } from "../devices/routing-device-control.js";
import { parseBreakpoints } from "./breakpoints.js";
import type { GroupDefinition, RuntimeConfig, TransportConfig } from "./types.js";

function clampTimeout(value: unknown, fallback: number): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return Math.round(parsed);
}

function findCycle(groups: GroupDefinition[]): string[] | null {
  const children = new Map(
    groups.map((group) => [
      group.id,
      group.members.map((member) => nestedGroupId(member.id)).filter((id): id is string => id !== null),
    ]),
  );
  const visiting = new Set<string>();
  const done = new Set<string>();

  const visit = (id: string, path: string[]): string[] | null => {
    if (visiting.has(id)) return [...path, id];
    if (done.has(id)) return null;
    visiting.add(id);
    for (const child of children.get(id) ?? []) {
      const cycle = visit(child, [...path, id]);
      if (cycle) return cycle;
    }
    visiting.delete(id);
    done.add(id);
    return null;
  };

  for (const group of groups) {
    const cycle = visit(group.id, []);
    if (cycle) return cycle;
  }
  return null;
}

/** First problem found in the group definitions, or null when they are usable. */
export function validateGroups(groups: GroupDefinition[]): string | null {
  if (!Array.isArray(groups)) return "Groups must be a list";
  const groupIds = new Set<string>();
  for (const group of groups) {
    if (typeof group !== "object" || group === null) return "Every group must be an object";
    if (typeof group.id !== "string" || group.id.trim().length === 0) return "Every group needs an id";
    if (groupIds.has(group.id)) return `Duplicate group id: ${group.id}`;
    groupIds.add(group.id);
    if (!Array.isArray(group.members) || group.members.length === 0) {
      return `Group ${group.id} requires at least one member`;
    }
  }

  for (const group of groups) {
    const memberIds = new Set<string>();
    for (const member of group.members) {
      if (typeof member !== "object" || member === null) return `Group ${group.id} has a member that is not an object`;
      if (typeof member.id !== "string" || member.id.trim().length === 0) {
        return `Group ${group.id} has a member without an id`;
      }
      if (memberIds.has(member.id)) return `Group ${group.id} lists ${member.id} twice`;
      memberIds.add(member.id);

      if (member.capability !== undefined && member.capability !== "dimmable" && member.capability !== "onoff") {
        return `Member ${member.id} in ${group.id} has unknown capability ${String(member.capability)}`;
      }
      const nested = nestedGroupId(member.id);
      if (nested !== null && !groupIds.has(nested)) {
        return `Member ${member.id} in ${group.id} references an unknown group`;
      }
      try {
        CurveTable.build(parseBreakpoints(member.breakpoints));
      } catch (error) {
        return `Member ${member.id} in ${group.id}: ${asErrorMessage(error)}`;
      }
    }
  }

  const cycle = findCycle(groups);
  if (cycle) return `Groups control each other in a loop: ${cycle.join(" -> ")}`;
  return null;
}

export function validateTransport(transport: TransportConfig): string | null {
  const members = transport.members;
  if (!members || (members.type !== "mqtt" && members.type !== "simulator")) {
    return "Transport members.type must be mqtt or simulator";
  }
  if (members.type === "mqtt" && members.brightnessScale !== undefined) {
    if (!Number.isInteger(members.brightnessScale) || members.brightnessScale < 100) {
      return "Transport members.brightnessScale must be an integer of at least 100";
    }
  }
  const needsBroker = members.type === "mqtt" || transport.exposure?.enabled === true;
  if (needsBroker && !transport.mqtt?.brokerUrl) {
    return "Transport mqtt.brokerUrl is required for MQTT members or exposure";
  }
  return null;
}

async function readJsonFile<T>(relativePath: string): Promise<T> {
  const fullPath = resolve(process.cwd(), relativePath);
  const raw = await readFile(fullPath, "utf8");
  return JSON.parse(raw) as T;
}

export async function loadRuntimeConfig(): Promise<RuntimeConfig> {
  const [groups, transport] = await Promise.all([
    readJsonFile<GroupDefinition[]>("data/groups.json"),
    readJsonFile<TransportConfig>("data/transport.json"),
  ]);
  return buildRuntimeConfig(groups, transport, process.env);
}

export function buildRuntimeConfig(
  groups: GroupDefinition[],
  transport: TransportConfig,
  env: Record<string, string | undefined>,
): RuntimeConfig {
  const brokerUrl = env.MQTT_URL?.trim();
  const resolvedTransport: TransportConfig =
    brokerUrl && brokerUrl.length > 0 ? { ...transport, mqtt: { ...transport.mqtt, brokerUrl } } : transport;

  const groupError = validateGroups(groups);
  if (groupError) throw new ConfigError(groupError);
  const transportError = validateTransport(resolvedTransport);
  if (transportError) throw new ConfigError(transportError);

  return {
    transport: resolvedTransport,
    groups,
    markerTimeoutMs: clampTimeout(env.DIMMER_MARKER_TIMEOUT_MS, DEFAULT_MARKER_TIMEOUT_MS),
  };
}
