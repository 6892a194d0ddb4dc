import type { Diagnostic, ControlState } from "../core/state-reconciler.js";

export type GroupSummary = {
  id: string;
  name: string;
  members: Array<{ id: string; name: string; capability: string; available: boolean }>;
  state: ControlState;
};

export type ServerEvent =
  | { type: "groups"; payload: GroupSummary[] }
  | { type: "state"; payload: { groupId: string; state: ControlState } }
  | { type: "diagnostic"; payload: { groupId: string; diagnostic: Diagnostic } }
  | { type: "error"; payload: { message: string } };

export type ClientEvent = { type: "setState"; payload: { groupId: string; on: boolean; brightness?: number } };

export function parseClientEvent(raw: unknown): ClientEvent | null {
  if (typeof raw !== "object" || raw === null) return null;
  const event = Object.fromEntries(Object.entries(raw));
  if (event.type !== "setState") return null;
  const payload = event.payload;
  if (typeof payload !== "object" || payload === null) return null;
  const fields = Object.fromEntries(Object.entries(payload));
  if (typeof fields.groupId !== "string" || typeof fields.on !== "boolean") return null;
  if (fields.brightness !== undefined && typeof fields.brightness !== "number") return null;
  return {
    type: "setState",
    payload: {
      groupId: fields.groupId,
      on: fields.on,
      ...(typeof fields.brightness === "number" ? { brightness: fields.brightness } : {}),
    },
  };
}
