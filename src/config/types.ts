import type { Capability } from "../core/light-profile.js";

/**
 * Breakpoints as users write them: `{ "10": 20 }`, `[[10, 20]]` or the text
 * form `"10:20, 50:100"`. Keys are control values, values are outputs.
 */
export type BreakpointInput =
  | string
  | Record<string, number | string>
  | Array<[number | string, number | string]>;

export type MemberDefinition = {
  /** Device id on the member transport, or `group:<id>` for another virtual light. */
  id: string;
  name?: string;
  capability?: Capability;
  breakpoints?: BreakpointInput;
};

export type GroupDefinition = {
  id: string;
  name: string;
  members: MemberDefinition[];
  markerTimeoutMs?: number;
};

export type MqttConnectionDefinition = {
  brokerUrl: string;
  clientId?: string;
  username?: string;
  password?: string;
};

export type MemberTransportDefinition =
  | { type: "simulator" }
  | {
      type: "mqtt";
      baseTopic?: string;
      /** Device brightness at 100 %, 254 for zigbee2mqtt, 255 for Home Assistant. */
      brightnessScale?: number;
    };

export type ExposureDefinition = {
  enabled: boolean;
  baseTopic?: string;
  discoveryPrefix?: string;
  nodeId?: string;
};

export type TransportConfig = {
  mqtt?: MqttConnectionDefinition;
  members: MemberTransportDefinition;
  exposure?: ExposureDefinition;
};

export type RuntimeConfig = {
  transport: TransportConfig;
  groups: GroupDefinition[];
  markerTimeoutMs: number;
};
