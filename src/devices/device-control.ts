import type { MemberTarget } from "../core/light-profile.js";

export type MemberStateListener = (state: MemberTarget, timestamp: number) => void;
export type AvailabilityListener = (available: boolean, timestamp: number) => void;

/**
 * Transport to the member lights. Listeners fire for every state change,
 * including the ones caused by commands issued through this interface.
 */
export interface DeviceControl {
  readonly id: string;
  setBrightness(memberId: string, percent: number): Promise<void>;
  setOnOff(memberId: string, on: boolean): Promise<void>;
  subscribe(memberId: string, listener: MemberStateListener): () => void;
  subscribeAvailability(memberId: string, listener: AvailabilityListener): () => void;
}
