import type { ControlState } from "../core/state-reconciler.js";
import type { AvailabilityListener, DeviceControl, MemberStateListener } from "./device-control.js";

export const GROUP_MEMBER_PREFIX = "group:";

/** The part of a virtual light a parent group drives when it is one of its members. */
export interface NestedGroup {
  setState(on: boolean, brightness?: number): Promise<unknown>;
  getState(): ControlState;
  subscribe(listener: (state: ControlState) => void): () => void;
}

export function nestedGroupId(memberId: string): string | null {
  return memberId.startsWith(GROUP_MEMBER_PREFIX) ? memberId.slice(GROUP_MEMBER_PREFIX.length) : null;
}

/**
 * Sends `group:<id>` members to another virtual light in this process and
 * everything else to the member transport.
 */
export class RoutingDeviceControl implements DeviceControl {
  readonly id: string;

  constructor(
    private readonly members: DeviceControl,
    private readonly resolveGroup: (groupId: string) => NestedGroup | undefined,
    private readonly now: () => number = Date.now,
  ) {
    this.id = `routing:${members.id}`;
  }

  async setBrightness(memberId: string, percent: number): Promise<void> {
    const groupId = nestedGroupId(memberId);
    if (groupId === null) return this.members.setBrightness(memberId, percent);
    await this.group(groupId).setState(percent > 0, percent > 0 ? percent : undefined);
  }

  async setOnOff(memberId: string, on: boolean): Promise<void> {
    const groupId = nestedGroupId(memberId);
    if (groupId === null) return this.members.setOnOff(memberId, on);
    await this.group(groupId).setState(on);
  }

  subscribe(memberId: string, listener: MemberStateListener): () => void {
    const groupId = nestedGroupId(memberId);
    if (groupId === null) return this.members.subscribe(memberId, listener);
    return this.group(groupId).subscribe((state) => listener({ ...state }, this.now()));
  }

  subscribeAvailability(memberId: string, listener: AvailabilityListener): () => void {
    // Groups in this process are always reachable.
    if (nestedGroupId(memberId) !== null) return () => undefined;
    return this.members.subscribeAvailability(memberId, listener);
  }

  private group(groupId: string): NestedGroup {
    const group = this.resolveGroup(groupId);
    if (!group) throw new Error(`Unknown group: ${groupId}`);
    return group;
  }
}
