import type { MemberTarget } from "../core/light-profile.js";
import type { AvailabilityListener, DeviceControl, MemberStateListener } from "./device-control.js";

type SimulatedMember = {
  state: MemberTarget;
  available: boolean;
  failure: Error | null;
  listeners: Set<MemberStateListener>;
  availabilityListeners: Set<AvailabilityListener>;
};

/**
 * In-process member lights. Commands are confirmed immediately with a state
 * report, the way a well-behaved bridge echoes its devices.
 */
export class SimulatedDeviceControl implements DeviceControl {
  readonly id = "simulator";
  private members = new Map<string, SimulatedMember>();

  constructor(private readonly now: () => number = Date.now) {}

  async setBrightness(memberId: string, percent: number): Promise<void> {
    this.command(memberId, percent > 0 ? { on: true, brightness: percent } : { on: false });
  }

  async setOnOff(memberId: string, on: boolean): Promise<void> {
    const { brightness } = this.member(memberId).state;
    this.command(memberId, on ? (brightness === undefined ? { on: true } : { on: true, brightness }) : { on: false });
  }

  subscribe(memberId: string, listener: MemberStateListener): () => void {
    const member = this.member(memberId);
    member.listeners.add(listener);
    return () => {
      member.listeners.delete(listener);
    };
  }

  subscribeAvailability(memberId: string, listener: AvailabilityListener): () => void {
    const member = this.member(memberId);
    member.availabilityListeners.add(listener);
    return () => {
      member.availabilityListeners.delete(listener);
    };
  }

  getState(memberId: string): MemberTarget {
    return { ...this.member(memberId).state };
  }

  /** A change made outside the service, e.g. a wall switch. */
  applyExternal(memberId: string, state: MemberTarget): void {
    const member = this.member(memberId);
    member.state = { ...state };
    this.notify(member);
  }

  setAvailable(memberId: string, available: boolean): void {
    const member = this.member(memberId);
    if (member.available === available) return;
    member.available = available;
    const timestamp = this.now();
    for (const listener of member.availabilityListeners) {
      listener(available, timestamp);
    }
  }

  /** Makes every following command to the member fail until cleared with `null`. */
  setFailure(memberId: string, failure: Error | null): void {
    this.member(memberId).failure = failure;
  }

  private command(memberId: string, state: MemberTarget): void {
    const member = this.member(memberId);
    if (member.failure) throw member.failure;
    if (!member.available) throw new Error(`${memberId} is unavailable`);
    member.state = state;
    this.notify(member);
  }

  private notify(member: SimulatedMember): void {
    const timestamp = this.now();
    for (const listener of member.listeners) {
      listener({ ...member.state }, timestamp);
    }
  }

  private member(memberId: string): SimulatedMember {
    const existing = this.members.get(memberId);
    if (existing) return existing;
    const created: SimulatedMember = {
      state: { on: false },
      available: true,
      failure: null,
      listeners: new Set(),
      availabilityListeners: new Set(),
    };
    this.members.set(memberId, created);
    return created;
  }
}
