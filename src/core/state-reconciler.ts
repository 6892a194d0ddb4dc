import type { Logger } from "../logging/logger.js";
import type { DeviceControl } from "../devices/device-control.js";
import { silentLogger } from "../logging/logger.js";
import { clampPercent, MAX_PERCENT } from "./curve-table.js";
import { asErrorMessage, DispatchError } from "./errors.js";
import { INFERENCE_TOLERANCE } from "./group-mapper.js";
import type { GroupMapper, MemberObservation } from "./group-mapper.js";
import type { LightProfile, MemberTarget } from "./light-profile.js";
import { SerialQueue } from "./serial-queue.js";

export const DEFAULT_MARKER_TIMEOUT_MS = 5000;

/** Reported state of the virtual light. */
export type ControlState = {
  on: boolean;
  brightness?: number;
};

export type DispatchReport = {
  state: ControlState;
  control: number;
  succeeded: string[];
  failed: DispatchError[];
  /** members that were unavailable and received no command */
  skipped: string[];
  /** members already at their target */
  unchanged: string[];
};

export type Diagnostic =
  | { type: "inference-unknown"; memberId: string; reason: "no-evidence" | "ambiguous" }
  | { type: "inference-conflict"; memberId: string; control: number }
  | { type: "dispatch-failed"; memberId: string; message: string }
  | { type: "marker-expired"; memberId: string };

export type ReconcilerOptions = {
  markerTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
};

type PendingCommand = {
  target: MemberTarget;
  issuedAt: number;
};

function sameTarget(left: MemberTarget, right: MemberTarget): boolean {
  return left.on === right.on && left.brightness === right.brightness;
}

function sameState(left: ControlState, right: ControlState): boolean {
  return left.on === right.on && left.brightness === right.brightness;
}

function normalizeObservation(profile: LightProfile, state: MemberTarget): MemberTarget {
  if (!state.on) return { on: false };
  if (!profile.dimmable || state.brightness === undefined) return { on: true };
  return { on: true, brightness: clampPercent(state.brightness) };
}

function confirms(profile: LightProfile, expected: MemberTarget, observed: MemberTarget): boolean {
  if (expected.on !== observed.on) return false;
  if (!observed.on || !profile.dimmable) return true;
  if (expected.brightness === undefined || observed.brightness === undefined) return true;
  return Math.abs(expected.brightness - observed.brightness) <= INFERENCE_TOLERANCE;
}

function stateForControl(control: number): ControlState {
  return control > 0 ? { on: true, brightness: control } : { on: false };
}

/**
 * Control loop of one virtual light. Commands, observations and availability
 * changes are applied one at a time through a private queue.
 *
 * Every command sent to a member leaves a pending marker; the first matching
 * observation within the timeout is treated as the echo of that command and is
 * not interpreted. Anything else is an external change and drives inference.
 */
export class StateReconciler {
  private state: ControlState = { on: false };
  private control = 0;
  private lastBrightness = MAX_PERCENT;
  private readonly markers = new Map<string, PendingCommand>();
  private readonly known = new Map<string, MemberTarget>();
  private readonly observations = new Map<string, MemberObservation>();
  private readonly unavailable = new Set<string>();
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<(state: ControlState) => void>();
  private readonly diagnosticListeners = new Set<(diagnostic: Diagnostic) => void>();
  private unsubscribers: Array<() => void> = [];
  private readonly markerTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private mapper: GroupMapper,
    private readonly devices: DeviceControl,
    options: ReconcilerOptions = {},
  ) {
    this.markerTimeoutMs = Math.max(0, options.markerTimeoutMs ?? DEFAULT_MARKER_TIMEOUT_MS);
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /** Subscribes to state and availability of every member. */
  start(): void {
    if (this.unsubscribers.length > 0) return;
    for (const memberId of this.mapper.memberIds) {
      this.attach(memberId);
    }
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  getState(): ControlState {
    return { ...this.state };
  }

  getControl(): number {
    return this.control;
  }

  pendingMembers(): string[] {
    return [...this.markers.keys()];
  }

  observedMembers(): Map<string, MemberObservation> {
    return new Map(this.observations);
  }

  isAvailable(memberId: string): boolean {
    return !this.unavailable.has(memberId);
  }

  setState(on: boolean, brightness?: number): Promise<DispatchReport> {
    return this.queue.run(() => this.applyCommand(on, brightness));
  }

  observe(memberId: string, state: MemberTarget, timestamp: number): Promise<void> {
    return this.queue.run(() => this.applyObservation(memberId, state, timestamp));
  }

  setAvailability(memberId: string, available: boolean): Promise<void> {
    return this.queue.run(() => this.applyAvailability(memberId, available));
  }

  /** Replaces the whole mapping, e.g. after a member's curve or capability changed. */
  reconfigure(mapper: GroupMapper): Promise<void> {
    return this.queue.run(() => {
      const kept = new Set(mapper.memberIds);
      for (const memberId of this.mapper.memberIds) {
        if (kept.has(memberId)) continue;
        this.markers.delete(memberId);
        this.known.delete(memberId);
        this.observations.delete(memberId);
        this.unavailable.delete(memberId);
      }
      const previous = new Set(this.mapper.memberIds);
      this.mapper = mapper;
      // Last known targets were computed from the old curves.
      this.known.clear();
      if (this.unsubscribers.length > 0) {
        this.stop();
        for (const memberId of mapper.memberIds) this.attach(memberId);
      }
      this.logger.info(
        { added: mapper.memberIds.filter((memberId) => !previous.has(memberId)), members: mapper.memberIds.length },
        "Group reconfigured",
      );
    });
  }

  /** Resolves once every queued event has been applied. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  subscribe(listener: (state: ControlState) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  subscribeDiagnostics(listener: (diagnostic: Diagnostic) => void): () => void {
    this.diagnosticListeners.add(listener);
    return () => {
      this.diagnosticListeners.delete(listener);
    };
  }

  private attach(memberId: string): void {
    this.unsubscribers.push(
      this.devices.subscribe(memberId, (state, timestamp) => {
        this.observe(memberId, state, timestamp).catch((error: unknown) => {
          this.logger.error({ memberId, err: error }, "Failed to apply member observation");
        });
      }),
      this.devices.subscribeAvailability(memberId, (available) => {
        this.setAvailability(memberId, available).catch((error: unknown) => {
          this.logger.error({ memberId, err: error }, "Failed to apply member availability");
        });
      }),
    );
  }

  private targetControl(on: boolean, brightness?: number): number {
    if (!on) return 0;
    if (brightness === undefined) return this.lastBrightness;
    return clampPercent(brightness);
  }

  private async applyCommand(on: boolean, brightness?: number): Promise<DispatchReport> {
    const control = this.targetControl(on, brightness);
    const targets = this.mapper.forward(control);
    const skipped: string[] = [];
    const unchanged: string[] = [];
    const issued: Array<{ memberId: string; target: MemberTarget }> = [];

    for (const [memberId, target] of targets) {
      if (this.unavailable.has(memberId)) {
        skipped.push(memberId);
        continue;
      }
      const known = this.known.get(memberId);
      if (known && sameTarget(known, target)) {
        unchanged.push(memberId);
        continue;
      }
      this.markers.set(memberId, { target, issuedAt: this.now() });
      this.known.set(memberId, target);
      issued.push({ memberId, target });
    }

    this.updateState(control);
    this.logger.debug({ control, issued: issued.length, skipped, unchanged }, "Dispatching member commands");

    const outcomes = await Promise.all(
      issued.map(async ({ memberId, target }) => {
        try {
          await this.dispatch(memberId, target);
          return null;
        } catch (error) {
          return new DispatchError(memberId, error);
        }
      }),
    );

    const succeeded: string[] = [];
    const failed: DispatchError[] = [];
    outcomes.forEach((outcome, index) => {
      const { memberId } = issued[index];
      if (!outcome) {
        succeeded.push(memberId);
        return;
      }
      failed.push(outcome);
      // No echo will arrive for a command that never left.
      this.markers.delete(memberId);
      this.known.delete(memberId);
      this.logger.warn({ memberId, err: outcome.cause }, "Member command failed");
      this.emitDiagnostic({ type: "dispatch-failed", memberId, message: asErrorMessage(outcome.cause) });
    });

    return { state: this.getState(), control, succeeded, failed, skipped, unchanged };
  }

  private dispatch(memberId: string, target: MemberTarget): Promise<void> {
    if (target.on && target.brightness !== undefined) {
      return this.devices.setBrightness(memberId, target.brightness);
    }
    return this.devices.setOnOff(memberId, target.on);
  }

  private applyObservation(memberId: string, raw: MemberTarget, timestamp: number): void {
    const profile = this.mapper.profile(memberId);
    if (!profile) {
      this.logger.debug({ memberId }, "Ignoring observation for unknown member");
      return;
    }
    const state = normalizeObservation(profile, raw);

    const marker = this.markers.get(memberId);
    if (marker) {
      this.markers.delete(memberId);
      if (this.now() - marker.issuedAt > this.markerTimeoutMs) {
        this.emitDiagnostic({ type: "marker-expired", memberId });
      } else if (confirms(profile, marker.target, state)) {
        this.record(memberId, state, timestamp);
        return;
      }
    }

    const known = this.known.get(memberId);
    this.record(memberId, state, timestamp);
    if (this.unavailable.has(memberId)) return;
    if (known && sameTarget(known, state)) {
      // Repeated report of a state the member already had.
      this.logger.debug({ memberId }, "Ignoring unchanged member report");
      return;
    }

    const result = this.mapper.inferControl(this.availableObservations(), this.control);
    if (result.kind === "unknown") {
      this.logger.debug({ memberId, reason: result.reason }, "Could not infer control value");
      this.emitDiagnostic({ type: "inference-unknown", memberId, reason: result.reason });
      return;
    }
    if (result.conflict) {
      this.emitDiagnostic({ type: "inference-conflict", memberId: result.memberId, control: result.control });
    }
    this.logger.debug({ memberId, control: result.control, source: result.memberId }, "External change");
    this.updateState(result.control);
  }

  private applyAvailability(memberId: string, available: boolean): void {
    if (available) {
      if (this.unavailable.delete(memberId)) this.logger.info({ memberId }, "Member available");
      return;
    }
    if (this.unavailable.has(memberId)) return;
    this.unavailable.add(memberId);
    this.markers.delete(memberId);
    this.known.delete(memberId);
    this.logger.info({ memberId }, "Member unavailable");
  }

  private record(memberId: string, state: MemberTarget, timestamp: number): void {
    this.observations.set(memberId, { state, timestamp });
    this.known.set(memberId, state);
  }

  private availableObservations(): Map<string, MemberObservation> {
    const out = new Map<string, MemberObservation>();
    for (const [memberId, observation] of this.observations) {
      if (!this.unavailable.has(memberId)) out.set(memberId, observation);
    }
    return out;
  }

  private updateState(control: number): void {
    this.control = control;
    if (control > 0) this.lastBrightness = control;
    const next = stateForControl(control);
    if (sameState(next, this.state)) return;
    this.state = next;
    for (const listener of this.listeners) {
      listener(this.getState());
    }
  }

  private emitDiagnostic(diagnostic: Diagnostic): void {
    for (const listener of this.diagnosticListeners) {
      listener(diagnostic);
    }
  }
}
