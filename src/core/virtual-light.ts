import { parseBreakpoints } from "../config/breakpoints.js";
import type { GroupDefinition, MemberDefinition } from "../config/types.js";
import type { DeviceControl } from "../devices/device-control.js";
import { CurveTable } from "./curve-table.js";
import type { Breakpoint } from "./curve-table.js";
import { ConfigError } from "./errors.js";
import { GroupMapper } from "./group-mapper.js";
import { LightProfile } from "./light-profile.js";
import type { Capability } from "./light-profile.js";
import { StateReconciler } from "./state-reconciler.js";
import type { ControlState, Diagnostic, DispatchReport, ReconcilerOptions } from "./state-reconciler.js";

export type MemberCurve = {
  memberId: string;
  name: string;
  capability: Capability;
  breakpoints: Breakpoint[];
  levels: number[];
};

export type MemberPatch = Pick<MemberDefinition, "capability" | "breakpoints">;

export function buildProfile(member: MemberDefinition): LightProfile {
  try {
    const table = CurveTable.build(parseBreakpoints(member.breakpoints));
    return new LightProfile(member.id, table, member.capability ?? "dimmable");
  } catch (error) {
    if (error instanceof ConfigError) throw new ConfigError(`${member.id}: ${error.message}`);
    throw error;
  }
}

export function buildMapper(definition: GroupDefinition): GroupMapper {
  return new GroupMapper(definition.members.map(buildProfile));
}

/** One configured group light: its definition plus the control loop driving it. */
export class VirtualLight {
  readonly reconciler: StateReconciler;
  private definition: GroupDefinition;
  private mapper: GroupMapper;

  constructor(definition: GroupDefinition, devices: DeviceControl, options: ReconcilerOptions = {}) {
    this.definition = structuredClone(definition);
    this.mapper = buildMapper(this.definition);
    this.reconciler = new StateReconciler(this.mapper, devices, {
      ...options,
      markerTimeoutMs: definition.markerTimeoutMs ?? options.markerTimeoutMs,
    });
  }

  get id(): string {
    return this.definition.id;
  }

  get name(): string {
    return this.definition.name;
  }

  describe(): GroupDefinition {
    return structuredClone(this.definition);
  }

  curves(): MemberCurve[] {
    return this.definition.members.map((member) => {
      const profile = this.mapper.profile(member.id);
      const table = profile?.table ?? CurveTable.identity();
      return {
        memberId: member.id,
        name: member.name ?? member.id,
        capability: profile?.capability ?? "dimmable",
        breakpoints: [...table.breakpoints],
        levels: table.levels(),
      };
    });
  }

  start(): void {
    this.reconciler.start();
  }

  stop(): void {
    this.reconciler.stop();
  }

  getState(): ControlState {
    return this.reconciler.getState();
  }

  setState(on: boolean, brightness?: number): Promise<DispatchReport> {
    return this.reconciler.setState(on, brightness);
  }

  subscribe(listener: (state: ControlState) => void): () => void {
    return this.reconciler.subscribe(listener);
  }

  subscribeDiagnostics(listener: (diagnostic: Diagnostic) => void): () => void {
    return this.reconciler.subscribeDiagnostics(listener);
  }

  /** Rebuilds the member's curve and capability; the group keeps its current control value. */
  async reconfigureMember(memberId: string, patch: MemberPatch): Promise<MemberCurve> {
    const index = this.definition.members.findIndex((member) => member.id === memberId);
    if (index < 0) {
      throw new ConfigError(`Unknown member ${memberId} in group ${this.id}`);
    }
    const members = [...this.definition.members];
    members[index] = {
      ...members[index],
      ...(patch.capability !== undefined ? { capability: patch.capability } : {}),
      ...(patch.breakpoints !== undefined ? { breakpoints: patch.breakpoints } : {}),
    };
    const definition = { ...this.definition, members };
    const mapper = buildMapper(definition);

    await this.reconciler.reconfigure(mapper);
    this.definition = definition;
    this.mapper = mapper;
    return this.curves()[index];
  }
}
