import { CurveTable } from "./curve-table.js";

export type Capability = "dimmable" | "onoff";

/** Desired or observed state of one member light. Brightness is a percentage, absent when off or binary. */
export type MemberTarget = {
  on: boolean;
  brightness?: number;
};

export class LightProfile {
  constructor(
    readonly memberId: string,
    readonly table: CurveTable,
    readonly capability: Capability,
  ) {}

  get dimmable(): boolean {
    return this.capability === "dimmable";
  }

  evaluate(control: number): MemberTarget {
    const output = this.table.forward(control);
    if (output <= 0) return { on: false };
    return this.dimmable ? { on: true, brightness: output } : { on: true };
  }
}
