import type { GroupDefinition } from "../config/types.js";
import type { DeviceControl } from "../devices/device-control.js";
import { RoutingDeviceControl } from "../devices/routing-device-control.js";
import { silentLogger } from "../logging/logger.js";
import { ConfigError, GroupNotFoundError } from "./errors.js";
import type { ReconcilerOptions } from "./state-reconciler.js";
import { VirtualLight } from "./virtual-light.js";

export class GroupStore {
  private groups = new Map<string, VirtualLight>();
  readonly devices: DeviceControl;

  constructor(definitions: GroupDefinition[], members: DeviceControl, options: ReconcilerOptions = {}) {
    const logger = options.logger ?? silentLogger;
    this.devices = new RoutingDeviceControl(members, (groupId) => this.get(groupId), options.now);
    for (const definition of definitions) {
      if (this.groups.has(definition.id)) {
        throw new ConfigError(`Group already exists: ${definition.id}`);
      }
      this.groups.set(
        definition.id,
        new VirtualLight(definition, this.devices, {
          ...options,
          logger: logger.child({ component: "reconciler", groupId: definition.id }),
        }),
      );
    }
  }

  list(): VirtualLight[] {
    return [...this.groups.values()];
  }

  get(id: string): VirtualLight | undefined {
    return this.groups.get(id);
  }

  require(id: string): VirtualLight {
    const group = this.get(id);
    if (!group) throw new GroupNotFoundError(id);
    return group;
  }

  /** True when some group lists `memberId` among its members. */
  hasMember(memberId: string): boolean {
    return this.list().some((group) => group.describe().members.some((member) => member.id === memberId));
  }

  startAll(): void {
    for (const group of this.groups.values()) group.start();
  }

  stopAll(): void {
    for (const group of this.groups.values()) group.stop();
  }
}
