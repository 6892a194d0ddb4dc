import type { FastifyInstance } from "fastify";
import { parseBreakpoints } from "../config/breakpoints.js";
import type { BreakpointInput, MemberDefinition } from "../config/types.js";
import { CurveTable } from "../core/curve-table.js";
import { asErrorMessage, ConfigError } from "../core/errors.js";
import type { GroupStore } from "../core/group-store.js";
import type { Capability, MemberTarget } from "../core/light-profile.js";
import type { DispatchReport } from "../core/state-reconciler.js";
import type { VirtualLight } from "../core/virtual-light.js";
import type { SimulatedDeviceControl } from "../devices/simulated-device-control.js";
import type { GroupSummary } from "../ws/protocol.js";

type StateBody = { on?: unknown; brightness?: unknown };
type MemberBody = { capability?: unknown; breakpoints?: unknown };

export function summarizeGroup(group: VirtualLight): GroupSummary {
  const definition = group.describe();
  return {
    id: group.id,
    name: group.name,
    members: definition.members.map((member) => ({
      id: member.id,
      name: member.name ?? member.id,
      capability: member.capability ?? "dimmable",
      available: group.reconciler.isAvailable(member.id),
    })),
    state: group.getState(),
  };
}

export function serializeReport(report: DispatchReport) {
  return {
    state: report.state,
    control: report.control,
    succeeded: report.succeeded,
    failed: report.failed.map((failure) => ({ memberId: failure.memberId, message: failure.message })),
    skipped: report.skipped,
    unchanged: report.unchanged,
  };
}

function parseStateBody(body: StateBody | undefined): MemberTarget | string {
  if (!body || typeof body.on !== "boolean") return "Body requires a boolean on";
  if (body.brightness === undefined) return { on: body.on };
  if (typeof body.brightness !== "number" || !Number.isFinite(body.brightness)) {
    return "Brightness must be a number";
  }
  if (body.brightness < 0 || body.brightness > 100) return "Brightness must be between 0 and 100";
  return { on: body.on, brightness: body.brightness };
}

function parseCapability(value: unknown): Capability | undefined | string {
  if (value === undefined) return undefined;
  if (value === "dimmable" || value === "onoff") return value;
  return "Capability must be dimmable or onoff";
}

function isBreakpointInput(value: unknown): value is BreakpointInput {
  return typeof value === "string" || Array.isArray(value) || (typeof value === "object" && value !== null);
}

export async function registerRoutes(
  app: FastifyInstance,
  deps: {
    store: GroupStore;
    simulator?: SimulatedDeviceControl;
  },
): Promise<void> {
  app.get("/health", async () => ({ ok: true }));

  app.get("/api/groups", async () => deps.store.list().map(summarizeGroup));

  app.get<{ Params: { id: string } }>("/api/groups/:id", async (request, reply) => {
    const group = deps.store.get(request.params.id);
    if (!group) {
      reply.code(404);
      return { error: "Group not found" };
    }
    return { ...summarizeGroup(group), definition: group.describe() };
  });

  app.get<{ Params: { id: string } }>("/api/groups/:id/state", async (request, reply) => {
    const group = deps.store.get(request.params.id);
    if (!group) {
      reply.code(404);
      return { error: "Group not found" };
    }
    return group.getState();
  });

  app.post<{ Params: { id: string }; Body: StateBody }>("/api/groups/:id/state", async (request, reply) => {
    const group = deps.store.get(request.params.id);
    if (!group) {
      reply.code(404);
      return { error: "Group not found" };
    }
    const target = parseStateBody(request.body);
    if (typeof target === "string") {
      reply.code(400);
      return { error: target };
    }
    const report = await group.setState(target.on, target.brightness);
    if (report.failed.length > 0) {
      request.log.warn(
        { groupId: group.id, failed: report.failed.map((failure) => failure.memberId) },
        "Group command partially failed",
      );
    }
    return serializeReport(report);
  });

  app.get<{ Params: { id: string } }>("/api/groups/:id/curves", async (request, reply) => {
    const group = deps.store.get(request.params.id);
    if (!group) {
      reply.code(404);
      return { error: "Group not found" };
    }
    return group.curves();
  });

  app.put<{ Params: { id: string; memberId: string }; Body: MemberBody }>(
    "/api/groups/:id/members/:memberId",
    async (request, reply) => {
      const group = deps.store.get(request.params.id);
      if (!group) {
        reply.code(404);
        return { error: "Group not found" };
      }
      const capability = parseCapability(request.body?.capability);
      if (typeof capability === "string") {
        reply.code(400);
        return { error: capability };
      }
      const breakpoints = request.body?.breakpoints;
      if (breakpoints !== undefined && !isBreakpointInput(breakpoints)) {
        reply.code(400);
        return { error: "Breakpoints must be text, a list of pairs or an object" };
      }
      const patch: Pick<MemberDefinition, "capability" | "breakpoints"> = {};
      if (capability !== undefined) patch.capability = capability;
      if (breakpoints !== undefined) patch.breakpoints = breakpoints;

      try {
        return await group.reconfigureMember(request.params.memberId, patch);
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        reply.code(400);
        return { error: asErrorMessage(error) };
      }
    },
  );

  app.post<{ Body: { breakpoints?: unknown } }>("/api/curves/preview", async (request, reply) => {
    const breakpoints = request.body?.breakpoints;
    if (breakpoints !== undefined && !isBreakpointInput(breakpoints)) {
      reply.code(400);
      return { error: "Breakpoints must be text, a list of pairs or an object" };
    }
    try {
      const table = CurveTable.build(parseBreakpoints(breakpoints));
      return { breakpoints: table.breakpoints, levels: table.levels() };
    } catch (error) {
      reply.code(400);
      return { error: asErrorMessage(error) };
    }
  });

  const simulator = deps.simulator;
  if (simulator) {
    app.post<{ Params: { memberId: string }; Body: StateBody & { available?: unknown } }>(
      "/api/simulator/members/:memberId",
      async (request, reply) => {
        const { memberId } = request.params;
        if (!deps.store.hasMember(memberId)) {
          reply.code(404);
          return { error: "Member not found" };
        }
        if (typeof request.body?.available === "boolean") {
          simulator.setAvailable(memberId, request.body.available);
          if (request.body.on === undefined) {
            reply.code(204);
            return null;
          }
        }
        const target = parseStateBody(request.body);
        if (typeof target === "string") {
          reply.code(400);
          return { error: target };
        }
        simulator.applyExternal(memberId, target);
        return simulator.getState(memberId);
      },
    );
  }
}
