import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import staticPlugin from "@fastify/static";
import mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import { loadRuntimeConfig } from "./config/load-config.js";
import type { MqttConnectionDefinition, RuntimeConfig } from "./config/types.js";
import { GroupStore } from "./core/group-store.js";
import type { DeviceControl } from "./devices/device-control.js";
import { MqttDeviceControl } from "./devices/mqtt-device-control.js";
import { SimulatedDeviceControl } from "./devices/simulated-device-control.js";
import { MqttExposure } from "./exposure/mqtt-exposure.js";
import { logLevel } from "./logging/logger.js";
import { MqttJsAdapter } from "./mqtt/mqtt-js-adapter.js";
import { registerRoutes, serializeReport, summarizeGroup } from "./api/routes.js";
import { WsHub } from "./ws/hub.js";
import { asErrorMessage } from "./core/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function toClientOptions(connection: MqttConnectionDefinition): IClientOptions {
  const options: IClientOptions = {};
  if (connection.clientId) options.clientId = connection.clientId;
  if (connection.username) options.username = connection.username;
  if (connection.password) options.password = connection.password;
  return options;
}

function connectBroker(app: FastifyInstance, connection: MqttConnectionDefinition): MqttClient {
  const log = app.log.child({ component: "mqtt" });
  const client = mqtt.connect(connection.brokerUrl, toClientOptions(connection));
  client.on("connect", () => log.info({ brokerUrl: connection.brokerUrl }, "MQTT connected"));
  client.on("reconnect", () => log.debug({ brokerUrl: connection.brokerUrl }, "MQTT reconnecting"));
  client.on("offline", () => log.warn({ brokerUrl: connection.brokerUrl }, "MQTT offline"));
  client.on("error", (error) => log.error({ brokerUrl: connection.brokerUrl, err: error }, "MQTT client error"));
  app.addHook("onClose", async () => {
    await client.endAsync();
  });
  return client;
}

async function buildServer(config: RuntimeConfig): Promise<FastifyInstance> {
  const app = Fastify({ logger: { level: logLevel() } });
  await app.register(cors, { origin: true });
  await app.register(websocket);
  await app.register(staticPlugin, {
    root: resolve(__dirname, "..", "public"),
  });

  const { transport } = config;
  const needsBroker = transport.members.type === "mqtt" || transport.exposure?.enabled === true;
  const client = needsBroker && transport.mqtt ? connectBroker(app, transport.mqtt) : null;
  const driver = client ? new MqttJsAdapter(client) : null;

  const simulator = transport.members.type === "simulator" ? new SimulatedDeviceControl() : undefined;
  let members: DeviceControl;
  if (transport.members.type === "mqtt") {
    if (!driver) throw new Error("MQTT members need a broker connection");
    members = new MqttDeviceControl(driver, {
      baseTopic: transport.members.baseTopic,
      brightnessScale: transport.members.brightnessScale,
      logger: app.log.child({ component: "members" }),
    });
  } else {
    members = simulator ?? new SimulatedDeviceControl();
  }

  const store = new GroupStore(config.groups, members, {
    markerTimeoutMs: config.markerTimeoutMs,
    logger: app.log,
  });
  const wsHub = new WsHub(app.log.child({ component: "ws" }));

  for (const group of store.list()) {
    group.subscribe((state) => {
      wsHub.broadcast({ type: "state", payload: { groupId: group.id, state } });
    });
    group.subscribeDiagnostics((diagnostic) => {
      app.log.debug({ groupId: group.id, diagnostic }, "Group diagnostic");
      wsHub.broadcast({ type: "diagnostic", payload: { groupId: group.id, diagnostic } });
    });
  }

  await registerRoutes(app, { store, simulator });

  app.get("/ws", { websocket: true }, (connection) => {
    const socket = wsHub.addClient(connection, (event, reply) => {
      switch (event.type) {
        case "setState": {
          const group = store.get(event.payload.groupId);
          if (!group) {
            reply({ type: "error", payload: { message: `Group not found: ${event.payload.groupId}` } });
            return;
          }
          group
            .setState(event.payload.on, event.payload.brightness)
            .then((report) => {
              app.log.debug({ groupId: group.id, report: serializeReport(report) }, "Handled WS setState");
            })
            .catch((error: unknown) => {
              reply({ type: "error", payload: { message: asErrorMessage(error) } });
            });
          break;
        }
      }
    });
    socket.send(JSON.stringify({ type: "groups", payload: store.list().map(summarizeGroup) }));
  });

  app.get("/", async (_, reply) => {
    return reply.sendFile("index.html");
  });

  store.startAll();
  app.addHook("onClose", async () => {
    store.stopAll();
  });

  if (client && driver && transport.exposure?.enabled) {
    const exposure = new MqttExposure(
      driver,
      store.list(),
      transport.exposure,
      app.log.child({ component: "exposure" }),
    );
    exposure.attach();
    client.on("connect", () => {
      exposure.announce().catch((error: unknown) => {
        app.log.error({ err: error }, "Failed to announce groups over MQTT");
      });
    });
    app.addHook("onClose", async () => {
      await exposure.detach().catch((error: unknown) => {
        app.log.warn({ err: error }, "Failed to publish offline availability");
      });
    });
  }

  return app;
}

const config = await loadRuntimeConfig();
const port = Number(process.env.PORT ?? 3000);
const app = await buildServer(config);
await app.listen({ port, host: "0.0.0.0" });
