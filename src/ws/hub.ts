import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { parseClientEvent } from "./protocol.js";
import type { ClientEvent, ServerEvent } from "./protocol.js";

type EventHandler = (event: ClientEvent, reply: (event: ServerEvent) => void) => void;
type WebSocketLike = {
  OPEN: number;
  readyState: number;
  send: (payload: string) => void;
  on: (event: "message" | "close", listener: (data: unknown) => void) => void;
};
type Connection = { socket: WebSocketLike } | WebSocketLike;

export class WsHub {
  private sockets = new Set<WebSocketLike>();

  constructor(private readonly logger: Logger = silentLogger) {}

  get size(): number {
    return this.sockets.size;
  }

  addClient(connection: Connection, onEvent: EventHandler): WebSocketLike {
    const socket = "socket" in connection ? connection.socket : connection;
    this.sockets.add(socket);
    this.logger.debug({ clients: this.sockets.size }, "WebSocket client added");

    const reply = (event: ServerEvent) => {
      if (socket.readyState === socket.OPEN) socket.send(JSON.stringify(event));
    };

    socket.on("message", (raw: unknown) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(String(raw));
      } catch {
        parsed = null;
      }
      const event = parseClientEvent(parsed);
      if (!event) {
        this.logger.debug({ raw: String(raw) }, "Malformed client event");
        reply({ type: "error", payload: { message: "Malformed client event" } });
        return;
      }
      onEvent(event, reply);
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
      this.logger.debug({ clients: this.sockets.size }, "WebSocket client closed");
    });

    return socket;
  }

  broadcast(event: ServerEvent): void {
    const payload = JSON.stringify(event);
    for (const socket of this.sockets) {
      if (socket.readyState === socket.OPEN) {
        socket.send(payload);
      }
    }
  }
}
