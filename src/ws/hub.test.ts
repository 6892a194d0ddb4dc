import { describe, expect, it } from "vitest";
import { WsHub } from "./hub.js";
import type { ClientEvent } from "./protocol.js";

class FakeSocket {
  readonly OPEN = 1;
  readyState = 1;
  readonly sent: string[] = [];
  private readonly handlers = new Map<string, (data: unknown) => void>();

  send(payload: string): void {
    this.sent.push(payload);
  }

  on(event: "message" | "close", listener: (data: unknown) => void): void {
    this.handlers.set(event, listener);
  }

  receive(raw: string): void {
    this.handlers.get("message")?.(Buffer.from(raw));
  }

  close(): void {
    this.readyState = 3;
    this.handlers.get("close")?.(undefined);
  }
}

describe("WsHub", () => {
  it("passes parsed client events to the handler", () => {
    const hub = new WsHub();
    const socket = new FakeSocket();
    const events: ClientEvent[] = [];
    hub.addClient(socket, (event) => events.push(event));

    socket.receive('{"type":"setState","payload":{"groupId":"living","on":true}}');

    expect(events).toEqual([{ type: "setState", payload: { groupId: "living", on: true } }]);
  });

  it("answers malformed messages with an error", () => {
    const hub = new WsHub();
    const socket = new FakeSocket();
    hub.addClient(socket, () => undefined);

    socket.receive("not json");

    expect(socket.sent).toEqual(['{"type":"error","payload":{"message":"Malformed client event"}}']);
  });

  it("broadcasts to open clients and forgets closed ones", () => {
    const hub = new WsHub();
    const first = new FakeSocket();
    const second = new FakeSocket();
    hub.addClient(first, () => undefined);
    hub.addClient(second, () => undefined);

    second.close();
    hub.broadcast({ type: "state", payload: { groupId: "living", state: { on: false } } });

    expect(hub.size).toBe(1);
    expect(first.sent).toEqual(['{"type":"state","payload":{"groupId":"living","state":{"on":false}}}']);
    expect(second.sent).toEqual([]);
  });
});
