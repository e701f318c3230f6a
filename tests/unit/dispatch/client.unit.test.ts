import net from "node:net";
import { describe, it, expect, afterEach, vi } from "vitest";
import { buildDispatchMessage, sendTemplate } from "../../../src/dispatch/client";
import { Template } from "../../../src/builder/template";
import type { EventLogger } from "../../../src/logging/event-logger";

type FakeClient = {
  port: number;
  received: string[];
  close: () => Promise<void>;
};

const servers: net.Server[] = [];

const listen = (server: net.Server): Promise<number> => {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server has no port"));
        return;
      }
      resolve(address.port);
    });
  });
};

const closeServer = (server: net.Server): Promise<void> => {
  return new Promise((resolve) => server.close(() => resolve()));
};

/** Stands in for the client item API: answers the first line with `reply`. */
const startFakeClient = async (reply: string): Promise<FakeClient> => {
  const received: string[] = [];
  const server = net.createServer((socket) => {
    let buffer = "";
    socket.setEncoding("utf-8");
    socket.on("error", () => undefined);
    socket.on("data", (chunk: string) => {
      buffer += chunk;
      const newline = buffer.indexOf("\n");
      if (newline === -1) return;
      received.push(buffer.slice(0, newline));
      socket.end(`${reply}\n`);
    });
  });
  servers.push(server);
  const port = await listen(server);
  return { port, received, close: () => closeServer(server) };
};

const createRecordingLogger = () => {
  const emitEvent = vi.fn();
  const eventLogger: EventLogger = { emitEvent, onEvent: vi.fn() };
  return { emitEvent, eventLogger };
};

describe("dispatch", () => {
  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => (server.listening ? closeServer(server) : undefined)));
  });

  describe("buildDispatchMessage", () => {
    it("should wrap the code in a template message terminated by a newline", () => {
      const message = buildDispatchMessage({ code: "H4sI", name: "event_Join" });

      expect(message.endsWith("\n")).toBe(true);
      expect(JSON.parse(message)).toEqual({
        type: "template",
        source: "dftemplate - event_Join",
        data: JSON.stringify({ name: "dftemplate Template - event_Join", data: "H4sI" }),
      });
    });
  });

  describe("sendTemplate", () => {
    it("should report success when the client accepts the template", async () => {
      const client = await startFakeClient('{"status":"success"}');
      const { emitEvent, eventLogger } = createRecordingLogger();

      const result = await sendTemplate({ code: "H4sI", name: "event_Join" }, { port: client.port, eventLogger });

      expect(result).toEqual({ status: "sent" });
      expect(client.received).toEqual([buildDispatchMessage({ code: "H4sI", name: "event_Join" }).trimEnd()]);
      expect(emitEvent).toHaveBeenCalledWith({ event: "dispatch-sent", name: "event_Join" });
    });

    it("should pass on the client's error message", async () => {
      const client = await startFakeClient('{"status":"error","error":"Not in dev mode"}');
      const { emitEvent, eventLogger } = createRecordingLogger();

      const result = await sendTemplate({ code: "H4sI", name: "x" }, { port: client.port, eventLogger });

      expect(result).toEqual({ status: "rejected", error: "Not in dev mode" });
      expect(emitEvent).toHaveBeenCalledWith({ event: "dispatch-rejected", name: "x", error: "Not in dev mode" });
    });

    it("should reject replies that are not status objects", async () => {
      const client = await startFakeClient("ok");

      const result = await sendTemplate({ code: "H4sI", name: "x" }, { port: client.port });

      expect(result).toEqual({ status: "rejected", error: "Unexpected reply from client: ok" });
    });

    it("should report an unavailable client without throwing", async () => {
      const server = net.createServer();
      const port = await listen(server);
      await closeServer(server);
      const { emitEvent, eventLogger } = createRecordingLogger();

      const result = await sendTemplate({ code: "H4sI", name: "x" }, { port, eventLogger });

      expect(result).toEqual({ status: "unavailable", message: `Could not connect to 127.0.0.1:${port}` });
      expect(emitEvent).toHaveBeenCalledWith({ event: "dispatch-unavailable", host: "127.0.0.1", port });
    });

    it("should send a built template from the builder", async () => {
      const client = await startFakeClient('{"status":"success"}');
      const template = new Template().playerEvent("Join").playerAction("SendMessage", ["hello"]);

      const sent = await template.buildAndSend({ port: client.port });

      expect(sent.name).toBe("event_Join");
      expect(sent.dispatch).toEqual({ status: "sent" });
      expect(client.received).toEqual([buildDispatchMessage({ code: sent.code, name: "event_Join" }).trimEnd()]);
    });
  });
});
