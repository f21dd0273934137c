import { createServer } from "node:http";

import { afterEach, describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";

import { rawDataToString } from "../infra/ws.js";
import { GatewayApiClient } from "./client.js";
import { GatewayLockError, GatewayRequestError } from "./errors.js";
import {
  type GatewayServer,
  type GatewayServerOptions,
  listenGatewaySocket,
  parseConnectParams,
  startGatewayServer,
} from "./server.js";
import {
  chunks,
  createFakeBackend,
  createFakeChat,
  type FakeBackend,
  installGatewayTestHooks,
  testConfig,
} from "./test-helpers.js";

installGatewayTestHooks();

const servers: GatewayServer[] = [];

afterEach(async () => {
  await Promise.all(servers.splice(0).map((server) => server.close()));
});

async function startServerWithClient(
  backend: FakeBackend,
  opts: Omit<GatewayServerOptions, "backend"> = {},
) {
  const server = await startGatewayServer({ backend, config: testConfig(), ...opts });
  servers.push(server);
  const client = new GatewayApiClient({ host: server.host, port: server.port });
  return { server, client };
}

const ids = { user: "alice", session: "s1" };

/** Send one raw text frame and collect everything until the server closes. */
async function rawExchange(port: number, text: string) {
  const ws = new WebSocket(`ws://127.0.0.1:${port}/?user=alice&session=s1`);
  const frames: string[] = [];
  ws.on("message", (data) => frames.push(rawDataToString(data)));
  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });
  const closed = new Promise<{ code: number; reason: string }>((resolve) => {
    ws.once("close", (code, reason) => resolve({ code, reason: reason.toString() }));
  });
  ws.send(text);
  return { frames, ...(await closed) };
}

describe("parseConnectParams", () => {
  it("reads identity from the query", () => {
    expect(parseConnectParams("/?user=bob&session=work&think=1")).toEqual({
      user: "bob",
      session: "work",
      think: true,
    });
    expect(parseConnectParams("/?think=TRUE")).toEqual({
      user: "default",
      session: "default",
      think: true,
    });
  });

  it("defaults everything when the query is missing", () => {
    expect(parseConnectParams(undefined)).toEqual({
      user: "default",
      session: "default",
      think: false,
    });
    expect(parseConnectParams("/?user=&think=false").user).toBe("default");
  });
});

describe("gateway server", () => {
  it("answers a directory listing over the socket", async () => {
    const backend = createFakeBackend();
    backend.listDir.mockResolvedValue([
      ["a.txt", false],
      ["sub", true],
    ]);
    const { client } = await startServerWithClient(backend);
    await expect(client.listDir(".", ids)).resolves.toEqual([
      ["a.txt", false],
      ["sub", true],
    ]);
    expect(backend.listDir.mock.calls[0]?.[0]).toMatchObject({ path: ".", user: "alice" });
  });

  it("runs vm_execute with the requested timeout", async () => {
    const backend = createFakeBackend();
    backend.vmExecute.mockResolvedValue("hi\n");
    const { client } = await startServerWithClient(backend);
    await expect(client.vmExecute("echo hi", { ...ids, timeout: 5 })).resolves.toBe("hi\n");
    expect(backend.vmExecute.mock.calls[0]?.[0]).toMatchObject({
      user: "alice",
      session: "s1",
      command: "echo hi",
      timeout: 5,
    });
  });

  it("reports an unknown command as one error envelope", async () => {
    const { client } = await startServerWithClient(createFakeBackend());
    await expect(client.request("no_such_command", {}, ids)).resolves.toEqual({
      error: { code: "UNKNOWN_COMMAND", message: "Unknown command: no_such_command" },
    });
  });

  it("maps backend failures to UNAVAILABLE", async () => {
    const backend = createFakeBackend();
    backend.readFile.mockRejectedValue(new Error("disk gone"));
    const { client } = await startServerWithClient(backend);
    const failure = client.readFile("a.txt", ids);
    await expect(failure).rejects.toBeInstanceOf(GatewayRequestError);
    await expect(failure).rejects.toMatchObject({
      message: "read_file failed: disk gone",
      code: "UNAVAILABLE",
    });
  });

  it("streams chat deltas and ends when the server closes", async () => {
    const backend = createFakeBackend();
    backend.chat.mockImplementation(() => chunks(["Hel", "lo"]));
    const { client } = await startServerWithClient(backend);
    const parts: string[] = [];
    for await (const part of client.teamChatStream("hi", ids)) parts.push(part);
    expect(parts).toEqual(["Hel", "lo"]);
    expect(backend.chat.mock.calls[0]?.[0]).toMatchObject({
      user: "alice",
      session: "s1",
      prompt: "hi",
      think: true,
    });
  });

  it("relays vm output chunk by chunk when raw is off", async () => {
    const backend = createFakeBackend();
    backend.vmExecuteStream.mockImplementation(() => chunks(["a\n", "b\n"], 5));
    const { client } = await startServerWithClient(backend);
    const parts: string[] = [];
    for await (const part of client.vmExecuteStream("ls", ids)) parts.push(part);
    expect(parts).toEqual(["a\n", "b\n"]);
  });

  it("tears down the handler when the client leaves mid-stream", async () => {
    const backend = createFakeBackend();
    let closed = false;
    backend.chat.mockImplementation(async function* () {
      try {
        while (true) {
          await new Promise((resolve) => setTimeout(resolve, 10));
          yield "tick";
        }
      } finally {
        closed = true;
      }
    });
    const { client } = await startServerWithClient(backend);
    for await (const part of client.teamChatStream("go", ids)) {
      expect(part).toBe("tick");
      break;
    }
    await vi.waitFor(() => expect(closed).toBe(true));
  });

  it("returns the transcript for an audio upload", async () => {
    const backend = createFakeBackend();
    backend.uploadData.mockResolvedValue("docs/memo.mp3");
    backend.transcribe.mockResolvedValue("docs/memo.txt");
    const { client } = await startServerWithClient(backend);
    await expect(
      client.uploadDocument({ fileData: new Uint8Array([82, 73, 70, 70]), fileName: "memo.mp3" }, ids),
    ).resolves.toEqual({ location: "docs/memo.mp3", transcript: "docs/memo.txt" });
    expect(backend.uploadData.mock.calls[0]?.[0].data).toEqual(Buffer.from("RIFF"));
  });

  it("returns only the location for other uploads", async () => {
    const backend = createFakeBackend();
    backend.uploadDocument.mockResolvedValue("docs/report.pdf");
    const { client } = await startServerWithClient(backend);
    await expect(client.uploadDocument({ filePath: "/data/report.pdf" }, ids)).resolves.toEqual({
      location: "docs/report.pdf",
    });
  });

  it("hands the bound chat to restart_terminal", async () => {
    const backend = createFakeBackend();
    const chat = createFakeChat();
    const resolveChatAffinity = vi.fn(() => chat);
    const { client } = await startServerWithClient(backend, { resolveChatAffinity });
    await expect(client.restartTerminal(ids)).resolves.toBe("restarted");
    expect(resolveChatAffinity).toHaveBeenCalledWith({ user: "alice", session: "s1", think: false });
    expect(chat.sendNotification).toHaveBeenCalledWith("VM terminal restarted");
  });

  it("answers malformed JSON with INVALID_REQUEST and closes", async () => {
    const { server } = await startServerWithClient(createFakeBackend());
    const { frames, code, reason } = await rawExchange(server.port, "{not json");
    expect(frames).toHaveLength(1);
    const reply: unknown = JSON.parse(frames[0] ?? "");
    expect(reply).toMatchObject({ error: { code: "INVALID_REQUEST" } });
    expect(code).toBe(1000);
    expect(reason).toBe("done");
  });

  it("rejects a frame without a command", async () => {
    const { server } = await startServerWithClient(createFakeBackend());
    const { frames } = await rawExchange(server.port, JSON.stringify({ args: {} }));
    const reply: unknown = JSON.parse(frames[0] ?? "");
    expect(reply).toMatchObject({ error: { code: "INVALID_REQUEST" } });
  });

  it("closes with 1000 after a single command", async () => {
    const backend = createFakeBackend();
    backend.getMemory.mockResolvedValue("remember the milk");
    const { server } = await startServerWithClient(backend);
    const { frames, code } = await rawExchange(
      server.port,
      JSON.stringify({ command: "get_memory", args: null }),
    );
    expect(frames).toEqual(['{"result":"remember the milk"}']);
    expect(code).toBe(1000);
  });

  it("refuses to bind a port that is already taken", async () => {
    const { server } = await startServerWithClient(createFakeBackend());
    await expect(
      startGatewayServer({ backend: createFakeBackend(), config: testConfig(), port: server.port }),
    ).rejects.toBeInstanceOf(GatewayLockError);
  });

  it("passes other bind failures through unchanged", async () => {
    const httpServer = createServer();
    const denied = Object.assign(new Error("listen EACCES: permission denied"), { code: "EACCES" });
    vi.spyOn(httpServer, "listen").mockImplementation(() => {
      httpServer.emit("error", denied);
      return httpServer;
    });
    await expect(listenGatewaySocket(httpServer, 80, "127.0.0.1")).rejects.toBe(denied);
  });
});
