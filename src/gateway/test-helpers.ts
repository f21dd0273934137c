import { afterEach, beforeEach, type Mock, vi } from "vitest";

import { defaultConfig, type GatewayConfig, validateConfigObject } from "../config/config.js";
import type { GatewayConfigInput } from "../config/zod-schema.js";
import { setVerbose } from "../globals.js";
import { resetLogger, setLoggerOverride } from "../logging.js";
import type { AgentBackend, ChatAffinityHandle } from "./backend.js";
import { encodeFrame, type GatewayFrame } from "./protocol/index.js";
import type { GatewayCommandContext } from "./server-methods.js";

export function installGatewayTestHooks() {
  beforeEach(() => {
    setLoggerOverride({ level: "silent" });
  });
  afterEach(() => {
    setVerbose(false);
    resetLogger();
  });
}

export async function* chunks<T>(items: Iterable<T>, delayMs = 0): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
    yield item;
  }
}

export type FakeBackend = { [K in keyof AgentBackend]: Mock<AgentBackend[K]> };

export function createFakeBackend(): FakeBackend {
  return {
    chat: vi.fn<AgentBackend["chat"]>(() => chunks<string>([])),
    uploadDocument: vi.fn<AgentBackend["uploadDocument"]>(async ({ path }) => `stored/${path}`),
    uploadData: vi.fn<AgentBackend["uploadData"]>(async ({ fileName }) => `stored/${fileName}`),
    transcribe: vi.fn<AgentBackend["transcribe"]>(async () => null),
    notify: vi.fn<AgentBackend["notify"]>(async () => {}),
    listDir: vi.fn<AgentBackend["listDir"]>(async () => []),
    readFile: vi.fn<AgentBackend["readFile"]>(async () => ""),
    writeFile: vi.fn<AgentBackend["writeFile"]>(async () => "written"),
    deletePath: vi.fn<AgentBackend["deletePath"]>(async () => "deleted"),
    downloadFile: vi.fn<AgentBackend["downloadFile"]>(async () => "downloaded"),
    vmExecute: vi.fn<AgentBackend["vmExecute"]>(async () => ""),
    vmExecuteStream: vi.fn<AgentBackend["vmExecuteStream"]>(() => chunks<string>([])),
    vmSendInput: vi.fn<AgentBackend["vmSendInput"]>(async () => {}),
    vmSendKeys: vi.fn<AgentBackend["vmSendKeys"]>(async () => {}),
    listSessions: vi.fn<AgentBackend["listSessions"]>(async () => []),
    listSessionsInfo: vi.fn<AgentBackend["listSessionsInfo"]>(async () => []),
    listDocuments: vi.fn<AgentBackend["listDocuments"]>(async () => []),
    getMemory: vi.fn<AgentBackend["getMemory"]>(async () => ""),
    setMemory: vi.fn<AgentBackend["setMemory"]>(async () => "saved"),
    resetMemory: vi.fn<AgentBackend["resetMemory"]>(async () => "reset"),
    restartTerminal: vi.fn<AgentBackend["restartTerminal"]>(async () => {}),
  };
}

export type FakeChat = { [K in keyof ChatAffinityHandle]: Mock<ChatAffinityHandle[K]> };

export function createFakeChat(): FakeChat {
  return {
    chatStream: vi.fn<ChatAffinityHandle["chatStream"]>(() => chunks<string>([])),
    sendNotification: vi.fn<ChatAffinityHandle["sendNotification"]>(async () => {}),
  };
}

export function testConfig(input: GatewayConfigInput = {}): GatewayConfig {
  return validateConfigObject({ ...input, gateway: { host: "127.0.0.1", port: 0, ...input.gateway } });
}

export function makeContext(
  backend: AgentBackend,
  overrides: Partial<GatewayCommandContext> = {},
): GatewayCommandContext {
  return {
    user: "alice",
    session: "s1",
    think: false,
    config: defaultConfig(),
    backend,
    ...overrides,
  };
}

/** Drain a dispatch and return each frame as it would go on the wire. */
export async function collectWire(frames: AsyncIterable<GatewayFrame>): Promise<string[]> {
  const out: string[] = [];
  for await (const frame of frames) out.push(encodeFrame(frame));
  return out;
}
