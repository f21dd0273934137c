import type { GatewayConfig } from "../config/config.js";

/** Identity every backend call is scoped to, plus the `backend` config section. */
export type BackendScope = {
  user: string;
  session: string;
  config: GatewayConfig["backend"];
};

export type UserScope = Pick<BackendScope, "user" | "config">;

/** `[name, isDirectory]`, serialized as a two-element JSON array. */
export type DirEntry = [name: string, isDir: boolean];

/**
 * Operations the gateway relays. Implementations own chat generation, storage,
 * VM processes and notification delivery; the gateway only awaits them and
 * forwards what they return.
 */
export type AgentBackend = {
  chat: (params: BackendScope & { prompt: string; think: boolean }) => AsyncIterable<string>;
  uploadDocument: (params: BackendScope & { path: string }) => Promise<string>;
  uploadData: (params: BackendScope & { data: Buffer; fileName: string }) => Promise<string>;
  /** Resolves to the stored transcript location, or nothing when there is none. */
  transcribe: (params: BackendScope & { localPath: string }) => Promise<string | null | undefined>;
  notify: (params: BackendScope & { message: string }) => Promise<void>;
  listDir: (params: UserScope & { path: string }) => Promise<DirEntry[]>;
  readFile: (params: UserScope & { path: string }) => Promise<unknown>;
  writeFile: (params: UserScope & { path: string; content: string }) => Promise<unknown>;
  deletePath: (params: BackendScope & { path: string }) => Promise<unknown>;
  downloadFile: (params: BackendScope & { path: string; dest?: string }) => Promise<unknown>;
  vmExecute: (params: BackendScope & { command: string; timeout?: number }) => Promise<string>;
  vmExecuteStream: (params: BackendScope & { command: string; raw: boolean }) => AsyncIterable<string>;
  vmSendInput: (params: BackendScope & { data: string }) => Promise<void>;
  vmSendKeys: (params: BackendScope & { data: string; delayMs: number }) => Promise<void>;
  listSessions: (params: { user: string }) => Promise<unknown>;
  listSessionsInfo: (params: { user: string }) => Promise<unknown>;
  listDocuments: (params: { user: string }) => Promise<unknown>;
  getMemory: (params: { user: string }) => Promise<unknown>;
  setMemory: (params: { user: string; memory: string }) => Promise<unknown>;
  resetMemory: (params: { user: string }) => Promise<unknown>;
  restartTerminal: (params: BackendScope) => Promise<void>;
};

/** A pre-existing conversation the connection is bound to. */
export type ChatAffinityHandle = {
  chatStream: (prompt: string) => AsyncIterable<string>;
  sendNotification: (message: string) => Promise<void>;
};
