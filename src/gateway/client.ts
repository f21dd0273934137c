import { Buffer } from "node:buffer";

import { WebSocket } from "ws";
import { z } from "zod";

import type { GatewayConfig } from "../config/config.js";
import { DEFAULT_GATEWAY_PORT } from "../config/zod-schema.js";
import { rawDataToString } from "../infra/ws.js";
import { createSubsystemLogger } from "../logging.js";
import type { DirEntry } from "./backend.js";
import {
  GatewayClosedError,
  GatewayRequestError,
  GatewayResponseError,
  GatewayUnresponsiveError,
} from "./errors.js";
import {
  type CommandFrame,
  DEFAULT_KEY_DELAY_SECONDS,
  type ParsedEnvelope,
  parseEnvelope,
} from "./protocol/index.js";
import { formatForLog } from "./ws-log.js";

const log = createSubsystemLogger("gateway/client");

export const DEFAULT_CLIENT_HOST = "localhost";
export const DEFAULT_CLIENT_PORT = DEFAULT_GATEWAY_PORT;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_CHAT_IDLE_TIMEOUT_MS = 30_000;
export const DEFAULT_TRANSCRIPT_TIMEOUT_MS = 60_000;

export type GatewayClientOptions = {
  host?: string;
  port?: number;
  /** Per-frame wait for single-result calls. */
  requestTimeoutMs?: number;
  /** Quiet period that ends a chat stream. */
  chatIdleTimeoutMs?: number;
  /** How long an audio upload waits for its transcript frame. */
  transcriptTimeoutMs?: number;
};

/** Client settings from a loaded config: the gateway's own port and the `client` timeouts. */
export function clientOptionsFromConfig(config: GatewayConfig, host = DEFAULT_CLIENT_HOST): GatewayClientOptions {
  return {
    host,
    port: config.gateway.port,
    requestTimeoutMs: config.client.requestTimeoutMs,
    chatIdleTimeoutMs: config.client.chatIdleTimeoutMs,
    transcriptTimeoutMs: config.client.transcriptTimeoutMs,
  };
}

export type ConnectionIdentity = {
  user: string;
  session: string;
  think?: boolean;
};

export type RequestOptions = ConnectionIdentity & { timeoutMs?: number };

export type ChatStreamOptions = ConnectionIdentity & {
  /** Extra args merged over `{ prompt }`. */
  extra?: Record<string, string>;
  timeoutMs?: number;
};

export type VmStreamOptions = ConnectionIdentity & { raw?: boolean };

export type UploadInput =
  | { filePath: string }
  | { fileData: Uint8Array | string; fileName: string };

export type UploadResult = {
  location: string;
  transcript?: string;
};

type NextFrame = { kind: "frame"; data: string } | { kind: "closed"; code: number } | { kind: "timeout" };

/**
 * Buffers frames from one socket so callers can pull them one at a time with
 * a deadline. Frames received before a close are still delivered first.
 */
class FrameQueue {
  private readonly frames: string[] = [];
  private closedCode: number | null = null;
  private failure: Error | null = null;
  private waiter: ((next: NextFrame) => void) | null = null;
  private waiterReject: ((err: Error) => void) | null = null;
  private waiterTimer: NodeJS.Timeout | null = null;

  constructor(ws: WebSocket) {
    ws.on("message", (data) => {
      const text = rawDataToString(data);
      if (!this.settle({ kind: "frame", data: text })) this.frames.push(text);
    });
    ws.on("close", (code) => {
      this.closedCode = code;
      this.settle({ kind: "closed", code });
    });
    ws.on("error", (err) => {
      this.failure = err;
      const reject = this.waiterReject;
      this.clearWaiter();
      reject?.(err);
    });
  }

  private clearWaiter() {
    if (this.waiterTimer) clearTimeout(this.waiterTimer);
    this.waiter = null;
    this.waiterReject = null;
    this.waiterTimer = null;
  }

  private settle(next: NextFrame): boolean {
    const resolve = this.waiter;
    if (!resolve) return false;
    this.clearWaiter();
    resolve(next);
    return true;
  }

  /** Next frame, or `closed`, or `timeout` once `timeoutMs` passes without one. */
  next(timeoutMs?: number): Promise<NextFrame> {
    const queued = this.frames.shift();
    if (queued !== undefined) return Promise.resolve({ kind: "frame", data: queued });
    if (this.failure) return Promise.reject(this.failure);
    if (this.closedCode !== null) return Promise.resolve({ kind: "closed", code: this.closedCode });
    return new Promise<NextFrame>((resolve, reject) => {
      this.waiter = resolve;
      this.waiterReject = reject;
      if (timeoutMs !== undefined) {
        this.waiterTimer = setTimeout(() => this.settle({ kind: "timeout" }), timeoutMs);
      }
    });
  }
}

function sendText(ws: WebSocket, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(text, (err) => (err ? reject(err) : resolve()));
  });
}

function closeQuietly(ws: WebSocket) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.close(1000);
  } else if (ws.readyState === WebSocket.CONNECTING) {
    ws.terminate();
  }
}

const TextResultSchema = z
  .string()
  .nullable()
  .transform((value) => value ?? "");
const DirListingSchema = z.array(z.tuple([z.string(), z.boolean()]));
const SessionNamesSchema = z.array(z.string());
const InfoListSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Client for the gateway's WebSocket API. Every call opens its own
 * connection and closes it when the call is done; nothing is pooled.
 */
export class GatewayApiClient {
  readonly host: string;
  readonly port: number;
  private readonly requestTimeoutMs: number;
  private readonly chatIdleTimeoutMs: number;
  private readonly transcriptTimeoutMs: number;

  constructor(opts: GatewayClientOptions = {}) {
    this.host = opts.host ?? DEFAULT_CLIENT_HOST;
    this.port = opts.port ?? DEFAULT_CLIENT_PORT;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.chatIdleTimeoutMs = opts.chatIdleTimeoutMs ?? DEFAULT_CHAT_IDLE_TIMEOUT_MS;
    this.transcriptTimeoutMs = opts.transcriptTimeoutMs ?? DEFAULT_TRANSCRIPT_TIMEOUT_MS;
  }

  buildUri(user: string, session: string, think: boolean): string {
    const query = new URLSearchParams({ user, session, think: think ? "true" : "false" });
    return `ws://${this.host}:${this.port}/?${query.toString()}`;
  }

  private async open(identity: ConnectionIdentity, thinkDefault: boolean) {
    const uri = this.buildUri(identity.user, identity.session, identity.think ?? thinkDefault);
    const ws = new WebSocket(uri);
    // attach before open so no early frame is missed
    const queue = new FrameQueue(ws);
    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        ws.off("error", onError);
        resolve();
      };
      const onError = (err: Error) => {
        ws.off("open", onOpen);
        reject(err);
      };
      ws.once("open", onOpen);
      ws.once("error", onError);
    });
    return { ws, queue };
  }

  private async sendCommand(ws: WebSocket, command: string, args: Record<string, unknown>) {
    const frame: CommandFrame = { command, args };
    await sendText(ws, JSON.stringify(frame));
  }

  /**
   * Send one command and return the first envelope (`result` or `error`).
   * Frames that are not JSON are skipped.
   */
  async request(
    command: string,
    args: Record<string, unknown>,
    opts: RequestOptions,
  ): Promise<ParsedEnvelope> {
    const timeoutMs = opts.timeoutMs ?? this.requestTimeoutMs;
    const { ws, queue } = await this.open(opts, true);
    try {
      await this.sendCommand(ws, command, args);
      while (true) {
        const next = await queue.next(timeoutMs);
        if (next.kind === "timeout") throw new GatewayUnresponsiveError(timeoutMs);
        if (next.kind === "closed") throw new GatewayClosedError(next.code);
        const parsed = parseEnvelope(next.data);
        if (parsed.kind === "envelope") return parsed.envelope;
        if (parsed.kind === "not-json") {
          log.debug(`Ignoring non-JSON response: ${formatForLog(next.data)}`);
        }
      }
    } finally {
      closeQuietly(ws);
    }
  }

  private async *relay(
    command: string,
    args: Record<string, unknown>,
    identity: ConnectionIdentity,
    thinkDefault: boolean,
    idleTimeoutMs?: number,
  ): AsyncGenerator<string, void, undefined> {
    const { ws, queue } = await this.open(identity, thinkDefault);
    try {
      await this.sendCommand(ws, command, args);
      while (true) {
        const next = await queue.next(idleTimeoutMs);
        if (next.kind !== "frame") return;
        yield next.data;
      }
    } finally {
      closeQuietly(ws);
    }
  }

  /** Chat deltas for `prompt`; ends after a quiet period or when the server closes. */
  teamChatStream(prompt: string, opts: ChatStreamOptions): AsyncGenerator<string, void, undefined> {
    const args = { prompt, ...opts.extra };
    return this.relay("team_chat", args, opts, true, opts.timeoutMs ?? this.chatIdleTimeoutMs);
  }

  /** VM output for `command`; ends when the server closes the connection. */
  vmExecuteStream(command: string, opts: VmStreamOptions): AsyncGenerator<string, void, undefined> {
    return this.relay("vm_execute_stream", { command, raw: opts.raw ?? false }, opts, false);
  }

  private async call<T>(
    command: string,
    args: Record<string, unknown>,
    opts: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const envelope = await this.request(command, args, { ...opts, think: opts.think ?? false });
    if ("error" in envelope) throw new GatewayRequestError(command, envelope.error);
    const parsed = schema.safeParse(envelope.result);
    if (!parsed.success) {
      throw new GatewayResponseError(
        command,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "result"}: ${issue.message}`),
      );
    }
    return parsed.data;
  }

  async vmExecute(command: string, opts: RequestOptions & { timeout?: number }): Promise<string> {
    const { timeout, ...rest } = opts;
    const args: Record<string, unknown> = { command };
    if (timeout !== undefined) args.timeout = timeout;
    return await this.call("vm_execute", args, rest, TextResultSchema);
  }

  async vmSendInput(data: string, opts: RequestOptions): Promise<void> {
    await this.call("vm_input", { data }, opts, z.unknown());
  }

  async vmSendKeys(data: string, opts: RequestOptions & { delay?: number }): Promise<void> {
    const { delay = DEFAULT_KEY_DELAY_SECONDS, ...rest } = opts;
    await this.call("vm_keys", { data, delay }, rest, z.unknown());
  }

  async listDir(path: string, opts: RequestOptions): Promise<DirEntry[]> {
    return await this.call("list_dir", { path }, opts, DirListingSchema);
  }

  async readFile(path: string, opts: RequestOptions): Promise<string> {
    return await this.call("read_file", { path }, opts, TextResultSchema);
  }

  async writeFile(path: string, content: string, opts: RequestOptions): Promise<string> {
    return await this.call("write_file", { path, content }, opts, TextResultSchema);
  }

  async downloadFile(path: string, opts: RequestOptions & { dest?: string }): Promise<string> {
    const { dest, ...rest } = opts;
    return await this.call("download_file", { path, dest: dest ?? null }, rest, TextResultSchema);
  }

  async deletePath(path: string, opts: RequestOptions): Promise<string> {
    return await this.call("delete_path", { path }, opts, TextResultSchema);
  }

  async sendNotification(message: string, opts: RequestOptions): Promise<void> {
    await this.call("send_notification", { message }, opts, z.unknown());
  }

  async listSessions(opts: RequestOptions): Promise<string[]> {
    return await this.call("list_sessions", {}, opts, SessionNamesSchema);
  }

  async listSessionsInfo(opts: RequestOptions): Promise<Record<string, unknown>[]> {
    return await this.call("list_sessions_info", {}, opts, InfoListSchema);
  }

  async listDocuments(opts: RequestOptions): Promise<Record<string, unknown>[]> {
    return await this.call("list_documents", {}, opts, InfoListSchema);
  }

  async getMemory(opts: RequestOptions): Promise<string> {
    return await this.call("get_memory", {}, opts, TextResultSchema);
  }

  async setMemory(memory: string, opts: RequestOptions): Promise<string> {
    return await this.call("set_memory", { memory }, opts, TextResultSchema);
  }

  async resetMemory(opts: RequestOptions): Promise<string> {
    return await this.call("reset_memory", {}, opts, TextResultSchema);
  }

  async restartTerminal(opts: RequestOptions): Promise<string> {
    return await this.call("restart_terminal", {}, opts, TextResultSchema);
  }

  /**
   * Upload a file by path or by content. Audio uploads may be followed by a
   * transcript location; it is returned when it arrives before the server
   * closes the connection or `transcriptTimeoutMs` passes.
   */
  async uploadDocument(input: UploadInput, opts: RequestOptions): Promise<UploadResult> {
    const args: Record<string, unknown> =
      "filePath" in input
        ? { file_path: input.filePath }
        : {
            file_name: input.fileName,
            file_data:
              typeof input.fileData === "string"
                ? input.fileData
                : Buffer.from(input.fileData).toString("base64"),
          };
    const timeoutMs = opts.timeoutMs ?? this.requestTimeoutMs;
    const { ws, queue } = await this.open(opts, false);
    try {
      await this.sendCommand(ws, "upload_document", args);
      const first = await this.nextEnvelope(queue, timeoutMs);
      if (first.kind === "timeout") throw new GatewayUnresponsiveError(timeoutMs);
      if (first.kind === "closed") throw new GatewayClosedError(first.code);
      const location = this.readUploadResult(first.envelope);
      const second = await this.nextEnvelope(queue, this.transcriptTimeoutMs);
      if (second.kind !== "envelope") return { location };
      if ("error" in second.envelope) {
        log.debug(`upload follow-up error ignored: ${formatForLog(second.envelope.error)}`);
        return { location };
      }
      const transcript = TextResultSchema.safeParse(second.envelope.result);
      return transcript.success && transcript.data ? { location, transcript: transcript.data } : { location };
    } finally {
      closeQuietly(ws);
    }
  }

  private readUploadResult(envelope: ParsedEnvelope): string {
    if ("error" in envelope) throw new GatewayRequestError("upload_document", envelope.error);
    const parsed = TextResultSchema.safeParse(envelope.result);
    if (!parsed.success) {
      throw new GatewayResponseError("upload_document", ["result: expected a stored location"]);
    }
    return parsed.data;
  }

  private async nextEnvelope(
    queue: FrameQueue,
    timeoutMs: number,
  ): Promise<
    { kind: "envelope"; envelope: ParsedEnvelope } | { kind: "closed"; code: number } | { kind: "timeout" }
  > {
    while (true) {
      const next = await queue.next(timeoutMs);
      if (next.kind !== "frame") return next;
      const parsed = parseEnvelope(next.data);
      if (parsed.kind === "envelope") return parsed;
      log.debug(`Ignoring non-envelope frame: ${formatForLog(next.data)}`);
    }
  }
}
