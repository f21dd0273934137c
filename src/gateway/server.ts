import { randomUUID } from "node:crypto";
import { createServer as createHttpServer, type Server as HttpServer } from "node:http";

import { WebSocket, WebSocketServer } from "ws";

import { defaultConfig, type GatewayConfig } from "../config/config.js";
import { rawDataToString } from "../infra/ws.js";
import { configureLogger, createSubsystemLogger } from "../logging.js";
import type { AgentBackend, ChatAffinityHandle } from "./backend.js";
import { errnoCode, formatError, GatewayLockError, isGatewayCommandError } from "./errors.js";
import {
  type CommandFrame,
  type ConnectParams,
  encodeFrame,
  ErrorCodes,
  type ErrorShape,
  errorFrame,
  errorShape,
  formatValidationErrors,
  PROTOCOL_VERSION,
  validateCommandFrame,
} from "./protocol/index.js";
import { dispatchCommand, type GatewayCommandContext } from "./server-methods.js";
import { logWs } from "./ws-log.js";

const log = createSubsystemLogger("gateway");

export const DEFAULT_USER = "default";
export const DEFAULT_SESSION = "default";

export type ResolveChatAffinity = (
  params: ConnectParams,
) => ChatAffinityHandle | undefined | Promise<ChatAffinityHandle | undefined>;

export type GatewayServerOptions = {
  backend: AgentBackend;
  config?: GatewayConfig;
  /** Overrides `config.gateway.port`; 0 picks a free port. */
  port?: number;
  host?: string;
  resolveChatAffinity?: ResolveChatAffinity;
};

export type GatewayServer = {
  host: string;
  port: number;
  close: () => Promise<void>;
};

/** Connection identity from the upgrade URL query; fixed for the connection. */
export function parseConnectParams(requestUrl: string | undefined): ConnectParams {
  const url = new URL(requestUrl ?? "/", "ws://localhost");
  const user = url.searchParams.get("user")?.trim() || DEFAULT_USER;
  const session = url.searchParams.get("session")?.trim() || DEFAULT_SESSION;
  const think = url.searchParams.get("think")?.trim().toLowerCase();
  return { user, session, think: think === "true" || think === "1" };
}

function sendText(socket: WebSocket, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(text, (err) => (err ? reject(err) : resolve()));
  });
}

function closeSocket(socket: WebSocket, code: number, reason: string) {
  if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
    socket.close(code, reason);
  }
}

function parseCommandFrame(text: string): { ok: true; frame: CommandFrame } | { ok: false; error: ErrorShape } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      error: errorShape(ErrorCodes.INVALID_REQUEST, `invalid JSON: ${formatError(err)}`),
    };
  }
  if (!validateCommandFrame(parsed)) {
    return {
      ok: false,
      error: errorShape(
        ErrorCodes.INVALID_REQUEST,
        `invalid command frame: ${formatValidationErrors(validateCommandFrame.errors)}`,
      ),
    };
  }
  return { ok: true, frame: parsed };
}

function toErrorShape(err: unknown): ErrorShape {
  if (isGatewayCommandError(err)) return err.toShape();
  return errorShape(ErrorCodes.UNAVAILABLE, formatError(err));
}

type ConnectionState = {
  socket: WebSocket;
  connId: string;
  connect: ConnectParams;
  config: GatewayConfig;
  backend: AgentBackend;
  resolveChatAffinity?: ResolveChatAffinity;
};

async function runCommand(conn: ConnectionState, text: string) {
  const { socket, connId, connect } = conn;
  const parsed = parseCommandFrame(text);
  if (!parsed.ok) {
    logWs("out", "error", { connId, ok: false, error: parsed.error.message });
    await sendText(socket, encodeFrame(errorFrame(parsed.error)));
    return;
  }
  const { command, args } = parsed.frame;
  logWs("in", "cmd", { connId, command, user: connect.user, session: connect.session });

  let frames = 0;
  try {
    const chat = await conn.resolveChatAffinity?.(connect);
    const context: GatewayCommandContext = {
      user: connect.user,
      session: connect.session,
      think: connect.think,
      config: conn.config,
      backend: conn.backend,
      ...(chat ? { chat } : {}),
    };
    for await (const frame of dispatchCommand(command, args, context)) {
      // the peer left: stop pulling, which returns the handler's generator
      if (socket.readyState !== WebSocket.OPEN) break;
      await sendText(socket, encodeFrame(frame));
      frames += 1;
    }
    logWs("out", "done", { connId, command, ok: true, frames });
  } catch (err) {
    const shape = toErrorShape(err);
    log.warn(`command ${command} failed conn=${connId}: ${shape.message}`);
    logWs("out", "error", { connId, command, ok: false, frames, error: shape.message });
    if (socket.readyState === WebSocket.OPEN) {
      await sendText(socket, encodeFrame(errorFrame(shape)));
    }
  }
}

function attachConnection(conn: ConnectionState) {
  const { socket, connId } = conn;
  let received = false;

  logWs("in", "open", { connId, user: conn.connect.user, session: conn.connect.session });

  socket.on("message", (data) => {
    if (received) {
      log.warn(`ignoring extra message conn=${connId}: one command per connection`);
      return;
    }
    received = true;
    void runCommand(conn, rawDataToString(data))
      .catch((err) => log.error(`sending to conn=${connId} failed: ${formatError(err)}`))
      .finally(() => closeSocket(socket, 1000, "done"));
  });

  socket.on("error", (err) => {
    log.warn(`socket error conn=${connId}: ${formatError(err)}`);
  });

  socket.on("close", (code) => {
    logWs("out", "close", { connId, code });
  });
}

/** EADDRINUSE becomes a `GatewayLockError`; other bind failures propagate as they are. */
export async function listenGatewaySocket(httpServer: HttpServer, port: number, host: string) {
  try {
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        httpServer.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        httpServer.off("error", onError);
        resolve();
      };
      httpServer.once("error", onError);
      httpServer.once("listening", onListening);
      httpServer.listen(port, host);
    });
  } catch (err) {
    if (errnoCode(err) === "EADDRINUSE") {
      throw new GatewayLockError(
        `another gateway instance is already listening on ws://${host}:${port}`,
        err,
      );
    }
    throw err;
  }
}

export async function startGatewayServer(opts: GatewayServerOptions): Promise<GatewayServer> {
  const config = opts.config ?? defaultConfig();
  configureLogger(config.logging);
  const host = opts.host ?? config.gateway.host;
  const httpServer = createHttpServer((_req, res) => {
    res.writeHead(426, { "Content-Type": "text/plain" });
    res.end("Upgrade Required");
  });

  await listenGatewaySocket(httpServer, opts.port ?? config.gateway.port, host);

  const wss = new WebSocketServer({
    server: httpServer,
    maxPayload: config.gateway.maxPayloadBytes,
  });

  wss.on("connection", (socket, req) => {
    attachConnection({
      socket,
      connId: randomUUID(),
      connect: parseConnectParams(req.url),
      config,
      backend: opts.backend,
      resolveChatAffinity: opts.resolveChatAffinity,
    });
  });

  const address = httpServer.address();
  const port = address && typeof address === "object" ? address.port : (opts.port ?? config.gateway.port);
  log.info(`listening on ws://${host}:${port} (protocol ${PROTOCOL_VERSION})`);

  return {
    host,
    port,
    close: async () => {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      await new Promise<void>((resolve, reject) =>
        httpServer.close((err) => (err ? reject(err) : resolve())),
      );
    },
  };
}
