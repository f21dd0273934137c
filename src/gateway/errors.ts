import { type ErrorCode, type ErrorShape, errorShape } from "./protocol/index.js";

/** Routing or parameter failure raised while dispatching one command. */
export class GatewayCommandError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, opts?: { details?: unknown; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "GatewayCommandError";
    this.code = code;
    this.details = opts?.details;
  }

  toShape(): ErrorShape {
    return errorShape(this.code, this.message, { details: this.details });
  }
}

export class GatewayLockError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = "GatewayLockError";
  }
}

/** No qualifying frame arrived within the request timeout. */
export class GatewayUnresponsiveError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = "Server did not respond in time") {
    super(message);
    this.name = "GatewayUnresponsiveError";
    this.timeoutMs = timeoutMs;
  }
}

/** The connection closed before a result or error envelope arrived. */
export class GatewayClosedError extends Error {
  readonly closeCode?: number;

  constructor(closeCode?: number, message = "Server closed connection without a result") {
    super(message);
    this.name = "GatewayClosedError";
    this.closeCode = closeCode;
  }
}

/** The server answered with an error envelope. */
export class GatewayRequestError extends Error {
  readonly command: string;
  readonly error: unknown;
  readonly code?: string;

  constructor(command: string, error: unknown) {
    super(`${command} failed: ${describeRemoteError(error)}`);
    this.name = "GatewayRequestError";
    this.command = command;
    this.error = error;
    const code = readField(error, "code");
    if (typeof code === "string") this.code = code;
  }
}

function readField(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object") return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

function describeRemoteError(error: unknown): string {
  if (typeof error === "string") return error;
  const message = readField(error, "message");
  if (typeof message === "string") return message;
  return JSON.stringify(error);
}

export function isGatewayCommandError(err: unknown): err is GatewayCommandError {
  return err instanceof GatewayCommandError;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  const status = readField(err, "status");
  const code = readField(err, "code");
  if (status || code) return `status=${String(status ?? "unknown")} code=${String(code ?? "unknown")}`;
  return JSON.stringify(err, null, 2) ?? String(err);
}

/** Node system error code (`EADDRINUSE`, `ENOENT`, ...) when present. */
export function errnoCode(err: unknown): string | undefined {
  const code = readField(err, "code");
  return typeof code === "string" ? code : undefined;
}

/** The server answered, but the result does not have the shape the call expects. */
export class GatewayResponseError extends Error {
  readonly command: string;
  readonly issues: string[];

  constructor(command: string, issues: string[]) {
    super(`unexpected ${command} result: ${issues.join("; ")}`);
    this.name = "GatewayResponseError";
    this.command = command;
    this.issues = issues;
  }
}
