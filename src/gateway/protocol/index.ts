import AjvPkg, { type ErrorObject, type ValidateFunction } from "ajv";

import {
  type ChatParams,
  ChatParamsSchema,
  type CommandFrame,
  CommandFrameSchema,
  type ConnectParams,
  type DownloadFileParams,
  DownloadFileParamsSchema,
  type ErrorCode,
  type ErrorShape,
  type PathParams,
  PathParamsSchema,
  type SendNotificationParams,
  SendNotificationParamsSchema,
  type SetMemoryParams,
  SetMemoryParamsSchema,
  type UploadDocumentParams,
  UploadDocumentParamsSchema,
  type VmExecuteParams,
  VmExecuteParamsSchema,
  type VmExecuteStreamParams,
  VmExecuteStreamParamsSchema,
  type VmInputParams,
  VmInputParamsSchema,
  type VmKeysParams,
  VmKeysParamsSchema,
  type WriteFileParams,
  WriteFileParamsSchema,
} from "./schema.js";

type AjvInstance = import("ajv").default;
const Ajv = AjvPkg as unknown as new (opts?: object) => AjvInstance;

const ajv = new Ajv({
  allErrors: true,
  strict: false,
  removeAdditional: false,
});

// Command arguments are loosely typed on the wire ("5" for 5, 1 for "1");
// coerce scalars the way the handlers expect them.
const paramsAjv = new Ajv({
  allErrors: true,
  strict: false,
  removeAdditional: false,
  coerceTypes: true,
});

export const validateCommandFrame = ajv.compile<CommandFrame>(CommandFrameSchema);

export const validateChatParams = paramsAjv.compile<ChatParams>(ChatParamsSchema);
export const validatePathParams = paramsAjv.compile<PathParams>(PathParamsSchema);
export const validateWriteFileParams = paramsAjv.compile<WriteFileParams>(WriteFileParamsSchema);
export const validateDownloadFileParams =
  paramsAjv.compile<DownloadFileParams>(DownloadFileParamsSchema);
export const validateVmExecuteParams = paramsAjv.compile<VmExecuteParams>(VmExecuteParamsSchema);
export const validateVmExecuteStreamParams = paramsAjv.compile<VmExecuteStreamParams>(
  VmExecuteStreamParamsSchema,
);
export const validateVmInputParams = paramsAjv.compile<VmInputParams>(VmInputParamsSchema);
export const validateVmKeysParams = paramsAjv.compile<VmKeysParams>(VmKeysParamsSchema);
export const validateSendNotificationParams = paramsAjv.compile<SendNotificationParams>(
  SendNotificationParamsSchema,
);
export const validateSetMemoryParams = paramsAjv.compile<SetMemoryParams>(SetMemoryParamsSchema);
export const validateUploadDocumentParams = paramsAjv.compile<UploadDocumentParams>(
  UploadDocumentParamsSchema,
);

export type ParamsValidator<T> = ValidateFunction<T>;

export function formatValidationErrors(errors: ErrorObject[] | null | undefined) {
  if (!errors || errors.length === 0) return "unknown validation error";
  return ajv.errorsText(errors, { separator: "; ", dataVar: "args" });
}

export const ErrorCodes = {
  INVALID_REQUEST: "INVALID_REQUEST",
  UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
  INVALID_PARAMS: "INVALID_PARAMS",
  UNAVAILABLE: "UNAVAILABLE",
} as const satisfies Record<ErrorCode, ErrorCode>;

export function errorShape(
  code: ErrorCode,
  message: string,
  opts?: { details?: unknown; retryable?: boolean },
): ErrorShape {
  return {
    code,
    message,
    ...(opts?.details !== undefined ? { details: opts.details } : {}),
    ...(opts?.retryable !== undefined ? { retryable: opts.retryable } : {}),
  };
}

export type EnvelopeBody = { result: unknown } | { error: unknown };

/** Exactly-once result, serialized as one JSON object. */
export type EnvelopeFrame = { kind: "envelope"; envelope: EnvelopeBody };

/** Unwrapped text chunk of a multi-part stream. */
export type RawFrame = { kind: "raw"; text: string };

export type GatewayFrame = EnvelopeFrame | RawFrame;

export function envelopeFrame(result: unknown): EnvelopeFrame {
  // JSON drops undefined members; keep the key so clients still see a result.
  return { kind: "envelope", envelope: { result: result === undefined ? null : result } };
}

export function errorFrame(error: ErrorShape): EnvelopeFrame {
  return { kind: "envelope", envelope: { error } };
}

export function rawFrame(text: string): RawFrame {
  return { kind: "raw", text };
}

export function encodeFrame(frame: GatewayFrame): string {
  if (frame.kind === "raw") return frame.text;
  return JSON.stringify(frame.envelope);
}

export type ParsedEnvelope = Record<string, unknown> & ({ result: unknown } | { error: unknown });

export type EnvelopeParseResult =
  | { kind: "envelope"; envelope: ParsedEnvelope }
  | { kind: "json"; value: unknown }
  | { kind: "not-json"; text: string };

function isEnvelopeRecord(value: unknown): value is ParsedEnvelope {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  return "result" in value || "error" in value;
}

/**
 * Classify a received text frame. Only JSON objects holding `result` or
 * `error` count as envelopes; other JSON and plain text are reported apart so
 * callers can skip them.
 */
export function parseEnvelope(text: string): EnvelopeParseResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { kind: "not-json", text };
  }
  if (isEnvelopeRecord(value)) return { kind: "envelope", envelope: value };
  return { kind: "json", value };
}

export { DEFAULT_KEY_DELAY_SECONDS, PROTOCOL_VERSION } from "./schema.js";
export type {
  ChatParams,
  CommandFrame,
  ConnectParams,
  DownloadFileParams,
  ErrorCode,
  ErrorShape,
  PathParams,
  SendNotificationParams,
  SetMemoryParams,
  UploadDocumentParams,
  VmExecuteParams,
  VmExecuteStreamParams,
  VmInputParams,
  VmKeysParams,
  WriteFileParams,
} from "./schema.js";
