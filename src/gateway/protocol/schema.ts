import { type Static, Type } from "@sinclair/typebox";

export const PROTOCOL_VERSION = 1 as const;

/** Seconds between simulated keystrokes when `vm_keys` omits `delay`. */
export const DEFAULT_KEY_DELAY_SECONDS = 0.05;

const NonEmptyString = Type.String({ minLength: 1 });

export const ErrorCodeSchema = Type.Union([
  Type.Literal("INVALID_REQUEST"),
  Type.Literal("UNKNOWN_COMMAND"),
  Type.Literal("INVALID_PARAMS"),
  Type.Literal("UNAVAILABLE"),
]);

export const ErrorShapeSchema = Type.Object(
  {
    code: ErrorCodeSchema,
    message: Type.String(),
    details: Type.Optional(Type.Unknown()),
    retryable: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

/** Client -> server. The only message a client sends on a connection. */
export const CommandFrameSchema = Type.Object(
  {
    command: NonEmptyString,
    args: Type.Optional(Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()])),
  },
  { additionalProperties: false },
);

export const ConnectParamsSchema = Type.Object(
  {
    user: NonEmptyString,
    session: NonEmptyString,
    think: Type.Boolean(),
  },
  { additionalProperties: false },
);

// Per-command argument objects. Unknown keys are tolerated so clients can pass
// extra context (team_chat "extra"). Null values are stripped before validation
// and count as absent.

export const ChatParamsSchema = Type.Object({
  prompt: Type.Optional(Type.String()),
});

export const PathParamsSchema = Type.Object({
  path: Type.String(),
});

export const WriteFileParamsSchema = Type.Object({
  path: Type.String(),
  content: Type.Optional(Type.String()),
});

export const DownloadFileParamsSchema = Type.Object({
  path: Type.String(),
  dest: Type.Optional(Type.String()),
});

export const VmExecuteParamsSchema = Type.Object({
  command: Type.String(),
  timeout: Type.Optional(Type.Number({ minimum: 0 })),
});

export const VmExecuteStreamParamsSchema = Type.Object({
  command: Type.String(),
  raw: Type.Optional(Type.Boolean()),
});

export const VmInputParamsSchema = Type.Object({
  data: Type.Optional(Type.String()),
});

export const VmKeysParamsSchema = Type.Object({
  data: Type.Optional(Type.String()),
  delay: Type.Optional(Type.Number({ minimum: 0 })),
});

export const SendNotificationParamsSchema = Type.Object({
  message: Type.String(),
});

export const SetMemoryParamsSchema = Type.Object({
  memory: Type.Optional(Type.String()),
});

export const UploadDocumentParamsSchema = Type.Object({
  file_path: Type.Optional(Type.String()),
  file_name: Type.Optional(Type.String()),
  // bytes arrive only in process; over the wire this is base64 text
  file_data: Type.Optional(Type.Unknown()),
});

export type ErrorCode = Static<typeof ErrorCodeSchema>;
export type ErrorShape = Static<typeof ErrorShapeSchema>;
export type CommandFrame = Static<typeof CommandFrameSchema>;
export type ConnectParams = Static<typeof ConnectParamsSchema>;
export type ChatParams = Static<typeof ChatParamsSchema>;
export type PathParams = Static<typeof PathParamsSchema>;
export type WriteFileParams = Static<typeof WriteFileParamsSchema>;
export type DownloadFileParams = Static<typeof DownloadFileParamsSchema>;
export type VmExecuteParams = Static<typeof VmExecuteParamsSchema>;
export type VmExecuteStreamParams = Static<typeof VmExecuteStreamParamsSchema>;
export type VmInputParams = Static<typeof VmInputParamsSchema>;
export type VmKeysParams = Static<typeof VmKeysParamsSchema>;
export type SendNotificationParams = Static<typeof SendNotificationParamsSchema>;
export type SetMemoryParams = Static<typeof SetMemoryParamsSchema>;
export type UploadDocumentParams = Static<typeof UploadDocumentParamsSchema>;
