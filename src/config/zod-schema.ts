import { z } from "zod";

import { ALLOWED_LOG_LEVELS } from "../logging.js";

export const DEFAULT_GATEWAY_PORT = 8765;

export const StreamingCoalesceSchema = z
  .object({
    minChars: z.number().int().positive().default(256),
    idleMs: z.number().int().nonnegative().default(50),
  })
  .strict();

export const GatewaySchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(0).max(65535).default(DEFAULT_GATEWAY_PORT),
    maxPayloadBytes: z
      .number()
      .int()
      .positive()
      .default(64 * 1024 * 1024),
  })
  .strict();

export const ClientSchema = z
  .object({
    requestTimeoutMs: z.number().int().positive().default(10_000),
    chatIdleTimeoutMs: z.number().int().positive().default(30_000),
    transcriptTimeoutMs: z.number().int().positive().default(60_000),
  })
  .strict();

export const LoggingSchema = z
  .object({
    level: z.enum(ALLOWED_LOG_LEVELS).default("info"),
    consoleStyle: z.union([z.literal("pretty"), z.literal("json")]).default("pretty"),
  })
  .strict();

export const GatewayConfigSchema = z
  .object({
    gateway: GatewaySchema.default({}),
    uploads: z
      .object({
        dir: z.string().min(1).default("uploads"),
      })
      .strict()
      .default({}),
    streaming: z
      .object({
        coalesce: StreamingCoalesceSchema.default({}),
      })
      .strict()
      .default({}),
    client: ClientSchema.default({}),
    logging: LoggingSchema.default({}),
    /** Opaque settings handed to every backend operation. */
    backend: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type StreamingCoalesceConfig = z.infer<typeof StreamingCoalesceSchema>;
