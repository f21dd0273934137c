import type { GatewayConfig } from "../../config/config.js";
import type { AgentBackend, BackendScope, ChatAffinityHandle } from "../backend.js";
import { GatewayCommandError } from "../errors.js";
import {
  ErrorCodes,
  formatValidationErrors,
  type GatewayFrame,
  type ParamsValidator,
} from "../protocol/index.js";

export type CommandArgs = Record<string, unknown>;

/** Fixed for the lifetime of one dispatched command. */
export type GatewayCommandContext = {
  readonly user: string;
  readonly session: string;
  readonly think: boolean;
  readonly config: GatewayConfig;
  readonly backend: AgentBackend;
  /** Existing conversation to reuse; absent means one-off generation. */
  readonly chat?: ChatAffinityHandle;
};

/** Nullish items are dropped by the dispatcher, never sent. */
export type GatewayCommandHandler = (
  args: CommandArgs,
  context: GatewayCommandContext,
) => AsyncIterable<GatewayFrame | null | undefined>;

export type GatewayCommandHandlers = Record<string, GatewayCommandHandler>;

export function backendScope(context: GatewayCommandContext): BackendScope {
  return { user: context.user, session: context.session, config: context.config.backend };
}

function withoutNullish(args: CommandArgs): CommandArgs {
  const out: CommandArgs = {};
  for (const [key, value] of Object.entries(args)) {
    if (value === null || value === undefined) continue;
    out[key] = value;
  }
  return out;
}

/**
 * Validate (and coerce) one command's arguments. Null values count as absent.
 * Throws INVALID_PARAMS before the handler produces anything.
 */
export function assertParams<T>(validator: ParamsValidator<T>, command: string, args: CommandArgs): T {
  const params = withoutNullish(args);
  if (!validator(params)) {
    throw new GatewayCommandError(
      ErrorCodes.INVALID_PARAMS,
      `invalid ${command} params: ${formatValidationErrors(validator.errors)}`,
    );
  }
  return params;
}
