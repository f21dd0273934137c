import { GatewayCommandError } from "./errors.js";
import { ErrorCodes, type GatewayFrame } from "./protocol/index.js";
import { chatHandlers } from "./server-methods/chat.js";
import { fileHandlers } from "./server-methods/files.js";
import { notificationHandlers } from "./server-methods/notifications.js";
import { sessionHandlers } from "./server-methods/sessions.js";
import type {
  CommandArgs,
  GatewayCommandContext,
  GatewayCommandHandler,
  GatewayCommandHandlers,
} from "./server-methods/types.js";
import { uploadHandlers } from "./server-methods/uploads.js";
import { vmHandlers } from "./server-methods/vm.js";

export type {
  CommandArgs,
  GatewayCommandContext,
  GatewayCommandHandler,
  GatewayCommandHandlers,
} from "./server-methods/types.js";

/** Short names that resolve to another command's handler. */
export const COMMAND_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  chat: "team_chat",
});

function buildRegistry(): Readonly<GatewayCommandHandlers> {
  const registry: GatewayCommandHandlers = {
    ...chatHandlers,
    ...uploadHandlers,
    ...fileHandlers,
    ...vmHandlers,
    ...notificationHandlers,
    ...sessionHandlers,
  };
  for (const [alias, target] of Object.entries(COMMAND_ALIASES)) {
    const handler = registry[target];
    if (!handler) throw new Error(`alias ${alias} points at unknown command ${target}`);
    registry[alias] = handler;
  }
  return Object.freeze(registry);
}

const GATEWAY_COMMANDS = buildRegistry();

export function listGatewayCommands(): string[] {
  return Object.keys(GATEWAY_COMMANDS);
}

export function resolveCommandHandler(command: string): GatewayCommandHandler | undefined {
  return Object.hasOwn(GATEWAY_COMMANDS, command) ? GATEWAY_COMMANDS[command] : undefined;
}

async function* relayFrames(
  frames: AsyncIterable<GatewayFrame | null | undefined>,
): AsyncGenerator<GatewayFrame, void, undefined> {
  for await (const frame of frames) {
    if (frame === null || frame === undefined) continue;
    yield frame;
  }
}

/**
 * Resolve `command` and relay its handler's frames in order.
 *
 * An unknown command throws here, before any iterator exists, so callers can
 * tell a bad command apart from a handler that produced nothing. Parameter
 * and backend errors surface from the returned iterator.
 */
export function dispatchCommand(
  command: string,
  args: CommandArgs | null | undefined,
  context: GatewayCommandContext,
): AsyncGenerator<GatewayFrame, void, undefined> {
  const handler = resolveCommandHandler(command);
  if (!handler) {
    throw new GatewayCommandError(ErrorCodes.UNKNOWN_COMMAND, `Unknown command: ${command}`);
  }
  return relayFrames(handler(args ?? {}, context));
}
