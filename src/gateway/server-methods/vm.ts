import {
  DEFAULT_KEY_DELAY_SECONDS,
  envelopeFrame,
  rawFrame,
  validateVmExecuteParams,
  validateVmExecuteStreamParams,
  validateVmInputParams,
  validateVmKeysParams,
} from "../protocol/index.js";
import { coalesceStream } from "../stream-coalesce.js";
import { assertParams, backendScope, type GatewayCommandHandlers } from "./types.js";

export const TERMINAL_RESTARTED_NOTICE = "VM terminal restarted";

export const vmHandlers: GatewayCommandHandlers = {
  vm_execute: async function* (args, context) {
    const { command, timeout } = assertParams(validateVmExecuteParams, "vm_execute", args);
    const output = await context.backend.vmExecute({
      ...backendScope(context),
      command,
      ...(timeout !== undefined ? { timeout: Math.trunc(timeout) } : {}),
    });
    yield envelopeFrame(output);
  },

  vm_execute_stream: async function* (args, context) {
    const params = assertParams(validateVmExecuteStreamParams, "vm_execute_stream", args);
    const raw = params.raw ?? true;
    const stream = context.backend.vmExecuteStream({
      ...backendScope(context),
      command: params.command,
      raw,
    });
    if (raw) {
      // terminal bytes: chunk boundaries are meaningless, merge them
      for await (const chunk of coalesceStream(stream, context.config.streaming.coalesce)) {
        yield rawFrame(chunk);
      }
      return;
    }
    for await (const part of stream) {
      yield rawFrame(part);
    }
  },

  vm_input: async function* (args, context) {
    const { data = "" } = assertParams(validateVmInputParams, "vm_input", args);
    await context.backend.vmSendInput({ ...backendScope(context), data });
    yield envelopeFrame("ok");
  },

  vm_keys: async function* (args, context) {
    const { data = "", delay = DEFAULT_KEY_DELAY_SECONDS } = assertParams(
      validateVmKeysParams,
      "vm_keys",
      args,
    );
    await context.backend.vmSendKeys({
      ...backendScope(context),
      data,
      delayMs: Math.round(delay * 1000),
    });
    yield envelopeFrame("ok");
  },

  restart_terminal: async function* (_args, context) {
    await context.backend.restartTerminal(backendScope(context));
    if (context.chat) {
      await context.chat.sendNotification(TERMINAL_RESTARTED_NOTICE);
    }
    yield envelopeFrame("restarted");
  },
};
