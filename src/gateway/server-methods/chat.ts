import { rawFrame, validateChatParams } from "../protocol/index.js";
import { assertParams, backendScope, type GatewayCommandHandlers } from "./types.js";

export const chatHandlers: GatewayCommandHandlers = {
  team_chat: async function* (args, context) {
    const { prompt = "" } = assertParams(validateChatParams, "team_chat", args);
    const stream = context.chat
      ? context.chat.chatStream(prompt)
      : context.backend.chat({ ...backendScope(context), prompt, think: context.think });
    for await (const part of stream) {
      yield rawFrame(part);
    }
  },
};
