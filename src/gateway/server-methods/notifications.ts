import { envelopeFrame, validateSendNotificationParams } from "../protocol/index.js";
import { assertParams, backendScope, type GatewayCommandHandlers } from "./types.js";

export const notificationHandlers: GatewayCommandHandlers = {
  send_notification: async function* (args, context) {
    const { message } = assertParams(validateSendNotificationParams, "send_notification", args);
    await context.backend.notify({ ...backendScope(context), message });
    yield envelopeFrame("ok");
  },
};
