import { envelopeFrame, validateSetMemoryParams } from "../protocol/index.js";
import { assertParams, type GatewayCommandHandlers } from "./types.js";

// Per-user persisted state. Scoped by user only: sessions and memory outlive a session.
export const sessionHandlers: GatewayCommandHandlers = {
  list_sessions: async function* (_args, { backend, user }) {
    yield envelopeFrame(await backend.listSessions({ user }));
  },
  list_sessions_info: async function* (_args, { backend, user }) {
    yield envelopeFrame(await backend.listSessionsInfo({ user }));
  },
  list_documents: async function* (_args, { backend, user }) {
    yield envelopeFrame(await backend.listDocuments({ user }));
  },
  get_memory: async function* (_args, { backend, user }) {
    yield envelopeFrame(await backend.getMemory({ user }));
  },
  set_memory: async function* (args, { backend, user }) {
    const { memory = "" } = assertParams(validateSetMemoryParams, "set_memory", args);
    yield envelopeFrame(await backend.setMemory({ user, memory }));
  },
  reset_memory: async function* (_args, { backend, user }) {
    yield envelopeFrame(await backend.resetMemory({ user }));
  },
};
