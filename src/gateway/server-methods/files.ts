import {
  envelopeFrame,
  validateDownloadFileParams,
  validatePathParams,
  validateWriteFileParams,
} from "../protocol/index.js";
import { assertParams, backendScope, type GatewayCommandHandlers } from "./types.js";

export const fileHandlers: GatewayCommandHandlers = {
  list_dir: async function* (args, { backend, user, config }) {
    const { path } = assertParams(validatePathParams, "list_dir", args);
    const listing = await backend.listDir({ path, user, config: config.backend });
    yield envelopeFrame([...listing]);
  },
  read_file: async function* (args, { backend, user, config }) {
    const { path } = assertParams(validatePathParams, "read_file", args);
    yield envelopeFrame(await backend.readFile({ path, user, config: config.backend }));
  },
  write_file: async function* (args, { backend, user, config }) {
    const { path, content = "" } = assertParams(validateWriteFileParams, "write_file", args);
    yield envelopeFrame(await backend.writeFile({ path, content, user, config: config.backend }));
  },
  delete_path: async function* (args, context) {
    const { path } = assertParams(validatePathParams, "delete_path", args);
    yield envelopeFrame(await context.backend.deletePath({ ...backendScope(context), path }));
  },
  download_file: async function* (args, context) {
    const { path, dest } = assertParams(validateDownloadFileParams, "download_file", args);
    const result = await context.backend.downloadFile({
      ...backendScope(context),
      path,
      ...(dest !== undefined ? { dest } : {}),
    });
    yield envelopeFrame(result);
  },
};
