import path from "node:path";

import { lookup } from "mime-types";

import { createSubsystemLogger } from "../../logging.js";
import { formatError, GatewayCommandError } from "../errors.js";
import { envelopeFrame, ErrorCodes, validateUploadDocumentParams } from "../protocol/index.js";
import {
  assertParams,
  backendScope,
  type GatewayCommandContext,
  type GatewayCommandHandlers,
} from "./types.js";

const log = createSubsystemLogger("gateway/uploads");

export type UploadStage = "receiving" | "stored" | "transcribing" | "done";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function sanitizeFilename(name: string): string {
  const base = path.basename(name.replace(/\\/g, "/"));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "");
  return cleaned || "upload";
}

/** Bytes from an in-process byte array or base64 text off the wire. */
export function decodeFileData(fileData: unknown): Buffer {
  if (typeof fileData === "string") {
    const compact = fileData.replace(/\s+/g, "");
    if (compact.length % 4 === 0 && BASE64_RE.test(compact)) {
      return Buffer.from(compact, "base64");
    }
  } else if (fileData instanceof Uint8Array) {
    return Buffer.from(fileData);
  } else if (fileData instanceof ArrayBuffer) {
    return Buffer.from(fileData);
  }
  throw new GatewayCommandError(
    ErrorCodes.INVALID_PARAMS,
    "file_data must be bytes or base64 string",
  );
}

export function isAudioFile(filePath: string): boolean {
  const mime = lookup(filePath);
  return typeof mime === "string" && mime.startsWith("audio/");
}

function trackStage(stage: UploadStage, context: GatewayCommandContext, meta?: Record<string, unknown>) {
  log.debug(`upload ${stage}`, { user: context.user, session: context.session, ...meta });
}

// A failed notification never holds back the frame it announces.
async function notifyUploaded(context: GatewayCommandContext, location: string) {
  try {
    await context.backend.notify({ ...backendScope(context), message: `File uploaded: ${location}` });
  } catch (err) {
    log.warn(`upload notification failed for ${location}: ${formatError(err)}`);
  }
}

export const uploadHandlers: GatewayCommandHandlers = {
  upload_document: async function* (args, context) {
    const params = assertParams(validateUploadDocumentParams, "upload_document", args);
    const scope = backendScope(context);
    const userDir = path.join(context.config.uploads.dir, context.user);
    trackStage("receiving", context);

    let stored: string;
    let localPath: string;
    if (params.file_data !== undefined) {
      if (!params.file_name) {
        throw new GatewayCommandError(
          ErrorCodes.INVALID_PARAMS,
          "file_name required when file_data provided",
        );
      }
      const data = decodeFileData(params.file_data);
      stored = await context.backend.uploadData({ ...scope, data, fileName: params.file_name });
      localPath = path.join(userDir, sanitizeFilename(params.file_name));
    } else if (params.file_path) {
      stored = await context.backend.uploadDocument({ ...scope, path: params.file_path });
      localPath = path.join(userDir, path.basename(params.file_path));
    } else {
      throw new GatewayCommandError(
        ErrorCodes.INVALID_PARAMS,
        "file_path or file_data required",
      );
    }

    trackStage("stored", context, { location: stored });
    await notifyUploaded(context, stored);
    yield envelopeFrame(stored);

    if (!isAudioFile(localPath)) {
      trackStage("done", context);
      return;
    }

    trackStage("transcribing", context, { localPath });
    let transcript: string | null | undefined;
    try {
      transcript = await context.backend.transcribe({ ...scope, localPath });
    } catch (err) {
      // the upload already succeeded; a transcript is best effort
      log.error(`Transcription failed for ${localPath}: ${formatError(err)}`);
      trackStage("done", context, { transcribed: false });
      return;
    }
    trackStage("done", context, { transcribed: Boolean(transcript) });
    if (!transcript) return;
    await notifyUploaded(context, transcript);
    yield envelopeFrame(transcript);
  },
};
