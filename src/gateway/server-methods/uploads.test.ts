import path from "node:path";

import { describe, expect, it } from "vitest";

import { dispatchCommand } from "../server-methods.js";
import { collectWire, createFakeBackend, installGatewayTestHooks, makeContext } from "../test-helpers.js";
import { decodeFileData, isAudioFile, sanitizeFilename } from "./uploads.js";

installGatewayTestHooks();

describe("sanitizeFilename", () => {
  it("keeps only the base name", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\docs\\memo.mp3")).toBe("memo.mp3");
  });

  it("replaces unsafe characters and strips leading dots", () => {
    expect(sanitizeFilename("my report (1).pdf")).toBe("my_report__1_.pdf");
    expect(sanitizeFilename("..hidden")).toBe("hidden");
  });

  it("falls back when nothing usable remains", () => {
    expect(sanitizeFilename("...")).toBe("upload");
    expect(sanitizeFilename("")).toBe("upload");
  });
});

describe("decodeFileData", () => {
  it("accepts base64 text and byte arrays", () => {
    expect(decodeFileData(Buffer.from("RIFF").toString("base64"))).toEqual(Buffer.from("RIFF"));
    expect(decodeFileData(new Uint8Array([1, 2, 3]))).toEqual(Buffer.from([1, 2, 3]));
  });

  it("rejects other shapes", () => {
    expect(() => decodeFileData("not base64!")).toThrow("file_data must be bytes or base64 string");
    expect(() => decodeFileData(42)).toThrow("file_data must be bytes or base64 string");
  });
});

describe("isAudioFile", () => {
  it("infers audio from the extension", () => {
    expect(isAudioFile("uploads/alice/memo.mp3")).toBe(true);
    expect(isAudioFile("uploads/alice/report.pdf")).toBe(false);
    expect(isAudioFile("uploads/alice/no-extension")).toBe(false);
  });
});

describe("upload_document", () => {
  it("stores a resident file and emits one result", async () => {
    const backend = createFakeBackend();
    backend.uploadDocument.mockResolvedValue("docs/report.pdf");
    const frames = await collectWire(
      dispatchCommand("upload_document", { file_path: "/data/report.pdf" }, makeContext(backend)),
    );
    expect(frames).toEqual(['{"result":"docs/report.pdf"}']);
    expect(backend.uploadDocument.mock.calls[0]?.[0].path).toBe("/data/report.pdf");
    expect(backend.notify).toHaveBeenCalledTimes(1);
    expect(backend.notify.mock.calls[0]?.[0].message).toBe("File uploaded: docs/report.pdf");
    expect(backend.transcribe).not.toHaveBeenCalled();
  });

  it("emits the stored location then the transcript for audio", async () => {
    const backend = createFakeBackend();
    backend.uploadData.mockResolvedValue("docs/memo.mp3");
    backend.transcribe.mockResolvedValue("docs/memo.txt");
    const fileData = Buffer.from("RIFF").toString("base64");
    const frames = await collectWire(
      dispatchCommand(
        "upload_document",
        { file_name: "memo.mp3", file_data: fileData },
        makeContext(backend),
      ),
    );
    expect(frames).toEqual(['{"result":"docs/memo.mp3"}', '{"result":"docs/memo.txt"}']);
    expect(backend.uploadData.mock.calls[0]?.[0]).toMatchObject({
      data: Buffer.from("RIFF"),
      fileName: "memo.mp3",
    });
    expect(backend.transcribe.mock.calls[0]?.[0].localPath).toBe(
      path.join("uploads", "alice", "memo.mp3"),
    );
    expect(backend.notify.mock.calls.map(([params]) => params.message)).toEqual([
      "File uploaded: docs/memo.mp3",
      "File uploaded: docs/memo.txt",
    ]);
  });

  it("derives the local path from a sanitized file name", async () => {
    const backend = createFakeBackend();
    await collectWire(
      dispatchCommand(
        "upload_document",
        { file_name: "../voice note.mp3", file_data: new Uint8Array([1, 2]) },
        makeContext(backend),
      ),
    );
    expect(backend.transcribe.mock.calls[0]?.[0].localPath).toBe(
      path.join("uploads", "alice", "voice_note.mp3"),
    );
  });

  it("emits only the location when transcription fails", async () => {
    const backend = createFakeBackend();
    backend.uploadDocument.mockResolvedValue("docs/call.mp3");
    backend.transcribe.mockRejectedValue(new Error("speech service down"));
    const frames = await collectWire(
      dispatchCommand("upload_document", { file_path: "/data/call.mp3" }, makeContext(backend)),
    );
    expect(frames).toEqual(['{"result":"docs/call.mp3"}']);
    expect(backend.notify).toHaveBeenCalledTimes(1);
  });

  it("emits no second frame for an empty transcript", async () => {
    const backend = createFakeBackend();
    backend.uploadDocument.mockResolvedValue("docs/call.mp3");
    backend.transcribe.mockResolvedValue("");
    const frames = await collectWire(
      dispatchCommand("upload_document", { file_path: "/data/call.mp3" }, makeContext(backend)),
    );
    expect(frames).toEqual(['{"result":"docs/call.mp3"}']);
  });

  it("still emits the location when the notification fails", async () => {
    const backend = createFakeBackend();
    backend.uploadDocument.mockResolvedValue("docs/a.txt");
    backend.notify.mockRejectedValue(new Error("offline"));
    const frames = await collectWire(
      dispatchCommand("upload_document", { file_path: "/data/a.txt" }, makeContext(backend)),
    );
    expect(frames).toEqual(['{"result":"docs/a.txt"}']);
  });

  it("requires a file name with file data", async () => {
    const backend = createFakeBackend();
    await expect(
      collectWire(
        dispatchCommand("upload_document", { file_data: "UklGRg==" }, makeContext(backend)),
      ),
    ).rejects.toMatchObject({
      code: "INVALID_PARAMS",
      message: "file_name required when file_data provided",
    });
    expect(backend.uploadData).not.toHaveBeenCalled();
  });

  it("rejects file data that is not base64", async () => {
    const backend = createFakeBackend();
    await expect(
      collectWire(
        dispatchCommand(
          "upload_document",
          { file_name: "a.bin", file_data: "not base64!" },
          makeContext(backend),
        ),
      ),
    ).rejects.toMatchObject({ code: "INVALID_PARAMS" });
    expect(backend.uploadData).not.toHaveBeenCalled();
  });

  it("requires a path or data", async () => {
    const backend = createFakeBackend();
    await expect(
      collectWire(dispatchCommand("upload_document", {}, makeContext(backend))),
    ).rejects.toMatchObject({
      code: "INVALID_PARAMS",
      message: "file_path or file_data required",
    });
  });
});
