import type { StreamingCoalesceConfig } from "../config/config.js";
import { createSubsystemLogger } from "../logging.js";
import { formatError } from "./errors.js";

const log = createSubsystemLogger("gateway/coalesce");

export const DEFAULT_COALESCE: StreamingCoalesceConfig = {
  minChars: 256,
  idleMs: 50,
};

const IDLE = Symbol("idle");

function raceIdle<T>(pending: Promise<T>, idleMs: number): Promise<T | typeof IDLE> {
  let timer: NodeJS.Timeout | undefined;
  const idle = new Promise<typeof IDLE>((resolve) => {
    timer = setTimeout(() => resolve(IDLE), idleMs);
  });
  return Promise.race([pending, idle]).finally(() => clearTimeout(timer));
}

/**
 * Merge adjacent text chunks into fewer frames.
 *
 * The buffer is flushed once it holds `minChars`, after `idleMs` without a new
 * chunk, and when the source ends or fails. Chunks are never split, so every output
 * frame is one or more whole input chunks in their original order.
 */
export async function* coalesceStream(
  source: AsyncIterable<string | null | undefined>,
  opts: Partial<StreamingCoalesceConfig> = {},
): AsyncGenerator<string, void, undefined> {
  const minChars = Math.max(1, opts.minChars ?? DEFAULT_COALESCE.minChars);
  const idleMs = Math.max(0, opts.idleMs ?? DEFAULT_COALESCE.idleMs);
  const iterator = source[Symbol.asyncIterator]();
  let buffer = "";
  let pending: Promise<IteratorResult<string | null | undefined>> | null = null;
  let finished = false;

  try {
    while (true) {
      pending ??= iterator.next();
      let next: IteratorResult<string | null | undefined> | typeof IDLE;
      try {
        next = buffer ? await raceIdle(pending, idleMs) : await pending;
      } catch (err) {
        finished = true;
        if (buffer) {
          const flushed = buffer;
          buffer = "";
          yield flushed;
        }
        throw err;
      }
      if (next === IDLE) {
        const flushed = buffer;
        buffer = "";
        yield flushed;
        continue;
      }
      pending = null;
      if (next.done) {
        finished = true;
        break;
      }
      if (!next.value) continue;
      buffer += next.value;
      if (buffer.length >= minChars) {
        const flushed = buffer;
        buffer = "";
        yield flushed;
      }
    }
    if (buffer) yield buffer;
  } finally {
    if (!finished) {
      if (pending) {
        // return() must not overlap the in-flight next(); close once it settles
        void pending
          .then(async () => {
            await iterator.return?.();
          })
          .catch((err: unknown) => log.debug(`coalesced source closed with error: ${formatError(err)}`));
      } else {
        await iterator.return?.();
      }
    }
  }
}
