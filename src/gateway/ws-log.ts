import chalk from "chalk";

import { shouldLogVerbose } from "../globals.js";

const LOG_VALUE_LIMIT = 240;

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function shortId(value: string): string {
  const s = value.trim();
  if (UUID_RE.test(s)) return `${s.slice(0, 8)}…${s.slice(-4)}`;
  if (s.length <= 24) return s;
  return `${s.slice(0, 12)}…${s.slice(-4)}`;
}

export function formatForLog(value: unknown): string {
  try {
    if (value instanceof Error) {
      const parts = [value.name, value.message].filter(Boolean);
      return parts.join(": ");
    }
    const str = typeof value === "string" ? value : JSON.stringify(value);
    if (str === undefined) return String(value);
    return str.length > LOG_VALUE_LIMIT ? `${str.slice(0, LOG_VALUE_LIMIT)}...` : str;
  } catch {
    return String(value);
  }
}

export type WsLogKind = "open" | "cmd" | "frame" | "done" | "error" | "close";

const wsInflightSince = new Map<string, number>();

export function buildWsLogLine(
  direction: "in" | "out",
  kind: WsLogKind,
  meta?: Record<string, unknown>,
  now = Date.now(),
): string {
  const connId = typeof meta?.connId === "string" ? meta.connId : undefined;
  const command = typeof meta?.command === "string" ? meta.command : undefined;
  const ok = typeof meta?.ok === "boolean" ? meta.ok : undefined;

  if (direction === "in" && kind === "cmd" && connId) {
    wsInflightSince.set(connId, now);
  }
  const durationMs =
    direction === "out" && (kind === "done" || kind === "error") && connId
      ? (() => {
          const startedAt = wsInflightSince.get(connId);
          if (startedAt === undefined) return undefined;
          wsInflightSince.delete(connId);
          return now - startedAt;
        })()
      : undefined;

  const dirArrow = direction === "in" ? "←" : "→";
  const dirColor = direction === "in" ? chalk.greenBright : chalk.cyanBright;
  const prefix = `${chalk.gray("[gws]")} ${dirColor(dirArrow)} ${chalk.bold(kind)}`;
  const statusToken =
    ok === undefined ? undefined : ok ? chalk.greenBright("✓") : chalk.redBright("✗");
  const headline = command ? chalk.bold(command) : undefined;
  const durationToken = typeof durationMs === "number" ? chalk.dim(`${durationMs}ms`) : undefined;

  const restMeta: string[] = [];
  if (meta) {
    for (const [key, value] of Object.entries(meta)) {
      if (value === undefined) continue;
      if (key === "connId" || key === "command" || key === "ok") continue;
      restMeta.push(`${chalk.dim(key)}=${formatForLog(value)}`);
    }
  }
  const trailing = connId ? [`${chalk.dim("conn")}=${chalk.gray(shortId(connId))}`] : [];

  return [prefix, statusToken, headline, durationToken, ...restMeta, ...trailing]
    .filter((t): t is string => Boolean(t))
    .join(" ");
}

export function logWs(direction: "in" | "out", kind: WsLogKind, meta?: Record<string, unknown>) {
  if (!shouldLogVerbose()) return;
  console.log(buildWsLogLine(direction, kind, meta));
}
