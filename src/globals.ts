import { getResolvedLogLevel } from "./logging.js";

let globalVerbose = false;

export function setVerbose(v: boolean) {
  globalVerbose = v;
}

export function isVerbose() {
  return globalVerbose;
}

export function shouldLogVerbose() {
  const level = getResolvedLogLevel();
  return globalVerbose || level === "debug" || level === "trace";
}
