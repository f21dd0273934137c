import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import JSON5 from "json5";
import type { ZodIssue } from "zod";

import { type GatewayConfig, GatewayConfigSchema } from "./zod-schema.js";

export type { GatewayConfig, GatewayConfigInput, StreamingCoalesceConfig } from "./zod-schema.js";

export const CONFIG_PATH_ENV = "AGENT_GATEWAY_CONFIG";
export const PORT_ENV = "AGENT_GATEWAY_PORT";

export function resolveDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME?.trim() || os.homedir();
  return path.join(home, ".agent-gateway", "config.json5");
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) return path.resolve(override);
  return resolveDefaultConfigPath(env);
}

export class ConfigError extends Error {
  readonly configPath?: string;
  readonly issues: string[];

  constructor(message: string, opts: { configPath?: string; issues?: string[]; cause?: unknown }) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "ConfigError";
    this.configPath = opts.configPath;
    this.issues = opts.issues ?? [];
  }
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${where}: ${issue.message}`;
  });
}

export function parseConfigJson5(raw: string): unknown {
  return JSON5.parse(raw);
}

/** Validate a raw config object and fill in defaults. */
export function validateConfigObject(
  raw: unknown,
  configPath?: string,
): GatewayConfig {
  const parsed = GatewayConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatConfigIssues(parsed.error.issues);
    throw new ConfigError(`invalid config${configPath ? ` at ${configPath}` : ""}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }
  return parsed.data;
}

function applyEnvOverrides(cfg: GatewayConfig, env: NodeJS.ProcessEnv): GatewayConfig {
  const rawPort = env[PORT_ENV]?.trim();
  if (!rawPort) return cfg;
  const port = Number.parseInt(rawPort, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`invalid ${PORT_ENV}: ${rawPort}`, { issues: [`${PORT_ENV}: not a port`] });
  }
  return { ...cfg, gateway: { ...cfg.gateway, port } };
}

export type LoadConfigOptions = {
  path?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Read the JSON5 config file. A missing file yields the defaults; anything
 * unreadable or invalid throws a ConfigError.
 */
export function loadConfig(opts: LoadConfigOptions = {}): GatewayConfig {
  const env = opts.env ?? process.env;
  const configPath = opts.path ? path.resolve(opts.path) : resolveConfigPath(env);
  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    let text: string;
    try {
      text = fs.readFileSync(configPath, "utf-8");
    } catch (err) {
      throw new ConfigError(`failed to read config at ${configPath}`, { configPath, cause: err });
    }
    try {
      raw = parseConfigJson5(text);
    } catch (err) {
      throw new ConfigError(`failed to parse config at ${configPath}: ${String(err)}`, {
        configPath,
        cause: err,
      });
    }
  }
  return applyEnvOverrides(validateConfigObject(raw, configPath), env);
}

export function defaultConfig(): GatewayConfig {
  return validateConfigObject({});
}
