import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";

import { GreeterConfigSchema } from "./schema.js";
import type { GreeterConfig } from "./types.js";

export const DEFAULT_CONFIG_PATH = "config.yaml";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}` : message,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

function clean(value?: string): string {
  return value?.trim() ?? "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return path.resolve(clean(explicit) || clean(env.GREETER_CONFIG) || DEFAULT_CONFIG_PATH);
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const matrix: Record<string, unknown> = isRecord(raw.matrix) ? { ...raw.matrix } : {};
  const overrides: Array<[string, string | undefined]> = [
    ["homeserver", env.MATRIX_HOMESERVER],
    ["userId", env.MATRIX_USER_ID],
    ["accessToken", env.MATRIX_ACCESS_TOKEN],
    ["password", env.MATRIX_PASSWORD],
    ["deviceName", env.MATRIX_DEVICE_NAME],
  ];
  for (const [key, value] of overrides) {
    const trimmed = clean(value);
    if (trimmed) matrix[key] = trimmed;
  }
  const next: Record<string, unknown> = { ...raw, matrix };

  const inviteToken = clean(env.GREETER_INVITE_API_TOKEN);
  if (inviteToken && isRecord(raw.invites)) {
    next.invites = { ...raw.invites, apiToken: inviteToken };
  }
  const level = clean(env.LOG_LEVEL).toLowerCase();
  if (level) {
    next.logging = { ...(isRecord(raw.logging) ? raw.logging : {}), level };
  }
  return next;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): GreeterConfig {
  const doc = raw ?? {};
  if (!isRecord(doc)) {
    throw new ConfigError("Greeter config must be a mapping");
  }
  const result = GreeterConfigSchema.safeParse(applyEnvOverrides(doc, env));
  if (!result.success) {
    throw new ConfigError("Invalid greeter config", result.error.issues.map(formatIssue));
  }
  return deepFreeze(result.data);
}

export function loadConfig(
  params: { path?: string; env?: NodeJS.ProcessEnv } = {},
): GreeterConfig {
  const env = params.env ?? process.env;
  const configPath = resolveConfigPath(params.path, env);
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${String(err)}`);
  }
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Cannot parse ${configPath}: ${String(err)}`);
  }
  return parseConfig(raw, env);
}
