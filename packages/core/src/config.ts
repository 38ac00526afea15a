import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import type { SessionServiceConfig } from "@clubhouse/types";
import { ClubhouseError } from "./errors.js";

export const SessionServiceConfigSchema = z
  .object({
    target: z.string().min(1).default("clubhouse.db"),
    database: z.string().min(1).default("(default)"),
    collectionPrefix: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "only letters, digits, '_' and '-' are allowed")
      .default("clubhouse"),
    stateScoping: z.enum(["app-user-session", "session"]).default("app-user-session"),
    logLevel: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info"),
  })
  .strict();

/** Environment variable → config field. */
const ENV_OVERRIDES = {
  CLUBHOUSE_STORE_TARGET: "target",
  CLUBHOUSE_DATABASE: "database",
  CLUBHOUSE_COLLECTION_PREFIX: "collectionPrefix",
  CLUBHOUSE_STATE_SCOPING: "stateScoping",
  LOG_LEVEL: "logLevel",
} as const;

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw new ClubhouseError("CONFIG_ERROR", `Cannot read config file ${path}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    throw new ClubhouseError("CONFIG_ERROR", `Invalid YAML in ${path}`, { cause: err });
  }

  if (parsed === undefined || parsed === null) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ClubhouseError("CONFIG_ERROR", `Config file ${path} must contain a mapping`);
  }
  return { ...parsed };
}

/**
 * Load the session service configuration.
 *
 * Reads the YAML file at `path` when it exists, then applies environment
 * overrides, then validates. A missing file is not an error.
 */
export async function loadServiceConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<SessionServiceConfig> {
  const fromFile = path ? await readConfigFile(path) : {};
  const merged: Record<string, unknown> = { ...fromFile };

  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    merged[field] = field === "logLevel" ? value.toLowerCase() : value;
  }

  const result = SessionServiceConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClubhouseError("CONFIG_ERROR", `Invalid configuration: ${issues}`, {
      cause: result.error,
    });
  }
  return result.data;
}
