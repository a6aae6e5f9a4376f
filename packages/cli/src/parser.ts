/**
 * JSONC configuration file parsing and environment variable expansion.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import type { RecordKind } from "@notesync/core";
import type {
  ConfigFile,
  EngineConfigRaw,
  JobConfigRaw,
  PollConfigRaw,
  RemoteConfigRaw,
  StateConfigRaw,
} from "./config.js";

type Environment = { [name: string]: string | undefined };
type JsonObject = { [key: string]: unknown };

/**
 * Load and parse a JSONC configuration file.
 * @param configPath - Path to the JSONC configuration file
 * @returns Parsed configuration object, environment variables expanded
 * @throws Error if file cannot be read, parsed or validated
 */
export async function loadConfigFile(
  configPath: string,
  env: Environment = process.env
): Promise<ConfigFile> {
  const fullPath = path.resolve(configPath);

  try {
    const content = await fs.readFile(fullPath, "utf-8");
    return parseConfigText(content, env);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load config from ${fullPath}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Parse configuration text (JSONC: comments and trailing commas allowed).
 */
export function parseConfigText(content: string, env: Environment = process.env): ConfigFile {
  const errors: ParseError[] = [];

  const parsed: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    disallowComments: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors.map(
      (e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`
    );
    throw new Error(`Failed to parse JSONC file: ${errorMessages.join(", ")}`);
  }

  return validateConfig(expandEnvironmentVariables(parsed, env));
}

/**
 * Expand environment variables in a string.
 * Supports ${VAR} and ${VAR:-default} syntax.
 * Unknown variables without a default are left as written.
 */
function expandEnvVar(value: string, env: Environment): string {
  return value.replace(
    /\$\{([^}:-]+)(?::-([^}]*))?\}/g,
    (match: string, varName: string, defaultValue: string | undefined) => {
      const envValue = env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      return match;
    }
  );
}

/**
 * Recursively expand environment variables in every string of a parsed document.
 */
export function expandEnvironmentVariables(value: unknown, env: Environment = process.env): unknown {
  if (typeof value === "string") {
    return expandEnvVar(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => expandEnvironmentVariables(item, env));
  }

  if (isObject(value)) {
    const expanded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvironmentVariables(item, env);
    }
    return expanded;
  }

  return value;
}

/**
 * Validate the structure of the configuration object.
 * @throws Error naming the first invalid setting
 */
export function validateConfig(config: unknown): ConfigFile {
  if (!isObject(config)) {
    throw new Error("Configuration file must contain an object");
  }

  if (!isObject(config.remote)) {
    throw new Error("Configuration must include 'remote' section");
  }
  if (!isObject(config.state)) {
    throw new Error("Configuration must include 'state' section");
  }
  if (!Array.isArray(config.jobs)) {
    throw new Error("Configuration must include 'jobs' array");
  }

  const result: ConfigFile = {
    remote: validateRemoteConfig(config.remote),
    state: validateStateConfig(config.state),
    jobs: config.jobs.map((job: unknown) => validateJobConfig(job)),
  };

  if (config.engine !== undefined) {
    if (!isObject(config.engine)) {
      throw new Error("'engine' must be an object");
    }
    result.engine = validateEngineConfig(config.engine);
  }

  // Job ids name jobs on the command line, and two jobs may not race on one cursor
  const ids = new Set<string>();
  const targets = new Map<string, string>();
  for (const job of result.jobs) {
    if (ids.has(job.id)) {
      throw new Error(`Duplicate job id '${job.id}'`);
    }
    ids.add(job.id);

    const target = `${job.account ?? "default"}:${job.kind}`;
    const other = targets.get(target);
    if (other !== undefined) {
      throw new Error(`Jobs '${other}' and '${job.id}' both sync '${target}'`);
    }
    targets.set(target, job.id);
  }

  return result;
}

function validateRemoteConfig(remote: JsonObject): RemoteConfigRaw {
  const where = "remote";
  const pageSize = optionalNumber(remote, "page_size", where, { integer: true, min: 1 });

  if (remote.driver === "http") {
    return {
      driver: "http",
      base_url: requiredString(remote, "base_url", where),
      token: requiredString(remote, "token", where),
      page_size: pageSize,
      timeout_ms: optionalNumber(remote, "timeout_ms", where, { min: 1 }),
    };
  }
  if (remote.driver === "in-memory") {
    return { driver: "in-memory", page_size: pageSize };
  }
  throw new Error(`remote.driver must be "http" or "in-memory", got ${JSON.stringify(remote.driver)}`);
}

function validateStateConfig(state: JsonObject): StateConfigRaw {
  if (state.driver === "file") {
    return { driver: "file", path: requiredString(state, "path", "state") };
  }
  if (state.driver === "in-memory") {
    return { driver: "in-memory" };
  }
  throw new Error(`state.driver must be "file" or "in-memory", got ${JSON.stringify(state.driver)}`);
}

function validateEngineConfig(engine: JsonObject): EngineConfigRaw {
  const where = "engine";
  const result: EngineConfigRaw = {
    batch_size: optionalNumber(engine, "batch_size", where, { integer: true, min: 1 }),
    concurrency: optionalNumber(engine, "concurrency", where, { integer: true, min: 1 }),
  };

  if (engine.mode !== undefined) {
    if (engine.mode !== "blocking" && engine.mode !== "concurrent") {
      throw new Error(`engine.mode must be "blocking" or "concurrent"`);
    }
    result.mode = engine.mode;
  }

  if (engine.retry !== undefined) {
    const retry = requiredObject(engine, "retry", where);
    result.retry = {
      max_attempts: optionalNumber(retry, "max_attempts", "engine.retry", { integer: true, min: 1 }),
      base_delay_ms: optionalNumber(retry, "base_delay_ms", "engine.retry", { min: 0 }),
      max_delay_ms: optionalNumber(retry, "max_delay_ms", "engine.retry", { min: 0 }),
      jitter: optionalNumber(retry, "jitter", "engine.retry", { min: 0 }),
      max_rate_limit_waits: optionalNumber(retry, "max_rate_limit_waits", "engine.retry", {
        integer: true,
        min: 0,
      }),
    };
  }

  if (engine.throttle !== undefined) {
    const throttle = requiredObject(engine, "throttle", where);
    result.throttle = {
      max_reqs: optionalNumber(throttle, "max_reqs", "engine.throttle", { integer: true, min: 1 }),
      interval_sec: optionalNumber(throttle, "interval_sec", "engine.throttle", { min: 0 }),
    };
  }

  return result;
}

/**
 * Validate a single job configuration.
 */
function validateJobConfig(job: unknown): JobConfigRaw {
  if (!isObject(job) || typeof job.id !== "string" || job.id === "") {
    throw new Error("Each job must have a string 'id'");
  }
  const where = `Job '${job.id}'`;

  const result: JobConfigRaw = {
    id: job.id,
    kind: validateKind(job.kind, where),
    snapshot: requiredString(job, "snapshot", where),
    account: optionalString(job, "account", where),
    additions: optionalString(job, "additions", where),
    schedule: optionalString(job, "schedule", where),
  };

  if (job.poll !== undefined) {
    result.poll = validatePollConfig(requiredObject(job, "poll", where), `${where}, poll`);
  }

  if (job.field_limits !== undefined) {
    const limits = requiredObject(job, "field_limits", where);
    result.field_limits = {};
    for (const field of Object.keys(limits)) {
      const limit = optionalNumber(limits, field, `${where}, field_limits`, { integer: true, min: 0 });
      if (limit !== undefined) {
        result.field_limits[field] = limit;
      }
    }
  }

  return result;
}

function validatePollConfig(poll: JsonObject, where: string): PollConfigRaw {
  const result: PollConfigRaw = {
    interval_sec: optionalNumber(poll, "interval_sec", where, { above: 0 }),
    backoff_factor: optionalNumber(poll, "backoff_factor", where, { above: 1 }),
    max_interval_sec: optionalNumber(poll, "max_interval_sec", where, { min: 0 }),
    max_consecutive_errors: optionalNumber(poll, "max_consecutive_errors", where, {
      integer: true,
      min: 1,
    }),
  };
  if (
    result.interval_sec !== undefined &&
    result.max_interval_sec !== undefined &&
    result.max_interval_sec < result.interval_sec
  ) {
    throw new Error(`${where}: max_interval_sec must not be below interval_sec`);
  }
  return result;
}

function validateKind(kind: unknown, where: string): RecordKind {
  if (kind === "highlight" || kind === "document") {
    return kind;
  }
  throw new Error(`${where}: kind must be "highlight" or "document"`);
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requiredObject(obj: JsonObject, key: string, where: string): JsonObject {
  const value = obj[key];
  if (!isObject(value)) {
    throw new Error(`${where}: '${key}' must be an object`);
  }
  return value;
}

function requiredString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value === "") {
    throw new Error(`${where}: must have '${key}' string`);
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${where}: '${key}' must be a string`);
  }
  return value;
}

function optionalNumber(
  obj: JsonObject,
  key: string,
  where: string,
  rules: { integer?: boolean; min?: number; above?: number } = {}
): number | undefined {
  const value = obj[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${where}: ${key} must be a number`);
  }
  if (rules.integer && !Number.isInteger(value)) {
    throw new Error(`${where}: ${key} must be an integer`);
  }
  if (rules.min !== undefined && value < rules.min) {
    throw new Error(`${where}: ${key} must be at least ${rules.min}`);
  }
  if (rules.above !== undefined && value <= rules.above) {
    throw new Error(`${where}: ${key} must be greater than ${rules.above}`);
  }
  return value;
}
