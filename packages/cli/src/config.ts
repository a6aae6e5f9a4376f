/**
 * Type definitions for JSONC configuration file format.
 * These types represent the raw configuration as it appears in the JSONC file.
 */

import type { RecordKind } from "@notesync/core";

/**
 * Remote endpoint configuration.
 */
export type RemoteConfigRaw =
  | {
      driver: "http";
      base_url: string;
      token: string; // usually "${NOTESYNC_TOKEN}"
      page_size?: number;
      timeout_ms?: number;
    }
  | {
      driver: "in-memory";
      page_size?: number;
    };

/**
 * Cursor state storage configuration.
 */
export type StateConfigRaw =
  | { driver: "file"; path: string }
  | { driver: "in-memory" };

/**
 * Retry configuration (as it appears in JSONC).
 * Uses snake_case to match JSONC format.
 */
export interface RetryConfigRaw {
  max_attempts?: number;
  base_delay_ms?: number;
  max_delay_ms?: number;
  jitter?: number;
  max_rate_limit_waits?: number;
}

/**
 * Throttle configuration (as it appears in JSONC).
 */
export interface ThrottleConfigRaw {
  max_reqs?: number;
  interval_sec?: number;
}

/**
 * Engine settings shared by every job.
 */
export interface EngineConfigRaw {
  batch_size?: number;
  /** "blocking" runs groups and jobs one after another, "concurrent" interleaves them */
  mode?: "blocking" | "concurrent";
  concurrency?: number;
  retry?: RetryConfigRaw;
  throttle?: ThrottleConfigRaw;
}

/**
 * Background poller settings for a job.
 */
export interface PollConfigRaw {
  interval_sec?: number;
  backoff_factor?: number;
  max_interval_sec?: number;
  max_consecutive_errors?: number;
}

/**
 * Individual job configuration (as it appears in JSONC).
 */
export interface JobConfigRaw {
  id: string;
  account?: string;
  kind: RecordKind;
  /** JSON file holding the local records of this kind */
  snapshot: string;
  /** Where remote additions and updates are written after a pass */
  additions?: string;
  schedule?: string; // Cron expression; omit for manual/CLI-only
  poll?: PollConfigRaw;
  /** Per-field overrides merged over the kind's default limits */
  field_limits?: { [field: string]: number };
}

/**
 * Complete configuration file structure (as it appears in JSONC).
 */
export interface ConfigFile {
  remote: RemoteConfigRaw;
  state: StateConfigRaw;
  engine?: EngineConfigRaw;
  jobs: JobConfigRaw[];
}
