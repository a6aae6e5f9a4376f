/**
 * Wire everything together: parse config, load remote and cursor store, create
 * sync managers, run passes or pollers.
 */

import * as path from "path";
import {
  BackgroundPoller,
  DOCUMENT_FIELD_LIMITS,
  HIGHLIGHT_FIELD_LIMITS,
  InFlightRegistry,
  RateLimitedTransport,
  SyncManager,
  blockingExecutor,
  concurrentExecutor,
  resolveEngineConfig,
  runPasses,
  silentLogger,
  type CursorStore,
  type EngineConfig,
  type Executor,
  type Logger,
  type PassJob,
  type PassReport,
  type RetryConfig,
  type ThrottleConfig,
} from "@notesync/core";
import type {
  ConfigFile,
  EngineConfigRaw,
  JobConfigRaw,
  RetryConfigRaw,
  ThrottleConfigRaw,
} from "./config.js";
import {
  loadCursorStore,
  loadRemote,
  loadSnapshot,
  writeBackIds,
  writeRecords,
  type LoadedRemote,
} from "./loaders.js";
import { loadConfigFile } from "./parser.js";

export const DEFAULT_POLL_INTERVAL_SEC = 300;
export const DEFAULT_POLL_BACKOFF_FACTOR = 2;
export const DEFAULT_POLL_MAX_INTERVAL_SEC = 3600;

/**
 * Convert raw retry config (snake_case) to engine config (camelCase).
 * Unset keys stay absent so the defaults apply.
 */
function convertRetryConfig(raw: RetryConfigRaw): Partial<RetryConfig> {
  const retry: Partial<RetryConfig> = {};
  if (raw.max_attempts !== undefined) retry.maxAttempts = raw.max_attempts;
  if (raw.base_delay_ms !== undefined) retry.baseDelayMs = raw.base_delay_ms;
  if (raw.max_delay_ms !== undefined) retry.maxDelayMs = raw.max_delay_ms;
  if (raw.jitter !== undefined) retry.jitter = raw.jitter;
  if (raw.max_rate_limit_waits !== undefined) retry.maxRateLimitWaits = raw.max_rate_limit_waits;
  return retry;
}

/**
 * Convert raw throttle config (snake_case) to engine config (camelCase).
 */
function convertThrottleConfig(raw: ThrottleConfigRaw): Partial<ThrottleConfig> {
  const throttle: Partial<ThrottleConfig> = {};
  if (raw.max_reqs !== undefined) throttle.maxReqs = raw.max_reqs;
  if (raw.interval_sec !== undefined) throttle.intervalSec = raw.interval_sec;
  return throttle;
}

/**
 * Build the engine configuration for one job: shared engine settings plus the
 * job's field limit overrides.
 */
export function engineConfigForJob(engine: EngineConfigRaw | undefined, job: JobConfigRaw): EngineConfig {
  return resolveEngineConfig({
    batchSize: engine?.batch_size,
    retry: engine?.retry ? convertRetryConfig(engine.retry) : undefined,
    throttle: engine?.throttle ? convertThrottleConfig(engine.throttle) : undefined,
    fieldLimits: {
      highlight: {
        ...HIGHLIGHT_FIELD_LIMITS,
        ...(job.kind === "highlight" ? job.field_limits : undefined),
      },
      document: {
        ...DOCUMENT_FIELD_LIMITS,
        ...(job.kind === "document" ? job.field_limits : undefined),
      },
    },
  });
}

export function executorFor(engine: EngineConfigRaw | undefined): Executor {
  return engine?.mode === "concurrent"
    ? concurrentExecutor(engine.concurrency ?? 4)
    : blockingExecutor;
}

/**
 * Everything the jobs of one configuration file share.
 */
export interface Workspace {
  config: ConfigFile;
  configFilePath: string;
  remote: LoadedRemote;
  store: CursorStore;
  executor: Executor;
  logger: Logger;
  /** One transport per account, so jobs of an account share its request budget */
  transports: Map<string, RateLimitedTransport>;
}

export async function openWorkspace(configFilePath: string, logger: Logger = silentLogger): Promise<Workspace> {
  const config = await loadConfigFile(configFilePath);
  return {
    config,
    configFilePath,
    remote: loadRemote(config.remote),
    store: loadCursorStore(config.state, configFilePath, logger),
    executor: executorFor(config.engine),
    logger,
    transports: new Map(),
  };
}

/**
 * Create a SyncManager instance from a job configuration.
 */
export function createManagerForJob(workspace: Workspace, job: JobConfigRaw): SyncManager {
  const account = job.account ?? "default";
  const engineConfig = engineConfigForJob(workspace.config.engine, job);

  let transport = workspace.transports.get(account);
  if (transport === undefined) {
    transport = new RateLimitedTransport({
      throttle: engineConfig.throttle,
      logger: workspace.logger.child({ account }),
    });
    workspace.transports.set(account, transport);
  }

  return new SyncManager({
    kind: job.kind,
    account,
    remote: workspace.remote.remote,
    codec: workspace.remote.codecFor(job.kind),
    config: engineConfig,
    transport,
    logger: workspace.logger.child({ job: job.id }),
    executor: workspace.executor,
  });
}

/**
 * Resolve a job's file setting relative to the config file's directory.
 */
export function resolveJobPath(workspace: Workspace, file: string): string {
  return path.resolve(path.dirname(workspace.configFilePath), file);
}

/**
 * Pick the jobs to run.
 * @throws Error if a requested job id is not configured
 */
export function selectJobs(config: ConfigFile, jobIds?: string[]): JobConfigRaw[] {
  if (!jobIds || jobIds.length === 0) {
    return config.jobs;
  }
  const unknown = jobIds.filter((id) => !config.jobs.some((job) => job.id === id));
  if (unknown.length > 0) {
    throw new Error(`Unknown job id(s): ${unknown.join(", ")}`);
  }
  return config.jobs.filter((job) => jobIds.includes(job.id));
}

/**
 * Persist what a pass produced: the cursor unless the pass failed, the ids of
 * created records in the snapshot, and the remote-side changes when the job
 * names an additions file.
 */
export async function recordPass(workspace: Workspace, job: JobConfigRaw, report: PassReport): Promise<void> {
  if (report.outcome !== "failed") {
    await workspace.store.save(report.account, report.kind, report.cursor);
  }
  await writeBackIds(resolveJobPath(workspace, job.snapshot), report.results);
  if (job.additions) {
    await writeRecords(resolveJobPath(workspace, job.additions), [
      ...report.remoteAdditions,
      ...report.remoteUpdates,
    ]);
  }
}

export interface JobRunResult {
  jobId: string;
  report: PassReport;
}

export interface RunJobsOptions {
  jobIds?: string[];
  logger?: Logger;
}

/**
 * Run one pass for each selected job of a configuration file.
 * @param configFilePath - Path to the JSONC configuration file
 * @returns One result per job, in configuration order
 */
export async function runJobs(configFilePath: string, options: RunJobsOptions = {}): Promise<JobRunResult[]> {
  const workspace = await openWorkspace(configFilePath, options.logger);
  return runWorkspaceJobs(workspace, options.jobIds);
}

export async function runWorkspaceJobs(workspace: Workspace, jobIds?: string[]): Promise<JobRunResult[]> {
  const jobs = selectJobs(workspace.config, jobIds);

  const passJobs: PassJob[] = [];
  for (const job of jobs) {
    const manager = createManagerForJob(workspace, job);
    passJobs.push({
      manager,
      snapshot: await loadSnapshot(resolveJobPath(workspace, job.snapshot)),
      cursor: await workspace.store.load(manager.account, manager.kind),
    });
  }

  const reports = await runPasses(passJobs, workspace.executor);

  const results: JobRunResult[] = [];
  for (let i = 0; i < jobs.length; i++) {
    await recordPass(workspace, jobs[i], reports[i]);
    results.push({ jobId: jobs[i].id, report: reports[i] });
  }
  return results;
}

/**
 * Create a background poller for a job. Cursors are loaded and saved by the
 * poller; created ids and additions are written after each usable pass.
 */
export function createPollerForJob(
  workspace: Workspace,
  job: JobConfigRaw,
  registry: InFlightRegistry
): BackgroundPoller {
  const poll = job.poll ?? {};
  const intervalSec = poll.interval_sec ?? DEFAULT_POLL_INTERVAL_SEC;
  const snapshotPath = resolveJobPath(workspace, job.snapshot);
  const poller = new BackgroundPoller({
    manager: createManagerForJob(workspace, job),
    store: workspace.store,
    snapshot: () => loadSnapshot(snapshotPath),
    intervalMs: intervalSec * 1000,
    backoffFactor: poll.backoff_factor ?? DEFAULT_POLL_BACKOFF_FACTOR,
    maxIntervalMs: Math.max(intervalSec, poll.max_interval_sec ?? DEFAULT_POLL_MAX_INTERVAL_SEC) * 1000,
    maxConsecutiveErrors: poll.max_consecutive_errors,
    registry,
    logger: workspace.logger.child({ job: job.id }),
  });

  poller.onPass((report) => {
    writeBackIds(snapshotPath, report.results).catch((error: unknown) => {
      workspace.logger.error("failed to write ids back to the snapshot", {
        job: job.id,
        path: snapshotPath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  });

  if (job.additions) {
    const additionsPath = resolveJobPath(workspace, job.additions);
    poller.onPass((report) => {
      writeRecords(additionsPath, [...report.remoteAdditions, ...report.remoteUpdates]).catch(
        (error: unknown) => {
          workspace.logger.error("failed to write additions", {
            job: job.id,
            path: additionsPath,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      );
    });
  }

  return poller;
}

/**
 * One-line, human-readable summary of a pass.
 */
export function summarizeReport(jobId: string, report: PassReport): string {
  const { stats } = report;
  const parts = [
    `${stats.created} created`,
    `${stats.updated} updated`,
    `${stats.skipped} skipped`,
    `${stats.failed} failed`,
    `${stats.inSync} in sync`,
    `${report.remoteAdditions.length + report.remoteUpdates.length} remote changes`,
  ];
  if (stats.truncated > 0) {
    parts.push(`${stats.truncated} truncated`);
  }
  const line = `Job '${jobId}' ${report.outcome}: ${parts.join(", ")}`;
  return report.failure
    ? `${line} (${report.failure.stage} failed: ${report.failure.error.message})`
    : line;
}
