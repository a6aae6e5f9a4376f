#!/usr/bin/env tsx
/**
 * NoteSync CLI - Main entry point
 */

import { Command } from "commander";
import * as path from "path";
import * as fs from "fs/promises";
import { config } from "dotenv";
import * as cron from "node-cron";
import {
  InFlightRegistry,
  createJsonLogger,
  describeError,
  isLogLevel,
  type Logger,
  type PollerHandle,
} from "@notesync/core";
import {
  createPollerForJob,
  openWorkspace,
  runWorkspaceJobs,
  selectJobs,
  summarizeReport,
  type Workspace,
} from "./runner.js";

// Load environment variables from .env file if it exists
config();

const DEFAULT_CONFIG = "notesync.jsonc";

function createLogger(): Logger {
  const level = process.env.NOTESYNC_LOG_LEVEL ?? "info";
  return createJsonLogger({ level: isLogLevel(level) ? level : "info" });
}

/**
 * Resolve the config path and open it, exiting when the file is missing.
 */
async function openConfig(configOption: string, logger: Logger): Promise<Workspace> {
  const configPath = path.resolve(configOption);

  // Check if config file exists
  try {
    await fs.access(configPath);
  } catch {
    console.error(`Error: Configuration file not found: ${configPath}`);
    process.exit(1);
  }

  return openWorkspace(configPath, logger);
}

function waitForSigint(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
  });
}

const program = new Command();

program
  .name("notesync")
  .description("Bulk synchronization of highlights and documents with a note service")
  .version("0.1.0");

program
  .command("run")
  .description("Run one sync pass per job")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-j, --jobs <ids...>", "Specific job IDs to run (default: all jobs)")
  .action(async (options: { config: string; jobs?: string[] }) => {
    try {
      const workspace = await openConfig(options.config, createLogger());
      const results = await runWorkspaceJobs(workspace, options.jobs);

      for (const { jobId, report } of results) {
        console.log(summarizeReport(jobId, report));
      }
      console.log(`\nCompleted ${results.length} job(s)`);

      // Exit with error code if any pass failed
      const hasFailures = results.some(({ report }) => report.outcome === "failed");
      process.exit(hasFailures ? 1 : 0);
    } catch (error) {
      console.error(`Error running jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("poll")
  .description("Poll every job in the background until interrupted")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("-j, --jobs <ids...>", "Specific job IDs to poll (default: all jobs)")
  .action(async (options: { config: string; jobs?: string[] }) => {
    try {
      const workspace = await openConfig(options.config, createLogger());
      const registry = new InFlightRegistry();
      const handles: PollerHandle[] = [];

      for (const job of selectJobs(workspace.config, options.jobs)) {
        const poller = createPollerForJob(workspace, job, registry);
        poller.onPass((report) => console.log(summarizeReport(job.id, report)));
        handles.push(poller.start());
      }

      console.log(`Polling ${handles.length} job(s). Press Ctrl+C to stop.`);

      const stopped = Promise.all(handles.map((handle) => handle.done));
      const interrupted = waitForSigint().then(async () => {
        console.log("\nShutting down...");
        await Promise.all(handles.map((handle) => handle.cancel()));
      });
      await Promise.race([stopped, interrupted]);
      await stopped;
      process.exit(0);
    } catch (error) {
      console.error(`Error polling jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("schedule")
  .description("Run sync jobs on their configured cron schedules")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    try {
      const workspace = await openConfig(options.config, createLogger());
      console.log(`Starting scheduled sync jobs from ${workspace.configFilePath}`);
      console.log(`Found ${workspace.config.jobs.length} job(s)\n`);

      // One pass per job at a time: a tick that finds the last pass still running is skipped
      const inFlight = new InFlightRegistry();
      const scheduledJobs = new Map<string, cron.ScheduledTask>();

      for (const job of workspace.config.jobs) {
        if (!job.schedule) {
          console.log(`Job '${job.id}' has no schedule (manual/CLI-only)`);
          continue;
        }
        if (!cron.validate(job.schedule)) {
          console.error(`Invalid cron expression for job '${job.id}': ${job.schedule}`);
          continue;
        }

        const task = cron.schedule(
          job.schedule,
          async () => {
            const release = inFlight.tryAcquire(job.id);
            if (release === null) {
              workspace.logger.warn("skipping scheduled run, previous run still in flight", {
                job: job.id,
              });
              return;
            }
            try {
              const [result] = await runWorkspaceJobs(workspace, [job.id]);
              console.log(summarizeReport(result.jobId, result.report));
            } catch (error) {
              console.error(`Error running job '${job.id}': ${describeError(error)}`);
            } finally {
              release();
            }
          },
          { scheduled: true, timezone: "UTC" }
        );

        scheduledJobs.set(job.id, task);
        console.log(`Scheduled job '${job.id}' with cron: ${job.schedule}`);
      }

      if (scheduledJobs.size === 0) {
        console.log("\nNo jobs with schedules found. Use 'notesync run' to run jobs manually.");
        process.exit(0);
      }

      console.log(`\n${scheduledJobs.size} job(s) scheduled. Press Ctrl+C to stop.`);

      await waitForSigint();
      console.log("\nShutting down...");
      for (const [jobId, task] of scheduledJobs) {
        task.stop();
        console.log(`Stopped schedule for job '${jobId}'`);
      }
      process.exit(0);
    } catch (error) {
      console.error(`Error starting scheduled jobs: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("validate")
  .description("Validate a configuration file without running jobs")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .action(async (options: { config: string }) => {
    try {
      const { config: loaded, configFilePath } = await openConfig(options.config, createLogger());

      console.log(`✓ Configuration file is valid: ${configFilePath}`);
      console.log(`  Remote: ${loaded.remote.driver}`);
      console.log(`  State: ${loaded.state.driver}${loaded.state.driver === "file" ? ` (${loaded.state.path})` : ""}`);
      console.log(`  Jobs: ${loaded.jobs.length}`);

      for (const job of loaded.jobs) {
        console.log(
          `    - ${job.id}: ${job.account ?? "default"}/${job.kind}${job.schedule ? ` (schedule: ${job.schedule})` : " (manual)"}`
        );
      }

      process.exit(0);
    } catch (error) {
      console.error(`Configuration validation failed: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command("cursors")
  .description("Show saved cursors, or reset them")
  .option("-c, --config <path>", "Path to JSONC configuration file", DEFAULT_CONFIG)
  .option("--reset [job]", "Reset the cursor of one job, or of every job")
  .action(async (options: { config: string; reset?: string | boolean }) => {
    try {
      const workspace = await openConfig(options.config, createLogger());

      if (options.reset !== undefined && options.reset !== false) {
        const jobs = selectJobs(
          workspace.config,
          typeof options.reset === "string" ? [options.reset] : undefined
        );
        for (const job of jobs) {
          await workspace.store.reset(job.account ?? "default", job.kind);
          console.log(`Reset cursor for job '${job.id}'`);
        }
        process.exit(0);
      }

      const cursors = await workspace.store.list();
      if (cursors.length === 0) {
        console.log("No saved cursors");
      }
      for (const { account, kind, cursor } of cursors) {
        const watermark = cursor.watermark === null ? "none" : new Date(cursor.watermark).toISOString();
        console.log(`${account}/${kind}: watermark ${watermark}${cursor.token ? `, resume token ${cursor.token}` : ""}`);
      }
      process.exit(0);
    } catch (error) {
      console.error(`Error reading cursors: ${describeError(error)}`);
      process.exit(1);
    }
  });

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
