/**
 * BackgroundPoller - runs sync passes on an interval, persisting the cursor
 * after each pass so a restart resumes where the last run stopped.
 */

import { PassInProgressError, describeError } from "./errors.js";
import { InFlightRegistry } from "./inflight.js";
import { silentLogger, type Logger } from "./logger.js";
import type { PassReport, SyncManager } from "./manager.js";
import { systemClock } from "./runtime.js";
import type { Clock, CursorStore, SyncRecord } from "./types.js";

export interface PollerOptions {
  manager: SyncManager;
  store: CursorStore;
  /** Supplies the local snapshot for each pass */
  snapshot: () => Promise<readonly SyncRecord[]> | readonly SyncRecord[];
  intervalMs: number;
  /** Multiplier applied to the interval after a failed pass, at least 1 */
  backoffFactor: number;
  maxIntervalMs: number;
  /** Stop the loop after this many failed passes in a row; unlimited when unset */
  maxConsecutiveErrors?: number;
  /** Share one registry between pollers that may target the same account and kind */
  registry?: InFlightRegistry;
  clock?: Clock;
  logger?: Logger;
}

export interface PollerState {
  lastPollTime: Date | null;
  pollCount: number;
  errorCount: number;
  consecutiveErrors: number;
  lastError: string | null;
  currentIntervalMs: number;
  isRunning: boolean;
}

export interface PollerHandle {
  /** Interrupt the pending sleep, let a running pass finish, then stop */
  cancel(): Promise<void>;
  /** Settles when the loop has stopped */
  readonly done: Promise<void>;
  readonly isRunning: boolean;
}

export type PassListener = (report: PassReport) => void;
export type PollerErrorListener = (error: Error, report?: PassReport) => void;

export class BackgroundPoller {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly registry: InFlightRegistry;
  private readonly passListeners: PassListener[] = [];
  private readonly errorListeners: PollerErrorListener[] = [];
  private readonly pollerState: PollerState;
  private controller: AbortController | null = null;

  constructor(private readonly options: PollerOptions) {
    if (!(options.intervalMs > 0) || options.maxIntervalMs < options.intervalMs) {
      throw new Error("Poller needs 0 < intervalMs <= maxIntervalMs");
    }
    if (!(options.backoffFactor > 1)) {
      throw new Error(`backoffFactor must be greater than 1, got ${options.backoffFactor}`);
    }
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger).child({
      account: options.manager.account,
      kind: options.manager.kind,
    });
    this.registry = options.registry ?? new InFlightRegistry();
    this.pollerState = {
      lastPollTime: null,
      pollCount: 0,
      errorCount: 0,
      consecutiveErrors: 0,
      lastError: null,
      currentIntervalMs: options.intervalMs,
      isRunning: false,
    };
  }

  get state(): PollerState {
    return { ...this.pollerState };
  }

  get isRunning(): boolean {
    return this.pollerState.isRunning;
  }

  onPass(listener: PassListener): void {
    this.passListeners.push(listener);
  }

  onError(listener: PollerErrorListener): void {
    this.errorListeners.push(listener);
  }

  /**
   * Clear the error streak and return to the baseline interval.
   */
  resetErrors(): void {
    this.pollerState.consecutiveErrors = 0;
    this.pollerState.lastError = null;
    this.pollerState.currentIntervalMs = this.options.intervalMs;
  }

  /**
   * Run a single pass now.
   * @throws PassInProgressError when a pass for the same account and kind is running
   */
  async pollOnce(): Promise<PassReport> {
    const { manager, store } = this.options;
    const key = InFlightRegistry.keyFor(manager.account, manager.kind);
    const release = this.registry.tryAcquire(key);
    if (release === null) {
      throw new PassInProgressError(key);
    }

    try {
      const cursor = await store.load(manager.account, manager.kind);
      const snapshot = await this.options.snapshot();
      const report = await manager.runOnce(snapshot, cursor);

      if (report.outcome !== "failed") {
        await store.save(manager.account, manager.kind, report.cursor);
      }

      this.pollerState.pollCount++;
      this.pollerState.lastPollTime = new Date(this.clock.now());

      if (report.outcome === "failed") {
        const error = report.failure?.error ?? new Error("Sync pass failed");
        this.recordFailure(error, report);
      } else {
        this.pollerState.consecutiveErrors = 0;
        this.pollerState.currentIntervalMs = this.options.intervalMs;
        this.emitPass(report);
      }
      return report;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(describeError(error));
      this.recordFailure(failure);
      throw failure;
    } finally {
      release();
    }
  }

  /**
   * Start the polling loop. The first pass runs immediately.
   */
  start(): PollerHandle {
    if (this.controller !== null) {
      throw new Error("Poller is already running");
    }
    const controller = new AbortController();
    this.controller = controller;
    this.pollerState.isRunning = true;
    this.logger.info("poller started", { intervalMs: this.options.intervalMs });

    const done = this.loop(controller.signal).finally(() => {
      this.pollerState.isRunning = false;
      this.controller = null;
      this.logger.info("poller stopped", { pollCount: this.pollerState.pollCount });
    });

    const poller = this;
    return {
      cancel: async () => {
        controller.abort();
        await done;
      },
      done,
      get isRunning() {
        return poller.isRunning;
      },
    };
  }

  private async loop(signal: AbortSignal): Promise<void> {
    const { maxConsecutiveErrors } = this.options;

    while (!signal.aborted) {
      try {
        await this.pollOnce();
      } catch (error) {
        if (error instanceof PassInProgressError) {
          this.logger.info("skipping pass, previous pass still in flight");
        }
        // Other failures were already recorded by pollOnce
      }

      if (
        maxConsecutiveErrors !== undefined &&
        this.pollerState.consecutiveErrors >= maxConsecutiveErrors
      ) {
        this.logger.error("stopping poller after consecutive failures", {
          consecutiveErrors: this.pollerState.consecutiveErrors,
        });
        return;
      }

      await this.clock.sleep(this.pollerState.currentIntervalMs, signal);
    }
  }

  private recordFailure(error: Error, report?: PassReport): void {
    this.pollerState.errorCount++;
    this.pollerState.consecutiveErrors++;
    this.pollerState.lastError = error.message;
    this.pollerState.currentIntervalMs = Math.min(
      this.pollerState.currentIntervalMs * this.options.backoffFactor,
      this.options.maxIntervalMs
    );
    this.logger.warn("pass failed, backing off", {
      consecutiveErrors: this.pollerState.consecutiveErrors,
      nextIntervalMs: this.pollerState.currentIntervalMs,
      error: error.message,
    });

    for (const listener of this.errorListeners) {
      try {
        listener(error, report);
      } catch (listenerError) {
        this.logger.warn("error listener threw", { error: describeError(listenerError) });
      }
    }
  }

  private emitPass(report: PassReport): void {
    for (const listener of this.passListeners) {
      try {
        listener(report);
      } catch (error) {
        this.logger.warn("pass listener threw", { error: describeError(error) });
      }
    }
  }
}

/**
 * Start a poller and return its cancellable handle.
 */
export function startPolling(options: PollerOptions): PollerHandle {
  return new BackgroundPoller(options).start();
}
