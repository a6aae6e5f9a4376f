/**
 * FileCursorStore - persists cursors to a JSON state file so a restarted poller
 * resumes instead of pulling everything again.
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  silentLogger,
  type CursorStore,
  type Logger,
  type RecordKind,
  type SyncCursor,
} from "@notesync/core";
import { INITIAL_CURSOR } from "./in-memory-cursor-store.js";

const STATE_VERSION = 1;

interface StoredCursor extends SyncCursor {
  updatedAt: string;
}

interface StateFile {
  version: number;
  accounts: { [account: string]: { [kind: string]: StoredCursor } };
}

export interface FileCursorStoreOptions {
  /** Path of the JSON state file; parent directories are created on save */
  path: string;
  logger?: Logger;
  now?: () => Date;
}

export class FileCursorStore implements CursorStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private state: StateFile | null = null;
  // Serializes writes so concurrent saves for different kinds do not clobber each other
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: FileCursorStoreOptions) {
    if (!options.path) {
      throw new Error("FileCursorStore requires path");
    }
    this.filePath = path.resolve(options.path);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async load(account: string, kind: RecordKind): Promise<SyncCursor> {
    const state = await this.read();
    const stored = state.accounts[account]?.[kind];
    if (stored === undefined) {
      return { ...INITIAL_CURSOR };
    }
    return { token: stored.token, watermark: stored.watermark };
  }

  async save(account: string, kind: RecordKind, cursor: SyncCursor): Promise<void> {
    await this.mutate((state) => {
      const byKind = state.accounts[account] ?? {};
      byKind[kind] = {
        token: cursor.token,
        watermark: cursor.watermark,
        updatedAt: this.now().toISOString(),
      };
      state.accounts[account] = byKind;
    });
  }

  async reset(account: string, kind?: RecordKind): Promise<void> {
    await this.mutate((state) => {
      if (kind === undefined) {
        delete state.accounts[account];
        return;
      }
      const byKind = state.accounts[account];
      if (byKind !== undefined) {
        delete byKind[kind];
      }
    });
  }

  async list(): Promise<Array<{ account: string; kind: RecordKind; cursor: SyncCursor }>> {
    const state = await this.read();
    const result: Array<{ account: string; kind: RecordKind; cursor: SyncCursor }> = [];
    for (const [account, byKind] of Object.entries(state.accounts)) {
      for (const [kind, stored] of Object.entries(byKind)) {
        if (kind === "highlight" || kind === "document") {
          result.push({
            account,
            kind,
            cursor: { token: stored.token, watermark: stored.watermark },
          });
        }
      }
    }
    return result;
  }

  /**
   * Apply `change` to a copy of the state and adopt the copy once it is on
   * disk, so a failed write leaves memory matching the file.
   */
  private async mutate(change: (state: StateFile) => void): Promise<void> {
    const run = this.writeChain.then(async () => {
      const next = structuredClone(await this.read());
      change(next);
      await this.write(next);
      this.state = next;
    });
    // Keep the chain alive after a failed write; the caller still sees the error
    this.writeChain = run.catch((error: unknown) => {
      this.logger.error("failed to write cursor state", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return run;
  }

  private async read(): Promise<StateFile> {
    if (this.state !== null) {
      return this.state;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        this.state = emptyState();
        return this.state;
      }
      throw error;
    }

    try {
      this.state = parseState(JSON.parse(content));
    } catch (error) {
      // A corrupt state file means starting over, not refusing to run
      this.logger.warn("ignoring unreadable cursor state file", {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      this.state = emptyState();
    }
    return this.state;
  }

  private async write(state: StateFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify(state, null, 2)}\n`, "utf-8");
    await fs.rename(tmpPath, this.filePath);
  }
}

function emptyState(): StateFile {
  return { version: STATE_VERSION, accounts: {} };
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Validate a parsed state file. Malformed entries are dropped, a malformed
 * document is rejected.
 */
function parseState(value: unknown): StateFile {
  if (typeof value !== "object" || value === null || !("accounts" in value)) {
    throw new Error("State file must be an object with 'accounts'");
  }
  const accounts = value.accounts;
  if (typeof accounts !== "object" || accounts === null) {
    throw new Error("'accounts' must be an object");
  }

  const state = emptyState();
  for (const [account, byKind] of Object.entries(accounts)) {
    if (typeof byKind !== "object" || byKind === null) {
      continue;
    }
    const parsed: { [kind: string]: StoredCursor } = {};
    for (const [kind, stored] of Object.entries(byKind)) {
      const cursor = parseStoredCursor(stored);
      if (cursor !== null) {
        parsed[kind] = cursor;
      }
    }
    state.accounts[account] = parsed;
  }
  return state;
}

function parseStoredCursor(value: unknown): StoredCursor | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  const token = "token" in value ? value.token : null;
  const watermark = "watermark" in value ? value.watermark : null;
  const updatedAt = "updatedAt" in value ? value.updatedAt : "";
  if (token !== null && typeof token !== "string") {
    return null;
  }
  if (watermark !== null && typeof watermark !== "number") {
    return null;
  }
  return {
    token,
    watermark,
    updatedAt: typeof updatedAt === "string" ? updatedAt : "",
  };
}
