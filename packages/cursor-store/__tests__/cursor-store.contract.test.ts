/**
 * Contract tests for CursorStore implementations.
 * Every store (InMemory, File) must behave identically according to the interface contract.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { CursorStore, Logger } from "@notesync/core";
import { InMemoryCursorStore } from "../src/in-memory-cursor-store";
import { FileCursorStore } from "../src/file-cursor-store";

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "cursor-store-"));
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

let fileCounter = 0;

function nextStatePath(): string {
  fileCounter += 1;
  return path.join(tmpDir, `state-${fileCounter}`, "cursors.json");
}

/**
 * Test suite that works with any CursorStore implementation.
 */
function runCursorStoreContractTests(createStore: () => CursorStore, implementationName: string) {
  describe(`CursorStore Contract Tests - ${implementationName}`, () => {
    let store: CursorStore;

    beforeEach(() => {
      store = createStore();
    });

    it("should return the initial cursor when nothing was saved", async () => {
      const cursor = await store.load("acct", "highlight");
      expect(cursor).toEqual({ token: null, watermark: null });
    });

    it("should save and load cursors", async () => {
      await store.save("acct", "highlight", { token: null, watermark: 42 });

      const loaded = await store.load("acct", "highlight");
      expect(loaded).toEqual({ token: null, watermark: 42 });
    });

    it("should handle cursor updates", async () => {
      await store.save("acct", "highlight", { token: null, watermark: 1 });
      await store.save("acct", "highlight", { token: "page-2", watermark: 7 });

      const loaded = await store.load("acct", "highlight");
      expect(loaded).toEqual({ token: "page-2", watermark: 7 });
    });

    it("should track cursors per account and kind independently", async () => {
      await store.save("acct1", "highlight", { token: null, watermark: 1 });
      await store.save("acct1", "document", { token: null, watermark: 2 });
      await store.save("acct2", "highlight", { token: null, watermark: 3 });

      expect((await store.load("acct1", "highlight")).watermark).toBe(1);
      expect((await store.load("acct1", "document")).watermark).toBe(2);
      expect((await store.load("acct2", "highlight")).watermark).toBe(3);
      expect((await store.load("acct2", "document")).watermark).toBeNull();
    });

    it("should not share state with the returned cursor object", async () => {
      await store.save("acct", "document", { token: null, watermark: 5 });

      const loaded = await store.load("acct", "document");
      loaded.watermark = 99;

      expect((await store.load("acct", "document")).watermark).toBe(5);
    });

    it("should reset a single kind", async () => {
      await store.save("acct", "highlight", { token: null, watermark: 1 });
      await store.save("acct", "document", { token: null, watermark: 2 });

      await store.reset("acct", "highlight");

      expect(await store.load("acct", "highlight")).toEqual({ token: null, watermark: null });
      expect((await store.load("acct", "document")).watermark).toBe(2);
    });

    it("should reset every kind of an account", async () => {
      await store.save("acct", "highlight", { token: null, watermark: 1 });
      await store.save("acct", "document", { token: null, watermark: 2 });
      await store.save("other", "highlight", { token: null, watermark: 3 });

      await store.reset("acct");

      expect((await store.load("acct", "highlight")).watermark).toBeNull();
      expect((await store.load("acct", "document")).watermark).toBeNull();
      expect((await store.load("other", "highlight")).watermark).toBe(3);
    });

    it("should list saved cursors", async () => {
      await store.save("acct", "highlight", { token: null, watermark: 1 });
      await store.save("acct", "document", { token: "t", watermark: null });

      const listed = await store.list();
      const sorted = [...listed].sort((a, b) => a.kind.localeCompare(b.kind));

      expect(sorted).toEqual([
        { account: "acct", kind: "document", cursor: { token: "t", watermark: null } },
        { account: "acct", kind: "highlight", cursor: { token: null, watermark: 1 } },
      ]);
    });

    it("should keep every save when saves run concurrently", async () => {
      await Promise.all([
        store.save("acct", "highlight", { token: null, watermark: 10 }),
        store.save("acct", "document", { token: null, watermark: 20 }),
      ]);

      expect((await store.load("acct", "highlight")).watermark).toBe(10);
      expect((await store.load("acct", "document")).watermark).toBe(20);
    });
  });
}

runCursorStoreContractTests(() => new InMemoryCursorStore(), "InMemory");
runCursorStoreContractTests(() => new FileCursorStore({ path: nextStatePath() }), "File");

describe("FileCursorStore persistence", () => {
  it("should resume from the state file in a new instance", async () => {
    const statePath = nextStatePath();
    const first = new FileCursorStore({ path: statePath });
    await first.save("acct", "highlight", { token: null, watermark: 1234 });

    const second = new FileCursorStore({ path: statePath });
    expect(await second.load("acct", "highlight")).toEqual({ token: null, watermark: 1234 });
  });

  it("should write a versioned JSON document with update times", async () => {
    const statePath = nextStatePath();
    const store = new FileCursorStore({
      path: statePath,
      now: () => new Date("2024-01-02T03:04:05.000Z"),
    });
    await store.save("acct", "document", { token: null, watermark: 9 });

    const written = JSON.parse(await fs.readFile(statePath, "utf-8"));
    expect(written).toEqual({
      version: 1,
      accounts: {
        acct: {
          document: { token: null, watermark: 9, updatedAt: "2024-01-02T03:04:05.000Z" },
        },
      },
    });
  });

  it("should keep the last written cursor when a save cannot be written", async () => {
    const statePath = nextStatePath();
    const store = new FileCursorStore({ path: statePath });
    await store.save("acct", "highlight", { token: null, watermark: 10 });

    // A directory in place of the state file makes the final rename fail
    await fs.rm(statePath);
    await fs.mkdir(statePath);

    await expect(store.save("acct", "highlight", { token: null, watermark: 20 })).rejects.toThrow();
    expect(await store.load("acct", "highlight")).toEqual({ token: null, watermark: 10 });

    await fs.rm(statePath, { recursive: true });
    await store.save("acct", "document", { token: null, watermark: 5 });
    const reopened = new FileCursorStore({ path: statePath });
    expect(await reopened.load("acct", "highlight")).toEqual({ token: null, watermark: 10 });
    expect(await reopened.load("acct", "document")).toEqual({ token: null, watermark: 5 });
  });

  it("should treat a corrupt state file as empty and log a warning", async () => {
    const statePath = nextStatePath();
    await fs.mkdir(path.dirname(statePath), { recursive: true });
    await fs.writeFile(statePath, "{not json", "utf-8");

    const warn = jest.fn();
    const logger: Logger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn,
      error: jest.fn(),
      child: () => logger,
    };
    const store = new FileCursorStore({ path: statePath, logger });

    expect(await store.load("acct", "highlight")).toEqual({ token: null, watermark: null });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe("ignoring unreadable cursor state file");

    // The next save replaces the corrupt file
    await store.save("acct", "highlight", { token: null, watermark: 3 });
    const reopened = new FileCursorStore({ path: statePath });
    expect((await reopened.load("acct", "highlight")).watermark).toBe(3);
  });

  it("should drop malformed entries and keep the valid ones", async () => {
    const statePath = nextStatePath();
    await fs.mkdir(path.dirname(statePath), { recursive: true });
    await fs.writeFile(
      statePath,
      JSON.stringify({
        version: 1,
        accounts: {
          acct: {
            highlight: { token: null, watermark: 5, updatedAt: "x" },
            document: { token: 12, watermark: "bad" },
          },
        },
      }),
      "utf-8"
    );

    const store = new FileCursorStore({ path: statePath });
    expect((await store.load("acct", "highlight")).watermark).toBe(5);
    expect(await store.load("acct", "document")).toEqual({ token: null, watermark: null });
  });
});
