import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { expandEnvironmentVariables, loadConfigFile, parseConfigText } from "../src/parser";

const VALID_CONFIG = `{
  // Remote service
  "remote": {
    "driver": "http",
    "base_url": "https://notes.test",
    "token": "\${NOTESYNC_TOKEN}",
  },
  "state": { "driver": "file", "path": "\${STATE_DIR:-.notesync}/cursors.json" },
  "engine": { "batch_size": 50, "mode": "concurrent", "retry": { "max_attempts": 3 } },
  "jobs": [
    {
      "id": "highlights",
      "kind": "highlight",
      "snapshot": "highlights.json",
      "schedule": "*/15 * * * *",
      "poll": { "interval_sec": 60, "backoff_factor": 2, "max_interval_sec": 600 },
      "field_limits": { "note": 100 },
    },
    { "id": "docs", "account": "work", "kind": "document", "snapshot": "docs.json" },
  ],
}`;

describe("parseConfigText", () => {
  it("should parse JSONC and expand environment variables", () => {
    const config = parseConfigText(VALID_CONFIG, { NOTESYNC_TOKEN: "test-token" });

    expect(config.remote).toEqual({
      driver: "http",
      base_url: "https://notes.test",
      token: "test-token",
      page_size: undefined,
      timeout_ms: undefined,
    });
    expect(config.state).toEqual({ driver: "file", path: ".notesync/cursors.json" });
    expect(config.engine?.batch_size).toBe(50);
    expect(config.engine?.mode).toBe("concurrent");
    expect(config.engine?.retry?.max_attempts).toBe(3);
    expect(config.jobs.map((job) => job.id)).toEqual(["highlights", "docs"]);
    expect(config.jobs[0].poll).toEqual({
      interval_sec: 60,
      backoff_factor: 2,
      max_interval_sec: 600,
      max_consecutive_errors: undefined,
    });
    expect(config.jobs[0].field_limits).toEqual({ note: 100 });
    expect(config.jobs[1].account).toBe("work");
  });

  it("should report JSONC syntax errors", () => {
    expect(() => parseConfigText('{ "remote": }', {})).toThrow(/^Failed to parse JSONC file: /);
  });

  it("should require the remote section", () => {
    expect(() =>
      parseConfigText(JSON.stringify({ state: { driver: "in-memory" }, jobs: [] }), {})
    ).toThrow("Configuration must include 'remote' section");
  });

  it("should reject an unknown remote driver", () => {
    const text = JSON.stringify({
      remote: { driver: "ftp" },
      state: { driver: "in-memory" },
      jobs: [],
    });
    expect(() => parseConfigText(text, {})).toThrow('remote.driver must be "http" or "in-memory", got "ftp"');
  });

  it("should reject an unknown record kind", () => {
    const text = JSON.stringify({
      remote: { driver: "in-memory" },
      state: { driver: "in-memory" },
      jobs: [{ id: "j1", kind: "book", snapshot: "s.json" }],
    });
    expect(() => parseConfigText(text, {})).toThrow(`Job 'j1': kind must be "highlight" or "document"`);
  });

  it("should reject two jobs syncing the same account and kind", () => {
    const text = JSON.stringify({
      remote: { driver: "in-memory" },
      state: { driver: "in-memory" },
      jobs: [
        { id: "a", kind: "highlight", snapshot: "a.json" },
        { id: "b", kind: "highlight", snapshot: "b.json" },
      ],
    });
    expect(() => parseConfigText(text, {})).toThrow("Jobs 'a' and 'b' both sync 'default:highlight'");
  });

  it("should reject invalid numbers", () => {
    const text = JSON.stringify({
      remote: { driver: "in-memory" },
      state: { driver: "in-memory" },
      engine: { batch_size: 0 },
      jobs: [],
    });
    expect(() => parseConfigText(text, {})).toThrow("engine: batch_size must be at least 1");
  });

  it("should reject poll settings under which backoff cannot lengthen the interval", () => {
    const withPoll = (poll: { [key: string]: number }) =>
      JSON.stringify({
        remote: { driver: "in-memory" },
        state: { driver: "in-memory" },
        jobs: [{ id: "j", kind: "document", snapshot: "s.json", poll }],
      });

    expect(() => parseConfigText(withPoll({ interval_sec: 0 }), {})).toThrow(
      "Job 'j', poll: interval_sec must be greater than 0"
    );
    expect(() => parseConfigText(withPoll({ backoff_factor: 1 }), {})).toThrow(
      "Job 'j', poll: backoff_factor must be greater than 1"
    );
  });

  it("should reject a poll maximum below the interval", () => {
    const text = JSON.stringify({
      remote: { driver: "in-memory" },
      state: { driver: "in-memory" },
      jobs: [{ id: "j", kind: "document", snapshot: "s.json", poll: { interval_sec: 60, max_interval_sec: 30 } }],
    });
    expect(() => parseConfigText(text, {})).toThrow(
      "Job 'j', poll: max_interval_sec must not be below interval_sec"
    );
  });
});

describe("expandEnvironmentVariables", () => {
  it("should expand strings at any depth and leave other values alone", () => {
    const expanded = expandEnvironmentVariables(
      { a: "${HOME_DIR}/x", b: ["${MISSING:-fallback}", 3], c: { d: "${UNSET}" }, e: true },
      { HOME_DIR: "/home/test" }
    );

    expect(expanded).toEqual({
      a: "/home/test/x",
      b: ["fallback", 3],
      c: { d: "${UNSET}" },
      e: true,
    });
  });
});

describe("loadConfigFile", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "notesync-config-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("should load a config file from disk", async () => {
    const configPath = path.join(tmpDir, "notesync.jsonc");
    await fs.writeFile(configPath, VALID_CONFIG, "utf-8");

    const config = await loadConfigFile(configPath, { NOTESYNC_TOKEN: "test-token" });
    expect(config.jobs).toHaveLength(2);
  });

  it("should name the file when loading fails", async () => {
    const configPath = path.join(tmpDir, "missing.jsonc");
    await expect(loadConfigFile(configPath, {})).rejects.toThrow(
      `Failed to load config from ${configPath}: `
    );
  });
});
