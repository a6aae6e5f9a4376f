import { TransientError, type SyncRecord } from "@notesync/core";
import { InMemoryRemote } from "../src/in-memory-remote";
import { plainCodec } from "../src/plain-codec";

function highlight(key: string, revision: number, text = `text ${key}`): SyncRecord {
  return { key, revision, fields: { text } };
}

describe("InMemoryRemote", () => {
  describe("list", () => {
    it("should page through records ordered by revision", async () => {
      const remote = new InMemoryRemote({
        pageSize: 2,
        initialRecords: {
          highlight: [highlight("c", 30), highlight("a", 10), highlight("b", 20)],
        },
      });

      const first = await remote.list({ kind: "highlight", pageToken: null, updatedAfter: null });
      expect(first.items.map((item) => item.key)).toEqual(["a", "b"]);
      expect(first.nextPageToken).toBe("2");

      const second = await remote.list({ kind: "highlight", pageToken: "2", updatedAfter: null });
      expect(second.items.map((item) => item.key)).toEqual(["c"]);
      expect(second.nextPageToken).toBeNull();
    });

    it("should include records at or above updatedAfter", async () => {
      const remote = new InMemoryRemote({
        initialRecords: {
          highlight: [highlight("a", 10), highlight("b", 20), highlight("c", 30)],
        },
      });

      const page = await remote.list({ kind: "highlight", pageToken: null, updatedAfter: 20 });
      expect(page.items.map((item) => item.key)).toEqual(["b", "c"]);
    });

    it("should keep kinds apart", async () => {
      const remote = new InMemoryRemote({
        initialRecords: { highlight: [highlight("a", 1)] },
      });

      const page = await remote.list({ kind: "document", pageToken: null, updatedAfter: null });
      expect(page).toEqual({ items: [], nextPageToken: null });
    });

    it("should reject an invalid page token", async () => {
      const remote = new InMemoryRemote();
      await expect(
        remote.list({ kind: "highlight", pageToken: "abc", updatedAfter: null })
      ).rejects.toThrow("Invalid page token 'abc'");
    });
  });

  describe("createOrUpdate", () => {
    it("should create records without an id and update records with one", async () => {
      const remote = new InMemoryRemote();
      const existingId = remote.addRecord("highlight", highlight("old", 1));
      expect(existingId).toBe("highlight-1");

      const outcomes = await remote.createOrUpdate("highlight", [
        plainCodec.encode(highlight("new", 2)),
        plainCodec.encode({ ...highlight("old", 3, "edited"), id: existingId }),
      ]);

      expect(outcomes).toEqual([
        { status: "created", id: "highlight-2" },
        { status: "updated", id: "highlight-1" },
      ]);
      expect(remote.getRecord("highlight", "highlight-1")?.fields.text).toBe("edited");
      expect(remote.getRecord("highlight", "highlight-2")?.key).toBe("new");
    });

    it("should reject an update for an unknown id", async () => {
      const remote = new InMemoryRemote();
      const outcomes = await remote.createOrUpdate("document", [
        plainCodec.encode({ ...highlight("x", 1), id: "missing" }),
      ]);
      expect(outcomes).toEqual([{ status: "rejected", message: "Record missing not found" }]);
    });

    it("should reject payloads the codec cannot read", async () => {
      const remote = new InMemoryRemote();
      const outcomes = await remote.createOrUpdate("highlight", [{ revision: 1, fields: {} }]);
      expect(outcomes).toEqual([
        { status: "rejected", message: "Payload is missing a string 'key'" },
      ]);
    });

    it("should apply the rejection rule per item", async () => {
      const remote = new InMemoryRemote({
        rejectWhen: (record) => (record.key === "bad" ? "text is required" : null),
      });

      const outcomes = await remote.createOrUpdate("highlight", [
        plainCodec.encode(highlight("good", 1)),
        plainCodec.encode(highlight("bad", 1)),
      ]);

      expect(outcomes[0].status).toBe("created");
      expect(outcomes[1]).toEqual({ status: "rejected", message: "text is required" });
      expect(remote.getAllRecords("highlight")).toHaveLength(1);
    });
  });

  describe("injected failures", () => {
    it("should throw queued errors once each, then recover", async () => {
      const remote = new InMemoryRemote();
      const failure = new TransientError("connection reset");
      remote.failNext("createOrUpdate", failure);

      await expect(
        remote.createOrUpdate("highlight", [plainCodec.encode(highlight("a", 1))])
      ).rejects.toBe(failure);
      await expect(
        remote.createOrUpdate("highlight", [plainCodec.encode(highlight("a", 1))])
      ).resolves.toEqual([{ status: "created", id: "highlight-1" }]);
    });

    it("should record every call, including failed ones", async () => {
      const remote = new InMemoryRemote();
      remote.failNext("list", new TransientError("timeout"));

      await expect(
        remote.list({ kind: "highlight", pageToken: null, updatedAfter: null })
      ).rejects.toThrow("timeout");
      await remote.list({ kind: "highlight", pageToken: null, updatedAfter: 5 });

      expect(remote.callsFor("list").map((call) => call.request.updatedAfter)).toEqual([null, 5]);
      expect(remote.callsFor("createOrUpdate")).toHaveLength(0);
    });
  });

  it("should reset everything on clear", async () => {
    const remote = new InMemoryRemote({ initialRecords: { highlight: [highlight("a", 1)] } });
    remote.clear();

    expect(remote.getAllRecords("highlight")).toEqual([]);
    expect(remote.calls).toEqual([]);
    expect(remote.addRecord("highlight", highlight("b", 1))).toBe("highlight-1");
  });
});

describe("plainCodec", () => {
  it("should carry id, key, revision and fields across the wire", () => {
    const record: SyncRecord = {
      id: "h-1",
      key: "k",
      revision: 5,
      fields: { text: "hello", tags: ["a", "b"], note: null },
    };
    const decoded = plainCodec.decode(plainCodec.encode(record));
    expect(decoded).toEqual(record);
  });

  it("should copy arrays so callers cannot mutate stored fields", () => {
    const tags = ["a"];
    const payload = plainCodec.encode({ key: "k", revision: 1, fields: { tags } });
    tags.push("b");
    expect(payload.fields).toEqual({ tags: ["a"] });
  });

  it("should reject malformed fields", () => {
    expect(() =>
      plainCodec.decode({ key: "k", revision: 1, fields: { nested: { a: 1 } } })
    ).toThrow("Payload 'k' has malformed 'fields'");
  });
});
