/**
 * InMemoryCursorStore - An in-memory implementation of CursorStore for testing.
 */

import type { CursorStore, RecordKind, SyncCursor } from "@notesync/core";

export const INITIAL_CURSOR: SyncCursor = { token: null, watermark: null };

/**
 * Cursor storage keyed by account, then kind.
 * Useful for testing and development without touching the filesystem.
 */
export class InMemoryCursorStore implements CursorStore {
  private readonly cursors = new Map<string, Map<RecordKind, SyncCursor>>();

  /**
   * Load the last saved cursor, or the initial cursor when none was saved.
   */
  async load(account: string, kind: RecordKind): Promise<SyncCursor> {
    const cursor = this.cursors.get(account)?.get(kind);
    return cursor ? { ...cursor } : { ...INITIAL_CURSOR };
  }

  async save(account: string, kind: RecordKind, cursor: SyncCursor): Promise<void> {
    let byKind = this.cursors.get(account);
    if (byKind === undefined) {
      byKind = new Map();
      this.cursors.set(account, byKind);
    }
    byKind.set(kind, { ...cursor });
  }

  async reset(account: string, kind?: RecordKind): Promise<void> {
    if (kind === undefined) {
      this.cursors.delete(account);
      return;
    }
    this.cursors.get(account)?.delete(kind);
  }

  async list(): Promise<Array<{ account: string; kind: RecordKind; cursor: SyncCursor }>> {
    const result: Array<{ account: string; kind: RecordKind; cursor: SyncCursor }> = [];
    for (const [account, byKind] of this.cursors) {
      for (const [kind, cursor] of byKind) {
        result.push({ account, kind, cursor: { ...cursor } });
      }
    }
    return result;
  }

  /**
   * Clear all data (useful for testing/debugging).
   */
  clear(): void {
    this.cursors.clear();
  }
}
