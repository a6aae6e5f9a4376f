/**
 * @notesync/cursor-store - CursorStore implementations
 */

export { InMemoryCursorStore, INITIAL_CURSOR } from "./in-memory-cursor-store.js";
export { FileCursorStore, type FileCursorStoreOptions } from "./file-cursor-store.js";
