/**
 * @notesync/remote-in-memory - In-process RemoteEndpoint for tests and dry runs
 */

export {
  InMemoryRemote,
  type InMemoryRemoteOptions,
  type RemoteCall,
  type RemoteOperation,
} from "./in-memory-remote.js";
export { plainCodec } from "./plain-codec.js";
