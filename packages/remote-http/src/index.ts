/**
 * @notesync/remote-http - RemoteEndpoint over the service's REST API
 */

export {
  HttpRemoteEndpoint,
  type HttpRemoteOptions,
  type FetchFn,
  type FetchResponse,
} from "./http-remote.js";
export { highlightCodec, documentCodec, codecFor, REVISION_FIELD } from "./codecs.js";
