/**
 * @cadsync/adapter-onshape - RemoteDocumentStore over the Onshape REST API
 */

export {
  DEFAULT_BASE_URL,
  loadCredentials,
  generateNonce,
  formatHttpDate,
  buildQueryString,
  computeSignature,
  signedHeaders,
  type OnshapeCredentials,
  type SignatureInput,
} from "./auth.js";
export {
  OnshapeClient,
  DEFAULT_API_VERSION,
  type OnshapeClientOptions,
  type FetchFn,
  type FetchInit,
  type FetchResponse,
} from "./client.js";
export { OnshapeDocumentStore, type FolderTreeNode } from "./onshape-document-store.js";
export {
  parseOnshapeUrl,
  buildOnshapeUrl,
  normalizeOnshapeUrl,
  toRemoteAddress,
  type ParsedOnshapeUrl,
  type OnshapeUrlParts,
  type OnshapeUrlType,
} from "./url.js";
