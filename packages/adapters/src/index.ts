/**
 * @cadsync/adapter-in-memory - In-memory RemoteDocumentStore
 */

export {
  InMemoryDocumentStore,
  type InMemoryDocumentStoreOptions,
  type StoreCall,
} from "./in-memory-document-store.js";
