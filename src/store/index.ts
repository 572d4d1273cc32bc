export {
  type DocumentStore,
  BaseDocumentStore,
  MemoryDocumentStore,
  JsonFileDocumentStore,
  DocumentCorruptedError,
  DOCUMENT_FILE_NAME,
} from './document-store.js';
export {
  createDefaultDocument,
  createDefaultRules,
  createDefaultChains,
  createEmptyDocument,
} from './default-catalog.js';
export { appendCapped, newestFirst } from './capped.js';
export { Mutex } from './mutex.js';
