export { MemoryEngine } from "./adapters/memory/memory-engine"
export { SqliteEngine, type SqliteEngineOptions } from "./adapters/sqlite/sqlite-engine"
export { CODEC_BUCKET } from "./core/codec-guard"
export {
  type BinaryStoreOptions,
  createBinaryStore,
  createJsonStore,
  createStore,
  type CreateStoreOptions,
  createXmlStore,
  type FormatStoreOptions,
  type TextStoreOptions,
} from "./core/create-store"
export {
  createDispatcher,
  type Dispatch,
  type EntryCallback,
  type ForEachCallback,
  onEntry,
  onValue,
  type Unmarshal,
  type ValueCallback,
} from "./core/dispatcher"
export { deriveKey } from "./core/keys"
export { keyTypes } from "./core/key-types"
export { marshal, unmarshal } from "./core/marshal"
export { Store, type StoreDeps, type StoreOptions } from "./core/store"
export {
  type LoadStoreConfigOptions,
  loadStoreConfig,
  type OpenedStore,
  type OpenStoreDeps,
  openStore,
  type StoreConfig,
  storeConfigSchema,
  type StoreFormat,
  storeFormats,
} from "./core/store-config"
export {
  CodecMismatchError,
  InvalidCallbackError,
  NotFoundError,
  StorageError,
} from "./core/store-errors"
export { valueTypes } from "./core/value-types"
export type {
  Bucket,
  BucketPath,
  ReadBucket,
  ReadTransaction,
  TransactionalEngine,
  WriteTransaction,
} from "./ports/engine"
export type { KeyType, StoreKey } from "./ports/key-type"
export type { ValueType } from "./ports/value-type"
