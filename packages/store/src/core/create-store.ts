import {
  BinaryCodec,
  type Codec,
  JsonCodec,
  PooledCodec,
  PrimedCodec,
  type ReuseSafeCodec,
  type TypeRegistry,
  XmlCodec,
} from "@larder/codec"
import type { Logger } from "@larder/logger"
import type { BucketPath, TransactionalEngine } from "../ports/engine"
import { Store } from "./store"

export type CreateStoreOptions = {
  engine: TransactionalEngine
  bucket: string | BucketPath
  codec: Codec
  logger?: Logger
  guardCodec?: boolean
}

export type FormatStoreOptions = Omit<CreateStoreOptions, "codec">

/**
 * Binary stores are pooled only when primed: unprimed binary coders carry
 * type definitions from one value to the next.
 */
export type BinaryStoreOptions = FormatStoreOptions & {
  registry?: TypeRegistry
} & (
    | { samples?: undefined; pooled?: false }
    | { samples: readonly unknown[]; pooled?: boolean }
  )

export type TextStoreOptions = FormatStoreOptions & {
  pooled?: boolean
}

export function createStore({
  engine,
  codec,
  logger,
  bucket,
  guardCodec,
}: CreateStoreOptions): Store {
  return new Store(
    { engine, codec, ...(logger !== undefined && { logger }) },
    { bucket, ...(guardCodec !== undefined && { guardCodec }) },
  )
}

const maybePooled = (codec: ReuseSafeCodec, pooled: boolean | undefined): Codec =>
  pooled ? new PooledCodec(codec) : codec

export function createBinaryStore(opts: BinaryStoreOptions): Store {
  const { registry, samples, pooled, ...rest } = opts
  const base = new BinaryCodec(registry !== undefined ? { registry } : {})

  const codec =
    samples === undefined ? base : maybePooled(PrimedCodec.create(base, samples), pooled)

  return createStore({ ...rest, codec })
}

export function createJsonStore(opts: TextStoreOptions): Store {
  const { pooled, ...rest } = opts
  return createStore({ ...rest, codec: maybePooled(new JsonCodec(), pooled) })
}

export function createXmlStore(opts: TextStoreOptions): Store {
  const { pooled, ...rest } = opts
  return createStore({ ...rest, codec: maybePooled(new XmlCodec(), pooled) })
}
