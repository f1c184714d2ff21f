import type { TypeRegistry } from "@larder/codec"
import {
  ConfigError,
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@larder/config"
import { createPinoLogger, type Logger, logLevelNames } from "@larder/logger"
import { z } from "zod"
import { SqliteEngine } from "../adapters/sqlite/sqlite-engine"
import type { TransactionalEngine } from "../ports/engine"
import { createBinaryStore, createJsonStore, createXmlStore } from "./create-store"
import type { Store } from "./store"

export const storeFormats = ["binary", "json", "xml"] as const

export type StoreFormat = (typeof storeFormats)[number]

export const storeConfigSchema = z.object({
  LARDER_DB_PATH: z.string().min(1).default(":memory:"),
  LARDER_BUCKET: z.string().min(1).default("default"),
  LARDER_FORMAT: z.enum(storeFormats).default("binary"),
  LARDER_POOLED: z.stringbool().default(false),
  LARDER_GUARD_CODEC: z.stringbool().default(true),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type StoreConfig = z.infer<typeof storeConfigSchema>

export type LoadStoreConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>

  /** Optional .env file read before the environment; the environment wins. */
  dotenvFile?: string

  /** Applied last, over the file and the environment. */
  overrides?: Partial<Record<keyof StoreConfig, string>>
}

export async function loadStoreConfig(
  opts: LoadStoreConfigOptions = {},
): Promise<IConfig<StoreConfig>> {
  const sources: ConfigSource[] = [
    ...(opts.dotenvFile !== undefined
      ? [new DotenvSource({ file: opts.dotenvFile, required: false })]
      : []),
    new EnvSource(opts.env !== undefined ? { env: opts.env } : {}),
    ...(opts.overrides !== undefined ? [new ObjectSource(opts.overrides)] : []),
  ]

  return loadConfig({ schema: storeConfigSchema, sources })
}

export type OpenStoreDeps = {
  /** Replaces the pino logger built from LOG_LEVEL / LOG_PRETTY. */
  logger?: Logger

  /** Replaces the SQLite engine opened at LARDER_DB_PATH. */
  engine?: TransactionalEngine

  /** Class registry for the binary format. */
  registry?: TypeRegistry

  /** Priming samples for the binary format. Required to pool it. */
  samples?: readonly unknown[]
}

export type OpenedStore = {
  store: Store
  engine: TransactionalEngine
  logger: Logger
  close(): void
}

type StoreParts = {
  engine: TransactionalEngine
  logger: Logger
}

function buildStore(config: StoreConfig, parts: StoreParts, deps: OpenStoreDeps): Store {
  const common = {
    ...parts,
    bucket: config.LARDER_BUCKET,
    guardCodec: config.LARDER_GUARD_CODEC,
  }

  switch (config.LARDER_FORMAT) {
    case "binary": {
      const binary = {
        ...common,
        ...(deps.registry !== undefined && { registry: deps.registry }),
      }

      return deps.samples
        ? createBinaryStore({ ...binary, samples: deps.samples, pooled: config.LARDER_POOLED })
        : createBinaryStore(binary)
    }
    case "json":
      return createJsonStore({ ...common, pooled: config.LARDER_POOLED })
    case "xml":
      return createXmlStore({ ...common, pooled: config.LARDER_POOLED })
  }
}

/**
 * Opens the engine, logger and store described by `config`.
 *
 * Rejects with ConfigError when pooling is requested for an unprimed binary
 * store.
 */
export async function openStore(
  config: StoreConfig,
  deps: OpenStoreDeps = {},
): Promise<OpenedStore> {
  if (config.LARDER_FORMAT === "binary" && config.LARDER_POOLED && !deps.samples) {
    throw ConfigError.invalid(
      "LARDER_POOLED: the binary format can only be pooled with priming samples",
      ["openStore"],
    )
  }

  const logger =
    deps.logger ??
    createPinoLogger({}, { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY }, {
      service: "larder",
    })
  const engine = deps.engine ?? (await SqliteEngine.open({ path: config.LARDER_DB_PATH }))
  const store = buildStore(config, { engine, logger }, deps)

  logger.info("store opened", {
    module: "store",
    bucket: config.LARDER_BUCKET,
    codec: config.LARDER_FORMAT,
  })

  return {
    store,
    engine,
    logger,
    close: () => {
      if (!deps.engine) engine.close()
    },
  }
}
