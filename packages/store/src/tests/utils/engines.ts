import { MemoryEngine } from "../../adapters/memory/memory-engine"
import { SqliteEngine } from "../../adapters/sqlite/sqlite-engine"
import type { TransactionalEngine } from "../../ports/engine"

export type EngineFactory = () => TransactionalEngine | Promise<TransactionalEngine>

export const engineFactories: [name: string, create: EngineFactory][] = [
  ["MemoryEngine", () => new MemoryEngine()],
  ["SqliteEngine", () => SqliteEngine.open({ path: ":memory:" })],
]
