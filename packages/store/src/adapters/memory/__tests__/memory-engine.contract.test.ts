import { describeEngineContract } from "../../../ports/__tests__/engine.contract"
import { MemoryEngine } from "../memory-engine"

describeEngineContract("MemoryEngine", () => new MemoryEngine())
