import { Writable } from "node:stream"
import pino from "pino"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, logLevelNames } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

function levelOf(payload: Record<string, unknown>): LogLevelName {
  const label = pino.levels.labels[Number(payload.level)]
  const name = logLevelNames.find((n) => n === label)
  if (!name) throw new Error(`unexpected pino level: ${String(payload.level)}`)
  return name
}

/** PinoLogger writing JSON lines into memory. */
export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const lines: string[] = []

      const destination = new Writable({
        write(chunk, _encoding, done) {
          lines.push(String(chunk))
          done()
        },
      })

      const read = (): CapturedLog[] =>
        lines.map((line) => {
          const payload: Record<string, unknown> = JSON.parse(line)
          return { level: levelOf(payload), payload }
        })

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read,
      }
    },
  }
}
