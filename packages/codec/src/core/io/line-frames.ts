import type { ByteSink, ByteSource } from "../../ports/byte-io"

const NEWLINE = 0x0a

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Writes `text` followed by a newline. `text` must not contain raw newlines.
 */
export function writeLine(sink: ByteSink, text: string): void {
  sink.write(encoder.encode(`${text}\n`))
}

/**
 * Reads the next newline-terminated line without its terminator.
 * Returns undefined at end of input.
 *
 * @throws TypeError when the line is not valid UTF-8.
 */
export function readLine(source: ByteSource): string | undefined {
  const raw = source.readUntil(NEWLINE)
  if (raw.length === 0) return undefined

  const end = raw[raw.length - 1] === NEWLINE ? raw.length - 1 : raw.length
  return decoder.decode(raw.subarray(0, end))
}
