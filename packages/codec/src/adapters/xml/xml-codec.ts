import { XMLBuilder, XMLParser } from "fast-xml-parser"
import { MarshalError, UnmarshalError } from "../../core/codec-errors"
import { readLine, writeLine } from "../../core/io/line-frames"
import type { ByteSink, ByteSource } from "../../ports/byte-io"
import type { Decoder, Encoder, ReuseSafeCodec } from "../../ports/codec"

const FORMAT = "xml"

const VALUE_ROOT = "value"
const LIST_ROOT = "list"
const LIST_ITEM = "item"

const ELEMENT_NAME = /^[A-Za-z_][\w.-]*$/

type XmlTree = string | XmlTree[] | { [name: string]: XmlTree }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function elementName(name: string): string {
  if (!ELEMENT_NAME.test(name) || name.toLowerCase().startsWith("xml")) {
    throw new MarshalError(`xml: not a valid element name: ${name}`, {
      code: "marshal_failed",
      context: { format: FORMAT, element: name },
    })
  }
  return name
}

function rootName(value: unknown): string {
  if (Array.isArray(value)) return LIST_ROOT
  if (typeof value !== "object" || value === null) return VALUE_ROOT
  if (value instanceof Date || ArrayBuffer.isView(value)) return VALUE_ROOT

  const proto: unknown = Object.getPrototypeOf(value)
  if (proto === Object.prototype || proto === null) return VALUE_ROOT

  return elementName(Reflect.getPrototypeOf(value)?.constructor.name || VALUE_ROOT)
}

function toTree(value: unknown): XmlTree {
  switch (typeof value) {
    case "string":
      return value
    case "number":
    case "boolean":
    case "bigint":
      return String(value)
    case "undefined":
      return ""
    case "function":
    case "symbol":
      throw new MarshalError(`xml: cannot encode a ${typeof value}`, {
        code: "marshal_failed",
        context: { format: FORMAT },
      })
  }

  if (value === null) return ""
  if (value instanceof Date) return value.toISOString()
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64")
  if (Array.isArray(value)) return value.map(toTree)

  const out: { [name: string]: XmlTree } = {}
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined) continue
    out[elementName(key)] = toTree(field)
  }
  return out
}

function wrapRoot(value: unknown): Record<string, XmlTree> {
  const tree = toTree(value)

  if (Array.isArray(tree)) return { [LIST_ROOT]: { [LIST_ITEM]: tree } }
  return { [rootName(value)]: tree }
}

function unwrapRoot(document: unknown): unknown {
  if (!isRecord(document)) {
    throw UnmarshalError.malformed(FORMAT, "document has no root element")
  }

  const roots = Object.keys(document)
  const root = roots[0]
  if (roots.length !== 1 || root === undefined) {
    throw UnmarshalError.malformed(FORMAT, "document must have exactly one root element")
  }

  const content = document[root]
  if (root !== LIST_ROOT) return content

  if (content === "") return []
  if (!isRecord(content) || !(LIST_ITEM in content)) {
    throw UnmarshalError.malformed(FORMAT, "list without items")
  }

  const items = content[LIST_ITEM]
  return Array.isArray(items) ? items : [items]
}

/**
 * One XML document per line.
 *
 * @remarks
 * The root element is the class name of the value, `value` for plain objects
 * and scalars, or `list` with one `item` per element for arrays. The format
 * carries no type information: every leaf decodes as a string, `null` and
 * `undefined` as the empty string, and a field holding a one-element array
 * decodes as that element. Value types are expected to coerce.
 */
export class XmlCodec implements ReuseSafeCodec {
  readonly name = FORMAT
  readonly fingerprint = "xml/1"
  readonly reuseSafe = true

  private readonly builder = new XMLBuilder({
    ignoreAttributes: true,
    format: false,
    processEntities: true,
  })

  private readonly parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: false,
    processEntities: true,
    htmlEntities: true,
  })

  newEncoder(sink: ByteSink): Encoder {
    return {
      encode: (value: unknown): void => {
        let xml: string
        try {
          xml = String(this.builder.build(wrapRoot(value)))
        } catch (err) {
          throw MarshalError.from(FORMAT, err)
        }

        writeLine(sink, xml.replaceAll("\n", "&#10;").replaceAll("\r", "&#13;"))
      },
    }
  }

  newDecoder(source: ByteSource): Decoder {
    return {
      decode: (): unknown => {
        let line: string | undefined
        let document: unknown
        try {
          line = readLine(source)
          if (line === undefined) throw UnmarshalError.endOfInput(FORMAT)
          document = this.parser.parse(line, true)
        } catch (err) {
          throw UnmarshalError.from(FORMAT, err)
        }

        return unwrapRoot(document)
      },
    }
  }
}
