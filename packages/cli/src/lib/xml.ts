import * as xml2js from "xml2js"
import xmlbuilder from "xmlbuilder"

import { ParseError } from "./errors"

export interface XmlNode {
  name: string
  attributes: Record<string, string>
  /** Character data of the element; whitespace-only content reads as "" unless it came from CDATA. */
  text: string
  children: XmlNode[]
}

export type XmlElementBuilder = xmlbuilder.XMLElement

// xml2js groups children by tag name unless asked to keep them in an ordered `$$`
// list; Android backups interleave <sms> and <mms>, so document order matters.
const PARSER_OPTIONS: xml2js.ParserOptions = {
  explicitRoot: true,
  explicitArray: true,
  explicitCharkey: true,
  explicitChildren: true,
  preserveChildrenOrder: true,
  attrkey: "$",
  charkey: "_",
  childkey: "$$",
}

const NAME_KEY = "#name"

// Char production of XML 1.0; lone surrogates fall outside it as well.
const INVALID_XML_CHARACTER = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u
const WHITESPACE_ONLY = /^\s+$/

export async function parseXmlDocument(text: string): Promise<XmlNode> {
  let parsed: unknown
  try {
    parsed = await new xml2js.Parser(PARSER_OPTIONS).parseStringPromise(text)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ParseError(`Malformed XML: ${message.split("\n")[0] ?? message}`, undefined, { cause: error })
  }

  if (!isRecord(parsed)) {
    throw new ParseError("Document is empty")
  }

  const [rootName, rootValue] = Object.entries(parsed)[0] ?? []
  if (rootName === undefined) {
    throw new ParseError("Document has no root element")
  }

  return toXmlNode(rootValue, rootName)
}

export function childElements(node: XmlNode, name: string): XmlNode[] {
  return node.children.filter((child) => child.name === name)
}

export function childElement(node: XmlNode, name: string): XmlNode | undefined {
  return node.children.find((child) => child.name === name)
}

export function childText(node: XmlNode, name: string): string | undefined {
  return childElement(node, name)?.text
}

export function createXmlDocument(
  rootName: string,
  attributes: Record<string, string> = {},
  declaration: { standalone?: boolean } = {},
): XmlElementBuilder {
  const root = xmlbuilder.create(rootName, {
    version: "1.0",
    encoding: "UTF-8",
    ...(declaration.standalone === undefined ? {} : { standalone: declaration.standalone }),
  })

  for (const [name, value] of Object.entries(attributes)) {
    root.att(name, value)
  }

  return root
}

export function appendTextElement(parent: XmlElementBuilder, name: string, text: string): XmlElementBuilder {
  // Parsers drop whitespace-only character data, but keep it inside CDATA.
  if (WHITESPACE_ONLY.test(text)) {
    return parent.ele(name).dat(text)
  }

  return parent.ele(name, {}, text)
}

/** Returns the first character XML 1.0 cannot carry, formatted as `U+XXXX`. */
export function findInvalidXmlCharacter(text: string): string | undefined {
  const match = INVALID_XML_CHARACTER.exec(text)
  const codePoint = match?.[0].codePointAt(0)
  if (codePoint === undefined) {
    return undefined
  }

  return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`
}

export function serializeXmlDocument(root: XmlElementBuilder): string {
  return `${root.end({ pretty: true, indent: "  ", newline: "\n" })}\n`
}

function toXmlNode(value: unknown, fallbackName: string): XmlNode {
  if (typeof value === "string") {
    return { name: fallbackName, attributes: {}, text: value, children: [] }
  }

  if (!isRecord(value)) {
    return { name: fallbackName, attributes: {}, text: "", children: [] }
  }

  const rawName = value[NAME_KEY]
  const rawText = value._
  const rawChildren: unknown[] = Array.isArray(value.$$) ? value.$$ : []

  return {
    name: typeof rawName === "string" ? rawName : fallbackName,
    attributes: toAttributes(value.$),
    text: typeof rawText === "string" ? rawText : "",
    children: rawChildren.map((child) => toXmlNode(child, "")),
  }
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {}
  if (!isRecord(value)) {
    return attributes
  }

  for (const [key, attributeValue] of Object.entries(value)) {
    if (typeof attributeValue === "string") {
      attributes[key] = attributeValue
    }
  }

  return attributes
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
