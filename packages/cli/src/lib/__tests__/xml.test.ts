import { describe, expect, it } from "vitest"

import { ParseError } from "../errors"
import {
  appendTextElement,
  childElement,
  childElements,
  childText,
  createXmlDocument,
  findInvalidXmlCharacter,
  parseXmlDocument,
  serializeXmlDocument,
} from "../xml"

describe("parseXmlDocument", () => {
  it("keeps mixed siblings in document order", async () => {
    const root = await parseXmlDocument('<smses count="3"><sms id="1"/><mms id="2"><parts/></mms><sms id="3"/></smses>')

    expect(root.name).toBe("smses")
    expect(root.attributes).toEqual({ count: "3" })
    expect(root.children.map((child) => `${child.name}:${child.attributes.id ?? ""}`)).toEqual([
      "sms:1",
      "mms:2",
      "sms:3",
    ])
    expect(root.children[1]?.children.map((child) => child.name)).toEqual(["parts"])
  })

  it("reads text content and decodes entities", async () => {
    const root = await parseXmlDocument(
      '<root><Body>1 &lt; 2 &amp; 3</Body><Empty/><Blank>   </Blank><Attr value="a&#xA;b &quot;c&quot;"/></root>',
    )

    expect(childText(root, "Body")).toBe("1 < 2 & 3")
    expect(childText(root, "Empty")).toBe("")
    expect(childText(root, "Blank")).toBe("")
    expect(childText(root, "Missing")).toBeUndefined()
    expect(childElement(root, "Attr")?.attributes.value).toBe('a\nb "c"')
  })

  it("finds repeated children", async () => {
    const root = await parseXmlDocument("<Recepients><string>a</string><other/><string>b</string></Recepients>")

    expect(childElements(root, "string").map((entry) => entry.text)).toEqual(["a", "b"])
  })

  it("rejects malformed documents", async () => {
    await expect(parseXmlDocument("<root><open></root>")).rejects.toBeInstanceOf(ParseError)
    await expect(parseXmlDocument("not xml at all")).rejects.toThrow("Malformed XML")
  })

  it("rejects empty documents", async () => {
    await expect(parseXmlDocument("   ")).rejects.toThrow("Document is empty")
  })
})

describe("xml builder", () => {
  it("writes a pretty-printed document with a declaration", () => {
    const root = createXmlDocument("root", { a: "1" })
    appendTextElement(root, "b", "x & y")

    expect(serializeXmlDocument(root)).toBe(
      ['<?xml version="1.0" encoding="UTF-8"?>', '<root a="1">', "  <b>x &amp; y</b>", "</root>", ""].join("\n"),
    )
  })

  it("marks standalone documents", () => {
    const root = createXmlDocument("smses", { count: "0" }, { standalone: true })

    expect(serializeXmlDocument(root).split("\n")[0]).toBe('<?xml version="1.0" encoding="UTF-8" standalone="yes"?>')
  })

  it("wraps whitespace-only text in CDATA so it is read back", async () => {
    const root = createXmlDocument("root")
    appendTextElement(root, "b", " \t ")

    const document = serializeXmlDocument(root)
    expect(document.split("\n")[2]).toBe("  <b><![CDATA[ \t ]]></b>")
    expect(childText(await parseXmlDocument(document), "b")).toBe(" \t ")
  })

  it("produces documents the parser reads back", async () => {
    const root = createXmlDocument("smses")
    root.ele("sms", { body: 'line one\nline "two" <3' })
    root.ele("mms", { id: "2" })

    const parsed = await parseXmlDocument(serializeXmlDocument(root))
    expect(parsed.children.map((child) => child.name)).toEqual(["sms", "mms"])
    expect(parsed.children[0]?.attributes.body).toBe('line one\nline "two" <3')
  })
})

describe("findInvalidXmlCharacter", () => {
  it("accepts text XML can carry", () => {
    expect(findInvalidXmlCharacter("tab\tline\r\n\u{1F600}")).toBeUndefined()
  })

  it("reports control characters and lone surrogates", () => {
    expect(findInvalidXmlCharacter("a\u0001b")).toBe("U+0001")
    expect(findInvalidXmlCharacter("x\uD800")).toBe("U+D800")
    expect(findInvalidXmlCharacter("\uFFFE")).toBe("U+FFFE")
  })
})
