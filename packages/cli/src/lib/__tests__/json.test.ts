import { describe, expect, it } from "vitest"

import { ParseError } from "../errors"
import { parseJson } from "../json"

describe("parseJson", () => {
  it("parses valid JSON", () => {
    expect(parseJson('[{"body":"hi"}]', (message) => new ParseError(message))).toEqual([{ body: "hi" }])
  })

  it("wraps parse errors using onError", () => {
    const parse = () => parseJson("{bad-json}", (message) => new ParseError(`Malformed JSON: ${message}`))

    expect(parse).toThrow(ParseError)
    expect(parse).toThrow("Malformed JSON: ")
  })
})
