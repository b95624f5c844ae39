import { describe, expect, it } from "vitest"

import { UsageError } from "../../lib/errors"
import type { CliArgs } from "../args"
import { toConversionConfig } from "../config"

const complete: CliArgs = {
  from: "win10",
  to: "android",
  inputs: ["a.msg"],
  sort: false,
  normalize: false,
  help: false,
}

describe("toConversionConfig", () => {
  it("builds the conversion config", () => {
    expect(toConversionConfig({ ...complete, phone: "Obi-wan Kenobi", output: "out.xml", sort: true })).toEqual({
      from: "win10",
      to: "android",
      inputs: ["a.msg"],
      phone: "Obi-wan Kenobi",
      output: "out.xml",
      sort: true,
      normalize: false,
    })
  })

  it("leaves optional settings out when absent", () => {
    const config = toConversionConfig(complete)

    expect("phone" in config).toBe(false)
    expect("output" in config).toBe(false)
  })

  it("does not require a phone number up front", () => {
    expect(toConversionConfig(complete).to).toBe("android")
  })

  it("requires formats and inputs", () => {
    expect(() => toConversionConfig({ ...complete, from: undefined })).toThrow(
      new UsageError("Missing --from. Run 'msgport --help' for available formats."),
    )
    expect(() => toConversionConfig({ ...complete, to: undefined })).toThrow("Missing --to.")
    expect(() => toConversionConfig({ ...complete, inputs: [] })).toThrow(
      "Missing --input. Pass at least one input file.",
    )
  })
})
