import { describe, expect, it } from "vitest"

import { resolveFormat } from "../../formats"
import { readWin10 } from "../../formats/win10"
import { ParseError } from "../../lib/errors"
import { parseXmlDocument } from "../../lib/xml"
import { readFixture } from "../../test/load-fixture"
import type { Message } from "../../types"
import { type ConversionConfig, convertFiles, mergeMessages, normalizeParticipants, readInputs } from "../pipeline"

function messageAt(timestamp: bigint, body: string): Message {
  return {
    direction: "sent",
    timestamp,
    participants: ["+15550100001"],
    body,
    attachments: [],
    read: true,
  }
}

function fakeFiles(files: Record<string, string>): { readText: (path: string) => Promise<string>; reads: string[] } {
  const reads: string[] = []
  return {
    reads,
    readText: async (path) => {
      reads.push(path)
      const text = files[path]
      if (text === undefined) {
        throw new Error(`Input file not found: '${path}'`)
      }
      return text
    },
  }
}

describe("mergeMessages", () => {
  const three = messageAt(3n, "three")
  const one = messageAt(1n, "one")
  const two = messageAt(2n, "two")

  it("keeps input order by default", () => {
    expect(mergeMessages([[three, one], [two]], { sort: false }).map((message) => message.body)).toEqual([
      "three",
      "one",
      "two",
    ])
  })

  it("sorts by ascending timestamp when asked", () => {
    expect(mergeMessages([[three, one], [two]], { sort: true }).map((message) => message.body)).toEqual([
      "one",
      "two",
      "three",
    ])
  })

  it("keeps input order for equal timestamps", () => {
    const first = messageAt(5n, "first")
    const second = messageAt(5n, "second")
    const third = messageAt(5n, "third")

    expect(
      mergeMessages([[second], [messageAt(9n, "late"), first], [third]], { sort: true }).map((message) => message.body),
    ).toEqual(["second", "first", "third", "late"])
  })

  it("does not deduplicate", () => {
    expect(mergeMessages([[one], [one]], { sort: false })).toEqual([one, one])
  })

  it("does not reorder the source arrays", () => {
    const source = [three, one]
    mergeMessages([source], { sort: true })

    expect(source).toEqual([three, one])
  })
})

describe("readInputs", () => {
  it("reads inputs one after another in the order given", async () => {
    const win10 = await readFixture("win10.msg")
    const files = fakeFiles({ "a.msg": win10, "b.msg": win10 })

    const inputs = await readInputs(resolveFormat("win10"), ["b.msg", "a.msg"], files.readText)

    expect(files.reads).toEqual(["b.msg", "a.msg"])
    expect(inputs.map((input) => [input.path, input.messages.length])).toEqual([
      ["b.msg", 5],
      ["a.msg", 5],
    ])
  })

  it("names the input that failed to parse and stops", async () => {
    const files = fakeFiles({ "bad.msg": '<smses count="0"/>', "good.msg": "<ArrayOfMessage/>" })

    const result = readInputs(resolveFormat("win10"), ["bad.msg", "good.msg"], files.readText)

    await expect(result).rejects.toThrow(
      new ParseError("Expected a Windows 10 Mobile backup (<ArrayOfMessage> root), found <smses>", "bad.msg"),
    )
    expect(files.reads).toEqual(["bad.msg"])
  })
})

describe("normalizeParticipants", () => {
  it("normalizes numbers and drops duplicates that collapse together", () => {
    const message: Message = { ...messageAt(1n, "hi"), participants: ["+1 (555) 010-0001", "5550100001", "Obi-wan"] }

    expect(normalizeParticipants(message).participants).toEqual(["5550100001", "Obi-wan"])
  })
})

describe("convertFiles", () => {
  const baseConfig: ConversionConfig = {
    from: "win10",
    to: "android",
    inputs: ["one.msg", "two.msg"],
    phone: "Obi-wan Kenobi",
    sort: false,
    normalize: false,
  }

  it("writes the sum of all input messages", async () => {
    const win10 = await readFixture("win10.msg")
    const files = fakeFiles({ "one.msg": win10, "two.msg": win10 })

    const result = await convertFiles(baseConfig, files.readText)
    const root = await parseXmlDocument(result.document)

    expect(result.messageCount).toBe(10)
    expect(result.inputs).toEqual([
      { path: "one.msg", messageCount: 5 },
      { path: "two.msg", messageCount: 5 },
    ])
    expect(root.attributes.count).toBe("10")
    expect(root.children).toHaveLength(10)
  })

  it("sorts the merged messages when configured", async () => {
    const win10 = await readFixture("win10.msg")
    const files = fakeFiles({ "one.msg": win10 })

    const result = await convertFiles({ ...baseConfig, to: "win10", inputs: ["one.msg"], sort: true }, files.readText)
    const messages = await readWin10(result.document)

    expect(messages.map((message) => message.timestamp)).toEqual([
      1_614_855_600_000_000_000n,
      1_614_859_200_000_000_000n,
      1_614_859_260_000_000_000n,
      1_614_859_320_000_000_000n,
      1_614_859_380_500_000_000n,
    ])
  })

  it("normalizes participants when configured", async () => {
    const win10 = await readFixture("win10.msg")
    const files = fakeFiles({ "one.msg": win10 })

    const result = await convertFiles(
      { ...baseConfig, to: "win10", inputs: ["one.msg"], normalize: true },
      files.readText,
    )
    const messages = await readWin10(result.document)

    expect(messages[2]?.participants).toEqual(["5550100001", "5550100002"])
  })
})
