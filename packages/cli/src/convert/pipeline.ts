import { type FormatId, resolveFormat } from "../formats"
import { normalizeAddress } from "../lib/address"
import { uniqueStrings } from "../lib/collections"
import { ParseError } from "../lib/errors"
import { readInputText } from "../lib/fs"
import { withParticipants } from "../lib/messages"
import { compareTimestamps } from "../lib/timestamps"
import type { Message, MessageFormat } from "../types"

export interface ConversionConfig {
  from: FormatId
  to: FormatId
  inputs: string[]
  phone?: string
  sort: boolean
  normalize: boolean
  output?: string
}

export type ReadText = (path: string) => Promise<string>

export interface InputMessages {
  path: string
  messages: Message[]
}

export interface ConversionResult {
  document: string
  inputs: Array<{ path: string; messageCount: number }>
  messageCount: number
}

/**
 * Reads every input with the same format, one file at a time and in the order given.
 * A parse failure aborts the whole run and names the offending input.
 */
export async function readInputs(
  format: MessageFormat,
  paths: readonly string[],
  readText: ReadText = readInputText,
): Promise<InputMessages[]> {
  const results: InputMessages[] = []

  for (const path of paths) {
    const text = await readText(path)
    try {
      results.push({ path, messages: await format.read(text) })
    } catch (error) {
      if (error instanceof ParseError) {
        throw error.withSource(path)
      }
      throw error
    }
  }

  return results
}

/** Concatenates sources in order; with `sort`, a stable sort by ascending timestamp. No deduplication. */
export function mergeMessages(sources: ReadonlyArray<readonly Message[]>, options: { sort: boolean }): Message[] {
  const merged = sources.flatMap((messages) => [...messages])
  if (!options.sort) {
    return merged
  }

  // Array.prototype.sort is stable, so equal timestamps keep their input order.
  return merged.sort((left, right) => compareTimestamps(left.timestamp, right.timestamp))
}

export function normalizeParticipants(message: Message): Message {
  return withParticipants(message, uniqueStrings(message.participants.map(normalizeAddress)))
}

export async function convertFiles(
  config: ConversionConfig,
  readText: ReadText = readInputText,
): Promise<ConversionResult> {
  const inputs = await readInputs(resolveFormat(config.from), config.inputs, readText)

  let messages = mergeMessages(
    inputs.map((input) => input.messages),
    { sort: config.sort },
  )
  if (config.normalize) {
    messages = messages.map(normalizeParticipants)
  }

  const options = config.phone === undefined ? {} : { phone: config.phone }
  const document = resolveFormat(config.to).write(messages, options)

  return {
    document,
    inputs: inputs.map((input) => ({ path: input.path, messageCount: input.messages.length })),
    messageCount: messages.length,
  }
}
