import { z } from "zod"

import { decodeBase64, encodeBase64 } from "../lib/base64"
import { ParseError } from "../lib/errors"
import { parseJson } from "../lib/json"
import { createMessage } from "../lib/messages"
import { parseEpochNanos } from "../lib/timestamps"
import type { Message } from "../types"

const attachmentSchema = z.object({
  contentType: z.string().min(1),
  data: z.string(),
})

const messageSchema = z.object({
  direction: z.enum(["sent", "received"]),
  timestamp: z.string().regex(/^-?\d+$/, "Expected nanoseconds since the Unix epoch as a decimal string"),
  participants: z.array(z.string()),
  body: z.string(),
  read: z.boolean(),
  attachments: z.array(attachmentSchema),
})

const documentSchema = z.array(messageSchema)

type JsonMessage = z.infer<typeof messageSchema>

export async function readJson(text: string): Promise<Message[]> {
  const raw = parseJson(text.replace(/^\uFEFF/, ""), (message) => new ParseError(`Malformed JSON: ${message}`))
  const parsed = documentSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : ""
    throw new ParseError(`Invalid message document${path}: ${issue?.message ?? "unexpected shape"}`)
  }

  return parsed.data.map((entry, index) => fromJsonMessage(entry, `Message #${index + 1}`))
}

export function writeJson(messages: readonly Message[]): string {
  return `${JSON.stringify(messages.map(toJsonMessage), null, 2)}\n`
}

function fromJsonMessage(entry: JsonMessage, label: string): Message {
  const timestamp = parseEpochNanos(entry.timestamp)
  if (timestamp === undefined) {
    throw new ParseError(`${label} has an invalid timestamp '${entry.timestamp}'`)
  }

  return createMessage(
    {
      direction: entry.direction,
      timestamp,
      participants: entry.participants,
      body: entry.body,
      read: entry.read,
      attachments: entry.attachments.map((attachment, index) => {
        const data = decodeBase64(attachment.data)
        if (!data) {
          throw new ParseError(`${label} attachment #${index + 1} has invalid base64 data`)
        }
        return { contentType: attachment.contentType, data }
      }),
    },
    label,
  )
}

function toJsonMessage(message: Message): JsonMessage {
  return {
    direction: message.direction,
    timestamp: message.timestamp.toString(),
    participants: [...message.participants],
    body: message.body,
    read: message.read,
    attachments: message.attachments.map((attachment) => ({
      contentType: attachment.contentType,
      data: encodeBase64(attachment.data),
    })),
  }
}
