import type { Attachment, Message } from "../types"
import { ParseError } from "./errors"
import { findInvalidXmlCharacter } from "./xml"

const TEXT_CONTENT_TYPES = new Set(["text/plain", "application/smil"])

export function createMessage(fields: Message, label = "Message"): Message {
  if (fields.participants.length === 0) {
    throw new ParseError(`${label} has no participants`)
  }

  if (fields.participants.some((participant) => participant.length === 0)) {
    throw new ParseError(`${label} has an empty participant address`)
  }

  if (fields.body.length === 0 && fields.attachments.length === 0) {
    throw new ParseError(`${label} has neither a body nor attachments`)
  }

  assertXmlSafe(fields.body, `${label} body`)
  fields.participants.forEach((participant, index) => assertXmlSafe(participant, `${label} participant #${index + 1}`))
  fields.attachments.forEach((attachment, index) => {
    const attachmentLabel = `${label} attachment #${index + 1}`
    assertXmlSafe(attachment.contentType, `${attachmentLabel} content type`)
    if (isTextContentType(attachment.contentType)) {
      assertXmlSafe(attachmentText(attachment), attachmentLabel)
    }
  })

  return Object.freeze({
    direction: fields.direction,
    timestamp: fields.timestamp,
    participants: Object.freeze([...fields.participants]),
    body: fields.body,
    attachments: Object.freeze(fields.attachments.map((attachment) => Object.freeze({ ...attachment }))),
    read: fields.read,
  })
}

function assertXmlSafe(text: string, label: string): void {
  const invalid = findInvalidXmlCharacter(text)
  if (invalid) {
    throw new ParseError(`${label} contains ${invalid}, which XML documents cannot store`)
  }
}

export function isTextContentType(contentType: string): boolean {
  const mediaType = contentType.split(";")[0] ?? ""
  return TEXT_CONTENT_TYPES.has(mediaType.trim().toLowerCase())
}

export function textAttachment(contentType: string, text: string): Attachment {
  return { contentType, data: Buffer.from(text, "utf8") }
}

export function attachmentText(attachment: Attachment): string {
  return attachment.data.toString("utf8")
}

export function senderOf(message: Message): string | undefined {
  return message.direction === "received" ? message.participants[0] : undefined
}

export function recipientsOf(message: Message): readonly string[] {
  return message.direction === "received" ? message.participants.slice(1) : message.participants
}

export function isGroupMessage(message: Message): boolean {
  return message.participants.length > 1
}

export function withParticipants(message: Message, participants: readonly string[]): Message {
  return createMessage({ ...message, participants })
}
