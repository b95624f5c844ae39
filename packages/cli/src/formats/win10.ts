import { decodeBase64, encodeBase64 } from "../lib/base64"
import { ParseError } from "../lib/errors"
import { attachmentText, createMessage, isTextContentType, recipientsOf, senderOf } from "../lib/messages"
import { fromFileTime, toFileTime } from "../lib/timestamps"
import {
  appendTextElement,
  childElement,
  childElements,
  childText,
  createXmlDocument,
  parseXmlDocument,
  serializeXmlDocument,
  type XmlNode,
} from "../lib/xml"
import type { Attachment, Message } from "../types"

const ROOT_ELEMENT = "ArrayOfMessage"
const MESSAGE_ELEMENT = "Message"

const ROOT_NAMESPACES = {
  "xmlns:xsd": "http://www.w3.org/2001/XMLSchema",
  "xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
}

export async function readWin10(text: string): Promise<Message[]> {
  const root = await parseXmlDocument(text)
  if (root.name !== ROOT_ELEMENT) {
    throw new ParseError(`Expected a Windows 10 Mobile backup (<${ROOT_ELEMENT}> root), found <${root.name}>`)
  }

  return root.children.map((node, index) => {
    const label = `Message #${index + 1}`
    if (node.name !== MESSAGE_ELEMENT) {
      throw new ParseError(`Unexpected <${node.name}> element at position ${index + 1}`)
    }

    return readWin10Message(node, label)
  })
}

export function writeWin10(messages: readonly Message[]): string {
  const root = createXmlDocument(ROOT_ELEMENT, ROOT_NAMESPACES)

  for (const message of messages) {
    const element = root.ele(MESSAGE_ELEMENT)

    const recipients = element.ele("Recepients")
    for (const recipient of recipientsOf(message)) {
      appendTextElement(recipients, "string", recipient)
    }

    appendTextElement(element, "Body", message.body)
    appendTextElement(element, "IsIncoming", String(message.direction === "received"))
    appendTextElement(element, "IsRead", String(message.read))

    const attachments = element.ele("Attachments")
    for (const attachment of message.attachments) {
      const entry = attachments.ele("MessageAttachment")
      appendTextElement(entry, "AttachmentContentType", attachment.contentType)
      appendTextElement(entry, "AttachmentDataBase64String", encodeWin10Attachment(attachment))
    }

    appendTextElement(element, "LocalTimestamp", toFileTime(message.timestamp))
    appendTextElement(element, "Sender", senderOf(message) ?? "")
  }

  return serializeXmlDocument(root)
}

function readWin10Message(node: XmlNode, label: string): Message {
  const rawTimestamp = childText(node, "LocalTimestamp")
  if (rawTimestamp === undefined) {
    throw new ParseError(`${label} is missing <LocalTimestamp>`)
  }

  const timestamp = fromFileTime(rawTimestamp)
  if (timestamp === undefined) {
    throw new ParseError(`${label} has an invalid <LocalTimestamp> '${rawTimestamp}'`)
  }

  const rawIncoming = childText(node, "IsIncoming")
  if (rawIncoming === undefined) {
    throw new ParseError(`${label} is missing <IsIncoming>`)
  }

  const incoming = parseBoolean(rawIncoming)
  if (incoming === undefined) {
    throw new ParseError(`${label} has an invalid <IsIncoming> '${rawIncoming}'`)
  }

  const recipientsNode = childElement(node, "Recepients")
  const recipients = recipientsNode ? childElements(recipientsNode, "string").map((entry) => entry.text.trim()) : []

  let participants = recipients
  if (incoming) {
    const sender = childText(node, "Sender")?.trim() ?? ""
    if (sender.length === 0) {
      throw new ParseError(`${label} is incoming but has no <Sender>`)
    }
    participants = [sender, ...recipients]
  }

  const attachmentsNode = childElement(node, "Attachments")
  const attachments = attachmentsNode
    ? childElements(attachmentsNode, "MessageAttachment").map((entry, index) =>
        readWin10Attachment(entry, `${label} attachment #${index + 1}`),
      )
    : []

  return createMessage(
    {
      direction: incoming ? "received" : "sent",
      timestamp,
      participants,
      body: childText(node, "Body") ?? "",
      attachments,
      read: parseBoolean(childText(node, "IsRead") ?? "") ?? false,
    },
    label,
  )
}

function readWin10Attachment(node: XmlNode, label: string): Attachment {
  const contentType = childText(node, "AttachmentContentType")?.trim() ?? ""
  if (contentType.length === 0) {
    throw new ParseError(`${label} is missing <AttachmentContentType>`)
  }

  const encoded = childText(node, "AttachmentDataBase64String")
  if (encoded === undefined) {
    throw new ParseError(`${label} is missing <AttachmentDataBase64String>`)
  }

  const data = decodeBase64(encoded)
  if (!data) {
    throw new ParseError(`${label} has invalid base64 data`)
  }

  // Text parts are stored as UTF-16LE before the base64 step.
  if (isTextContentType(contentType)) {
    if (data.length % 2 !== 0) {
      throw new ParseError(`${label} has UTF-16 text with an odd number of bytes (${data.length})`)
    }
    return { contentType, data: Buffer.from(data.toString("utf16le"), "utf8") }
  }

  return { contentType, data }
}

function encodeWin10Attachment(attachment: Attachment): string {
  if (isTextContentType(attachment.contentType)) {
    return encodeBase64(Buffer.from(attachmentText(attachment), "utf16le"))
  }

  return encodeBase64(attachment.data)
}

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase()
  if (normalized === "true") {
    return true
  }

  if (normalized === "false") {
    return false
  }

  return undefined
}
