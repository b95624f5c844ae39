import { normalizeAddress } from "../lib/address"
import { decodeBase64, encodeBase64 } from "../lib/base64"
import { MissingPhoneError, ParseError } from "../lib/errors"
import {
  attachmentText,
  createMessage,
  isGroupMessage,
  isTextContentType,
  recipientsOf,
  senderOf,
  textAttachment,
} from "../lib/messages"
import { fromEpochMillis, toEpochMillis } from "../lib/timestamps"
import {
  childElement,
  childElements,
  createXmlDocument,
  parseXmlDocument,
  serializeXmlDocument,
  type XmlElementBuilder,
  type XmlNode,
} from "../lib/xml"
import type { Attachment, Direction, Message, WriteOptions } from "../types"

const ROOT_ELEMENT = "smses"

// Values used by the Android telephony provider.
const SMS_TYPE_RECEIVED = "1"
const SMS_TYPE_SENT = "2"
const SMS_OUTGOING_TYPES = new Set(["2", "3", "4", "5", "6"]) // sent, draft, outbox, failed, queued
const MMS_BOX_RECEIVED = "1"
const MMS_BOX_SENT = "2"
const MMS_OUTGOING_BOXES = new Set(["2", "3", "4"]) // sent, drafts, outbox
const MMS_TYPE_RETRIEVE_CONF = "132"
const MMS_TYPE_SEND_REQ = "128"
const ADDRESS_TYPE_FROM = "137"
const ADDRESS_TYPE_TO = "151"
const CHARSET_UTF_8 = "106"
const ADDRESS_SEPARATOR = "~"

/** Content location that marks the part carrying the message body. */
export const BODY_PART_LOCATION = "body.txt"

export async function readAndroid(text: string): Promise<Message[]> {
  const root = await parseXmlDocument(text)
  if (root.name !== ROOT_ELEMENT) {
    throw new ParseError(`Expected an Android SMS backup (<${ROOT_ELEMENT}> root), found <${root.name}>`)
  }

  return root.children.map((node, index) => {
    const label = `<${node.name}> #${index + 1}`
    switch (node.name) {
      case "sms":
        return readSms(node, label)
      case "mms":
        return readMms(node, label)
      default:
        throw new ParseError(`Unexpected <${node.name}> element at position ${index + 1}`)
    }
  })
}

/**
 * Serializes messages as an SMS Backup & Restore document.
 *
 * Messages with attachments or more than one participant become `<mms>` entries,
 * everything else `<sms>`. Outgoing MMS need the owner's number as their FROM
 * address: without it the Android app still imports them but reports an
 * "Unrecognized sender", so the writer refuses to produce such a document.
 */
export function writeAndroid(messages: readonly Message[], options: WriteOptions = {}): string {
  const phone = options.phone?.trim() || undefined
  if (!phone && messages.some((message) => message.direction === "sent" && isMms(message))) {
    throw new MissingPhoneError()
  }

  const root = createXmlDocument(ROOT_ELEMENT, { count: String(messages.length) }, { standalone: true })
  for (const message of messages) {
    if (isMms(message)) {
      appendMms(root, message, phone)
    } else {
      appendSms(root, message)
    }
  }

  return serializeXmlDocument(root)
}

export function isMms(message: Message): boolean {
  return message.attachments.length > 0 || isGroupMessage(message)
}

function appendSms(root: XmlElementBuilder, message: Message): void {
  root.ele("sms", {
    date: toEpochMillis(message.timestamp),
    address: message.participants[0] ?? "",
    type: message.direction === "received" ? SMS_TYPE_RECEIVED : SMS_TYPE_SENT,
    body: message.body,
    read: message.read ? "1" : "0",
  })
}

function appendMms(root: XmlElementBuilder, message: Message, phone: string | undefined): void {
  const received = message.direction === "received"
  const mms = root.ele("mms", {
    m_type: received ? MMS_TYPE_RETRIEVE_CONF : MMS_TYPE_SEND_REQ,
    msg_box: received ? MMS_BOX_RECEIVED : MMS_BOX_SENT,
    date: toEpochMillis(message.timestamp),
    address: [...message.participants].sort().join(ADDRESS_SEPARATOR),
    read: message.read ? "1" : "0",
    text_only: message.attachments.length === 0 ? "1" : "0",
  })

  const parts = mms.ele("parts")
  if (message.body.length > 0) {
    parts.ele("part", { chset: CHARSET_UTF_8, ct: "text/plain", cl: BODY_PART_LOCATION, text: message.body })
  }
  for (const attachment of message.attachments) {
    parts.ele("part", partAttributes(attachment))
  }

  const addrs = mms.ele("addrs")
  const sender = senderOf(message)
  if (sender !== undefined) {
    appendAddress(addrs, ADDRESS_TYPE_FROM, sender)
    if (phone) {
      appendAddress(addrs, ADDRESS_TYPE_TO, phone)
    }
  } else if (phone) {
    appendAddress(addrs, ADDRESS_TYPE_FROM, phone)
  }
  for (const recipient of recipientsOf(message)) {
    appendAddress(addrs, ADDRESS_TYPE_TO, recipient)
  }
}

function partAttributes(attachment: Attachment): Record<string, string> {
  if (isTextContentType(attachment.contentType)) {
    return { chset: CHARSET_UTF_8, ct: attachment.contentType, text: attachmentText(attachment) }
  }

  return { chset: CHARSET_UTF_8, ct: attachment.contentType, data: encodeBase64(attachment.data) }
}

function appendAddress(addrs: XmlElementBuilder, type: string, address: string): void {
  addrs.ele("addr", { charset: CHARSET_UTF_8, address, type })
}

function readSms(node: XmlNode, label: string): Message {
  const address = node.attributes.address?.trim() ?? ""
  if (address.length === 0) {
    throw new ParseError(`${label} is missing its address`)
  }

  return createMessage(
    {
      direction: smsDirection(node.attributes.type, label),
      timestamp: requireDate(node, label),
      participants: [address],
      body: node.attributes.body ?? "",
      attachments: [],
      read: node.attributes.read === "1",
    },
    label,
  )
}

function readMms(node: XmlNode, label: string): Message {
  const direction = mmsDirection(node.attributes.msg_box, label)
  const timestamp = requireDate(node, label)

  // Everyone in the conversation except the device owner.
  const conversation = (node.attributes.address ?? "")
    .split(ADDRESS_SEPARATOR)
    .map((address) => address.trim())
    .filter((address) => address.length > 0)
  const conversationKeys = new Set(conversation.map(normalizeAddress))

  const addrsNode = childElement(node, "addrs")
  const addresses = addrsNode ? childElements(addrsNode, "addr") : []
  const from = addresses.find((entry) => entry.attributes.type === ADDRESS_TYPE_FROM)?.attributes.address?.trim()
  const to = addresses
    .filter((entry) => entry.attributes.type === ADDRESS_TYPE_TO)
    .map((entry) => entry.attributes.address?.trim() ?? "")
    .filter((address) => address.length > 0 && conversationKeys.has(normalizeAddress(address)))

  let participants: string[]
  if (direction === "received") {
    if (!from) {
      throw new ParseError(`${label} is incoming but has no sender address (type ${ADDRESS_TYPE_FROM})`)
    }
    const senderKey = normalizeAddress(from)
    participants = [from, ...to.filter((address) => normalizeAddress(address) !== senderKey)]
  } else {
    participants = addresses.length > 0 ? to : conversation
  }

  const partsNode = childElement(node, "parts")
  const parts = partsNode ? childElements(partsNode, "part") : []
  const bodyParts: string[] = []
  const attachments: Attachment[] = []
  parts.forEach((part, index) => {
    const partLabel = `${label} part #${index + 1}`
    const attachment = readPart(part, partLabel)
    if (part.attributes.cl === BODY_PART_LOCATION && isTextContentType(attachment.contentType)) {
      bodyParts.push(attachmentText(attachment))
      return
    }
    attachments.push(attachment)
  })

  return createMessage(
    {
      direction,
      timestamp,
      participants,
      body: bodyParts.join(""),
      attachments,
      read: node.attributes.read === "1",
    },
    label,
  )
}

function readPart(node: XmlNode, label: string): Attachment {
  const contentType = node.attributes.ct?.trim() ?? ""
  if (contentType.length === 0) {
    throw new ParseError(`${label} is missing its content type`)
  }

  const encoded = node.attributes.data
  if (encoded !== undefined) {
    const data = decodeBase64(encoded)
    if (!data) {
      throw new ParseError(`${label} has invalid base64 data`)
    }
    return { contentType, data }
  }

  const text = node.attributes.text
  if (text === undefined) {
    throw new ParseError(`${label} has neither data nor text`)
  }

  return textAttachment(contentType, text)
}

function requireDate(node: XmlNode, label: string): bigint {
  const rawDate = node.attributes.date
  if (rawDate === undefined) {
    throw new ParseError(`${label} is missing its date`)
  }

  const timestamp = fromEpochMillis(rawDate)
  if (timestamp === undefined) {
    throw new ParseError(`${label} has an invalid date '${rawDate}'`)
  }

  return timestamp
}

function smsDirection(type: string | undefined, label: string): Direction {
  if (type === SMS_TYPE_RECEIVED) {
    return "received"
  }

  if (type !== undefined && SMS_OUTGOING_TYPES.has(type)) {
    return "sent"
  }

  throw new ParseError(`${label} has an unsupported type '${type ?? ""}'`)
}

function mmsDirection(box: string | undefined, label: string): Direction {
  if (box === MMS_BOX_RECEIVED) {
    return "received"
  }

  if (box !== undefined && MMS_OUTGOING_BOXES.has(box)) {
    return "sent"
  }

  throw new ParseError(`${label} has an unsupported msg_box '${box ?? ""}'`)
}
