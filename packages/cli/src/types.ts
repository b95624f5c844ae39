export type Direction = "sent" | "received"

export interface Attachment {
  readonly contentType: string
  /** Raw part content. Text parts (`text/plain`, `application/smil`) hold UTF-8 bytes. */
  readonly data: Buffer
}

/**
 * A single SMS or MMS in the format-neutral shape every reader produces and every
 * writer consumes.
 *
 * For a received message `participants[0]` is the sender and the remaining entries
 * are the other members of the group. For a sent message every entry is a recipient.
 */
export interface Message {
  readonly direction: Direction
  /** Nanoseconds since the Unix epoch. */
  readonly timestamp: bigint
  readonly participants: readonly string[]
  readonly body: string
  readonly attachments: readonly Attachment[]
  readonly read: boolean
}

export interface WriteOptions {
  /** The device owner's address, used as the sender of outgoing MMS. */
  phone?: string
}

export interface MessageFormat {
  label: string
  read(text: string): Promise<Message[]>
  write(messages: readonly Message[], options: WriteOptions): string
}
